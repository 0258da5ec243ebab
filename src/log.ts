// log.ts
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerOptions {
  namespace?: string;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

interface LoggingConfig {
  minLevel: LogLevel;
  silent: boolean;
  setMinLevel(level: LogLevel): void;
  setSilent(silent: boolean): void;
}

const globalConfig: LoggingConfig = {
  minLevel: 'info',
  silent: false,

  setMinLevel(level: LogLevel) {
    this.minLevel = level;
  },

  setSilent(silent: boolean) {
    this.silent = silent;
  },
};

/**
 * Namespaced console logger. Every level writes to stderr so stdout
 * only ever carries the command's own output.
 */
export class Logger {
  private namespace?: string;

  constructor(options: LoggerOptions = {}) {
    this.namespace = options.namespace;
  }

  private shouldLog(level: LogLevel) {
    return !globalConfig.silent && levelPriority[level] >= levelPriority[globalConfig.minLevel];
  }

  private prefix(level: LogLevel) {
    const ns = this.namespace ? `[${this.namespace}]` : '';
    return level === 'info' ? ns : `${ns} ${level.toUpperCase()}:`.trimStart();
  }

  debug(msg: string, ...args: unknown[]) {
    if (this.shouldLog('debug')) console.error(this.prefix('debug'), msg, ...args);
  }

  info(msg: string, ...args: unknown[]) {
    if (this.shouldLog('info')) console.error(this.prefix('info'), msg, ...args);
  }

  warn(msg: string, ...args: unknown[]) {
    if (this.shouldLog('warn')) console.warn(this.prefix('warn'), msg, ...args);
  }

  error(msg: string, ...args: unknown[]) {
    if (this.shouldLog('error')) console.error(this.prefix('error'), msg, ...args);
  }
}

export const Logging = globalConfig;
