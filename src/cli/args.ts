/**
 * Command-line argument parsing.
 */

import type { FilterSpec } from '../query/types';

export type Mode = 'backpack' | 'container';

export interface CliOptions {
  file: string;
  mode: Mode;
  filter: FilterSpec;
  out: string;
  config?: string;
  json: boolean;
  verbose: boolean;
}

export type ParseResult =
  | { kind: 'help' }
  | { kind: 'run'; options: CliOptions };

export const DEFAULT_OUTPUT = 'inventory.png';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `
Backpack & Container Viewer

Usage:
  backpack-viewer [query] -f <file> [options]

Options:
  -f, --file <path>            Backpack save (.dat) or container dump (.json)  (required)
  --mode <backpack|container>  Processing mode (default: from the file extension)
  --owner <name|uuid>          Backpacks owned by this player name or backpack uuid
  --item <id>                  Records holding this item; "mod:item" matches exactly,
                               anything else matches as a substring of the id
  --upgrade <id>               Backpacks with this upgrade installed
  --nodungeon                  Exclude dungeon loot containers
  --ctype <id>                 Containers of this block id (alias: --container-type)
  --nbt <text>                 Containers whose item NBT contains this text
  --config <path>              JSON file overriding the save layout key names
  -o, --out <path>             Output image (default: ${DEFAULT_OUTPUT})
  --json                       Print matched records as JSON instead of a summary
  -v, --verbose                Log debug details
  -h, --help                   Show this help

Examples:
  backpack-viewer -f sophisticatedbackpacks.dat --item minecraft:flint
  backpack-viewer -f sophisticatedbackpacks.dat --owner Steve
  backpack-viewer -f sophisticatedbackpacks.dat --upgrade sophisticatedbackpacks:stack_upgrade_tier_1
  backpack-viewer -f containers.json --item diamond --nbt Float420 --nodungeon
`;

/**
 * Mode implied by the file name: JSON dumps are containers, anything else
 * is read as an NBT backpack save.
 */
export function detectMode(file: string): Mode {
  return file.toLowerCase().endsWith('.json') ? 'container' : 'backpack';
}

/**
 * `--item` with a namespaced id is an exact match, a bare word a substring.
 */
export function itemPredicate(value: string): Pick<FilterSpec, 'item' | 'itemContains'> {
  return value.includes(':') ? { item: value } : { itemContains: value };
}

export function parseArgs(args: readonly string[]): ParseResult {
  let file: string | undefined;
  let mode: Mode | undefined;
  let out = DEFAULT_OUTPUT;
  let config: string | undefined;
  let json = false;
  let verbose = false;
  let query: string | undefined;
  const filter: {
    -readonly [K in keyof FilterSpec]: FilterSpec[K];
  } = {};

  let i = 0;
  const value = (flag: string): string => {
    const next = args[i + 1];
    if (next === undefined || (next.startsWith('-') && next.length > 1 && !/^-\d/.test(next))) {
      throw new UsageError(`Missing value for ${flag}`);
    }
    i += 2;
    return next;
  };

  while (i < args.length) {
    const arg = args[i];
    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-f':
      case '--file':
        file = value(arg);
        break;
      case '--mode': {
        const m = value(arg);
        if (m !== 'backpack' && m !== 'container') {
          throw new UsageError(`Invalid mode: ${m} (expected backpack or container)`);
        }
        mode = m;
        break;
      }
      case '--owner':
        filter.owner = value(arg);
        break;
      case '--item':
        Object.assign(filter, itemPredicate(value(arg)));
        break;
      case '--upgrade':
        filter.upgrade = value(arg);
        break;
      case '--ctype':
      case '--container-type':
        filter.containerType = value(arg);
        break;
      case '--nbt':
        filter.nbt = value(arg);
        break;
      case '--config':
        config = value(arg);
        break;
      case '-o':
      case '--out':
        out = value(arg);
        break;
      case '--nodungeon':
        filter.excludeDungeon = true;
        i++;
        break;
      case '--json':
        json = true;
        i++;
        break;
      case '-v':
      case '--verbose':
        verbose = true;
        i++;
        break;
      default:
        if (arg.startsWith('-') && arg.length > 1) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        if (query !== undefined) {
          throw new UsageError(`Unexpected argument: ${arg}`);
        }
        query = arg;
        i++;
    }
  }

  if (!file) {
    throw new UsageError('Missing required option --file');
  }
  if (query !== undefined) {
    filter.query = query;
  }

  return {
    kind: 'run',
    options: {
      file,
      mode: mode ?? detectMode(file),
      filter,
      out,
      config,
      json,
      verbose,
    },
  };
}
