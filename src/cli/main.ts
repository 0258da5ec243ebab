/**
 * Command entry: argument handling, file checks and exit codes.
 */

import * as fs from 'fs';
import { USAGE, UsageError, parseArgs } from './args';
import type { ParseResult } from './args';
import { run } from './run';

function printUsage(): void {
  console.log(USAGE);
}

/**
 * Run the command for the given arguments and return its exit code.
 */
export function main(args: string[]): number {
  if (args.length === 0) {
    printUsage();
    return 0;
  }

  let parsed: ParseResult;
  try {
    parsed = parseArgs(args);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}`);
      printUsage();
      return 1;
    }
    throw error;
  }

  if (parsed.kind === 'help') {
    printUsage();
    return 0;
  }

  const { options } = parsed;
  if (!fs.existsSync(options.file)) {
    console.error(`Error: File not found: ${options.file}`);
    return 1;
  }
  if (options.config && !fs.existsSync(options.config)) {
    console.error(`Error: File not found: ${options.config}`);
    return 1;
  }

  try {
    run(options);
    return 0;
  } catch (error) {
    // Decode failures, unreadable files and render limits all end the run
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
