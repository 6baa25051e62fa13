/**
 * CLI helpers: error handling and option parsing.
 */

import { InvalidArgumentError } from 'commander';
import { ColumnKey, isColumnKey } from './table/columns.js';
import * as out from './output.js';

/**
 * Run a command action, reporting any error and flagging a failed exit.
 * Startup errors are fatal: nothing else runs after the action.
 */
export async function $try(fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    if (err instanceof Error) {
      out.error(err.message);
    } else {
      out.error(String(err));
    }
    process.exitCode = 1;
  }
}

/** commander argument parser for --sort */
export function parseSortColumn(value: string): ColumnKey {
  const key = value.toLowerCase();
  if (isColumnKey(key)) return key;
  throw new InvalidArgumentError(`Expected one of: ${Object.values(ColumnKey).join(', ')}`);
}
