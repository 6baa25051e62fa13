#!/usr/bin/env -S npx tsx

import { Command } from 'commander';
import { getDefaultDbPath } from '@tsk/core';
import { run } from './run.js';
import { $try, parseSortColumn } from './helpers.js';
import { ColumnKey } from './table/columns.js';

interface Options {
  db: string;
  sort: ColumnKey;
  desc?: boolean;
}

const program = new Command()
  .name('tsk')
  .description('Browse tasks in an interactive terminal table (j/k to move, h to toggle header, q to quit)')
  .version('1.0.0')
  .option('--db <path>', 'Path to the task database', getDefaultDbPath())
  .option('-s, --sort <column>', `Initial sort column (${Object.values(ColumnKey).join(', ')})`, parseSortColumn, ColumnKey.Id)
  .option('-d, --desc', 'Sort descending')
  .action((opts: Options) => $try(() =>
    run({ dbPath: opts.db, sort: { column: opts.sort, ascending: !opts.desc } })));

await program.parseAsync();
