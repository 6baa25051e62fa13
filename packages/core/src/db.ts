import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { mkdirSync } from 'node:fs';

export type TaskDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database };

/** Returns the platform-appropriate default database path */
export function getDefaultDbPath(): string {
  const platform = process.platform;
  let dir: string;

  if (platform === 'darwin') {
    dir = join(homedir(), 'Library', 'Application Support', 'tsk');
  } else if (platform === 'win32') {
    dir = join(process.env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), 'tsk');
  } else {
    // Linux / other
    dir = join(process.env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), 'tsk');
  }

  return join(dir, 'tsk.db');
}

/** Idempotent schema; applied when a repository is created */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    status INTEGER NOT NULL DEFAULT 1,
    priority INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    due TEXT,
    notes TEXT
);

CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
CREATE INDEX IF NOT EXISTS idx_tasks_priority ON tasks(priority);
`;

/**
 * Open a Drizzle database connection with pragmas set.
 * If no path is given, uses the platform default.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function createDb(path?: string): TaskDb {
  const dbPath = path ?? getDefaultDbPath();

  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);

  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('busy_timeout = 5000');

  return drizzle(sqlite, { schema });
}

/** In-memory database with the schema applied. For tests. */
export function createTestDb(): TaskDb {
  const db = createDb(':memory:');
  db.$client.exec(CREATE_SCHEMA_SQL);
  return db;
}

/** Get the raw better-sqlite3 handle behind a Drizzle instance */
export function getRawDb(db: TaskDb): Database.Database {
  return db.$client;
}

export function closeDb(db: TaskDb): void {
  const raw = getRawDb(db);
  if (raw.open) raw.close();
}
