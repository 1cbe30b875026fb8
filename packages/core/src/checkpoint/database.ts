// packages/core/src/checkpoint/database.ts

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { DatabaseError, toError } from '../utils/errors.js';

const SCHEMA_VERSION = '1';

const MIGRATIONS = [
  // Latest snapshot per workflow run
  `CREATE TABLE IF NOT EXISTS checkpoints (
    workflow_id     TEXT PRIMARY KEY,
    conversation_id TEXT NOT NULL,
    user_request    TEXT NOT NULL,
    current_stage   TEXT,
    start_time      TEXT,
    end_time        TEXT,
    state_json      TEXT NOT NULL,
    updated_at      TEXT NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_checkpoints_updated ON checkpoints(updated_at DESC)',
  'CREATE INDEX IF NOT EXISTS idx_checkpoints_conversation ON checkpoints(conversation_id)',

  // Schema meta
  `CREATE TABLE IF NOT EXISTS schema_meta (
    key   TEXT PRIMARY KEY,
    value TEXT NOT NULL
  )`,
];

/**
 * Open a SQLite database and run migrations.
 * Pass ':memory:' for in-memory databases (testing).
 */
export function openDatabase(dbPath: string): Database.Database {
  let db: Database.Database | undefined;
  try {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    db = new Database(dbPath);
    configurePragmas(db);

    const version = getSchemaVersion(db);
    if (version !== null && Number(version) > Number(SCHEMA_VERSION)) {
      throw new Error(`schema version ${version} is newer than supported version ${SCHEMA_VERSION}`);
    }

    runMigrations(db);
    return db;
  } catch (err) {
    db?.close();
    throw new DatabaseError(`Failed to open database at "${dbPath}": ${toError(err).message}`, 'open');
  }
}

function configurePragmas(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
}

/**
 * Run all schema migrations. Idempotent (uses IF NOT EXISTS).
 */
export function runMigrations(db: Database.Database): void {
  db.transaction(() => {
    for (const sql of MIGRATIONS) {
      db.exec(sql);
    }

    db.prepare("INSERT OR REPLACE INTO schema_meta(key, value) VALUES ('version', ?)").run(
      SCHEMA_VERSION,
    );
    db.prepare(
      "INSERT OR IGNORE INTO schema_meta(key, value) VALUES ('created_at', datetime('now'))",
    ).run();
  })();
}

/** Get the current schema version, or null for a database that was never migrated. */
export function getSchemaVersion(db: Database.Database): string | null {
  const meta: unknown = db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_meta'")
    .get();
  if (meta === undefined) return null;

  const row: unknown = db.prepare("SELECT value FROM schema_meta WHERE key = 'version'").get();
  return isRecord(row) && typeof row.value === 'string' ? row.value : null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
