// Database client (better-sqlite3)
import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { env } from './env.js';
import { AppError } from './utils/errors.js';

export type ClinicDb = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS patients (
    id TEXT PRIMARY KEY,
    name TEXT,
    created_at TEXT NOT NULL,
    last_message_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS interactions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    patient_id TEXT NOT NULL REFERENCES patients(id),
    message_text TEXT NOT NULL,
    intent TEXT NOT NULL,
    confidence REAL NOT NULL,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_interactions_patient ON interactions(patient_id, created_at DESC);

  CREATE TABLE IF NOT EXISTS appointments (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    patient_id TEXT NOT NULL REFERENCES patients(id),
    starts_at TEXT NOT NULL,
    ends_at TEXT NOT NULL,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_appointments_starts_at ON appointments(starts_at);
`;

/**
 * Open (creating if needed) a database file and apply the schema.
 * Pass ':memory:' for a throwaway in-process database.
 */
export function openDatabase(filename: string): ClinicDb {
  if (filename !== ':memory:') {
    const resolved = path.isAbsolute(filename) ? filename : path.join(process.cwd(), filename);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    filename = resolved;
  }

  const db = new Database(filename);
  try {
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.pragma('busy_timeout = 5000');
    db.exec(SCHEMA);
  } catch (err) {
    // A corrupt or locked file still hands back a live handle
    db.close();
    throw err;
  }
  return db;
}

let shared: ClinicDb | null = null;

// Opened lazily so the process (and GET /) stays up when the file is unusable
export function getDb(): ClinicDb {
  if (!shared) {
    shared = openDatabase(env.DATABASE_PATH);
  }
  return shared;
}

export function closeDb(): void {
  if (shared) {
    shared.close();
    shared = null;
  }
}

export interface DbPluginOptions {
  db?: ClinicDb;
}

// Route plugins take an explicit database in tests and fall back to the shared one
export function resolveDb(opts: DbPluginOptions): ClinicDb {
  return guardStorage('open', () => opts.db ?? getDb());
}

// Any driver failure (closed, locked, corrupt file) surfaces as a storage error
export function guardStorage<T>(operation: string, run: () => T): T {
  try {
    return run();
  } catch (err) {
    if (err instanceof AppError) throw err;
    throw AppError.storage(`Database unavailable during ${operation}`, err);
  }
}
