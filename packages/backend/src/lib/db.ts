import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';

export type SqliteDatabase = Database.Database;

/**
 * Open the history database and make sure its tables exist.
 * `:memory:` gives a private in-process database (used by tests).
 */
export function openDatabase(path: string): SqliteDatabase {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  migrate(db);
  return db;
}

export function migrate(db: SqliteDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS pools (
      tool TEXT PRIMARY KEY,
      total INTEGER NOT NULL,
      commit_qty INTEGER NOT NULL DEFAULT 0,
      max_overage INTEGER NOT NULL DEFAULT 0,
      commit_price REAL NOT NULL DEFAULT 0.0,
      overage_price_per_license REAL NOT NULL DEFAULT 0.0,
      active INTEGER NOT NULL DEFAULT 1
    );

    CREATE TABLE IF NOT EXISTS borrows (
      id TEXT PRIMARY KEY,
      tool TEXT NOT NULL,
      user TEXT NOT NULL,
      borrowed_at TEXT NOT NULL,
      returned_at TEXT,
      is_overage INTEGER NOT NULL DEFAULT 0,
      FOREIGN KEY(tool) REFERENCES pools(tool)
    );

    CREATE INDEX IF NOT EXISTS borrows_outstanding ON borrows(returned_at);

    CREATE TABLE IF NOT EXISTS overage_charges (
      id TEXT PRIMARY KEY,
      tool TEXT NOT NULL,
      borrow_id TEXT NOT NULL,
      user TEXT NOT NULL,
      charged_at TEXT NOT NULL,
      amount REAL NOT NULL,
      FOREIGN KEY(tool) REFERENCES pools(tool),
      FOREIGN KEY(borrow_id) REFERENCES borrows(id)
    );
  `);
}
