import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

let db: Database.Database | undefined;

/**
 * Open a SQLite database with the pragmas and schema the store expects.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const database = new Database(dbPath === ':memory:' ? dbPath : path.resolve(dbPath));

  database.pragma('journal_mode = WAL');
  database.pragma('foreign_keys = ON');
  // INTEGER columns (cents, counts, flags) come back as bigint so amounts past 2^53 stay exact
  database.defaultSafeIntegers(true);

  createSchema(database);

  return database;
}

export function initializeDatabase(dbPath: string): Database.Database {
  db = openDatabase(dbPath);
  return db;
}

function createSchema(database: Database.Database): void {
  const statements = [
    `CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      username TEXT,
      created_at TEXT DEFAULT CURRENT_TIMESTAMP
    )`,

    // NOCASE keeps "Food" and "food" from coexisting for one user
    `CREATE TABLE IF NOT EXISTS categories (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      name TEXT NOT NULL COLLATE NOCASE,
      icon TEXT NOT NULL,
      created_at TEXT DEFAULT CURRENT_TIMESTAMP,
      FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE,
      UNIQUE(user_id, name)
    )`,

    `CREATE TABLE IF NOT EXISTS expense_groups (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      description TEXT,
      created_by TEXT NOT NULL,
      created_at TEXT DEFAULT CURRENT_TIMESTAMP,
      FOREIGN KEY (created_by) REFERENCES users(id) ON DELETE CASCADE
    )`,

    `CREATE TABLE IF NOT EXISTS group_members (
      group_id TEXT NOT NULL,
      user_id TEXT NOT NULL,
      PRIMARY KEY (group_id, user_id),
      FOREIGN KEY (group_id) REFERENCES expense_groups(id) ON DELETE CASCADE,
      FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
    )`,

    `CREATE TABLE IF NOT EXISTS expenses (
      id TEXT PRIMARY KEY,
      description TEXT NOT NULL,
      amount_cents INTEGER NOT NULL CHECK (amount_cents > 0),
      date TEXT NOT NULL,
      category_id TEXT,
      group_id TEXT,
      paid_by TEXT NOT NULL,
      is_ai_generated INTEGER NOT NULL DEFAULT 0,
      receipt_path TEXT,
      created_at TEXT DEFAULT CURRENT_TIMESTAMP,
      FOREIGN KEY (category_id) REFERENCES categories(id) ON DELETE SET NULL,
      FOREIGN KEY (group_id) REFERENCES expense_groups(id) ON DELETE CASCADE,
      FOREIGN KEY (paid_by) REFERENCES users(id) ON DELETE CASCADE
    )`,

    `CREATE INDEX IF NOT EXISTS idx_expenses_date ON expenses(date)`,
    `CREATE INDEX IF NOT EXISTS idx_expenses_paid_by_date ON expenses(paid_by, date)`,
    `CREATE INDEX IF NOT EXISTS idx_categories_user ON categories(user_id)`,
    `CREATE INDEX IF NOT EXISTS idx_group_members_user ON group_members(user_id)`,
  ];

  for (const stmt of statements) {
    database.exec(stmt);
  }
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = undefined;
  }
}
