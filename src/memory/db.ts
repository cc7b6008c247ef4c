import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';

export type SqliteDatabase = Database.Database;

const SCHEMA: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS receipts (
    access_key TEXT PRIMARY KEY,
    issuer_name TEXT NOT NULL,
    issuer_cnpj TEXT NOT NULL,
    issuer_address TEXT,
    number TEXT,
    series TEXT,
    issued_at_text TEXT,
    issued_at TEXT,
    consumer_cpf TEXT,
    consumer_name TEXT,
    declared_item_count INTEGER,
    total_value REAL NOT NULL,
    paid_value REAL NOT NULL,
    taxes REAL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS products (
    id TEXT PRIMARY KEY,
    base_name TEXT NOT NULL,
    base_brand TEXT,
    normalized_key TEXT NOT NULL UNIQUE,
    category TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS line_items (
    access_key TEXT NOT NULL REFERENCES receipts(access_key) ON DELETE CASCADE,
    sequence INTEGER NOT NULL,
    description TEXT NOT NULL,
    code TEXT,
    quantity REAL NOT NULL,
    unit TEXT,
    unit_price REAL NOT NULL,
    total_price REAL NOT NULL,
    category_suggested TEXT,
    category_confirmed TEXT,
    classification_source TEXT,
    confidence REAL,
    product_id TEXT REFERENCES products(id),
    updated_at TEXT NOT NULL,
    PRIMARY KEY (access_key, sequence)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_line_items_pending ON line_items(category_confirmed)`,
  `CREATE TABLE IF NOT EXISTS payments (
    access_key TEXT NOT NULL REFERENCES receipts(access_key) ON DELETE CASCADE,
    position INTEGER NOT NULL,
    method TEXT NOT NULL,
    amount REAL NOT NULL,
    PRIMARY KEY (access_key, position)
  )`,
  `CREATE TABLE IF NOT EXISTS product_aliases (
    alias_text TEXT PRIMARY KEY,
    product_id TEXT NOT NULL REFERENCES products(id),
    updated_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS product_embeddings (
    product_id TEXT PRIMARY KEY,
    description TEXT NOT NULL,
    model TEXT NOT NULL,
    vector TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS classification_records (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    access_key TEXT NOT NULL,
    sequence INTEGER NOT NULL,
    source TEXT NOT NULL,
    model_name TEXT,
    raw_response TEXT,
    confidence REAL NOT NULL,
    timestamp TEXT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_classification_records_item ON classification_records(access_key, sequence)`,
  `CREATE TABLE IF NOT EXISTS manual_reviews (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    access_key TEXT NOT NULL,
    sequence INTEGER NOT NULL,
    category TEXT,
    product_name TEXT,
    product_brand TEXT,
    reviewer TEXT,
    notes TEXT,
    confirmed INTEGER NOT NULL,
    timestamp TEXT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_manual_reviews_receipt ON manual_reviews(access_key)`,
];

export function applySchema(db: SqliteDatabase): void {
  for (const ddl of SCHEMA) {
    db.prepare(ddl).run();
  }
}

/** Opens (creating if needed) the receipts database; pass `:memory:` for a throwaway one. */
export function openReceiptDatabase(filename = 'data/receipts.db'): SqliteDatabase {
  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }
  const db = new Database(filename);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  applySchema(db);
  return db;
}
