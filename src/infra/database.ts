import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import type { Logger } from './logger.js';

export type SqliteDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS tokens (
    address TEXT NOT NULL,
    chain_id INTEGER NOT NULL,
    symbol TEXT,
    name TEXT,
    decimals INTEGER,
    first_seen TEXT NOT NULL,
    PRIMARY KEY (address, chain_id)
  );

  CREATE TABLE IF NOT EXISTS pools (
    chain_id INTEGER NOT NULL,
    token_address TEXT NOT NULL,
    pool_address TEXT NOT NULL,
    dex TEXT NOT NULL,
    fee_tier INTEGER NOT NULL,
    quote_symbol TEXT NOT NULL,
    quote_address TEXT NOT NULL,
    quote_decimals INTEGER NOT NULL,
    discovered_at TEXT NOT NULL,
    PRIMARY KEY (chain_id, token_address, pool_address)
  );

  CREATE TABLE IF NOT EXISTS positions (
    id TEXT PRIMARY KEY,
    token_address TEXT NOT NULL,
    chain_id INTEGER NOT NULL,
    pricing_chain_id INTEGER NOT NULL,
    symbol TEXT NOT NULL,
    decimals INTEGER NOT NULL,
    quantity TEXT NOT NULL,
    entry_price REAL NOT NULL,
    take_profit_pct REAL NOT NULL,
    stop_loss_pct REAL NOT NULL,
    quote_symbol TEXT NOT NULL,
    fee_tier INTEGER NOT NULL,
    status TEXT NOT NULL CHECK (status IN ('HOLDING', 'EXIT_PENDING', 'CLOSED')),
    exit_reason TEXT,
    exit_price REAL,
    exit_tx_hash TEXT,
    realized_pnl REAL,
    opened_at TEXT NOT NULL,
    closed_at TEXT
  );

  CREATE UNIQUE INDEX IF NOT EXISTS idx_positions_one_open
    ON positions (token_address, chain_id) WHERE status != 'CLOSED';

  CREATE TRIGGER IF NOT EXISTS trg_positions_entry_price_immutable
    BEFORE UPDATE OF entry_price ON positions
    WHEN NEW.entry_price != OLD.entry_price
  BEGIN
    SELECT RAISE(ABORT, 'entry_price is immutable');
  END;

  CREATE TABLE IF NOT EXISTS executions (
    id TEXT PRIMARY KEY,
    position_id TEXT,
    side TEXT NOT NULL,
    reason TEXT NOT NULL,
    chain_id INTEGER NOT NULL,
    token_in TEXT NOT NULL,
    token_out TEXT NOT NULL,
    amount_in TEXT NOT NULL,
    min_amount_out TEXT NOT NULL,
    status TEXT NOT NULL,
    tx_hash TEXT,
    gas_used TEXT,
    gas_cost_wei TEXT,
    error_message TEXT,
    created_at TEXT NOT NULL,
    completed_at TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_executions_position ON executions (position_id);

  CREATE TABLE IF NOT EXISTS whitelisted_senders (
    address TEXT PRIMARY KEY,
    label TEXT,
    added_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS whitelist_audit (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    action TEXT NOT NULL,
    address TEXT NOT NULL,
    label TEXT,
    actor TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS whitelisted_tokens (
    address TEXT NOT NULL,
    chain_id INTEGER NOT NULL,
    symbol TEXT,
    sender TEXT,
    status TEXT NOT NULL DEFAULT 'pending',
    added_at TEXT NOT NULL,
    PRIMARY KEY (address, chain_id)
  );

  CREATE TABLE IF NOT EXISTS token_events (
    transfer_id TEXT NOT NULL,
    chain_id INTEGER NOT NULL,
    token_address TEXT NOT NULL,
    sender TEXT NOT NULL,
    amount TEXT,
    block_number INTEGER,
    tx_hash TEXT,
    created_at TEXT NOT NULL,
    PRIMARY KEY (chain_id, transfer_id)
  );
`;

export function createDatabase(filename: string, logger: Logger): SqliteDatabase {
  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }

  const db = new Database(filename);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA);

  logger.info({ filename }, 'SQLite database ready');
  return db;
}

export function checkDatabaseHealth(db: SqliteDatabase): boolean {
  try {
    const row = db.prepare<[], { ok: number }>('SELECT 1 AS ok').get();
    return row?.ok === 1;
  } catch {
    return false;
  }
}
