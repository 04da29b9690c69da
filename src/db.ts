import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { StoreUnavailableError, describeError } from "./errors.js";

export type Db = Database.Database;

const SCHEMA = `
CREATE TABLE IF NOT EXISTS collections (
  id TEXT PRIMARY KEY,
  title TEXT NOT NULL,
  source_url TEXT NOT NULL,
  title_confirmed INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE IF NOT EXISTS subcollections (
  id TEXT PRIMARY KEY,
  collection_id TEXT NOT NULL REFERENCES collections(id) ON DELETE CASCADE,
  sequence_number INTEGER NOT NULL,
  title TEXT NOT NULL,
  description TEXT,
  source_url TEXT,
  updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  UNIQUE (collection_id, sequence_number)
);

CREATE TABLE IF NOT EXISTS actors (
  handle TEXT PRIMARY KEY,
  display_name TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS items (
  id TEXT NOT NULL,
  subcollection_id TEXT NOT NULL REFERENCES subcollections(id) ON DELETE CASCADE,
  title TEXT NOT NULL,
  primary_attribute TEXT,
  secondary_attribute TEXT,
  submitter TEXT REFERENCES actors(handle),
  submission_note TEXT,
  aggregate_score INTEGER NOT NULL DEFAULT 0,
  awarded_score INTEGER NOT NULL DEFAULT 0,
  voter_count INTEGER NOT NULL DEFAULT 0,
  position INTEGER NOT NULL,
  source_url TEXT,
  updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  PRIMARY KEY (subcollection_id, id)
);

CREATE TABLE IF NOT EXISTS leaf_records (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  subcollection_id TEXT NOT NULL,
  item_id TEXT NOT NULL,
  actor TEXT NOT NULL REFERENCES actors(handle),
  value INTEGER CHECK (value IS NULL OR value >= 0),
  note TEXT,
  FOREIGN KEY (subcollection_id, item_id) REFERENCES items(subcollection_id, id) ON DELETE CASCADE,
  UNIQUE (subcollection_id, item_id, actor)
);

CREATE TABLE IF NOT EXISTS checkpoints (
  collection_id TEXT NOT NULL,
  subcollection_id TEXT NOT NULL DEFAULT '',
  status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'in_progress', 'complete', 'failed')),
  attempt_count INTEGER NOT NULL DEFAULT 0,
  last_attempt_at TEXT,
  error_detail TEXT,
  position INTEGER NOT NULL DEFAULT 0,
  PRIMARY KEY (collection_id, subcollection_id)
);

CREATE INDEX IF NOT EXISTS idx_subcollections_collection ON subcollections(collection_id);
CREATE INDEX IF NOT EXISTS idx_items_submitter ON items(submitter);
CREATE INDEX IF NOT EXISTS idx_leaf_records_actor ON leaf_records(actor);
CREATE INDEX IF NOT EXISTS idx_checkpoints_status ON checkpoints(status);
`;

/** Opens (creating if needed) the database holding both extracted rows and checkpoints. */
export function openDatabase(dbPath: string): Db {
  try {
    if (dbPath !== ":memory:") fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    const db = new Database(dbPath);
    if (dbPath !== ":memory:") db.pragma("journal_mode = WAL");
    db.pragma("foreign_keys = ON");
    db.exec(SCHEMA);
    return db;
  } catch (err) {
    throw new StoreUnavailableError(`Cannot open database ${dbPath}: ${describeError(err)}`, { cause: err });
  }
}

/** Copies the database file next to itself, e.g. `harvest.db` → `harvest.backup-20260101-120000.db`. */
export function backupDatabase(db: Db, dbPath: string, stamp: string): Promise<string> {
  const ext = path.extname(dbPath);
  const target = path.join(path.dirname(dbPath), `${path.basename(dbPath, ext)}.backup-${stamp}${ext}`);
  return db.backup(target).then(() => target);
}
