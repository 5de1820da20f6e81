import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

export type LedgerDb = Database.Database;

const PRAGMAS = [
  "busy_timeout = 5000",
  "journal_mode = WAL",
  // fsync on every commit
  "synchronous = FULL",
];

export function openLedgerDb(dbPath: string): LedgerDb {
  mkdirSync(dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  for (const pragma of PRAGMAS) {
    db.pragma(pragma);
  }

  db.exec(`
  CREATE TABLE IF NOT EXISTS ledger (
    seq       INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id    TEXT NOT NULL,
    batch_id  TEXT NOT NULL,
    phase     TEXT NOT NULL,      -- started | file-copied | verified | completed | failed
    path      TEXT,               -- file-copied only
    reason    TEXT,               -- failed only
    attempts  INTEGER,            -- failed copy only
    manifest  TEXT,               -- JSON; started and completed
    ts        INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS ledger_batch_idx ON ledger(batch_id, seq);
  CREATE INDEX IF NOT EXISTS ledger_run_idx ON ledger(run_id, batch_id);
  CREATE TRIGGER IF NOT EXISTS ledger_no_update
    BEFORE UPDATE ON ledger
    BEGIN
      SELECT RAISE(ABORT, 'ledger rows are append-only');
    END;
`);

  return db;
}
