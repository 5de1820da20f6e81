// src/ledger-store.ts
//
// Persistence for the transfer ledger. A store only appends and replays;
// all phase bookkeeping lives in Ledger (ledger.ts).

import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  truncateSync,
  writeFileSync,
  writeSync,
} from "node:fs";
import path from "node:path";
import { z } from "zod";
import { openLedgerDb, type LedgerDb } from "./db.js";
import type { Logger } from "./logger.js";
import type { Manifest } from "./manifest.js";

export const LEDGER_PHASES = [
  "started",
  "file-copied",
  "verified",
  "completed",
  "failed",
] as const;

export type LedgerPhase = (typeof LEDGER_PHASES)[number];

export interface TransactionRecord {
  seq: number;
  runId: string;
  batchId: string;
  phase: LedgerPhase;
  ts: number;
  path?: string;
  reason?: string;
  attempts?: number;
  manifest?: Manifest;
}

export type NewTransactionRecord = Omit<TransactionRecord, "seq">;

export interface LedgerStore {
  readonly location: string;
  append(record: NewTransactionRecord): TransactionRecord;
  readAll(): TransactionRecord[];
  /** Atomically replace the whole history. Only used by retention pruning. */
  replaceAll(records: TransactionRecord[]): void;
  close(): void;
}

export type LedgerFormat = "sqlite" | "jsonl";

const manifestSchema = z.array(
  z.object({
    relativePath: z.string(),
    sizeBytes: z.number().int().nonnegative(),
    modifiedTime: z.number(),
  }),
);

const recordSchema = z.object({
  seq: z.number().int().positive(),
  runId: z.string().min(1),
  batchId: z.string().min(1),
  phase: z.enum(LEDGER_PHASES),
  ts: z.number(),
  path: z.string().optional(),
  reason: z.string().optional(),
  attempts: z.number().int().optional(),
  manifest: manifestSchema.optional(),
});

function parseManifest(raw: string | null): Manifest | undefined {
  if (raw == null) return undefined;
  return manifestSchema.parse(JSON.parse(raw));
}

type LedgerRow = {
  seq: number;
  run_id: string;
  batch_id: string;
  phase: string;
  path: string | null;
  reason: string | null;
  attempts: number | null;
  manifest: string | null;
  ts: number;
};

function rowToRecord(row: LedgerRow): TransactionRecord {
  return recordSchema.parse({
    seq: row.seq,
    runId: row.run_id,
    batchId: row.batch_id,
    phase: row.phase,
    ts: row.ts,
    path: row.path ?? undefined,
    reason: row.reason ?? undefined,
    attempts: row.attempts ?? undefined,
    manifest: parseManifest(row.manifest),
  });
}

export class SqliteLedgerStore implements LedgerStore {
  private readonly db: LedgerDb;
  private readonly insertStmt;
  private readonly insertWithSeqStmt;
  private readonly allStmt;

  constructor(readonly location: string) {
    this.db = openLedgerDb(location);
    this.insertStmt = this.db.prepare<
      [string, string, string, string | null, string | null, number | null, string | null, number]
    >(
      `INSERT INTO ledger(run_id, batch_id, phase, path, reason, attempts, manifest, ts)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    this.insertWithSeqStmt = this.db.prepare<
      [number, string, string, string, string | null, string | null, number | null, string | null, number]
    >(
      `INSERT INTO ledger(seq, run_id, batch_id, phase, path, reason, attempts, manifest, ts)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    this.allStmt = this.db.prepare<[], LedgerRow>(
      `SELECT seq, run_id, batch_id, phase, path, reason, attempts, manifest, ts
         FROM ledger
        ORDER BY seq`,
    );
  }

  append(record: NewTransactionRecord): TransactionRecord {
    const info = this.insertStmt.run(
      record.runId,
      record.batchId,
      record.phase,
      record.path ?? null,
      record.reason ?? null,
      record.attempts ?? null,
      record.manifest ? JSON.stringify(record.manifest) : null,
      record.ts,
    );
    return { ...record, seq: Number(info.lastInsertRowid) };
  }

  readAll(): TransactionRecord[] {
    return this.allStmt.all().map(rowToRecord);
  }

  replaceAll(records: TransactionRecord[]): void {
    const tx = this.db.transaction((entries: TransactionRecord[]) => {
      this.db.exec("DELETE FROM ledger");
      for (const r of entries) {
        this.insertWithSeqStmt.run(
          r.seq,
          r.runId,
          r.batchId,
          r.phase,
          r.path ?? null,
          r.reason ?? null,
          r.attempts ?? null,
          r.manifest ? JSON.stringify(r.manifest) : null,
          r.ts,
        );
      }
    });
    tx(records);
  }

  close(): void {
    this.db.close();
  }
}

/**
 * One JSON object per line, fsync'd after every append. A crash can leave a
 * torn final line; it is cut off when the store is opened so the next
 * append starts on a fresh line.
 */
export class JsonlLedgerStore implements LedgerStore {
  private fd: number;
  private nextSeq = 1;

  constructor(
    readonly location: string,
    private readonly logger?: Logger,
  ) {
    mkdirSync(path.dirname(location), { recursive: true });
    if (existsSync(location)) {
      this.dropTornTail();
      const records = this.replay();
      const last = records[records.length - 1];
      if (last) this.nextSeq = last.seq + 1;
    }
    this.fd = openSync(location, "a");
  }

  private dropTornTail(): void {
    const buf = readFileSync(this.location);
    if (buf.length === 0 || buf[buf.length - 1] === 0x0a) return;
    const keep = buf.lastIndexOf(0x0a) + 1;
    this.logger?.warn("dropping torn ledger line", {
      file: this.location,
      bytes: buf.length - keep,
    });
    truncateSync(this.location, keep);
  }

  private replay(): TransactionRecord[] {
    const lines = readFileSync(this.location, "utf8").split("\n");
    const out: TransactionRecord[] = [];
    lines.forEach((line, index) => {
      if (!line.trim()) return;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (err) {
        throw new Error(
          `ledger ${this.location} is corrupt at line ${index + 1}`,
          { cause: err },
        );
      }
      out.push(recordSchema.parse(parsed));
    });
    return out;
  }

  append(record: NewTransactionRecord): TransactionRecord {
    const full: TransactionRecord = { seq: this.nextSeq, ...record };
    const line = JSON.stringify(full) + "\n";
    writeSync(this.fd, line);
    fsyncSync(this.fd);
    this.nextSeq += 1;
    return full;
  }

  readAll(): TransactionRecord[] {
    return this.replay();
  }

  replaceAll(records: TransactionRecord[]): void {
    const tmp = `${this.location}.rewrite`;
    writeFileSync(tmp, records.map((r) => JSON.stringify(r) + "\n").join(""));
    const fd = openSync(tmp, "r+");
    try {
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    closeSync(this.fd);
    renameSync(tmp, this.location);
    this.fd = openSync(this.location, "a");
  }

  close(): void {
    closeSync(this.fd);
  }
}

export function openLedgerStore(
  location: string,
  format: LedgerFormat = "sqlite",
  logger?: Logger,
): LedgerStore {
  return format === "jsonl"
    ? new JsonlLedgerStore(location, logger)
    : new SqliteLedgerStore(location);
}
