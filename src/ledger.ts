// src/ledger.ts
//
// The transfer ledger: an append-only history of intents and outcomes,
// keyed by (runId, batchId). Opening a ledger replays the whole store once
// into an in-memory index; every later append goes to the store first and
// only then updates the index, so the index never claims more than is on
// disk.

import { randomBytes } from "node:crypto";
import { LedgerStateError, LedgerWriteError, errorMessage } from "./errors.js";
import {
  openLedgerStore,
  type LedgerFormat,
  type LedgerPhase,
  type LedgerStore,
  type NewTransactionRecord,
  type TransactionRecord,
} from "./ledger-store.js";
import type { Logger } from "./logger.js";
import type { Manifest } from "./manifest.js";

export type { LedgerPhase, TransactionRecord } from "./ledger-store.js";

export interface TransactionHandle {
  readonly runId: string;
  readonly batchId: string;
  /** Manifest recorded when the transaction started. */
  readonly manifest: Manifest;
  /** Paths already recorded as copied when the handle was obtained. */
  readonly copied: ReadonlySet<string>;
  readonly resumed: boolean;
}

export interface PendingTransaction {
  runId: string;
  batchId: string;
  phase: LedgerPhase;
  copied: number;
  startedAt: number;
}

export interface Checkpoint {
  runId: string;
  manifest: Manifest;
  copied: ReadonlySet<string>;
  /** Why the transaction failed. */
  reason?: string;
}

export interface HistoryQuery {
  batchId?: string;
  runId?: string;
  limit?: number;
}

interface TxState {
  runId: string;
  batchId: string;
  phase: LedgerPhase;
  manifest: Manifest;
  copied: Set<string>;
  startedAt: number;
  reason?: string;
}

const ALLOWED_AFTER: Record<LedgerPhase, readonly LedgerPhase[]> = {
  started: ["file-copied", "verified", "failed"],
  "file-copied": ["file-copied", "verified", "failed"],
  verified: ["completed", "failed"],
  completed: [],
  failed: [],
};

function isOpenPhase(phase: LedgerPhase): boolean {
  return phase !== "completed" && phase !== "failed";
}

const txKey = (runId: string, batchId: string) => `${runId}\u0000${batchId}`;

export function newRunId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d+Z$/, "Z");
  return `${stamp}-${randomBytes(2).toString("hex")}`;
}

export class Ledger {
  private readonly records: TransactionRecord[] = [];
  private readonly txs = new Map<string, TxState>();
  private readonly byBatch = new Map<string, TxState[]>();
  private readonly completed = new Map<string, Manifest>();

  constructor(
    private readonly store: LedgerStore,
    private readonly clock: () => number = Date.now,
    private readonly logger?: Logger,
  ) {
    for (const record of store.readAll()) {
      this.index(record);
    }
    this.logger?.debug("ledger replayed", {
      location: store.location,
      records: this.records.length,
      transactions: this.txs.size,
    });
  }

  static open(
    location: string,
    opts: { format?: LedgerFormat; logger?: Logger; clock?: () => number } = {},
  ): Ledger {
    return new Ledger(
      openLedgerStore(location, opts.format, opts.logger),
      opts.clock,
      opts.logger,
    );
  }

  get location(): string {
    return this.store.location;
  }

  close(): void {
    this.store.close();
  }

  // ------------------------------------------------------------------ writes

  begin(runId: string, batchId: string, manifest: Manifest): TransactionHandle {
    const existing = this.txs.get(txKey(runId, batchId));
    if (existing) {
      throw new LedgerStateError("transaction already started", {
        runId,
        batchId,
        phase: existing.phase,
      });
    }
    this.append({ runId, batchId, phase: "started", manifest });
    return {
      runId,
      batchId,
      manifest,
      copied: new Set(),
      resumed: false,
    };
  }

  /** Reopen an interrupted transaction so its copies are not repeated. */
  resume(runId: string, batchId: string): TransactionHandle {
    const tx = this.txs.get(txKey(runId, batchId));
    if (!tx) {
      throw new LedgerStateError("no such transaction", { runId, batchId });
    }
    if (!isOpenPhase(tx.phase)) {
      throw new LedgerStateError("transaction already finished", {
        runId,
        batchId,
        phase: tx.phase,
      });
    }
    return {
      runId,
      batchId,
      manifest: tx.manifest,
      copied: new Set(tx.copied),
      resumed: true,
    };
  }

  recordFileCopied(handle: TransactionHandle, relativePath: string): void {
    this.transition(handle, "file-copied", { path: relativePath });
  }

  recordVerified(handle: TransactionHandle): void {
    this.transition(handle, "verified", {});
  }

  recordCompleted(handle: TransactionHandle, manifest: Manifest): void {
    this.transition(handle, "completed", { manifest });
  }

  recordFailed(
    handle: TransactionHandle,
    reason: string,
    attempts?: number,
  ): void {
    this.transition(handle, "failed", { reason, attempts });
  }

  private transition(
    handle: TransactionHandle,
    phase: LedgerPhase,
    fields: Pick<NewTransactionRecord, "path" | "reason" | "attempts" | "manifest">,
  ): void {
    const tx = this.txs.get(txKey(handle.runId, handle.batchId));
    if (!tx) {
      throw new LedgerStateError("transaction was never started", {
        runId: handle.runId,
        batchId: handle.batchId,
        phase,
      });
    }
    if (!ALLOWED_AFTER[tx.phase].includes(phase)) {
      throw new LedgerStateError(`cannot record ${phase} after ${tx.phase}`, {
        runId: handle.runId,
        batchId: handle.batchId,
      });
    }
    this.append({
      runId: handle.runId,
      batchId: handle.batchId,
      phase,
      ...fields,
    });
  }

  private append(record: Omit<NewTransactionRecord, "ts">): void {
    let stored: TransactionRecord;
    try {
      stored = this.store.append({ ...record, ts: this.clock() });
    } catch (err) {
      throw new LedgerWriteError(
        `unable to append ${record.phase} for ${record.batchId} to ${this.store.location}: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    this.index(stored);
  }

  private index(record: TransactionRecord): void {
    this.records.push(record);
    const key = txKey(record.runId, record.batchId);
    if (record.phase === "started") {
      const tx: TxState = {
        runId: record.runId,
        batchId: record.batchId,
        phase: "started",
        manifest: record.manifest ?? [],
        copied: new Set(),
        startedAt: record.ts,
      };
      this.txs.set(key, tx);
      const list = this.byBatch.get(record.batchId) ?? [];
      list.push(tx);
      this.byBatch.set(record.batchId, list);
      return;
    }
    const tx = this.txs.get(key);
    if (!tx) {
      // a history that was pruned by hand; keep replaying
      this.logger?.warn("ledger record without a started record", {
        seq: record.seq,
        runId: record.runId,
        batchId: record.batchId,
      });
      return;
    }
    tx.phase = record.phase;
    if (record.phase === "file-copied" && record.path) {
      tx.copied.add(record.path);
    }
    if (record.phase === "failed") {
      tx.reason = record.reason;
    }
    if (record.phase === "completed") {
      this.completed.set(record.batchId, record.manifest ?? tx.manifest);
    }
  }

  // ------------------------------------------------------------------- reads

  latestCompletedManifest(batchId: string): Manifest | undefined {
    return this.completed.get(batchId);
  }

  pendingIncomplete(): PendingTransaction[] {
    const out: PendingTransaction[] = [];
    for (const tx of this.txs.values()) {
      if (!isOpenPhase(tx.phase)) continue;
      out.push({
        runId: tx.runId,
        batchId: tx.batchId,
        phase: tx.phase,
        copied: tx.copied.size,
        startedAt: tx.startedAt,
      });
    }
    return out;
  }

  /**
   * Copies made by the batch's most recent transaction, if that
   * transaction failed. A fresh attempt can skip files that still match.
   */
  lastCheckpoint(batchId: string): Checkpoint | undefined {
    const list = this.byBatch.get(batchId);
    const last = list?.[list.length - 1];
    if (!last || last.phase !== "failed" || last.copied.size === 0) {
      return undefined;
    }
    return {
      runId: last.runId,
      manifest: last.manifest,
      copied: last.copied,
      reason: last.reason,
    };
  }

  phaseOf(runId: string, batchId: string): LedgerPhase | undefined {
    return this.txs.get(txKey(runId, batchId))?.phase;
  }

  history(query: HistoryQuery = {}): TransactionRecord[] {
    let rows = this.records.filter(
      (r) =>
        (query.batchId === undefined || r.batchId === query.batchId) &&
        (query.runId === undefined || r.runId === query.runId),
    );
    if (query.limit !== undefined && query.limit >= 0) {
      rows = rows.slice(Math.max(0, rows.length - query.limit));
    }
    return rows;
  }

  // --------------------------------------------------------------- retention

  /**
   * Drop finished transactions that started before `cutoff`, keeping each
   * batch's latest completed transaction and its latest transaction of any
   * kind. Open transactions are always kept. Run this between runs only.
   */
  prune(cutoff: number): number {
    const keep = new Set<string>();
    for (const list of this.byBatch.values()) {
      const latest = list[list.length - 1];
      if (latest) keep.add(txKey(latest.runId, latest.batchId));
      for (let i = list.length - 1; i >= 0; i--) {
        const tx = list[i];
        if (tx.phase === "completed") {
          keep.add(txKey(tx.runId, tx.batchId));
          break;
        }
      }
      for (const tx of list) {
        if (isOpenPhase(tx.phase) || tx.startedAt >= cutoff) {
          keep.add(txKey(tx.runId, tx.batchId));
        }
      }
    }
    const kept = this.records.filter((r) =>
      keep.has(txKey(r.runId, r.batchId)),
    );
    const removed = this.records.length - kept.length;
    if (removed === 0) return 0;
    try {
      this.store.replaceAll(kept);
    } catch (err) {
      throw new LedgerWriteError(
        `unable to prune ${this.store.location}: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    this.records.length = 0;
    this.txs.clear();
    this.byBatch.clear();
    this.completed.clear();
    for (const record of kept) this.index(record);
    this.logger?.info("ledger pruned", { removed, kept: kept.length });
    return removed;
  }
}
