// src/coordinator.ts
import {
  classify,
  type BatchItem,
  type Classification,
} from "./change-detector.js";
import type { EngineConfig } from "./config.js";
import {
  LedgerStateError,
  LedgerWriteError,
  SourceUnreadableError,
  errorMessage,
} from "./errors.js";
import { TransferExecutor } from "./executor.js";
import { createIgnorer, type Ignorer } from "./ignore.js";
import { newRunId, type Ledger, type PendingTransaction } from "./ledger.js";
import { NullLogger, type Logger } from "./logger.js";
import { manifestBytes } from "./manifest.js";
import { runPool, type PoolResult } from "./pool.js";
import { filterRecords, type BatchRecord, type FilterCriteria } from "./records.js";
import { LocalStorage, type StorageBackend } from "./storage.js";
import { summarize, type ItemResult, type RunSummary } from "./summary.js";

export interface CoordinatorDeps {
  source?: StorageBackend;
  destination?: StorageBackend;
  logger?: Logger;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RunOptions {
  signal?: AbortSignal;
  runId?: string;
  /** Classify and report only: no copies, no ledger writes. */
  dryRun?: boolean;
}

export class RunCoordinator {
  private readonly source: StorageBackend;
  private readonly destination: StorageBackend;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly ignorer: Ignorer;
  private readonly executor: TransferExecutor;

  constructor(
    private readonly config: EngineConfig,
    deps: CoordinatorDeps = {},
  ) {
    this.source = deps.source ?? new LocalStorage();
    this.destination = deps.destination ?? this.source;
    this.logger = deps.logger ?? new NullLogger();
    this.clock = deps.clock ?? Date.now;
    this.ignorer = createIgnorer(config.ignore);
    this.executor = new TransferExecutor({
      source: this.source,
      destination: this.destination,
      maxCopyRetries: config.maxCopyRetries,
      retryBackoffBaseMs: config.retryBackoffBaseMs,
      copyTimeoutMs: config.copyTimeoutMs,
      verifyChecksum: config.verifyChecksum,
      checksumAlgorithm: config.checksumAlgorithm,
      logger: this.logger.child("transfer"),
      sleep: deps.sleep,
    });
  }

  /**
   * One pass: filter, resume or close interrupted transactions, classify,
   * transfer what changed, summarize. Item failures end up in the ledger
   * and the summary; only a malformed record source or an unwritable
   * ledger throws.
   */
  async runOnce(
    records: readonly BatchRecord[],
    criteria: FilterCriteria,
    sourceRoot: string,
    destinationRoot: string,
    ledger: Ledger,
    opts: RunOptions = {},
  ): Promise<RunSummary> {
    const startedAt = this.clock();
    const runId = opts.runId ?? newRunId(new Date(startedAt));
    const log = this.logger.child("run");

    const selected = Array.from(filterRecords(records, criteria));
    log.info("batches selected", {
      runId,
      records: records.length,
      selected: selected.length,
      criteria,
    });

    const pending = this.claimPending(ledger, new Set(selected), runId, opts, log);

    const halt = new AbortController();
    const onAbort = () => halt.abort(opts.signal?.reason);
    if (opts.signal?.aborted) onAbort();
    opts.signal?.addEventListener("abort", onAbort, { once: true });

    let fatal: unknown;
    const worker = async (batchId: string): Promise<ItemResult> => {
      try {
        return await this.processBatch(batchId, {
          runId,
          sourceRoot,
          destinationRoot,
          ledger,
          pending: pending.get(batchId),
          signal: halt.signal,
          dryRun: opts.dryRun ?? false,
          log,
        });
      } catch (err) {
        if (err instanceof LedgerWriteError || err instanceof LedgerStateError) {
          fatal ??= err;
          halt.abort(err);
        }
        throw err;
      }
    };

    let results: PoolResult<ItemResult>[];
    try {
      results = await runPool(
        selected,
        this.config.workerPoolSize,
        worker,
        halt.signal,
      );
    } finally {
      opts.signal?.removeEventListener("abort", onAbort);
    }
    if (fatal) throw fatal;

    const items: ItemResult[] = results.map((r, i) => {
      if (r.status === "done") return r.value;
      if (r.status === "error") {
        return {
          batchId: selected[i],
          outcome: "failed",
          reason: `error:${errorMessage(r.error)}`,
          filesCopied: 0,
          bytesCopied: 0,
          resumed: false,
        };
      }
      return {
        batchId: selected[i],
        outcome: "cancelled",
        filesCopied: 0,
        bytesCopied: 0,
        resumed: false,
      };
    });

    const summary = summarize({
      runId,
      startedAt,
      finishedAt: this.clock(),
      selected: selected.length,
      items,
    });
    log.info("run finished", {
      runId,
      completed: summary.completed,
      failed: summary.failed,
      skipped: summary.skipped,
      interrupted: summary.interrupted,
      cancelled: summary.cancelled,
      elapsedMs: summary.elapsedMs,
    });
    return summary;
  }

  /**
   * Interrupted transactions of selected batches are resumed by this run.
   * Those of batches that are no longer selected are closed, so nothing
   * stays ambiguous in the ledger.
   */
  private claimPending(
    ledger: Ledger,
    selected: Set<string>,
    runId: string,
    opts: RunOptions,
    log: Logger,
  ): Map<string, PendingTransaction> {
    const claimed = new Map<string, PendingTransaction>();
    // pendingIncomplete() is in start order, so the last one per batch wins
    for (const p of ledger.pendingIncomplete()) {
      if (!selected.has(p.batchId)) {
        this.closePending(ledger, p, "no-longer-selected", opts, log);
        continue;
      }
      const previous = claimed.get(p.batchId);
      if (previous) this.closePending(ledger, previous, "superseded", opts, log);
      claimed.set(p.batchId, p);
    }
    if (claimed.size) {
      log.info("resuming interrupted transfers", {
        runId,
        batches: Array.from(claimed.keys()),
      });
    }
    return claimed;
  }

  private closePending(
    ledger: Ledger,
    p: PendingTransaction,
    reason: string,
    opts: RunOptions,
    log: Logger,
  ): void {
    log.warn("closing interrupted transfer", {
      runId: p.runId,
      batchId: p.batchId,
      reason,
    });
    if (opts.dryRun) return;
    ledger.recordFailed(ledger.resume(p.runId, p.batchId), reason);
  }

  private async processBatch(
    batchId: string,
    ctx: {
      runId: string;
      sourceRoot: string;
      destinationRoot: string;
      ledger: Ledger;
      pending?: PendingTransaction;
      signal: AbortSignal;
      dryRun: boolean;
      log: Logger;
    },
  ): Promise<ItemResult> {
    const { runId, ledger, log } = ctx;
    const resumed = ctx.pending !== undefined;

    let item: BatchItem;
    try {
      item = await classify(batchId, ctx.sourceRoot, ctx.destinationRoot, ledger, {
        source: this.source,
        destination: this.destination,
        ignorer: this.ignorer,
        mtimeToleranceMs: this.config.mtimeToleranceMs,
        folderMatch: this.config.folderMatch,
        logger: log,
      });
    } catch (err) {
      const reason =
        err instanceof SourceUnreadableError
          ? `source-unreadable:${err.message}`
          : `classify-error:${errorMessage(err)}`;
      log.error("unable to classify batch", { batchId, reason });
      if (!ctx.dryRun) {
        ledger.recordFailed(ledger.begin(runId, batchId, []), reason);
      }
      return failedItem(batchId, reason, undefined, resumed);
    }

    if (item.classification === "unchanged" && !resumed) {
      log.debug("unchanged; skipping", { batchId });
      return {
        batchId,
        classification: item.classification,
        outcome: "skipped",
        filesCopied: 0,
        bytesCopied: 0,
        resumed: false,
      };
    }

    if (ctx.dryRun) {
      log.info("would transfer", {
        batchId,
        classification: item.classification,
        files: item.fileManifest.length,
        bytes: manifestBytes(item.fileManifest),
        diff: item.diff,
      });
      return {
        batchId,
        classification: item.classification,
        outcome: "skipped",
        reason: "dry-run",
        filesCopied: 0,
        bytesCopied: 0,
        resumed,
      };
    }

    const outcome = await this.executor.execute(item, ledger, {
      runId,
      resume: ctx.pending
        ? ledger.resume(ctx.pending.runId, ctx.pending.batchId)
        : undefined,
      signal: ctx.signal,
    });
    return {
      batchId,
      classification: item.classification,
      outcome: outcome.status,
      reason: outcome.status === "failed" ? outcome.reason : undefined,
      filesCopied: outcome.filesCopied,
      bytesCopied: outcome.bytesCopied,
      resumed,
    };
  }
}

function failedItem(
  batchId: string,
  reason: string,
  classification: Classification | undefined,
  resumed: boolean,
): ItemResult {
  return {
    batchId,
    classification,
    outcome: "failed",
    reason,
    filesCopied: 0,
    bytesCopied: 0,
    resumed,
  };
}
