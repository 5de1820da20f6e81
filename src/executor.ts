// src/executor.ts
import { randomBytes } from "node:crypto";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import type { BatchItem } from "./change-detector.js";
import { STAGING_SUFFIX } from "./constants.js";
import {
  CopyError,
  VerificationMismatchError,
  errorMessage,
} from "./errors.js";
import { streamDigest, type HashAlg } from "./hash.js";
import type { Checkpoint, Ledger, TransactionHandle } from "./ledger.js";
import { NullLogger, type Logger } from "./logger.js";
import { manifestIndex, sameEntry, type ManifestEntry } from "./manifest.js";
import { isContained, toAbs } from "./path-rel.js";
import { retryWithBackoff, type RetryPolicy } from "./retry.js";
import type { StorageBackend } from "./storage.js";

const VERIFICATION_MISMATCH = "verification-mismatch:";

export type TransferOutcome =
  | { status: "completed"; filesCopied: number; bytesCopied: number }
  | {
      status: "failed";
      reason: string;
      filesCopied: number;
      bytesCopied: number;
    }
  | { status: "interrupted"; filesCopied: number; bytesCopied: number };

export interface ExecutorOptions {
  source: StorageBackend;
  destination: StorageBackend;
  maxCopyRetries: number;
  retryBackoffBaseMs: number;
  copyTimeoutMs: number;
  verifyChecksum: boolean;
  checksumAlgorithm: HashAlg;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export interface ExecuteOptions {
  runId: string;
  /** Continue an interrupted transaction instead of starting a new one. */
  resume?: TransactionHandle;
  signal?: AbortSignal;
}

type LedgerWriter = Pick<
  Ledger,
  | "begin"
  | "recordFileCopied"
  | "recordVerified"
  | "recordCompleted"
  | "recordFailed"
  | "lastCheckpoint"
>;

export class TransferExecutor {
  private readonly logger: Logger;
  private readonly policy: RetryPolicy;

  constructor(private readonly opts: ExecutorOptions) {
    this.logger = opts.logger ?? new NullLogger();
    this.policy = {
      maxAttempts: opts.maxCopyRetries,
      backoffBaseMs: opts.retryBackoffBaseMs,
      timeoutMs: opts.copyTimeoutMs,
    };
  }

  async execute(
    item: BatchItem,
    ledger: LedgerWriter,
    { runId, resume, signal }: ExecuteOptions,
  ): Promise<TransferOutcome> {
    const log = this.logger.child(item.batchId);
    // read before begin(): afterwards the newest transaction is the new one
    const checkpoint = resume ?? this.reusable(ledger.lastCheckpoint(item.batchId), log);
    const handle = resume ?? ledger.begin(runId, item.batchId, item.fileManifest);
    let filesCopied = 0;
    let bytesCopied = 0;

    const fail = (reason: string, attempts?: number): TransferOutcome => {
      ledger.recordFailed(handle, reason, attempts);
      log.warn("transfer failed", { runId: handle.runId, reason });
      return { status: "failed", reason, filesCopied, bytesCopied };
    };

    const interrupted = (): TransferOutcome => {
      log.info("transfer interrupted; resumable", {
        runId: handle.runId,
        filesCopied,
      });
      return { status: "interrupted", filesCopied, bytesCopied };
    };

    const done = await this.alreadyCopied(item, handle, checkpoint, ledger, log);

    try {
      await this.opts.destination.ensureDir(item.destinationPath);
    } catch (err) {
      return fail(`destination-unwritable:${errorMessage(err)}`);
    }

    for (const entry of item.fileManifest) {
      if (done.has(entry.relativePath)) continue;
      if (signal?.aborted) return interrupted();
      const result = await retryWithBackoff(
        (_attempt, attemptSignal) => this.copyOne(item, entry, attemptSignal),
        this.policy,
        {
          sleep: this.opts.sleep,
          signal,
          onAttemptFailed: (attempt, err, nextDelayMs) =>
            log.warn("copy attempt failed", {
              path: entry.relativePath,
              attempt,
              maxAttempts: this.policy.maxAttempts,
              retryInMs: nextDelayMs,
              error: errorMessage(err),
            }),
        },
      );
      if (!result.ok) {
        if (result.cancelled) return interrupted();
        return fail(`copy-error:${entry.relativePath}`, result.attempts);
      }
      ledger.recordFileCopied(handle, entry.relativePath);
      filesCopied += 1;
      bytesCopied += entry.sizeBytes;
    }

    for (const entry of item.fileManifest) {
      try {
        await this.verifyOne(item, entry);
      } catch (err) {
        log.error("verification failed", {
          path: entry.relativePath,
          error: errorMessage(err),
        });
        return fail(`${VERIFICATION_MISMATCH}${entry.relativePath}`);
      }
    }

    ledger.recordVerified(handle);
    ledger.recordCompleted(handle, item.fileManifest);
    log.info("transfer completed", {
      runId: handle.runId,
      files: item.fileManifest.length,
      filesCopied,
      bytesCopied,
      resumed: handle.resumed,
    });
    return { status: "completed", filesCopied, bytesCopied };
  }

  /**
   * A failed transaction's copies can be reused unless it failed at
   * verification: the file it names is at the destination but wrong.
   */
  private reusable(
    checkpoint: Checkpoint | undefined,
    log: Logger,
  ): Checkpoint | undefined {
    if (checkpoint?.reason?.startsWith(VERIFICATION_MISMATCH)) {
      log.info("not reusing copies of a transaction that failed verification", {
        runId: checkpoint.runId,
        reason: checkpoint.reason,
      });
      return undefined;
    }
    return checkpoint;
  }

  /**
   * Files that need no copy: those a resumed transaction already recorded,
   * or those the batch's last failed attempt copied, provided the source
   * entry is unchanged and the destination still has the right size (and
   * digest, when checksums are on). Carried-over files are recorded again
   * under the new transaction.
   */
  private async alreadyCopied(
    item: BatchItem,
    handle: TransactionHandle,
    checkpoint: Pick<Checkpoint, "manifest" | "copied"> | undefined,
    ledger: LedgerWriter,
    log: Logger,
  ): Promise<Set<string>> {
    const done = new Set<string>();
    if (!checkpoint) return done;

    const current = manifestIndex(item.fileManifest);
    const before = manifestIndex(checkpoint.manifest);
    for (const rel of checkpoint.copied) {
      if (!isContained(rel)) continue;
      const now = current.get(rel);
      const then = before.get(rel);
      if (!now || !then || !sameEntry(now, then)) continue;
      const st = await this.opts.destination
        .stat(toAbs(rel, item.destinationPath))
        .catch(() => null);
      if (!st || st.isDirectory || st.size !== now.sizeBytes) continue;
      if (this.opts.verifyChecksum && !(await this.sameDigest(item, now, log))) {
        continue;
      }
      if (!handle.resumed) ledger.recordFileCopied(handle, rel);
      done.add(rel);
    }
    if (done.size) {
      log.info(handle.resumed ? "resuming transfer" : "reusing earlier copies", {
        runId: handle.runId,
        skipped: done.size,
        remaining: item.fileManifest.length - done.size,
      });
    }
    return done;
  }

  private async sameDigest(
    item: BatchItem,
    entry: ManifestEntry,
    log: Logger,
  ): Promise<boolean> {
    try {
      const [expected, actual] = await this.digests(item, entry);
      return expected === actual;
    } catch (err) {
      log.debug("unable to compare digests; copying again", {
        path: entry.relativePath,
        error: errorMessage(err),
      });
      return false;
    }
  }

  private digests(item: BatchItem, entry: ManifestEntry): Promise<[string, string]> {
    const { source, destination, checksumAlgorithm: alg } = this.opts;
    return Promise.all([
      streamDigest(alg, source.read(toAbs(entry.relativePath, item.sourcePath))),
      streamDigest(alg, destination.read(toAbs(entry.relativePath, item.destinationPath))),
    ]);
  }

  private async copyOne(
    item: BatchItem,
    entry: ManifestEntry,
    signal: AbortSignal,
  ): Promise<void> {
    const { source, destination } = this.opts;
    const src = toAbs(entry.relativePath, item.sourcePath);
    const dst = toAbs(entry.relativePath, item.destinationPath);
    const dir = path.dirname(dst);
    const staging = path.join(
      dir,
      `.${path.basename(dst)}.${randomBytes(4).toString("hex")}${STAGING_SUFFIX}`,
    );
    try {
      await destination.ensureDir(dir);
      await pipeline(source.read(src), destination.write(staging), { signal });
      await destination.setTimes(staging, entry.modifiedTime);
      await destination.rename(staging, dst);
    } catch (err) {
      await destination.remove(staging).catch((rmErr: unknown) =>
        this.logger.warn("unable to remove staging file", {
          staging,
          error: errorMessage(rmErr),
        }),
      );
      throw new CopyError(
        `copy ${entry.relativePath} failed: ${errorMessage(err)}`,
        entry.relativePath,
        { cause: err },
      );
    }
  }

  private async verifyOne(item: BatchItem, entry: ManifestEntry): Promise<void> {
    const st = await this.opts.destination.stat(
      toAbs(entry.relativePath, item.destinationPath),
    );
    if (!st || st.isDirectory) {
      throw new VerificationMismatchError(
        `${entry.relativePath} is missing at the destination`,
        entry.relativePath,
        String(entry.sizeBytes),
        "missing",
      );
    }
    if (st.size !== entry.sizeBytes) {
      throw new VerificationMismatchError(
        `${entry.relativePath} has ${st.size} bytes, expected ${entry.sizeBytes}`,
        entry.relativePath,
        String(entry.sizeBytes),
        String(st.size),
      );
    }
    if (!this.opts.verifyChecksum) return;
    const [expected, actual] = await this.digests(item, entry);
    if (expected !== actual) {
      throw new VerificationMismatchError(
        `${entry.relativePath} ${this.opts.checksumAlgorithm} differs`,
        entry.relativePath,
        expected,
        actual,
      );
    }
  }
}
