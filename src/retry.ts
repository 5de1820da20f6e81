// src/retry.ts
import { wait } from "./util.js";

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number; cancelled: boolean };

export interface RetryPolicy {
  /** Total attempts, including the first. */
  maxAttempts: number;
  backoffBaseMs: number;
  maxBackoffMs?: number;
  /** Per-attempt timeout; an attempt that runs longer counts as failed. */
  timeoutMs?: number;
}

export interface RetryHooks {
  onAttemptFailed?: (attempt: number, error: unknown, nextDelayMs: number | null) => void;
  sleep?: (ms: number) => Promise<void>;
  /** Checked before every attempt; aborting also cuts a backoff sleep short. */
  signal?: AbortSignal;
}

export class AttemptTimeoutError extends Error {
  override readonly cause?: unknown;
  constructor(
    public readonly timeoutMs: number,
    options?: { cause?: unknown },
  ) {
    super(`attempt timed out after ${timeoutMs} ms`);
    this.name = "AttemptTimeoutError";
    this.cause = options?.cause;
  }
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.backoffBaseMs * 2 ** (attempt - 1);
  return policy.maxBackoffMs != null ? Math.min(delay, policy.maxBackoffMs) : delay;
}

// A timed-out attempt is aborted and then awaited, so nothing it started is
// still running when the next attempt begins.
async function runAttempt<T>(
  op: (attempt: number, signal: AbortSignal) => Promise<T>,
  attempt: number,
  timeoutMs?: number,
): Promise<T> {
  const ac = new AbortController();
  if (!timeoutMs || timeoutMs <= 0) return op(attempt, ac.signal);
  const timer = setTimeout(
    () => ac.abort(new AttemptTimeoutError(timeoutMs)),
    timeoutMs,
  );
  let cause: unknown;
  try {
    const value = await op(attempt, ac.signal);
    if (!ac.signal.aborted) return value;
  } catch (err) {
    if (!ac.signal.aborted) throw err;
    cause = err;
  } finally {
    clearTimeout(timer);
  }
  throw new AttemptTimeoutError(timeoutMs, { cause });
}

function untilAborted(p: Promise<void>, signal?: AbortSignal): Promise<void> {
  if (!signal) return p;
  if (signal.aborted) return Promise.resolve();
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => resolve();
    signal.addEventListener("abort", onAbort, { once: true });
    p.then(
      () => {
        signal.removeEventListener("abort", onAbort);
        resolve();
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Run `op` up to `policy.maxAttempts` times, sleeping
 * `backoffBaseMs * 2^(attempt-1)` between attempts. Failure is returned as
 * data; nothing thrown by `op` escapes. Once `hooks.signal` aborts no further
 * attempt starts and the result is `cancelled`.
 */
export async function retryWithBackoff<T>(
  op: (attempt: number, signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  const { signal } = hooks;
  const sleep = (ms: number) =>
    untilAborted(hooks.sleep ? hooks.sleep(ms) : wait(ms, signal), signal);
  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      return {
        ok: false,
        error: lastError ?? signal.reason,
        attempts: attempt - 1,
        cancelled: true,
      };
    }
    try {
      const value = await runAttempt(op, attempt, policy.timeoutMs);
      return { ok: true, value, attempts: attempt };
    } catch (err) {
      lastError = err;
      const next = attempt < maxAttempts ? backoffDelay(policy, attempt) : null;
      hooks.onAttemptFailed?.(attempt, err, next);
      if (next != null) await sleep(next);
    }
  }
  return { ok: false, error: lastError, attempts: maxAttempts, cancelled: false };
}
