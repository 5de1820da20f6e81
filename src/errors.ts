// src/errors.ts
//
// Structural errors (MalformedRecordSourceError, LedgerWriteError,
// ConfigError) propagate out of a run. Per-item errors are turned into
// ledger "failed" records by the coordinator and never escape it.

export class MalformedRecordSourceError extends Error {
  constructor(
    message: string,
    public readonly missingColumns: string[] = [],
  ) {
    super(message);
    this.name = "MalformedRecordSourceError";
  }
}

export class SourceUnreadableError extends Error {
  override readonly cause?: unknown;
  constructor(
    message: string,
    public readonly batchId: string,
    options?: { cause?: unknown },
  ) {
    super(message);
    this.name = "SourceUnreadableError";
    this.cause = options?.cause;
  }
}

export class LedgerWriteError extends Error {
  override readonly cause?: unknown;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = "LedgerWriteError";
    this.cause = options?.cause;
  }
}

export class LedgerStateError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "LedgerStateError";
  }
}

export class CopyError extends Error {
  override readonly cause?: unknown;
  constructor(
    message: string,
    public readonly relativePath: string,
    options?: { cause?: unknown },
  ) {
    super(message);
    this.name = "CopyError";
    this.cause = options?.cause;
  }
}

export class VerificationMismatchError extends Error {
  constructor(
    message: string,
    public readonly relativePath: string,
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(message);
    this.name = "VerificationMismatchError";
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}
