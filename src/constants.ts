export const CLI_NAME = "batch-relay";

// Headings tracking spreadsheets use for the batch identifier, tried in
// order when no id column is configured.
export const BATCH_ID_COLUMNS = [
  "Batch ID",
  "BatchID",
  "Batch_ID",
  "ID",
  "Batch Number",
] as const;

export const STAGING_SUFFIX = ".relay-tmp";

export const DEFAULT_MAX_COPY_RETRIES = 3;
export const DEFAULT_RETRY_BACKOFF_BASE_MS = 1_000;
export const DEFAULT_WORKER_POOL_SIZE = 4;
export const DEFAULT_COPY_TIMEOUT_MS = 5 * 60 * 1000;
export const DEFAULT_RETENTION_DAYS = 30;
