// src/index.ts
export * from "./errors.js";
export {
  filterRecords,
  resolveBatchId,
  recordsFromRows,
  makeRecord,
  JsonRecordSource,
  StaticRecordSource,
  type BatchRecord,
  type FilterCriteria,
  type RecordSource,
} from "./records.js";
export {
  diffManifests,
  sameEntry,
  sortManifest,
  type Manifest,
  type ManifestDiff,
  type ManifestEntry,
} from "./manifest.js";
export {
  LocalStorage,
  type FileStat,
  type StorageBackend,
} from "./storage.js";
export {
  classify,
  resolveBatchFolder,
  CLASSIFICATIONS,
  type BatchItem,
  type Classification,
  type FolderMatch,
} from "./change-detector.js";
export {
  Ledger,
  newRunId,
  type LedgerPhase,
  type PendingTransaction,
  type TransactionHandle,
  type TransactionRecord,
} from "./ledger.js";
export {
  openLedgerStore,
  JsonlLedgerStore,
  SqliteLedgerStore,
  type LedgerFormat,
  type LedgerStore,
} from "./ledger-store.js";
export { retryWithBackoff, type RetryPolicy, type RetryResult } from "./retry.js";
export { TransferExecutor, type TransferOutcome } from "./executor.js";
export { RunCoordinator, type RunOptions } from "./coordinator.js";
export {
  formatCompletionMessage,
  formatSummaryTable,
  runSucceeded,
  type ItemResult,
  type RunSummary,
} from "./summary.js";
export {
  defaultEngineConfig,
  loadSettings,
  parseSettings,
  type EngineConfig,
  type Settings,
} from "./config.js";
export {
  AlwaysConnected,
  CommandConnectivity,
  type ConnectivityProvider,
} from "./connectivity.js";
export { LogNotifier, type Notifier } from "./notify.js";
export { runTransferWorkflow, type WorkflowResult } from "./workflow.js";
export {
  ConsoleLogger,
  NullLogger,
  StructuredLogger,
  fileSink,
  type Logger,
  type LogLevel,
} from "./logger.js";
