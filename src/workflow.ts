// src/workflow.ts
//
// One scheduled invocation: connectivity, storage checks, records, ledger,
// coordinator, notification. Returns the process exit code instead of exiting.

import { engineConfigFrom, criteriaFrom, type Settings } from "./config.js";
import {
  AlwaysConnected,
  CommandConnectivity,
  type ConnectivityProvider,
} from "./connectivity.js";
import { RunCoordinator } from "./coordinator.js";
import { errorMessage } from "./errors.js";
import { Ledger } from "./ledger.js";
import type { Logger } from "./logger.js";
import { LogNotifier, type Notifier } from "./notify.js";
import { JsonRecordSource, type RecordSource } from "./records.js";
import { LocalStorage, type StorageBackend } from "./storage.js";
import { runSucceeded, type RunSummary } from "./summary.js";

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_UNREACHABLE = 2;

export interface WorkflowDeps {
  logger: Logger;
  connectivity?: ConnectivityProvider;
  notifier?: Notifier;
  records?: RecordSource;
  source?: StorageBackend;
  destination?: StorageBackend;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface WorkflowOptions {
  signal?: AbortSignal;
  dryRun?: boolean;
}

export interface WorkflowResult {
  exitCode: number;
  summary?: RunSummary;
}

export function connectivityFrom(
  settings: Settings,
  logger: Logger,
): ConnectivityProvider {
  const c = settings.connectivity;
  if (!c.checkCommand) return new AlwaysConnected();
  return new CommandConnectivity({
    checkCommand: c.checkCommand,
    connectCommand: c.connectCommand,
    retries: c.retries,
    retryDelayMs: c.retryDelayMs,
    timeoutMs: c.timeoutMs,
    logger,
  });
}

export async function runTransferWorkflow(
  settings: Settings,
  deps: WorkflowDeps,
  opts: WorkflowOptions = {},
): Promise<WorkflowResult> {
  const { logger } = deps;
  const log = logger.child("workflow");
  const notifier = deps.notifier ?? new LogNotifier(logger.child("notify"));
  const source = deps.source ?? new LocalStorage();
  const destination = deps.destination ?? source;
  const { paths } = settings;

  const connectivity =
    deps.connectivity ?? connectivityFrom(settings, logger.child("connectivity"));
  if (!(await connectivity.ensureConnected())) {
    await notifier.notifyFailure(new Error("connectivity check failed"));
    return { exitCode: EXIT_UNREACHABLE };
  }

  for (const [label, backend, root] of [
    ["source", source, paths.sourceRoot],
    ["destination", destination, paths.destinationRoot],
  ] as const) {
    if (!(await backend.isAccessible(root))) {
      log.error(`${label} root is not accessible`, { root, kind: backend.kind });
      await notifier.notifyFailure(new Error(`${label} root ${root} is not accessible`));
      return { exitCode: EXIT_UNREACHABLE };
    }
  }

  let ledger: Ledger | undefined;
  try {
    const recordSource =
      deps.records ??
      new JsonRecordSource(paths.recordsFile, {
        idColumn: settings.filter.idColumn,
        logger: log,
      });
    const records = await recordSource.loadRecords();

    ledger = Ledger.open(paths.ledger, {
      format: settings.ledger.format,
      logger: logger.child("ledger"),
      clock: deps.clock,
    });

    const coordinator = new RunCoordinator(engineConfigFrom(settings), {
      source,
      destination,
      logger,
      clock: deps.clock,
      sleep: deps.sleep,
    });
    const summary = await coordinator.runOnce(
      records,
      criteriaFrom(settings),
      paths.sourceRoot,
      paths.destinationRoot,
      ledger,
      { signal: opts.signal, dryRun: opts.dryRun },
    );
    await notifier.notifyCompletion(summary);
    return {
      exitCode: runSucceeded(summary) ? EXIT_OK : EXIT_FAILED,
      summary,
    };
  } catch (err) {
    log.error("run aborted", { error: errorMessage(err) });
    await notifier.notifyFailure(err);
    return { exitCode: EXIT_FAILED };
  } finally {
    ledger?.close();
  }
}
