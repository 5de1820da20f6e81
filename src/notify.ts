// src/notify.ts
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { formatCompletionMessage, runSucceeded, type RunSummary } from "./summary.js";

export interface Notifier {
  notifyCompletion(summary: RunSummary): Promise<void>;
  notifyFailure(error: unknown): Promise<void>;
}

/** Writes the report through the logger; mail or chat delivery plugs in here. */
export class LogNotifier implements Notifier {
  constructor(private readonly logger: Logger) {}

  async notifyCompletion(summary: RunSummary): Promise<void> {
    const level = runSucceeded(summary) ? "info" : "warn";
    this.logger.log(level, "transfer report", {
      runId: summary.runId,
      report: formatCompletionMessage(summary),
    });
  }

  async notifyFailure(error: unknown): Promise<void> {
    this.logger.error("transfer run failed", { error: errorMessage(error) });
  }
}
