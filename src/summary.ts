// src/summary.ts
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import { CLASSIFICATIONS, type Classification } from "./change-detector.js";
import { fmtBytes, fmtMs } from "./util.js";

export type ItemOutcome =
  | "completed"
  | "failed"
  | "skipped"
  | "interrupted"
  | "cancelled";

export interface ItemResult {
  batchId: string;
  classification?: Classification;
  outcome: ItemOutcome;
  reason?: string;
  filesCopied: number;
  bytesCopied: number;
  resumed: boolean;
}

export interface RunSummary {
  runId: string;
  startedAt: number;
  finishedAt: number;
  elapsedMs: number;
  selected: number;
  classifications: Record<Classification, number>;
  completed: number;
  failed: number;
  skipped: number;
  interrupted: number;
  cancelled: number;
  resumed: number;
  filesCopied: number;
  bytesCopied: number;
  items: ItemResult[];
}

function emptyClassificationCounts(): Record<Classification, number> {
  return {
    new: 0,
    modified: 0,
    unchanged: 0,
    "destination-missing": 0,
  };
}

export function summarize(opts: {
  runId: string;
  startedAt: number;
  finishedAt: number;
  selected: number;
  items: ItemResult[];
}): RunSummary {
  const classifications = emptyClassificationCounts();
  const count = (outcome: ItemOutcome) =>
    opts.items.filter((i) => i.outcome === outcome).length;
  let filesCopied = 0;
  let bytesCopied = 0;
  for (const item of opts.items) {
    if (item.classification) classifications[item.classification] += 1;
    filesCopied += item.filesCopied;
    bytesCopied += item.bytesCopied;
  }
  return {
    runId: opts.runId,
    startedAt: opts.startedAt,
    finishedAt: opts.finishedAt,
    elapsedMs: opts.finishedAt - opts.startedAt,
    selected: opts.selected,
    classifications,
    completed: count("completed"),
    failed: count("failed"),
    skipped: count("skipped"),
    interrupted: count("interrupted"),
    cancelled: count("cancelled"),
    resumed: opts.items.filter((i) => i.resumed).length,
    filesCopied,
    bytesCopied,
    items: opts.items,
  };
}

export function runSucceeded(summary: RunSummary): boolean {
  return (
    summary.failed === 0 &&
    summary.interrupted === 0 &&
    summary.cancelled === 0
  );
}

export function formatSummaryTable(summary: RunSummary): string {
  const table = new AsciiTable3(`Run ${summary.runId}`)
    .setHeading("Batch", "Classification", "Outcome", "Files", "Size", "Detail")
    .setStyle("unicode-round");
  [0, 1, 2, 5].forEach((idx) => table.setAlign(idx, AlignmentEnum.LEFT));
  [3, 4].forEach((idx) => table.setAlign(idx, AlignmentEnum.RIGHT));
  for (const item of summary.items) {
    table.addRow(
      item.batchId,
      item.classification ?? "-",
      item.resumed ? `${item.outcome} (resumed)` : item.outcome,
      String(item.filesCopied),
      fmtBytes(item.bytesCopied),
      item.reason ?? "",
    );
  }
  const totals = [
    `${summary.selected} selected`,
    `${summary.completed} completed`,
    `${summary.failed} failed`,
    `${summary.skipped} unchanged`,
  ];
  if (summary.interrupted) totals.push(`${summary.interrupted} interrupted`);
  if (summary.cancelled) totals.push(`${summary.cancelled} cancelled`);
  return `${table.toString().trimEnd()}\n${totals.join(", ")}; ${summary.filesCopied} files, ${fmtBytes(summary.bytesCopied)} in ${fmtMs(summary.elapsedMs)}\n`;
}

/** Plain-text report for notifications. */
export function formatCompletionMessage(summary: RunSummary): string {
  const acted = summary.completed + summary.failed;
  const rate = acted > 0 ? (summary.completed / acted) * 100 : 100;
  const lines = [
    `Batch transfer report (run ${summary.runId})`,
    "",
    `Batches selected:   ${summary.selected}`,
    ...CLASSIFICATIONS.map(
      (c) => `  ${c.padEnd(20)}${summary.classifications[c]}`,
    ),
    `Completed:          ${summary.completed}`,
    `Failed:             ${summary.failed}`,
    `Unchanged:          ${summary.skipped}`,
    `Files copied:       ${summary.filesCopied} (${fmtBytes(summary.bytesCopied)})`,
    `Success rate:       ${rate.toFixed(1)}%`,
    `Elapsed:            ${fmtMs(summary.elapsedMs)}`,
  ];
  const completed = summary.items.filter((i) => i.outcome === "completed");
  if (completed.length) {
    lines.push("", "Completed batches:");
    for (const i of completed) {
      lines.push(`  - ${i.batchId}: ${i.filesCopied} files`);
    }
  }
  const problems = summary.items.filter(
    (i) => i.outcome === "failed" || i.outcome === "interrupted" || i.outcome === "cancelled",
  );
  if (problems.length) {
    lines.push("", "Batches needing attention:");
    for (const i of problems) {
      lines.push(`  - ${i.batchId}: ${i.outcome}${i.reason ? ` (${i.reason})` : ""}`);
    }
  }
  return lines.join("\n") + "\n";
}
