// src/ledger-report.ts
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import type { PendingTransaction, TransactionRecord } from "./ledger.js";

function fmtTs(ts: number): string {
  return new Date(ts).toISOString().replace("T", " ").replace(/\.\d+Z$/, "Z");
}

function detail(record: TransactionRecord): string {
  switch (record.phase) {
    case "started":
      return `${record.manifest?.length ?? 0} files`;
    case "file-copied":
      return record.path ?? "";
    case "failed":
      return record.attempts
        ? `${record.reason ?? ""} (${record.attempts} attempts)`
        : (record.reason ?? "");
    case "completed":
      return `${record.manifest?.length ?? 0} files`;
    default:
      return "";
  }
}

export function formatHistoryTable(records: readonly TransactionRecord[]): string {
  const table = new AsciiTable3("Ledger")
    .setHeading("Seq", "Time", "Run", "Batch", "Phase", "Detail")
    .setStyle("unicode-round");
  table.setAlign(0, AlignmentEnum.RIGHT);
  [1, 2, 3, 4, 5].forEach((idx) => table.setAlign(idx, AlignmentEnum.LEFT));
  for (const r of records) {
    table.addRow(String(r.seq), fmtTs(r.ts), r.runId, r.batchId, r.phase, detail(r));
  }
  return table.toString();
}

export function formatPendingTable(pending: readonly PendingTransaction[]): string {
  const table = new AsciiTable3("Interrupted transfers")
    .setHeading("Run", "Batch", "Phase", "Copied", "Started")
    .setStyle("unicode-round");
  [0, 1, 2, 4].forEach((idx) => table.setAlign(idx, AlignmentEnum.LEFT));
  table.setAlign(3, AlignmentEnum.RIGHT);
  for (const p of pending) {
    table.addRow(p.runId, p.batchId, p.phase, String(p.copied), fmtTs(p.startedAt));
  }
  return table.toString();
}
