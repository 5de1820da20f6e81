// src/records.ts
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { BATCH_ID_COLUMNS } from "./constants.js";
import { MalformedRecordSourceError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";

/** One row of the tabular source. Column values are always strings. */
export interface BatchRecord {
  readonly batchId: string;
  readonly columns: ReadonlyMap<string, string>;
}

export interface FilterCriteria {
  matchColumn: string;
  matchValue: string;
  emptyColumn: string;
}

export interface RecordSource {
  loadRecords(): Promise<BatchRecord[]>;
}

/**
 * Batch ids of the records whose match column equals the configured value
 * and whose empty column is blank, both compared after trimming. Records
 * lacking either column are skipped; a record set where no row has one of
 * the columns at all is structurally wrong and rejected.
 */
export function filterRecords(
  records: readonly BatchRecord[],
  criteria: FilterCriteria,
): Set<string> {
  const selected = new Set<string>();
  if (records.length === 0) return selected;

  const missing = [criteria.matchColumn, criteria.emptyColumn].filter(
    (col) => !records.some((r) => r.columns.has(col)),
  );
  if (missing.length) {
    throw new MalformedRecordSourceError(
      `record source has no column ${missing.map((c) => `"${c}"`).join(" or ")}`,
      missing,
    );
  }

  const wanted = criteria.matchValue.trim();
  for (const record of records) {
    const match = record.columns.get(criteria.matchColumn);
    const empty = record.columns.get(criteria.emptyColumn);
    if (match === undefined || empty === undefined) continue;
    if (match.trim() !== wanted) continue;
    if (empty.trim() !== "") continue;
    selected.add(record.batchId);
  }
  return selected;
}

export function resolveBatchId(
  columns: ReadonlyMap<string, string>,
  idColumn?: string,
): string | undefined {
  const candidates = idColumn ? [idColumn] : BATCH_ID_COLUMNS;
  for (const col of candidates) {
    const value = columns.get(col)?.trim();
    if (value) return value;
  }
  return undefined;
}

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const rowsSchema = z.array(z.record(z.string(), cellSchema.optional()));

type RawRow = z.infer<typeof rowsSchema>[number];

function toColumns(row: RawRow): Map<string, string> {
  const columns = new Map<string, string>();
  for (const [key, value] of Object.entries(row)) {
    if (value === null || value === undefined) continue;
    columns.set(key, String(value));
  }
  return columns;
}

export function recordsFromRows(
  rows: readonly RawRow[],
  opts: { idColumn?: string; logger?: Logger } = {},
): BatchRecord[] {
  const records: BatchRecord[] = [];
  rows.forEach((row, index) => {
    const columns = toColumns(row);
    const batchId = resolveBatchId(columns, opts.idColumn);
    if (!batchId) {
      opts.logger?.warn("row has no batch id; skipping", {
        row: index,
        columns: Array.from(columns.keys()),
      });
      return;
    }
    records.push({ batchId, columns });
  });
  return records;
}

/**
 * Rows exported from the tracking spreadsheet as a JSON array of objects
 * (one object per row, keyed by column heading).
 */
export class JsonRecordSource implements RecordSource {
  constructor(
    private readonly file: string,
    private readonly opts: { idColumn?: string; logger?: Logger } = {},
  ) {}

  async loadRecords(): Promise<BatchRecord[]> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(this.file, "utf8"));
    } catch (err) {
      throw new MalformedRecordSourceError(
        `unable to read records from ${this.file}: ${errorMessage(err)}`,
      );
    }
    const rows = rowsSchema.safeParse(parsed);
    if (!rows.success) {
      throw new MalformedRecordSourceError(
        `records in ${this.file} must be an array of row objects: ${rows.error.issues
          .map((i) => `${i.path.join(".") || "<root>"} ${i.message}`)
          .join("; ")}`,
      );
    }
    const records = recordsFromRows(rows.data, this.opts);
    this.opts.logger?.info("loaded records", {
      file: this.file,
      rows: rows.data.length,
      records: records.length,
    });
    return records;
  }
}

export class StaticRecordSource implements RecordSource {
  constructor(private readonly records: BatchRecord[]) {}

  async loadRecords(): Promise<BatchRecord[]> {
    return this.records;
  }
}

/** Build a record from a plain object; handy for tests and embedding. */
export function makeRecord(
  batchId: string,
  columns: Record<string, string>,
): BatchRecord {
  return { batchId, columns: new Map(Object.entries(columns)) };
}
