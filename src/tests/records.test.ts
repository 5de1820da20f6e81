import fsp from "node:fs/promises";
import path from "node:path";
import { MalformedRecordSourceError } from "../errors.js";
import {
  JsonRecordSource,
  filterRecords,
  makeRecord,
  recordsFromRows,
  resolveBatchId,
} from "../records.js";
import { mkTmp } from "./util.js";

const criteria = { matchColumn: "AJ", matchValue: "PP", emptyColumn: "AK" };

describe("filterRecords", () => {
  test("selects rows whose match column equals the value and whose empty column is blank", () => {
    const records = [
      makeRecord("B1", { AJ: "PP", AK: "" }),
      makeRecord("B2", { AJ: "PP", AK: "done" }),
      makeRecord("B3", { AJ: " PP ", AK: "   " }),
      makeRecord("B4", { AJ: "XX", AK: "" }),
    ];
    expect(Array.from(filterRecords(records, criteria))).toEqual(["B1", "B3"]);
  });

  test("comparison is case-sensitive", () => {
    const records = [makeRecord("B1", { AJ: "pp", AK: "" })];
    expect(filterRecords(records, criteria).size).toBe(0);
  });

  test("duplicate ids collapse to one batch", () => {
    const records = [
      makeRecord("B1", { AJ: "PP", AK: "" }),
      makeRecord("B1", { AJ: "PP", AK: "" }),
    ];
    expect(Array.from(filterRecords(records, criteria))).toEqual(["B1"]);
  });

  test("rows missing a column are skipped when other rows have it", () => {
    const records = [
      makeRecord("B1", { AJ: "PP" }),
      makeRecord("B2", { AJ: "PP", AK: "" }),
    ];
    expect(Array.from(filterRecords(records, criteria))).toEqual(["B2"]);
  });

  test("an empty record set selects nothing", () => {
    expect(filterRecords([], criteria).size).toBe(0);
  });

  test("a column no row has is a malformed source", () => {
    const records = [makeRecord("B1", { AJ: "PP" })];
    let caught: unknown;
    try {
      filterRecords(records, criteria);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MalformedRecordSourceError);
    if (caught instanceof MalformedRecordSourceError) {
      expect(caught.missingColumns).toEqual(["AK"]);
      expect(caught.message).toBe('record source has no column "AK"');
    }
  });
});

describe("batch ids", () => {
  test("falls back through the usual id column names", () => {
    expect(resolveBatchId(new Map([["BatchID", " B7 "]]))).toBe("B7");
    expect(resolveBatchId(new Map([["ID", ""], ["Batch Number", "B8"]]))).toBe("B8");
    expect(resolveBatchId(new Map([["Other", "B9"]]))).toBeUndefined();
  });

  test("an explicit id column is the only one consulted", () => {
    const columns = new Map([
      ["Batch ID", "B1"],
      ["Ref", "R-2"],
    ]);
    expect(resolveBatchId(columns, "Ref")).toBe("R-2");
  });

  test("rows become string columns; rows without an id are dropped", () => {
    const records = recordsFromRows([
      { "Batch ID": "B1", AJ: "PP", AK: null, Count: 3, Flag: true },
      { AJ: "PP" },
    ]);
    expect(records).toHaveLength(1);
    expect(records[0].batchId).toBe("B1");
    expect(Array.from(records[0].columns.entries())).toEqual([
      ["Batch ID", "B1"],
      ["AJ", "PP"],
      ["Count", "3"],
      ["Flag", "true"],
    ]);
  });
});

describe("JsonRecordSource", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await mkTmp("records-");
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("loads rows from a JSON array", async () => {
    const file = path.join(tmp, "rows.json");
    await fsp.writeFile(
      file,
      JSON.stringify([
        { "Batch ID": "B1", AJ: "PP", AK: "" },
        { "Batch ID": "B2", AJ: "PP", AK: "shipped" },
      ]),
    );
    const records = await new JsonRecordSource(file).loadRecords();
    expect(records.map((r) => r.batchId)).toEqual(["B1", "B2"]);
    expect(Array.from(filterRecords(records, criteria))).toEqual(["B1"]);
  });

  test("a file that is not an array of rows is malformed", async () => {
    const file = path.join(tmp, "object.json");
    await fsp.writeFile(file, JSON.stringify({ rows: [] }));
    await expect(new JsonRecordSource(file).loadRecords()).rejects.toBeInstanceOf(
      MalformedRecordSourceError,
    );
  });

  test("a missing file is malformed", async () => {
    await expect(
      new JsonRecordSource(path.join(tmp, "nope.json")).loadRecords(),
    ).rejects.toBeInstanceOf(MalformedRecordSourceError);
  });
});
