import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { classify, type BatchItem } from "../change-detector.js";
import { TransferExecutor, type ExecutorOptions } from "../executor.js";
import { Ledger } from "../ledger.js";
import { FaultyStorage, listFiles, mkTmp, readText, recordSleeps, writeFiles } from "./util.js";

describe("TransferExecutor", () => {
  let tmp: string;
  let src: string;
  let dst: string;
  let storage: FaultyStorage;
  let ledger: Ledger;

  beforeEach(async () => {
    tmp = await mkTmp("executor-");
    src = path.join(tmp, "src");
    dst = path.join(tmp, "dst");
    await writeFiles(src, { "B1/a.txt": "alpha", "B1/sub/b.txt": "bravo" });
    await fsp.mkdir(dst);
    storage = new FaultyStorage();
    ledger = Ledger.open(path.join(tmp, "ledger.jsonl"), { format: "jsonl" });
  });

  afterEach(async () => {
    ledger.close();
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  function executor(
    overrides: Partial<ExecutorOptions> = {},
  ): { exec: TransferExecutor; sleeps: number[] } {
    const sleeps = recordSleeps();
    const exec = new TransferExecutor({
      source: storage,
      destination: storage,
      maxCopyRetries: 3,
      retryBackoffBaseMs: 1000,
      copyTimeoutMs: 0,
      verifyChecksum: false,
      checksumAlgorithm: "sha256",
      sleep: sleeps.sleep,
      ...overrides,
    });
    return { exec, sleeps };
  }

  function item(batchId = "B1"): Promise<BatchItem> {
    return classify(batchId, src, dst, ledger, { source: storage, destination: storage });
  }

  const phases = (runId: string) =>
    ledger.history({ runId }).map((r) => (r.path ? `${r.phase}:${r.path}` : r.phase));

  test("copies every file, preserving content and modification time", async () => {
    const when = new Date("2026-05-04T03:02:01.000Z");
    await fsp.utimes(path.join(src, "B1", "a.txt"), when, when);
    const { exec } = executor();
    const outcome = await exec.execute(await item(), ledger, { runId: "run-1" });

    expect(outcome).toEqual({ status: "completed", filesCopied: 2, bytesCopied: 10 });
    expect(await listFiles(dst)).toEqual(["B1/a.txt", "B1/sub/b.txt"]);
    expect(await readText(path.join(dst, "B1", "sub", "b.txt"))).toBe("bravo");
    expect((await fsp.stat(path.join(dst, "B1", "a.txt"))).mtime.getTime()).toBe(
      when.getTime(),
    );
    expect(phases("run-1")).toEqual([
      "started",
      "file-copied:a.txt",
      "file-copied:sub/b.txt",
      "verified",
      "completed",
    ]);
    expect(ledger.latestCompletedManifest("B1")?.map((e) => e.relativePath)).toEqual([
      "a.txt",
      "sub/b.txt",
    ]);
  });

  test("a file that fails twice then succeeds completes after two backoffs", async () => {
    storage.renameFailures.set(path.join(dst, "B1", "a.txt"), 2);
    const { exec, sleeps } = executor();
    const outcome = await exec.execute(await item(), ledger, { runId: "run-1" });

    expect(outcome.status).toBe("completed");
    expect([...sleeps]).toEqual([1000, 2000]);
    expect(await listFiles(dst)).toEqual(["B1/a.txt", "B1/sub/b.txt"]);
  });

  test("a file that keeps failing fails the batch with the attempt count", async () => {
    storage.renameFailures.set(path.join(dst, "B1", "a.txt"), 5);
    const { exec, sleeps } = executor();
    const outcome = await exec.execute(await item(), ledger, { runId: "run-1" });

    expect(outcome).toEqual({
      status: "failed",
      reason: "copy-error:a.txt",
      filesCopied: 0,
      bytesCopied: 0,
    });
    expect([...sleeps]).toEqual([1000, 2000]);
    const last = ledger.history({ runId: "run-1" }).at(-1);
    expect(last?.phase).toBe("failed");
    expect(last?.reason).toBe("copy-error:a.txt");
    expect(last?.attempts).toBe(3);
    // staging files are cleaned up after every failed attempt
    expect(await listFiles(dst)).toEqual([]);
  });

  test("a size mismatch after copying fails verification and leaves the copies", async () => {
    storage.statSizeSkew.set(path.join(dst, "B1", "sub", "b.txt"), 1);
    const { exec } = executor();
    const outcome = await exec.execute(await item(), ledger, { runId: "run-1" });

    expect(outcome.status).toBe("failed");
    if (outcome.status === "failed") {
      expect(outcome.reason).toBe("verification-mismatch:sub/b.txt");
    }
    expect(phases("run-1")).toEqual([
      "started",
      "file-copied:a.txt",
      "file-copied:sub/b.txt",
      "failed",
    ]);
    expect(await listFiles(dst)).toEqual(["B1/a.txt", "B1/sub/b.txt"]);
  });

  test("checksum verification catches same-size corruption", async () => {
    storage.readOverride.set(path.join(dst, "B1", "a.txt"), "alphX");
    const { exec } = executor({ verifyChecksum: true });
    const outcome = await exec.execute(await item(), ledger, { runId: "run-1" });
    expect(outcome).toEqual({
      status: "failed",
      reason: "verification-mismatch:a.txt",
      filesCopied: 2,
      bytesCopied: 10,
    });
  });

  test("resuming an interrupted transaction copies only what is missing", async () => {
    const batch = await item();
    const h = ledger.begin("run-1", "B1", batch.fileManifest);
    await fsp.mkdir(path.join(dst, "B1"));
    await fsp.copyFile(path.join(src, "B1", "a.txt"), path.join(dst, "B1", "a.txt"));
    ledger.recordFileCopied(h, "a.txt");

    const { exec } = executor();
    const outcome = await exec.execute(batch, ledger, {
      runId: "run-2",
      resume: ledger.resume("run-1", "B1"),
    });

    expect(outcome).toEqual({ status: "completed", filesCopied: 1, bytesCopied: 5 });
    expect(storage.renamed).toEqual([path.join(dst, "B1", "sub", "b.txt")]);
    expect(phases("run-1")).toEqual([
      "started",
      "file-copied:a.txt",
      "file-copied:sub/b.txt",
      "verified",
      "completed",
    ]);
    expect(phases("run-2")).toEqual([]);
  });

  test("a new attempt reuses files the failed attempt already copied", async () => {
    const batch = await item();
    storage.renameFailures.set(path.join(dst, "B1", "sub", "b.txt"), 3);
    const { exec } = executor();
    const first = await exec.execute(batch, ledger, { runId: "run-1" });
    expect(first.status).toBe("failed");

    storage.renamed.length = 0;
    const second = await exec.execute(batch, ledger, { runId: "run-2" });
    expect(second).toEqual({ status: "completed", filesCopied: 1, bytesCopied: 5 });
    expect(storage.renamed).toEqual([path.join(dst, "B1", "sub", "b.txt")]);
    expect(phases("run-2")).toEqual([
      "started",
      "file-copied:a.txt",
      "file-copied:sub/b.txt",
      "verified",
      "completed",
    ]);
  });

  test("a failed verification is not reused; the next attempt copies afresh", async () => {
    const a = path.join(dst, "B1", "a.txt");
    storage.onRename = (to) => {
      if (to !== a) return;
      fs.writeFileSync(a, "XXXXX");
      storage.onRename = undefined;
    };
    const batch = await item();
    const { exec } = executor({ verifyChecksum: true });
    const first = await exec.execute(batch, ledger, { runId: "run-1" });
    expect(first).toEqual({
      status: "failed",
      reason: "verification-mismatch:a.txt",
      filesCopied: 2,
      bytesCopied: 10,
    });

    storage.renamed.length = 0;
    const second = await exec.execute(batch, ledger, { runId: "run-2" });
    expect(second).toEqual({ status: "completed", filesCopied: 2, bytesCopied: 10 });
    expect(storage.renamed).toEqual([a, path.join(dst, "B1", "sub", "b.txt")]);
    expect(await readText(a)).toBe("alpha");
  });

  test("with checksums on, an earlier copy whose digest changed is copied again", async () => {
    const batch = await item();
    storage.renameFailures.set(path.join(dst, "B1", "sub", "b.txt"), 3);
    const { exec } = executor({ verifyChecksum: true });
    const first = await exec.execute(batch, ledger, { runId: "run-1" });
    expect(first.status).toBe("failed");
    await fsp.writeFile(path.join(dst, "B1", "a.txt"), "XXXXX");

    const second = await exec.execute(batch, ledger, { runId: "run-2" });
    expect(second).toEqual({ status: "completed", filesCopied: 2, bytesCopied: 10 });
    expect(await readText(path.join(dst, "B1", "a.txt"))).toBe("alpha");
    expect(phases("run-2")).toEqual([
      "started",
      "file-copied:a.txt",
      "file-copied:sub/b.txt",
      "verified",
      "completed",
    ]);
  });

  test("executing a completed item again leaves the same bytes and a second clean cycle", async () => {
    const batch = await item();
    const { exec } = executor();
    await exec.execute(batch, ledger, { runId: "run-1" });
    const again = await exec.execute(batch, ledger, { runId: "run-2" });

    expect(again).toEqual({ status: "completed", filesCopied: 2, bytesCopied: 10 });
    expect(await listFiles(dst)).toEqual(["B1/a.txt", "B1/sub/b.txt"]);
    expect(await readText(path.join(dst, "B1", "a.txt"))).toBe("alpha");
    expect(await readText(path.join(dst, "B1", "sub", "b.txt"))).toBe("bravo");
    const cycle = ["started", "file-copied", "file-copied", "verified", "completed"];
    expect(ledger.history({ batchId: "B1" }).map((r) => `${r.runId}:${r.phase}`)).toEqual([
      ...cycle.map((p) => `run-1:${p}`),
      ...cycle.map((p) => `run-2:${p}`),
    ]);
  });

  test("cancellation during a retry backoff stops without another attempt", async () => {
    const ac = new AbortController();
    const delays: number[] = [];
    storage.renameFailures.set(path.join(dst, "B1", "a.txt"), 5);
    const { exec } = executor({
      sleep: (ms) => {
        delays.push(ms);
        ac.abort();
        return new Promise<void>(() => {});
      },
    });
    const outcome = await exec.execute(await item(), ledger, {
      runId: "run-1",
      signal: ac.signal,
    });

    expect(outcome).toEqual({ status: "interrupted", filesCopied: 0, bytesCopied: 0 });
    expect(delays).toEqual([1000]);
    expect(storage.renameFailures.get(path.join(dst, "B1", "a.txt"))).toBe(4);
    expect(ledger.phaseOf("run-1", "B1")).toBe("started");
    expect(ledger.pendingIncomplete().map((p) => p.batchId)).toEqual(["B1"]);
    expect(await listFiles(dst)).toEqual([]);
  });

  test("cancellation stops between files and leaves the transaction open", async () => {
    const ac = new AbortController();
    storage.onRename = () => ac.abort();
    const { exec } = executor();
    const outcome = await exec.execute(await item(), ledger, {
      runId: "run-1",
      signal: ac.signal,
    });

    expect(outcome).toEqual({ status: "interrupted", filesCopied: 1, bytesCopied: 5 });
    expect(ledger.phaseOf("run-1", "B1")).toBe("file-copied");
    expect(ledger.pendingIncomplete().map((p) => p.batchId)).toEqual(["B1"]);
  });

  test("an empty batch completes with an empty destination folder", async () => {
    await fsp.mkdir(path.join(src, "B2"));
    const { exec } = executor();
    const outcome = await exec.execute(await item("B2"), ledger, { runId: "run-1" });

    expect(outcome).toEqual({ status: "completed", filesCopied: 0, bytesCopied: 0 });
    expect((await fsp.stat(path.join(dst, "B2"))).isDirectory()).toBe(true);
    expect(phases("run-1")).toEqual(["started", "verified", "completed"]);
  });

  test("an unwritable destination fails before any copy", async () => {
    await fsp.writeFile(path.join(dst, "B1"), "not a directory");
    const { exec } = executor();
    const outcome = await exec.execute(await item(), ledger, { runId: "run-1" });

    expect(outcome.status).toBe("failed");
    if (outcome.status === "failed") {
      expect(outcome.reason).toMatch(/^destination-unwritable:/);
    }
    expect(storage.renamed).toEqual([]);
  });
});
