import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Readable } from "node:stream";
import { LocalStorage } from "../storage.js";

export async function mkTmp(prefix: string): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeFiles(
  root: string,
  files: Record<string, string>,
): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const abs = path.join(root, ...rel.split("/"));
    await fsp.mkdir(path.dirname(abs), { recursive: true });
    await fsp.writeFile(abs, content);
  }
}

export async function readText(p: string): Promise<string> {
  return fsp.readFile(p, "utf8");
}

export async function fileExists(p: string): Promise<boolean> {
  try {
    await fsp.stat(p);
    return true;
  } catch {
    return false;
  }
}

/** Every file under `root`, as sorted posix relative paths. */
export async function listFiles(root: string, prefix = ""): Promise<string[]> {
  const out: string[] = [];
  for (const e of await fsp.readdir(root, { withFileTypes: true })) {
    const rel = prefix ? `${prefix}/${e.name}` : e.name;
    if (e.isDirectory()) out.push(...(await listFiles(path.join(root, e.name), rel)));
    else if (e.isFile()) out.push(rel);
  }
  return out.sort();
}

export type Sleeps = number[] & { sleep: (ms: number) => Promise<void> };

/** Records requested delays instead of waiting. */
export function recordSleeps(): Sleeps {
  const delays: number[] = [];
  return Object.assign(delays, {
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  });
}

/**
 * LocalStorage with injectable faults, keyed by absolute path:
 * - renameFailures: the next N renames onto the path throw
 * - statSizeSkew: stat reports the size off by this many bytes
 * - readOverride: read returns these bytes instead of the file
 */
export class FaultyStorage extends LocalStorage {
  readonly renameFailures = new Map<string, number>();
  readonly statSizeSkew = new Map<string, number>();
  readonly readOverride = new Map<string, string>();
  readonly renamed: string[] = [];
  onRename?: (to: string) => void;

  override async rename(from: string, to: string): Promise<void> {
    const left = this.renameFailures.get(to) ?? 0;
    if (left > 0) {
      this.renameFailures.set(to, left - 1);
      throw new Error("simulated rename failure");
    }
    await super.rename(from, to);
    this.renamed.push(to);
    this.onRename?.(to);
  }

  override async stat(p: string) {
    const st = await super.stat(p);
    const skew = this.statSizeSkew.get(p);
    return st && skew ? { ...st, size: st.size + skew } : st;
  }

  override read(p: string): Readable {
    const data = this.readOverride.get(p);
    return data === undefined ? super.read(p) : Readable.from([Buffer.from(data)]);
  }
}
