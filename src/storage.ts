// src/storage.ts
//
// All filesystem access made by the engine. LocalStorage also serves mapped
// network drives.

import { constants as fsConstants, createReadStream, createWriteStream } from "node:fs";
import {
  access,
  mkdir,
  readdir,
  rename as fsRename,
  rm,
  stat as fsStat,
  utimes,
} from "node:fs/promises";
import type { Readable, Writable } from "node:stream";
import * as walk from "@nodelib/fs.walk";
import { errorCode } from "./errors.js";
import type { Ignorer } from "./ignore.js";
import { sortManifest, type Manifest, type ManifestEntry } from "./manifest.js";
import { toRel } from "./path-rel.js";

export interface FileStat {
  size: number;
  mtimeMs: number;
  isDirectory: boolean;
}

export interface StorageBackend {
  readonly kind: string;
  isAccessible(root: string): Promise<boolean>;
  exists(path: string): Promise<boolean>;
  stat(path: string): Promise<FileStat | null>;
  /** Names of the immediate child directories of `root`. */
  listDirectories(root: string): Promise<string[]>;
  /** Every regular file under `dir`, as a sorted manifest. */
  enumerate(dir: string, ignorer?: Ignorer): Promise<Manifest>;
  read(path: string): Readable;
  write(path: string): Writable;
  ensureDir(path: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  remove(path: string): Promise<void>;
  setTimes(path: string, mtimeMs: number): Promise<void>;
}

function walkEntries(root: string, settings: walk.Options): Promise<walk.Entry[]> {
  return new Promise((resolve, reject) => {
    walk.walk(root, settings, (err, entries) => {
      if (err) reject(err);
      else resolve(entries);
    });
  });
}

export class LocalStorage implements StorageBackend {
  readonly kind = "local";

  async isAccessible(root: string): Promise<boolean> {
    try {
      const st = await fsStat(root);
      if (!st.isDirectory()) return false;
      await access(root, fsConstants.R_OK);
      return true;
    } catch {
      return false;
    }
  }

  async exists(path: string): Promise<boolean> {
    return (await this.stat(path)) != null;
  }

  async stat(path: string): Promise<FileStat | null> {
    try {
      const st = await fsStat(path);
      return {
        size: st.size,
        mtimeMs: Math.floor(st.mtimeMs),
        isDirectory: st.isDirectory(),
      };
    } catch (err) {
      if (errorCode(err) === "ENOENT") return null;
      throw err;
    }
  }

  async listDirectories(root: string): Promise<string[]> {
    const entries = await readdir(root, { withFileTypes: true });
    return entries
      .filter((e) => e.isDirectory())
      .map((e) => e.name)
      .sort();
  }

  async enumerate(dir: string, ignorer?: Ignorer): Promise<Manifest> {
    const entries = await walkEntries(dir, {
      stats: true,
      followSymbolicLinks: false,
      deepFilter: (e) => !ignorer?.ignoresDir(toRel(e.path, dir)),
      entryFilter: (e) =>
        e.dirent.isFile() && !ignorer?.ignoresFile(toRel(e.path, dir)),
    });
    const manifest: ManifestEntry[] = [];
    for (const e of entries) {
      const st = e.stats ?? (await fsStat(e.path));
      manifest.push({
        relativePath: toRel(e.path, dir),
        sizeBytes: st.size,
        modifiedTime: Math.floor(st.mtimeMs),
      });
    }
    return sortManifest(manifest);
  }

  read(path: string): Readable {
    return createReadStream(path);
  }

  write(path: string): Writable {
    return createWriteStream(path, { flags: "w" });
  }

  async ensureDir(path: string): Promise<void> {
    await mkdir(path, { recursive: true });
  }

  async rename(from: string, to: string): Promise<void> {
    await fsRename(from, to);
  }

  async remove(path: string): Promise<void> {
    await rm(path, { force: true });
  }

  async setTimes(path: string, mtimeMs: number): Promise<void> {
    const when = new Date(mtimeMs);
    await utimes(path, when, when);
  }
}
