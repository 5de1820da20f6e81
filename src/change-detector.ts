// src/change-detector.ts
import path from "node:path";
import { SourceUnreadableError, errorMessage } from "./errors.js";
import type { Ignorer } from "./ignore.js";
import type { Logger } from "./logger.js";
import {
  diffManifests,
  isEmptyDiff,
  type Manifest,
  type ManifestDiff,
} from "./manifest.js";
import type { StorageBackend } from "./storage.js";

export const CLASSIFICATIONS = [
  "new",
  "modified",
  "unchanged",
  "destination-missing",
] as const;

export type Classification = (typeof CLASSIFICATIONS)[number];

export type FolderMatch = "exact" | "case-insensitive" | "contains";

export interface BatchItem {
  batchId: string;
  sourcePath: string;
  destinationPath: string;
  classification: Classification;
  fileManifest: Manifest;
  /** Present for `modified` items: what changed since the last completed copy. */
  diff?: ManifestDiff;
}

export interface CompletedManifestLookup {
  latestCompletedManifest(batchId: string): Manifest | undefined;
}

export interface ClassifyOptions {
  source: StorageBackend;
  destination: StorageBackend;
  ignorer?: Ignorer;
  mtimeToleranceMs?: number;
  folderMatch?: FolderMatch;
  logger?: Logger;
}

function isSingleSegment(batchId: string): boolean {
  return (
    batchId.length > 0 &&
    batchId !== "." &&
    batchId !== ".." &&
    !/[\\/]/.test(batchId)
  );
}

/**
 * Name of the batch's folder under `sourceRoot`. Exact match is tried
 * first in every mode; the looser modes exist for shares where folders
 * carry a suffix ("B1024 - final") or inconsistent case.
 */
export async function resolveBatchFolder(
  batchId: string,
  sourceRoot: string,
  source: StorageBackend,
  mode: FolderMatch = "exact",
): Promise<string | undefined> {
  const exact = await source.stat(path.join(sourceRoot, batchId));
  if (exact?.isDirectory) return batchId;
  if (mode === "exact") return undefined;
  const names = await source.listDirectories(sourceRoot);
  const wanted = batchId.toLowerCase();
  const ci = names.find((n) => n.toLowerCase() === wanted);
  if (ci || mode === "case-insensitive") return ci;
  return names.find((n) => n.toLowerCase().includes(wanted));
}

export async function classify(
  batchId: string,
  sourceRoot: string,
  destinationRoot: string,
  ledger: CompletedManifestLookup,
  opts: ClassifyOptions,
): Promise<BatchItem> {
  if (!isSingleSegment(batchId)) {
    throw new SourceUnreadableError(
      `batch id "${batchId}" is not a directory name`,
      batchId,
    );
  }

  let folder: string | undefined;
  try {
    folder = await resolveBatchFolder(
      batchId,
      sourceRoot,
      opts.source,
      opts.folderMatch,
    );
  } catch (err) {
    throw new SourceUnreadableError(
      `unable to search ${sourceRoot}: ${errorMessage(err)}`,
      batchId,
      { cause: err },
    );
  }
  if (!folder) {
    throw new SourceUnreadableError(
      `source directory not found under ${sourceRoot}`,
      batchId,
    );
  }

  const sourcePath = path.join(sourceRoot, folder);
  const destinationPath = path.join(destinationRoot, folder);

  let fileManifest: Manifest;
  try {
    fileManifest = await opts.source.enumerate(sourcePath, opts.ignorer);
  } catch (err) {
    throw new SourceUnreadableError(
      `unable to enumerate ${sourcePath}: ${errorMessage(err)}`,
      batchId,
      { cause: err },
    );
  }

  const item = (classification: Classification, diff?: ManifestDiff): BatchItem => {
    opts.logger?.debug("classified", {
      batchId,
      classification,
      files: fileManifest.length,
    });
    return {
      batchId,
      sourcePath,
      destinationPath,
      classification,
      fileManifest,
      diff,
    };
  };

  const dest = await opts.destination.stat(destinationPath);
  if (!dest?.isDirectory) return item("destination-missing");

  const previous = ledger.latestCompletedManifest(batchId);
  if (!previous) return item("new");

  const diff = diffManifests(previous, fileManifest, opts.mtimeToleranceMs ?? 0);
  return isEmptyDiff(diff) ? item("unchanged") : item("modified", diff);
}
