// src/manifest.ts

export interface ManifestEntry {
  relativePath: string; // posix, relative to the batch directory
  sizeBytes: number;
  modifiedTime: number; // epoch ms
}

export type Manifest = ManifestEntry[];

export interface ManifestDiff {
  added: string[];
  removed: string[];
  changed: string[];
}

export function compareRelPaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function sortManifest(entries: Iterable<ManifestEntry>): Manifest {
  return Array.from(entries).sort((a, b) =>
    compareRelPaths(a.relativePath, b.relativePath),
  );
}

export function sameEntry(
  a: ManifestEntry,
  b: ManifestEntry,
  mtimeToleranceMs = 0,
): boolean {
  return (
    a.relativePath === b.relativePath &&
    a.sizeBytes === b.sizeBytes &&
    Math.abs(a.modifiedTime - b.modifiedTime) <= mtimeToleranceMs
  );
}

/**
 * Diff two sorted manifests. Network shares often round modification times
 * (FAT/SMB keep 2s resolution), hence the tolerance.
 */
export function diffManifests(
  previous: readonly ManifestEntry[],
  current: readonly ManifestEntry[],
  mtimeToleranceMs = 0,
): ManifestDiff {
  const diff: ManifestDiff = { added: [], removed: [], changed: [] };
  let i = 0;
  let j = 0;
  while (i < previous.length || j < current.length) {
    const p = previous[i];
    const c = current[j];
    if (p === undefined) {
      diff.added.push(c.relativePath);
      j++;
      continue;
    }
    if (c === undefined) {
      diff.removed.push(p.relativePath);
      i++;
      continue;
    }
    const cmp = compareRelPaths(p.relativePath, c.relativePath);
    if (cmp < 0) {
      diff.removed.push(p.relativePath);
      i++;
    } else if (cmp > 0) {
      diff.added.push(c.relativePath);
      j++;
    } else {
      if (!sameEntry(p, c, mtimeToleranceMs)) diff.changed.push(c.relativePath);
      i++;
      j++;
    }
  }
  return diff;
}

export function isEmptyDiff(diff: ManifestDiff): boolean {
  return !diff.added.length && !diff.removed.length && !diff.changed.length;
}

export function manifestBytes(entries: readonly ManifestEntry[]): number {
  return entries.reduce((sum, e) => sum + e.sizeBytes, 0);
}

export function manifestIndex(
  entries: readonly ManifestEntry[],
): Map<string, ManifestEntry> {
  return new Map(entries.map((e) => [e.relativePath, e]));
}
