// src/path-rel.ts
import path from "node:path";

// Manifest paths are always posix, whatever the platform the drive is
// mounted on, so manifests recorded on one host compare equal on another.
export function toRel(abs: string, root: string): string {
  const rel = path.relative(root, abs);
  if (!rel) return "";
  return rel.split(path.sep).join("/");
}

export function toAbs(rel: string, root: string): string {
  return rel ? path.join(root, ...rel.split("/")) : root;
}

/** Reject relative paths that would escape the batch directory. */
export function isContained(rel: string): boolean {
  if (!rel || path.posix.isAbsolute(rel)) return false;
  return !rel.split("/").some((seg) => seg === "..");
}
