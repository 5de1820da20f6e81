import ignore from "ignore";
import { STAGING_SUFFIX } from "./constants.js";

export type Ignorer = {
  ignoresFile: (r: string) => boolean; // file path relative to the batch dir
  ignoresDir: (r: string) => boolean; // directory path relative to the batch dir
};

// Lock files Office leaves next to open documents, Windows/macOS folder
// metadata, and our own staging files from an interrupted copy.
export const DEFAULT_IGNORES = [
  "~$*",
  "Thumbs.db",
  "desktop.ini",
  ".DS_Store",
  `*${STAGING_SUFFIX}`,
];

export function normalizeR(r: string): string {
  return r.replace(/\\/g, "/").replace(/^\/+/, "");
}

export function normalizeIgnorePatterns(patterns: readonly string[]): string[] {
  const out = new Set<string>();
  for (const raw of patterns) {
    const trimmed = raw.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    out.add(trimmed.replace(/\\/g, "/"));
  }
  return Array.from(out);
}

export function createIgnorer(
  patterns: readonly string[] = [],
  opts: { defaults?: boolean } = {},
): Ignorer {
  const cleaned = normalizeIgnorePatterns([
    ...(opts.defaults === false ? [] : DEFAULT_IGNORES),
    ...patterns,
  ]);
  if (!cleaned.length) {
    return {
      ignoresFile: () => false,
      ignoresDir: () => false,
    };
  }
  const matcher = ignore().add(cleaned);
  return {
    ignoresFile: (r) => {
      const rel = normalizeR(r);
      return rel !== "" && matcher.ignores(rel);
    },
    ignoresDir: (r) => {
      const rel = normalizeR(r).replace(/\/+$/, "");
      // trailing slash so dir-only patterns ("tmp/") match
      return rel !== "" && matcher.ignores(`${rel}/`);
    },
  };
}
