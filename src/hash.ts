// src/hash.ts
import { createHash, getHashes } from "node:crypto";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";

const ENCODING = "hex";

export const CURATED_HASH_ALGOS = [
  "md5",
  "sha1",
  "sha256",
  "sha512",
  "blake2b512",
] as const;

export type HashAlg = (typeof CURATED_HASH_ALGOS)[number];

let supportedHashes: HashAlg[] | null = null;
export function listSupportedHashes(): HashAlg[] {
  if (supportedHashes == null) {
    const avail = new Set(getHashes().map((s) => s.toLowerCase()));
    supportedHashes = CURATED_HASH_ALGOS.filter((a) => avail.has(a));
  }
  return supportedHashes;
}

/** Digest a stream with backpressure; read errors reject. */
export async function streamDigest(alg: HashAlg, input: Readable): Promise<string> {
  const h = createHash(alg);
  await pipeline(input, async function (src: AsyncIterable<Buffer>) {
    for await (const chunk of src) {
      h.update(chunk);
    }
  });
  return h.digest(ENCODING);
}
