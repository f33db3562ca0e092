/**
 * Disk cache for Overpass API responses.
 *
 * Content-addressed: each response is stored under the digest of the exact
 * query text that produced it, so re-running the same route with the same
 * rules never touches the network. Entries never expire; a change to how
 * queries are rendered simply produces new keys.
 *
 * Cache lives at ~/.route-pois/overpass-cache/ by default. The directory is
 * flat, one file per query, holding the verbatim response body.
 */

import { createHash } from "node:crypto";
import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  statSync,
  writeSync,
} from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

/** Default cache directory */
export function defaultCacheDir(): string {
  return join(homedir(), ".route-pois", "overpass-cache");
}

/**
 * Deterministic cache key for a query.
 *
 * SHA-1 of the UTF-8 query text in padded URL-safe base64: 28 characters,
 * filesystem-safe on every platform.
 */
export function queryCacheKey(query: string): string {
  return createHash("sha1")
    .update(query, "utf-8")
    .digest("base64")
    .replace(/\+/g, "-")
    .replace(/\//g, "_");
}

/**
 * Get the cache file path for a query.
 */
export function getCachePath(query: string, cacheDir?: string): string {
  return join(cacheDir ?? defaultCacheDir(), queryCacheKey(query));
}

/**
 * Read a cached response body from disk.
 *
 * @returns The stored bytes on hit, or null on miss. A zero-length file
 * counts as a miss.
 */
export function readCachedResponse(
  query: string,
  cacheDir?: string
): Buffer | null {
  const filepath = getCachePath(query, cacheDir);

  if (!existsSync(filepath)) return null;
  if (statSync(filepath).size === 0) return null;

  return readFileSync(filepath);
}

/**
 * Write a response body to the disk cache.
 *
 * The body goes to a temporary sibling first and is fsynced, then renamed
 * over the key, so an interrupted run never leaves a partial entry behind.
 * A failed write removes its temporary file before rethrowing.
 *
 * @returns The path of the cache entry
 */
export function writeCachedResponse(
  query: string,
  body: Buffer,
  cacheDir?: string
): string {
  const dir = cacheDir ?? defaultCacheDir();
  mkdirSync(dir, { recursive: true });

  const filepath = getCachePath(query, dir);
  const tmpPath = `${filepath}.${process.pid}.tmp`;
  try {
    const fd = openSync(tmpPath, "w");
    try {
      let offset = 0;
      while (offset < body.length) {
        offset += writeSync(fd, body, offset);
      }
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tmpPath, filepath);
  } catch (err) {
    rmSync(tmpPath, { force: true });
    throw err;
  }
  return filepath;
}
