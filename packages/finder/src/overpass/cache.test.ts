import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  queryCacheKey,
  readCachedResponse,
  writeCachedResponse,
  getCachePath,
} from "./cache.js";

const query = `[out:json];node["amenity"~"^(cafe)$"](around:80,1.000000,2.000000);
(._;>;);
out meta;`;

describe("queryCacheKey", () => {
  it("is the padded URL-safe base64 SHA-1 of the query", () => {
    // SHA-1("") = da39a3ee5e6b4b0d3255bfef95601890afd80709
    expect(queryCacheKey("")).toBe("2jmj7l5rSw0yVb_vlWAYkK_YBwk=");
  });

  it("is filesystem-safe", () => {
    expect(queryCacheKey(query)).toMatch(/^[A-Za-z0-9_-]{27}=$/);
  });

  it("is deterministic", () => {
    expect(queryCacheKey(query)).toBe(queryCacheKey(query));
  });

  it("differs for any change in the query text", () => {
    expect(queryCacheKey(query)).not.toBe(queryCacheKey(query.replace("80", "81")));
  });
});

describe("readCachedResponse / writeCachedResponse", () => {
  let cacheDir: string;

  beforeEach(() => {
    cacheDir = mkdtempSync(join(tmpdir(), "overpass-cache-test-"));
  });

  afterEach(() => {
    rmSync(cacheDir, { recursive: true, force: true });
  });

  it("round-trips write → read byte for byte", () => {
    const body = Buffer.from('{"elements":[{"type":"node","id":1}]}\n');
    writeCachedResponse(query, body, cacheDir);

    const cached = readCachedResponse(query, cacheDir);
    expect(cached?.equals(body)).toBe(true);
  });

  it("returns null on cache miss (no file)", () => {
    expect(readCachedResponse(query, cacheDir)).toBeNull();
  });

  it("returns null for empty file", () => {
    writeFileSync(join(cacheDir, queryCacheKey(query)), "");
    expect(readCachedResponse(query, cacheDir)).toBeNull();
  });

  it("stores one file named by the key and nothing else", () => {
    const path = writeCachedResponse(query, Buffer.from("{}"), cacheDir);
    expect(path).toBe(join(cacheDir, queryCacheKey(query)));
    expect(readdirSync(cacheDir)).toEqual([queryCacheKey(query)]);
  });

  it("overwrites an existing entry", () => {
    writeCachedResponse(query, Buffer.from("old"), cacheDir);
    writeCachedResponse(query, Buffer.from("new"), cacheDir);
    expect(readCachedResponse(query, cacheDir)?.toString()).toBe("new");
  });

  it("creates cache directory recursively", () => {
    const nested = join(cacheDir, "a", "b", "c");
    writeCachedResponse(query, Buffer.from("{}"), nested);
    expect(readCachedResponse(query, nested)?.toString()).toBe("{}");
  });

  it("leaves no temporary file behind when the write fails", () => {
    // A non-empty directory where the entry should go makes the rename fail
    const entry = getCachePath(query, cacheDir);
    mkdirSync(entry);
    writeFileSync(join(entry, "occupied"), "x");

    expect(() => writeCachedResponse(query, Buffer.from("{}"), cacheDir)).toThrow();
    expect(readdirSync(cacheDir)).toEqual([queryCacheKey(query)]);
  });
});

describe("getCachePath", () => {
  it("joins the cache directory and the key", () => {
    expect(getCachePath(query, "/tmp/test")).toBe(join("/tmp/test", queryCacheKey(query)));
  });
});
