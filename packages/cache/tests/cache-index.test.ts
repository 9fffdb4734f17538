/**
 * Unit tests for the cache index store
 */

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CacheIndexCorruptError } from "@skiff/storage-core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type CacheIndexData, createCacheIndexStore, emptyIndex } from "../src/cache-index.ts";

const KEY = "ab".repeat(32);

describe("createCacheIndexStore", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "skiff-index-test-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("starts empty", async () => {
    const store = createCacheIndexStore({ path: join(root, "index.json"), tempDir: join(root, "tmp") });
    expect(await store.load()).toEqual(emptyIndex());
  });

  it("saves and reloads entries", async () => {
    const store = createCacheIndexStore({ path: join(root, "index.json"), tempDir: join(root, "tmp") });
    const data: CacheIndexData = {
      version: 1,
      entries: {
        [KEY]: {
          key: KEY,
          identifier: "s3://bucket/a.txt",
          backend: "s3",
          file: `data/ab/${KEY}`,
          freshnessToken: "v1",
          size: 5,
          contentHash: "cd".repeat(32),
          fetchedAt: "2024-05-01T10:00:00.000Z",
        },
      },
      extractions: {},
    };

    await store.save(data);

    expect(await store.load()).toEqual(data);
    expect(JSON.parse(await readFile(join(root, "index.json"), "utf-8")).version).toBe(1);
  });

  it("rejects unreadable and invalid documents", async () => {
    const path = join(root, "index.json");
    const store = createCacheIndexStore({ path, tempDir: join(root, "tmp") });

    await writeFile(path, "{ not json");
    await expect(store.load()).rejects.toBeInstanceOf(CacheIndexCorruptError);

    await writeFile(path, JSON.stringify({ version: 2, entries: {}, extractions: {} }));
    await expect(store.load()).rejects.toBeInstanceOf(CacheIndexCorruptError);
  });
});
