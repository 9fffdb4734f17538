/**
 * Cache index
 *
 * One JSON document at `<root>/index.json` holding every cache entry and
 * every extracted member. It is validated with zod on load and replaced
 * atomically (temp file + rename) on save. Callers serialize
 * read-modify-write cycles through the `index` lock.
 */

import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { CacheIndexCorruptError, errnoCode } from "@skiff/storage-core";
import { z } from "zod";

// ============================================================================
// Schemas
// ============================================================================

const KeySchema = z.string().regex(/^[a-f0-9]{64}$/);

export const BackendKindSchema = z.enum(["local", "http", "s3", "hub"]);

/**
 * A cached base artifact.
 */
export const CacheEntrySchema = z.object({
  key: KeySchema,
  /** Canonical identifier string of the base artifact */
  identifier: z.string(),
  backend: BackendKindSchema,
  /** Data file, relative to the cache root */
  file: z.string(),
  freshnessToken: z.string().nullable(),
  size: z.number().int().nonnegative(),
  /** SHA-256 of the installed bytes */
  contentHash: z.string(),
  fetchedAt: z.string().datetime(),
  /** Expiry chosen for this entry; absent means the configured default */
  expireDays: z.number().int().min(-1).optional(),
  /** Freshness checking chosen for this entry; absent means the configured default */
  autoUpdate: z.boolean().optional(),
});

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

/**
 * A member extracted from a base artifact (one per prefix of the member
 * chain), or a whole archive extracted into a directory.
 */
export const ExtractionEntrySchema = z.object({
  key: KeySchema,
  baseKey: KeySchema,
  member: z.array(z.string()),
  kind: z.enum(["file", "directory"]).default("file"),
  file: z.string(),
  /** Revision of the base artifact the member was extracted from */
  sourceToken: z.string().nullable(),
  /** Bytes of a file, or number of files in a directory */
  size: z.number().int().nonnegative(),
  extractedAt: z.string().datetime(),
});

export type ExtractionEntry = z.infer<typeof ExtractionEntrySchema>;

export const CacheIndexSchema = z.object({
  version: z.literal(1),
  entries: z.record(KeySchema, CacheEntrySchema),
  extractions: z.record(KeySchema, ExtractionEntrySchema),
});

export type CacheIndexData = z.infer<typeof CacheIndexSchema>;

// ============================================================================
// Store
// ============================================================================

export type CacheIndexStore = {
  readonly path: string;
  load: () => Promise<CacheIndexData>;
  save: (data: CacheIndexData) => Promise<void>;
};

export const emptyIndex = (): CacheIndexData => ({ version: 1, entries: {}, extractions: {} });

const parseIndex = (path: string, text: string): CacheIndexData => {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error: unknown) {
    throw new CacheIndexCorruptError(path, { cause: error });
  }
  const result = CacheIndexSchema.safeParse(raw);
  if (!result.success) {
    throw new CacheIndexCorruptError(path, { cause: result.error });
  }
  return result.data;
};

export const createCacheIndexStore = (config: { path: string; tempDir: string }): CacheIndexStore => {
  const { path, tempDir } = config;

  return {
    path,

    async load(): Promise<CacheIndexData> {
      let text: string;
      try {
        text = await readFile(path, "utf-8");
      } catch (error: unknown) {
        if (errnoCode(error) === "ENOENT") return emptyIndex();
        throw error;
      }
      return parseIndex(path, text);
    },

    async save(data: CacheIndexData): Promise<void> {
      await mkdir(tempDir, { recursive: true });
      await mkdir(dirname(path), { recursive: true });
      const temp = join(tempDir, `index-${randomUUID()}.json`);
      try {
        await writeFile(temp, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
        await rename(temp, path);
      } finally {
        await rm(temp, { force: true });
      }
    },
  };
};
