/**
 * Compression detection and streaming decompression
 *
 * Detection looks at the file name first and falls back to magic bytes.
 * gzip and brotli use zlib, bzip2 uses unbzip2-stream. xz and lzma are
 * recognised but cannot be decoded.
 */

import { createReadStream, createWriteStream } from "node:fs";
import type { Readable, Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import { createBrotliDecompress, createGunzip } from "node:zlib";
import { UnsupportedCompressionError } from "@skiff/storage-core";
import unbzip2Stream from "unbzip2-stream";
import { readHeader, startsWith } from "./sniff.ts";

// ============================================================================
// Types
// ============================================================================

export type CompressionFormat = "gzip" | "bzip2" | "brotli" | "xz" | "lzma";

/**
 * - `none`: bytes as stored
 * - `auto`: decompress when a format is detected
 * - `force`: decompress, failing when no format is detected
 */
export type DecompressMode = "none" | "auto" | "force";

// ============================================================================
// Constants
// ============================================================================

const SUFFIXES: ReadonlyArray<readonly [string, CompressionFormat, string]> = [
  [".tar.gz", "gzip", ".tar"],
  [".tgz", "gzip", ".tar"],
  [".gz", "gzip", ""],
  [".tar.bz2", "bzip2", ".tar"],
  [".tbz2", "bzip2", ".tar"],
  [".bz2", "bzip2", ""],
  [".tar.xz", "xz", ".tar"],
  [".txz", "xz", ".tar"],
  [".xz", "xz", ""],
  [".lzma", "lzma", ""],
  [".br", "brotli", ""],
];

const MAGIC: ReadonlyArray<readonly [readonly number[], CompressionFormat]> = [
  [[0x1f, 0x8b], "gzip"],
  [[0x42, 0x5a, 0x68], "bzip2"],
  [[0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00], "xz"],
];

// ============================================================================
// Detection
// ============================================================================

const suffixMatch = (name: string) => {
  const lower = name.toLowerCase();
  return SUFFIXES.find(([suffix]) => lower.endsWith(suffix));
};

export const detectCompressionByName = (name: string): CompressionFormat | null => suffixMatch(name)?.[1] ?? null;

export const detectCompressionByMagic = (header: Uint8Array): CompressionFormat | null =>
  MAGIC.find(([magic]) => startsWith(header, magic))?.[1] ?? null;

/**
 * Name of the decompressed file: `data.csv.gz` → `data.csv`,
 * `bundle.tgz` → `bundle.tar`.
 */
export const stripCompressionSuffix = (name: string): string => {
  const match = suffixMatch(name);
  return match ? name.slice(0, name.length - match[0].length) + match[2] : name;
};

/**
 * Compression of the file at `path`. `nameHint` stands in for the file
 * name when the path is a cache entry.
 */
export const detectCompression = async (path: string, nameHint?: string): Promise<CompressionFormat | null> => {
  const byName = detectCompressionByName(nameHint ?? path);
  if (byName) return byName;
  return detectCompressionByMagic(await readHeader(path, 6));
};

// ============================================================================
// Decompression
// ============================================================================

export const createDecompressor = (format: CompressionFormat, file: string): Transform => {
  switch (format) {
    case "gzip":
      return createGunzip();
    case "brotli":
      return createBrotliDecompress();
    case "bzip2":
      return unbzip2Stream();
    case "xz":
    case "lzma":
      throw new UnsupportedCompressionError(format, file);
  }
};

/**
 * Write the decompressed content of `source` to `target`.
 */
export const decompressFile = async (source: string, target: string, format: CompressionFormat): Promise<void> => {
  await pipeline(createReadStream(source), createDecompressor(format, source), createWriteStream(target));
};

/**
 * Read stream over `path`, decompressed according to `mode`.
 */
export const openDecompressed = async (
  path: string,
  mode: DecompressMode,
  nameHint?: string
): Promise<Readable> => {
  if (mode === "none") return createReadStream(path);

  const format = await detectCompression(path, nameHint);
  if (format === null) {
    if (mode === "force") throw new UnsupportedCompressionError("unknown", nameHint ?? path);
    return createReadStream(path);
  }

  const decompressor = createDecompressor(format, nameHint ?? path);
  const source = createReadStream(path);
  source.on("error", (error) => decompressor.emit("error", error));
  return source.pipe(decompressor);
};
