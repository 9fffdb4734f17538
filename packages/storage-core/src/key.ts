/**
 * Cache key utilities
 *
 * Keys are 64-char lowercase hex SHA-256 digests.
 */

import { createHash } from "node:crypto";
import type { ResourceIdentifier } from "./types.ts";

export const sha256Hex = (input: string | Uint8Array): string =>
  createHash("sha256").update(input).digest("hex");

/**
 * Cache key of the base artifact. The member chain is excluded: members are
 * extracted from the cached base, never downloaded on their own.
 */
export const toCacheKey = (id: ResourceIdentifier): string => sha256Hex(`${id.scheme}|${id.location}`);

/**
 * Key of an extracted member chain below a base artifact.
 */
export const toExtractionKey = (baseKey: string, member: readonly string[]): string =>
  sha256Hex([baseKey, ...member].join("!"));

/**
 * Key of the directory an archive is fully extracted into. The trailing
 * empty segment keeps it apart from every member key, since members are
 * never empty.
 */
export const toArchiveDirectoryKey = (baseKey: string, member: readonly string[]): string =>
  toExtractionKey(baseKey, [...member, ""]);

/**
 * Create storage path from a cache key.
 * Uses first 2 chars of the key as subdirectory for better distribution.
 *
 * Example: abcdef... -> data/ab/abcdef...
 */
export const toStoragePath = (key: string, prefix = "data/"): string => {
  const subdir = key.slice(0, 2);
  return `${prefix}${subdir}/${key}`;
};
