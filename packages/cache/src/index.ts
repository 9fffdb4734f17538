/**
 * Skiff Cache
 *
 * Cache index, per-key locking, the cache manager and unified file handles.
 */

export {
  type CacheEntry,
  CacheEntrySchema,
  type CacheIndexData,
  CacheIndexSchema,
  type CacheIndexStore,
  createCacheIndexStore,
  emptyIndex,
  type ExtractionEntry,
  ExtractionEntrySchema,
} from "./cache-index.ts";
export {
  type CacheListing,
  type CacheManager,
  type CacheManagerConfig,
  type CacheTargets,
  createCacheManager,
  type DownloadOptions,
  type FileResolveOptions,
  type ListOptions,
  type OpenOptions,
  type ReadResolveOptions,
  type ResolveOptions,
  type SweepReport,
  type WriteResolveOptions,
} from "./cache-manager.ts";
export { createDefaultDrivers, type DriversConfig } from "./drivers.ts";
export {
  createReadHandle,
  createWriteHandle,
  type ReadHandle,
  useWriteHandle,
  type WriteHandle,
} from "./file-handle.ts";
export { type CacheLock, type CacheLockConfig, createCacheLock, DEFAULT_LOCK_TIMEOUT_MS } from "./lock.ts";
export { type CacheLogger, silentLogger } from "./types.ts";
