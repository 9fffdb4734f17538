/**
 * Cache manager
 *
 * Maps resource identifiers to local files under one cache root:
 *
 * ```
 * <root>/index.json            cache index
 * <root>/data/<k0k1>/<key>     base artifacts
 * <root>/extracted/<k0k1>/<key> extracted archive members
 * <root>/tmp/                  in-flight downloads and staged writes
 * <root>/locks/                per-key lock files
 * ```
 *
 * `resolve` runs check-freshness / fetch / install under the per-key lock,
 * so at most one fetch per key is in flight across every process sharing
 * the root. Data files are installed by rename inside the `index` lock,
 * together with their index entry; a reader only ever sees the previous or
 * the new complete file, and a failed index write puts the previous file
 * back.
 *
 * @packageDocumentation
 */

import { createHash, randomUUID } from "node:crypto";
import { constants, createReadStream, createWriteStream, type Dirent } from "node:fs";
import { copyFile, link, mkdir, readdir, rename, rm, stat as statFile } from "node:fs/promises";
import { basename, dirname, join, resolve as resolvePath, sep } from "node:path";
import { Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import {
  type DecompressMode,
  extractArchive,
  extractArchiveMember,
  isArchiveFile,
  openDecompressed,
} from "@skiff/codec";
import {
  ArchiveMemberNotFoundError,
  AuthenticationError,
  type BackendDriver,
  type BackendDrivers,
  baseIdentifier,
  CacheEntryNotFoundError,
  ChecksumMismatchError,
  createStagedFileSink,
  DestinationExistsError,
  errnoCode,
  formatIdentifier,
  InvalidIdentifierError,
  locationName,
  parseIdentifier,
  type ResourceIdentifier,
  ResourceNotFoundError,
  SkiffError,
  selectDriver,
  type StatResult,
  toArchiveDirectoryKey,
  toCacheKey,
  toExtractionKey,
  toStoragePath,
} from "@skiff/storage-core";
import { type CacheEntry, type CacheIndexData, createCacheIndexStore, type ExtractionEntry } from "./cache-index.ts";
import {
  createReadHandle,
  createWriteHandle,
  type ReadHandle,
  useWriteHandle,
  type WriteHandle,
} from "./file-handle.ts";
import { createCacheLock } from "./lock.ts";
import { type CacheLogger, silentLogger } from "./types.ts";

// ============================================================================
// Types
// ============================================================================

export type CacheManagerConfig = {
  /** Cache root directory */
  root: string;
  /** One driver per backend kind */
  drivers: BackendDrivers;
  /** Lock acquisition timeout (default: 60000) */
  lockTimeoutMs?: number;
  /** Lock poll interval (default: 100) */
  lockPollMs?: number;
  /** Entries older than this many days are refetched; -1 never expires (default: -1) */
  expireDays?: number;
  /** Check freshness on every resolve (default: true) */
  autoUpdate?: boolean;
  /** Grace period before `sweep` touches unreferenced files (default: 1 hour) */
  sweepGraceMs?: number;
  logger?: CacheLogger;
  /** Clock (for testing) */
  now?: () => Date;
};

/**
 * `autoUpdate` and `expireDays` given here are stored on the entry and stay
 * in force for later calls that leave them out.
 */
export type ResolveOptions = {
  /** Fetch even when the cached copy is current */
  forceRefresh?: boolean;
  /** Override the configured `autoUpdate` */
  autoUpdate?: boolean;
  /** Override the configured `expireDays` */
  expireDays?: number;
};

export type FileResolveOptions = ResolveOptions & {
  /** When the resolved file is an archive, extract all of it and return the directory */
  extract?: boolean;
  /** Like `extract`, re-extracting even when a current extraction exists */
  forceExtract?: boolean;
};

export type DownloadOptions = ResolveOptions & {
  /** Replace an existing destination file (default: false) */
  overwrite?: boolean;
};

export type ReadResolveOptions = ResolveOptions & { mode?: "read" };
export type WriteResolveOptions = { mode: "write" };

export type OpenOptions = ResolveOptions & {
  /** Decompression of the resolved file (default: "none") */
  decompress?: DecompressMode;
};

export type ListOptions = {
  /** Only expired (true) or only unexpired (false) entries */
  expired?: boolean;
  /** Judge expiry by this many days instead of each entry's own setting */
  expireDays?: number;
};

export type CacheListing = CacheEntry & {
  /** Absolute path of the data file */
  path: string;
  expired: boolean;
  /** Number of members extracted from this entry */
  extractions: number;
};

/**
 * Identifiers or key prefixes, or every entry.
 */
export type CacheTargets = readonly string[] | "all";

export type SweepReport = {
  tempFiles: number;
  dataFiles: number;
  entries: number;
  extractions: number;
};

export type CacheManager = {
  readonly root: string;
  /**
   * Resolve the base artifact of `id` to a local path (read), or open a
   * staged write handle (write).
   */
  resolve: {
    (id: string | ResourceIdentifier, options?: ReadResolveOptions): Promise<string>;
    (id: string | ResourceIdentifier, options: WriteResolveOptions): Promise<WriteHandle>;
  };
  /** Resolve `id` including its archive-member chain */
  resolveFile: (id: string | ResourceIdentifier, options?: FileResolveOptions) => Promise<string>;
  /** Whether `id` exists at its backend (members: inside the archive) */
  exists: (id: string | ResourceIdentifier) => Promise<boolean>;
  open: (id: string | ResourceIdentifier, options?: OpenOptions) => Promise<ReadHandle>;
  openWrite: (id: string | ResourceIdentifier) => Promise<WriteHandle>;
  withWriteHandle: <T>(id: string | ResourceIdentifier, fn: (handle: WriteHandle) => Promise<T>) => Promise<T>;
  list: (queries?: readonly string[], options?: ListOptions) => Promise<CacheListing[]>;
  /** Entries `remove` or `update` would act on, without touching them */
  match: (targets: CacheTargets) => Promise<CacheEntry[]>;
  remove: (targets: CacheTargets) => Promise<CacheEntry[]>;
  update: (targets: CacheTargets) => Promise<CacheEntry[]>;
  sweep: () => Promise<SweepReport>;
  /**
   * Resolve `id` and copy the file to `dest` (a file or an existing
   * directory). An existing destination file is only replaced with
   * `overwrite`.
   */
  download: (id: string | ResourceIdentifier, dest: string, options?: DownloadOptions) => Promise<string>;
  /** Write a local file to `id` through a write handle */
  upload: (localFile: string, id: string | ResourceIdentifier) => Promise<void>;
  /** Delete `id` at its backend and drop its cache entry */
  delete: (id: string | ResourceIdentifier) => Promise<void>;
};

type ResolvedBase = {
  key: string;
  path: string;
  /** Identity of the base content; extractions are valid while it is unchanged */
  revision: string | null;
};

// ============================================================================
// Helpers
// ============================================================================

const DAY_MS = 24 * 60 * 60 * 1000;
const DEFAULT_SWEEP_GRACE_MS = 60 * 60 * 1000;
const FETCH_ATTEMPTS = 2;
const KEY_PREFIX_PATTERN = /^[a-f0-9]{4,64}$/;

const toId = (id: string | ResourceIdentifier): ResourceIdentifier =>
  typeof id === "string" ? parseIdentifier(id) : id;

const pathKind = async (path: string): Promise<"file" | "directory" | null> => {
  try {
    const stats = await statFile(path);
    if (stats.isFile()) return "file";
    return stats.isDirectory() ? "directory" : null;
  } catch (error: unknown) {
    if (errnoCode(error) === "ENOENT") return null;
    throw error;
  }
};

const fileExists = async (path: string): Promise<boolean> => (await pathKind(path)) === "file";

/** Hard-link `path` to `backup`; false when there is nothing to back up. */
const backUp = async (path: string, backup: string): Promise<boolean> => {
  try {
    await link(path, backup);
    return true;
  } catch (error: unknown) {
    if (errnoCode(error) === "ENOENT") return false;
    throw error;
  }
};

type EntrySettings = Pick<CacheEntry, "expireDays" | "autoUpdate">;

const settingsOf = (options: ResolveOptions, previous: EntrySettings | undefined): EntrySettings => ({
  expireDays: options.expireDays ?? previous?.expireDays,
  autoUpdate: options.autoUpdate ?? previous?.autoUpdate,
});

const hashFile = async (path: string): Promise<{ sha256: string; size: number }> => {
  const hash = createHash("sha256");
  let size = 0;
  for await (const chunk of createReadStream(path)) {
    const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    hash.update(bytes);
    size += bytes.length;
  }
  return { sha256: hash.digest("hex"), size };
};

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Files of a directory tree (absolute paths). Missing directories are empty.
 */
const listFiles = async (dir: string): Promise<string[]> => {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error: unknown) {
    if (errnoCode(error) === "ENOENT") return [];
    throw error;
  }
  const files: string[] = [];
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) files.push(...(await listFiles(path)));
    else if (entry.isFile()) files.push(path);
  }
  return files;
};

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a cache manager over `config.root`. Nothing is created on disk
 * until the first operation that needs it.
 */
export const createCacheManager = (config: CacheManagerConfig): CacheManager => {
  const root = resolvePath(config.root);
  const logger = config.logger ?? silentLogger;
  const now = config.now ?? (() => new Date());
  const defaultExpireDays = config.expireDays ?? -1;
  const defaultAutoUpdate = config.autoUpdate ?? true;
  const sweepGraceMs = config.sweepGraceMs ?? DEFAULT_SWEEP_GRACE_MS;

  const paths = {
    index: join(root, "index.json"),
    data: join(root, "data"),
    extracted: join(root, "extracted"),
    tmp: join(root, "tmp"),
    locks: join(root, "locks"),
  };
  const index = createCacheIndexStore({ path: paths.index, tempDir: paths.tmp });
  const locks = createCacheLock({
    lockDir: paths.locks,
    timeoutMs: config.lockTimeoutMs,
    pollMs: config.lockPollMs,
    logger,
  });

  const absolute = (file: string): string => join(root, file);

  const tempPath = async (key: string, suffix: string): Promise<string> => {
    await mkdir(paths.tmp, { recursive: true });
    return join(paths.tmp, `${key}.${randomUUID()}.${suffix}`);
  };

  /** Re-read, mutate and atomically replace the index under the `index` lock. */
  const mutateIndex = <T>(fn: (data: CacheIndexData) => T): Promise<T> =>
    locks.withLock("index", async () => {
      const data = await index.load();
      const result = fn(data);
      await index.save(data);
      return result;
    });

  /** Drop the extractions of a base entry; returns their files. */
  const dropExtractions = (data: CacheIndexData, baseKey: string): string[] => {
    const files: string[] = [];
    for (const [key, extraction] of Object.entries(data.extractions)) {
      if (extraction.baseKey === baseKey) {
        files.push(extraction.file);
        delete data.extractions[key];
      }
    }
    return files;
  };

  const removeFiles = async (files: readonly string[]): Promise<void> => {
    await Promise.all(files.map((file) => rm(absolute(file), { recursive: true, force: true })));
  };

  const isExpired = (entry: CacheEntry, expireDays = entry.expireDays ?? defaultExpireDays): boolean => {
    if (expireDays < 0) return false;
    return now().getTime() - Date.parse(entry.fetchedAt) >= expireDays * DAY_MS;
  };

  /** Store explicitly given settings on an existing entry. */
  const remember = async (entry: CacheEntry, options: ResolveOptions): Promise<void> => {
    const settings = settingsOf(options, entry);
    if (settings.expireDays === entry.expireDays && settings.autoUpdate === entry.autoUpdate) return;
    await mutateIndex((data) => {
      const current = data.entries[entry.key];
      if (current) data.entries[entry.key] = { ...current, ...settings };
    });
  };

  const toResolved = (entry: CacheEntry): ResolvedBase => ({
    key: entry.key,
    path: absolute(entry.file),
    revision: entry.contentHash,
  });

  // --------------------------------------------------------------------------
  // Install
  // --------------------------------------------------------------------------

  /**
   * Move a complete file into the data path of `key` and record its entry,
   * both under the `index` lock. When the index cannot be written the
   * previous data file is restored.
   */
  const install = async (
    base: ResourceIdentifier,
    key: string,
    driver: BackendDriver,
    source: string,
    content: { sha256: string; size: number },
    freshnessToken: string | null,
    options: ResolveOptions = {}
  ): Promise<CacheEntry> => {
    const file = toStoragePath(key);
    const target = absolute(file);
    await mkdir(dirname(target), { recursive: true });
    const backup = await tempPath(key, "previous");

    try {
      const { entry, stale } = await locks.withLock("index", async () => {
        const data = await index.load();
        const entry: CacheEntry = {
          key,
          identifier: formatIdentifier(base),
          backend: driver.kind,
          file,
          freshnessToken,
          size: content.size,
          contentHash: content.sha256,
          fetchedAt: now().toISOString(),
          ...settingsOf(options, data.entries[key]),
        };

        const hadPrevious = await backUp(target, backup);
        await rename(source, target);
        try {
          data.entries[key] = entry;
          const stale = dropExtractions(data, key);
          await index.save(data);
          return { entry, stale };
        } catch (error: unknown) {
          if (hadPrevious) await rename(backup, target);
          else await rm(target, { force: true });
          throw error;
        }
      });
      await removeFiles(stale);
      return entry;
    } finally {
      await rm(backup, { force: true });
    }
  };

  /** Download to a temp file, hashing on the way, then install. */
  const download = async (
    base: ResourceIdentifier,
    key: string,
    driver: BackendDriver,
    stat: StatResult,
    options: ResolveOptions
  ): Promise<CacheEntry> => {
    for (let attempt = 1; ; attempt++) {
      const temp = await tempPath(key, "download");
      try {
        logger.info(`[cache] fetching ${formatIdentifier(base)}`);
        const hash = createHash("sha256");
        let size = 0;
        const meter = new Transform({
          transform(chunk: Buffer, _encoding, callback) {
            hash.update(chunk);
            size += chunk.length;
            callback(null, chunk);
          },
        });
        await pipeline(await driver.openRead(base.location), meter, createWriteStream(temp));

        const sha256 = hash.digest("hex");
        if (stat.sha256 !== null && stat.sha256 !== sha256) {
          if (attempt < FETCH_ATTEMPTS) {
            logger.warn(`[cache] checksum mismatch for ${formatIdentifier(base)}, retrying`);
            continue;
          }
          throw new ChecksumMismatchError(base.location, stat.sha256, sha256);
        }
        return await install(base, key, driver, temp, { sha256, size }, stat.freshnessToken, options);
      } finally {
        await rm(temp, { force: true });
      }
    }
  };

  // --------------------------------------------------------------------------
  // Resolve
  // --------------------------------------------------------------------------

  const resolveBase = async (id: ResourceIdentifier, options: ResolveOptions = {}): Promise<ResolvedBase> => {
    const base = baseIdentifier(id);
    const key = toCacheKey(base);
    const driver = selectDriver(config.drivers, base);

    if (driver.kind === "local") {
      const stat = await driver.stat(base.location);
      return { key, path: base.location, revision: stat.freshnessToken };
    }

    return locks.withLock(key, async () => {
      const data = await index.load();
      const existing = data.entries[key];
      const current = existing && (await fileExists(absolute(existing.file))) ? existing : undefined;
      const name = formatIdentifier(base);
      if (current) await remember(current, options);
      const settings = settingsOf(options, current);

      if (current && !options.forceRefresh) {
        if (isExpired(current, settings.expireDays ?? defaultExpireDays)) {
          logger.info(`[cache] ${name} expired`);
        } else if (!(settings.autoUpdate ?? defaultAutoUpdate)) {
          logger.debug(`[cache] hit ${name} (not validated)`);
          return toResolved(current);
        } else {
          let stat: StatResult;
          try {
            stat = await driver.stat(base.location);
          } catch (error: unknown) {
            if (error instanceof AuthenticationError) throw error;
            logger.warn(`[cache] serving cached copy of ${name}: ${errorMessage(error)}`);
            return toResolved(current);
          }
          if (stat.freshnessToken !== null && stat.freshnessToken === current.freshnessToken) {
            logger.debug(`[cache] hit ${name}`);
            return toResolved(current);
          }
          logger.info(`[cache] ${name} changed upstream`);
          return toResolved(await download(base, key, driver, stat, options));
        }
      }

      const stat = await driver.stat(base.location);
      return toResolved(await download(base, key, driver, stat, options));
    });
  };

  /** Whether `extraction` was made from the current revision of `base` and is still on disk. */
  const isCurrent = async (extraction: ExtractionEntry | undefined, base: ResolvedBase): Promise<boolean> =>
    extraction !== undefined &&
    extraction.sourceToken !== null &&
    extraction.sourceToken === base.revision &&
    (await pathKind(absolute(extraction.file))) === extraction.kind;

  /** Extract one level of a member chain, reusing a previous extraction of the same revision. */
  const extractMember = async (
    base: ResolvedBase,
    chain: readonly string[],
    containerPath: string,
    nameHint: string
  ): Promise<string> => {
    const key = toExtractionKey(base.key, chain);
    const member = chain[chain.length - 1] ?? "";

    return locks.withLock(key, async () => {
      const data = await index.load();
      const existing = data.extractions[key];
      if (existing && (await isCurrent(existing, base))) {
        return absolute(existing.file);
      }

      const file = toStoragePath(key, "extracted/");
      const temp = await tempPath(key, "extract");
      let size: number;
      try {
        logger.debug(`[cache] extracting ${member} from ${nameHint}`);
        await extractArchiveMember({ containerPath, member, outPath: temp, nameHint, tempDir: paths.tmp });
        size = (await statFile(temp)).size;
        await mkdir(dirname(absolute(file)), { recursive: true });
        await rename(temp, absolute(file));
      } finally {
        await rm(temp, { force: true });
      }

      await mutateIndex((current) => {
        current.extractions[key] = {
          key,
          baseKey: base.key,
          member: [...chain],
          kind: "file",
          file,
          sourceToken: base.revision,
          size,
          extractedAt: now().toISOString(),
        };
      });
      return absolute(file);
    });
  };

  /**
   * Extract a whole archive into `extracted/<k0k1>/<key>/`, reusing a
   * directory made from the same revision unless `force` is set.
   */
  const extractDirectory = async (
    base: ResolvedBase,
    chain: readonly string[],
    containerPath: string,
    nameHint: string,
    force: boolean
  ): Promise<string> => {
    const key = toArchiveDirectoryKey(base.key, chain);

    return locks.withLock(key, async () => {
      const data = await index.load();
      const existing = data.extractions[key];
      if (!force && existing && (await isCurrent(existing, base))) {
        return absolute(existing.file);
      }

      const file = toStoragePath(key, "extracted/");
      const temp = await tempPath(key, "extract");
      let size: number;
      try {
        logger.debug(`[cache] extracting ${nameHint}`);
        size = await extractArchive({ containerPath, outDir: temp, nameHint, tempDir: paths.tmp });
        await rm(absolute(file), { recursive: true, force: true });
        await mkdir(dirname(absolute(file)), { recursive: true });
        await rename(temp, absolute(file));
      } finally {
        await rm(temp, { recursive: true, force: true });
      }

      await mutateIndex((current) => {
        current.extractions[key] = {
          key,
          baseKey: base.key,
          member: [...chain],
          kind: "directory",
          file,
          sourceToken: base.revision,
          size,
          extractedAt: now().toISOString(),
        };
      });
      return absolute(file);
    });
  };

  const resolveFile = async (id: string | ResourceIdentifier, options: FileResolveOptions = {}): Promise<string> => {
    const target = toId(id);
    const base = await resolveBase(target, options);

    let path = base.path;
    let nameHint = locationName(target.location);
    for (let depth = 1; depth <= target.member.length; depth++) {
      const chain = target.member.slice(0, depth);
      path = await extractMember(base, chain, path, nameHint);
      nameHint = locationName(chain[chain.length - 1] ?? "");
    }

    const force = options.forceExtract ?? false;
    if ((options.extract || force) && (await isArchiveFile(path, nameHint))) {
      return extractDirectory(base, target.member, path, nameHint, force);
    }
    return path;
  };

  // --------------------------------------------------------------------------
  // Writes
  // --------------------------------------------------------------------------

  /** Push a staged file to the backend, then install it as the fresh entry. */
  const publish = (target: ResourceIdentifier, key: string, driver: BackendDriver, staged: string) =>
    locks.withLock(key, async () => {
      const remote = await driver.openWrite(target.location);
      try {
        await pipeline(createReadStream(staged), remote.stream);
      } catch (error: unknown) {
        await remote.discard();
        throw error;
      }
      await remote.commit();
      logger.info(`[cache] wrote ${formatIdentifier(target)}`);

      let token: string | null = null;
      try {
        token = (await driver.stat(target.location)).freshnessToken;
      } catch (error: unknown) {
        logger.warn(`[cache] could not stat ${formatIdentifier(target)} after writing: ${errorMessage(error)}`);
      }
      await install(target, key, driver, staged, await hashFile(staged), token);
    });

  const openWrite = async (id: string | ResourceIdentifier): Promise<WriteHandle> => {
    const target = toId(id);
    if (target.member.length > 0) {
      throw new InvalidIdentifierError(formatIdentifier(target), "archive members cannot be written");
    }
    const driver = selectDriver(config.drivers, target);

    if (driver.kind === "local") {
      return createWriteHandle(target, target.location, await driver.openWrite(target.location));
    }

    const key = toCacheKey(target);
    const sink = await createStagedFileSink({
      tempPath: await tempPath(key, "upload"),
      install: (staged) => publish(target, key, driver, staged),
    });
    return createWriteHandle(target, absolute(toStoragePath(key)), sink);
  };

  function resolve(id: string | ResourceIdentifier, options?: ReadResolveOptions): Promise<string>;
  function resolve(id: string | ResourceIdentifier, options: WriteResolveOptions): Promise<WriteHandle>;
  async function resolve(
    id: string | ResourceIdentifier,
    options: ReadResolveOptions | WriteResolveOptions = {}
  ): Promise<string | WriteHandle> {
    if (options.mode === "write") return openWrite(id);
    return (await resolveBase(toId(id), options)).path;
  }

  // --------------------------------------------------------------------------
  // Maintenance
  // --------------------------------------------------------------------------

  const keyOf = (target: string): string | null => {
    try {
      return toCacheKey(baseIdentifier(parseIdentifier(target)));
    } catch (error: unknown) {
      if (error instanceof SkiffError) return null;
      throw error;
    }
  };

  const matchTargets = (data: CacheIndexData, targets: CacheTargets): CacheEntry[] => {
    const entries = Object.values(data.entries);
    if (targets === "all") return entries;

    const matched = new Map<string, CacheEntry>();
    for (const target of targets) {
      const key = keyOf(target);
      const isPrefix = KEY_PREFIX_PATTERN.test(target);
      const hits = entries.filter(
        (entry) => entry.key === key || entry.identifier === target || (isPrefix && entry.key.startsWith(target))
      );
      if (hits.length === 0) throw new CacheEntryNotFoundError(target);
      for (const hit of hits) matched.set(hit.key, hit);
    }
    return Array.from(matched.values());
  };

  const forget = (key: string) =>
    locks.withLock(key, async () => {
      const files = await mutateIndex((data) => {
        const entry = data.entries[key];
        if (!entry) return [];
        delete data.entries[key];
        return [entry.file, ...dropExtractions(data, key)];
      });
      await removeFiles(files);
    });

  const sweep = async (): Promise<SweepReport> => {
    const report: SweepReport = { tempFiles: 0, dataFiles: 0, entries: 0, extractions: 0 };
    const cutoff = now().getTime() - sweepGraceMs;
    const isOld = async (path: string): Promise<boolean> => {
      try {
        return (await statFile(path)).mtimeMs <= cutoff;
      } catch (error: unknown) {
        if (errnoCode(error) === "ENOENT") return false;
        throw error;
      }
    };

    for (const file of await listFiles(paths.tmp)) {
      if (await isOld(file)) {
        await rm(file, { force: true });
        report.tempFiles++;
      }
    }

    const snapshot = await index.load();
    const extractions = Object.values(snapshot.extractions);
    const known = new Map<string, "file" | "directory">([
      ...Object.values(snapshot.entries).map((entry): [string, "file"] => [absolute(entry.file), "file"]),
      ...extractions.map((extraction): [string, "file" | "directory"] => [absolute(extraction.file), extraction.kind]),
    ]);
    const directories = extractions
      .filter((extraction) => extraction.kind === "directory")
      .map((extraction) => `${absolute(extraction.file)}${sep}`);
    const isKnown = (file: string): boolean =>
      known.has(file) || directories.some((directory) => file.startsWith(directory));

    for (const file of [...(await listFiles(paths.data)), ...(await listFiles(paths.extracted))]) {
      if (!isKnown(file) && (await isOld(file))) {
        await rm(file, { force: true });
        report.dataFiles++;
      }
    }

    const gone = new Set<string>();
    for (const [file, kind] of known) {
      if ((await pathKind(file)) !== kind) gone.add(file);
    }
    if (gone.size > 0) {
      await mutateIndex((data) => {
        for (const [key, entry] of Object.entries(data.entries)) {
          if (gone.has(absolute(entry.file))) {
            delete data.entries[key];
            report.entries++;
          }
        }
        for (const [key, extraction] of Object.entries(data.extractions)) {
          if (gone.has(absolute(extraction.file)) || !data.entries[extraction.baseKey]) {
            delete data.extractions[key];
            report.extractions++;
          }
        }
      });
    }

    logger.info(
      `[cache] swept ${report.tempFiles} temp files, ${report.dataFiles} data files, ` +
        `${report.entries} entries and ${report.extractions} extractions`
    );
    return report;
  };

  // --------------------------------------------------------------------------
  // Public API
  // --------------------------------------------------------------------------

  return {
    root,
    resolve,
    resolveFile,

    async exists(id: string | ResourceIdentifier): Promise<boolean> {
      const target = toId(id);
      if (target.member.length === 0) {
        return selectDriver(config.drivers, target).exists(target.location);
      }
      try {
        await resolveFile(target);
        return true;
      } catch (error: unknown) {
        if (error instanceof ResourceNotFoundError || error instanceof ArchiveMemberNotFoundError) return false;
        throw error;
      }
    },

    async open(id: string | ResourceIdentifier, options: OpenOptions = {}): Promise<ReadHandle> {
      const target = toId(id);
      const path = await resolveFile(target, options);
      const nameHint = locationName(target.member[target.member.length - 1] ?? target.location);
      return createReadHandle(path, await openDecompressed(path, options.decompress ?? "none", nameHint));
    },

    openWrite,

    async withWriteHandle<T>(id: string | ResourceIdentifier, fn: (handle: WriteHandle) => Promise<T>): Promise<T> {
      return useWriteHandle(await openWrite(id), fn);
    },

    async list(queries: readonly string[] = [], options: ListOptions = {}): Promise<CacheListing[]> {
      const data = await index.load();
      const extractionCounts = new Map<string, number>();
      for (const extraction of Object.values(data.extractions)) {
        extractionCounts.set(extraction.baseKey, (extractionCounts.get(extraction.baseKey) ?? 0) + 1);
      }

      return Object.values(data.entries)
        .filter((entry) => queries.every((query) => entry.identifier.includes(query) || entry.key.startsWith(query)))
        .map((entry) => ({
          ...entry,
          path: absolute(entry.file),
          expired: isExpired(entry, options.expireDays),
          extractions: extractionCounts.get(entry.key) ?? 0,
        }))
        .filter((listing) => options.expired === undefined || listing.expired === options.expired)
        .sort((a, b) => a.fetchedAt.localeCompare(b.fetchedAt));
    },

    async match(targets: CacheTargets): Promise<CacheEntry[]> {
      return matchTargets(await index.load(), targets);
    },

    async remove(targets: CacheTargets): Promise<CacheEntry[]> {
      const matched = matchTargets(await index.load(), targets);
      for (const entry of matched) {
        await forget(entry.key);
        logger.info(`[cache] removed ${entry.identifier}`);
      }
      return matched;
    },

    async update(targets: CacheTargets): Promise<CacheEntry[]> {
      const matched = matchTargets(await index.load(), targets);
      const updated: CacheEntry[] = [];
      for (const entry of matched) {
        await resolveBase(parseIdentifier(entry.identifier), { forceRefresh: true });
        const refreshed = (await index.load()).entries[entry.key];
        if (refreshed) updated.push(refreshed);
      }
      return updated;
    },

    sweep,

    async download(id: string | ResourceIdentifier, dest: string, options: DownloadOptions = {}): Promise<string> {
      const target = toId(id);
      let output = resolvePath(dest);
      if ((await pathKind(output)) === "directory") {
        output = join(output, basename(target.member[target.member.length - 1] ?? locationName(target.location)));
      }
      const overwrite = options.overwrite ?? false;
      if (!overwrite && (await pathKind(output)) !== null) {
        throw new DestinationExistsError(output);
      }

      const path = await resolveFile(target, options);
      await mkdir(dirname(output), { recursive: true });
      try {
        await copyFile(path, output, overwrite ? 0 : constants.COPYFILE_EXCL);
      } catch (error: unknown) {
        if (errnoCode(error) === "EEXIST") throw new DestinationExistsError(output);
        throw error;
      }
      return output;
    },

    async upload(localFile: string, id: string | ResourceIdentifier): Promise<void> {
      await useWriteHandle(await openWrite(id), (handle) => pipeline(createReadStream(localFile), handle.stream));
    },

    async delete(id: string | ResourceIdentifier): Promise<void> {
      const target = toId(id);
      if (target.member.length > 0) {
        throw new InvalidIdentifierError(formatIdentifier(target), "archive members cannot be deleted");
      }
      const driver = selectDriver(config.drivers, target);
      await driver.delete(target.location);
      if (driver.kind !== "local") await forget(toCacheKey(target));
    },
  };
};
