/**
 * Per-key cache locks
 *
 * Two layers: a promise chain per name serializes callers inside one
 * process, and a proper-lockfile lock under `locks/` serializes processes
 * sharing the cache root. `timeoutMs` bounds the whole acquisition (queue
 * wait plus file-lock polling); past it the caller fails with
 * CacheLockTimeoutError and never runs unlocked.
 */

import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { CacheLockTimeoutError, errnoCode } from "@skiff/storage-core";
import { lock } from "proper-lockfile";
import { type CacheLogger, silentLogger } from "./types.ts";

export type CacheLockConfig = {
  lockDir: string;
  /** Give up after this long (default: 60000) */
  timeoutMs?: number;
  /** Poll interval while another process holds the lock (default: 100) */
  pollMs?: number;
  /** Age after which an abandoned lock is taken over (default: 30000, minimum 5000) */
  staleMs?: number;
  logger?: CacheLogger;
};

export type CacheLock = {
  withLock: <T>(name: string, fn: () => Promise<T>) => Promise<T>;
};

export const DEFAULT_LOCK_TIMEOUT_MS = 60_000;

export const createCacheLock = (config: CacheLockConfig): CacheLock => {
  const timeoutMs = config.timeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
  const pollMs = config.pollMs ?? 100;
  const staleMs = Math.max(5_000, config.staleMs ?? 30_000);
  const logger = config.logger ?? silentLogger;
  const chains = new Map<string, Promise<void>>();

  const acquire = async (name: string, remainingMs: number): Promise<() => Promise<void>> => {
    await mkdir(config.lockDir, { recursive: true });
    try {
      return await lock(join(config.lockDir, name), {
        realpath: false,
        stale: staleMs,
        retries: {
          retries: Math.max(0, Math.ceil(remainingMs / pollMs)),
          factor: 1,
          minTimeout: pollMs,
          maxTimeout: pollMs,
        },
        onCompromised: (error) => logger.warn(`[cache] lock ${name} compromised: ${error.message}`),
      });
    } catch (error: unknown) {
      if (errnoCode(error) === "ELOCKED") {
        throw new CacheLockTimeoutError(name, timeoutMs, { cause: error });
      }
      throw error;
    }
  };

  /** Wait for the previous in-process holder, at most until `deadline`. */
  const waitForTurn = async (name: string, previous: Promise<void>, deadline: number): Promise<void> => {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new CacheLockTimeoutError(name, timeoutMs)), Math.max(0, deadline - Date.now()));
    });
    try {
      await Promise.race([previous, expired]);
    } finally {
      clearTimeout(timer);
    }
  };

  const holdFileLock = async <T>(name: string, fn: () => Promise<T>, deadline: number): Promise<T> => {
    const release = await acquire(name, deadline - Date.now());
    logger.debug(`[cache] acquired lock ${name}`);
    try {
      return await fn();
    } finally {
      await release();
      logger.debug(`[cache] released lock ${name}`);
    }
  };

  return {
    withLock<T>(name: string, fn: () => Promise<T>): Promise<T> {
      const deadline = Date.now() + timeoutMs;
      const previous = chains.get(name);
      const run = previous
        ? waitForTurn(name, previous, deadline).then(() => holdFileLock(name, fn, deadline))
        : holdFileLock(name, fn, deadline);
      // The next caller's turn comes once both the previous holder and this
      // caller are done; a caller that timed out leaves the lock to the holder.
      const settled = Promise.all([previous, run]).then(
        () => undefined,
        () => (previous ?? Promise.resolve()).then(() => undefined)
      );
      chains.set(name, settled);
      void settled.then(() => {
        if (chains.get(name) === settled) chains.delete(name);
      });
      return run;
    },
  };
};
