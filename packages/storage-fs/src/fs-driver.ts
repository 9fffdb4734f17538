/**
 * Local file system backend driver
 *
 * - Freshness token derived from modification time and size
 * - Writes staged to a sibling temp file and renamed into place on commit
 */

import { randomUUID } from "node:crypto";
import { createReadStream } from "node:fs";
import { rename, rm, stat as statFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import type { Readable } from "node:stream";
import {
  AuthenticationError,
  type BackendDriver,
  createStagedFileSink,
  errnoCode,
  ResourceNotFoundError,
  type StatResult,
  type WriteSink,
} from "@skiff/storage-core";

/**
 * File System Driver configuration
 */
export type FsDriverConfig = {
  /** Suffix of staging files written beside their target (default: ".partial") */
  stagingSuffix?: string;
};

const NOT_FOUND_CODES = new Set(["ENOENT", "ENOTDIR", "EISDIR"]);
const DENIED_CODES = new Set(["EACCES", "EPERM"]);

const translateError = (location: string, error: unknown): unknown => {
  const code = errnoCode(error);
  if (code !== undefined && NOT_FOUND_CODES.has(code)) {
    return new ResourceNotFoundError(location, { cause: error });
  }
  if (code !== undefined && DENIED_CODES.has(code)) {
    return new AuthenticationError(location);
  }
  return error;
};

/**
 * Freshness token of a local file.
 */
export const toFreshnessToken = (mtimeMs: number, size: number): string =>
  `${Math.trunc(mtimeMs)}-${size}`;

/**
 * Create a local file system driver
 */
export const createFsDriver = (config: FsDriverConfig = {}): BackendDriver => {
  const stagingSuffix = config.stagingSuffix ?? ".partial";

  const stat = async (location: string): Promise<StatResult> => {
    try {
      const info = await statFile(location);
      if (!info.isFile()) {
        throw new ResourceNotFoundError(location);
      }
      return {
        exists: true,
        freshnessToken: toFreshnessToken(info.mtimeMs, info.size),
        size: info.size,
        sha256: null,
      };
    } catch (error: unknown) {
      throw translateError(location, error);
    }
  };

  const exists = async (location: string): Promise<boolean> => {
    try {
      await stat(location);
      return true;
    } catch (error: unknown) {
      if (error instanceof ResourceNotFoundError) return false;
      throw error;
    }
  };

  const openRead = async (location: string): Promise<Readable> => {
    await stat(location);
    return createReadStream(location);
  };

  const openWrite = async (location: string): Promise<WriteSink> => {
    const tempPath = join(dirname(location), `.${basename(location)}.${randomUUID()}${stagingSuffix}`);
    return createStagedFileSink({
      tempPath,
      install: async (staged) => {
        try {
          await rename(staged, location);
        } catch (error: unknown) {
          throw translateError(location, error);
        }
      },
    });
  };

  const remove = async (location: string): Promise<void> => {
    try {
      await rm(location);
    } catch (error: unknown) {
      throw translateError(location, error);
    }
  };

  return { kind: "local", stat, exists, openRead, openWrite, delete: remove };
};
