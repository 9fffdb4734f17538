/**
 * Unified file handles
 *
 * Read handles stream a resolved local file. Write handles are two-phase:
 * bytes written to `stream` reach the target only on `commit()`, and
 * `discard()` drops them.
 */

import type { Readable, Writable } from "node:stream";
import type { ResourceIdentifier, WriteSink } from "@skiff/storage-core";

export type ReadHandle = {
  /** Resolved local file */
  path: string;
  stream: Readable;
  close: () => Promise<void>;
};

export type WriteHandle = {
  identifier: ResourceIdentifier;
  /** Local file holding the content once committed */
  path: string;
  stream: Writable;
  commit: () => Promise<void>;
  discard: () => Promise<void>;
};

export const createReadHandle = (path: string, stream: Readable): ReadHandle => ({
  path,
  stream,
  close: async () => {
    stream.destroy();
  },
});

export const createWriteHandle = (identifier: ResourceIdentifier, path: string, sink: WriteSink): WriteHandle => {
  let state: "open" | "committed" | "discarded" = "open";

  return {
    identifier,
    path,
    stream: sink.stream,

    async commit(): Promise<void> {
      if (state !== "open") throw new Error(`Write handle for ${path} is already ${state}`);
      state = "committed";
      await sink.commit();
    },

    async discard(): Promise<void> {
      if (state !== "open") return;
      state = "discarded";
      await sink.discard();
    },
  };
};

/**
 * Run `fn` with a write handle; commit when it resolves, discard when it
 * throws.
 */
export const useWriteHandle = async <T>(handle: WriteHandle, fn: (handle: WriteHandle) => Promise<T>): Promise<T> => {
  let result: T;
  try {
    result = await fn(handle);
  } catch (error: unknown) {
    await handle.discard();
    throw error;
  }
  await handle.commit();
  return result;
};
