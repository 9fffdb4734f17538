/**
 * In-memory backend driver
 *
 * Stands in for any backend kind. Each stored object carries a version
 * counter used as its freshness token, bumped on every write.
 */

import { Readable, Writable } from "node:stream";
import {
  type BackendDriver,
  type BackendKind,
  ResourceNotFoundError,
  sha256Hex,
  type StatResult,
  type WriteSink,
} from "@skiff/storage-core";

/**
 * Memory driver configuration
 */
export type MemoryDriverConfig = {
  /** Backend kind reported by the driver (default: "s3") */
  kind?: BackendKind;
  /** Optional initial objects, keyed by location */
  initialData?: Map<string, Uint8Array>;
  /** Report no freshness token at all */
  withoutTokens?: boolean;
  /** Announce the SHA-256 of each object from `stat` */
  announceSha256?: boolean;
};

type StoredObject = { content: Uint8Array; version: number };

export type MemoryDriverCall = {
  op: "stat" | "openRead" | "openWrite" | "commit" | "delete";
  location: string;
};

export type MemoryDriverInspection = BackendDriver & {
  /** Every driver call, in order */
  calls: MemoryDriverCall[];
  /** Store an object directly, bumping its token */
  put: (location: string, content: Uint8Array | string) => void;
  get: (location: string) => Uint8Array | null;
  keys: () => string[];
  clear: () => void;
  /** Make every following `stat` and `openRead` fail with `error` (null restores) */
  failWith: (error: Error | null) => void;
  /** Replace the SHA-256 announced for `location` */
  announce: (location: string, sha256: string) => void;
  /** Number of calls for one operation */
  count: (op: MemoryDriverCall["op"], location?: string) => number;
};

const toBytes = (content: Uint8Array | string): Uint8Array =>
  typeof content === "string" ? new TextEncoder().encode(content) : content;

/**
 * Create memory driver with inspection methods (for testing)
 */
export const createMemoryDriverWithInspection = (config: MemoryDriverConfig = {}): MemoryDriverInspection => {
  const data = new Map<string, StoredObject>();
  for (const [location, content] of config.initialData ?? []) {
    data.set(location, { content, version: 1 });
  }
  const announced = new Map<string, string>();
  const calls: MemoryDriverCall[] = [];
  let failure: Error | null = null;

  const store = (location: string, content: Uint8Array) => {
    const version = (data.get(location)?.version ?? 0) + 1;
    data.set(location, { content, version });
    announced.delete(location);
  };

  const lookup = (location: string): StoredObject => {
    if (failure) throw failure;
    const object = data.get(location);
    if (!object) throw new ResourceNotFoundError(location);
    return object;
  };

  const stat = async (location: string): Promise<StatResult> => {
    calls.push({ op: "stat", location });
    const object = lookup(location);
    return {
      exists: true,
      freshnessToken: config.withoutTokens ? null : `v${object.version}`,
      size: object.content.byteLength,
      sha256: announced.get(location) ?? (config.announceSha256 ? sha256Hex(object.content) : null),
    };
  };

  const openWrite = async (location: string): Promise<WriteSink> => {
    calls.push({ op: "openWrite", location });
    const chunks: Buffer[] = [];
    let settled = false;
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
    });

    return {
      stream,
      async commit() {
        if (settled) throw new Error(`Write to ${location} already settled`);
        settled = true;
        if (!stream.writableEnded) stream.end();
        calls.push({ op: "commit", location });
        store(location, new Uint8Array(Buffer.concat(chunks)));
      },
      async discard() {
        settled = true;
        stream.destroy();
      },
    };
  };

  return {
    kind: config.kind ?? "s3",
    stat,

    async exists(location: string): Promise<boolean> {
      if (failure) throw failure;
      return data.has(location);
    },

    async openRead(location: string): Promise<Readable> {
      calls.push({ op: "openRead", location });
      return Readable.from([Buffer.from(lookup(location).content)]);
    },

    openWrite,

    async delete(location: string): Promise<void> {
      calls.push({ op: "delete", location });
      if (!data.delete(location)) throw new ResourceNotFoundError(location);
    },

    calls,
    put: (location, content) => store(location, toBytes(content)),
    get: (location) => data.get(location)?.content ?? null,
    keys: () => Array.from(data.keys()),
    clear: () => data.clear(),
    failWith: (error) => {
      failure = error;
    },
    announce: (location, sha256) => {
      announced.set(location, sha256);
    },
    count: (op, location) =>
      calls.filter((call) => call.op === op && (location === undefined || call.location === location)).length,
  };
};

/**
 * Create an in-memory driver
 */
export const createMemoryDriver = (config: MemoryDriverConfig = {}): BackendDriver => {
  const { kind, stat, exists, openRead, openWrite, delete: remove } = createMemoryDriverWithInspection(config);
  return { kind, stat, exists, openRead, openWrite, delete: remove };
};
