import { once } from "node:events";
import { createWriteStream } from "node:fs";
import { mkdir, rm } from "node:fs/promises";
import { dirname } from "node:path";
import type { WriteSink } from "./types.ts";

export type StagedFileSinkConfig = {
  /** Where bytes are staged until commit */
  tempPath: string;
  /** Publish the fully written staging file; the staging file is removed afterwards if still present */
  install: (tempPath: string) => Promise<void>;
};

/**
 * Write sink backed by a staging file. Nothing reaches the target before
 * `commit()`, and a failed install leaves the target untouched.
 */
export const createStagedFileSink = async (config: StagedFileSinkConfig): Promise<WriteSink> => {
  const { tempPath, install } = config;
  await mkdir(dirname(tempPath), { recursive: true });
  const stream = createWriteStream(tempPath);
  let settled = false;

  const flush = async (): Promise<void> => {
    if (stream.errored) throw stream.errored;
    if (!stream.writableEnded) stream.end();
    if (!stream.writableFinished) await once(stream, "finish");
    if (!stream.closed) await once(stream, "close");
  };

  return {
    stream,

    async commit(): Promise<void> {
      if (settled) throw new Error(`Write to ${tempPath} already settled`);
      settled = true;
      try {
        await flush();
        await install(tempPath);
      } finally {
        await rm(tempPath, { force: true });
      }
    },

    async discard(): Promise<void> {
      if (settled) return;
      settled = true;
      stream.destroy();
      if (!stream.closed) await once(stream, "close");
      await rm(tempPath, { force: true });
    },
  };
};
