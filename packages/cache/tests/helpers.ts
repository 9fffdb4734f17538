/**
 * Shared fixtures for cache tests
 *
 * Every test gets a fresh cache root. Remote backends are in-memory drivers
 * with call logs; the local backend is the real file system driver.
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync } from "node:zlib";
import type { BackendDrivers } from "@skiff/storage-core";
import { createFsDriver } from "@skiff/storage-fs";
import { createMemoryDriverWithInspection } from "@skiff/storage-memory";
import JSZip from "jszip";
import { pack } from "tar-stream";
import { type CacheManagerConfig, createCacheManager } from "../src/cache-manager.ts";

export const createTestCache = async (overrides: Partial<Omit<CacheManagerConfig, "root" | "drivers">> = {}) => {
  const root = await mkdtemp(join(tmpdir(), "skiff-cache-test-"));
  const http = createMemoryDriverWithInspection({ kind: "http", withoutTokens: true });
  const s3 = createMemoryDriverWithInspection({ kind: "s3" });
  const hub = createMemoryDriverWithInspection({ kind: "hub", announceSha256: true });
  const drivers: BackendDrivers = { local: createFsDriver(), http, s3, hub };
  const manager = createCacheManager({ root, drivers, ...overrides });

  return {
    root,
    manager,
    drivers,
    s3,
    hub,
    http,
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
};

export async function buildZip(files: Record<string, string | Uint8Array>): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const [name, content] of Object.entries(files)) zip.file(name, content);
  return new Uint8Array(await zip.generateAsync({ type: "nodebuffer" }));
}

export async function buildTarGz(files: Record<string, string>): Promise<Uint8Array> {
  const archive = pack();
  for (const [name, content] of Object.entries(files)) archive.entry({ name }, content);
  archive.finalize();
  const chunks: Buffer[] = [];
  for await (const chunk of archive) chunks.push(Buffer.from(chunk));
  return new Uint8Array(gzipSync(Buffer.concat(chunks)));
}

export async function readAll(stream: AsyncIterable<Buffer | string>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  return Buffer.concat(chunks).toString("utf-8");
}
