/**
 * Model hub backend driver
 *
 * Locations are `hf://[datasets/|spaces/]<owner>/<repo>[@<revision>]/<path>`.
 *
 * - `stat` → HEAD on `resolve/<revision>/<path>` without following the CDN
 *   redirect, so the hub's own validator (`X-Linked-Etag` for large files)
 *   is read. A 64-hex validator is the SHA-256 of the content.
 * - `openRead` → GET on the same URL, following redirects
 * - writes and deletes → one commit each through the NDJSON commit API
 *
 * @packageDocumentation
 */

import { randomUUID } from "node:crypto";
import { readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Readable } from "node:stream";
import {
  type BackendDriver,
  createStagedFileSink,
  decodeLocation,
  InvalidIdentifierError,
  ResourceNotFoundError,
  type StatResult,
  type WriteSink,
} from "@skiff/storage-core";
import {
  checkResponse,
  type FetchLike,
  fetchWithRetry,
  normalizeEtag,
  parseContentLength,
  type RetryOptions,
  toNodeReadable,
} from "@skiff/storage-http";

// ============================================================================
// Types
// ============================================================================

export type HubRepoType = "model" | "dataset" | "space";

export type HubLocation = {
  repoType: HubRepoType;
  /** "<owner>/<repo>" */
  repo: string;
  revision: string;
  path: string;
};

export type HubDriverConfig = RetryOptions & {
  /** Hub base URL (default: https://huggingface.co) */
  endpoint?: string;
  /** Access token sent as a bearer token */
  token?: string;
  /** fetch implementation (default: global fetch) */
  fetch?: FetchLike;
  /** Directory for staged uploads (default: OS temp dir) */
  stagingDir?: string;
};

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_HUB_ENDPOINT = "https://huggingface.co";
const DEFAULT_REVISION = "main";
const SHA256_PATTERN = /^[a-f0-9]{64}$/;

const TYPE_PREFIXES: Record<string, HubRepoType> = {
  datasets: "dataset",
  spaces: "space",
};

// ============================================================================
// Helpers
// ============================================================================

export const parseHubLocation = (location: string): HubLocation => {
  const parts = location.replace(/^hf:\/\//, "").split("/").filter(Boolean);
  const repoType = TYPE_PREFIXES[parts[0] ?? ""];
  if (repoType) parts.shift();

  const [owner, repoWithRevision, ...path] = parts;
  if (!owner || !repoWithRevision || path.length === 0) {
    throw new InvalidIdentifierError(location, "expected hf://<owner>/<repo>[@<revision>]/<path>");
  }
  const at = repoWithRevision.indexOf("@");
  const repo = at === -1 ? repoWithRevision : repoWithRevision.slice(0, at);
  const revision = at === -1 ? DEFAULT_REVISION : decodeLocation(location, repoWithRevision.slice(at + 1));

  return {
    repoType: repoType ?? "model",
    repo: `${owner}/${repo}`,
    revision: revision || DEFAULT_REVISION,
    path: path.join("/"),
  };
};

const encodePath = (path: string): string => path.split("/").map(encodeURIComponent).join("/");

export const toResolveUrl = (endpoint: string, hub: HubLocation): string => {
  const prefix = hub.repoType === "model" ? "" : `${hub.repoType}s/`;
  return `${endpoint}/${prefix}${hub.repo}/resolve/${encodeURIComponent(hub.revision)}/${encodePath(hub.path)}`;
};

export const toCommitUrl = (endpoint: string, hub: HubLocation): string =>
  `${endpoint}/api/${hub.repoType}s/${hub.repo}/commit/${encodeURIComponent(hub.revision)}`;

const isRedirect = (status: number): boolean => status >= 300 && status < 400;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a model hub driver.
 */
export const createHubDriver = (config: HubDriverConfig = {}): BackendDriver => {
  const endpoint = (config.endpoint ?? DEFAULT_HUB_ENDPOINT).replace(/\/+$/, "");
  const fetchImpl: FetchLike = config.fetch ?? ((url, init) => fetch(url, init));
  const retry: RetryOptions = { retries: config.retries, backoffMs: config.backoffMs };
  const stagingDir = config.stagingDir ?? tmpdir();
  const authHeaders: Record<string, string> = config.token ? { Authorization: `Bearer ${config.token}` } : {};

  const commit = async (location: string, hub: HubLocation, operation: object, summary: string) => {
    const body = [
      JSON.stringify({ key: "header", value: { summary, description: "" } }),
      JSON.stringify(operation),
    ].join("\n");
    const response = await fetchWithRetry(
      fetchImpl,
      toCommitUrl(endpoint, hub),
      {
        method: "POST",
        headers: { ...authHeaders, "Content-Type": "application/x-ndjson" },
        body,
      },
      retry
    );
    await checkResponse(location, response);
    await response.body?.cancel();
  };

  const stat = async (location: string): Promise<StatResult> => {
    const hub = parseHubLocation(location);
    const response = await fetchWithRetry(
      fetchImpl,
      toResolveUrl(endpoint, hub),
      { method: "HEAD", headers: { ...authHeaders, "Accept-Encoding": "identity" }, redirect: "manual" },
      retry
    );
    if (!isRedirect(response.status)) {
      await checkResponse(location, response);
    }

    const token = normalizeEtag(response.headers.get("x-linked-etag") ?? response.headers.get("etag"));
    return {
      exists: true,
      freshnessToken: token,
      size: parseContentLength(response.headers.get("x-linked-size") ?? response.headers.get("content-length")),
      sha256: token !== null && SHA256_PATTERN.test(token) ? token : null,
    };
  };

  const openWrite = async (location: string): Promise<WriteSink> => {
    const hub = parseHubLocation(location);
    return createStagedFileSink({
      tempPath: join(stagingDir, `skiff-hub-${randomUUID()}`),
      install: async (staged) => {
        const content = await readFile(staged);
        await commit(
          location,
          hub,
          { key: "file", value: { content: content.toString("base64"), path: hub.path, encoding: "base64" } },
          `Upload ${hub.path}`
        );
      },
    });
  };

  return {
    kind: "hub",
    stat,

    async exists(location: string): Promise<boolean> {
      try {
        await stat(location);
        return true;
      } catch (error: unknown) {
        if (error instanceof ResourceNotFoundError) return false;
        throw error;
      }
    },

    async openRead(location: string): Promise<Readable> {
      const hub = parseHubLocation(location);
      const response = await fetchWithRetry(
        fetchImpl,
        toResolveUrl(endpoint, hub),
        { method: "GET", headers: authHeaders, redirect: "follow" },
        retry
      );
      return toNodeReadable(await checkResponse(location, response));
    },

    openWrite,

    async delete(location: string): Promise<void> {
      const hub = parseHubLocation(location);
      await commit(location, hub, { key: "deletedFile", value: { path: hub.path } }, `Delete ${hub.path}`);
    },
  };
};
