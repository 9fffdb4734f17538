/**
 * HTTP(S) backend driver
 *
 * Read-only. `stat` issues a HEAD request (falling back to GET when the
 * server refuses HEAD) and uses the entity tag, or Last-Modified, as the
 * freshness token.
 *
 * @packageDocumentation
 */

import type { Readable } from "node:stream";
import {
  type BackendDriver,
  ResourceNotFoundError,
  type StatResult,
  UnsupportedOperationError,
} from "@skiff/storage-core";
import {
  checkResponse,
  type FetchLike,
  fetchWithRetry,
  normalizeEtag,
  parseContentLength,
  type RetryOptions,
  toNodeReadable,
} from "./http-fetch.ts";

// ============================================================================
// Types
// ============================================================================

export type HttpDriverConfig = RetryOptions & {
  /** fetch implementation (default: global fetch) */
  fetch?: FetchLike;
  /** Extra headers sent with every request (e.g. Authorization) */
  headers?: Record<string, string>;
};

// ============================================================================
// Factory
// ============================================================================

/**
 * Create an HTTP(S) driver.
 */
export const createHttpDriver = (config: HttpDriverConfig = {}): BackendDriver => {
  const fetchImpl: FetchLike = config.fetch ?? ((url, init) => fetch(url, init));
  const headers = config.headers ?? {};
  const retry: RetryOptions = { retries: config.retries, backoffMs: config.backoffMs };

  const request = (url: string, method: "GET" | "HEAD"): Promise<Response> =>
    fetchWithRetry(fetchImpl, url, { method, headers, redirect: "follow" }, retry);

  const stat = async (location: string): Promise<StatResult> => {
    let response = await request(location, "HEAD");
    if (response.status === 405 || response.status === 501) {
      response = await request(location, "GET");
      await response.body?.cancel();
    }
    await checkResponse(location, response);

    const etag = normalizeEtag(response.headers.get("etag"));
    return {
      exists: true,
      freshnessToken: etag ?? response.headers.get("last-modified"),
      size: parseContentLength(response.headers.get("content-length")),
      sha256: null,
    };
  };

  return {
    kind: "http",
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
      const response = await checkResponse(location, await request(location, "GET"));
      return toNodeReadable(response);
    },

    async openWrite(): Promise<never> {
      throw new UnsupportedOperationError("http", "writes");
    },

    async delete(): Promise<never> {
      throw new UnsupportedOperationError("http", "delete");
    },
  };
};
