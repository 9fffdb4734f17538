/**
 * Retrying fetch and status translation shared by the HTTP-based drivers.
 */

import { Readable } from "node:stream";
import { setTimeout as sleep } from "node:timers/promises";
import {
  AuthenticationError,
  BackendUnavailableError,
  ResourceNotFoundError,
} from "@skiff/storage-core";

// ============================================================================
// Types
// ============================================================================

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type RetryOptions = {
  /** Total attempts, including the first (default: 3) */
  retries?: number;
  /** Delay before the second attempt; doubles afterwards (default: 500) */
  backoffMs?: number;
};

// ============================================================================
// Constants
// ============================================================================

const RETRY_STATUSES = new Set([502, 503, 504]);
const DEFAULT_RETRIES = 3;
const DEFAULT_BACKOFF_MS = 500;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Issue a request, retrying network errors and 502/503/504 with exponential
 * backoff. The last response is returned whatever its status.
 */
export const fetchWithRetry = async (
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  options: RetryOptions = {}
): Promise<Response> => {
  const retries = Math.max(1, options.retries ?? DEFAULT_RETRIES);
  const backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;

  for (let attempt = 0; ; attempt++) {
    const last = attempt >= retries - 1;
    let response: Response;
    try {
      response = await fetchImpl(url, init);
    } catch (error: unknown) {
      if (last) {
        const detail = error instanceof Error ? error.message : "network error";
        throw new BackendUnavailableError(url, detail, { cause: error });
      }
      await sleep(backoffMs * 2 ** attempt);
      continue;
    }

    if (!last && RETRY_STATUSES.has(response.status)) {
      await response.body?.cancel();
      await sleep(backoffMs * 2 ** attempt);
      continue;
    }
    return response;
  }
};

/**
 * Map an unsuccessful response onto the error taxonomy. Returns the response
 * unchanged when it is a success.
 */
export const checkResponse = async (location: string, response: Response): Promise<Response> => {
  if (response.ok) return response;
  await response.body?.cancel();
  if (response.status === 401 || response.status === 403) {
    throw new AuthenticationError(location, response.status);
  }
  if (response.status === 404 || response.status === 410) {
    throw new ResourceNotFoundError(location);
  }
  throw new BackendUnavailableError(location, `HTTP ${response.status} ${response.statusText}`.trim());
};

/**
 * Entity tag without weak prefix or quotes.
 */
export const normalizeEtag = (etag: string | null): string | null => {
  if (etag === null || etag === "") return null;
  return etag.replace(/^W\//, "").replace(/^"(.*)"$/, "$1");
};

export const parseContentLength = (value: string | null): number | null => {
  if (value === null) return null;
  const size = Number.parseInt(value, 10);
  return Number.isFinite(size) && size >= 0 ? size : null;
};

/**
 * Node stream over a response body (empty when the body is absent).
 */
export const toNodeReadable = (response: Response): Readable =>
  response.body ? Readable.fromWeb(response.body) : Readable.from([]);
