/**
 * @skiff/storage-http
 *
 * HTTP(S) backend driver and the retrying fetch helpers shared with the hub driver.
 */

export { createHttpDriver, type HttpDriverConfig } from "./http-driver.ts";
export {
  checkResponse,
  type FetchLike,
  fetchWithRetry,
  normalizeEtag,
  parseContentLength,
  type RetryOptions,
  toNodeReadable,
} from "./http-fetch.ts";
