import type { Readable, Writable } from "node:stream";

/**
 * URL schemes understood by the identifier parser.
 */
export type Scheme = "file" | "http" | "https" | "s3" | "hf";

/**
 * Closed set of backend variants. Every scheme maps to exactly one kind.
 */
export type BackendKind = "local" | "http" | "s3" | "hub";

/**
 * Parsed resource identifier.
 *
 * `location` is normalized per scheme: an absolute path for `file`, the full
 * URL for every other scheme. `member` holds the archive-member chain, one
 * entry per `!` separator, outermost archive first.
 */
export type ResourceIdentifier = {
  readonly scheme: Scheme;
  readonly location: string;
  readonly member: readonly string[];
};

/**
 * Result of a backend `stat`.
 */
export type StatResult = {
  exists: boolean;
  /** Validator used for freshness checks; null when the backend offers none */
  freshnessToken: string | null;
  size: number | null;
  /** Hex SHA-256 of the content, when the backend announces it */
  sha256: string | null;
};

/**
 * Staged write target. Bytes written to `stream` only become visible at the
 * backend after `commit()` resolves; `discard()` drops them.
 */
export type WriteSink = {
  stream: Writable;
  commit: () => Promise<void>;
  discard: () => Promise<void>;
};

/**
 * Backend driver capability set.
 */
export type BackendDriver = {
  readonly kind: BackendKind;
  /**
   * Fails with ResourceNotFoundError when absent and AuthenticationError
   * when credentials are missing or rejected.
   */
  stat: (location: string) => Promise<StatResult>;
  exists: (location: string) => Promise<boolean>;
  openRead: (location: string) => Promise<Readable>;
  openWrite: (location: string) => Promise<WriteSink>;
  delete: (location: string) => Promise<void>;
};

/**
 * One driver per backend kind.
 */
export type BackendDrivers = { [K in BackendKind]: BackendDriver };
