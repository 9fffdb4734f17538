/**
 * Error taxonomy shared by every skiff package.
 *
 * Each failure kind carries a stable `code` so library callers can branch on
 * it and the CLI can map it to an exit status.
 */

// ============================================================================
// Codes
// ============================================================================

export type SkiffErrorCode =
  | "UNSUPPORTED_SCHEME"
  | "INVALID_IDENTIFIER"
  | "RESOURCE_NOT_FOUND"
  | "AUTHENTICATION"
  | "BACKEND_UNAVAILABLE"
  | "UNSUPPORTED_OPERATION"
  | "CACHE_LOCK_TIMEOUT"
  | "ARCHIVE_MEMBER_NOT_FOUND"
  | "UNSUPPORTED_COMPRESSION"
  | "UNSUPPORTED_ARCHIVE_FORMAT"
  | "CHECKSUM_MISMATCH"
  | "CACHE_ENTRY_NOT_FOUND"
  | "CACHE_INDEX_CORRUPT"
  | "DESTINATION_EXISTS";

// ============================================================================
// Base class
// ============================================================================

export class SkiffError extends Error {
  constructor(
    public readonly code: SkiffErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "SkiffError";
  }
}

export const isSkiffError = (error: unknown, code?: SkiffErrorCode): error is SkiffError =>
  error instanceof SkiffError && (code === undefined || error.code === code);

// ============================================================================
// Kinds
// ============================================================================

export class UnsupportedSchemeError extends SkiffError {
  constructor(public readonly scheme: string) {
    super("UNSUPPORTED_SCHEME", `Unsupported scheme: ${scheme}`);
    this.name = "UnsupportedSchemeError";
  }
}

export class InvalidIdentifierError extends SkiffError {
  constructor(
    public readonly raw: string,
    reason: string
  ) {
    super("INVALID_IDENTIFIER", `Invalid resource identifier "${raw}": ${reason}`);
    this.name = "InvalidIdentifierError";
  }
}

export class ResourceNotFoundError extends SkiffError {
  constructor(
    public readonly location: string,
    options?: { cause?: unknown }
  ) {
    super("RESOURCE_NOT_FOUND", `Resource not found: ${location}`, options);
    this.name = "ResourceNotFoundError";
  }
}

export class AuthenticationError extends SkiffError {
  constructor(
    public readonly location: string,
    public readonly status?: number
  ) {
    super(
      "AUTHENTICATION",
      `Access denied for ${location}${status !== undefined ? ` (HTTP ${status})` : ""}`
    );
    this.name = "AuthenticationError";
  }
}

/**
 * Transient backend failure (network down, 5xx after retries).
 */
export class BackendUnavailableError extends SkiffError {
  constructor(
    public readonly location: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super("BACKEND_UNAVAILABLE", `Backend unavailable for ${location}: ${detail}`, options);
    this.name = "BackendUnavailableError";
  }
}

export class UnsupportedOperationError extends SkiffError {
  constructor(backend: string, operation: string) {
    super("UNSUPPORTED_OPERATION", `${backend} backend does not support ${operation}`);
    this.name = "UnsupportedOperationError";
  }
}

export class CacheLockTimeoutError extends SkiffError {
  constructor(
    public readonly lockName: string,
    timeoutMs: number,
    options?: { cause?: unknown }
  ) {
    super("CACHE_LOCK_TIMEOUT", `Could not acquire cache lock ${lockName} within ${timeoutMs}ms`, options);
    this.name = "CacheLockTimeoutError";
  }
}

export class ArchiveMemberNotFoundError extends SkiffError {
  constructor(
    public readonly member: string,
    archive: string
  ) {
    super("ARCHIVE_MEMBER_NOT_FOUND", `Archive member "${member}" not found in ${archive}`);
    this.name = "ArchiveMemberNotFoundError";
  }
}

export class UnsupportedCompressionError extends SkiffError {
  constructor(format: string, file: string) {
    super("UNSUPPORTED_COMPRESSION", `Unsupported compression ${format} for ${file}`);
    this.name = "UnsupportedCompressionError";
  }
}

export class UnsupportedArchiveFormatError extends SkiffError {
  constructor(file: string) {
    super("UNSUPPORTED_ARCHIVE_FORMAT", `Not a zip or tar archive: ${file}`);
    this.name = "UnsupportedArchiveFormatError";
  }
}

export class ChecksumMismatchError extends SkiffError {
  constructor(
    public readonly location: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super("CHECKSUM_MISMATCH", `Checksum mismatch for ${location}: expected ${expected}, got ${actual}`);
    this.name = "ChecksumMismatchError";
  }
}

export class CacheEntryNotFoundError extends SkiffError {
  constructor(public readonly query: string) {
    super("CACHE_ENTRY_NOT_FOUND", `No cached entry matches ${query}`);
    this.name = "CacheEntryNotFoundError";
  }
}

export class CacheIndexCorruptError extends SkiffError {
  constructor(path: string, options?: { cause?: unknown }) {
    super("CACHE_INDEX_CORRUPT", `Cache index is unreadable: ${path}`, options);
    this.name = "CacheIndexCorruptError";
  }
}

export class DestinationExistsError extends SkiffError {
  constructor(public readonly path: string) {
    super("DESTINATION_EXISTS", `File ${path} already exists`);
    this.name = "DestinationExistsError";
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * The `code` of a Node.js system error (ENOENT, EACCES, ...), if any.
 */
export const errnoCode = (error: unknown): string | undefined =>
  error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : undefined;
