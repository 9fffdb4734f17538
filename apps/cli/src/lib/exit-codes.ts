import { isSkiffError, type SkiffErrorCode } from "@skiff/storage-core";
import { CommanderError } from "commander";

export const EXIT_FAILURE = 1;

/**
 * Process exit status per error code.
 */
export const EXIT_CODES: Record<SkiffErrorCode, number> = {
  UNSUPPORTED_SCHEME: 2,
  INVALID_IDENTIFIER: 3,
  RESOURCE_NOT_FOUND: 4,
  AUTHENTICATION: 5,
  BACKEND_UNAVAILABLE: 6,
  UNSUPPORTED_OPERATION: 7,
  CACHE_LOCK_TIMEOUT: 8,
  ARCHIVE_MEMBER_NOT_FOUND: 9,
  UNSUPPORTED_COMPRESSION: 10,
  UNSUPPORTED_ARCHIVE_FORMAT: 11,
  CHECKSUM_MISMATCH: 12,
  CACHE_ENTRY_NOT_FOUND: 13,
  CACHE_INDEX_CORRUPT: 14,
  DESTINATION_EXISTS: 15,
};

export function exitCodeOf(error: unknown): number {
  if (isSkiffError(error)) {
    return EXIT_CODES[error.code];
  }
  if (error instanceof CommanderError) {
    return error.exitCode;
  }
  return EXIT_FAILURE;
}
