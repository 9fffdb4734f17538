/**
 * Skiff Storage Core
 *
 * Identifier parsing, cache keys, the backend driver contract and the shared
 * error taxonomy.
 */

// Errors
export {
  ArchiveMemberNotFoundError,
  AuthenticationError,
  BackendUnavailableError,
  CacheEntryNotFoundError,
  CacheIndexCorruptError,
  CacheLockTimeoutError,
  ChecksumMismatchError,
  DestinationExistsError,
  errnoCode,
  InvalidIdentifierError,
  isSkiffError,
  ResourceNotFoundError,
  SkiffError,
  type SkiffErrorCode,
  UnsupportedArchiveFormatError,
  UnsupportedCompressionError,
  UnsupportedOperationError,
  UnsupportedSchemeError,
} from "./errors.ts";
// Identifiers
export {
  backendKindOf,
  baseIdentifier,
  decodeLocation,
  formatIdentifier,
  locationName,
  normalizeMember,
  parseIdentifier,
  selectDriver,
  splitMembers,
} from "./identifier.ts";
// Key utilities
export { sha256Hex, toArchiveDirectoryKey, toCacheKey, toExtractionKey, toStoragePath } from "./key.ts";
// Staged writes
export { createStagedFileSink, type StagedFileSinkConfig } from "./staged-sink.ts";
// Types
export type {
  BackendDriver,
  BackendDrivers,
  BackendKind,
  ResourceIdentifier,
  Scheme,
  StatResult,
  WriteSink,
} from "./types.ts";
