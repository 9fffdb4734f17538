/**
 * Skiff Codec
 *
 * Transparent decompression and archive-member extraction.
 */

export {
  type ArchiveFormat,
  detectArchive,
  detectArchiveByMagic,
  detectArchiveByName,
  type ExtractArchiveOptions,
  type ExtractMemberOptions,
  extractArchive,
  extractArchiveMember,
  isArchiveFile,
} from "./archive.ts";
export {
  type CompressionFormat,
  createDecompressor,
  type DecompressMode,
  decompressFile,
  detectCompression,
  detectCompressionByMagic,
  detectCompressionByName,
  openDecompressed,
  stripCompressionSuffix,
} from "./compression.ts";
