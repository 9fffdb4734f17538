/**
 * Archive detection and extraction (one member, or every member into a
 * directory)
 *
 * zip archives are read with JSZip, tar archives are streamed through
 * tar-stream. A compressed container (`.tar.gz`, `.tgz`, ...) is
 * decompressed to a temp file before the archive format is detected.
 */

import { randomUUID } from "node:crypto";
import { createReadStream, createWriteStream } from "node:fs";
import { mkdir, readFile, rm } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { pipeline } from "node:stream/promises";
import {
  ArchiveMemberNotFoundError,
  normalizeMember,
  UnsupportedArchiveFormatError,
} from "@skiff/storage-core";
import JSZip from "jszip";
import { extract } from "tar-stream";
import { decompressFile, detectCompression, stripCompressionSuffix } from "./compression.ts";
import { readHeader, startsWith } from "./sniff.ts";

// ============================================================================
// Types
// ============================================================================

export type ArchiveFormat = "zip" | "tar";

export type ExtractMemberOptions = {
  /** File holding the (possibly compressed) archive */
  containerPath: string;
  /** Normalized member path inside the archive */
  member: string;
  /** Where the member's bytes are written */
  outPath: string;
  /** File name used for suffix detection (default: basename of containerPath) */
  nameHint?: string;
  /** Directory for the decompressed intermediate */
  tempDir: string;
};

export type ExtractArchiveOptions = {
  containerPath: string;
  /** Directory receiving every member, created if missing */
  outDir: string;
  nameHint?: string;
  tempDir: string;
};

// ============================================================================
// Detection
// ============================================================================

const ZIP_MAGIC = [[0x50, 0x4b, 0x03, 0x04], [0x50, 0x4b, 0x05, 0x06]] as const;
const USTAR_MAGIC = [0x75, 0x73, 0x74, 0x61, 0x72] as const;
const USTAR_OFFSET = 257;

export const detectArchiveByName = (name: string): ArchiveFormat | null => {
  const lower = name.toLowerCase();
  if (lower.endsWith(".zip")) return "zip";
  if (lower.endsWith(".tar")) return "tar";
  return null;
};

export const detectArchiveByMagic = (header: Uint8Array): ArchiveFormat | null => {
  if (ZIP_MAGIC.some((magic) => startsWith(header, magic))) return "zip";
  if (startsWith(header, USTAR_MAGIC, USTAR_OFFSET)) return "tar";
  return null;
};

export const detectArchive = async (path: string, nameHint?: string): Promise<ArchiveFormat | null> => {
  const byName = detectArchiveByName(nameHint ?? path);
  if (byName) return byName;
  return detectArchiveByMagic(await readHeader(path, USTAR_OFFSET + USTAR_MAGIC.length));
};

/**
 * Whether `path` is an archive, looking through a compression suffix
 * (`.tar.gz` is a tar archive, `.txt.gz` is not).
 */
export const isArchiveFile = async (path: string, nameHint?: string): Promise<boolean> => {
  const name = nameHint ?? basename(path);
  if (await detectCompression(path, name)) {
    return detectArchiveByName(stripCompressionSuffix(name)) !== null;
  }
  return (await detectArchive(path, name)) !== null;
};

// ============================================================================
// Extraction
// ============================================================================

/** Target of a member below `outDir`; null for entries that would escape it. */
const memberTarget = (outDir: string, name: string): string | null => {
  const member = normalizeMember(name);
  if (member === "" || member.split("/").includes("..")) return null;
  return join(outDir, member);
};

const extractZipMember = async (archivePath: string, member: string, outPath: string): Promise<boolean> => {
  const zip = await JSZip.loadAsync(await readFile(archivePath));
  const entry = Object.values(zip.files).find((file) => !file.dir && normalizeMember(file.name) === member);
  if (!entry) return false;
  await pipeline(entry.nodeStream("nodebuffer"), createWriteStream(outPath));
  return true;
};

const extractTarMember = async (archivePath: string, member: string, outPath: string): Promise<boolean> => {
  const extractor = extract();
  let found = false;

  extractor.on("entry", (header, stream, next) => {
    const isFile = header.type === "file" || header.type === "contiguous-file";
    if (!found && isFile && normalizeMember(header.name) === member) {
      found = true;
      pipeline(stream, createWriteStream(outPath)).then(() => next(), next);
      return;
    }
    stream.on("end", () => next());
    stream.resume();
  });

  await pipeline(createReadStream(archivePath), extractor);
  return found;
};

const extractZipAll = async (archivePath: string, outDir: string): Promise<number> => {
  const zip = await JSZip.loadAsync(await readFile(archivePath));
  let count = 0;
  for (const file of Object.values(zip.files)) {
    const target = memberTarget(outDir, file.name);
    if (!target) continue;
    if (file.dir) {
      await mkdir(target, { recursive: true });
      continue;
    }
    await mkdir(dirname(target), { recursive: true });
    await pipeline(file.nodeStream("nodebuffer"), createWriteStream(target));
    count++;
  }
  return count;
};

const extractTarAll = async (archivePath: string, outDir: string): Promise<number> => {
  const extractor = extract();
  let count = 0;

  extractor.on("entry", (header, stream, next) => {
    const target = memberTarget(outDir, header.name);
    const isFile = header.type === "file" || header.type === "contiguous-file";
    if (target && isFile) {
      mkdir(dirname(target), { recursive: true })
        .then(() => pipeline(stream, createWriteStream(target)))
        .then(() => {
          count++;
          next();
        }, next);
      return;
    }
    stream.on("end", () => next());
    stream.resume();
  });

  await pipeline(createReadStream(archivePath), extractor);
  return count;
};

/**
 * Decompress the container if needed, detect its format and hand the plain
 * archive to `fn`.
 */
const withArchive = async <T>(
  options: { containerPath: string; nameHint?: string; tempDir: string },
  fn: (archivePath: string, format: ArchiveFormat) => Promise<T>
): Promise<T> => {
  const { containerPath, tempDir } = options;
  let name = options.nameHint ?? basename(containerPath);
  let archivePath = containerPath;
  let decompressed: string | null = null;

  try {
    const compression = await detectCompression(containerPath, name);
    if (compression) {
      await mkdir(tempDir, { recursive: true });
      decompressed = join(tempDir, `${randomUUID()}.unpacked`);
      await decompressFile(containerPath, decompressed, compression);
      archivePath = decompressed;
      name = stripCompressionSuffix(name);
    }

    const format = await detectArchive(archivePath, name);
    if (format === null) {
      throw new UnsupportedArchiveFormatError(options.nameHint ?? containerPath);
    }
    return await fn(archivePath, format);
  } finally {
    if (decompressed) await rm(decompressed, { force: true });
  }
};

/**
 * Extract one member of an archive to `outPath`.
 *
 * @throws UnsupportedArchiveFormatError when the container is neither zip nor tar
 * @throws ArchiveMemberNotFoundError when no regular file matches `member`
 */
export const extractArchiveMember = async (options: ExtractMemberOptions): Promise<void> => {
  const { member, outPath } = options;
  const found = await withArchive(options, (archivePath, format) =>
    format === "zip" ? extractZipMember(archivePath, member, outPath) : extractTarMember(archivePath, member, outPath)
  );
  if (!found) {
    throw new ArchiveMemberNotFoundError(member, options.nameHint ?? options.containerPath);
  }
};

/**
 * Extract every regular file of an archive below `outDir`. Entries whose
 * path leaves `outDir` are skipped. Returns the number of files written.
 *
 * @throws UnsupportedArchiveFormatError when the container is neither zip nor tar
 */
export const extractArchive = async (options: ExtractArchiveOptions): Promise<number> => {
  const { outDir } = options;
  await mkdir(outDir, { recursive: true });
  return withArchive(options, (archivePath, format) =>
    format === "zip" ? extractZipAll(archivePath, outDir) : extractTarAll(archivePath, outDir)
  );
};
