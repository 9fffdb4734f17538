import {
  ArchiveMemberNotFoundError,
  AuthenticationError,
  CacheEntryNotFoundError,
  CacheIndexCorruptError,
  ChecksumMismatchError,
  DestinationExistsError,
  InvalidIdentifierError,
  ResourceNotFoundError,
  UnsupportedArchiveFormatError,
  UnsupportedCompressionError,
  UnsupportedSchemeError,
} from "@skiff/storage-core";
import { CommanderError } from "commander";
import { describe, expect, it } from "vitest";
import { EXIT_CODES, exitCodeOf } from "../src/lib/exit-codes.ts";

describe("exitCodeOf", () => {
  it("maps error codes to their exit statuses", () => {
    expect(exitCodeOf(new UnsupportedSchemeError("ftp"))).toBe(2);
    expect(exitCodeOf(new InvalidIdentifierError("archive.zip!", "empty archive member"))).toBe(3);
    expect(exitCodeOf(new ResourceNotFoundError("s3://bucket/missing"))).toBe(4);
    expect(exitCodeOf(new AuthenticationError("s3://bucket/private"))).toBe(5);
    expect(exitCodeOf(new ArchiveMemberNotFoundError("a.zip", "b.txt"))).toBe(9);
    expect(exitCodeOf(new UnsupportedCompressionError("xz", "a.xz"))).toBe(10);
    expect(exitCodeOf(new UnsupportedArchiveFormatError("a.bin"))).toBe(11);
    expect(exitCodeOf(new ChecksumMismatchError("hf://org/repo/f", "aa", "bb"))).toBe(12);
    expect(exitCodeOf(new CacheEntryNotFoundError("s3://bucket/never"))).toBe(13);
    expect(exitCodeOf(new CacheIndexCorruptError("/tmp/index.json"))).toBe(14);
    expect(exitCodeOf(new DestinationExistsError("/tmp/out.txt"))).toBe(15);
  });

  it("uses the commander exit code for usage errors", () => {
    expect(exitCodeOf(new CommanderError(1, "commander.missingArgument", "missing"))).toBe(1);
  });

  it("returns 1 for anything unclassified", () => {
    expect(exitCodeOf(new Error("boom"))).toBe(1);
    expect(exitCodeOf("boom")).toBe(1);
  });

  it("gives every failure kind its own status above 1", () => {
    const statuses = Object.values(EXIT_CODES);
    for (const status of statuses) {
      expect(status).toBeGreaterThan(1);
    }
    expect(new Set(statuses).size).toBe(statuses.length);
  });
});
