/**
 * Unit tests for identifier parsing and cache keys
 */
import { resolve } from "node:path";
import { describe, expect, it } from "vitest";
import {
  backendKindOf,
  formatIdentifier,
  InvalidIdentifierError,
  isSkiffError,
  locationName,
  parseIdentifier,
  toArchiveDirectoryKey,
  toCacheKey,
  toExtractionKey,
  toStoragePath,
  UnsupportedSchemeError,
} from "../src/index.ts";

describe("parseIdentifier", () => {
  it("splits a remote archive and its member", () => {
    const id = parseIdentifier("https://example.com/data/archive.zip!dir/file.txt");
    expect(id.scheme).toBe("https");
    expect(id.location).toBe("https://example.com/data/archive.zip");
    expect(id.member).toEqual(["dir/file.txt"]);
  });

  it("keeps every nested member segment in order", () => {
    const id = parseIdentifier("s3://bucket/outer.tar.gz!inner.zip!x/y.txt");
    expect(id.location).toBe("s3://bucket/outer.tar.gz");
    expect(id.member).toEqual(["inner.zip", "x/y.txt"]);
  });

  it("treats bare paths as local files", () => {
    const id = parseIdentifier("relative/path.txt");
    expect(id.scheme).toBe("file");
    expect(id.location).toBe(resolve("relative/path.txt"));
    expect(backendKindOf(id.scheme)).toBe("local");
  });

  it("normalizes scheme and host case", () => {
    const id = parseIdentifier("HTTPS://Example.COM/a");
    expect(id.scheme).toBe("https");
    expect(id.location).toBe("https://example.com/a");
  });

  it("honours escaped separators", () => {
    const id = parseIdentifier("file:///tmp/a\\!b.txt");
    expect(id.location).toBe(resolve("/tmp/a!b.txt"));
    expect(id.member).toEqual([]);
  });

  it("normalizes member paths", () => {
    expect(parseIdentifier("archive.zip!./dir//file.txt").member).toEqual(["dir/file.txt"]);
  });

  it("rejects unknown schemes", () => {
    expect(() => parseIdentifier("ftp://host/file")).toThrow(UnsupportedSchemeError);
  });

  it("rejects empty members and incomplete locations", () => {
    expect(() => parseIdentifier("archive.zip!")).toThrow(InvalidIdentifierError);
    expect(() => parseIdentifier("s3://bucket")).toThrow(InvalidIdentifierError);
    expect(() => parseIdentifier("hf://owner/repo")).toThrow(InvalidIdentifierError);
  });

  it("rejects malformed percent-encoding", () => {
    expect(() => parseIdentifier("file:///data/a%zz.txt")).toThrow(InvalidIdentifierError);
  });

  it("returns a frozen identifier", () => {
    const id = parseIdentifier("s3://bucket/key");
    expect(Object.isFrozen(id)).toBe(true);
    expect(Object.isFrozen(id.member)).toBe(true);
  });

  it("raises errors carrying their code", () => {
    try {
      parseIdentifier("gopher://x/y");
      expect.unreachable();
    } catch (error) {
      expect(isSkiffError(error, "UNSUPPORTED_SCHEME")).toBe(true);
    }
  });
});

describe("formatIdentifier", () => {
  it("re-escapes separators inside the location", () => {
    const id = parseIdentifier("/tmp/a\\!b.zip!x");
    expect(id.location).toBe(resolve("/tmp/a!b.zip"));
    expect(formatIdentifier(id)).toBe(`${resolve("/tmp/a!b.zip").replace(/!/g, "\\!")}!x`);
  });

  it("renders remote identifiers with members", () => {
    expect(formatIdentifier(parseIdentifier("https://h/a.zip!b.txt"))).toBe("https://h/a.zip!b.txt");
  });
});

describe("keys", () => {
  it("ignores the member chain", () => {
    const withMember = toCacheKey(parseIdentifier("https://h/a.zip!x"));
    const bare = toCacheKey(parseIdentifier("https://h/a.zip"));
    expect(withMember).toBe(bare);
    expect(bare).toMatch(/^[a-f0-9]{64}$/);
  });

  it("differs across schemes and locations", () => {
    const a = toCacheKey(parseIdentifier("http://h/a.zip"));
    const b = toCacheKey(parseIdentifier("https://h/a.zip"));
    const c = toCacheKey(parseIdentifier("https://h/b.zip"));
    expect(new Set([a, b, c]).size).toBe(3);
  });

  it("derives extraction keys from base key and chain", () => {
    const base = toCacheKey(parseIdentifier("https://h/a.zip"));
    expect(toExtractionKey(base, ["x"])).not.toBe(toExtractionKey(base, ["y"]));
    expect(toExtractionKey(base, ["x", "y"])).not.toBe(toExtractionKey(base, ["x"]));
  });

  it("keeps archive directory keys apart from member keys", () => {
    const base = toCacheKey(parseIdentifier("https://h/a.zip"));
    expect(toArchiveDirectoryKey(base, [])).not.toBe(base);
    expect(toArchiveDirectoryKey(base, ["x"])).not.toBe(toExtractionKey(base, ["x"]));
    expect(toArchiveDirectoryKey(base, ["x"])).toBe(toExtractionKey(base, ["x", ""]));
  });

  it("shards storage paths by key prefix", () => {
    expect(toStoragePath("abcdef")).toBe("data/ab/abcdef");
    expect(toStoragePath("abcdef", "extracted/")).toBe("extracted/ab/abcdef");
  });

  it("extracts location names", () => {
    expect(locationName("https://h/dir/a.tar.gz?x=1")).toBe("a.tar.gz");
    expect(locationName("/var/data/file.bz2")).toBe("file.bz2");
  });
});
