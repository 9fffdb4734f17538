/**
 * Unit tests for the S3 driver's location parsing and error mapping
 */
import { S3ServiceException } from "@aws-sdk/client-s3";
import {
  AuthenticationError,
  BackendUnavailableError,
  InvalidIdentifierError,
  ResourceNotFoundError,
} from "@skiff/storage-core";
import { describe, expect, it } from "vitest";
import { checksumToHex, parseS3Location, translateS3Error } from "../src/s3-driver.ts";

const LOCATION = "s3://bucket/models/weights.bin";

const serviceError = (name: string, status: number) =>
  new S3ServiceException({
    name,
    $fault: "client",
    $metadata: { httpStatusCode: status },
    message: name,
  });

describe("parseS3Location", () => {
  it("splits bucket and key", () => {
    expect(parseS3Location(LOCATION)).toEqual({ bucket: "bucket", key: "models/weights.bin" });
  });

  it("rejects locations without a key", () => {
    expect(() => parseS3Location("s3://bucket/")).toThrow(InvalidIdentifierError);
  });
});

describe("checksumToHex", () => {
  it("converts full-object checksums", () => {
    const hex = "a".repeat(64);
    expect(checksumToHex(Buffer.from(hex, "hex").toString("base64"))).toBe(hex);
  });

  it("ignores composite and missing checksums", () => {
    expect(checksumToHex("abc=-3")).toBeNull();
    expect(checksumToHex(undefined)).toBeNull();
  });
});

describe("translateS3Error", () => {
  it("maps missing objects", () => {
    expect(translateS3Error(LOCATION, serviceError("NotFound", 404))).toBeInstanceOf(ResourceNotFoundError);
    expect(translateS3Error(LOCATION, serviceError("NoSuchKey", 404))).toBeInstanceOf(ResourceNotFoundError);
  });

  it("maps denied access", () => {
    const mapped = translateS3Error(LOCATION, serviceError("AccessDenied", 403));
    expect(mapped).toBeInstanceOf(AuthenticationError);
  });

  it("treats other failures as unavailable", () => {
    expect(translateS3Error(LOCATION, serviceError("SlowDown", 503))).toBeInstanceOf(BackendUnavailableError);
    expect(translateS3Error(LOCATION, new Error("socket hang up"))).toBeInstanceOf(BackendUnavailableError);
  });
});
