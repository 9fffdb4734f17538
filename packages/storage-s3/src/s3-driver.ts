/**
 * S3 backend driver
 *
 * Locations are `s3://<bucket>/<key>`. The ETag is the freshness token; when
 * the object carries a full-object SHA-256 checksum it is reported too.
 * Writes are staged in a temp file and uploaded with a single PutObject on
 * commit.
 */

import { randomUUID } from "node:crypto";
import { createReadStream } from "node:fs";
import { stat as statFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable } from "node:stream";
import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import {
  AuthenticationError,
  type BackendDriver,
  BackendUnavailableError,
  createStagedFileSink,
  InvalidIdentifierError,
  ResourceNotFoundError,
  type StatResult,
  type WriteSink,
} from "@skiff/storage-core";

/**
 * S3 Driver configuration
 */
export type S3DriverConfig = {
  /** AWS region (e.g. "us-west-2") */
  region?: string;
  /** Custom endpoint for S3-compatible stores */
  endpoint?: string;
  /** Use path-style addressing (needed by most S3-compatible stores) */
  forcePathStyle?: boolean;
  /** Optional S3 client (for testing or custom config) */
  client?: S3Client;
  /** Directory for staged uploads (default: OS temp dir) */
  stagingDir?: string;
};

export type S3Location = { bucket: string; key: string };

// ============================================================================
// Helpers
// ============================================================================

export const parseS3Location = (location: string): S3Location => {
  const rest = location.replace(/^s3:\/\//, "");
  const slash = rest.indexOf("/");
  if (slash <= 0 || slash === rest.length - 1) {
    throw new InvalidIdentifierError(location, "expected s3://<bucket>/<key>");
  }
  return { bucket: rest.slice(0, slash), key: rest.slice(slash + 1) };
};

/**
 * Hex form of a base64 SHA-256 checksum. Multipart composite checksums
 * ("<base64>-<parts>") are not content hashes and yield null.
 */
export const checksumToHex = (checksum: string | undefined): string | null => {
  if (!checksum || checksum.includes("-")) return null;
  const hex = Buffer.from(checksum, "base64").toString("hex");
  return hex.length === 64 ? hex : null;
};

export const translateS3Error = (location: string, error: unknown): unknown => {
  if (error instanceof S3ServiceException) {
    const status = error.$metadata.httpStatusCode;
    if (error.name === "NotFound" || error.name === "NoSuchKey" || status === 404) {
      return new ResourceNotFoundError(location, { cause: error });
    }
    if (error.name === "AccessDenied" || error.name === "Forbidden" || status === 401 || status === 403) {
      return new AuthenticationError(location, status);
    }
    return new BackendUnavailableError(location, error.message, { cause: error });
  }
  if (error instanceof Error && error.name === "CredentialsProviderError") {
    return new AuthenticationError(location);
  }
  if (error instanceof Error) {
    return new BackendUnavailableError(location, error.message, { cause: error });
  }
  return error;
};

// ============================================================================
// Factory
// ============================================================================

/**
 * Create an S3-backed driver
 */
export const createS3Driver = (config: S3DriverConfig = {}): BackendDriver => {
  const client =
    config.client ??
    new S3Client({
      ...(config.region ? { region: config.region } : {}),
      ...(config.endpoint ? { endpoint: config.endpoint } : {}),
      ...(config.forcePathStyle !== undefined ? { forcePathStyle: config.forcePathStyle } : {}),
    });
  const stagingDir = config.stagingDir ?? tmpdir();

  const stat = async (location: string): Promise<StatResult> => {
    const { bucket, key } = parseS3Location(location);
    try {
      const result = await client.send(
        new HeadObjectCommand({ Bucket: bucket, Key: key, ChecksumMode: "ENABLED" })
      );
      return {
        exists: true,
        freshnessToken: result.ETag ? result.ETag.replace(/^"(.*)"$/, "$1") : null,
        size: result.ContentLength ?? null,
        sha256: checksumToHex(result.ChecksumSHA256),
      };
    } catch (error: unknown) {
      throw translateS3Error(location, error);
    }
  };

  const openRead = async (location: string): Promise<Readable> => {
    const { bucket, key } = parseS3Location(location);
    try {
      const result = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      if (!result.Body) return Readable.from([]);
      if (result.Body instanceof Readable) return result.Body;
      return Readable.from([Buffer.from(await result.Body.transformToByteArray())]);
    } catch (error: unknown) {
      throw translateS3Error(location, error);
    }
  };

  const openWrite = async (location: string): Promise<WriteSink> => {
    const { bucket, key } = parseS3Location(location);
    return createStagedFileSink({
      tempPath: join(stagingDir, `skiff-s3-${randomUUID()}`),
      install: async (staged) => {
        const { size } = await statFile(staged);
        try {
          await client.send(
            new PutObjectCommand({
              Bucket: bucket,
              Key: key,
              Body: createReadStream(staged),
              ContentLength: size,
              ContentType: "application/octet-stream",
            })
          );
        } catch (error: unknown) {
          throw translateS3Error(location, error);
        }
      },
    });
  };

  return {
    kind: "s3",
    stat,

    async exists(location: string): Promise<boolean> {
      try {
        await stat(location);
        return true;
      } catch (error: unknown) {
        if (error instanceof ResourceNotFoundError) return false;
        throw error;
      }
    },

    openRead,
    openWrite,

    async delete(location: string): Promise<void> {
      const { bucket, key } = parseS3Location(location);
      try {
        await client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
      } catch (error: unknown) {
        throw translateS3Error(location, error);
      }
    },
  };
};
