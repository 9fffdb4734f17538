/**
 * Skiff Storage S3
 *
 * Object-store backend driver.
 */

export {
  checksumToHex,
  createS3Driver,
  parseS3Location,
  type S3DriverConfig,
  type S3Location,
  translateS3Error,
} from "./s3-driver.ts";
