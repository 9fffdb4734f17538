/**
 * Default driver set
 */

import type { BackendDrivers } from "@skiff/storage-core";
import { createFsDriver, type FsDriverConfig } from "@skiff/storage-fs";
import { createHttpDriver, type HttpDriverConfig } from "@skiff/storage-http";
import { createHubDriver, type HubDriverConfig } from "@skiff/storage-hub";
import { createS3Driver, type S3DriverConfig } from "@skiff/storage-s3";

export type DriversConfig = {
  local?: FsDriverConfig;
  http?: HttpDriverConfig;
  s3?: S3DriverConfig;
  hub?: HubDriverConfig;
};

export const createDefaultDrivers = (config: DriversConfig = {}): BackendDrivers => ({
  local: createFsDriver(config.local),
  http: createHttpDriver(config.http),
  s3: createS3Driver(config.s3),
  hub: createHubDriver(config.hub),
});
