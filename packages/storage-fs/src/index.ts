/**
 * Skiff File System Storage
 *
 * Local file system backend driver.
 */

export { createFsDriver, type FsDriverConfig, toFreshnessToken } from "./fs-driver.ts";
