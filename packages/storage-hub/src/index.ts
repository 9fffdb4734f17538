/**
 * @skiff/storage-hub
 *
 * Model hub backend driver.
 */

export {
  createHubDriver,
  DEFAULT_HUB_ENDPOINT,
  type HubDriverConfig,
  type HubLocation,
  type HubRepoType,
  parseHubLocation,
  toCommitUrl,
  toResolveUrl,
} from "./hub-driver.ts";
