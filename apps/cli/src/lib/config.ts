import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { type CacheManagerConfig, createDefaultDrivers } from "@skiff/cache";
import { DEFAULT_HUB_ENDPOINT } from "@skiff/storage-hub";
import { z } from "zod";

// ============================================================================
// Schema
// ============================================================================

export const ConfigSchema = z.object({
  cache: z
    .object({
      root: z.string().optional(),
      expireDays: z.number().int().min(-1).default(-1),
      autoUpdate: z.boolean().default(true),
      lockTimeoutMs: z.number().int().positive().default(60_000),
    })
    .default({}),
  hub: z
    .object({
      endpoint: z.string().url().default(DEFAULT_HUB_ENDPOINT),
      token: z.string().optional(),
    })
    .default({}),
  s3: z
    .object({
      region: z.string().optional(),
      endpoint: z.string().url().optional(),
      forcePathStyle: z.boolean().optional(),
    })
    .default({}),
  http: z
    .object({
      headers: z.record(z.string()).default({}),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(
    public readonly configPath: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Invalid config file ${configPath}: ${detail}`, options);
    this.name = "ConfigError";
  }
}

// ============================================================================
// Paths
// ============================================================================

type Env = Record<string, string | undefined>;

export function getSkiffDir(): string {
  return path.join(os.homedir(), ".skiff");
}

export function getConfigPath(env: Env = process.env): string {
  return env.SKIFF_CONFIG || path.join(getSkiffDir(), "config.json");
}

export function getDefaultCacheRoot(env: Env = process.env): string {
  if (env.XDG_CACHE_HOME) {
    return path.join(env.XDG_CACHE_HOME, "skiff");
  }
  return path.join(os.homedir(), ".cache", "skiff");
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load the config file (absent means defaults), then apply environment
 * overrides: SKIFF_CACHE_ROOT, HF_TOKEN, SKIFF_HUB_ENDPOINT, AWS_REGION.
 */
export function loadConfig(env: Env = process.env): Config {
  const configPath = getConfigPath(env);

  let raw: unknown = {};
  if (fs.existsSync(configPath)) {
    try {
      raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
    } catch (error: unknown) {
      throw new ConfigError(configPath, "not valid JSON", { cause: error });
    }
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(configPath, detail);
  }

  const config = parsed.data;
  return {
    ...config,
    cache: { ...config.cache, root: env.SKIFF_CACHE_ROOT || config.cache.root },
    hub: {
      endpoint: env.SKIFF_HUB_ENDPOINT || config.hub.endpoint,
      token: env.HF_TOKEN || config.hub.token,
    },
    s3: { ...config.s3, region: env.AWS_REGION || config.s3.region },
  };
}

/**
 * Cache manager settings for a loaded config. `root` (the --root option)
 * overrides every other source.
 */
export function toManagerConfig(
  config: Config,
  options: { root?: string; env?: Env } = {}
): Omit<CacheManagerConfig, "logger"> {
  return {
    root: options.root || config.cache.root || getDefaultCacheRoot(options.env),
    expireDays: config.cache.expireDays,
    autoUpdate: config.cache.autoUpdate,
    lockTimeoutMs: config.cache.lockTimeoutMs,
    drivers: createDefaultDrivers({
      http: { headers: config.http.headers },
      s3: {
        region: config.s3.region,
        endpoint: config.s3.endpoint,
        forcePathStyle: config.s3.forcePathStyle,
      },
      hub: { endpoint: config.hub.endpoint, token: config.hub.token },
    }),
  };
}
