import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, getDefaultCacheRoot, loadConfig, toManagerConfig } from "../src/lib/config.ts";

describe("loadConfig", () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "skiff-config-test-"));
    configPath = join(dir, "config.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("uses defaults when the file does not exist", () => {
    const config = loadConfig({ SKIFF_CONFIG: configPath });

    expect(config.cache).toEqual({ root: undefined, expireDays: -1, autoUpdate: true, lockTimeoutMs: 60_000 });
    expect(config.hub).toEqual({ endpoint: "https://huggingface.co", token: undefined });
    expect(config.http.headers).toEqual({});
  });

  it("reads the file and applies environment overrides", async () => {
    await writeFile(
      configPath,
      JSON.stringify({
        cache: { root: "/from-file", expireDays: 7 },
        hub: { token: "file-token" },
        s3: { region: "eu-west-1", forcePathStyle: true },
      })
    );

    const config = loadConfig({
      SKIFF_CONFIG: configPath,
      SKIFF_CACHE_ROOT: "/from-env",
      HF_TOKEN: "test-secret",
    });

    expect(config.cache.root).toBe("/from-env");
    expect(config.cache.expireDays).toBe(7);
    expect(config.hub.token).toBe("test-secret");
    expect(config.s3).toEqual({ region: "eu-west-1", forcePathStyle: true });
  });

  it("lets AWS_REGION and SKIFF_HUB_ENDPOINT override the file", async () => {
    await writeFile(configPath, JSON.stringify({ s3: { region: "eu-west-1" } }));

    const config = loadConfig({
      SKIFF_CONFIG: configPath,
      AWS_REGION: "us-east-2",
      SKIFF_HUB_ENDPOINT: "http://hub.test",
    });

    expect(config.s3.region).toBe("us-east-2");
    expect(config.hub.endpoint).toBe("http://hub.test");
  });

  it("rejects malformed JSON", async () => {
    await writeFile(configPath, "{ nope");

    expect(() => loadConfig({ SKIFF_CONFIG: configPath })).toThrow(ConfigError);
  });

  it("names the invalid field", async () => {
    await writeFile(configPath, JSON.stringify({ cache: { expireDays: "soon" } }));

    expect(() => loadConfig({ SKIFF_CONFIG: configPath })).toThrow(/cache\.expireDays/);
  });
});

describe("cache root", () => {
  it("prefers XDG_CACHE_HOME", () => {
    expect(getDefaultCacheRoot({ XDG_CACHE_HOME: "/xdg" })).toBe(join("/xdg", "skiff"));
  });

  it("lets the --root option override the config", () => {
    const config = loadConfig({ SKIFF_CONFIG: join(tmpdir(), "skiff-missing-config.json"), SKIFF_CACHE_ROOT: "/env" });

    expect(toManagerConfig(config).root).toBe("/env");
    expect(toManagerConfig(config, { root: "/cli" }).root).toBe("/cli");
  });

  it("falls back to the default root", () => {
    const config = loadConfig({ SKIFF_CONFIG: join(tmpdir(), "skiff-missing-config.json") });

    expect(toManagerConfig(config, { env: { XDG_CACHE_HOME: "/xdg" } }).root).toBe(join("/xdg", "skiff"));
  });
});
