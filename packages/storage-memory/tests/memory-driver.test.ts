/**
 * Unit tests for the in-memory driver
 */
import { BackendUnavailableError, ResourceNotFoundError, sha256Hex } from "@skiff/storage-core";
import { describe, expect, it } from "vitest";
import { createMemoryDriver, createMemoryDriverWithInspection } from "../src/memory-driver.ts";

const LOCATION = "s3://bucket/a.txt";

async function readAll(stream: AsyncIterable<Buffer>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) chunks.push(chunk);
  return Buffer.concat(chunks).toString("utf-8");
}

describe("createMemoryDriver", () => {
  it("bumps the token on every write", async () => {
    const driver = createMemoryDriverWithInspection();
    driver.put(LOCATION, "one");
    expect((await driver.stat(LOCATION)).freshnessToken).toBe("v1");

    driver.put(LOCATION, "two");
    expect(await driver.stat(LOCATION)).toEqual({ exists: true, freshnessToken: "v2", size: 3, sha256: null });
  });

  it("commits staged writes only", async () => {
    const driver = createMemoryDriverWithInspection({ kind: "hub" });

    const dropped = await driver.openWrite(LOCATION);
    dropped.stream.write("draft");
    await dropped.discard();
    expect(driver.get(LOCATION)).toBeNull();

    const sink = await driver.openWrite(LOCATION);
    sink.stream.write("final");
    await sink.commit();
    expect(await readAll(await driver.openRead(LOCATION))).toBe("final");
    expect(driver.count("commit")).toBe(1);
  });

  it("announces content hashes on request", async () => {
    const driver = createMemoryDriverWithInspection({ announceSha256: true });
    driver.put(LOCATION, "abc");
    expect((await driver.stat(LOCATION)).sha256).toBe(sha256Hex("abc"));

    driver.announce(LOCATION, "0".repeat(64));
    expect((await driver.stat(LOCATION)).sha256).toBe("0".repeat(64));
  });

  it("injects failures", async () => {
    const driver = createMemoryDriverWithInspection();
    driver.put(LOCATION, "x");
    driver.failWith(new BackendUnavailableError(LOCATION, "offline"));
    await expect(driver.stat(LOCATION)).rejects.toBeInstanceOf(BackendUnavailableError);

    driver.failWith(null);
    expect((await driver.stat(LOCATION)).exists).toBe(true);
  });

  it("reports missing objects", async () => {
    const driver = createMemoryDriver({ withoutTokens: true });
    await expect(driver.stat(LOCATION)).rejects.toBeInstanceOf(ResourceNotFoundError);
    await expect(driver.delete(LOCATION)).rejects.toBeInstanceOf(ResourceNotFoundError);
    expect(await driver.exists(LOCATION)).toBe(false);
    expect(driver.kind).toBe("s3");
  });
});
