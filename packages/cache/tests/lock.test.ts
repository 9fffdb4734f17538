/**
 * Unit tests for createCacheLock
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CacheLockTimeoutError } from "@skiff/storage-core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createCacheLock } from "../src/lock.ts";

describe("createCacheLock", () => {
  let lockDir: string;

  beforeEach(async () => {
    lockDir = await mkdtemp(join(tmpdir(), "skiff-lock-test-"));
  });

  afterEach(async () => {
    await rm(lockDir, { recursive: true, force: true });
  });

  it("runs callers of one name one at a time", async () => {
    const locks = createCacheLock({ lockDir });
    const events: string[] = [];
    const task = (label: string) => async () => {
      events.push(`${label}:start`);
      await new Promise((resolve) => setTimeout(resolve, 20));
      events.push(`${label}:end`);
      return label;
    };

    const results = await Promise.all([locks.withLock("k", task("a")), locks.withLock("k", task("b"))]);

    expect(results).toEqual(["a", "b"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end"]);
  });

  it("keeps the queue going after a failure", async () => {
    const locks = createCacheLock({ lockDir });
    const failed = locks.withLock("k", async () => {
      throw new Error("boom");
    });
    const next = locks.withLock("k", async () => "ok");

    await expect(failed).rejects.toThrow("boom");
    expect(await next).toBe("ok");
  });

  it("times out while another holder keeps the lock", async () => {
    const holder = createCacheLock({ lockDir });
    const contender = createCacheLock({ lockDir, timeoutMs: 200, pollMs: 50 });

    let release = () => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    let acquired = () => {};
    const isHeld = new Promise<void>((resolve) => {
      acquired = resolve;
    });
    const holding = holder.withLock("k", async () => {
      acquired();
      await held;
    });
    await isHeld;

    await expect(contender.withLock("k", async () => "never")).rejects.toBeInstanceOf(CacheLockTimeoutError);

    release();
    await holding;
    expect(await contender.withLock("k", async () => "after")).toBe("after");
  });

  it("times out while waiting behind a holder in the same process", async () => {
    const locks = createCacheLock({ lockDir, timeoutMs: 200, pollMs: 50 });
    const events: string[] = [];

    let release = () => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const holding = locks.withLock("k", async () => {
      await held;
      events.push("holder:end");
    });

    let ran = false;
    const started = Date.now();
    await expect(
      locks.withLock("k", async () => {
        ran = true;
      })
    ).rejects.toBeInstanceOf(CacheLockTimeoutError);
    expect(ran).toBe(false);
    expect(Date.now() - started).toBeLessThan(1_000);

    // A caller queued after the timed-out one still waits for the holder
    const next = locks.withLock("k", async () => {
      events.push("next:run");
    });
    setTimeout(release, 50);
    await Promise.all([holding, next]);

    expect(events).toEqual(["holder:end", "next:run"]);
  });
});
