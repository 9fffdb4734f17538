/**
 * Unit tests for createHubDriver
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  AuthenticationError,
  InvalidIdentifierError,
  ResourceNotFoundError,
} from "@skiff/storage-core";
import type { FetchLike } from "@skiff/storage-http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createHubDriver, parseHubLocation, toCommitUrl, toResolveUrl } from "../src/hub-driver.ts";

// ============================================================================
// Mock helpers
// ============================================================================

type Call = {
  method: string;
  url: string;
  redirect: RequestInit["redirect"];
  authorization: string | null;
  body: string | null;
};

const ENDPOINT = "https://hub.example.test";
const SHA = "a".repeat(64);

function createMockFetch(respond: (call: Call) => Response) {
  const calls: Call[] = [];
  const fetch: FetchLike = async (url, init) => {
    const call: Call = {
      method: init.method ?? "GET",
      url,
      redirect: init.redirect,
      authorization: new Headers(init.headers).get("authorization"),
      body: typeof init.body === "string" ? init.body : null,
    };
    calls.push(call);
    return respond(call);
  };
  return { fetch, calls };
}

// ============================================================================
// Location helpers
// ============================================================================

describe("parseHubLocation", () => {
  it("defaults to a model repo on main", () => {
    expect(parseHubLocation("hf://acme/tiny-model/config.json")).toEqual({
      repoType: "model",
      repo: "acme/tiny-model",
      revision: "main",
      path: "config.json",
    });
  });

  it("reads the repo type prefix and revision", () => {
    expect(parseHubLocation("hf://datasets/acme/corpus@v1.0/splits/train.jsonl")).toEqual({
      repoType: "dataset",
      repo: "acme/corpus",
      revision: "v1.0",
      path: "splits/train.jsonl",
    });
  });

  it("rejects locations without a file path", () => {
    expect(() => parseHubLocation("hf://acme/tiny-model")).toThrow(InvalidIdentifierError);
  });

  it("rejects a malformed revision escape", () => {
    expect(() => parseHubLocation("hf://acme/tiny-model@%zz/config.json")).toThrow(InvalidIdentifierError);
  });

  it("builds resolve and commit URLs", () => {
    const hub = parseHubLocation("hf://datasets/acme/corpus@refs%2Fpr%2F1/a b.txt");
    expect(toResolveUrl(ENDPOINT, hub)).toBe(`${ENDPOINT}/datasets/acme/corpus/resolve/refs%2Fpr%2F1/a%20b.txt`);
    expect(toCommitUrl(ENDPOINT, hub)).toBe(`${ENDPOINT}/api/datasets/acme/corpus/commit/refs%2Fpr%2F1`);
  });
});

// ============================================================================
// Driver
// ============================================================================

describe("createHubDriver", () => {
  const LOCATION = "hf://acme/tiny-model/weights.bin";

  it("reads the linked etag from the redirect without following it", async () => {
    const { fetch, calls } = createMockFetch(
      () =>
        new Response(null, {
          status: 302,
          headers: { "x-linked-etag": `"${SHA}"`, "x-linked-size": "1024", location: "https://cdn.example.test/x" },
        })
    );
    const driver = createHubDriver({ endpoint: ENDPOINT, token: "test-secret", fetch });

    expect(await driver.stat(LOCATION)).toEqual({
      exists: true,
      freshnessToken: SHA,
      size: 1024,
      sha256: SHA,
    });
    expect(calls).toEqual([
      {
        method: "HEAD",
        url: `${ENDPOINT}/acme/tiny-model/resolve/main/weights.bin`,
        redirect: "manual",
        authorization: "Bearer test-secret",
        body: null,
      },
    ]);
  });

  it("uses a plain etag for small files", async () => {
    const { fetch } = createMockFetch(
      () => new Response(null, { status: 200, headers: { etag: '"1f2e3d"', "content-length": "12" } })
    );
    const result = await createHubDriver({ endpoint: ENDPOINT, fetch }).stat(LOCATION);
    expect(result).toEqual({ exists: true, freshnessToken: "1f2e3d", size: 12, sha256: null });
  });

  it("maps missing and forbidden files", async () => {
    const driver = (status: number) =>
      createHubDriver({ endpoint: ENDPOINT, fetch: createMockFetch(() => new Response(null, { status })).fetch });

    await expect(driver(404).stat(LOCATION)).rejects.toBeInstanceOf(ResourceNotFoundError);
    await expect(driver(401).stat(LOCATION)).rejects.toBeInstanceOf(AuthenticationError);
    expect(await driver(404).exists(LOCATION)).toBe(false);
  });

  it("follows redirects when reading", async () => {
    const { fetch, calls } = createMockFetch(() => new Response("weights", { status: 200 }));
    const stream = await createHubDriver({ endpoint: ENDPOINT, fetch }).openRead(LOCATION);

    const chunks: Buffer[] = [];
    for await (const chunk of stream) chunks.push(Buffer.from(chunk));
    expect(Buffer.concat(chunks).toString()).toBe("weights");
    expect(calls[0]?.redirect).toBe("follow");
  });

  describe("commits", () => {
    let stagingDir: string;

    beforeEach(async () => {
      stagingDir = await mkdtemp(join(tmpdir(), "skiff-hub-test-"));
    });

    afterEach(async () => {
      await rm(stagingDir, { recursive: true, force: true });
    });

    it("uploads the staged content as one commit", async () => {
      const { fetch, calls } = createMockFetch(() => new Response("{}", { status: 200 }));
      const driver = createHubDriver({ endpoint: ENDPOINT, token: "test-secret", fetch, stagingDir });

      const sink = await driver.openWrite(LOCATION);
      sink.stream.write("hello hub");
      await sink.commit();

      expect(calls).toHaveLength(1);
      expect(calls[0]?.url).toBe(`${ENDPOINT}/api/models/acme/tiny-model/commit/main`);
      const lines = (calls[0]?.body ?? "").split("\n").map((line) => JSON.parse(line));
      expect(lines).toEqual([
        { key: "header", value: { summary: "Upload weights.bin", description: "" } },
        {
          key: "file",
          value: { content: Buffer.from("hello hub").toString("base64"), path: "weights.bin", encoding: "base64" },
        },
      ]);
    });

    it("sends nothing when a write is discarded", async () => {
      const { fetch, calls } = createMockFetch(() => new Response("{}", { status: 200 }));
      const sink = await createHubDriver({ endpoint: ENDPOINT, fetch, stagingDir }).openWrite(LOCATION);
      sink.stream.write("draft");
      await sink.discard();
      expect(calls).toHaveLength(0);
    });

    it("deletes through a commit", async () => {
      const { fetch, calls } = createMockFetch(() => new Response("{}", { status: 200 }));
      await createHubDriver({ endpoint: ENDPOINT, fetch }).delete(LOCATION);

      const lines = (calls[0]?.body ?? "").split("\n").map((line) => JSON.parse(line));
      expect(lines[1]).toEqual({ key: "deletedFile", value: { path: "weights.bin" } });
    });
  });
});
