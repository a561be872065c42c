import { afterEach, describe, expect, it, vi } from "vitest";
import { pino } from "pino";

import { WalrusArtifactStore } from "./walrus.artifact.store.js";
import type { WalrusConfig } from "../config/walrus.config.js";
import { StorageUnavailableError } from "../services/upload/upload.errors.js";

const config: WalrusConfig = {
  publisherUrl: "http://publisher.test",
  epochs: 3,
  timeoutMs: 5_000,
  maxRetries: 3,
  baseRetryDelayMs: 1,
  queue: { concurrency: 1, intervalCap: 10, intervalMs: 10 },
};

const input = {
  uploadId: "0b6a4c1e-8f3d-4a2b-9c1d-2e3f4a5b6c7d",
  filename: "a.bin",
  contentType: "application/octet-stream",
  sizeBytes: 12,
  chunks: {
    async *[Symbol.asyncIterator]() {
      yield Buffer.from("hello ");
      yield Buffer.from("walrus");
    },
  },
};

function stubPublisher(responses: Array<() => Response>) {
  const bodies: string[] = [];
  const urls: string[] = [];
  let call = 0;

  const fetchMock = vi.fn(async (url: string | URL | Request, init?: RequestInit) => {
    urls.push(String(url));
    expect(init?.method).toBe("PUT");
    bodies.push(init?.body ? await new Response(init.body).text() : "");
    const respond = responses[Math.min(call++, responses.length - 1)];
    return respond();
  });

  vi.stubGlobal("fetch", fetchMock);
  return { fetchMock, bodies, urls };
}

const created = () =>
  new Response(
    JSON.stringify({
      newlyCreated: {
        blobObject: { id: "0xobject", blobId: "blob-1", storage: { endEpoch: 12 } },
        cost: 5,
      },
    }),
    { status: 200 }
  );

const unavailable = () => new Response("busy", { status: 503 });

describe("WalrusArtifactStore", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("publishes the merged bytes and returns a walrus reference", async () => {
    const { fetchMock, bodies, urls } = stubPublisher([created]);
    const store = new WalrusArtifactStore(config, pino({ level: "silent" }));

    await expect(store.store(input)).resolves.toBe("walrus:blob-1");

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(urls).toEqual(["http://publisher.test/v1/blobs?epochs=3"]);
    expect(bodies).toEqual(["hello walrus"]);
  });

  it("retries with a fresh stream after a server error", async () => {
    const certified = () =>
      new Response(JSON.stringify({ alreadyCertified: { blobId: "blob-2", endEpoch: 4 } }), {
        status: 200,
      });
    const { fetchMock, bodies } = stubPublisher([unavailable, certified]);
    const store = new WalrusArtifactStore(config, pino({ level: "silent" }));

    await expect(store.store(input)).resolves.toBe("walrus:blob-2");

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(bodies).toEqual(["hello walrus", "hello walrus"]);
  });

  it("reports exhausted retries as StorageUnavailableError", async () => {
    const { fetchMock } = stubPublisher([unavailable]);
    const store = new WalrusArtifactStore(config, pino({ level: "silent" }));

    await expect(store.store(input)).rejects.toBeInstanceOf(StorageUnavailableError);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("treats a response without a blob id as a failure", async () => {
    const empty = () => new Response(JSON.stringify({}), { status: 200 });
    stubPublisher([empty]);
    const store = new WalrusArtifactStore({ ...config, maxRetries: 1 }, pino({ level: "silent" }));

    await expect(store.store(input)).rejects.toMatchObject({
      code: "STORAGE_UNAVAILABLE",
      cause: new Error("WALRUS_MISSING_BLOB_ID"),
    });
  });
});
