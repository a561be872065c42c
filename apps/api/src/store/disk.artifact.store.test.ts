import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";

import { DiskArtifactStore } from "./disk.artifact.store.js";
import {
  ChunkCorruptError,
  StorageUnavailableError,
} from "../services/upload/upload.errors.js";

function chunksOf(...parts: string[]): AsyncIterable<Uint8Array> {
  return {
    async *[Symbol.asyncIterator]() {
      for (const part of parts) yield Buffer.from(part);
    },
  };
}

function failingChunks(err: Error): AsyncIterable<Uint8Array> {
  return {
    async *[Symbol.asyncIterator]() {
      yield Buffer.from("partial");
      throw err;
    },
  };
}

const meta = {
  uploadId: "0b6a4c1e-8f3d-4a2b-9c1d-2e3f4a5b6c7d",
  filename: "a.bin",
  contentType: "application/octet-stream",
  sizeBytes: 11,
};

describe("DiskArtifactStore", () => {
  let dir: string;
  let store: DiskArtifactStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "chunkup-artifacts-"));
    store = new DiskArtifactStore(path.join(dir, "artifacts"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes the chunks in order under the upload id", async () => {
    const reference = await store.store({ ...meta, chunks: chunksOf("hello", " ", "world") });

    expect(reference).toBe(`disk:${meta.uploadId}.bin`);
    expect(store.resolvePath(reference)).toBe(path.join(dir, "artifacts", `${meta.uploadId}.bin`));
    expect(await fs.readFile(store.resolvePath(reference), "utf8")).toBe("hello world");
  });

  it("passes typed chunk errors through and leaves no file", async () => {
    const corrupt = new ChunkCorruptError(meta.uploadId, 1, 10, 3);

    await expect(
      store.store({ ...meta, chunks: failingChunks(corrupt) })
    ).rejects.toBe(corrupt);
    expect(await fs.readdir(path.join(dir, "artifacts"))).toEqual([]);
  });

  it("wraps other failures as StorageUnavailableError", async () => {
    await expect(
      store.store({ ...meta, chunks: failingChunks(new Error("EIO")) })
    ).rejects.toBeInstanceOf(StorageUnavailableError);
  });

  it("discards a stored artifact", async () => {
    const reference = await store.store({ ...meta, chunks: chunksOf("x") });

    await store.discard(reference);
    await store.discard(reference);

    expect(await fs.readdir(path.join(dir, "artifacts"))).toEqual([]);
  });

  it("rejects references from other stores", () => {
    expect(() => store.resolvePath("memory:abc")).toThrow("NOT_A_DISK_REFERENCE");
  });
});
