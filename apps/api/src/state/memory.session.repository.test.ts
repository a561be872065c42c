import { describe, expect, it } from "vitest";

import { MemorySessionRepository } from "./memory.session.repository.js";
import { newSession } from "../services/upload/upload.session.js";
import {
  ConflictError,
  SessionNotFoundError,
  SessionTerminalError,
  StorageUnavailableError,
} from "../services/upload/upload.errors.js";

const input = {
  filename: "a.bin",
  contentType: "application/octet-stream",
  sizeBytes: 30,
  chunkSize: 10,
};

describe("MemorySessionRepository", () => {
  it("returns copies that callers cannot mutate", async () => {
    const repository = new MemorySessionRepository();
    await repository.create(newSession("u-1", input, 1_000));

    const copy = await repository.get("u-1");
    copy?.receivedChunks.push(2);

    expect((await repository.get("u-1"))?.receivedChunks).toEqual([]);
  });

  it("refuses to create a duplicate id", async () => {
    const repository = new MemorySessionRepository();
    await repository.create(newSession("u-1", input, 1_000));

    await expect(
      repository.create(newSession("u-1", input, 2_000))
    ).rejects.toBeInstanceOf(StorageUnavailableError);
  });

  it("applies the mutator to the latest record and bumps the version", async () => {
    const repository = new MemorySessionRepository();
    await repository.create(newSession("u-1", input, 1_000));

    await repository.compareAndSwap("u-1", ["pending"], (latest) => ({
      ...latest,
      status: "in_progress",
      receivedChunks: [0],
    }));
    const next = await repository.compareAndSwap("u-1", ["in_progress"], (latest) => ({
      ...latest,
      receivedChunks: [...latest.receivedChunks, 1],
    }));

    expect(next.version).toBe(2);
    expect(next.receivedChunks).toEqual([0, 1]);
    expect(await repository.get("u-1")).toEqual(next);
  });

  it("rejects a swap from an unexpected status", async () => {
    const repository = new MemorySessionRepository();
    await repository.create(newSession("u-1", input, 1_000));

    await expect(
      repository.compareAndSwap("u-1", ["merging"], (latest) => latest)
    ).rejects.toBeInstanceOf(ConflictError);
    await expect(
      repository.compareAndSwap("u-2", ["pending"], (latest) => latest)
    ).rejects.toBeInstanceOf(SessionNotFoundError);
  });

  it("writes nothing when the mutator throws", async () => {
    const repository = new MemorySessionRepository();
    await repository.create(newSession("u-1", input, 1_000));

    await expect(
      repository.compareAndSwap("u-1", ["pending"], (latest) => {
        throw new SessionTerminalError(latest.uploadId, latest.status);
      })
    ).rejects.toBeInstanceOf(SessionTerminalError);
    expect((await repository.get("u-1"))?.version).toBe(0);
  });

  it("lists and deletes sessions", async () => {
    const repository = new MemorySessionRepository();
    await repository.create(newSession("u-1", input, 1_000));
    await repository.create(newSession("u-2", input, 1_000));

    await repository.delete("u-1");

    expect((await repository.list()).map((session) => session.uploadId)).toEqual(["u-2"]);
  });
});
