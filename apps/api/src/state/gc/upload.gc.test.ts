import { afterEach, describe, expect, it, vi } from "vitest";
import { pino } from "pino";

import { runUploadGc } from "./upload.gc.worker.js";
import { isUploadGcRunning, startUploadGc, stopUploadGc } from "./upload.gc.scheduler.js";
import { reconcileOrphanUploads } from "./upload.gc.reconcile.js";
import { ChunkUploadEngine } from "../../services/upload/upload.engine.js";
import { newSession } from "../../services/upload/upload.session.js";
import { MemorySessionRepository } from "../memory.session.repository.js";
import { MemoryChunkStore } from "../../store/memory.chunk.store.js";
import { MemoryArtifactStore } from "../../store/memory.artifact.store.js";

const log = pino({ level: "silent" });

const file = { filename: "a.bin", contentType: "application/octet-stream" };

function createEngine(now?: () => number) {
  const repository = new MemorySessionRepository();
  const chunkStore = new MemoryChunkStore();
  const engine = new ChunkUploadEngine({
    repository,
    chunkStore,
    artifactStore: new MemoryArtifactStore(),
    log,
    sessionTtlMs: 1_000,
    casRetryDelayMs: 0,
    ...(now && { now }),
  });
  return { engine, repository, chunkStore };
}

describe("runUploadGc", () => {
  it("expires stalled sessions and purges terminal ones past retention", async () => {
    const { engine, chunkStore } = createEngine(() => 1_000);
    const stalled = await engine.createSession({ ...file, sizeBytes: 20, chunkSize: 10 });
    await engine.uploadChunk({ uploadId: stalled.uploadId, index: 0, bytes: Buffer.alloc(10) });
    const done = await engine.createSession({ ...file, sizeBytes: 10, chunkSize: 10 });
    await engine.uploadChunk({ uploadId: done.uploadId, index: 0, bytes: Buffer.alloc(10) });
    await engine.completeSession(done.uploadId);
    const settings = { sessionTtlMs: 1_000, retentionMs: 5_000 };

    expect(await runUploadGc(engine, log, settings, 2_001)).toEqual({
      expired: [stalled.uploadId],
      purged: [],
    });
    expect(await chunkStore.listChunks(stalled.uploadId)).toEqual([]);

    expect(await runUploadGc(engine, log, settings, 7_000)).toEqual({
      expired: [],
      purged: [done.uploadId],
    });
    expect(await runUploadGc(engine, log, settings, 7_002)).toEqual({
      expired: [],
      purged: [stalled.uploadId],
    });
  });
});

describe("upload GC scheduler", () => {
  afterEach(async () => {
    await stopUploadGc();
    vi.useRealTimers();
  });

  it("expires sessions on its own schedule", async () => {
    vi.useFakeTimers({ now: 1_000_000 });
    const { engine } = createEngine();
    const { uploadId } = await engine.createSession({ ...file, sizeBytes: 10, chunkSize: 10 });

    startUploadGc(engine, log, { intervalMs: 500, sessionTtlMs: 1_000, retentionMs: 60_000 });
    expect(isUploadGcRunning()).toBe(true);

    await vi.advanceTimersByTimeAsync(1_000);
    expect((await engine.getStatus(uploadId)).status).toBe("pending");

    await vi.advanceTimersByTimeAsync(1_000);
    expect((await engine.getStatus(uploadId)).status).toBe("expired");
  });

  it("never overlaps sweeps and waits for the current one on stop", async () => {
    vi.useFakeTimers();
    const { engine } = createEngine();
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const expire = vi.spyOn(engine, "expireStalled").mockImplementation(async () => {
      await gate;
      return [];
    });
    const purge = vi.spyOn(engine, "purgeTerminated");

    startUploadGc(engine, log, { intervalMs: 100, sessionTtlMs: 1_000, retentionMs: 1_000 });
    await vi.advanceTimersByTimeAsync(350);
    expect(expire).toHaveBeenCalledTimes(1);

    const stopping = stopUploadGc();
    release();
    await stopping;

    expect(purge).toHaveBeenCalledTimes(1);
    expect(isUploadGcRunning()).toBe(false);
  });

  it("keeps running after a failed sweep", async () => {
    vi.useFakeTimers();
    const { engine } = createEngine();
    const expire = vi
      .spyOn(engine, "expireStalled")
      .mockRejectedValueOnce(new Error("redis down"));

    startUploadGc(engine, log, { intervalMs: 100, sessionTtlMs: 1_000, retentionMs: 1_000 });
    await vi.advanceTimersByTimeAsync(250);

    expect(expire).toHaveBeenCalledTimes(2);
  });
});

describe("reconcileOrphanUploads", () => {
  it("removes chunk data that no session owns", async () => {
    const { repository, chunkStore } = createEngine();
    await repository.create(newSession("known", { ...file, sizeBytes: 10, chunkSize: 10 }, 1_000));
    await chunkStore.writeChunk("known", { index: 0, writeId: "w-1" }, Buffer.from("a"));
    await chunkStore.writeChunk("orphan", { index: 0, writeId: "w-1" }, Buffer.from("b"));

    expect(await reconcileOrphanUploads(log, repository, chunkStore)).toEqual(["orphan"]);
    expect(await chunkStore.listUploads()).toEqual(["known"]);
  });

  it("skips ids it cannot check", async () => {
    const { repository, chunkStore } = createEngine();
    await chunkStore.writeChunk("unknown-a", { index: 0, writeId: "w-1" }, Buffer.from("a"));
    await chunkStore.writeChunk("unknown-b", { index: 0, writeId: "w-1" }, Buffer.from("b"));
    vi.spyOn(repository, "get").mockRejectedValueOnce(new Error("boom"));

    expect(await reconcileOrphanUploads(log, repository, chunkStore)).toEqual(["unknown-b"]);
    expect(await chunkStore.listUploads()).toEqual(["unknown-a"]);
  });
});
