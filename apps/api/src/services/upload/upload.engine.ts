// src/services/upload/upload.engine.ts

import crypto from "crypto";
import type { FastifyBaseLogger } from "fastify";

import type {
  CompleteUploadResult,
  CreateSessionInput,
  UploadChunkInput,
  UploadChunkResult,
  UploadSession,
  UploadStatus,
  UploadStatusView,
} from "../../types/upload.js";
import { NON_TERMINAL_STATUSES, isTerminalStatus } from "../../types/upload.js";
import type { SessionMutator, SessionRepository } from "../../state/session.repository.js";
import type { ChunkRef, ChunkStore } from "../../store/chunk.store.js";
import type { ArtifactStore } from "../../store/artifact.store.js";
import {
  computeTotalChunks,
  expectedChunkBytes,
  missingChunkIndices,
  newSession,
  toStatusView,
  withReceivedChunk,
} from "./upload.session.js";
import {
  ChunkCorruptError,
  ChunkNotFoundError,
  ConflictError,
  CorruptSessionError,
  IncompleteUploadError,
  InvalidChunkError,
  InvalidChunkIndexError,
  InvalidUploadRequestError,
  MergeError,
  MergeInProgressError,
  SessionNotFoundError,
  SessionTerminalError,
  StorageUnavailableError,
  UploadError,
  UploadLimitError,
} from "./upload.errors.js";

const ACCEPTING: readonly UploadStatus[] = ["pending", "in_progress"];

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

// Aborts a swap whose precondition no longer holds without reporting an error.
class SkipTransition extends Error {}

type Guard = (session: UploadSession) => void;

function assertAcceptsChunks(session: UploadSession): void {
  if (!ACCEPTING.includes(session.status)) {
    throw new SessionTerminalError(session.uploadId, session.status);
  }
}

function assertCompletable(session: UploadSession): void {
  if (session.status === "merging") {
    throw new MergeInProgressError(session.uploadId);
  }
  assertAcceptsChunks(session);

  const missing = [...missingChunkIndices(session)];
  if (missing.length > 0) {
    throw new IncompleteUploadError(session.uploadId, missing);
  }
}

function assertMerging(session: UploadSession): void {
  if (session.status !== "merging") {
    throw new SessionTerminalError(session.uploadId, session.status);
  }
}

function assertCancelable(session: UploadSession): void {
  if (session.status === "failed" || session.status === "expired") {
    throw new SkipTransition();
  }
  if (session.status === "merging") {
    throw new MergeInProgressError(session.uploadId);
  }
  assertAcceptsChunks(session);
}

function isStalled(session: UploadSession, now: number, ttlMs: number): boolean {
  return !isTerminalStatus(session.status) && now - session.lastActivityAt > ttlMs;
}

function completedReference(session: UploadSession): string {
  if (!session.resultReference) {
    throw new CorruptSessionError(session.uploadId, "completed without resultReference");
  }
  return session.resultReference;
}

function committedChunk(session: UploadSession, index: number): ChunkRef {
  const writeId = session.chunkWrites[String(index)];
  if (writeId === undefined) throw new ChunkNotFoundError(session.uploadId, index);
  return { index, writeId };
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0;
}

export interface ChunkUploadEngineOptions {
  repository: SessionRepository;
  chunkStore: ChunkStore;
  artifactStore: ArtifactStore;
  log: FastifyBaseLogger;
  sessionTtlMs: number;
  maxFileSizeBytes?: number;
  maxTotalChunks?: number;
  /** Compare-and-swap attempts before giving up with StorageUnavailableError. */
  maxCasAttempts?: number;
  casRetryDelayMs?: number;
  now?: () => number;
  idFactory?: () => string;
}

export class ChunkUploadEngine {
  private readonly repository: SessionRepository;
  private readonly chunkStore: ChunkStore;
  private readonly artifactStore: ArtifactStore;
  private readonly log: FastifyBaseLogger;
  readonly sessionTtlMs: number;
  private readonly maxFileSizeBytes: number | undefined;
  private readonly maxTotalChunks: number | undefined;
  private readonly maxCasAttempts: number;
  private readonly casRetryDelayMs: number;
  private readonly now: () => number;
  private readonly idFactory: () => string;

  constructor(options: ChunkUploadEngineOptions) {
    this.repository = options.repository;
    this.chunkStore = options.chunkStore;
    this.artifactStore = options.artifactStore;
    this.log = options.log;
    this.sessionTtlMs = options.sessionTtlMs;
    this.maxFileSizeBytes = options.maxFileSizeBytes;
    this.maxTotalChunks = options.maxTotalChunks;
    this.maxCasAttempts = Math.max(1, options.maxCasAttempts ?? 8);
    this.casRetryDelayMs = options.casRetryDelayMs ?? 25;
    this.now = options.now ?? Date.now;
    this.idFactory = options.idFactory ?? (() => crypto.randomUUID());
  }

  async createSession(input: CreateSessionInput): Promise<UploadSession> {
    if (typeof input.filename !== "string" || input.filename.trim() === "") {
      throw new InvalidUploadRequestError("filename must be a non-empty string");
    }
    if (typeof input.contentType !== "string") {
      throw new InvalidUploadRequestError("contentType must be a string");
    }
    if (!isPositiveInteger(input.sizeBytes)) {
      throw new InvalidUploadRequestError("sizeBytes must be a positive integer");
    }
    if (!isPositiveInteger(input.chunkSize)) {
      throw new InvalidUploadRequestError("chunkSize must be a positive integer");
    }

    if (this.maxFileSizeBytes !== undefined && input.sizeBytes > this.maxFileSizeBytes) {
      throw new UploadLimitError(
        "FILE_TOO_LARGE",
        `sizeBytes exceeds the ${this.maxFileSizeBytes} byte limit`
      );
    }

    const totalChunks = computeTotalChunks(input.sizeBytes, input.chunkSize);
    if (this.maxTotalChunks !== undefined && totalChunks > this.maxTotalChunks) {
      throw new UploadLimitError(
        "TOO_MANY_CHUNKS",
        `Upload would need ${totalChunks} chunks; the limit is ${this.maxTotalChunks}`
      );
    }

    const session = newSession(this.idFactory(), input, this.now());
    await this.repository.create(session);

    this.log.info(
      {
        uploadId: session.uploadId,
        sizeBytes: session.sizeBytes,
        chunkSize: session.chunkSize,
        totalChunks: session.totalChunks,
      },
      "Upload session created"
    );

    return session;
  }

  async uploadChunk(input: UploadChunkInput): Promise<UploadChunkResult> {
    const { uploadId, index, bytes } = input;
    const session = await this.requireSession(uploadId);
    assertAcceptsChunks(session);

    if (!Number.isInteger(index) || index < 0 || index >= session.totalChunks) {
      throw new InvalidChunkIndexError(index, session.totalChunks);
    }

    const expectedBytes = expectedChunkBytes(session, index);
    if (bytes.byteLength !== expectedBytes) {
      throw new InvalidChunkError(
        "CHUNK_SIZE_MISMATCH",
        `Chunk ${index} must be ${expectedBytes} bytes, got ${bytes.byteLength}`,
        { index, expectedBytes, actualBytes: bytes.byteLength }
      );
    }

    if (input.sha256 !== undefined) {
      const actual = crypto.createHash("sha256").update(bytes).digest("hex");
      if (actual !== input.sha256.toLowerCase()) {
        throw new InvalidChunkError("HASH_MISMATCH", `Chunk ${index} failed its SHA-256 check`, {
          index,
        });
      }
    }

    // Merges read only the writeId committed below.
    const chunk: ChunkRef = { index, writeId: crypto.randomUUID() };
    await this.chunkStore.writeChunk(uploadId, chunk, bytes);

    const previous: { writeId?: string } = {};
    let updated: UploadSession;
    try {
      updated = await this.transition(uploadId, ACCEPTING, assertAcceptsChunks, (latest) => {
        const now = this.now();
        previous.writeId = latest.chunkWrites[String(index)];
        return {
          ...latest,
          status: "in_progress",
          receivedChunks: withReceivedChunk(latest.receivedChunks, index),
          chunkWrites: { ...latest.chunkWrites, [String(index)]: chunk.writeId },
          updatedAt: now,
          lastActivityAt: now,
        };
      });
    } catch (err) {
      if (err instanceof SessionTerminalError || err instanceof SessionNotFoundError) {
        await this.discardChunk(uploadId, chunk);
      }
      throw err;
    }

    if (previous.writeId !== undefined) {
      await this.discardChunk(uploadId, { index, writeId: previous.writeId });
    }

    return {
      receivedCount: updated.receivedChunks.length,
      totalChunks: updated.totalChunks,
    };
  }

  async completeSession(uploadId: string): Promise<CompleteUploadResult> {
    const session = await this.requireSession(uploadId);
    if (session.status === "completed") {
      return { resultReference: completedReference(session) };
    }
    assertCompletable(session);

    let merging: UploadSession;
    try {
      merging = await this.transition(uploadId, ACCEPTING, assertCompletable, (latest) => ({
        ...latest,
        status: "merging",
        updatedAt: this.now(),
      }));
    } catch (err) {
      // Another caller may have finished the merge while this one raced for it.
      if (err instanceof SessionTerminalError) {
        const latest = await this.repository.get(uploadId);
        if (latest?.status === "completed") {
          return { resultReference: completedReference(latest) };
        }
      }
      throw err;
    }

    return this.merge(merging);
  }

  async getStatus(uploadId: string): Promise<UploadStatusView> {
    const session = await this.requireSession(uploadId);
    return toStatusView(session, this.sessionTtlMs);
  }

  async cancelSession(uploadId: string): Promise<UploadSession> {
    let canceled: UploadSession;
    try {
      const session = await this.requireSession(uploadId);
      assertCancelable(session);

      canceled = await this.transition(uploadId, ACCEPTING, assertCancelable, (latest) => ({
        ...latest,
        status: "failed",
        failureReason: "canceled",
        updatedAt: this.now(),
      }));
    } catch (err) {
      if (err instanceof SkipTransition) return this.requireSession(uploadId);
      throw err;
    }

    await this.releaseChunks(uploadId);
    this.log.info({ uploadId }, "Upload canceled");
    return canceled;
  }

  async expireStalled(now: number, ttlMs: number): Promise<string[]> {
    const sessions = await this.repository.list();
    const expired: string[] = [];

    const guard: Guard = (latest) => {
      if (!isStalled(latest, now, ttlMs)) throw new SkipTransition();
    };

    for (const session of sessions) {
      if (!isStalled(session, now, ttlMs)) continue;
      const { uploadId } = session;

      try {
        await this.transition(uploadId, NON_TERMINAL_STATUSES, guard, (latest) => ({
          ...latest,
          status: "expired",
          updatedAt: now,
        }));
      } catch (err) {
        if (err instanceof SkipTransition) continue;
        this.log.error({ err, uploadId }, "Failed to expire upload session");
        continue;
      }

      await this.releaseChunks(uploadId);
      this.log.warn(
        { uploadId, lastActivityAt: session.lastActivityAt, status: session.status },
        "Upload session expired"
      );
      expired.push(uploadId);
    }

    return expired;
  }

  async purgeTerminated(now: number, retentionMs: number): Promise<string[]> {
    const sessions = await this.repository.list();
    const purged: string[] = [];

    for (const session of sessions) {
      if (!isTerminalStatus(session.status)) continue;
      const terminatedAt = session.completedAt ?? session.updatedAt;
      if (now - terminatedAt <= retentionMs) continue;

      const { uploadId } = session;
      try {
        // Late writers can leave bytes behind after the session ended.
        await this.chunkStore.cleanup(uploadId);
        await this.repository.delete(uploadId);
      } catch (err) {
        this.log.error({ err, uploadId }, "Failed to purge upload session");
        continue;
      }

      this.log.info({ uploadId, status: session.status }, "Upload session purged");
      purged.push(uploadId);
    }

    return purged;
  }

  private async merge(session: UploadSession): Promise<CompleteUploadResult> {
    const { uploadId } = session;
    const start = this.now();

    let reference: string;
    try {
      const stored = new Set(
        (await this.chunkStore.listChunks(uploadId)).map(
          (chunk) => `${chunk.index}.${chunk.writeId}`
        )
      );
      for (let index = 0; index < session.totalChunks; index++) {
        const chunk = committedChunk(session, index);
        if (!stored.has(`${index}.${chunk.writeId}`)) {
          throw new ChunkNotFoundError(uploadId, index);
        }
      }

      reference = await this.artifactStore.store({
        uploadId,
        filename: session.filename,
        contentType: session.contentType,
        sizeBytes: session.sizeBytes,
        chunks: this.orderedChunks(session),
      });
    } catch (err) {
      throw await this.abortMerge(session, err);
    }

    try {
      await this.transition(uploadId, ["merging"], assertMerging, (latest) => {
        const now = this.now();
        return {
          ...latest,
          status: "completed",
          resultReference: reference,
          completedAt: now,
          updatedAt: now,
        };
      });
    } catch (err) {
      this.log.warn({ err, uploadId, reference }, "Merge finished after the session moved on; discarding artifact");
      await this.artifactStore.discard(reference).catch((discardErr: unknown) => {
        this.log.error({ err: discardErr, uploadId, reference }, "Failed to discard artifact");
      });
      throw err;
    }

    await this.releaseChunks(uploadId);

    this.log.info(
      { uploadId, reference, sizeBytes: session.sizeBytes, durationMs: this.now() - start },
      "Upload completed"
    );

    return { resultReference: reference };
  }

  /**
   * Settles a merge that could not store its artifact and returns the error
   * the caller should see. Missing or damaged chunks fail the session for
   * good; anything else puts it back to `in_progress` so completion can be
   * retried.
   */
  private async abortMerge(session: UploadSession, err: unknown): Promise<UploadError> {
    const { uploadId } = session;

    if (err instanceof ChunkNotFoundError || err instanceof ChunkCorruptError) {
      this.log.error({ err, uploadId }, "Chunk store lost data for a received chunk");
      await this.transition(uploadId, ["merging"], assertMerging, (latest) => ({
        ...latest,
        status: "failed",
        failureReason: "chunk_store_corrupt",
        updatedAt: this.now(),
      }));
      await this.releaseChunks(uploadId);
      return new MergeError(uploadId, false, err);
    }

    this.log.warn({ err, uploadId }, "Merge failed; reverting to in_progress");
    await this.transition(uploadId, ["merging"], assertMerging, (latest) => ({
      ...latest,
      status: "in_progress",
      updatedAt: this.now(),
    }));

    if (err instanceof StorageUnavailableError || !(err instanceof UploadError)) {
      return new MergeError(uploadId, true, err);
    }
    return err;
  }

  /**
   * Committed chunk payloads in ascending index order. Every iteration reads the
   * store again, so an artifact store may restart the sequence on retry.
   */
  private orderedChunks(session: UploadSession): AsyncIterable<Uint8Array> {
    const chunkStore = this.chunkStore;

    return {
      async *[Symbol.asyncIterator]() {
        for (let index = 0; index < session.totalChunks; index++) {
          const bytes = await chunkStore.readChunk(
            session.uploadId,
            committedChunk(session, index)
          );
          const expectedBytes = expectedChunkBytes(session, index);
          if (bytes.byteLength !== expectedBytes) {
            throw new ChunkCorruptError(session.uploadId, index, expectedBytes, bytes.byteLength);
          }
          yield bytes;
        }
      },
    };
  }

  /**
   * Applies `apply` through compare-and-swap. `guard` runs against the
   * latest record inside the swap and again after every conflict, so a
   * status change surfaces as its typed error instead of a retry.
   */
  private async transition(
    uploadId: string,
    expected: readonly UploadStatus[],
    guard: Guard,
    apply: SessionMutator
  ): Promise<UploadSession> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.repository.compareAndSwap(uploadId, expected, (latest) => {
          guard(latest);
          return apply(latest);
        });
      } catch (err) {
        if (!(err instanceof ConflictError)) throw err;

        guard(await this.requireSession(uploadId));

        if (attempt >= this.maxCasAttempts) {
          throw new StorageUnavailableError(
            `Session ${uploadId} kept changing; gave up after ${attempt} attempts`,
            err
          );
        }
        await sleep(this.casRetryDelayMs * attempt);
      }
    }
  }

  private async requireSession(uploadId: string): Promise<UploadSession> {
    const session = await this.repository.get(uploadId);
    if (!session) throw new SessionNotFoundError(uploadId);
    return session;
  }

  private async discardChunk(uploadId: string, chunk: ChunkRef): Promise<void> {
    try {
      await this.chunkStore.deleteChunk(uploadId, chunk);
    } catch (err) {
      this.log.warn({ err, uploadId, ...chunk }, "Failed to delete chunk write; the reaper will retry");
    }
  }

  private async releaseChunks(uploadId: string): Promise<void> {
    try {
      await this.chunkStore.cleanup(uploadId);
    } catch (err) {
      this.log.warn({ err, uploadId }, "Failed to release chunk data; the reaper will retry");
    }
  }
}
