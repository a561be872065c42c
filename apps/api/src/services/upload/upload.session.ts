// src/services/upload/upload.session.ts

import type {
  CreateSessionInput,
  UploadSession,
  UploadStatusView,
} from "../../types/upload.js";
import { isTerminalStatus } from "../../types/upload.js";

export function computeTotalChunks(sizeBytes: number, chunkSize: number): number {
  return Math.ceil(sizeBytes / chunkSize);
}

/**
 * Exact byte length chunk `index` must have. Every chunk is `chunkSize`
 * except the last, which carries the remainder.
 */
export function expectedChunkBytes(
  session: Pick<UploadSession, "sizeBytes" | "chunkSize" | "totalChunks">,
  index: number
): number {
  const isLastChunk = index === session.totalChunks - 1;
  return isLastChunk
    ? session.sizeBytes - session.chunkSize * (session.totalChunks - 1)
    : session.chunkSize;
}

export function newSession(
  uploadId: string,
  input: CreateSessionInput,
  now: number
): UploadSession {
  return {
    uploadId,
    filename: input.filename,
    contentType: input.contentType,
    sizeBytes: input.sizeBytes,
    chunkSize: input.chunkSize,
    totalChunks: computeTotalChunks(input.sizeBytes, input.chunkSize),
    receivedChunks: [],
    chunkWrites: {},
    status: "pending",
    createdAt: now,
    updatedAt: now,
    lastActivityAt: now,
    version: 0,
  };
}

export function withReceivedChunk(received: readonly number[], index: number): number[] {
  if (received.includes(index)) return [...received];
  return [...received, index].sort((a, b) => a - b);
}

/**
 * Ascending indices in `[0, totalChunks)` that have not been received.
 * Each iteration walks the range again, so the result can be consumed
 * more than once.
 */
export function missingChunkIndices(
  session: Pick<UploadSession, "totalChunks" | "receivedChunks">
): Iterable<number> {
  const received = new Set(session.receivedChunks);
  const totalChunks = session.totalChunks;

  return {
    *[Symbol.iterator]() {
      for (let i = 0; i < totalChunks; i++) {
        if (!received.has(i)) yield i;
      }
    },
  };
}

export function receivedBytes(session: UploadSession): number {
  let total = 0;
  for (const index of session.receivedChunks) {
    total += expectedChunkBytes(session, index);
  }
  return total;
}

export function toStatusView(
  session: UploadSession,
  sessionTtlMs: number
): UploadStatusView {
  const bytes = receivedBytes(session);

  return {
    uploadId: session.uploadId,
    filename: session.filename,
    contentType: session.contentType,
    sizeBytes: session.sizeBytes,
    chunkSize: session.chunkSize,
    status: session.status,
    receivedCount: session.receivedChunks.length,
    totalChunks: session.totalChunks,
    missingIndices: missingChunkIndices(session),
    receivedBytes: bytes,
    progress: Math.min(100, (bytes / session.sizeBytes) * 100),
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
    expiresAt: isTerminalStatus(session.status)
      ? null
      : session.lastActivityAt + sessionTtlMs,
    ...(session.completedAt !== undefined && { completedAt: session.completedAt }),
    ...(session.resultReference !== undefined && {
      resultReference: session.resultReference,
    }),
    ...(session.failureReason !== undefined && {
      failureReason: session.failureReason,
    }),
  };
}
