// src/state/session.codec.ts

import type { FailureReason, UploadSession } from "../types/upload.js";
import { isUploadStatus } from "../types/upload.js";
import { CorruptSessionError } from "../services/upload/upload.errors.js";

type StoredSession = Omit<UploadSession, "version">;

export function encodeSession(session: UploadSession): string {
  const { version: _version, ...stored } = session;
  const data: StoredSession = stored;
  return JSON.stringify(data);
}

function field(record: object, key: string): unknown {
  return Reflect.get(record, key);
}

function isFailureReason(value: unknown): value is FailureReason {
  return value === "canceled" || value === "chunk_store_corrupt";
}

function isIndexList(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => Number.isInteger(v) && v >= 0);
}

function isChunkWrites(value: unknown): value is Record<string, string> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  return Object.entries(value).every(
    ([index, writeId]) => /^\d+$/.test(index) && typeof writeId === "string"
  );
}

export function decodeSession(
  uploadId: string,
  raw: { version?: unknown; data?: unknown }
): UploadSession {
  const version = Number(raw.version);
  if (!Number.isInteger(version) || version < 0) {
    throw new CorruptSessionError(uploadId, "invalid version");
  }

  if (typeof raw.data !== "string") {
    throw new CorruptSessionError(uploadId, "missing data");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.data);
  } catch {
    throw new CorruptSessionError(uploadId, "data is not JSON");
  }

  if (typeof parsed !== "object" || parsed === null) {
    throw new CorruptSessionError(uploadId, "data is not an object");
  }

  const filename = field(parsed, "filename");
  const contentType = field(parsed, "contentType");
  const sizeBytes = field(parsed, "sizeBytes");
  const chunkSize = field(parsed, "chunkSize");
  const totalChunks = field(parsed, "totalChunks");
  const receivedChunks = field(parsed, "receivedChunks");
  const chunkWrites = field(parsed, "chunkWrites");
  const status = field(parsed, "status");
  const createdAt = field(parsed, "createdAt");
  const updatedAt = field(parsed, "updatedAt");
  const lastActivityAt = field(parsed, "lastActivityAt");
  const completedAt = field(parsed, "completedAt");
  const resultReference = field(parsed, "resultReference");
  const failureReason = field(parsed, "failureReason");

  if (
    typeof filename !== "string" ||
    typeof contentType !== "string" ||
    typeof sizeBytes !== "number" ||
    typeof chunkSize !== "number" ||
    typeof totalChunks !== "number" ||
    !Number.isInteger(totalChunks) ||
    !isIndexList(receivedChunks) ||
    !isChunkWrites(chunkWrites) ||
    !isUploadStatus(status) ||
    typeof createdAt !== "number" ||
    typeof updatedAt !== "number" ||
    typeof lastActivityAt !== "number"
  ) {
    throw new CorruptSessionError(uploadId, "missing or mistyped fields");
  }

  return {
    uploadId,
    filename,
    contentType,
    sizeBytes,
    chunkSize,
    totalChunks,
    receivedChunks,
    chunkWrites,
    status,
    createdAt,
    updatedAt,
    lastActivityAt,
    ...(typeof completedAt === "number" && { completedAt }),
    ...(typeof resultReference === "string" && { resultReference }),
    ...(isFailureReason(failureReason) && { failureReason }),
    version,
  };
}
