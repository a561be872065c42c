// src/types/upload.ts

export type UploadStatus =
  | "pending"
  | "in_progress"
  | "merging"
  | "completed"
  | "failed"
  | "expired";

export const UPLOAD_STATUSES: readonly UploadStatus[] = [
  "pending",
  "in_progress",
  "merging",
  "completed",
  "failed",
  "expired",
];

export const TERMINAL_STATUSES: readonly UploadStatus[] = [
  "completed",
  "failed",
  "expired",
];

export const NON_TERMINAL_STATUSES: readonly UploadStatus[] = [
  "pending",
  "in_progress",
  "merging",
];

export type FailureReason = "canceled" | "chunk_store_corrupt";

export interface UploadSession {
  uploadId: string;
  filename: string;
  contentType: string;
  sizeBytes: number;
  chunkSize: number;
  totalChunks: number;
  // Sorted, unique.
  receivedChunks: number[];
  // Index -> writeId of the stored bytes that count for that index.
  chunkWrites: Record<string, string>;
  status: UploadStatus;
  createdAt: number;
  updatedAt: number;
  lastActivityAt: number;
  completedAt?: number;
  resultReference?: string;
  failureReason?: FailureReason;
  version: number;
}

export interface CreateSessionInput {
  filename: string;
  contentType: string;
  sizeBytes: number;
  chunkSize: number;
}

export interface UploadChunkInput {
  uploadId: string;
  index: number;
  bytes: Uint8Array;
  /** Hex SHA-256 of `bytes`, checked when present. */
  sha256?: string;
}

export interface UploadChunkResult {
  receivedCount: number;
  totalChunks: number;
}

export interface CompleteUploadResult {
  resultReference: string;
}

export interface UploadStatusView {
  uploadId: string;
  filename: string;
  contentType: string;
  sizeBytes: number;
  chunkSize: number;
  status: UploadStatus;
  receivedCount: number;
  totalChunks: number;
  missingIndices: Iterable<number>;
  receivedBytes: number;
  progress: number;
  createdAt: number;
  updatedAt: number;
  expiresAt: number | null;
  completedAt?: number;
  resultReference?: string;
  failureReason?: FailureReason;
}

export function isTerminalStatus(status: UploadStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function isUploadStatus(value: unknown): value is UploadStatus {
  return (
    typeof value === "string" &&
    UPLOAD_STATUSES.some((status) => status === value)
  );
}
