// src/types/walrus.metrics.ts

import type { FastifyBaseLogger } from "fastify";

export type WalrusUploadOutcome =
  | "success"
  | "auth_failed"
  | "rate_limited"
  | "network_error"
  | "timeout"
  | "client_error"
  | "server_error"
  | "invalid_response"
  | "unknown_error";

export interface WalrusUploadMetric {
  uploadId: string;
  sizeBytes: number;
  epochs: number;
  attempt: number;
  durationMs: number;
  outcome: WalrusUploadOutcome;
  error?: string;
  httpStatus?: number;
  timestamp: number;
}

export function recordWalrusUploadMetric(
  log: FastifyBaseLogger,
  metric: WalrusUploadMetric
) {
  log.info({ metric }, "walrus.upload.metric");
}

export function extractWalrusHttpStatus(err: unknown): number | undefined {
  const msg = err instanceof Error ? err.message : String(err);
  const m = msg.match(/WALRUS_UPLOAD_FAILED:(\d{3})\b/);
  if (!m) return undefined;
  const status = Number(m[1]);
  return Number.isFinite(status) ? status : undefined;
}

export function classifyWalrusError(
  err: unknown
): WalrusUploadOutcome {
  if (err instanceof Error && err.name === "AbortError") return "timeout";

  const msg = (err instanceof Error ? err.message : String(err)).toUpperCase();

  const status = extractWalrusHttpStatus(err);
  if (status !== undefined) {
    if (status === 401 || status === 403) return "auth_failed";
    if (status === 429) return "rate_limited";
    if (status >= 400 && status <= 499) return "client_error";
    if (status >= 500 && status <= 599) return "server_error";
  }

  if (msg.includes("AUTH")) return "auth_failed";
  if (
    msg.includes("ECONN") ||
    msg.includes("ENOTFOUND") ||
    msg.includes("EAI_AGAIN") ||
    msg.includes("ETIMEDOUT") ||
    msg.includes("NETWORK") ||
    msg.includes("FETCH")
  )
    return "network_error";
  if (msg.includes("SERVER")) return "server_error";
  if (msg.includes("MISSING_BLOB_ID")) return "invalid_response";
  if (msg.includes("INVALID")) return "invalid_response";

  return "unknown_error";
}
