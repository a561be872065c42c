// src/services/upload/walrus.upload.ts

import type { Readable } from "stream";
import { nodeToWeb } from "../../utils/nodeToWeb.js";

export interface WalrusPublishResult {
  blobId: string;
  objectId?: string;
  cost?: number;
  endEpoch?: number;
}

function field(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null) return undefined;
  return Reflect.get(value, key);
}

function dig(value: unknown, ...keys: string[]): unknown {
  return keys.reduce<unknown>((acc, key) => field(acc, key), value);
}

function asString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function asNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/**
 * Publisher responses come in two shapes: `newlyCreated` for a fresh
 * blob and `alreadyCertified` when identical bytes were stored before.
 */
export function parsePublishResponse(json: unknown): WalrusPublishResult {
  const blobId =
    asString(dig(json, "newlyCreated", "blobObject", "blobId")) ??
    asString(dig(json, "alreadyCertified", "blobId")) ??
    asString(dig(json, "blobObject", "blobId"));

  if (!blobId) throw new Error("WALRUS_MISSING_BLOB_ID");

  return {
    blobId,
    objectId: asString(dig(json, "newlyCreated", "blobObject", "id")),
    cost: asNumber(dig(json, "newlyCreated", "cost")),
    endEpoch:
      asNumber(dig(json, "newlyCreated", "blobObject", "storage", "endEpoch")) ??
      asNumber(dig(json, "alreadyCertified", "endEpoch")),
  };
}

async function safeReadText(res: Response): Promise<string> {
  try {
    return await res.text();
  } catch {
    return "";
  }
}

export async function uploadToWalrusOnce(params: {
  publisherUrl: string;
  epochs: number;
  timeoutMs: number;
  streamFactory: () => Readable;
}): Promise<WalrusPublishResult> {
  if (!Number.isInteger(params.epochs) || params.epochs <= 0) {
    throw new Error("INVALID_EPOCHS");
  }

  const query = new URLSearchParams({ epochs: String(params.epochs) });

  const controller = new AbortController();
  const timeout = setTimeout(
    () => controller.abort(),
    params.timeoutMs
  );

  try {
    const res = await fetch(
      `${params.publisherUrl}/v1/blobs?${query.toString()}`,
      {
        method: "PUT",
        headers: { "Content-Type": "application/octet-stream" },
        body: nodeToWeb(params.streamFactory()),
        duplex: "half",
        signal: controller.signal,
      }
    );

    if (!res.ok) {
      const text = await safeReadText(res);
      throw new Error(`WALRUS_UPLOAD_FAILED:${res.status}:${text}`);
    }

    const json: unknown = await res.json();
    return parsePublishResponse(json);
  } finally {
    clearTimeout(timeout);
  }
}
