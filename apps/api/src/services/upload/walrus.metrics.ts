// src/services/upload/walrus.metrics.ts

import type { Readable } from "stream";
import type PQueue from "p-queue";
import type { FastifyBaseLogger } from "fastify";

import { uploadToWalrusOnce, type WalrusPublishResult } from "./walrus.upload.js";
import type { WalrusConfig } from "../../config/walrus.config.js";
import { UploadError } from "./upload.errors.js";
import {
  recordWalrusUploadMetric,
  classifyWalrusError,
  extractWalrusHttpStatus,
} from "../../types/walrus.metrics.js";

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

function isPermanent(err: unknown): boolean {
  // Chunk store corruption will not heal on retry.
  return err instanceof UploadError && !err.retryable;
}

export async function uploadToWalrusWithMetrics(
  params: {
    uploadId: string;
    sizeBytes: number;
    streamFactory: () => Readable;
  },
  deps: {
    config: WalrusConfig;
    queue: PQueue;
    log: FastifyBaseLogger;
  }
): Promise<WalrusPublishResult> {
  const { config, queue, log } = deps;
  const start = Date.now();
  let lastError: unknown;
  let attempts = 0;

  try {
    const result = await queue.add(
      async () => {
        for (let attempt = 1; attempt <= config.maxRetries; attempt++) {
          attempts = attempt;
          try {
            const res = await uploadToWalrusOnce({
              publisherUrl: config.publisherUrl,
              epochs: config.epochs,
              timeoutMs: config.timeoutMs,
              streamFactory: params.streamFactory,
            });

            recordWalrusUploadMetric(log, {
              uploadId: params.uploadId,
              sizeBytes: params.sizeBytes,
              epochs: config.epochs,
              attempt,
              durationMs: Date.now() - start,
              outcome: "success",
              timestamp: Date.now(),
            });

            return res;
          } catch (err) {
            lastError = err;
            if (isPermanent(err) || attempt === config.maxRetries) break;
            log.warn(
              { uploadId: params.uploadId, attempt, err },
              "Walrus publish attempt failed; retrying"
            );
            await sleep(config.baseRetryDelayMs * attempt);
          }
        }

        throw lastError ?? new Error("WALRUS_RETRIES_EXHAUSTED");
      },
      { throwOnTimeout: true }
    );

    return result;
  } catch (err) {
    recordWalrusUploadMetric(log, {
      uploadId: params.uploadId,
      sizeBytes: params.sizeBytes,
      epochs: config.epochs,
      attempt: attempts,
      durationMs: Date.now() - start,
      outcome: classifyWalrusError(err),
      error: err instanceof Error ? err.message : "unknown",
      httpStatus: extractWalrusHttpStatus(err),
      timestamp: Date.now(),
    });

    throw err;
  }
}
