// apps/api/src/config/walrus.config.ts

import { parsePositiveIntEnv, type Env } from "./uploads.config.js";

function assertHttpUrl(name: string, url: string) {
  if (!/^https?:\/\//.test(url)) {
    throw new Error(`${name} must start with http:// or https://`);
  }
}

export const WalrusEpochLimits = {
  min: 1,
  max: 90,
  default: 3,
} as const;

export interface WalrusConfig {
  publisherUrl: string;
  epochs: number;
  timeoutMs: number;

  maxRetries: number;
  baseRetryDelayMs: number;

  queue: {
    /**
     * Max concurrent Walrus publish requests.
     */
    concurrency: number;

    /**
     * Max jobs per interval window.
     */
    intervalCap: number;

    /**
     * Interval window in ms.
     */
    intervalMs: number;
  };
}

export function loadWalrusConfig(env: Env = process.env): WalrusConfig {
  const publisherUrl = env.WALRUS_PUBLISHER_URL?.trim();
  if (!publisherUrl) {
    throw new Error("Missing required env: WALRUS_PUBLISHER_URL");
  }
  assertHttpUrl("WALRUS_PUBLISHER_URL", publisherUrl);

  const epochs = parsePositiveIntEnv(env, "WALRUS_EPOCHS", WalrusEpochLimits.default);
  if (epochs > WalrusEpochLimits.max) {
    throw new Error(`WALRUS_EPOCHS must be <= ${WalrusEpochLimits.max}`);
  }

  return {
    publisherUrl: publisherUrl.replace(/\/$/, ""),
    epochs,
    timeoutMs: parsePositiveIntEnv(env, "WALRUS_UPLOAD_TIMEOUT_MS", 5 * 60 * 1000), // 5 min
    maxRetries: parsePositiveIntEnv(env, "WALRUS_UPLOAD_MAX_RETRIES", 3),
    baseRetryDelayMs: parsePositiveIntEnv(env, "WALRUS_UPLOAD_RETRY_DELAY_MS", 2000),
    queue: {
      concurrency: parsePositiveIntEnv(env, "WALRUS_QUEUE_CONCURRENCY", 3),
      intervalCap: parsePositiveIntEnv(env, "WALRUS_QUEUE_INTERVAL_CAP", 1),
      intervalMs: parsePositiveIntEnv(env, "WALRUS_QUEUE_INTERVAL_MS", 1500),
    },
  };
}
