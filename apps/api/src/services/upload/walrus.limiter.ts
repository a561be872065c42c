// src/services/upload/walrus.limiter.ts

import PQueue from "p-queue";
import type { WalrusConfig } from "../../config/walrus.config.js";

export function createWalrusQueue(limits: WalrusConfig["queue"]): PQueue {
  return new PQueue({
    concurrency: limits.concurrency,
    intervalCap: limits.intervalCap,
    interval: limits.intervalMs,
    carryoverConcurrencyCount: true,
  });
}
