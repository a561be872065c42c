// src/state/gc/upload.gc.scheduler.ts

import type { FastifyBaseLogger } from "fastify";
import type { ChunkUploadEngine } from "../../services/upload/upload.engine.js";
import { runUploadGc, type UploadGcSettings } from "./upload.gc.worker.js";

export interface UploadGcSchedule extends UploadGcSettings {
  intervalMs: number;
}

let timer: NodeJS.Timeout | null = null;
let running: Promise<void> | null = null;

export function isUploadGcRunning(): boolean {
  return timer !== null;
}

export function startUploadGc(
  engine: ChunkUploadEngine,
  log: FastifyBaseLogger,
  schedule: UploadGcSchedule
) {
  if (timer) return;

  log.info({ intervalMs: schedule.intervalMs }, "Upload GC started");

  timer = setInterval(() => {
    if (running) return; // prevent overlap

    running = runUploadGc(engine, log, schedule)
      .then(() => undefined)
      .catch((err: unknown) => {
        log.error({ err }, "Upload GC failed");
      })
      .finally(() => {
        running = null;
      });
  }, schedule.intervalMs);

  timer.unref();
}

export async function stopUploadGc(): Promise<void> {
  if (timer) {
    clearInterval(timer);
    timer = null;
  }

  if (running) {
    await running;
    running = null;
  }
}
