// src/state/gc/upload.gc.worker.ts

import type { FastifyBaseLogger } from "fastify";
import type { ChunkUploadEngine } from "../../services/upload/upload.engine.js";

export interface UploadGcSettings {
  /** Inactivity after which a non-terminal session expires. */
  sessionTtlMs: number;
  /** How long terminal sessions stay readable before they are purged. */
  retentionMs: number;
}

export interface UploadGcResult {
  expired: string[];
  purged: string[];
}

/**
 * One sweep: expire stalled sessions, then purge terminal ones past
 * retention. Sessions expired in this sweep are never purged by it.
 */
export async function runUploadGc(
  engine: ChunkUploadEngine,
  log: FastifyBaseLogger,
  settings: UploadGcSettings,
  now: number = Date.now()
): Promise<UploadGcResult> {
  const expired = await engine.expireStalled(now, settings.sessionTtlMs);
  const purged = await engine.purgeTerminated(now, settings.retentionMs);

  if (expired.length > 0 || purged.length > 0) {
    log.info(
      { expired: expired.length, purged: purged.length },
      "Upload GC sweep finished"
    );
  }

  return { expired, purged };
}
