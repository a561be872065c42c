// src/state/gc/upload.gc.reconcile.ts

import type { FastifyBaseLogger } from "fastify";

import type { SessionRepository } from "../session.repository.js";
import type { ChunkStore } from "../../store/chunk.store.js";

/**
 * Deletes chunk data whose upload id has no session record, e.g. bytes a
 * late writer left behind after the session was purged. Run at start-up.
 */
export async function reconcileOrphanUploads(
  log: FastifyBaseLogger,
  repository: SessionRepository,
  chunkStore: ChunkStore
): Promise<string[]> {
  const uploadIds = await chunkStore.listUploads();
  const removed: string[] = [];

  for (const uploadId of uploadIds) {
    try {
      const session = await repository.get(uploadId);
      if (session) continue;

      log.warn({ uploadId }, "Removing orphan chunk data");
      await chunkStore.cleanup(uploadId);
      removed.push(uploadId);
    } catch (err) {
      log.error({ err, uploadId }, "Failed to reconcile upload");
    }
  }

  return removed;
}
