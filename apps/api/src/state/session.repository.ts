// src/state/session.repository.ts

import type { UploadSession, UploadStatus } from "../types/upload.js";

/**
 * Pure transformation of the latest stored record. It may throw to
 * abort the swap; nothing is written in that case.
 */
export type SessionMutator = (latest: UploadSession) => UploadSession;

export interface SessionRepository {
  get(uploadId: string): Promise<UploadSession | null>;

  /** Fails when a session with the same id already exists. */
  create(session: UploadSession): Promise<void>;

  /**
   * Sole mutation entry point. Applies `mutator` to the latest record when
   * its status is one of `expected` and bumps `version`.
   *
   * @throws SessionNotFoundError when the record does not exist
   * @throws ConflictError when the status differs or a concurrent writer won
   */
  compareAndSwap(
    uploadId: string,
    expected: readonly UploadStatus[],
    mutator: SessionMutator
  ): Promise<UploadSession>;

  /** Records that cannot be read are skipped, so one bad entry never hides the rest. */
  list(): Promise<UploadSession[]>;

  delete(uploadId: string): Promise<void>;

  ping(): Promise<void>;
}
