// src/state/memory.session.repository.ts

import type { UploadSession, UploadStatus } from "../types/upload.js";
import type { SessionMutator, SessionRepository } from "./session.repository.js";
import {
  ConflictError,
  SessionNotFoundError,
  StorageUnavailableError,
} from "../services/upload/upload.errors.js";

export class MemorySessionRepository implements SessionRepository {
  private readonly sessions = new Map<string, UploadSession>();

  async get(uploadId: string): Promise<UploadSession | null> {
    const session = this.sessions.get(uploadId);
    return session ? structuredClone(session) : null;
  }

  async create(session: UploadSession): Promise<void> {
    if (this.sessions.has(session.uploadId)) {
      throw new StorageUnavailableError(`UPLOAD_ID_COLLISION ${session.uploadId}`);
    }
    this.sessions.set(session.uploadId, structuredClone(session));
  }

  // Check and write happen without an intervening await.
  async compareAndSwap(
    uploadId: string,
    expected: readonly UploadStatus[],
    mutator: SessionMutator
  ): Promise<UploadSession> {
    const current = this.sessions.get(uploadId);
    if (!current) throw new SessionNotFoundError(uploadId);

    if (!expected.includes(current.status)) {
      throw new ConflictError(uploadId, `status is ${current.status}`);
    }

    const next = {
      ...mutator(structuredClone(current)),
      uploadId,
      version: current.version + 1,
    };
    this.sessions.set(uploadId, next);
    return structuredClone(next);
  }

  async list(): Promise<UploadSession[]> {
    return [...this.sessions.values()].map((session) => structuredClone(session));
  }

  async delete(uploadId: string): Promise<void> {
    this.sessions.delete(uploadId);
  }

  async ping(): Promise<void> {}
}
