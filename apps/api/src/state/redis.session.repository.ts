// src/state/redis.session.repository.ts

import type { Redis } from "@upstash/redis";
import type { FastifyBaseLogger } from "fastify";

import type { UploadSession, UploadStatus } from "../types/upload.js";
import type { SessionMutator, SessionRepository } from "./session.repository.js";
import { uploadKeys } from "./keys.js";
import { decodeSession, encodeSession } from "./session.codec.js";
import {
  ConflictError,
  SessionNotFoundError,
  StorageUnavailableError,
  toStorageError,
} from "../services/upload/upload.errors.js";

/**
 * KEYS[1] session hash, KEYS[2] index set
 * ARGV[1] version, ARGV[2] data, ARGV[3] uploadId
 */
export const CREATE_SESSION_SCRIPT = `
if redis.call("EXISTS", KEYS[1]) == 1 then
  return 0
end
redis.call("HSET", KEYS[1], "version", ARGV[1], "data", ARGV[2])
redis.call("SADD", KEYS[2], ARGV[3])
return 1
`;

/**
 * KEYS[1] session hash
 * ARGV[1] expected version, ARGV[2] next version, ARGV[3] data
 */
export const CAS_SESSION_SCRIPT = `
if redis.call("HGET", KEYS[1], "version") ~= ARGV[1] then
  return 0
end
redis.call("HSET", KEYS[1], "version", ARGV[2], "data", ARGV[3])
return 1
`;

export class RedisSessionRepository implements SessionRepository {
  constructor(
    private readonly redis: Redis,
    private readonly log: FastifyBaseLogger
  ) {}

  async get(uploadId: string): Promise<UploadSession | null> {
    let raw: Record<string, string> | null;
    try {
      raw = await this.redis.hgetall<Record<string, string>>(uploadKeys.session(uploadId));
    } catch (err) {
      throw toStorageError(err, `Failed to read session ${uploadId}`);
    }

    if (!raw || Object.keys(raw).length === 0) return null;
    return decodeSession(uploadId, raw);
  }

  async create(session: UploadSession): Promise<void> {
    let created: unknown;
    try {
      created = await this.redis.eval(
        CREATE_SESSION_SCRIPT,
        [uploadKeys.session(session.uploadId), uploadKeys.index()],
        [String(session.version), encodeSession(session), session.uploadId]
      );
    } catch (err) {
      throw toStorageError(err, `Failed to create session ${session.uploadId}`);
    }

    if (Number(created) !== 1) {
      throw new StorageUnavailableError(`UPLOAD_ID_COLLISION ${session.uploadId}`);
    }
  }

  async compareAndSwap(
    uploadId: string,
    expected: readonly UploadStatus[],
    mutator: SessionMutator
  ): Promise<UploadSession> {
    const current = await this.get(uploadId);
    if (!current) throw new SessionNotFoundError(uploadId);

    if (!expected.includes(current.status)) {
      throw new ConflictError(uploadId, `status is ${current.status}`);
    }

    const next: UploadSession = {
      ...mutator(current),
      uploadId,
      version: current.version + 1,
    };

    let swapped: unknown;
    try {
      swapped = await this.redis.eval(
        CAS_SESSION_SCRIPT,
        [uploadKeys.session(uploadId)],
        [String(current.version), String(next.version), encodeSession(next)]
      );
    } catch (err) {
      throw toStorageError(err, `Failed to update session ${uploadId}`);
    }

    if (Number(swapped) !== 1) {
      throw new ConflictError(uploadId, `version ${current.version} is stale`);
    }

    return next;
  }

  async list(): Promise<UploadSession[]> {
    let ids: string[];
    try {
      ids = await this.redis.smembers(uploadKeys.index());
    } catch (err) {
      throw toStorageError(err, "Failed to list sessions");
    }

    const results = await Promise.allSettled(ids.map((id) => this.get(id)));
    const sessions: UploadSession[] = [];

    results.forEach((result, i) => {
      if (result.status === "rejected") {
        this.log.error(
          { err: result.reason, uploadId: ids[i] },
          "Skipping unreadable upload session"
        );
      } else if (result.value) {
        sessions.push(result.value);
      }
    });

    return sessions;
  }

  async delete(uploadId: string): Promise<void> {
    try {
      await this.redis
        .multi()
        .del(uploadKeys.session(uploadId))
        .srem(uploadKeys.index(), uploadId)
        .exec();
    } catch (err) {
      throw toStorageError(err, `Failed to delete session ${uploadId}`);
    }
  }

  async ping(): Promise<void> {
    try {
      await this.redis.ping();
    } catch (err) {
      throw toStorageError(err, "Redis ping failed");
    }
  }
}
