// src/routes/uploads.routes.ts

import type { FastifyInstance } from "fastify";

import { sendApiError, sendUploadError } from "../utils/apiError.js";
import type { ChunkSettings } from "../config/uploads.config.js";
import type { ChunkUploadEngine } from "../services/upload/upload.engine.js";

export interface UploadRoutesOptions {
  engine: ChunkUploadEngine;
  chunk: ChunkSettings;
}

interface UploadParams {
  uploadId: string;
}

interface ChunkParams extends UploadParams {
  index: string;
}

const MAX_FILENAME_LENGTH = 512;
const MAX_CONTENT_TYPE_LENGTH = 128;
const DEFAULT_CONTENT_TYPE = "application/octet-stream";

function isUuid(value: unknown): value is string {
  return (
    typeof value === "string" &&
    /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i.test(
      value
    )
  );
}

function isSha256Hex(value: unknown): value is string {
  return typeof value === "string" && /^[0-9a-f]{64}$/i.test(value);
}

function bodyField(body: unknown, key: string): unknown {
  if (typeof body !== "object" || body === null) return undefined;
  return Reflect.get(body, key);
}

export default async function uploadRoutes(
  app: FastifyInstance,
  opts: UploadRoutesOptions
) {
  const { engine, chunk } = opts;

  /**
   * Opens an upload session. A requested `chunkSize` outside
   * `[chunk.minBytes, chunk.maxBytes]` is clamped into that range rather
   * than rejected, and the default applies when it is omitted; clients
   * must split the file by the `chunkSize` in the response, not the one
   * they asked for.
   */
  app.post("/v1/uploads/create", async (req, reply) => {
    const body: unknown = req.body;

    if (!body || typeof body !== "object") {
      return sendApiError(
        reply,
        400,
        "INVALID_REQUEST_BODY",
        "Request body must be JSON"
      );
    }

    const filename = bodyField(body, "filename");
    const contentType = bodyField(body, "contentType") ?? DEFAULT_CONTENT_TYPE;
    const sizeBytes = bodyField(body, "sizeBytes");
    const chunkSize = bodyField(body, "chunkSize");

    if (typeof filename !== "string" || filename.length > MAX_FILENAME_LENGTH) {
      return sendApiError(
        reply,
        400,
        "INVALID_CREATE_UPLOAD_REQUEST",
        `filename must be a string of at most ${MAX_FILENAME_LENGTH} chars`
      );
    }

    if (typeof contentType !== "string" || contentType.length > MAX_CONTENT_TYPE_LENGTH) {
      return sendApiError(
        reply,
        400,
        "INVALID_CREATE_UPLOAD_REQUEST",
        `contentType must be a string of at most ${MAX_CONTENT_TYPE_LENGTH} chars`
      );
    }

    let chunkSizeNum: number | undefined;
    if (chunkSize !== undefined) {
      chunkSizeNum = Number(chunkSize);
      if (!Number.isFinite(chunkSizeNum) || chunkSizeNum <= 0) {
        return sendApiError(
          reply,
          400,
          "INVALID_CREATE_UPLOAD_REQUEST",
          "chunkSize must be a positive number"
        );
      }
    }

    const resolvedChunkSize = Math.min(
      chunk.maxBytes,
      Math.max(chunk.minBytes, Math.floor(chunkSizeNum ?? chunk.defaultBytes))
    );

    try {
      const session = await engine.createSession({
        filename,
        contentType,
        sizeBytes: Number(sizeBytes),
        chunkSize: resolvedChunkSize,
      });

      return reply.code(201).send({
        uploadId: session.uploadId,
        chunkSize: session.chunkSize,
        totalChunks: session.totalChunks,
        expiresAt: session.lastActivityAt + engine.sessionTtlMs,
      });
    } catch (err) {
      return sendUploadError(reply, err);
    }
  });

  app.put<{ Params: ChunkParams }>(
    "/v1/uploads/:uploadId/chunk/:index",
    async (req, reply) => {
      const { uploadId, index } = req.params;

      if (!isUuid(uploadId)) {
        return sendApiError(reply, 400, "INVALID_UPLOAD_ID", "uploadId must be a UUID");
      }

      if (!/^\d+$/.test(index)) {
        return sendApiError(reply, 400, "INVALID_CHUNK", "Chunk index must be a non-negative integer");
      }

      const expectedHash = req.headers["x-chunk-sha256"];
      if (expectedHash !== undefined && !isSha256Hex(expectedHash)) {
        return sendApiError(reply, 400, "INVALID_CHUNK", "x-chunk-sha256 must be a hex SHA-256 digest");
      }

      let bytes: Buffer;
      try {
        const part = await req.file();
        if (!part || part.type !== "file") {
          return sendApiError(reply, 400, "INVALID_CHUNK", "Multipart file field required", {
            retryable: true,
          });
        }

        bytes = await part.toBuffer();

        if (part.file.truncated) {
          return sendApiError(
            reply,
            413,
            "CHUNK_TOO_LARGE",
            `Chunk exceeds ${chunk.maxBytes} bytes`
          );
        }
      } catch (err) {
        req.log.warn({ uploadId, index, err }, "Failed to read chunk stream");
        return sendApiError(reply, 400, "CHUNK_STREAM_ERROR", "Failed to read chunk stream", {
          retryable: true,
        });
      }

      try {
        const result = await engine.uploadChunk({
          uploadId,
          index: Number(index),
          bytes,
          ...(expectedHash !== undefined && { sha256: expectedHash }),
        });

        return {
          ok: true,
          uploadId,
          chunkIndex: Number(index),
          receivedCount: result.receivedCount,
          totalChunks: result.totalChunks,
        };
      } catch (err) {
        return sendUploadError(reply, err);
      }
    }
  );

  app.get<{ Params: UploadParams }>("/v1/uploads/:uploadId/status", async (req, reply) => {
    const { uploadId } = req.params;

    if (!isUuid(uploadId)) {
      return sendApiError(reply, 400, "INVALID_UPLOAD_ID", "uploadId must be a UUID");
    }

    try {
      const view = await engine.getStatus(uploadId);
      return {
        ...view,
        missingIndices: Array.from(view.missingIndices),
      };
    } catch (err) {
      return sendUploadError(reply, err);
    }
  });

  app.post<{ Params: UploadParams }>("/v1/uploads/:uploadId/complete", async (req, reply) => {
    const { uploadId } = req.params;

    if (!isUuid(uploadId)) {
      return sendApiError(reply, 400, "INVALID_UPLOAD_ID", "uploadId must be a UUID");
    }

    try {
      const result = await engine.completeSession(uploadId);
      return reply.code(200).send({
        uploadId,
        status: "completed",
        resultReference: result.resultReference,
      });
    } catch (err) {
      return sendUploadError(reply, err);
    }
  });

  // Idempotent: repeated cancels answer 200 with the terminal status.
  app.delete<{ Params: UploadParams }>("/v1/uploads/:uploadId", async (req, reply) => {
    const { uploadId } = req.params;

    if (!isUuid(uploadId)) {
      return sendApiError(reply, 400, "INVALID_UPLOAD_ID", "uploadId must be a UUID");
    }

    try {
      const session = await engine.cancelSession(uploadId);
      return reply.code(200).send({ ok: true, uploadId, status: session.status });
    } catch (err) {
      return sendUploadError(reply, err);
    }
  });
}
