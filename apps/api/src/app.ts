// src/app.ts

import Fastify, { type FastifyError, type FastifyInstance, type FastifyServerOptions } from "fastify";
import multipart from "@fastify/multipart";

import uploadRoutes from "./routes/uploads.routes.js";
import healthRoute from "./routes/health.js";
import type { ChunkSettings } from "./config/uploads.config.js";
import type { ChunkUploadEngine } from "./services/upload/upload.engine.js";
import type { SessionRepository } from "./state/session.repository.js";

export interface CreateAppOptions {
  chunk: ChunkSettings;
  logger?: FastifyServerOptions["logger"];
}

export interface UploadApiDeps {
  engine: ChunkUploadEngine;
  repository: SessionRepository;
  chunk: ChunkSettings;
}

export function createApp(options: CreateAppOptions): FastifyInstance {
  return Fastify({
    logger: options.logger ?? false,
    // Requests should be chunk-sized (multipart) or small JSON.
    bodyLimit: options.chunk.maxBytes + 1024 * 1024,
  });
}

export async function registerUploadApi(app: FastifyInstance, deps: UploadApiDeps) {
  app.setErrorHandler<FastifyError>((err, req, reply) => {
    const statusCode =
      err.statusCode !== undefined && Number.isInteger(err.statusCode)
        ? err.statusCode
        : 500;

    req.log.error(
      { err, url: req.url, method: req.method, requestId: req.id },
      "Request error"
    );

    return reply.code(statusCode).send({
      error: {
        code: statusCode < 500 ? "REQUEST_ERROR" : "INTERNAL_ERROR",
        message: statusCode < 500 ? err.message : "Unexpected server error",
        retryable: false,
      },
    });
  });

  await app.register(multipart, {
    attachFieldsToBody: false,
    throwFileSizeLimit: false,
    limits: {
      // One chunk per request.
      fileSize: deps.chunk.maxBytes,
      files: 1,
    },
  });

  await app.register(uploadRoutes, { engine: deps.engine, chunk: deps.chunk });
  await app.register(healthRoute, { repository: deps.repository });
}
