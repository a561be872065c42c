// src/utils/apiError.ts

import type { FastifyReply } from "fastify";
import {
  UploadError,
  type UploadErrorCode,
} from "../services/upload/upload.errors.js";

/**
 * Canonical API error codes.
 * Engine failures keep their own code; the rest come from the transport.
 */
export type ApiErrorCode =
  | UploadErrorCode
  | "INVALID_REQUEST_BODY"
  | "INVALID_UPLOAD_ID"
  | "INVALID_CHUNK"
  | "CHUNK_STREAM_ERROR"
  | "CHUNK_TOO_LARGE"
  | "REQUEST_ERROR"
  | "INTERNAL_ERROR";

export interface ApiErrorResponse {
  error: {
    code: ApiErrorCode;
    message: string;
    retryable: boolean;
    details?: Record<string, unknown>;
  };
}

export function sendApiError(
  reply: FastifyReply,
  statusCode: number,
  code: ApiErrorCode,
  message: string,
  options?: {
    retryable?: boolean;
    details?: Record<string, unknown>;
  }
) {
  const safeStatus =
    Number.isInteger(statusCode) &&
    statusCode >= 400 &&
    statusCode <= 599
      ? statusCode
      : 500;

  const response: ApiErrorResponse = {
    error: {
      code,
      message,
      retryable: options?.retryable ?? false,
      ...(options?.details && { details: options.details }),
    },
  };

  return reply.code(safeStatus).send(response);
}

/**
 * Maps engine failures onto the error envelope. Anything that is not an
 * UploadError is rethrown for the app error handler.
 */
export function sendUploadError(reply: FastifyReply, err: unknown) {
  if (!(err instanceof UploadError)) throw err;

  if (err.statusCode >= 500) {
    reply.log.error({ err, code: err.code }, "Upload request failed");
  }

  return sendApiError(reply, err.statusCode, err.code, err.message, {
    retryable: err.retryable,
    details: err.details,
  });
}
