import type { ErrorRequestHandler, Response } from "express";
import { ZodError } from "zod";
import type { ApiErrorResponse } from "@coursemate/shared";
import { BackendError, ConfigurationError, RetrievalError } from "../errors.js";
import { logger } from "../utils/logger.js";

export interface ApiErrorMapping {
  status: number;
  body: ApiErrorResponse;
}

/** Provider payloads and keys stay in the logs; bodies carry fixed messages. */
export function toApiError(error: unknown): ApiErrorMapping {
  if (error instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: "Validation failed",
        details: error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message
        }))
      }
    };
  }
  if (error instanceof BackendError) {
    return { status: 502, body: { error: error.userMessage, kind: error.kind } };
  }
  if (error instanceof ConfigurationError) {
    return { status: 503, body: { error: "The service is not configured to answer queries." } };
  }
  if (error instanceof RetrievalError) {
    return { status: 503, body: { error: "The course index is unavailable." } };
  }
  return { status: 500, body: { error: "Internal server error" } };
}

export function sendApiError(res: Response, error: unknown, context: string): Response {
  const mapped = toApiError(error);
  if (mapped.status >= 500) {
    logger.error({ err: error, status: mapped.status }, context);
  }
  return res.status(mapped.status).json(mapped.body);
}

export const apiErrorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  sendApiError(res, err, "Unhandled error");
};
