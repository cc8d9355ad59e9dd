import { randomUUID } from "node:crypto";
import type { RequestHandler } from "express";
import { logger } from "../utils/logger.js";

export const REQUEST_ID_HEADER = "x-request-id";
const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Tags each request with an id (the caller's, when it sends a usable one)
 * and logs the outcome once the response is sent: 5xx as errors, 4xx as
 * warnings.
 */
export const requestLogger: RequestHandler = (req, res, next) => {
  const startTime = Date.now();
  const incoming = req.get(REQUEST_ID_HEADER)?.trim();
  const requestId =
    incoming && incoming.length <= MAX_REQUEST_ID_LENGTH ? incoming : randomUUID();
  res.setHeader(REQUEST_ID_HEADER, requestId);

  res.on("finish", () => {
    const entry = {
      requestId,
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      durationMs: Date.now() - startTime
    };

    if (res.statusCode >= 500) {
      logger.error(entry, "HTTP request failed");
    } else if (res.statusCode >= 400) {
      logger.warn(entry, "HTTP request rejected");
    } else {
      logger.info(entry, "HTTP request");
    }
  });

  next();
};
