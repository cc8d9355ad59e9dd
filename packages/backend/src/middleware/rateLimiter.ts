import rateLimit, { type RateLimitRequestHandler } from "express-rate-limit";
import type { ApiErrorResponse } from "@coursemate/shared";
import { appConfig } from "../config.js";
import { logger } from "../utils/logger.js";

export interface ApiRateLimitOptions {
  windowMs: number;
  limit: number;
}

export const RATE_LIMITED_MESSAGE = "Too many requests. Please retry shortly.";

export function createApiRateLimiter(options: ApiRateLimitOptions): RateLimitRequestHandler {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.limit,
    standardHeaders: "draft-7",
    legacyHeaders: false,
    handler: (req, res, _next, used) => {
      logger.warn({ ip: req.ip, url: req.originalUrl, limit: options.limit }, "API rate limit reached");
      const body: ApiErrorResponse = { error: RATE_LIMITED_MESSAGE };
      res.status(used.statusCode).json(body);
    }
  });
}

export const apiRateLimiter = createApiRateLimiter({
  windowMs: appConfig.RATE_LIMIT_WINDOW_MS,
  limit: appConfig.RATE_LIMIT_MAX
});
