import type { RequestHandler } from "express";
import type { ZodTypeAny } from "zod";
import { sendApiError } from "./errorHandler.js";

const requestParts = ["params", "query", "body"] as const;
type RequestPart = (typeof requestParts)[number];

export type RequestSchemas = Partial<Record<RequestPart, ZodTypeAny>>;

/**
 * Replaces each listed request part with its parsed value. The first part
 * that fails answers 400 through the shared error mapping.
 */
export function validate(schemas: RequestSchemas): RequestHandler {
  return (req, res, next) => {
    for (const part of requestParts) {
      const schema = schemas[part];
      if (!schema) {
        continue;
      }

      const parsed = schema.safeParse(req[part]);
      if (!parsed.success) {
        sendApiError(res, parsed.error, `Invalid request ${part}`);
        return;
      }
      req[part] = parsed.data;
    }

    next();
  };
}
