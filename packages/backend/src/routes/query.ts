import { Router } from "express";
import { z } from "zod";
import type { QueryResponse } from "@coursemate/shared";
import { validate } from "../middleware/validator.js";
import { sendApiError } from "../middleware/errorHandler.js";
import { getQAServiceSingleton } from "../runtime/ragRuntime.js";
import type { CourseQAServiceLike } from "../services/CourseQAService.js";

const queryBodySchema = z.object({
  query: z.string().trim().min(1).max(4000),
  sessionId: z.string().trim().min(1).max(200).nullish()
});

interface CreateQueryRouterOptions {
  service?: CourseQAServiceLike;
}

export function createQueryRouter(options: CreateQueryRouterOptions = {}): Router {
  const getService = (): CourseQAServiceLike => options.service ?? getQAServiceSingleton();

  const queryRouter = Router();

  queryRouter.post("/", validate({ body: queryBodySchema }), async (req, res) => {
    const { query, sessionId } = queryBodySchema.parse(req.body);

    try {
      const response: QueryResponse = await getService().query({ query, sessionId: sessionId ?? null });
      return res.json(response);
    } catch (error) {
      return sendApiError(res, error, "Query failed");
    }
  });

  return queryRouter;
}

export const queryRouter = createQueryRouter();
