import { Router } from "express";
import { z } from "zod";
import { validate } from "../middleware/validator.js";
import { getQAServiceSingleton } from "../runtime/ragRuntime.js";
import type { CourseQAServiceLike } from "../services/CourseQAService.js";
import { sendApiError } from "../middleware/errorHandler.js";

const sessionParamsSchema = z.object({
  id: z.string().min(1)
});

interface CreateSessionsRouterOptions {
  service?: CourseQAServiceLike;
}

export function createSessionsRouter(options: CreateSessionsRouterOptions = {}): Router {
  const getService = (): CourseQAServiceLike => options.service ?? getQAServiceSingleton();

  const sessionsRouter = Router();

  sessionsRouter.delete("/:id", validate({ params: sessionParamsSchema }), (req, res) => {
    const sessionId = req.params.id ?? "";
    try {
      if (!getService().clearSession(sessionId)) {
        return res.status(404).json({ error: "Session not found" });
      }
      return res.status(204).send();
    } catch (error) {
      return sendApiError(res, error, "Session reset failed");
    }
  });

  return sessionsRouter;
}

export const sessionsRouter = createSessionsRouter();
