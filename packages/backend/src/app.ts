import cors from "cors";
import express from "express";
import { appConfig } from "./config.js";
import { apiErrorHandler } from "./middleware/errorHandler.js";
import { requestLogger } from "./middleware/logger.js";
import { apiRateLimiter } from "./middleware/rateLimiter.js";
import { coursesRouter } from "./routes/courses.js";
import { healthRouter } from "./routes/health.js";
import { queryRouter } from "./routes/query.js";
import { sessionsRouter } from "./routes/sessions.js";

export const app = express();

app.use(requestLogger);
app.use(
  cors({
    origin: appConfig.CORS_ORIGIN
  })
);
app.use(express.json({ limit: "2mb" }));
app.use(express.urlencoded({ extended: true }));
app.use(apiRateLimiter);

app.use("/api/query", queryRouter);
app.use("/api/courses", coursesRouter);
app.use("/api/sessions", sessionsRouter);
app.use("/api/health", healthRouter);

app.use((_req, res) => {
  res.status(404).json({ error: "Route not found" });
});

app.use(apiErrorHandler);
