import type { RequestHandler } from "express";
import { Router } from "express";
import multer from "multer";
import { z } from "zod";
import type { CourseStatsResponse, IngestCourseResponse } from "@coursemate/shared";
import { appConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";
import { sendApiError } from "../middleware/errorHandler.js";
import { validate } from "../middleware/validator.js";
import { FileValidationError, validateUploadedFile } from "../parsers/fileValidator.js";
import type { CourseIngestionPipeline } from "../pipeline/CourseIngestionPipeline.js";
import type { RetrievalIndex } from "../retrieval/RetrievalIndex.js";
import {
  ensureVectorStoreConnected,
  getIngestionPipelineSingleton,
  getRetrievalIndexSingleton
} from "../runtime/ragRuntime.js";
import { logger } from "../utils/logger.js";

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: appConfig.MAX_UPLOAD_SIZE
  }
});

const courseParamsSchema = z.object({
  title: z.string().min(1)
});

interface CreateCoursesRouterOptions {
  index?: RetrievalIndex;
  pipeline?: CourseIngestionPipeline;
  ensureStoreConnected?: () => Promise<void>;
}

export function createCoursesRouter(options: CreateCoursesRouterOptions = {}): Router {
  const getIndex = (): RetrievalIndex => options.index ?? getRetrievalIndexSingleton();
  const getPipeline = (): CourseIngestionPipeline => options.pipeline ?? getIngestionPipelineSingleton();
  const ensureStoreConnected = options.ensureStoreConnected ?? (() => ensureVectorStoreConnected());

  const coursesRouter = Router();

  const handleUpload: RequestHandler = (req, res, next) => {
    upload.single("file")(req, res, (err: unknown) => {
      if (err) {
        const message =
          err instanceof multer.MulterError
            ? err.code === "LIMIT_FILE_SIZE"
              ? `File too large. Maximum allowed size is ${Math.round(appConfig.MAX_UPLOAD_SIZE / 1024 / 1024)}MB`
              : err.message
            : err instanceof Error
              ? err.message
              : "File upload failed";
        return res.status(400).json({ error: message });
      }
      next();
    });
  };

  coursesRouter.get("/", (_req, res) => {
    const courses = getIndex().listCourses();
    const response: CourseStatsResponse = {
      totalCourses: courses.length,
      courseTitles: courses.map((course) => course.title)
    };
    return res.json(response);
  });

  coursesRouter.post("/", handleUpload, async (req, res) => {
    if (!req.file) {
      return res.status(400).json({ error: "No file uploaded" });
    }

    try {
      await ensureStoreConnected();
    } catch (error) {
      logger.error({ err: error }, "Vector store connection failed");
      return res.status(503).json({ error: "Vector store unavailable" });
    }

    let filename: string;
    try {
      const validated = await validateUploadedFile(req.file, {
        maxSizeBytes: appConfig.MAX_UPLOAD_SIZE
      });
      filename = validated.sanitizedFilename;
    } catch (error) {
      if (error instanceof FileValidationError) {
        return res.status(400).json({ error: error.message });
      }
      return sendApiError(res, error, "File validation failed");
    }

    try {
      const result = await getPipeline().ingestBuffer(req.file.buffer, filename);
      const response: IngestCourseResponse = {
        message: "Course indexed",
        course: result.course,
        chunkCount: result.chunks.length
      };
      return res.status(201).json(response);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return res.status(422).json({ error: error.message });
      }
      return sendApiError(res, error, "Course ingestion failed");
    }
  });

  coursesRouter.delete("/:title", validate({ params: courseParamsSchema }), async (req, res) => {
    const title = req.params.title ?? "";
    try {
      const removed = await getIndex().removeCourse(title);
      if (!removed) {
        return res.status(404).json({ error: "Course not found" });
      }
      return res.status(204).send();
    } catch (error) {
      return sendApiError(res, error, "Course removal failed");
    }
  });

  return coursesRouter;
}

export const coursesRouter = createCoursesRouter();
