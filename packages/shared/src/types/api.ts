import type { QueryAnswer } from "./chat.js";
import type { CourseMetadata } from "./course.js";

export type ServiceConnectionStatus = "ok" | "failed" | "not_configured";

export interface ApiErrorResponse {
  error: string;
  kind?: string;
  details?: unknown;
}

export type QueryResponse = QueryAnswer;

export interface CourseStatsResponse {
  totalCourses: number;
  courseTitles: string[];
}

export interface IngestCourseResponse {
  message: string;
  course: CourseMetadata;
  chunkCount: number;
}

export interface HealthResponse {
  status: "ok" | "degraded";
  timestamp: string;
  uptimeSec?: number;
  checks?: {
    vectorStore: ServiceConnectionStatus;
    llm: ServiceConnectionStatus;
  };
  provider?: string | null;
  memoryUsage?: {
    rss: number;
    heapUsed: number;
    heapTotal: number;
  };
}
