import type { CourseChunk, CourseMetadata } from "@coursemate/shared";

export type IngestionPhase = "parsing" | "chunking" | "indexing" | "completed" | "error";

export interface IngestionStatusEvent {
  source: string;
  phase: IngestionPhase;
  progress: number;
  message?: string;
}

export interface CourseIngestionOptions {
  chunkSize: number;
  chunkOverlap: number;
  maxChunksPerDocument: number;
}

export interface CourseDocumentInput {
  text: string;
  filename: string;
}

export interface CourseIngestionResult {
  course: CourseMetadata;
  chunks: CourseChunk[];
}

export interface FolderIngestionResult {
  ingested: CourseIngestionResult[];
  skipped: string[];
  failed: Array<{ filename: string; error: string }>;
}
