import { EventEmitter } from "node:events";
import { readdir, readFile } from "node:fs/promises";
import { basename, resolve } from "node:path";
import type { CourseChunkDraft, CourseMetadata } from "@coursemate/shared";
import { appConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";
import { TextParser, isSupportedCourseFile } from "../parsers/index.js";
import type { RetrievalIndex } from "../retrieval/RetrievalIndex.js";
import { logger } from "../utils/logger.js";
import { CourseCatalogExtractor, formatSourceLabel, lessonAt } from "./CourseCatalogExtractor.js";
import { TextChunker } from "./TextChunker.js";
import type {
  CourseDocumentInput,
  CourseIngestionOptions,
  CourseIngestionResult,
  FolderIngestionResult,
  IngestionPhase,
  IngestionStatusEvent
} from "./types.js";

const defaultOptions: CourseIngestionOptions = {
  chunkSize: appConfig.CHUNK_SIZE,
  chunkOverlap: appConfig.CHUNK_OVERLAP,
  maxChunksPerDocument: appConfig.MAX_CHUNKS_PER_DOCUMENT
};

export class CourseIngestionPipeline {
  private readonly eventEmitter: EventEmitter;
  private readonly options: CourseIngestionOptions;
  private readonly chunker: TextChunker;
  private readonly extractor = new CourseCatalogExtractor();
  private readonly parser = new TextParser();

  constructor(
    private readonly index: RetrievalIndex,
    eventEmitter?: EventEmitter,
    options: Partial<CourseIngestionOptions> = {}
  ) {
    this.eventEmitter = eventEmitter ?? new EventEmitter();
    this.options = {
      ...defaultOptions,
      ...options
    };
    this.chunker = new TextChunker({
      chunkSize: this.options.chunkSize,
      overlap: this.options.chunkOverlap
    });
  }

  onStatus(listener: (event: IngestionStatusEvent) => void): void {
    this.eventEmitter.on("status", listener);
  }

  /** Extracts the catalog, chunks the body and replaces the course in the index. */
  async ingestDocument(input: CourseDocumentInput): Promise<CourseIngestionResult> {
    try {
      this.emitStatus(input.filename, "chunking", 20);
      const { course, chunks } = this.prepare(input);

      this.emitStatus(input.filename, "indexing", 60);
      const stored = await this.index.ingest(course, chunks);

      this.emitStatus(input.filename, "completed", 100);
      return { course, chunks: stored };
    } catch (error) {
      this.emitStatus(input.filename, "error", 100, error instanceof Error ? error.message : "Unknown error");
      throw error;
    }
  }

  async ingestBuffer(buffer: Buffer, filename: string): Promise<CourseIngestionResult> {
    this.emitStatus(filename, "parsing", 0);
    const parsed = await this.parser.parse(buffer);
    return this.ingestDocument({ text: parsed.text, filename });
  }

  async ingestFile(path: string): Promise<CourseIngestionResult> {
    const buffer = await readFile(path);
    return this.ingestBuffer(buffer, basename(path));
  }

  /**
   * Ingests every .txt/.md file directly inside `dir`, in name order. Courses
   * already in the index are skipped unless `clearExisting` empties it first.
   * A file that fails is logged and reported; the rest still load.
   */
  async ingestFolder(
    dir: string,
    options: { clearExisting?: boolean } = {}
  ): Promise<FolderIngestionResult> {
    const folder = resolve(dir);
    if (options.clearExisting) {
      await this.index.clear();
    }

    const entries = await readdir(folder, { withFileTypes: true });
    const filenames = entries
      .filter((entry) => entry.isFile() && isSupportedCourseFile(entry.name))
      .map((entry) => entry.name)
      .sort();

    const result: FolderIngestionResult = { ingested: [], skipped: [], failed: [] };
    for (const filename of filenames) {
      try {
        this.emitStatus(filename, "parsing", 0);
        const parsed = await this.parser.parse(await readFile(resolve(folder, filename)));
        const { course } = this.extractor.extract(parsed.text, filename);
        if (this.index.hasCourse(course.title)) {
          result.skipped.push(course.title);
          continue;
        }

        result.ingested.push(await this.ingestDocument({ text: parsed.text, filename }));
      } catch (error) {
        logger.error({ err: error, filename }, "Failed to ingest course document");
        result.failed.push({
          filename,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }

    logger.info(
      {
        folder,
        ingested: result.ingested.length,
        skipped: result.skipped.length,
        failed: result.failed.length
      },
      "Course folder loaded"
    );
    return result;
  }

  private prepare(input: CourseDocumentInput): { course: CourseMetadata; chunks: CourseChunkDraft[] } {
    const { course, body, markers } = this.extractor.extract(input.text, input.filename);
    if (body.trim().length === 0) {
      throw new ConfigurationError(`Document "${input.filename}" has no course content`);
    }

    const segments = this.chunker.chunk(body);
    if (segments.length > this.options.maxChunksPerDocument) {
      throw new ConfigurationError(
        `Chunk count limit exceeded: ${segments.length} > ${this.options.maxChunksPerDocument}. Please split the document.`
      );
    }

    const chunks: CourseChunkDraft[] = segments.map((segment, index) => {
      const lessonNumber = lessonAt(markers, segment.start);
      return {
        text: segment.text,
        index,
        courseTitle: course.title,
        lessonNumber,
        sourceLabel: formatSourceLabel(course.title, lessonNumber)
      };
    });

    return { course, chunks };
  }

  private emitStatus(source: string, phase: IngestionPhase, progress: number, message?: string): void {
    const payload: IngestionStatusEvent = {
      source,
      phase,
      progress
    };
    if (message !== undefined) {
      payload.message = message;
    }

    this.eventEmitter.emit("status", payload);
  }
}
