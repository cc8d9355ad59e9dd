import { randomUUID } from "node:crypto";
import type {
  ChunkRecord,
  CourseChunk,
  CourseChunkDraft,
  CourseMetadata,
  CourseSummary,
  EmbeddingProvider,
  SearchFilter,
  SearchResult,
  VectorFilter,
  VectorStore
} from "@coursemate/shared";
import { RetrievalError } from "../errors.js";
import { logger } from "../utils/logger.js";
import { resolveTitle } from "./titleMatching.js";

interface CatalogEntry {
  course: CourseMetadata;
  generation: string;
  chunkCount: number;
  ingestedAt: Date;
}

export interface RetrievalIndexOptions {
  /** Minimum word-overlap score for a fuzzy course-name match. */
  fuzzyThreshold: number;
}

const defaultOptions: RetrievalIndexOptions = {
  fuzzyThreshold: 0.5
};

/**
 * Course-aware semantic index over a VectorStore.
 *
 * Chunks of one course are written under a fresh generation id and become
 * visible in a single catalog swap. A search pins the generations it sees
 * before its first await; superseded generations are removed only after
 * every search pinned to them has finished.
 */
export class RetrievalIndex {
  private readonly catalog = new Map<string, CatalogEntry>();
  private readonly readers = new Map<string, number>();
  private readonly drainWaiters = new Map<string, Array<() => void>>();
  private readonly courseLocks = new Map<string, Promise<void>>();
  private readonly options: RetrievalIndexOptions;

  constructor(
    private readonly vectorStore: VectorStore,
    private readonly embedder: EmbeddingProvider,
    options: Partial<RetrievalIndexOptions> = {}
  ) {
    this.options = { ...defaultOptions, ...options };
  }

  get courseCount(): number {
    return this.catalog.size;
  }

  /** Replaces the course's chunks and returns them with their stored ids. */
  async ingest(course: CourseMetadata, chunks: CourseChunkDraft[]): Promise<CourseChunk[]> {
    return this.withCourseLock(course.title, async () => {
      const generation = randomUUID();
      const records = await this.buildRecords(course.title, chunks, generation);

      try {
        await this.vectorStore.upsert(records);
      } catch (error) {
        await this.discardGeneration(course.title, generation);
        throw new RetrievalError(`Failed to store chunks for "${course.title}"`, { cause: error });
      }

      const previous = this.catalog.get(course.title);
      this.catalog.set(course.title, {
        course,
        generation,
        chunkCount: chunks.length,
        ingestedAt: new Date()
      });

      if (previous) {
        await this.waitForReaders(previous.generation);
        await this.deleteSuperseded(course.title, generation);
      }

      logger.info(
        { course: course.title, chunkCount: chunks.length, replaced: previous !== undefined },
        "Course indexed"
      );
      return chunks.map((chunk) => ({ ...chunk, id: chunkRecordId(generation, chunk.index) }));
    });
  }

  async search(queryText: string, filter: SearchFilter, k: number): Promise<SearchResult> {
    if (k <= 0 || this.catalog.size === 0) {
      return [];
    }

    let generations: string[];
    if (filter.courseTitle !== null) {
      const entry = this.catalog.get(filter.courseTitle);
      if (!entry) {
        return [];
      }
      generations = [entry.generation];
    } else {
      generations = [...this.catalog.values()].map((entry) => entry.generation);
    }

    const vectorFilter: VectorFilter = { generations };
    if (filter.courseTitle !== null) {
      vectorFilter.courseTitle = filter.courseTitle;
    }
    if (filter.lessonNumber !== null) {
      vectorFilter.lessonNumber = filter.lessonNumber;
    }

    this.pin(generations);
    try {
      const vector = await this.embedQuery(queryText);
      const matches = await this.queryStore(vector, vectorFilter, k);

      return [...matches]
        .sort((a, b) => a.distance - b.distance)
        .slice(0, k)
        .map((match) => ({
          chunk: {
            id: match.id,
            text: match.metadata.text,
            index: match.metadata.index,
            courseTitle: match.metadata.courseTitle,
            lessonNumber: match.metadata.lessonNumber,
            sourceLabel: match.metadata.sourceLabel
          },
          distance: match.distance,
          score: 1 - match.distance
        }));
    } finally {
      this.unpin(generations);
    }
  }

  resolveCourseTitle(partialName: string): string | null {
    return resolveTitle(partialName, [...this.catalog.keys()], this.options.fuzzyThreshold);
  }

  getCourse(title: string): CourseMetadata | null {
    return this.catalog.get(title)?.course ?? null;
  }

  hasCourse(title: string): boolean {
    return this.catalog.has(title);
  }

  listCourses(): CourseSummary[] {
    return [...this.catalog.values()].map((entry) => ({
      title: entry.course.title,
      instructor: entry.course.instructor,
      lessonCount: entry.course.lessons.length,
      chunkCount: entry.chunkCount,
      ingestedAt: entry.ingestedAt
    }));
  }

  async removeCourse(title: string): Promise<boolean> {
    let removed = false;
    await this.withCourseLock(title, async () => {
      const entry = this.catalog.get(title);
      if (!entry) {
        return;
      }

      this.catalog.delete(title);
      removed = true;
      await this.waitForReaders(entry.generation);
      try {
        await this.vectorStore.deleteCourse(title);
      } catch (error) {
        throw new RetrievalError(`Failed to delete chunks for "${title}"`, { cause: error });
      }
    });
    return removed;
  }

  async clear(): Promise<void> {
    const generations = [...this.catalog.values()].map((entry) => entry.generation);
    this.catalog.clear();
    await Promise.all(generations.map((generation) => this.waitForReaders(generation)));
    try {
      await this.vectorStore.deleteAll();
    } catch (error) {
      throw new RetrievalError("Failed to clear the vector store", { cause: error });
    }
  }

  private async buildRecords(
    courseTitle: string,
    chunks: CourseChunkDraft[],
    generation: string
  ): Promise<ChunkRecord[]> {
    if (chunks.length === 0) {
      return [];
    }

    let vectors: number[][];
    try {
      vectors = await this.embedder.embedMany(chunks.map((chunk) => chunk.text));
    } catch (error) {
      throw new RetrievalError(`Failed to embed chunks for "${courseTitle}"`, { cause: error });
    }

    return chunks.map((chunk, position) => {
      const vector = vectors[position];
      if (!vector) {
        throw new RetrievalError(`Embedding missing for chunk ${chunk.index} of "${courseTitle}"`);
      }
      return {
        id: chunkRecordId(generation, chunk.index),
        vector,
        metadata: {
          courseTitle,
          lessonNumber: chunk.lessonNumber,
          index: chunk.index,
          text: chunk.text,
          sourceLabel: chunk.sourceLabel,
          generation
        }
      };
    });
  }

  private async embedQuery(queryText: string): Promise<number[]> {
    try {
      return await this.embedder.embed(queryText);
    } catch (error) {
      throw new RetrievalError("Failed to embed search query", { cause: error });
    }
  }

  private async queryStore(vector: number[], filter: VectorFilter, k: number) {
    try {
      return await this.vectorStore.queryKNN(vector, filter, k);
    } catch (error) {
      throw new RetrievalError("Vector store query failed", { cause: error });
    }
  }

  private async deleteSuperseded(courseTitle: string, keepGeneration: string): Promise<void> {
    try {
      await this.vectorStore.deleteCourse(courseTitle, { keepGeneration });
    } catch (error) {
      // the catalog already points at the new generation, so stale rows stay invisible
      logger.warn({ err: error, course: courseTitle }, "Failed to delete superseded chunks");
    }
  }

  private async discardGeneration(courseTitle: string, generation: string): Promise<void> {
    const current = this.catalog.get(courseTitle);
    try {
      if (current) {
        await this.vectorStore.deleteCourse(courseTitle, { keepGeneration: current.generation });
      } else {
        await this.vectorStore.deleteCourse(courseTitle);
      }
    } catch (error) {
      logger.warn({ err: error, course: courseTitle, generation }, "Failed to discard partial upsert");
    }
  }

  private pin(generations: string[]): void {
    for (const generation of generations) {
      this.readers.set(generation, (this.readers.get(generation) ?? 0) + 1);
    }
  }

  private unpin(generations: string[]): void {
    for (const generation of generations) {
      const remaining = (this.readers.get(generation) ?? 1) - 1;
      if (remaining > 0) {
        this.readers.set(generation, remaining);
        continue;
      }

      this.readers.delete(generation);
      const waiters = this.drainWaiters.get(generation) ?? [];
      this.drainWaiters.delete(generation);
      for (const wake of waiters) {
        wake();
      }
    }
  }

  private waitForReaders(generation: string): Promise<void> {
    if (!this.readers.has(generation)) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const waiters = this.drainWaiters.get(generation) ?? [];
      waiters.push(resolve);
      this.drainWaiters.set(generation, waiters);
    });
  }

  private async withCourseLock<T>(title: string, task: () => Promise<T>): Promise<T> {
    const previous = this.courseLocks.get(title) ?? Promise.resolve();
    const current = previous.then(task);
    const settled = current.then(
      () => undefined,
      () => undefined
    );
    this.courseLocks.set(title, settled);

    try {
      return await current;
    } finally {
      if (this.courseLocks.get(title) === settled) {
        this.courseLocks.delete(title);
      }
    }
  }
}

function chunkRecordId(generation: string, index: number): string {
  return `${generation}:${index}`;
}
