import { beforeEach, describe, expect, it } from "vitest";
import type { ChunkRecord, VectorFilter, VectorMatch } from "@coursemate/shared";
import { RetrievalError } from "../../../src/errors.js";
import { InMemoryVectorStore } from "../../../src/retrieval/InMemoryVectorStore.js";
import { RetrievalIndex } from "../../../src/retrieval/RetrievalIndex.js";
import { FakeEmbeddingProvider } from "../../helpers/FakeEmbeddingProvider.js";
import { buildChunks, buildCourse } from "../../helpers/courseFixtures.js";

class GatedVectorStore extends InMemoryVectorStore {
  gate: Promise<void> | null = null;
  failUpsert = false;

  override async upsert(records: ChunkRecord[]): Promise<void> {
    if (this.failUpsert) {
      throw new Error("disk full");
    }
    return super.upsert(records);
  }

  override async queryKNN(vector: number[], filter: VectorFilter, k: number): Promise<VectorMatch[]> {
    if (this.gate) {
      await this.gate;
    }
    return super.queryKNN(vector, filter, k);
  }
}

function settle(): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, 10);
  });
}

describe("RetrievalIndex", () => {
  let store: GatedVectorStore;
  let embedder: FakeEmbeddingProvider;
  let index: RetrievalIndex;

  beforeEach(() => {
    store = new GatedVectorStore();
    embedder = new FakeEmbeddingProvider(["alpha", "beta", "gamma"]);
    index = new RetrievalIndex(store, embedder);
  });

  it("returns nothing from an empty index without embedding the query", async () => {
    const hits = await index.search("alpha", { courseTitle: null, lessonNumber: null }, 5);

    expect(hits).toEqual([]);
    expect(embedder.embedCalls).toBe(0);
  });

  it("returns nothing for an unknown course or a non-positive k", async () => {
    await index.ingest(buildCourse("Course A"), buildChunks("Course A", [{ text: "alpha", lesson: 1 }]));

    expect(await index.search("alpha", { courseTitle: "Course Z", lessonNumber: null }, 5)).toEqual([]);
    expect(await index.search("alpha", { courseTitle: null, lessonNumber: null }, 0)).toEqual([]);
  });

  it("ranks hits by ascending distance with score = 1 - distance", async () => {
    await index.ingest(
      buildCourse("Course A"),
      buildChunks("Course A", [
        { text: "beta beta", lesson: 1 },
        { text: "alpha alpha", lesson: 1 },
        { text: "alpha beta", lesson: 2 }
      ])
    );

    const hits = await index.search("alpha", { courseTitle: null, lessonNumber: null }, 2);

    expect(hits.map((hit) => hit.chunk.text)).toEqual(["alpha alpha", "alpha beta"]);
    expect(hits.every((hit) => hit.score === 1 - hit.distance)).toBe(true);
    expect(hits[0]?.chunk.sourceLabel).toBe("Course A – Lesson 1");
  });

  it("applies course and lesson filters together", async () => {
    await index.ingest(
      buildCourse("Course A"),
      buildChunks("Course A", [
        { text: "alpha one", lesson: 1 },
        { text: "alpha two", lesson: 2 }
      ])
    );
    await index.ingest(buildCourse("Course B"), buildChunks("Course B", [{ text: "alpha b", lesson: 2 }]));

    const hits = await index.search("alpha", { courseTitle: "Course A", lessonNumber: 2 }, 5);
    expect(hits.map((hit) => hit.chunk.text)).toEqual(["alpha two"]);

    const lessonTwo = await index.search("alpha", { courseTitle: null, lessonNumber: 2 }, 5);
    expect(lessonTwo.map((hit) => hit.chunk.courseTitle).sort()).toEqual(["Course A", "Course B"]);
  });

  it("replaces a course's chunks on re-ingest", async () => {
    await index.ingest(buildCourse("Course A"), buildChunks("Course A", [{ text: "alpha old", lesson: 1 }]));
    await index.ingest(
      buildCourse("Course A", 3),
      buildChunks("Course A", [
        { text: "gamma new", lesson: 1 },
        { text: "gamma newer", lesson: 2 }
      ])
    );

    const hits = await index.search("alpha", { courseTitle: "Course A", lessonNumber: null }, 5);
    expect(hits.map((hit) => hit.chunk.text).sort()).toEqual(["gamma new", "gamma newer"]);
    expect(store.size).toBe(2);
    expect(index.getCourse("Course A")?.lessons).toHaveLength(3);
    expect(index.listCourses()).toMatchObject([{ title: "Course A", chunkCount: 2, lessonCount: 3 }]);
  });

  it("lets an in-flight search finish on the generation it started with", async () => {
    await index.ingest(buildCourse("Course A"), buildChunks("Course A", [{ text: "alpha old", lesson: 1 }]));

    let release: () => void = () => undefined;
    store.gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const search = index.search("alpha", { courseTitle: "Course A", lessonNumber: null }, 5);
    let ingestDone = false;
    const reingest = index
      .ingest(buildCourse("Course A"), buildChunks("Course A", [{ text: "alpha new", lesson: 1 }]))
      .then(() => {
        ingestDone = true;
      });

    await settle();
    expect(ingestDone).toBe(false);

    store.gate = null;
    release();
    const hits = await search;
    await reingest;

    expect(hits.map((hit) => hit.chunk.text)).toEqual(["alpha old"]);
    expect(ingestDone).toBe(true);
    expect(store.size).toBe(1);
    const after = await index.search("alpha", { courseTitle: "Course A", lessonNumber: null }, 5);
    expect(after.map((hit) => hit.chunk.text)).toEqual(["alpha new"]);
  });

  it("keeps the previous chunks when storing a re-ingest fails", async () => {
    await index.ingest(buildCourse("Course A"), buildChunks("Course A", [{ text: "alpha old", lesson: 1 }]));
    store.failUpsert = true;

    await expect(
      index.ingest(buildCourse("Course A"), buildChunks("Course A", [{ text: "alpha new", lesson: 1 }]))
    ).rejects.toBeInstanceOf(RetrievalError);

    store.failUpsert = false;
    const hits = await index.search("alpha", { courseTitle: "Course A", lessonNumber: null }, 5);
    expect(hits.map((hit) => hit.chunk.text)).toEqual(["alpha old"]);
  });

  it("wraps embedding failures in RetrievalError", async () => {
    await index.ingest(buildCourse("Course A"), buildChunks("Course A", [{ text: "alpha", lesson: 1 }]));
    embedder.failNext = new Error("embedding service down");

    await expect(
      index.search("alpha", { courseTitle: null, lessonNumber: null }, 5)
    ).rejects.toThrow("Failed to embed search query");
  });

  it("resolves partial course names against indexed titles", async () => {
    await index.ingest(buildCourse("Introduction to MCP"), buildChunks("Introduction to MCP", [{ text: "alpha", lesson: 1 }]));
    await index.ingest(
      buildCourse("Advanced Retrieval for AI with Chroma"),
      buildChunks("Advanced Retrieval for AI with Chroma", [{ text: "beta", lesson: 1 }])
    );

    expect(index.resolveCourseTitle("mcp")).toBe("Introduction to MCP");
    expect(index.resolveCourseTitle("Chroma")).toBe("Advanced Retrieval for AI with Chroma");
    expect(index.resolveCourseTitle("Kubernetes")).toBeNull();
  });

  it("removes and clears courses", async () => {
    await index.ingest(buildCourse("Course A"), buildChunks("Course A", [{ text: "alpha", lesson: 1 }]));
    await index.ingest(buildCourse("Course B"), buildChunks("Course B", [{ text: "beta", lesson: 1 }]));

    expect(await index.removeCourse("Course A")).toBe(true);
    expect(await index.removeCourse("Course A")).toBe(false);
    expect(index.courseCount).toBe(1);
    expect(store.size).toBe(1);

    await index.clear();
    expect(index.courseCount).toBe(0);
    expect(store.size).toBe(0);
  });
});
