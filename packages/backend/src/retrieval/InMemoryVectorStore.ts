import type { ChunkRecord, VectorFilter, VectorMatch, VectorStore } from "@coursemate/shared";

export class InMemoryVectorStore implements VectorStore {
  private readonly records = new Map<string, ChunkRecord>();

  async connect(): Promise<void> {}

  async disconnect(): Promise<void> {}

  async healthCheck(): Promise<boolean> {
    return true;
  }

  get size(): number {
    return this.records.size;
  }

  async upsert(records: ChunkRecord[]): Promise<void> {
    for (const record of records) {
      this.records.set(record.id, {
        id: record.id,
        vector: [...record.vector],
        metadata: { ...record.metadata }
      });
    }
  }

  async queryKNN(vector: number[], filter: VectorFilter, k: number): Promise<VectorMatch[]> {
    if (k <= 0) {
      return [];
    }

    const generations = filter.generations ? new Set(filter.generations) : null;
    const matches: VectorMatch[] = [];

    for (const record of this.records.values()) {
      const { metadata } = record;
      if (filter.courseTitle !== undefined && metadata.courseTitle !== filter.courseTitle) {
        continue;
      }
      if (filter.lessonNumber !== undefined && metadata.lessonNumber !== filter.lessonNumber) {
        continue;
      }
      if (generations && !generations.has(metadata.generation)) {
        continue;
      }

      matches.push({
        id: record.id,
        metadata: { ...metadata },
        distance: cosineDistance(vector, record.vector)
      });
    }

    return matches
      .sort((a, b) => a.distance - b.distance || a.metadata.index - b.metadata.index)
      .slice(0, k);
  }

  async deleteCourse(courseTitle: string, options: { keepGeneration?: string } = {}): Promise<void> {
    for (const [id, record] of this.records) {
      if (
        record.metadata.courseTitle === courseTitle &&
        record.metadata.generation !== options.keepGeneration
      ) {
        this.records.delete(id);
      }
    }
  }

  async deleteAll(): Promise<void> {
    this.records.clear();
  }
}

/** 1 - cosine similarity; a zero vector is at distance 1 from everything. */
export function cosineDistance(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 1;
  }
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
