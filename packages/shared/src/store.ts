export interface ChunkRecordMetadata {
  courseTitle: string;
  lessonNumber: number | null;
  index: number;
  text: string;
  sourceLabel: string;
  generation: string;
}

export interface ChunkRecord {
  id: string;
  vector: number[];
  metadata: ChunkRecordMetadata;
}

export interface VectorFilter {
  courseTitle?: string;
  lessonNumber?: number;
  generations?: string[];
}

export interface VectorMatch {
  id: string;
  metadata: ChunkRecordMetadata;
  distance: number;
}

export interface VectorStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  healthCheck(): Promise<boolean>;
  upsert(records: ChunkRecord[]): Promise<void>;
  queryKNN(vector: number[], filter: VectorFilter, k: number): Promise<VectorMatch[]>;
  deleteCourse(courseTitle: string, options?: { keepGeneration?: string }): Promise<void>;
  deleteAll(): Promise<void>;
}

export interface EmbeddingProvider {
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
  embedMany(texts: string[]): Promise<number[][]>;
}
