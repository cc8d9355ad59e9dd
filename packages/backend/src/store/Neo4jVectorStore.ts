import neo4j, { type SessionConfig } from "neo4j-driver";
import type {
  ChunkRecord,
  ChunkRecordMetadata,
  VectorFilter,
  VectorMatch,
  VectorStore
} from "@coursemate/shared";
import { appConfig } from "../config.js";

export interface Neo4jVectorStoreConfig {
  uri: string;
  user: string;
  password: string;
  database?: string;
  embeddingDimensions: number;
  /** Candidates fetched per requested result when a metadata filter applies. */
  candidateMultiplier?: number;
}

export interface Neo4jRecordLike {
  get(key: string): unknown;
}

export interface Neo4jSessionLike {
  run(query: string, parameters?: Record<string, unknown>): PromiseLike<{ records: Neo4jRecordLike[] }>;
  close(): Promise<void>;
}

export interface Neo4jDriverLike {
  session(config?: SessionConfig): Neo4jSessionLike;
  verifyConnectivity(): Promise<unknown>;
  close(): Promise<void>;
}

type AccessMode = "READ" | "WRITE";

const MAX_CANDIDATES = 1000;

export class Neo4jVectorStore implements VectorStore {
  private driver: Neo4jDriverLike | null = null;
  private readonly candidateMultiplier: number;

  constructor(
    private readonly config: Neo4jVectorStoreConfig,
    private readonly deps: { createDriver?: () => Neo4jDriverLike } = {}
  ) {
    this.candidateMultiplier = Math.max(1, config.candidateMultiplier ?? 10);
  }

  static fromEnv(): Neo4jVectorStore {
    return new Neo4jVectorStore({
      uri: appConfig.NEO4J_URI,
      user: appConfig.NEO4J_USER,
      password: appConfig.NEO4J_PASSWORD,
      database: appConfig.NEO4J_DATABASE,
      embeddingDimensions: appConfig.EMBEDDING_DIMENSIONS
    });
  }

  async connect(): Promise<void> {
    if (this.driver) {
      return;
    }

    this.driver = this.deps.createDriver
      ? this.deps.createDriver()
      : neo4j.driver(this.config.uri, neo4j.auth.basic(this.config.user, this.config.password));

    try {
      await this.driver.verifyConnectivity();
      await this.ensureIndexes();
    } catch (error) {
      await this.disconnect();
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (!this.driver) {
      return;
    }

    await this.driver.close();
    this.driver = null;
  }

  async healthCheck(): Promise<boolean> {
    if (!this.driver) {
      return false;
    }

    try {
      await this.withSession("READ", async (session) => {
        await session.run("RETURN 1 AS ok");
      });
      return true;
    } catch {
      return false;
    }
  }

  async upsert(records: ChunkRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    await this.withSession("WRITE", async (session) => {
      await session.run(
        `
        UNWIND $records AS record
        MERGE (c:Chunk {id: record.id})
        SET
          c.courseTitle = record.courseTitle,
          c.lessonNumber = record.lessonNumber,
          c.index = record.index,
          c.text = record.text,
          c.sourceLabel = record.sourceLabel,
          c.generation = record.generation,
          c.embedding = record.embedding
        `,
        {
          records: records.map((record) => this.serializeRecord(record))
        }
      );
    });
  }

  /**
   * A course or lesson filter runs an exact scan over the matching chunks, so
   * a small course is never crowded out of the vector index's global top
   * candidates. Otherwise the index is queried, over-fetching
   * `k * candidateMultiplier` candidates when only generations are filtered.
   * Neo4j's cosine score lies in [0, 1]; distance is `1 - score`.
   */
  async queryKNN(vector: number[], filter: VectorFilter, k: number): Promise<VectorMatch[]> {
    if (vector.length === 0 || k <= 0) {
      return [];
    }

    const scoped = filter.courseTitle !== undefined || filter.lessonNumber !== undefined;
    const candidates =
      filter.generations !== undefined ? Math.min(MAX_CANDIDATES, Math.max(k, k * this.candidateMultiplier)) : k;
    const source = scoped
      ? `
        MATCH (node:Chunk)
        WHERE ($courseTitle IS NULL OR node.courseTitle = $courseTitle)
          AND ($lessonNumber IS NULL OR node.lessonNumber = $lessonNumber)
          AND ($generations IS NULL OR node.generation IN $generations)
        WITH node, vector.similarity.cosine(node.embedding, $vector) AS score
        `
      : `
        CALL db.index.vector.queryNodes('chunk_embedding', $candidates, $vector)
        YIELD node, score
        WITH node, score
        WHERE $generations IS NULL OR node.generation IN $generations
        `;

    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `${source}
        RETURN
          node.id AS id,
          node.courseTitle AS courseTitle,
          node.lessonNumber AS lessonNumber,
          node.index AS index,
          node.text AS text,
          node.sourceLabel AS sourceLabel,
          node.generation AS generation,
          score
        ORDER BY score DESC
        LIMIT $k
        `,
        {
          vector,
          candidates: neo4j.int(candidates),
          k: neo4j.int(k),
          courseTitle: filter.courseTitle ?? null,
          lessonNumber: filter.lessonNumber ?? null,
          generations: filter.generations ?? null
        }
      );

      return result.records.map((record) => ({
        id: this.toString(record.get("id"), ""),
        metadata: this.mapMetadata(record),
        distance: 1 - this.toNumber(record.get("score"))
      }));
    });
  }

  async deleteCourse(courseTitle: string, options: { keepGeneration?: string } = {}): Promise<void> {
    await this.withSession("WRITE", async (session) => {
      await session.run(
        `
        MATCH (c:Chunk {courseTitle: $courseTitle})
        WHERE $keepGeneration IS NULL OR c.generation <> $keepGeneration
        DETACH DELETE c
        `,
        {
          courseTitle,
          keepGeneration: options.keepGeneration ?? null
        }
      );
    });
  }

  async deleteAll(): Promise<void> {
    await this.withSession("WRITE", async (session) => {
      await session.run("MATCH (c:Chunk) DETACH DELETE c");
    });
  }

  private async ensureIndexes(): Promise<void> {
    const dimension = Math.max(1, Math.floor(this.config.embeddingDimensions));

    await this.withSession("WRITE", async (session) => {
      await session.run(
        `
        CREATE VECTOR INDEX chunk_embedding IF NOT EXISTS
        FOR (c:Chunk) ON (c.embedding)
        OPTIONS {indexConfig: {\`vector.dimensions\`: ${dimension}, \`vector.similarity_function\`: 'cosine'}}
        `
      );
      await session.run(
        `CREATE CONSTRAINT chunk_id_unique IF NOT EXISTS FOR (c:Chunk) REQUIRE c.id IS UNIQUE`
      );
      await session.run(
        `CREATE INDEX chunk_course_idx IF NOT EXISTS FOR (c:Chunk) ON (c.courseTitle)`
      );
    });
  }

  private withSession<T>(accessMode: AccessMode, fn: (session: Neo4jSessionLike) => Promise<T>): Promise<T> {
    const sessionConfig: SessionConfig = {
      defaultAccessMode: accessMode === "READ" ? neo4j.session.READ : neo4j.session.WRITE
    };
    if (this.config.database) {
      sessionConfig.database = this.config.database;
    }

    const session = this.getDriver().session(sessionConfig);

    return fn(session).finally(async () => {
      await session.close();
    });
  }

  private getDriver(): Neo4jDriverLike {
    if (!this.driver) {
      throw new Error("Neo4jVectorStore is not connected. Call connect() first.");
    }

    return this.driver;
  }

  private serializeRecord(record: ChunkRecord): Record<string, unknown> {
    return {
      id: record.id,
      courseTitle: record.metadata.courseTitle,
      lessonNumber: record.metadata.lessonNumber,
      index: record.metadata.index,
      text: record.metadata.text,
      sourceLabel: record.metadata.sourceLabel,
      generation: record.metadata.generation,
      embedding: record.vector
    };
  }

  private mapMetadata(record: Neo4jRecordLike): ChunkRecordMetadata {
    const lessonNumber = record.get("lessonNumber");
    return {
      courseTitle: this.toString(record.get("courseTitle"), ""),
      lessonNumber: lessonNumber === null || lessonNumber === undefined ? null : this.toNumber(lessonNumber),
      index: this.toNumber(record.get("index")),
      text: this.toString(record.get("text"), ""),
      sourceLabel: this.toString(record.get("sourceLabel"), ""),
      generation: this.toString(record.get("generation"), "")
    };
  }

  private toString(value: unknown, fallback: string): string {
    if (typeof value === "string") {
      return value;
    }
    if (typeof value === "number" || typeof value === "boolean") {
      return String(value);
    }
    return fallback;
  }

  private toNumber(value: unknown, fallback = 0): number {
    if (typeof value === "number") {
      return Number.isFinite(value) ? value : fallback;
    }
    if (neo4j.isInt(value)) {
      return value.toNumber();
    }
    if (typeof value === "string" && value.trim() !== "") {
      const parsed = Number(value);
      if (Number.isFinite(parsed)) {
        return parsed;
      }
    }
    return fallback;
  }
}
