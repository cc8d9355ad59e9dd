import OpenAI from "openai";
import type { EmbeddingProvider } from "@coursemate/shared";
import { appConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";
import { ProviderCallLimiter } from "./ProviderCallLimiter.js";

export interface OpenAIEmbeddingConfig {
  apiKey: string;
  baseURL?: string;
  model: string;
  dimensions: number;
  batchSize?: number;
}

export interface EmbeddingsClient {
  embeddings: {
    create(
      body: OpenAI.EmbeddingCreateParams,
      options?: { signal?: AbortSignal }
    ): Promise<OpenAI.CreateEmbeddingResponse>;
  };
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions: number;
  private readonly client: EmbeddingsClient;
  private readonly limiter: ProviderCallLimiter;
  private readonly model: string;
  private readonly batchSize: number;

  constructor(
    config: OpenAIEmbeddingConfig,
    deps?: {
      client?: EmbeddingsClient;
      limiter?: ProviderCallLimiter;
    }
  ) {
    if (!deps?.client && config.apiKey.trim().length === 0) {
      throw new ConfigurationError("EMBEDDING_PROVIDER=openai requires EMBEDDING_API_KEY or OPENAI_API_KEY");
    }

    this.dimensions = config.dimensions;
    this.model = config.model;
    this.batchSize = Math.max(1, config.batchSize ?? 64);
    this.client =
      deps?.client ??
      new OpenAI({
        apiKey: config.apiKey,
        ...(config.baseURL ? { baseURL: config.baseURL } : {}),
        maxRetries: 0
      });
    this.limiter =
      deps?.limiter ??
      new ProviderCallLimiter("openai-embeddings", {
        maxConcurrent: appConfig.LLM_MAX_CONCURRENT,
        retries: appConfig.LLM_MAX_RETRIES,
        retryDelayMs: appConfig.LLM_RETRY_DELAY_MS,
        requestsPerMinute: appConfig.LLM_REQUESTS_PER_MINUTE,
        timeoutMs: appConfig.LLM_TIMEOUT_MS
      });
  }

  static fromEnv(): OpenAIEmbeddingProvider {
    const config: OpenAIEmbeddingConfig = {
      apiKey: appConfig.EMBEDDING_API_KEY || appConfig.OPENAI_API_KEY,
      model: appConfig.EMBEDDING_MODEL,
      dimensions: appConfig.EMBEDDING_DIMENSIONS
    };
    const baseURL = appConfig.EMBEDDING_BASE_URL || appConfig.OPENAI_BASE_URL;
    if (baseURL) {
      config.baseURL = baseURL;
    }
    return new OpenAIEmbeddingProvider(config);
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedMany([text]);
    if (!vector) {
      throw new Error("Embedding response contained no vectors");
    }
    return vector;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let offset = 0; offset < texts.length; offset += this.batchSize) {
      const batch = texts.slice(offset, offset + this.batchSize);
      const response = await this.limiter.run((signal) =>
        this.client.embeddings.create(
          {
            model: this.model,
            input: batch,
            dimensions: this.dimensions
          },
          { signal }
        )
      );

      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      if (ordered.length !== batch.length) {
        throw new Error(`Expected ${batch.length} embeddings, received ${ordered.length}`);
      }
      for (const item of ordered) {
        if (item.embedding.length !== this.dimensions) {
          throw new Error(
            `Embedding dimension mismatch: expected ${this.dimensions}, got ${item.embedding.length}`
          );
        }
        vectors.push(item.embedding);
      }
    }
    return vectors;
  }
}
