import type { EmbeddingProvider, VectorStore } from "@coursemate/shared";
import { appConfig } from "../config.js";
import { createModelBackend, resolveProviderSelection, type ProviderSelection } from "../llm/providerSelection.js";
import type { ModelBackend } from "../llm/types.js";
import { CourseIngestionPipeline } from "../pipeline/CourseIngestionPipeline.js";
import { InMemoryVectorStore } from "../retrieval/InMemoryVectorStore.js";
import { RetrievalIndex } from "../retrieval/RetrievalIndex.js";
import { FifoWindowPolicy } from "../services/ConversationStore.js";
import { CourseQAService } from "../services/CourseQAService.js";
import { HashingEmbeddingProvider } from "../services/HashingEmbeddingProvider.js";
import { InMemoryConversationStore } from "../services/InMemoryConversationStore.js";
import { OpenAIEmbeddingProvider } from "../services/OpenAIEmbeddingProvider.js";
import { OrchestrationLoop } from "../services/OrchestrationLoop.js";
import { Neo4jVectorStore } from "../store/Neo4jVectorStore.js";
import { CourseOutlineTool } from "../tools/CourseOutlineTool.js";
import { CourseSearchTool } from "../tools/CourseSearchTool.js";
import { ToolRegistry } from "../tools/ToolRegistry.js";

let vectorStoreSingleton: VectorStore | null = null;
let embeddingProviderSingleton: EmbeddingProvider | null = null;
let retrievalIndexSingleton: RetrievalIndex | null = null;
let ingestionPipelineSingleton: CourseIngestionPipeline | null = null;
let providerSelectionSingleton: ProviderSelection | null = null;
let modelBackendSingleton: ModelBackend | null = null;
let qaServiceSingleton: CourseQAService | null = null;
let connectPromise: Promise<void> | null = null;

export function getVectorStoreSingleton(): VectorStore {
  if (!vectorStoreSingleton) {
    vectorStoreSingleton =
      appConfig.VECTOR_STORE === "neo4j" ? Neo4jVectorStore.fromEnv() : new InMemoryVectorStore();
  }

  return vectorStoreSingleton;
}

export function getEmbeddingProviderSingleton(): EmbeddingProvider {
  if (!embeddingProviderSingleton) {
    embeddingProviderSingleton =
      appConfig.EMBEDDING_PROVIDER === "openai"
        ? OpenAIEmbeddingProvider.fromEnv()
        : new HashingEmbeddingProvider(appConfig.EMBEDDING_DIMENSIONS);
  }

  return embeddingProviderSingleton;
}

export function getRetrievalIndexSingleton(): RetrievalIndex {
  if (!retrievalIndexSingleton) {
    retrievalIndexSingleton = new RetrievalIndex(getVectorStoreSingleton(), getEmbeddingProviderSingleton());
  }

  return retrievalIndexSingleton;
}

export function getIngestionPipelineSingleton(): CourseIngestionPipeline {
  if (!ingestionPipelineSingleton) {
    ingestionPipelineSingleton = new CourseIngestionPipeline(getRetrievalIndexSingleton());
  }

  return ingestionPipelineSingleton;
}

/** Resolved once per process; throws ConfigurationError when no provider has a key. */
export function getProviderSelectionSingleton(): ProviderSelection {
  if (!providerSelectionSingleton) {
    providerSelectionSingleton = resolveProviderSelection(appConfig);
  }

  return providerSelectionSingleton;
}

export function getModelBackendSingleton(): ModelBackend {
  if (!modelBackendSingleton) {
    modelBackendSingleton = createModelBackend(getProviderSelectionSingleton(), appConfig);
  }

  return modelBackendSingleton;
}

export function createToolRegistry(index: RetrievalIndex, maxResults = appConfig.MAX_RESULTS): ToolRegistry {
  return new ToolRegistry()
    .register(new CourseSearchTool(index, maxResults))
    .register(new CourseOutlineTool(index));
}

export function getQAServiceSingleton(): CourseQAService {
  if (!qaServiceSingleton) {
    const index = getRetrievalIndexSingleton();
    const loop = new OrchestrationLoop(getModelBackendSingleton(), createToolRegistry(index));
    const conversations = new InMemoryConversationStore(new FifoWindowPolicy(appConfig.MAX_HISTORY * 2));
    qaServiceSingleton = new CourseQAService(loop, conversations, {
      queryTimeoutMs: appConfig.QUERY_TIMEOUT_MS
    });
  }

  return qaServiceSingleton;
}

export async function ensureVectorStoreConnected(
  store: VectorStore = getVectorStoreSingleton()
): Promise<void> {
  if (connectPromise) {
    return connectPromise;
  }

  connectPromise = store.connect().catch((error: unknown) => {
    connectPromise = null;
    throw error;
  });

  return connectPromise;
}
