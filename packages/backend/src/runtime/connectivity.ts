import type { ServiceConnectionStatus, VectorStore } from "@coursemate/shared";
import { appConfig, providerIds } from "../config.js";
import { providerApiKey } from "../llm/providerSelection.js";
import { ensureVectorStoreConnected, getVectorStoreSingleton } from "./ragRuntime.js";

export function isNeo4jConfigured(): boolean {
  return (
    appConfig.NEO4J_URI.trim().length > 0 &&
    appConfig.NEO4J_USER.trim().length > 0 &&
    appConfig.NEO4J_PASSWORD.trim().length > 0
  );
}

export function isLlmConfigured(): boolean {
  return providerIds.some((provider) => providerApiKey(appConfig, provider).length > 0);
}

interface VectorStoreConnectionOptions {
  store?: VectorStore;
  ensureStoreConnected?: () => Promise<void>;
}

export async function checkVectorStoreConnection(
  options: VectorStoreConnectionOptions = {}
): Promise<ServiceConnectionStatus> {
  if (!options.store && appConfig.VECTOR_STORE === "neo4j" && !isNeo4jConfigured()) {
    return "not_configured";
  }

  const store = options.store ?? getVectorStoreSingleton();
  const ensureStoreConnected =
    options.ensureStoreConnected ??
    (options.store ? () => store.connect() : () => ensureVectorStoreConnected(store));

  try {
    await ensureStoreConnected();
    const healthy = await store.healthCheck();
    return healthy ? "ok" : "failed";
  } catch {
    return "failed";
  }
}

/** Reports whether any provider has a key; no request is sent. */
export async function checkLlmConfiguration(): Promise<ServiceConnectionStatus> {
  return isLlmConfigured() ? "ok" : "not_configured";
}
