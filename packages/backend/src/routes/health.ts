import { Router } from "express";
import type { HealthResponse, ServiceConnectionStatus, VectorStore } from "@coursemate/shared";
import { ConfigurationError } from "../errors.js";
import { checkLlmConfiguration, checkVectorStoreConnection } from "../runtime/connectivity.js";
import { getProviderSelectionSingleton } from "../runtime/ragRuntime.js";

interface CreateHealthRouterOptions {
  store?: VectorStore;
  checkVectorStore?: () => Promise<ServiceConnectionStatus>;
  checkLlm?: () => Promise<ServiceConnectionStatus>;
  getProvider?: () => string | null;
  startTime?: number;
}

export function createHealthRouter(options: CreateHealthRouterOptions = {}): Router {
  const checkVectorStore =
    options.checkVectorStore ??
    (() => checkVectorStoreConnection(options.store ? { store: options.store } : {}));
  const checkLlm = options.checkLlm ?? checkLlmConfiguration;
  const getProvider = options.getProvider ?? selectedProvider;
  const startTime = options.startTime ?? Date.now();

  const healthRouter = Router();

  healthRouter.get("/", async (_req, res) => {
    const [vectorStore, llm] = await Promise.all([checkVectorStore(), checkLlm()]);
    const status: HealthResponse["status"] =
      vectorStore === "ok" && llm === "ok" ? "ok" : "degraded";

    const mem = process.memoryUsage();
    const response: HealthResponse = {
      status,
      timestamp: new Date().toISOString(),
      uptimeSec: Math.max(0, Math.floor((Date.now() - startTime) / 1000)),
      checks: {
        vectorStore,
        llm
      },
      provider: getProvider(),
      memoryUsage: {
        rss: mem.rss,
        heapUsed: mem.heapUsed,
        heapTotal: mem.heapTotal
      }
    };
    res.json(response);
  });

  return healthRouter;
}

function selectedProvider(): string | null {
  try {
    return getProviderSelectionSingleton().selected;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return null;
    }
    throw error;
  }
}

export const healthRouter = createHealthRouter();
