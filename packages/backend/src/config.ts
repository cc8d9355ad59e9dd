import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Repository root; `.env` and a relative DOCS_DIR resolve against it. */
export const projectRoot = resolve(__dirname, "../../..");
loadEnv({ path: resolve(projectRoot, ".env") });

export const providerIds = ["openai", "anthropic", "gemini", "xai"] as const;
export type ProviderId = (typeof providerIds)[number];

const providerPriorityList = z
  .string()
  .default("openai,anthropic,gemini,xai")
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim().toLowerCase())
      .filter((item) => item.length > 0)
  )
  .pipe(z.array(z.enum(providerIds)).min(1));

const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(8000),
    CORS_ORIGIN: z.string().default("*"),
    MAX_UPLOAD_SIZE: z.coerce.number().int().positive().default(10 * 1024 * 1024),
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    DOCS_DIR: z.string().default("docs"),
    CHUNK_SIZE: z.coerce.number().int().positive().default(800),
    CHUNK_OVERLAP: z.coerce.number().int().min(0).default(100),
    MAX_RESULTS: z.coerce.number().int().positive().default(5),
    MAX_HISTORY: z.coerce.number().int().min(0).default(2),
    MAX_CHUNKS_PER_DOCUMENT: z.coerce.number().int().positive().default(2000),
    QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(90_000),
    LLM_PROVIDER_PRIORITY: providerPriorityList,
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(800),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
    LLM_MAX_CONCURRENT: z.coerce.number().int().positive().default(5),
    LLM_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(60),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
    LLM_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),
    OPENAI_API_KEY: z.string().default(""),
    OPENAI_BASE_URL: z.string().default("https://api.openai.com/v1"),
    OPENAI_MODEL: z.string().default("gpt-4o"),
    ANTHROPIC_API_KEY: z.string().default(""),
    ANTHROPIC_MODEL: z.string().default("claude-sonnet-4-20250514"),
    GOOGLE_API_KEY: z.string().default(""),
    GEMINI_BASE_URL: z.string().default("https://generativelanguage.googleapis.com/v1beta/openai/"),
    GEMINI_MODEL: z.string().default("gemini-1.5-pro-002"),
    XAI_API_KEY: z.string().default(""),
    XAI_BASE_URL: z.string().default("https://api.x.ai/v1"),
    GROK_MODEL: z.string().default("grok-2-latest"),
    EMBEDDING_PROVIDER: z.enum(["local", "openai"]).default("local"),
    EMBEDDING_API_KEY: z.string().default(""),
    EMBEDDING_BASE_URL: z.string().default(""),
    EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
    EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(384),
    VECTOR_STORE: z.enum(["memory", "neo4j"]).default("memory"),
    NEO4J_URI: z.string().default("bolt://localhost:7687"),
    NEO4J_USER: z.string().default("neo4j"),
    NEO4J_PASSWORD: z.string().default(""),
    NEO4J_DATABASE: z.string().default("neo4j")
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    path: ["CHUNK_OVERLAP"]
  });

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "env"}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid environment configuration: ${issues.join("; ")}`);
  }

  return parsed.data;
}

export const appConfig: AppConfig = loadConfig(process.env);
