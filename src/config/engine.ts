import { z } from "zod";
import { ConfigurationError } from "../errors";
import type { SimilarityMetric } from "../types";

const intFromEnv = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const EngineEnvSchema = z.object({
  LLM_PROVIDER: z.enum(["openai", "ollama"]).default("openai"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  OLLAMA_BASE_URL: z.string().url().default("http://localhost:11434"),
  LLM_MODEL: z.string().min(1).default("gpt-4o-mini"),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  EMBEDDING_DIMENSION: intFromEnv(1536, 1, 16_000),
  SIMILARITY_METRIC: z.enum(["cosine", "inner_product", "l2"]).default("cosine"),
  EVIDENCE_CAP: intFromEnv(10, 1, 100),
  TOP_K: intFromEnv(5, 1, 100),
  TOP_K_MAX: intFromEnv(20, 1, 100),
  STRUCTURED_ROW_LIMIT: intFromEnv(50, 1, 1000),
  RECORD_STORE_TIMEOUT_MS: intFromEnv(5_000, 50, 120_000),
  VECTOR_INDEX_TIMEOUT_MS: intFromEnv(5_000, 50, 120_000),
  EMBEDDING_TIMEOUT_MS: intFromEnv(10_000, 50, 120_000),
  MODEL_TIMEOUT_MS: intFromEnv(60_000, 50, 600_000),
  RETRY_BACKOFF_MS: intFromEnv(200, 0, 10_000)
});

export type ModelProvider = "openai" | "ollama";

export interface EngineConfig {
  readonly provider: ModelProvider;
  readonly openaiApiKey?: string;
  readonly openaiBaseUrl?: string;
  readonly ollamaBaseUrl: string;
  readonly modelVersion: string;
  readonly temperature: number;
  readonly embeddingModel: string;
  readonly embeddingDimension: number;
  readonly similarityMetric: SimilarityMetric;
  readonly evidenceCap: number;
  readonly topK: number;
  readonly topKMax: number;
  readonly structuredRowLimit: number;
  readonly timeouts: {
    readonly recordStoreMs: number;
    readonly vectorIndexMs: number;
    readonly embeddingMs: number;
    readonly modelMs: number;
  };
  readonly retryBackoffMs: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = loadEngineConfig({});

/**
 * Builds the immutable configuration value threaded through the engine.
 * Only entry points call this; the core never reads process.env.
 */
export function loadEngineConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));
  const result = EngineEnvSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigurationError(`Invalid engine configuration: ${issues}`);
  }
  const parsed = result.data;
  if (parsed.TOP_K > parsed.TOP_K_MAX) {
    throw new ConfigurationError(`TOP_K (${parsed.TOP_K}) exceeds TOP_K_MAX (${parsed.TOP_K_MAX})`);
  }

  return deepFreeze({
    provider: parsed.LLM_PROVIDER,
    openaiApiKey: parsed.OPENAI_API_KEY,
    openaiBaseUrl: parsed.OPENAI_BASE_URL,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
    modelVersion: parsed.LLM_MODEL,
    temperature: parsed.LLM_TEMPERATURE,
    embeddingModel: parsed.EMBEDDING_MODEL,
    embeddingDimension: parsed.EMBEDDING_DIMENSION,
    similarityMetric: parsed.SIMILARITY_METRIC,
    evidenceCap: parsed.EVIDENCE_CAP,
    topK: parsed.TOP_K,
    topKMax: parsed.TOP_K_MAX,
    structuredRowLimit: parsed.STRUCTURED_ROW_LIMIT,
    timeouts: {
      recordStoreMs: parsed.RECORD_STORE_TIMEOUT_MS,
      vectorIndexMs: parsed.VECTOR_INDEX_TIMEOUT_MS,
      embeddingMs: parsed.EMBEDDING_TIMEOUT_MS,
      modelMs: parsed.MODEL_TIMEOUT_MS
    },
    retryBackoffMs: parsed.RETRY_BACKOFF_MS
  });
}

/** Returns a copy of `base` with overrides applied, frozen again. */
export function withOverrides(base: EngineConfig, overrides: Partial<Omit<EngineConfig, "timeouts">> & { timeouts?: Partial<EngineConfig["timeouts"]> }): EngineConfig {
  return deepFreeze({
    ...base,
    ...overrides,
    timeouts: { ...base.timeouts, ...overrides.timeouts }
  });
}

function deepFreeze<T extends object>(value: T): T {
  for (const inner of Object.values(value)) {
    if (inner !== null && typeof inner === "object") {
      deepFreeze(inner);
    }
  }
  return Object.freeze(value);
}
