import type { Pool } from "pg";
import { createPool } from "./config/db";
import { loadEngineConfig, type EngineConfig } from "./config/engine";
import { ConfigurationError } from "./errors";
import { createLanguageModel, type LanguageModel } from "./llm/client";
import { createEmbeddingFunction, type EmbeddingFunction } from "./llm/embeddings";
import { QueryOrchestrator } from "./orchestrator";
import { PgRecordStore } from "./store/recordStore";
import { PgVectorIndex, type VectorIndex } from "./store/vectorIndex";

export interface Engine {
  orchestrator: QueryOrchestrator;
  config: EngineConfig;
  close(): Promise<void>;
}

/**
 * Startup check: the configured metric and the embedder's dimension must
 * match what the index was built with. Also embeds a probe string so a
 * model that disagrees with its declared dimension fails here, not per request.
 */
export async function assertIndexCompatible(index: VectorIndex, embedder: EmbeddingFunction, config: EngineConfig): Promise<void> {
  const description = await index.describe();
  if (description.metric !== config.similarityMetric) {
    throw new ConfigurationError(
      `Similarity metric mismatch: engine uses ${config.similarityMetric}, index was built with ${description.metric}`
    );
  }
  if (description.dimension !== embedder.dimension) {
    throw new ConfigurationError(
      `Embedding dimension mismatch: ${embedder.modelVersion} produces ${embedder.dimension}, index expects ${description.dimension}`
    );
  }
  if (description.modelVersion && description.modelVersion !== embedder.modelVersion) {
    console.warn(`[STARTUP] index was built with ${description.modelVersion}, engine embeds with ${embedder.modelVersion}`);
  }

  const probe = await embedder.embed("inspection record");
  if (probe.length !== description.dimension) {
    throw new ConfigurationError(`Embedding probe returned ${probe.length} dimensions, index expects ${description.dimension}`);
  }
}

export async function createEngine(config: EngineConfig = loadEngineConfig(), pool: Pool = createPool({ statementTimeoutMs: config.timeouts.recordStoreMs })): Promise<Engine> {
  const store = new PgRecordStore(pool);
  const index = new PgVectorIndex(pool, config.similarityMetric);

  let embedder: EmbeddingFunction;
  let model: LanguageModel;
  try {
    embedder = createEmbeddingFunction(config);
    model = createLanguageModel(config);
    await assertIndexCompatible(index, embedder, config);
  } catch (error) {
    await pool.end();
    throw error;
  }

  console.info(
    `[STARTUP] ${config.provider} model ${model.modelVersion}, embeddings ${embedder.modelVersion} (${embedder.dimension}d, ${config.similarityMetric})`
  );

  return {
    orchestrator: new QueryOrchestrator({ store, index, embedder, model, config }),
    config,
    close: () => pool.end()
  };
}
