import type { EngineConfig } from "../config/engine";
import { EngineError, isAbortError, toRetrievalError } from "../errors";
import type { EmbeddingFunction } from "../llm/embeddings";
import type { RecordStore } from "../store/recordStore";
import type { VectorIndex } from "../store/vectorIndex";
import type { EvidenceItem, SimilarityMetric } from "../types";
import { withTimeout } from "../utils";
import { compareIds } from "./structuredQuery";

export interface SemanticRetrieverDeps {
  embedder: EmbeddingFunction;
  index: VectorIndex;
  store: RecordStore;
  config: Pick<EngineConfig, "similarityMetric" | "timeouts">;
  signal?: AbortSignal;
}

export interface SemanticResult {
  items: EvidenceItem[];
  /** Neighbors whose record no longer exists in the store. */
  staleCount: number;
}

const clamp = (value: number) => (Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : 0);

/**
 * Maps a raw pgvector distance into [0, 1]. Cosine distance spans [0, 2];
 * `<#>` reports the negated inner product of unit vectors; L2 is unbounded.
 */
export function normalizeScore(distance: number, metric: SimilarityMetric): number {
  switch (metric) {
    case "cosine":
      return clamp(1 - distance / 2);
    case "inner_product":
      return clamp((-distance + 1) / 2);
    case "l2":
      return clamp(1 / (1 + Math.max(0, distance)));
  }
}

async function guarded<T>(label: string, timeoutMs: number, signal: AbortSignal | undefined, run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  try {
    return await withTimeout(run, { label, timeoutMs, signal });
  } catch (error) {
    if (error instanceof EngineError || isAbortError(error)) {
      throw error;
    }
    throw toRetrievalError(error, label);
  }
}

/**
 * Embeds `text`, takes the K nearest index entries and resolves them back to
 * live records. Entries without a live record are dropped and counted.
 */
export async function retrieveSemantic(text: string, k: number, deps: SemanticRetrieverDeps): Promise<SemanticResult> {
  const { embedder, index, store, config, signal } = deps;
  if (k < 1) {
    return { items: [], staleCount: 0 };
  }

  const vector = await guarded("embedding", config.timeouts.embeddingMs, signal, (inner) => embedder.embed(text, { signal: inner }));
  const neighbors = await guarded("vector index", config.timeouts.vectorIndexMs, signal, () => index.nearest(vector, k));

  const scores = new Map<string, number>();
  for (const neighbor of neighbors) {
    const score = normalizeScore(neighbor.distance, config.similarityMetric);
    const previous = scores.get(neighbor.id);
    if (previous === undefined || score > previous) {
      scores.set(neighbor.id, score);
    }
  }
  if (scores.size === 0) {
    return { items: [], staleCount: 0 };
  }

  const ids = Array.from(scores.keys());
  const records = await guarded("record store", config.timeouts.recordStoreMs, signal, () => store.getByIds(ids));

  const items: EvidenceItem[] = [];
  let staleCount = 0;
  for (const id of ids) {
    const record = records.get(id);
    if (!record) {
      staleCount += 1;
      continue;
    }
    items.push(Object.freeze({ record, provenance: "SEMANTIC" as const, score: scores.get(id) ?? 0 }));
  }

  items.sort((a, b) => b.score - a.score || compareIds(a.record.id, b.record.id));
  return { items: items.slice(0, k), staleCount };
}
