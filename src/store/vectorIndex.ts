import { z } from "zod";
import type { EmbeddingVector, SimilarityMetric } from "../types";
import type { Queryable } from "./recordStore";
import { EMBEDDINGS_TABLE, INDEX_META_TABLE } from "./schema";

export interface NearestNeighbor {
  id: string;
  /** Raw metric value as the index reports it; smaller is closer. */
  distance: number;
}

export interface IndexDescription {
  metric: SimilarityMetric;
  dimension: number;
  modelVersion: string | null;
}

export interface VectorIndex {
  describe(): Promise<IndexDescription>;
  nearest(vector: EmbeddingVector, k: number): Promise<NearestNeighbor[]>;
}

const METRIC_OPERATORS: Record<SimilarityMetric, string> = {
  cosine: "<=>",
  inner_product: "<#>",
  l2: "<->"
};

const NeighborRowSchema = z.object({
  id: z.coerce.string(),
  distance: z.coerce.number()
});

const MetaRowSchema = z.object({
  metric: z.enum(["cosine", "inner_product", "l2"]),
  dimension: z.coerce.number().int().positive(),
  model: z.string().nullish()
});

export function toVectorLiteral(vector: EmbeddingVector): string {
  return `[${vector.map((value) => (Number.isFinite(value) ? value.toFixed(8) : "0.00000000")).join(",")}]`;
}

/**
 * pgvector-backed index. The operator follows the metric the index was built
 * with; startup checks that it matches the engine configuration.
 */
export class PgVectorIndex implements VectorIndex {
  constructor(
    private readonly db: Queryable,
    private readonly metric: SimilarityMetric
  ) {}

  async describe(): Promise<IndexDescription> {
    const result = await this.db.query(`SELECT metric, dimension, model FROM ${INDEX_META_TABLE} ORDER BY built_at DESC LIMIT 1`);
    const [row] = result.rows;
    if (row === undefined) {
      throw new Error(`${INDEX_META_TABLE} has no index build metadata`);
    }
    const parsed = MetaRowSchema.parse(row);
    return { metric: parsed.metric, dimension: parsed.dimension, modelVersion: parsed.model ?? null };
  }

  async nearest(vector: EmbeddingVector, k: number): Promise<NearestNeighbor[]> {
    const operator = METRIC_OPERATORS[this.metric];
    const result = await this.db.query(
      `SELECT record_id::text AS id, embedding ${operator} $1::vector AS distance
       FROM ${EMBEDDINGS_TABLE}
       ORDER BY embedding ${operator} $1::vector, record_id ASC
       LIMIT $2`,
      [toVectorLiteral(vector), k]
    );
    return result.rows.map((row) => NeighborRowSchema.parse(row));
  }
}
