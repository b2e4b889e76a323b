import type { AxiosInstance } from "axios";
import type OpenAI from "openai";
import { z } from "zod";
import type { EngineConfig } from "../config/engine";
import type { EmbeddingVector } from "../types";
import { createOllamaHttp, createOpenAIClient, type CallOptions } from "./client";

/** text -> fixed-length vector; deterministic for a given model version. */
export interface EmbeddingFunction {
  readonly modelVersion: string;
  readonly dimension: number;
  embed(text: string, options?: CallOptions): Promise<EmbeddingVector>;
}

const OllamaEmbeddingSchema = z.object({ embedding: z.array(z.number()).min(1) });

export function normalizeVector(vector: readonly number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
  if (norm === 0) {
    return [...vector];
  }
  return vector.map((value) => value / norm);
}

function checked(vector: readonly number[], expected: number, model: string): EmbeddingVector {
  if (vector.length !== expected) {
    throw new Error(`Embedding model ${model} returned ${vector.length} dimensions, expected ${expected}`);
  }
  return Object.freeze(normalizeVector(vector));
}

export class OpenAIEmbeddingFunction implements EmbeddingFunction {
  readonly modelVersion: string;

  readonly dimension: number;

  constructor(
    private readonly config: EngineConfig,
    private readonly openai: OpenAI = createOpenAIClient(config)
  ) {
    this.modelVersion = config.embeddingModel;
    this.dimension = config.embeddingDimension;
  }

  async embed(text: string, { signal }: CallOptions = {}): Promise<EmbeddingVector> {
    const response = await this.openai.embeddings.create(
      {
        model: this.modelVersion,
        input: text,
        ...(this.modelVersion.startsWith("text-embedding-3") ? { dimensions: this.dimension } : {})
      },
      { signal, timeout: this.config.timeouts.embeddingMs }
    );
    const [first] = response.data;
    if (!first) {
      throw new Error("Embedding response contained no vectors");
    }
    return checked(first.embedding, this.dimension, this.modelVersion);
  }
}

export class OllamaEmbeddingFunction implements EmbeddingFunction {
  readonly modelVersion: string;

  readonly dimension: number;

  constructor(
    private readonly config: EngineConfig,
    private readonly http: AxiosInstance = createOllamaHttp(config)
  ) {
    this.modelVersion = config.embeddingModel;
    this.dimension = config.embeddingDimension;
  }

  async embed(text: string, { signal }: CallOptions = {}): Promise<EmbeddingVector> {
    const response = await this.http.post<unknown>(
      "/api/embeddings",
      { model: this.modelVersion, prompt: text },
      { signal, timeout: this.config.timeouts.embeddingMs }
    );
    const parsed = OllamaEmbeddingSchema.parse(response.data);
    return checked(parsed.embedding, this.dimension, this.modelVersion);
  }
}

export function createEmbeddingFunction(config: EngineConfig): EmbeddingFunction {
  return config.provider === "ollama" ? new OllamaEmbeddingFunction(config) : new OpenAIEmbeddingFunction(config);
}
