import { DEFAULT_ENGINE_CONFIG, withOverrides, type EngineConfig } from "../config/engine";
import type { CallOptions, ChatPrompt, LanguageModel } from "../llm/client";
import type { EmbeddingFunction } from "../llm/embeddings";
import { normalizeVector } from "../llm/embeddings";
import { compareIds } from "../retrieval/structuredQuery";
import { toInspectionRecord, type Queryable, type RecordQuery, type RecordStore } from "../store/recordStore";
import type { IndexDescription, NearestNeighbor, VectorIndex } from "../store/vectorIndex";
import type { AttributeValue, EmbeddingVector, EvidenceItem, FilterCondition, InspectionRecord, Provenance } from "../types";

export const FIXED_NOW = new Date("2024-03-15T12:00:00Z");

export const testConfig: EngineConfig = withOverrides(DEFAULT_ENGINE_CONFIG, {
  embeddingModel: "fake-embed-1",
  embeddingDimension: 4,
  retryBackoffMs: 0,
  timeouts: { recordStoreMs: 50, vectorIndexMs: 50, embeddingMs: 50, modelMs: 50 }
});

export const RECORD_ROWS = {
  r101: {
    record_id: 101,
    vin: "ABC123",
    inspection_date: "2024-02-10",
    inspection_time: "09:30",
    inspection_type: "AB",
    inspector_name: "Bryan Keller",
    ramp: "Detroit North",
    railcar_number: "TTGX100200",
    bay_location: "B12",
    mfg_model: "Ford F150",
    damage_comments: "Scuff on bumper",
    vehicle_comments: null,
    damage_count: 2,
    aiag_codes: "01 02",
    damage_descriptions: "Front bumper - left - scratch - minor; Brake rotor - rear - corrosion - moderate",
    source_file: "batch_0210.pdf"
  },
  r102: {
    record_id: 102,
    vin: "ABC123",
    inspection_date: "2024-02-20",
    inspection_time: "14:00",
    inspection_type: "CD",
    inspector_name: "Dana Ortiz",
    ramp: "Toledo",
    railcar_number: null,
    bay_location: null,
    mfg_model: "Ford F150",
    damage_comments: null,
    vehicle_comments: "Clean",
    damage_count: 0,
    aiag_codes: null,
    damage_descriptions: null,
    source_file: "batch_0220.pdf"
  },
  r103: {
    record_id: 103,
    vin: "1FTFW1E50NFA00001",
    inspection_date: "2024-03-05",
    inspection_time: "08:15",
    inspection_type: "AB",
    inspector_name: "Bryan Keller",
    ramp: "Detroit North",
    railcar_number: null,
    bay_location: "C03",
    mfg_model: "Ford F250",
    damage_comments: null,
    vehicle_comments: null,
    damage_count: 1,
    aiag_codes: "07",
    damage_descriptions: "Brake caliper - front - leak - severe",
    source_file: "batch_0305.pdf"
  },
  r104: {
    record_id: 104,
    vin: "XYZ789",
    inspection_date: "2024-03-12",
    inspection_time: "11:00",
    inspection_type: "AB",
    inspector_name: "Dana Ortiz",
    ramp: "Toledo",
    railcar_number: null,
    bay_location: null,
    mfg_model: "Chevrolet Silverado",
    damage_comments: null,
    vehicle_comments: null,
    damage_count: 3,
    aiag_codes: "03 05",
    damage_descriptions: "Door panel - right - dent - moderate; Brake line - rear - corrosion - minor",
    source_file: "batch_0312.pdf"
  }
};

export const R101 = toInspectionRecord(RECORD_ROWS.r101);
export const R102 = toInspectionRecord(RECORD_ROWS.r102);
export const R103 = toInspectionRecord(RECORD_ROWS.r103);
export const R104 = toInspectionRecord(RECORD_ROWS.r104);
export const ALL_RECORDS = [R101, R102, R103, R104];

export function evidenceItem(record: InspectionRecord, provenance: Provenance, score: number): EvidenceItem {
  return { record, provenance, score };
}

/** "ok" runs normally, "hang" never settles, an Error rejects. */
export type Behavior = "ok" | "hang" | Error;

function nextBehavior(queue: Behavior[], fallback: Behavior): Behavior {
  return queue.shift() ?? fallback;
}

async function apply<T>(behavior: Behavior, run: () => T): Promise<T> {
  if (behavior === "hang") {
    return new Promise<T>(() => undefined);
  }
  if (behavior instanceof Error) {
    throw behavior;
  }
  return run();
}

function compareValues(left: AttributeValue, right: string | number): number | null {
  if (left === null) return null;
  if (typeof left === "number" && typeof right === "number") return left - right;
  const a = String(left);
  const b = String(right);
  return a < b ? -1 : a > b ? 1 : 0;
}

export function matchesCondition(record: InspectionRecord, condition: FilterCondition): boolean {
  const value = record.attributes[condition.field] ?? null;
  switch (condition.kind) {
    case "eq":
      return compareValues(value, condition.value) === 0;
    case "in":
      return condition.values.some((candidate) => compareValues(value, candidate) === 0);
    case "contains":
      return value !== null && String(value).toLowerCase().includes(condition.value.toLowerCase());
    case "range": {
      const checks: Array<[string | number | undefined, (diff: number) => boolean]> = [
        [condition.gt, (diff) => diff > 0],
        [condition.gte, (diff) => diff >= 0],
        [condition.lt, (diff) => diff < 0],
        [condition.lte, (diff) => diff <= 0]
      ];
      return checks.every(([bound, test]) => {
        if (bound === undefined) return true;
        const diff = compareValues(value, bound);
        return diff !== null && test(diff);
      });
    }
  }
}

/** Record store over an array, evaluating filters the way the SQL would. */
export class InMemoryRecordStore implements RecordStore {
  findCalls = 0;

  getByIdsCalls = 0;

  readonly findBehaviors: Behavior[] = [];

  findFallback: Behavior = "ok";

  /** When set, find waits for it before answering. */
  findGate: Promise<void> | null = null;

  constructor(private readonly records: readonly InspectionRecord[] = ALL_RECORDS) {}

  async find(query: RecordQuery): Promise<InspectionRecord[]> {
    this.findCalls += 1;
    const behavior = nextBehavior(this.findBehaviors, this.findFallback);
    if (this.findGate) {
      await this.findGate;
    }
    return apply(behavior, () =>
      this.records
        .filter((record) => query.filter.conditions.every((condition) => matchesCondition(record, condition)))
        .sort((a, b) => (a.inspectedAt === b.inspectedAt ? compareIds(a.id, b.id) : a.inspectedAt < b.inspectedAt ? 1 : -1))
        .slice(0, query.limit)
    );
  }

  async getByIds(ids: readonly string[]): Promise<Map<string, InspectionRecord>> {
    this.getByIdsCalls += 1;
    const found = new Map<string, InspectionRecord>();
    for (const record of this.records) {
      if (ids.includes(record.id)) found.set(record.id, record);
    }
    return found;
  }
}

function dot(a: readonly number[], b: readonly number[]): number {
  return a.reduce((sum, value, index) => sum + value * (b[index] ?? 0), 0);
}

/** Exact nearest-neighbor search reporting pgvector-style distances. */
export class InMemoryVectorIndex implements VectorIndex {
  nearestCalls = 0;

  readonly behaviors: Behavior[] = [];

  fallback: Behavior = "ok";

  constructor(
    private readonly entries: Record<string, number[]>,
    private readonly description: IndexDescription = { metric: "cosine", dimension: 4, modelVersion: "fake-embed-1" }
  ) {}

  async describe(): Promise<IndexDescription> {
    return this.description;
  }

  async nearest(vector: EmbeddingVector, k: number): Promise<NearestNeighbor[]> {
    this.nearestCalls += 1;
    return apply(nextBehavior(this.behaviors, this.fallback), () =>
      Object.entries(this.entries)
        .map(([id, entry]) => ({ id, distance: this.distance(vector, entry) }))
        .sort((a, b) => a.distance - b.distance || compareIds(a.id, b.id))
        .slice(0, k)
    );
  }

  private distance(query: EmbeddingVector, entry: number[]): number {
    switch (this.description.metric) {
      case "cosine":
        return 1 - dot(query, entry) / (Math.sqrt(dot(query, query)) * Math.sqrt(dot(entry, entry)));
      case "inner_product":
        return -dot(query, entry);
      case "l2":
        return Math.sqrt(query.reduce((sum, value, index) => sum + (value - (entry[index] ?? 0)) ** 2, 0));
    }
  }
}

export class FakeEmbedder implements EmbeddingFunction {
  readonly modelVersion = "fake-embed-1";

  calls = 0;

  readonly behaviors: Behavior[] = [];

  fallback: Behavior = "ok";

  constructor(
    readonly dimension = 4,
    private readonly vectorFor: (text: string) => number[] = () => [1, 0, 0, 0]
  ) {}

  async embed(text: string, _options?: CallOptions): Promise<EmbeddingVector> {
    this.calls += 1;
    return apply(nextBehavior(this.behaviors, this.fallback), () => normalizeVector(this.vectorFor(text)));
  }
}

export class ScriptedModel implements LanguageModel {
  readonly modelVersion = "scripted-model";

  readonly prompts: ChatPrompt[] = [];

  constructor(private readonly responses: Array<string | Error> = []) {}

  async complete(prompt: ChatPrompt, _options?: CallOptions): Promise<string> {
    this.prompts.push(prompt);
    const next = this.responses.shift();
    if (next === undefined) {
      throw new Error("No scripted response left");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export interface RecordedQuery {
  text: string;
  values: unknown[];
}

export class FakeQueryable implements Queryable {
  readonly queries: RecordedQuery[] = [];

  constructor(private readonly respond: (text: string, values: unknown[]) => unknown[] = () => []) {}

  async query(text: string, values: unknown[] = []): Promise<{ rows: unknown[] }> {
    this.queries.push({ text, values });
    return { rows: this.respond(text, values) };
  }
}

/** Index over the fixture records plus one entry whose record is gone. */
export function fixtureIndex(): InMemoryVectorIndex {
  return new InMemoryVectorIndex({
    "101": [1, 0, 0, 0],
    "103": [0, 1, 0, 0],
    "104": [-1, 0, 0, 0],
    "999": [1, 1, 0, 0]
  });
}

export function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}
