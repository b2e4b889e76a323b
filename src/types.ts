import type { ErrorCode } from "./errors";

export type AttributeValue = string | number | null;

/**
 * Immutable snapshot of one inspection row. The core only ever holds copies
 * handed out by the record store.
 */
export interface InspectionRecord {
  readonly id: string;
  readonly vehicleId: string;
  /** ISO-8601 timestamp built from inspection date and time. */
  readonly inspectedAt: string;
  readonly attributes: Readonly<Record<string, AttributeValue>>;
  readonly summary: string;
}

export type EmbeddingVector = readonly number[];

export type SimilarityMetric = "cosine" | "inner_product" | "l2";

export type PlanTag = "STRUCTURED" | "SEMANTIC" | "HYBRID";

export type FilterScalar = string | number;

export type FilterCondition =
  | { readonly kind: "eq"; readonly field: string; readonly value: FilterScalar }
  | {
      readonly kind: "range";
      readonly field: string;
      readonly gt?: FilterScalar;
      readonly gte?: FilterScalar;
      readonly lt?: FilterScalar;
      readonly lte?: FilterScalar;
    }
  | { readonly kind: "in"; readonly field: string; readonly values: readonly FilterScalar[] }
  | { readonly kind: "contains"; readonly field: string; readonly value: string };

/** Conjunction of conditions over whitelisted attributes. */
export interface FilterPredicate {
  readonly conditions: readonly FilterCondition[];
}

export interface RetrievalPlan {
  readonly tag: PlanTag;
  readonly filter?: FilterPredicate;
  readonly semanticText?: string;
  readonly rationale: string;
}

export type PlanRejectionCode = Extract<ErrorCode, "plan-empty" | "invalid-field" | "read-only-request">;

export type PlanOutcome =
  | { readonly status: "planned"; readonly plan: RetrievalPlan }
  | { readonly status: "rejected"; readonly code: PlanRejectionCode; readonly message: string };

export type Provenance = "STRUCTURED" | "SEMANTIC" | "BOTH";

export interface EvidenceItem {
  readonly record: InspectionRecord;
  readonly provenance: Provenance;
  /** Relevance within the producing path, normalized to [0, 1]. */
  readonly score: number;
}

export type EvidenceSet = readonly EvidenceItem[];

export interface GroundednessVerdict {
  readonly grounded: boolean;
  readonly unsupported: readonly string[];
  readonly checkedClaims: number;
}

export interface EvidenceDigest {
  recordCount: number;
  topDamage: { type: string; count: number } | null;
  topInspector: { name: string; count: number } | null;
  sourceFiles: string[];
}

export type RetrievalPath = "structured" | "semantic";

export interface PathFailure {
  path: RetrievalPath;
  code: Extract<ErrorCode, "retrieval-timeout" | "retrieval-failed">;
  attempts: number;
}

export interface RunTimings {
  classifyMs: number;
  structuredMs: number | null;
  semanticMs: number | null;
  mergeMs: number | null;
  generateMs: number | null;
  totalMs: number;
}

export interface RunMetadata {
  requestId: string;
  planTag: PlanTag | null;
  rationale: string | null;
  modelVersion: string;
  timings: RunTimings;
  staleIndexEntries: number;
  pathFailures: PathFailure[];
  modelCalls: number;
  generationAttempts: number;
}

export type AnswerStatus = "answered" | "refused" | "failed";

export interface Answer {
  readonly status: AnswerStatus;
  readonly code?: ErrorCode;
  readonly text: string;
  readonly evidence: EvidenceSet;
  readonly grounded: boolean;
  readonly verdict: GroundednessVerdict | null;
  readonly digest: EvidenceDigest | null;
  readonly suggestion?: string;
  readonly metadata: RunMetadata;
}

export interface AskRequest {
  question: string;
  topK?: number;
  /** Earlier questions from the same conversation, oldest first. */
  history?: string[];
}

export interface Citation {
  recordId: string;
  provenance: Provenance;
  score: number;
}
