import { randomUUID } from "node:crypto";
import { withOverrides, type EngineConfig } from "./config/engine";
import { EngineError, isAbortError, userMessageFor, type ErrorCode } from "./errors";
import type { LanguageModel } from "./llm/client";
import type { EmbeddingFunction } from "./llm/embeddings";
import { generateGroundedAnswer } from "./llm/groundedAnswer";
import { digestEvidence } from "./retrieval/evidenceDigest";
import { mergeEvidence } from "./retrieval/evidenceMerger";
import { classifyQuestion } from "./retrieval/queryClassifier";
import { retrieveSemantic } from "./retrieval/semanticRetriever";
import { runStructuredQuery } from "./retrieval/structuredQuery";
import type { RecordStore } from "./store/recordStore";
import type { VectorIndex } from "./store/vectorIndex";
import type {
  Answer,
  AnswerStatus,
  AskRequest,
  Citation,
  EvidenceItem,
  EvidenceSet,
  PathFailure,
  RetrievalPath,
  RetrievalPlan,
  RunMetadata,
  RunTimings
} from "./types";
import { elapsedSince, withRetry } from "./utils";

export interface OrchestratorDeps {
  store: RecordStore;
  index: VectorIndex;
  embedder: EmbeddingFunction;
  model: LanguageModel;
  config: EngineConfig;
  /** Clock for relative dates in questions. */
  now?: () => Date;
}

/** Settings a single run may change; adapters keep their startup settings. */
export type RunSettings = Pick<EngineConfig, "topK" | "topKMax" | "evidenceCap" | "structuredRowLimit" | "timeouts" | "retryBackoffMs">;

export interface AnswerOptions {
  signal?: AbortSignal;
  requestId?: string;
  /** Replaces the run settings of the engine configuration for this run only. */
  config?: RunSettings;
}

function runSettingsOf(settings: RunSettings): RunSettings {
  return {
    topK: settings.topK,
    topKMax: settings.topKMax,
    evidenceCap: settings.evidenceCap,
    structuredRowLimit: settings.structuredRowLimit,
    timeouts: settings.timeouts,
    retryBackoffMs: settings.retryBackoffMs
  };
}

interface PathOutcome {
  items: EvidenceItem[];
  staleCount: number;
  failure: PathFailure | null;
  elapsedMs: number;
}

const EMPTY_PATH: PathOutcome = { items: [], staleCount: 0, failure: null, elapsedMs: 0 };

export function toCitations(evidence: EvidenceSet): Citation[] {
  return evidence.map((item) => ({ recordId: item.record.id, provenance: item.provenance, score: Number(item.score.toFixed(4)) }));
}

/** Hint attached to a no-evidence refusal. */
export function suggestFor(question: string, plan: RetrievalPlan | null): string {
  const fields = new Set(plan?.filter?.conditions.map((condition) => condition.field) ?? []);
  const lower = question.toLowerCase();
  if (fields.has("vin") || /\b(?:vin|vehicle)\b/.test(lower)) {
    return "Verify the VIN or vehicle identifier is correct.";
  }
  if (fields.has("inspection_date")) {
    return "Try widening the date range.";
  }
  return "Try a more specific question, for example with a VIN, a date or an inspector name.";
}

/**
 * One request/response cycle: classify, retrieve (both paths concurrently for
 * HYBRID), merge, then generate a grounded answer. Holds no per-request state.
 */
export class QueryOrchestrator {
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  get config(): EngineConfig {
    return this.deps.config;
  }

  async answer(request: AskRequest, options: AnswerOptions = {}): Promise<Answer> {
    const startedAt = Date.now();
    const config = options.config ? withOverrides(this.deps.config, runSettingsOf(options.config)) : this.deps.config;
    const requestId = options.requestId ?? randomUUID();
    const { signal } = options;
    const tag = ` ${requestId}`;
    const topK = Math.min(Math.max(1, Math.floor(request.topK ?? config.topK)), config.topKMax);

    const timings: RunTimings = {
      classifyMs: 0,
      structuredMs: null,
      semanticMs: null,
      mergeMs: null,
      generateMs: null,
      totalMs: 0
    };
    const metadata: RunMetadata = {
      requestId,
      planTag: null,
      rationale: null,
      modelVersion: this.deps.model.modelVersion,
      timings,
      staleIndexEntries: 0,
      pathFailures: [],
      modelCalls: 0,
      generationAttempts: 0
    };

    const finish = (
      status: AnswerStatus,
      fields: Partial<Pick<Answer, "code" | "evidence" | "verdict" | "digest" | "suggestion">> & { text: string }
    ): Answer => {
      timings.totalMs = elapsedSince(startedAt);
      console.info(`[ANSWER]${tag} ${status}${fields.code ? ` (${fields.code})` : ""} in ${timings.totalMs}ms`);
      return Object.freeze({
        status,
        evidence: [],
        verdict: null,
        digest: null,
        ...fields,
        grounded: status === "answered",
        metadata
      });
    };
    const refuse = (code: ErrorCode, detail?: string, plan: RetrievalPlan | null = null) =>
      finish("refused", {
        code,
        text: detail ? `${userMessageFor(code)} (${detail})` : userMessageFor(code),
        suggestion: code === "no-evidence" ? suggestFor(request.question, plan) : undefined
      });

    const classifyStarted = Date.now();
    const outcome = classifyQuestion(request.question, { now: this.now() });
    timings.classifyMs = elapsedSince(classifyStarted);
    if (outcome.status === "rejected") {
      console.info(`[ROUTE]${tag} rejected: ${outcome.code}: ${outcome.message}`);
      return refuse(outcome.code, outcome.code === "invalid-field" ? outcome.message : undefined);
    }

    const { plan } = outcome;
    metadata.planTag = plan.tag;
    metadata.rationale = plan.rationale;
    console.info(`[ROUTE]${tag} ${plan.tag}: ${plan.rationale}`);

    // Both paths start before either is awaited; Promise.all is the join.
    const filter = plan.tag !== "SEMANTIC" ? plan.filter : undefined;
    const structuredTask: Promise<PathOutcome> = filter
      ? this.runPath("structured", config, signal, tag, async () => ({
          items: await runStructuredQuery(filter, { store: this.deps.store, config, signal }),
          staleCount: 0
        }))
      : Promise.resolve(EMPTY_PATH);
    const semanticText = plan.tag !== "STRUCTURED" ? plan.semanticText : undefined;
    const semanticTask: Promise<PathOutcome> =
      semanticText
        ? this.runPath("semantic", config, signal, tag, () =>
            retrieveSemantic(semanticText, topK, {
              embedder: this.deps.embedder,
              index: this.deps.index,
              store: this.deps.store,
              config,
              signal
            })
          )
        : Promise.resolve(EMPTY_PATH);

    let structured: PathOutcome;
    let semantic: PathOutcome;
    try {
      [structured, semantic] = await Promise.all([structuredTask, semanticTask]);
    } catch (error) {
      if (error instanceof EngineError && error.code === "invalid-field") {
        return refuse("invalid-field", error.message);
      }
      throw error;
    }

    if (plan.tag !== "SEMANTIC") timings.structuredMs = structured.elapsedMs;
    if (plan.tag !== "STRUCTURED") timings.semanticMs = semantic.elapsedMs;
    metadata.staleIndexEntries = semantic.staleCount;
    metadata.pathFailures = [structured.failure, semantic.failure].filter((failure): failure is PathFailure => failure !== null);
    if (semantic.staleCount > 0) {
      console.warn(`[SEMANTIC]${tag} dropped ${semantic.staleCount} stale index entries`);
    }

    const mergeStarted = Date.now();
    const merged = mergeEvidence([structured.items, semantic.items], config.evidenceCap);
    timings.mergeMs = elapsedSince(mergeStarted);
    if (merged.status === "no-evidence") {
      console.info(`[MERGE]${tag} no evidence`);
      return refuse("no-evidence", undefined, plan);
    }
    const { evidence } = merged;
    console.info(`[MERGE]${tag} ${evidence.length} evidence items`);

    const digest = digestEvidence(evidence);
    const generateStarted = Date.now();
    try {
      const generated = await generateGroundedAnswer(
        { question: request.question, evidence, history: request.history },
        {
          model: this.deps.model,
          config,
          signal,
          logTag: tag,
          onModelCall: () => {
            metadata.modelCalls += 1;
          }
        }
      );
      timings.generateMs = elapsedSince(generateStarted);
      metadata.generationAttempts = generated.attempts;
      return finish(generated.status, {
        code: generated.code,
        text: generated.text,
        evidence,
        verdict: generated.verdict,
        digest
      });
    } catch (error) {
      timings.generateMs = elapsedSince(generateStarted);
      if (error instanceof EngineError && error.code === "model-unavailable") {
        return finish("failed", { code: "model-unavailable", text: userMessageFor("model-unavailable"), evidence, digest });
      }
      throw error;
    }
  }

  /**
   * Runs one retrieval path with a single retry. Retryable failures become a
   * recorded PathFailure with empty evidence; anything else propagates.
   */
  private async runPath(
    path: RetrievalPath,
    config: EngineConfig,
    signal: AbortSignal | undefined,
    tag: string,
    run: () => Promise<{ items: EvidenceItem[]; staleCount: number }>
  ): Promise<PathOutcome> {
    const startedAt = Date.now();
    const label = path === "structured" ? "[STRUCTURED]" : "[SEMANTIC]";
    let attempts = 1;
    try {
      const result = await withRetry(run, {
        retries: 1,
        initialDelayMs: config.retryBackoffMs,
        signal,
        shouldRetry: (error) => error instanceof EngineError && error.retryable,
        onRetry: (error, attempt) => {
          attempts = attempt + 1;
          console.warn(`${label}${tag} attempt ${attempt} failed, retrying`, error);
        }
      });
      console.info(`${label}${tag} ${result.items.length} items`);
      return { ...result, failure: null, elapsedMs: elapsedSince(startedAt) };
    } catch (error) {
      if (isAbortError(error) || !(error instanceof EngineError) || !error.retryable) {
        throw error;
      }
      const code = error.code === "retrieval-timeout" ? "retrieval-timeout" : "retrieval-failed";
      console.error(`${label}${tag} failed after ${attempts} attempts`, error.cause ?? error);
      return { items: [], staleCount: 0, failure: { path, code, attempts }, elapsedMs: elapsedSince(startedAt) };
    }
  }
}
