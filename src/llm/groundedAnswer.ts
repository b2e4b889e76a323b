import type { EngineConfig } from "../config/engine";
import { EngineError, isAbortError, userMessageFor } from "../errors";
import type { EvidenceSet, GroundednessVerdict } from "../types";
import { withRetry, withTimeout } from "../utils";
import type { ChatPrompt, LanguageModel } from "./client";
import { checkGroundedness } from "./groundedness";
import { buildAnswerPrompt } from "./prompt";

export interface GenerationDeps {
  model: LanguageModel;
  config: Pick<EngineConfig, "retryBackoffMs" | "timeouts">;
  signal?: AbortSignal;
  /** Prefix for log lines, usually the request id. */
  logTag?: string;
  onModelCall?: () => void;
}

export interface GenerationInput {
  question: string;
  evidence: EvidenceSet;
  history?: readonly string[];
}

export interface GenerationResult {
  status: "answered" | "refused";
  code?: "insufficient-grounded-evidence";
  text: string;
  verdict: GroundednessVerdict;
  /** Language model invocations, including transport retries. */
  modelCalls: number;
  /** Prompts sent: 1, or 2 after a failed groundedness check. */
  attempts: number;
}

/** Strips code fences and empty list artifacts and capitalizes the first letter. */
export function polishAnswer(raw: string): string {
  const cleaned = raw
    .replace(/```[a-z]*\n?/gi, "")
    .split("\n")
    .filter((line) => !/^\s*(?:[-*•]|\[\s*\])\s*$/.test(line))
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
  return cleaned.charAt(0).toUpperCase() + cleaned.slice(1);
}

async function callModel(prompt: ChatPrompt, deps: GenerationDeps, onCall: () => void): Promise<string> {
  const { model, config, signal, logTag = "" } = deps;
  try {
    return await withRetry(
      () => {
        onCall();
        return withTimeout((inner) => model.complete(prompt, { signal: inner }), {
          label: "language model",
          timeoutMs: config.timeouts.modelMs,
          signal
        });
      },
      {
        retries: 1,
        initialDelayMs: config.retryBackoffMs,
        signal,
        onRetry: (error) => console.warn(`[GENERATE]${logTag} model call failed, retrying`, error)
      }
    );
  } catch (error) {
    if (isAbortError(error)) {
      throw error;
    }
    console.error(`[GENERATE]${logTag} model unavailable`, error);
    throw new EngineError("model-unavailable", undefined, { cause: error });
  }
}

/**
 * Asks the model for an answer restricted to the evidence. An answer that
 * fails the groundedness check gets exactly one stricter retry; a second
 * failure becomes a refusal and the model's text is discarded.
 */
export async function generateGroundedAnswer(input: GenerationInput, deps: GenerationDeps): Promise<GenerationResult> {
  if (input.evidence.length === 0) {
    throw new EngineError("no-evidence");
  }

  let modelCalls = 0;
  let verdict: GroundednessVerdict = { grounded: false, unsupported: [], checkedClaims: 0 };
  const logTag = deps.logTag ?? "";

  for (const strict of [false, true]) {
    const prompt = buildAnswerPrompt({ ...input, strict });
    const raw = await callModel(prompt, deps, () => {
      modelCalls += 1;
      deps.onModelCall?.();
    });
    const text = polishAnswer(raw);
    verdict = checkGroundedness(text, input.evidence, { question: input.question });
    const attempts = strict ? 2 : 1;

    if (verdict.grounded) {
      return { status: "answered", text, verdict, modelCalls, attempts };
    }
    console.warn(`[GENERATE]${logTag} attempt ${attempts} ungrounded: ${verdict.unsupported.join(", ")}`);
  }

  return {
    status: "refused",
    code: "insufficient-grounded-evidence",
    text: userMessageFor("insufficient-grounded-evidence"),
    verdict,
    modelCalls,
    attempts: 2
  };
}
