import { Router, type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import { isAbortError, REQUEST_SHAPED_CODES } from "./errors";
import type { ConversationMemory } from "./memory";
import { toCitations, type QueryOrchestrator } from "./orchestrator";
import type { Answer } from "./types";

/** 400 for refusals caused by the request itself, 503 when the model is down. */
export function statusFor(answer: Answer): number {
  if (answer.code && REQUEST_SHAPED_CODES.has(answer.code)) {
    return 400;
  }
  if (answer.status === "failed") {
    return 503;
  }
  return 200;
}

export function toResponseBody(answer: Answer, sessionId: string) {
  return {
    status: answer.status,
    code: answer.code,
    answer: answer.text,
    grounded: answer.grounded,
    citations: toCitations(answer.evidence),
    digest: answer.digest,
    suggestion: answer.suggestion,
    sessionId,
    requestId: answer.metadata.requestId,
    timestamp: new Date().toISOString(),
    metadata: {
      planTag: answer.metadata.planTag,
      rationale: answer.metadata.rationale,
      modelVersion: answer.metadata.modelVersion,
      timings: answer.metadata.timings,
      staleIndexEntries: answer.metadata.staleIndexEntries,
      pathFailures: answer.metadata.pathFailures,
      modelCalls: answer.metadata.modelCalls,
      unsupportedClaims: answer.verdict?.unsupported ?? []
    }
  };
}

export function createRouter(orchestrator: QueryOrchestrator, memory: ConversationMemory): Router {
  const router = Router();

  const AskBodySchema = z.object({
    question: z.string().max(2000),
    topK: z.number().int().min(1).max(orchestrator.config.topKMax).optional(),
    sessionId: z.string().min(1).max(128).optional()
  });

  router.post("/ask", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = AskBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({
        message: "Request body must include a question string.",
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
      });
    }

    const { question, topK, sessionId = memory.newSessionId() } = parsed.data;
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    try {
      const history = memory.previousQuestions(sessionId);
      const answer = await orchestrator.answer({ question, topK, history }, { signal: controller.signal });
      memory.append(sessionId, "user", question);
      memory.append(sessionId, "assistant", answer.text);
      return res.status(statusFor(answer)).json(toResponseBody(answer, sessionId));
    } catch (error) {
      if (isAbortError(error) && controller.signal.aborted) {
        console.info("[ROUTE] client disconnected, run cancelled");
        return undefined;
      }
      return next(error);
    }
  });

  router.get("/session/:id/history", (req: Request, res: Response) => {
    const sessionId = req.params.id;
    return res.json({ sessionId, messages: memory.history(sessionId) });
  });

  router.delete("/session/:id", (req: Request, res: Response) => {
    if (!memory.clear(req.params.id)) {
      return res.status(404).json({ message: "Session not found." });
    }
    return res.status(204).end();
  });

  return router;
}

export default createRouter;
