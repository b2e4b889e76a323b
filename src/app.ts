import express, { type Application, type NextFunction, type Request, type Response } from "express";
import fs from "node:fs";
import path from "node:path";
import helmet from "helmet";
import swaggerUi from "swagger-ui-express";
import type { ConversationMemory } from "./memory";
import type { QueryOrchestrator } from "./orchestrator";
import { createRouter } from "./routes";

export interface AppOptions {
  /** Serve /docs from this OpenAPI document when it exists. */
  swaggerPath?: string;
}

function loadSwaggerDocument(candidates: string[]): Record<string, unknown> | null {
  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    console.warn(`Swagger definition not found at ${candidates.join(" or ")}. /docs route disabled.`);
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(found, "utf-8"));
    return parsed !== null && typeof parsed === "object" && !Array.isArray(parsed) ? Object.fromEntries(Object.entries(parsed)) : null;
  } catch (error) {
    console.error("Failed to parse swagger.json", error);
    return null;
  }
}

export function createApp(orchestrator: QueryOrchestrator, memory: ConversationMemory, options: AppOptions = {}): Application {
  const app: Application = express();

  app.use(helmet());
  app.use(express.json({ limit: "1mb" }));

  // Compiled output sits one level below the project root.
  const swaggerDocument = loadSwaggerDocument(
    options.swaggerPath ? [options.swaggerPath] : [path.resolve(__dirname, "..", "swagger.json"), path.resolve(__dirname, "..", "..", "swagger.json")]
  );
  if (swaggerDocument) {
    app.use("/docs", swaggerUi.serve, swaggerUi.setup(swaggerDocument));
  }

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", uptime: process.uptime() });
  });

  app.use(createRouter(orchestrator, memory));

  // Basic error handler for uncaught errors within the request pipeline.
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error("Unhandled error", err);
    if (err instanceof SyntaxError) {
      res.status(400).json({ message: "Request body must be valid JSON." });
      return;
    }
    res.status(500).json({ message: "Unexpected server error" });
  });

  return app;
}
