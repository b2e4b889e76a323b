import dotenv from "dotenv";
import { createApp } from "./src/app";
import { createEngine } from "./src/bootstrap";
import { ConversationMemory } from "./src/memory";

dotenv.config();

const port = process.env.PORT ? Number(process.env.PORT) : 3000;

async function main(): Promise<void> {
  const engine = await createEngine();
  const app = createApp(engine.orchestrator, new ConversationMemory());

  const server = app.listen(port, () => {
    console.log(`Vehicle inspection Q&A listening on port ${port}`);
  });

  process.on("SIGTERM", () => {
    console.log("Received SIGTERM, shutting down.");
    server.close(() => {
      engine.close().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error("Failed to close database pool", error);
          process.exit(1);
        }
      );
    });
  });
}

process.on("unhandledRejection", (reason: unknown) => {
  console.error("Unhandled promise rejection", reason);
});

main().catch((error) => {
  console.error("Startup failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
