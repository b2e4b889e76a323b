#!/usr/bin/env node
/**
 * vehicle-qa: ask the inspection records a question from the terminal.
 *
 *   vehicle-qa "question" [--top-k N] [--json]   answer once
 *   vehicle-qa --file questions.txt [--json]     one question per line
 *   vehicle-qa                                   interactive session
 */
import dotenv from "dotenv";
import fs from "node:fs/promises";
import { createInterface } from "node:readline/promises";
import { parseArgs } from "node:util";
import pLimit from "p-limit";
import { createEngine, type Engine } from "./bootstrap";
import { ConfigurationError, REQUEST_SHAPED_CODES } from "./errors";
import { toCitations } from "./orchestrator";
import type { Answer } from "./types";

dotenv.config();

const FILE_CONCURRENCY = 3;

export interface CliOptions {
  question: string | null;
  topK?: number;
  json: boolean;
  file?: string;
  help: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      "top-k": { type: "string" },
      json: { type: "boolean", default: false },
      file: { type: "string" },
      help: { type: "boolean", short: "h", default: false }
    },
    allowPositionals: true
  });

  let topK: number | undefined;
  if (values["top-k"] !== undefined) {
    topK = Number(values["top-k"]);
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ConfigurationError(`--top-k must be a positive integer, got "${values["top-k"]}"`);
    }
  }

  const question = positionals.join(" ").trim();
  return {
    question: question.length > 0 ? question : null,
    topK,
    json: values.json ?? false,
    file: values.file,
    help: values.help ?? false
  };
}

/** 0 for answers and content refusals, 2 when the question itself was refused, 1 for service errors. */
export function exitCodeFor(answer: Answer): number {
  if (answer.status === "failed") {
    return 1;
  }
  if (answer.code && REQUEST_SHAPED_CODES.has(answer.code)) {
    return 2;
  }
  return 0;
}

export function formatAnswer(answer: Answer): string {
  const lines = [answer.text];
  if (answer.suggestion) {
    lines.push(`Suggestion: ${answer.suggestion}`);
  }
  const citations = toCitations(answer.evidence);
  if (citations.length > 0) {
    lines.push("", "Evidence:");
    citations.forEach((citation, index) => {
      lines.push(`  [E${index + 1}] record ${citation.recordId} (${citation.provenance}, ${citation.score.toFixed(2)})`);
    });
  }
  const { metadata } = answer;
  lines.push(
    "",
    `plan=${metadata.planTag ?? "none"} grounded=${answer.grounded} stale=${metadata.staleIndexEntries} model_calls=${metadata.modelCalls} total=${metadata.timings.totalMs}ms`
  );
  return lines.join("\n");
}

function render(answer: Answer, json: boolean): string {
  return json ? JSON.stringify({ ...answer, citations: toCitations(answer.evidence) }, null, 2) : formatAnswer(answer);
}

async function answerFile(engine: Engine, file: string, options: CliOptions): Promise<number> {
  const questions = (await fs.readFile(file, "utf-8"))
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
  const limit = pLimit(FILE_CONCURRENCY);
  const answers = await Promise.all(
    questions.map((question) => limit(() => engine.orchestrator.answer({ question, topK: options.topK })))
  );

  answers.forEach((answer, index) => {
    console.log(options.json ? render(answer, true) : `Q: ${questions[index]}\n${formatAnswer(answer)}\n`);
  });
  return Math.max(0, ...answers.map(exitCodeFor));
}

async function interactive(engine: Engine, options: CliOptions): Promise<number> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const history: string[] = [];
  console.log("Vehicle inspection Q&A. Type 'exit' or 'quit' to leave.");
  try {
    while (true) {
      const question = (await rl.question("\nQuestion: ")).trim();
      if (question === "") continue;
      if (["exit", "quit"].includes(question.toLowerCase())) break;
      const answer = await engine.orchestrator.answer({ question, topK: options.topK, history: history.slice(-3) });
      history.push(question);
      console.log(render(answer, options.json));
    }
  } finally {
    rl.close();
  }
  return 0;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const options = parseCliArgs(argv);
  if (options.help) {
    console.log('Usage: vehicle-qa ["question"] [--top-k N] [--json] [--file questions.txt]');
    return 0;
  }

  const engine = await createEngine();
  try {
    if (options.file) {
      return await answerFile(engine, options.file, options);
    }
    if (options.question) {
      const answer = await engine.orchestrator.answer({ question: options.question, topK: options.topK });
      console.log(render(answer, options.json));
      return exitCodeFor(answer);
    }
    return await interactive(engine, options);
  } finally {
    await engine.close();
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    }
  );
}
