import axios, { type AxiosInstance } from "axios";
import OpenAI from "openai";
import { z } from "zod";
import type { EngineConfig } from "../config/engine";
import { ConfigurationError } from "../errors";

export interface ChatPrompt {
  system: string;
  user: string;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface LanguageModel {
  readonly modelVersion: string;
  complete(prompt: ChatPrompt, options?: CallOptions): Promise<string>;
}

const OllamaGenerateSchema = z.object({ response: z.string() });

export function createOpenAIClient(config: EngineConfig): OpenAI {
  if (!config.openaiApiKey) {
    throw new ConfigurationError("OPENAI_API_KEY is not configured");
  }
  // Retries are owned by the engine, not the SDK.
  return new OpenAI({ apiKey: config.openaiApiKey, baseURL: config.openaiBaseUrl, maxRetries: 0 });
}

export function createOllamaHttp(config: EngineConfig): AxiosInstance {
  return axios.create({ baseURL: config.ollamaBaseUrl, headers: { "Content-Type": "application/json" } });
}

export class OpenAIChatModel implements LanguageModel {
  readonly modelVersion: string;

  constructor(
    private readonly config: EngineConfig,
    private readonly openai: OpenAI = createOpenAIClient(config)
  ) {
    this.modelVersion = config.modelVersion;
  }

  async complete(prompt: ChatPrompt, { signal }: CallOptions = {}): Promise<string> {
    const response = await this.openai.chat.completions.create(
      {
        model: this.config.modelVersion,
        temperature: this.config.temperature,
        max_tokens: 800,
        messages: [
          { role: "system", content: prompt.system },
          { role: "user", content: prompt.user }
        ]
      },
      { signal, timeout: this.config.timeouts.modelMs }
    );

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error("Model returned empty response");
    }
    return content;
  }
}

export class OllamaChatModel implements LanguageModel {
  readonly modelVersion: string;

  constructor(
    private readonly config: EngineConfig,
    private readonly http: AxiosInstance = createOllamaHttp(config)
  ) {
    this.modelVersion = config.modelVersion;
  }

  async complete(prompt: ChatPrompt, { signal }: CallOptions = {}): Promise<string> {
    const response = await this.http.post<unknown>(
      "/api/generate",
      {
        model: this.config.modelVersion,
        system: prompt.system,
        prompt: prompt.user,
        stream: false,
        options: { temperature: this.config.temperature }
      },
      { signal, timeout: this.config.timeouts.modelMs }
    );

    const parsed = OllamaGenerateSchema.parse(response.data);
    if (parsed.response.trim().length === 0) {
      throw new Error("Model returned empty response");
    }
    return parsed.response;
  }
}

export function createLanguageModel(config: EngineConfig): LanguageModel {
  return config.provider === "ollama" ? new OllamaChatModel(config) : new OpenAIChatModel(config);
}
