import { randomUUID } from "node:crypto";

export type MessageRole = "user" | "assistant";

export interface ConversationMessage {
  role: MessageRole;
  content: string;
  timestamp: string;
}

interface Session {
  messages: ConversationMessage[];
  touchedAt: number;
}

export interface ConversationMemoryOptions {
  ttlMs?: number;
  maxMessages?: number;
  now?: () => number;
}

/**
 * Per-session question/answer history for the HTTP surface. Lives outside
 * the engine; the orchestrator only ever sees earlier questions as context.
 */
export class ConversationMemory {
  private readonly sessions = new Map<string, Session>();

  private readonly ttlMs: number;

  private readonly maxMessages: number;

  private readonly now: () => number;

  constructor({ ttlMs = 60 * 60 * 1000, maxMessages = 10, now = Date.now }: ConversationMemoryOptions = {}) {
    this.ttlMs = ttlMs;
    this.maxMessages = maxMessages;
    this.now = now;
  }

  newSessionId(): string {
    return randomUUID();
  }

  append(sessionId: string, role: MessageRole, content: string): void {
    this.evictExpired();
    const session = this.sessions.get(sessionId) ?? { messages: [], touchedAt: this.now() };
    session.messages.push({ role, content, timestamp: new Date(this.now()).toISOString() });
    if (session.messages.length > this.maxMessages) {
      session.messages.splice(0, session.messages.length - this.maxMessages);
    }
    session.touchedAt = this.now();
    this.sessions.set(sessionId, session);
  }

  history(sessionId: string): ConversationMessage[] {
    this.evictExpired();
    return [...(this.sessions.get(sessionId)?.messages ?? [])];
  }

  /** Earlier user questions, oldest first. */
  previousQuestions(sessionId: string, limit = 3): string[] {
    return this.history(sessionId)
      .filter((message) => message.role === "user")
      .map((message) => message.content)
      .slice(-limit);
  }

  clear(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  get size(): number {
    this.evictExpired();
    return this.sessions.size;
  }

  private evictExpired(): void {
    const cutoff = this.now() - this.ttlMs;
    for (const [id, session] of this.sessions) {
      if (session.touchedAt < cutoff) {
        this.sessions.delete(id);
      }
    }
  }
}
