import { AbortError, TimeoutError } from "./errors";

export interface RetryOptions {
  retries?: number;
  initialDelayMs?: number;
  factor?: number;
  shouldRetry?: (error: unknown) => boolean;
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number) => void;
}

export interface TimeoutOptions {
  label: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december"
];

const MONTH_PATTERN = `(?:${MONTHS.join("|")}|${MONTHS.map((month) => month.slice(0, 3)).join("|")})`;

/** Matches `2024-01-05`, `january 5, 2024`, `jan 5th 2024` and `1/5/2024`. */
export const DATE_PATTERN = `(?:\\d{4}-\\d{2}-\\d{2}|${MONTH_PATTERN}\\.?\\s+\\d{1,2}(?:st|nd|rd|th)?(?:,?\\s*\\d{4})?|\\d{1,2}[/-]\\d{1,2}[/-]\\d{2,4})`;

export function toIsoDate(value: string, referenceYear?: number): string | null {
  const lower = value.trim().toLowerCase();
  const isoMatch = /^(\d{4})-(\d{2})-(\d{2})$/.exec(lower);
  if (isoMatch) {
    const [, year, month, day] = isoMatch;
    return isValidDate(Number(year), Number(month), Number(day)) ? lower : null;
  }

  const monthMatch = new RegExp(`^(${MONTH_PATTERN})\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?(?:,?\\s*(\\d{4}))?$`).exec(lower);
  if (monthMatch) {
    const month = MONTHS.findIndex((name) => name.startsWith(monthMatch[1])) + 1;
    const day = Number(monthMatch[2]);
    const year = monthMatch[3] ? Number(monthMatch[3]) : referenceYear;
    if (year === undefined || month === 0 || !isValidDate(year, month, day)) {
      return null;
    }
    return formatDate(year, month, day);
  }

  const numericMatch = /^(\d{1,2})[/-](\d{1,2})[/-](\d{2,4})$/.exec(lower);
  if (numericMatch) {
    const [, m1, m2, m3] = numericMatch;
    return normalizeNumericDate(Number(m1), Number(m2), Number(m3));
  }

  return null;
}

function normalizeNumericDate(a: number, b: number, c: number): string | null {
  const year = c < 100 ? 2000 + c : c;
  if (isValidDate(year, a, b)) {
    return formatDate(year, a, b);
  }
  if (isValidDate(year, b, a)) {
    return formatDate(year, b, a);
  }
  return null;
}

function isValidDate(year: number, month: number, day: number): boolean {
  const candidate = new Date(Date.UTC(year, month - 1, day));
  return (
    !Number.isNaN(candidate.getTime()) &&
    candidate.getUTCFullYear() === year &&
    candidate.getUTCMonth() + 1 === month &&
    candidate.getUTCDate() === day
  );
}

export function formatDate(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

export function isoDay(date: Date): string {
  return formatDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * 24 * 60 * 60 * 1000);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 2, initialDelayMs = 250, factor = 2, shouldRetry = () => true, signal, onRetry } = options;
  let attempt = 0;
  let delay = initialDelayMs;
  while (true) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= retries || error instanceof AbortError || !shouldRetry(error)) {
        throw error;
      }
      attempt += 1;
      onRetry?.(error, attempt);
      await sleep(delay, signal);
      delay *= factor;
    }
  }
}

/**
 * Runs `run` with its own AbortSignal that fires when the deadline passes or
 * the caller's signal aborts. Deadlines reject with TimeoutError, caller
 * cancellation with AbortError.
 */
export function withTimeout<T>(run: (signal: AbortSignal) => Promise<T>, { label, timeoutMs, signal }: TimeoutOptions): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(new AbortError());
  }

  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const finish = (settle: () => void) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      settle();
    };
    const onAbort = () => {
      controller.abort();
      finish(() => reject(new AbortError()));
    };
    const timer = setTimeout(() => {
      controller.abort();
      finish(() => reject(new TimeoutError(label, timeoutMs)));
    }, timeoutMs);
    signal?.addEventListener("abort", onAbort, { once: true });

    run(controller.signal).then(
      (value) => finish(() => resolve(value)),
      (error: unknown) => finish(() => reject(error))
    );
  });
}

export function elapsedSince(startedAt: number): number {
  return Date.now() - startedAt;
}

export { MONTHS };
