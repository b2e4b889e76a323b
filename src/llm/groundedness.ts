import { INSPECTION_ATTRIBUTES } from "../store/schema";
import type { EvidenceSet, GroundednessVerdict } from "../types";
import { DATE_PATTERN, MONTHS, toIsoDate } from "../utils";

export interface GroundednessOptions {
  /** Words in the question may be echoed back without evidence. */
  question?: string;
}

const LABEL_PATTERN = /\[\s*E\d+(?:\s*,\s*E\d+)*\s*\]/g;
const IDENTIFIER_PATTERN = /\b[A-Za-z0-9][A-Za-z0-9-]{3,}\b/g;
const NUMBER_PATTERN = /\b\d[\d,]*(?:\.\d+)?\b/g;
const ORDINAL_PATTERN = /^\d+(?:st|nd|rd|th)$/i;

/** Capitalized sentence openers that never name an entity. */
const SENTENCE_OPENERS = new Set([
  "the", "a", "an", "this", "that", "these", "those", "it", "its", "there", "they", "both", "all", "each", "only",
  "one", "two", "three", "in", "on", "at", "for", "from", "during", "after", "before", "between", "of", "with",
  "based", "according", "overall", "however", "also", "inspected", "found", "recorded", "reported", "most", "some"
]);

const WEEKDAYS = ["monday", "tuesday", "wednesday", "thursday", "friday", "saturday", "sunday"];

/** Capitalized words an answer may use without them appearing in the evidence. */
const DOMAIN_WORDS = [
  "vin", "vins", "aiag", "record", "records", "inspection", "inspections", "inspector", "inspectors", "vehicle",
  "vehicles", "damage", "damages", "ramp", "bay", "railcar", "model", "source", "file", "type", "count", "comments",
  "evidence", "summary", "note", "none", "yes", "no", "i", "e"
];

const ALLOWED_WORDS = new Set<string>([
  ...DOMAIN_WORDS,
  ...MONTHS,
  ...MONTHS.map((month) => month.slice(0, 3)),
  ...WEEKDAYS,
  ...INSPECTION_ATTRIBUTES.flatMap((attribute) => attribute.synonyms.flatMap((synonym) => synonym.split(/\s+/)))
]);

function corpusOf(evidence: EvidenceSet): string {
  return evidence
    .map((item) =>
      [item.record.id, item.record.vehicleId, item.record.inspectedAt, item.record.summary, ...Object.values(item.record.attributes)]
        .filter((value) => value !== null && value !== undefined)
        .join(" ")
    )
    .join("\n")
    .toLowerCase();
}

/** Dates and clock times, whose digit groups are not quantities. */
const TIMESTAMP_PATTERN = /\d{4}-\d{2}-\d{2}(?:t\d{2}:\d{2}(?::\d{2})?)?|\b\d{1,2}:\d{2}(?::\d{2})?\b/g;

function tokensOf(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/[^a-z0-9]+/).filter((token) => token.length > 0));
}

/** Every alphanumeric piece of `raw` must be a whole token of the text. */
function containsTokens(tokens: ReadonlySet<string>, raw: string): boolean {
  const pieces = raw.toLowerCase().split(/[^a-z0-9]+/).filter((piece) => piece.length > 0);
  return pieces.length > 0 && pieces.every((piece) => tokens.has(piece));
}

function numbersIn(text: string): Set<number> {
  const numbers = new Set<number>();
  for (const match of text.match(NUMBER_PATTERN) ?? []) {
    const value = Number(match.replace(/,/g, ""));
    if (Number.isFinite(value)) numbers.add(value);
  }
  return numbers;
}

function mask(text: string, start: number, length: number): string {
  return text.slice(0, start) + " ".repeat(length) + text.slice(start + length);
}

/**
 * Containment policy: every date, identifier, number and capitalized name in
 * the answer must occur as whole tokens of the evidence text. Numbers up to
 * the evidence size are accepted as counts over the evidence itself.
 */
export function checkGroundedness(answer: string, evidence: EvidenceSet, options: GroundednessOptions = {}): GroundednessVerdict {
  const corpus = corpusOf(evidence);
  const corpusTokens = tokensOf(corpus);
  const questionTokens = tokensOf(options.question ?? "");
  const evidenceNumbers = numbersIn(corpus.replace(TIMESTAMP_PATTERN, " "));
  const evidenceDates = new Set(corpus.match(/\d{4}-\d{2}-\d{2}/g) ?? []);
  const unsupported: string[] = [];
  let checkedClaims = 0;

  let text = answer.replace(LABEL_PATTERN, (label) => " ".repeat(label.length));

  for (const match of Array.from(text.matchAll(new RegExp(DATE_PATTERN, "gi")))) {
    const raw = match[0];
    checkedClaims += 1;
    const hasYear = /\d{4}/.test(raw);
    const iso = toIsoDate(raw, 2000);
    const supported =
      iso !== null && (hasYear ? evidenceDates.has(iso) : Array.from(evidenceDates).some((date) => date.endsWith(iso.slice(4))));
    if (!supported) unsupported.push(raw);
    text = mask(text, match.index ?? 0, raw.length);
  }

  for (const match of Array.from(text.matchAll(IDENTIFIER_PATTERN))) {
    const raw = match[0];
    if (!/\d/.test(raw) || !/[a-z]/i.test(raw) || ORDINAL_PATTERN.test(raw)) continue;
    checkedClaims += 1;
    if (!containsTokens(corpusTokens, raw)) unsupported.push(raw);
    text = mask(text, match.index ?? 0, raw.length);
  }

  for (const match of Array.from(text.matchAll(NUMBER_PATTERN))) {
    const raw = match[0];
    const value = Number(raw.replace(/,/g, ""));
    checkedClaims += 1;
    const isCount = Number.isInteger(value) && value >= 0 && value <= evidence.length;
    if (!isCount && !evidenceNumbers.has(value)) unsupported.push(raw);
  }

  for (const sentence of text.split(/(?<=[.!?:])\s+|\n+/)) {
    const words = sentence.replace(/^[\s\-*•>#\d.)]+/, "").match(/[A-Za-z][A-Za-z'-]*/g) ?? [];
    words.forEach((word, position) => {
      if (!/^[A-Z]/.test(word)) return;
      const lower = word.toLowerCase().replace(/'s$/, "");
      if (ALLOWED_WORDS.has(lower) || (position === 0 && SENTENCE_OPENERS.has(lower))) return;
      checkedClaims += 1;
      if (!containsTokens(corpusTokens, lower) && !containsTokens(questionTokens, lower)) unsupported.push(word);
    });
  }

  return { grounded: unsupported.length === 0, unsupported: Array.from(new Set(unsupported)), checkedClaims };
}
