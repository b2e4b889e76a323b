import { INSPECTION_ATTRIBUTES, isOrderedKind, resolveAttributeReference, type AttributeDefinition } from "../store/schema";
import type { FilterCondition, FilterScalar, PlanOutcome, PlanRejectionCode, RetrievalPlan } from "../types";
import { DATE_PATTERN, addDays, formatDate, isoDay, toIsoDate } from "../utils";

export interface ClassifyOptions {
  /** Reference instant for relative dates such as "last week". */
  now?: Date;
}

const DESTRUCTIVE_PATTERN = /\b(delete|drop|truncate|alter|update|insert)\b/i;

const STOPWORDS = new Set([
  "a", "an", "the", "and", "or", "of", "to", "in", "on", "at", "for", "by", "with", "from", "into", "about",
  "is", "are", "was", "were", "be", "been", "it", "its", "this", "that", "these", "those", "me", "my", "i",
  "we", "us", "you", "your", "there", "their", "them", "they", "any", "some", "all", "please", "can", "could",
  "would", "will", "do", "does", "did", "has", "have", "had", "one", "ones", "s"
]);

/** Words that ask for filterable facts rather than explanation. */
const FACTUAL_WORDS = new Set([
  "show", "list", "find", "get", "give", "display", "fetch", "return", "filter", "filtered", "sort", "sorted",
  "group", "grouped", "order", "ordered", "where", "field", "column", "inspections", "inspection", "records", "record",
  "vehicles", "vehicle", "cars", "car", "vins", "vin", "how", "many", "much", "count", "number", "total", "what",
  "which", "when", "who", "latest", "last", "recent", "most", "date", "dates", "done", "performed", "inspected",
  "details", "history", "service", "time", "times", "each", "every", "ids", "id", "results", "entries", "data"
]);

const SEMANTIC_CUES: RegExp[] = [
  /\bsimilar\b/,
  /\bresembl/,
  /\blike\s+(?:the|that|this|those)\b/,
  /\bwhy\b/,
  /\bexplain/,
  /\bdescribe/,
  /\bsummar/,
  /\bpatterns?\b/,
  /\btrends?\b/,
  /\bissues?\b/,
  /\bproblems?\b/,
  /\brelated\b/,
  /\bcomparable\b/,
  /\bkinds?\s+of\b/,
  /\bwhat\s+happened\b/,
  /\btell\s+me\s+about\b/
];

const COMPARATORS: Array<{ phrase: string; build: (field: string, value: number) => FilterCondition }> = [
  { phrase: "more than", build: (field, value) => ({ kind: "range", field, gt: value }) },
  { phrase: "greater than", build: (field, value) => ({ kind: "range", field, gt: value }) },
  { phrase: "over", build: (field, value) => ({ kind: "range", field, gt: value }) },
  { phrase: "above", build: (field, value) => ({ kind: "range", field, gt: value }) },
  { phrase: "at least", build: (field, value) => ({ kind: "range", field, gte: value }) },
  { phrase: "fewer than", build: (field, value) => ({ kind: "range", field, lt: value }) },
  { phrase: "less than", build: (field, value) => ({ kind: "range", field, lt: value }) },
  { phrase: "under", build: (field, value) => ({ kind: "range", field, lt: value }) },
  { phrase: "below", build: (field, value) => ({ kind: "range", field, lt: value }) },
  { phrase: "at most", build: (field, value) => ({ kind: "range", field, lte: value }) },
  { phrase: "exactly", build: (field, value) => ({ kind: "eq", field, value }) },
  { phrase: "equal to", build: (field, value) => ({ kind: "eq", field, value }) }
];

interface PhraseExtractor {
  field: string;
  pattern: RegExp;
  build: (value: string) => FilterCondition | null;
}

const SKIP_VALUES = new Set([...STOPWORDS, ...FACTUAL_WORDS]);

const upper = (value: string) => value.toUpperCase().replace(/\s+/g, "");

const PHRASE_EXTRACTORS: PhraseExtractor[] = [
  {
    field: "record_id",
    pattern: /\brecord(?:\s+(?:id|number))?\s*#?\s*(\d+)\b/g,
    build: (value) => ({ kind: "eq", field: "record_id", value })
  },
  {
    field: "inspector_name",
    pattern: /\b(?:inspected\s+by|inspector(?:\s+name)?(?:\s+(?:is|was|named|called))?)\s+([a-z][a-z'.-]+(?:\s+[a-z][a-z'.-]+)?)/g,
    build: (value) => {
      const words: string[] = [];
      for (const word of value.split(/\s+/)) {
        if (SKIP_VALUES.has(word.toLowerCase())) break;
        words.push(word);
      }
      return words.length > 0 ? { kind: "contains", field: "inspector_name", value: words.join(" ") } : null;
    }
  },
  {
    field: "inspection_type",
    pattern: /\binspection\s+types?\s+([a-z0-9]{2}(?:\s*(?:,|or|and)\s*[a-z0-9]{2})*)\b/g,
    build: (value) => {
      const codes = value.split(/\s*(?:,|\bor\b|\band\b)\s*/).filter(Boolean).map(upper);
      if (codes.length === 0) return null;
      return codes.length === 1
        ? { kind: "eq", field: "inspection_type", value: codes[0] }
        : { kind: "in", field: "inspection_type", values: codes };
    }
  },
  {
    field: "railcar_number",
    pattern: /\brailcar(?:\s+number)?\s+([a-z]{2,4}\s?\d{3,})\b/g,
    build: (value) => ({ kind: "eq", field: "railcar_number", value: upper(value) })
  },
  {
    field: "bay_location",
    pattern: /\bbay(?:\s+location)?\s+([a-z0-9-]{1,10})\b/g,
    build: (value) => (/\d/.test(value) ? { kind: "eq", field: "bay_location", value: upper(value) } : null)
  },
  {
    field: "source_file",
    pattern: /\b(?:source\s+)?file\s+([\w.-]+\.(?:pdf|csv|xlsx?|txt|json))\b/g,
    build: (value) => ({ kind: "eq", field: "source_file", value })
  },
  {
    field: "ramp",
    pattern: /\b(?:ramp|facility|location)\s+(?:named\s+|called\s+)?([a-z0-9][a-z0-9'.-]*)/g,
    build: (value) => (SKIP_VALUES.has(value.toLowerCase()) ? null : { kind: "contains", field: "ramp", value })
  },
  {
    field: "mfg_model",
    pattern: /\b(?:model|make|manufacturer)\s+([a-z0-9][a-z0-9-]*)/g,
    build: (value) => (SKIP_VALUES.has(value.toLowerCase()) ? null : { kind: "contains", field: "mfg_model", value })
  }
];

class QuestionScanner {
  readonly original: string;

  private masked: string;

  constructor(question: string) {
    const lower = question.toLowerCase();
    // Offsets into `original` must line up with the lowercased copy.
    this.original = lower.length === question.length ? question : lower;
    this.masked = lower;
  }

  get text(): string {
    return this.masked;
  }

  matches(pattern: RegExp): RegExpMatchArray[] {
    return Array.from(this.masked.matchAll(pattern));
  }

  consume(match: RegExpMatchArray): void {
    const start = match.index ?? 0;
    this.masked = this.masked.slice(0, start) + " ".repeat(match[0].length) + this.masked.slice(start + match[0].length);
  }

  /** Returns a capture group with the question's original casing. */
  originalGroup(match: RegExpMatchArray, group: number): string {
    const value = match[group] ?? "";
    const start = (match.index ?? 0) + match[0].lastIndexOf(value);
    return this.original.slice(start, start + value.length);
  }

  stripBackticks(): void {
    this.masked = this.masked.replace(/`/g, " ");
  }
}

class PlanRejected extends Error {
  constructor(
    readonly code: PlanRejectionCode,
    message: string
  ) {
    super(message);
  }
}

function contentWords(text: string): string[] {
  return (text.match(/[a-z0-9][a-z0-9']*/g) ?? []).filter((word) => !STOPWORDS.has(word));
}

function attributeWords(): Set<string> {
  const words = new Set<string>();
  for (const attribute of INSPECTION_ATTRIBUTES) {
    for (const part of attribute.name.split("_")) words.add(part);
    for (const synonym of attribute.synonyms) {
      for (const part of synonym.split(/\s+/)) words.add(part);
    }
  }
  return words;
}

const ATTRIBUTE_WORDS = attributeWords();

function requireAttribute(reference: string): AttributeDefinition {
  const attribute = resolveAttributeReference(reference);
  if (!attribute) {
    throw new PlanRejected("invalid-field", `Unknown attribute "${reference}"`);
  }
  return attribute;
}

function coerceValue(attribute: AttributeDefinition, raw: string, now: Date): FilterScalar {
  const value = raw.replace(/^["']|["']$/g, "").trim();
  if (attribute.kind === "number") {
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      throw new PlanRejected("invalid-field", `"${value}" is not a number for ${attribute.name}`);
    }
    return parsed;
  }
  if (attribute.kind === "date") {
    const iso = toIsoDate(value, now.getUTCFullYear());
    if (!iso) {
      throw new PlanRejected("invalid-field", `"${value}" is not a date for ${attribute.name}`);
    }
    return iso;
  }
  if (attribute.name === "vin" || attribute.name === "inspection_type") {
    return upper(value);
  }
  return value;
}

function pairCondition(attribute: AttributeDefinition, operator: string, value: FilterScalar): FilterCondition {
  if (operator === "=" || operator === ":") {
    return attribute.kind === "fuzzy"
      ? { kind: "contains", field: attribute.name, value: String(value) }
      : { kind: "eq", field: attribute.name, value };
  }
  if (!isOrderedKind(attribute.kind)) {
    throw new PlanRejected("invalid-field", `${attribute.name} cannot be compared with ${operator}`);
  }
  switch (operator) {
    case ">":
      return { kind: "range", field: attribute.name, gt: value };
    case ">=":
      return { kind: "range", field: attribute.name, gte: value };
    case "<":
      return { kind: "range", field: attribute.name, lt: value };
    default:
      return { kind: "range", field: attribute.name, lte: value };
  }
}

/** `field=value`, `field: value`, `field >= 3`, and bare references such as "filter by `x`". */
function extractExplicitFields(scanner: QuestionScanner, conditions: FilterCondition[], now: Date): void {
  for (const match of scanner.matches(/`([^`]+)`/g)) {
    requireAttribute(match[1]);
  }
  scanner.stripBackticks();

  const pairPattern = /\b([a-z][a-z0-9]*(?:_[a-z0-9]+)*)\s*(>=|<=|=|:|>|<)\s*("[^"]*"|'[^']*'|[^\s,;?]+)/g;
  for (const match of scanner.matches(pairPattern)) {
    const name = match[1];
    const attribute = resolveAttributeReference(name);
    if (!attribute) {
      if (name.includes("_")) {
        throw new PlanRejected("invalid-field", `Unknown attribute "${name}"`);
      }
      continue;
    }
    const value = coerceValue(attribute, scanner.originalGroup(match, 3), now);
    conditions.push(pairCondition(attribute, match[2], value));
    scanner.consume(match);
  }

  const referencePattern = /\b(?:filter(?:ed)?\s+by|group(?:ed)?\s+by|sort(?:ed)?\s+by|order(?:ed)?\s+by|where|field|column)\s+([a-z][a-z0-9]*(?:_[a-z0-9]+)+)\b/g;
  for (const match of scanner.matches(referencePattern)) {
    requireAttribute(match[1]);
    scanner.consume(match);
  }
}

function looksLikeVehicleId(value: string): boolean {
  return /\d/.test(value) && (/[a-z]/i.test(value) || value.length >= 6);
}

function extractVehicles(scanner: QuestionScanner, conditions: FilterCondition[]): void {
  for (const match of scanner.matches(/\b(?:vins|vehicles|cars)\s+([a-z0-9]{5,17}(?:\s*(?:,|\band\b|\bor\b)\s*[a-z0-9]{5,17})+)\b/g)) {
    const ids = match[1].split(/\s*(?:,|\band\b|\bor\b)\s*/).filter(Boolean);
    if (ids.length > 1 && ids.every(looksLikeVehicleId)) {
      conditions.push({ kind: "in", field: "vin", values: ids.map(upper) });
      scanner.consume(match);
    }
  }

  for (const match of scanner.matches(/\b(?:vin|vehicle)\s+(?:number\s+)?end(?:ing|s)\s+(?:with|in)\s+(?:number\s+)?([a-z0-9]{3,17})\b/g)) {
    conditions.push({ kind: "contains", field: "vin", value: upper(match[1]) });
    scanner.consume(match);
  }

  for (const match of scanner.matches(/\b(?:(?:vin|vehicle|car)(?:\s+(?:number|id))?\s*[:#]?\s*)?([a-hj-npr-z0-9]{17})\b/g)) {
    if (/\d/.test(match[1]) && /[a-z]/.test(match[1])) {
      conditions.push({ kind: "eq", field: "vin", value: upper(match[1]) });
      scanner.consume(match);
    }
  }

  for (const match of scanner.matches(/\b(?:vin|vehicle|car)\b(?:\s+(?:number|id))?\s*[:#]?\s*([a-z0-9]{4,17})\b/g)) {
    if (looksLikeVehicleId(match[1])) {
      conditions.push({ kind: "eq", field: "vin", value: upper(match[1]) });
      scanner.consume(match);
    }
  }
}

function extractDates(scanner: QuestionScanner, conditions: FilterCondition[], now: Date): void {
  const field = "inspection_date";
  const year = now.getUTCFullYear();
  const iso = (value: string) => toIsoDate(value.replace(/\s+/g, " "), year);

  for (const match of scanner.matches(new RegExp(`\\bbetween\\s+(${DATE_PATTERN})\\s+and\\s+(${DATE_PATTERN})`, "g"))) {
    const from = iso(match[1]);
    const to = iso(match[2]);
    if (from && to) {
      conditions.push({ kind: "range", field, gte: from <= to ? from : to, lte: from <= to ? to : from });
      scanner.consume(match);
    }
  }

  const bounded: Array<{ pattern: RegExp; build: (value: string) => FilterCondition }> = [
    { pattern: new RegExp(`\\bafter\\s+(${DATE_PATTERN})`, "g"), build: (value) => ({ kind: "range", field, gt: value }) },
    {
      pattern: new RegExp(`\\b(?:since|from|starting)\\s+(${DATE_PATTERN})`, "g"),
      build: (value) => ({ kind: "range", field, gte: value })
    },
    {
      pattern: new RegExp(`\\b(?:before|prior\\s+to)\\s+(${DATE_PATTERN})`, "g"),
      build: (value) => ({ kind: "range", field, lt: value })
    },
    {
      pattern: new RegExp(`\\b(?:until|till|through|up\\s+to)\\s+(${DATE_PATTERN})`, "g"),
      build: (value) => ({ kind: "range", field, lte: value })
    },
    { pattern: new RegExp(`(?:\\bon\\s+)?\\b(${DATE_PATTERN})`, "g"), build: (value) => ({ kind: "eq", field, value }) }
  ];

  for (const { pattern, build } of bounded) {
    for (const match of scanner.matches(pattern)) {
      const value = iso(match[1]);
      if (value) {
        conditions.push(build(value));
        scanner.consume(match);
      }
    }
  }

  const today = isoDay(now);
  const relative: Array<{ pattern: RegExp; build: (match: RegExpMatchArray) => FilterCondition }> = [
    { pattern: /\btoday\b/g, build: () => ({ kind: "eq", field, value: today }) },
    { pattern: /\byesterday\b/g, build: () => ({ kind: "eq", field, value: isoDay(addDays(now, -1)) }) },
    {
      pattern: /\b(?:in\s+the\s+)?(?:last|past)\s+(\d{1,3})\s+days\b/g,
      build: (match) => ({ kind: "range", field, gte: isoDay(addDays(now, -Number(match[1]))), lte: today })
    },
    { pattern: /\b(?:last|past|previous)\s+week\b/g, build: () => ({ kind: "range", field, gte: isoDay(addDays(now, -7)), lte: today }) },
    { pattern: /\bthis\s+week\b/g, build: () => ({ kind: "range", field, gte: isoDay(addDays(now, -now.getUTCDay())), lte: today }) },
    { pattern: /\b(?:last|past|previous)\s+month\b/g, build: () => ({ kind: "range", field, gte: isoDay(addDays(now, -30)), lte: today }) },
    {
      pattern: /\bthis\s+month\b/g,
      build: () => ({ kind: "range", field, gte: formatDate(year, now.getUTCMonth() + 1, 1), lte: today })
    },
    {
      pattern: /\b(?:last|previous)\s+year\b/g,
      build: () => ({ kind: "range", field, gte: formatDate(year - 1, 1, 1), lt: formatDate(year, 1, 1) })
    },
    { pattern: /\bthis\s+year\b/g, build: () => ({ kind: "range", field, gte: formatDate(year, 1, 1), lte: today }) }
  ];

  for (const { pattern, build } of relative) {
    for (const match of scanner.matches(pattern)) {
      conditions.push(build(match));
      scanner.consume(match);
    }
  }
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function extractNumericComparisons(scanner: QuestionScanner, conditions: FilterCondition[]): void {
  const phrases = COMPARATORS.map((entry) => escapeRegex(entry.phrase)).join("|");
  const symbols: Record<string, (field: string, value: number) => FilterCondition> = {
    ">": (field, value) => ({ kind: "range", field, gt: value }),
    ">=": (field, value) => ({ kind: "range", field, gte: value }),
    "<": (field, value) => ({ kind: "range", field, lt: value }),
    "<=": (field, value) => ({ kind: "range", field, lte: value }),
    of: (field, value) => ({ kind: "eq", field, value })
  };
  const builderFor = (operator: string) =>
    COMPARATORS.find((entry) => entry.phrase === operator.replace(/\s+/g, " "))?.build ?? symbols[operator];

  for (const attribute of INSPECTION_ATTRIBUTES.filter((candidate) => candidate.kind === "number")) {
    const synonyms = [...attribute.synonyms].sort((a, b) => b.length - a.length).map(escapeRegex).join("|");
    const patterns = [
      new RegExp(`\\b(?:${synonyms})\\s+(?:of\\s+)?(${phrases}|>=|<=|>|<|of)\\s*(\\d+(?:\\.\\d+)?)`, "g"),
      new RegExp(`\\b(${phrases})\\s+(\\d+(?:\\.\\d+)?)\\s+(?:${synonyms})\\b`, "g")
    ];
    for (const pattern of patterns) {
      for (const match of scanner.matches(pattern)) {
        const build = builderFor(match[1]);
        if (build) {
          conditions.push(build(attribute.name, Number(match[2])));
          scanner.consume(match);
        }
      }
    }
    for (const match of scanner.matches(new RegExp(`\\bwith\\s+(\\d+)\\s+(?:${synonyms})\\b`, "g"))) {
      conditions.push({ kind: "eq", field: attribute.name, value: Number(match[1]) });
      scanner.consume(match);
    }
  }
}

function extractPhrases(scanner: QuestionScanner, conditions: FilterCondition[]): void {
  for (const extractor of PHRASE_EXTRACTORS) {
    for (const match of scanner.matches(extractor.pattern)) {
      const condition = extractor.build(scanner.originalGroup(match, 1));
      if (condition) {
        conditions.push(condition);
        scanner.consume(match);
      }
    }
  }
}

function describeConditions(conditions: readonly FilterCondition[]): string {
  return Array.from(new Set(conditions.map((condition) => condition.field))).join(", ");
}

/**
 * Decides the retrieval plan for a question. Pure: the same question and
 * `now` always produce the same outcome.
 */
export function classifyQuestion(question: string, options: ClassifyOptions = {}): PlanOutcome {
  const now = options.now ?? new Date();
  const trimmed = question.trim();

  if (contentWords(trimmed.toLowerCase()).length === 0) {
    return { status: "rejected", code: "plan-empty", message: "The question contains nothing to search for." };
  }
  if (DESTRUCTIVE_PATTERN.test(trimmed)) {
    return { status: "rejected", code: "read-only-request", message: "Only read-only questions are supported." };
  }

  const scanner = new QuestionScanner(trimmed);
  const conditions: FilterCondition[] = [];
  try {
    extractExplicitFields(scanner, conditions, now);
    extractVehicles(scanner, conditions);
    extractDates(scanner, conditions, now);
    extractNumericComparisons(scanner, conditions);
    extractPhrases(scanner, conditions);
  } catch (error) {
    if (error instanceof PlanRejected) {
      return { status: "rejected", code: error.code, message: error.message };
    }
    throw error;
  }

  const lower = trimmed.toLowerCase();
  const cue = SEMANTIC_CUES.find((pattern) => pattern.test(lower));
  const leftovers = contentWords(scanner.text).filter(
    (word) => !FACTUAL_WORDS.has(word) && !ATTRIBUTE_WORDS.has(word) && !/^\d+$/.test(word)
  );

  let plan: RetrievalPlan;
  if (conditions.length === 0) {
    plan = { tag: "SEMANTIC", semanticText: trimmed, rationale: "No structured filter signals found" };
  } else if (cue) {
    plan = {
      tag: "HYBRID",
      filter: { conditions },
      semanticText: trimmed,
      rationale: `Filter on ${describeConditions(conditions)} plus open-ended wording`
    };
  } else if (leftovers.length > 0) {
    plan = {
      tag: "HYBRID",
      filter: { conditions },
      semanticText: trimmed,
      rationale: `Filter on ${describeConditions(conditions)}; unmatched terms: ${leftovers.slice(0, 5).join(", ")}`
    };
  } else {
    plan = { tag: "STRUCTURED", filter: { conditions }, rationale: `Filter on ${describeConditions(conditions)}` };
  }

  return { status: "planned", plan };
}
