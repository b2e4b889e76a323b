import type { EngineConfig } from "../config/engine";
import { EngineError, isAbortError, toRetrievalError } from "../errors";
import { findAttribute, isOrderedKind } from "../store/schema";
import { ALL_COLUMNS, type RecordQuery, type RecordStore } from "../store/recordStore";
import type { EvidenceItem, FilterPredicate, InspectionRecord } from "../types";
import { withTimeout } from "../utils";

/**
 * Rejects predicates that reference attributes outside the whitelist or use
 * an operator the attribute's kind cannot take.
 */
export function validateFilter(filter: FilterPredicate): void {
  if (filter.conditions.length === 0) {
    throw new EngineError("invalid-field", "Filter has no conditions");
  }

  for (const condition of filter.conditions) {
    const attribute = findAttribute(condition.field);
    if (!attribute) {
      throw new EngineError("invalid-field", `Unknown attribute "${condition.field}"`);
    }

    switch (condition.kind) {
      case "range": {
        if (!isOrderedKind(attribute.kind)) {
          throw new EngineError("invalid-field", `Range filter on text attribute "${attribute.name}"`);
        }
        const bounds = [condition.gt, condition.gte, condition.lt, condition.lte].filter((bound) => bound !== undefined);
        if (bounds.length === 0) {
          throw new EngineError("invalid-field", `Range filter on "${attribute.name}" has no bounds`);
        }
        break;
      }
      case "contains":
        if (attribute.kind === "number" || attribute.kind === "date") {
          throw new EngineError("invalid-field", `Substring filter on ${attribute.kind} attribute "${attribute.name}"`);
        }
        break;
      case "in":
        if (condition.values.length === 0) {
          throw new EngineError("invalid-field", `Membership filter on "${attribute.name}" has no values`);
        }
        break;
      case "eq":
        break;
    }
  }
}

export function buildRecordQuery(filter: FilterPredicate, config: Pick<EngineConfig, "structuredRowLimit">): RecordQuery {
  validateFilter(filter);
  return { filter, projection: ALL_COLUMNS, limit: config.structuredRowLimit };
}

const byCodeUnit = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Numeric order for digit-only identifiers at any length (record ids are
 * BIGINT), code-unit order otherwise.
 */
export function compareIds(a: string, b: string): number {
  if (/^\d+$/.test(a) && /^\d+$/.test(b)) {
    const left = a.replace(/^0+(?=\d)/, "");
    const right = b.replace(/^0+(?=\d)/, "");
    return left.length - right.length || byCodeUnit(left, right) || byCodeUnit(a, b);
  }
  return byCodeUnit(a, b);
}

export interface StructuredQueryDeps {
  store: RecordStore;
  config: Pick<EngineConfig, "structuredRowLimit" | "timeouts">;
  signal?: AbortSignal;
}

/**
 * Runs one bounded query. Results are re-sorted by record identifier so the
 * order never depends on the adapter.
 */
export async function runStructuredQuery(filter: FilterPredicate, { store, config, signal }: StructuredQueryDeps): Promise<EvidenceItem[]> {
  const query = buildRecordQuery(filter, config);

  let records: InspectionRecord[];
  try {
    records = await withTimeout(() => store.find(query), {
      label: "record store",
      timeoutMs: config.timeouts.recordStoreMs,
      signal
    });
  } catch (error) {
    if (error instanceof EngineError || isAbortError(error)) {
      throw error;
    }
    throw toRetrievalError(error, "Structured query");
  }

  return [...records]
    .sort((a, b) => compareIds(a.id, b.id))
    .map((record) => Object.freeze({ record, provenance: "STRUCTURED" as const, score: 1 }));
}
