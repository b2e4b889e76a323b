import { z } from "zod";
import { EngineError } from "../errors";
import type { AttributeValue, FilterCondition, FilterPredicate, InspectionRecord } from "../types";
import { isoDay } from "../utils";
import { INSPECTION_ATTRIBUTES, INSPECTIONS_TABLE, findAttribute } from "./schema";

/**
 * The slice of a pg Pool the adapters need. pg cannot abort an in-flight
 * query; callers bound it with a deadline and the pool's statement_timeout.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface RecordQuery {
  filter: FilterPredicate;
  projection: readonly string[];
  limit: number;
}

export interface RecordStore {
  find(query: RecordQuery): Promise<InspectionRecord[]>;
  getByIds(ids: readonly string[]): Promise<Map<string, InspectionRecord>>;
}

export interface CompiledQuery {
  text: string;
  values: unknown[];
}

export const ALL_COLUMNS = INSPECTION_ATTRIBUTES.map((attribute) => attribute.name);

const scalar = z.union([z.string(), z.number(), z.date(), z.null(), z.undefined()]);

const InspectionRowSchema = z
  .object({
    record_id: z.union([z.string(), z.number()]),
    vin: z.string().nullish(),
    inspection_date: z.union([z.string(), z.date()]).nullish(),
    inspection_time: z.string().nullish(),
    damage_count: z.union([z.number(), z.string()]).nullish()
  })
  .catchall(scalar);

export class PgRecordStore implements RecordStore {
  constructor(private readonly db: Queryable) {}

  async find(query: RecordQuery): Promise<InspectionRecord[]> {
    const compiled = compileRecordQuery(query);
    const result = await this.db.query(compiled.text, compiled.values);
    return result.rows.map(toInspectionRecord);
  }

  async getByIds(ids: readonly string[]): Promise<Map<string, InspectionRecord>> {
    const found = new Map<string, InspectionRecord>();
    if (ids.length === 0) {
      return found;
    }
    const compiled = compileIdLookup(ids);
    const result = await this.db.query(compiled.text, compiled.values);
    for (const row of result.rows) {
      const record = toInspectionRecord(row);
      found.set(record.id, record);
    }
    return found;
  }
}

function quoteColumn(name: string): string {
  if (!findAttribute(name)) {
    throw new EngineError("invalid-field", `Unknown attribute "${name}"`);
  }
  return `"${name}"`;
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

function compileCondition(condition: FilterCondition, values: unknown[]): string[] {
  const column = quoteColumn(condition.field);
  const bind = (value: unknown) => {
    values.push(value);
    return `$${values.length}`;
  };

  switch (condition.kind) {
    case "eq":
      return [`${column} = ${bind(condition.value)}`];
    case "in":
      return [`${column} = ANY(${bind([...condition.values])})`];
    case "contains":
      return [`${column} ILIKE ${bind(`%${escapeLike(condition.value)}%`)}`];
    case "range": {
      const clauses: string[] = [];
      if (condition.gt !== undefined) clauses.push(`${column} > ${bind(condition.gt)}`);
      if (condition.gte !== undefined) clauses.push(`${column} >= ${bind(condition.gte)}`);
      if (condition.lt !== undefined) clauses.push(`${column} < ${bind(condition.lt)}`);
      if (condition.lte !== undefined) clauses.push(`${column} <= ${bind(condition.lte)}`);
      return clauses;
    }
  }
}

/**
 * Compiles a bounded query. Column names only ever come from the attribute
 * whitelist; every value is a bound parameter.
 */
export function compileRecordQuery(query: RecordQuery): CompiledQuery {
  const values: unknown[] = [];
  const projection = query.projection.map(quoteColumn).join(", ");
  const where = query.filter.conditions.flatMap((condition) => compileCondition(condition, values));
  values.push(query.limit);
  const limitParam = `$${values.length}`;

  const text = [
    `SELECT ${projection} FROM ${INSPECTIONS_TABLE}`,
    where.length > 0 ? `WHERE ${where.join(" AND ")}` : null,
    `ORDER BY "inspection_date" DESC NULLS LAST, "inspection_time" DESC NULLS LAST, "record_id" ASC`,
    `LIMIT ${limitParam}`
  ]
    .filter((line): line is string => line !== null)
    .join(" ");

  return { text, values };
}

export function compileIdLookup(ids: readonly string[]): CompiledQuery {
  const projection = ALL_COLUMNS.map(quoteColumn).join(", ");
  return {
    text: `SELECT ${projection} FROM ${INSPECTIONS_TABLE} WHERE "record_id"::text = ANY($1::text[])`,
    values: [[...ids]]
  };
}

function normalizeTime(value: string | null | undefined): string {
  if (!value) {
    return "00:00:00";
  }
  const match = /^(\d{1,2}):(\d{2})(?::(\d{2}))?/.exec(value.trim());
  if (!match) {
    return "00:00:00";
  }
  return `${match[1].padStart(2, "0")}:${match[2]}:${match[3] ?? "00"}`;
}

function toAttributeValue(value: unknown): AttributeValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    return isoDay(value);
  }
  if (typeof value === "number" || typeof value === "string") {
    return value;
  }
  return String(value);
}

export function toInspectionRecord(row: unknown): InspectionRecord {
  const parsed = InspectionRowSchema.parse(row);
  const attributes: Record<string, AttributeValue> = {};
  for (const column of ALL_COLUMNS) {
    if (column in parsed) {
      attributes[column] = toAttributeValue(parsed[column]);
    }
  }
  attributes.record_id = String(parsed.record_id);
  if (parsed.damage_count !== null && parsed.damage_count !== undefined) {
    const count = Number(parsed.damage_count);
    attributes.damage_count = Number.isFinite(count) ? count : null;
  }

  const date = toAttributeValue(parsed.inspection_date);
  const inspectedAt = typeof date === "string" ? `${date}T${normalizeTime(parsed.inspection_time)}` : "";

  const summary = ["damage_descriptions", "damage_comments", "vehicle_comments"]
    .map((column) => attributes[column])
    .filter((value): value is string => typeof value === "string" && value.trim().length > 0)
    .map((value) => value.trim())
    .join(". ");

  return Object.freeze({
    id: String(parsed.record_id),
    vehicleId: parsed.vin ?? "",
    inspectedAt,
    attributes: Object.freeze(attributes),
    summary
  });
}
