import { describe, expect, it } from "vitest";
import { classifyQuestion } from "../../retrieval/queryClassifier";
import type { PlanOutcome, RetrievalPlan } from "../../types";
import { FIXED_NOW } from "../fixtures";

function planOf(outcome: PlanOutcome): RetrievalPlan {
  if (outcome.status !== "planned") {
    throw new Error(`Expected a plan, got ${outcome.code}`);
  }
  return outcome.plan;
}

const classify = (question: string) => classifyQuestion(question, { now: FIXED_NOW });

describe("classifyQuestion", () => {
  it("plans a structured lookup for a vehicle and a date bound", () => {
    const plan = planOf(classify("show inspections for vehicle ABC123 after 2024-01-01"));
    expect(plan.tag).toBe("STRUCTURED");
    expect(plan.filter?.conditions).toEqual([
      { kind: "eq", field: "vin", value: "ABC123" },
      { kind: "range", field: "inspection_date", gt: "2024-01-01" }
    ]);
    expect(plan.semanticText).toBeUndefined();
    expect(plan.rationale).toBe("Filter on vin, inspection_date");
  });

  it("plans a hybrid search when a filter comes with open-ended wording", () => {
    const question = "which vehicles had similar brake issues to the one inspected last week";
    const plan = planOf(classify(question));
    expect(plan.tag).toBe("HYBRID");
    expect(plan.filter?.conditions).toEqual([{ kind: "range", field: "inspection_date", gte: "2024-03-08", lte: "2024-03-15" }]);
    expect(plan.semanticText).toBe(question);
  });

  it("rejects references to attributes outside the schema", () => {
    const outcome = classify("filter by `engine_color`");
    expect(outcome).toMatchObject({ status: "rejected", code: "invalid-field" });
  });

  it("rejects unknown snake_case fields in name=value pairs", () => {
    expect(classify("records with engine_color=red")).toMatchObject({ status: "rejected", code: "invalid-field" });
  });

  it("rejects ordering comparisons on text attributes", () => {
    expect(classify("inspections where ramp > 5")).toMatchObject({ status: "rejected", code: "invalid-field" });
  });

  it.each(["", "   ", "?", "the a"])("returns plan-empty for %j", (question) => {
    expect(classify(question)).toMatchObject({ status: "rejected", code: "plan-empty" });
  });

  it("refuses destructive requests", () => {
    expect(classify("delete all inspections for vehicle ABC123")).toMatchObject({
      status: "rejected",
      code: "read-only-request"
    });
  });

  it("falls back to semantic search without structured signals", () => {
    const plan = planOf(classify("describe brake corrosion problems"));
    expect(plan.tag).toBe("SEMANTIC");
    expect(plan.filter).toBeUndefined();
    expect(plan.semanticText).toBe("describe brake corrosion problems");
  });

  it("recognizes a full 17-character VIN", () => {
    const plan = planOf(classify("show inspections for 1FTFW1E50NFA00001"));
    expect(plan.tag).toBe("STRUCTURED");
    expect(plan.filter?.conditions).toEqual([{ kind: "eq", field: "vin", value: "1FTFW1E50NFA00001" }]);
  });

  it("turns a list of VINs into a membership filter", () => {
    const plan = planOf(classify("list inspections for vins ABC123, XYZ789 and DEF456"));
    expect(plan.filter?.conditions).toEqual([{ kind: "in", field: "vin", values: ["ABC123", "XYZ789", "DEF456"] }]);
  });

  it("reads between ... and ... as an inclusive date range", () => {
    const plan = planOf(classify("inspections between 2024-01-01 and 2024-02-01"));
    expect(plan.tag).toBe("STRUCTURED");
    expect(plan.filter?.conditions).toEqual([{ kind: "range", field: "inspection_date", gte: "2024-01-01", lte: "2024-02-01" }]);
  });

  it("reads month-name dates", () => {
    const plan = planOf(classify("inspections on march 5, 2024"));
    expect(plan.filter?.conditions).toEqual([{ kind: "eq", field: "inspection_date", value: "2024-03-05" }]);
  });

  it("resolves relative days against the injected clock", () => {
    const plan = planOf(classify("inspections yesterday"));
    expect(plan.filter?.conditions).toEqual([{ kind: "eq", field: "inspection_date", value: "2024-03-14" }]);
  });

  it("extracts numeric comparisons on damage count", () => {
    const plan = planOf(classify("inspections with damage count over 2"));
    expect(plan.tag).toBe("STRUCTURED");
    expect(plan.filter?.conditions).toEqual([{ kind: "range", field: "damage_count", gt: 2 }]);
  });

  it("accepts explicit field comparisons", () => {
    const plan = planOf(classify("inspections where damage_count >= 3"));
    expect(plan.tag).toBe("STRUCTURED");
    expect(plan.filter?.conditions).toEqual([{ kind: "range", field: "damage_count", gte: 3 }]);
  });

  it("keeps the inspector's name as written", () => {
    const plan = planOf(classify("show inspections inspected by Bryan"));
    expect(plan.filter?.conditions).toEqual([{ kind: "contains", field: "inspector_name", value: "Bryan" }]);
  });

  it("prefers hybrid when words beyond the filter remain", () => {
    const plan = planOf(classify("inspections for vehicle ABC123 with paint overspray"));
    expect(plan.tag).toBe("HYBRID");
    expect(plan.filter?.conditions).toEqual([{ kind: "eq", field: "vin", value: "ABC123" }]);
    expect(plan.rationale).toBe("Filter on vin; unmatched terms: paint, overspray");
  });

  it("is a pure function of question and clock", () => {
    const question = "which vehicles had similar brake issues to the one inspected last week";
    expect(classify(question)).toEqual(classify(question));
  });
});
