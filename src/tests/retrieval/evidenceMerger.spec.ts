import { describe, expect, it } from "vitest";
import { digestEvidence } from "../../retrieval/evidenceDigest";
import { mergeEvidence } from "../../retrieval/evidenceMerger";
import type { EvidenceSet } from "../../types";
import { evidenceItem, R101, R102, R103, R104 } from "../fixtures";

function evidenceOf(result: ReturnType<typeof mergeEvidence>): EvidenceSet {
  if (result.status !== "evidence") {
    throw new Error("Expected evidence");
  }
  return result.evidence;
}

describe("mergeEvidence", () => {
  it("keeps one item per record, tagged BOTH with the higher score", () => {
    const evidence = evidenceOf(
      mergeEvidence(
        [[evidenceItem(R101, "STRUCTURED", 1)], [evidenceItem(R101, "SEMANTIC", 0.8), evidenceItem(R103, "SEMANTIC", 0.6)]],
        10
      )
    );

    expect(evidence.map((item) => [item.record.id, item.provenance, item.score])).toEqual([
      ["101", "BOTH", 1],
      ["103", "SEMANTIC", 0.6]
    ]);
  });

  it("keeps the provenance when the same path reports a record twice", () => {
    const evidence = evidenceOf(mergeEvidence([[evidenceItem(R103, "SEMANTIC", 0.4), evidenceItem(R103, "SEMANTIC", 0.7)]], 10));
    expect(evidence).toHaveLength(1);
    expect(evidence[0]).toMatchObject({ provenance: "SEMANTIC", score: 0.7 });
  });

  it("breaks score ties by newest inspection, then by id", () => {
    const evidence = evidenceOf(
      mergeEvidence(
        [[evidenceItem(R103, "SEMANTIC", 0.5), evidenceItem(R104, "SEMANTIC", 0.5)], [evidenceItem(R102, "STRUCTURED", 1)]],
        10
      )
    );
    expect(evidence.map((item) => item.record.id)).toEqual(["102", "104", "103"]);
  });

  it("orders equal score and timestamp by record id", () => {
    const twin = { ...R104, id: "100" };
    const evidence = evidenceOf(mergeEvidence([[evidenceItem(R104, "SEMANTIC", 0.5), evidenceItem(twin, "SEMANTIC", 0.5)]], 10));
    expect(evidence.map((item) => item.record.id)).toEqual(["100", "104"]);
  });

  it("truncates to the evidence cap after ranking", () => {
    const evidence = evidenceOf(
      mergeEvidence(
        [[evidenceItem(R101, "SEMANTIC", 0.2), evidenceItem(R102, "SEMANTIC", 0.9), evidenceItem(R103, "SEMANTIC", 0.5), evidenceItem(R104, "SEMANTIC", 0.7)]],
        2
      )
    );
    expect(evidence.map((item) => item.record.id)).toEqual(["102", "104"]);
  });

  it("signals no-evidence when every list is empty", () => {
    expect(mergeEvidence([[], []], 10)).toEqual({ status: "no-evidence" });
    expect(mergeEvidence([], 10)).toEqual({ status: "no-evidence" });
  });
});

describe("digestEvidence", () => {
  it("summarizes damage types, inspectors and source files", () => {
    const digest = digestEvidence([
      evidenceItem(R101, "STRUCTURED", 1),
      evidenceItem(R103, "SEMANTIC", 0.5),
      evidenceItem(R104, "SEMANTIC", 0.4)
    ]);

    expect(digest).toEqual({
      recordCount: 3,
      topDamage: { type: "corrosion", count: 2 },
      topInspector: { name: "Bryan Keller", count: 2 },
      sourceFiles: ["batch_0210.pdf", "batch_0305.pdf", "batch_0312.pdf"]
    });
  });

  it("returns empty summaries for records without damage or inspector", () => {
    const digest = digestEvidence([evidenceItem(R102, "STRUCTURED", 1)]);
    expect(digest.topDamage).toBeNull();
    expect(digest.topInspector).toEqual({ name: "Dana Ortiz", count: 1 });
  });
});
