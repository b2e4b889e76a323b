import type { EvidenceItem, EvidenceSet } from "../types";
import { compareIds } from "./structuredQuery";

export type MergeResult = { status: "evidence"; evidence: EvidenceSet } | { status: "no-evidence" };

function byRank(a: EvidenceItem, b: EvidenceItem): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.record.inspectedAt !== b.record.inspectedAt) {
    return a.record.inspectedAt < b.record.inspectedAt ? 1 : -1;
  }
  return compareIds(a.record.id, b.record.id);
}

/**
 * Joins the per-path evidence lists: one item per record id (higher score
 * wins, provenance BOTH when the paths differ), ranked, then capped.
 */
export function mergeEvidence(lists: ReadonlyArray<readonly EvidenceItem[]>, cap: number): MergeResult {
  const merged = new Map<string, EvidenceItem>();

  for (const list of lists) {
    for (const item of list) {
      const existing = merged.get(item.record.id);
      if (!existing) {
        merged.set(item.record.id, item);
        continue;
      }
      const winner = item.score > existing.score ? item : existing;
      const provenance = existing.provenance === item.provenance ? existing.provenance : "BOTH";
      merged.set(item.record.id, Object.freeze({ record: winner.record, provenance, score: Math.max(existing.score, item.score) }));
    }
  }

  if (merged.size === 0) {
    return { status: "no-evidence" };
  }

  const evidence = Array.from(merged.values()).sort(byRank).slice(0, Math.max(1, cap));
  return { status: "evidence", evidence: Object.freeze(evidence) };
}
