import type { EvidenceDigest, EvidenceSet } from "../types";

const MAX_SOURCE_FILES = 3;

/** `part - location - damage type - severity`; several descriptions are `;` separated. */
function damageTypes(descriptions: string): string[] {
  return descriptions
    .split(/[;\n]+/)
    .map((entry) => entry.split(/\s+-\s+/).map((part) => part.trim()))
    .filter((parts) => parts.length >= 3 && parts[2] !== "")
    .map((parts) => parts[2]);
}

function topOf(counts: Map<string, number>): { key: string; count: number } | null {
  let best: { key: string; count: number } | null = null;
  for (const [key, count] of counts) {
    if (!best || count > best.count || (count === best.count && key < best.key)) {
      best = { key, count };
    }
  }
  return best;
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

export function digestEvidence(evidence: EvidenceSet): EvidenceDigest {
  const damage = new Map<string, number>();
  const inspectors = new Map<string, number>();
  const sourceFiles: string[] = [];

  for (const { record } of evidence) {
    const { damage_descriptions: descriptions, inspector_name: inspector, source_file: sourceFile } = record.attributes;
    if (typeof descriptions === "string") {
      damageTypes(descriptions).forEach((type) => increment(damage, type.toLowerCase()));
    }
    if (typeof inspector === "string" && inspector.trim() !== "") {
      increment(inspectors, inspector.trim());
    }
    if (typeof sourceFile === "string" && sourceFile !== "" && !sourceFiles.includes(sourceFile) && sourceFiles.length < MAX_SOURCE_FILES) {
      sourceFiles.push(sourceFile);
    }
  }

  const topDamage = topOf(damage);
  const topInspector = topOf(inspectors);
  return {
    recordCount: evidence.length,
    topDamage: topDamage ? { type: topDamage.key, count: topDamage.count } : null,
    topInspector: topInspector ? { name: topInspector.key, count: topInspector.count } : null,
    sourceFiles
  };
}
