import type { EvidenceSet, InspectionRecord } from "../types";
import type { ChatPrompt } from "./client";

export const INSUFFICIENT_INFORMATION = "The inspection records provided do not contain enough information to answer this question.";

const FACT_FIELDS: Array<[string, string]> = [
  ["vin", "VIN"],
  ["inspection_type", "inspection type"],
  ["inspector_name", "inspector"],
  ["ramp", "ramp"],
  ["railcar_number", "railcar"],
  ["bay_location", "bay"],
  ["mfg_model", "model"],
  ["damage_count", "damage count"],
  ["aiag_codes", "AIAG codes"],
  ["damage_descriptions", "damage"],
  ["damage_comments", "damage comments"],
  ["vehicle_comments", "vehicle comments"],
  ["source_file", "source file"]
];

export function evidenceLabel(index: number): string {
  return `E${index + 1}`;
}

function presentFields(record: InspectionRecord): Array<[string, string]> {
  const fields: Array<[string, string]> = [
    ["record", record.id],
    ["inspected at", record.inspectedAt]
  ];
  for (const [column, label] of FACT_FIELDS) {
    const value = record.attributes[column];
    if (value !== null && value !== undefined && String(value).trim() !== "") {
      fields.push([label, String(value).trim()]);
    }
  }
  return fields.filter(([, value]) => value !== "");
}

export function formatEvidence(evidence: EvidenceSet, explicit = false): string {
  return evidence
    .map((item, index) => {
      const fields = presentFields(item.record);
      if (explicit) {
        return [`[${evidenceLabel(index)}]`, ...fields.map(([label, value]) => `  - ${label}: ${value}`)].join("\n");
      }
      return `[${evidenceLabel(index)}] ${fields.map(([label, value]) => `${label}: ${value}`).join("; ")}`;
    })
    .join(explicit ? "\n\n" : "\n");
}

export function buildSystemPrompt(strict = false): string {
  const rules = [
    "You answer questions about vehicle inspection records.",
    "Use only the labeled facts you are given. Cite the labels you rely on, for example [E1].",
    "Never invent VINs, dates, names, counts or locations.",
    `If the facts do not answer the question, reply exactly: "${INSUFFICIENT_INFORMATION}"`,
    "Keep the answer short and factual. Do not reveal chain-of-thought."
  ];
  if (strict) {
    rules.push(
      "Your previous answer mentioned details that are not in the facts.",
      "Every identifier, number, date and name in your answer must be copied from a fact below.",
      "Leave out anything you cannot copy from a fact."
    );
  }
  return rules.join(" ");
}

export interface AnswerPromptInput {
  question: string;
  evidence: EvidenceSet;
  /** Earlier questions in the conversation, oldest first. */
  history?: readonly string[];
  strict?: boolean;
}

export function buildAnswerPrompt({ question, evidence, history = [], strict = false }: AnswerPromptInput): ChatPrompt {
  const sections: string[] = [];
  const recent = history.slice(-3);
  if (recent.length > 0) {
    sections.push("Earlier questions (context only, not facts):", ...recent.map((entry) => `- ${entry}`), "");
  }
  sections.push(
    strict ? `Facts (${evidence.length} records, one block per record):` : `Facts (${evidence.length} records):`,
    formatEvidence(evidence, strict),
    "",
    `Question: ${question.trim()}`
  );
  return { system: buildSystemPrompt(strict), user: sections.join("\n") };
}
