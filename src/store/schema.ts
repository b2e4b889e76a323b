export type AttributeKind = "identifier" | "exact" | "fuzzy" | "date" | "time" | "number";

export interface AttributeDefinition {
  name: string;
  kind: AttributeKind;
  description: string;
  /** Words a question may use to refer to this attribute. */
  synonyms: string[];
}

export const INSPECTIONS_TABLE = "inspections";
export const EMBEDDINGS_TABLE = "inspection_embeddings";
export const INDEX_META_TABLE = "inspection_index_meta";

export const INSPECTION_ATTRIBUTES: readonly AttributeDefinition[] = [
  { name: "record_id", kind: "identifier", description: "Unique identifier for each inspection record", synonyms: ["record", "record id"] },
  { name: "vin", kind: "exact", description: "Vehicle Identification Number", synonyms: ["vehicle", "vin", "vehicle id", "car"] },
  {
    name: "inspection_date",
    kind: "date",
    description: "Date of inspection",
    synonyms: ["date", "timestamp", "inspection date", "inspected on"]
  },
  { name: "inspection_time", kind: "time", description: "Time of inspection", synonyms: ["time", "inspection time"] },
  { name: "inspection_type", kind: "exact", description: "Two-character inspection category code", synonyms: ["inspection type", "type"] },
  { name: "inspector_name", kind: "fuzzy", description: "Full name of inspector", synonyms: ["inspector", "inspected by"] },
  { name: "ramp", kind: "fuzzy", description: "Facility location where inspection took place", synonyms: ["ramp", "location", "facility"] },
  { name: "railcar_number", kind: "exact", description: "Railcar identifier", synonyms: ["railcar", "railcar number"] },
  { name: "bay_location", kind: "exact", description: "Code for specific bay/stall in yard", synonyms: ["bay", "stall", "bay location"] },
  { name: "mfg_model", kind: "fuzzy", description: "Manufacturer and model", synonyms: ["model", "make", "manufacturer"] },
  { name: "damage_comments", kind: "fuzzy", description: "Brief damage description comments", synonyms: ["damage comments"] },
  { name: "vehicle_comments", kind: "fuzzy", description: "General vehicle condition remarks", synonyms: ["vehicle comments", "remarks"] },
  { name: "damage_count", kind: "number", description: "Number of distinct damage instances", synonyms: ["damage count", "damages", "damage"] },
  { name: "aiag_codes", kind: "fuzzy", description: "AIAG-standard damage codes", synonyms: ["aiag", "aiag code", "damage code"] },
  {
    name: "damage_descriptions",
    kind: "fuzzy",
    description: "Standardized damage label descriptions with vehicle part and severity",
    synonyms: ["damage description", "damage descriptions"]
  },
  { name: "source_file", kind: "exact", description: "Original document source filename", synonyms: ["source file", "source", "file"] }
];

const ATTRIBUTES_BY_NAME = new Map(INSPECTION_ATTRIBUTES.map((attribute) => [attribute.name, attribute]));

export function findAttribute(name: string): AttributeDefinition | undefined {
  return ATTRIBUTES_BY_NAME.get(name);
}

/** Resolves an attribute name or one of its synonyms. */
export function resolveAttributeReference(reference: string): AttributeDefinition | undefined {
  const normalized = reference.trim().toLowerCase().replace(/[\s-]+/g, "_");
  const direct = ATTRIBUTES_BY_NAME.get(normalized);
  if (direct) {
    return direct;
  }
  const spaced = normalized.replace(/_/g, " ");
  return INSPECTION_ATTRIBUTES.find((attribute) => attribute.synonyms.includes(spaced));
}

export function isOrderedKind(kind: AttributeKind): boolean {
  return kind === "date" || kind === "number" || kind === "time";
}
