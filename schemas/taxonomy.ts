/**
 * PHI TAXONOMY - CLOSED CATEGORY SET
 *
 * Every detector label is folded onto this taxonomy before resolution.
 * Priority and source weights are explicit policy tables, not ad hoc lists.
 *
 * OCaml equivalent:
 * type category =
 *   | Url | EmailAddress | IpAddress | Ssn | ... | Organization | Unknown
 */

import { Schema as S } from "effect";
import categoryAliases from "./data/categoryAliases.json";

// ============================================================================
// CATEGORY (Variant Type)
// ============================================================================

export const CategorySchema = S.Literal(
  "URL",
  "EMAIL_ADDRESS",
  "IP_ADDRESS",
  "SSN",
  "VEHICLE_ID",
  "DEVICE_ID",
  "HEALTH_PLAN_ID",
  "ACCOUNT_NUMBER",
  "LICENSE_NUMBER",
  "MRN",
  "ENCOUNTER_ID",
  "PHONE_NUMBER",
  "FAX_NUMBER",
  "DATE",
  "PHOTO_ID",
  "BIOMETRIC_ID",
  "NAME",
  "LOCATION",
  "ZIP",
  "AGE_OVER_89",
  "OTHER_ID",
  "ORGANIZATION",
  "UNKNOWN"
);
export type Category = S.Schema.Type<typeof CategorySchema>;

/** Categories a resolved entity may carry (UNKNOWN never survives resolution) */
export type KnownCategory = Exclude<Category, "UNKNOWN">;

export const ALL_CATEGORIES: ReadonlyArray<Category> = CategorySchema.literals;

export const isCategory = S.is(CategorySchema);

// ============================================================================
// CANDIDATE SOURCE (Variant Type)
// ============================================================================

export const CandidateSourceSchema = S.Literal(
  "rule",
  "statistical",
  "learned",
  "clinical-preserve"
);
export type CandidateSource = S.Schema.Type<typeof CandidateSourceSchema>;

const SOURCE_ALIASES: Readonly<Record<string, CandidateSource>> = {
  rule: "rule",
  regex: "rule",
  pattern: "rule",
  presidio: "rule",
  statistical: "statistical",
  spacy: "statistical",
  ner: "statistical",
  learned: "learned",
  hf: "learned",
  bert: "learned",
  transformer: "learned",
  "clinical-preserve": "clinical-preserve",
  clinical: "clinical-preserve",
};

/**
 * Fold a detector-reported source name onto the closed source set.
 * Returns undefined for sources nobody registered.
 */
export const normalizeSource = (raw: string): CandidateSource | undefined =>
  SOURCE_ALIASES[raw.trim().toLowerCase()];

// ============================================================================
// LABEL NORMALIZATION
// ============================================================================

const ALIASES: ReadonlyMap<string, Category> = new Map(
  Object.entries(categoryAliases).flatMap(([label, category]) =>
    isCategory(category) ? [[label, category] as const] : []
  )
);

/**
 * Map a raw detector label (PERSON, US_SSN, MEDICAL_RECORD_NUMBER...) onto
 * the taxonomy. Unrecognized labels become UNKNOWN.
 */
export const normalizeCategory = (label: string): Category => {
  const key = label.trim().toUpperCase().replace(/[\s-]+/g, "_");
  if (isCategory(key)) return key;
  return ALIASES.get(key) ?? "UNKNOWN";
};

// ============================================================================
// PRIORITY POLICY (lower = kept preferentially)
// ============================================================================

export const CATEGORY_PRIORITY: Readonly<Record<KnownCategory, number>> = {
  URL: 0,
  EMAIL_ADDRESS: 1,
  IP_ADDRESS: 2,
  SSN: 3,
  VEHICLE_ID: 4,
  DEVICE_ID: 5,
  HEALTH_PLAN_ID: 6,
  ACCOUNT_NUMBER: 7,
  LICENSE_NUMBER: 8,
  MRN: 9,
  ENCOUNTER_ID: 10,
  PHONE_NUMBER: 11,
  FAX_NUMBER: 12,
  DATE: 13,
  PHOTO_ID: 14,
  BIOMETRIC_ID: 15,
  NAME: 16,
  LOCATION: 17,
  ZIP: 18,
  AGE_OVER_89: 19,
  OTHER_ID: 20,
  // Lowest: organization names are the most common false positive
  ORGANIZATION: 21,
};

export const categoryPriority = (category: KnownCategory): number =>
  CATEGORY_PRIORITY[category];

// ============================================================================
// SOURCE WEIGHTS
// ============================================================================

interface SourceWeights {
  readonly preferred: ReadonlySet<KnownCategory>;
  readonly preferredWeight: number;
  readonly defaultWeight: number;
}

export const SOURCE_WEIGHTS: Readonly<Record<CandidateSource, SourceWeights>> = {
  rule: {
    preferred: new Set<KnownCategory>([
      "PHONE_NUMBER",
      "FAX_NUMBER",
      "EMAIL_ADDRESS",
      "SSN",
      "URL",
      "IP_ADDRESS",
      "LICENSE_NUMBER",
      "VEHICLE_ID",
      "DEVICE_ID",
    ]),
    preferredWeight: 1.2,
    defaultWeight: 0.8,
  },
  statistical: {
    preferred: new Set<KnownCategory>(["NAME", "LOCATION", "ORGANIZATION", "DATE"]),
    preferredWeight: 1.2,
    defaultWeight: 0.8,
  },
  learned: {
    preferred: new Set<KnownCategory>([
      "MRN",
      "HEALTH_PLAN_ID",
      "ACCOUNT_NUMBER",
      "BIOMETRIC_ID",
      "PHOTO_ID",
      "AGE_OVER_89",
    ]),
    preferredWeight: 1.2,
    defaultWeight: 0.8,
  },
  "clinical-preserve": {
    preferred: new Set<KnownCategory>(),
    preferredWeight: 1,
    defaultWeight: 1,
  },
};

export const sourceWeight = (source: CandidateSource, category: KnownCategory): number => {
  const weights = SOURCE_WEIGHTS[source];
  return weights.preferred.has(category) ? weights.preferredWeight : weights.defaultWeight;
};

// ============================================================================
// ATOMIC IDENTIFIERS
// ============================================================================

/** Multi-token identifiers that must never be partially replaced */
export const ATOMIC_CATEGORIES: ReadonlySet<Category> = new Set<Category>([
  "URL",
  "EMAIL_ADDRESS",
]);

/** Categories whose pseudonym key ignores token order */
export const NAME_LIKE_CATEGORIES: ReadonlySet<Category> = new Set<Category>(["NAME"]);
