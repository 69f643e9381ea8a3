/**
 * ENGINE CONFIGURATION SCHEMA
 *
 * Everything the transformation engine reads at construction time. The salt
 * may be absent: hashing then runs on a fallback salt and warns.
 */

import { Schema as S, pipe } from "effect";
import clinicalTerms from "./data/clinicalTerms.json";
import headerVocabulary from "./data/headerVocabulary.json";

// ============================================================================
// POLICIES
// ============================================================================

export const UnparseableDatePolicySchema = S.Literal("keep", "redact");
export type UnparseableDatePolicy = S.Schema.Type<typeof UnparseableDatePolicySchema>;

/** Codes shorter than this are trivially brute-forced */
export const MIN_CODE_LENGTH = 8;

/** Hex digits available from one SHA-256 digest */
export const MAX_CODE_LENGTH = 64;

const CodeLength = pipe(S.Int, S.between(MIN_CODE_LENGTH, MAX_CODE_LENGTH));

// ============================================================================
// DEID CONFIG
// ============================================================================

export const DeidConfigSchema = S.Struct({
  salt: S.optional(S.String),
  defaultShiftDays: S.Int,
  minTransformLength: pipe(S.Int, S.nonNegative()),
  hashCodeLength: CodeLength,
  pseudonymCodeLength: CodeLength,
  unparseableDatePolicy: UnparseableDatePolicySchema,
  clinicalTerms: S.Array(S.String),
  headerPhrases: S.Array(S.String),
});
export type DeidConfig = S.Schema.Type<typeof DeidConfigSchema>;

/** Partial overlay accepted from callers; missing fields come from the defaults */
export const DeidConfigInputSchema = S.partialWith(DeidConfigSchema, { exact: true });
export type DeidConfigInput = S.Schema.Type<typeof DeidConfigInputSchema>;

export const DEFAULT_DEID_CONFIG: DeidConfig = {
  defaultShiftDays: 30,
  minTransformLength: 3,
  hashCodeLength: 12,
  pseudonymCodeLength: 8,
  unparseableDatePolicy: "keep",
  clinicalTerms,
  headerPhrases: [...headerVocabulary.sectionHeaders, ...headerVocabulary.headerPhrases],
};

// ============================================================================
// ENVIRONMENT
// ============================================================================

export const DeidEnvSchema = S.Struct({
  DEID_SALT: S.optional(S.String),
  DEID_DEFAULT_SHIFT_DAYS: S.optional(pipe(S.NumberFromString, S.int())),
  DEID_UNPARSEABLE_DATE_POLICY: S.optional(UnparseableDatePolicySchema),
});
export type DeidEnv = S.Schema.Type<typeof DeidEnvSchema>;
