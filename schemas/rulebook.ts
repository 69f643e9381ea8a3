/**
 * RULEBOOK SCHEMA - CATEGORY -> ACTION POLICY
 *
 * Configuration supplies a partial map keyed by detector labels or taxonomy
 * categories. It is decoded once into a total map over the taxonomy, so the
 * transformation engine never does a string lookup with a silent fallback.
 *
 * OCaml equivalent:
 * type action = Redact | Hash | Pseudonym | Generalize | DateShift
 * type rulebook = { rules : category -> action; templates : ...; default : action }
 */

import { Schema as S } from "effect";
import { ALL_CATEGORIES, CategorySchema, normalizeCategory, type Category } from "./taxonomy";

// ============================================================================
// ACTION (Variant Type)
// ============================================================================

export const ActionSchema = S.Literal(
  "redact",
  "hash",
  "pseudonym",
  "generalize",
  "date_shift"
);
export type Action = S.Schema.Type<typeof ActionSchema>;

// ============================================================================
// RULEBOOK INPUT (as found in configuration)
// ============================================================================

const TemplateMapSchema = S.Record({ key: S.String, value: S.String });

export const RuleBookInputSchema = S.Struct({
  rules: S.Record({ key: S.String, value: ActionSchema }),
  formatTemplates: S.optional(TemplateMapSchema),
  format_templates: S.optional(TemplateMapSchema),
  defaultAction: S.optional(ActionSchema),
  default_action: S.optional(ActionSchema),
});
export type RuleBookInput = S.Schema.Type<typeof RuleBookInputSchema>;

export const decodeRuleBookInput = S.decodeUnknown(RuleBookInputSchema);

// ============================================================================
// RULEBOOK (total over the taxonomy)
// ============================================================================

export const DEFAULT_TEMPLATE_KEY = "DEFAULT";

/** One action per taxonomy category, no gaps */
export const TotalRulesSchema = S.Record({ key: CategorySchema, value: ActionSchema });
export type TotalRules = S.Schema.Type<typeof TotalRulesSchema>;

const decodeTotalRules = S.decodeUnknownSync(TotalRulesSchema);

export interface RuleBook {
  readonly rules: TotalRules;
  /** Keyed by category or DEFAULT; `{code}` and `{category}` are substituted */
  readonly formatTemplates: Readonly<Record<string, string>>;
  readonly defaultAction: Action;
}

export interface RuleBookBuild {
  readonly rulebook: RuleBook;
  /** Configured labels that fold onto no category */
  readonly unknownLabels: ReadonlyArray<string>;
}

const normalizeTemplateKey = (key: string): string =>
  key.trim().toUpperCase() === DEFAULT_TEMPLATE_KEY ? DEFAULT_TEMPLATE_KEY : normalizeCategory(key);

/**
 * Smart constructor: fold labels onto the taxonomy and fill every missing
 * category with the default action.
 */
export const buildRuleBook = (input: RuleBookInput): RuleBookBuild => {
  const defaultAction = input.defaultAction ?? input.default_action ?? "redact";
  const configured = new Map<Category, Action>();
  const unknownLabels: string[] = [];

  for (const [label, action] of Object.entries(input.rules)) {
    const category = normalizeCategory(label);
    if (category === "UNKNOWN" && label.trim().toUpperCase() !== "UNKNOWN") {
      unknownLabels.push(label);
      continue;
    }
    configured.set(category, action);
  }

  const rules = decodeTotalRules(
    Object.fromEntries(
      ALL_CATEGORIES.map((category) => [category, configured.get(category) ?? defaultAction])
    )
  );

  const formatTemplates: Record<string, string> = {};
  const templates = { ...input.format_templates, ...input.formatTemplates };
  for (const [key, template] of Object.entries(templates)) {
    formatTemplates[normalizeTemplateKey(key)] = template;
  }

  return {
    rulebook: { rules, formatTemplates, defaultAction },
    unknownLabels,
  };
};

/** A rulebook where every category uses the same action */
export const uniformRuleBook = (action: Action = "redact"): RuleBook =>
  buildRuleBook({ rules: {}, defaultAction: action }).rulebook;

/**
 * Rulebook mirroring the reference deployment: structured identifiers are
 * hashed, names pseudonymized, dates shifted, ZIPs and ages generalized.
 */
export const DEFAULT_RULEBOOK: RuleBook = buildRuleBook({
  rules: {
    NAME: "pseudonym",
    MRN: "hash",
    ACCOUNT_NUMBER: "hash",
    HEALTH_PLAN_ID: "hash",
    DATE: "date_shift",
    ZIP: "generalize",
    AGE_OVER_89: "generalize",
  },
  formatTemplates: {
    NAME: "PATIENT_{code}",
    MRN: "MRN_{code}",
    DEFAULT: "{category}_{code}",
  },
  defaultAction: "redact",
}).rulebook;
