/**
 * TRANSFORMATION ENGINE
 *
 * Rewrites resolved entities in the original text according to a rulebook:
 *
 *   redact      -> [REDACTED:CATEGORY]
 *   hash        -> template rendered with a 12-char HMAC code
 *   pseudonym   -> template rendered with an 8-char HMAC code
 *   generalize  -> coarser value (ZIP 021XX, age 90+, date -> year)
 *   date_shift  -> same date format, moved by the subject's offset
 *
 * Entities are applied right to left so earlier offsets stay valid. Text
 * outside applied spans is copied unchanged.
 *
 * OCaml equivalent:
 * val transform : string -> resolved_entity list -> rulebook -> string option
 *   -> string * audit_record list
 */

import { DEFAULT_DEID_CONFIG, type DeidConfig } from "../schemas/config";
import type { AuditAction, AuditRecord, ResolvedEntity } from "../schemas/entities";
import { DEFAULT_TEMPLATE_KEY, type Action, type RuleBook } from "../schemas/rulebook";
import type { KnownCategory } from "../schemas/taxonomy";
import { appLogger, type AppLogger } from "./appLogger";
import { computeShiftDays, dateYear, shiftDate } from "./dateShifter";
import { HashInputError, WeakSaltWarning } from "./errors";
import { createProtectedTextGuard, expandAtomicEntities } from "./redactionGuards";
import { pseudonymCacheKey, resolveSalt, secureCode } from "./secureHash";
import { InMemorySubjectStore, SubjectContext, type SubjectStore } from "./subjectContext";

// ============================================================================
// TYPES
// ============================================================================

export interface TransformResult {
  readonly text: string;
  /** Sorted by start; never carries identifier text */
  readonly audit: AuditRecord[];
  /** Present when this call hashed with the fallback salt */
  readonly warnings: WeakSaltWarning[];
}

export interface TransformationEngineOptions {
  readonly config?: DeidConfig;
  readonly store?: SubjectStore;
  readonly logger?: Pick<AppLogger, "warn" | "debug">;
}

export interface TransformationEngine {
  transform(
    original: string,
    entities: ReadonlyArray<ResolvedEntity>,
    rulebook: RuleBook,
    subjectId?: string
  ): TransformResult;
  /** Shift one date string; unrecognized input follows unparseableDatePolicy */
  shift(dateText: string, subjectId?: string): string;
  /** Render the hash or pseudonym code for an identifier */
  pseudonym(
    category: KnownCategory,
    text: string,
    rulebook: RuleBook,
    subjectId?: string,
    action?: "hash" | "pseudonym"
  ): string;
  readonly store: SubjectStore;
  readonly config: DeidConfig;
  readonly weakSalt: boolean;
}

interface Applied {
  readonly replacement: string;
  readonly action: AuditAction;
}

// ============================================================================
// RENDERING
// ============================================================================

export const redactionPlaceholder = (category: string): string => `[REDACTED:${category}]`;

const generalizedPlaceholder = (category: string): string => `[GENERALIZED:${category}]`;

export const renderTemplate = (template: string, code: string, category: string): string =>
  template.replaceAll("{code}", code).replaceAll("{category}", category);

const templateFor = (rulebook: RuleBook, category: KnownCategory): string =>
  rulebook.formatTemplates[category] ?? rulebook.formatTemplates[DEFAULT_TEMPLATE_KEY] ?? "{code}";

export const generalize = (category: KnownCategory, text: string): string => {
  switch (category) {
    case "ZIP": {
      const digits = text.replace(/\D/g, "");
      return digits.length >= 3 ? `${digits.slice(0, 3)}XX` : generalizedPlaceholder(category);
    }
    case "AGE_OVER_89":
      return "90+";
    case "DATE":
      return dateYear(text) ?? generalizedPlaceholder(category);
    default:
      return generalizedPlaceholder(category);
  }
};

const roundConfidence = (confidence: number): number => Math.round(confidence * 1000) / 1000;

// ============================================================================
// ENGINE
// ============================================================================

/**
 * Factory keeps salt and caches in closure scope.
 *
 * @example
 * const engine = createTransformationEngine({ config: { ...DEFAULT_DEID_CONFIG, salt } });
 * const { text, audit } = engine.transform(original, entities, DEFAULT_RULEBOOK, "patient-7");
 */
export const createTransformationEngine = (
  options: TransformationEngineOptions = {}
): TransformationEngine => {
  const config = options.config ?? DEFAULT_DEID_CONFIG;
  const store = options.store ?? new InMemorySubjectStore();
  const logger = options.logger ?? appLogger;
  const { salt, weak } = resolveSalt(config.salt);
  const isProtected = createProtectedTextGuard(config);

  let weakSaltLogged = false;
  let saltUsedThisCall = false;

  const useSalt = (): string => {
    saltUsedThisCall = true;
    if (weak && !weakSaltLogged) {
      weakSaltLogged = true;
      logger.warn("Hashing with the fallback salt; set DEID_SALT for real pseudonyms", {
        fallback: true,
      });
    }
    return salt;
  };

  const contextFor = (subjectId: string | undefined): SubjectContext =>
    subjectId ? store.get(subjectId) : new SubjectContext(undefined);

  const shiftDaysFor = (context: SubjectContext): number => {
    const { subjectId } = context;
    if (!subjectId) return config.defaultShiftDays;
    return context.getOrComputeShiftDays(() => computeShiftDays(useSalt(), subjectId));
  };

  const shiftWith = (context: SubjectContext, dateText: string): string | undefined =>
    context.getOrComputeDate(dateText, () => shiftDate(dateText, shiftDaysFor(context)));

  const codeFor = (
    context: SubjectContext,
    category: KnownCategory,
    text: string,
    rulebook: RuleBook,
    action: "hash" | "pseudonym"
  ): string => {
    if (text.trim().length === 0) {
      throw new HashInputError({ message: "Cannot hash empty text", context: { category } });
    }
    const key = pseudonymCacheKey(category, text, context.subjectId);
    return context.getOrComputePseudonym(`${action}:${key}`, () => {
      const length = action === "hash" ? config.hashCodeLength : config.pseudonymCodeLength;
      const code = secureCode(useSalt(), key, length);
      return renderTemplate(templateFor(rulebook, category), code, category);
    });
  };

  const apply = (
    context: SubjectContext,
    entity: ResolvedEntity,
    text: string,
    action: Action,
    rulebook: RuleBook
  ): Applied => {
    const { category } = entity;
    switch (action) {
      case "redact":
        return { replacement: redactionPlaceholder(category), action };
      case "hash":
      case "pseudonym":
        if (text.trim().length < config.minTransformLength) {
          return { replacement: text, action: "preserved" };
        }
        return { replacement: codeFor(context, category, text, rulebook, action), action };
      case "generalize":
        return { replacement: generalize(category, text), action };
      case "date_shift": {
        const shifted = shiftWith(context, text);
        if (shifted !== undefined) return { replacement: shifted, action };
        return config.unparseableDatePolicy === "redact"
          ? { replacement: redactionPlaceholder(category), action: "redact" }
          : { replacement: text, action: "preserved" };
      }
    }
  };

  const transform: TransformationEngine["transform"] = (original, entities, rulebook, subjectId) => {
    saltUsedThisCall = false;
    const context = contextFor(subjectId);

    const inBounds = entities.filter(
      (e) => Number.isInteger(e.start) && Number.isInteger(e.end) && e.start >= 0 && e.start < e.end && e.end <= original.length
    );
    const guarded = expandAtomicEntities(original, inBounds);

    let text = original;
    let lowestApplied = Number.POSITIVE_INFINITY;
    const audit: AuditRecord[] = [];
    let skipped = 0;

    const descending = [...guarded.entities].sort((a, b) => b.start - a.start || b.end - a.end);
    for (const entity of descending) {
      // Overlaps only happen when the resolver was bypassed
      if (entity.end > lowestApplied) {
        skipped++;
        continue;
      }

      const span = original.slice(entity.start, entity.end);
      const applied: Applied = isProtected(span)
        ? { replacement: span, action: "preserved" }
        : apply(context, entity, span, rulebook.rules[entity.category], rulebook);

      text = text.slice(0, entity.start) + applied.replacement + text.slice(entity.end);
      lowestApplied = entity.start;
      audit.push({
        start: entity.start,
        end: entity.end,
        category: entity.category,
        confidence: roundConfidence(entity.confidence),
        source: entity.source,
        action: applied.action,
      });
    }

    logger.debug("Transformed entities", {
      applied: audit.length,
      expanded: guarded.expanded,
      dropped: guarded.dropped + skipped,
    });

    return {
      text,
      audit: audit.sort((a, b) => a.start - b.start),
      warnings:
        weak && saltUsedThisCall
          ? [new WeakSaltWarning({ message: "Fallback salt used for hashing" })]
          : [],
    };
  };

  const shift: TransformationEngine["shift"] = (dateText, subjectId) => {
    const shifted = shiftWith(contextFor(subjectId), dateText);
    if (shifted !== undefined) return shifted;
    return config.unparseableDatePolicy === "redact" ? redactionPlaceholder("DATE") : dateText;
  };

  const pseudonym: TransformationEngine["pseudonym"] = (
    category,
    text,
    rulebook,
    subjectId,
    action = "pseudonym"
  ) => codeFor(contextFor(subjectId), category, text, rulebook, action);

  return { transform, shift, pseudonym, store, config, weakSalt: weak };
};
