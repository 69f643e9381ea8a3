/**
 * PRE-REDACTION GUARDS
 *
 * Two checks run before any span is rewritten:
 * - atomic identifiers (emails, URLs) grow to their whole token, so a
 *   replacement never strands half an address
 * - headers, section labels, clinical terms and doses are left alone even
 *   when a detector labelled them
 */

import { spansIntersect, type ResolvedEntity, type Span } from "../schemas/entities";
import { ATOMIC_CATEGORIES } from "../schemas/taxonomy";

// ============================================================================
// ATOMIC EXPANSION
// ============================================================================

const isSpace = (ch: string): boolean => /\s/.test(ch);

const LEFT_STOP = /[,;=<>"'([{]/;
const RIGHT_STOP = /[<>"']/;
const TRAILING_PUNCTUATION = /[.,;:!?)\]}>]/;
const LEADING_PUNCTUATION = /[([{<]/;

export const isAtomic = (entity: ResolvedEntity): boolean =>
  ATOMIC_CATEGORIES.has(entity.category) || entity.text.includes("@");

/**
 * Whitespace-delimited token around a span. A colon stops the left edge
 * unless it starts a `://` scheme separator.
 */
export const expandToToken = (original: string, span: Span): Span => {
  let start = span.start;
  while (start > 0) {
    const ch = original[start - 1];
    if (isSpace(ch) || LEFT_STOP.test(ch)) break;
    if (ch === ":" && original.slice(start, start + 2) !== "//") break;
    start--;
  }

  let end = span.end;
  while (end < original.length && !isSpace(original[end]) && !RIGHT_STOP.test(original[end])) {
    end++;
  }

  // Sentence punctuation around the token is not part of it
  while (end > span.end && TRAILING_PUNCTUATION.test(original[end - 1])) end--;
  while (start < span.start && LEADING_PUNCTUATION.test(original[start])) start++;

  return { start, end };
};

export interface AtomicExpansion {
  readonly entities: ResolvedEntity[];
  readonly expanded: number;
  readonly dropped: number;
}

/**
 * Expand atomic entities to their tokens and drop whatever else the expanded
 * spans now cover.
 */
export const expandAtomicEntities = (
  original: string,
  entities: ReadonlyArray<ResolvedEntity>
): AtomicExpansion => {
  const ordered = [...entities].sort((a, b) => a.start - b.start);
  const atomic: ResolvedEntity[] = [];
  let expanded = 0;
  let dropped = 0;

  for (const entity of ordered) {
    if (!isAtomic(entity)) continue;
    const span = expandToToken(original, entity);
    if (atomic.some((kept) => spansIntersect(kept, span))) {
      dropped++;
      continue;
    }
    if (span.start !== entity.start || span.end !== entity.end) expanded++;
    atomic.push({ ...entity, ...span, text: original.slice(span.start, span.end) });
  }

  const others = ordered.filter((entity) => {
    if (isAtomic(entity)) return false;
    if (atomic.some((kept) => spansIntersect(kept, entity))) {
      dropped++;
      return false;
    }
    return true;
  });

  return {
    entities: [...atomic, ...others].sort((a, b) => a.start - b.start),
    expanded,
    dropped,
  };
};

// ============================================================================
// HEADER / CLINICAL GUARD
// ============================================================================

export type GuardReason = "header" | "section-label" | "clinical-term" | "dose";

export interface GuardVocabulary {
  readonly headerPhrases: ReadonlyArray<string>;
  readonly clinicalTerms: ReadonlyArray<string>;
}

const SECTION_LABEL = /^[A-Z][a-zA-Z\s/]+:$/;
const DOSE = /\d+(?:\.\d+)?\s*(?:mg|mcg)\b/;

/**
 * Build the guard once per vocabulary. Multi-word header phrases also match
 * inside a longer span; single words only match exactly.
 */
export const createProtectedTextGuard = (vocabulary: GuardVocabulary) => {
  const headers = new Set(vocabulary.headerPhrases.map((phrase) => phrase.toLowerCase()));
  const containedPhrases = vocabulary.headerPhrases.filter((phrase) => /[\s/]/.test(phrase.trim()));
  const clinicalTerms = new Set(vocabulary.clinicalTerms);

  return (text: string): GuardReason | undefined => {
    const trimmed = text.trim();
    if (headers.has(trimmed.toLowerCase())) return "header";
    if (containedPhrases.some((phrase) => trimmed.includes(phrase))) return "header";
    if (SECTION_LABEL.test(trimmed)) return "section-label";
    if (clinicalTerms.has(trimmed)) return "clinical-term";
    if (DOSE.test(trimmed)) return "dose";
    return undefined;
  };
};

export type ProtectedTextGuard = ReturnType<typeof createProtectedTextGuard>;
