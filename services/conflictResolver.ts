/**
 * CONFLICT RESOLVER
 *
 * Several detectors report overlapping, differently labelled spans. The
 * resolver folds labels onto the taxonomy, drops what a preserve span covers,
 * and keeps one winner per region:
 *
 *   validate -> preserve filter -> sort -> containment -> pairwise overlap
 *
 * Winners are chosen by category priority, then source-weighted confidence,
 * then length, then whichever was kept first.
 *
 * OCaml equivalent:
 * val resolve : candidate list -> preserve_span list -> resolved_entity list
 */

import {
  spanContains,
  spanLength,
  spansIntersect,
  type CandidateInput,
  type DroppedCandidate,
  type DropReason,
  type PreserveSpan,
  type ResolvedEntity,
} from "../schemas/entities";
import {
  categoryPriority,
  normalizeCategory,
  normalizeSource,
  sourceWeight,
} from "../schemas/taxonomy";
import { parseDate } from "./dateShifter";

// ============================================================================
// TYPES
// ============================================================================

export interface ResolveOptions {
  /** Original text: bounds-checks candidates and fills missing snippets */
  readonly original?: string;
}

export interface ResolveResult {
  readonly entities: ResolvedEntity[];
  readonly dropped: DroppedCandidate[];
}

interface Scored {
  readonly entity: ResolvedEntity;
  readonly priority: number;
  readonly weighted: number;
}

// ============================================================================
// VALIDATION
// ============================================================================

const rejectReason = (c: CandidateInput, length: number | undefined): DropReason | undefined => {
  if (!Number.isInteger(c.start) || !Number.isInteger(c.end)) return "out-of-bounds";
  if (c.start >= c.end) return "empty-span";
  if (c.start < 0 || (length !== undefined && c.end > length)) return "out-of-bounds";
  if (!Number.isFinite(c.confidence)) return "bad-confidence";
  return undefined;
};

const clampConfidence = (confidence: number): number => Math.min(1, Math.max(0, confidence));

const drop = (c: { start: number; end: number; category: string }, reason: DropReason): DroppedCandidate => ({
  start: c.start,
  end: c.end,
  category: c.category,
  reason,
});

// ============================================================================
// ORDERING
// ============================================================================

/** Step B: start asc, length desc, priority asc, weighted confidence desc */
const processingOrder = (a: Scored, b: Scored): number =>
  a.entity.start - b.entity.start ||
  spanLength(b.entity) - spanLength(a.entity) ||
  a.priority - b.priority ||
  b.weighted - a.weighted;

/** Step D: does the challenger beat an already kept entity? Ties keep the incumbent */
const beats = (challenger: Scored, incumbent: Scored): boolean => {
  if (challenger.priority !== incumbent.priority) return challenger.priority < incumbent.priority;
  if (challenger.weighted !== incumbent.weighted) return challenger.weighted > incumbent.weighted;
  const lengthDiff = spanLength(challenger.entity) - spanLength(incumbent.entity);
  return lengthDiff > 0;
};

// ============================================================================
// RESOLVE
// ============================================================================

/**
 * Resolve and report every dropped candidate with its reason. Dropping is
 * never an error.
 */
export const resolveWithDiagnostics = (
  candidates: ReadonlyArray<CandidateInput>,
  preserve: ReadonlyArray<PreserveSpan> = [],
  options: ResolveOptions = {}
): ResolveResult => {
  const { original } = options;
  const length = original?.length;
  const dropped: DroppedCandidate[] = [];
  const preserveSpans = preserve.filter((p) => p.start < p.end);

  const scored: Scored[] = [];
  for (const c of candidates) {
    const reason = rejectReason(c, length);
    if (reason) {
      dropped.push(drop(c, reason));
      continue;
    }

    const category = normalizeCategory(c.category);
    if (category === "UNKNOWN") {
      dropped.push(drop(c, "unknown-category"));
      continue;
    }

    const source = normalizeSource(c.source);
    if (source === undefined) {
      dropped.push(drop(c, "unknown-source"));
      continue;
    }

    // Step A
    if (preserveSpans.some((p) => spansIntersect(p, c))) {
      dropped.push(drop(c, "preserved"));
      continue;
    }

    const confidence = clampConfidence(c.confidence);
    scored.push({
      entity: {
        start: c.start,
        end: c.end,
        category,
        confidence,
        source,
        text: c.text ?? original?.slice(c.start, c.end) ?? "",
      },
      priority: categoryPriority(category),
      // Step E
      weighted: confidence * sourceWeight(source, category),
    });
  }

  scored.sort(processingOrder);

  let kept: Scored[] = [];
  for (const candidate of scored) {
    const { entity } = candidate;

    // Step C
    const container = kept.find((k) => spanContains(k.entity, entity));
    if (container && candidate.priority >= container.priority) {
      dropped.push(drop(entity, "contained"));
      continue;
    }

    // Step D
    const rivals = kept.filter((k) => spansIntersect(k.entity, entity));
    if (!rivals.every((rival) => beats(candidate, rival))) {
      dropped.push(drop(entity, "overlap"));
      continue;
    }

    for (const rival of rivals) dropped.push(drop(rival.entity, "overlap"));
    kept = kept.filter((k) => !rivals.includes(k));
    kept.push(candidate);
  }

  return {
    entities: kept.map((k) => k.entity).sort((a, b) => a.start - b.start),
    dropped,
  };
};

/**
 * Merge candidates from every detector into one non-overlapping entity list,
 * sorted by start.
 *
 * @example
 * resolve(
 *   [
 *     { start: 5, end: 15, category: "DATE", confidence: 0.9, source: "rule" },
 *     { start: 5, end: 15, category: "PHONE_NUMBER", confidence: 0.6, source: "rule" },
 *   ],
 *   [],
 * ); // [{ start: 5, end: 15, category: "PHONE_NUMBER", ... }]
 */
export const resolve = (
  candidates: ReadonlyArray<CandidateInput>,
  preserve: ReadonlyArray<PreserveSpan> = [],
  options: ResolveOptions = {}
): ResolvedEntity[] => resolveWithDiagnostics(candidates, preserve, options).entities;

// ============================================================================
// FRAGMENT MERGING
// ============================================================================

interface MergeRule {
  readonly maxGap: number;
  readonly accepts: (gap: string) => boolean;
  /** Extra check on the fragment texts and their join */
  readonly joins?: (left: string, right: string, joined: string) => boolean;
}

// Two complete dates (a range such as `01/15/2020 - 01/20/2020`) stay apart
const joinsDateFragments = (left: string, right: string, joined: string): boolean =>
  parseDate(joined) !== undefined && (parseDate(left) === undefined || parseDate(right) === undefined);

const MERGE_RULES: Readonly<Record<string, MergeRule>> = {
  DATE: {
    maxGap: 5,
    accepts: (gap) => ["", "/", "-", "."].includes(gap.trim()),
    joins: joinsDateFragments,
  },
  MRN: { maxGap: 5, accepts: (gap) => /^[\s\-/.#:]*$/.test(gap) },
  NAME: { maxGap: 3, accepts: (gap) => /^[\s.]*$/.test(gap) },
};

const mergePair = (left: CandidateInput, right: CandidateInput, original: string): CandidateInput => {
  const stronger = right.confidence > left.confidence ? right : left;
  return {
    start: left.start,
    end: right.end,
    category: stronger.category,
    source: stronger.source,
    confidence: Math.max(left.confidence, right.confidence),
    text: original.slice(left.start, right.end),
  };
};

/**
 * Join split fragments of one identifier: `01` + `/15/1980`, `MRN 12` +
 * `-3456`, `John` + `Smith`. Runs before resolution, in original coordinates.
 */
export const mergeAdjacentFragments = (
  candidates: ReadonlyArray<CandidateInput>,
  original: string
): CandidateInput[] => {
  const untouched: CandidateInput[] = [];
  const groups = new Map<string, CandidateInput[]>();

  for (const c of candidates) {
    const category = normalizeCategory(c.category);
    const wellFormed =
      Number.isInteger(c.start) &&
      Number.isInteger(c.end) &&
      c.start >= 0 &&
      c.start < c.end &&
      c.end <= original.length;
    if (!wellFormed || MERGE_RULES[category] === undefined) {
      untouched.push(c);
      continue;
    }
    const group = groups.get(category) ?? [];
    group.push(c);
    groups.set(category, group);
  }

  const merged: CandidateInput[] = [];
  for (const [category, group] of groups) {
    const rule = MERGE_RULES[category];
    const ordered = [...group].sort((a, b) => a.start - b.start || b.end - a.end);
    let current = ordered[0];
    for (const next of ordered.slice(1)) {
      const gap = next.start - current.end;
      const adjacent =
        gap >= 0 && gap <= rule.maxGap && rule.accepts(original.slice(current.end, next.start));
      if (
        adjacent &&
        (rule.joins === undefined ||
          rule.joins(
            original.slice(current.start, current.end),
            original.slice(next.start, next.end),
            original.slice(current.start, next.end)
          ))
      ) {
        current = mergePair(current, next, original);
      } else {
        merged.push(current);
        current = next;
      }
    }
    merged.push(current);
  }

  return [...untouched, ...merged].sort((a, b) => a.start - b.start);
};
