/**
 * ENTITY SCHEMAS - DETECTOR OUTPUT THROUGH AUDIT RECORD
 *
 * Lifecycle of a span:
 *   RawCandidate (canonical coords, detector labels)
 *     -> CandidateEntity (original coords, taxonomy category)
 *     -> ResolvedEntity (non-overlapping, known category)
 *     -> AuditRecord (no identifier text)
 */

import { Schema as S } from "effect";
import {
  CandidateSourceSchema,
  CategorySchema,
  type CandidateSource,
  type Category,
  type KnownCategory,
} from "./taxonomy";

// ============================================================================
// SPAN (half-open [start, end))
// ============================================================================

export interface Span {
  readonly start: number;
  readonly end: number;
}

export const spansIntersect = (a: Span, b: Span): boolean =>
  a.start < b.end && b.start < a.end;

export const spanContains = (outer: Span, inner: Span): boolean =>
  outer.start <= inner.start && inner.end <= outer.end;

export const spanLength = (span: Span): number => span.end - span.start;

// ============================================================================
// RAW CANDIDATE (external detector output contract)
// ============================================================================

/**
 * What a detector hands us. Labels and sources are free strings here;
 * folding onto the taxonomy happens during projection.
 */
export const RawCandidateSchema = S.Struct({
  start: S.Int,
  end: S.Int,
  category: S.String,
  confidence: S.Number,
  source: S.String,
});
export type RawCandidate = S.Schema.Type<typeof RawCandidateSchema>;

export const decodeRawCandidates = S.decodeUnknown(S.Array(RawCandidateSchema));

/** Resolver input: detector labels, original coordinates, text when known */
export interface CandidateInput extends RawCandidate {
  readonly text?: string;
}

// ============================================================================
// CANDIDATE ENTITY (projected into original coordinates)
// ============================================================================

export interface CandidateEntity {
  readonly start: number;
  readonly end: number;
  readonly category: Category;
  readonly confidence: number;
  readonly source: CandidateSource;
  readonly text: string;
}

// ============================================================================
// RESOLVED ENTITY
// ============================================================================

/**
 * Invariants (enforced by the resolver):
 * - start < end
 * - no overlap with any other entity of the same result
 * - category is never UNKNOWN
 */
export interface ResolvedEntity extends CandidateEntity {
  readonly category: KnownCategory;
}

// ============================================================================
// PRESERVE SPAN (clinical measurement / whitelisted phrase)
// ============================================================================

export const PreserveSpanSchema = S.Struct({
  start: S.Int,
  end: S.Int,
  category: S.String,
});
export type PreserveSpan = S.Schema.Type<typeof PreserveSpanSchema>;

// ============================================================================
// CONTAINER SPANS (informational, canonical coordinates)
// ============================================================================

export interface ContainerSpans {
  readonly urls: ReadonlyArray<Span>;
  readonly filenames: ReadonlyArray<Span>;
}

// ============================================================================
// AUDIT RECORD (never carries identifier text)
// ============================================================================

export const AuditActionSchema = S.Literal(
  "redact",
  "hash",
  "pseudonym",
  "generalize",
  "date_shift",
  "preserved"
);
export type AuditAction = S.Schema.Type<typeof AuditActionSchema>;

export const AuditRecordSchema = S.Struct({
  start: S.Int,
  end: S.Int,
  category: CategorySchema,
  confidence: S.Number,
  source: CandidateSourceSchema,
  action: AuditActionSchema,
});
export type AuditRecord = S.Schema.Type<typeof AuditRecordSchema>;

// ============================================================================
// DROPPED CANDIDATE (resolver diagnostics, not errors)
// ============================================================================

export type DropReason =
  | "empty-span"
  | "out-of-bounds"
  | "bad-confidence"
  | "unknown-category"
  | "unknown-source"
  | "preserved"
  | "contained"
  | "overlap";

export interface DroppedCandidate {
  readonly start: number;
  readonly end: number;
  readonly category: string;
  readonly reason: DropReason;
}
