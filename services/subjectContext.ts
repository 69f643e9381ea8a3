/**
 * SUBJECT CONTEXT STORE
 *
 * Per-subject memo tables: date shift, pseudonyms, shifted dates. JS runs the
 * lookup-compute-insert of every getOrCompute without yielding, so two callers
 * for the same subject can never cache divergent values.
 *
 * A store is tied to the salt of the engine that fills it.
 */

import { Context, Layer } from "effect";

export class SubjectContext {
  private shiftDays: number | undefined;
  private readonly pseudonyms = new Map<string, string>();
  private readonly dates = new Map<string, string>();

  constructor(readonly subjectId: string | undefined) {}

  getOrComputeShiftDays(compute: () => number): number {
    if (this.shiftDays === undefined) {
      this.shiftDays = compute();
    }
    return this.shiftDays;
  }

  getOrComputePseudonym(key: string, compute: () => string): string {
    return getOrCompute(this.pseudonyms, key, compute);
  }

  /** Unrecognized dates (compute returns undefined) are not cached */
  getOrComputeDate(dateText: string, compute: () => string | undefined): string | undefined {
    return getOrCompute(this.dates, dateText, compute);
  }

  get pseudonymCount(): number {
    return this.pseudonyms.size;
  }

  get dateCount(): number {
    return this.dates.size;
  }
}

function getOrCompute(cache: Map<string, string>, key: string, compute: () => string): string;
function getOrCompute(
  cache: Map<string, string>,
  key: string,
  compute: () => string | undefined
): string | undefined;
function getOrCompute(
  cache: Map<string, string>,
  key: string,
  compute: () => string | undefined
): string | undefined {
  const hit = cache.get(key);
  if (hit !== undefined) return hit;
  const value = compute();
  if (value !== undefined) cache.set(key, value);
  return value;
}

// ============================================================================
// STORE
// ============================================================================

export interface SubjectStore {
  /** Get or lazily create the context for a subject */
  get(subjectId: string): SubjectContext;
  reset(subjectId: string): void;
  clear(): void;
  size(): number;
}

export class InMemorySubjectStore implements SubjectStore {
  private readonly contexts = new Map<string, SubjectContext>();

  get(subjectId: string): SubjectContext {
    let context = this.contexts.get(subjectId);
    if (!context) {
      context = new SubjectContext(subjectId);
      this.contexts.set(subjectId, context);
    }
    return context;
  }

  reset(subjectId: string): void {
    this.contexts.delete(subjectId);
  }

  clear(): void {
    this.contexts.clear();
  }

  size(): number {
    return this.contexts.size;
  }
}

// ============================================================================
// EFFECT SERVICE
// ============================================================================

export const SubjectStore = Context.GenericTag<SubjectStore>("SubjectStore");

/** Fresh in-memory store per layer build */
export const SubjectStoreLive: Layer.Layer<SubjectStore> = Layer.sync(
  SubjectStore,
  () => new InMemorySubjectStore()
);
