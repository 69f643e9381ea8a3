/**
 * CLINICAL PRESERVE FINDER
 *
 * Vitals, labs and medication doses look like identifiers to pattern
 * detectors (`BP 120/80` reads as a date, `HR 72` as an ID). Their spans are
 * handed to the resolver as preserve spans, which always win.
 */

import { Context, Effect, Layer } from "effect";
import type { PreserveSpan } from "../schemas/entities";
import clinicalMeasurements from "../schemas/data/clinicalMeasurements.json";

interface MeasurementPattern {
  readonly pattern: RegExp;
  readonly category: string;
}

const escapeLabel = (label: string): string => label.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const MEASUREMENT_PATTERNS: ReadonlyArray<MeasurementPattern> = clinicalMeasurements.measurements.map(
  ({ label, value, category }) => ({
    pattern: new RegExp(`(?<![A-Za-z0-9])${escapeLabel(label)}\\s*:?\\s*${value}(?!\\d)`, "gi"),
    category,
  })
);

const AMOUNT = "(?<![\\w.])\\d{1,4}(?:\\.\\d+)?";

// Mass and volume units are matched case-sensitively ("IU", not "iu")
const DOSE_PATTERN = new RegExp(`${AMOUNT}\\s*(?:${clinicalMeasurements.doseUnits.join("|")})\\b`, "g");

// "2 Unit" is an address; "10 units subcutaneously" is a dose
const COUNTED_DOSE_PATTERN = new RegExp(
  `${AMOUNT}\\s*(?:${clinicalMeasurements.countUnits.join("|")})\\s+(?:${clinicalMeasurements.doseContext.join("|")})\\b`,
  "gi"
);

/**
 * Spans of clinical measurements and doses, in the coordinates of `text`,
 * sorted by start.
 *
 * @example
 * findClinicalMeasurementSpans("BP 120/80, HR 72");
 * // [{ start: 0, end: 9, category: "CLINICAL_VITAL" }, { start: 11, end: 16, ... }]
 */
export const findClinicalMeasurementSpans = (text: string): PreserveSpan[] => {
  const spans: PreserveSpan[] = [];
  for (const { pattern, category } of MEASUREMENT_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const start = match.index ?? 0;
      spans.push({ start, end: start + match[0].length, category });
    }
  }
  for (const pattern of [DOSE_PATTERN, COUNTED_DOSE_PATTERN]) {
    for (const match of text.matchAll(pattern)) {
      const start = match.index ?? 0;
      spans.push({ start, end: start + match[0].length, category: "MEDICATION_DOSE" });
    }
  }
  return spans.sort((a, b) => a.start - b.start || b.end - a.end);
};

// ============================================================================
// PRESERVE FINDER SERVICE (Effect Layer for dependency injection)
// ============================================================================

/**
 * OCaml equivalent:
 * module type PreserveFinder = sig
 *   val find : string -> preserve_span list
 * end
 */
export interface PreserveFinder {
  /** Preserve spans in the coordinates of the original text */
  find(original: string): Effect.Effect<ReadonlyArray<PreserveSpan>>;
}

export const PreserveFinder = Context.GenericTag<PreserveFinder>("PreserveFinder");

export const ClinicalPreserveFinderLive: Layer.Layer<PreserveFinder> = Layer.succeed(PreserveFinder, {
  find: (original) => Effect.sync(() => findClinicalMeasurementSpans(original)),
});

/** For callers that supply no preserve spans at all */
export const NoPreserveFinder: Layer.Layer<PreserveFinder> = Layer.succeed(PreserveFinder, {
  find: () => Effect.succeed([]),
});
