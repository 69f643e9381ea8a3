/**
 * DE-IDENTIFICATION PIPELINE - EFFECT-TS VERSION
 *
 * Architecture:
 * - Detectors as Effect services (dependency injection)
 * - Detector failures are values, collected, never fatal
 * - Deterministic core (normalize -> project -> merge -> resolve -> transform)
 *   stays pure and is exported on its own as deidentifyDocument
 *
 * OCaml equivalent:
 * module Deidentifier : sig
 *   type detector = { name : string; detect : string -> (raw_candidate list, error) result }
 *   val deidentify : string -> options -> (result, never) Effect.t
 * end
 */

import { Context, Effect, Layer, ParseResult, pipe } from "effect";
import type { DeidConfig } from "../schemas/config";
import {
  decodeRawCandidates,
  type AuditRecord,
  type ContainerSpans,
  type DroppedCandidate,
  type PreserveSpan,
  type RawCandidate,
} from "../schemas/entities";
import { markAsDeidentified, type DeidentifiedText } from "../schemas/phi";
import type { RuleBook } from "../schemas/rulebook";
import { appLogger } from "./appLogger";
import { summarizeAudit, type AuditSummary } from "./auditSummary";
import { ClinicalPreserveFinderLive, PreserveFinder } from "./clinicalPreserve";
import { mergeAdjacentFragments, resolveWithDiagnostics } from "./conflictResolver";
import { DeidConfigService, makeDeidConfigLayer } from "./deidConfig";
import { DetectorError, ErrorCollector, type WeakSaltWarning } from "./errors";
import { withAppLogging } from "./runtime";
import { SubjectStore, SubjectStoreLive } from "./subjectContext";
import {
  findContainerSpans,
  normalize,
  projectCandidates,
  type NormalizedDocument,
} from "./textNormalizer";
import { createTransformationEngine, type TransformationEngine } from "./transformationEngine";

// ============================================================================
// TYPES
// ============================================================================

export interface DeidentifyOptions {
  readonly subjectId?: string;
  /** Extra preserve spans in original coordinates, added to the finder's */
  readonly preserve?: ReadonlyArray<PreserveSpan>;
}

export interface DocumentResult {
  readonly text: DeidentifiedText;
  readonly audit: AuditRecord[];
  readonly dropped: DroppedCandidate[];
  readonly containers: ContainerSpans;
  readonly warnings: WeakSaltWarning[];
  readonly summary: AuditSummary;
}

export interface DeidentifyResult {
  readonly result: DocumentResult;
  readonly errors: ErrorCollector;
}

// ============================================================================
// PURE PIPELINE
// ============================================================================

/**
 * Run the deterministic core on candidates a caller already has.
 *
 * @param candidates - detector output in canonical coordinates of `original`
 *
 * @example
 * const engine = createTransformationEngine({ config });
 * const { text } = deidentifyDocument(
 *   "DOB: 03/12/1958",
 *   [{ start: 5, end: 15, category: "DATE", confidence: 0.9, source: "regex" }],
 *   { engine, rulebook: DEFAULT_RULEBOOK }
 * );
 */
export const deidentifyDocument = (
  original: string,
  candidates: ReadonlyArray<RawCandidate>,
  options: DeidentifyOptions & {
    readonly engine: TransformationEngine;
    readonly rulebook: RuleBook;
    /** `normalize(original)` when the caller already ran it for its detectors */
    readonly normalized?: NormalizedDocument;
  }
): DocumentResult => {
  const doc = options.normalized ?? normalize(original);
  const projected = projectCandidates(doc, candidates);
  const merged = mergeAdjacentFragments(projected, original);
  const { entities, dropped } = resolveWithDiagnostics(merged, options.preserve ?? [], { original });
  const transformed = options.engine.transform(original, entities, options.rulebook, options.subjectId);

  return {
    text: markAsDeidentified(transformed.text),
    audit: transformed.audit,
    dropped,
    containers: findContainerSpans(doc.canonical),
    warnings: transformed.warnings,
    summary: summarizeAudit(transformed.audit, original.length),
  };
};

// ============================================================================
// DETECTOR SERVICE (Effect Layer for dependency injection)
// ============================================================================

/**
 * An external candidate detector (pattern, NER, token classifier).
 * Runs on canonical text and reports canonical offsets.
 */
export interface CandidateDetector {
  readonly name: string;
  detect(canonical: string): Effect.Effect<ReadonlyArray<RawCandidate>, DetectorError, never>;
}

export interface CandidateDetectors {
  readonly detectors: ReadonlyArray<CandidateDetector>;
}

export const CandidateDetectors = Context.GenericTag<CandidateDetectors>("CandidateDetectors");

export const makeCandidateDetectorsLayer = (
  detectors: ReadonlyArray<CandidateDetector>
): Layer.Layer<CandidateDetectors> => Layer.succeed(CandidateDetectors, { detectors });

/**
 * Wrap a plain (sync or async) detector function. Thrown errors and output
 * that is not a candidate list become DetectorError.
 */
export const makeCandidateDetector = (
  name: string,
  run: (canonical: string) => unknown
): CandidateDetector => ({
  name,
  detect: (canonical) =>
    pipe(
      Effect.tryPromise({
        try: async () => run(canonical),
        catch: (error) =>
          new DetectorError({
            message: error instanceof Error ? error.message : String(error),
            detectorName: name,
          }),
      }),
      Effect.flatMap((output) =>
        Effect.mapError(
          decodeRawCandidates(output),
          (error) =>
            new DetectorError({
              message: "Detector returned malformed output",
              detectorName: name,
              context: { issues: ParseResult.ArrayFormatter.formatErrorSync(error).length },
            })
        )
      )
    ),
});

// ============================================================================
// TRANSFORMATION ENGINE SERVICE
// ============================================================================

export const TransformationEngineService =
  Context.GenericTag<TransformationEngine>("TransformationEngine");

/** One engine per layer build, sharing the injected subject store */
export const TransformationEngineLive: Layer.Layer<
  TransformationEngine,
  never,
  DeidConfigService | SubjectStore
> = Layer.effect(
  TransformationEngineService,
  Effect.gen(function* (_) {
    const { config } = yield* _(DeidConfigService);
    const store = yield* _(SubjectStore);
    return createTransformationEngine({ config, store });
  })
);

export interface DeidentifierLayerOptions {
  readonly detectors: ReadonlyArray<CandidateDetector>;
  readonly config?: DeidConfig;
  readonly rulebook?: RuleBook;
  readonly preserveFinder?: Layer.Layer<PreserveFinder>;
  /** Share one store across runs; a fresh in-memory store otherwise */
  readonly store?: SubjectStore;
}

/**
 * Everything deidentify needs. The clinical preserve finder is the default.
 */
export const makeDeidentifierLayer = (options: DeidentifierLayerOptions) => {
  const configLayer = makeDeidConfigLayer(options.config, options.rulebook);
  const engineLayer = Layer.provide(
    TransformationEngineLive,
    Layer.mergeAll(
      configLayer,
      options.store ? Layer.succeed(SubjectStore, options.store) : SubjectStoreLive
    )
  );
  return Layer.mergeAll(
    engineLayer,
    configLayer,
    options.preserveFinder ?? ClinicalPreserveFinderLive,
    makeCandidateDetectorsLayer(options.detectors)
  );
};

// ============================================================================
// MAIN PROGRAM
// ============================================================================

const runDetectors = (
  detectors: ReadonlyArray<CandidateDetector>,
  canonical: string,
  errorCollector: ErrorCollector
): Effect.Effect<RawCandidate[]> =>
  Effect.gen(function* (_) {
    const candidates: RawCandidate[] = [];
    for (const detector of detectors) {
      const found = yield* _(
        pipe(
          detector.detect(canonical),
          Effect.catchAll((error) => {
            // Keep going on the remaining detectors
            errorCollector.add(error);
            return Effect.succeed<ReadonlyArray<RawCandidate>>([]);
          })
        )
      );
      candidates.push(...found);
    }
    return candidates;
  });

/**
 * De-identify one document with the injected detectors, preserve finder,
 * config and engine.
 */
export const deidentify = (
  original: string,
  options: DeidentifyOptions = {}
): Effect.Effect<
  DeidentifyResult,
  never,
  CandidateDetectors | PreserveFinder | DeidConfigService | TransformationEngine
> =>
  Effect.gen(function* (_) {
    const errorCollector = new ErrorCollector();
    const { rulebook } = yield* _(DeidConfigService);
    const engine = yield* _(TransformationEngineService);
    const { detectors } = yield* _(CandidateDetectors);
    const preserveFinder = yield* _(PreserveFinder);
    const startTime = performance.now();

    const normalized = normalize(original);
    const candidates = yield* _(runDetectors(detectors, normalized.canonical, errorCollector));
    const found = yield* _(preserveFinder.find(original));

    const result = deidentifyDocument(original, candidates, {
      engine,
      rulebook,
      normalized,
      subjectId: options.subjectId,
      preserve: [...found, ...(options.preserve ?? [])],
    });
    result.warnings.forEach((warning) => errorCollector.add(warning));

    yield* _(
      pipe(
        Effect.logInfo("De-identification complete"),
        Effect.annotateLogs({
          candidates: candidates.length,
          applied: result.audit.length,
          actions: result.summary.byAction,
          dropped: result.dropped.length,
          errors: errorCollector.count(),
          durationMs: Math.round(performance.now() - startTime),
        })
      )
    );

    return { result, errors: errorCollector };
  });

/**
 * HELPER: Run the pipeline as a Promise with the given detectors
 */
export const runDeidentify = async (
  text: string,
  options: DeidentifyOptions & DeidentifierLayerOptions
): Promise<DocumentResult> => {
  const program = pipe(
    deidentify(text, options),
    Effect.provide(makeDeidentifierLayer(options))
  );

  const { result, errors } = await Effect.runPromise(withAppLogging(program));

  if (errors.hasErrors()) {
    appLogger.warn(`De-identification completed with ${errors.count()} warnings`, {
      errors: errors.toJSON(),
    });
  }

  return result;
};
