/**
 * PHI span de-identification core
 *
 * Normalize -> (external detectors) -> project -> merge -> resolve -> transform
 */

// Schemas
export * from "./schemas/taxonomy";
export * from "./schemas/entities";
export * from "./schemas/rulebook";
export * from "./schemas/config";
export * from "./schemas/phi";

// Pipeline stages
export {
  normalize,
  findContainerSpans,
  projectCandidates,
  type NormalizedDocument,
  type ProjectedCandidate,
} from "./services/textNormalizer";
export {
  resolve,
  resolveWithDiagnostics,
  mergeAdjacentFragments,
  type ResolveOptions,
  type ResolveResult,
} from "./services/conflictResolver";
export {
  createTransformationEngine,
  generalize,
  redactionPlaceholder,
  type TransformationEngine,
  type TransformationEngineOptions,
  type TransformResult,
} from "./services/transformationEngine";
export { shiftDate, parseDate, computeShiftDays, type ParsedDate } from "./services/dateShifter";
export { secureCode, normalizeName, pseudonymCacheKey, FALLBACK_SALT } from "./services/secureHash";
export { createProtectedTextGuard, expandAtomicEntities } from "./services/redactionGuards";
export { summarizeAudit, formatAuditSummary, type AuditSummary } from "./services/auditSummary";

// Services and orchestration
export {
  SubjectContext,
  SubjectStore,
  InMemorySubjectStore,
  SubjectStoreLive,
} from "./services/subjectContext";
export {
  DeidConfigService,
  DeidConfigServiceFromEnv,
  makeDeidConfigLayer,
  decodeRuleBook,
  decodeDeidConfig,
  configFromEnv,
} from "./services/deidConfig";
export {
  PreserveFinder,
  ClinicalPreserveFinderLive,
  NoPreserveFinder,
  findClinicalMeasurementSpans,
} from "./services/clinicalPreserve";
export {
  deidentifyDocument,
  deidentify,
  runDeidentify,
  CandidateDetectors,
  makeCandidateDetector,
  makeCandidateDetectorsLayer,
  makeDeidentifierLayer,
  TransformationEngineService,
  TransformationEngineLive,
  type CandidateDetector,
  type DeidentifyOptions,
  type DeidentifyResult,
  type DocumentResult,
  type DeidentifierLayerOptions,
} from "./services/deidentifier.effect";

// Errors, logging, runtime
export {
  WeakSaltWarning,
  HashInputError,
  DetectorError,
  ConfigValidationError,
  ErrorCollector,
  type ServiceError,
} from "./services/errors";
export { appLogger } from "./services/appLogger";
export { runPromise, runSyncResult, AppLayer, type RunResult } from "./services/runtime";
