/**
 * SERVICE-LEVEL ERROR SYSTEM (Effect-TS)
 *
 * Errors are values, not exceptions. Composable, type-safe, structured.
 *
 * Philosophy:
 * - Errors are part of the type signature (Effect<A, E, R>)
 * - Recoverable errors are collected, the run continues
 * - Contract violations (HashInputError) are thrown immediately
 * - No error ever carries identifier text
 */

import { Data } from "effect";

/**
 * WEAK SALT WARNING - Hashing is running on the built-in fallback salt
 *
 * Codes stay deterministic but are guessable by anyone with the source.
 */
export class WeakSaltWarning extends Data.TaggedError("WeakSaltWarning")<{
  readonly message: string;
  readonly context?: Record<string, unknown>;
}> {
  get recoverable(): boolean {
    return true; // Processing continues on the fallback salt
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      context: this.context,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * HASH INPUT ERROR - Empty text handed to the keyed hash
 */
export class HashInputError extends Data.TaggedError("HashInputError")<{
  readonly message: string;
  readonly context?: Record<string, unknown>;
}> {
  get recoverable(): boolean {
    return false;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      context: this.context,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * DETECTOR ERROR - An external candidate detector failed
 *
 * Used by deidentifier.effect.ts; the remaining detectors still run.
 */
export class DetectorError extends Data.TaggedError("DetectorError")<{
  readonly message: string;
  readonly detectorName: string;
  readonly context?: Record<string, unknown>;
}> {
  get recoverable(): boolean {
    return true; // Other detectors' candidates are still resolved
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      detectorName: this.detectorName,
      context: this.context,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * CONFIG VALIDATION ERROR - Rulebook or engine config failed decoding
 */
export class ConfigValidationError extends Data.TaggedError("ConfigValidationError")<{
  readonly message: string;
  readonly source: "rulebook" | "config" | "env";
  readonly issues: ReadonlyArray<string>;
}> {
  get recoverable(): boolean {
    return false; // A wrong policy must never be guessed at
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      source: this.source,
      issues: this.issues,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * Union of all service errors (for type safety)
 */
export type ServiceError =
  | WeakSaltWarning
  | HashInputError
  | DetectorError
  | ConfigValidationError;

/**
 * Error Collector (for accumulating multiple errors during processing)
 *
 * Used when we want to continue processing despite errors (graceful degradation)
 */
export class ErrorCollector {
  private errors: ServiceError[] = [];

  add(error: ServiceError): void {
    this.errors.push(error);
  }

  getAll(): ServiceError[] {
    return [...this.errors];
  }

  count(): number {
    return this.errors.length;
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  hasUnrecoverableErrors(): boolean {
    return this.errors.some((e) => !e.recoverable);
  }

  clear(): void {
    this.errors = [];
  }

  toJSON() {
    return this.errors.map((e) => e.toJSON());
  }
}
