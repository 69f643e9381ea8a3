/**
 * EFFECT RUNTIME - CENTRALIZED RUNTIME CONFIGURATION
 *
 * Provides a unified runtime for Effect-TS programs with:
 * - Structured JSON logging with metadata redaction
 * - Result-typed runners (no exceptions escape)
 *
 * OCaml equivalent:
 * module Runtime : sig
 *   val run_promise : 'a Effect.t -> ('a, error) result Promise.t
 *   val run_sync_result : 'a Effect.t -> ('a, error) result
 * end
 */

import { Effect, Logger, LogLevel } from "effect";
import { getLogMode, isRecord, redactValue } from "./appLogger";
import type { ServiceError } from "./errors";

// ============================================================================
// RUNTIME CONFIGURATION
// ============================================================================

/**
 * Structured logger for Effect programs
 *
 * Annotations pass through the same redaction as appLogger, so a stage that
 * annotates with a text-bearing key never leaks it.
 */
const AppLogger = Logger.make(({ logLevel, message, annotations }) => {
  const level = logLevel.label;
  const fields: Record<string, unknown> = {};
  for (const [key, value] of annotations) {
    fields[key] = value;
  }

  const redacted = redactValue(fields);
  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    message: redactValue(Array.isArray(message) ? message.join(" ") : message),
    ...(isRecord(redacted) ? redacted : {}),
  };

  if (level === "ERROR" || level === "FATAL") {
    console.error(JSON.stringify(logEntry));
  } else if (level === "WARN") {
    console.warn(JSON.stringify(logEntry));
  } else if (level === "INFO") {
    console.info(JSON.stringify(logEntry));
  } else {
    console.log(JSON.stringify(logEntry));
  }
});

/**
 * Base layer: replaces the default logger (WARN+ outside development)
 */
const AppLayer = Logger.replace(Logger.defaultLogger, AppLogger);

const minimumLevel = (): LogLevel.LogLevel =>
  getLogMode() === "development" ? LogLevel.Info : LogLevel.Warning;

/** Attach the structured logger and level filter to any program */
export const withAppLogging = <A, E, R>(effect: Effect.Effect<A, E, R>) =>
  effect.pipe(Logger.withMinimumLogLevel(minimumLevel()), Effect.provide(AppLayer));

// ============================================================================
// RUNTIME HELPERS
// ============================================================================

export type RunResult<A, E> = { success: true; data: A } | { success: false; error: E };

/**
 * Run Effect as Promise with error handling
 *
 * @example
 * const result = await runPromise(deidentify(text, options).pipe(Effect.provide(layer)));
 * if (result.success) {
 *   console.log(result.data.text);
 * }
 */
export const runPromise = <A, E>(
  effect: Effect.Effect<A, E, never>
): Promise<RunResult<A, E>> => {
  return Effect.runPromise(
    withAppLogging(effect).pipe(
      Effect.map((data) => ({ success: true as const, data })),
      Effect.catchAll((error) =>
        Effect.succeed({ success: false as const, error })
      )
    )
  );
};

/**
 * Run Effect with Result type (no exceptions)
 *
 * Safer alternative to Effect.runSync for synchronous operations
 */
export const runSyncResult = <A, E>(
  effect: Effect.Effect<A, E, never>
): RunResult<A, E> => {
  return Effect.runSync(
    withAppLogging(effect).pipe(
      Effect.map((data) => ({ success: true as const, data })),
      Effect.catchAll((error) =>
        Effect.succeed({ success: false as const, error })
      )
    )
  );
};

// ============================================================================
// SERVICE ERROR HELPERS
// ============================================================================

export const isRecoverable = (error: ServiceError): boolean => error.recoverable;

/**
 * Convert ServiceError to JSON for logging
 */
export const serializeError = (error: ServiceError): Record<string, unknown> => {
  return error.toJSON();
};

export { AppLayer, AppLogger };
