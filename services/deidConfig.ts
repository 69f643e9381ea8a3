/**
 * CONFIGURATION LOADING - Effect-TS
 *
 * Decodes rulebooks and engine configuration from untrusted input and exposes
 * the result to Effect programs through DeidConfigService.
 *
 * OCaml equivalent:
 * val decode_rulebook : json -> (rulebook, config_error) result
 * val config_from_env : env -> (deid_config, config_error) result
 */

import { Context, Effect, Layer, ParseResult, Schema as S, pipe } from "effect";
import {
  DEFAULT_DEID_CONFIG,
  DeidConfigInputSchema,
  DeidEnvSchema,
  type DeidConfig,
} from "../schemas/config";
import {
  DEFAULT_RULEBOOK,
  buildRuleBook,
  decodeRuleBookInput,
  type RuleBook,
} from "../schemas/rulebook";
import { ConfigValidationError } from "./errors";

const formatIssues = (error: ParseResult.ParseError): ReadonlyArray<string> =>
  ParseResult.ArrayFormatter.formatErrorSync(error).map((issue) =>
    issue.path.length > 0 ? `${issue.path.map(String).join(".")}: ${issue.message}` : issue.message
  );

// ============================================================================
// RULEBOOK
// ============================================================================

/**
 * Decode a rulebook from configuration. Labels that fold onto no category
 * are rejected rather than ignored.
 */
export const decodeRuleBook = (
  input: unknown
): Effect.Effect<RuleBook, ConfigValidationError> =>
  pipe(
    decodeRuleBookInput(input),
    Effect.mapError(
      (error) =>
        new ConfigValidationError({
          message: "Rulebook failed schema validation",
          source: "rulebook",
          issues: formatIssues(error),
        })
    ),
    Effect.map(buildRuleBook),
    Effect.flatMap(({ rulebook, unknownLabels }) =>
      unknownLabels.length === 0
        ? Effect.succeed(rulebook)
        : Effect.fail(
            new ConfigValidationError({
              message: "Rulebook names labels outside the taxonomy",
              source: "rulebook",
              issues: unknownLabels.map((label) => `rules.${label}: unknown category`),
            })
          )
    )
  );

// ============================================================================
// ENGINE CONFIG
// ============================================================================

const decodeConfigInput = S.decodeUnknown(DeidConfigInputSchema);
const decodeEnv = S.decodeUnknown(DeidEnvSchema);

/**
 * Decode a partial config and overlay it on DEFAULT_DEID_CONFIG
 */
export const decodeDeidConfig = (
  input: unknown
): Effect.Effect<DeidConfig, ConfigValidationError> =>
  pipe(
    decodeConfigInput(input),
    Effect.map((overlay): DeidConfig => ({ ...DEFAULT_DEID_CONFIG, ...overlay })),
    Effect.mapError(
      (error) =>
        new ConfigValidationError({
          message: "Engine config failed schema validation",
          source: "config",
          issues: formatIssues(error),
        })
    )
  );

/**
 * Overlay DEID_* environment variables on a base config
 *
 * @example
 * const config = yield* _(configFromEnv(process.env));
 */
export const configFromEnv = (
  env: Readonly<Record<string, string | undefined>>,
  base: DeidConfig = DEFAULT_DEID_CONFIG
): Effect.Effect<DeidConfig, ConfigValidationError> =>
  pipe(
    decodeEnv({
      DEID_SALT: env.DEID_SALT || undefined,
      DEID_DEFAULT_SHIFT_DAYS: env.DEID_DEFAULT_SHIFT_DAYS || undefined,
      DEID_UNPARSEABLE_DATE_POLICY: env.DEID_UNPARSEABLE_DATE_POLICY || undefined,
    }),
    Effect.map(
      (vars): DeidConfig => ({
        ...base,
        ...(vars.DEID_SALT !== undefined ? { salt: vars.DEID_SALT } : {}),
        ...(vars.DEID_DEFAULT_SHIFT_DAYS !== undefined
          ? { defaultShiftDays: vars.DEID_DEFAULT_SHIFT_DAYS }
          : {}),
        ...(vars.DEID_UNPARSEABLE_DATE_POLICY !== undefined
          ? { unparseableDatePolicy: vars.DEID_UNPARSEABLE_DATE_POLICY }
          : {}),
      })
    ),
    Effect.mapError(
      (error) =>
        new ConfigValidationError({
          message: "Environment config failed validation",
          source: "env",
          issues: formatIssues(error),
        })
    )
  );

// ============================================================================
// CONFIG SERVICE (Effect Layer for dependency injection)
// ============================================================================

export interface DeidConfigService {
  readonly config: DeidConfig;
  readonly rulebook: RuleBook;
}

export const DeidConfigService = Context.GenericTag<DeidConfigService>("DeidConfigService");

export const makeDeidConfigLayer = (
  config: DeidConfig = DEFAULT_DEID_CONFIG,
  rulebook: RuleBook = DEFAULT_RULEBOOK
): Layer.Layer<DeidConfigService> => Layer.succeed(DeidConfigService, { config, rulebook });

/**
 * Config from the process environment over the defaults, default rulebook
 */
export const DeidConfigServiceFromEnv: Layer.Layer<DeidConfigService, ConfigValidationError> =
  Layer.effect(
    DeidConfigService,
    Effect.map(configFromEnv(process.env), (config) => ({ config, rulebook: DEFAULT_RULEBOOK }))
  );
