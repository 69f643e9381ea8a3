/**
 * STRUCTURED TEST LOGGER
 *
 * Same JSON shape as appLogger. Only counts and offsets go in metadata,
 * never document text. Silent unless VITEST_VERBOSE=true or DEBUG=true.
 */

import type { AuditRecord } from "../schemas/entities";

interface LogMetadata {
  [key: string]: string | number | boolean | undefined;
}

const isVerbose = process.env.VITEST_VERBOSE === "true" || process.env.DEBUG === "true";

const emit = (level: string, event: string, fields: object): void => {
  if (!isVerbose) return;
  console.log(JSON.stringify({ level, event, timestamp: new Date().toISOString(), ...fields }));
};

export const testLogger = {
  info(event: string, metadata: LogMetadata = {}) {
    emit("info", event, metadata);
  },

  perf(event: string, metrics: { duration?: number; size?: number; count?: number }) {
    emit("perf", event, metrics);
  },

  /**
   * Action counts of an audit trail, e.g. { redact: 2, date_shift: 1 }
   */
  audit(event: string, audit: ReadonlyArray<AuditRecord>) {
    const actions: Record<string, number> = {};
    for (const record of audit) {
      actions[record.action] = (actions[record.action] || 0) + 1;
    }
    emit("audit", event, { records: audit.length, actions });
  },
};

/**
 * Usage in tests:
 *
 * ```typescript
 * testLogger.info('test:date-shift', { subjects: 2 });
 * testLogger.audit('test:long-note', result.audit);
 * ```
 *
 * Run with verbose logging:
 * ```bash
 * VITEST_VERBOSE=true npm test
 * ```
 */
