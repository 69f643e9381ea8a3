/**
 * AUDIT SUMMARY
 *
 * Counts over an audit trail for compliance reports and run logs. Built from
 * offsets and labels only, so a summary is as safe to log as the trail.
 */

import type { AuditRecord } from "../schemas/entities";

export interface AuditSummary {
  readonly totalRecords: number;
  readonly byCategory: Record<string, number>;
  readonly byAction: Record<string, number>;
  /** Original characters covered by transformed (not preserved) spans */
  readonly charactersTransformed: number;
  /** charactersTransformed as a percentage of the original length */
  readonly phiDensityPercent: number;
}

export const summarizeAudit = (
  audit: ReadonlyArray<AuditRecord>,
  originalLength: number
): AuditSummary => {
  const byCategory: Record<string, number> = {};
  const byAction: Record<string, number> = {};
  let charactersTransformed = 0;

  for (const record of audit) {
    byCategory[record.category] = (byCategory[record.category] || 0) + 1;
    byAction[record.action] = (byAction[record.action] || 0) + 1;
    if (record.action !== "preserved") {
      charactersTransformed += record.end - record.start;
    }
  }

  const density = originalLength > 0 ? (charactersTransformed / originalLength) * 100 : 0;

  return {
    totalRecords: audit.length,
    byCategory,
    byAction,
    charactersTransformed,
    phiDensityPercent: Math.round(density * 100) / 100,
  };
};

/**
 * Console-friendly one-line-per-action view
 */
export const formatAuditSummary = (summary: AuditSummary): string => {
  const lines = ["AUDIT SUMMARY", "-".repeat(40)];
  for (const [action, count] of Object.entries(summary.byAction).sort()) {
    lines.push(`  ${action}: ${count}`);
  }
  lines.push("-".repeat(40));
  lines.push(`  TOTAL: ${summary.totalRecords} records, ${summary.phiDensityPercent}% of text transformed`);
  return lines.join("\n");
};
