/**
 * OBVIOUSLY-FAKE TEST DATA CONSTANTS
 *
 * These values are intentionally invalid to prevent copy-paste into production.
 * Hard to accidentally ship, easy to identify in logs.
 */

import { DEFAULT_DEID_CONFIG, type DeidConfig } from "../schemas/config";
import type { RawCandidate } from "../schemas/entities";

export const TEST_SALT = "test-secret";

export const TEST_CONFIG: DeidConfig = { ...DEFAULT_DEID_CONFIG, salt: TEST_SALT };

export const TEST_PHI = {
  // Emails - using .invalid TLD (RFC 6761 - guaranteed to never be real)
  EMAIL_PRIMARY: "test-patient@example.invalid",

  // SSNs - Using 000 prefix (invalid per SSA rules)
  SSN_PRIMARY: "000-00-0001",

  // Phone Numbers - Using 555-01XX range (reserved for fictional use)
  PHONE_PRIMARY: "555-010-0000",

  // Medical Record Numbers - Prefix with TEST
  MRN_PRIMARY: "TEST000001",

  // ZIP Codes - Using 00000 (non-existent)
  ZIP_5_DIGIT: "00000",

  DATE_BIRTH: "03/12/1958",
  DATE_VISIT: "06/15/2024",

  // Names - Clearly test data
  NAME_PATIENT: "Test Patient",
  NAME_PATIENT_REVERSED: "Patient, Test",

  SUBJECT_A: "subject-test-a",
  SUBJECT_B: "subject-test-b",
} as const;

/**
 * Candidate covering the first occurrence of `needle` in `text`.
 * Offsets come from the text itself so tests never hand-count them.
 */
export const candidateFor = (
  text: string,
  needle: string,
  category: string,
  overrides: Partial<RawCandidate> = {}
): RawCandidate => {
  const start = text.indexOf(needle);
  if (start < 0) {
    throw new Error(`"${needle}" not found in test text`);
  }
  return {
    start,
    end: start + needle.length,
    category,
    confidence: 0.9,
    source: "regex",
    ...overrides,
  };
};
