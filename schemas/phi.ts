/**
 * PHI (Protected Health Information) TYPE SYSTEM
 *
 * Branded strings keep de-identified output apart from raw clinical text at
 * compile time. Plain strings at runtime.
 */

// ============================================================================
// SIMPLIFIED BRANDED TYPES
// ============================================================================

/**
 * Brand tags - these are compile-time only markers
 */
type Brand<K, T> = K & { __brand: T };

/**
 * DeidentifiedText - SAFE: every resolved entity has been transformed
 */
export type DeidentifiedText = Brand<string, 'DeidentifiedText'>;

/**
 * RedactionPlaceholder - A marker like [REDACTED:SSN] or [GENERALIZED:DATE]
 */
export type RedactionPlaceholder = Brand<string, 'RedactionPlaceholder'>;

// ============================================================================
// TYPE CONSTRUCTORS
// ============================================================================

/**
 * Mark text as de-identified (SAFE) - ONLY CALL FROM THE PIPELINE
 *
 * @internal - use deidentifyDocument() or deidentify()
 */
export function markAsDeidentified(text: string): DeidentifiedText {
  return text as DeidentifiedText;
}

// ============================================================================
// TYPE GUARDS (For Type Narrowing)
// ============================================================================

const PLACEHOLDER = /\[(?:REDACTED|GENERALIZED):([A-Z0-9_]+)\]/g;

/**
 * Type guard: Check if a string is exactly one placeholder
 */
export function isRedactionPlaceholder(text: string): text is RedactionPlaceholder {
  return /^\[(?:REDACTED|GENERALIZED):[A-Z0-9_]+\]$/.test(text);
}

// ============================================================================
// EXTRACTION UTILITIES
// ============================================================================

/**
 * Count placeholders by category
 *
 * @example
 * countPlaceholdersByCategory(markAsDeidentified("[REDACTED:SSN] [REDACTED:SSN]"));
 * // { SSN: 2 }
 */
export function countPlaceholdersByCategory(text: DeidentifiedText): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const match of text.matchAll(PLACEHOLDER)) {
    const category = match[1];
    counts[category] = (counts[category] || 0) + 1;
  }
  return counts;
}
