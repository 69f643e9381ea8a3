/**
 * DATE SHIFTING
 *
 * Dates move by a per-subject offset in [30, 90] days and are written back in
 * the format they were found in, so intervals between a subject's dates
 * survive de-identification.
 */

import { addDays, format, isValid, parse } from 'date-fns';
import { hmacDigest } from './secureHash';

// ============================================================================
// FORMATS
// ============================================================================

/**
 * Ordered: ISO, US numeric, European numeric, month names, compact.
 * {M} and {d} expand to padded then unpadded widths.
 */
const LAYOUTS = [
  "yyyy-{M}-{d}'T'HH:mm:ss",
  'yyyy-{M}-{d} HH:mm:ss',
  'yyyy-{M}-{d} HH:mm',
  'yyyy-{M}-{d}',
  '{M}/{d}/yyyy HH:mm:ss',
  '{M}/{d}/yyyy HH:mm',
  '{M}/{d}/yyyy',
  '{M}/{d}/yy',
  '{M}-{d}-yyyy',
  '{M}-{d}-yy',
  '{d}/{M}/yyyy',
  '{d}/{M}/yy',
  '{d}-{M}-yyyy',
  '{d}-{M}-yy',
  '{d}.{M}.yyyy',
  '{d}.{M}.yy',
  'yyyy/{M}/{d}',
  'MMMM {d}, yyyy',
  'MMM {d}, yyyy',
  'MMMM {d} yyyy',
  'MMM {d} yyyy',
  '{d} MMMM yyyy',
  '{d} MMM yyyy',
  'yyyyMMdd',
] as const;

const expandLayout = (layout: string): string[] =>
  ['MM', 'M'].flatMap((month) =>
    ['dd', 'd'].map((day) => layout.replace('{M}', month).replace('{d}', day))
  );

const FORMATS: ReadonlyArray<string> = [...new Set(LAYOUTS.flatMap(expandLayout))];

const FIELD_PATTERNS: ReadonlyArray<readonly [string, string]> = [
  ['yyyy', '\\d{4}'],
  ['yy', '\\d{2}'],
  ['MMMM', '(?:[A-Za-z]{4,9}|May)'],
  ['MMM', '[A-Za-z]{3}'],
  ['MM', '\\d{2}'],
  ['M', '[1-9]\\d?'],
  ['dd', '\\d{2}'],
  ['d', '[1-9]\\d?'],
  ['HH', '\\d{2}'],
  ['mm', '\\d{2}'],
  ['ss', '\\d{2}'],
];

const escapeRegex = (text: string): string => text.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');

/**
 * date-fns accepts short fields for long tokens (`1` for MM, `80` for yyyy),
 * so the exact shape is checked first.
 */
const shapeOf = (fmt: string): RegExp => {
  let pattern = '';
  let i = 0;
  while (i < fmt.length) {
    if (fmt[i] === "'") {
      const close = fmt.indexOf("'", i + 1);
      pattern += escapeRegex(fmt.slice(i + 1, close));
      i = close + 1;
      continue;
    }
    const field = FIELD_PATTERNS.find(([token]) => fmt.startsWith(token, i));
    if (field) {
      pattern += field[1];
      i += field[0].length;
    } else {
      pattern += escapeRegex(fmt[i]);
      i += 1;
    }
  }
  return new RegExp(`^${pattern}$`);
};

const SHAPES: ReadonlyArray<readonly [string, RegExp]> = FORMATS.map((fmt) => [fmt, shapeOf(fmt)]);

// Fixed reference: two-digit years resolve to 1950-2049 regardless of today
const REFERENCE_DATE = new Date(2000, 0, 1);

// ============================================================================
// PARSING
// ============================================================================

export interface ParsedDate {
  readonly date: Date;
  /** The date-fns format that matched; used to render the shifted date */
  readonly format: string;
  readonly leading: string;
  readonly trailing: string;
}

/**
 * Parse against the ordered format list. Surrounding whitespace is kept aside.
 */
export const parseDate = (text: string): ParsedDate | undefined => {
  const body = text.trim();
  if (body.length === 0) return undefined;
  const leading = text.slice(0, text.indexOf(body));
  const trailing = text.slice(leading.length + body.length);

  for (const [fmt, shape] of SHAPES) {
    if (!shape.test(body)) continue;
    const date = parse(body, fmt, REFERENCE_DATE);
    if (isValid(date)) {
      return { date, format: fmt, leading, trailing };
    }
  }
  return undefined;
};

// "MARCH 12" stays upper case, "march 12" lower case
const matchMonthCase = (rendered: string, source: string): string => {
  const word = /[A-Za-z]+/.exec(source)?.[0];
  if (word === undefined) return rendered;
  if (word === word.toUpperCase()) return rendered.replace(/[A-Za-z]+/, (m) => m.toUpperCase());
  if (word === word.toLowerCase()) return rendered.replace(/[A-Za-z]+/, (m) => m.toLowerCase());
  return rendered;
};

/**
 * Shift a date string by a number of days, keeping its format.
 * Returns undefined when the text is not a recognized date.
 *
 * @example
 * shiftDate("01/15/1980", 30); // "02/14/1980"
 */
export const shiftDate = (text: string, days: number): string | undefined => {
  const parsed = parseDate(text);
  if (!parsed) return undefined;
  let rendered = format(addDays(parsed.date, days), parsed.format);
  if (parsed.format.includes('MMM')) {
    rendered = matchMonthCase(rendered, text);
  }
  return `${parsed.leading}${rendered}${parsed.trailing}`;
};

/** The four-digit year of a recognized date */
export const dateYear = (text: string): string | undefined => {
  const parsed = parseDate(text);
  return parsed ? format(parsed.date, 'yyyy') : undefined;
};

// ============================================================================
// SHIFT AMOUNT
// ============================================================================

export const MIN_SHIFT_DAYS = 30;
export const SHIFT_RANGE = 61;

/**
 * 30 + (first four digest bytes, big-endian) mod 61, always in [30, 90].
 */
export const computeShiftDays = (salt: string, subjectId: string): number =>
  MIN_SHIFT_DAYS + (hmacDigest(salt, `${subjectId}:date_shift`).readUInt32BE(0) % SHIFT_RANGE);
