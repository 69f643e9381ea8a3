/**
 * TEXT NORMALIZER - CANONICAL COPY WITH PROVENANCE
 *
 * Detectors see a cleaned copy of the document (Unicode folded, OCR noise
 * repaired, wrapped words joined). Every canonical character remembers which
 * original character it came from, so detections map back exactly.
 *
 * Pipeline (each stage rewrites text and provenance in lock-step):
 * 1. NFKC per source segment (code point + trailing combining marks)
 * 2. Typographic confusables -> ASCII
 * 3. Control / zero-width removal (\n and \t kept), then OCR letter/digit
 *    fixes inside header tokens
 * 4. Whitespace runs and padded separators collapsed
 * 5. Line-wrap de-hyphenation (bounded passes)
 * 6. Numeric date OCR repair
 *
 * Mapping rules: deletions emit nothing, same-length replacements map
 * one-to-one, other replacements anchor to the first replaced character.
 */

import headerVocabulary from "../schemas/data/headerVocabulary.json";
import type { ContainerSpans, RawCandidate, Span } from "../schemas/entities";

// ============================================================================
// TYPES
// ============================================================================

export interface NormalizedDocument {
  readonly original: string;
  readonly canonical: string;
  /** charMap[i] = index in original of canonical character i */
  readonly charMap: ReadonlyArray<number>;
  /** Canonical [start, end) -> original [start, end); never cuts a code point */
  project(start: number, end: number): Span;
}

/** A candidate in original coordinates, still carrying detector labels */
export interface ProjectedCandidate extends RawCandidate {
  readonly text: string;
}

/**
 * Working copy: one entry per UTF-16 code unit. `src` is where the unit came
 * from, `srcEnd` the end of the original segment it belongs to.
 */
interface Working {
  readonly text: string;
  readonly src: ReadonlyArray<number>;
  readonly srcEnd: ReadonlyArray<number>;
}

interface Edit {
  readonly start: number;
  readonly end: number;
  readonly replacement: string;
}

// ============================================================================
// EDIT APPLICATION
// ============================================================================

/**
 * Apply sorted, non-overlapping edits to the working copy.
 */
const applyEdits = (w: Working, edits: ReadonlyArray<Edit>): Working => {
  if (edits.length === 0) return w;

  let text = "";
  const src: number[] = [];
  const srcEnd: number[] = [];
  let cursor = 0;

  const keep = (from: number, to: number) => {
    text += w.text.slice(from, to);
    for (let i = from; i < to; i++) {
      src.push(w.src[i]);
      srcEnd.push(w.srcEnd[i]);
    }
  };

  for (const edit of edits) {
    keep(cursor, edit.start);
    const width = edit.end - edit.start;
    const { replacement } = edit;
    text += replacement;
    for (let k = 0; k < replacement.length; k++) {
      const from = replacement.length === width ? edit.start + k : edit.start;
      src.push(w.src[from]);
      srcEnd.push(w.srcEnd[from]);
    }
    cursor = edit.end;
  }
  keep(cursor, w.text.length);

  return { text, src, srcEnd };
};

const deletion = (start: number, end: number): Edit => ({ start, end, replacement: "" });

// ============================================================================
// STAGE 1: NFKC PER SEGMENT
// ============================================================================

const SEGMENT = /\P{M}\p{M}*|\p{M}+/gu;

const foldUnicode = (original: string): Working => {
  let text = "";
  const src: number[] = [];
  const srcEnd: number[] = [];

  for (const match of original.matchAll(SEGMENT)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    const folded = match[0].normalize("NFKC");
    text += folded;
    for (let k = 0; k < folded.length; k++) {
      // Units of one segment share its bounds so projections never split it
      src.push(start);
      srcEnd.push(end);
    }
  }

  return { text, src, srcEnd };
};

// ============================================================================
// STAGE 2: CONFUSABLES
// ============================================================================

const TYPOGRAPHIC: Readonly<Record<string, string>> = {
  "\u2018": "'",
  "\u2019": "'",
  "\u201A": "'",
  "\u201B": "'",
  "\u2032": "'",
  "\u201C": '"',
  "\u201D": '"',
  "\u201E": '"',
  "\u201F": '"',
  "\u2033": '"',
  "\u2010": "-",
  "\u2011": "-",
  "\u2012": "-",
  "\u2013": "-",
  "\u2014": "-",
  "\u2015": "-",
  "\u2212": "-",
  "\u00A0": " ",
  "\u2007": " ",
  "\u202F": " ",
  "\u3000": " ",
};

const foldTypographic = (w: Working): Working => {
  const edits: Edit[] = [];
  for (let i = 0; i < w.text.length; i++) {
    const replacement = TYPOGRAPHIC[w.text[i]];
    if (replacement !== undefined) edits.push({ start: i, end: i + 1, replacement });
  }
  return applyEdits(w, edits);
};

const HEADER_TOKENS: ReadonlySet<string> = new Set(headerVocabulary.headerTokens);

const OCR_LETTER_FOR: Readonly<Record<string, string>> = {
  "0": "O",
  "1": "I",
  l: "I",
  "5": "S",
  "8": "B",
};

const TOKEN = /(?<![A-Za-z0-9])[A-Za-z0-9]{2,}(?![A-Za-z0-9])/g;

/**
 * D0B -> DOB, PATlENT -> PATIENT, 5SN -> SSN. Only tokens that already read
 * as a header word once folded, and that have two real letters.
 */
const fixHeaderTokens = (w: Working): Working => {
  const edits: Edit[] = [];
  for (const match of w.text.matchAll(TOKEN)) {
    const token = match[0];
    if (HEADER_TOKENS.has(token.toUpperCase())) continue;

    const letters = token.replace(/[^A-Za-z]/g, "").length;
    if (letters < 2) continue;

    const folded = Array.from(token, (ch) => OCR_LETTER_FOR[ch] ?? ch).join("");
    if (folded === token || !HEADER_TOKENS.has(folded.toUpperCase())) continue;

    const start = match.index ?? 0;
    edits.push({ start, end: start + token.length, replacement: folded });
  }
  return applyEdits(w, edits);
};

// ============================================================================
// STAGE 3: CONTROL / ZERO-WIDTH
// ============================================================================

const INVISIBLE = /(?![\n\t])[\p{Cc}\p{Cf}]/gu;

const stripInvisible = (w: Working): Working => {
  const edits = Array.from(w.text.matchAll(INVISIBLE), (m) =>
    deletion(m.index ?? 0, (m.index ?? 0) + m[0].length)
  );
  return applyEdits(w, edits);
};

// ============================================================================
// STAGE 4: WHITESPACE / SEPARATOR COLLAPSE
// ============================================================================

const SPACE_RUN = /[ \t]{3,}/g;

const collapseSpaces = (w: Working): Working => {
  const edits: Edit[] = [];
  for (const m of w.text.matchAll(SPACE_RUN)) {
    const start = m.index ?? 0;
    edits.push({ start, end: start + 1, replacement: " " });
    edits.push(deletion(start + 1, start + m[0].length));
  }
  return applyEdits(w, edits);
};

const PADDED_SEPARATOR = /(?<=([A-Za-z0-9]))([ \t]*)([.\-/])([ \t]*)(?=([A-Za-z0-9]))/g;

const isDigit = (ch: string | undefined): boolean => ch !== undefined && ch >= "0" && ch <= "9";

/**
 * `01 / 15 / 1980` -> `01/15/1980`. Padding after the separator alone only
 * collapses between digits, so `Dr. Smith` stays readable.
 */
const collapseSeparators = (w: Working): Working => {
  const edits: Edit[] = [];
  for (const m of w.text.matchAll(PADDED_SEPARATOR)) {
    const before = m[2];
    const after = m[4];
    if (before.length === 0 && after.length === 0) continue;
    if (before.length === 0 && !(isDigit(m[1]) && isDigit(m[5]))) continue;

    const start = m.index ?? 0;
    if (before.length > 0) edits.push(deletion(start, start + before.length));
    if (after.length > 0) {
      const afterStart = start + before.length + 1;
      edits.push(deletion(afterStart, afterStart + after.length));
    }
  }
  return applyEdits(w, edits);
};

// ============================================================================
// STAGE 5: DE-HYPHENATION
// ============================================================================

const WRAPPED_HYPHEN = /(?<=[A-Za-z])-[ \t]*\n[ \t]*(?=[A-Za-z])/g;
const DEHYPHENATE_PASSES = 3;

const dehyphenate = (w: Working): Working => {
  let current = w;
  for (let pass = 0; pass < DEHYPHENATE_PASSES; pass++) {
    const edits = Array.from(current.text.matchAll(WRAPPED_HYPHEN), (m) =>
      deletion(m.index ?? 0, (m.index ?? 0) + m[0].length)
    );
    if (edits.length === 0) break;
    current = applyEdits(current, edits);
  }
  return current;
};

// ============================================================================
// STAGE 6: DATE OCR REPAIR
// ============================================================================

const OCR_DATE = /(?<![A-Za-z0-9])([0-9lIOo]{1,2})([/-])([0-9lIOo]{1,2})\2(\d{4})(?![A-Za-z0-9])/g;

const OCR_DIGIT_FOR: Readonly<Record<string, string>> = { l: "1", I: "1", O: "0", o: "0" };

const repairField = (field: string): string =>
  Array.from(field, (ch) => OCR_DIGIT_FOR[ch] ?? ch).join("");

const isMonthDay = (month: number, day: number): boolean =>
  month >= 1 && month <= 12 && day >= 1 && day <= 31;

const repairDates = (w: Working): Working => {
  const edits: Edit[] = [];
  for (const m of w.text.matchAll(OCR_DATE)) {
    const [, first, , second] = m;
    const fixedFirst = repairField(first);
    const fixedSecond = repairField(second);
    if (fixedFirst === first && fixedSecond === second) continue;

    const a = Number(fixedFirst);
    const b = Number(fixedSecond);
    if (!isMonthDay(a, b) && !isMonthDay(b, a)) continue;

    const start = m.index ?? 0;
    if (fixedFirst !== first) {
      edits.push({ start, end: start + first.length, replacement: fixedFirst });
    }
    if (fixedSecond !== second) {
      const secondStart = start + first.length + 1;
      edits.push({ start: secondStart, end: secondStart + second.length, replacement: fixedSecond });
    }
  }
  return applyEdits(w, edits);
};

// ============================================================================
// PUBLIC API
// ============================================================================

const STAGES: ReadonlyArray<(w: Working) => Working> = [
  foldTypographic,
  // Invisible characters go first so they cannot split a header token
  stripInvisible,
  fixHeaderTokens,
  collapseSpaces,
  collapseSeparators,
  dehyphenate,
  repairDates,
];

/**
 * Build the canonical working copy of a document.
 *
 * @example
 * const doc = normalize("Patient D0B: 0l/15/1980");
 * doc.canonical;        // "Patient DOB: 01/15/1980"
 * doc.project(8, 11);   // { start: 8, end: 11 }
 */
export const normalize = (original: string): NormalizedDocument => {
  const working = STAGES.reduce((w, stage) => stage(w), foldUnicode(original));
  const { text: canonical, src, srcEnd } = working;
  const length = canonical.length;

  const project = (start: number, end: number): Span => {
    const a = Math.max(0, start);
    if (a >= length) return { start: original.length, end: original.length };
    const last = Math.min(end, length) - 1;
    if (last < a) return { start: src[a], end: src[a] };
    return { start: src[a], end: Math.max(srcEnd[last], src[a]) };
  };

  return { original, canonical, charMap: src, project };
};

// ============================================================================
// CONTAINER SPANS
// ============================================================================

const URL_PATTERN = /https?:\/\/\S+/gi;
const FILENAME_PATTERN = /\b[\w.-]+\.(?:pdf|png|jpg|jpeg|tif|tiff|txt|rtf|docx)\b/gi;
const TRAILING_PUNCTUATION = /[.,;:!?)\]}>'"]+$/;

const matchSpans = (text: string, pattern: RegExp, trim?: RegExp): Span[] =>
  Array.from(text.matchAll(pattern), (m) => {
    const start = m.index ?? 0;
    const body = trim ? m[0].replace(trim, "") : m[0];
    return { start, end: start + body.length };
  }).filter((span) => span.end > span.start);

/**
 * URLs and filenames in canonical coordinates. Informational: downstream
 * detectors may use them to avoid splitting a container.
 */
export const findContainerSpans = (canonical: string): ContainerSpans => ({
  urls: matchSpans(canonical, URL_PATTERN, TRAILING_PUNCTUATION),
  filenames: matchSpans(canonical, FILENAME_PATTERN),
});

// ============================================================================
// SPAN PROJECTOR
// ============================================================================

const isWellFormed = (c: RawCandidate, length: number): boolean =>
  Number.isInteger(c.start) && Number.isInteger(c.end) && c.start >= 0 && c.start < c.end && c.end <= length;

/**
 * Map detector output from canonical to original coordinates and attach the
 * original text. Malformed candidates keep their bounds so the resolver can
 * drop them with a reason.
 */
export const projectCandidates = (
  doc: NormalizedDocument,
  candidates: ReadonlyArray<RawCandidate>
): ProjectedCandidate[] =>
  candidates.map((candidate) => {
    if (!isWellFormed(candidate, doc.canonical.length)) {
      // Past the canonical end must stay past the original end too
      const end =
        candidate.end > doc.canonical.length
          ? Math.max(candidate.end, doc.original.length + 1)
          : candidate.end;
      return { ...candidate, end, text: "" };
    }
    const span = doc.project(candidate.start, candidate.end);
    return {
      ...candidate,
      start: span.start,
      end: span.end,
      text: doc.original.slice(span.start, span.end),
    };
  });
