import { describe, it, expect } from "vitest";
import { findContainerSpans, normalize, projectCandidates } from "../services/textNormalizer";

/**
 * TEXT NORMALIZER TESTS
 *
 * Detectors see canonical text; redaction happens on the original. Every
 * canonical span must map back onto the exact original characters.
 */

describe("normalize", () => {
  it("repairs OCR header tokens and date digits", () => {
    const doc = normalize("Patient D0B: 0l/15/1980");

    expect(doc.canonical).toBe("Patient DOB: 01/15/1980");
    expect(doc.project(13, 23)).toEqual({ start: 13, end: 23 });
  });

  it("leaves tokens that do not fold onto a header word", () => {
    expect(normalize("B0B lives in Room 101").canonical).toBe("B0B lives in Room 101");
  });

  it("strips zero-width characters and projects around them", () => {
    const original = "John\u200BSmith";
    const doc = normalize(original);

    expect(doc.canonical).toBe("JohnSmith");
    const span = doc.project(4, 9);
    expect(span).toEqual({ start: 5, end: 10 });
    expect(original.slice(span.start, span.end)).toBe("Smith");
  });

  it("collapses padded date separators", () => {
    const original = "DOB: 01 / 15 / 1980";
    const doc = normalize(original);

    expect(doc.canonical).toBe("DOB: 01/15/1980");
    expect(doc.project(5, 15)).toEqual({ start: 5, end: 19 });
  });

  it("keeps the space after an abbreviation", () => {
    expect(normalize("Seen by Dr. Smith").canonical).toBe("Seen by Dr. Smith");
  });

  it("joins words hyphenated across a line break", () => {
    expect(normalize("history of hyper-\ntension").canonical).toBe("history of hypertension");
  });

  it("folds typographic dashes and quotes", () => {
    expect(normalize("Smith\u2013Jones \u201Cstable\u201D").canonical).toBe('Smith-Jones "stable"');
  });

  it("never splits an expanded character when projecting", () => {
    // U+FB01 is one original unit that folds to two canonical ones
    const doc = normalize("\uFB01le");

    expect(doc.canonical).toBe("file");
    expect(doc.project(1, 2)).toEqual({ start: 0, end: 1 });
    expect(doc.project(1, 4)).toEqual({ start: 0, end: 3 });
  });

  it("maps every canonical unit to an original index", () => {
    const doc = normalize("MRN:   12345");

    expect(doc.canonical).toBe("MRN: 12345");
    expect(doc.charMap).toHaveLength(doc.canonical.length);
    expect(doc.charMap[5]).toBe(7);
  });

  it("returns identical text when nothing needs folding", () => {
    const text = "Follow up in two weeks.";
    const doc = normalize(text);

    expect(doc.canonical).toBe(text);
    expect(doc.project(0, text.length)).toEqual({ start: 0, end: text.length });
  });
});

describe("findContainerSpans", () => {
  it("finds URLs without trailing punctuation and filenames", () => {
    const spans = findContainerSpans("See https://example.invalid/report.pdf, thanks");

    expect(spans.urls).toEqual([{ start: 4, end: 38 }]);
    expect(spans.filenames).toEqual([{ start: 28, end: 38 }]);
  });

  it("returns empty lists for plain text", () => {
    expect(findContainerSpans("no links here")).toEqual({ urls: [], filenames: [] });
  });
});

describe("projectCandidates", () => {
  it("attaches original text to projected candidates", () => {
    const original = "DOB: 01 / 15 / 1980";
    const doc = normalize(original);
    const [projected] = projectCandidates(doc, [
      { start: 5, end: 15, category: "DATE", confidence: 0.9, source: "rule" },
    ]);

    expect(projected).toMatchObject({ start: 5, end: 19, text: "01 / 15 / 1980" });
  });

  it("passes malformed candidates through for the resolver to drop", () => {
    const doc = normalize("short");
    const [inverted, past] = projectCandidates(doc, [
      { start: 4, end: 2, category: "NAME", confidence: 0.9, source: "rule" },
      { start: 2, end: 40, category: "NAME", confidence: 0.9, source: "rule" },
    ]);

    expect(inverted).toMatchObject({ start: 4, end: 2, text: "" });
    expect(past).toMatchObject({ start: 2, end: 40, text: "" });
  });
});
