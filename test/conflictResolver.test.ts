import { describe, it, expect } from "vitest";
import {
  mergeAdjacentFragments,
  resolve,
  resolveWithDiagnostics,
} from "../services/conflictResolver";
import { spansIntersect, type CandidateInput } from "../schemas/entities";
import { candidateFor } from "../services/testConstants";

/**
 * CONFLICT RESOLVER TESTS
 *
 * Several detectors, one answer: no two resolved entities may overlap, a
 * preserve span always wins, and every drop is explained.
 */

const candidate = (
  start: number,
  end: number,
  category: string,
  overrides: Partial<CandidateInput> = {}
): CandidateInput => ({ start, end, category, confidence: 0.9, source: "rule", ...overrides });

describe("resolve", () => {
  it("drops an ID nested inside a date", () => {
    const original = "DOB: 03/12/1958";
    const { entities, dropped } = resolveWithDiagnostics(
      [candidate(5, 15, "DATE"), candidate(5, 8, "OTHER_ID")],
      [],
      { original }
    );

    expect(entities).toHaveLength(1);
    expect(entities[0]).toMatchObject({ start: 5, end: 15, category: "DATE", text: "03/12/1958" });
    expect(dropped).toEqual([{ start: 5, end: 8, category: "OTHER_ID", reason: "contained" }]);
  });

  it("lets a preserve span suppress any candidate it touches", () => {
    const { entities, dropped } = resolveWithDiagnostics(
      [candidate(0, 9, "SSN")],
      [{ start: 0, end: 9, category: "CLINICAL_VITAL" }]
    );

    expect(entities).toEqual([]);
    expect(dropped).toEqual([{ start: 0, end: 9, category: "SSN", reason: "preserved" }]);
  });

  it("prefers the higher-priority category on an identical span", () => {
    const entities = resolve([
      candidate(5, 15, "DATE"),
      candidate(5, 15, "PHONE_NUMBER", { confidence: 0.6 }),
    ]);

    expect(entities.map((e) => e.category)).toEqual(["PHONE_NUMBER"]);
  });

  it("keeps the higher-priority side of a partial overlap", () => {
    const entities = resolve([
      candidate(0, 10, "NAME", { source: "statistical" }),
      candidate(5, 15, "LOCATION", { source: "statistical" }),
    ]);

    expect(entities.map((e) => [e.start, e.end, e.category])).toEqual([[0, 10, "NAME"]]);
  });

  it("breaks a priority tie on source-weighted confidence", () => {
    // rule: 0.9 * 0.8 = 0.72, statistical on NAME: 0.7 * 1.2 = 0.84
    const { entities, dropped } = resolveWithDiagnostics([
      candidate(0, 8, "NAME", { source: "rule" }),
      candidate(4, 12, "NAME", { source: "statistical", confidence: 0.7 }),
    ]);

    expect(entities.map((e) => [e.start, e.end])).toEqual([[4, 12]]);
    expect(dropped).toEqual([{ start: 0, end: 8, category: "NAME", reason: "overlap" }]);
  });

  it("lets a contained higher-priority entity replace its container", () => {
    const entities = resolve([candidate(0, 20, "NAME"), candidate(5, 16, "SSN")]);

    expect(entities.map((e) => [e.start, e.end, e.category])).toEqual([[5, 16, "SSN"]]);
  });

  it("keeps the incumbent on a full tie", () => {
    const entities = resolve([candidate(0, 6, "MRN"), candidate(3, 9, "MRN")]);

    expect(entities.map((e) => [e.start, e.end])).toEqual([[0, 6]]);
  });

  it("folds detector labels and sources onto the taxonomy", () => {
    const [entity] = resolve([candidate(0, 4, "PERSON", { source: "spacy" })]);

    expect(entity.category).toBe("NAME");
    expect(entity.source).toBe("statistical");
  });

  it("drops malformed candidates with a reason", () => {
    const { entities, dropped } = resolveWithDiagnostics(
      [
        candidate(3, 3, "NAME"),
        candidate(-1, 2, "NAME"),
        candidate(5, 20, "NAME"),
        candidate(0, 2, "NAME", { confidence: Number.NaN }),
        candidate(0, 2, "FAVORITE_COLOR"),
        candidate(0, 2, "NAME", { source: "oracle" }),
      ],
      [],
      { original: "0123456789" }
    );

    expect(entities).toEqual([]);
    expect(dropped.map((d) => d.reason)).toEqual([
      "empty-span",
      "out-of-bounds",
      "out-of-bounds",
      "bad-confidence",
      "unknown-category",
      "unknown-source",
    ]);
  });

  it("clamps confidence into [0, 1]", () => {
    const [entity] = resolve([candidate(0, 4, "NAME", { confidence: 1.7 })]);

    expect(entity.confidence).toBe(1);
  });

  it("never returns overlapping entities", () => {
    const categories = ["NAME", "DATE", "MRN", "PHONE_NUMBER", "LOCATION", "OTHER_ID"];
    const candidates: CandidateInput[] = [];
    for (let i = 0; i < 40; i++) {
      const start = (i * 7) % 50;
      const length = 2 + ((i * 5) % 9);
      candidates.push(
        candidate(start, start + length, categories[i % categories.length], {
          confidence: ((i * 13) % 10) / 10,
          source: i % 2 === 0 ? "rule" : "learned",
        })
      );
    }

    const entities = resolve(candidates);

    expect(entities.length).toBeGreaterThan(0);
    for (let i = 0; i < entities.length; i++) {
      for (let j = i + 1; j < entities.length; j++) {
        expect(spansIntersect(entities[i], entities[j])).toBe(false);
      }
      if (i > 0) expect(entities[i].start).toBeGreaterThanOrEqual(entities[i - 1].end);
    }
  });
});

describe("mergeAdjacentFragments", () => {
  it("joins a date split by a detector", () => {
    const original = "DOB 01/15/1980";
    const merged = mergeAdjacentFragments(
      [
        candidateFor(original, "01", "DATE", { confidence: 0.6 }),
        candidateFor(original, "/15/1980", "DATE", { confidence: 0.8 }),
      ],
      original
    );

    expect(merged).toEqual([
      { start: 4, end: 14, category: "DATE", confidence: 0.8, source: "regex", text: "01/15/1980" },
    ]);
  });

  it("joins a first and last name separated by a space", () => {
    const original = "Test Patient";
    const merged = mergeAdjacentFragments(
      [candidateFor(original, "Test", "PERSON"), candidateFor(original, "Patient", "PERSON")],
      original
    );

    expect(merged.map((c) => [c.start, c.end])).toEqual([[0, 12]]);
  });

  it("does not join names across a comma", () => {
    const original = "Patient, Test";
    const merged = mergeAdjacentFragments(
      [candidateFor(original, "Patient", "NAME"), candidateFor(original, "Test", "NAME")],
      original
    );

    expect(merged).toHaveLength(2);
  });

  it("keeps the two ends of a date range apart", () => {
    const original = "Admitted 01/15/2020 - 01/20/2020";
    const merged = mergeAdjacentFragments(
      [candidateFor(original, "01/15/2020", "DATE"), candidateFor(original, "01/20/2020", "DATE")],
      original
    );

    expect(merged.map((c) => [c.start, c.end])).toEqual([
      [9, 19],
      [22, 32],
    ]);
  });

  it("keeps a hyphenated date range apart", () => {
    const original = "01/15/2020-01/20/2020";
    const merged = mergeAdjacentFragments(
      [candidate(0, 10, "DATE"), candidate(11, 21, "DATE")],
      original
    );

    expect(merged.map((c) => [c.start, c.end])).toEqual([
      [0, 10],
      [11, 21],
    ]);
  });

  it("never merges a valid date into an out-of-bounds neighbour", () => {
    const original = "DOB: 03/12/1958 x";
    const merged = mergeAdjacentFragments(
      [candidate(5, 15, "DATE"), candidate(16, 999, "DATE")],
      original
    );

    expect(merged).toEqual([candidate(5, 15, "DATE"), candidate(16, 999, "DATE")]);
  });

  it("does not join fragments of different categories", () => {
    const original = "01/15 MRN";
    const merged = mergeAdjacentFragments(
      [candidateFor(original, "01/15", "DATE"), candidateFor(original, "MRN", "MRN")],
      original
    );

    expect(merged).toHaveLength(2);
  });
});
