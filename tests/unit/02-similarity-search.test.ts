import { describe, expect, it } from "vitest";
import { DEFAULT_ENGINE_CONFIG } from "../../src/config.js";
import { buildCorpusIndex } from "../../src/pipeline/corpusIndex.js";
import {
  ageRangesOverlap,
  calculateSimilarity,
  parseAgeRange,
  phasesAdjacent,
  stringMatchCredit,
} from "../../src/pipeline/similarity.js";
import {
  normalizeQuery,
  searchSimilarTrials,
} from "../../src/pipeline/similaritySearch.js";
import { makeTrial } from "../fixtures/factories.js";

const SEARCH = DEFAULT_ENGINE_CONFIG.search;

// ── Shared corpus ──────────────────────────────────────────────────────────────

const INDEX = buildCorpusIndex([
  makeTrial({ nctId: "NCT001", outcome: "failed" }),
  makeTrial({ nctId: "NCT002", drugClass: "SNRI" }),
  makeTrial({
    nctId: "NCT003",
    drugClass: "SSRI extended-release",
    phase: "Phase 2",
    populationAge: "12-17",
  }),
  makeTrial({ nctId: "NCT004", therapeuticArea: "Neurology" }),
  makeTrial({ nctId: "NCT005" }),
]);

const FULL_QUERY = {
  drugClass: "SSRI",
  therapeuticArea: "Psychiatry",
  phase: "Phase 3",
  populationAge: "18-75",
};

// ── Scoring helpers ────────────────────────────────────────────────────────────

describe("L1 · similarity helpers", () => {
  it("gives full, partial or no credit for string fields", () => {
    expect(stringMatchCredit("SSRI", "ssri", 0.5)).toBe(1);
    expect(stringMatchCredit("SSRI extended-release", "SSRI", 0.5)).toBe(0.5);
    expect(stringMatchCredit("SNRI", "SSRI", 0.5)).toBe(0);
  });

  it("gives partial credit to a blank trial value and none to a blank query", () => {
    expect(stringMatchCredit("", "SSRI", 0.5)).toBe(0.5);
    expect(stringMatchCredit("SSRI", "  ", 0.5)).toBe(0);
    expect(stringMatchCredit("", "", 0.5)).toBe(0);
  });

  it("scores a trial with a blank therapeutic area as a partial area match", () => {
    const trial = makeTrial({ nctId: "NCT012", therapeuticArea: "" });

    expect(
      calculateSimilarity(
        trial,
        { drugClass: "SSRI", therapeuticArea: "Psychiatry" },
        SEARCH
      )
    ).toBeCloseTo((0.4 + 0.15) / 0.7, 10);
  });

  it("treats phases one step apart as adjacent", () => {
    expect(phasesAdjacent("Phase 2/3", "Phase 3", SEARCH.phaseOrder)).toBe(true);
    expect(phasesAdjacent("Phase 2", "Phase 3", SEARCH.phaseOrder)).toBe(false);
    expect(phasesAdjacent("Phase 5", "Phase 3", SEARCH.phaseOrder)).toBe(false);
  });

  it("parses the first two integers of an age range", () => {
    expect(parseAgeRange("18-65")).toEqual([18, 65]);
    expect(parseAgeRange("Adults 65 to 18 years")).toEqual([18, 65]);
    expect(parseAgeRange("adults")).toBeNull();
    expect(parseAgeRange("18+")).toBeNull();
  });

  it("detects overlapping age ranges, inclusive at the bounds", () => {
    expect(ageRangesOverlap("18-65", "65-80")).toBe(true);
    expect(ageRangesOverlap("12-17", "18-75")).toBe(false);
    expect(ageRangesOverlap("adults", "18-75")).toBe(false);
  });

  it("drops absent query fields from the denominator", () => {
    const trial = makeTrial({ nctId: "NCT010", therapeuticArea: "Neurology" });

    expect(calculateSimilarity(trial, { drugClass: "SSRI" }, SEARCH)).toBe(1);
    expect(
      calculateSimilarity(
        trial,
        { drugClass: "SSRI", therapeuticArea: "Psychiatry" },
        SEARCH
      )
    ).toBeCloseTo(0.4 / 0.7, 10);
  });

  it("gives half phase credit for an adjacent phase", () => {
    const trial = makeTrial({ nctId: "NCT011", phase: "Phase 2/3" });
    const score = calculateSimilarity(
      trial,
      { drugClass: "SSRI", phase: "Phase 3" },
      SEARCH
    );

    expect(score).toBeCloseTo((0.4 + 0.1) / 0.6, 10);
  });
});

// ── Search ─────────────────────────────────────────────────────────────────────

describe("L1 · searchSimilarTrials", () => {
  it("returns an empty list for an empty corpus", () => {
    expect(searchSimilarTrials(buildCorpusIndex([]), FULL_QUERY)).toEqual([]);
  });

  it("ranks candidates by score with corpus order breaking ties", () => {
    const results = searchSimilarTrials(INDEX, { ...FULL_QUERY, topK: 5 });

    expect(results.map((t) => t.nctId)).toEqual([
      "NCT001",
      "NCT005",
      "NCT004",
      "NCT003",
    ]);
    expect(results[0]?.similarityScore).toBe(1);
    expect(results[1]?.similarityScore).toBe(1);
    expect(results[2]?.similarityScore).toBeCloseTo(0.7, 10);
    expect(results[3]?.similarityScore).toBeCloseTo(0.5, 10);
  });

  it("never returns a trial whose drug class shares no substring with the query", () => {
    const results = searchSimilarTrials(INDEX, { ...FULL_QUERY, topK: 10 });

    expect(results.map((t) => t.nctId)).not.toContain("NCT002");
  });

  it("narrows by therapeutic area when enough candidates remain", () => {
    const results = searchSimilarTrials(INDEX, { ...FULL_QUERY, topK: 3 });

    expect(results.map((t) => t.nctId)).toEqual(["NCT001", "NCT005", "NCT003"]);
  });

  it("falls back to the drug-class candidates when the area leaves none", () => {
    const results = searchSimilarTrials(INDEX, {
      drugClass: "SSRI",
      therapeuticArea: "Cardiology",
      topK: 2,
    });

    expect(results.map((t) => t.nctId)).toEqual(["NCT001", "NCT004"]);
    expect(results[0]?.similarityScore).toBeCloseTo(0.4 / 0.7, 10);
  });

  it("respects topK and the default of five", () => {
    const many = buildCorpusIndex(
      Array.from({ length: 8 }, (_, i) => makeTrial({ nctId: `NCT5${i}` }))
    );

    expect(searchSimilarTrials(many, { drugClass: "SSRI" })).toHaveLength(5);
    expect(searchSimilarTrials(many, { drugClass: "SSRI", topK: 2 })).toHaveLength(2);
    expect(searchSimilarTrials(many, { drugClass: "SSRI", topK: 0 })).toEqual([]);
  });

  it("scores a same-class same-area trial at 0.70 or more", () => {
    const [match] = searchSimilarTrials(INDEX, {
      drugClass: "ssri",
      therapeuticArea: "PSYCHIATRY",
      phase: "Phase 1",
      populationAge: "70-90",
    });

    expect(match?.similarityScore).toBeGreaterThanOrEqual(0.7);
  });

  it("matches nothing for a blank drug class", () => {
    expect(searchSimilarTrials(INDEX, { drugClass: "   " })).toEqual([]);
  });

  it("keeps every score within [0, 1] and in descending order", () => {
    const results = searchSimilarTrials(INDEX, {
      drugClass: "SSRI",
      phase: "Phase 2/3",
      populationAge: "10-20",
      topK: 10,
    });

    for (const trial of results) {
      expect(trial.similarityScore).toBeGreaterThanOrEqual(0);
      expect(trial.similarityScore).toBeLessThanOrEqual(1);
    }
    const scores = results.map((t) => t.similarityScore);
    expect(scores).toEqual([...scores].sort((a, b) => b - a));
  });

  it("does not mutate the indexed records", () => {
    searchSimilarTrials(INDEX, FULL_QUERY);

    expect(INDEX.records[0]).not.toHaveProperty("similarityScore");
  });

  it("returns hits whose lists cannot change the index", () => {
    const index = buildCorpusIndex([
      makeTrial({
        nctId: "NCT020",
        outcome: "failed",
        tags: ["depression"],
        failureReasons: ["placebo response"],
      }),
    ]);
    const [hit] = searchSimilarTrials(index, { drugClass: "SSRI" });

    expect(() => hit?.tags.push("added")).toThrow(TypeError);
    expect(() => hit?.failureReasons?.push("sample size")).toThrow(TypeError);
    expect(index.records[0]?.tags).toEqual(["depression"]);
    expect(index.records[0]?.failureReasons).toEqual(["placebo response"]);
  });
});

describe("L1 · normalizeQuery", () => {
  it("replaces a blank drug class and drops blank optional fields", () => {
    expect(
      normalizeQuery({ drugClass: " ", therapeuticArea: "", populationAge: " 18-65 " })
    ).toEqual({
      drugClass: "Unknown",
      therapeuticArea: undefined,
      phase: undefined,
      populationAge: "18-65",
    });
  });
});
