import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import { ValidationError } from "../../src/errors.js";
import { setLogLevel } from "../../src/logger.js";
import { loadCorpusFile, parseCorpus } from "../../src/pipeline/corpusLoader.js";

const FIXTURE = fileURLToPath(new URL("../fixtures/corpus.json", import.meta.url));

let workDir = "";

beforeAll(async () => {
  workDir = await mkdtemp(join(tmpdir(), "trial-corpus-"));
});

afterAll(async () => {
  await rm(workDir, { recursive: true, force: true });
});

afterEach(() => {
  setLogLevel("silent");
  vi.restoreAllMocks();
});

describe("L4 · corpusLoader", () => {
  it("loads and validates the fixture corpus", async () => {
    const corpus = await loadCorpusFile(FIXTURE);

    expect(corpus.trials).toHaveLength(7);
    expect(corpus.trials[0]).toMatchObject({
      nctId: "NCT90000001",
      trialName: "MOOD-LIFT",
      phase: "Phase 3",
      outcome: "failed",
      actualEnrollment: 398,
      failureReasons: ["High placebo response masked treatment effect"],
    });
    expect(corpus.trials[1]?.failureReasons).toBeUndefined();
    expect(Object.keys(corpus.failurePatterns)).toEqual(["psychiatry", "psychiatry_ssri"]);
  });

  it("logs the number of trials loaded", async () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    setLogLevel("info");

    await loadCorpusFile(FIXTURE);

    expect(spy).toHaveBeenCalledWith(
      `[CorpusLoader] Loaded 7 historical trials from ${FIXTURE}`
    );
  });

  it("returns an empty corpus with a warning when the file is missing", async () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
    setLogLevel("info");
    const missing = join(workDir, "absent.json");

    const corpus = await loadCorpusFile(missing);

    expect(corpus).toEqual({ trials: [], failurePatterns: {} });
    expect(spy).toHaveBeenCalledWith(
      `[CorpusLoader] Historical trials file not found at ${missing}; using empty corpus`
    );
  });

  it("propagates a malformed corpus file as a validation error", async () => {
    const path = join(workDir, "broken.json");
    await writeFile(path, '{"trials": [{"nct_id": "NCT1", "planned_enrollment": "many"}]}');

    await expect(loadCorpusFile(path)).rejects.toThrow(ValidationError);
  });

  it("propagates read failures other than a missing file", async () => {
    await expect(loadCorpusFile(workDir)).rejects.toMatchObject({ code: "EISDIR" });
  });
});

describe("L4 · parseCorpus", () => {
  it("rejects an empty document", () => {
    expect(() => parseCorpus("  ")).toThrow("Corpus document is empty");
  });

  it("rejects text that is not JSON", () => {
    let caught: unknown;
    try {
      parseCorpus("{not json", "upload");
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;
    expect(caught.source).toBe("upload");
    expect(caught.message.startsWith("Corpus is not valid JSON: ")).toBe(true);
  });

  it("accepts a document without failure patterns", () => {
    const corpus = parseCorpus('{"trials": [{"nct_id": "NCT2", "drug_class": "SSRI"}]}');

    expect(corpus.trials.map((t) => t.nctId)).toEqual(["NCT2"]);
    expect(corpus.failurePatterns).toEqual({});
  });
});
