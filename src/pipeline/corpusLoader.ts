import { readFile } from "node:fs/promises";
import { ValidationError } from "../errors.js";
import { createLogger } from "../logger.js";
import { parseCorpusDocument } from "../schemas.js";
import type { TrialCorpusData } from "../types.js";

const log = createLogger("CorpusLoader");

/**
 * Parses a corpus JSON document (`{ "trials": [...], "failure_patterns": {...} }`)
 * into validated trial records.
 */
export function parseCorpus(raw: string, source = "corpus"): TrialCorpusData {
  if (!raw || raw.trim().length === 0) {
    throw new ValidationError("Corpus document is empty", source);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Corpus is not valid JSON: ${reason}`, source, [
      `[root] ${reason}`,
    ]);
  }

  return parseCorpusDocument(data);
}

/**
 * Reads and parses a corpus file. A missing file yields an empty corpus with a
 * warning; every other read or parse failure propagates.
 */
export async function loadCorpusFile(path: string): Promise<TrialCorpusData> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      log.warn(`Historical trials file not found at ${path}; using empty corpus`);
      return { trials: [], failurePatterns: {} };
    }
    throw err;
  }

  const corpus = parseCorpus(raw, path);
  log.info(`Loaded ${corpus.trials.length} historical trials from ${path}`);
  return corpus;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
