import type { EngineConfig } from "../config.js";
import { DEFAULT_ENGINE_CONFIG } from "../config.js";
import { createLogger } from "../logger.js";
import type {
  CorpusIndex,
  FailurePattern,
  ScoredTrial,
  SimilarityQuery,
  TrialCorpusData,
  TrialRecord,
} from "../types.js";
import { buildCorpusIndex, getTrialById } from "./corpusIndex.js";
import { loadCorpusFile } from "./corpusLoader.js";
import { searchSimilarTrials } from "./similaritySearch.js";
import type { TrialListFilters, TrialSearchFilters } from "./trialFilters.js";
import {
  getFailurePatterns,
  listTrials,
  searchTrialsByFilters,
} from "./trialFilters.js";

const log = createLogger("TrialCorpus");

/**
 * Owns the live corpus index. Constructed once by the calling service and
 * passed to request handlers; there is no module-level instance.
 *
 * Every read goes through `snapshot()`, and `reload()` replaces that single
 * reference with a freshly built index, so a reader never observes a
 * half-built index.
 */
export class TrialCorpus {
  private index: CorpusIndex;

  constructor(
    corpus: TrialCorpusData = { trials: [], failurePatterns: {} },
    readonly config: EngineConfig = DEFAULT_ENGINE_CONFIG
  ) {
    this.index = TrialCorpus.build(corpus);
  }

  static async fromFile(
    path: string,
    config: EngineConfig = DEFAULT_ENGINE_CONFIG
  ): Promise<TrialCorpus> {
    return new TrialCorpus(await loadCorpusFile(path), config);
  }

  get size(): number {
    return this.index.records.length;
  }

  snapshot(): CorpusIndex {
    return this.index;
  }

  reload(corpus: TrialCorpusData): void {
    const next = TrialCorpus.build(corpus);
    this.index = next;
    log.info(`Reloaded corpus: ${next.records.length} trials indexed`);
  }

  search(query: SimilarityQuery): ScoredTrial[] {
    return searchSimilarTrials(this.index, query, this.config.search);
  }

  getTrial(nctId: string): Readonly<TrialRecord> | undefined {
    return getTrialById(this.index, nctId);
  }

  listTrials(filters: TrialListFilters = {}): Readonly<TrialRecord>[] {
    return listTrials(this.index, {
      ...filters,
      limit: filters.limit ?? this.config.browse.listLimit,
    });
  }

  searchByFilters(filters: TrialSearchFilters = {}): Readonly<TrialRecord>[] {
    return searchTrialsByFilters(this.index, {
      ...filters,
      limit: filters.limit ?? this.config.browse.filterLimit,
    });
  }

  getFailurePatterns(therapeuticArea: string, drugClass?: string): FailurePattern {
    return getFailurePatterns(this.index, therapeuticArea, drugClass);
  }

  private static build(corpus: TrialCorpusData): CorpusIndex {
    const index = buildCorpusIndex(corpus.trials, corpus.failurePatterns);
    const duplicates = corpus.trials.length - index.records.length;
    if (duplicates > 0) {
      log.warn(`${duplicates} duplicate trial id(s) replaced by later records`);
    }
    return index;
  }
}
