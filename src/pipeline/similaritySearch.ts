import { DEFAULT_ENGINE_CONFIG } from "../config.js";
import type {
  CorpusIndex,
  ScoredTrial,
  SimilarityQuery,
} from "../types.js";
import { normalizeKey, recordsAt } from "./corpusIndex.js";
import type { NormalizedQuery, SearchConfig } from "./similarity.js";
import { calculateSimilarity } from "./similarity.js";

const UNKNOWN_DRUG_CLASS = "Unknown";

/**
 * Multi-stage similarity search:
 *   1. Candidates from the drug-class index (exact + substring buckets),
 *      narrowed by therapeutic area unless that leaves fewer than K
 *   2. Weighted partial-credit score per candidate
 *   3. Stable sort by score (corpus order breaks ties), top K
 *
 * Never throws: an empty corpus or an unknown class yields [] or low scores.
 */
export function searchSimilarTrials(
  index: CorpusIndex,
  query: SimilarityQuery,
  config: SearchConfig = DEFAULT_ENGINE_CONFIG.search
): ScoredTrial[] {
  const topK = Math.max(0, Math.floor(query.topK ?? config.defaultTopK));
  const normalized = normalizeQuery(query);

  const candidates = selectCandidates(index, normalized, topK);

  const scored = recordsAt(index, candidates).map(
    (trial): ScoredTrial => ({
      ...trial,
      similarityScore: calculateSimilarity(trial, normalized, config),
    })
  );

  // Array.prototype.sort is stable, and candidates arrive in corpus order
  return scored
    .sort((a, b) => b.similarityScore - a.similarityScore)
    .slice(0, topK);
}

export function normalizeQuery(query: SimilarityQuery): NormalizedQuery {
  const drugClass = query.drugClass.trim() || UNKNOWN_DRUG_CLASS;
  return {
    drugClass,
    therapeuticArea: blankToUndefined(query.therapeuticArea),
    phase: blankToUndefined(query.phase),
    populationAge: blankToUndefined(query.populationAge),
  };
}

function selectCandidates(
  index: CorpusIndex,
  query: NormalizedQuery,
  topK: number
): Set<number> {
  const drugClass = normalizeKey(query.drugClass);
  const byDrugClass = new Set<number>(index.byDrugClass.get(drugClass) ?? []);

  // Partial matches stay eligible for half credit in scoring
  for (const [indexedClass, positions] of index.byDrugClass) {
    if (indexedClass.includes(drugClass) || drugClass.includes(indexedClass)) {
      for (const p of positions) byDrugClass.add(p);
    }
  }

  if (!query.therapeuticArea) return byDrugClass;

  const inArea = new Set(
    index.byTherapeuticArea.get(normalizeKey(query.therapeuticArea)) ?? []
  );
  const narrowed = new Set([...byDrugClass].filter((p) => inArea.has(p)));

  // An over-restrictive area filter must not hide available candidates
  if (narrowed.size === 0 || narrowed.size < topK) return byDrugClass;
  return narrowed;
}

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
