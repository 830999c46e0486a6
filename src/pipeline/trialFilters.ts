import { DEFAULT_ENGINE_CONFIG } from "../config.js";
import type {
  CorpusIndex,
  FailurePattern,
  TrialOutcome,
  TrialPhase,
  TrialRecord,
} from "../types.js";
import { normalizeKey, recordsAt } from "./corpusIndex.js";

export interface TrialListFilters {
  phase?: TrialPhase;
  therapeuticArea?: string;
  outcome?: TrialOutcome;
  limit?: number;
}

/**
 * Exact-match browsing: phase and outcome via their indices, therapeutic
 * area case-insensitively. Corpus order, capped at `limit`.
 */
export function listTrials(
  index: CorpusIndex,
  filters: TrialListFilters = {}
): Readonly<TrialRecord>[] {
  const limit = filters.limit ?? DEFAULT_ENGINE_CONFIG.browse.listLimit;
  let positions: number[] = index.records.map((_, i) => i);

  if (filters.phase) {
    positions = intersect(positions, index.byPhase.get(filters.phase));
  }
  if (filters.therapeuticArea) {
    positions = intersect(
      positions,
      index.byTherapeuticArea.get(normalizeKey(filters.therapeuticArea))
    );
  }
  if (filters.outcome) {
    positions = intersect(positions, index.byOutcome.get(filters.outcome));
  }

  return recordsAt(index, positions).slice(0, Math.max(0, limit));
}

export type OutcomeFilter = TrialOutcome | "all";

export interface TrialSearchFilters {
  drugClass?: string;
  therapeuticArea?: string;
  phase?: TrialPhase;
  outcome?: OutcomeFilter;
  limit?: number;
}

/**
 * Loose full-scan filter: drug class matches when either string contains
 * the other (a blank trial class is contained in every query), therapeutic
 * area when the trial's area contains the query.
 */
export function searchTrialsByFilters(
  index: CorpusIndex,
  filters: TrialSearchFilters = {}
): Readonly<TrialRecord>[] {
  const limit = filters.limit ?? DEFAULT_ENGINE_CONFIG.browse.filterLimit;
  const drugClass = normalizeKey(filters.drugClass);
  const area = normalizeKey(filters.therapeuticArea);
  const outcome = filters.outcome ?? "all";
  const results: Readonly<TrialRecord>[] = [];

  for (const trial of index.records) {
    if (results.length >= limit) break;

    if (drugClass) {
      const trialClass = normalizeKey(trial.drugClass);
      if (!trialClass.includes(drugClass) && !drugClass.includes(trialClass)) continue;
    }
    if (area && !normalizeKey(trial.therapeuticArea).includes(area)) continue;
    if (filters.phase && trial.phase !== filters.phase) continue;
    if (outcome !== "all" && trial.outcome !== outcome) continue;

    results.push(trial);
  }

  return results;
}

/** Pre-computed patterns keyed by area, or `area_drugclass` when a class is given. */
export function getFailurePatterns(
  index: CorpusIndex,
  therapeuticArea: string,
  drugClass?: string
): FailurePattern {
  const area = normalizeKey(therapeuticArea);
  const key = drugClass ? `${area}_${normalizeKey(drugClass)}` : area;
  return index.failurePatterns[key] ?? {};
}

function intersect(
  positions: number[],
  bucket: readonly number[] | undefined
): number[] {
  if (!bucket) return [];
  const allowed = new Set(bucket);
  return positions.filter((p) => allowed.has(p));
}
