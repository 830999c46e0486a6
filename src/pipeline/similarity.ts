import type { EngineConfig } from "../config.js";
import type { TrialRecord } from "../types.js";
import { normalizeKey } from "./corpusIndex.js";

export type SearchConfig = EngineConfig["search"];

export interface NormalizedQuery {
  drugClass: string;
  therapeuticArea?: string;
  phase?: string;
  populationAge?: string;
}

/**
 * 1 for equal strings, partial credit when one contains the other, else 0.
 * A blank query earns nothing; a blank trial value is contained in any query
 * and so earns partial credit.
 */
export function stringMatchCredit(
  trialValue: string,
  queryValue: string,
  partialCredit: number
): number {
  const query = normalizeKey(queryValue);
  if (!query) return 0;
  const value = normalizeKey(trialValue);
  if (value === query) return 1;
  if (value.includes(query) || query.includes(value)) return partialCredit;
  return 0;
}

/** True when both phases are known and at most one step apart. */
export function phasesAdjacent(
  a: string,
  b: string,
  order: readonly string[]
): boolean {
  const i = order.indexOf(a);
  const j = order.indexOf(b);
  if (i < 0 || j < 0) return false;
  return Math.abs(i - j) <= 1;
}

/** Reads the first two integers as a range, e.g. "18-65 years" → [18, 65]. */
export function parseAgeRange(value: string): [number, number] | null {
  const numbers = value.match(/\d+/g);
  if (!numbers || numbers.length < 2) return null;
  const a = Number(numbers[0]);
  const b = Number(numbers[1]);
  return a <= b ? [a, b] : [b, a];
}

export function ageRangesOverlap(a: string, b: string): boolean {
  const r1 = parseAgeRange(a);
  const r2 = parseAgeRange(b);
  if (!r1 || !r2) return false;
  return !(r1[1] < r2[0] || r2[1] < r1[0]);
}

/**
 * Weighted partial-credit similarity in [0, 1].
 * Optional query fields that are absent drop out of the denominator.
 */
export function calculateSimilarity(
  trial: Readonly<TrialRecord>,
  query: NormalizedQuery,
  config: SearchConfig
): number {
  const { weights, partialCredit, phaseOrder } = config;
  let score = 0;
  let applicable = 0;

  applicable += weights.drugClass;
  score += weights.drugClass * stringMatchCredit(trial.drugClass, query.drugClass, partialCredit);

  if (query.therapeuticArea) {
    applicable += weights.therapeuticArea;
    score +=
      weights.therapeuticArea *
      stringMatchCredit(trial.therapeuticArea, query.therapeuticArea, partialCredit);
  }

  if (query.phase) {
    applicable += weights.phase;
    if (trial.phase === query.phase) {
      score += weights.phase;
    } else if (trial.phase && phasesAdjacent(trial.phase, query.phase, phaseOrder)) {
      score += weights.phase * partialCredit;
    }
  }

  if (query.populationAge) {
    applicable += weights.populationAge;
    if (ageRangesOverlap(trial.populationAge, query.populationAge)) {
      score += weights.populationAge;
    }
  }

  if (applicable <= 0) return 0;
  return clamp(score / applicable, 0, 1);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
