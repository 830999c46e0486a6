import type {
  ClinicalProtocol,
  HistoricalTrialSummary,
  NarrativeFinding,
  RiskAssessment,
  ScoredTrial,
  SimilarityQuery,
} from "../types.js";
import { buildComparisonTable } from "./comparisonTable.js";
import { prioritizeRecommendations } from "./recommendations.js";
import { calculateRiskScore } from "./riskScoring.js";
import type { TrialCorpus } from "./trialCorpus.js";

export interface AssessmentOptions {
  topK?: number;
  /** How many of the best matches get a comparison table */
  comparisonLimit?: number;
}

/**
 * Full assessment of one protocol:
 *   1. Build the similarity query from the protocol's own attributes
 *   2. Rank historical trials against it
 *   3. Score risk from the protocol, the matches and the narrative findings
 *   4. Compare the protocol side by side with the best matches
 *   5. Rank the findings' recommendations
 *
 * Works on one index snapshot, so a concurrent reload cannot mix corpora
 * within a single assessment.
 */
export function assessProtocol(
  corpus: TrialCorpus,
  protocol: ClinicalProtocol,
  findings: readonly NarrativeFinding[] = [],
  options: AssessmentOptions = {}
): RiskAssessment {
  const start = performance.now();
  const { config } = corpus;
  const comparisonLimit = options.comparisonLimit ?? config.assessment.comparisonLimit;

  const query = { ...buildSimilarityQuery(protocol), topK: options.topK };
  const matches = corpus.search(query);

  const riskScore = calculateRiskScore(protocol, matches, findings, config.scoring);

  return {
    protocolName: protocol.metadata.trialName,
    riskScore,
    similarTrials: matches.map(summarizeTrial),
    comparisons: matches
      .slice(0, comparisonLimit)
      .map((trial) => buildComparisonTable(protocol, trial, config.comparison)),
    recommendations: prioritizeRecommendations(findings),
    findings: [...findings],
    durationMs: performance.now() - start,
  };
}

/** Blank protocol fields are left out of the query rather than scored as misses. */
export function buildSimilarityQuery(protocol: ClinicalProtocol): SimilarityQuery {
  const { drugProfile, patientPopulation, metadata } = protocol;
  return {
    drugClass: drugProfile.drugClass,
    therapeuticArea: patientPopulation.therapeuticArea.trim() || undefined,
    phase: metadata.phase,
    populationAge: patientPopulation.ageRange.trim() || undefined,
  };
}

export function summarizeTrial(trial: ScoredTrial): HistoricalTrialSummary {
  return {
    nctId: trial.nctId,
    trialName: trial.trialName,
    phase: trial.phase,
    therapeuticArea: trial.therapeuticArea,
    drugClass: trial.drugClass,
    outcome: trial.outcome,
    similarityScore: trial.similarityScore,
    keyLearnings: [...trial.keyLearnings],
    failureReasons: trial.failureReasons ? [...trial.failureReasons] : undefined,
  };
}
