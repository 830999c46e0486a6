import { DEFAULT_ENGINE_CONFIG } from "../config.js";
import type { EngineConfig } from "../config.js";
import type {
  CategoryScore,
  ClinicalProtocol,
  NarrativeFinding,
  RiskLevel,
  RiskScore,
  ScoredTrial,
} from "../types.js";
import { clamp } from "./similarity.js";

export type ScoringConfig = EngineConfig["scoring"];

/**
 * Combines three rule-based signals into one risk score:
 *
 *   overall = 0.40 × historical precedent
 *           + 0.35 × safety alignment
 *           + 0.25 × design completeness
 *
 * Category and overall scores are rounded to one decimal, confidence to two.
 * Narrative findings only feed the confidence estimate; an empty list is fine.
 */
export function calculateRiskScore(
  protocol: ClinicalProtocol,
  matchedTrials: readonly ScoredTrial[],
  findings: readonly NarrativeFinding[],
  config: ScoringConfig = DEFAULT_ENGINE_CONFIG.scoring
): RiskScore {
  const historical = scoreHistoricalPrecedent(matchedTrials, config);
  const safety = scoreSafetyAlignment(protocol, config);
  const design = scoreDesignCompleteness(protocol, config);

  const weights = config.categoryWeights;
  const overall = round(
    clamp(
      weights.historicalPrecedent * historical.score +
        weights.safetyAlignment * safety.score +
        weights.designCompleteness * design.score,
      0,
      100
    ),
    1
  );

  return {
    overallScore: overall,
    riskLevel: riskLevelFor(overall, config),
    confidence: calculateConfidence(matchedTrials.length, findings.length, config),
    categoryScores: [historical, safety, design],
  };
}

/** `< low` → low, `< medium` → medium, otherwise high. */
export function riskLevelFor(
  score: number,
  config: Pick<ScoringConfig, "riskThresholds"> = DEFAULT_ENGINE_CONFIG.scoring
): RiskLevel {
  if (score < config.riskThresholds.low) return "low";
  if (score < config.riskThresholds.medium) return "medium";
  return "high";
}

// ── Historical precedent ──────────────────────────────────────────────────────

export function scoreHistoricalPrecedent(
  matchedTrials: readonly ScoredTrial[],
  config: ScoringConfig = DEFAULT_ENGINE_CONFIG.scoring
): CategoryScore {
  if (matchedTrials.length === 0) {
    return {
      category: "historical_precedent",
      score: config.neutralHistoricalScore,
      findingsCount: 0,
      keyConcerns: ["Limited historical data available"],
    };
  }

  const failed = matchedTrials.filter((t) => t.outcome === "failed");
  const failureRate = failed.length / matchedTrials.length;
  const avgSimilarity =
    matchedTrials.reduce((sum, t) => sum + t.similarityScore, 0) /
    matchedTrials.length;

  // Multipliers never stack: the worst matching family wins
  let multiplier = 1;
  const concerns: string[] = [];
  for (const trial of failed) {
    for (const reason of trial.failureReasons ?? []) {
      const text = reason.toLowerCase();
      for (const family of config.severityMultipliers) {
        if (family.keywords.some((k) => text.includes(k.toLowerCase()))) {
          multiplier = Math.max(multiplier, family.multiplier);
          concerns.push(family.concern);
        }
      }
    }
  }

  const score = clamp(failureRate * 100 * avgSimilarity * multiplier, 0, 100);
  const keyConcerns = [...new Set(concerns)].slice(0, config.maxConcerns);

  return {
    category: "historical_precedent",
    score: round(score, 1),
    findingsCount: failed.length,
    keyConcerns:
      keyConcerns.length > 0
        ? keyConcerns
        : [`${failed.length}/${matchedTrials.length} similar trials failed`],
  };
}

// ── Safety alignment ──────────────────────────────────────────────────────────

export function scoreSafetyAlignment(
  protocol: ClinicalProtocol,
  config: ScoringConfig = DEFAULT_ENGINE_CONFIG.scoring
): CategoryScore {
  const points = config.safety;
  const { knownContraindications, pharmacogenomicMarkers } = protocol.drugProfile;
  const { exclusionCriteria, biomarkerRequirements } = protocol.patientPopulation;
  let score = 0;
  const concerns: string[] = [];

  const exclusions = exclusionCriteria.map((e) => e.toLowerCase());
  const unmitigated = knownContraindications.filter((contra) => {
    const needle = contra.toLowerCase();
    return !exclusions.some((e) => e.includes(needle));
  });
  if (unmitigated.length > 0) {
    score += points.unmitigatedContraindication * unmitigated.length;
    concerns.push(`${unmitigated.length} contraindications not in exclusion criteria`);
  }

  const plan = protocol.safetyMonitoringPlan ?? "";
  if (plan.length < points.minMonitoringPlanLength) {
    score += points.incompleteMonitoringPlan;
    concerns.push("Incomplete safety monitoring plan");
  }

  if (pharmacogenomicMarkers.length > 0 && biomarkerRequirements.length === 0) {
    score += points.unusedPharmacogenomics;
    concerns.push("Known pharmacogenomic markers not used for patient selection");
  }

  return {
    category: "safety_alignment",
    score: round(clamp(score, 0, 100), 1),
    findingsCount: concerns.length,
    keyConcerns: concerns.slice(0, config.maxConcerns),
  };
}

// ── Design completeness ───────────────────────────────────────────────────────

/** Phase 2 and Phase 3 trials (including 2/3) are held to efficacy standards. */
export function isEfficacyTrial(phase: string | undefined): boolean {
  const text = (phase ?? "").toLowerCase();
  return text.includes("phase 2") || text.includes("phase 3");
}

export function scoreDesignCompleteness(
  protocol: ClinicalProtocol,
  config: ScoringConfig = DEFAULT_ENGINE_CONFIG.scoring
): CategoryScore {
  const points = config.design;
  const { studyDesign, statisticalPlan, primaryEndpoints } = protocol;
  const efficacy = isEfficacyTrial(protocol.metadata.phase);
  let score = 0;
  const concerns: string[] = [];

  if (efficacy && !studyDesign.placeboControlled) {
    score += points.missingPlaceboControl;
    concerns.push("No placebo control in efficacy trial");
  }

  if (!statisticalPlan.powerCalculationProvided) {
    score += points.missingPowerCalculation;
    concerns.push("No statistical power calculation provided");
  }

  if (primaryEndpoints.length === 0) {
    score += points.noPrimaryEndpoint;
    concerns.push("No primary endpoint defined");
  } else if (primaryEndpoints.length > 1) {
    score += points.multiplePrimaryEndpoints;
    concerns.push("Multiple primary endpoints may dilute power");
  }

  if (!protocol.safetyMonitoringPlan) {
    score += points.missingSafetyPlan;
    concerns.push("No safety monitoring plan");
  }

  if (efficacy && studyDesign.blinding.trim().toLowerCase() === "open-label") {
    score += points.openLabelEfficacy;
    concerns.push("Open-label design in efficacy trial");
  }

  const plannedN = statisticalPlan.plannedEnrollment;
  if (efficacy && plannedN < points.minEfficacyEnrollment) {
    score += points.smallEfficacySample;
    concerns.push(`Small sample size (${plannedN}) for efficacy trial`);
  }

  return {
    category: "design_completeness",
    score: round(clamp(score, 0, 100), 1),
    findingsCount: concerns.length,
    keyConcerns: concerns.slice(0, config.maxConcerns),
  };
}

// ── Confidence ────────────────────────────────────────────────────────────────

/**
 * Evidence-sufficiency heuristic in [0, 1]: more matched trials and a fuller
 * set of narrative findings raise it. Not a statistical interval.
 */
export function calculateConfidence(
  matchedTrialCount: number,
  findingsCount: number,
  config: ScoringConfig = DEFAULT_ENGINE_CONFIG.scoring
): number {
  const { base, trialSteps, findingsBonus, minFindingsForBonus } = config.confidence;
  let confidence = base;

  const step = [...trialSteps]
    .sort((a, b) => b.minTrials - a.minTrials)
    .find((s) => matchedTrialCount >= s.minTrials);
  if (step) confidence += step.bonus;

  if (findingsCount >= minFindingsForBonus) confidence += findingsBonus;

  return round(clamp(confidence, 0, 1), 2);
}

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
