import { DEFAULT_ENGINE_CONFIG } from "../config.js";
import type { EngineConfig } from "../config.js";
import type {
  ClinicalProtocol,
  ComparisonRow,
  ComparisonTable,
  MatchStatus,
  RiskLevel,
  TrialRecord,
} from "../types.js";

const UNKNOWN = "Unknown";

/**
 * Side-by-side comparison of a protocol against one historical trial.
 * Always five rows, in this order: Population Age, Drug Class, Study Design,
 * Placebo Run-in, Sample Size.
 */
export function buildComparisonTable(
  protocol: ClinicalProtocol,
  trial: Readonly<TrialRecord>,
  config: EngineConfig["comparison"] = DEFAULT_ENGINE_CONFIG.comparison
): ComparisonTable {
  const currentRunIn = protocol.studyDesign.placeboRunIn;
  const historicalRunIn = trial.placeboRunIn;
  const sharedRunInGap =
    !currentRunIn && !historicalRunIn && trial.outcome === "failed";

  const rows: ComparisonRow[] = [
    compareField(
      "Population Age",
      orUnknown(protocol.patientPopulation.ageRange),
      orUnknown(trial.populationAge)
    ),
    compareField(
      "Drug Class",
      orUnknown(protocol.drugProfile.drugClass),
      orUnknown(trial.drugClass)
    ),
    compareField(
      "Study Design",
      orUnknown(protocol.studyDesign.designType),
      orUnknown(trial.studyDesign)
    ),
    {
      ...compareField(
        "Placebo Run-in",
        yesNo(currentRunIn),
        yesNo(historicalRunIn),
        sharedRunInGap
      ),
      ...(sharedRunInGap
        ? { explanation: "Trial failed without placebo run-in" }
        : {}),
    },
    compareSampleSize(
      protocol.statisticalPlan.plannedEnrollment,
      trial.plannedEnrollment,
      config.sampleSizeTolerance
    ),
  ];

  const similarCount = rows.filter(
    (r) => r.matchStatus === "EXACT_MATCH" || r.matchStatus === "MATCH"
  ).length;
  const overallSimilarity = similarCount / rows.length;

  return {
    historicalTrial: {
      nctId: trial.nctId || UNKNOWN,
      trialName: trial.trialName || UNKNOWN,
      outcome: trial.outcome,
      phase: trial.phase ?? UNKNOWN,
    },
    rows,
    overallSimilarity,
    riskAssessment: describeRisk(rows, overallSimilarity, config.highSimilarityThreshold),
  };
}

function compareField(
  field: string,
  current: string,
  historical: string,
  isRiskFactor = false
): ComparisonRow {
  const [matchStatus, riskLevel] = classify(current, historical, isRiskFactor);
  return { field, current, historical, matchStatus, riskLevel };
}

function classify(
  current: string,
  historical: string,
  isRiskFactor: boolean
): [MatchStatus, RiskLevel] {
  const a = current.trim().toLowerCase();
  const b = historical.trim().toLowerCase();

  if (a === b) return isRiskFactor ? ["RISK_FACTOR", "high"] : ["EXACT_MATCH", "low"];
  if (a.includes(b) || b.includes(a)) return ["MATCH", "medium"];
  return ["MISMATCH", "low"];
}

function compareSampleSize(
  current: number,
  historical: number,
  tolerance: number
): ComparisonRow {
  return {
    field: "Sample Size",
    current: String(current),
    historical: String(historical),
    matchStatus: Math.abs(current - historical) < tolerance ? "MATCH" : "MISMATCH",
    riskLevel: current < historical ? "medium" : "low",
  };
}

function describeRisk(
  rows: ComparisonRow[],
  overallSimilarity: number,
  highSimilarityThreshold: number
): string {
  const riskFactors = rows.filter((r) => r.matchStatus === "RISK_FACTOR").length;
  if (riskFactors > 0) {
    return `High similarity to failed trial (${riskFactors} risk factors)`;
  }
  if (overallSimilarity > highSimilarityThreshold) {
    return "High similarity to historical trial";
  }
  return "Moderate similarity";
}

function orUnknown(value: string): string {
  return value.trim() ? value : UNKNOWN;
}

function yesNo(flag: boolean): string {
  return flag ? "Yes" : "No";
}
