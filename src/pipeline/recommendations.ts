import type {
  Difficulty,
  FindingSeverity,
  NarrativeFinding,
  Recommendation,
} from "../types.js";

const RISK_REDUCTION: Record<FindingSeverity, number> = {
  critical: 25,
  high: 18,
  medium: 10,
  low: 5,
};

const FEASIBILITY: Record<Difficulty, number> = {
  easy: 100,
  medium: 70,
  hard: 40,
};

const IMPLEMENTATION_TIME: Record<Difficulty, string> = {
  easy: "1-2 weeks",
  medium: "1-2 months",
  hard: "3-6 months",
};

/**
 * Turns narrative findings into ranked recommendations.
 *
 *   priority score = reduction² × feasibility / 10000
 *
 * Severity sets the expected risk reduction, difficulty the feasibility
 * (unspecified difficulty counts as medium). Ties keep input order.
 */
export function prioritizeRecommendations(
  findings: readonly NarrativeFinding[]
): Recommendation[] {
  return findings
    .map((finding) => {
      const difficulty = finding.implementationDifficulty ?? "medium";
      const reduction = RISK_REDUCTION[finding.severity];
      return {
        priorityScore: priorityScore(reduction, difficulty),
        recommendation: {
          title: finding.title || "Untitled recommendation",
          description: finding.recommendation,
          expectedRiskReduction: reduction,
          estimatedCost: finding.estimatedCostToFix,
          implementationTime: IMPLEMENTATION_TIME[difficulty],
          difficulty,
          impactCategory: finding.category,
        },
      };
    })
    .sort((a, b) => b.priorityScore - a.priorityScore)
    .map(({ recommendation }, i): Recommendation => ({
      priority: i + 1,
      ...recommendation,
    }));
}

export function priorityScore(riskReduction: number, difficulty: Difficulty): number {
  return (riskReduction ** 2 * FEASIBILITY[difficulty]) / 10000;
}
