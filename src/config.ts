/**
 * Engine configuration.
 *
 * Every weight, threshold and point value used by search and scoring lives
 * here. Callers own the configuration: there is no environment-variable
 * surface, only `resolveEngineConfig(overrides)`.
 */

import { ConfigurationError } from "./errors.js";
import type { TrialPhase } from "./types.js";
import { TRIAL_PHASES } from "./types.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface KeywordMultiplier {
  keywords: string[];
  multiplier: number;
  concern: string;
}

export interface EngineConfig {
  search: {
    defaultTopK: number;
    weights: {
      drugClass: number;
      therapeuticArea: number;
      phase: number;
      populationAge: number;
    };
    /** Credit given for a substring or adjacent-phase match */
    partialCredit: number;
    phaseOrder: readonly TrialPhase[];
  };

  browse: {
    listLimit: number;
    filterLimit: number;
  };

  comparison: {
    sampleSizeTolerance: number;
    highSimilarityThreshold: number;
  };

  scoring: {
    categoryWeights: {
      historicalPrecedent: number;
      safetyAlignment: number;
      designCompleteness: number;
    };
    riskThresholds: {
      /** overall < low → "low" */
      low: number;
      /** overall < medium → "medium", else "high" */
      medium: number;
    };
    neutralHistoricalScore: number;
    maxConcerns: number;
    severityMultipliers: KeywordMultiplier[];
    safety: {
      unmitigatedContraindication: number;
      incompleteMonitoringPlan: number;
      minMonitoringPlanLength: number;
      unusedPharmacogenomics: number;
    };
    design: {
      missingPlaceboControl: number;
      missingPowerCalculation: number;
      noPrimaryEndpoint: number;
      multiplePrimaryEndpoints: number;
      missingSafetyPlan: number;
      openLabelEfficacy: number;
      smallEfficacySample: number;
      minEfficacyEnrollment: number;
    };
    confidence: {
      base: number;
      /** Checked top-down; first `minTrials` met wins */
      trialSteps: { minTrials: number; bonus: number }[];
      findingsBonus: number;
      minFindingsForBonus: number;
    };
  };

  assessment: {
    comparisonLimit: number;
  };
}

export type EngineConfigOverrides = {
  [K in keyof EngineConfig]?: Partial<EngineConfig[K]>;
};

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════════════════════

export const DEFAULT_ENGINE_CONFIG = deepFreeze<EngineConfig>({
  search: {
    defaultTopK: 5,
    weights: {
      drugClass: 0.4,
      therapeuticArea: 0.3,
      phase: 0.2,
      populationAge: 0.1,
    },
    partialCredit: 0.5,
    phaseOrder: TRIAL_PHASES,
  },

  browse: {
    listLimit: 20,
    filterLimit: 5,
  },

  comparison: {
    sampleSizeTolerance: 50,
    highSimilarityThreshold: 0.7,
  },

  scoring: {
    categoryWeights: {
      historicalPrecedent: 0.4,
      safetyAlignment: 0.35,
      designCompleteness: 0.25,
    },
    riskThresholds: {
      low: 30,
      medium: 60,
    },
    neutralHistoricalScore: 50,
    maxConcerns: 3,
    severityMultipliers: [
      {
        keywords: ["placebo"],
        multiplier: 1.2,
        concern: "High placebo response in similar trials",
      },
      {
        keywords: ["biomarker", "enrichment"],
        multiplier: 1.3,
        concern: "Biomarker selection issues in similar trials",
      },
      {
        keywords: ["power", "sample size"],
        multiplier: 1.15,
        concern: "Statistical power issues in similar trials",
      },
    ],
    safety: {
      unmitigatedContraindication: 20,
      incompleteMonitoringPlan: 15,
      minMonitoringPlanLength: 50,
      unusedPharmacogenomics: 25,
    },
    design: {
      missingPlaceboControl: 30,
      missingPowerCalculation: 25,
      noPrimaryEndpoint: 20,
      multiplePrimaryEndpoints: 10,
      missingSafetyPlan: 15,
      openLabelEfficacy: 20,
      smallEfficacySample: 15,
      minEfficacyEnrollment: 50,
    },
    confidence: {
      base: 0.5,
      trialSteps: [
        { minTrials: 5, bonus: 0.3 },
        { minTrials: 3, bonus: 0.2 },
        { minTrials: 1, bonus: 0.1 },
      ],
      findingsBonus: 0.2,
      minFindingsForBonus: 3,
    },
  },

  assessment: {
    comparisonLimit: 3,
  },
});

// ═══════════════════════════════════════════════════════════════════════════════
// RESOLUTION
// ═══════════════════════════════════════════════════════════════════════════════

const WEIGHT_TOLERANCE = 1e-9;

/**
 * Merges section-level overrides onto the defaults and freezes the result.
 * Throws ConfigurationError when the category weights do not sum to 1.
 */
export function resolveEngineConfig(
  overrides: EngineConfigOverrides = {}
): EngineConfig {
  const config: EngineConfig = {
    search: { ...DEFAULT_ENGINE_CONFIG.search, ...overrides.search },
    browse: { ...DEFAULT_ENGINE_CONFIG.browse, ...overrides.browse },
    comparison: { ...DEFAULT_ENGINE_CONFIG.comparison, ...overrides.comparison },
    scoring: { ...DEFAULT_ENGINE_CONFIG.scoring, ...overrides.scoring },
    assessment: { ...DEFAULT_ENGINE_CONFIG.assessment, ...overrides.assessment },
  };

  const { historicalPrecedent, safetyAlignment, designCompleteness } =
    config.scoring.categoryWeights;
  const sum = historicalPrecedent + safetyAlignment + designCompleteness;
  if (Math.abs(sum - 1) > WEIGHT_TOLERANCE) {
    throw new ConfigurationError(
      `Category weights must sum to 1.0 (got ${sum})`,
      "scoring.categoryWeights"
    );
  }

  if (config.search.defaultTopK < 1) {
    throw new ConfigurationError(
      `defaultTopK must be at least 1 (got ${config.search.defaultTopK})`,
      "search.defaultTopK"
    );
  }

  return deepFreeze(config);
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
