export * from "./types.js";
export {
  DEFAULT_ENGINE_CONFIG,
  resolveEngineConfig,
  type EngineConfig,
  type EngineConfigOverrides,
} from "./config.js";
export { ConfigurationError, ValidationError } from "./errors.js";
export { createLogger, setLogLevel, type LogLevel, type Logger } from "./logger.js";
export {
  formatValidationIssues,
  parseCorpusDocument,
  parseNarrativeFindings,
  parseProtocol,
  parseTrialRecords,
} from "./schemas.js";
export { buildCorpusIndex, getTrialById } from "./pipeline/corpusIndex.js";
export { loadCorpusFile, parseCorpus } from "./pipeline/corpusLoader.js";
export { searchSimilarTrials } from "./pipeline/similaritySearch.js";
export { calculateSimilarity } from "./pipeline/similarity.js";
export { buildComparisonTable } from "./pipeline/comparisonTable.js";
export {
  calculateConfidence,
  calculateRiskScore,
  riskLevelFor,
} from "./pipeline/riskScoring.js";
export { prioritizeRecommendations } from "./pipeline/recommendations.js";
export {
  getFailurePatterns,
  listTrials,
  searchTrialsByFilters,
  type OutcomeFilter,
  type TrialListFilters,
  type TrialSearchFilters,
} from "./pipeline/trialFilters.js";
export { TrialCorpus } from "./pipeline/trialCorpus.js";
export {
  assessProtocol,
  buildSimilarityQuery,
  summarizeTrial,
  type AssessmentOptions,
} from "./pipeline/index.js";
