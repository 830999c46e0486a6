// ── Enumerations ──────────────────────────────────────────────────────────────

export const TRIAL_PHASES = [
  "Phase 1",
  "Phase 1/2",
  "Phase 2",
  "Phase 2/3",
  "Phase 3",
  "Phase 4",
] as const;

export type TrialPhase = (typeof TRIAL_PHASES)[number];

export const TRIAL_OUTCOMES = [
  "success",
  "failed",
  "terminated",
  "unknown",
  "ongoing",
] as const;

export type TrialOutcome = (typeof TRIAL_OUTCOMES)[number];

export type RiskLevel = "low" | "medium" | "high";

/** Narrative findings may carry one level above the scored bands. */
export type FindingSeverity = RiskLevel | "critical";

export type RiskCategory =
  | "historical_precedent"
  | "safety_alignment"
  | "design_completeness";

export type MatchStatus = "EXACT_MATCH" | "MATCH" | "MISMATCH" | "RISK_FACTOR";

export type Difficulty = "easy" | "medium" | "hard";

// ── Historical corpus ─────────────────────────────────────────────────────────

export interface TrialRecord {
  nctId: string;
  trialName: string;
  phase?: TrialPhase;
  drugClass: string;
  therapeuticArea: string;
  outcome: TrialOutcome;
  /** Free text such as "18-65" */
  populationAge: string;
  plannedEnrollment: number;
  actualEnrollment?: number;
  placeboRunIn: boolean;
  studyDesign: string;
  tags: string[];
  keyLearnings: string[];
  /** Present only for failed or terminated trials */
  failureReasons?: string[];
}

export type FailurePattern = Record<string, unknown>;

export interface TrialCorpusData {
  trials: TrialRecord[];
  /** Keyed by "<area>" or "<area>_<drug class>", lower-cased */
  failurePatterns: Record<string, FailurePattern>;
}

export interface CorpusIndex {
  /** Deduplicated records in corpus order */
  readonly records: readonly Readonly<TrialRecord>[];
  readonly byId: ReadonlyMap<string, number>;
  readonly byDrugClass: ReadonlyMap<string, readonly number[]>;
  readonly byTherapeuticArea: ReadonlyMap<string, readonly number[]>;
  readonly byPhase: ReadonlyMap<string, readonly number[]>;
  readonly byOutcome: ReadonlyMap<string, readonly number[]>;
  readonly byTag: ReadonlyMap<string, readonly number[]>;
  readonly failurePatterns: Readonly<Record<string, FailurePattern>>;
}

// ── Protocol under analysis ───────────────────────────────────────────────────

export interface ProtocolMetadata {
  nctId?: string;
  trialName: string;
  sponsor: string;
  phase?: TrialPhase;
  year?: number;
}

export interface DrugProfile {
  name: string;
  drugClass: string;
  mechanismOfAction?: string;
  knownContraindications: string[];
  pharmacogenomicMarkers: string[];
}

export interface PatientPopulation {
  ageRange: string;
  gender?: string;
  diseaseIndication: string;
  therapeuticArea: string;
  inclusionCriteria: string[];
  exclusionCriteria: string[];
  diseaseSeverity?: string;
  biomarkerRequirements: string[];
}

export interface StudyDesign {
  designType: string;
  /** open-label, single-blind, double-blind, triple-blind */
  blinding: string;
  randomization: boolean;
  placeboControlled: boolean;
  placeboRunIn: boolean;
  enrichmentDesign: boolean;
  adaptiveDesign: boolean;
  durationWeeks?: number;
}

export interface StatisticalPlan {
  plannedEnrollment: number;
  actualEnrollment?: number;
  powerCalculationProvided: boolean;
  expectedEffectSize?: number;
  alphaLevel: number;
  dropoutRateAssumption?: number;
  primaryAnalysisMethod?: string;
}

export interface Endpoint {
  name: string;
  type: string;
  measurementMethod?: string;
  timepoint?: string;
}

export interface ClinicalProtocol {
  metadata: ProtocolMetadata;
  drugProfile: DrugProfile;
  patientPopulation: PatientPopulation;
  studyDesign: StudyDesign;
  statisticalPlan: StatisticalPlan;
  safetyMonitoringPlan?: string;
  primaryEndpoints: Endpoint[];
  secondaryEndpoints: Endpoint[];
}

// ── Upstream narrative findings ───────────────────────────────────────────────

export interface NarrativeFinding {
  title: string;
  category: RiskCategory;
  severity: FindingSeverity;
  description: string;
  evidence: string[];
  historicalTrialReferences: string[];
  quantifiedImpact?: string;
  recommendation: string;
  estimatedCostToFix?: string;
  implementationDifficulty?: Difficulty;
}

// ── Similarity search ─────────────────────────────────────────────────────────

export interface SimilarityQuery {
  drugClass: string;
  therapeuticArea?: string;
  phase?: string;
  populationAge?: string;
  topK?: number;
}

export type ScoredTrial = Readonly<TrialRecord> & {
  /** 0–1 */
  similarityScore: number;
};

export interface HistoricalTrialSummary {
  nctId: string;
  trialName: string;
  phase?: TrialPhase;
  therapeuticArea: string;
  drugClass: string;
  outcome: TrialOutcome;
  similarityScore: number;
  keyLearnings: string[];
  failureReasons?: string[];
}

// ── Comparison table ──────────────────────────────────────────────────────────

export interface ComparisonRow {
  field: string;
  current: string;
  historical: string;
  matchStatus: MatchStatus;
  riskLevel: RiskLevel;
  explanation?: string;
}

export interface ComparisonTable {
  historicalTrial: {
    nctId: string;
    trialName: string;
    outcome: TrialOutcome;
    phase: string;
  };
  rows: ComparisonRow[];
  /** Share of EXACT_MATCH / MATCH rows, 0–1 */
  overallSimilarity: number;
  riskAssessment: string;
}

// ── Risk scoring ──────────────────────────────────────────────────────────────

export interface CategoryScore {
  category: RiskCategory;
  /** 0–100, higher is riskier */
  score: number;
  findingsCount: number;
  /** At most 3 */
  keyConcerns: string[];
}

export interface RiskScore {
  overallScore: number;
  riskLevel: RiskLevel;
  /**
   * Data-availability heuristic in 0–1. Not a statistical confidence
   * interval: it only reflects how many matched trials and narrative findings
   * backed the score.
   */
  confidence: number;
  categoryScores: [CategoryScore, CategoryScore, CategoryScore];
}

export interface Recommendation {
  /** 1 = highest */
  priority: number;
  title: string;
  description: string;
  expectedRiskReduction: number;
  estimatedCost?: string;
  implementationTime: string;
  difficulty: Difficulty;
  impactCategory: RiskCategory;
}

// ── Assessment ────────────────────────────────────────────────────────────────

export interface RiskAssessment {
  protocolName: string;
  riskScore: RiskScore;
  similarTrials: HistoricalTrialSummary[];
  comparisons: ComparisonTable[];
  recommendations: Recommendation[];
  findings: NarrativeFinding[];
  durationMs: number;
}
