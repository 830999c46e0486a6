import { z } from "zod";
import { ValidationError } from "./errors.js";
import type {
  ClinicalProtocol,
  Endpoint,
  NarrativeFinding,
  TrialCorpusData,
  TrialRecord,
} from "./types.js";
import { TRIAL_OUTCOMES, TRIAL_PHASES } from "./types.js";

// Wire shapes are snake_case, the shape upstream collaborators emit. Absent
// optional fields get their documented defaults here so the core types stay
// strict. Wrong types are rejected, never coerced.

const optionalString = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

const optionalNumber = z
  .number()
  .finite()
  .nullish()
  .transform((v) => v ?? undefined);

const stringList = z.array(z.string()).nullish().transform((v) => v ?? []);

const lowerCased = (value: unknown) =>
  typeof value === "string" ? value.trim().toLowerCase() : value;

const TrialPhaseZ = z.enum(TRIAL_PHASES);

const optionalPhase = z.preprocess(
  (value) => (value === "" || value === null ? undefined : value),
  TrialPhaseZ.optional()
);

const TrialOutcomeZ = z.preprocess(lowerCased, z.enum(TRIAL_OUTCOMES));

const RiskCategoryZ = z.enum([
  "historical_precedent",
  "safety_alignment",
  "design_completeness",
]);

// ── Historical trials ─────────────────────────────────────────────────────────

const TrialRecordZ = z
  .object({
    nct_id: z.string().default(""),
    trial_name: z.string().default("Unknown"),
    phase: optionalPhase,
    drug_class: z.string().default(""),
    therapeutic_area: z.string().default(""),
    outcome: TrialOutcomeZ.default("unknown"),
    population_age: z.string().default(""),
    planned_enrollment: z.number().int().nonnegative().default(0),
    actual_enrollment: z.number().int().nonnegative().nullish(),
    placebo_run_in: z.boolean().default(false),
    study_design: z.string().default(""),
    tags: stringList,
    key_learnings: stringList,
    failure_reasons: z.array(z.string()).nullish(),
  })
  .transform(
    (w): TrialRecord => ({
      nctId: w.nct_id.trim(),
      trialName: w.trial_name,
      phase: w.phase,
      drugClass: w.drug_class,
      therapeuticArea: w.therapeutic_area,
      outcome: w.outcome,
      populationAge: w.population_age,
      plannedEnrollment: w.planned_enrollment,
      actualEnrollment: w.actual_enrollment ?? undefined,
      placeboRunIn: w.placebo_run_in,
      studyDesign: w.study_design,
      tags: w.tags,
      keyLearnings: w.key_learnings,
      failureReasons: w.failure_reasons ?? undefined,
    })
  );

const CorpusDocumentZ = z
  .object({
    trials: z.array(TrialRecordZ).default([]),
    failure_patterns: z
      .record(z.string(), z.record(z.string(), z.unknown()))
      .default({}),
  })
  .transform(
    (w): TrialCorpusData => ({
      trials: w.trials,
      failurePatterns: Object.fromEntries(
        Object.entries(w.failure_patterns).map(([key, pattern]) => [
          key.toLowerCase(),
          pattern,
        ])
      ),
    })
  );

// ── Protocol ──────────────────────────────────────────────────────────────────

const EndpointZ = z.union([
  z.string().transform((name): Endpoint => ({ name, type: "" })),
  z
    .object({
      name: z.string(),
      type: z.string().default(""),
      measurement_method: optionalString,
      timepoint: optionalString,
    })
    .transform(
      (w): Endpoint => ({
        name: w.name,
        type: w.type,
        measurementMethod: w.measurement_method,
        timepoint: w.timepoint,
      })
    ),
]);

const MetadataZ = z
  .object({
    nct_id: optionalString,
    trial_name: z.string().default("Unknown"),
    sponsor: z.string().default("Unknown"),
    phase: optionalPhase,
    year: z.number().int().nullish(),
  })
  .default({});

const DrugProfileZ = z
  .object({
    name: z.string().default("Unknown"),
    drug_class: z.string().default(""),
    mechanism_of_action: optionalString,
    known_contraindications: stringList,
    pharmacogenomic_markers: stringList,
  })
  .default({});

const PatientPopulationZ = z
  .object({
    age_range: z.string().default(""),
    gender: optionalString,
    disease_indication: z.string().default(""),
    therapeutic_area: z.string().default(""),
    inclusion_criteria: stringList,
    exclusion_criteria: stringList,
    disease_severity: optionalString,
    biomarker_requirements: stringList,
  })
  .default({});

const StudyDesignZ = z
  .object({
    design_type: z.string().default(""),
    blinding: z.string().default(""),
    randomization: z.boolean().default(false),
    placebo_controlled: z.boolean().default(false),
    placebo_run_in: z.boolean().default(false),
    enrichment_design: z.boolean().default(false),
    adaptive_design: z.boolean().default(false),
    duration_weeks: z.number().int().nonnegative().nullish(),
  })
  .default({});

const StatisticalPlanZ = z
  .object({
    planned_enrollment: z.number().int().nonnegative().default(0),
    actual_enrollment: z.number().int().nonnegative().nullish(),
    power_calculation_provided: z.boolean().default(false),
    expected_effect_size: optionalNumber,
    alpha_level: z.number().min(0).max(1).default(0.05),
    dropout_rate_assumption: optionalNumber,
    primary_analysis_method: optionalString,
  })
  .default({});

const ClinicalProtocolZ = z
  .object({
    metadata: MetadataZ,
    drug_profile: DrugProfileZ,
    patient_population: PatientPopulationZ,
    study_design: StudyDesignZ,
    statistical_plan: StatisticalPlanZ,
    safety_monitoring_plan: optionalString,
    primary_endpoints: z.array(EndpointZ).nullish().transform((v) => v ?? []),
    secondary_endpoints: z.array(EndpointZ).nullish().transform((v) => v ?? []),
  })
  .transform(
    (w): ClinicalProtocol => ({
      metadata: {
        nctId: w.metadata.nct_id,
        trialName: w.metadata.trial_name,
        sponsor: w.metadata.sponsor,
        phase: w.metadata.phase,
        year: w.metadata.year ?? undefined,
      },
      drugProfile: {
        name: w.drug_profile.name,
        drugClass: w.drug_profile.drug_class,
        mechanismOfAction: w.drug_profile.mechanism_of_action,
        knownContraindications: w.drug_profile.known_contraindications,
        pharmacogenomicMarkers: w.drug_profile.pharmacogenomic_markers,
      },
      patientPopulation: {
        ageRange: w.patient_population.age_range,
        gender: w.patient_population.gender,
        diseaseIndication: w.patient_population.disease_indication,
        therapeuticArea: w.patient_population.therapeutic_area,
        inclusionCriteria: w.patient_population.inclusion_criteria,
        exclusionCriteria: w.patient_population.exclusion_criteria,
        diseaseSeverity: w.patient_population.disease_severity,
        biomarkerRequirements: w.patient_population.biomarker_requirements,
      },
      studyDesign: {
        designType: w.study_design.design_type,
        blinding: w.study_design.blinding,
        randomization: w.study_design.randomization,
        placeboControlled: w.study_design.placebo_controlled,
        placeboRunIn: w.study_design.placebo_run_in,
        enrichmentDesign: w.study_design.enrichment_design,
        adaptiveDesign: w.study_design.adaptive_design,
        durationWeeks: w.study_design.duration_weeks ?? undefined,
      },
      statisticalPlan: {
        plannedEnrollment: w.statistical_plan.planned_enrollment,
        actualEnrollment: w.statistical_plan.actual_enrollment ?? undefined,
        powerCalculationProvided: w.statistical_plan.power_calculation_provided,
        expectedEffectSize: w.statistical_plan.expected_effect_size,
        alphaLevel: w.statistical_plan.alpha_level,
        dropoutRateAssumption: w.statistical_plan.dropout_rate_assumption,
        primaryAnalysisMethod: w.statistical_plan.primary_analysis_method,
      },
      safetyMonitoringPlan: w.safety_monitoring_plan,
      primaryEndpoints: w.primary_endpoints,
      secondaryEndpoints: w.secondary_endpoints,
    })
  );

// ── Narrative findings ────────────────────────────────────────────────────────

const NarrativeFindingZ = z
  .object({
    title: z.string(),
    category: RiskCategoryZ,
    severity: z.preprocess(
      lowerCased,
      z.enum(["low", "medium", "high", "critical"])
    ),
    description: z.string().default(""),
    evidence: stringList,
    historical_trial_references: stringList,
    quantified_impact: optionalString,
    recommendation: z.string().default(""),
    estimated_cost_to_fix: optionalString,
    implementation_difficulty: z
      .preprocess(lowerCased, z.enum(["easy", "medium", "hard"]))
      .nullish(),
  })
  .transform(
    (w): NarrativeFinding => ({
      title: w.title,
      category: w.category,
      severity: w.severity,
      description: w.description,
      evidence: w.evidence,
      historicalTrialReferences: w.historical_trial_references,
      quantifiedImpact: w.quantified_impact,
      recommendation: w.recommendation,
      estimatedCostToFix: w.estimated_cost_to_fix,
      implementationDifficulty: w.implementation_difficulty ?? undefined,
    })
  );

// ── Parse helpers ─────────────────────────────────────────────────────────────

/** One line per issue: `[path] message`. */
export function formatValidationIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.join(".");
    return `[${path || "root"}] ${issue.message}`;
  });
}

function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  source: string
): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = formatValidationIssues(result.error);
    throw new ValidationError(
      `Invalid ${source}: ${issues.length} issue(s)`,
      source,
      issues
    );
  }
  return result.data;
}

export function parseProtocol(data: unknown): ClinicalProtocol {
  return parseWith(ClinicalProtocolZ, data, "protocol");
}

export function parseTrialRecords(data: unknown): TrialRecord[] {
  return parseWith(z.array(TrialRecordZ), data, "trial records");
}

export function parseNarrativeFindings(data: unknown): NarrativeFinding[] {
  return parseWith(
    z.array(NarrativeFindingZ).nullish().transform((v) => v ?? []),
    data,
    "narrative findings"
  );
}

export function parseCorpusDocument(data: unknown): TrialCorpusData {
  return parseWith(CorpusDocumentZ, data, "corpus document");
}
