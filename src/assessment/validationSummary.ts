/**
 * Wire formats.
 *
 * ValidationResult is the internal, camelCase result of the validation stage;
 * ValidationSummary is the snake_case JSON the decision stage consumes. The
 * conversion only runs in one direction here, and decision input files are
 * always read through `parseDecisionInput`.
 */

import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { formatSeverity } from './severity.js';
import type {
  ApplicationExtraction,
  DecisionResult,
  DecisionSummary,
  ScoredCategory,
  ValidationFinding,
  ValidationResult,
} from './types.js';
import { roundTo } from './validators.js';

const WIRE_DECIMALS = 4;

const score = z.number().finite().nullish().transform((value) => value ?? 0);

const FindingObjectSchema = z.object({
  category: z.string().nullish().transform((value) => value ?? ''),
  severity: z.string().nullish().transform((value) => value ?? 'INFO'),
  message: z.string().nullish().transform((value) => value ?? ''),
  fields_involved: z.array(z.string()).nullish().transform((value) => value ?? []),
  affected_documents: z.array(z.string()).nullish().transform((value) => value ?? []),
  auto_resolvable: z.boolean().nullish().transform((value) => value ?? false),
  suggested_resolution: z.string().nullish().transform((value) => value ?? undefined),
});

// Older producers wrote findings as bare message strings.
const FindingWireSchema = z.union([
  FindingObjectSchema,
  z.string().transform((message) => FindingObjectSchema.parse({ message })),
]);

const CategoryScoresWireSchema = z.object({
  personal_info: score,
  employment: score,
  income: score,
  assets: score,
  credit: score,
});

const ValidationSummaryEntrySchema = z.object({
  application_id: z.string().nullish(),
  quality_score: score,
  consistency_score: score,
  completeness_score: score,
  category_scores: CategoryScoresWireSchema.nullish().transform(
    (value) => value ?? { personal_info: 0, employment: 0, income: 0, assets: 0, credit: 0 }
  ),
  findings: z.array(FindingWireSchema).nullish().transform((value) => value ?? []),
  documents_reviewed: score,
  validation_status: z.string().nullish().transform((value) => value ?? undefined),
});

const DecisionInputSchema = z.object({
  applications: z.array(z.unknown()).nullish().transform((value) => value ?? []),
});

export type ValidationFindingWire = z.output<typeof FindingObjectSchema>;

export interface ValidationSummary {
  application_id: string;
  quality_score: number;
  consistency_score: number;
  completeness_score: number;
  category_scores: Record<ScoredCategory, number>;
  findings: ValidationFindingWire[];
  documents_reviewed: number;
  validation_status?: string;
}

export function toFindingWire(finding: ValidationFinding): ValidationFindingWire {
  return {
    category: finding.category,
    severity: formatSeverity(finding.severity),
    message: finding.message,
    fields_involved: [...finding.fieldsInvolved],
    affected_documents: [...finding.affectedDocuments],
    auto_resolvable: finding.autoResolvable,
    ...(finding.suggestedResolution !== undefined ? { suggested_resolution: finding.suggestedResolution } : {}),
  };
}

export function toValidationSummary(result: ValidationResult): ValidationSummary {
  return {
    application_id: result.applicationId,
    quality_score: roundTo(result.qualityScore, WIRE_DECIMALS),
    consistency_score: roundTo(result.consistencyScore, WIRE_DECIMALS),
    completeness_score: roundTo(result.completenessScore, WIRE_DECIMALS),
    category_scores: {
      personal_info: roundTo(result.categoryScores.personal_info, WIRE_DECIMALS),
      employment: roundTo(result.categoryScores.employment, WIRE_DECIMALS),
      income: roundTo(result.categoryScores.income, WIRE_DECIMALS),
      assets: roundTo(result.categoryScores.assets, WIRE_DECIMALS),
      credit: roundTo(result.categoryScores.credit, WIRE_DECIMALS),
    },
    findings: result.findings.map(toFindingWire),
    documents_reviewed: result.documentsReviewed,
    validation_status: result.validationStatus,
  };
}

function describeIssue(error: z.ZodError, prefix: (string | number)[]): string {
  const issue = error.issues[0];
  const path = [...prefix, ...issue.path].join('.');
  return `${path || '(root)'}: ${issue.message}`;
}

/**
 * Reads a decision input document (`{ applications: [...] }`). Absent or null
 * scores default to 0 and lists to empty; entries without an id are dropped.
 * A malformed entry is logged and skipped. Throws only when the document
 * itself has the wrong shape.
 */
export function parseDecisionInput(json: unknown): Map<string, ValidationSummary> {
  const parsed = DecisionInputSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Invalid decision input at ${describeIssue(parsed.error, [])}`);
  }

  const summaries = new Map<string, ValidationSummary>();
  for (const [index, raw] of parsed.data.applications.entries()) {
    const entry = ValidationSummaryEntrySchema.safeParse(raw);
    if (!entry.success) {
      logger.warn(
        { event: 'decision_input_entry_skipped', reason: describeIssue(entry.error, ['applications', index]) },
        'Skipping malformed decision input entry'
      );
      continue;
    }
    const { application_id: applicationId, ...rest } = entry.data;
    if (!applicationId) continue;
    summaries.set(applicationId, { application_id: applicationId, ...rest });
  }
  return summaries;
}

// --- Output ---

export interface DecisionOutput {
  application_id: string;
  final_decision: string;
  decision_scores: {
    validation_score: number;
    ml_confidence: number;
    business_rule_score: number;
    combined_score: number;
    approval_likelihood: number;
  };
  findings: { category: string; severity: string; message: string; weight: number }[];
  rationale: string;
  confidence_level: string;
  appeals_eligible: boolean;
  recommended_actions: string[];
  critical_flags: string[];
  ml_prediction_class: number;
  ml_prediction_probability: number;
  validation_status: string;
}

export function serializeDecision(decision: DecisionResult): DecisionOutput {
  const scores = decision.decisionScores;
  return {
    application_id: decision.applicationId,
    final_decision: decision.finalDecision,
    decision_scores: {
      validation_score: roundTo(scores.validationScore, WIRE_DECIMALS),
      ml_confidence: roundTo(scores.mlConfidence, WIRE_DECIMALS),
      business_rule_score: roundTo(scores.businessRuleScore, WIRE_DECIMALS),
      combined_score: roundTo(scores.combinedScore, WIRE_DECIMALS),
      approval_likelihood: roundTo(scores.approvalLikelihood, WIRE_DECIMALS),
    },
    findings: decision.findings.map((f) => ({
      category: f.category,
      severity: formatSeverity(f.severity),
      message: f.message,
      weight: roundTo(f.weight, WIRE_DECIMALS),
    })),
    rationale: decision.rationale,
    confidence_level: decision.confidenceLevel,
    appeals_eligible: decision.appealsEligible,
    recommended_actions: [...decision.recommendedActions],
    critical_flags: [...decision.criticalFlags],
    ml_prediction_class: decision.mlPredictionClass,
    ml_prediction_probability: roundTo(decision.mlPredictionProbability, WIRE_DECIMALS),
    validation_status: decision.validationStatus,
  };
}

export function serializeDecisionSummary(summary: DecisionSummary): Record<string, unknown> {
  return {
    total_applications: summary.totalApplications,
    decisions: {
      approve: summary.decisions.APPROVE,
      deny: summary.decisions.DENY,
      needs_review: summary.decisions.NEEDS_REVIEW,
    },
    confidence_distribution: {
      high: summary.confidenceDistribution.HIGH,
      medium: summary.confidenceDistribution.MEDIUM,
      low: summary.confidenceDistribution.LOW,
    },
    average_scores: {
      validation_score: summary.averageScores.validationScore,
      ml_confidence: summary.averageScores.mlConfidence,
      combined_score: summary.averageScores.combinedScore,
    },
    appeals_eligible: summary.appealsEligible,
  };
}

/**
 * Extraction overview for reports. Source paths and processing durations vary
 * between runs and are left out.
 */
export function serializeExtraction(extraction: ApplicationExtraction): Record<string, unknown> {
  return {
    application_id: extraction.applicationId,
    personal_info: extraction.personalInfo,
    employment_info: extraction.employmentInfo,
    bank_statement: extraction.bankStatement,
    resume: extraction.resume,
    assets_liabilities: extraction.assetsLiabilities,
    credit_report: extraction.creditReport,
    documents: Object.fromEntries(
      Object.entries(extraction.documents).map(([kind, metadata]) => [kind, {
        status: metadata.status,
        confidence: metadata.confidence,
        extraction_method: metadata.extractionMethod,
        errors: metadata.errors,
        warnings: metadata.warnings,
      }])
    ),
    missing_documents: extraction.missingDocuments,
    verification_status: extraction.verificationStatus,
    data_quality_score: extraction.dataQualityScore,
    backfilled_fields: extraction.backfilledFields,
  };
}
