/**
 * Turns findings and the assembled application into validation scores.
 */

import { isAtLeast, maxSeverity, type Severity } from './severity.js';
import {
  DOCUMENT_KINDS,
  SCORED_CATEGORIES,
  type ApplicationExtraction,
  type CategoryScores,
  type DocumentKind,
  type ScoredCategory,
  type ValidationFinding,
  type ValidationResult,
  type ValidationStatus,
} from './types.js';
import { clamp01, roundTo } from './validators.js';

const IDENTITY_PENALTIES: Record<Severity, number> = { critical: 0.3, high: 0.2, medium: 0.1, low: 0.05, info: 0 };
const FINANCIAL_PENALTIES: Record<Severity, number> = { critical: 0.3, high: 0.15, medium: 0.05, low: 0.05, info: 0 };

export const CATEGORY_PENALTIES: Record<ScoredCategory, Record<Severity, number>> = {
  personal_info: IDENTITY_PENALTIES,
  employment: IDENTITY_PENALTIES,
  income: IDENTITY_PENALTIES,
  assets: FINANCIAL_PENALTIES,
  credit: FINANCIAL_PENALTIES,
};

export const CONSISTENCY_PENALTIES: Record<Severity, number> = IDENTITY_PENALTIES;

export const COMPLETENESS_WEIGHTS: Record<DocumentKind, number> = {
  identity_card: 0.15,
  employment_letter: 0.15,
  bank_statement: 0.2,
  resume: 0.15,
  assets_liabilities: 0.2,
  credit_report: 0.15,
};

export const QUALITY_WEIGHTS: Record<ScoredCategory, number> = {
  personal_info: 0.15,
  employment: 0.15,
  income: 0.25,
  assets: 0.2,
  credit: 0.25,
};

/** Score for a category whose source document yielded nothing. */
const NO_DOCUMENT_SCORES: Partial<Record<ScoredCategory, { kind: DocumentKind; score: number }>> = {
  employment: { kind: 'employment_letter', score: 0.5 },
  income: { kind: 'bank_statement', score: 0 },
  assets: { kind: 'assets_liabilities', score: 0.5 },
  credit: { kind: 'credit_report', score: 0.5 },
};

export const QUALITY_REVIEW_THRESHOLD = 0.6;

function yieldedFields(extraction: ApplicationExtraction, kind: DocumentKind): boolean {
  const status = extraction.documents[kind].status;
  return status === 'success' || status === 'partial';
}

export function categoryScore(
  category: ScoredCategory,
  extraction: ApplicationExtraction,
  findings: readonly ValidationFinding[]
): number {
  const fallback = NO_DOCUMENT_SCORES[category];
  if (fallback && !yieldedFields(extraction, fallback.kind)) return fallback.score;

  const penalties = CATEGORY_PENALTIES[category];
  const penalty = findings
    .filter((f) => f.category === category)
    .reduce((total, f) => total + penalties[f.severity], 0);
  return roundTo(clamp01(1 - penalty), 4);
}

export function consistencyScore(findings: readonly ValidationFinding[]): number {
  const penalty = findings.reduce((total, f) => total + CONSISTENCY_PENALTIES[f.severity], 0);
  return roundTo(clamp01(1 - penalty), 4);
}

export function completenessScore(extraction: ApplicationExtraction): number {
  const score = DOCUMENT_KINDS
    .filter((kind) => yieldedFields(extraction, kind))
    .reduce((total, kind) => total + COMPLETENESS_WEIGHTS[kind], 0);
  return roundTo(clamp01(score), 4);
}

export function qualityScore(scores: CategoryScores): number {
  const score = SCORED_CATEGORIES.reduce((total, category) => total + QUALITY_WEIGHTS[category] * scores[category], 0);
  return roundTo(clamp01(score), 4);
}

export function deriveValidationStatus(findings: readonly ValidationFinding[], quality: number): ValidationStatus {
  const worst = maxSeverity(findings.map((f) => f.severity));
  if (worst === 'critical') return 'failed';
  if ((worst !== null && isAtLeast(worst, 'high')) || quality < QUALITY_REVIEW_THRESHOLD) return 'needs_review';
  if (findings.length > 0) return 'passed_with_warnings';
  return 'passed';
}

export function aggregateScores(
  extraction: ApplicationExtraction,
  findings: readonly ValidationFinding[]
): ValidationResult {
  const categoryScores: CategoryScores = {
    personal_info: categoryScore('personal_info', extraction, findings),
    employment: categoryScore('employment', extraction, findings),
    income: categoryScore('income', extraction, findings),
    assets: categoryScore('assets', extraction, findings),
    credit: categoryScore('credit', extraction, findings),
  };
  const quality = qualityScore(categoryScores);

  return {
    applicationId: extraction.applicationId,
    consistencyScore: consistencyScore(findings),
    completenessScore: completenessScore(extraction),
    qualityScore: quality,
    categoryScores,
    findings: [...findings],
    validationStatus: deriveValidationStatus(findings, quality),
    documentsReviewed: DOCUMENT_KINDS.length - extraction.missingDocuments.length,
  };
}
