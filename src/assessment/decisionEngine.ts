/**
 * Decision Engine
 *
 * Fuses three signals into APPROVE / DENY / NEEDS_REVIEW:
 * - validation score (quality, consistency, completeness)
 * - approval confidence from a pluggable ConfidenceModel
 * - business-rule score (hard thresholds, each a penalty)
 *
 * Branches are evaluated in a fixed order and the first match wins.
 */

import { createContextLogger } from '../utils/logger.js';
import { FeatureWeightApproximation, type ConfidenceModel } from './confidenceModel.js';
import type { Severity } from './severity.js';
import type {
  ConfidenceLevel,
  CriticalFlag,
  DecisionFinding,
  DecisionResult,
  DecisionScore,
  DecisionSummary,
  FinalDecision,
} from './types.js';
import type { ValidationSummary } from './validationSummary.js';
import { clamp01, roundTo } from './validators.js';

export const REQUIRED_DOCUMENT_COUNT = 6;
export const INCOME_STABILITY_THRESHOLD = 0.7;

const QUALITY_MINIMUM = 0.7;
const QUALITY_PREFERRED = 0.85;

const VALIDATION_WEIGHTS = { quality: 0.4, consistency: 0.35, completeness: 0.25 } as const;
const COMBINED_WEIGHTS = { validation: 0.4, ml: 0.35, rules: 0.25 } as const;

export const NOT_FOUND_RATIONALE = 'Application not found in validation results';

export interface BusinessRuleEvaluation {
  score: number;
  findings: DecisionFinding[];
}

function ruleFinding(severity: Severity, message: string, weight: number): DecisionFinding {
  return { category: 'business_rule', severity, message, weight };
}

export function evaluateBusinessRules(summary: ValidationSummary): BusinessRuleEvaluation {
  const findings: DecisionFinding[] = [];
  const quality = summary.quality_score;

  if (quality < QUALITY_MINIMUM) {
    findings.push(ruleFinding('critical', `Quality score ${quality.toFixed(2)} below minimum threshold 0.70`, 0.3));
  } else if (quality < QUALITY_PREFERRED) {
    findings.push(ruleFinding('high', `Quality score ${quality.toFixed(2)} below preferred threshold 0.85`, 0.15));
  }

  // Only a present but weak income score counts; a zero means no bank statement.
  const income = summary.category_scores.income;
  if (income > 0 && income < INCOME_STABILITY_THRESHOLD) {
    findings.push(ruleFinding('high', `Income stability ${income.toFixed(2)} below threshold ${INCOME_STABILITY_THRESHOLD}`, 0.2));
  }

  const debtFinding = summary.findings.find((f) => {
    const message = f.message.toLowerCase();
    return message.includes('debt') && message.includes('burden');
  });
  if (debtFinding) {
    findings.push(ruleFinding('high', `Critical debt burden detected: ${debtFinding.message}`, 0.25));
  }

  if (summary.documents_reviewed < REQUIRED_DOCUMENT_COUNT) {
    findings.push(ruleFinding(
      'medium',
      `Incomplete documentation: ${summary.documents_reviewed}/${REQUIRED_DOCUMENT_COUNT} documents reviewed`,
      0.1
    ));
  }

  const penalty = findings.reduce((total, f) => total + f.weight, 0);
  return { score: roundTo(Math.max(0, 1 - penalty), 4), findings };
}

export function validationScore(summary: ValidationSummary): number {
  return clamp01(
    summary.quality_score * VALIDATION_WEIGHTS.quality +
    summary.consistency_score * VALIDATION_WEIGHTS.consistency +
    summary.completeness_score * VALIDATION_WEIGHTS.completeness
  );
}

export function notFoundDecision(applicationId: string): DecisionResult {
  return {
    applicationId,
    finalDecision: 'NEEDS_REVIEW',
    decisionScores: { validationScore: 0, mlConfidence: 0, businessRuleScore: 0, combinedScore: 0, approvalLikelihood: 0 },
    findings: [],
    rationale: NOT_FOUND_RATIONALE,
    confidenceLevel: 'MEDIUM',
    appealsEligible: false,
    recommendedActions: [],
    criticalFlags: [],
    mlPredictionClass: -1,
    mlPredictionProbability: 0,
    validationStatus: 'UNKNOWN',
  };
}

interface Outcome {
  finalDecision: FinalDecision;
  confidenceLevel: ConfidenceLevel;
  appealsEligible: boolean;
  finding: DecisionFinding;
  recommendedActions: string[];
  criticalFlags: CriticalFlag[];
}

function decisionFinding(severity: Severity, message: string, weight = 1.0): DecisionFinding {
  return { category: 'decision', severity, message, weight };
}

function chooseOutcome(summary: ValidationSummary, scores: DecisionScore): Outcome {
  const { validationScore: validation, mlConfidence: ml, businessRuleScore: rules, combinedScore: combined } = scores;
  const quality = summary.quality_score;
  const consistency = summary.consistency_score;

  if (validation >= 0.9 && ml >= 0.7 && rules >= 0.9) {
    return {
      finalDecision: 'APPROVE',
      confidenceLevel: 'HIGH',
      appealsEligible: false,
      finding: decisionFinding('info', `Strong approval: validation ${validation.toFixed(2)} + ML ${ml.toFixed(2)} + rules ${rules.toFixed(2)}`),
      recommendedActions: [],
      criticalFlags: [],
    };
  }

  if (validation >= 0.85 && ml >= 0.65 && rules >= 0.85) {
    return {
      finalDecision: 'APPROVE',
      confidenceLevel: 'HIGH',
      appealsEligible: false,
      finding: decisionFinding('info', `Approved: validation ${validation.toFixed(2)} + ML ${ml.toFixed(2)} + rules ${rules.toFixed(2)}`),
      recommendedActions: [],
      criticalFlags: [],
    };
  }

  if (validation >= 0.8 && rules >= 0.75) {
    return {
      finalDecision: 'APPROVE',
      confidenceLevel: 'MEDIUM',
      appealsEligible: false,
      finding: decisionFinding('info', `Conditional approval: validation ${validation.toFixed(2)} with minor flags`),
      recommendedActions: rules < 0.85 ? ['Verify employment letter within 30 days'] : [],
      criticalFlags: [],
    };
  }

  if (rules < 0.6) {
    return {
      finalDecision: 'DENY',
      confidenceLevel: 'HIGH',
      appealsEligible: true,
      finding: decisionFinding('critical', `Business rule violations: rule score ${rules.toFixed(2)}`),
      recommendedActions: [],
      criticalFlags: ['FAILED_BUSINESS_RULES'],
    };
  }

  if (quality < 0.6 && consistency < 0.6) {
    return {
      finalDecision: 'DENY',
      confidenceLevel: 'HIGH',
      appealsEligible: true,
      finding: decisionFinding('critical', `Insufficient data quality: quality ${quality.toFixed(2)}, consistency ${consistency.toFixed(2)}`),
      recommendedActions: [],
      criticalFlags: ['INSUFFICIENT_DATA_QUALITY'],
    };
  }

  const recommendedActions = ['Escalate to human reviewer for additional verification'];
  if (rules < 0.85) recommendedActions.push('Address business rule gaps before re-submission');
  if (validation < 0.85) recommendedActions.push(`Improve data quality metrics (current: ${validation.toFixed(2)})`);
  return {
    finalDecision: 'NEEDS_REVIEW',
    confidenceLevel: combined >= 0.6 ? 'MEDIUM' : 'LOW',
    appealsEligible: true,
    finding: decisionFinding('info', `Manual review required: combined score ${combined.toFixed(2)} (borderline)`, 0.5),
    recommendedActions,
    criticalFlags: [],
  };
}

/**
 * Decides one application from its validation summary.
 */
export function decideFromSummary(summary: ValidationSummary, model: ConfidenceModel): DecisionResult {
  const validation = validationScore(summary);
  const prediction = model.predict(summary);
  const ml = clamp01(prediction.probability);
  const rules = evaluateBusinessRules(summary);
  const combined = clamp01(
    validation * COMBINED_WEIGHTS.validation + ml * COMBINED_WEIGHTS.ml + rules.score * COMBINED_WEIGHTS.rules
  );

  const decisionScores: DecisionScore = {
    validationScore: validation,
    mlConfidence: ml,
    businessRuleScore: rules.score,
    combinedScore: combined,
    approvalLikelihood: Math.max(combined, ml),
  };
  const outcome = chooseOutcome(summary, decisionScores);

  return {
    applicationId: summary.application_id,
    finalDecision: outcome.finalDecision,
    decisionScores,
    findings: [outcome.finding, ...rules.findings],
    rationale:
      `Decision based on validation quality (${summary.quality_score.toFixed(2)}), ` +
      `ML confidence (${ml.toFixed(2)}), and business rule compliance (${rules.score.toFixed(2)}). ` +
      `Combined eligibility score: ${combined.toFixed(2)}`,
    confidenceLevel: outcome.confidenceLevel,
    appealsEligible: outcome.appealsEligible,
    recommendedActions: outcome.recommendedActions,
    criticalFlags: outcome.criticalFlags,
    mlPredictionClass: prediction.predictedClass,
    mlPredictionProbability: ml,
    validationStatus: summary.validation_status ?? 'UNKNOWN',
  };
}

function percentage(count: number, total: number): number {
  return total === 0 ? 0 : roundTo((count / total) * 100, 2);
}

function average(values: readonly number[]): number {
  return values.length === 0 ? 0 : roundTo(values.reduce((total, v) => total + v, 0) / values.length, 4);
}

export function summarizeDecisions(decisions: readonly DecisionResult[]): DecisionSummary {
  const total = decisions.length;
  const count = (decision: FinalDecision) => decisions.filter((d) => d.finalDecision === decision).length;
  const confidence = (level: ConfidenceLevel) => decisions.filter((d) => d.confidenceLevel === level).length;

  return {
    totalApplications: total,
    decisions: {
      APPROVE: { count: count('APPROVE'), percentage: percentage(count('APPROVE'), total) },
      DENY: { count: count('DENY'), percentage: percentage(count('DENY'), total) },
      NEEDS_REVIEW: { count: count('NEEDS_REVIEW'), percentage: percentage(count('NEEDS_REVIEW'), total) },
    },
    confidenceDistribution: {
      HIGH: confidence('HIGH'),
      MEDIUM: confidence('MEDIUM'),
      LOW: confidence('LOW'),
    },
    averageScores: {
      validationScore: average(decisions.map((d) => d.decisionScores.validationScore)),
      mlConfidence: average(decisions.map((d) => d.decisionScores.mlConfidence)),
      combinedScore: average(decisions.map((d) => d.decisionScores.combinedScore)),
    },
    appealsEligible: decisions.filter((d) => d.appealsEligible).length,
  };
}

/**
 * Decides applications against a read-only table of validation summaries.
 */
export class DecisionEngine {
  private readonly log = createContextLogger({});

  constructor(
    private readonly summaries: ReadonlyMap<string, ValidationSummary>,
    private readonly model: ConfidenceModel = new FeatureWeightApproximation()
  ) {}

  decide(applicationId: string): DecisionResult {
    const summary = this.summaries.get(applicationId);
    if (!summary) {
      this.log.warn({ event: 'decision_input_missing', applicationId }, 'No validation result for application');
      return notFoundDecision(applicationId);
    }

    const decision = decideFromSummary(summary, this.model);
    this.log.info(
      {
        event: 'decision_made',
        applicationId,
        model: this.model.name,
        decision: decision.finalDecision,
        combinedScore: roundTo(decision.decisionScores.combinedScore, 4),
      },
      'Application decided'
    );
    return decision;
  }

  /**
   * Decides the given ids, or every known id, in sorted order.
   */
  decideBatch(applicationIds?: readonly string[]): DecisionResult[] {
    const ids = [...(applicationIds ?? this.summaries.keys())].sort();
    return ids.map((id) => this.decide(id));
  }
}
