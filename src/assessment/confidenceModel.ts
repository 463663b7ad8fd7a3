/**
 * Approval confidence models.
 *
 * The decision engine only sees the `ConfidenceModel` interface, so a trained
 * classifier can replace the linear approximation without touching the rules.
 */

import type { ValidationSummary } from './validationSummary.js';
import { clamp01 } from './validators.js';

export interface ConfidencePrediction {
  /** 1 = likely approval, 0 = likely rejection. */
  predictedClass: 0 | 1;
  probability: number;
}

export interface ConfidenceModel {
  readonly name: string;
  predict(summary: ValidationSummary): ConfidencePrediction;
}

/** Feature weights of the offline classifier, by importance. */
export const FEATURE_WEIGHTS = {
  quality: 0.2553,
  consistency: 0.1489,
  assets: 0.1277,
  categoryVariance: 0.1277,
  minCategoryScore: 0.1064,
  completeness: 0.0638,
  income: 0.0638,
  employment: 0.0364,
} as const;

export const APPROVAL_CLASS_THRESHOLD = 0.5;

/**
 * Population variance; 0 for fewer than two values.
 */
export function populationVariance(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const mean = values.reduce((total, v) => total + v, 0) / values.length;
  return values.reduce((total, v) => total + (v - mean) ** 2, 0) / values.length;
}

/**
 * Linear stand-in for the offline classifier, weighted by its feature importances.
 */
export class FeatureWeightApproximation implements ConfidenceModel {
  readonly name = 'feature-weight-approximation';

  predict(summary: ValidationSummary): ConfidencePrediction {
    const quality = summary.quality_score;
    const consistency = summary.consistency_score;
    const completeness = summary.completeness_score;
    const { assets, employment, income } = summary.category_scores;

    const positive = [quality, consistency, completeness, assets, employment, income].filter((v) => v > 0);
    const categoryVariance = populationVariance(positive);
    const minCategoryScore = positive.length > 0 ? Math.min(...positive) : 0;

    const probability = clamp01(
      quality * FEATURE_WEIGHTS.quality +
      consistency * FEATURE_WEIGHTS.consistency +
      assets * FEATURE_WEIGHTS.assets +
      categoryVariance * FEATURE_WEIGHTS.categoryVariance +
      minCategoryScore * FEATURE_WEIGHTS.minCategoryScore +
      completeness * FEATURE_WEIGHTS.completeness +
      income * FEATURE_WEIGHTS.income +
      employment * FEATURE_WEIGHTS.employment
    );

    return {
      predictedClass: probability >= APPROVAL_CLASS_THRESHOLD ? 1 : 0,
      probability,
    };
  }
}
