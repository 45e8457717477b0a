import { DriftValidationError } from './errors.js'
import type {
  ChiSquareDetection,
  DetectionRecord,
  KsDetection,
  MetricOutcome,
  PsiDetection,
} from './types.js'

function assertPositiveThreshold(threshold: number): void {
  // Written as a negated comparison so NaN is rejected too.
  if (!(threshold > 0)) {
    throw new DriftValidationError('threshold must be greater than 0')
  }
}

/**
 * PSI detector: drift when the index is strictly above `threshold`.
 *
 * @throws {DriftValidationError} if `threshold <= 0`.
 */
export function detectPsiDrift(psiValue: number, threshold: number): PsiDetection {
  assertPositiveThreshold(threshold)
  return {
    drift_detected: psiValue > threshold,
    metric: 'psi',
    value: psiValue,
    threshold,
  }
}

/**
 * KS detector: drift when the statistic is strictly above `threshold`.
 * The p-value is carried through but not used for the decision.
 *
 * @throws {DriftValidationError} if `threshold <= 0`.
 */
export function detectKsDrift(statistic: number, pValue: number, threshold: number): KsDetection {
  assertPositiveThreshold(threshold)
  return {
    drift_detected: statistic > threshold,
    metric: 'ks',
    statistic,
    p_value: pValue,
    threshold,
  }
}

/**
 * Chi-Square detector: drift when the p-value is strictly below `threshold`
 * (a significance level).
 *
 * @throws {DriftValidationError} if `threshold <= 0`.
 */
export function detectChiSquareDrift(statistic: number, pValue: number, threshold: number): ChiSquareDetection {
  assertPositiveThreshold(threshold)
  return {
    drift_detected: pValue < threshold,
    metric: 'chi_square',
    statistic,
    p_value: pValue,
    threshold,
  }
}

/** Routes a computed metric to its detector. */
export function detectDrift(outcome: MetricOutcome, threshold: number): DetectionRecord {
  switch (outcome.metric) {
    case 'psi':
      return detectPsiDrift(outcome.value, threshold)
    case 'ks':
      return detectKsDrift(outcome.statistic, outcome.p_value, threshold)
    case 'chi_square':
      return detectChiSquareDrift(outcome.statistic, outcome.p_value, threshold)
  }
}
