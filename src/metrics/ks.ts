import { requireNonEmpty, requireNumeric } from './guards.js'
import { kolmogorovSurvival } from './special.js'
import type { SampleInput, TestResult } from '../types.js'

/**
 * Largest vertical gap between the empirical CDFs of two sorted samples.
 * Both CDFs are right-continuous, so ties are stepped over together.
 */
function maxCdfGap(a: readonly number[], b: readonly number[]): number {
  let i = 0
  let j = 0
  let gap = 0
  while (i < a.length && j < b.length) {
    const x = Math.min(a[i] ?? Infinity, b[j] ?? Infinity)
    while (i < a.length && a[i] === x) i++
    while (j < b.length && b[j] === x) j++
    gap = Math.max(gap, Math.abs(i / a.length - j / b.length))
  }
  return gap
}

/**
 * Two-sample Kolmogorov–Smirnov test.
 *
 * `statistic` is the maximum absolute difference between the two empirical
 * CDFs; `p_value` is the asymptotic two-sided p-value from the Kolmogorov
 * distribution at √(n·m / (n + m)) · statistic.
 *
 * @throws {DriftValidationError} if either sample is empty or contains NaN.
 * @throws {DriftTypeError} if either sample is categorical.
 */
export function calculateKs(reference: SampleInput, current: SampleInput): TestResult {
  const ref = requireNonEmpty(reference, 'reference')
  const cur = requireNonEmpty(current, 'current')
  const a = [...requireNumeric(ref, 'reference', 'KS test').values].sort((x, y) => x - y)
  const b = [...requireNumeric(cur, 'current', 'KS test').values].sort((x, y) => x - y)

  const statistic = maxCdfGap(a, b)
  const effectiveSize = (a.length * b.length) / (a.length + b.length)
  const p_value = kolmogorovSurvival(Math.sqrt(effectiveSize) * statistic)
  return { statistic, p_value }
}
