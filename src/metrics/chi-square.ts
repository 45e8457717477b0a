import { requireDiscrete, requireNonEmpty } from './guards.js'
import { chiSquareSurvival } from './special.js'
import type { Sample, SampleInput, TestResult } from '../types.js'

/** Occurrence count per label, keyed by the label's string form. */
function countLabels(sample: Sample): Map<string, number> {
  const counts = new Map<string, number>()
  for (const v of sample.values) {
    const label = String(v)
    counts.set(label, (counts.get(label) ?? 0) + 1)
  }
  return counts
}

/**
 * Builds the 2×k contingency table (rows: reference, current; columns: the
 * union of labels in sorted order).
 */
export function buildContingencyTable(
  reference: SampleInput,
  current: SampleInput
): { readonly categories: readonly string[]; readonly observed: readonly [readonly number[], readonly number[]] } {
  const refCounts = countLabels(requireDiscrete(requireNonEmpty(reference, 'reference'), 'Chi-Square test'))
  const curCounts = countLabels(requireDiscrete(requireNonEmpty(current, 'current'), 'Chi-Square test'))
  const categories = [...new Set([...refCounts.keys(), ...curCounts.keys()])].sort()
  return {
    categories,
    observed: [
      categories.map((c) => refCounts.get(c) ?? 0),
      categories.map((c) => curCounts.get(c) ?? 0),
    ],
  }
}

/**
 * Chi-square test of independence on the reference/current label counts.
 *
 * Degrees of freedom are k − 1 for k distinct labels. A single label gives
 * `{ statistic: 0, p_value: 1 }`. With one degree of freedom the Yates
 * continuity correction is applied: each observed count moves toward its
 * expected count by at most 0.5.
 *
 * @throws {DriftValidationError} if either sample is empty.
 * @throws {DriftTypeError} if either sample is continuous (float).
 */
export function calculateChiSquare(reference: SampleInput, current: SampleInput): TestResult {
  // Check emptiness of both sides before either side's kind.
  requireNonEmpty(reference, 'reference')
  requireNonEmpty(current, 'current')
  const { categories, observed } = buildContingencyTable(reference, current)

  const dof = categories.length - 1
  if (dof === 0) return { statistic: 0, p_value: 1 }

  const rowTotals = observed.map((row) => row.reduce((s, n) => s + n, 0))
  const colTotals = categories.map((_, k) => (observed[0][k] ?? 0) + (observed[1][k] ?? 0))
  const total = (rowTotals[0] ?? 0) + (rowTotals[1] ?? 0)

  let statistic = 0
  observed.forEach((row, r) => {
    row.forEach((count, k) => {
      const expected = ((rowTotals[r] ?? 0) * (colTotals[k] ?? 0)) / total
      let o = count
      if (dof === 1) {
        const diff = expected - o
        o += Math.sign(diff) * Math.min(0.5, Math.abs(diff))
      }
      statistic += (o - expected) ** 2 / expected
    })
  })

  return { statistic, p_value: chiSquareSurvival(statistic, dof) }
}
