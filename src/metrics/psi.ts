import { DriftValidationError } from '../errors.js'
import { requireNonEmpty, requireNumeric } from './guards.js'
import type { SampleInput } from '../types.js'

/** Number of equal-width bins laid over the reference range. */
export const PSI_BIN_COUNT = 10

/** Stand-in for an empty bin's proportion, keeping ln() finite. */
export const PSI_EPSILON = 1e-10

/** One histogram bin of the PSI computation. */
export interface PsiBin {
  /** Inclusive lower edge; -Infinity for the first bin. */
  readonly lower: number
  /** Exclusive upper edge; +Infinity (inclusive) for the last bin. */
  readonly upper: number
  readonly referenceProportion: number
  readonly currentProportion: number
  /** This bin's term of the PSI sum. */
  readonly contribution: number
}

/**
 * Bin edges over [min, max] of the reference sample, with the outer edges
 * opened to ±Infinity so every current value lands in some bin.
 */
function binEdges(reference: readonly number[]): number[] {
  let min = Infinity
  let max = -Infinity
  for (const v of reference) {
    if (v < min) min = v
    if (v > max) max = v
  }
  if (!Number.isFinite(min) || !Number.isFinite(max)) {
    throw new DriftValidationError('reference data must have a finite range')
  }
  const step = (max - min) / PSI_BIN_COUNT
  const edges: number[] = []
  for (let i = 0; i <= PSI_BIN_COUNT; i++) edges.push(min + i * step)
  edges[0] = -Infinity
  edges[PSI_BIN_COUNT] = Infinity
  return edges
}

/**
 * Counts values per bin. Bin i holds `edges[i] <= x < edges[i + 1]`; the last
 * bin is closed on the right. Coinciding edges give empty bins.
 */
function histogram(values: readonly number[], edges: readonly number[]): number[] {
  const counts = new Array<number>(PSI_BIN_COUNT).fill(0)
  for (const v of values) {
    for (let i = 0; i < PSI_BIN_COUNT; i++) {
      const lower = edges[i] ?? -Infinity
      const upper = edges[i + 1] ?? Infinity
      const isLast = i === PSI_BIN_COUNT - 1
      if (v >= lower && (v < upper || (isLast && v <= upper))) {
        counts[i] = (counts[i] ?? 0) + 1
        break
      }
    }
  }
  return counts
}

function proportions(counts: readonly number[], size: number): number[] {
  return counts.map((count) => {
    const p = count / size
    return p === 0 ? PSI_EPSILON : p
  })
}

/**
 * Per-bin breakdown of the Population Stability Index between two numerical
 * samples. The bins are fixed by the reference sample alone.
 *
 * @throws {DriftValidationError} if either sample is empty or contains NaN.
 * @throws {DriftTypeError} if either sample is categorical.
 */
export function computePsiBins(reference: SampleInput, current: SampleInput): readonly PsiBin[] {
  const ref = requireNonEmpty(reference, 'reference')
  const cur = requireNonEmpty(current, 'current')
  const refValues = requireNumeric(ref, 'reference', 'PSI').values
  const curValues = requireNumeric(cur, 'current', 'PSI').values

  const edges = binEdges(refValues)
  const refProps = proportions(histogram(refValues, edges), refValues.length)
  const curProps = proportions(histogram(curValues, edges), curValues.length)

  const bins: PsiBin[] = []
  for (let i = 0; i < PSI_BIN_COUNT; i++) {
    const r = refProps[i] ?? PSI_EPSILON
    const c = curProps[i] ?? PSI_EPSILON
    bins.push({
      lower: edges[i] ?? -Infinity,
      upper: edges[i + 1] ?? Infinity,
      referenceProportion: r,
      currentProportion: c,
      contribution: (c - r) * Math.log(c / r),
    })
  }
  return bins
}

/**
 * Population Stability Index:
 * Σ (current − reference) · ln(current / reference) over 10 reference bins.
 * Non-negative up to floating-point noise.
 *
 * @throws {DriftValidationError} if either sample is empty or contains NaN.
 * @throws {DriftTypeError} if either sample is categorical.
 */
export function calculatePsi(reference: SampleInput, current: SampleInput): number {
  let psi = 0
  for (const bin of computePsiBins(reference, current)) psi += bin.contribution
  return psi
}
