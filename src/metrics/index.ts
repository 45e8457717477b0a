import { calculateChiSquare } from './chi-square.js'
import { calculateKs } from './ks.js'
import { calculatePsi } from './psi.js'
import type { MetricName, MetricOutcome, SampleInput } from '../types.js'

export { calculatePsi, computePsiBins, PSI_BIN_COUNT, PSI_EPSILON } from './psi.js'
export type { PsiBin } from './psi.js'
export { calculateKs } from './ks.js'
export { calculateChiSquare, buildContingencyTable } from './chi-square.js'
export { chiSquareSurvival, kolmogorovSurvival, lnGamma, regularizedGammaQ } from './special.js'

/** Runs the calculator for `metric` and tags the result with its name. */
export function computeMetric(metric: MetricName, reference: SampleInput, current: SampleInput): MetricOutcome {
  switch (metric) {
    case 'psi':
      return { metric, value: calculatePsi(reference, current) }
    case 'ks':
      return { metric, ...calculateKs(reference, current) }
    case 'chi_square':
      return { metric, ...calculateChiSquare(reference, current) }
  }
}
