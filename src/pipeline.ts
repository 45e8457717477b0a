import { generateAlert } from './alerts.js'
import { detectDrift } from './detectors.js'
import { DriftValidationError } from './errors.js'
import { computeMetric } from './metrics/index.js'
import { asCategorical, getColumn } from './table.js'
import type { Table } from './table.js'
import { isMetricName } from './types.js'
import type { FeatureType, MetricOutcome, PipelineMetrics, PipelineReport, Sample } from './types.js'

/** Parameters of a single pipeline run. */
export interface DriftPipelineOptions {
  /** `psi`, `ks` or `chi_square`. Validated at run time. */
  readonly metric: string
  /** Drift threshold handed to the detector; must be > 0. */
  readonly threshold: number
  /**
   * `numerical` (default) compares the columns as loaded. `categorical`
   * re-labels numeric columns as string categories for Chi-Square; PSI and
   * KS always see the columns as loaded.
   */
  readonly featureType?: FeatureType
  /** Column to compare. Defaults to each table's first column. */
  readonly feature?: string
}

function toPipelineMetrics(outcome: MetricOutcome): PipelineMetrics {
  switch (outcome.metric) {
    case 'psi':
      return { psi: outcome.value }
    case 'ks':
      return { ks: { statistic: outcome.statistic, p_value: outcome.p_value } }
    case 'chi_square':
      return { chi_square: { statistic: outcome.statistic, p_value: outcome.p_value } }
  }
}

/**
 * Compares one feature of `referenceTable` against the same feature of
 * `currentTable`: metric → detector → alert, assembled into a report.
 *
 * Synchronous and pure. Any failure aborts the whole run; there is no
 * partial report.
 *
 * @throws {DriftValidationError} for an empty table, an unsupported metric,
 *   an unknown feature, or a non-positive threshold.
 * @throws {DriftTypeError} when the feature's data kind does not suit the metric.
 */
export function runDriftPipeline(
  referenceTable: Table,
  currentTable: Table,
  options: DriftPipelineOptions
): PipelineReport {
  if (referenceTable.rowCount === 0) {
    throw new DriftValidationError('reference table cannot be empty')
  }
  if (currentTable.rowCount === 0) {
    throw new DriftValidationError('current table cannot be empty')
  }

  const { metric, threshold, feature } = options
  if (!isMetricName(metric)) {
    throw new DriftValidationError(`unsupported metric: ${metric}`)
  }
  const relabel = options.featureType === 'categorical' && metric === 'chi_square'
  const prepare = (sample: Sample): Sample => (relabel ? asCategorical(sample) : sample)
  const reference = prepare(getColumn(referenceTable, feature).sample)
  const current = prepare(getColumn(currentTable, feature).sample)

  const outcome = computeMetric(metric, reference, current)
  const detection = detectDrift(outcome, threshold)
  const alert = generateAlert(detection)

  return {
    drift_detected: detection.drift_detected,
    alerts: alert === null ? [] : [alert],
    metrics: toPipelineMetrics(outcome),
    window: {
      reference_size: referenceTable.rowCount,
      current_size: currentTable.rowCount,
    },
  }
}
