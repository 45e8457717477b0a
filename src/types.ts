/**
 * Core types for drift detection.
 * All types are immutable (readonly where appropriate).
 *
 * Records, alerts and reports keep snake_case field names: they are the JSON
 * wire format printed by the CLI.
 */

// ---------------------------------------------------------------------------
// Samples
// ---------------------------------------------------------------------------

/** A single cell of a feature column. */
export type SampleValue = number | string

/**
 * Element kind of a sample. `integer` and `float` are numerical; `integer`
 * labels are also accepted as categories by the Chi-Square test.
 */
export type ValueKind = 'integer' | 'float' | 'categorical'

/** A numerical feature column. */
export interface NumericSample {
  readonly kind: 'integer' | 'float'
  readonly values: readonly number[]
}

/** A categorical feature column. Labels are compared by string equality. */
export interface CategoricalSample {
  readonly kind: 'categorical'
  readonly values: readonly string[]
}

/** A 1-D, kind-homogeneous sequence of values. */
export type Sample = NumericSample | CategoricalSample

/** Anything a metric calculator accepts: a typed sample or a raw array. */
export type SampleInput = Sample | readonly SampleValue[]

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

/**
 * All supported drift metrics as a const array: the single source of truth
 * for both the `MetricName` union and the `isMetricName` runtime guard.
 */
export const METRIC_NAMES = [
  'psi',        // Population Stability Index
  'ks',         // Two-sample Kolmogorov–Smirnov test
  'chi_square', // Chi-square test of independence
] as const

/** Name of a drift metric. */
export type MetricName = typeof METRIC_NAMES[number]

/** Returns true if `v` is a supported `MetricName`. */
export function isMetricName(v: unknown): v is MetricName {
  return typeof v === 'string' && (METRIC_NAMES as readonly string[]).includes(v)
}

/** How the compared feature should be interpreted. */
export const FEATURE_TYPES = ['numerical', 'categorical'] as const

export type FeatureType = typeof FEATURE_TYPES[number]

/** Returns true if `v` is a supported `FeatureType`. */
export function isFeatureType(v: unknown): v is FeatureType {
  return typeof v === 'string' && (FEATURE_TYPES as readonly string[]).includes(v)
}

/** Result of a hypothesis test (KS, Chi-Square). Both values lie in [0, 1] for KS. */
export interface TestResult {
  readonly statistic: number
  readonly p_value: number
}

/** A computed metric, tagged with the metric that produced it. */
export type MetricOutcome =
  | { readonly metric: 'psi'; readonly value: number }
  | { readonly metric: 'ks' } & TestResult
  | { readonly metric: 'chi_square' } & TestResult

// ---------------------------------------------------------------------------
// Detection records
// ---------------------------------------------------------------------------

export interface PsiDetection {
  readonly drift_detected: boolean
  readonly metric: 'psi'
  readonly value: number
  readonly threshold: number
}

export interface KsDetection {
  readonly drift_detected: boolean
  readonly metric: 'ks'
  readonly statistic: number
  readonly p_value: number
  readonly threshold: number
}

export interface ChiSquareDetection {
  readonly drift_detected: boolean
  readonly metric: 'chi_square'
  readonly statistic: number
  readonly p_value: number
  readonly threshold: number
}

/**
 * Output of a detector. `threshold` is always the exact value the detector
 * was called with.
 */
export type DetectionRecord = PsiDetection | KsDetection | ChiSquareDetection

// ---------------------------------------------------------------------------
// Alerts
// ---------------------------------------------------------------------------

/** Coarse classification of how far a detected drift exceeds its threshold. */
export type Severity = 'warning' | 'critical'

export interface Alert {
  readonly alert: true
  readonly severity: Severity
  readonly metric: string
  readonly message: string
  /** The detection record without `drift_detected`; every other key kept verbatim. */
  readonly details: Readonly<Record<string, unknown>>
}

// ---------------------------------------------------------------------------
// Pipeline report
// ---------------------------------------------------------------------------

/** The computed metric keyed by its name. Exactly one key is present. */
export type PipelineMetrics =
  | { readonly psi: number }
  | { readonly ks: TestResult }
  | { readonly chi_square: TestResult }

export interface WindowSizes {
  readonly reference_size: number
  readonly current_size: number
}

export interface PipelineReport {
  readonly drift_detected: boolean
  /** Zero or one alert. */
  readonly alerts: readonly Alert[]
  readonly metrics: PipelineMetrics
  readonly window: WindowSizes
}
