import { DriftTypeError, DriftValidationError } from './errors.js'
import type { Alert, Severity } from './types.js'

// ---------------------------------------------------------------------------
// Severity
// ---------------------------------------------------------------------------

/**
 * Where the number compared against the threshold comes from.
 *
 * - `value`: PSI records.
 * - `statistic`: KS and Chi-Square records.
 * - `zero-fallback`: records carrying neither (e.g. only a `p_value`). These
 *   are classified as if the value were 0, so they always come out as
 *   `warning` for a non-negative threshold.
 */
export type SeveritySource =
  | { readonly kind: 'value'; readonly value: number }
  | { readonly kind: 'statistic'; readonly value: number }
  | { readonly kind: 'zero-fallback'; readonly value: 0 }

/**
 * `warning` while `value <= 2 * threshold`, `critical` above it.
 * The boundary itself is a warning.
 */
export function classifySeverity(value: number, threshold: number): Severity {
  return value <= 2 * threshold ? 'warning' : 'critical'
}

function readNumber(record: Readonly<Record<string, unknown>>, key: string): number | undefined {
  if (!(key in record)) return undefined
  const v = record[key]
  if (typeof v !== 'number') {
    throw new DriftTypeError(`${key} must be a number`)
  }
  return v
}

/**
 * Picks the severity value of a detection record: `value` first, then
 * `statistic`, then the explicit zero fallback.
 *
 * @throws {DriftTypeError} if the chosen key holds a non-number.
 */
export function resolveSeveritySource(record: Readonly<Record<string, unknown>>): SeveritySource {
  const value = readNumber(record, 'value')
  if (value !== undefined) return { kind: 'value', value }
  const statistic = readNumber(record, 'statistic')
  if (statistic !== undefined) return { kind: 'statistic', value: statistic }
  return { kind: 'zero-fallback', value: 0 }
}

// ---------------------------------------------------------------------------
// generateAlert
// ---------------------------------------------------------------------------

function isPlainRecord(v: unknown): v is Readonly<Record<string, unknown>> {
  return v !== null && typeof v === 'object' && !Array.isArray(v)
}

/**
 * Turns a detection record into an alert, or `null` when no drift was
 * detected.
 *
 * Accepts any key/value record so that records carrying extra diagnostic
 * fields pass through into `details` untouched. `threshold` defaults to 0
 * when absent.
 *
 * @throws {DriftTypeError} if `record` is not a key/value object, or a field
 *   has the wrong type.
 * @throws {DriftValidationError} if `drift_detected` or `metric` is missing.
 */
export function generateAlert(record: unknown): Alert | null {
  if (!isPlainRecord(record)) {
    throw new DriftTypeError('detection record must be an object')
  }
  if (!('drift_detected' in record)) {
    throw new DriftValidationError('drift_detected key is required')
  }
  if (!('metric' in record)) {
    throw new DriftValidationError('metric key is required')
  }

  const driftDetected = record['drift_detected']
  if (typeof driftDetected !== 'boolean') {
    throw new DriftTypeError('drift_detected must be a boolean')
  }
  if (!driftDetected) return null

  const metric = record['metric']
  if (typeof metric !== 'string') {
    throw new DriftTypeError('metric must be a string')
  }

  const source = resolveSeveritySource(record)
  const threshold = readNumber(record, 'threshold') ?? 0

  const { drift_detected: _omitted, ...details } = record
  return {
    alert: true,
    severity: classifySeverity(source.value, threshold),
    metric,
    message: `Drift detected using ${metric} metric`,
    details,
  }
}
