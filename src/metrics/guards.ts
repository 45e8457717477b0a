import { DriftTypeError, DriftValidationError } from '../errors.js'
import { toSample } from '../table.js'
import type { NumericSample, Sample, SampleInput } from '../types.js'

/** Which side of the comparison a sample came from. Used in error messages. */
export type Side = 'reference' | 'current'

/**
 * Normalises `input` and rejects an empty sample.
 *
 * @throws {DriftValidationError} naming the empty side.
 */
export function requireNonEmpty(input: SampleInput, side: Side): Sample {
  const sample = toSample(input)
  if (sample.values.length === 0) {
    throw new DriftValidationError(`${side} data cannot be empty`)
  }
  return sample
}

/**
 * Narrows to a numerical sample free of NaN.
 *
 * @throws {DriftTypeError} for categorical data, prefixed with `testName`.
 * @throws {DriftValidationError} if any value is NaN.
 */
export function requireNumeric(sample: Sample, side: Side, testName: string): NumericSample {
  if (sample.kind === 'categorical') {
    throw new DriftTypeError(`${testName} requires numerical data, not categorical`)
  }
  if (sample.values.some((v) => Number.isNaN(v))) {
    throw new DriftValidationError(`${side} data contains NaN`)
  }
  return sample
}

/**
 * Rejects continuous (float) samples; integers and labels pass.
 *
 * @throws {DriftTypeError}
 */
export function requireDiscrete(sample: Sample, testName: string): Sample {
  if (sample.kind === 'float') {
    throw new DriftTypeError(`${testName} requires categorical data, not continuous numerical`)
  }
  return sample
}
