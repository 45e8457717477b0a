import { DriftValidationError } from './errors.js'
import { sliceRows } from './table.js'
import type { Table } from './table.js'

function assertPositiveInteger(label: string, size: number): void {
  if (!Number.isInteger(size)) {
    throw new DriftValidationError(`${label} must be an integer (got ${size})`)
  }
  if (size <= 0) {
    throw new DriftValidationError(`${label} must be greater than 0 (got ${size})`)
  }
}

function assertFits(label: string, size: number, dataSize: number): void {
  if (size > dataSize) {
    throw new DriftValidationError(`${label} (${size}) exceeds data size (${dataSize})`)
  }
}

/**
 * Splits one continuous table into a reference window (the first
 * `referenceSize` rows) and a current window (the last `currentSize` rows),
 * both in original row order.
 *
 * The windows may overlap: each size only has to fit the table on its own.
 *
 * @throws {DriftValidationError} if a size is not a positive integer or
 *   exceeds the table's row count.
 */
export function getWindows(
  table: Table,
  referenceSize: number,
  currentSize: number
): readonly [reference: Table, current: Table] {
  // Both sizes are checked for sign before either is checked against the table.
  assertPositiveInteger('reference_size', referenceSize)
  assertPositiveInteger('current_size', currentSize)
  assertFits('reference_size', referenceSize, table.rowCount)
  assertFits('current_size', currentSize, table.rowCount)

  return [
    sliceRows(table, 0, referenceSize),
    sliceRows(table, table.rowCount - currentSize, table.rowCount),
  ]
}
