import { describe, it, expect } from 'vitest'
import { getWindows } from '../../src/windows.js'
import { createTable } from '../../src/table.js'
import { DriftValidationError } from '../../src/errors.js'

const table = createTable({
  value: [1, 2, 3, 4, 5],
  label: ['a', 'b', 'c', 'd', 'e'],
})

describe('getWindows — slicing', () => {
  it('reference is the first n rows, current the last m rows', () => {
    const [reference, current] = getWindows(table, 2, 3)
    expect(reference.rowCount).toBe(2)
    expect(current.rowCount).toBe(3)
    expect(reference.columns[0]?.sample.values).toEqual([1, 2])
    expect(current.columns[0]?.sample.values).toEqual([3, 4, 5])
  })

  it('keeps every column and their names', () => {
    const [reference, current] = getWindows(table, 1, 1)
    expect(reference.columns.map((c) => c.name)).toEqual(['value', 'label'])
    expect(current.columns[1]?.sample.values).toEqual(['e'])
  })

  it('windows may overlap', () => {
    const [reference, current] = getWindows(table, 4, 4)
    expect(reference.columns[0]?.sample.values).toEqual([1, 2, 3, 4])
    expect(current.columns[0]?.sample.values).toEqual([2, 3, 4, 5])
  })

  it('a size equal to the row count takes the whole table', () => {
    const [reference, current] = getWindows(table, 5, 5)
    expect(reference.rowCount).toBe(5)
    expect(current.rowCount).toBe(5)
  })

  it('leaves the input table untouched', () => {
    getWindows(table, 2, 2)
    expect(table.rowCount).toBe(5)
    expect(table.columns[0]?.sample.values).toEqual([1, 2, 3, 4, 5])
  })
})

describe('getWindows — validation', () => {
  it('reference_size 0 → DriftValidationError', () => {
    const run = () => getWindows(table, 0, 2)
    expect(run).toThrow(DriftValidationError)
    expect(run).toThrow('reference_size must be greater than 0 (got 0)')
  })

  it('negative current_size → DriftValidationError', () => {
    expect(() => getWindows(table, 2, -1)).toThrow('current_size must be greater than 0 (got -1)')
  })

  it('reference_size larger than the table → DriftValidationError', () => {
    expect(() => getWindows(table, 6, 2)).toThrow('reference_size (6) exceeds data size (5)')
  })

  it('current_size larger than the table → DriftValidationError', () => {
    expect(() => getWindows(table, 2, 10)).toThrow('current_size (10) exceeds data size (5)')
  })

  it('non-positive current_size is reported before an oversized reference_size', () => {
    expect(() => getWindows(table, 10, 0)).toThrow('current_size must be greater than 0 (got 0)')
  })

  it('fractional size → DriftValidationError', () => {
    expect(() => getWindows(table, 1.5, 2)).toThrow('reference_size must be an integer (got 1.5)')
  })

  it('reference is checked before current', () => {
    expect(() => getWindows(table, 0, 0)).toThrow('reference_size')
  })
})
