import { DriftValidationError } from './errors.js'
import type { Sample, SampleInput, SampleValue } from './types.js'

// ---------------------------------------------------------------------------
// Samples
// ---------------------------------------------------------------------------

/**
 * Infers the kind of a raw array of values.
 *
 * All numbers → `integer` when every value is integral, else `float`.
 * Any string present → `categorical`, with numbers stringified.
 * An empty array is `categorical`.
 */
export function inferSample(values: readonly SampleValue[]): Sample {
  const numbers: number[] = []
  for (const v of values) {
    if (typeof v !== 'number') {
      return { kind: 'categorical', values: values.map((x) => String(x)) }
    }
    numbers.push(v)
  }
  if (numbers.length === 0) return { kind: 'categorical', values: [] }
  return {
    kind: numbers.every((n) => Number.isInteger(n)) ? 'integer' : 'float',
    values: numbers,
  }
}

/** Normalises calculator input: typed samples pass through, raw arrays are inferred. */
export function toSample(input: SampleInput): Sample {
  return 'kind' in input ? input : inferSample(input)
}

/** Re-labels a sample as categorical. Numbers become their string form. */
export function asCategorical(sample: Sample): Sample {
  if (sample.kind === 'categorical') return sample
  return { kind: 'categorical', values: sample.values.map((n) => String(n)) }
}

function sliceSample(sample: Sample, start: number, end: number): Sample {
  return sample.kind === 'categorical'
    ? { kind: 'categorical', values: sample.values.slice(start, end) }
    : { kind: sample.kind, values: sample.values.slice(start, end) }
}

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

/** One named feature column. */
export interface Column {
  readonly name: string
  readonly sample: Sample
}

/**
 * A read-only, column-oriented table. Every column holds exactly `rowCount`
 * values.
 */
export interface Table {
  readonly columns: readonly Column[]
  readonly rowCount: number
}

/**
 * Builds a table from named columns. Raw arrays have their kind inferred;
 * typed samples keep theirs. Column order follows the record's key order.
 *
 * @throws {DriftValidationError} if the columns differ in length.
 */
export function createTable(columns: Readonly<Record<string, SampleInput>>): Table {
  const built: Column[] = Object.entries(columns).map(([name, input]) => ({
    name,
    sample: toSample(input),
  }))
  return fromColumns(built)
}

/**
 * Builds a table from an ordered list of columns.
 *
 * @throws {DriftValidationError} if the columns differ in length.
 */
export function fromColumns(columns: readonly Column[]): Table {
  const first = columns[0]
  const rowCount = first === undefined ? 0 : first.sample.values.length
  for (const column of columns) {
    if (column.sample.values.length !== rowCount) {
      throw new DriftValidationError(
        `column "${column.name}" has ${column.sample.values.length} rows, expected ${rowCount}`
      )
    }
  }
  return { columns, rowCount }
}

/**
 * Returns rows `[start, end)` of every column, keeping each column's kind.
 * Bounds follow `Array.prototype.slice`.
 */
export function sliceRows(table: Table, start: number, end?: number): Table {
  const stop = end ?? table.rowCount
  const columns = table.columns.map((column) => ({
    name: column.name,
    sample: sliceSample(column.sample, start, stop),
  }))
  return fromColumns(columns)
}

/**
 * Returns the named column, or the first column when no name is given.
 *
 * @throws {DriftValidationError} if the table has no columns or no column
 *   with that name.
 */
export function getColumn(table: Table, name?: string): Column {
  if (name === undefined) {
    const first = table.columns[0]
    if (first === undefined) throw new DriftValidationError('table has no columns')
    return first
  }
  const column = table.columns.find((c) => c.name === name)
  if (column === undefined) {
    const known = table.columns.map((c) => c.name).join(', ')
    throw new DriftValidationError(`unknown feature "${name}" (columns: ${known})`)
  }
  return column
}
