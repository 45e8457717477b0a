import { DriftValidationError } from '../errors.js'
import { fromColumns } from '../table.js'
import type { Column, Table } from '../table.js'
import type { Sample } from '../types.js'
import { readInputFile } from '../utils/fs.js'

export interface CsvOptions {
  /** Single-character field delimiter. @default ',' */
  readonly delimiter?: string
}

const INTEGER_RE = /^[+-]?\d+$/
const DECIMAL_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

// ---------------------------------------------------------------------------
// Record splitting
// ---------------------------------------------------------------------------

interface CsvRecord {
  readonly fields: readonly string[]
  /** 1-based line on which the record starts. */
  readonly line: number
}

/**
 * Splits CSV text into records. Quoted fields may contain the delimiter,
 * line breaks and `""` escapes. CRLF and LF are both accepted; blank lines
 * are skipped.
 */
function splitRecords(text: string, delimiter: string): CsvRecord[] {
  const records: CsvRecord[] = []
  let fields: string[] = []
  let field = ''
  let inQuotes = false
  let line = 1
  let recordLine = 1
  let sawContent = false

  const endRecord = (): void => {
    if (sawContent || fields.length > 0) {
      fields.push(field)
      records.push({ fields, line: recordLine })
    }
    fields = []
    field = ''
    sawContent = false
  }

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i)
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"'
          i++
        } else {
          inQuotes = false
        }
      } else {
        if (ch === '\n') line++
        field += ch
      }
      continue
    }

    if (ch === '"') {
      inQuotes = true
      sawContent = true
    } else if (ch === delimiter) {
      fields.push(field)
      field = ''
      sawContent = true
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++
      endRecord()
      line++
      recordLine = line
    } else {
      field += ch
      sawContent = true
    }
  }

  if (inQuotes) {
    throw new DriftValidationError(`unterminated quoted field starting on line ${recordLine}`)
  }
  endRecord()
  return records
}

// ---------------------------------------------------------------------------
// Column typing
// ---------------------------------------------------------------------------

/**
 * Types a column from its raw cells: all integer literals → `integer`, all
 * decimal literals → `float`, anything else keeps the cells as labels.
 *
 * Integers beyond the safe range stay labels so that distinct values remain
 * distinct. Empty cells in an otherwise numeric column read as NaN, which
 * makes the column `float`.
 */
export function inferColumnSample(cells: readonly string[]): Sample {
  const trimmed = cells.map((c) => c.trim())
  const present = trimmed.filter((c) => c !== '')
  if (present.length === 0) {
    return { kind: 'categorical', values: [...cells] }
  }
  if (present.length === trimmed.length && present.every((c) => INTEGER_RE.test(c))) {
    if (!present.every((c) => Number.isSafeInteger(Number(c)))) {
      return { kind: 'categorical', values: [...cells] }
    }
    return { kind: 'integer', values: present.map(Number) }
  }
  if (present.every((c) => DECIMAL_RE.test(c))) {
    return { kind: 'float', values: trimmed.map((c) => (c === '' ? Number.NaN : Number(c))) }
  }
  return { kind: 'categorical', values: [...cells] }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parses delimited text with a header row into a `Table`.
 *
 * @throws {DriftValidationError} for input without a header, a record whose
 *   field count differs from the header's, or an unterminated quote.
 */
export function parseCsv(text: string, options: CsvOptions = {}): Table {
  const delimiter = options.delimiter ?? ','
  if (delimiter.length !== 1 || delimiter === '"' || delimiter === '\n' || delimiter === '\r') {
    throw new DriftValidationError(`invalid delimiter: ${JSON.stringify(delimiter)}`)
  }

  const body = text.startsWith('\uFEFF') ? text.slice(1) : text
  const [header, ...rows] = splitRecords(body, delimiter)
  if (header === undefined) {
    throw new DriftValidationError('CSV input has no header row')
  }

  const names = header.fields.map((name) => name.trim())
  const cells: string[][] = names.map(() => [])
  for (const row of rows) {
    if (row.fields.length !== names.length) {
      throw new DriftValidationError(
        `line ${row.line}: expected ${names.length} fields, got ${row.fields.length}`
      )
    }
    row.fields.forEach((value, i) => cells[i]?.push(value))
  }

  const columns: Column[] = names.map((name, i) => ({
    name,
    sample: inferColumnSample(cells[i] ?? []),
  }))
  return fromColumns(columns)
}

/**
 * Reads a CSV file into a `Table`.
 *
 * @throws {DriftValidationError} if the file does not exist or cannot be parsed.
 */
export async function readTable(filePath: string, options: CsvOptions = {}): Promise<Table> {
  const text = await readInputFile(filePath, 'file')
  return parseCsv(text, options)
}
