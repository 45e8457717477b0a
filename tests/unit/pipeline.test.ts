import { describe, it, expect } from 'vitest'
import { runDriftPipeline } from '../../src/pipeline.js'
import { createTable } from '../../src/table.js'
import { parseCsv } from '../../src/io/csv.js'
import { DriftTypeError, DriftValidationError } from '../../src/errors.js'

const stable = createTable({ feature: [1, 2, 3, 4, 5] })
const shifted = createTable({ feature: [10, 20, 30, 40, 50] })

// ---------------------------------------------------------------------------
// Reports
// ---------------------------------------------------------------------------

describe('runDriftPipeline — PSI', () => {
  it('identical tables → no drift, no alerts', () => {
    expect(runDriftPipeline(stable, stable, { metric: 'psi', threshold: 0.5 })).toEqual({
      drift_detected: false,
      alerts: [],
      metrics: { psi: 0 },
      window: { reference_size: 5, current_size: 5 },
    })
  })

  it('shifted current → drift with one critical alert', () => {
    const report = runDriftPipeline(stable, shifted, { metric: 'psi', threshold: 0.01 })
    expect(report.drift_detected).toBe(true)
    expect(report.alerts).toHaveLength(1)
    expect(report.alerts[0]?.severity).toBe('critical')
    expect(report.alerts[0]?.metric).toBe('psi')
    expect(report.alerts[0]?.details['threshold']).toBe(0.01)
    expect(report.metrics).toHaveProperty('psi')
    if ('psi' in report.metrics) {
      expect(report.metrics.psi).toBeCloseTo(18.4207, 3)
    }
  })
})

describe('runDriftPipeline — KS', () => {
  it('statistic at exactly double the threshold → warning', () => {
    const report = runDriftPipeline(stable, shifted, { metric: 'ks', threshold: 0.5 })
    expect(report.drift_detected).toBe(true)
    expect(report.alerts[0]?.severity).toBe('warning')
    expect(report.metrics).toEqual({ ks: { statistic: 1, p_value: expect.closeTo(0.013476, 5) } })
  })
})

describe('runDriftPipeline — Chi-Square', () => {
  const reference = createTable({ color: ['a', 'b', 'c', 'a', 'b'] })
  const current = createTable({ color: ['a', 'b', 'c', 'c', 'b'] })

  it('similar label mix → no drift at 0.05', () => {
    const report = runDriftPipeline(reference, current, { metric: 'chi_square', threshold: 0.05 })
    expect(report.drift_detected).toBe(false)
    expect(report.alerts).toEqual([])
    expect(report.metrics).toEqual({
      chi_square: { statistic: expect.closeTo(2 / 3, 10), p_value: expect.closeTo(Math.exp(-1 / 3), 8) },
    })
  })

  it('float column → DriftTypeError', () => {
    const floats = createTable({ x: [1.5, 2.5] })
    expect(() => runDriftPipeline(floats, floats, { metric: 'chi_square', threshold: 0.05 })).toThrow(DriftTypeError)
  })

  it('featureType categorical re-labels a float column', () => {
    const report = runDriftPipeline(createTable({ x: [1.5, 2.5] }), createTable({ x: [1.5, 3.5] }), {
      metric: 'chi_square',
      threshold: 0.05,
      featureType: 'categorical',
    })
    expect(report.metrics).toEqual({
      chi_square: { statistic: expect.closeTo(2, 10), p_value: expect.closeTo(Math.exp(-1), 8) },
    })
  })
})

describe('runDriftPipeline — featureType', () => {
  it('categorical leaves numeric columns as loaded for PSI', () => {
    expect(runDriftPipeline(stable, stable, { metric: 'psi', threshold: 0.5, featureType: 'categorical' })).toEqual({
      drift_detected: false,
      alerts: [],
      metrics: { psi: 0 },
      window: { reference_size: 5, current_size: 5 },
    })
  })

  it('categorical leaves numeric columns as loaded for KS', () => {
    const report = runDriftPipeline(stable, shifted, { metric: 'ks', threshold: 0.5, featureType: 'categorical' })
    expect(report.metrics).toEqual({ ks: { statistic: 1, p_value: expect.closeTo(0.013476, 5) } })
  })
})

// ---------------------------------------------------------------------------
// CSV-loaded columns
// ---------------------------------------------------------------------------

describe('runDriftPipeline — columns read from CSV', () => {
  it('integers past 2^53 stay distinct Chi-Square labels', () => {
    const reference = parseCsv('id\n9007199254740993\n9007199254740993\n9007199254740993\n9007199254740993\n')
    const current = parseCsv('id\n9007199254740992\n9007199254740992\n9007199254740992\n9007199254740992\n')
    const report = runDriftPipeline(reference, current, { metric: 'chi_square', threshold: 0.05 })
    expect(report.drift_detected).toBe(true)
    expect(report.metrics).toEqual({
      chi_square: { statistic: expect.closeTo(4.5, 10), p_value: expect.closeTo(0.0338949, 6) },
    })
  })

  it('an empty cell in a numeric column → PSI rejects the NaN by side', () => {
    const reference = parseCsv('score\n1.5\n""\n2.5\n')
    expect(() => runDriftPipeline(reference, reference, { metric: 'psi', threshold: 0.1 })).toThrow(
      'reference data contains NaN'
    )
  })

  it('an empty cell in an integer column → Chi-Square rejects the float column', () => {
    const reference = parseCsv('bucket\n1\n""\n2\n')
    expect(() => runDriftPipeline(reference, reference, { metric: 'chi_square', threshold: 0.05 })).toThrow(
      DriftTypeError
    )
  })
})

// ---------------------------------------------------------------------------
// Feature selection
// ---------------------------------------------------------------------------

describe('runDriftPipeline — feature selection', () => {
  const reference = createTable({ id: [1, 2, 3, 4, 5], score: [1, 2, 3, 4, 5] })
  const current = createTable({ id: [1, 2, 3, 4, 5], score: [10, 20, 30, 40, 50] })

  it('defaults to the first column', () => {
    expect(runDriftPipeline(reference, current, { metric: 'psi', threshold: 0.1 }).drift_detected).toBe(false)
  })

  it('compares the named column', () => {
    expect(runDriftPipeline(reference, current, { metric: 'psi', threshold: 0.1, feature: 'score' }).drift_detected).toBe(
      true
    )
  })

  it('unknown feature → DriftValidationError', () => {
    expect(() => runDriftPipeline(reference, current, { metric: 'psi', threshold: 0.1, feature: 'nope' })).toThrow(
      'unknown feature "nope"'
    )
  })
})

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe('runDriftPipeline — validation', () => {
  const empty = createTable({ feature: [] })

  it('unsupported metric → DriftValidationError', () => {
    const run = () => runDriftPipeline(stable, stable, { metric: 'wasserstein', threshold: 0.1 })
    expect(run).toThrow(DriftValidationError)
    expect(run).toThrow('unsupported metric: wasserstein')
  })

  it('empty reference → DriftValidationError', () => {
    expect(() => runDriftPipeline(empty, stable, { metric: 'psi', threshold: 0.1 })).toThrow(
      'reference table cannot be empty'
    )
  })

  it('empty current → DriftValidationError', () => {
    expect(() => runDriftPipeline(stable, empty, { metric: 'psi', threshold: 0.1 })).toThrow(
      'current table cannot be empty'
    )
  })

  it('table without columns counts as empty', () => {
    expect(() => runDriftPipeline(createTable({}), stable, { metric: 'psi', threshold: 0.1 })).toThrow(
      'reference table cannot be empty'
    )
  })

  it('empty tables are reported before an unsupported metric', () => {
    expect(() => runDriftPipeline(empty, empty, { metric: 'nope', threshold: 0.1 })).toThrow(
      'reference table cannot be empty'
    )
  })

  it('non-positive threshold → DriftValidationError', () => {
    expect(() => runDriftPipeline(stable, shifted, { metric: 'ks', threshold: 0 })).toThrow(
      'threshold must be greater than 0'
    )
  })
})

describe('runDriftPipeline — purity', () => {
  it('same inputs → equal reports', () => {
    const options = { metric: 'ks', threshold: 0.3 }
    expect(runDriftPipeline(stable, shifted, options)).toEqual(runDriftPipeline(stable, shifted, options))
  })

  it('leaves the input tables untouched', () => {
    runDriftPipeline(stable, shifted, { metric: 'chi_square', threshold: 0.05, featureType: 'categorical' })
    expect(stable.columns[0]?.sample).toEqual({ kind: 'integer', values: [1, 2, 3, 4, 5] })
    expect(shifted.columns[0]?.sample.kind).toBe('integer')
  })
})
