import { describe, it, expect } from 'vitest'
import { calculatePsi, computePsiBins, PSI_BIN_COUNT, PSI_EPSILON } from '../../../src/metrics/psi.js'
import { DriftTypeError, DriftValidationError } from '../../../src/errors.js'

describe('calculatePsi — values', () => {
  it('identical samples → 0', () => {
    expect(calculatePsi([1, 2, 3, 4, 5], [1, 2, 3, 4, 5])).toBe(0)
  })

  it('current entirely above the reference range → large index', () => {
    // Reference fills bins 0, 2, 5, 7, 9 at 0.2 each; current lands in bin 9.
    expect(calculatePsi([1, 2, 3, 4, 5], [10, 20, 30, 40, 50])).toBeCloseTo(18.4207, 3)
  })

  it('constant reference → only the outer bins hold data', () => {
    expect(calculatePsi([3, 3], [1, 5])).toBeCloseTo(11.5129, 3)
  })

  it('constant reference compared with itself → 0', () => {
    expect(calculatePsi([3, 3, 3], [3, 3, 3])).toBe(0)
  })

  it('is non-negative for a moderate shift', () => {
    expect(calculatePsi([1, 2, 3, 4, 5, 6, 7, 8], [2, 3, 4, 5, 6, 7, 8, 9])).toBeGreaterThanOrEqual(0)
  })

  it('is deterministic', () => {
    const ref = [0.1, 0.4, 0.35, 0.8, 0.9, 0.2]
    const cur = [0.5, 0.45, 0.6, 0.95, 0.3, 0.7]
    expect(calculatePsi(ref, cur)).toBe(calculatePsi(ref, cur))
  })

  it('accepts a typed float sample', () => {
    expect(calculatePsi({ kind: 'float', values: [0.5, 1.5] }, { kind: 'float', values: [0.5, 1.5] })).toBe(0)
  })
})

describe('calculatePsi — errors', () => {
  it('empty reference → DriftValidationError', () => {
    const run = () => calculatePsi([], [1, 2])
    expect(run).toThrow(DriftValidationError)
    expect(run).toThrow('reference data cannot be empty')
  })

  it('empty current → DriftValidationError', () => {
    expect(() => calculatePsi([1, 2], [])).toThrow('current data cannot be empty')
  })

  it('categorical data → DriftTypeError', () => {
    const run = () => calculatePsi(['a', 'b'], ['a', 'b'])
    expect(run).toThrow(DriftTypeError)
    expect(run).toThrow('PSI requires numerical data, not categorical')
  })

  it('emptiness is reported before the data kind', () => {
    expect(() => calculatePsi([], ['a'])).toThrow(DriftValidationError)
  })

  it('NaN in current → DriftValidationError', () => {
    expect(() => calculatePsi([1, 2], [1, Number.NaN])).toThrow('current data contains NaN')
  })

  it('infinite reference value → DriftValidationError', () => {
    expect(() => calculatePsi([1, Infinity], [1, 2])).toThrow('reference data must have a finite range')
  })
})

describe('computePsiBins', () => {
  const bins = computePsiBins([1, 2, 3, 4, 5], [10, 20, 30, 40, 50])

  it(`returns ${PSI_BIN_COUNT} bins with open outer edges`, () => {
    expect(bins).toHaveLength(10)
    expect(bins[0]?.lower).toBe(-Infinity)
    expect(bins[9]?.upper).toBe(Infinity)
  })

  it('inner edges are laid over the reference range', () => {
    expect(bins[0]?.upper).toBeCloseTo(1.4, 12)
    expect(bins[5]?.lower).toBe(3)
  })

  it('empty bins use the epsilon proportion', () => {
    expect(bins[1]?.referenceProportion).toBe(PSI_EPSILON)
    expect(bins[0]?.currentProportion).toBe(PSI_EPSILON)
    expect(bins[9]?.currentProportion).toBe(1)
    expect(bins[9]?.referenceProportion).toBe(0.2)
  })

  it('contributions sum to calculatePsi', () => {
    const total = bins.reduce((sum, bin) => sum + bin.contribution, 0)
    expect(total).toBe(calculatePsi([1, 2, 3, 4, 5], [10, 20, 30, 40, 50]))
  })
})
