/**
 * Special functions behind the p-values of the KS and Chi-Square tests.
 * Pure numeric helpers with no dependencies.
 */

const EPS = Number.EPSILON
const FPMIN = Number.MIN_VALUE / Number.EPSILON
const MAX_ITERATIONS = 10_000

// ---------------------------------------------------------------------------
// lnGamma
// ---------------------------------------------------------------------------

// Lanczos approximation, g = 607/128, 14 terms.
const LANCZOS_COEFFICIENTS = [
  57.1562356658629235, -59.5979603554754912, 14.1360979747417471,
  -0.491913816097620199, 0.339946499848118887e-4, 0.465236289270485756e-4,
  -0.983744753048795646e-4, 0.158088703224912494e-3, -0.210264441724104883e-3,
  0.217439618115212643e-3, -0.164318106536763890e-3, 0.844182239838527433e-4,
  -0.261908384015814087e-4, 0.368991826595316234e-5,
] as const

/**
 * Natural log of the gamma function for `x > 0`.
 *
 * @throws {RangeError} if `x <= 0`.
 */
export function lnGamma(x: number): number {
  if (!(x > 0)) throw new RangeError(`lnGamma requires x > 0 (got ${x})`)
  let y = x
  let tmp = x + 5.24218750000000000
  tmp = (x + 0.5) * Math.log(tmp) - tmp
  let ser = 0.999999999999997092
  for (const c of LANCZOS_COEFFICIENTS) {
    y += 1
    ser += c / y
  }
  return tmp + Math.log((2.5066282746310005 * ser) / x)
}

// ---------------------------------------------------------------------------
// Incomplete gamma
// ---------------------------------------------------------------------------

/** P(a, x) by its power series; converges quickly for x < a + 1. */
function gammaPSeries(a: number, x: number): number {
  let ap = a
  let del = 1 / a
  let sum = del
  for (let i = 0; i < MAX_ITERATIONS; i++) {
    ap += 1
    del *= x / ap
    sum += del
    if (Math.abs(del) < Math.abs(sum) * EPS) break
  }
  return sum * Math.exp(-x + a * Math.log(x) - lnGamma(a))
}

/** Q(a, x) by Lentz's continued fraction; converges quickly for x >= a + 1. */
function gammaQContinuedFraction(a: number, x: number): number {
  let b = x + 1 - a
  let c = 1 / FPMIN
  let d = 1 / b
  let h = d
  for (let i = 1; i <= MAX_ITERATIONS; i++) {
    const an = -i * (i - a)
    b += 2
    d = an * d + b
    if (Math.abs(d) < FPMIN) d = FPMIN
    c = b + an / c
    if (Math.abs(c) < FPMIN) c = FPMIN
    d = 1 / d
    const del = d * c
    h *= del
    if (Math.abs(del - 1) <= EPS) break
  }
  return Math.exp(-x + a * Math.log(x) - lnGamma(a)) * h
}

/**
 * Regularized upper incomplete gamma function Q(a, x) = Γ(a, x) / Γ(a).
 *
 * @throws {RangeError} if `a <= 0` or `x < 0`.
 */
export function regularizedGammaQ(a: number, x: number): number {
  if (!(a > 0)) throw new RangeError(`regularizedGammaQ requires a > 0 (got ${a})`)
  if (!(x >= 0)) throw new RangeError(`regularizedGammaQ requires x >= 0 (got ${x})`)
  if (x === 0) return 1
  if (x < a + 1) return 1 - gammaPSeries(a, x)
  return gammaQContinuedFraction(a, x)
}

/** Upper tail probability of the chi-square distribution with `dof` degrees of freedom. */
export function chiSquareSurvival(x: number, dof: number): number {
  if (x <= 0) return 1
  return regularizedGammaQ(dof / 2, x / 2)
}

// ---------------------------------------------------------------------------
// Kolmogorov distribution
// ---------------------------------------------------------------------------

const PI_SQUARED_OVER_8 = 1.23370055013616983
const FOUR_OVER_SQRT_PI = 2.25675833419102515

/**
 * Survival function of the limiting Kolmogorov distribution,
 * Q(z) = 2 Σ (-1)^(j-1) exp(-2 j² z²), clamped to [0, 1].
 *
 * Uses the dual theta-function series below z = 1.18, where the alternating
 * series converges slowly.
 */
export function kolmogorovSurvival(z: number): number {
  if (!(z > 0)) return 1
  if (z < 1.18) {
    const t = PI_SQUARED_OVER_8 / (z * z)
    const y = Math.exp(-t)
    const cdf = FOUR_OVER_SQRT_PI * Math.sqrt(t) * (y + y ** 9 + y ** 25 + y ** 49)
    return clampUnit(1 - cdf)
  }
  const x = Math.exp(-2 * z * z)
  return clampUnit(2 * (x - x ** 4 + x ** 9))
}

function clampUnit(p: number): number {
  return Math.min(1, Math.max(0, p))
}
