/**
 * Distribution functions needed for exact p-values (t and F).
 * simple-statistics only ships the normal CDF, so t and F go through the
 * regularized incomplete beta function.
 */

const LANCZOS_G = 7
const LANCZOS = [
  0.99999999999980993,
  676.5203681218851,
  -1259.1392167224028,
  771.32342877765313,
  -176.61502916214059,
  12.507343278686905,
  -0.13857109526572012,
  9.9843695780195716e-6,
  1.5056327351493116e-7,
]

/** ln Γ(x) (Lanczos approximation, reflection below 0.5) */
export function logGamma(x: number): number {
  if (x < 0.5) return Math.log(Math.PI / Math.abs(Math.sin(Math.PI * x))) - logGamma(1 - x)
  const z = x - 1
  let a = LANCZOS[0]
  const t = z + LANCZOS_G + 0.5
  for (let i = 1; i < LANCZOS_G + 2; i++) a += LANCZOS[i] / (z + i)
  return 0.5 * Math.log(2 * Math.PI) + (z + 0.5) * Math.log(t) - t + Math.log(a)
}

const MAX_ITERATIONS = 300
const EPSILON = 1e-15
const TINY = 1e-300

/** Continued fraction for I_x(a, b), modified Lentz */
function betaContinuedFraction(a: number, b: number, x: number): number {
  const qab = a + b
  const qap = a + 1
  const qam = a - 1
  let c = 1
  let d = 1 - (qab * x) / qap
  if (Math.abs(d) < TINY) d = TINY
  d = 1 / d
  let h = d
  for (let m = 1; m <= MAX_ITERATIONS; m++) {
    const m2 = 2 * m
    let aa = (m * (b - m) * x) / ((qam + m2) * (a + m2))
    d = 1 + aa * d
    if (Math.abs(d) < TINY) d = TINY
    c = 1 + aa / c
    if (Math.abs(c) < TINY) c = TINY
    d = 1 / d
    h *= d * c
    aa = (-(a + m) * (qab + m) * x) / ((a + m2) * (qap + m2))
    d = 1 + aa * d
    if (Math.abs(d) < TINY) d = TINY
    c = 1 + aa / c
    if (Math.abs(c) < TINY) c = TINY
    d = 1 / d
    const delta = d * c
    h *= delta
    if (Math.abs(delta - 1) < EPSILON) break
  }
  return h
}

/** Regularized incomplete beta I_x(a, b) for a, b > 0 */
export function regularizedIncompleteBeta(a: number, b: number, x: number): number {
  if (Number.isNaN(x)) return NaN
  if (x <= 0) return 0
  if (x >= 1) return 1
  const front = Math.exp(
    logGamma(a + b) - logGamma(a) - logGamma(b) + a * Math.log(x) + b * Math.log(1 - x)
  )
  if (x < (a + 1) / (a + b + 2)) return (front * betaContinuedFraction(a, b, x)) / a
  return 1 - (front * betaContinuedFraction(b, a, 1 - x)) / b
}

/** CDF of Student's t with `dof` degrees of freedom */
export function studentTCdf(t: number, dof: number): number {
  if (Number.isNaN(t) || dof <= 0) return NaN
  if (t === Infinity) return 1
  if (t === -Infinity) return 0
  const tail = 0.5 * regularizedIncompleteBeta(dof / 2, 0.5, dof / (dof + t * t))
  return t > 0 ? 1 - tail : tail
}

/** Two-sided p-value 2·(1 − CDF_t(|t|)); computed from the tail directly to keep precision for large |t| */
export function tTwoSidedPValue(t: number, dof: number): number {
  if (Number.isNaN(t) || dof <= 0) return NaN
  if (!Number.isFinite(t)) return 0
  return Math.min(1, regularizedIncompleteBeta(dof / 2, 0.5, dof / (dof + t * t)))
}

/** Upper-tail probability of the F distribution, 1 − CDF_F(f; d1, d2) */
export function fSurvival(f: number, d1: number, d2: number): number {
  if (Number.isNaN(f) || d1 <= 0 || d2 <= 0) return NaN
  if (f <= 0) return 1
  if (f === Infinity) return 0
  return regularizedIncompleteBeta(d2 / 2, d1 / 2, d2 / (d2 + d1 * f))
}
