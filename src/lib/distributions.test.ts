import { describe, it, expect } from 'vitest'
import { fSurvival, logGamma, regularizedIncompleteBeta, studentTCdf, tTwoSidedPValue } from './distributions'

describe('logGamma', () => {
  it('matches ln((n − 1)!) at integers', () => {
    expect(logGamma(1)).toBeCloseTo(0, 12)
    expect(logGamma(5)).toBeCloseTo(Math.log(24), 10)
  })

  it('gives ln √π at 1/2', () => {
    expect(logGamma(0.5)).toBeCloseTo(0.5723649429247001, 10)
  })
})

describe('regularizedIncompleteBeta', () => {
  it('is the identity for a = b = 1', () => {
    expect(regularizedIncompleteBeta(1, 1, 0.3)).toBeCloseTo(0.3, 12)
  })

  it('matches the closed form for a = b = 2', () => {
    // I_x(2, 2) = 3x² − 2x³
    expect(regularizedIncompleteBeta(2, 2, 0.25)).toBeCloseTo(0.15625, 12)
  })

  it('clamps outside (0, 1)', () => {
    expect(regularizedIncompleteBeta(2, 3, 0)).toBe(0)
    expect(regularizedIncompleteBeta(2, 3, 1)).toBe(1)
    expect(regularizedIncompleteBeta(2, 3, NaN)).toBeNaN()
  })
})

describe('studentTCdf', () => {
  it('is 1/2 at zero', () => {
    expect(studentTCdf(0, 3)).toBeCloseTo(0.5, 12)
  })

  it('matches the Cauchy distribution for one degree of freedom', () => {
    expect(studentTCdf(1, 1)).toBeCloseTo(0.75, 10)
    expect(studentTCdf(-1, 1)).toBeCloseTo(0.25, 10)
  })

  it('handles infinite t', () => {
    expect(studentTCdf(Infinity, 4)).toBe(1)
    expect(studentTCdf(-Infinity, 4)).toBe(0)
  })
})

describe('tTwoSidedPValue', () => {
  it('gives known values', () => {
    expect(tTwoSidedPValue(1, 1)).toBeCloseTo(0.5, 10)
    expect(tTwoSidedPValue(2, 2)).toBeCloseTo(1 - 2 / Math.sqrt(6), 10)
  })

  it('is symmetric in t', () => {
    expect(tTwoSidedPValue(-2, 2)).toBeCloseTo(tTwoSidedPValue(2, 2), 12)
  })

  it('is 1 at t = 0 and 0 for infinite t', () => {
    expect(tTwoSidedPValue(0, 5)).toBe(1)
    expect(tTwoSidedPValue(Infinity, 5)).toBe(0)
  })

  it('rejects a non-positive dof', () => {
    expect(tTwoSidedPValue(1, 0)).toBeNaN()
  })
})

describe('fSurvival', () => {
  it('is 1/2 at F = 1 with equal degrees of freedom', () => {
    expect(fSurvival(1, 3, 3)).toBeCloseTo(0.5, 10)
  })

  it('matches the closed form for d1 = 2', () => {
    // (d2 / (d2 + 2F))^(d2 / 2)
    expect(fSurvival(1, 2, 4)).toBeCloseTo(4 / 9, 10)
  })

  it('is 1 for F ≤ 0 and 0 for infinite F', () => {
    expect(fSurvival(0, 2, 10)).toBe(1)
    expect(fSurvival(Infinity, 2, 10)).toBe(0)
  })
})
