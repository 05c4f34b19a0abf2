/**
 * Combination formulas for per-station sufficient statistics.
 * Every combiner here is pure, commutative and associative.
 */

import type { GroupSummary, MomentAccumulator, ScalarGroupSummary } from '../types'
import { addMatrices, addVectors, zeros } from './linalg'
import { tTwoSidedPValue } from './distributions'

/**
 * Parallel-variance identity: merge (mean, sample variance, count) summaries
 * of disjoint row sets into the summary of their union. null when N ≤ 1.
 */
export function combineScalarSummaries(summaries: ScalarGroupSummary[]): ScalarGroupSummary | null {
  const N = summaries.reduce((acc, s) => acc + s.count, 0)
  if (N <= 1) return null
  const globalMean = summaries.reduce((acc, s) => acc + s.average * s.count, 0) / N
  const corrected = summaries.reduce(
    (acc, s) => acc + (s.count - 1) * s.variance + s.count * (s.average - globalMean) ** 2,
    0
  )
  return { average: globalMean, variance: corrected / (N - 1), count: N }
}

/**
 * Column-wise parallel-variance identity. A member with count < 2 has no
 * variance and contributes only through its mean. null when N is 0; the
 * variance is null when N < 2.
 */
export function combineGroupSummaries(summaries: GroupSummary[]): GroupSummary | null {
  const members = summaries.filter((s) => s.count > 0)
  const N = members.reduce((acc, s) => acc + s.count, 0)
  if (N === 0) return null
  const d = members[0].mean.length
  const mean = Array(d).fill(0)
  for (const s of members) for (let c = 0; c < d; c++) mean[c] += s.mean[c] * s.count
  for (let c = 0; c < d; c++) mean[c] /= N
  if (N < 2) return { mean, variance: null, count: N }
  const corrected = Array(d).fill(0)
  for (const s of members) {
    for (let c = 0; c < d; c++) {
      const within = s.variance && s.count > 1 ? (s.count - 1) * s.variance[c] : 0
      corrected[c] += within + s.count * (s.mean[c] - mean[c]) ** 2
    }
  }
  return { mean, variance: corrected.map((ss) => ss / (N - 1)), count: N }
}

export interface PooledTTest {
  tScore: number
  pValue: number
  dof: number
}

/**
 * Pooled-variance two-sample t-test from two summaries.
 * null when a group has fewer than 2 records or the standard error is exactly 0.
 */
export function pooledTTest(a: ScalarGroupSummary, b: ScalarGroupSummary): PooledTTest | null {
  if (a.count < 2 || b.count < 2) return null
  const dof = a.count + b.count - 2
  const pooledVar = ((a.count - 1) * a.variance + (b.count - 1) * b.variance) / dof
  const denom = Math.sqrt(pooledVar / a.count + pooledVar / b.count)
  if (denom === 0) return null
  const tScore = (a.average - b.average) / denom
  return { tScore, pValue: tTwoSidedPValue(tScore, dof), dof }
}

export function emptyMoments(d: number): MomentAccumulator {
  return { n: 0, sum: Array(d).fill(0), sumSq: zeros(d, d) }
}

/** Element-wise addition; both accumulators must have the same dimension. */
export function addMoments(a: MomentAccumulator, b: MomentAccumulator): MomentAccumulator {
  return { n: a.n + b.n, sum: addVectors(a.sum, b.sum), sumSq: addMatrices(a.sumSq, b.sumSq) }
}

export function combineMoments(list: MomentAccumulator[], d: number): MomentAccumulator {
  return list.reduce(addMoments, emptyMoments(d))
}
