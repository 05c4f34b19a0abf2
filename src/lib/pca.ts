/**
 * Principal component analysis from linear sufficient statistics.
 * Stations share n, column sums and XᵀX; the coordinator derives the
 * covariance and its eigendecomposition.
 */

import type { LocalTable, MomentAccumulator, SkipRecord } from '../types'
import { AggregationError, capture, type Result } from './errors'
import { isSquare, outer, scaleMatrix, symmetricEigen, transposeProduct, zeros } from './linalg'
import { combineMoments } from './pooling'
import { assertColumns, assertNotEmpty, assertNumeric, isNumericValue, resolveColumns, usableRows } from './table'
import { partitionOutcomes, type PcaPartial } from './wire'

export interface PcaPartialOptions {
  features?: string[]
}

export function extractPcaPartial(table: LocalTable | null | undefined, options: PcaPartialOptions = {}): Result<PcaPartial> {
  return capture(() => {
    assertNotEmpty(table)
    const columns = resolveColumns(table, options.features)
    assertColumns(table, columns)
    const rows = usableRows(table, columns)
    assertNumeric(table, columns)
    const X = rows.map((row) =>
      columns.map((c) => {
        const v = row[c]
        return isNumericValue(v) ? v : NaN
      })
    )
    const d = columns.length
    const sum = columns.map((_, c) => X.reduce((acc, x) => acc + x[c], 0))
    return { n: X.length, columns, sum, sum_sq: transposeProduct(X, d) }
  })
}

export interface PcaOptions {
  nComponents?: number
  center?: boolean
}

export interface PcaResult {
  columns: string[]
  n_total: number
  mean: number[]
  /** d×k, column j is the j-th principal direction */
  components: number[][]
  explained_variance: number[]
  explained_variance_ratio: number[]
  centered: boolean
  covariance: number[][]
  skipped: SkipRecord[]
}

/** Covariance from merged moments: (XᵀX − sum·sumᵀ/n) / max(n − 1, 1) when centering. */
export function covarianceFromMoments(m: MomentAccumulator, center: boolean): number[][] {
  const d = m.sum.length
  if (d === 1) return zeros(1, 1)
  const meanProduct = outer(m.sum, m.sum)
  const scatter = center ? m.sumSq.map((row, i) => row.map((x, j) => x - meanProduct[i][j] / m.n)) : m.sumSq
  return scaleMatrix(scatter, 1 / Math.max(m.n - 1, 1))
}

export function aggregatePca(outcomes: Result<PcaPartial>[], options: PcaOptions = {}): PcaResult {
  const center = options.center ?? true
  const { usable, skipped } = partitionOutcomes(outcomes)
  if (usable.length === 0) throw new AggregationError('No usable station results', skipped)

  const ref = usable[0]
  const columns = ref.value.columns
  const d = columns.length
  for (const { station, value } of usable) {
    if (value.columns.join('\u0000') !== columns.join('\u0000'))
      throw new AggregationError(
        `Column mismatch: station ${station} has [${value.columns.join(', ')}], station ${ref.station} has [${columns.join(', ')}]`,
        skipped
      )
    if (value.sum.length !== d || !isSquare(value.sum_sq, d))
      throw new AggregationError(`Shape mismatch in the result of station ${station}`, skipped)
  }

  const moments = combineMoments(
    usable.map(({ value }) => ({ n: value.n, sum: value.sum, sumSq: value.sum_sq })),
    d
  )
  if (moments.n === 0) throw new AggregationError('Stations reported zero records', skipped)

  const mean = moments.sum.map((s) => s / moments.n)
  const covariance = covarianceFromMoments(moments, center)
  const { values, vectors } = symmetricEigen(covariance)

  const k = Math.max(1, Math.min(options.nComponents ?? d, d))
  const explained = values.slice(0, k)
  const total = values.reduce((a, b) => a + b, 0)
  return {
    columns,
    n_total: moments.n,
    mean,
    components: vectors.map((row) => row.slice(0, k)),
    explained_variance: explained,
    explained_variance_ratio: total > 0 ? explained.map((v) => v / total) : explained.map(() => 0),
    centered: center,
    covariance,
    skipped,
  }
}
