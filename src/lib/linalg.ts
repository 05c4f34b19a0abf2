import type { EigenResult } from '../types'

export function zeros(rows: number, cols: number): number[][] {
  return Array.from({ length: rows }, () => Array(cols).fill(0))
}

export function identity(n: number): number[][] {
  const m = zeros(n, n)
  for (let i = 0; i < n; i++) m[i][i] = 1
  return m
}

export function outer(a: number[], b: number[]): number[][] {
  return a.map((x) => b.map((y) => x * y))
}

export function addVectors(a: number[], b: number[]): number[] {
  return a.map((x, i) => x + b[i])
}

export function addMatrices(a: number[][], b: number[][]): number[][] {
  return a.map((row, i) => row.map((x, j) => x + b[i][j]))
}

export function scaleMatrix(a: number[][], factor: number): number[][] {
  return a.map((row) => row.map((x) => x * factor))
}

/** XᵀX for an n×d matrix (d×d, symmetric) */
export function transposeProduct(X: number[][], d: number): number[][] {
  const out = zeros(d, d)
  for (const row of X)
    for (let j = 0; j < d; j++)
      for (let k = j; k < d; k++) out[j][k] += row[j] * row[k]
  for (let j = 0; j < d; j++) for (let k = 0; k < j; k++) out[j][k] = out[k][j]
  return out
}

export function isSquare(m: unknown[][], d: number): boolean {
  return m.length === d && m.every((row) => row.length === d)
}

const MAX_SWEEPS = 100
const OFF_DIAGONAL_TOLERANCE = 1e-26

/**
 * Eigendecomposition of a symmetric matrix by cyclic Jacobi rotations.
 * Eigenvalues come back descending; each eigenvector (a column of `vectors`)
 * is signed so that its largest-magnitude entry is positive.
 */
export function symmetricEigen(matrix: number[][]): EigenResult {
  const n = matrix.length
  const a = matrix.map((row) => row.slice())
  const v = identity(n)

  let scale = 0
  for (let i = 0; i < n; i++) for (let j = 0; j < n; j++) scale += a[i][j] ** 2

  for (let sweep = 0; sweep < MAX_SWEEPS && scale > 0; sweep++) {
    let off = 0
    for (let p = 0; p < n; p++) for (let q = p + 1; q < n; q++) off += a[p][q] ** 2
    if (off <= OFF_DIAGONAL_TOLERANCE * scale) break

    for (let p = 0; p < n; p++) {
      for (let q = p + 1; q < n; q++) {
        const apq = a[p][q]
        if (apq === 0) continue
        const theta = (a[q][q] - a[p][p]) / (2 * apq)
        const root = Math.sqrt(theta * theta + 1)
        const t = theta >= 0 ? 1 / (theta + root) : -1 / (-theta + root)
        const c = 1 / Math.sqrt(t * t + 1)
        const s = t * c
        for (let k = 0; k < n; k++) {
          const akp = a[k][p]
          const akq = a[k][q]
          a[k][p] = c * akp - s * akq
          a[k][q] = s * akp + c * akq
        }
        for (let k = 0; k < n; k++) {
          const apk = a[p][k]
          const aqk = a[q][k]
          a[p][k] = c * apk - s * aqk
          a[q][k] = s * apk + c * aqk
        }
        for (let k = 0; k < n; k++) {
          const vkp = v[k][p]
          const vkq = v[k][q]
          v[k][p] = c * vkp - s * vkq
          v[k][q] = s * vkp + c * vkq
        }
      }
    }
  }

  const order = Array.from({ length: n }, (_, i) => i).sort((i, j) => a[j][j] - a[i][i])
  const values = order.map((i) => a[i][i])
  const vectors = zeros(n, n)
  order.forEach((src, dst) => {
    let pivot = 0
    for (let k = 1; k < n; k++) if (Math.abs(v[k][src]) > Math.abs(v[pivot][src])) pivot = k
    const sign = v[pivot][src] < 0 ? -1 : 1
    for (let k = 0; k < n; k++) vectors[k][dst] = sign * v[k][src]
  })
  return { values, vectors }
}
