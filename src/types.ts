/** A cell value as loaded at a station. null, '' and NaN are missing. */
export type CellValue = string | number | null

/** Row of data keyed by column name */
export type DataRow = Record<string, CellValue>

/** A station's private table. Never leaves the station. */
export interface LocalTable {
  columns: string[]
  rows: DataRow[]
}

/** Station identifier as the task substrate knows it */
export type StationId = number

/** Why a station, or a column, did not contribute to a result */
export interface SkipRecord {
  station?: StationId
  column?: string
  reason: string
}

/** Per-group (or whole-table) column-wise mean and sample variance */
export interface GroupSummary {
  mean: number[]
  /** null when count < 2 (sample variance undefined) */
  variance: number[] | null
  count: number
}

/** Single-column summary exchanged by the t-test */
export interface ScalarGroupSummary {
  average: number
  variance: number
  count: number
}

/** Linear sufficient statistic: n, column sums and uncentered cross-products */
export interface MomentAccumulator {
  n: number
  sum: number[]
  sumSq: number[][]
}

export interface EigenResult {
  /** Descending */
  values: number[]
  /** d×d, column j is the eigenvector of values[j] */
  vectors: number[][]
}
