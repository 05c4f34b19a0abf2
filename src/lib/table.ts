/**
 * Station-side table helpers and the validation sequence shared by every
 * extractor. Validation failures are thrown as station errors and turned into
 * tagged results by `capture`.
 */

import type { CellValue, DataRow, LocalTable } from '../types'
import { DataError, PrivacyError, SchemaError } from './errors'

export function isMissing(value: CellValue | undefined): boolean {
  if (value === null || value === undefined || value === '') return true
  return typeof value === 'number' && Number.isNaN(value)
}

export function isNumericValue(value: CellValue | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}

/** A column is numeric when every non-missing value is a finite number. */
export function isNumericColumn(table: LocalTable, column: string): boolean {
  return table.rows.every((row) => isMissing(row[column]) || isNumericValue(row[column]))
}

export function numericColumns(table: LocalTable, exclude: string[] = []): string[] {
  return table.columns.filter((c) => !exclude.includes(c) && isNumericColumn(table, c))
}

export function getDistinctValues(rows: DataRow[], column: string): string[] {
  const set = new Set<string>()
  for (const row of rows) {
    const v = row[column]
    if (isMissing(v)) continue
    set.add(String(v))
  }
  return Array.from(set)
}

/** Numeric values of one column, skipping missing cells */
export function getNumericValues(rows: DataRow[], column: string): number[] {
  const out: number[] = []
  for (const row of rows) {
    const v = row[column]
    if (isNumericValue(v)) out.push(v)
  }
  return out
}

/** Rows with a value in every one of `columns` */
export function completeRows(rows: DataRow[], columns: string[]): DataRow[] {
  return rows.filter((row) => columns.every((c) => !isMissing(row[c])))
}

/** Step 1: table missing or empty */
export function assertNotEmpty(table: LocalTable | null | undefined): asserts table is LocalTable {
  if (!table || table.rows.length === 0 || table.columns.length === 0) throw new DataError('empty table')
}

/** Step 2: every requested column exists */
export function assertColumns(table: LocalTable, columns: string[]): void {
  const missing = columns.filter((c) => !table.columns.includes(c))
  if (missing.length) throw new SchemaError(`Columns not found: ${missing.join(', ')}`, missing)
}

/** Step 3: drop rows with a missing value in any requested column; at least one must remain */
export function usableRows(table: LocalTable, columns: string[]): DataRow[] {
  const rows = completeRows(table.rows, columns)
  if (rows.length === 0) throw new DataError('no usable rows')
  return rows
}

/** Step 4: refuse to disclose aggregates over `minimumRecords` or fewer rows */
export function assertDisclosable(rowCount: number, minimumRecords: number): void {
  if (rowCount <= minimumRecords)
    throw new PrivacyError(`Number of records must be greater than ${minimumRecords}; station has ${rowCount}`)
}

/** Step 5: requested columns hold numbers only */
export function assertNumeric(table: LocalTable, columns: string[]): void {
  const nonNumeric = columns.filter((c) => !isNumericColumn(table, c))
  if (nonNumeric.length) throw new SchemaError(`Columns are not numeric: ${nonNumeric.join(', ')}`, nonNumeric)
}

/** Explicit selection, or every numeric column other than `exclude` */
export function resolveColumns(table: LocalTable, requested: string[] | undefined, exclude: string[] = []): string[] {
  if (requested?.length) return requested
  const numeric = numericColumns(table, exclude)
  if (numeric.length === 0) throw new SchemaError('No numeric columns to analyze')
  return numeric
}
