/**
 * Two-sample pooled t-test from per-station (mean, sample variance, count).
 *
 * Grouped mode compares the two levels of a group column, pooling every
 * station. Legacy mode (no group column) compares station 0 against station 1.
 */

import { mean, sampleVariance } from 'simple-statistics'
import type { DataRow, LocalTable, ScalarGroupSummary, SkipRecord } from '../types'
import { AggregationError, capture, type Result } from './errors'
import { combineScalarSummaries, pooledTTest } from './pooling'
import {
  assertColumns,
  assertDisclosable,
  assertNotEmpty,
  assertNumeric,
  getNumericValues,
  resolveColumns,
  usableRows,
} from './table'
import { partitionOutcomes, type TTestGroupedPartial, type TTestLegacyPartial } from './wire'

export interface TTestPartialOptions {
  columns?: string[]
  groupColumn?: string
  minimumRecords: number
}

/** Summaries per column; a column with fewer than 2 values is left out. */
function summarize(rows: DataRow[], columns: string[]): TTestLegacyPartial {
  const out: TTestLegacyPartial = {}
  for (const column of columns) {
    const values = getNumericValues(rows, column)
    if (values.length < 2) continue
    out[column] = { average: mean(values), count: values.length, variance: sampleVariance(values) }
  }
  return out
}

export function extractTTestPartial(
  table: LocalTable | null | undefined,
  options: TTestPartialOptions & { groupColumn: string }
): Result<TTestGroupedPartial>
export function extractTTestPartial(
  table: LocalTable | null | undefined,
  options: TTestPartialOptions & { groupColumn?: undefined }
): Result<TTestLegacyPartial>
export function extractTTestPartial(
  table: LocalTable | null | undefined,
  options: TTestPartialOptions
): Result<TTestGroupedPartial | TTestLegacyPartial>
export function extractTTestPartial(
  table: LocalTable | null | undefined,
  options: TTestPartialOptions
): Result<TTestGroupedPartial | TTestLegacyPartial> {
  return capture(() => {
    assertNotEmpty(table)
    const { groupColumn, minimumRecords } = options
    const exclude = groupColumn ? [groupColumn] : []
    const columns = resolveColumns(table, options.columns, exclude)
    assertColumns(table, [...columns, ...exclude])
    const rows = usableRows(table, [...columns, ...exclude])
    assertDisclosable(rows.length, minimumRecords)
    assertNumeric(table, columns)

    if (!groupColumn) return summarize(rows, columns)
    const byLabel = new Map<string, DataRow[]>()
    for (const row of rows) {
      const label = String(row[groupColumn])
      const bucket = byLabel.get(label)
      if (bucket) bucket.push(row)
      else byLabel.set(label, [row])
    }
    const grouped: TTestGroupedPartial = {}
    for (const [label, groupRows] of byLabel) grouped[label] = summarize(groupRows, columns)
    return grouped
  })
}

export interface TTestColumnResult {
  t_score: number
  p_value: number
  dof: number
  group_a: ScalarGroupSummary
  group_b: ScalarGroupSummary
}

export interface TTestResult {
  mode: 'grouped' | 'legacy'
  /** Labels compared, A first; station indices in legacy mode */
  groups: [string, string]
  columns: Record<string, TTestColumnResult>
  skipped: SkipRecord[]
}

function testColumn(
  column: string,
  a: ScalarGroupSummary[],
  b: ScalarGroupSummary[],
  skipped: SkipRecord[]
): TTestColumnResult | null {
  if (!a.length || !b.length) {
    skipped.push({ column, reason: 'column has data in only one group' })
    return null
  }
  const groupA = combineScalarSummaries(a)
  const groupB = combineScalarSummaries(b)
  if (!groupA || !groupB) {
    skipped.push({ column, reason: 'a group has one record or fewer across all stations' })
    return null
  }
  const res = pooledTTest(groupA, groupB)
  if (!res) {
    skipped.push({
      column,
      reason: groupA.count < 2 || groupB.count < 2 ? 'a group has fewer than 2 records' : 'pooled variance is zero',
    })
    return null
  }
  return { t_score: res.tScore, p_value: res.pValue, dof: res.dof, group_a: groupA, group_b: groupB }
}

function finish(result: TTestResult): TTestResult {
  if (Object.keys(result.columns).length === 0)
    throw new AggregationError('No column could be tested', result.skipped)
  return result
}

export function aggregateGroupedTTest(outcomes: Result<TTestGroupedPartial>[]): TTestResult {
  const { usable, skipped } = partitionOutcomes(outcomes)
  if (usable.length === 0) throw new AggregationError('No usable station results', skipped)

  const labels = new Set<string>()
  for (const { value } of usable) for (const label of Object.keys(value)) labels.add(label)
  if (labels.size !== 2) {
    const found = Array.from(labels).sort()
    throw new AggregationError(
      `Exactly 2 distinct groups are required globally, found ${found.length}: ${found.join(', ')}`,
      skipped
    )
  }
  const [labelA, labelB] = Array.from(labels).sort()

  const columnSet = new Set<string>()
  for (const { value } of usable)
    for (const label of [labelA, labelB]) for (const column of Object.keys(value[label] ?? {})) columnSet.add(column)

  const columns: Record<string, TTestColumnResult> = {}
  for (const column of Array.from(columnSet).sort()) {
    const pick = (label: string) =>
      usable.flatMap(({ value }) => {
        const s = value[label]?.[column]
        return s ? [s] : []
      })
    const res = testColumn(column, pick(labelA), pick(labelB), skipped)
    if (res) columns[column] = res
  }
  return finish({ mode: 'grouped', groups: [labelA, labelB], columns, skipped })
}

export function aggregateLegacyTTest(outcomes: Result<TTestLegacyPartial>[]): TTestResult {
  if (outcomes.length !== 2)
    throw new AggregationError(`Legacy mode needs results from exactly two stations, got ${outcomes.length}`)
  const { usable, skipped } = partitionOutcomes(outcomes)
  if (usable.length !== 2) throw new AggregationError('Legacy mode needs usable results from both stations', skipped)
  const [a, b] = usable

  const columns: Record<string, TTestColumnResult> = {}
  const all = Array.from(new Set([...Object.keys(a.value), ...Object.keys(b.value)])).sort()
  for (const column of all) {
    const sa = a.value[column]
    const sb = b.value[column]
    const res = testColumn(column, sa ? [sa] : [], sb ? [sb] : [], skipped)
    if (res) columns[column] = res
  }
  return finish({ mode: 'legacy', groups: [String(a.station), String(b.station)], columns, skipped })
}
