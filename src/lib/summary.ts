/**
 * Federated descriptive summary in two rounds.
 *
 * Round 1 collects counts, extremes, sums and local quartiles; the global mean
 * follows from sum / count. Round 2 asks each station for its sum of squared
 * deviations from that global mean, which gives the pooled sample SD.
 *
 * Quartiles are order statistics and cannot be merged exactly, so every
 * station's own 25/50/75% and IQR are kept as a list, one entry per station.
 */

import { max, min, quantile, sum } from 'simple-statistics'
import type { LocalTable, SkipRecord, StationId } from '../types'
import { AggregationError, DataError, capture, type Result } from './errors'
import { assertColumns, assertNotEmpty, assertNumeric, completeRows, getNumericValues, isMissing, isNumericColumn } from './table'
import {
  partitionOutcomes,
  type CategoricalSummary,
  type NumericSummary,
  type SummaryPartial,
  type VariancePartial,
} from './wire'

export interface SummaryPartialOptions {
  columns?: string[]
  numericColumns?: string[]
}

function describeNumeric(values: number[], rowCount: number): NumericSummary {
  if (values.length === 0)
    return { count: 0, missing: rowCount, min: null, max: null, sum: 0, '25%': null, '50%': null, '75%': null, IQR: null }
  const q25 = quantile(values, 0.25)
  const q75 = quantile(values, 0.75)
  return {
    count: values.length,
    missing: rowCount - values.length,
    min: min(values),
    max: max(values),
    sum: sum(values),
    '25%': q25,
    '50%': quantile(values, 0.5),
    '75%': q75,
    IQR: q75 - q25,
  }
}

export function extractSummaryPartial(
  table: LocalTable | null | undefined,
  options: SummaryPartialOptions = {}
): Result<SummaryPartial> {
  return capture(() => {
    assertNotEmpty(table)
    const requestedNumeric = options.numericColumns ?? []
    const columns = options.columns?.length ? options.columns : table.columns
    const all = Array.from(new Set([...columns, ...requestedNumeric]))
    assertColumns(table, all)
    if (table.rows.every((row) => all.every((c) => isMissing(row[c])))) throw new DataError('no usable rows')
    assertNumeric(table, requestedNumeric)

    const numericSet = requestedNumeric.length ? requestedNumeric : all.filter((c) => isNumericColumn(table, c))
    const rowCount = table.rows.length
    const numeric: Record<string, NumericSummary> = {}
    const categorical: Record<string, CategoricalSummary> = {}
    const countsUniqueValues: Record<string, Record<string, number>> = {}
    for (const column of all) {
      if (numericSet.includes(column)) {
        numeric[column] = describeNumeric(getNumericValues(table.rows, column), rowCount)
        continue
      }
      const counts: Record<string, number> = {}
      let present = 0
      for (const row of table.rows) {
        const v = row[column]
        if (isMissing(v)) continue
        const key = String(v)
        counts[key] = (counts[key] ?? 0) + 1
        present++
      }
      categorical[column] = { count: present, missing: rowCount - present }
      countsUniqueValues[column] = counts
    }

    return {
      numeric,
      categorical,
      counts_unique_values: countsUniqueValues,
      num_complete_rows_per_node: completeRows(table.rows, all).length,
    }
  })
}

export interface GlobalNumericSummary {
  count: number
  missing: number
  min: number | null
  max: number | null
  sum: number
  /** sum / count; null when no station has a value */
  mean: number | null
  /** Filled by the second round */
  std: number | null
  '25%': number[]
  '50%': number[]
  '75%': number[]
  IQR: number[]
}

export interface SummaryResult {
  numeric: Record<string, GlobalNumericSummary>
  categorical: Record<string, CategoricalSummary>
  counts_unique_values: Record<string, Record<string, number>>
  num_complete_rows_per_node: number[]
  /** Stations that contributed to round 1, in result order */
  stations: StationId[]
  skipped: SkipRecord[]
}

function pick(a: number | null, b: number | null, choose: (x: number, y: number) => number): number | null {
  if (a === null) return b
  if (b === null) return a
  return choose(a, b)
}

function withQuartiles(list: number[], value: number | null): number[] {
  return value === null ? list : [...list, value]
}

function mergeNumeric(acc: GlobalNumericSummary | undefined, s: NumericSummary): GlobalNumericSummary {
  const base: GlobalNumericSummary = acc ?? {
    count: 0,
    missing: 0,
    min: null,
    max: null,
    sum: 0,
    mean: null,
    std: null,
    '25%': [],
    '50%': [],
    '75%': [],
    IQR: [],
  }
  return {
    ...base,
    count: base.count + s.count,
    missing: base.missing + s.missing,
    min: pick(base.min, s.min, Math.min),
    max: pick(base.max, s.max, Math.max),
    sum: base.sum + s.sum,
    '25%': withQuartiles(base['25%'], s['25%']),
    '50%': withQuartiles(base['50%'], s['50%']),
    '75%': withQuartiles(base['75%'], s['75%']),
    IQR: withQuartiles(base.IQR, s.IQR),
  }
}

/** Round 1: fold the per-station summaries and derive global means. */
export function aggregateSummaries(outcomes: Result<SummaryPartial>[]): SummaryResult {
  const { usable, skipped } = partitionOutcomes(outcomes)
  if (usable.length === 0) throw new AggregationError('No usable station results', skipped)

  const numeric: Record<string, GlobalNumericSummary> = {}
  const categorical: Record<string, CategoricalSummary> = {}
  const countsUniqueValues: Record<string, Record<string, number>> = {}
  for (const { value } of usable) {
    for (const [column, s] of Object.entries(value.numeric)) numeric[column] = mergeNumeric(numeric[column], s)
    for (const [column, s] of Object.entries(value.categorical)) {
      const prev = categorical[column] ?? { count: 0, missing: 0 }
      categorical[column] = { count: prev.count + s.count, missing: prev.missing + s.missing }
    }
    for (const [column, counts] of Object.entries(value.counts_unique_values)) {
      const merged = { ...(countsUniqueValues[column] ?? {}) }
      for (const [key, n] of Object.entries(counts)) merged[key] = (merged[key] ?? 0) + n
      countsUniqueValues[column] = merged
    }
  }
  for (const s of Object.values(numeric)) s.mean = s.count > 0 ? s.sum / s.count : null

  const columnSkips: SkipRecord[] = []
  for (const column of Object.keys(numeric)) {
    if (!(column in categorical)) continue
    delete numeric[column]
    delete categorical[column]
    delete countsUniqueValues[column]
    columnSkips.push({ column, reason: 'numeric at some stations, categorical at others' })
  }

  return {
    numeric,
    categorical,
    counts_unique_values: countsUniqueValues,
    num_complete_rows_per_node: usable.map(({ value }) => value.num_complete_rows_per_node),
    stations: usable.map(({ station }) => station),
    skipped: [...skipped, ...columnSkips],
  }
}

/** Global means to send out for round 2; columns without any value are left out. */
export function globalMeans(summary: SummaryResult): Record<string, number> {
  const means: Record<string, number> = {}
  for (const [column, s] of Object.entries(summary.numeric)) if (s.mean !== null) means[column] = s.mean
  return means
}

export interface VariancePartialOptions {
  means: Record<string, number>
}

/**
 * Round 2: local sum of squared deviations from the global mean, per column.
 * Requested columns the station lacks, or holds as text, are left out.
 */
export function extractVariancePartial(
  table: LocalTable | null | undefined,
  options: VariancePartialOptions
): Result<VariancePartial> {
  return capture(() => {
    assertNotEmpty(table)
    const columns = Object.keys(options.means).filter((c) => table.columns.includes(c) && isNumericColumn(table, c))
    const out: VariancePartial = {}
    for (const column of columns) {
      const m = options.means[column]
      const values = getNumericValues(table.rows, column)
      out[column] = { ssd: values.reduce((acc, v) => acc + (v - m) ** 2, 0), count: values.length }
    }
    return out
  })
}

/**
 * Round 2 aggregation: std = sqrt(Σ ssd / (count − 1)) when the round-2 counts
 * match round 1. `outcomes` are index-aligned with `summary.stations`.
 */
export function addStandardDeviations(summary: SummaryResult, outcomes: Result<VariancePartial>[]): SummaryResult {
  const { usable, skipped } = partitionOutcomes(outcomes)
  const roundTwoSkips = skipped.map((s): SkipRecord => ({
    station: s.station === undefined ? undefined : summary.stations[s.station],
    reason: `round 2: ${s.reason}`,
  }))
  const columnSkips: SkipRecord[] = []
  const numeric: Record<string, GlobalNumericSummary> = {}
  for (const [column, s] of Object.entries(summary.numeric)) {
    numeric[column] = { ...s }
    if (s.mean === null) continue
    let ssd = 0
    let count = 0
    for (const { value } of usable) {
      const entry = value[column]
      if (!entry) continue
      ssd += entry.ssd
      count += entry.count
    }
    if (count !== s.count) {
      columnSkips.push({ column, reason: `round 2 covers ${count} of ${s.count} values` })
      continue
    }
    if (count < 2) {
      columnSkips.push({ column, reason: 'fewer than 2 values for a standard deviation' })
      continue
    }
    numeric[column].std = Math.sqrt(ssd / (count - 1))
  }
  return { ...summary, numeric, skipped: [...summary.skipped, ...roundTwoSkips, ...columnSkips] }
}
