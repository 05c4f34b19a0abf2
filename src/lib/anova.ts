/**
 * One-way ANOVA over the groups of one column, pooled across stations.
 */

import { mean, sampleVariance } from 'simple-statistics'
import type { GroupSummary, LocalTable, SkipRecord } from '../types'
import { AggregationError, SchemaError, capture, type Result } from './errors'
import { fSurvival } from './distributions'
import { combineGroupSummaries } from './pooling'
import {
  assertColumns,
  assertNotEmpty,
  assertNumeric,
  getDistinctValues,
  isNumericValue,
  resolveColumns,
  usableRows,
} from './table'
import { partitionOutcomes, type AnovaPartial, type UsableResult } from './wire'

export interface AnovaPartialOptions {
  /** Only the first column defines the groups */
  groups: string[]
  features?: string[]
}

export function extractAnovaPartial(
  table: LocalTable | null | undefined,
  options: AnovaPartialOptions
): Result<AnovaPartial> {
  return capture(() => {
    assertNotEmpty(table)
    const groupColumn = options.groups[0]
    if (!groupColumn) throw new SchemaError('A group column is required')
    const columns = resolveColumns(table, options.features, options.groups)
    assertColumns(table, [...columns, groupColumn])
    const rows = usableRows(table, [...columns, groupColumn])
    assertNumeric(table, columns)

    const X = rows.map((row) =>
      columns.map((c) => {
        const v = row[c]
        return isNumericValue(v) ? v : NaN
      })
    )
    const grand = columns.map((_, c) => mean(X.map((x) => x[c])))
    const labels = getDistinctValues(rows, groupColumn).sort()

    const counts: number[] = []
    const means: number[][] = []
    const variances: (number[] | null)[] = []
    let ssBetween = 0
    let ssWithin = 0
    for (const label of labels) {
      const group = X.filter((_, i) => String(rows[i][groupColumn]) === label)
      const groupMean = columns.map((_, c) => mean(group.map((x) => x[c])))
      counts.push(group.length)
      means.push(groupMean)
      variances.push(group.length > 1 ? columns.map((_, c) => sampleVariance(group.map((x) => x[c]))) : null)
      ssBetween += group.length * groupMean.reduce((acc, m, c) => acc + (m - grand[c]) ** 2, 0)
      for (const x of group) ssWithin += x.reduce((acc, v, c) => acc + (v - groupMean[c]) ** 2, 0)
    }

    return {
      n: rows.length,
      columns,
      groups: labels,
      counts,
      means,
      variances,
      ss_between: ssBetween,
      ss_within: ssWithin,
    }
  })
}

export interface AnovaResult {
  f_statistic: number
  p_value: number
  df_between: number
  df_within: number
  ss_between: number
  ss_within: number
  ms_between: number
  ms_within: number
  n_total: number
  columns: string[] | null
  groups: string[]
  /** null when a station did not report per-group counts */
  group_counts: number[] | null
  group_means: number[][]
  group_variances: (number[] | null)[]
  /** 'pooled': exact decomposition from per-group summaries; 'summed': stations' own sums of squares */
  decomposition: 'pooled' | 'summed'
  skipped: SkipRecord[]
}

function sameMembers(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((x) => b.includes(x))
}

/** Structural checks against the first usable station; any mismatch fails the analysis. */
function checkShape(usable: UsableResult<AnovaPartial>[], skipped: SkipRecord[]): { groups: string[]; d: number } {
  const ref = usable[0].value
  const groups = ref.groups.slice().sort()
  const d = ref.means[0]?.length ?? ref.columns?.length ?? 0
  for (const { station, value } of usable) {
    const mismatch = (what: string) =>
      new AggregationError(`Station ${station} disagrees with station ${usable[0].station}: ${what}`, skipped)
    if (!sameMembers(value.groups, groups)) throw mismatch(`groups [${value.groups.join(', ')}]`)
    if (ref.columns && value.columns && ref.columns.join('\u0000') !== value.columns.join('\u0000'))
      throw mismatch(`columns [${value.columns.join(', ')}]`)
    const k = value.groups.length
    if (value.means.length !== k || value.variances.length !== k) throw mismatch('per-group arrays do not match the group list')
    if (value.means.some((m) => m.length !== d) || value.variances.some((v) => v !== null && v.length !== d))
      throw mismatch(`expected ${d} columns per group`)
    if (value.counts) {
      if (value.counts.length !== k) throw mismatch('group counts do not match the group list')
      if (value.counts.reduce((a, b) => a + b, 0) !== value.n) throw mismatch('group counts do not add up to n')
    }
  }
  return { groups, d }
}

function fStatistic(msBetween: number, msWithin: number): number {
  if (msWithin > 0) return msBetween / msWithin
  return msBetween > 0 ? Infinity : 0
}

export function aggregateAnova(outcomes: Result<AnovaPartial>[]): AnovaResult {
  const { usable, skipped } = partitionOutcomes(outcomes)
  if (usable.length === 0) throw new AggregationError('No usable station results', skipped)
  const { groups, d } = checkShape(usable, skipped)

  const k = groups.length
  if (k < 2) throw new AggregationError(`ANOVA needs at least 2 groups, found ${k}`, skipped)
  const nTotal = usable.reduce((acc, { value }) => acc + value.n, 0)
  const dfBetween = k - 1
  const dfWithin = nTotal - k
  if (dfWithin < 1) throw new AggregationError(`Not enough records: ${nTotal} for ${k} groups`, skipped)

  const exact = usable.every(({ value }) => value.counts !== undefined)
  let ssBetween = 0
  let ssWithin = 0
  let groupCounts: number[] | null = null
  const groupMeans: number[][] = []
  const groupVariances: (number[] | null)[] = []

  if (exact) {
    const pooled: GroupSummary[] = groups.map((label) => {
      const members = usable.map(({ value }): GroupSummary => {
        const i = value.groups.indexOf(label)
        return { mean: value.means[i], variance: value.variances[i], count: value.counts?.[i] ?? 0 }
      })
      const combined = combineGroupSummaries(members)
      if (!combined) throw new AggregationError(`Group ${label} has no records`, skipped)
      return combined
    })
    const grand = Array.from({ length: d }, (_, c) => pooled.reduce((acc, g) => acc + g.mean[c] * g.count, 0) / nTotal)
    for (const g of pooled) {
      ssBetween += g.count * g.mean.reduce((acc, m, c) => acc + (m - grand[c]) ** 2, 0)
      if (g.variance) ssWithin += g.variance.reduce((acc, v) => acc + (g.count - 1) * v, 0)
      groupMeans.push(g.mean)
      groupVariances.push(g.variance)
    }
    groupCounts = pooled.map((g) => g.count)
  } else {
    for (const { value } of usable) {
      ssBetween += value.ss_between
      ssWithin += value.ss_within
    }
    // Without per-group counts, station size is the only weight available for the means.
    for (const label of groups) {
      const means = Array(d).fill(0)
      for (const { value } of usable) {
        const row = value.means[value.groups.indexOf(label)]
        for (let c = 0; c < d; c++) means[c] += (row[c] * value.n) / nTotal
      }
      groupMeans.push(means)
      groupVariances.push(null)
    }
  }

  const msBetween = ssBetween / dfBetween
  const msWithin = ssWithin / dfWithin
  const F = fStatistic(msBetween, msWithin)
  return {
    f_statistic: F,
    p_value: fSurvival(F, dfBetween, dfWithin),
    df_between: dfBetween,
    df_within: dfWithin,
    ss_between: ssBetween,
    ss_within: ssWithin,
    ms_between: msBetween,
    ms_within: msWithin,
    n_total: nTotal,
    columns: usable[0].value.columns ?? null,
    groups,
    group_counts: groupCounts,
    group_means: groupMeans,
    group_variances: groupVariances,
    decomposition: exact ? 'pooled' : 'summed',
    skipped,
  }
}
