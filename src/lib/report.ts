/**
 * Flatten an aggregated result into table rows plus a one-line insight,
 * for printing or export.
 */

import type { SkipRecord } from '../types'
import type { AnalysisOutput } from './resultValidator'

export type ResultRow = Record<string, string | number>

export interface ResultTable {
  title: string
  table: ResultRow[]
  insight: string
  keyStat?: string
}

const ALPHA = 0.05

export function round3(x: number): number | string {
  if (!Number.isFinite(x)) return x > 0 ? '∞' : x < 0 ? '-∞' : '—'
  return Math.round(x * 1000) / 1000
}

export function formatP(p: number): number | string {
  return p < 0.001 ? '< 0.001' : round3(p)
}

function skippedRows(skipped: SkipRecord[]): ResultRow[] {
  return skipped.map((s) => ({
    Skipped: s.station !== undefined ? `station ${s.station}` : s.column ? `column ${s.column}` : 'analysis',
    Reason: s.reason,
  }))
}

export function toResultTable(output: AnalysisOutput): ResultTable {
  switch (output.kind) {
    case 'ttest': {
      const r = output.result
      const [a, b] = r.groups
      const table: ResultRow[] = []
      const significant: string[] = []
      for (const [column, c] of Object.entries(r.columns)) {
        table.push(
          { Column: column, Group: a, N: c.group_a.count, Mean: round3(c.group_a.average), Variance: round3(c.group_a.variance) },
          { Column: column, Group: b, N: c.group_b.count, Mean: round3(c.group_b.average), Variance: round3(c.group_b.variance) },
          { Column: column, Statistic: 't (pooled)', Value: round3(c.t_score) },
          { Column: column, Statistic: 'df', Value: c.dof },
          { Column: column, Statistic: 'p-value (two-sided)', Value: formatP(c.p_value) }
        )
        if (c.p_value < ALPHA) significant.push(column)
      }
      const tested = Object.keys(r.columns).length
      const insight = significant.length
        ? `${a} and ${b} differ significantly (p < 0.05) on ${significant.join(', ')}.`
        : `No significant difference between ${a} and ${b} on the ${tested} tested column(s) (p ≥ 0.05).`
      return {
        title: r.mode === 'grouped' ? 'Federated two-sample t-test' : 'Federated two-sample t-test (station vs station)',
        table: [...table, ...skippedRows(r.skipped)],
        insight,
      }
    }

    case 'anova': {
      const r = output.result
      const table: ResultRow[] = r.groups.map((g, i) => ({
        Group: g,
        N: r.group_counts ? r.group_counts[i] : '—',
        Mean: r.group_means[i].map((m) => round3(m)).join(', '),
      }))
      table.push(
        { Statistic: 'SS between', Value: round3(r.ss_between) },
        { Statistic: 'SS within', Value: round3(r.ss_within) },
        { Statistic: 'F', Value: round3(r.f_statistic) },
        { Statistic: 'df', Value: `${r.df_between}, ${r.df_within}` },
        { Statistic: 'p-value', Value: formatP(r.p_value) }
      )
      const sig = r.p_value < ALPHA
      return {
        title: 'Federated one-way ANOVA',
        table: [...table, ...skippedRows(r.skipped)],
        insight: `One-way ANOVA: F(${r.df_between}, ${r.df_within}) = ${Number.isFinite(r.f_statistic) ? r.f_statistic.toFixed(2) : '∞'}, p ${sig ? '<' : '≥'} 0.05. ${sig ? 'At least one group mean differs significantly.' : 'No significant difference between group means.'}`,
        keyStat: `F = ${Number.isFinite(r.f_statistic) ? r.f_statistic.toFixed(2) : '∞'}`,
      }
    }

    case 'pca': {
      const r = output.result
      let cumulative = 0
      const table: ResultRow[] = r.explained_variance.map((v, j) => {
        cumulative += r.explained_variance_ratio[j]
        const row: ResultRow = {
          Component: `PC${j + 1}`,
          Variance: round3(v),
          '% of variance': Math.round(r.explained_variance_ratio[j] * 1000) / 10,
          'Cumulative %': Math.round(cumulative * 1000) / 10,
        }
        r.columns.forEach((c, i) => {
          row[c] = round3(r.components[i][j])
        })
        return row
      })
      const first = r.explained_variance_ratio[0] ?? 0
      return {
        title: 'Federated principal component analysis',
        table: [...table, ...skippedRows(r.skipped)],
        insight: `PC1 explains ${(first * 100).toFixed(1)}% of the variance across ${r.n_total} records.`,
        keyStat: `n = ${r.n_total}`,
      }
    }

    case 'summary': {
      const r = output.result
      const table: ResultRow[] = Object.entries(r.numeric).map(([column, s]) => ({
        Variable: column,
        N: s.count,
        Missing: s.missing,
        Mean: s.mean === null ? '—' : round3(s.mean),
        SD: s.std === null ? '—' : round3(s.std),
        Min: s.min === null ? '—' : s.min,
        Max: s.max === null ? '—' : s.max,
      }))
      for (const [column, counts] of Object.entries(r.counts_unique_values))
        for (const [value, count] of Object.entries(counts)) table.push({ Variable: column, Value: value, Count: count })
      return {
        title: 'Federated descriptive statistics',
        table: [...table, ...skippedRows(r.skipped)],
        insight: `${r.stations.length} station(s) contributed ${r.num_complete_rows_per_node.reduce((a, b) => a + b, 0)} complete row(s).`,
      }
    }
  }
}
