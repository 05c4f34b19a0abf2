import { describe, it, expect } from 'vitest'
import { formatP, round3, toResultTable } from './report'
import type { AnovaResult } from './anova'
import type { TTestResult } from './ttest'

describe('formatting', () => {
  it('rounds to three decimals and hides tiny p-values', () => {
    expect(round3(1.23456)).toBe(1.235)
    expect(round3(Infinity)).toBe('∞')
    expect(formatP(0.0004)).toBe('< 0.001')
    expect(formatP(0.04321)).toBe(0.043)
  })
})

describe('toResultTable', () => {
  it('lays out a t-test per column with a significance insight', () => {
    const result: TTestResult = {
      mode: 'grouped',
      groups: ['A', 'B'],
      columns: {
        x: {
          t_score: -6.38047,
          p_value: 0.0002,
          dof: 8,
          group_a: { average: 12, variance: 2.5, count: 5 },
          group_b: { average: 22.6, variance: 11.3, count: 5 },
        },
      },
      skipped: [{ station: 2, reason: 'privacy: too few records' }],
    }
    const out = toResultTable({ kind: 'ttest', result })
    expect(out.table).toEqual([
      { Column: 'x', Group: 'A', N: 5, Mean: 12, Variance: 2.5 },
      { Column: 'x', Group: 'B', N: 5, Mean: 22.6, Variance: 11.3 },
      { Column: 'x', Statistic: 't (pooled)', Value: -6.38 },
      { Column: 'x', Statistic: 'df', Value: 8 },
      { Column: 'x', Statistic: 'p-value (two-sided)', Value: '< 0.001' },
      { Skipped: 'station 2', Reason: 'privacy: too few records' },
    ])
    expect(out.insight).toBe('A and B differ significantly (p < 0.05) on x.')
  })

  it('summarizes an ANOVA with an infinite F', () => {
    const result: AnovaResult = {
      f_statistic: Infinity,
      p_value: 0,
      df_between: 1,
      df_within: 6,
      ss_between: 8,
      ss_within: 0,
      ms_between: 8,
      ms_within: 0,
      n_total: 8,
      columns: ['y'],
      groups: ['a', 'b'],
      group_counts: [4, 4],
      group_means: [[5], [7]],
      group_variances: [[0], [0]],
      decomposition: 'pooled',
      skipped: [],
    }
    const out = toResultTable({ kind: 'anova', result })
    expect(out.table[0]).toEqual({ Group: 'a', N: 4, Mean: '5' })
    expect(out.table).toContainEqual({ Statistic: 'F', Value: '∞' })
    expect(out.insight).toBe('One-way ANOVA: F(1, 6) = ∞, p < 0.05. At least one group mean differs significantly.')
    expect(out.keyStat).toBe('F = ∞')
  })
})
