/**
 * Post-run validation: is the aggregated result internally consistent?
 * Issues are reported, never thrown; the coordinator logs them.
 */

import type { AnovaResult } from './anova'
import type { PcaResult } from './pca'
import type { SummaryResult } from './summary'
import type { TTestResult } from './ttest'

export type AnalysisOutput =
  | { kind: 'ttest'; result: TTestResult }
  | { kind: 'anova'; result: AnovaResult }
  | { kind: 'pca'; result: PcaResult }
  | { kind: 'summary'; result: SummaryResult }

export interface ResultValidation {
  consistent: boolean
  issues: string[]
}

const TOLERANCE = 1e-6

function isProbability(p: number): boolean {
  return Number.isFinite(p) && p >= 0 && p <= 1
}

function close(a: number, b: number): boolean {
  return Math.abs(a - b) <= TOLERANCE * Math.max(1, Math.abs(a), Math.abs(b))
}

function checkTTest(result: TTestResult, issues: string[]): void {
  for (const [column, r] of Object.entries(result.columns)) {
    if (!isProbability(r.p_value)) issues.push(`${column}: p-value ${r.p_value} is outside [0, 1].`)
    if (r.dof !== r.group_a.count + r.group_b.count - 2)
      issues.push(`${column}: degrees of freedom should be n_a + n_b − 2.`)
    if (r.group_a.variance < 0 || r.group_b.variance < 0) issues.push(`${column}: negative group variance.`)
  }
}

function checkAnova(result: AnovaResult, issues: string[]): void {
  if (!isProbability(result.p_value)) issues.push(`p-value ${result.p_value} is outside [0, 1].`)
  if (result.df_between !== result.groups.length - 1) issues.push('df_between should be k − 1.')
  if (result.df_within !== result.n_total - result.groups.length) issues.push('df_within should be N − k.')
  if (result.ss_between < -TOLERANCE || result.ss_within < -TOLERANCE) issues.push('Sums of squares must be non-negative.')
  if (result.group_counts && result.group_counts.reduce((a, b) => a + b, 0) !== result.n_total)
    issues.push('Group counts do not add up to the total.')
  if (result.f_statistic === Infinity && result.p_value !== 0) issues.push('Infinite F should give p = 0.')
  const k = result.groups.length
  if (result.group_means.length !== k || result.group_variances.length !== k || (result.group_counts && result.group_counts.length !== k))
    issues.push('Per-group arrays are not aligned with the group list.')
}

function checkPca(result: PcaResult, issues: string[]): void {
  const { explained_variance: ev, explained_variance_ratio: ratio } = result
  for (let i = 1; i < ev.length; i++)
    if (ev[i] > ev[i - 1] + TOLERANCE) issues.push('Explained variance is not in descending order.')
  if (ev.some((v) => v < -TOLERANCE)) issues.push('Covariance has a negative eigenvalue.')
  if (ratio.some((r) => r < -TOLERANCE || r > 1 + TOLERANCE)) issues.push('Explained variance ratio outside [0, 1].')
  if (ratio.reduce((a, b) => a + b, 0) > 1 + TOLERANCE) issues.push('Explained variance ratios sum above 1.')
  const cov = result.covariance
  if (cov.some((row, i) => row.some((x, j) => !close(x, cov[j]?.[i] ?? NaN)))) issues.push('Covariance is not symmetric.')
  if (result.components.length !== result.columns.length) issues.push('Components should have one row per column.')
  for (let j = 0; j < ev.length; j++) {
    const norm = Math.sqrt(result.components.reduce((acc, row) => acc + (row[j] ?? 0) ** 2, 0))
    if (!close(norm, 1)) issues.push(`Component ${j + 1} is not unit length.`)
  }
}

function checkSummary(result: SummaryResult, issues: string[]): void {
  for (const [column, s] of Object.entries(result.numeric)) {
    if (s.min !== null && s.max !== null && s.min > s.max) issues.push(`${column}: min exceeds max.`)
    if (s.mean !== null && s.min !== null && s.max !== null && (s.mean < s.min - TOLERANCE || s.mean > s.max + TOLERANCE))
      issues.push(`${column}: mean lies outside [min, max].`)
    if (s.std !== null && s.std < 0) issues.push(`${column}: negative standard deviation.`)
  }
  if (result.num_complete_rows_per_node.length !== result.stations.length)
    issues.push('Complete-row counts do not match the contributing stations.')
}

export function validateAnalysisResult(output: AnalysisOutput): ResultValidation {
  const issues: string[] = []
  switch (output.kind) {
    case 'ttest':
      checkTTest(output.result, issues)
      break
    case 'anova':
      checkAnova(output.result, issues)
      break
    case 'pca':
      checkPca(output.result, issues)
      break
    case 'summary':
      checkSummary(output.result, issues)
      break
  }
  return { consistent: issues.length === 0, issues }
}
