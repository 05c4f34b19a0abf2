/**
 * Station-side entry point: runs the requested extractor on the local table
 * and returns the JSON payload that leaves the station. Never throws.
 */

import type { LocalTable } from '../types'
import { loadSettings, type Settings } from './config'
import type { Result } from './errors'
import { createLogger } from './log'
import { extractAnovaPartial } from './anova'
import { extractPcaPartial } from './pca'
import { extractSummaryPartial, extractVariancePartial } from './summary'
import { extractTTestPartial } from './ttest'
import { toWire, type WireError } from './wire'

export type TaskRequest =
  | { method: 'ttest_partial'; kwargs: { columns?: string[]; groupColumn?: string } }
  | { method: 'anova_partial'; kwargs: { groups: string[]; features?: string[] } }
  | { method: 'pca_partial'; kwargs: { features?: string[] } }
  | { method: 'summary_partial'; kwargs: { columns?: string[]; numericColumns?: string[] } }
  | { method: 'variance_partial'; kwargs: { means: Record<string, number> } }

export type TaskMethod = TaskRequest['method']

function extract(request: TaskRequest, table: LocalTable | null, settings: Settings): Result<unknown> {
  switch (request.method) {
    case 'ttest_partial':
      return extractTTestPartial(table, { ...request.kwargs, minimumRecords: settings.tTestMinimumRecords })
    case 'anova_partial':
      return extractAnovaPartial(table, request.kwargs)
    case 'pca_partial':
      return extractPcaPartial(table, request.kwargs)
    case 'summary_partial':
      return extractSummaryPartial(table, request.kwargs)
    case 'variance_partial':
      return extractVariancePartial(table, request.kwargs)
  }
}

export function runPartial(request: TaskRequest, table: LocalTable | null, settings?: Settings): unknown {
  let log = createLogger('station')
  try {
    const resolved = settings ?? loadSettings()
    log = createLogger('station', resolved.logLevel)
    const result = extract(request, table, resolved)
    if (result.ok) log.debug(`${request.method} finished`)
    else log.warn(`${request.method} refused (${result.error.kind}): ${result.error.message}`)
    return toWire(result)
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e)
    log.error(`${request.method} failed: ${message}`)
    const payload: WireError = { error: message, kind: 'internal' }
    return payload
  }
}
