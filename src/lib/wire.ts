/**
 * JSON contract between station extractors and the coordinator.
 * Key names are the wire format and stay snake_case.
 */

import { z } from 'zod'
import type { SkipRecord, StationId } from '../types'
import type { Result, StationFailure } from './errors'

const count = z.number().int().nonnegative()

export const wireErrorSchema = z.object({
  error: z.string(),
  kind: z.enum(['schema', 'data', 'privacy', 'internal']).optional(),
})
export type WireError = z.infer<typeof wireErrorSchema>

export const scalarSummarySchema = z.object({
  average: z.number(),
  count,
  variance: z.number().nonnegative(),
})

/** t-test without a group column: `{ column: summary }` */
export const ttestLegacyPartialSchema = z.record(z.string(), scalarSummarySchema)
/** t-test with a group column: `{ label: { column: summary } }` */
export const ttestGroupedPartialSchema = z.record(z.string(), ttestLegacyPartialSchema)
export type TTestLegacyPartial = z.infer<typeof ttestLegacyPartialSchema>
export type TTestGroupedPartial = z.infer<typeof ttestGroupedPartialSchema>

export const anovaPartialSchema = z.object({
  n: count,
  columns: z.array(z.string()).optional(),
  groups: z.array(z.string()),
  counts: z.array(count).optional(),
  means: z.array(z.array(z.number())),
  variances: z.array(z.array(z.number().nonnegative()).nullable()),
  ss_between: z.number(),
  ss_within: z.number(),
})
export type AnovaPartial = z.infer<typeof anovaPartialSchema>

export const pcaPartialSchema = z.object({
  n: count,
  columns: z.array(z.string()),
  sum: z.array(z.number()),
  sum_sq: z.array(z.array(z.number())),
})
export type PcaPartial = z.infer<typeof pcaPartialSchema>

export const numericSummarySchema = z.object({
  count,
  missing: count,
  min: z.number().nullable(),
  max: z.number().nullable(),
  sum: z.number(),
  '25%': z.number().nullable(),
  '50%': z.number().nullable(),
  '75%': z.number().nullable(),
  IQR: z.number().nullable(),
})
export type NumericSummary = z.infer<typeof numericSummarySchema>

export const categoricalSummarySchema = z.object({ count, missing: count })
export type CategoricalSummary = z.infer<typeof categoricalSummarySchema>

export const summaryPartialSchema = z.object({
  numeric: z.record(z.string(), numericSummarySchema),
  categorical: z.record(z.string(), categoricalSummarySchema),
  counts_unique_values: z.record(z.string(), z.record(z.string(), count)),
  num_complete_rows_per_node: count,
})
export type SummaryPartial = z.infer<typeof summaryPartialSchema>

export const variancePartialSchema = z.record(
  z.string(),
  z.object({ ssd: z.number().nonnegative(), count })
)
export type VariancePartial = z.infer<typeof variancePartialSchema>

/** Serialize an extractor outcome: the statistic itself, or `{ error, kind }`. */
export function toWire<T>(result: Result<T>): T | WireError {
  if (result.ok) return result.value
  const { kind, message } = result.error
  return kind === 'absent' || kind === 'malformed' ? { error: message } : { error: message, kind }
}

/**
 * Map each raw station result (index-aligned) to a usable statistic or a tagged failure.
 * An error payload without a kind counts as `internal`.
 */
export function decodeStationResults<S extends z.ZodTypeAny>(raw: unknown[], schema: S): Result<z.infer<S>>[] {
  return raw.map((entry): Result<z.infer<S>> => {
    if (entry === null || entry === undefined)
      return { ok: false, error: { kind: 'absent', message: 'No result received' } }
    const asError = wireErrorSchema.safeParse(entry)
    if (asError.success)
      return { ok: false, error: { kind: asError.data.kind ?? 'internal', message: asError.data.error } }
    const parsed = schema.safeParse(entry)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const where = issue?.path.length ? ` at ${issue.path.join('.')}` : ''
      return { ok: false, error: { kind: 'malformed', message: `Malformed result${where}: ${issue?.message ?? 'invalid'}` } }
    }
    return { ok: true, value: parsed.data }
  })
}

export interface UsableResult<T> {
  station: StationId
  value: T
}

/** Split decoded outcomes into usable statistics and skip records for the failed stations. */
export function partitionOutcomes<T>(outcomes: Result<T>[]): { usable: UsableResult<T>[]; skipped: SkipRecord[] } {
  const usable: UsableResult<T>[] = []
  const skipped: SkipRecord[] = []
  outcomes.forEach((outcome, station) => {
    if (outcome.ok) usable.push({ station, value: outcome.value })
    else skipped.push({ station, reason: describeFailure(outcome.error) })
  })
  return { usable, skipped }
}

export function describeFailure(failure: StationFailure): string {
  return `${failure.kind}: ${failure.message}`
}
