/**
 * Coordinator: sends extraction tasks to the stations, waits for every result
 * and hands the index-aligned list to the aggregators.
 */

import { z } from 'zod'
import type { LocalTable, SkipRecord, StationId } from '../types'
import { loadSettings, type Settings } from './config'
import { AggregationError, InputError } from './errors'
import { createLogger } from './log'
import { aggregateAnova, type AnovaResult } from './anova'
import { aggregatePca, type PcaResult } from './pca'
import { validateAnalysisResult, type AnalysisOutput } from './resultValidator'
import { runPartial, type TaskRequest } from './station'
import { addStandardDeviations, aggregateSummaries, globalMeans, type SummaryResult } from './summary'
import { aggregateGroupedTTest, aggregateLegacyTTest, type TTestResult } from './ttest'
import {
  anovaPartialSchema,
  decodeStationResults,
  pcaPartialSchema,
  summaryPartialSchema,
  ttestGroupedPartialSchema,
  ttestLegacyPartialSchema,
  variancePartialSchema,
} from './wire'

export interface TaskHandle {
  id: number
  stations: StationId[]
}

/** Task-distribution substrate. Results come back index-aligned with `stations`; an entry may be null. */
export interface StationClient {
  listStations(): Promise<StationId[]>
  submit(request: TaskRequest, stations: StationId[]): Promise<TaskHandle>
  awaitResults(handle: TaskHandle): Promise<unknown[]>
}

export interface InProcessClientOptions {
  /** Stations that never answer */
  offline?: StationId[]
  /** Per-station artificial latency in ms */
  latencyMs?: Partial<Record<StationId, number>>
  /** Stations slower than this yield null; defaults to FEDSTATS_STATION_TIMEOUT_MS */
  timeoutMs?: number
  /** Station-side settings; defaults to the environment */
  settings?: Settings
}

/** Round-trip through JSON, as a real transport would. */
function overTheWire(payload: unknown): unknown {
  return JSON.parse(JSON.stringify(payload))
}

/**
 * Runs every station in this process. Tables stay inside the client; only
 * JSON payloads come out.
 */
export class InProcessStationClient implements StationClient {
  private readonly tables: (LocalTable | null)[]
  private readonly options: InProcessClientOptions
  private readonly tasks = new Map<number, Promise<unknown[]>>()
  private nextId = 1

  constructor(tables: (LocalTable | null)[], options: InProcessClientOptions = {}) {
    this.tables = tables
    this.options = options
  }

  async listStations(): Promise<StationId[]> {
    return this.tables.map((_, i) => i)
  }

  async submit(request: TaskRequest, stations: StationId[]): Promise<TaskHandle> {
    const unknown = stations.filter((s) => !Number.isInteger(s) || s < 0 || s >= this.tables.length)
    if (unknown.length) throw new InputError(`Unknown stations: ${unknown.join(', ')}`)
    const id = this.nextId++
    this.tasks.set(id, Promise.all(stations.map((s) => this.runStation(s, request))))
    return { id, stations }
  }

  async awaitResults(handle: TaskHandle): Promise<unknown[]> {
    const pending = this.tasks.get(handle.id)
    if (!pending) throw new InputError(`Unknown task ${handle.id}`)
    this.tasks.delete(handle.id)
    return pending
  }

  private runStation(station: StationId, request: TaskRequest): Promise<unknown> {
    if (this.options.offline?.includes(station)) return Promise.resolve(null)
    const settings = this.options.settings ?? loadSettings()
    const latency = this.options.latencyMs?.[station] ?? 0
    const timeoutMs = this.options.timeoutMs ?? settings.stationTimeoutMs
    const work = new Promise<unknown>((resolve) => {
      setTimeout(() => resolve(overTheWire(runPartial(structuredClone(request), this.tables[station], settings))), latency)
    })
    if (timeoutMs === undefined) return work
    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), timeoutMs)
    })
    return Promise.race([work, timeout]).finally(() => clearTimeout(timer))
  }
}

const log = createLogger('coordinator')

const stationList = z.array(z.number().int().nonnegative()).min(1).optional()
const columnList = z.array(z.string().min(1)).optional()

export const ttestOptionsSchema = z.object({
  columns: columnList,
  groupColumn: z.string().min(1).optional(),
  stations: stationList,
})
export const anovaOptionsSchema = z.object({
  groups: z.array(z.string().min(1)).min(1),
  features: columnList,
  stations: stationList,
})
export const pcaOptionsSchema = z.object({
  features: columnList,
  nComponents: z.number().int().positive().optional(),
  center: z.boolean().default(true),
  stations: stationList,
})
export const summaryOptionsSchema = z
  .object({
    columns: columnList,
    numericColumns: columnList,
    stations: stationList,
  })
  .refine(
    (o) => !o.columns?.length || !o.numericColumns || o.numericColumns.every((c) => o.columns?.includes(c)),
    { message: "'numericColumns' must be a subset of 'columns'", path: ['numericColumns'] }
  )

export type TTestOptions = z.input<typeof ttestOptionsSchema>
export type AnovaOptions = z.input<typeof anovaOptionsSchema>
export type PcaRunOptions = z.input<typeof pcaOptionsSchema>
export type SummaryOptions = z.input<typeof summaryOptionsSchema>

function parseOptions<S extends z.ZodTypeAny>(schema: S, options: unknown): z.infer<S> {
  const parsed = schema.safeParse(options)
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || 'options'}: ${i.message}`).join('; ')
    throw new InputError(`Invalid options: ${detail}`)
  }
  return parsed.data
}

async function dispatch(
  client: StationClient,
  request: TaskRequest,
  stations?: StationId[]
): Promise<{ raw: unknown[]; stations: StationId[] }> {
  const targets = stations ?? (await client.listStations())
  if (targets.length === 0) throw new AggregationError('No stations to send the task to')
  log.info(`Submitting ${request.method} to ${targets.length} station(s)`)
  const handle = await client.submit(request, targets)
  const raw = await client.awaitResults(handle)
  if (raw.length !== targets.length)
    throw new AggregationError(`Expected ${targets.length} results, received ${raw.length}`)
  const missing = raw.filter((r) => r === null || r === undefined).length
  if (missing) log.warn(`${missing} of ${targets.length} station(s) returned no result`)
  else log.info('Results obtained')
  return { raw, stations: targets }
}

/** Skip records carry result positions; report them as station ids. */
function relabel(skipped: SkipRecord[], stations: StationId[]): SkipRecord[] {
  return skipped.map((s) => (s.station === undefined ? s : { ...s, station: stations[s.station] }))
}

function check(output: AnalysisOutput): void {
  const { consistent, issues } = validateAnalysisResult(output)
  if (!consistent) for (const issue of issues) log.warn(`${output.kind} result: ${issue}`)
  for (const s of output.result.skipped)
    log.warn(`Skipped${s.station !== undefined ? ` station ${s.station}` : ''}${s.column ? ` column ${s.column}` : ''}: ${s.reason}`)
}

/** Rethrow aggregation errors with station ids in their skip list. */
function relabelErrors<T>(stations: StationId[], aggregate: () => T): T {
  try {
    return aggregate()
  } catch (e) {
    if (e instanceof AggregationError) throw new AggregationError(e.message, relabel(e.skipped, stations))
    throw e
  }
}

export async function runTTest(client: StationClient, options: TTestOptions = {}): Promise<TTestResult> {
  const { columns, groupColumn, stations } = parseOptions(ttestOptionsSchema, options)
  const request: TaskRequest = { method: 'ttest_partial', kwargs: { columns, groupColumn } }

  if (groupColumn) {
    log.info(`Two-sample t-test between the levels of '${groupColumn}' across all stations`)
    const sent = await dispatch(client, request, stations)
    const result = relabelErrors(sent.stations, () =>
      aggregateGroupedTTest(decodeStationResults(sent.raw, ttestGroupedPartialSchema))
    )
    const final = { ...result, skipped: relabel(result.skipped, sent.stations) }
    check({ kind: 'ttest', result: final })
    return final
  }

  const targets = stations ?? (await client.listStations())
  if (targets.length !== 2)
    throw new AggregationError(`Without a group column exactly two stations are compared; got ${targets.length}`)
  log.info(`Two-sample t-test: all records of station ${targets[0]} vs station ${targets[1]}`)
  const sent = await dispatch(client, request, targets)
  const result = relabelErrors(sent.stations, () =>
    aggregateLegacyTTest(decodeStationResults(sent.raw, ttestLegacyPartialSchema))
  )
  const final: TTestResult = {
    ...result,
    groups: [String(sent.stations[0]), String(sent.stations[1])],
    skipped: relabel(result.skipped, sent.stations),
  }
  check({ kind: 'ttest', result: final })
  return final
}

export async function runAnova(client: StationClient, options: AnovaOptions): Promise<AnovaResult> {
  const { groups, features, stations } = parseOptions(anovaOptionsSchema, options)
  log.info(`One-way ANOVA over groups of '${groups[0]}'`)
  const sent = await dispatch(client, { method: 'anova_partial', kwargs: { groups, features } }, stations)
  const result = relabelErrors(sent.stations, () => aggregateAnova(decodeStationResults(sent.raw, anovaPartialSchema)))
  const final = { ...result, skipped: relabel(result.skipped, sent.stations) }
  check({ kind: 'anova', result: final })
  return final
}

export async function runPca(client: StationClient, options: PcaRunOptions = {}): Promise<PcaResult> {
  const { features, nComponents, center, stations } = parseOptions(pcaOptionsSchema, options)
  log.info(`PCA (${center ? 'centered' : 'uncentered'})`)
  const sent = await dispatch(client, { method: 'pca_partial', kwargs: { features } }, stations)
  const result = relabelErrors(sent.stations, () =>
    aggregatePca(decodeStationResults(sent.raw, pcaPartialSchema), { nComponents, center })
  )
  const final = { ...result, skipped: relabel(result.skipped, sent.stations) }
  check({ kind: 'pca', result: final })
  return final
}

/**
 * Two rounds: summaries first, then sums of squared deviations from the
 * global means. Round 2 goes only to the stations that contributed to round 1.
 */
export async function runSummary(client: StationClient, options: SummaryOptions = {}): Promise<SummaryResult> {
  const { columns, numericColumns, stations } = parseOptions(summaryOptionsSchema, options)
  const first = await dispatch(client, { method: 'summary_partial', kwargs: { columns, numericColumns } }, stations)
  let summary = relabelErrors(first.stations, () =>
    aggregateSummaries(decodeStationResults(first.raw, summaryPartialSchema))
  )

  const means = globalMeans(summary)
  if (Object.keys(means).length) {
    const contributors = summary.stations.map((i) => first.stations[i])
    const second = await dispatch(client, { method: 'variance_partial', kwargs: { means } }, contributors)
    summary = addStandardDeviations(summary, decodeStationResults(second.raw, variancePartialSchema))
  }

  const final: SummaryResult = {
    ...summary,
    stations: summary.stations.map((i) => first.stations[i]),
    skipped: relabel(summary.skipped, first.stations),
  }
  check({ kind: 'summary', result: final })
  return final
}
