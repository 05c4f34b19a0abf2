import type { SkipRecord } from '../types'

export type ErrorKind = 'schema' | 'data' | 'privacy' | 'aggregation' | 'input'

/** Base class for every failure raised by an analysis. */
export class AnalysisError extends Error {
  readonly kind: ErrorKind

  constructor(kind: ErrorKind, message: string) {
    super(message)
    this.kind = kind
    this.name = 'AnalysisError'
  }
}

/** Requested column absent, or of the wrong type */
export class SchemaError extends AnalysisError {
  readonly columns: string[]

  constructor(message: string, columns: string[] = []) {
    super('schema', message)
    this.name = 'SchemaError'
    this.columns = columns
  }
}

/** Empty table, or every row dropped by missing-value filtering */
export class DataError extends AnalysisError {
  constructor(message: string) {
    super('data', message)
    this.name = 'DataError'
  }
}

/** Too few records to disclose aggregates */
export class PrivacyError extends AnalysisError {
  constructor(message: string) {
    super('privacy', message)
    this.name = 'PrivacyError'
  }
}

/** Raised at the coordinator; fatal to the whole analysis. */
export class AggregationError extends AnalysisError {
  readonly skipped: SkipRecord[]

  constructor(message: string, skipped: SkipRecord[] = []) {
    super('aggregation', message)
    this.name = 'AggregationError'
    this.skipped = skipped
  }
}

/** Invalid options or settings at the coordinator boundary */
export class InputError extends AnalysisError {
  constructor(message: string) {
    super('input', message)
    this.name = 'InputError'
  }
}

export type StationErrorKind = 'schema' | 'data' | 'privacy'

/** Why a station result cannot be used; `internal` is an unexpected station-side failure */
export interface StationFailure {
  kind: StationErrorKind | 'internal' | 'absent' | 'malformed'
  message: string
}

export type Result<T, E = StationFailure> = { ok: true; value: T } | { ok: false; error: E }

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function fail(kind: StationFailure['kind'], message: string): Result<never> {
  return { ok: false, error: { kind, message } }
}

function isStationErrorKind(kind: ErrorKind): kind is StationErrorKind {
  return kind === 'schema' || kind === 'data' || kind === 'privacy'
}

/**
 * Run a station-side extraction and turn station errors into a failed Result.
 * Anything else (a bug, an input error) is rethrown.
 */
export function capture<T>(extract: () => T): Result<T> {
  try {
    return ok(extract())
  } catch (e) {
    if (e instanceof AnalysisError && isStationErrorKind(e.kind)) return fail(e.kind, e.message)
    throw e
  }
}
