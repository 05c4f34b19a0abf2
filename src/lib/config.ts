/**
 * Settings read from the environment. Stations and coordinator share them;
 * a station reads its own environment, so thresholds are enforced locally.
 */

import { z } from 'zod'
import { InputError } from './errors'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

/** Default minimum number of records a station must hold before disclosing t-test aggregates */
export const T_TEST_MINIMUM_NUMBER_OF_RECORDS = 3

const settingsSchema = z.object({
  T_TEST_MINIMUM_NUMBER_OF_RECORDS: z.coerce.number().int().min(0).default(T_TEST_MINIMUM_NUMBER_OF_RECORDS),
  FEDSTATS_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  FEDSTATS_STATION_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
})

export interface Settings {
  tTestMinimumRecords: number
  logLevel: LogLevel
  stationTimeoutMs?: number
}

type Env = Record<string, string | undefined>

/** Blank variables count as unset. */
function withoutBlanks(env: Env): Env {
  const out: Env = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value.trim()
  }
  return out
}

export function loadSettings(env: Env = process.env): Settings {
  const parsed = settingsSchema.safeParse(withoutBlanks(env))
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new InputError(`Invalid settings: ${detail}`)
  }
  const s = parsed.data
  return {
    tTestMinimumRecords: s.T_TEST_MINIMUM_NUMBER_OF_RECORDS,
    logLevel: s.FEDSTATS_LOG_LEVEL,
    stationTimeoutMs: s.FEDSTATS_STATION_TIMEOUT_MS,
  }
}
