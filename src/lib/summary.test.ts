import { describe, it, expect } from 'vitest'
import { sampleStandardDeviation } from 'simple-statistics'
import { fail, ok } from './errors'
import {
  addStandardDeviations,
  aggregateSummaries,
  extractSummaryPartial,
  extractVariancePartial,
  globalMeans,
} from './summary'
import type { LocalTable } from '../types'
import type { SummaryPartial } from './wire'

const north: LocalTable = {
  columns: ['age', 'sex'],
  rows: [
    { age: 20, sex: 'M' },
    { age: 30, sex: 'F' },
    { age: null, sex: 'F' },
  ],
}
const south: LocalTable = {
  columns: ['age', 'sex'],
  rows: [
    { age: 40, sex: 'M' },
    { age: 50, sex: null },
  ],
}

function partial(table: LocalTable): SummaryPartial {
  const res = extractSummaryPartial(table)
  if (!res.ok) throw new Error(res.error.message)
  return res.value
}

describe('extractSummaryPartial', () => {
  it('describes numeric and categorical columns', () => {
    expect(partial(north)).toEqual({
      numeric: {
        age: { count: 2, missing: 1, min: 20, max: 30, sum: 50, '25%': 20, '50%': 25, '75%': 30, IQR: 10 },
      },
      categorical: { sex: { count: 3, missing: 0 } },
      counts_unique_values: { sex: { M: 1, F: 2 } },
      num_complete_rows_per_node: 2,
    })
  })

  it('reports a column with no values as all missing', () => {
    const t: LocalTable = { columns: ['a', 'b'], rows: [{ a: 1, b: null }, { a: 2, b: null }] }
    expect(partial(t).numeric.b).toEqual({
      count: 0,
      missing: 2,
      min: null,
      max: null,
      sum: 0,
      '25%': null,
      '50%': null,
      '75%': null,
      IQR: null,
    })
  })

  it('rejects a listed numeric column holding text', () => {
    expect(extractSummaryPartial(north, { numericColumns: ['sex'] })).toEqual({
      ok: false,
      error: { kind: 'schema', message: 'Columns are not numeric: sex' },
    })
  })

  it('rejects an absent column', () => {
    const res = extractSummaryPartial(north, { columns: ['age', 'weight'] })
    expect(res.ok ? null : res.error.message).toBe('Columns not found: weight')
  })

  it('fails when every cell is missing', () => {
    const t: LocalTable = { columns: ['a'], rows: [{ a: null }, { a: '' }] }
    expect(extractSummaryPartial(t)).toEqual({ ok: false, error: { kind: 'data', message: 'no usable rows' } })
  })
})

describe('two-round summary', () => {
  const roundOne = aggregateSummaries([ok(partial(north)), ok(partial(south))])

  it('folds round 1 and keeps local quartiles as lists', () => {
    expect(roundOne.numeric.age).toEqual({
      count: 4,
      missing: 1,
      min: 20,
      max: 50,
      sum: 140,
      mean: 35,
      std: null,
      '25%': [20, 40],
      '50%': [25, 45],
      '75%': [30, 50],
      IQR: [10, 10],
    })
    expect(roundOne.categorical.sex).toEqual({ count: 4, missing: 1 })
    expect(roundOne.counts_unique_values.sex).toEqual({ M: 2, F: 2 })
    expect(roundOne.num_complete_rows_per_node).toEqual([2, 1])
    expect(roundOne.stations).toEqual([0, 1])
    expect(globalMeans(roundOne)).toEqual({ age: 35 })
  })

  it('leaves out requested columns the station lacks or holds as text', () => {
    expect(extractVariancePartial(north, { means: { age: 35, bmi: 23, sex: 1 } })).toEqual({
      ok: true,
      value: { age: { ssd: 250, count: 2 } },
    })
  })

  it('computes squared deviations from the global mean', () => {
    expect(extractVariancePartial(north, { means: { age: 35 } })).toEqual({
      ok: true,
      value: { age: { ssd: 250, count: 2 } },
    })
  })

  it('derives the pooled standard deviation in round 2', () => {
    const roundTwo = [north, south].map((t) => extractVariancePartial(t, { means: globalMeans(roundOne) }))
    const result = addStandardDeviations(roundOne, roundTwo)
    expect(result.numeric.age.std).toBeCloseTo(sampleStandardDeviation([20, 30, 40, 50]), 12)
    expect(result.skipped).toEqual([])
  })

  it('skips the standard deviation when round 2 is incomplete', () => {
    const result = addStandardDeviations(roundOne, [
      extractVariancePartial(north, { means: { age: 35 } }),
      fail('absent', 'No result received'),
    ])
    expect(result.numeric.age.std).toBeNull()
    expect(result.skipped).toEqual([
      { station: 1, reason: 'round 2: absent: No result received' },
      { column: 'age', reason: 'round 2 covers 2 of 4 values' },
    ])
  })

  it('ignores failed round-1 stations and records them', () => {
    const result = aggregateSummaries([fail('data', 'empty table'), ok(partial(south))])
    expect(result.stations).toEqual([1])
    expect(result.numeric.age.count).toBe(2)
    expect(result.skipped).toEqual([{ station: 0, reason: 'data: empty table' }])
  })

  it('fails with no usable station', () => {
    expect(() => aggregateSummaries([fail('data', 'empty table')])).toThrow('No usable station results')
  })
})

describe('stations with different schemas', () => {
  function bothRounds(tables: LocalTable[]) {
    const roundOne = aggregateSummaries(tables.map((t) => ok(partial(t))))
    const means = globalMeans(roundOne)
    return addStandardDeviations(roundOne, tables.map((t) => extractVariancePartial(t, { means })))
  }

  it('keeps the standard deviation of shared columns when one station lacks a column', () => {
    const wide: LocalTable = {
      columns: ['age', 'bmi'],
      rows: [
        { age: 20, bmi: 22 },
        { age: 30, bmi: 24 },
      ],
    }
    const narrow: LocalTable = { columns: ['age'], rows: [{ age: 40 }, { age: 50 }] }
    const result = bothRounds([wide, narrow])
    expect(result.numeric.age.std).toBeCloseTo(sampleStandardDeviation([20, 30, 40, 50]), 12)
    expect(result.numeric.bmi.mean).toBe(23)
    expect(result.numeric.bmi.std).toBeCloseTo(Math.SQRT2, 12)
    expect(result.skipped).toEqual([])
  })

  it('drops a column that is numeric at one station and text at another', () => {
    const coded: LocalTable = {
      columns: ['age', 'code'],
      rows: [
        { age: 20, code: 1 },
        { age: 30, code: 2 },
      ],
    }
    const labelled: LocalTable = {
      columns: ['age', 'code'],
      rows: [
        { age: 40, code: 'x' },
        { age: 50, code: 'y' },
      ],
    }
    const result = bothRounds([coded, labelled])
    expect(Object.keys(result.numeric)).toEqual(['age'])
    expect(result.categorical).toEqual({})
    expect(result.counts_unique_values).toEqual({})
    expect(result.numeric.age.std).toBeCloseTo(sampleStandardDeviation([20, 30, 40, 50]), 12)
    expect(result.skipped).toEqual([{ column: 'code', reason: 'numeric at some stations, categorical at others' }])
  })
})

describe('station order', () => {
  const east: LocalTable = { columns: ['x'], rows: [{ x: 3 }, { x: 9 }, { x: 4 }] }
  const west: LocalTable = { columns: ['x'], rows: [{ x: 12 }, { x: null }] }
  const central: LocalTable = { columns: ['x'], rows: [{ x: 7 }, { x: 1 }, { x: 6 }, { x: 8 }] }

  function run(tables: LocalTable[]) {
    const roundOne = aggregateSummaries(tables.map((t) => ok(partial(t))))
    const means = globalMeans(roundOne)
    return addStandardDeviations(roundOne, tables.map((t) => extractVariancePartial(t, { means }))).numeric.x
  }

  it('does not change the pooled figures', () => {
    const base = run([east, west, central])
    expect(base.count).toBe(8)
    expect(base.missing).toBe(1)
    expect(base.std).toBeCloseTo(sampleStandardDeviation([3, 9, 4, 12, 7, 1, 6, 8]), 12)
    for (const order of [
      [central, east, west],
      [west, central, east],
    ]) {
      const other = run(order)
      expect(other.count).toBe(base.count)
      expect(other.missing).toBe(base.missing)
      expect(other.sum).toBe(base.sum)
      expect(other.min).toBe(base.min)
      expect(other.max).toBe(base.max)
      expect(other.mean).toBeCloseTo(base.mean ?? NaN, 12)
      expect(other.std).toBeCloseTo(base.std ?? NaN, 12)
    }
  })
})
