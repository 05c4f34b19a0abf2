import { describe, it, expect } from 'vitest'
import { DataError, PrivacyError, SchemaError } from './errors'
import {
  assertColumns,
  assertDisclosable,
  assertNotEmpty,
  assertNumeric,
  completeRows,
  getDistinctValues,
  getNumericValues,
  isMissing,
  isNumericColumn,
  numericColumns,
  resolveColumns,
  usableRows,
} from './table'
import type { LocalTable } from '../types'

const table: LocalTable = {
  columns: ['age', 'sex', 'score', 'empty'],
  rows: [
    { age: 25, sex: 'M', score: 80, empty: null },
    { age: 30, sex: 'F', score: null, empty: null },
    { age: NaN, sex: '', score: 72, empty: null },
  ],
}

describe('value helpers', () => {
  it('treats null, empty string and NaN as missing', () => {
    expect([null, undefined, '', NaN, 0, 'x'].map(isMissing)).toEqual([true, true, true, true, false, false])
  })

  it('detects numeric columns, counting an all-missing column as numeric', () => {
    expect(isNumericColumn(table, 'age')).toBe(true)
    expect(isNumericColumn(table, 'sex')).toBe(false)
    expect(numericColumns(table)).toEqual(['age', 'score', 'empty'])
    expect(numericColumns(table, ['empty'])).toEqual(['age', 'score'])
  })

  it('collects distinct and numeric values, skipping missing cells', () => {
    expect(getDistinctValues(table.rows, 'sex')).toEqual(['M', 'F'])
    expect(getNumericValues(table.rows, 'age')).toEqual([25, 30])
    expect(completeRows(table.rows, ['age', 'score'])).toEqual([table.rows[0]])
  })
})

describe('validation sequence', () => {
  it('rejects a missing or empty table', () => {
    expect(() => assertNotEmpty(null)).toThrow(DataError)
    expect(() => assertNotEmpty({ columns: ['a'], rows: [] })).toThrow('empty table')
  })

  it('lists absent columns', () => {
    expect(() => assertColumns(table, ['age', 'height', 'weight'])).toThrow('Columns not found: height, weight')
    try {
      assertColumns(table, ['height'])
    } catch (e) {
      expect(e).toBeInstanceOf(SchemaError)
      expect(e instanceof SchemaError && e.columns).toEqual(['height'])
    }
  })

  it('fails when no row survives missing-value filtering', () => {
    expect(usableRows(table, ['age'])).toHaveLength(2)
    expect(() => usableRows(table, ['empty'])).toThrow('no usable rows')
  })

  it('refuses to disclose at or below the threshold', () => {
    expect(() => assertDisclosable(3, 3)).toThrow(PrivacyError)
    expect(() => assertDisclosable(3, 3)).toThrow('Number of records must be greater than 3; station has 3')
    expect(() => assertDisclosable(4, 3)).not.toThrow()
  })

  it('rejects non-numeric columns', () => {
    expect(() => assertNumeric(table, ['age', 'sex'])).toThrow('Columns are not numeric: sex')
  })
})

describe('resolveColumns', () => {
  it('keeps an explicit selection', () => {
    expect(resolveColumns(table, ['sex'])).toEqual(['sex'])
  })

  it('defaults to numeric columns outside the exclusion list', () => {
    expect(resolveColumns(table, undefined, ['score'])).toEqual(['age', 'empty'])
    expect(resolveColumns(table, [], ['score', 'empty'])).toEqual(['age'])
  })

  it('fails when nothing numeric is left', () => {
    expect(() => resolveColumns({ columns: ['sex'], rows: [{ sex: 'M' }] }, undefined)).toThrow(
      'No numeric columns to analyze'
    )
  })
})
