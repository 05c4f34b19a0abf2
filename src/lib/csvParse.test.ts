import { describe, it, expect } from 'vitest'
import { parseCSV } from './csvParse'

describe('parseCSV', () => {
  it('reads the header and coerces numeric cells', () => {
    const table = parseCSV('age,sex,score\n25,M,80.5\n30,F,85\n')
    expect(table.columns).toEqual(['age', 'sex', 'score'])
    expect(table.rows).toEqual([
      { age: 25, sex: 'M', score: 80.5 },
      { age: 30, sex: 'F', score: 85 },
    ])
  })

  it('turns empty cells into null and keeps non-canonical numbers as text', () => {
    const table = parseCSV('a,b\n,007\n 3 ,x\n')
    expect(table.rows).toEqual([
      { a: null, b: '007' },
      { a: 3, b: 'x' },
    ])
  })

  it('names blank headers by position', () => {
    expect(parseCSV('x,\n1,2\n').columns).toEqual(['x', 'Column_2'])
  })

  it('returns an empty table for empty input', () => {
    expect(parseCSV('')).toEqual({ columns: [], rows: [] })
  })

  it('keeps a header-only file as a table without rows', () => {
    expect(parseCSV('a,b\n')).toEqual({ columns: ['a', 'b'], rows: [] })
  })
})
