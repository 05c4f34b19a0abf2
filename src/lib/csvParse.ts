import Papa from 'papaparse'
import type { CellValue, DataRow, LocalTable } from '../types'

function toCell(raw: string | undefined): CellValue {
  const trimmed = raw == null ? '' : raw.trim()
  if (trimmed === '') return null
  const num = Number(trimmed)
  return !Number.isNaN(num) && String(num) === trimmed ? num : trimmed
}

/** Load a station's table from CSV text. First row is the header; empty cells become null. */
export function parseCSV(csvText: string): LocalTable {
  if (!csvText) return { columns: [], rows: [] }
  const parsed = Papa.parse<string[]>(csvText, { skipEmptyLines: true })
  const lines = Array.isArray(parsed.data) ? parsed.data : []
  if (lines.length === 0) return { columns: [], rows: [] }

  const columns = lines[0].map((h, j) => (h != null ? String(h).trim() : '') || `Column_${j + 1}`)
  const rows: DataRow[] = []
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i]
    const row: DataRow = {}
    columns.forEach((c, j) => {
      row[c] = toCell(line[j])
    })
    rows.push(row)
  }
  return { columns, rows }
}
