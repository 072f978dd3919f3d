/**
 * Tables
 *
 * Loading API payloads (CSV text, parquet bytes, JSON records) into a
 * column/row table, plus the null-dropping cleanups applied to results.
 */

import { parse } from 'csv-parse/sync'
import { parquetReadObjects } from 'hyparquet'
import type { Row, Table } from './types'

const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/

/**
 * Convert a raw CSV cell: empty becomes null, numeric text becomes a number.
 */
function castCell(value: string): string | number | null {
  if (value === '') return null
  if (NUMERIC.test(value)) return Number(value)
  return value
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'))
  )
}

function isMissing(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value))
}

/**
 * Parse CSV text with a header row.
 *
 * @throws when the text is not well-formed CSV (unclosed quotes, ragged rows)
 * or has no header row
 */
export function parseCsvTable(text: string): Table {
  const records: unknown = parse(text, { skip_empty_lines: true, bom: true })
  if (!isStringMatrix(records)) {
    throw new Error('CSV parser returned unexpected records')
  }

  const [header, ...body] = records
  if (!header) {
    throw new Error('No columns to parse from CSV')
  }

  const rows = body.map((record) => {
    const row: Row = {}
    header.forEach((column, i) => {
      row[column] = castCell(record[i] ?? '')
    })
    return row
  })
  return { columns: header, rows }
}

/**
 * Build a table from a list of plain records, columns in first-seen order.
 */
export function tableFromRecords(records: readonly Row[]): Table {
  const columns: string[] = []
  const seen = new Set<string>()
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key)
        columns.push(key)
      }
    }
  }
  return { columns, rows: records }
}

/**
 * Decode a parquet file.
 *
 * @throws when the bytes are not a readable parquet file
 */
export async function parseParquetTable(bytes: Uint8Array): Promise<Table> {
  const file = new ArrayBuffer(bytes.byteLength)
  new Uint8Array(file).set(bytes)

  const records: Row[] = await parquetReadObjects({ file })
  return tableFromRecords(records)
}

/**
 * Remove every column whose values are all missing.
 * A table without rows loses all of its columns.
 */
export function dropEmptyColumns(table: Table): Table {
  const columns = table.columns.filter((column) =>
    table.rows.some((row) => !isMissing(row[column]))
  )
  if (columns.length === table.columns.length) return table

  const rows = table.rows.map((row) => {
    const kept: Row = {}
    for (const column of columns) {
      kept[column] = row[column]
    }
    return kept
  })
  return { columns, rows }
}

/**
 * Remove every row that has a missing value in any column.
 */
export function dropIncompleteRows(table: Table): Table {
  return {
    columns: table.columns,
    rows: table.rows.filter((row) => table.columns.every((column) => !isMissing(row[column])))
  }
}

/**
 * Escape a value for CSV (handle quotes and commas).
 */
function escapeCSV(value: unknown): string {
  if (value === undefined || value === null) {
    return ''
  }

  const str = typeof value === 'object' ? JSON.stringify(value) : String(value)

  if (str.includes(',') || str.includes('\n') || str.includes('"') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`
  }

  return str
}

/**
 * Render a table as CSV text with a header row.
 */
export function tableToCsv(table: Table): string {
  const lines = [table.columns.map(escapeCSV).join(',')]
  for (const row of table.rows) {
    lines.push(table.columns.map((column) => escapeCSV(row[column])).join(','))
  }
  return `${lines.join('\n')}\n`
}
