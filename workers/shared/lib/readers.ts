import { readFile } from 'node:fs/promises'
import { parse } from 'csv-parse/sync'
import { parquetMetadata, parquetReadObjects, parquetSchema } from 'hyparquet'
import type { RawRow, RawTable, SourceFormat } from '../types/track'

export type TableReader = (location: string) => Promise<RawTable>

function isRecord(value: unknown): value is RawRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function columnsOf(rows: readonly RawRow[]): string[] {
  const columns = new Set<string>()
  for (const row of rows) {
    for (const key of Object.keys(row)) columns.add(key)
  }
  return Array.from(columns)
}

export function parseCsv(text: string): RawTable {
  let header: string[] = []
  const records: unknown = parse(text, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    columns: (names: string[]) => {
      header = names.map((name) => name.trim())
      return header
    },
  })

  if (!Array.isArray(records)) {
    throw new Error('CSV parser returned no rows')
  }
  return { columns: header, rows: records.filter(isRecord) }
}

export function parseJsonRows(text: string): RawTable {
  const parsed: unknown = JSON.parse(text)
  const rows = Array.isArray(parsed)
    ? parsed
    : isRecord(parsed) && Array.isArray(parsed.tracks)
      ? parsed.tracks
      : undefined
  if (!rows) {
    throw new Error('JSON source must be an array of rows or { "tracks": [...] }')
  }
  const records = rows.filter(isRecord)
  return { columns: columnsOf(records), rows: records }
}

export async function readCsv(location: string): Promise<RawTable> {
  return parseCsv(await readFile(location, 'utf8'))
}

export async function readJson(location: string): Promise<RawTable> {
  return parseJsonRows(await readFile(location, 'utf8'))
}

export async function readParquet(location: string): Promise<RawTable> {
  const buffer = await readFile(location)
  const file = new ArrayBuffer(buffer.byteLength)
  new Uint8Array(file).set(buffer)
  // columns come from the file schema, so a file with no rows still declares them
  const metadata = parquetMetadata(file)
  const columns = parquetSchema(metadata).children.map((child) => child.element.name)
  const rows: unknown[] = await parquetReadObjects({ file, metadata })
  return { columns, rows: rows.filter(isRecord) }
}

export const DEFAULT_READERS: Record<SourceFormat, TableReader> = {
  csv: readCsv,
  parquet: readParquet,
  json: readJson,
}
