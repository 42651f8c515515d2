import { DatasetError } from './errors'
import {
  ESSENTIAL_COLUMNS,
  NUMERIC_COLUMNS,
  OPTIONAL_NUMERIC_COLUMNS,
  type EssentialColumn,
  type FeatureScale,
  type NormalizationReport,
  type NumericColumn,
  type OptionalNumericColumn,
  type RawRow,
  type RawTable,
} from '../types/track'

export type NumericValues = Partial<Record<NumericColumn, number>>

export interface NormalizedRow {
  raw: RawRow
  values: NumericValues
}

export interface NormalizedTable {
  columns: string[]
  rows: NormalizedRow[]
  report: NormalizationReport
}

/**
 * Upstream exports stored the percentage features on three different scales
 * over the dataset's history: fractions (0-1), percentages (0-100) and values
 * multiplied by 10 or 1000. The scale of a column is picked from its observed
 * maximum, then every value is divided by the factor and clipped to 0-100.
 */
const SCALE_TIERS: Array<{ upTo: number; scale: Omit<FeatureScale, 'observedMax'> }> = [
  { upTo: 1, scale: { name: 'fraction', factor: 100 } },
  { upTo: 100, scale: { name: 'percent', factor: 1 } },
  { upTo: 1000, scale: { name: 'permille', factor: 0.1 } },
  { upTo: Number.POSITIVE_INFINITY, scale: { name: 'per-hundred-thousand', factor: 0.001 } },
]

export function coerceNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined
  }
  if (typeof value === 'bigint') {
    return Number(value)
  }
  if (typeof value === 'string') {
    const trimmed = value.trim()
    if (trimmed.length === 0) return undefined
    const parsed = Number(trimmed)
    return Number.isFinite(parsed) ? parsed : undefined
  }
  return undefined
}

export function detectScale(values: readonly number[]): FeatureScale {
  const observedMax = values.reduce((max, value) => (value > max ? value : max), 0)
  const tier = SCALE_TIERS.find((candidate) => observedMax <= candidate.upTo) ?? SCALE_TIERS[SCALE_TIERS.length - 1]
  return { ...tier.scale, observedMax }
}

export function clipPercent(value: number): number {
  return Math.min(100, Math.max(0, value))
}

export function applyScale(value: number, scale: FeatureScale): number {
  // Rounded to 6 places so 0.07 * 100 stays 7.
  return clipPercent(Math.round(value * scale.factor * 1e6) / 1e6)
}

function missingEssentialColumns(columns: readonly string[]): EssentialColumn[] {
  const present = new Set(columns)
  return ESSENTIAL_COLUMNS.filter((column) => !present.has(column))
}

/**
 * Coerces the numeric columns, drops incomplete rows and rescales the
 * percentage features to 0-100. A table with neither rows nor declared
 * columns (an empty JSON document) has no schema to check and normalizes
 * to an empty table.
 */
export function normalizeTable(table: RawTable): NormalizedTable {
  const schemaless = table.rows.length === 0 && table.columns.length === 0
  const missing = schemaless ? [] : missingEssentialColumns(table.columns)
  if (missing.length > 0) {
    throw new DatasetError('schema-invalid', `Missing required columns: ${missing.join(', ')}`, {
      missingColumns: missing,
    })
  }

  const columnSet = new Set(table.columns)
  const presentNumeric = NUMERIC_COLUMNS.filter((column) => columnSet.has(column))
  const optionalColumns = OPTIONAL_NUMERIC_COLUMNS.filter((column): column is OptionalNumericColumn =>
    columnSet.has(column),
  )

  const kept: NormalizedRow[] = []
  for (const raw of table.rows) {
    const values: NumericValues = {}
    let complete = true
    for (const column of presentNumeric) {
      const value = coerceNumber(raw[column])
      if (value === undefined) {
        complete = false
        break
      }
      values[column] = value
    }
    if (complete) kept.push({ raw, values })
  }

  const scaleOf = (column: EssentialColumn) => detectScale(kept.map((row) => row.values[column] ?? 0))
  const scales: Record<EssentialColumn, FeatureScale> = {
    danceability: scaleOf('danceability'),
    energy: scaleOf('energy'),
    valence: scaleOf('valence'),
    popularity: scaleOf('popularity'),
  }

  const rows = kept.map(({ raw, values }) => {
    const next: NumericValues = { ...values }
    for (const column of ESSENTIAL_COLUMNS) {
      next[column] = applyScale(values[column] ?? 0, scales[column])
    }
    next.popularity = Math.round(next.popularity ?? 0)
    if (next.year !== undefined) next.year = Math.trunc(next.year)
    return { raw, values: next }
  })

  return {
    columns: table.columns,
    rows,
    report: {
      rowCount: table.rows.length,
      keptCount: rows.length,
      droppedCount: table.rows.length - rows.length,
      scales,
      optionalColumns,
    },
  }
}
