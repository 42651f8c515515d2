import { describe, expect, it } from 'vitest'
import { isDatasetError } from '../shared/lib/errors'
import { coerceNumber, detectScale, normalizeTable } from '../shared/lib/normalize'
import type { RawRow, RawTable } from '../shared/types/track'

function table(rows: RawRow[], columns: string[] = Object.keys(rows[0] ?? {})): RawTable {
  return { columns, rows }
}

const row = (overrides: RawRow = {}): RawRow => ({
  name: 'Song',
  danceability: '0.5',
  energy: '0.5',
  valence: '0.5',
  popularity: '50',
  ...overrides,
})

describe('coerceNumber', () => {
  it('accepts numbers, bigints and numeric strings', () => {
    expect(coerceNumber(42)).toBe(42)
    expect(coerceNumber(' 3.5 ')).toBe(3.5)
    expect(coerceNumber(10n)).toBe(10)
  })

  it('treats non-numeric input as missing', () => {
    expect(coerceNumber('')).toBeUndefined()
    expect(coerceNumber('n/a')).toBeUndefined()
    expect(coerceNumber(Number.NaN)).toBeUndefined()
    expect(coerceNumber(Number.POSITIVE_INFINITY)).toBeUndefined()
    expect(coerceNumber(null)).toBeUndefined()
  })
})

describe('detectScale', () => {
  it('picks the scale from the observed maximum', () => {
    expect(detectScale([0.2, 0.9])).toEqual({ name: 'fraction', factor: 100, observedMax: 0.9 })
    expect(detectScale([12, 100])).toEqual({ name: 'percent', factor: 1, observedMax: 100 })
    expect(detectScale([5, 655])).toEqual({ name: 'permille', factor: 0.1, observedMax: 655 })
    expect(detectScale([1, 50000])).toEqual({ name: 'per-hundred-thousand', factor: 0.001, observedMax: 50000 })
  })

  it('treats an empty column as fractions', () => {
    expect(detectScale([])).toEqual({ name: 'fraction', factor: 100, observedMax: 0 })
  })
})

describe('normalizeTable', () => {
  it('rescales fraction columns to 0-100', () => {
    const result = normalizeTable(
      table([
        row({ danceability: '0.72', energy: '0.55', valence: '0.4', popularity: '81' }),
        row({ danceability: '0.31', energy: '0.12', valence: '0.08', popularity: '66' }),
      ]),
    )

    expect(result.rows.map((r) => r.values)).toEqual([
      { danceability: 72, energy: 55, valence: 40, popularity: 81 },
      { danceability: 31, energy: 12, valence: 8, popularity: 66 },
    ])
    expect(result.report.scales.danceability.name).toBe('fraction')
    expect(result.report.scales.popularity.name).toBe('percent')
  })

  it('divides columns stored times ten', () => {
    const result = normalizeTable(
      table([row({ energy: '655' }), row({ energy: '120' })]),
    )
    expect(result.report.scales.energy.name).toBe('permille')
    expect(result.rows.map((r) => r.values.energy)).toEqual([65.5, 12])
  })

  it('clips values outside 0-100 and rounds popularity', () => {
    const result = normalizeTable(
      table([
        row({ valence: '-5', popularity: '0.555' }),
        row({ valence: '50', popularity: '0.2' }),
      ]),
    )
    expect(result.rows.map((r) => r.values.valence)).toEqual([0, 50])
    expect(result.rows.map((r) => r.values.popularity)).toEqual([56, 20])
  })

  it('drops rows missing an essential value', () => {
    const result = normalizeTable(
      table([row(), row({ danceability: 'n/a' }), row({ popularity: '' })]),
    )
    expect(result.report).toMatchObject({ rowCount: 3, keptCount: 1, droppedCount: 2 })
  })

  it('drops rows missing year only when the year column exists', () => {
    const withYear = normalizeTable(table([row({ year: '1999' }), row({ year: 'unknown' })]))
    expect(withYear.report.keptCount).toBe(1)
    expect(withYear.report.optionalColumns).toEqual(['year'])
    expect(withYear.rows[0].values.year).toBe(1999)

    const withoutYear = normalizeTable(table([row(), row()]))
    expect(withoutYear.report.keptCount).toBe(2)
    expect(withoutYear.report.optionalColumns).toEqual([])
    expect(withoutYear.rows[0].values.year).toBeUndefined()
  })

  it('never rescales tempo', () => {
    const result = normalizeTable(table([row({ tempo: '0.9' }), row({ tempo: '174' })]))
    expect(result.rows.map((r) => r.values.tempo)).toEqual([0.9, 174])
  })

  it('reports missing essential columns as schema-invalid', () => {
    const input = table([{ name: 'Song', danceability: '0.5', popularity: '10' }])
    try {
      normalizeTable(input)
      expect.unreachable('normalizeTable should have thrown')
    } catch (error) {
      expect(isDatasetError(error, 'schema-invalid')).toBe(true)
      if (isDatasetError(error)) {
        expect(error.missingColumns).toEqual(['energy', 'valence'])
      }
    }
  })

  it('treats a table with no rows and no columns as empty, not invalid', () => {
    const result = normalizeTable({ columns: [], rows: [] })
    expect(result.rows).toEqual([])
    expect(result.report).toMatchObject({ rowCount: 0, keptCount: 0, droppedCount: 0 })
  })

  it('still checks the schema of a header-only table', () => {
    expect(() => normalizeTable({ columns: ['name', 'energy'], rows: [] })).toThrow(
      'Missing required columns: danceability, valence, popularity',
    )
  })

  it('keeps every essential value within 0-100', () => {
    const raw = [0, 0.25, 0.5, 0.99, 1].map((fraction, index) =>
      row({
        danceability: String(fraction),
        energy: String(fraction * 1000),
        valence: String(fraction * 100),
        popularity: String(index * 25),
      }),
    )
    const result = normalizeTable(table(raw))
    for (const { values } of result.rows) {
      for (const column of ['danceability', 'energy', 'valence', 'popularity'] as const) {
        expect(values[column]).toBeGreaterThanOrEqual(0)
        expect(values[column]).toBeLessThanOrEqual(100)
      }
    }
  })
})
