import { describe, expect, it } from 'vitest'
import { parseCsv } from '../shared/lib/readers'

describe('parseCsv', () => {
  it('strips the BOM, trims header names and skips blank lines', () => {
    const table = parseCsv('\uFEFFname, energy\nA,10\n\nB,20\n')

    expect(table.columns).toEqual(['name', 'energy'])
    expect(table.rows).toEqual([
      { name: 'A', energy: '10' },
      { name: 'B', energy: '20' },
    ])
  })

  it('keeps quoted fields with commas intact', () => {
    const table = parseCsv('name,artists\n"Skyline","[\'Drake\', \'Rihanna\']"\n')
    expect(table.rows[0]).toEqual({ name: 'Skyline', artists: "['Drake', 'Rihanna']" })
  })

  it('returns no rows for a header-only file', () => {
    expect(parseCsv('name,energy\n')).toEqual({ columns: ['name', 'energy'], rows: [] })
  })
})
