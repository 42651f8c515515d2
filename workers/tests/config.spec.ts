import path from 'node:path'
import { describe, expect, it } from 'vitest'
import {
  DEFAULT_DATA_SOURCES,
  inferSourceFormat,
  readEnv,
  resolvePlayerTemplate,
  resolveSourceCandidates,
} from '../shared/lib/config'

describe('dataset configuration', () => {
  it('uses the default candidates under data/', () => {
    expect(resolveSourceCandidates({})).toEqual(
      DEFAULT_DATA_SOURCES.map((file) => ({ location: path.join('data', file), format: inferSourceFormat(file) })),
    )
  })

  it('parses DATA_SOURCES in order', () => {
    expect(resolveSourceCandidates({ DATA_DIR: 'fixtures/', DATA_SOURCES: 'b.json, ,a.CSV' })).toEqual([
      { location: path.join('fixtures', 'b.json'), format: 'json' },
      { location: path.join('fixtures', 'a.CSV'), format: 'csv' },
    ])
  })

  it('rejects unknown extensions', () => {
    expect(() => inferSourceFormat('tracks.xlsx')).toThrow(
      "Unsupported data source extension '.xlsx'. Use .csv, .parquet or .json.",
    )
  })

  it('requires an {id} placeholder in the player template', () => {
    expect(resolvePlayerTemplate({})).toBe('https://open.spotify.com/embed/track/{id}')
    expect(resolvePlayerTemplate({ PLAYER_EMBED_TEMPLATE: 'https://p.example.test/{id}' })).toBe(
      'https://p.example.test/{id}',
    )
    expect(() => resolvePlayerTemplate({ PLAYER_EMBED_TEMPLATE: 'https://p.example.test/' })).toThrow(
      'PLAYER_EMBED_TEMPLATE must contain an {id} placeholder',
    )
  })

  it('reads only the known keys from the process environment', () => {
    expect(readEnv({ DATA_DIR: '/srv/data', HOME: '/root' })).toEqual({
      DATA_DIR: '/srv/data',
      DATA_SOURCES: undefined,
      PLAYER_EMBED_TEMPLATE: undefined,
      OBS_SERVICE: undefined,
      OBS_ENABLED: undefined,
    })
  })
})
