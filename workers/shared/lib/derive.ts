import { tryParseTrackId } from './links'
import { coerceNumber, type NormalizedRow } from './normalize'
import { LINK_COLUMNS, type RawRow, type TrackRecord } from '../types/track'

export const MISSING_ARTISTS_LABEL = 'N/A'

const QUOTED_ITEM = /'([^']*)'|"([^"]*)"/g

export function deriveDecade(year: number): number {
  return Math.floor(year / 10) * 10
}

/**
 * Parses the raw artists cell, usually a bracketed list such as
 * `['Drake', 'Rihanna']`. Quoted items are kept verbatim so names containing
 * an apostrophe survive; unquoted input has brackets and quotes stripped and
 * is split on commas.
 */
export function parseArtists(raw: unknown): string[] {
  if (Array.isArray(raw)) {
    return raw.map((value) => String(value).trim()).filter(Boolean)
  }
  if (typeof raw !== 'string') return []

  const quoted = Array.from(raw.matchAll(QUOTED_ITEM), (match) => (match[1] ?? match[2] ?? '').trim())
  if (quoted.length > 0) {
    return quoted.filter(Boolean)
  }

  return raw
    .replace(/\[|\]|'/g, '')
    .split(',')
    .map((value) => value.trim())
    .filter(Boolean)
}

export function formatArtists(artists: readonly string[]): string {
  return artists.join(', ')
}

function readText(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined
  const text = String(value).trim()
  return text.length > 0 ? text : undefined
}

export function canonicalizeLink(row: RawRow): string | undefined {
  for (const column of LINK_COLUMNS) {
    const value = readText(row[column])
    if (value) return value
  }
  return undefined
}

export function deriveDurationSeconds(row: RawRow): number | undefined {
  const ms = coerceNumber(row.duration_ms)
  return ms === undefined ? undefined : ms / 1000
}

/**
 * Builds a frozen track record from a normalized row.
 */
export function deriveTrack(row: NormalizedRow, index: number, columns: readonly string[]): TrackRecord {
  const { raw, values } = row
  const link = canonicalizeLink(raw)
  const hasArtistsColumn = columns.includes('artists')
  const artists = Object.freeze(parseArtists(raw.artists))

  const track: TrackRecord = {
    id: readText(raw.id) ?? tryParseTrackId(link) ?? `row-${index}`,
    name: readText(raw.name) ?? '',
    artists,
    displayArtists: hasArtistsColumn ? formatArtists(artists) : MISSING_ARTISTS_LABEL,
    danceability: values.danceability ?? 0,
    energy: values.energy ?? 0,
    valence: values.valence ?? 0,
    popularity: values.popularity ?? 0,
  }

  if (values.year !== undefined) {
    track.year = values.year
    track.decade = deriveDecade(values.year)
  }
  if (values.tempo !== undefined) track.tempo = values.tempo

  const durationSeconds = deriveDurationSeconds(raw)
  if (durationSeconds !== undefined) track.durationSeconds = durationSeconds
  if (link) track.link = link

  return Object.freeze(track)
}
