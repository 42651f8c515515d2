export const NUMERIC_COLUMNS = ['year', 'danceability', 'popularity', 'tempo', 'energy', 'valence'] as const
export type NumericColumn = (typeof NUMERIC_COLUMNS)[number]

// Columns every record must carry; the quiz and the explorer depend on them.
export const ESSENTIAL_COLUMNS = ['danceability', 'energy', 'valence', 'popularity'] as const
export type EssentialColumn = (typeof ESSENTIAL_COLUMNS)[number]

export const OPTIONAL_NUMERIC_COLUMNS = ['year', 'tempo'] as const
export type OptionalNumericColumn = (typeof OPTIONAL_NUMERIC_COLUMNS)[number]

// Checked in priority order when looking for the player link.
export const LINK_COLUMNS = ['Link', 'link', 'spotify_url', 'url', 't'] as const

export type RawRow = Record<string, unknown>

export interface RawTable {
  columns: string[]
  rows: RawRow[]
}

export type SourceFormat = 'csv' | 'parquet' | 'json'

export interface SourceCandidate {
  location: string
  format: SourceFormat
}

export interface TrackRecord {
  id: string
  name: string
  artists: readonly string[]
  displayArtists: string
  year?: number
  decade?: number
  danceability: number
  energy: number
  valence: number
  popularity: number
  tempo?: number
  durationSeconds?: number
  link?: string
}

export type FeatureScaleName = 'fraction' | 'percent' | 'permille' | 'per-hundred-thousand'

export interface FeatureScale {
  name: FeatureScaleName
  factor: number
  observedMax: number
}

export interface NormalizationReport {
  rowCount: number
  keptCount: number
  droppedCount: number
  scales: Record<EssentialColumn, FeatureScale>
  /** Optional numeric columns that were present in the source */
  optionalColumns: OptionalNumericColumn[]
}

export interface Dataset {
  tracks: readonly TrackRecord[]
  source: SourceCandidate
  report: NormalizationReport
  loadedAt: string
}
