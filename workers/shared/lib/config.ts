import path from 'node:path'
import { DEFAULT_PLAYER_EMBED_TEMPLATE } from './links'
import type { Env } from '../types/env'
import type { SourceCandidate, SourceFormat } from '../types/track'

export const DEFAULT_DATA_DIR = 'data'
export const DEFAULT_DATA_SOURCES = ['tracks.parquet', 'data_vers2.csv', 'data.csv'] as const

const FORMAT_BY_EXTENSION: Record<string, SourceFormat> = {
  '.csv': 'csv',
  '.parquet': 'parquet',
  '.json': 'json',
}

export function inferSourceFormat(location: string): SourceFormat {
  const extension = path.extname(location).toLowerCase()
  const format = FORMAT_BY_EXTENSION[extension]
  if (!format) {
    throw new Error(`Unsupported data source extension '${extension || location}'. Use .csv, .parquet or .json.`)
  }
  return format
}

export function normalizeDataDir(raw?: string): string {
  if (!raw || raw.trim().length === 0) {
    return DEFAULT_DATA_DIR
  }
  return raw.trim().replace(/\/+$/, '')
}

export function parseSourceList(raw?: string): string[] {
  const entries = (raw ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean)
  return entries.length > 0 ? entries : [...DEFAULT_DATA_SOURCES]
}

export function resolveSourceCandidates(env: Pick<Env, 'DATA_DIR' | 'DATA_SOURCES'>): SourceCandidate[] {
  const dataDir = normalizeDataDir(env.DATA_DIR)
  return parseSourceList(env.DATA_SOURCES).map((entry) => ({
    location: path.isAbsolute(entry) ? entry : path.join(dataDir, entry),
    format: inferSourceFormat(entry),
  }))
}

export function resolvePlayerTemplate(env: Pick<Env, 'PLAYER_EMBED_TEMPLATE'>): string {
  const template = env.PLAYER_EMBED_TEMPLATE?.trim()
  if (!template) return DEFAULT_PLAYER_EMBED_TEMPLATE
  if (!template.includes('{id}')) {
    throw new Error('PLAYER_EMBED_TEMPLATE must contain an {id} placeholder')
  }
  return template
}

export function readEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return {
    DATA_DIR: source.DATA_DIR,
    DATA_SOURCES: source.DATA_SOURCES,
    PLAYER_EMBED_TEMPLATE: source.PLAYER_EMBED_TEMPLATE,
    OBS_SERVICE: source.OBS_SERVICE,
    OBS_ENABLED: source.OBS_ENABLED,
  }
}
