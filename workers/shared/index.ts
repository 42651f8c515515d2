export * from './types/track'
export type { Env } from './types/env'
export * from './lib/errors'
export * from './lib/links'
export { coerceNumber, detectScale, normalizeTable } from './lib/normalize'
export { deriveDecade, deriveTrack, formatArtists, parseArtists, canonicalizeLink } from './lib/derive'
export { readEnv, resolvePlayerTemplate, resolveSourceCandidates } from './lib/config'
export { logEvent } from './lib/observability'
export { buildDataset, createDatasetLoader } from '../pipeline/src/index'
export type { DatasetLoader, DatasetLoaderOptions } from '../pipeline/src/index'
