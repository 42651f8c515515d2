import { resolveSourceCandidates } from '../../shared/lib/config'
import { isDatasetError } from '../../shared/lib/errors'
import { logEvent } from '../../shared/lib/observability'
import type { Env } from '../../shared/types/env'
import type { Dataset, SourceCandidate } from '../../shared/types/track'
import { handleLoad, type ReaderMap } from './stages/load'
import { handleNormalize } from './stages/normalize'

export interface DatasetLoaderOptions {
  /** Overrides the candidates resolved from DATA_DIR / DATA_SOURCES */
  candidates?: readonly SourceCandidate[]
  readers?: ReaderMap
  now?: () => Date
}

export interface DatasetLoader {
  load(): Promise<Dataset>
  invalidate(): void
}

/**
 * Runs load and normalize once for the given candidates.
 */
export async function buildDataset(
  env: Env,
  candidates: readonly SourceCandidate[],
  options: Pick<DatasetLoaderOptions, 'readers' | 'now'> = {},
): Promise<Dataset> {
  const startedAt = Date.now()
  logEvent(env, 'info', {
    event: 'dataset.load',
    status: 'start',
    fields: { candidates: candidates.map((candidate) => candidate.location) },
  })

  try {
    const { table, source } = await handleLoad(env, candidates, options.readers)
    const { tracks, report } = handleNormalize(env, table)
    const dataset: Dataset = Object.freeze({
      tracks,
      source,
      report,
      loadedAt: (options.now ?? (() => new Date()))().toISOString(),
    })

    logEvent(env, 'info', {
      event: 'dataset.load',
      status: 'success',
      location: source.location,
      durationMs: Date.now() - startedAt,
      fields: { tracks: tracks.length },
    })
    return dataset
  } catch (error) {
    logEvent(env, 'error', {
      event: 'dataset.load',
      status: 'fail',
      durationMs: Date.now() - startedAt,
      errorCode: isDatasetError(error) ? error.kind : undefined,
      error,
    })
    throw error
  }
}

/**
 * Caches the dataset for the process lifetime. Concurrent callers share the
 * in-flight load; a failed load is not cached.
 */
export function createDatasetLoader(env: Env, options: DatasetLoaderOptions = {}): DatasetLoader {
  let cached: Promise<Dataset> | undefined

  return {
    load() {
      if (!cached) {
        const pending = Promise.resolve().then(() =>
          buildDataset(env, options.candidates ?? resolveSourceCandidates(env), options),
        )
        cached = pending
        void pending.catch(() => {
          if (cached === pending) cached = undefined
        })
      }
      return cached
    },
    invalidate() {
      cached = undefined
    },
  }
}
