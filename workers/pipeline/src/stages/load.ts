import { DatasetError, describeError, type SourceAttempt } from '../../../shared/lib/errors'
import { logEvent } from '../../../shared/lib/observability'
import { DEFAULT_READERS, type TableReader } from '../../../shared/lib/readers'
import type { Env } from '../../../shared/types/env'
import type { RawTable, SourceCandidate, SourceFormat } from '../../../shared/types/track'

export interface LoadResult {
  table: RawTable
  source: SourceCandidate
  attempted: SourceAttempt[]
}

export type ReaderMap = Record<SourceFormat, TableReader>

/**
 * Load stage: read the first candidate source that parses.
 * Throws `data-unavailable` with every attempt when none does.
 */
export async function handleLoad(
  env: Env,
  candidates: readonly SourceCandidate[],
  readers: ReaderMap = DEFAULT_READERS,
): Promise<LoadResult> {
  const attempted: SourceAttempt[] = []

  for (const candidate of candidates) {
    const startedAt = Date.now()
    try {
      const table = await readers[candidate.format](candidate.location)
      logEvent(env, 'info', {
        event: 'dataset.source',
        status: 'success',
        location: candidate.location,
        durationMs: Date.now() - startedAt,
        fields: { format: candidate.format, rows: table.rows.length },
      })
      return { table, source: candidate, attempted }
    } catch (error) {
      const reason = describeError(error)
      attempted.push({ ...candidate, reason })
      logEvent(env, 'warn', {
        event: 'dataset.source',
        status: 'fail',
        location: candidate.location,
        message: reason,
        fields: { format: candidate.format },
      })
    }
  }

  const tried = attempted.map((attempt) => attempt.location).join(', ')
  throw new DatasetError('data-unavailable', `No data source could be loaded (tried: ${tried || 'none'})`, {
    attempted,
  })
}
