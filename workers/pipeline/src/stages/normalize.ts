import { deriveTrack } from '../../../shared/lib/derive'
import { normalizeTable } from '../../../shared/lib/normalize'
import { logEvent } from '../../../shared/lib/observability'
import type { Env } from '../../../shared/types/env'
import type { NormalizationReport, RawTable, TrackRecord } from '../../../shared/types/track'

export interface NormalizeResult {
  tracks: readonly TrackRecord[]
  report: NormalizationReport
}

/**
 * Normalize stage: coerce, drop, rescale, then derive the canonical records.
 */
export function handleNormalize(env: Env, table: RawTable): NormalizeResult {
  const normalized = normalizeTable(table)
  const tracks = Object.freeze(
    normalized.rows.map((row, index) => deriveTrack(row, index, normalized.columns)),
  )

  const { report } = normalized
  logEvent(env, 'info', {
    event: 'dataset.normalize',
    status: 'success',
    fields: {
      rows: report.rowCount,
      kept: report.keptCount,
      dropped: report.droppedCount,
      scales: Object.fromEntries(
        Object.entries(report.scales).map(([column, scale]) => [column, scale.name]),
      ),
    },
  })

  if (report.keptCount === 0 && report.rowCount > 0) {
    logEvent(env, 'warn', {
      event: 'dataset.normalize',
      status: 'empty',
      message: 'Every row was dropped during normalization',
    })
  }

  return { tracks, report }
}
