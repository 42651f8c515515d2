export interface Env {
  /** Directory the candidate data files are resolved against (defaults to data) */
  DATA_DIR?: string
  /**
   * Comma separated candidate file names, tried in order. The format is taken
   * from the extension (.csv, .parquet, .json).
   */
  DATA_SOURCES?: string
  /** Embeddable player URL; `{id}` is replaced by the track id */
  PLAYER_EMBED_TEMPLATE?: string
  /** Optional service label for structured log payloads */
  OBS_SERVICE?: string
  /** When falsey, info-level events are not written */
  OBS_ENABLED?: string
}
