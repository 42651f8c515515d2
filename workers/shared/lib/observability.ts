import type { Env } from '../types/env'

export type LogLevel = 'info' | 'warn' | 'error'

export type ObservabilityEnv = Pick<Env, 'OBS_ENABLED' | 'OBS_SERVICE'>

export interface LogEventOptions {
  event: string
  status?: 'start' | 'success' | 'fail' | 'empty'
  message?: string
  // data source the event concerns
  location?: string
  durationMs?: number
  errorCode?: string
  fields?: Record<string, unknown>
  error?: unknown
}

export type LogPayload = Record<string, unknown> & {
  ts: string
  level: LogLevel
  service: string
  event: string
}

const WRITERS: Record<LogLevel, (line: string) => void> = {
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
}

export function isObservabilityEnabled(env: Pick<Env, 'OBS_ENABLED'>): boolean {
  return env.OBS_ENABLED === 'true' || env.OBS_ENABLED === '1'
}

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    const code = 'kind' in error && typeof error.kind === 'string' ? error.kind : undefined
    return { name: error.name, message: error.message, code, stack: error.stack }
  }
  return error
}

/**
 * Writes one JSON line per event. Info events are only written when
 * OBS_ENABLED is set; warnings and errors are always written.
 * The payload is returned either way.
 */
export function logEvent(env: ObservabilityEnv, level: LogLevel, options: LogEventOptions): LogPayload {
  const { fields, error, ...rest } = options
  const payload: LogPayload = {
    ts: new Date().toISOString(),
    level,
    service: env.OBS_SERVICE || 'dataset',
    ...rest,
    ...fields,
  }
  if (error !== undefined) payload.error = serializeError(error)

  if (level !== 'info' || isObservabilityEnabled(env)) {
    WRITERS[level](JSON.stringify(payload))
  }
  return payload
}
