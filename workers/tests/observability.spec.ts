import { afterEach, describe, expect, it, vi } from 'vitest'
import { isObservabilityEnabled, logEvent } from '../shared/lib/observability'

describe('logEvent', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('skips info events unless OBS_ENABLED is set', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    const payload = logEvent({}, 'info', { event: 'dataset.load', status: 'start' })

    expect(log).not.toHaveBeenCalled()
    expect(payload).toMatchObject({ level: 'info', service: 'dataset', event: 'dataset.load', status: 'start' })
  })

  it('writes one JSON line per enabled info event', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    logEvent({ OBS_ENABLED: '1', OBS_SERVICE: 'explorer-data' }, 'info', {
      event: 'dataset.normalize',
      status: 'success',
      durationMs: 12,
      fields: { keptCount: 3 },
    })

    expect(log).toHaveBeenCalledTimes(1)
    const line: unknown = JSON.parse(String(log.mock.calls[0][0]))
    expect(line).toMatchObject({
      level: 'info',
      service: 'explorer-data',
      event: 'dataset.normalize',
      status: 'success',
      durationMs: 12,
      keptCount: 3,
    })
  })

  it('always writes warnings and errors', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})

    logEvent({}, 'warn', { event: 'dataset.load', status: 'fail', location: 'data/a.csv' })
    const payload = logEvent({}, 'error', { event: 'dataset.build', error: new Error('boom') })

    expect(warn).toHaveBeenCalledTimes(1)
    expect(error).toHaveBeenCalledTimes(1)
    expect(payload.error).toMatchObject({ message: 'boom' })
  })

  it('accepts 1 and true as the enable flag', () => {
    expect(isObservabilityEnabled({ OBS_ENABLED: '1' })).toBe(true)
    expect(isObservabilityEnabled({ OBS_ENABLED: 'true' })).toBe(true)
    expect(isObservabilityEnabled({ OBS_ENABLED: 'yes' })).toBe(false)
  })
})
