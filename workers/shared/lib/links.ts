import { DatasetError } from './errors'

export const DEFAULT_PLAYER_EMBED_TEMPLATE = 'https://open.spotify.com/embed/track/{id}'

export type PlayerEmbed =
  | { available: true; trackId: string; embedUrl: string }
  | { available: false; reason: string }

const TRACK_URI_PATTERN = /^spotify:track:([A-Za-z0-9]+)$/

/**
 * Extracts the track id from a player link: the path segment following
 * `track` in an http(s) URL, or the last part of a `spotify:track:<id>` URI.
 * Throws a `malformed-link` DatasetError otherwise.
 */
export function parseTrackIdFromLink(link: string): string {
  const trimmed = link.trim()
  const uriMatch = trimmed.match(TRACK_URI_PATTERN)
  if (uriMatch) return uriMatch[1]

  let url: URL
  try {
    url = new URL(trimmed)
  } catch (error) {
    throw new DatasetError('malformed-link', `Not a URL: ${trimmed}`, { link, cause: error })
  }

  const parts = url.pathname.split('/').filter(Boolean)
  const trackIndex = parts.indexOf('track')
  const trackId = trackIndex >= 0 ? parts[trackIndex + 1] : undefined
  if (!trackId) {
    throw new DatasetError('malformed-link', `No track segment in link: ${trimmed}`, { link })
  }
  return trackId
}

export function tryParseTrackId(link?: string): string | undefined {
  if (!link) return undefined
  try {
    return parseTrackIdFromLink(link)
  } catch {
    return undefined
  }
}

export function buildEmbedUrl(trackId: string, template: string = DEFAULT_PLAYER_EMBED_TEMPLATE): string {
  return template.replace('{id}', encodeURIComponent(trackId))
}

export function resolvePlayerEmbed(
  link: string | undefined,
  template: string = DEFAULT_PLAYER_EMBED_TEMPLATE,
): PlayerEmbed {
  if (!link) {
    return { available: false, reason: 'no link' }
  }
  try {
    const trackId = parseTrackIdFromLink(link)
    return { available: true, trackId, embedUrl: buildEmbedUrl(trackId, template) }
  } catch (error) {
    return { available: false, reason: error instanceof Error ? error.message : 'malformed link' }
  }
}
