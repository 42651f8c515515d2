import type { TrackRecord } from '@feature-explorer/workers';

export type Range = readonly [min: number, max: number];

export type ExplorerFilters = {
  decades?: Range;
  danceability?: Range;
  popularity?: Range;
  tempo?: Range;
};

export const TEMPO_STEP = 5;
export const DEFAULT_DECADE_SPAN = 4;

function within(value: number | undefined, range: Range | undefined): boolean {
  if (!range) return true;
  if (value === undefined) return false;
  return value >= range[0] && value <= range[1];
}

/**
 * Returns a new array with the tracks that pass every active filter.
 * Feature ranges use the canonical 0-100 scale.
 */
export function applyFilters(tracks: readonly TrackRecord[], filters: ExplorerFilters = {}): TrackRecord[] {
  return tracks.filter(
    (track) =>
      within(track.decade, filters.decades) &&
      within(track.danceability, filters.danceability) &&
      within(track.popularity, filters.popularity) &&
      within(track.tempo, filters.tempo),
  );
}

export function decadeOptions(tracks: readonly TrackRecord[]): number[] {
  const decades = new Set<number>();
  for (const track of tracks) {
    if (track.decade !== undefined) decades.add(track.decade);
  }
  return Array.from(decades).sort((a, b) => a - b);
}

export function formatDecadeLabel(decade: number): string {
  return `${decade}s`;
}

export function parseDecadeLabel(label: string): number | undefined {
  const match = label.trim().match(/^(\d{3,4})s$/);
  return match ? Number(match[1]) : undefined;
}

/** The last four decades on offer, or every decade when there are fewer. */
export function defaultDecadeRange(options: readonly number[], span: number = DEFAULT_DECADE_SPAN): Range | undefined {
  if (options.length === 0) return undefined;
  const start = options[Math.max(0, options.length - span)];
  return [start, options[options.length - 1]];
}

export type TempoBounds = { min: number; max: number; step: number };

export function tempoBounds(tracks: readonly TrackRecord[]): TempoBounds | undefined {
  const tempos = tracks.flatMap((track) => (track.tempo === undefined ? [] : [track.tempo]));
  if (tempos.length === 0) return undefined;
  const min = tempos.reduce((lowest, tempo) => (tempo < lowest ? tempo : lowest));
  const max = tempos.reduce((highest, tempo) => (tempo > highest ? tempo : highest));
  return {
    min: Math.floor(min / TEMPO_STEP) * TEMPO_STEP,
    max: Math.floor(max / TEMPO_STEP) * TEMPO_STEP + TEMPO_STEP,
    step: TEMPO_STEP,
  };
}
