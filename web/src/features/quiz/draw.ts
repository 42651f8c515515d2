import type { QuizTrack } from './types';

export type RandomSource = () => number;

/**
 * Keeps the first track for each id. Rows sharing an id count as one song,
 * so a session lasts min(round limit, unique ids) rounds.
 */
export function uniqueById<T extends QuizTrack>(pool: readonly T[]): T[] {
  const seen = new Set<string>();
  return pool.filter((track) => {
    if (seen.has(track.id)) return false;
    seen.add(track.id);
    return true;
  });
}

/**
 * Tracks of the pool whose id has not been drawn yet.
 */
export function undrawnTracks<T extends QuizTrack>(pool: readonly T[], drawnIds: ReadonlySet<string>): T[] {
  return pool.filter((track) => !drawnIds.has(track.id));
}

/**
 * Picks one undrawn track uniformly at random, or undefined when the pool is
 * exhausted.
 */
export function drawTrack<T extends QuizTrack>(
  pool: readonly T[],
  drawnIds: ReadonlySet<string>,
  random: RandomSource = Math.random,
): T | undefined {
  const available = undrawnTracks(pool, drawnIds);
  if (available.length === 0) return undefined;
  const index = Math.min(available.length - 1, Math.floor(random() * available.length));
  return available[index];
}
