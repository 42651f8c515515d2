import {
  DEFAULT_PLAYER_EMBED_TEMPLATE,
  resolvePlayerEmbed,
  type PlayerEmbed,
  type TrackRecord,
} from '@feature-explorer/workers';

export type AxisKey = 'danceability' | 'energy' | 'tempo' | 'popularity' | 'valence' | 'year';

export const AXIS_OPTIONS: ReadonlyArray<{ key: AxisKey; label: string }> = [
  { key: 'danceability', label: 'Danceability' },
  { key: 'energy', label: 'Energy' },
  { key: 'tempo', label: 'Tempo' },
  { key: 'popularity', label: 'Popularity' },
  { key: 'valence', label: 'Valence' },
  { key: 'year', label: 'Year' },
];

export const DEFAULT_AXES: { x: AxisKey; y: AxisKey } = { x: 'popularity', y: 'energy' };

export const CORRELATION_COLUMNS: readonly AxisKey[] = ['danceability', 'energy', 'tempo', 'popularity', 'valence', 'year'];

export type Summary = {
  count: number;
  meanEnergy?: number;
  meanValence?: number;
};

export type ScatterPoint = {
  name: string;
  x: number;
  y: number;
  // drives marker size and colour
  popularity: number;
};

export type CorrelationMatrix = {
  columns: AxisKey[];
  values: Array<Array<number | null>>;
};

export type SongDetails = {
  name: string;
  artists: string;
  embed: PlayerEmbed;
};

function mean(values: readonly number[]): number | undefined {
  if (values.length === 0) return undefined;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function axisLabel(key: AxisKey): string {
  return AXIS_OPTIONS.find((option) => option.key === key)?.label ?? key;
}

export function summarize(tracks: readonly TrackRecord[]): Summary {
  return {
    count: tracks.length,
    meanEnergy: mean(tracks.map((track) => track.energy)),
    meanValence: mean(tracks.map((track) => track.valence)),
  };
}

export function scatterSeries(tracks: readonly TrackRecord[], x: AxisKey, y: AxisKey): ScatterPoint[] {
  const points: ScatterPoint[] = [];
  for (const track of tracks) {
    const xValue = track[x];
    const yValue = track[y];
    if (xValue === undefined || yValue === undefined) continue;
    points.push({ name: track.name, x: xValue, y: yValue, popularity: track.popularity });
  }
  return points;
}

/**
 * Pearson correlation over the pairs where both values exist. Null when
 * fewer than two pairs exist or either side is constant.
 */
export function pearson(xs: readonly number[], ys: readonly number[]): number | null {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return null;
  let sumX = 0;
  let sumY = 0;
  for (let i = 0; i < n; i += 1) {
    sumX += xs[i];
    sumY += ys[i];
  }
  const meanX = sumX / n;
  const meanY = sumY / n;
  let cov = 0;
  let varX = 0;
  let varY = 0;
  for (let i = 0; i < n; i += 1) {
    const dx = xs[i] - meanX;
    const dy = ys[i] - meanY;
    cov += dx * dy;
    varX += dx * dx;
    varY += dy * dy;
  }
  if (varX === 0 || varY === 0) return null;
  return cov / Math.sqrt(varX * varY);
}

export function correlationMatrix(tracks: readonly TrackRecord[]): CorrelationMatrix {
  const columns = CORRELATION_COLUMNS.filter((column) => tracks.some((track) => track[column] !== undefined));
  const values = columns.map((a) =>
    columns.map((b) => {
      const xs: number[] = [];
      const ys: number[] = [];
      for (const track of tracks) {
        const x = track[a];
        const y = track[b];
        if (x === undefined || y === undefined) continue;
        xs.push(x);
        ys.push(y);
      }
      return pearson(xs, ys);
    }),
  );
  return { columns, values };
}

export function songsByPopularity(tracks: readonly TrackRecord[]): TrackRecord[] {
  return [...tracks].sort((a, b) => b.popularity - a.popularity);
}

export function describeSong(
  tracks: readonly TrackRecord[],
  name: string,
  template: string = DEFAULT_PLAYER_EMBED_TEMPLATE,
): SongDetails | undefined {
  const track = tracks.find((candidate) => candidate.name === name);
  if (!track) return undefined;
  return {
    name: track.name,
    artists: track.displayArtists,
    embed: resolvePlayerEmbed(track.link, template),
  };
}
