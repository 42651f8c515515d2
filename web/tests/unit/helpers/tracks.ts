import type { Dataset, DatasetLoader, TrackRecord } from '@feature-explorer/workers';

export function makeTrack(id: string, overrides: Partial<TrackRecord> = {}): TrackRecord {
  return {
    id,
    name: `Track ${id}`,
    artists: ['Test Artist'],
    displayArtists: 'Test Artist',
    danceability: 50,
    energy: 50,
    valence: 50,
    popularity: 50,
    ...overrides,
  };
}

export function makeDataset(tracks: TrackRecord[]): Dataset {
  return {
    tracks,
    source: { location: 'data/tracks.csv', format: 'csv' },
    report: {
      rowCount: tracks.length,
      keptCount: tracks.length,
      droppedCount: 0,
      scales: {
        danceability: { name: 'percent', factor: 1, observedMax: 100 },
        energy: { name: 'percent', factor: 1, observedMax: 100 },
        valence: { name: 'percent', factor: 1, observedMax: 100 },
        popularity: { name: 'percent', factor: 1, observedMax: 100 },
      },
      optionalColumns: ['year', 'tempo'],
    },
    loadedAt: '2025-09-28T00:00:00.000Z',
  };
}

export function fakeLoader(result: Dataset | Error): DatasetLoader {
  return {
    load: () => (result instanceof Error ? Promise.reject(result) : Promise.resolve(result)),
    invalidate: () => {},
  };
}

/** Random source that replays the given values, then repeats the last one. */
export function sequence(...values: number[]): () => number {
  let index = 0;
  return () => values[Math.min(index++, values.length - 1)] ?? 0;
}
