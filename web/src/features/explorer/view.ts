import { readEnv, resolvePlayerTemplate, type DatasetLoader } from '@feature-explorer/workers';
import { loadTracks, type DataState } from '../quiz/datasource';
import {
  applyFilters,
  decadeOptions,
  defaultDecadeRange,
  formatDecadeLabel,
  tempoBounds,
  type ExplorerFilters,
  type TempoBounds,
} from './filters';
import {
  DEFAULT_AXES,
  correlationMatrix,
  describeSong,
  scatterSeries,
  songsByPopularity,
  summarize,
  type AxisKey,
  type CorrelationMatrix,
  type ScatterPoint,
  type SongDetails,
  type Summary,
} from './stats';

export type ExplorerInput = {
  filters?: ExplorerFilters;
  axes?: { x: AxisKey; y: AxisKey };
  song?: string;
  // defaults to PLAYER_EMBED_TEMPLATE
  playerTemplate?: string;
};

export type ExplorerView = {
  filters: ExplorerFilters;
  decades: Array<{ value: number; label: string }>;
  tempo?: TempoBounds;
  summary: Summary;
  axes: { x: AxisKey; y: AxisKey };
  scatter: ScatterPoint[];
  songs: Array<{ name: string; popularity: number }>;
  correlation: CorrelationMatrix;
  selected?: SongDetails;
  // true when the filters leave no song; the view shows a warning instead of charts
  empty: boolean;
};

/**
 * Builds everything the explorer page renders from the cached dataset.
 * Without a decade filter the last four decades are selected.
 */
export async function buildExplorerView(
  loader: DatasetLoader,
  input: ExplorerInput = {},
): Promise<DataState<ExplorerView>> {
  const loaded = await loadTracks(loader);
  if (loaded.status === 'error') return loaded;

  const { tracks } = loaded.data;
  const options = decadeOptions(tracks);
  const filters: ExplorerFilters = { ...input.filters, decades: input.filters?.decades ?? defaultDecadeRange(options) };
  const filtered = applyFilters(tracks, filters);
  const axes = input.axes ?? DEFAULT_AXES;

  return {
    status: 'ready',
    data: {
      filters,
      decades: options.map((value) => ({ value, label: formatDecadeLabel(value) })),
      tempo: tempoBounds(tracks),
      summary: summarize(filtered),
      axes,
      scatter: scatterSeries(filtered, axes.x, axes.y),
      songs: songsByPopularity(filtered).map((track) => ({ name: track.name, popularity: track.popularity })),
      correlation: correlationMatrix(filtered),
      selected: input.song
        ? describeSong(filtered, input.song, input.playerTemplate ?? resolvePlayerTemplate(readEnv()))
        : undefined,
      empty: filtered.length === 0,
    },
  };
}
