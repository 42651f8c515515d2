// Path: web/src/features/quiz/datasource.ts
import {
  isDatasetError,
  mapDatasetErrorToMessage,
  type Dataset,
  type DatasetErrorKind,
  type DatasetLoader,
} from '@feature-explorer/workers';
import { derr, dlog } from '@/src/lib/logger';
import { applyFilters, type ExplorerFilters } from '../explorer/filters';
import { isQuizError, mapQuizErrorToMessage } from './errors';
import type { QuizSession } from './session';
import type { ActiveRound } from './types';

export type DataErrorKind = DatasetErrorKind | 'empty-dataset' | 'empty-pool';

export type DataErrorState = { status: 'error'; kind: DataErrorKind; message: string };

export type DataState<T> = { status: 'ready'; data: T } | DataErrorState;

export const EMPTY_DATASET_MESSAGE = 'No loadable data found in the dataset.';

/**
 * Loads the cached dataset. Data and schema failures become an error state
 * the view renders instead of charts; anything else is rethrown.
 */
export async function loadTracks(loader: DatasetLoader): Promise<DataState<Dataset>> {
  try {
    const dataset = await loader.load();
    if (dataset.tracks.length === 0) {
      return { status: 'error', kind: 'empty-dataset', message: EMPTY_DATASET_MESSAGE };
    }
    dlog('dataset ready', dataset.source.location, dataset.tracks.length);
    return { status: 'ready', data: dataset };
  } catch (error) {
    if (isDatasetError(error)) {
      derr('dataset unavailable', error.kind, error.message);
      return { status: 'error', kind: error.kind, message: mapDatasetErrorToMessage(error) };
    }
    throw error;
  }
}

/**
 * Starts a quiz over the (optionally filtered) dataset.
 */
export async function startQuiz(
  loader: DatasetLoader,
  session: QuizSession,
  filters?: ExplorerFilters,
): Promise<DataState<ActiveRound>> {
  const loaded = await loadTracks(loader);
  if (loaded.status === 'error') return loaded;

  const pool = filters ? applyFilters(loaded.data.tracks, filters) : loaded.data.tracks;
  try {
    return { status: 'ready', data: session.start(pool) };
  } catch (error) {
    if (isQuizError(error, 'empty-pool')) {
      return { status: 'error', kind: 'empty-pool', message: mapQuizErrorToMessage(error) };
    }
    throw error;
  }
}
