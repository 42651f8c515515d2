import { DEFAULT_ROUND_LIMIT } from '@/src/lib/env';
import { scoreRound } from '@/src/lib/scoring';
import { QuizError, invalidTransition } from './errors';
import type { ActiveRound, EndReason, Guesses, QuizPhase, QuizTrack, RoundResult } from './types';

export type QuizState = {
  phase: QuizPhase;
  roundLimit: number;
  current?: ActiveRound;
  lastResult?: RoundResult;
  rounds: RoundResult[];
  drawnIds: string[];
  total: number;
  startedAt?: string; // ISO string for session start
  finishedAt?: string;
  endReason?: EndReason;
};

export type QuizAction =
  | { type: 'START'; track: QuizTrack; at: string }
  | { type: 'SUBMIT'; guesses: Guesses; at: string }
  // next is undefined when no undrawn track is left
  | { type: 'ADVANCE'; next?: QuizTrack; at: string }
  | { type: 'RESET' };

export function createInitialState(roundLimit: number = DEFAULT_ROUND_LIMIT): QuizState {
  return {
    phase: 'idle',
    roundLimit,
    rounds: [],
    drawnIds: [],
    total: 0,
  };
}

/**
 * Pure transition function. Actions that are not valid in the current phase
 * throw an `invalid-state-transition` QuizError.
 */
export function quizReducer(state: QuizState, action: QuizAction): QuizState {
  switch (action.type) {
    case 'START': {
      if (state.phase !== 'idle') throw invalidTransition(state.phase, 'start');
      return {
        ...createInitialState(state.roundLimit),
        phase: 'in-round',
        current: { index: 1, track: action.track, startedAt: action.at },
        drawnIds: [action.track.id],
        startedAt: action.at,
      };
    }

    case 'SUBMIT': {
      const { current } = state;
      if (state.phase !== 'in-round' || !current) throw invalidTransition(state.phase, 'submit a guess');
      const { features, total } = scoreRound(current.track, action.guesses);
      const result: RoundResult = {
        index: current.index,
        trackId: current.track.id,
        trackName: current.track.name,
        artists: current.track.displayArtists,
        link: current.track.link,
        features,
        total,
        startedAt: current.startedAt,
        submittedAt: action.at,
      };
      return {
        ...state,
        phase: 'round-scored',
        lastResult: result,
        rounds: [...state.rounds, result],
        total: state.total + total,
      };
    }

    case 'ADVANCE': {
      if (state.phase !== 'round-scored') throw invalidTransition(state.phase, 'advance to the next round');
      const limitReached = state.drawnIds.length >= state.roundLimit;
      if (limitReached || !action.next) {
        return {
          ...state,
          phase: 'finished',
          current: undefined,
          finishedAt: action.at,
          endReason: limitReached ? 'round-limit' : 'pool-exhausted',
        };
      }
      if (state.drawnIds.includes(action.next.id)) {
        throw new QuizError('invalid-state-transition', `Track ${action.next.id} was already drawn`, {
          from: state.phase,
          action: 'advance to the next round',
        });
      }
      return {
        ...state,
        phase: 'in-round',
        current: { index: state.rounds.length + 1, track: action.next, startedAt: action.at },
        drawnIds: [...state.drawnIds, action.next.id],
      };
    }

    case 'RESET':
      return createInitialState(state.roundLimit);

    default:
      return state;
  }
}
