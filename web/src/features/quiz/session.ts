import { dlog } from '@/src/lib/logger';
import { composeSummary } from '@/src/lib/scoring';
import { drawTrack, uniqueById, type RandomSource } from './draw';
import { QuizError, invalidTransition } from './errors';
import { GuessesSchema } from './schemas';
import { createInitialState, quizReducer, type QuizAction, type QuizState } from './sessionReducer';
import type { ActiveRound, QuizPhase, QuizTrack, RoundResult, SessionSummary } from './types';

export type QuizSessionOptions = {
  roundLimit?: number;
  random?: RandomSource;
  now?: () => Date;
};

export type SessionCommand = 'start' | 'submit' | 'next' | 'finish';

const PHASE_FOR_COMMAND: Record<SessionCommand, QuizPhase> = {
  start: 'idle',
  submit: 'in-round',
  next: 'round-scored',
  finish: 'finished',
};

const COMMAND_LABEL: Record<SessionCommand, string> = {
  start: 'start',
  submit: 'submit a guess',
  next: 'advance to the next round',
  finish: 'finish',
};

/**
 * One player's quiz. Holds the pool, the clock and the random source, and
 * drives the reducer through explicit transitions.
 */
export class QuizSession {
  #state: QuizState;
  #pool: readonly QuizTrack[] = [];
  #summary?: SessionSummary;
  readonly #random: RandomSource;
  readonly #now: () => Date;

  constructor(options: QuizSessionOptions = {}) {
    this.#state = createInitialState(options.roundLimit);
    this.#random = options.random ?? Math.random;
    this.#now = options.now ?? (() => new Date());
  }

  get state(): QuizState {
    return this.#state;
  }

  get phase(): QuizPhase {
    return this.#state.phase;
  }

  get currentRound(): ActiveRound | undefined {
    return this.#state.current;
  }

  get total(): number {
    return this.#state.total;
  }

  /** Whether a command is valid right now; lets the UI disable controls. */
  can(command: SessionCommand): boolean {
    return this.#state.phase === PHASE_FOR_COMMAND[command];
  }

  start(pool: readonly QuizTrack[]): ActiveRound {
    this.#assertPhase('start');
    if (pool.length === 0) {
      throw new QuizError('empty-pool', 'Cannot start a quiz without tracks');
    }
    this.#pool = uniqueById(pool);
    this.#summary = undefined;

    const track = drawTrack(this.#pool, new Set<string>(), this.#random);
    if (!track) {
      throw new QuizError('empty-pool', 'Cannot start a quiz without tracks');
    }
    this.#dispatch({ type: 'START', track, at: this.#timestamp() });
    return this.#requireCurrent();
  }

  submitGuess(guesses: unknown): RoundResult {
    this.#assertPhase('submit');
    const parsed = GuessesSchema.safeParse(guesses);
    if (!parsed.success) {
      throw new QuizError('invalid-guess', 'Guesses must be numbers between 0 and 100', {
        details: parsed.error.issues,
      });
    }
    this.#dispatch({ type: 'SUBMIT', guesses: parsed.data, at: this.#timestamp() });
    const result = this.#state.lastResult;
    if (!result) throw invalidTransition(this.#state.phase, 'submit a guess');
    return result;
  }

  /**
   * Draws the next round, or finishes the session when the round limit is
   * reached or no undrawn track is left. Returns the new round, if any.
   */
  nextRound(): ActiveRound | undefined {
    this.#assertPhase('next');
    const limitReached = this.#state.drawnIds.length >= this.#state.roundLimit;
    const next = limitReached ? undefined : drawTrack(this.#pool, new Set(this.#state.drawnIds), this.#random);
    this.#dispatch({ type: 'ADVANCE', next, at: this.#timestamp() });
    return this.#state.current;
  }

  finish(): SessionSummary {
    this.#assertPhase('finish');
    if (!this.#summary) {
      const { rounds, total, startedAt, finishedAt, endReason } = this.#state;
      this.#summary = composeSummary({ rounds, total, startedAt, finishedAt, endReason });
    }
    return this.#summary;
  }

  reset(): void {
    this.#pool = [];
    this.#summary = undefined;
    this.#dispatch({ type: 'RESET' });
  }

  #assertPhase(command: SessionCommand): void {
    if (!this.can(command)) {
      throw invalidTransition(this.#state.phase, COMMAND_LABEL[command]);
    }
  }

  #requireCurrent(): ActiveRound {
    const current = this.#state.current;
    if (!current) throw invalidTransition(this.#state.phase, 'read the current round');
    return current;
  }

  #timestamp(): string {
    return this.#now().toISOString();
  }

  #dispatch(action: QuizAction): void {
    const before = this.#state.phase;
    this.#state = quizReducer(this.#state, action);
    dlog('quiz', action.type, before, '->', this.#state.phase);
  }
}
