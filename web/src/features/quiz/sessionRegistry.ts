import { readQuizConfig, type QuizConfig } from '@/src/lib/env';
import { QuizSession, type QuizSessionOptions } from './session';

/**
 * Keeps one isolated QuizSession per session identity, so concurrent players
 * never share quiz progress.
 */
export class QuizSessionRegistry {
  readonly #sessions = new Map<string, QuizSession>();
  readonly #options: QuizSessionOptions;

  constructor(options: QuizSessionOptions = {}) {
    this.#options = options;
  }

  static fromConfig(
    config: Pick<QuizConfig, 'roundLimit'> = readQuizConfig(),
    options: Omit<QuizSessionOptions, 'roundLimit'> = {},
  ): QuizSessionRegistry {
    return new QuizSessionRegistry({ ...options, roundLimit: config.roundLimit });
  }

  get size(): number {
    return this.#sessions.size;
  }

  get(sessionId: string): QuizSession {
    const existing = this.#sessions.get(sessionId);
    if (existing) return existing;
    const session = new QuizSession(this.#options);
    this.#sessions.set(sessionId, session);
    return session;
  }

  has(sessionId: string): boolean {
    return this.#sessions.has(sessionId);
  }

  discard(sessionId: string): boolean {
    return this.#sessions.delete(sessionId);
  }
}
