// Quiz and leaderboard errors
// Path: web/src/features/quiz/errors.ts

export type QuizErrorKind = 'invalid-state-transition' | 'invalid-entry' | 'invalid-guess' | 'empty-pool';

export type QuizErrorOptions = {
  from?: string;
  action?: string;
  cause?: unknown;
  details?: unknown;
};

export class QuizError extends Error {
  readonly kind: QuizErrorKind;
  readonly from?: string;
  readonly action?: string;
  readonly details?: unknown;
  readonly cause?: unknown;

  constructor(kind: QuizErrorKind, message: string, options: QuizErrorOptions = {}) {
    super(message);
    this.name = 'QuizError';
    this.kind = kind;
    this.from = options.from;
    this.action = options.action;
    this.details = options.details;
    this.cause = options.cause;

    if (options.cause) {
      Error.captureStackTrace(this, QuizError);
    }
  }
}

export function isQuizError(error: unknown, kind?: QuizErrorKind): error is QuizError {
  if (!(error instanceof QuizError)) return false;
  return kind === undefined || error.kind === kind;
}

export function invalidTransition(from: string, action: string): QuizError {
  return new QuizError('invalid-state-transition', `Cannot ${action} while the session is ${from}`, { from, action });
}

export function mapQuizErrorToMessage(error: unknown): string {
  if (!isQuizError(error)) {
    return 'Something went wrong. Please start a new quiz.';
  }

  switch (error.kind) {
    case 'invalid-entry':
      return 'Please enter a name before saving your score.';
    case 'invalid-guess':
      return 'Each guess must be a number between 0 and 100.';
    case 'empty-pool':
      return 'No songs match the current selection. Adjust the filters to play.';
    case 'invalid-state-transition':
      return 'That action is not available right now. Please start a new quiz.';
    default:
      return 'Something went wrong. Please start a new quiz.';
  }
}
