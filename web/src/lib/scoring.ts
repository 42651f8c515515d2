import {
  SCORED_FEATURES,
  type EndReason,
  type FeatureResult,
  type Guesses,
  type QuizTrack,
  type RoundResult,
  type SessionSummary,
} from '@/src/features/quiz/types';

export const MAX_FEATURE_SCORE = 100;
export const MAX_ROUND_SCORE = MAX_FEATURE_SCORE * SCORED_FEATURES.length;

/**
 * Linear-decay score for one feature: 100 for an exact guess, one point less
 * per unit of distance, never below 0.
 *
 * @param guess - Guessed value on the 0-100 scale
 * @param actual - Track value on the same scale
 */
export function scoreGuess(guess: number, actual: number): number {
  return Math.round(Math.max(0, MAX_FEATURE_SCORE - Math.abs(guess - actual)));
}

/**
 * Scores all four features of a round. The round total is their sum (max 400).
 */
export function scoreRound(track: QuizTrack, guesses: Guesses): { features: FeatureResult[]; total: number } {
  const features = SCORED_FEATURES.map((feature) => ({
    feature,
    guess: guesses[feature],
    actual: track[feature],
    score: scoreGuess(guesses[feature], track[feature]),
  }));
  return { features, total: features.reduce((sum, result) => sum + result.score, 0) };
}

/**
 * Composes the session summary shown at the end and handed to the leaderboard.
 */
export function composeSummary(input: {
  rounds: RoundResult[];
  total: number;
  startedAt?: string;
  finishedAt?: string;
  endReason?: EndReason;
}): SessionSummary {
  const summary: SessionSummary = {
    total: input.total,
    maxTotal: input.rounds.length * MAX_ROUND_SCORE,
    roundCount: input.rounds.length,
    rounds: input.rounds,
    startedAt: input.startedAt,
    finishedAt: input.finishedAt,
    endReason: input.endReason,
  };
  if (input.startedAt && input.finishedAt) {
    const a = Date.parse(input.startedAt);
    const b = Date.parse(input.finishedAt);
    if (!Number.isNaN(a) && !Number.isNaN(b) && b >= a) summary.durationMs = b - a;
  }
  return summary;
}
