import { z } from 'zod';

export const DEFAULT_ROUND_LIMIT = 5;
export const DEFAULT_LEADERBOARD_LIMIT = 5;
export const DEFAULT_LEADERBOARD_PATH = 'data/leaderboard.json';

const QuizConfigSchema = z.object({
  QUIZ_ROUND_LIMIT: z.coerce.number().int().min(1).default(DEFAULT_ROUND_LIMIT),
  LEADERBOARD_LIMIT: z.coerce.number().int().min(1).default(DEFAULT_LEADERBOARD_LIMIT),
  LEADERBOARD_PATH: z.string().trim().min(1).default(DEFAULT_LEADERBOARD_PATH),
});

export type QuizConfig = {
  roundLimit: number;
  leaderboardLimit: number;
  leaderboardPath: string;
};

function blankToUndefined(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value : undefined;
}

/**
 * Reads quiz settings from the environment. Blank values fall back to the
 * defaults; anything else that does not parse throws a ZodError.
 */
export function readQuizConfig(source: NodeJS.ProcessEnv = process.env): QuizConfig {
  const parsed = QuizConfigSchema.parse({
    QUIZ_ROUND_LIMIT: blankToUndefined(source.QUIZ_ROUND_LIMIT),
    LEADERBOARD_LIMIT: blankToUndefined(source.LEADERBOARD_LIMIT),
    LEADERBOARD_PATH: blankToUndefined(source.LEADERBOARD_PATH),
  });
  return {
    roundLimit: parsed.QUIZ_ROUND_LIMIT,
    leaderboardLimit: parsed.LEADERBOARD_LIMIT,
    leaderboardPath: parsed.LEADERBOARD_PATH,
  };
}
