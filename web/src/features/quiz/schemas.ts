import { z } from 'zod'
import type { Guesses } from './types'

const GuessValueSchema = z.number().min(0).max(100)

export const GuessesSchema: z.ZodType<Guesses> = z.object({
  danceability: GuessValueSchema,
  energy: GuessValueSchema,
  valence: GuessValueSchema,
  popularity: GuessValueSchema,
})

export const PlayerNameSchema = z.string().trim().min(1)

export const LeaderboardEntrySchema = z.object({
  name: PlayerNameSchema,
  score: z.number().int().nonnegative(),
  timestamp: z.string().datetime(),
})

export const LeaderboardSchema = z.array(z.unknown())

export type LeaderboardEntry = z.infer<typeof LeaderboardEntrySchema>
