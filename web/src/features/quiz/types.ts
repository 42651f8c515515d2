import type { TrackRecord } from '@feature-explorer/workers';

export const SCORED_FEATURES = ['danceability', 'energy', 'valence', 'popularity'] as const;
export type ScoredFeature = (typeof SCORED_FEATURES)[number];

export type Guesses = Record<ScoredFeature, number>;

// The quiz only reads these fields; it never mutates a track.
export type QuizTrack = Pick<TrackRecord, 'id' | 'name' | 'displayArtists' | 'link' | ScoredFeature>;

export type QuizPhase = 'idle' | 'in-round' | 'round-scored' | 'finished';

export type EndReason = 'round-limit' | 'pool-exhausted';

export type FeatureResult = {
  feature: ScoredFeature;
  guess: number;
  actual: number;
  score: number;
};

export type ActiveRound = {
  index: number; // 1-based
  track: QuizTrack;
  startedAt: string; // ISO8601
};

export type RoundResult = {
  index: number;
  trackId: string;
  trackName: string;
  artists: string;
  link?: string;
  features: FeatureResult[];
  total: number;
  startedAt: string;
  submittedAt: string;
};

export type SessionSummary = {
  total: number;
  maxTotal: number;
  roundCount: number;
  rounds: RoundResult[];
  startedAt?: string;
  finishedAt?: string;
  durationMs?: number;
  endReason?: EndReason;
};
