import { mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { QuizError } from '@/src/features/quiz/errors';
import {
  LeaderboardEntrySchema,
  LeaderboardSchema,
  PlayerNameSchema,
  type LeaderboardEntry,
} from '@/src/features/quiz/schemas';
import type { SessionSummary } from '@/src/features/quiz/types';
import { DEFAULT_LEADERBOARD_LIMIT, readQuizConfig, type QuizConfig } from './env';
import { dwarn } from './logger';

export type { LeaderboardEntry };

export const LEADERBOARD_KEY = 'explorer.leaderboard';

/**
 * Persistence for the leaderboard. `load` returns whatever was stored (or
 * undefined); the store validates it. `save` overwrites everything.
 */
export interface LeaderboardBackend {
  load(): unknown;
  save(entries: LeaderboardEntry[]): void;
}

export type RecordResult = {
  entry: LeaderboardEntry;
  entries: LeaderboardEntry[];
  rank?: number; // 1-based; undefined when the entry did not make the board
};

function parseJson(json: string): unknown {
  try {
    return JSON.parse(json);
  } catch {
    dwarn('leaderboard: stored value is not valid JSON, starting empty');
    return undefined;
  }
}

/** Backend over a Web Storage object such as localStorage. */
export function createStorageBackend(storage: Storage, key: string = LEADERBOARD_KEY): LeaderboardBackend {
  return {
    load() {
      const raw = storage.getItem(key);
      return raw ? parseJson(raw) : undefined;
    },
    save(entries) {
      storage.setItem(key, JSON.stringify(entries));
    },
  };
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Backend over a JSON file. Writes go to a temp file that is renamed over the
 * target, so readers never see a half-written board.
 */
export function createFileBackend(filePath: string): LeaderboardBackend {
  return {
    load() {
      let raw: string;
      try {
        raw = readFileSync(filePath, 'utf8');
      } catch (error) {
        if (isMissingFile(error)) return undefined;
        throw error;
      }
      return parseJson(raw);
    },
    save(entries) {
      mkdirSync(path.dirname(filePath), { recursive: true });
      const tmp = `${filePath}.${process.pid}.tmp`;
      writeFileSync(tmp, `${JSON.stringify(entries, null, 2)}\n`, 'utf8');
      renameSync(tmp, filePath);
    },
  };
}

/**
 * Sorts by score descending and keeps the first `limit`. The sort is stable,
 * so on equal scores the earlier entry stays ahead.
 */
export function rankEntries(entries: readonly LeaderboardEntry[], limit: number): LeaderboardEntry[] {
  return [...entries].sort((a, b) => b.score - a.score).slice(0, limit);
}

export class LeaderboardStore {
  readonly #backend: LeaderboardBackend;
  readonly #limit: number;
  readonly #now: () => Date;

  constructor(backend: LeaderboardBackend, options: { limit?: number; now?: () => Date } = {}) {
    this.#backend = backend;
    this.#limit = options.limit ?? DEFAULT_LEADERBOARD_LIMIT;
    this.#now = options.now ?? (() => new Date());
  }

  get limit(): number {
    return this.#limit;
  }

  load(): LeaderboardEntry[] {
    const stored = LeaderboardSchema.safeParse(this.#backend.load());
    if (!stored.success) return [];

    const entries: LeaderboardEntry[] = [];
    for (const item of stored.data) {
      const parsed = LeaderboardEntrySchema.safeParse(item);
      if (parsed.success) {
        entries.push(parsed.data);
      } else {
        dwarn('leaderboard: skipping invalid entry', item);
      }
    }
    return rankEntries(entries, this.#limit);
  }

  record(name: string, score: number): RecordResult {
    const parsedName = PlayerNameSchema.safeParse(name);
    if (!parsedName.success) {
      throw new QuizError('invalid-entry', 'A name is required to save a score', { details: parsedName.error.issues });
    }
    if (!Number.isInteger(score) || score < 0) {
      throw new QuizError('invalid-entry', `Score must be a non-negative integer, got ${score}`);
    }

    const entry: LeaderboardEntry = { name: parsedName.data, score, timestamp: this.#now().toISOString() };
    const entries = rankEntries([...this.load(), entry], this.#limit);
    this.#backend.save(entries);

    const index = entries.indexOf(entry);
    return { entry, entries, rank: index >= 0 ? index + 1 : undefined };
  }

  recordSession(name: string, summary: SessionSummary): RecordResult {
    return this.record(name, summary.total);
  }
}

/** File-backed leaderboard at LEADERBOARD_PATH, keeping LEADERBOARD_LIMIT entries. */
export function openFileLeaderboard(
  config: Pick<QuizConfig, 'leaderboardPath' | 'leaderboardLimit'> = readQuizConfig(),
): LeaderboardStore {
  return new LeaderboardStore(createFileBackend(config.leaderboardPath), { limit: config.leaderboardLimit });
}
