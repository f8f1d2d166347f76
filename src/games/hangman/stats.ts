/**
 * Persistent statistics: one JSON record per installation.
 *
 * Reads never fail: a missing file gives the defaults, a corrupt one gives
 * the defaults plus a warning, and a partial one is backfilled field by
 * field. Writes overwrite the whole record; a failed write is logged and
 * the game carries on.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { type HangmanLogger, createConsoleLogger } from '../../logger';
import { PersistenceReadError, PersistenceWriteError } from './errors';

// ============================================================================
// Schema
// ============================================================================

const count = z.number().int().nonnegative().catch(0);
const ratio = z.number().nonnegative().catch(0);

export const statisticsSchema = z.object({
  gamesPlayed: count,
  wins: count,
  losses: count,
  totalScore: count,
  /** Percentage, 0–100 */
  winRate: ratio,
  averageScore: ratio,
  /** ISO-8601 */
  lastPlayed: z.string().nullable().catch(null),
});

export type Statistics = z.infer<typeof statisticsSchema>;

export function createDefaultStatistics(): Statistics {
  return {
    gamesPlayed: 0,
    wins: 0,
    losses: 0,
    totalScore: 0,
    winRate: 0,
    averageScore: 0,
    lastPlayed: null,
  };
}

// ============================================================================
// Aggregation
// ============================================================================

/**
 * Recompute winRate and averageScore from the counters
 */
export function calculateDerivedStats(stats: Statistics): Statistics {
  if (stats.gamesPlayed === 0) {
    return { ...stats, winRate: 0, averageScore: 0 };
  }
  return {
    ...stats,
    winRate: (stats.wins / stats.gamesPlayed) * 100,
    averageScore: stats.totalScore / stats.gamesPlayed,
  };
}

/**
 * Fold one finished game into the running totals
 */
export function applyOutcome(stats: Statistics, won: boolean, score: number, playedAt: Date): Statistics {
  return calculateDerivedStats({
    ...stats,
    gamesPlayed: stats.gamesPlayed + 1,
    wins: stats.wins + (won ? 1 : 0),
    losses: stats.losses + (won ? 0 : 1),
    totalScore: stats.totalScore + score,
    lastPlayed: playedAt.toISOString(),
  });
}

// ============================================================================
// Store
// ============================================================================

export interface StatisticsStoreOptions {
  logger?: HangmanLogger;
  /** Clock for lastPlayed */
  now?: () => Date;
}

export class StatisticsStore {
  private readonly logger: HangmanLogger;
  private readonly now: () => Date;

  constructor(readonly path: string, options: StatisticsStoreOptions = {}) {
    this.logger = options.logger ?? createConsoleLogger('Statistics');
    this.now = options.now ?? (() => new Date());
  }

  load(): Statistics {
    if (!existsSync(this.path)) return createDefaultStatistics();

    try {
      return parseStatistics(readFileSync(this.path, 'utf-8'), this.path);
    } catch (err) {
      const error = err instanceof PersistenceReadError ? err : new PersistenceReadError(this.path, err);
      this.logger.warn(`${error.message}. Starting fresh.`);
      return createDefaultStatistics();
    }
  }

  /**
   * Overwrite the stored record. Returns false when the write failed.
   */
  save(stats: Statistics): boolean {
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(this.path, `${JSON.stringify(stats, null, 2)}\n`, 'utf-8');
      return true;
    } catch (err) {
      const error = new PersistenceWriteError(this.path, err);
      this.logger.warn(`${error.message}. Statistics for this game were not saved.`);
      return false;
    }
  }

  recordOutcome(won: boolean, score: number): Statistics {
    const updated = applyOutcome(this.load(), won, score, this.now());
    this.save(updated);
    return updated;
  }
}

function parseStatistics(raw: string, path: string): Statistics {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new PersistenceReadError(path, err);
  }

  const parsed = statisticsSchema.safeParse(data);
  if (!parsed.success) {
    throw new PersistenceReadError(path, 'expected a JSON object');
  }
  return parsed.data;
}
