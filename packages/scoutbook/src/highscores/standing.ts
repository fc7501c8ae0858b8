/**
 * Highscore Standing
 *
 * Decides whether a freshly published highscore table is worth storing, and
 * compares a player's two newest snapshots.
 */

import type { HighscoreScores, HighscoreSnapshot } from '../core/types.js';
import { HIGHSCORE_MIN_INTERVAL_MS } from '../core/constants.js';

/**
 * Change between two snapshots, field by field. Points grow upwards; a
 * positive rank change means the player dropped in the table. Null where
 * either side lacks the field.
 */
export type ScoreDelta = { readonly [K in keyof HighscoreScores]: number | null };

export interface PlayerStanding {
  readonly playerId: number;
  readonly latest: HighscoreSnapshot | null;
  readonly previous: HighscoreSnapshot | null;
  /** Null until two snapshots exist */
  readonly delta: ScoreDelta | null;
}

const SCORE_FIELDS: readonly (keyof HighscoreScores)[] = [
  'totalPoints',
  'totalRank',
  'militaryPoints',
  'militaryRank',
  'militaryBuiltPoints',
];

/**
 * A table is due once it was published at least minIntervalMs after the
 * newest stored snapshot. Anything older or equal never is.
 */
export function isSnapshotDue(
  latestStored: Date | null,
  publishedAt: Date,
  minIntervalMs: number = HIGHSCORE_MIN_INTERVAL_MS
): boolean {
  if (latestStored === null) {
    return true;
  }
  return publishedAt.getTime() - latestStored.getTime() >= minIntervalMs;
}

function fieldDelta(latest: number | null, previous: number | null): number | null {
  return latest === null || previous === null ? null : latest - previous;
}

export function scoreDelta(latest: HighscoreScores, previous: HighscoreScores): ScoreDelta {
  const delta: Record<keyof HighscoreScores, number | null> = {
    totalPoints: null,
    totalRank: null,
    militaryPoints: null,
    militaryRank: null,
    militaryBuiltPoints: null,
  };
  for (const field of SCORE_FIELDS) {
    delta[field] = fieldDelta(latest[field], previous[field]);
  }
  return delta;
}

/**
 * @param snapshots - the player's snapshots, newest first
 */
export function computeStanding(playerId: number, snapshots: readonly HighscoreSnapshot[]): PlayerStanding {
  const [latest = null, previous = null] = snapshots;
  return {
    playerId,
    latest,
    previous,
    delta: latest && previous ? scoreDelta(latest, previous) : null,
  };
}
