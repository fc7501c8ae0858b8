/**
 * Highscore Standing Tests
 */

import { describe, it, expect } from 'vitest';
import { computeStanding, isSnapshotDue } from '../../../highscores/standing.js';
import type { HighscoreSnapshot } from '../../../core/types.js';

const MINUTE = 60 * 1000;

function snapshot(iso: string, overrides: Partial<HighscoreSnapshot> = {}): HighscoreSnapshot {
  return {
    playerId: 9,
    createdAt: new Date(iso),
    totalPoints: 1000,
    totalRank: 5,
    militaryPoints: 300,
    militaryRank: 8,
    militaryBuiltPoints: 400,
    ...overrides,
  };
}

describe('isSnapshotDue', () => {
  const latest = new Date('2024-03-01T10:00:00.000Z');

  it('stores the first table unconditionally', () => {
    expect(isSnapshotDue(null, latest)).toBe(true);
  });

  it('needs at least five minutes past the newest stored snapshot', () => {
    expect(isSnapshotDue(latest, new Date(latest.getTime() + 5 * MINUTE))).toBe(true);
    expect(isSnapshotDue(latest, new Date(latest.getTime() + 5 * MINUTE - 1))).toBe(false);
  });

  it('never stores a table that is not newer', () => {
    expect(isSnapshotDue(latest, latest)).toBe(false);
    expect(isSnapshotDue(latest, new Date(latest.getTime() - 60 * MINUTE))).toBe(false);
  });

  it('takes a custom interval', () => {
    expect(isSnapshotDue(latest, new Date(latest.getTime() + 1), 0)).toBe(true);
  });
});

describe('computeStanding', () => {
  it('has no delta without two snapshots', () => {
    expect(computeStanding(9, [])).toEqual({ playerId: 9, latest: null, previous: null, delta: null });

    const only = snapshot('2024-03-01T10:00:00.000Z');
    expect(computeStanding(9, [only])).toEqual({ playerId: 9, latest: only, previous: null, delta: null });
  });

  it('subtracts the previous snapshot field by field', () => {
    const latest = snapshot('2024-03-02T10:00:00.000Z', { totalPoints: 1400, totalRank: 3, militaryPoints: 250 });
    const previous = snapshot('2024-03-01T10:00:00.000Z');

    expect(computeStanding(9, [latest, previous]).delta).toEqual({
      totalPoints: 400,
      totalRank: -2,
      militaryPoints: -50,
      militaryRank: 0,
      militaryBuiltPoints: 0,
    });
  });

  it('leaves a field null when either side lacks it', () => {
    const latest = snapshot('2024-03-02T10:00:00.000Z', { militaryRank: null });
    const previous = snapshot('2024-03-01T10:00:00.000Z', { militaryBuiltPoints: null });

    const standing = computeStanding(9, [latest, previous]);

    expect(standing.delta?.militaryRank).toBeNull();
    expect(standing.delta?.militaryBuiltPoints).toBeNull();
    expect(standing.delta?.totalPoints).toBe(0);
  });
});
