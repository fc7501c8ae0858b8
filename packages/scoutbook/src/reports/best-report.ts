/**
 * Best-Report Selector
 *
 * Picks the one report treated as current truth for a player:
 *   1. the latest user-simulated report created within the freshness window;
 *   2. otherwise the primary-scout report with the greatest
 *      (military strength, createdAt);
 *   3. otherwise none.
 *
 * Pure over an in-memory list so the policy is testable without storage.
 */

import type { Report } from '../core/types.js';
import { DEFAULT_PEACEFUL_SHIP_TYPES, DEFAULT_SIMULATED_FRESHNESS_DAYS, MS_PER_DAY } from '../core/constants.js';
import { militaryStrength } from './military-strength.js';

export interface BestReportOptions {
  readonly now: Date;
  readonly simulatedFreshnessMs?: number;
  readonly peacefulShipTypes?: ReadonlySet<number>;
}

const DEFAULT_FRESHNESS_MS = DEFAULT_SIMULATED_FRESHNESS_DAYS * MS_PER_DAY;

/**
 * Ties on createdAt fall back to token order so repeated calls agree
 * regardless of input order.
 */
function laterOf(a: Report, b: Report): Report {
  const diff = a.createdAt.getTime() - b.createdAt.getTime();
  if (diff !== 0) {
    return diff > 0 ? a : b;
  }
  return a.token > b.token ? a : b;
}

export function selectBestReport(reports: readonly Report[], options: BestReportOptions): Report | null {
  const freshnessMs = options.simulatedFreshnessMs ?? DEFAULT_FRESHNESS_MS;
  const peaceful = options.peacefulShipTypes ?? new Set(DEFAULT_PEACEFUL_SHIP_TYPES);
  const cutoff = options.now.getTime() - freshnessMs;

  let bestSimulated: Report | null = null;
  for (const report of reports) {
    if (report.sourceKind === 'user-simulated' && report.createdAt.getTime() >= cutoff) {
      bestSimulated = bestSimulated ? laterOf(bestSimulated, report) : report;
    }
  }
  if (bestSimulated) {
    return bestSimulated;
  }

  let bestScout: Report | null = null;
  let bestStrength = -Infinity;
  for (const report of reports) {
    if (report.sourceKind !== 'primary-scout') {
      continue;
    }
    const strength = militaryStrength(report.ships, peaceful);
    if (bestScout === null || strength > bestStrength) {
      bestScout = report;
      bestStrength = strength;
    } else if (strength === bestStrength) {
      bestScout = laterOf(bestScout, report);
    }
  }
  return bestScout;
}
