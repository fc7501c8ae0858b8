/**
 * Manual-edit protection
 *
 * A planet asserted by a non-bulk source carries `manualEditAt`. While
 * `now - manualEditAt` is inside the trust window, bulk-scan absence must not
 * mark it destroyed. Recomputed on every read; nothing expires in the
 * background.
 */

import type { Planet } from '../core/types.js';
import { DEFAULT_TRUST_WINDOW_DAYS, MS_PER_DAY } from '../core/constants.js';

export const DEFAULT_TRUST_WINDOW_MS = DEFAULT_TRUST_WINDOW_DAYS * MS_PER_DAY;

export function isProtected(
  planet: Pick<Planet, 'manualEditAt'>,
  now: Date,
  trustWindowMs: number = DEFAULT_TRUST_WINDOW_MS
): boolean {
  if (planet.manualEditAt === null) {
    return false;
  }
  return now.getTime() - planet.manualEditAt.getTime() < trustWindowMs;
}
