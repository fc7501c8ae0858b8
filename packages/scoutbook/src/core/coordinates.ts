/**
 * Coordinate helpers
 *
 * Feeds and simulator strings carry coordinates as "galaxy:system:position".
 */

import type { Coordinate } from './types.js';
import { MalformedInputError } from './errors.js';

const COORDINATE_PATTERN = /^(\d+):(\d+):(\d+)$/;

/**
 * Parse "G:S:P" into a coordinate.
 *
 * @throws MalformedInputError when the string is not three positive integers
 */
export function parseCoordinate(raw: string, source = 'coordinate'): Coordinate {
  const match = COORDINATE_PATTERN.exec(raw.trim());
  if (!match) {
    throw new MalformedInputError(source, [`expected "galaxy:system:position", got "${raw}"`]);
  }

  const galaxy = Number.parseInt(match[1], 10);
  const system = Number.parseInt(match[2], 10);
  const position = Number.parseInt(match[3], 10);
  if (galaxy === 0 || system === 0 || position === 0) {
    throw new MalformedInputError(source, [`coordinate parts must be positive, got "${raw}"`]);
  }

  return { galaxy, system, position };
}

export function formatCoordinate(coordinate: Coordinate): string {
  return `${coordinate.galaxy}:${coordinate.system}:${coordinate.position}`;
}

/**
 * Stable map key for a coordinate
 */
export const coordinateKey = formatCoordinate;

export function sameCoordinate(a: Coordinate | null, b: Coordinate | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return a.galaxy === b.galaxy && a.system === b.system && a.position === b.position;
}

export function compareCoordinates(a: Coordinate, b: Coordinate): number {
  return a.galaxy - b.galaxy || a.system - b.system || a.position - b.position;
}
