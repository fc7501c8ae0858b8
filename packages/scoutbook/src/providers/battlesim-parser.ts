/**
 * Battle-simulator export parser
 *
 * Format: `key;value|key;value|...`. The reserved key `coords` carries the
 * coordinate; every numeric key is a type id, technologies below the
 * threshold and ships (or defences) at or above it. Unknown non-numeric keys
 * are ignored.
 */

import type { Coordinate } from '../core/types.js';
import { parseCoordinate } from '../core/coordinates.js';
import { MalformedInputError } from '../core/errors.js';
import { BATTLESIM_COORDS_KEY, DEFAULT_TECH_SHIP_THRESHOLD, HUNDRED_GLYPH } from '../core/constants.js';
import { BattleSimStringSchema, parseOrThrow } from '../security/input-validator.js';

export interface BattleSimExport {
  readonly coordinate: Coordinate | null;
  readonly ships: Map<number, number>;
  readonly techs: Map<number, number>;
}

const SOURCE = 'battle-simulator string';

/**
 * Undo the chat-client emoji substitution of ":100:"
 */
export function normalizeReportKey(raw: string): string {
  return raw.trim().replaceAll(HUNDRED_GLYPH, ':100:');
}

export function parseBattleSimString(
  raw: string,
  threshold: number = DEFAULT_TECH_SHIP_THRESHOLD
): BattleSimExport {
  const input = parseOrThrow(BattleSimStringSchema, raw, SOURCE);

  let coordinate: Coordinate | null = null;
  const ships = new Map<number, number>();
  const techs = new Map<number, number>();
  const issues: string[] = [];

  for (const part of input.split('|')) {
    if (part.length === 0) {
      continue;
    }

    const fields = part.split(';');
    if (fields.length !== 2) {
      issues.push(`entry "${part}" is not "key;value"`);
      continue;
    }
    const [key = '', value = ''] = fields;

    if (key === BATTLESIM_COORDS_KEY) {
      try {
        coordinate = parseCoordinate(value, SOURCE);
      } catch (error) {
        if (!(error instanceof MalformedInputError)) throw error;
        issues.push(...error.issues);
      }
      continue;
    }

    if (!/^\d+$/.test(key)) {
      continue;
    }
    if (!/^\d+$/.test(value)) {
      issues.push(`value for ${key} must be a non-negative integer, got "${value}"`);
      continue;
    }

    const typeId = Number.parseInt(key, 10);
    const target = typeId < threshold ? techs : ships;
    target.set(typeId, Number.parseInt(value, 10));
  }

  if (issues.length > 0) {
    throw new MalformedInputError(SOURCE, issues);
  }
  return { coordinate, ships, techs };
}
