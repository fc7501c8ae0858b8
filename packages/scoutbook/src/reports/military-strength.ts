/**
 * Military strength: total ship count with peaceful ship types excluded.
 * Unweighted by ship class.
 */

import type { ShipLine } from '../core/types.js';
import { DEFAULT_PEACEFUL_SHIP_TYPES } from '../core/constants.js';

export type ShipCounts = ReadonlyMap<number, number>;

const DEFAULT_PEACEFUL = new Set(DEFAULT_PEACEFUL_SHIP_TYPES);

export function militaryShips(
  ships: ShipCounts,
  peacefulShipTypes: ReadonlySet<number> = DEFAULT_PEACEFUL
): Map<number, number> {
  const military = new Map<number, number>();
  for (const [shipType, count] of ships) {
    if (!peacefulShipTypes.has(shipType)) {
      military.set(shipType, count);
    }
  }
  return military;
}

export function militaryStrength(
  ships: ShipCounts | readonly ShipLine[],
  peacefulShipTypes: ReadonlySet<number> = DEFAULT_PEACEFUL
): number {
  const entries: Iterable<readonly [number, number]> = isShipLines(ships)
    ? ships.map((line) => [line.shipType, line.count] as const)
    : ships;

  let total = 0;
  for (const [shipType, count] of entries) {
    if (!peacefulShipTypes.has(shipType)) {
      total += count;
    }
  }
  return total;
}

function isShipLines(ships: ShipCounts | readonly ShipLine[]): ships is readonly ShipLine[] {
  return Array.isArray(ships);
}
