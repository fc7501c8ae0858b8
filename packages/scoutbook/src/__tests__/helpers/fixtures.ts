/**
 * Shared test fixtures: in-memory store, fixed clock, report builder
 */

import { SQLiteAdapter } from '../../persistence/adapters/sqlite.js';
import { loadSchemaSQL } from '../../persistence/adapters/factory.js';
import { ScoutbookRepository } from '../../persistence/repository.js';
import { parseCoordinate } from '../../core/coordinates.js';
import { Logger } from '../../core/utils/logger.js';
import type { Clock, Coordinate, Report } from '../../core/types.js';

export const DAY_MS = 24 * 60 * 60 * 1000;

export async function createTestRepository(): Promise<{
  repo: ScoutbookRepository;
  adapter: SQLiteAdapter;
}> {
  const adapter = new SQLiteAdapter(':memory:');
  await adapter.initializeSchema(await loadSchemaSQL());
  return { repo: new ScoutbookRepository(adapter), adapter };
}

/**
 * Clock pinned to a settable instant
 */
export class TestClock {
  private current: Date;

  constructor(start: string | Date = '2024-03-01T12:00:00.000Z') {
    this.current = new Date(start);
  }

  readonly now: Clock = () => new Date(this.current.getTime());

  set(at: string | Date): void {
    this.current = new Date(at);
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export const silentLogger = new Logger({ level: 'error', service: 'test', pretty: true });

export function coord(text: string): Coordinate {
  return parseCoordinate(text);
}

export function makeReport(
  overrides: Partial<Report> & Pick<Report, 'token'>
): Report {
  return {
    playerId: 100,
    createdAt: new Date('2024-03-01T00:00:00.000Z'),
    sourceKind: 'primary-scout',
    coordinate: null,
    fromMoon: false,
    ships: [],
    techs: [],
    resources: null,
    ...overrides,
  };
}

/**
 * Fetch stub answering JSON bodies by URL path suffix; unknown paths get 404.
 * Every requested URL is recorded.
 */
export function routeFetch(routes: Readonly<Record<string, unknown>>): {
  fetch: (input: string, init?: RequestInit) => Promise<Response>;
  urls: string[];
} {
  const urls: string[] = [];
  const fetch = async (input: string): Promise<Response> => {
    urls.push(input);
    const path = new URL(input).pathname;
    const match = Object.keys(routes).find((suffix) => path.endsWith(suffix));
    if (match === undefined) {
      return new Response('not found', { status: 404, statusText: 'Not Found' });
    }
    return new Response(JSON.stringify(routes[match]), { headers: { 'Content-Type': 'application/json' } });
  };
  return { fetch, urls };
}
