/**
 * Game API Provider tests (stubbed fetch)
 */

import { describe, it, expect } from 'vitest';
import { GameApiProvider } from '../../../providers/game-api-provider.js';
import { HTTPClient } from '../../../core/http-client.js';
import { MalformedInputError, UpstreamFetchError } from '../../../core/errors.js';
import { coord, routeFetch } from '../../helpers/fixtures.js';

const BASE = 'https://game.test/api';

/**
 * Serves one highscore page per "type" query value
 */
function highscoreProvider(pages: Readonly<Record<string, unknown>>) {
  const urls: string[] = [];
  const fetch = async (input: string): Promise<Response> => {
    urls.push(input);
    const page = pages[new URL(input).searchParams.get('type') ?? ''];
    if (page === undefined) {
      return new Response('not found', { status: 404, statusText: 'Not Found' });
    }
    return new Response(JSON.stringify(page), { headers: { 'Content-Type': 'application/json' } });
  };
  return { provider: new GameApiProvider(BASE, new HTTPClient({ fetch })), urls };
}

function createProvider(routes: Record<string, unknown>) {
  const stub = routeFetch(routes);
  return { provider: new GameApiProvider(BASE, new HTTPClient({ fetch: stub.fetch })), urls: stub.urls };
}

describe('GameApiProvider', () => {
  it('fetches the roster', async () => {
    const { provider, urls } = createProvider({
      '/players.xml': {
        player: [{ '@attributes': { id: '101', name: 'Nyx' } }, { '@attributes': { id: 102, name: 'Vega', status: 'i' } }],
      },
    });

    expect(await provider.fetchRoster()).toEqual([
      { id: 101, name: 'Nyx' },
      { id: 102, name: 'Vega' },
    ]);
    expect(urls).toEqual(['https://game.test/api/players.xml?toJson=1']);
  });

  it('accepts a single-element roster', async () => {
    const { provider } = createProvider({
      '/players.xml': { player: { '@attributes': { id: '7', name: 'Solo' } } },
    });

    expect(await provider.fetchRoster()).toEqual([{ id: 7, name: 'Solo' }]);
  });

  it('maps a player\'s planets and moons', async () => {
    const { provider, urls } = createProvider({
      '/playerData.xml': {
        planets: {
          planet: [
            { '@attributes': { coords: '1:2:3', name: 'Home' }, moon: { '@attributes': { id: '5', name: 'Moon' } } },
            { '@attributes': { coords: '4:5:6' } },
          ],
        },
      },
    });

    expect(await provider.fetchPlanets(101)).toEqual([
      { coordinate: coord('1:2:3'), hasMoon: true, name: 'Home' },
      { coordinate: coord('4:5:6'), hasMoon: false, name: null },
    ]);
    expect(urls).toEqual(['https://game.test/api/playerData.xml?id=101&toJson=1']);
  });

  it('rejects planets with bad coordinates', async () => {
    const { provider } = createProvider({
      '/playerData.xml': { planets: { planet: [{ '@attributes': { coords: '1:2' } }] } },
    });

    await expect(provider.fetchPlanets(101)).rejects.toBeInstanceOf(MalformedInputError);
  });

  it('loads technology names', async () => {
    const { provider } = createProvider({
      '/localization.xml': {
        techs: {
          name: [
            { '@attributes': { id: '109' }, '@value': 'Weapons Technology' },
            { '@attributes': { id: '204' }, '@value': 'Light Fighter' },
          ],
        },
      },
    });

    expect(await provider.fetchTechnologyNames()).toEqual(
      new Map([
        [109, 'Weapons Technology'],
        [204, 'Light Fighter'],
      ])
    );
  });

  it('wraps HTTP failures as upstream errors', async () => {
    const { provider } = createProvider({});
    const error = await provider.fetchRoster().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamFetchError);
    expect(error instanceof UpstreamFetchError && error.feed).toBe('roster');
    expect(error instanceof UpstreamFetchError && error.url).toBe('https://game.test/api/players.xml?toJson=1');
    expect(error instanceof UpstreamFetchError && error.message).toBe('roster request failed: HTTP 404: Not Found');
  });

  it('reports an unparseable body as malformed input', async () => {
    const client = new HTTPClient({ fetch: async () => new Response('<players/>') });
    const provider = new GameApiProvider(BASE, client);

    await expect(provider.fetchRoster()).rejects.toThrow(MalformedInputError);
  });
});

describe('GameApiProvider.fetchHighscores', () => {
  it('merges the score categories per player', async () => {
    const { provider, urls } = highscoreProvider({
      '0': {
        '@attributes': { category: '1', type: '0', timestamp: '1709290000' },
        player: [
          { '@attributes': { position: '5', id: '9', score: '1000' } },
          { '@attributes': { position: '7', id: '10', score: '800' } },
        ],
      },
      '3': {
        '@attributes': { timestamp: '1709290060' },
        player: { '@attributes': { position: '8', id: '9', score: '300' } },
      },
      '5': {
        '@attributes': { timestamp: 1709290120 },
        player: [
          { '@attributes': { position: 2, id: 9, score: 400 } },
          { '@attributes': { position: 40, id: 11, score: 50 } },
        ],
      },
    });

    const table = await provider.fetchHighscores();
    const publishedAt = new Date(1709290120 * 1000);

    expect(table.publishedAt).toEqual(publishedAt);
    expect(table.snapshots).toEqual([
      {
        playerId: 9,
        createdAt: publishedAt,
        totalPoints: 1000,
        totalRank: 5,
        militaryPoints: 300,
        militaryRank: 8,
        militaryBuiltPoints: 400,
      },
      {
        playerId: 10,
        createdAt: publishedAt,
        totalPoints: 800,
        totalRank: 7,
        militaryPoints: null,
        militaryRank: null,
        militaryBuiltPoints: null,
      },
      {
        playerId: 11,
        createdAt: publishedAt,
        totalPoints: null,
        totalRank: null,
        militaryPoints: null,
        militaryRank: null,
        militaryBuiltPoints: 50,
      },
    ]);
    expect(urls).toEqual([
      'https://game.test/api/highscore.xml?toJson=1&category=1&type=0',
      'https://game.test/api/highscore.xml?toJson=1&category=1&type=3',
      'https://game.test/api/highscore.xml?toJson=1&category=1&type=5',
    ]);
  });

  it('rejects a page without a timestamp', async () => {
    const { provider } = highscoreProvider({
      '0': { '@attributes': { timestamp: '1709290000' }, player: [] },
      '3': { player: [] },
      '5': { '@attributes': { timestamp: '1709290000' }, player: [] },
    });

    await expect(provider.fetchHighscores()).rejects.toBeInstanceOf(MalformedInputError);
  });

  it('fails as a whole when one category is unavailable', async () => {
    const { provider, urls } = highscoreProvider({
      '0': { '@attributes': { timestamp: '1709290000' }, player: [] },
    });

    await expect(provider.fetchHighscores()).rejects.toBeInstanceOf(UpstreamFetchError);
    expect(urls).toHaveLength(2);
  });
});
