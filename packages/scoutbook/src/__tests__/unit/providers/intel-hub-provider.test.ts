/**
 * Intelligence hub provider tests (stubbed fetch)
 */

import { describe, it, expect } from 'vitest';
import { IntelHubProvider } from '../../../providers/intel-hub-provider.js';
import { HTTPClient } from '../../../core/http-client.js';
import { MalformedInputError } from '../../../core/errors.js';
import { coord, routeFetch } from '../../helpers/fixtures.js';

const CONFIG = {
  intelHubBaseUrl: 'https://hub.test/scripts',
  tool: 'scoutbook',
  country: 'us',
  universe: '256',
  teamKey: 'test-team-key',
};

function createProvider(routes: Record<string, unknown>) {
  const stub = routeFetch(routes);
  return { provider: new IntelHubProvider(CONFIG, new HTTPClient({ fetch: stub.fetch })), urls: stub.urls };
}

describe('IntelHubProvider', () => {
  it('maps galaxy positions, moons and in-game timestamps', async () => {
    const { provider, urls } = createProvider({
      '/api_galaxy_get_infos.php': {
        galaxy_array: [
          { galaxy: '1', system: '50', position: '3', moon: { id: '-1' }, timestamp_ig: 1709294400123 },
          { galaxy: 2, system: 7, position: 9, moon: { id: 4711 } },
        ],
      },
    });

    expect(await provider.fetchPositions(9)).toEqual([
      { coordinate: coord('1:50:3'), hasMoon: false, timestamp: new Date(1709294400000) },
      { coordinate: coord('2:7:9'), hasMoon: true, timestamp: null },
    ]);
    expect(urls).toEqual([
      'https://hub.test/scripts/api_galaxy_get_infos.php?tool=scoutbook&country=us&universe=256&team_key=test-team-key&player_id=9',
    ]);
  });

  it('resolves the top report link to a scouting report token', async () => {
    const { provider, urls } = createProvider({
      '/oglight_get_player_infos.php': { top_sr_link: 'https://hub.test/view.php?iid=abc123' },
      '/api_get_report.php': { report: { RESULT_DATA: { generic: { sr_id: 'f00d' } } } },
    });

    expect(await provider.fetchTopReportToken(9)).toBe('sr-us-256-f00d');
    expect(urls[1]).toBe('https://hub.test/scripts/api_get_report.php?iid=abc123&tool=scoutbook&team_key=test-team-key');
  });

  it('returns null when the player has no top report', async () => {
    const { provider, urls } = createProvider({
      '/oglight_get_player_infos.php': { top_sr_link: null },
    });

    expect(await provider.fetchTopReportToken(9)).toBeNull();
    expect(urls).toHaveLength(1);
  });

  it('rejects a top report link without an iid', async () => {
    const { provider } = createProvider({
      '/oglight_get_player_infos.php': { top_sr_link: 'https://hub.test/view.php' },
    });

    await expect(provider.fetchTopReportToken(9)).rejects.toThrow(
      'Malformed intel hub player response: top report link has no iid: https://hub.test/view.php'
    );
  });

  it('rejects positions without a moon field', async () => {
    const { provider } = createProvider({
      '/api_galaxy_get_infos.php': { galaxy_array: [{ galaxy: 1, system: 1, position: 1 }] },
    });

    await expect(provider.fetchPositions(9)).rejects.toBeInstanceOf(MalformedInputError);
  });
});
