/**
 * Report Ingestor Tests
 */

import { describe, it, expect } from 'vitest';
import { ReportIngestor, type IngestInput } from '../../../reports/report-ingestor.js';
import { DuplicateReportError, RegressionError } from '../../../core/errors.js';
import { TestClock, coord, createTestRepository, silentLogger } from '../../helpers/fixtures.js';

const CREATED = new Date('2024-03-01T08:00:00.000Z');

function scoutInput(overrides: Partial<IngestInput> & Pick<IngestInput, 'token'>): IngestInput {
  return {
    playerId: 9,
    ships: new Map(),
    techs: new Map(),
    sourceKind: 'primary-scout',
    createdAt: CREATED,
    coordinate: coord('2:100:8'),
    fromMoon: false,
    ...overrides,
  };
}

async function createIngestor() {
  const { repo, adapter } = await createTestRepository();
  const clock = new TestClock('2024-03-01T12:00:00.000Z');
  const ingestor = new ReportIngestor(repo, { clock: clock.now, logger: silentLogger });
  return { repo, adapter, clock, ingestor };
}

describe('ReportIngestor', () => {
  it('stores military ship lines only and all technology lines', async () => {
    const { repo, adapter, ingestor } = await createIngestor();

    const result = await ingestor.ingest(
      scoutInput({
        token: 'sr-a',
        ships: new Map([
          [202, 0],
          [203, 12],
          [401, 5],
          [204, 0],
        ]),
        techs: new Map([
          [109, 12],
          [110, 11],
        ]),
        resources: { metal: 10, crystal: 20, deuterium: 30 },
      })
    );

    expect(result.militaryStrength).toBe(5);
    const stored = await repo.getReport('sr-a');
    expect(stored?.ships).toEqual([{ shipType: 401, count: 5 }]);
    expect(stored?.techs).toEqual([
      { techType: 109, level: 12 },
      { techType: 110, level: 11 },
    ]);
    expect(stored?.resources).toEqual({ metal: 10, crystal: 20, deuterium: 30 });
    expect(stored).toEqual(result.report);

    await adapter.close();
  });

  it('rejects a duplicate token and leaves the store unchanged', async () => {
    const { repo, adapter, ingestor } = await createIngestor();
    const input = scoutInput({ token: 'sr-a', ships: new Map([[401, 5]]), techs: new Map([[109, 3]]) });
    await ingestor.ingest(input);

    const reportsBefore = await repo.listReports(9);
    const planetsBefore = await repo.listPlanets(9);

    await expect(ingestor.ingest({ ...input, ships: new Map([[401, 50]]) })).rejects.toBeInstanceOf(
      DuplicateReportError
    );

    expect(await repo.listReports(9)).toEqual(reportsBefore);
    expect(await repo.listPlanets(9)).toEqual(planetsBefore);
    const lines = await adapter.queryOne<{ n: number }>('SELECT COUNT(*) AS n FROM report_ships');
    expect(lines?.n).toBe(1);

    await adapter.close();
  });

  it('rejects a weaker report than the current best', async () => {
    const { repo, adapter, ingestor } = await createIngestor();
    await ingestor.ingest(scoutInput({ token: 'sr-a', ships: new Map([[202, 0], [401, 5]]) }));

    const error = await ingestor
      .ingest(scoutInput({ token: 'sr-b', ships: new Map([[401, 3]]), createdAt: new Date('2024-03-01T09:00:00.000Z') }))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RegressionError);
    expect(error instanceof RegressionError && error.details).toEqual({
      token: 'sr-b',
      incomingStrength: 3,
      bestStrength: 5,
      bestToken: 'sr-a',
    });
    expect(await repo.reportExists('sr-b')).toBe(false);

    await adapter.close();
  });

  it('stores a weaker report when regression is allowed', async () => {
    const { repo, adapter, ingestor } = await createIngestor();
    await ingestor.ingest(scoutInput({ token: 'sr-a', ships: new Map([[401, 5]]) }));

    const result = await ingestor.ingest(
      scoutInput({ token: 'sr-b', ships: new Map([[401, 3]]), allowRegression: true })
    );

    expect(result.militaryStrength).toBe(3);
    expect(await repo.reportExists('sr-b')).toBe(true);

    await adapter.close();
  });

  it('accepts an equally strong report', async () => {
    const { adapter, ingestor } = await createIngestor();
    await ingestor.ingest(scoutInput({ token: 'sr-a', ships: new Map([[401, 5]]) }));

    await expect(ingestor.ingest(scoutInput({ token: 'sr-b', ships: new Map([[204, 5]]) }))).resolves.toMatchObject({
      militaryStrength: 5,
    });

    await adapter.close();
  });

  it('measures regression against a fresh simulated best report', async () => {
    const { adapter, ingestor } = await createIngestor();
    await ingestor.ingest(
      scoutInput({
        token: 'sim-1',
        sourceKind: 'user-simulated',
        createdAt: new Date('2024-02-28T00:00:00.000Z'),
        ships: new Map([[204, 100]]),
      })
    );

    await expect(ingestor.ingest(scoutInput({ token: 'sr-a', ships: new Map([[204, 60]]) }))).rejects.toBeInstanceOf(
      RegressionError
    );

    await adapter.close();
  });

  it('creates a missing planet as a manual assertion', async () => {
    const { repo, adapter, ingestor } = await createIngestor();

    const result = await ingestor.ingest(scoutInput({ token: 'sr-a', fromMoon: true }));

    expect(result.planetCreated).toBe(true);
    expect(result.moonDetected).toBe(false);
    expect(await repo.getPlanet(9, coord('2:100:8'))).toEqual({
      playerId: 9,
      coordinate: coord('2:100:8'),
      name: null,
      hasMoon: true,
      destroyed: false,
      manualEditAt: CREATED,
    });

    await adapter.close();
  });

  it('records a newly seen moon and never clears it', async () => {
    const { repo, adapter, ingestor } = await createIngestor();
    await repo.savePlanet({
      playerId: 9, coordinate: coord('2:100:8'), name: 'Forge', hasMoon: false, destroyed: false, manualEditAt: null,
    });

    const fromMoon = await ingestor.ingest(scoutInput({ token: 'sr-a', fromMoon: true }));
    expect(fromMoon.planetCreated).toBe(false);
    expect(fromMoon.moonDetected).toBe(true);

    const fromPlanet = await ingestor.ingest(scoutInput({ token: 'sr-b', fromMoon: false }));
    expect(fromPlanet.moonDetected).toBe(false);

    expect(await repo.getPlanet(9, coord('2:100:8'))).toEqual({
      playerId: 9,
      coordinate: coord('2:100:8'),
      name: 'Forge',
      hasMoon: true,
      destroyed: false,
      manualEditAt: null,
    });

    await adapter.close();
  });

  it('links no planet without a coordinate', async () => {
    const { repo, adapter, ingestor } = await createIngestor();

    const result = await ingestor.ingest(scoutInput({ token: 'sr-a', coordinate: null }));

    expect(result.planetCreated).toBe(false);
    expect(result.report.coordinate).toBeNull();
    expect(await repo.listPlanets(9)).toEqual([]);

    await adapter.close();
  });
});

describe('ReportIngestor under concurrent callers', () => {
  it('never exposes a partly written report to readers', async () => {
    const { repo, adapter, ingestor } = await createIngestor();
    let settled = false;
    const pending = ingestor
      .ingest(
        scoutInput({
          token: 'sr-a',
          ships: new Map([
            [204, 3],
            [205, 2],
            [206, 1],
          ]),
          techs: new Map([
            [109, 1],
            [110, 2],
          ]),
          resources: { metal: 1, crystal: 2, deuterium: 3 },
        })
      )
      .finally(() => {
        settled = true;
      });

    const seen: string[] = [];
    while (!settled) {
      const report = await repo.getReport('sr-a');
      const planets = await repo.listPlanets(9);
      if (report === null) {
        seen.push('absent');
        continue;
      }
      expect(report.ships).toHaveLength(3);
      expect(report.techs).toHaveLength(2);
      expect(report.resources).not.toBeNull();
      expect(planets.map((planet) => planet.coordinate)).toEqual([coord('2:100:8')]);
      seen.push('complete');
    }
    await pending;

    expect(seen[0]).toBe('absent');
    expect((await repo.getReport('sr-a'))?.techs).toHaveLength(2);
    await adapter.close();
  });

  it('settles overlapping ingests for one player one at a time', async () => {
    const { repo, adapter, ingestor } = await createIngestor();
    const strong = scoutInput({ token: 'sr-strong', ships: new Map([[204, 10]]) });

    const outcomes = await Promise.allSettled([
      ingestor.ingest(strong),
      ingestor.ingest(strong),
      ingestor.ingest(scoutInput({ token: 'sr-weak', ships: new Map([[204, 4]]) })),
    ]);

    expect(outcomes.map((outcome) => (outcome.status === 'fulfilled' ? 'ok' : outcome.reason))).toEqual([
      'ok',
      expect.any(DuplicateReportError),
      expect.any(RegressionError),
    ]);
    expect((await repo.listReports(9)).map((report) => report.token)).toEqual(['sr-strong']);
    await adapter.close();
  });
});
