import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  closeDatabase,
  getChampionshipCounts,
  getConditionedFinalists,
  getConditionedSurvivors,
  getEntrants,
  getSimulationRuns,
  initDatabase,
  recordChampionshipOdds,
  recordConditionedTally,
  upsertEntrants,
} from '../../src/storage/database';
import { loadEntrants } from '../../src/data/loader';
import type { ConditionedTally } from '../../src/core/types';
import { MINI_CSV } from '../helpers';

beforeEach(() => {
  initDatabase(':memory:');
});

afterEach(() => {
  closeDatabase();
});

describe('entrants', () => {
  it('stores and reads back entrants with their probability tables', () => {
    const entrants = loadEntrants(MINI_CSV);
    upsertEntrants(entrants);

    const stored = getEntrants();
    expect(stored).toHaveLength(9);
    expect(stored.map(e => e.name).slice(0, 2)).toEqual(['Hotel', 'India']);
    expect(stored.find(e => e.name === 'Golf')).toEqual(entrants.find(e => e.name === 'Golf'));
  });

  it('replaces entrants on reload', () => {
    const entrants = loadEntrants(MINI_CSV);
    upsertEntrants(entrants);
    upsertEntrants(entrants);
    expect(getEntrants()).toHaveLength(9);
  });
});

describe('aggregate results', () => {
  it('records championship counts under a new run', () => {
    const runId = recordChampionshipOdds({
      totalSims: 10,
      championshipCounts: { Alpha: 6, Delta: 4 },
      rows: [],
    });

    expect(getChampionshipCounts(runId)).toEqual({ Alpha: 6, Delta: 4 });
    const [run] = getSimulationRuns();
    expect(run).toMatchObject({ id: runId, mode: 'championship-odds', champion: null, total_runs: 10, attempts: 10 });
  });

  it('records a conditioned tally with finalists and survivors', () => {
    const tally: ConditionedTally = {
      champion: 'Alpha',
      acceptedRuns: 3,
      attempts: 7,
      finalistCounts: { Alpha: 3, Delta: 2, Echo: 1 },
      divisionCounts: {
        Midwest: { 'first-four': { Alpha: 3, Bravo: 2, Charlie: 1 }, 'round-of-32': { Alpha: 3 } },
      },
    };

    const runId = recordConditionedTally(tally);

    expect(getConditionedFinalists(runId)).toEqual(tally.finalistCounts);
    expect(getConditionedSurvivors(runId)).toEqual(tally.divisionCounts);
    expect(getSimulationRuns(1)[0]).toMatchObject({ mode: 'conditioned', champion: 'Alpha', total_runs: 3, attempts: 7 });
  });

  it('lists the newest runs first', () => {
    const first = recordChampionshipOdds({ totalSims: 1, championshipCounts: { Alpha: 1 }, rows: [] });
    const second = recordChampionshipOdds({ totalSims: 2, championshipCounts: { Delta: 2 }, rows: [] });
    expect(getSimulationRuns().map(r => r.id)).toEqual([second, first]);
  });
});
