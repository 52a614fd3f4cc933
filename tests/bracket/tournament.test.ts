import { describe, it, expect } from 'vitest';
import { buildTournament } from '../../src/bracket/bracket-builder';
import { Tournament } from '../../src/bracket/tournament';
import type { TournamentDefinition } from '../../src/bracket/types';
import { loadTournament } from '../../src/data/loader';
import { createRng } from '../../src/engine/rng';
import { summarizeRun } from '../../src/output/report-generator';
import { StructuralError } from '../../src/core/errors';
import type { Entrant } from '../../src/core/types';
import { MINI_CSV, MINI_OPTIONS, constantRng, makeEntrant } from '../helpers';

function finalOnly(name: string, division: string, finals: number, champions: number): Entrant {
  return makeEntrant(name, 1, [1, null, null, null, null, finals, champions], division);
}

const fourWinners = [
  finalOnly('A', 'Midwest', 1, 1),
  finalOnly('B', 'West', 0, 0),
  finalOnly('C', 'South', 0.5, 0.25),
  finalOnly('D', 'East', 0.5, 0.25),
];

describe('Tournament', () => {
  it('plays the semifinals by the configured pairings, then the final', () => {
    const tournament = buildTournament(fourWinners, { divisionRounds: 1 });
    const run = tournament.simulate(constantRng(0.5));

    expect(run.finalists.map(e => e.name)).toEqual(['A', 'C']);
    expect(run.champion.name).toBe('A');
  });

  it('accepts other semifinal pairings', () => {
    const tournament = buildTournament(fourWinners, {
      divisionRounds: 1,
      pairings: [['Midwest', 'South'], ['West', 'East']],
    });
    const run = tournament.simulate(constantRng(0.5));

    expect(run.finalists.map(e => e.name)).toEqual(['A', 'D']);
  });

  it('rejects a division left out of the pairings', () => {
    const entrants = [...fourWinners.slice(0, 3), finalOnly('N', 'North', 0.5, 0.25)];
    expect(() => buildTournament(entrants, { divisionRounds: 1 })).toThrow('Region "North" not recognized');
  });

  it('rejects a paired division with no teams', () => {
    expect(() => buildTournament(fourWinners.slice(0, 3), { divisionRounds: 1 })).toThrow(StructuralError);
  });

  it('rejects duplicate team names', () => {
    const entrants = [...fourWinners, finalOnly('A', 'East', 0.5, 0.25)];
    expect(() => buildTournament(entrants, { divisionRounds: 1 })).toThrow('Team "A" appears more than once');
  });

  it('rejects two teams whose names reduce to the same id', () => {
    const entrants = [
      finalOnly('A', 'Midwest', 1, 1),
      finalOnly('B', 'West', 0, 0),
      finalOnly('C', 'South', 0.5, 0.25),
      finalOnly('D.C', 'East', 0.5, 0.25),
      finalOnly('D C', 'East', 0.5, 0.25),
    ];
    expect(() => buildTournament(entrants, { divisionRounds: 1 })).toThrow(
      new StructuralError('Teams "D.C" and "D C" share the id "east-1-d-c"'),
    );
  });

  it('produces two finalists and one champion from a loaded bracket', () => {
    const tournament = loadTournament(MINI_CSV, MINI_OPTIONS);
    const summary = summarizeRun(tournament.simulate(createRng(17)));

    expect(summary.divisions.map(d => d.division)).toEqual(['Midwest', 'West', 'South', 'East']);
    for (const division of summary.divisions) {
      expect(division.rounds.map(r => r.label)).toEqual(['FIRST FOUR', 'ROUND OF 32']);
      expect(division.rounds.map(r => r.survivors.length)).toEqual([2, 1]);
    }
    expect(summary.finalists).toHaveLength(2);
    expect(summary.finalists).toContain(summary.champion);
  });

  it('never advances a team with no chance in the semifinal', () => {
    const tournament = loadTournament(MINI_CSV, MINI_OPTIONS);
    const rng = createRng(3);
    for (let i = 0; i < 500; i++) {
      const run = tournament.simulate(rng);
      expect(run.finalists.map(e => e.name)).not.toContain('India');
    }
  });

  it('rebuilds identically from its serialized definition', () => {
    const tournament = loadTournament(MINI_CSV, MINI_OPTIONS);
    const definition: TournamentDefinition = JSON.parse(JSON.stringify(tournament.toDefinition()));
    const rebuilt = Tournament.fromDefinition(definition);

    expect(rebuilt.getEntrants()).toEqual(tournament.getEntrants());
    expect(summarizeRun(rebuilt.simulate(createRng(8)))).toEqual(summarizeRun(tournament.simulate(createRng(8))));
  });

  it('finds entrants by name', () => {
    const tournament = loadTournament(MINI_CSV, MINI_OPTIONS);
    expect(tournament.findEntrant('Golf')?.division).toBe('South');
    expect(tournament.findEntrant('Nobody')).toBeUndefined();
  });
});
