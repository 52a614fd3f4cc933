import { describe, it, expect } from 'vitest';
import {
  emptyConditionedBatch,
  mergeConditionedBatch,
  mergeCounts,
  mergeDivisionCounts,
  recordRun,
} from '../../src/engine/tally';
import { buildTournament } from '../../src/bracket/bracket-builder';
import type { CountMap, DivisionRoundCounts } from '../../src/core/types';
import { constantRng, makeEntrant } from '../helpers';

describe('mergeCounts', () => {
  it('adds counts key by key', () => {
    const target: CountMap = { Alpha: 2, Bravo: 1 };
    mergeCounts(target, { Bravo: 3, Charlie: 4 });
    expect(target).toEqual({ Alpha: 2, Bravo: 4, Charlie: 4 });
  });

  it('gives the same totals in either order', () => {
    const a: CountMap = { Alpha: 5, Delta: 1 };
    const b: CountMap = { Alpha: 2, Echo: 7 };
    expect(mergeCounts({ ...a }, b)).toEqual(mergeCounts({ ...b }, a));
  });
});

describe('mergeDivisionCounts', () => {
  it('merges nested division and round counts', () => {
    const target: DivisionRoundCounts = { East: { 'first-four': { Hotel: 3 } } };
    mergeDivisionCounts(target, {
      East: { 'first-four': { Hotel: 1, India: 2 }, 'round-of-32': { Hotel: 2 } },
      West: { 'first-four': { Delta: 1 } },
    });
    expect(target).toEqual({
      East: { 'first-four': { Hotel: 4, India: 2 }, 'round-of-32': { Hotel: 2 } },
      West: { 'first-four': { Delta: 1 } },
    });
  });
});

describe('recordRun', () => {
  it('counts every survivor and both finalists', () => {
    const entrants = ['Midwest', 'West', 'South', 'East'].map(division =>
      makeEntrant(`${division} One`, 1, [1, null, null, null, null, 0.5, 0.25], division),
    );
    const tournament = buildTournament(entrants, { divisionRounds: 1 });
    const run = tournament.simulate(constantRng(0.25));

    const divisionCounts: DivisionRoundCounts = {};
    const finalistCounts: CountMap = {};
    recordRun(run, divisionCounts, finalistCounts);
    recordRun(run, divisionCounts, finalistCounts);

    expect(divisionCounts.West).toEqual({ 'first-four': { 'West One': 2 } });
    expect(finalistCounts).toEqual({ 'Midwest One': 2, 'South One': 2 });
  });
});

describe('mergeConditionedBatch', () => {
  it('sums runs and attempts and keeps the exhausted flag', () => {
    const target = emptyConditionedBatch();
    mergeConditionedBatch(target, { ...emptyConditionedBatch(), acceptedRuns: 3, attempts: 10 });
    mergeConditionedBatch(target, {
      ...emptyConditionedBatch(),
      acceptedRuns: 1,
      attempts: 50,
      exhausted: true,
      finalistCounts: { Alpha: 1 },
    });
    expect(target.acceptedRuns).toBe(4);
    expect(target.attempts).toBe(60);
    expect(target.exhausted).toBe(true);
    expect(target.finalistCounts).toEqual({ Alpha: 1 });
  });
});
