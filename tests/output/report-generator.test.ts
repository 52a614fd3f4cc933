import { describe, it, expect } from 'vitest';
import { generateBracketReport, generateOddsReport, summarizeRun } from '../../src/output/report-generator';
import { buildTournament } from '../../src/bracket/bracket-builder';
import { constantRng, makeEntrant } from '../helpers';

const entrants = ['Midwest', 'West', 'South', 'East'].map(division =>
  makeEntrant(`${division} One`, 1, [1, null, null, null, null, 0.5, 0.25], division),
);

describe('summarizeRun', () => {
  it('reduces a run to names and round labels', () => {
    const run = buildTournament(entrants, { divisionRounds: 1 }).simulate(constantRng(0.25));
    const summary = summarizeRun(run);

    expect(summary.divisions[0]).toEqual({
      division: 'Midwest',
      rounds: [{ round: 'first-four', label: 'FIRST FOUR', survivors: ['Midwest One'] }],
    });
    expect(summary.finalists).toEqual(['Midwest One', 'South One']);
    expect(summary.champion).toBe('Midwest One');
  });
});

describe('report generators', () => {
  const now = new Date('2026-03-19T12:00:00.000Z');

  it('stamps the bracket report', () => {
    const run = buildTournament(entrants, { divisionRounds: 1 }).simulate(constantRng(0.25));
    const report = generateBracketReport(run, 'data/data.csv', now);

    expect(report.kind).toBe('bracket');
    expect(report.title).toBe('Simulated Bracket');
    expect(report.generatedAt).toBe('2026-03-19T12:00:00.000Z');
    expect(report.input).toBe('data/data.csv');
  });

  it('puts the simulation count in the odds title', () => {
    const report = generateOddsReport({ totalSims: 20000, championshipCounts: {}, rows: [] }, 'data.csv', now);
    expect(report.title).toBe(`Championship Odds (${(20000).toLocaleString()} simulations)`);
  });
});
