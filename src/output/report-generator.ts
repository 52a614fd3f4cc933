import type { BracketRun, ChampionshipOdds, ConditionedTally } from '../core/types';
import { ROUND_NAMES } from '../core/constants';
import type { BracketReport, ChampionshipOddsReport, ConditionedReport, RunSummary } from './types';

/**
 * Reduce a bracket run to names only, ready for rendering or JSON.
 */
export function summarizeRun(run: BracketRun): RunSummary {
  return {
    divisions: run.divisions.map(d => ({
      division: d.division,
      rounds: d.rounds.map(r => ({
        round: r.round,
        label: ROUND_NAMES[r.round],
        survivors: r.survivors.map(e => e.name),
      })),
    })),
    finalists: run.finalists.map(e => e.name),
    champion: run.champion.name,
  };
}

export function generateBracketReport(run: BracketRun, input: string, now = new Date()): BracketReport {
  return {
    kind: 'bracket',
    title: 'Simulated Bracket',
    generatedAt: now.toISOString(),
    input,
    summary: summarizeRun(run),
  };
}

export function generateOddsReport(odds: ChampionshipOdds, input: string, now = new Date()): ChampionshipOddsReport {
  return {
    kind: 'championship-odds',
    title: `Championship Odds (${odds.totalSims.toLocaleString()} simulations)`,
    generatedAt: now.toISOString(),
    input,
    odds,
  };
}

export function generateConditionedReport(
  tally: ConditionedTally,
  input: string,
  now = new Date(),
): ConditionedReport {
  return {
    kind: 'conditioned',
    title: `Brackets Won by ${tally.champion}`,
    generatedAt: now.toISOString(),
    input,
    tally,
  };
}
