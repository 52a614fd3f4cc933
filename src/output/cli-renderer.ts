import type { ChampionshipOdds, ConditionedTally, CountMap } from '../core/types';
import { ROUNDS_IN_ORDER, ROUND_NAMES } from '../core/constants';
import type { OutputReport, RunSummary } from './types';

/**
 * Render one simulated bracket: each division round by round, then the final.
 */
export function renderBracket(summary: RunSummary): string {
  let out = '';
  for (const division of summary.divisions) {
    out += `\n==========${division.division}==========\n`;
    for (const round of division.rounds) {
      out += `\n${round.label}:\n`;
      for (const name of round.survivors) {
        out += `${name}\n`;
      }
    }
  }

  out += '\n==========Championship==========\n';
  for (const name of summary.finalists) {
    out += `${name}\n`;
  }
  out += `\nChampion: ${summary.champion}\n`;
  return out;
}

export function renderChampionshipOdds(odds: ChampionshipOdds): string {
  const lines = ['Percent chance of winning tournament:'];
  for (const row of odds.rows) {
    lines.push(`  ${row.name}: ${row.percent.toFixed(1)}%`);
  }
  return lines.join('\n') + '\n';
}

function sortedCounts(counts: CountMap): [string, number][] {
  return Object.entries(counts).sort(([a, x], [b, y]) => y - x || a.localeCompare(b));
}

function formatCount(count: number, total: number): string {
  const pct = total > 0 ? (count * 100) / total : 0;
  return `${count} (${pct.toFixed(1)}%)`;
}

/**
 * Render how often each team reached each round across runs won by the desired champion.
 */
export function renderConditionedTally(tally: ConditionedTally): string {
  const lines: string[] = [];
  lines.push(`Desired champion: ${tally.champion}`);
  lines.push(`Matching runs: ${tally.acceptedRuns} (${tally.attempts} simulations)`);
  lines.push('');
  lines.push('Finalists:');
  for (const [name, count] of sortedCounts(tally.finalistCounts)) {
    lines.push(`  ${name}: ${formatCount(count, tally.acceptedRuns)}`);
  }

  for (const [division, rounds] of Object.entries(tally.divisionCounts)) {
    lines.push('');
    lines.push(`==========${division}==========`);
    for (const round of ROUNDS_IN_ORDER) {
      const counts = rounds[round];
      if (!counts) continue;
      lines.push(`${ROUND_NAMES[round]}:`);
      for (const [name, count] of sortedCounts(counts)) {
        lines.push(`  ${name}: ${formatCount(count, tally.acceptedRuns)}`);
      }
    }
  }

  return lines.join('\n') + '\n';
}

export function renderReport(report: OutputReport): string {
  switch (report.kind) {
    case 'bracket':
      return renderBracket(report.summary);
    case 'championship-odds':
      return renderChampionshipOdds(report.odds);
    case 'conditioned':
      return renderConditionedTally(report.tally);
  }
}
