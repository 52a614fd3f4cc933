import type { BracketRun, CountMap, DivisionRoundCounts } from '../core/types';
import { ROUNDS_IN_ORDER } from '../core/constants';
import type { ChampionBatchResult, ConditionedBatchResult } from './types';

// All merges below are plain per-key addition, so batches can be folded in any order.

export function incrementCount(counts: CountMap, key: string, by = 1): void {
  counts[key] = (counts[key] ?? 0) + by;
}

export function mergeCounts(target: CountMap, source: CountMap): CountMap {
  for (const [key, count] of Object.entries(source)) {
    incrementCount(target, key, count);
  }
  return target;
}

export function mergeDivisionCounts(
  target: DivisionRoundCounts,
  source: DivisionRoundCounts,
): DivisionRoundCounts {
  for (const [division, rounds] of Object.entries(source)) {
    const targetRounds = target[division] ?? {};
    target[division] = targetRounds;
    for (const round of ROUNDS_IN_ORDER) {
      const counts = rounds[round];
      if (!counts) continue;
      targetRounds[round] = mergeCounts(targetRounds[round] ?? {}, counts);
    }
  }
  return target;
}

/**
 * Add one run's survivors (per division and round) and finalists to the tallies.
 */
export function recordRun(
  run: BracketRun,
  divisionCounts: DivisionRoundCounts,
  finalistCounts: CountMap,
): void {
  for (const divisionRun of run.divisions) {
    const rounds = divisionCounts[divisionRun.division] ?? {};
    divisionCounts[divisionRun.division] = rounds;
    for (const { round, survivors } of divisionRun.rounds) {
      const counts = rounds[round] ?? {};
      rounds[round] = counts;
      for (const entrant of survivors) {
        incrementCount(counts, entrant.name);
      }
    }
  }
  for (const finalist of run.finalists) {
    incrementCount(finalistCounts, finalist.name);
  }
}

export function emptyChampionBatch(): ChampionBatchResult {
  return { type: 'champion-odds', totalSims: 0, championshipCounts: {} };
}

export function emptyConditionedBatch(): ConditionedBatchResult {
  return {
    type: 'conditioned',
    acceptedRuns: 0,
    attempts: 0,
    exhausted: false,
    divisionCounts: {},
    finalistCounts: {},
  };
}

export function mergeChampionBatch(target: ChampionBatchResult, source: ChampionBatchResult): ChampionBatchResult {
  target.totalSims += source.totalSims;
  mergeCounts(target.championshipCounts, source.championshipCounts);
  return target;
}

export function mergeConditionedBatch(
  target: ConditionedBatchResult,
  source: ConditionedBatchResult,
): ConditionedBatchResult {
  target.acceptedRuns += source.acceptedRuns;
  target.attempts += source.attempts;
  target.exhausted = target.exhausted || source.exhausted;
  mergeDivisionCounts(target.divisionCounts, source.divisionCounts);
  mergeCounts(target.finalistCounts, source.finalistCounts);
  return target;
}
