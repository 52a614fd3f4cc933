import type { BracketRun, Rng } from '../core/types';
import type { Tournament } from '../bracket/tournament';
import type { ChampionBatchResult, ConditionedBatchResult, SimulationOutcome } from './types';
import { emptyChampionBatch, emptyConditionedBatch, incrementCount, recordRun } from './tally';

/**
 * Simulate the tournament once from its initial seeding.
 */
export function simulateBracket(tournament: Tournament, rng: Rng): BracketRun {
  return tournament.simulate(rng);
}

/**
 * Re-simulate until the named entrant wins, giving up after maxAttempts runs.
 */
export function simulateUntilChampion(
  tournament: Tournament,
  champion: string,
  rng: Rng,
  maxAttempts: number,
): SimulationOutcome {
  for (let attempts = 1; attempts <= maxAttempts; attempts++) {
    const run = tournament.simulate(rng);
    if (run.champion.name === champion) {
      return { ok: true, run, attempts };
    }
  }
  return { ok: false, attempts: maxAttempts };
}

/**
 * Simulate the tournament N times and count championships per entrant.
 */
export function simulateChampionBatch(
  tournament: Tournament,
  simulationCount: number,
  rng: Rng,
): ChampionBatchResult {
  const result = emptyChampionBatch();
  for (let sim = 0; sim < simulationCount; sim++) {
    const run = tournament.simulate(rng);
    incrementCount(result.championshipCounts, run.champion.name);
    result.totalSims++;
  }
  return result;
}

/**
 * Collect N runs won by the given champion, tallying survivors and finalists.
 * Stops early, flagged as exhausted, if any single run uses up its attempts.
 */
export function simulateConditionedBatch(
  tournament: Tournament,
  champion: string,
  simulationCount: number,
  maxAttemptsPerRun: number,
  rng: Rng,
): ConditionedBatchResult {
  const result = emptyConditionedBatch();
  for (let sim = 0; sim < simulationCount; sim++) {
    const outcome = simulateUntilChampion(tournament, champion, rng, maxAttemptsPerRun);
    result.attempts += outcome.attempts;
    if (!outcome.ok) {
      result.exhausted = true;
      break;
    }
    recordRun(outcome.run, result.divisionCounts, result.finalistCounts);
    result.acceptedRuns++;
  }
  return result;
}
