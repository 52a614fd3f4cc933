import type { BracketRun, CountMap, DivisionRoundCounts } from '../core/types';

interface TaskBase {
  simulationCount: number;
  seed?: number; // RNG seed for reproducibility

  // Serialized TournamentDefinition, since this goes to worker threads
  tournamentJson: string;
}

export interface ChampionOddsTask extends TaskBase {
  type: 'champion-odds';
}

export interface ConditionedTask extends TaskBase {
  type: 'conditioned';
  champion: string;
  maxAttemptsPerRun: number;
}

export type SimulationTask = ChampionOddsTask | ConditionedTask;

export interface ChampionBatchResult {
  type: 'champion-odds';
  totalSims: number;
  /** entrant name -> number of championships */
  championshipCounts: CountMap;
}

export interface ConditionedBatchResult {
  type: 'conditioned';
  acceptedRuns: number;
  attempts: number;
  /** True when a run ran out of attempts; the batch stopped there. */
  exhausted: boolean;
  divisionCounts: DivisionRoundCounts;
  finalistCounts: CountMap;
}

export type SimulationBatchResult = ChampionBatchResult | ConditionedBatchResult;

export type SimulationOutcome =
  | { ok: true; run: BracketRun; attempts: number }
  | { ok: false; attempts: number };
