/**
 * Piscina worker thread for running Monte Carlo bracket simulations.
 * Each invocation receives a serialized task and returns serialized results.
 * Runs in a separate thread with no state shared with the main thread.
 */

import { Tournament } from '../bracket/tournament';
import type { TournamentDefinition } from '../bracket/types';
import { simulateChampionBatch, simulateConditionedBatch } from './bracket-propagator';
import { resolveRng } from './rng';
import type { SimulationTask, SimulationBatchResult } from './types';

export default function runSimulation(task: SimulationTask): SimulationBatchResult {
  const definition: TournamentDefinition = JSON.parse(task.tournamentJson);
  const tournament = Tournament.fromDefinition(definition);
  const rng = resolveRng(task.seed);

  switch (task.type) {
    case 'champion-odds':
      return simulateChampionBatch(tournament, task.simulationCount, rng);
    case 'conditioned':
      return simulateConditionedBatch(tournament, task.champion, task.simulationCount, task.maxAttemptsPerRun, rng);
  }
}
