import fs from 'fs';
import path from 'path';
import Piscina from 'piscina';
import type { ChampionshipOdds, ChampionshipOddsRow, ConditionedTally, Entrant } from '../core/types';
import { ConvergenceExhaustion } from '../core/errors';
import { CONFIG } from '../config';
import type { Tournament } from '../bracket/tournament';
import { eventBus } from '../pipeline/event-bus';
import runSimulation from './sim-worker';
import {
  emptyChampionBatch,
  emptyConditionedBatch,
  mergeChampionBatch,
  mergeConditionedBatch,
} from './tally';
import type { ChampionBatchResult, SimulationBatchResult, SimulationTask } from './types';

/**
 * Something that can run one batch of simulations: a worker pool or the current thread.
 */
export interface SimulationExecutor {
  run(task: SimulationTask, signal?: AbortSignal): Promise<SimulationBatchResult>;
  destroy(): Promise<void>;
}

function isBatchResult(value: unknown): value is SimulationBatchResult {
  if (typeof value !== 'object' || value === null || !('type' in value)) return false;
  return value.type === 'champion-odds' || value.type === 'conditioned';
}

/**
 * Runs batches on the main thread, one per event-loop turn so aborts take effect between batches.
 */
export class InlineExecutor implements SimulationExecutor {
  async run(task: SimulationTask, signal?: AbortSignal): Promise<SimulationBatchResult> {
    await new Promise<void>(resolve => setImmediate(resolve));
    if (signal?.aborted) {
      throw new Error('Simulation batch aborted');
    }
    return runSimulation(task);
  }

  async destroy(): Promise<void> {
    // nothing to release
  }
}

export class PiscinaExecutor implements SimulationExecutor {
  private pool: Piscina;

  constructor(filename: string, maxThreads: number) {
    this.pool = new Piscina({
      filename,
      maxThreads,
      idleTimeout: 30000,
    });
  }

  async run(task: SimulationTask, signal?: AbortSignal): Promise<SimulationBatchResult> {
    const result: unknown = await this.pool.run(task, signal ? { signal } : {});
    if (!isBatchResult(result)) {
      throw new Error('Simulation worker returned an unrecognized result');
    }
    return result;
  }

  async destroy(): Promise<void> {
    await this.pool.destroy();
  }
}

let executor: SimulationExecutor | null = null;

/**
 * Shared executor: a piscina pool over the compiled worker, or the main thread
 * when running from TypeScript sources where there is no worker file to load.
 */
export function getDefaultExecutor(): SimulationExecutor {
  if (executor) return executor;

  const workerPath = path.resolve(__dirname, 'sim-worker.js');
  if (fs.existsSync(workerPath)) {
    executor = new PiscinaExecutor(workerPath, CONFIG.WORKER_THREADS);
  } else {
    console.warn('[Simulator] Compiled worker not found; running simulations on the main thread');
    executor = new InlineExecutor();
  }
  return executor;
}

/**
 * Destroy the shared worker pool. Call on shutdown.
 */
export async function destroyPool(): Promise<void> {
  if (executor) {
    await executor.destroy();
    executor = null;
  }
}

export interface AggregateOptions {
  simulations?: number;
  batchSize?: number;
  seed?: number;
  executor?: SimulationExecutor;
}

export interface ChampionshipOddsOptions extends AggregateOptions {
  /** Minimum championship frequency (0-1) for an entrant to be reported. */
  threshold?: number;
}

export interface ConditionedOptions extends AggregateOptions {
  maxAttemptsPerRun?: number;
}

/**
 * Split a run count into batch sizes, the last one taking the remainder.
 */
export function planBatches(total: number, batchSize: number): number[] {
  if (!Number.isInteger(total) || total < 1) {
    throw new RangeError(`Simulation count must be a positive integer, got ${total}`);
  }
  const size = Math.max(1, Math.floor(batchSize));
  const batches: number[] = [];
  for (let remaining = total; remaining > 0; remaining -= size) {
    batches.push(Math.min(size, remaining));
  }
  return batches;
}

function batchSeed(seed: number | undefined, index: number): number | undefined {
  return seed === undefined ? undefined : seed + index;
}

/**
 * Turn merged championship counts into report rows at or above the threshold.
 */
export function summarizeChampionshipOdds(
  tournament: Tournament,
  merged: ChampionBatchResult,
  threshold: number,
): ChampionshipOdds {
  const byName = new Map<string, Entrant>(tournament.getEntrants().map(e => [e.name, e]));
  const rows: ChampionshipOddsRow[] = [];

  for (const [name, count] of Object.entries(merged.championshipCounts)) {
    const share = count / merged.totalSims;
    if (share < threshold) continue;
    const entrant = byName.get(name);
    rows.push({
      name,
      division: entrant?.division ?? '',
      seed: entrant?.seed ?? 0,
      count,
      percent: share * 100,
    });
  }
  rows.sort((a, b) => b.count - a.count || a.name.localeCompare(b.name));

  return { totalSims: merged.totalSims, championshipCounts: merged.championshipCounts, rows };
}

/**
 * Simulate the whole tournament many times in parallel and count champions.
 * Batches merge into one tally in completion order.
 */
export async function runChampionshipOdds(
  tournament: Tournament,
  options: ChampionshipOddsOptions = {},
): Promise<ChampionshipOdds> {
  const total = options.simulations ?? CONFIG.CHAMPION_SIMULATION_RUNS;
  const batches = planBatches(total, options.batchSize ?? CONFIG.BATCH_SIZE);
  const workers = options.executor ?? getDefaultExecutor();
  const tournamentJson = JSON.stringify(tournament.toDefinition());
  const task = 'championship odds simulations';
  const startTime = Date.now();

  eventBus.emit('simulation-started', { task, totalRuns: total, batches: batches.length });

  const merged = emptyChampionBatch();
  await Promise.all(
    batches.map((count, i) =>
      workers
        .run({ type: 'champion-odds', simulationCount: count, seed: batchSeed(options.seed, i), tournamentJson })
        .then(result => {
          if (result.type !== 'champion-odds') {
            throw new Error(`Expected a champion-odds result, got ${result.type}`);
          }
          mergeChampionBatch(merged, result);
          eventBus.emit('batch-completed', {
            task,
            completedRuns: merged.totalSims,
            totalRuns: total,
            attempts: merged.totalSims,
          });
        }),
    ),
  );

  eventBus.emit('simulation-finished', { task, completedRuns: merged.totalSims, elapsedMs: Date.now() - startTime });

  return summarizeChampionshipOdds(tournament, merged, options.threshold ?? CONFIG.ODDS_REPORT_THRESHOLD);
}

/**
 * Collect runs won by `champion` and tally how the rest of the bracket looked in them.
 * Each accepted run may take at most maxAttemptsPerRun simulations; running out
 * anywhere aborts outstanding batches and raises ConvergenceExhaustion.
 */
export async function runConditionedSimulation(
  tournament: Tournament,
  champion: string,
  options: ConditionedOptions = {},
): Promise<ConditionedTally> {
  if (!tournament.findEntrant(champion)) {
    throw new ConvergenceExhaustion(champion, 0, 0, `No team named "${champion}" in the bracket`);
  }

  const total = options.simulations ?? CONFIG.DESIRED_CHAMPION_RUNS;
  const maxAttemptsPerRun = options.maxAttemptsPerRun ?? CONFIG.MAX_ATTEMPTS_PER_RUN;
  if (!Number.isInteger(maxAttemptsPerRun) || maxAttemptsPerRun < 1) {
    throw new RangeError(`Attempts per run must be a positive integer, got ${maxAttemptsPerRun}`);
  }
  const batches = planBatches(total, options.batchSize ?? CONFIG.BATCH_SIZE);
  const workers = options.executor ?? getDefaultExecutor();
  const tournamentJson = JSON.stringify(tournament.toDefinition());
  const task = 'desired champion simulations';
  const startTime = Date.now();
  const controller = new AbortController();

  eventBus.emit('simulation-started', { task, totalRuns: total, batches: batches.length });

  const merged = emptyConditionedBatch();
  try {
    await Promise.all(
      batches.map((count, i) =>
        workers
          .run(
            {
              type: 'conditioned',
              champion,
              maxAttemptsPerRun,
              simulationCount: count,
              seed: batchSeed(options.seed, i),
              tournamentJson,
            },
            controller.signal,
          )
          .then(result => {
            if (result.type !== 'conditioned') {
              throw new Error(`Expected a conditioned result, got ${result.type}`);
            }
            mergeConditionedBatch(merged, result);
            if (result.exhausted) {
              throw new ConvergenceExhaustion(champion, merged.attempts, merged.acceptedRuns);
            }
            eventBus.emit('batch-completed', {
              task,
              completedRuns: merged.acceptedRuns,
              totalRuns: total,
              attempts: merged.attempts,
            });
          }),
      ),
    );
  } catch (err) {
    controller.abort();
    throw err;
  }

  eventBus.emit('simulation-finished', { task, completedRuns: merged.acceptedRuns, elapsedMs: Date.now() - startTime });

  return {
    champion,
    acceptedRuns: merged.acceptedRuns,
    attempts: merged.attempts,
    divisionCounts: merged.divisionCounts,
    finalistCounts: merged.finalistCounts,
  };
}
