import express from 'express';
import cors from 'cors';
import type { Response } from 'express';
import { CONFIG } from '../config';
import { isBracketOddsError } from '../core/errors';
import { loadTournament } from '../data/loader';
import type { TournamentOptions } from '../bracket/types';
import { simulateBracket } from '../engine/bracket-propagator';
import { resolveRng } from '../engine/rng';
import { runChampionshipOdds, runConditionedSimulation } from '../engine/simulator';
import type { SimulationExecutor } from '../engine/simulator';
import { summarizeRun } from '../output/report-generator';

export interface ServerOptions {
  inputPath?: string;
  executor?: SimulationExecutor;
  tournament?: TournamentOptions;
  /** Upper bound on runs a single request may ask for. */
  maxSimulations?: number;
}

function sendError(res: Response, err: unknown): void {
  if (isBracketOddsError(err)) {
    const status = err.code === 'CONVERGENCE_EXHAUSTION' ? 422 : 400;
    res.status(status).json({ error: err.message, code: err.code });
    return;
  }
  if (err instanceof RangeError) {
    res.status(400).json({ error: err.message });
    return;
  }
  res.status(500).json({ error: err instanceof Error ? err.message : String(err) });
}

function readInt(value: unknown, fallback: number): number {
  if (typeof value !== 'string') return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function readSeed(value: unknown): number | undefined {
  if (typeof value !== 'string') return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Build the HTTP API over one loaded bracket. The input is read once, up front.
 */
export function createApp(options: ServerOptions = {}): express.Express {
  const tournament = loadTournament(options.inputPath ?? CONFIG.DEFAULT_INPUT, options.tournament);
  const maxSims = options.maxSimulations ?? CONFIG.CHAMPION_SIMULATION_RUNS;

  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get('/api/entrants', (_req, res) => {
    res.json(tournament.getEntrants().map(e => ({
      id: e.id,
      name: e.name,
      division: e.division,
      seed: e.seed,
      independent: e.probabilities.independent,
      conditional: e.probabilities.conditional,
    })));
  });

  app.get('/api/bracket', (req, res) => {
    try {
      const run = simulateBracket(tournament, resolveRng(readSeed(req.query.seed)));
      res.json(summarizeRun(run));
    } catch (e) {
      sendError(res, e);
    }
  });

  app.get('/api/odds', async (req, res) => {
    const sims = readInt(req.query.sims, CONFIG.CHAMPION_SIMULATION_RUNS);
    if (sims < 1 || sims > maxSims) {
      res.status(400).json({ error: `sims must be between 1 and ${maxSims}` });
      return;
    }

    try {
      const odds = await runChampionshipOdds(tournament, {
        simulations: sims,
        seed: readSeed(req.query.seed),
        executor: options.executor,
      });
      res.json(odds);
    } catch (e) {
      sendError(res, e);
    }
  });

  app.get('/api/conditioned/:champion', async (req, res) => {
    const runs = readInt(req.query.runs, CONFIG.DESIRED_CHAMPION_RUNS);
    if (runs < 1 || runs > maxSims) {
      res.status(400).json({ error: `runs must be between 1 and ${maxSims}` });
      return;
    }
    const maxAttempts = readInt(req.query.maxAttempts, CONFIG.MAX_ATTEMPTS_PER_RUN);
    if (maxAttempts < 1) {
      res.status(400).json({ error: 'maxAttempts must be at least 1' });
      return;
    }

    try {
      const tally = await runConditionedSimulation(tournament, req.params.champion, {
        simulations: runs,
        maxAttemptsPerRun: maxAttempts,
        seed: readSeed(req.query.seed),
        executor: options.executor,
      });
      res.json(tally);
    } catch (e) {
      sendError(res, e);
    }
  });

  return app;
}

export function startServer(port: number, options: ServerOptions = {}): void {
  const app = createApp(options);
  app.listen(port, () => {
    console.log(`\n  Bracket Odds API`);
    console.log(`  API:    http://localhost:${port}/api`);
    console.log(`  Input:  ${options.inputPath ?? CONFIG.DEFAULT_INPUT}`);
    console.log(`  Press Ctrl+C to stop.\n`);
  });
}
