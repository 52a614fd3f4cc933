import os from 'os';
import path from 'path';
import { DEFAULT_DIVISION_ROUNDS } from './core/constants';
import { StructuralError } from './core/errors';
import type { SemifinalPairings } from './bracket/types';

/**
 * Parse "A:B,C:D" into the two semifinal division pairs.
 */
export function parsePairings(value: string): SemifinalPairings {
  const pairs = value
    .split(',')
    .map(s => s.trim())
    .filter(s => s.length > 0)
    .map(s => s.split(':').map(name => name.trim()));

  if (pairs.length !== 2 || pairs.some(p => p.length !== 2 || p.some(name => name === ''))) {
    throw new StructuralError(`Semifinal pairings must look like "A:B,C:D", got "${value}"`);
  }

  const [[a, b], [c, d]] = pairs;
  return [[a, b], [c, d]];
}

export const CONFIG = {
  // Simulation settings
  CHAMPION_SIMULATION_RUNS: parseInt(process.env.CHAMPION_SIMULATION_RUNS || '20000'),
  DESIRED_CHAMPION_RUNS: parseInt(process.env.DESIRED_CHAMPION_RUNS || '10000'),
  MAX_ATTEMPTS_PER_RUN: parseInt(process.env.MAX_ATTEMPTS_PER_RUN || '100000'),
  BATCH_SIZE: parseInt(process.env.BATCH_SIZE || '500'),
  WORKER_THREADS: parseInt(process.env.WORKER_THREADS || String(Math.max(1, os.cpus().length - 1))),
  ODDS_REPORT_THRESHOLD: parseFloat(process.env.ODDS_REPORT_THRESHOLD || '0.01'),
  PROGRESS_INTERVAL_MS: parseInt(process.env.PROGRESS_INTERVAL_MS || '1000'),

  // Bracket shape
  DIVISION_ROUNDS: parseInt(process.env.DIVISION_ROUNDS || String(DEFAULT_DIVISION_ROUNDS)),
  SEMIFINAL_PAIRINGS: parsePairings(process.env.SEMIFINAL_PAIRINGS || 'Midwest:West,South:East'),

  // Paths
  ROOT_DIR: path.resolve(__dirname, '..'),
  OUTPUT_DIR: path.resolve(__dirname, '..', 'output'),
  DEFAULT_INPUT: process.env.DEFAULT_INPUT || path.resolve(__dirname, '..', 'data', 'data.csv'),
  DEFAULT_OUTPUT: process.env.DEFAULT_OUTPUT || 'output.txt',
  DB_PATH: process.env.DB_PATH || path.resolve(__dirname, '..', 'data', 'bracket-odds.db'),

  // Persist loaded entrants and aggregate results to SQLite
  PERSIST_RESULTS: process.env.PERSIST_RESULTS !== 'false',

  // HTTP server
  PORT: parseInt(process.env.PORT || '3000'),
};
