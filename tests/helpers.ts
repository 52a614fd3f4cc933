import path from 'path';
import type { Entrant, RoundProbability } from '../src/core/types';
import { buildProbabilityTable } from '../src/engine/probability-table';
import { makeEntrantId } from '../src/bracket/bracket-builder';

export const MINI_CSV = path.resolve(__dirname, 'fixtures', 'mini.csv');
export const SAMPLE_CSV = path.resolve(__dirname, '..', 'data', 'data.csv');

/** The mini fixture has two seed lines per region: play-in plus one standard round. */
export const MINI_OPTIONS = { divisionRounds: 2 };

/**
 * Build an entrant from cumulative round odds, first-four first.
 */
export function makeEntrant(
  name: string,
  seed: number,
  odds: RoundProbability[],
  division = 'Test',
): Entrant {
  return {
    id: makeEntrantId(division, seed, name),
    name,
    division,
    seed,
    probabilities: buildProbabilityTable(odds),
  };
}

export function constantRng(value: number): () => number {
  return () => value;
}
