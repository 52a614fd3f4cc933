import type { Entrant } from '../core/types';

export type DivisionPair = readonly [string, string];

/** Division winners meet in two semifinals; their winners meet in the final. */
export type SemifinalPairings = readonly [DivisionPair, DivisionPair];

export interface TournamentOptions {
  divisionRounds?: number;
  pairings?: SemifinalPairings;
}

/**
 * Plain-data snapshot of a tournament, safe to hand to worker threads.
 */
export interface TournamentDefinition {
  divisionRounds: number;
  pairings: SemifinalPairings;
  entrants: Entrant[];
}
