import type { Entrant } from '../core/types';
import { StructuralError } from '../core/errors';
import { CONFIG } from '../config';
import { Tournament } from './tournament';
import type { TournamentOptions } from './types';

/**
 * Build a tournament from loaded entrants, grouping them into divisions by name.
 *
 * Entrant names double as identities in tallies and conditioned searches,
 * so they must be unique across the whole bracket. Ids key stored rows and
 * must be unique too.
 */
export function buildTournament(entrants: readonly Entrant[], options: TournamentOptions = {}): Tournament {
  const seen = new Set<string>();
  const namesById = new Map<string, string>();
  for (const entrant of entrants) {
    if (seen.has(entrant.name)) {
      throw new StructuralError(`Team "${entrant.name}" appears more than once`);
    }
    seen.add(entrant.name);

    const other = namesById.get(entrant.id);
    if (other !== undefined) {
      throw new StructuralError(`Teams "${other}" and "${entrant.name}" share the id "${entrant.id}"`);
    }
    namesById.set(entrant.id, entrant.name);
  }

  return Tournament.fromDefinition({
    entrants: [...entrants],
    divisionRounds: options.divisionRounds ?? CONFIG.DIVISION_ROUNDS,
    pairings: options.pairings ?? CONFIG.SEMIFINAL_PAIRINGS,
  });
}

export function makeEntrantId(division: string, seed: number, name: string): string {
  return `${division}-${seed}-${name}`
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}
