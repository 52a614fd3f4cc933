import type { Entrant, Round } from '../core/types';
import { ROUND_NAMES } from '../core/constants';
import { StructuralError } from '../core/errors';
import type { BracketSimState } from '../bracket/bracket-state';
import { getConditionalProbability } from './probability-table';

function requireProbability(entrant: Entrant, round: Round): number {
  const prob = getConditionalProbability(entrant.probabilities, round);
  if (prob === null) {
    throw new StructuralError(`${entrant.name} has no probability for ${ROUND_NAMES[round]} but is playing in it`);
  }
  return prob;
}

/**
 * Resolve one game. The two conditional probabilities for the round form the odds
 * range and a uniform draw over it picks the winner, so only their ratio matters.
 * The winner takes the loser's initial seed as its slot when that seed is stronger.
 */
export function resolveMatchup(
  state: BracketSimState,
  first: Entrant,
  second: Entrant,
  round: Round,
): Entrant {
  const firstProb = requireProbability(first, round);
  const secondProb = requireProbability(second, round);
  const oddsRange = firstProb + secondProb;
  const draw = state.rng() * oddsRange;

  const [winner, loser] = draw <= firstProb ? [first, second] : [second, first];
  state.inheritSeedSlot(winner, loser);
  return winner;
}
