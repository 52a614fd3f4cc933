import type { Entrant, DivisionRun, Round, RoundSurvivors } from '../core/types';
import { ROUNDS_IN_ORDER, MAX_DIVISION_ROUNDS } from '../core/constants';
import { StructuralError } from '../core/errors';
import { resolveMatchup } from '../engine/matchup';
import type { BracketSimState } from './bracket-state';

function byInitialSeed(a: Entrant, b: Entrant): number {
  return a.seed - b.seed || a.name.localeCompare(b.name);
}

/**
 * Rounds played inside a division, play-in first.
 */
export function getDivisionRounds(count: number): Round[] {
  if (!Number.isInteger(count) || count < 1 || count > MAX_DIVISION_ROUNDS) {
    throw new StructuralError(`Division round count must be between 1 and ${MAX_DIVISION_ROUNDS}, got ${count}`);
  }
  return ROUNDS_IN_ORDER.slice(0, count);
}

function groupBySeed(entrants: readonly Entrant[]): Map<number, Entrant[]> {
  const groups = new Map<number, Entrant[]>();
  for (const entrant of entrants) {
    const group = groups.get(entrant.seed);
    if (group) group.push(entrant);
    else groups.set(entrant.seed, [entrant]);
  }
  return groups;
}

/**
 * A sub-bracket that resolves its field to one winner.
 * Membership is fixed at construction; per-run results come back as a DivisionRun.
 */
export class Division {
  readonly entrants: readonly Entrant[];
  readonly rounds: readonly Round[];

  constructor(
    readonly name: string,
    entrants: readonly Entrant[],
    roundCount: number,
  ) {
    this.entrants = [...entrants].sort(byInitialSeed);
    this.rounds = getDivisionRounds(roundCount);
    this.validate();
  }

  private validate(): void {
    const groups = groupBySeed(this.entrants);
    for (const [seed, group] of groups) {
      if (group.length > 2) {
        throw new StructuralError(`Incorrect number of teams for seed ${seed} in ${this.name}: ${group.length}`);
      }
    }

    // After the play-in the field must halve cleanly down to one
    const expectedField = 2 ** (this.rounds.length - 1);
    if (groups.size !== expectedField) {
      throw new StructuralError(
        `${this.name} has ${groups.size} seed lines; ${this.rounds.length} rounds need exactly ${expectedField}`,
      );
    }
  }

  simulate(state: BracketSimState): DivisionRun {
    state.resetSeedSlots(this.entrants);

    const [playInRound, ...standardRounds] = this.rounds;
    const rounds: RoundSurvivors[] = [{ round: playInRound, survivors: this.playIn(state, playInRound) }];

    let previous = rounds[0].survivors;
    for (const round of standardRounds) {
      previous = this.playRound(state, previous, round);
      rounds.push({ round, survivors: previous });
    }

    if (previous.length !== 1) {
      throw new StructuralError(`${this.name} finished with ${previous.length} teams instead of one winner`);
    }

    return { division: this.name, rounds, winner: previous[0] };
  }

  /**
   * Seeds with two entrants play off for the seed line; single entrants advance.
   */
  private playIn(state: BracketSimState, round: Round): Entrant[] {
    const survivors: Entrant[] = [];
    for (const [seed, group] of groupBySeed(this.entrants)) {
      if (group.length === 2) {
        survivors.push(resolveMatchup(state, group[0], group[1], round));
      } else if (group.length === 1) {
        survivors.push(group[0]);
      } else {
        throw new StructuralError(`Incorrect number of teams for seed ${seed} in ${this.name}`);
      }
    }
    return survivors.sort(byInitialSeed);
  }

  /**
   * Reseeded round: strongest remaining seed slot plays the weakest.
   */
  private playRound(state: BracketSimState, field: Entrant[], round: Round): Entrant[] {
    if (field.length % 2 !== 0) {
      throw new StructuralError(`${this.name} has an odd field of ${field.length} entering ${round}`);
    }

    const bySlot = (a: Entrant, b: Entrant) =>
      state.getEffectiveSeed(a) - state.getEffectiveSeed(b) || byInitialSeed(a, b);
    const ordered = [...field].sort(bySlot);
    const half = ordered.length / 2;
    const highSeeds = ordered.slice(0, half);
    const lowSeeds = ordered.slice(half).reverse();

    const winners = highSeeds.map((high, i) => resolveMatchup(state, high, lowSeeds[i], round));
    return winners.sort(byInitialSeed);
  }
}
