import type { Entrant, BracketRun, DivisionRun, Rng } from '../core/types';
import { SEMIFINAL_ROUND, CHAMPIONSHIP_ROUND } from '../core/constants';
import { StructuralError } from '../core/errors';
import { resolveMatchup } from '../engine/matchup';
import { BracketSimState } from './bracket-state';
import { Division } from './division';
import type { SemifinalPairings, TournamentDefinition } from './types';

/**
 * The whole bracket: divisions plus the semifinal pairing of their winners.
 * Immutable; every call to simulate() works on its own BracketSimState.
 */
export class Tournament {
  readonly divisions: ReadonlyMap<string, Division>;

  constructor(
    divisions: readonly Division[],
    readonly pairings: SemifinalPairings,
    readonly divisionRounds: number,
  ) {
    const byName = new Map<string, Division>();
    for (const division of divisions) {
      if (byName.has(division.name)) {
        throw new StructuralError(`Division "${division.name}" is defined twice`);
      }
      byName.set(division.name, division);
    }
    this.divisions = byName;
    this.validatePairings();
  }

  static fromDefinition(definition: TournamentDefinition): Tournament {
    const grouped = new Map<string, Entrant[]>();
    for (const entrant of definition.entrants) {
      const members = grouped.get(entrant.division);
      if (members) members.push(entrant);
      else grouped.set(entrant.division, [entrant]);
    }

    const divisions = [...grouped].map(
      ([name, members]) => new Division(name, members, definition.divisionRounds),
    );
    return new Tournament(divisions, definition.pairings, definition.divisionRounds);
  }

  toDefinition(): TournamentDefinition {
    return {
      divisionRounds: this.divisionRounds,
      pairings: this.pairings,
      entrants: this.getEntrants(),
    };
  }

  getEntrants(): Entrant[] {
    return [...this.divisions.values()].flatMap(d => [...d.entrants]);
  }

  findEntrant(name: string): Entrant | undefined {
    return this.getEntrants().find(e => e.name === name);
  }

  private validatePairings(): void {
    const paired = this.pairings.flat();
    const unique = new Set(paired);
    if (unique.size !== paired.length) {
      throw new StructuralError(`Semifinal pairings name a division twice: ${paired.join(', ')}`);
    }

    for (const name of this.divisions.keys()) {
      if (!unique.has(name)) {
        throw new StructuralError(`Region "${name}" not recognized`);
      }
    }
    for (const name of paired) {
      if (!this.divisions.has(name)) {
        throw new StructuralError(`Region "${name}" is paired for the semifinals but has no teams`);
      }
    }
  }

  /**
   * Resolve every division, then both semifinals, then the final.
   */
  simulate(rng: Rng): BracketRun {
    const state = new BracketSimState(rng);
    const divisionRuns: DivisionRun[] = [];
    const winners = new Map<string, Entrant>();

    for (const division of this.divisions.values()) {
      const run = division.simulate(state);
      divisionRuns.push(run);
      winners.set(division.name, run.winner);
    }

    const winnerOf = (name: string): Entrant => {
      const winner = winners.get(name);
      if (!winner) throw new StructuralError(`Region "${name}" not recognized`);
      return winner;
    };

    const [[a, b], [c, d]] = this.pairings;
    const finalist1 = resolveMatchup(state, winnerOf(a), winnerOf(b), SEMIFINAL_ROUND);
    const finalist2 = resolveMatchup(state, winnerOf(c), winnerOf(d), SEMIFINAL_ROUND);
    const champion = resolveMatchup(state, finalist1, finalist2, CHAMPIONSHIP_ROUND);

    return { divisions: divisionRuns, finalists: [finalist1, finalist2], champion };
  }
}
