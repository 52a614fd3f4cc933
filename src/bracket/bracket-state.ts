import type { Entrant, Rng } from '../core/types';

/**
 * Mutable state for a single simulation run.
 * Tracks each entrant's seed slot: the best initial seed among the entrant and
 * the teams it has beaten. Created fresh for every run and discarded after.
 */
export class BracketSimState {
  private seedSlots = new Map<string, number>();

  constructor(readonly rng: Rng) {}

  getEffectiveSeed(entrant: Entrant): number {
    return this.seedSlots.get(entrant.id) ?? entrant.seed;
  }

  /**
   * Move the winner's seed slot down to the loser's initial seed if that seed is stronger.
   */
  inheritSeedSlot(winner: Entrant, loser: Entrant): void {
    if (loser.seed < this.getEffectiveSeed(winner)) {
      this.seedSlots.set(winner.id, loser.seed);
    }
  }

  /**
   * Put every given entrant back on its initial seed.
   */
  resetSeedSlots(entrants: readonly Entrant[]): void {
    for (const entrant of entrants) {
      this.seedSlots.delete(entrant.id);
    }
  }
}
