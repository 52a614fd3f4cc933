import { describe, it, expect } from 'vitest';
import { resolveMatchup } from '../../src/engine/matchup';
import { BracketSimState } from '../../src/bracket/bracket-state';
import { createRng } from '../../src/engine/rng';
import { StructuralError } from '../../src/core/errors';
import { constantRng, makeEntrant } from '../helpers';

describe('resolveMatchup', () => {
  const favorite = makeEntrant('Favorite', 1, [1, 0.8]);
  const underdog = makeEntrant('Underdog', 8, [1, 0.2]);

  it('picks the first entrant when the draw falls inside its share', () => {
    const state = new BracketSimState(constantRng(0.5));
    expect(resolveMatchup(state, favorite, underdog, 'round-of-32')).toBe(favorite);
  });

  it('picks the second entrant when the draw falls past the first share', () => {
    const state = new BracketSimState(constantRng(0.9));
    expect(resolveMatchup(state, favorite, underdog, 'round-of-32')).toBe(underdog);
  });

  it('wins in proportion to the two conditional probabilities', () => {
    const state = new BracketSimState(createRng(42));
    const trials = 100000;
    let wins = 0;
    for (let i = 0; i < trials; i++) {
      if (resolveMatchup(state, favorite, underdog, 'round-of-32') === favorite) wins++;
    }
    expect(wins / trials).toBeGreaterThan(0.78);
    expect(wins / trials).toBeLessThan(0.82);
  });

  it('lets an upset winner take over the stronger seed slot', () => {
    const two = makeEntrant('Two', 2, [1, 0.5]);
    const five = makeEntrant('Five', 5, [1, 0.5]);
    const state = new BracketSimState(constantRng(0));

    expect(resolveMatchup(state, five, two, 'round-of-32')).toBe(five);
    expect(state.getEffectiveSeed(five)).toBe(2);
    expect(state.getEffectiveSeed(two)).toBe(2);
  });

  it('inherits the initial seed of the team it beat, not the slot that team held', () => {
    const two = makeEntrant('Two', 2, [1, 0.5, 0.25]);
    const four = makeEntrant('Four', 4, [1, 0.5, 0.25]);
    const five = makeEntrant('Five', 5, [1, 0.5, 0.25]);
    const state = new BracketSimState(constantRng(0));

    resolveMatchup(state, five, two, 'round-of-32');
    expect(state.getEffectiveSeed(five)).toBe(2);

    expect(resolveMatchup(state, four, five, 'round-of-16')).toBe(four);
    expect(state.getEffectiveSeed(four)).toBe(4);
  });

  it('leaves a favorite on its own seed slot when it wins', () => {
    const two = makeEntrant('Two', 2, [1, 0.5]);
    const five = makeEntrant('Five', 5, [1, 0.5]);
    const state = new BracketSimState(constantRng(0));

    expect(resolveMatchup(state, two, five, 'round-of-32')).toBe(two);
    expect(state.getEffectiveSeed(two)).toBe(2);
  });

  it('gives the first entrant the game when neither can win it', () => {
    const a = makeEntrant('A', 1, [1, 0]);
    const b = makeEntrant('B', 2, [1, 0]);
    const state = new BracketSimState(createRng(7));
    expect(resolveMatchup(state, a, b, 'round-of-32')).toBe(a);
  });

  it('refuses to play an entrant with no odds for the round', () => {
    const missing = makeEntrant('Missing', 3, [1]);
    const state = new BracketSimState(constantRng(0.5));
    expect(() => resolveMatchup(state, favorite, missing, 'round-of-32')).toThrow(StructuralError);
  });
});

describe('createRng', () => {
  it('repeats the same stream for the same seed', () => {
    const a = createRng(123);
    const b = createRng(123);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
  });

  it('stays in [0, 1)', () => {
    const rng = createRng(9);
    for (let i = 0; i < 1000; i++) {
      const value = rng();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});
