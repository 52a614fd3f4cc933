import type { Rng } from '../core/types';

/**
 * Seeded random number generator (xoshiro128**).
 * Same seed, same stream; used wherever a run must be reproducible.
 */
export function createRng(seed: number): Rng {
  let s0 = seed | 0;
  let s1 = (Math.imul(s0, 1664525) + 1013904223) | 0;
  let s2 = (Math.imul(s1, 1664525) + 1013904223) | 0;
  let s3 = (Math.imul(s2, 1664525) + 1013904223) | 0;

  return () => {
    const t = s1 << 9;
    let r = Math.imul(s1, 5);
    r = (r << 7) | (r >>> 25);
    r = Math.imul(r, 9);

    s2 ^= s0;
    s3 ^= s1;
    s1 ^= s2;
    s0 ^= s3;
    s2 ^= t;
    s3 = (s3 << 11) | (s3 >>> 21);

    return (r >>> 0) / 4294967296;
  };
}

export function resolveRng(seed?: number): Rng {
  return seed !== undefined ? createRng(seed) : Math.random;
}
