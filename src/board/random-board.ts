// ============================================================
// Random Starting Layout
//
// One queen per column at a seeded-random row. Shown to the
// user as the starting board; the solver only uses its size.
// ============================================================

import { findConflicts } from '../solver/constraints';
import { InvalidBoardSizeError } from '../solver/errors';

// Mulberry32 seeded PRNG
export function mulberry32(seed: number): () => number {
  return () => {
    seed |= 0;
    seed = seed + 0x6D2B79F5 | 0;
    let t = Math.imul(seed ^ seed >>> 15, 1 | seed);
    t = t + Math.imul(t ^ t >>> 7, 61 | t) ^ t;
    return ((t ^ t >>> 14) >>> 0) / 4294967296;
  };
}

export function createRandomBoard(n: number, seed: number): number[] {
  if (!Number.isInteger(n) || n < 1) throw new InvalidBoardSizeError(n);
  const rng = mulberry32(seed);
  return Array.from({ length: n }, () => Math.floor(rng() * n));
}

/** Number of attacking queen pairs */
export function countConflicts(rows: readonly number[]): number {
  return findConflicts(rows).length;
}
