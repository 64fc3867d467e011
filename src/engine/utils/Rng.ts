// ─────────────────────────────────────────────
//  Seeded RNG
//  Deterministic RandomSource for replays and simulation tests.
// ─────────────────────────────────────────────

import type { RandomSource } from '@/engine/data/types/Combat';

// Simple string -> uint32 hash (xfnv1a)
const hashStrToUint = (str: string): number => {
  let h = 2166136261 >>> 0;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 16777619) >>> 0;
  }
  return h >>> 0;
};

// Mulberry32 PRNG. Accepts a uint32 seed.
const mulberry32 = (a: number) => {
  return function (): number {
    let t = (a += 0x6D2B79F5) >>> 0;
    t = Math.imul(t ^ (t >>> 15), t | 1) >>> 0;
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61) >>> 0;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

export const createRng = (seed: string | number): RandomSource => {
  const seedNum = typeof seed === 'number' ? (seed >>> 0) : hashStrToUint(seed);
  const rnd = mulberry32(seedNum || 1);
  return { next: () => rnd() };
};

/** Replays a fixed list of rolls, cycling when exhausted */
export const sequenceRng = (values: readonly number[]): RandomSource => {
  let i = 0;
  return {
    next: () => {
      if (values.length === 0) return 0;
      const v = values[i % values.length] ?? 0;
      i++;
      return v;
    },
  };
};
