import type { RandomSource } from '@/engine/data/types/Combat';

export const MathUtils: {
  clamp(v: number, min: number, max: number): number;
  clamp01(v: number): number;
  rand(): number;
  randRange(min: number, max: number, source?: RandomSource): number;
  lerp(a: number, b: number, t: number): number;
  inverseLerp(a: number, b: number, v: number): number;
  sum(values: readonly number[]): number;
  mean(values: readonly number[]): number;
  defaultRandom: RandomSource;
} = {
  /** Clamp a value between min and max */
  clamp(v: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, v));
  },

  clamp01(v: number): number {
    return MathUtils.clamp(v, 0, 1);
  },

  /** Random float in [0, 1) */
  rand(): number {
    return Math.random();
  },

  /** Random float in [min, max) drawn from `source` */
  randRange(min: number, max: number, source: RandomSource = MathUtils.defaultRandom): number {
    return min + source.next() * (max - min);
  },

  /** Linear interpolation */
  lerp(a: number, b: number, t: number): number {
    return a + (b - a) * t;
  },

  /** Inverse of lerp: where `v` sits between a and b */
  inverseLerp(a: number, b: number, v: number): number {
    return a === b ? 0 : (v - a) / (b - a);
  },

  /** Sum with an empty-list result of 0 */
  sum(values: readonly number[]): number {
    return values.reduce((acc, v) => acc + v, 0);
  },

  /** Arithmetic mean, 0 for an empty list */
  mean(values: readonly number[]): number {
    return values.length === 0 ? 0 : MathUtils.sum(values) / values.length;
  },

  /** RandomSource backed by MathUtils.rand, so tests can spy on it */
  defaultRandom: {
    next: (): number => MathUtils.rand(),
  } satisfies RandomSource,
};
