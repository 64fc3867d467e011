import { describe, it, expect } from 'vitest';
import { createRng, sequenceRng } from '@/engine/utils/Rng';

describe('createRng', () => {
  it('repeats the same stream for the same seed', () => {
    const a = createRng('battle-1');
    const b = createRng('battle-1');
    const rollsA = Array.from({ length: 5 }, () => a.next());
    const rollsB = Array.from({ length: 5 }, () => b.next());
    expect(rollsA).toEqual(rollsB);
  });

  it('produces different streams for different seeds', () => {
    const a = createRng(1);
    const b = createRng(2);
    expect(a.next()).not.toBe(b.next());
  });

  it('stays within [0, 1)', () => {
    const rng = createRng(42);
    for (let i = 0; i < 200; i++) {
      const v = rng.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});

describe('sequenceRng', () => {
  it('replays values and cycles', () => {
    const rng = sequenceRng([0.1, 0.9]);
    expect([rng.next(), rng.next(), rng.next()]).toEqual([0.1, 0.9, 0.1]);
  });

  it('returns 0 for an empty sequence', () => {
    expect(sequenceRng([]).next()).toBe(0);
  });
});
