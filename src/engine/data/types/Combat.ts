// ─────────────────────────────────────────────
//  Combat Boundary Types
//  The engine reads and writes character state only through these.
// ─────────────────────────────────────────────

import type { Element } from './Element';

export type StatKind = 'offense' | 'magicPower' | 'critRate' | 'critDamage';

/** Owned by the host game; the engine never stores character stats */
export interface StatAccessor {
  /** `undefined` when the entity has no such stat */
  getStat(entityId: string, stat: StatKind): number | undefined;
  applyDamage(entityId: string, amount: number): void;
}

/** Host status-effect system */
export interface StatusEffectApplicator {
  tryApply(statusEffectId: string, element: Element, targetId: string): boolean;
  remove?(statusEffectId: string, targetId: string): void;
}

/** Uniform [0, 1) source; inject a seeded one for reproducible results */
export interface RandomSource {
  next(): number;
}
