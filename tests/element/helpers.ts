// ─────────────────────────────────────────────
//  Element Test Helpers
//  In-memory stand-ins for the host's stat and status-effect systems.
// ─────────────────────────────────────────────

import type { Element } from '@/engine/data/types/Element';
import type { StatAccessor, StatKind, StatusEffectApplicator } from '@/engine/data/types/Combat';

export type StatTable = Record<string, Partial<Record<StatKind, number>>>;

export interface DamageRecord {
  id: string;
  amount: number;
}

export function makeStats(table: StatTable = {}): { stats: StatAccessor; damage: DamageRecord[] } {
  const damage: DamageRecord[] = [];
  const stats: StatAccessor = {
    getStat: (id, kind) => table[id]?.[kind],
    applyDamage: (id, amount) => {
      damage.push({ id, amount });
    },
  };
  return { stats, damage };
}

export interface StatusCall {
  statusEffectId: string;
  element: Element;
  targetId: string;
}

/** Accepts every status effect unless `accept` says otherwise */
export function makeApplicator(accept: (statusEffectId: string) => boolean = () => true): {
  applicator: StatusEffectApplicator;
  applied: StatusCall[];
  removed: Array<{ statusEffectId: string; targetId: string }>;
} {
  const applied: StatusCall[] = [];
  const removed: Array<{ statusEffectId: string; targetId: string }> = [];
  const applicator: StatusEffectApplicator = {
    tryApply: (statusEffectId, element, targetId) => {
      if (!accept(statusEffectId)) return false;
      applied.push({ statusEffectId, element, targetId });
      return true;
    },
    remove: (statusEffectId, targetId) => {
      removed.push({ statusEffectId, targetId });
    },
  };
  return { applicator, applied, removed };
}
