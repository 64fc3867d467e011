// ─────────────────────────────────────────────
//  Default Affinity Relationships
//  Used by AffinityTable.createDefault(). Games override per pair.
// ─────────────────────────────────────────────

import type { Element } from '@/engine/data/types/Element';

export interface AffinityPair {
  attack: Element;
  defense: Element;
  value: number;
}

/** Multiplier when attacker and defender share an element */
export const SAME_ELEMENT_AFFINITY = 0.5;

export const DEFAULT_AFFINITY_PAIRS: readonly AffinityPair[] = [
  { attack: 'Fire',      defense: 'Water',     value: 0.5 },
  { attack: 'Fire',      defense: 'Ice',       value: 1.5 },
  { attack: 'Fire',      defense: 'Earth',     value: 1.2 },
  { attack: 'Water',     defense: 'Fire',      value: 1.5 },
  { attack: 'Water',     defense: 'Lightning', value: 0.5 },
  { attack: 'Water',     defense: 'Earth',     value: 1.2 },
  { attack: 'Wind',      defense: 'Earth',     value: 1.5 },
  { attack: 'Wind',      defense: 'Fire',      value: 1.2 },
  { attack: 'Earth',     defense: 'Wind',      value: 0.5 },
  { attack: 'Earth',     defense: 'Water',     value: 0.8 },
  { attack: 'Light',     defense: 'Dark',      value: 1.5 },
  { attack: 'Dark',      defense: 'Light',     value: 1.5 },
  { attack: 'Lightning', defense: 'Water',     value: 1.5 },
  { attack: 'Ice',       defense: 'Fire',      value: 0.5 },
];
