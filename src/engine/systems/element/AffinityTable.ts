// ─────────────────────────────────────────────
//  Affinity (elemental) multiplier table
//  Backed by an authored matrix; the pair lookup is built lazily
//  on first access and writes go to both.
// ─────────────────────────────────────────────

import { ELEMENTS } from '@/engine/data/types/Element';
import type { Element } from '@/engine/data/types/Element';
import { DEFAULT_AFFINITY_PAIRS, SAME_ELEMENT_AFFINITY } from '@/engine/data/defaults/DefaultAffinities';

export const NEUTRAL_AFFINITY = 1.0;

export interface AffinityRow {
  attack: Element;
  /** One value per entry of `supportedElements`, same order */
  defense: number[];
}

/** Persisted representation */
export interface AffinityMatrix {
  supportedElements: Element[];
  rows: AffinityRow[];
}

const pairKey = (attack: Element, defense: Element): string => `${attack}>${defense}`;

export class AffinityTable {
  private readonly matrix: AffinityMatrix;
  private lookup: Map<string, number> | null = null;

  constructor(matrix: AffinityMatrix = { supportedElements: [], rows: [] }) {
    this.matrix = cloneMatrix(matrix);
  }

  /** Table holding the built-in relationships for every element except None */
  static createDefault(): AffinityTable {
    const supported = ELEMENTS.filter(e => e !== 'None');
    const rows: AffinityRow[] = supported.map(attack => ({
      attack,
      defense: supported.map(defense => defaultAffinity(attack, defense)),
    }));
    return new AffinityTable({ supportedElements: [...supported], rows });
  }

  /**
   * Returns the damage multiplier when an attack of `attack`
   * hits a defender whose element is `defense`. Unset pairs are neutral.
   */
  get(attack: Element, defense: Element): number {
    return this.ensureLookup().get(pairKey(attack, defense)) ?? NEUTRAL_AFFINITY;
  }

  has(attack: Element, defense: Element): boolean {
    return this.ensureLookup().has(pairKey(attack, defense));
  }

  set(attack: Element, defense: Element, value: number): void {
    this.ensureLookup().set(pairKey(attack, defense), value);
    this.writeCell(attack, defense, value);
  }

  /** Copy of the persisted matrix, in sync with every `set` */
  toMatrix(): AffinityMatrix {
    return cloneMatrix(this.matrix);
  }

  private ensureLookup(): Map<string, number> {
    if (this.lookup) return this.lookup;
    const lookup = new Map<string, number>();
    const { supportedElements, rows } = this.matrix;
    for (const row of rows) {
      const n = Math.min(row.defense.length, supportedElements.length);
      for (let j = 0; j < n; j++) {
        const defense = supportedElements[j];
        const value = row.defense[j];
        if (defense === undefined || value === undefined) continue;
        lookup.set(pairKey(row.attack, defense), value);
      }
    }
    this.lookup = lookup;
    return lookup;
  }

  private writeCell(attack: Element, defense: Element, value: number): void {
    const { supportedElements, rows } = this.matrix;

    let col = supportedElements.indexOf(defense);
    if (col === -1) {
      supportedElements.push(defense);
      col = supportedElements.length - 1;
    }

    let row = rows.find(r => r.attack === attack);
    if (!row) {
      row = { attack, defense: [] };
      rows.push(row);
    }

    // Pad short rows with neutral cells so column indices line up
    for (const r of rows) {
      while (r.defense.length < supportedElements.length) r.defense.push(NEUTRAL_AFFINITY);
    }
    row.defense[col] = value;
  }
}

function defaultAffinity(attack: Element, defense: Element): number {
  const pair = DEFAULT_AFFINITY_PAIRS.find(p => p.attack === attack && p.defense === defense);
  if (pair) return pair.value;
  return attack === defense ? SAME_ELEMENT_AFFINITY : NEUTRAL_AFFINITY;
}

function cloneMatrix(m: AffinityMatrix): AffinityMatrix {
  return {
    supportedElements: [...m.supportedElements],
    rows: m.rows.map(r => ({ attack: r.attack, defense: [...r.defense] })),
  };
}
