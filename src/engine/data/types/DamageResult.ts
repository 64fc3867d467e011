// ─────────────────────────────────────────────
//  Elemental Damage Result
// ─────────────────────────────────────────────

import type { Element, ElementalPower } from './Element';
import type { ResistanceMap } from './Resistance';

/** An on-hit effect the resolved attack is eligible to apply */
export interface TriggeredEffect {
  effectId: string;
  effectName: string;
  element: Element;
  power: number;
  duration: number;
  statusEffectIds: string[];
}

export interface DamageResult {
  baseDamage: number;
  finalDamage: number;
  /** Pairs actually used for damage (the composite pair when one formed) */
  attackParts: ElementalPower[];
  isComposite: boolean;
  compositeName?: string;
  critical: boolean;
  /** Variance multiplier that was rolled (1 for previews) */
  variance: number;
  defenseResistances: ResistanceMap;
  breakdown: Partial<Record<Element, number>>;
  triggeredEffects: TriggeredEffect[];
  log: string[];
}

export function elementDamage(result: DamageResult, element: Element): number {
  return result.breakdown[element] ?? 0;
}

export function wasElementUsed(result: DamageResult, element: Element): boolean {
  return result.attackParts.some(p => p.element === element);
}

/** Element with the largest positive contribution, None when nothing dealt damage */
export function dominantElement(result: DamageResult): Element {
  let dominant: Element = 'None';
  let highest = 0;
  for (const part of result.attackParts) {
    const dmg = elementDamage(result, part.element);
    if (dmg > highest) {
      highest = dmg;
      dominant = part.element;
    }
  }
  return dominant;
}
