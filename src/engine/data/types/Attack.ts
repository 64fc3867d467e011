// ─────────────────────────────────────────────
//  Elemental Attack
//  Immutable value; every transformation returns a new Attack.
// ─────────────────────────────────────────────

import { freeze, produce } from 'immer';
import type { Element, ElementalPower } from './Element';

export interface CompositeState {
  element: Element;
  power: number;
  multiplier: number;
  /** Elements merged into the composite, in attack order */
  sourceElements: Element[];
  name?: string;
}

export interface Attack {
  /** Raw contributions. Superseded by `composite` when it is set. */
  parts: ElementalPower[];
  /** Attributed attacker entity id */
  sourceId?: string;
  allowComposition: boolean;
  /** Product of the attacker's active composite-bonus multipliers */
  compositeBonus: number;
  composite?: CompositeState;
}

export interface AttackOptions {
  sourceId?: string;
  allowComposition?: boolean;
  compositeBonus?: number;
}

export function createAttack(parts: ElementalPower[], opts: AttackOptions = {}): Attack {
  const attack: Attack = {
    parts: parts.map(p => ({ element: p.element, power: p.power })),
    allowComposition: opts.allowComposition ?? true,
    compositeBonus: opts.compositeBonus ?? 1,
  };
  if (opts.sourceId !== undefined) attack.sourceId = opts.sourceId;
  return freeze(attack, true);
}

export function singleElementAttack(element: Element, power: number, opts: AttackOptions = {}): Attack {
  return createAttack([{ element, power }], opts);
}

/** Deep copy, for replaying one attack against several targets */
export function copyAttack(attack: Attack): Attack {
  const copy = createAttack(attack.parts, {
    allowComposition: attack.allowComposition,
    compositeBonus: attack.compositeBonus,
    ...(attack.sourceId !== undefined ? { sourceId: attack.sourceId } : {}),
  });
  const composite = attack.composite;
  if (!composite) return copy;
  return produce(copy, draft => {
    draft.composite = { ...composite, sourceElements: [...composite.sourceElements] };
  });
}

export function withElement(attack: Attack, element: Element, power: number): Attack {
  return produce(attack, draft => {
    draft.parts.push({ element, power });
  });
}

export function setComposite(
  attack: Attack,
  element: Element,
  power: number,
  multiplier = 1,
  sourceElements: Element[] = attackUniqueElements(attack),
  name?: string,
): Attack {
  return produce(attack, draft => {
    const composite: CompositeState = { element, power, multiplier, sourceElements: [...sourceElements] };
    if (name) composite.name = name;
    draft.composite = composite;
  });
}

export function clearComposite(attack: Attack): Attack {
  if (!attack.composite) return attack;
  return produce(attack, draft => {
    delete draft.composite;
  });
}

/** Folds the composite multiplier into the composite power */
export function applyCompositeMultiplier(attack: Attack): Attack {
  if (!attack.composite || attack.composite.multiplier === 1) return attack;
  return produce(attack, draft => {
    if (!draft.composite) return;
    draft.composite.power *= draft.composite.multiplier;
    draft.composite.multiplier = 1;
  });
}

export function scaleAttack(attack: Attack, multiplier: number): Attack {
  return produce(attack, draft => {
    if (draft.composite) {
      draft.composite.power *= multiplier;
    } else {
      for (const part of draft.parts) part.power *= multiplier;
    }
  });
}

/** The (element, power) pairs a reader must use */
export function effectiveParts(attack: Attack): ElementalPower[] {
  if (attack.composite) {
    return [{ element: attack.composite.element, power: attack.composite.power }];
  }
  return attack.parts.map(p => ({ element: p.element, power: p.power }));
}

export function attackTotalPower(attack: Attack): number {
  if (attack.composite) return attack.composite.power;
  return attack.parts.reduce((sum, p) => sum + p.power, 0);
}

export function attackElementPower(attack: Attack, element: Element): number {
  if (attack.composite) return attack.composite.element === element ? attack.composite.power : 0;
  return attack.parts
    .filter(p => p.element === element)
    .reduce((sum, p) => sum + p.power, 0);
}

export function attackHasElement(attack: Attack, element: Element): boolean {
  if (attack.composite) return attack.composite.element === element;
  return attack.parts.some(p => p.element === element);
}

/** Distinct elements in first-seen order */
export function attackUniqueElements(attack: Attack): Element[] {
  if (attack.composite) return [attack.composite.element];
  return [...new Set(attack.parts.map(p => p.element))];
}

export function attackElementCount(attack: Attack): number {
  return attackUniqueElements(attack).length;
}

export function isMultiElement(attack: Attack): boolean {
  return !attack.composite && attackElementCount(attack) > 1;
}
