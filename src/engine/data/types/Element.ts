// ─────────────────────────────────────────────
//  Element Types
// ─────────────────────────────────────────────

export const ELEMENTS = [
  'None', 'Fire', 'Water', 'Wind', 'Earth', 'Light',
  'Dark', 'Lightning', 'Ice', 'Poison', 'Holy', 'Void',
] as const;

export type Element = typeof ELEMENTS[number];

export type ElementFlag = 'Physical' | 'Magical' | 'Healing' | 'Debuff' | 'Environmental' | 'Ethereal';

export function isElement(value: string): value is Element {
  return ELEMENTS.some(e => e === value);
}

/** Defined entries of an element-keyed record, in ELEMENTS order */
export function elementEntries<T>(record: Partial<Record<Element, T>>): Array<[Element, T]> {
  const out: Array<[Element, T]> = [];
  for (const element of ELEMENTS) {
    const value = record[element];
    if (value !== undefined) out.push([element, value]);
  }
  return out;
}

/** One typed power contribution of an attack */
export interface ElementalPower {
  element: Element;
  power: number;
}

/** Per-element flat + percentage pair carried by modifiers and bonuses */
export interface ElementalValue {
  element: Element;
  flat: number;
  /** Fraction of the scaling stat (0.5 = 50%) */
  percentage: number;
}

export interface EffectTriggerContext {
  element: Element;
  /** Final damage of the hit that is checking the trigger */
  damage: number;
  /** Every element present in the resolved attack */
  attackElements: readonly Element[];
}

/** On-hit effect attached to an element definition */
export interface ElementalEffect {
  id: string;
  name: string;
  triggerElement: Element;
  basePower: number;
  /** Seconds */
  duration: number;
  statusEffectIds: string[];
  /**
   * Eligibility predicate. When omitted the effect triggers whenever
   * `triggerElement` is present in the attack.
   */
  trigger?: (ctx: EffectTriggerContext) => boolean;
}

/** Static description of an element, authored outside the engine */
export interface ElementDefinition {
  id: string;
  element: Element;
  name: string;
  flags: ElementFlag[];
  description?: string;
  loreTags?: string[];
  effects: ElementalEffect[];
}

export function hasFlag(def: ElementDefinition, flag: ElementFlag): boolean {
  return def.flags.includes(flag);
}

export function shouldTrigger(effect: ElementalEffect, ctx: EffectTriggerContext): boolean {
  if (effect.trigger) return effect.trigger(ctx);
  return ctx.element === effect.triggerElement && ctx.attackElements.includes(effect.triggerElement);
}
