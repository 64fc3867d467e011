// ─────────────────────────────────────────────
//  Elemental Modifier Types
//  One variant per kind, each carrying only the fields it needs.
// ─────────────────────────────────────────────

import type { Element, ElementalValue } from './Element';

export type ModifierKind =
  | 'AttackBonus'
  | 'DefenseResistance'
  | 'AffinityOverride'
  | 'ElementalConversion'
  | 'CompositeBonus';

export const MODIFIER_KINDS: readonly ModifierKind[] = [
  'AttackBonus', 'DefenseResistance', 'AffinityOverride', 'ElementalConversion', 'CompositeBonus',
];

interface ModifierBase {
  id: string;
  /** Bulk-revocation key (equipment id, buff group, environment id) */
  sourceId: string;
  displayName?: string;
  description?: string;
  permanent: boolean;
  /** Seconds */
  remainingDuration: number;
  originalDuration: number;
  allowStacking: boolean;
  maxStacks: number;
  currentStacks: number;
}

export interface AttackBonusModifier extends ModifierBase {
  kind: 'AttackBonus';
  values: ElementalValue[];
}

export interface DefenseResistanceModifier extends ModifierBase {
  kind: 'DefenseResistance';
  values: ElementalValue[];
}

export interface AffinityOverrideEntry {
  attack: Element;
  defense: Element;
  value: number;
}

export interface AffinityOverrideModifier extends ModifierBase {
  kind: 'AffinityOverride';
  overrides: AffinityOverrideEntry[];
}

export interface ConversionRule {
  from: Element;
  to: Element;
  /** 0-100 */
  percentage: number;
  /** true: add the converted share as a new part; false: replace the source part */
  additive: boolean;
}

export interface ElementalConversionModifier extends ModifierBase {
  kind: 'ElementalConversion';
  rule: ConversionRule;
}

export interface CompositeBonusModifier extends ModifierBase {
  kind: 'CompositeBonus';
  multiplier: number;
}

export type Modifier =
  | AttackBonusModifier
  | DefenseResistanceModifier
  | AffinityOverrideModifier
  | ElementalConversionModifier
  | CompositeBonusModifier;

export type ValueModifier = AttackBonusModifier | DefenseResistanceModifier;

export interface ModifierOptions {
  sourceId?: string;
  displayName?: string;
  description?: string;
  /** Omit for a permanent modifier */
  duration?: number;
  permanent?: boolean;
  allowStacking?: boolean;
  maxStacks?: number;
}

function base(id: string, opts: ModifierOptions): ModifierBase {
  const duration = opts.duration ?? 0;
  const mod: ModifierBase = {
    id,
    sourceId: opts.sourceId ?? '',
    permanent: opts.permanent ?? opts.duration === undefined,
    remainingDuration: duration,
    originalDuration: duration,
    allowStacking: opts.allowStacking ?? false,
    maxStacks: opts.maxStacks ?? 1,
    currentStacks: 1,
  };
  if (opts.displayName) mod.displayName = opts.displayName;
  if (opts.description) mod.description = opts.description;
  return mod;
}

export function attackBonus(id: string, values: ElementalValue[], opts: ModifierOptions = {}): AttackBonusModifier {
  return { ...base(id, opts), kind: 'AttackBonus', values: values.map(v => ({ ...v })) };
}

export function defenseResistance(
  id: string,
  values: ElementalValue[],
  opts: ModifierOptions = {},
): DefenseResistanceModifier {
  return { ...base(id, opts), kind: 'DefenseResistance', values: values.map(v => ({ ...v })) };
}

export function affinityOverride(
  id: string,
  overrides: AffinityOverrideEntry[],
  opts: ModifierOptions = {},
): AffinityOverrideModifier {
  return { ...base(id, opts), kind: 'AffinityOverride', overrides: overrides.map(o => ({ ...o })) };
}

export function elementalConversion(
  id: string,
  rule: ConversionRule,
  opts: ModifierOptions = {},
): ElementalConversionModifier {
  return { ...base(id, opts), kind: 'ElementalConversion', rule: { ...rule } };
}

export function compositeBonus(id: string, multiplier: number, opts: ModifierOptions = {}): CompositeBonusModifier {
  return { ...base(id, opts), kind: 'CompositeBonus', multiplier };
}

export function isModifierExpired(mod: Modifier): boolean {
  return !mod.permanent && mod.remainingDuration <= 0;
}

/** Remaining share of the original duration; 1 for permanent modifiers */
export function durationFraction(mod: Modifier): number {
  if (mod.permanent) return 1;
  return mod.originalDuration > 0 ? mod.remainingDuration / mod.originalDuration : 0;
}

export function refreshDuration<M extends Modifier>(mod: M): M {
  return { ...mod, remainingDuration: mod.originalDuration };
}

export function addStack<M extends Modifier>(mod: M): M {
  if (!mod.allowStacking || mod.currentStacks >= mod.maxStacks) return mod;
  return { ...mod, currentStacks: mod.currentStacks + 1 };
}

export function removeStack<M extends Modifier>(mod: M): M {
  if (mod.currentStacks <= 1) return mod;
  return { ...mod, currentStacks: mod.currentStacks - 1 };
}

/** Effect strength multiplier contributed by stacks */
export function stackScale(mod: Modifier): number {
  return mod.allowStacking ? mod.currentStacks : 1;
}

export function elementalValueOf(mod: ValueModifier, element: Element): ElementalValue | undefined {
  return mod.values.find(v => v.element === element);
}

/** Adds to an existing entry for the element, or appends a new one */
export function addElementalValue<M extends ValueModifier>(
  mod: M,
  element: Element,
  flat: number,
  percentage = 0,
): M {
  const found = mod.values.some(v => v.element === element);
  const values = found
    ? mod.values.map(v => (v.element === element
      ? { element, flat: v.flat + flat, percentage: v.percentage + percentage }
      : { ...v }))
    : [...mod.values.map(v => ({ ...v })), { element, flat, percentage }];
  return { ...mod, values };
}
