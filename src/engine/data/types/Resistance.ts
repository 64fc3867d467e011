// ─────────────────────────────────────────────
//  Resistance Profile
//  Values live in [-1, 1]: negative = weakness, positive = resistance.
// ─────────────────────────────────────────────

import { freeze, produce } from 'immer';
import type { Element } from './Element';
import { elementEntries } from './Element';
import { MathUtils } from '@/engine/utils/MathUtils';

export type ResistanceMap = Partial<Record<Element, number>>;

export interface ResistanceProfile {
  resistances: ResistanceMap;
  primaryElement: Element;
  immunities: Element[];
  weaknesses: Element[];
}

export interface ResistanceProfileInit {
  resistances?: ResistanceMap;
  primaryElement?: Element;
  immunities?: Element[];
  weaknesses?: Element[];
}

/** All-zero profile used when a defender has none */
export const EMPTY_PROFILE: ResistanceProfile = freeze({
  resistances: {},
  primaryElement: 'None',
  immunities: [],
  weaknesses: [],
}, true);

export function clampResistance(value: number): number {
  return MathUtils.clamp(value, -1, 1);
}

/** Frozen copy of `init`, values clamped */
export function createProfile(init: ResistanceProfileInit = {}): ResistanceProfile {
  const resistances: ResistanceMap = {};
  for (const [element, value] of resistanceEntries(init.resistances ?? {})) {
    resistances[element] = clampResistance(value);
  }
  return freeze({
    resistances,
    primaryElement: init.primaryElement ?? 'None',
    immunities: [...new Set(init.immunities ?? [])],
    weaknesses: [...new Set(init.weaknesses ?? [])],
  }, true);
}

/** Typed iteration over a resistance map, in ELEMENTS order */
export function resistanceEntries(map: ResistanceMap): Array<[Element, number]> {
  return elementEntries(map);
}

export function getResistance(profile: ResistanceProfile, element: Element): number {
  return profile.resistances[element] ?? 0;
}

export function isImmune(profile: ResistanceProfile, element: Element): boolean {
  return profile.immunities.includes(element);
}

export function isWeak(profile: ResistanceProfile, element: Element): boolean {
  return profile.weaknesses.includes(element);
}

export function withResistance(profile: ResistanceProfile, element: Element, value: number): ResistanceProfile {
  return produce(profile, draft => {
    draft.resistances[element] = clampResistance(value);
  });
}

/** Damage multiplier a single resistance value implies on its own */
export function resistanceDamageMultiplier(value: number): number {
  return value < 0 ? 1 + Math.abs(value) : 1 - value;
}
