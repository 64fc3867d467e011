// ─────────────────────────────────────────────
//  Environment Element Profile
//  Battlefield-wide element modifiers (volcano, storm, sanctum…)
// ─────────────────────────────────────────────

import type { Element } from './Element';
import type { ResistanceMap } from './Resistance';

export interface EnvironmentDamageModifier {
  multiplier: number;
  /** Flat power added after the multiplier */
  powerBonus: number;
}

export interface AmbientEffect {
  element: Element;
  statusEffectId: string;
  /** 0-1, rolled once per hit */
  chance: number;
  /** Attacks carrying any of these elements suppress the effect */
  immuneElements: Element[];
}

export interface EnvironmentProfile {
  id: string;
  name: string;
  description?: string;
  resistances: ResistanceMap;
  damageModifiers: Partial<Record<Element, EnvironmentDamageModifier>>;
  ambientEffects: AmbientEffect[];
}

export function environmentDamageMultiplier(env: EnvironmentProfile, element: Element): number {
  return env.damageModifiers[element]?.multiplier ?? 1;
}

export function environmentPowerBonus(env: EnvironmentProfile, element: Element): number {
  return env.damageModifiers[element]?.powerBonus ?? 0;
}

export function environmentResistance(env: EnvironmentProfile, element: Element): number {
  return env.resistances[element] ?? 0;
}
