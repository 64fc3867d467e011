// ─────────────────────────────────────────────
//  Composition Resolver
//  Merges a multi-element attack into one composite element/power
//  using the most specific matching rule.
// ─────────────────────────────────────────────

import type { Element } from '@/engine/data/types/Element';
import type { Attack } from '@/engine/data/types/Attack';
import { attackElementPower, attackUniqueElements, setComposite } from '@/engine/data/types/Attack';
import { MathUtils } from '@/engine/utils/MathUtils';

export type CombineMethod = 'Average' | 'Highest' | 'Lowest' | 'Weighted' | 'CustomCurve';

export interface CurveKey {
  time: number;
  value: number;
}

export const LINEAR_CURVE: readonly CurveKey[] = [
  { time: 0, value: 0 },
  { time: 1, value: 1 },
];

/** Power scale CustomCurve normalises against */
export const CURVE_POWER_SCALE = 100;

export interface CompositeRule {
  id: string;
  inputElements: Element[];
  /** Weighted method only; missing elements weigh 1.0 */
  weights: Partial<Record<Element, number>>;
  method: CombineMethod;
  /** CustomCurve method only; `compositeRule` sorts the keys by time */
  curve: readonly CurveKey[];
  /** None = keep the first input element */
  resultElement: Element;
  resultName: string;
  powerMultiplier: number;
  minimumPowerThreshold: number;
  requiredElementCount: number;
}

export type CompositeRuleInit = Partial<CompositeRule> & Pick<CompositeRule, 'inputElements' | 'resultElement'>;

export function compositeRule(init: CompositeRuleInit): CompositeRule {
  return {
    id: init.id ?? [...init.inputElements, init.resultElement].join('+'),
    inputElements: [...init.inputElements],
    weights: { ...(init.weights ?? {}) },
    method: init.method ?? 'Average',
    curve: [...(init.curve ?? LINEAR_CURVE)].sort((a, b) => a.time - b.time),
    resultElement: init.resultElement,
    resultName: init.resultName ?? '',
    powerMultiplier: init.powerMultiplier ?? 1,
    minimumPowerThreshold: init.minimumPowerThreshold ?? 0,
    requiredElementCount: init.requiredElementCount ?? 2,
  };
}

export interface CompositionResult {
  isComposite: boolean;
  element: Element;
  power: number;
  sourceElements: Element[];
  ruleId?: string;
  name?: string;
}

/** Piecewise-linear evaluation over keys sorted by time, clamped to the first/last key */
export function evaluateCurve(keys: readonly CurveKey[], t: number): number {
  const first = keys[0];
  const last = keys[keys.length - 1];
  if (!first || !last) return 0;
  if (t <= first.time) return first.value;
  if (t >= last.time) return last.value;

  for (let i = 0; i < keys.length - 1; i++) {
    const a = keys[i];
    const b = keys[i + 1];
    if (!a || !b) break;
    if (t >= a.time && t <= b.time) {
      return MathUtils.lerp(a.value, b.value, MathUtils.inverseLerp(a.time, b.time, t));
    }
  }
  return last.value;
}

/**
 * Combine contributing powers into one value.
 * Every method returns 0 for an empty power list.
 */
export function combinePowers(
  method: CombineMethod,
  elements: readonly Element[],
  powers: readonly number[],
  weights: Partial<Record<Element, number>> = {},
  curve: readonly CurveKey[] = LINEAR_CURVE,
): number {
  if (powers.length === 0) return 0;

  switch (method) {
    case 'Average':
      return MathUtils.mean(powers);
    case 'Highest':
      return Math.max(...powers);
    case 'Lowest':
      return Math.min(...powers);
    case 'Weighted': {
      let weightedSum = 0;
      let totalWeight = 0;
      const n = Math.min(elements.length, powers.length);
      for (let i = 0; i < n; i++) {
        const element = elements[i];
        const power = powers[i] ?? 0;
        const weight = element !== undefined ? (weights[element] ?? 1) : 1;
        weightedSum += power * weight;
        totalWeight += weight;
      }
      return totalWeight > 0 ? weightedSum / totalWeight : 0;
    }
    case 'CustomCurve': {
      const normalized = MathUtils.clamp01(MathUtils.mean(powers) / CURVE_POWER_SCALE);
      return evaluateCurve(curve, normalized) * CURVE_POWER_SCALE;
    }
  }
}

export function canCombine(rule: CompositeRule, elements: readonly Element[], powers: readonly number[]): boolean {
  const distinct = new Set(elements);
  if (distinct.size < rule.requiredElementCount) return false;
  if (!rule.inputElements.every(e => distinct.has(e))) return false;
  return MathUtils.sum(powers) >= rule.minimumPowerThreshold;
}

export class CompositionResolver {
  private rules: CompositeRule[] = [];

  constructor(rules: readonly CompositeRule[] = []) {
    rules.forEach(r => this.addRule(r));
  }

  addRule(rule: CompositeRule): void {
    this.rules.push(rule);
    // More required inputs = more specific; sort is stable for ties
    this.rules.sort((a, b) => b.inputElements.length - a.inputElements.length);
  }

  removeRule(id: string): boolean {
    const before = this.rules.length;
    this.rules = this.rules.filter(r => r.id !== id);
    return this.rules.length !== before;
  }

  /** Rules in match order */
  getRules(): CompositeRule[] {
    return [...this.rules];
  }

  /**
   * Try every rule, most specific first. `bonus` scales the output power
   * on top of the rule's own multiplier.
   */
  resolve(elements: readonly Element[], powers: readonly number[], bonus = 1): CompositionResult {
    const fallback: CompositionResult = {
      isComposite: false,
      element: elements[0] ?? 'None',
      power: powers[0] ?? 0,
      sourceElements: [...elements],
    };
    if (new Set(elements).size < 2) return fallback;

    const rule = this.rules.find(r => canCombine(r, elements, powers));
    if (!rule) return fallback;

    const combined = combinePowers(rule.method, elements, powers, rule.weights, rule.curve);
    const result: CompositionResult = {
      isComposite: true,
      element: rule.resultElement !== 'None' ? rule.resultElement : (elements[0] ?? 'None'),
      power: combined * rule.powerMultiplier * bonus,
      sourceElements: [...elements],
      ruleId: rule.id,
    };
    if (rule.resultName) result.name = rule.resultName;
    return result;
  }

  /**
   * Composite version of `attack`, or `attack` itself when no rule applies.
   * Powers of repeated elements are summed first. The attack's composite
   * bonus is left pending on the composite multiplier.
   */
  resolveAttack(attack: Attack): Attack {
    if (attack.composite) return attack;
    const elements = attackUniqueElements(attack);
    const powers = elements.map(e => attackElementPower(attack, e));
    const result = this.resolve(elements, powers);
    if (!result.isComposite) return attack;
    return setComposite(attack, result.element, result.power, attack.compositeBonus, result.sourceElements, result.name);
  }
}
