// ─────────────────────────────────────────────
//  Elemental Resolution Pipeline
//  attack + defender (+ environment) → DamageResult
//
//  1. base damage        5. crit + variance + global multiplier
//  2. composition        6. on-hit effect eligibility
//  3. defender profile   7. result + calculation log
//  4. per-element damage
// ─────────────────────────────────────────────

import { freeze } from 'immer';
import type { Element, ElementalPower } from '@/engine/data/types/Element';
import { shouldTrigger } from '@/engine/data/types/Element';
import type { Attack } from '@/engine/data/types/Attack';
import { applyCompositeMultiplier, attackTotalPower, effectiveParts } from '@/engine/data/types/Attack';
import type { ResistanceProfile } from '@/engine/data/types/Resistance';
import { EMPTY_PROFILE, getResistance, isImmune } from '@/engine/data/types/Resistance';
import type { EnvironmentProfile } from '@/engine/data/types/Environment';
import {
  environmentDamageMultiplier,
  environmentPowerBonus,
  environmentResistance,
} from '@/engine/data/types/Environment';
import type { DamageResult, TriggeredEffect } from '@/engine/data/types/DamageResult';
import type { RandomSource, StatAccessor, StatKind } from '@/engine/data/types/Combat';
import type { ElementConfig } from '@/config';
import { resolveConfig } from '@/config';
import { MathUtils } from '@/engine/utils/MathUtils';
import { Logger } from '@/engine/utils/Logger';
import type { ElementDatabase } from './ElementDatabase';
import type { AffinityOverrideTable } from './AffinityOverrideTable';
import { NEUTRAL_AFFINITY } from './AffinityTable';

/** Anything that can be struck by an elemental attack */
export interface Defender {
  readonly id: string;
  /** `undefined` is treated as all-zero resistance */
  getDefense(): ResistanceProfile | undefined;
  readonly affinityOverrides?: AffinityOverrideTable;
}

export interface PipelineOptions {
  stats: StatAccessor;
  /** Omit to resolve with neutral affinities and no composition */
  database?: ElementDatabase;
  random?: RandomSource;
  config?: Partial<ElementConfig>;
}

export interface ResolveOptions {
  environment?: EnvironmentProfile | null;
  /** Fixes the critical outcome instead of rolling it; attributed attacks only */
  forceCrit?: boolean;
}

interface PostModifiers {
  critical: boolean;
  critMultiplier: number;
  variance: number;
}

export class ResolutionPipeline {
  readonly config: ElementConfig;
  private readonly stats: StatAccessor;
  private readonly database: ElementDatabase | undefined;
  private readonly random: RandomSource;

  constructor(opts: PipelineOptions) {
    this.stats = opts.stats;
    this.database = opts.database;
    this.random = opts.random ?? MathUtils.defaultRandom;
    this.config = resolveConfig(opts.config);
  }

  setGlobalDamageMultiplier(multiplier: number): void {
    this.config.globalDamageMultiplier = Math.max(0, multiplier);
  }

  /**
   * Resolve one hit. Reads the defender but never mutates it; applying
   * the damage and any triggered effects is left to the caller.
   */
  resolve(attack: Attack, defender?: Defender | null, opts: ResolveOptions = {}): DamageResult {
    return this.run(attack, defender ?? null, opts.environment ?? null, log => this.rollPostModifiers(attack, opts.forceCrit, log));
  }

  /** Deterministic expected damage for UI/AI: no critical roll, variance fixed at 1 */
  preview(attack: Attack, defender?: Defender | null, environment?: EnvironmentProfile | null): DamageResult {
    return this.run(attack, defender ?? null, environment ?? null, () => ({ critical: false, critMultiplier: 1, variance: 1 }));
  }

  private run(
    input: Attack,
    defender: Defender | null,
    environment: EnvironmentProfile | null,
    post: (log: string[]) => PostModifiers,
  ): DamageResult {
    const log: string[] = [];

    // 1. Base damage
    const baseDamage = input.sourceId !== undefined
      ? this.stat(input.sourceId, 'offense', 0, log)
      : attackTotalPower(input);
    log.push(`Base damage: ${fmt(baseDamage)}`);

    // 2. Composition
    const attack = this.compose(input, log);
    const parts = effectiveParts(attack);

    // 3. Defender profile
    const defense = defender?.getDefense() ?? EMPTY_PROFILE;
    if (defense.primaryElement !== 'None') log.push(`Defender element: ${defense.primaryElement}`);

    // 4. Per-element damage
    const env = this.config.enableEnvironmentalEffects ? environment : null;
    if (env) log.push(`Environment: ${env.name}`);
    const breakdown: Partial<Record<Element, number>> = {};
    let total = 0;
    for (const part of parts) {
      const dmg = this.elementDamage(part, defense, defender?.affinityOverrides, env, log);
      breakdown[part.element] = (breakdown[part.element] ?? 0) + dmg;
      total += dmg;
    }

    // 5. Post-modifiers
    const { critical, critMultiplier, variance } = post(log);
    if (critical) {
      total *= critMultiplier;
      log.push(`Critical hit: ×${fmt(critMultiplier)}`);
    }
    total *= variance;
    if (this.config.globalDamageMultiplier !== 1) {
      total *= this.config.globalDamageMultiplier;
      log.push(`Global multiplier: ×${fmt(this.config.globalDamageMultiplier)}`);
    }
    const finalDamage = Math.max(0, total);
    log.push(`Final damage: ${fmt(finalDamage)}`);

    // 6. On-hit effects
    const triggeredEffects = this.eligibleEffects(parts, finalDamage);
    triggeredEffects.forEach(e => log.push(`Effect eligible: ${e.effectName} (${e.element})`));

    if (this.config.debug) log.forEach(line => Logger.log(line, 'damage'));

    // 7. Result
    const result: DamageResult = {
      baseDamage,
      finalDamage,
      attackParts: parts,
      isComposite: attack.composite !== undefined,
      critical,
      variance,
      defenseResistances: { ...defense.resistances },
      breakdown,
      triggeredEffects,
      log,
    };
    const compositeName = attack.composite?.name;
    if (compositeName) result.compositeName = compositeName;
    return freeze(result, true);
  }

  private compose(attack: Attack, log: string[]): Attack {
    if (!this.config.enableComposition || !this.database) return attack;
    if (!attack.allowComposition || attack.composite || attack.parts.length <= 1) return attack;

    const composed = applyCompositeMultiplier(this.database.composition.resolveAttack(attack));
    const composite = composed.composite;
    if (!composite) return attack;

    log.push(
      `Composite ${composite.name ?? composite.element}: ${composite.sourceElements.join(' + ')}`
      + ` → ${composite.element} ${fmt(composite.power)}`,
    );
    return composed;
  }

  private elementDamage(
    part: ElementalPower,
    defense: ResistanceProfile,
    overrides: AffinityOverrideTable | undefined,
    env: EnvironmentProfile | null,
    log: string[],
  ): number {
    const { element, power } = part;
    if (isImmune(defense, element)) {
      log.push(`${element}: immune → 0`);
      return 0;
    }

    const base = this.database?.getAffinity(element, defense.primaryElement) ?? NEUTRAL_AFFINITY;
    const affinity = overrides ? overrides.resolve(element, defense.primaryElement, base) : base;
    const resistance = getResistance(defense, element);
    let dmg = power * affinity * (1 - resistance);

    if (env) {
      dmg = dmg * environmentDamageMultiplier(env, element) + environmentPowerBonus(env, element);
      dmg *= 1 - environmentResistance(env, element);
    }
    dmg = Math.max(0, dmg);

    log.push(`${element}: ${fmt(power)} × affinity ${fmt(affinity)} × (1 - ${fmt(resistance)}) = ${fmt(dmg)}`);
    return dmg;
  }

  private rollPostModifiers(attack: Attack, forceCrit: boolean | undefined, log: string[]): PostModifiers {
    let critical = false;
    let critMultiplier = this.config.defaultCritMultiplier;
    if (attack.sourceId !== undefined) {
      const critRate = this.stat(attack.sourceId, 'critRate', 0, log);
      critical = forceCrit ?? this.random.next() < critRate;
      critMultiplier = this.stat(attack.sourceId, 'critDamage', this.config.defaultCritMultiplier, log);
    } else if (forceCrit) {
      log.push('Forced critical ignored: attack has no source');
    }
    const variance = MathUtils.randRange(this.config.varianceMin, this.config.varianceMax, this.random);
    return { critical, critMultiplier, variance };
  }

  private eligibleEffects(parts: readonly ElementalPower[], finalDamage: number): TriggeredEffect[] {
    if (!this.database) return [];
    const attackElements = parts.map(p => p.element);
    const seen = new Set<Element>();
    const out: TriggeredEffect[] = [];

    for (const element of attackElements) {
      if (seen.has(element)) continue;
      seen.add(element);
      const def = this.database.getDefinitionByElement(element);
      if (!def) continue;
      for (const effect of def.effects) {
        if (!shouldTrigger(effect, { element, damage: finalDamage, attackElements })) continue;
        out.push({
          effectId: effect.id,
          effectName: effect.name,
          element,
          power: effect.basePower,
          duration: effect.duration,
          statusEffectIds: [...effect.statusEffectIds],
        });
      }
    }
    return out;
  }

  /** Missing stats fall back to `fallback` and are noted in the log */
  private stat(entityId: string, kind: StatKind, fallback: number, log: string[]): number {
    const value = this.stats.getStat(entityId, kind);
    if (value === undefined) {
      log.push(`${entityId} has no ${kind} stat, using ${fmt(fallback)}`);
      return fallback;
    }
    return value;
  }
}

const fmt = (n: number): string => String(Math.round(n * 100) / 100);
