// ─────────────────────────────────────────────
//  Elemental Combatant
//  Per-entity element component. Owns the entity's modifier ledger,
//  resistance sources, attack bonuses and affinity overrides; nothing
//  here is shared between entities.
// ─────────────────────────────────────────────

import type { Element } from '@/engine/data/types/Element';
import type { Attack } from '@/engine/data/types/Attack';
import type { Modifier } from '@/engine/data/types/Modifier';
import type { ResistanceMap, ResistanceProfile } from '@/engine/data/types/Resistance';
import { clampResistance, createProfile, resistanceEntries } from '@/engine/data/types/Resistance';
import type { EnvironmentProfile } from '@/engine/data/types/Environment';
import type { DamageResult } from '@/engine/data/types/DamageResult';
import type { StatAccessor } from '@/engine/data/types/Combat';
import { TypedEventBus } from '@/engine/utils/EventBus';
import { AffinityOverrideTable } from './AffinityOverrideTable';
import { AttackBuilder } from './AttackBuilder';
import { ModifierLedger } from './ModifierLedger';
import { ResistanceAggregator } from './ResistanceAggregator';
import type { Defender, ResolutionPipeline, ResolveOptions } from './ResolutionPipeline';

export interface CombatantInit {
  id: string;
  primaryElement?: Element;
  secondaryElement?: Element;
  resistances?: ResistanceMap;
  immunities?: Element[];
  weaknesses?: Element[];
}

export interface CombatantEventMap {
  attackCreated: { attack: Attack };
  damageTaken: { result: DamageResult };
  /** An element the combatant is immune to was part of a hit */
  immunityTriggered: { element: Element };
}

interface DefenseCache {
  defense: ResistanceProfile;
  ledgerVersion: number;
  aggregatorRevision: number;
  baseRevision: number;
}

export class ElementalCombatant implements Defender {
  readonly id: string;
  readonly resistances = new ResistanceAggregator();
  readonly affinityOverrides = new AffinityOverrideTable();
  readonly attacks: AttackBuilder;
  readonly ledger: ModifierLedger;
  readonly events = new TypedEventBus<CombatantEventMap>();

  private primary: Element;
  private secondary: Element;
  private baseResistances: ResistanceMap = {};
  private immunities: Element[];
  private weaknesses: Element[];
  private baseRevision = 0;
  private cache: DefenseCache | null = null;

  constructor(init: CombatantInit, private readonly stats: StatAccessor) {
    this.id = init.id;
    this.primary = init.primaryElement ?? 'None';
    this.secondary = init.secondaryElement ?? 'None';
    for (const [element, value] of resistanceEntries(init.resistances ?? {})) {
      this.baseResistances[element] = clampResistance(value);
    }
    this.immunities = [...new Set(init.immunities ?? [])];
    this.weaknesses = [...new Set(init.weaknesses ?? [])];

    this.attacks = new AttackBuilder(stats);
    this.ledger = new ModifierLedger({
      attacks: this.attacks,
      resistances: this.resistances,
      overrides: this.affinityOverrides,
    }, this.id);
  }

  get primaryElement(): Element {
    return this.primary;
  }

  get secondaryElement(): Element {
    return this.secondary;
  }

  setPrimaryElement(element: Element): void {
    this.primary = element;
    this.baseRevision++;
  }

  setSecondaryElement(element: Element): void {
    this.secondary = element;
  }

  /** Both elements, skipping None */
  elements(): Element[] {
    return [this.primary, this.secondary].filter(e => e !== 'None');
  }

  hasElement(element: Element): boolean {
    return element !== 'None' && (this.primary === element || this.secondary === element);
  }

  // ── Base defense data ──

  /** Sets (not adds to) the base resistance for the element */
  addResistance(element: Element, value: number): void {
    this.baseResistances[element] = clampResistance(value);
    this.baseRevision++;
  }

  removeResistance(element: Element): void {
    if (this.baseResistances[element] === undefined) return;
    delete this.baseResistances[element];
    this.baseRevision++;
  }

  addImmunity(element: Element): void {
    if (this.immunities.includes(element)) return;
    this.immunities.push(element);
    this.baseRevision++;
  }

  removeImmunity(element: Element): void {
    if (!this.immunities.includes(element)) return;
    this.immunities = this.immunities.filter(e => e !== element);
    this.baseRevision++;
  }

  addWeakness(element: Element): void {
    if (this.weaknesses.includes(element)) return;
    this.weaknesses.push(element);
    this.baseRevision++;
  }

  removeWeakness(element: Element): void {
    if (!this.weaknesses.includes(element)) return;
    this.weaknesses = this.weaknesses.filter(e => e !== element);
    this.baseRevision++;
  }

  // ── Defense ──

  /**
   * Base resistances plus every aggregated source, clamped to [-1, 1].
   * Recomputed only when base data, the ledger or the aggregator changed
   * since the last read.
   */
  getDefense(): ResistanceProfile {
    const cache = this.cache;
    if (
      cache
      && cache.ledgerVersion === this.ledger.version
      && cache.aggregatorRevision === this.resistances.revision
      && cache.baseRevision === this.baseRevision
    ) {
      return cache.defense;
    }

    const defense = this.computeDefense();
    this.cache = {
      defense,
      ledgerVersion: this.ledger.version,
      aggregatorRevision: this.resistances.revision,
      baseRevision: this.baseRevision,
    };
    return defense;
  }

  invalidateDefense(): void {
    this.cache = null;
  }

  private computeDefense(): ResistanceProfile {
    const total = this.resistances.total();
    const resistances: ResistanceMap = { ...this.baseResistances };
    for (const [element, value] of resistanceEntries(total.resistances)) {
      resistances[element] = (resistances[element] ?? 0) + value;
    }
    return createProfile({
      resistances,
      primaryElement: this.primary !== 'None' ? this.primary : total.primaryElement,
      immunities: [...this.immunities, ...total.immunities],
      weaknesses: [...this.weaknesses, ...total.weaknesses],
    });
  }

  // ── Offense ──

  /** Builds from registered bonuses, then the ledger's conversions and composite bonus */
  createAttack(weaponId?: string, skillId?: string): Attack {
    const attack = this.attacks.build(this.id, weaponId, skillId, {
      conversions: this.ledger.conversionRules(),
      compositeBonus: this.ledger.compositeBonusMultiplier(),
      extraSkillIds: this.ledger.attackBonusIds(),
    });
    this.events.emit('attackCreated', { attack });
    return attack;
  }

  // ── Damage ──

  /** Resolve, then write the damage through the stat accessor */
  takeDamage(attack: Attack, pipeline: ResolutionPipeline, environment?: EnvironmentProfile | null): DamageResult {
    const opts: ResolveOptions = { environment: environment ?? null };
    const result = pipeline.resolve(attack, this, opts);
    this.receive(result);
    return result;
  }

  /** Apply an already-resolved hit. Returns the immune elements it carried. */
  receive(result: DamageResult): Element[] {
    this.stats.applyDamage(this.id, result.finalDamage);
    const defense = this.getDefense();
    const blocked = [...new Set(result.attackParts.map(p => p.element))]
      .filter(e => defense.immunities.includes(e));
    blocked.forEach(element => this.events.emit('immunityTriggered', { element }));
    this.events.emit('damageTaken', { result });
    return blocked;
  }

  // ── Modifiers ──

  applyModifier(modifier: Modifier): boolean {
    return this.ledger.apply(modifier);
  }

  removeModifier(id: string): boolean {
    return this.ledger.remove(id);
  }

  /**
   * Advance every timed table. The ledger goes first so each modifier's
   * own teardown removes what it wrote before the tables expire it.
   */
  tick(deltaTime: number): Modifier[] {
    const expired = this.ledger.tick(deltaTime);
    this.attacks.tick(deltaTime);
    this.resistances.tick(deltaTime);
    this.affinityOverrides.tick(deltaTime);
    return expired;
  }
}
