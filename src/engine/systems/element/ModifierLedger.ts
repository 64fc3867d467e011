// ─────────────────────────────────────────────
//  Modifier Ledger
//  Tracks active modifiers by id and by source, and applies each
//  kind's side effect to the attack builder, resistance aggregator,
//  or affinity override table.
//
//  Lifecycle per id: Inactive → Active → (Expired | Removed)
// ─────────────────────────────────────────────

import { freeze, produce } from 'immer';
import type { Element, ElementalValue } from '@/engine/data/types/Element';
import type { EnvironmentProfile } from '@/engine/data/types/Environment';
import type { ConversionRule, Modifier, ModifierKind } from '@/engine/data/types/Modifier';
import { MODIFIER_KINDS, addStack, defenseResistance, refreshDuration, stackScale } from '@/engine/data/types/Modifier';
import { createProfile, resistanceEntries } from '@/engine/data/types/Resistance';
import type { ResistanceMap } from '@/engine/data/types/Resistance';
import { TypedEventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';
import type { AttackBuilder } from './AttackBuilder';
import type { ResistanceAggregator } from './ResistanceAggregator';
import type { AffinityOverrideTable } from './AffinityOverrideTable';

export interface LedgerEventMap {
  modifierApplied: { modifier: Modifier };
  modifierRemoved: { modifier: Modifier };
  modifierExpired: { modifier: Modifier };
}

/** Tables the ledger writes modifier effects into */
export interface LedgerTargets {
  attacks: AttackBuilder;
  resistances: ResistanceAggregator;
  overrides: AffinityOverrideTable;
}

export const environmentModifierId = (environmentId: string): string => `environment_${environmentId}`;

/** Reason the modifier is malformed, or null when it can be applied */
export function validateModifier(mod: Modifier | null | undefined): string | null {
  if (!mod) return 'modifier is missing';
  if (typeof mod.id !== 'string' || mod.id.trim() === '') return 'modifier has no id';
  if (!MODIFIER_KINDS.includes(mod.kind)) return `modifier ${mod.id} has unknown kind "${String(mod.kind)}"`;
  if (!mod.permanent && !Number.isFinite(mod.remainingDuration)) {
    return `modifier ${mod.id} has an invalid duration`;
  }
  switch (mod.kind) {
    case 'AttackBonus':
    case 'DefenseResistance':
      return Array.isArray(mod.values) ? null : `modifier ${mod.id} has no element values`;
    case 'AffinityOverride':
      return Array.isArray(mod.overrides) ? null : `modifier ${mod.id} has no affinity overrides`;
    case 'ElementalConversion':
      return mod.rule ? null : `modifier ${mod.id} has no conversion rule`;
    case 'CompositeBonus':
      return Number.isFinite(mod.multiplier) ? null : `modifier ${mod.id} has an invalid multiplier`;
  }
}

/**
 * Key the ledger writes a modifier's effects under in the shared tables.
 * Kept apart from ids registered directly, so teardown never touches them.
 */
export const modifierEffectKey = (modifierId: string): string => `modifier:${modifierId}`;

const overrideKey = (modifierId: string, attack: Element, defense: Element): string =>
  `${modifierEffectKey(modifierId)}_${attack}_${defense}`;

export class ModifierLedger {
  readonly events = new TypedEventBus<LedgerEventMap>();

  private readonly active = new Map<string, Modifier>();
  private readonly bySource = new Map<string, string[]>();
  private ver = 0;

  constructor(private readonly targets: LedgerTargets, private readonly ownerId = '') {}

  /** Advances on every apply, removal and expiry */
  get version(): number {
    return this.ver;
  }

  get size(): number {
    return this.active.size;
  }

  // ── Lifecycle ──

  /**
   * Activate a modifier. An active modifier with the same id is torn down
   * first, unless both allow stacking, in which case a stack is added and
   * the duration refreshed. Malformed modifiers are rejected with a warning.
   */
  apply(modifier: Modifier | null | undefined): boolean {
    const problem = validateModifier(modifier);
    if (problem || !modifier) {
      Logger.warn(`Rejected elemental modifier${this.ownerLabel()}: ${problem ?? 'modifier is missing'}`);
      return false;
    }

    const existing = this.active.get(modifier.id);
    if (existing && existing.allowStacking && modifier.allowStacking && existing.kind === modifier.kind) {
      this.detachEffects(existing);
      this.active.delete(existing.id);
      this.untrack(existing);
      const stacked = refreshDuration(addStack(existing));
      this.install(stacked);
      return true;
    }

    if (existing) this.remove(existing.id);
    this.install(structuredClone(modifier));
    return true;
  }

  /** Reverse a modifier's effects. False when the id was not active. */
  remove(id: string): boolean {
    const mod = this.detach(id);
    if (!mod) return false;
    this.events.emit('modifierRemoved', { modifier: mod });
    return true;
  }

  removeBySource(sourceId: string): number {
    const ids = [...(this.bySource.get(sourceId) ?? [])];
    return ids.filter(id => this.remove(id)).length;
  }

  /**
   * Count down every timed modifier. Durations are all updated from one
   * snapshot before anything is removed. Returns the expired modifiers.
   */
  tick(deltaTime: number): Modifier[] {
    const expiredIds: string[] = [];
    for (const [id, mod] of this.active) {
      if (mod.permanent) continue;
      const next = produce(mod, draft => {
        draft.remainingDuration -= deltaTime;
      });
      this.active.set(id, next);
      if (next.remainingDuration <= 0) expiredIds.push(id);
    }

    const expired: Modifier[] = [];
    for (const id of expiredIds) {
      const mod = this.detach(id);
      if (!mod) continue;
      expired.push(mod);
      Logger.log(`Modifier expired: ${mod.displayName ?? mod.id}${this.ownerLabel()}`, 'modifier');
      this.events.emit('modifierExpired', { modifier: mod });
    }
    return expired;
  }

  clear(): void {
    [...this.active.keys()].forEach(id => this.remove(id));
  }

  clearByKind(kind: ModifierKind): number {
    const ids = [...this.active.values()].filter(m => m.kind === kind).map(m => m.id);
    return ids.filter(id => this.remove(id)).length;
  }

  // ── Queries ──

  has(id: string): boolean {
    return this.active.has(id);
  }

  get(id: string): Modifier | undefined {
    return this.active.get(id);
  }

  getActiveModifiers(): Modifier[] {
    return [...this.active.values()];
  }

  getModifiersBySource(sourceId: string): Modifier[] {
    return (this.bySource.get(sourceId) ?? [])
      .map(id => this.active.get(id))
      .filter((m): m is Modifier => m !== undefined);
  }

  /** Conversion rules the attack builder should apply, in activation order */
  conversionRules(): ConversionRule[] {
    const rules: ConversionRule[] = [];
    for (const mod of this.active.values()) {
      if (mod.kind === 'ElementalConversion') rules.push(mod.rule);
    }
    return rules;
  }

  /** Skill-bonus buckets written by active AttackBonus modifiers */
  attackBonusIds(): string[] {
    return [...this.active.values()].filter(m => m.kind === 'AttackBonus').map(m => modifierEffectKey(m.id));
  }

  /** Product of every active composite bonus, stacks included */
  compositeBonusMultiplier(): number {
    let product = 1;
    for (const mod of this.active.values()) {
      if (mod.kind === 'CompositeBonus') product *= mod.multiplier ** stackScale(mod);
    }
    return product;
  }

  // ── Integration helpers ──

  /** Equipment modifiers stay until the item is unequipped */
  registerEquipmentModifiers(equipmentId: string, modifiers: readonly Modifier[]): void {
    for (const mod of modifiers) {
      this.apply({ ...mod, sourceId: equipmentId, permanent: true });
    }
  }

  unregisterEquipmentModifiers(equipmentId: string): number {
    return this.removeBySource(equipmentId);
  }

  registerBuffModifiers(buffId: string, modifiers: readonly Modifier[], duration: number): void {
    for (const mod of modifiers) {
      this.apply({
        ...mod,
        sourceId: buffId,
        permanent: false,
        remainingDuration: duration,
        originalDuration: duration,
      });
    }
  }

  /** Omit `duration` for a permanent skill effect */
  registerSkillModifiers(skillId: string, modifiers: readonly Modifier[], duration?: number): void {
    for (const mod of modifiers) {
      this.apply({
        ...mod,
        sourceId: skillId,
        permanent: duration === undefined,
        remainingDuration: duration ?? 0,
        originalDuration: duration ?? 0,
      });
    }
  }

  /** Environment resistances become one permanent defense modifier sourced by the environment */
  applyEnvironment(environment: EnvironmentProfile): void {
    const values: ElementalValue[] = resistanceEntries(environment.resistances)
      .map(([element, value]) => ({ element, flat: value, percentage: 0 }));
    this.apply(defenseResistance(environmentModifierId(environment.id), values, {
      sourceId: environment.id,
      displayName: environment.name,
    }));
  }

  removeEnvironment(environmentId: string): number {
    return this.removeBySource(environmentId);
  }

  // ── Internals ──

  private install(modifier: Modifier): void {
    const mod = freeze(modifier, true);
    this.attachEffects(mod);
    this.active.set(mod.id, mod);
    if (mod.sourceId) {
      const ids = this.bySource.get(mod.sourceId) ?? [];
      ids.push(mod.id);
      this.bySource.set(mod.sourceId, ids);
    }
    this.ver++;
    this.events.emit('modifierApplied', { modifier: mod });
  }

  /** Teardown + untrack without emitting; returns the detached modifier */
  private detach(id: string): Modifier | undefined {
    const mod = this.active.get(id);
    if (!mod) return undefined;
    this.detachEffects(mod);
    this.active.delete(id);
    this.untrack(mod);
    this.ver++;
    return mod;
  }

  private untrack(mod: Modifier): void {
    if (!mod.sourceId) return;
    const ids = this.bySource.get(mod.sourceId);
    if (!ids) return;
    const remaining = ids.filter(id => id !== mod.id);
    if (remaining.length === 0) this.bySource.delete(mod.sourceId);
    else this.bySource.set(mod.sourceId, remaining);
  }

  private attachEffects(mod: Modifier): void {
    const duration = mod.permanent ? -1 : mod.remainingDuration;
    const scale = stackScale(mod);

    switch (mod.kind) {
      case 'AttackBonus':
        for (const v of mod.values) {
          this.targets.attacks.registerSkillBonus(modifierEffectKey(mod.id), v.element, v.flat * scale, v.percentage * scale, duration);
        }
        break;
      case 'DefenseResistance': {
        const resistances: ResistanceMap = {};
        for (const v of mod.values) resistances[v.element] = (resistances[v.element] ?? 0) + v.flat * scale;
        this.targets.resistances.registerTemporary(
          modifierEffectKey(mod.id),
          createProfile({ resistances }),
          mod.permanent ? undefined : mod.remainingDuration,
        );
        break;
      }
      case 'AffinityOverride':
        for (const o of mod.overrides) {
          this.targets.overrides.add(overrideKey(mod.id, o.attack, o.defense), o.attack, o.defense, o.value, duration, mod.sourceId);
        }
        break;
      case 'ElementalConversion':
        Logger.log(`Elemental conversion active: ${mod.rule.from} → ${mod.rule.to} (${mod.rule.percentage}%)`, 'modifier');
        break;
      case 'CompositeBonus':
        Logger.log(`Composite bonus active: ×${mod.multiplier}`, 'modifier');
        break;
    }
  }

  private detachEffects(mod: Modifier): void {
    switch (mod.kind) {
      case 'AttackBonus':
        this.targets.attacks.unregisterSkillBonuses(modifierEffectKey(mod.id));
        break;
      case 'DefenseResistance':
        this.targets.resistances.removeTemporary(modifierEffectKey(mod.id));
        break;
      case 'AffinityOverride':
        for (const o of mod.overrides) {
          this.targets.overrides.remove(overrideKey(mod.id, o.attack, o.defense));
        }
        break;
      case 'ElementalConversion':
      case 'CompositeBonus':
        // Declarative kinds: nothing was written outside the ledger
        break;
    }
  }

  private ownerLabel(): string {
    return this.ownerId ? ` [${this.ownerId}]` : '';
  }
}
