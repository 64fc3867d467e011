// ─────────────────────────────────────────────
//  Attack Builder
//  Assembles an outgoing attack from registered weapon and skill
//  power bonuses.
// ─────────────────────────────────────────────

import type { Element, ElementalPower } from '@/engine/data/types/Element';
import type { Attack } from '@/engine/data/types/Attack';
import { createAttack } from '@/engine/data/types/Attack';
import type { ConversionRule } from '@/engine/data/types/Modifier';
import type { StatAccessor, StatKind } from '@/engine/data/types/Combat';
import { applyConversions } from './ElementalConversion';

export interface ElementalBonus {
  element: Element;
  flat: number;
  /** Fraction of the scaling stat */
  percentage: number;
  temporary: boolean;
  /** Seconds left for temporary bonuses */
  remaining: number;
  sourceId: string;
}

export interface BuildOptions {
  conversions?: readonly ConversionRule[];
  compositeBonus?: number;
  allowComposition?: boolean;
  /** Further skill-bonus buckets folded in alongside `skillId` (modifier-granted bonuses) */
  extraSkillIds?: readonly string[];
}

type BonusTable = Map<string, ElementalBonus[]>;

export class AttackBuilder {
  private readonly weaponBonuses: BonusTable = new Map();
  private readonly skillBonuses: BonusTable = new Map();

  constructor(private readonly stats: StatAccessor) {}

  /** A positive `duration` makes the bonus temporary */
  registerWeaponBonus(weaponId: string, element: Element, flat: number, percentage = 0, duration = -1): void {
    addBonus(this.weaponBonuses, weaponId, element, flat, percentage, duration);
  }

  /** A positive `duration` makes the bonus temporary */
  registerSkillBonus(skillId: string, element: Element, flat: number, percentage = 0, duration = -1): void {
    addBonus(this.skillBonuses, skillId, element, flat, percentage, duration);
  }

  unregisterWeaponBonuses(weaponId: string): boolean {
    return this.weaponBonuses.delete(weaponId);
  }

  unregisterSkillBonuses(skillId: string): boolean {
    return this.skillBonuses.delete(skillId);
  }

  getWeaponBonuses(weaponId: string): ElementalBonus[] {
    return (this.weaponBonuses.get(weaponId) ?? []).map(b => ({ ...b }));
  }

  getSkillBonuses(skillId: string): ElementalBonus[] {
    return (this.skillBonuses.get(skillId) ?? []).map(b => ({ ...b }));
  }

  weaponIds(): string[] {
    return [...this.weaponBonuses.keys()];
  }

  skillIds(): string[] {
    return [...this.skillBonuses.keys()];
  }

  /**
   * Weapon bonuses scale off offense, skill bonuses off magic power.
   * Contributions of zero or less are dropped; with none left the attack
   * is a single (None, offense) pair.
   */
  build(attackerId: string, weaponId?: string, skillId?: string, opts: BuildOptions = {}): Attack {
    const parts: ElementalPower[] = [];
    if (weaponId) parts.push(...this.contributions(this.weaponBonuses.get(weaponId), attackerId, 'offense'));
    if (skillId) parts.push(...this.contributions(this.skillBonuses.get(skillId), attackerId, 'magicPower'));
    for (const id of opts.extraSkillIds ?? []) {
      if (id === skillId) continue;
      parts.push(...this.contributions(this.skillBonuses.get(id), attackerId, 'magicPower'));
    }

    if (parts.length === 0) {
      parts.push({ element: 'None', power: this.stat(attackerId, 'offense') });
    }

    const attack = createAttack(parts, {
      sourceId: attackerId,
      allowComposition: opts.allowComposition ?? true,
      compositeBonus: opts.compositeBonus ?? 1,
    });
    return opts.conversions?.length ? applyConversions(attack, opts.conversions) : attack;
  }

  /** Count down temporary bonuses; each bucket expires independently */
  tick(deltaTime: number): void {
    tickTable(this.weaponBonuses, deltaTime);
    tickTable(this.skillBonuses, deltaTime);
  }

  clearTemporary(): void {
    for (const table of [this.weaponBonuses, this.skillBonuses]) {
      for (const [id, bonuses] of table) {
        const kept = bonuses.filter(b => !b.temporary);
        if (kept.length === 0) table.delete(id);
        else table.set(id, kept);
      }
    }
  }

  private contributions(
    bonuses: ElementalBonus[] | undefined,
    attackerId: string,
    scaling: StatKind,
  ): ElementalPower[] {
    if (!bonuses) return [];
    const base = this.stat(attackerId, scaling);
    return bonuses
      .map(b => ({ element: b.element, power: b.flat + base * b.percentage }))
      .filter(p => p.power > 0);
  }

  private stat(attackerId: string, kind: StatKind): number {
    return this.stats.getStat(attackerId, kind) ?? 0;
  }
}

function addBonus(
  table: BonusTable,
  id: string,
  element: Element,
  flat: number,
  percentage: number,
  duration: number,
): void {
  const bonuses = table.get(id) ?? [];
  bonuses.push({
    element,
    flat,
    percentage,
    temporary: duration > 0,
    remaining: duration,
    sourceId: id,
  });
  table.set(id, bonuses);
}

function tickTable(table: BonusTable, deltaTime: number): void {
  for (const [id, bonuses] of table) {
    const kept: ElementalBonus[] = [];
    for (const b of bonuses) {
      if (!b.temporary) {
        kept.push(b);
        continue;
      }
      const remaining = b.remaining - deltaTime;
      if (remaining > 0) kept.push({ ...b, remaining });
    }
    if (kept.length === 0) table.delete(id);
    else table.set(id, kept);
  }
}
