// ─────────────────────────────────────────────
//  Resistance Aggregator
//  Keeps every resistance source independently addressable and
//  merges them with diminishing returns on demand.
// ─────────────────────────────────────────────

import { freeze } from 'immer';
import type { Element } from '@/engine/data/types/Element';
import type { ResistanceMap, ResistanceProfile } from '@/engine/data/types/Resistance';
import { createProfile, resistanceEntries } from '@/engine/data/types/Resistance';

export type ResistanceSourceKind = 'equipment' | 'passive' | 'temporary';

const SOURCE_ORDER: readonly ResistanceSourceKind[] = ['equipment', 'passive', 'temporary'];

/**
 * Saturating stack formula: s/(s+1) for resistance, s/(1-s) for weakness.
 * Any stack stays inside (-1, 1).
 */
export function diminishingReturns(sum: number): number {
  if (sum > 0) return sum / (sum + 1);
  if (sum < 0) return sum / (1 - sum);
  return 0;
}

/**
 * Merge profiles into one effective profile.
 * Immunity and weakness sets are unioned across sources.
 */
export function aggregateProfiles(sources: readonly ResistanceProfile[]): ResistanceProfile {
  const sums = new Map<Element, number>();
  const immunities = new Set<Element>();
  const weaknesses = new Set<Element>();

  for (const profile of sources) {
    for (const [element, value] of resistanceEntries(profile.resistances)) {
      if (value === 0) continue;
      sums.set(element, (sums.get(element) ?? 0) + value);
    }
    profile.immunities.forEach(e => immunities.add(e));
    profile.weaknesses.forEach(e => weaknesses.add(e));
  }

  const resistances: ResistanceMap = {};
  let primaryElement: Element = 'None';
  let highest = 0;
  for (const [element, sum] of sums) {
    const effective = diminishingReturns(sum);
    resistances[element] = effective;
    if (effective > highest) {
      highest = effective;
      primaryElement = element;
    }
  }

  return freeze({
    resistances,
    primaryElement,
    immunities: [...immunities],
    weaknesses: [...weaknesses],
  }, true);
}

export class ResistanceAggregator {
  private readonly tables: Record<ResistanceSourceKind, Map<string, ResistanceProfile>> = {
    equipment: new Map(),
    passive: new Map(),
    temporary: new Map(),
  };
  /** Remaining seconds for timed temporary sources */
  private readonly timers = new Map<string, number>();
  private rev = 0;

  /** Bumped on every change; used by callers to invalidate cached snapshots */
  get revision(): number {
    return this.rev;
  }

  /** Stores a frozen copy; later changes to `profile` are not seen */
  register(kind: ResistanceSourceKind, id: string, profile: ResistanceProfile): void {
    this.tables[kind].set(id, createProfile(profile));
    if (kind === 'temporary') this.timers.delete(id);
    this.rev++;
  }

  registerEquipment(id: string, profile: ResistanceProfile): void {
    this.register('equipment', id, profile);
  }

  registerPassive(id: string, profile: ResistanceProfile): void {
    this.register('passive', id, profile);
  }

  /** Omit `duration` to keep the source until removed */
  registerTemporary(id: string, profile: ResistanceProfile, duration?: number): void {
    this.register('temporary', id, profile);
    if (duration !== undefined) this.timers.set(id, duration);
  }

  remove(kind: ResistanceSourceKind, id: string): boolean {
    const removed = this.tables[kind].delete(id);
    if (kind === 'temporary') this.timers.delete(id);
    if (removed) this.rev++;
    return removed;
  }

  removeEquipment(id: string): boolean {
    return this.remove('equipment', id);
  }

  removePassive(id: string): boolean {
    return this.remove('passive', id);
  }

  removeTemporary(id: string): boolean {
    return this.remove('temporary', id);
  }

  clearTemporary(): void {
    if (this.tables.temporary.size === 0) return;
    this.tables.temporary.clear();
    this.timers.clear();
    this.rev++;
  }

  get(kind: ResistanceSourceKind, id: string): ResistanceProfile | undefined {
    return this.tables[kind].get(id);
  }

  ids(kind: ResistanceSourceKind): string[] {
    return [...this.tables[kind].keys()];
  }

  /** Every registered profile: equipment, then passive, then temporary */
  sources(): ResistanceProfile[] {
    return SOURCE_ORDER.flatMap(kind => [...this.tables[kind].values()]);
  }

  total(): ResistanceProfile {
    return aggregateProfiles(this.sources());
  }

  /** Count down timed temporary sources; returns the ids that expired */
  tick(deltaTime: number): string[] {
    const expired: string[] = [];
    for (const [id, remaining] of this.timers) {
      const next = remaining - deltaTime;
      if (next <= 0) expired.push(id);
      else this.timers.set(id, next);
    }
    expired.forEach(id => this.removeTemporary(id));
    return expired;
  }
}
