// ─────────────────────────────────────────────
//  Status Effect Bridge
//  Maps elements to the host's status-effect ids and forwards
//  application requests. Application itself belongs to the host.
// ─────────────────────────────────────────────

import type { Element } from '@/engine/data/types/Element';
import { elementEntries } from '@/engine/data/types/Element';
import type { StatusEffectApplicator } from '@/engine/data/types/Combat';
import type { TriggeredEffect } from '@/engine/data/types/DamageResult';
import { DEFAULT_STATUS_EFFECTS } from '@/engine/data/defaults/DefaultStatusEffects';

export interface AppliedStatus {
  statusEffectId: string;
  element: Element;
  targetId: string;
}

export class StatusEffectBridge {
  private readonly mapping = new Map<Element, string[]>();

  constructor(
    private readonly applicator: StatusEffectApplicator,
    mapping: Partial<Record<Element, readonly string[]>> = DEFAULT_STATUS_EFFECTS,
  ) {
    for (const [element, ids] of elementEntries(mapping)) {
      this.mapping.set(element, [...ids]);
    }
  }

  getStatusEffects(element: Element): string[] {
    return [...(this.mapping.get(element) ?? [])];
  }

  /** Element whose mapping contains the status effect */
  getElementFor(statusEffectId: string): Element | undefined {
    for (const [element, ids] of this.mapping) {
      if (ids.includes(statusEffectId)) return element;
    }
    return undefined;
  }

  setStatusEffects(element: Element, statusEffectIds: readonly string[]): void {
    if (statusEffectIds.length === 0) this.mapping.delete(element);
    else this.mapping.set(element, [...statusEffectIds]);
  }

  /** Offer every mapped status effect of `element`; returns those the host applied */
  applyFor(element: Element, targetId: string): AppliedStatus[] {
    return this.offer(this.mapping.get(element) ?? [], element, targetId);
  }

  /** Offer the status effects named by triggered on-hit effects */
  applyTriggered(effects: readonly TriggeredEffect[], targetId: string): AppliedStatus[] {
    return effects.flatMap(e => this.offer(e.statusEffectIds, e.element, targetId));
  }

  applyStatus(statusEffectId: string, element: Element, targetId: string): boolean {
    return this.applicator.tryApply(statusEffectId, element, targetId);
  }

  /** Removal is optional on the host side; returns how many removals were forwarded */
  removeFor(element: Element, targetId: string): number {
    const remove = this.applicator.remove?.bind(this.applicator);
    if (!remove) return 0;
    const ids = this.mapping.get(element) ?? [];
    ids.forEach(id => remove(id, targetId));
    return ids.length;
  }

  private offer(statusEffectIds: readonly string[], element: Element, targetId: string): AppliedStatus[] {
    return statusEffectIds
      .filter(id => this.applicator.tryApply(id, element, targetId))
      .map(statusEffectId => ({ statusEffectId, element, targetId }));
  }
}
