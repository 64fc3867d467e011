// ─────────────────────────────────────────────
//  Affinity Override Table
//  Time-bounded per-pair replacements that win over the static table.
// ─────────────────────────────────────────────

import type { Element } from '@/engine/data/types/Element';

export interface AffinityOverride {
  attack: Element;
  defense: Element;
  value: number;
  /** Seconds left; ignored when permanent */
  remaining: number;
  permanent: boolean;
  sourceId: string;
}

export class AffinityOverrideTable {
  private overrides = new Map<string, AffinityOverride>();

  /** A negative or omitted duration makes the override permanent */
  add(
    id: string,
    attack: Element,
    defense: Element,
    value: number,
    duration = -1,
    sourceId = '',
  ): void {
    this.overrides.set(id, {
      attack,
      defense,
      value,
      remaining: duration,
      permanent: duration < 0,
      sourceId,
    });
  }

  remove(id: string): boolean {
    return this.overrides.delete(id);
  }

  removeBySource(sourceId: string): number {
    const ids = [...this.overrides].filter(([, o]) => o.sourceId === sourceId).map(([id]) => id);
    ids.forEach(id => this.overrides.delete(id));
    return ids.length;
  }

  /** First matching override in insertion order, else `fallback` */
  resolve(attack: Element, defense: Element, fallback: number): number {
    for (const o of this.overrides.values()) {
      if (o.attack === attack && o.defense === defense) return o.value;
    }
    return fallback;
  }

  get(id: string): AffinityOverride | undefined {
    const o = this.overrides.get(id);
    return o ? { ...o } : undefined;
  }

  /** Returns the ids that expired this tick */
  tick(deltaTime: number): string[] {
    const expired: string[] = [];
    for (const [id, o] of this.overrides) {
      if (o.permanent) continue;
      const remaining = o.remaining - deltaTime;
      if (remaining <= 0) expired.push(id);
      else this.overrides.set(id, { ...o, remaining });
    }
    expired.forEach(id => this.overrides.delete(id));
    return expired;
  }

  list(): Array<{ id: string } & AffinityOverride> {
    return [...this.overrides].map(([id, o]) => ({ id, ...o }));
  }

  clear(): void {
    this.overrides.clear();
  }

  get size(): number {
    return this.overrides.size;
  }
}
