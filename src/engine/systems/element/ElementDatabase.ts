// ─────────────────────────────────────────────
//  Element Database
//  Read-mostly registry of already-parsed element data: definitions,
//  the affinity table, composite rules and environment profiles.
//  Authoring and loading live outside the engine.
// ─────────────────────────────────────────────

import type { Element, ElementDefinition, ElementFlag } from '@/engine/data/types/Element';
import { hasFlag } from '@/engine/data/types/Element';
import type { EnvironmentProfile } from '@/engine/data/types/Environment';
import { AffinityTable } from './AffinityTable';
import type { CompositeRule } from './CompositionResolver';
import { CompositionResolver } from './CompositionResolver';

export interface ElementDatabaseInit {
  definitions?: readonly ElementDefinition[];
  affinities?: AffinityTable;
  compositeRules?: readonly CompositeRule[];
  environments?: readonly EnvironmentProfile[];
}

export class ElementDatabase {
  readonly affinities: AffinityTable;
  readonly composition: CompositionResolver;

  private readonly definitions = new Map<string, ElementDefinition>();
  private readonly environments = new Map<string, EnvironmentProfile>();

  constructor(init: ElementDatabaseInit = {}) {
    this.affinities = init.affinities ?? new AffinityTable();
    this.composition = new CompositionResolver(init.compositeRules ?? []);
    init.definitions?.forEach(d => this.addDefinition(d));
    init.environments?.forEach(e => this.addEnvironment(e));
  }

  /** Database seeded with the built-in affinity relationships */
  static createDefault(init: Omit<ElementDatabaseInit, 'affinities'> = {}): ElementDatabase {
    return new ElementDatabase({ ...init, affinities: AffinityTable.createDefault() });
  }

  // ── Definitions ──

  /** Replaces any definition with the same id */
  addDefinition(def: ElementDefinition): void {
    this.definitions.set(def.id, def);
  }

  removeDefinition(id: string): boolean {
    return this.definitions.delete(id);
  }

  getDefinition(id: string): ElementDefinition | undefined {
    return this.definitions.get(id);
  }

  /** First definition registered for the element */
  getDefinitionByElement(element: Element): ElementDefinition | undefined {
    for (const def of this.definitions.values()) {
      if (def.element === element) return def;
    }
    return undefined;
  }

  getDefinitionsByFlag(flag: ElementFlag): ElementDefinition[] {
    return [...this.definitions.values()].filter(d => hasFlag(d, flag));
  }

  allDefinitions(): ElementDefinition[] {
    return [...this.definitions.values()];
  }

  // ── Affinities & rules ──

  getAffinity(attack: Element, defense: Element): number {
    return this.affinities.get(attack, defense);
  }

  addCompositeRule(rule: CompositeRule): void {
    this.composition.addRule(rule);
  }

  removeCompositeRule(id: string): boolean {
    return this.composition.removeRule(id);
  }

  // ── Environments ──

  addEnvironment(profile: EnvironmentProfile): void {
    this.environments.set(profile.id, profile);
  }

  removeEnvironment(id: string): boolean {
    return this.environments.delete(id);
  }

  getEnvironment(id: string): EnvironmentProfile | undefined {
    return this.environments.get(id);
  }

  environmentIds(): string[] {
    return [...this.environments.keys()];
  }
}
