// ─────────────────────────────────────────────
//  Element Session
//  One per simulated world. Holds the database, the pipeline, the
//  registered combatants and the current environment, and is passed
//  to whatever needs them.
// ─────────────────────────────────────────────

import type { Element } from '@/engine/data/types/Element';
import type { Attack } from '@/engine/data/types/Attack';
import { copyAttack, singleElementAttack } from '@/engine/data/types/Attack';
import type { Modifier } from '@/engine/data/types/Modifier';
import type { EnvironmentProfile } from '@/engine/data/types/Environment';
import type { DamageResult } from '@/engine/data/types/DamageResult';
import type { RandomSource, StatAccessor, StatusEffectApplicator } from '@/engine/data/types/Combat';
import type { ElementConfig } from '@/config';
import { MathUtils } from '@/engine/utils/MathUtils';
import { TypedEventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';
import { ElementDatabase } from './ElementDatabase';
import { ElementalCombatant } from './ElementalCombatant';
import type { CombatantInit } from './ElementalCombatant';
import { ResolutionPipeline } from './ResolutionPipeline';
import { StatusEffectBridge } from './StatusEffectBridge';
import type { AppliedStatus } from './StatusEffectBridge';

export interface SessionOptions {
  stats: StatAccessor;
  database?: ElementDatabase;
  /** Without one, triggered and ambient status effects are reported but never offered */
  statusEffects?: StatusEffectApplicator;
  random?: RandomSource;
  config?: Partial<ElementConfig>;
}

export interface SessionEventMap {
  combatantRegistered: { combatant: ElementalCombatant };
  combatantUnregistered: { combatant: ElementalCombatant };
  environmentChanged: { environment: EnvironmentProfile | null };
  damageResolved: { targetId: string; result: DamageResult };
}

export interface StrikeOutcome {
  targetId: string;
  result: DamageResult;
  /** Status effects the host accepted, triggered and ambient */
  applied: AppliedStatus[];
  /** Immune elements the hit carried */
  immune: Element[];
}

export type TargetRef = string | ElementalCombatant;

interface PendingStrike {
  attack: Attack;
  targetId: string;
  priority: number;
  callback: (outcome: StrikeOutcome | null) => void;
}

export class ElementSession {
  readonly database: ElementDatabase;
  readonly pipeline: ResolutionPipeline;
  readonly bridge: StatusEffectBridge | null;
  readonly events = new TypedEventBus<SessionEventMap>();

  private readonly stats: StatAccessor;
  private readonly random: RandomSource;
  private readonly combatants = new Map<string, ElementalCombatant>();
  private environment: EnvironmentProfile | null = null;
  private pending: PendingStrike[] = [];

  constructor(opts: SessionOptions) {
    this.stats = opts.stats;
    this.random = opts.random ?? MathUtils.defaultRandom;
    this.database = opts.database ?? ElementDatabase.createDefault();
    this.pipeline = new ResolutionPipeline({
      stats: opts.stats,
      database: this.database,
      random: this.random,
      ...(opts.config ? { config: opts.config } : {}),
    });
    this.bridge = opts.statusEffects ? new StatusEffectBridge(opts.statusEffects) : null;
  }

  get config(): ElementConfig {
    return this.pipeline.config;
  }

  get currentEnvironment(): EnvironmentProfile | null {
    return this.environment;
  }

  get size(): number {
    return this.combatants.size;
  }

  // ── Combatants ──

  /** Create a combatant wired to this session's stat accessor and register it */
  createCombatant(init: CombatantInit): ElementalCombatant {
    const combatant = new ElementalCombatant(init, this.stats);
    this.register(combatant);
    return combatant;
  }

  /** Registering an id twice replaces the earlier combatant */
  register(combatant: ElementalCombatant): void {
    const previous = this.combatants.get(combatant.id);
    if (previous && previous !== combatant) this.unregister(previous.id);

    this.combatants.set(combatant.id, combatant);
    if (this.environment && this.config.enableEnvironmentalEffects) {
      combatant.ledger.applyEnvironment(this.environment);
    }
    this.events.emit('combatantRegistered', { combatant });
  }

  unregister(id: string): boolean {
    const combatant = this.combatants.get(id);
    if (!combatant) return false;
    if (this.environment) combatant.ledger.removeEnvironment(this.environment.id);
    this.combatants.delete(id);
    this.pending = this.pending.filter(p => p.targetId !== id);
    this.events.emit('combatantUnregistered', { combatant });
    return true;
  }

  getCombatant(id: string): ElementalCombatant | undefined {
    return this.combatants.get(id);
  }

  getAll(): ElementalCombatant[] {
    return [...this.combatants.values()];
  }

  /** Combatants whose primary or secondary element is `element` */
  getByElement(element: Element): ElementalCombatant[] {
    return this.getAll().filter(c => c.hasElement(element));
  }

  // ── Environment ──

  /**
   * Switch the battlefield environment. The old environment's modifiers
   * are removed from every combatant before the new one's are applied.
   * Unknown ids are ignored with a warning.
   */
  setEnvironment(environment: string | EnvironmentProfile | null): boolean {
    const next = typeof environment === 'string'
      ? this.database.getEnvironment(environment) ?? null
      : environment;
    if (typeof environment === 'string' && !next) {
      Logger.warn(`Environment profile not found: ${environment}`);
      return false;
    }

    const previous = this.environment;
    if (previous) {
      this.combatants.forEach(c => c.ledger.removeEnvironment(previous.id));
    }
    this.environment = next;
    if (next && this.config.enableEnvironmentalEffects) {
      this.combatants.forEach(c => c.ledger.applyEnvironment(next));
    }

    Logger.log(`Environment changed to: ${next?.name ?? 'None'}`, 'environment');
    this.events.emit('environmentChanged', { environment: next });
    return true;
  }

  clearEnvironment(): void {
    this.setEnvironment(null);
  }

  // ── Damage ──

  /** Resolve without touching the target */
  calculate(attack: Attack, target: TargetRef): DamageResult | undefined {
    const combatant = this.resolveTarget(target);
    if (!combatant) return undefined;
    return this.pipeline.resolve(attack, combatant, { environment: this.environment });
  }

  /** Deterministic expected damage against a registered target */
  preview(attack: Attack, target: TargetRef): DamageResult | undefined {
    const combatant = this.resolveTarget(target);
    if (!combatant) return undefined;
    return this.pipeline.preview(attack, combatant, this.environment);
  }

  /**
   * Resolve a hit, then apply it: damage through the stat accessor,
   * triggered and ambient status effects through the bridge.
   */
  strike(attack: Attack, target: TargetRef): StrikeOutcome | undefined {
    const combatant = this.resolveTarget(target);
    if (!combatant) return undefined;
    const result = this.pipeline.resolve(attack, combatant, { environment: this.environment });
    return this.commit(combatant, result);
  }

  /**
   * Area hit. Every target is resolved against its own copy of the attack
   * before any of them is damaged.
   */
  strikeAll(attack: Attack, targets: readonly TargetRef[] = this.getAll()): StrikeOutcome[] {
    const resolved = targets
      .map(t => this.resolveTarget(t))
      .filter((c): c is ElementalCombatant => c !== undefined)
      .map(combatant => ({
        combatant,
        result: this.pipeline.resolve(copyAttack(attack), combatant, { environment: this.environment }),
      }));
    return resolved.map(({ combatant, result }) => this.commit(combatant, result));
  }

  /** Unattributed single-element damage, e.g. a trap or a hazard tick */
  applyElementalDamage(element: Element, power: number, targets: readonly TargetRef[] = this.getAll()): StrikeOutcome[] {
    return this.strikeAll(singleElementAttack(element, power), targets);
  }

  /** Queue a strike for a later `tick`; higher priority resolves first */
  enqueue(
    attack: Attack,
    target: TargetRef,
    callback: (outcome: StrikeOutcome | null) => void,
    priority = 0,
  ): void {
    const targetId = typeof target === 'string' ? target : target.id;
    this.pending.push({ attack, targetId, priority, callback });
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  // ── Modifiers ──

  /** Gives each target its own copy, with id `{id}_{combatantId}`. Returns how many accepted it. */
  applyModifierToAll(modifier: Modifier, targets: readonly TargetRef[] = this.getAll()): number {
    let applied = 0;
    for (const combatant of this.targetsOf(targets)) {
      if (combatant.applyModifier({ ...modifier, id: `${modifier.id}_${combatant.id}` })) applied++;
    }
    return applied;
  }

  removeModifiersBySourceFromAll(sourceId: string, targets: readonly TargetRef[] = this.getAll()): number {
    return this.targetsOf(targets).reduce((n, c) => n + c.ledger.removeBySource(sourceId), 0);
  }

  setGlobalDamageMultiplier(multiplier: number): void {
    this.pipeline.setGlobalDamageMultiplier(multiplier);
  }

  // ── Tick ──

  /** Resolve queued strikes, then advance every combatant's timers */
  tick(deltaTime: number): void {
    this.processPending();
    this.combatants.forEach(c => c.tick(deltaTime));
  }

  // ── Internals ──

  private commit(combatant: ElementalCombatant, result: DamageResult): StrikeOutcome {
    const immune = combatant.receive(result);
    const applied: AppliedStatus[] = [];
    if (this.bridge) {
      applied.push(...this.bridge.applyTriggered(result.triggeredEffects, combatant.id));
      applied.push(...this.applyAmbientEffects(result, combatant.id));
    }
    this.events.emit('damageResolved', { targetId: combatant.id, result });
    return { targetId: combatant.id, result, applied, immune };
  }

  /** Each ambient effect rolls once; any attack element on its immune list suppresses it */
  private applyAmbientEffects(result: DamageResult, targetId: string): AppliedStatus[] {
    const env = this.environment;
    const bridge = this.bridge;
    if (!env || !bridge || !this.config.enableEnvironmentalEffects) return [];

    const elements = result.attackParts.map(p => p.element);
    const trigger = elements[0] ?? 'None';
    const applied: AppliedStatus[] = [];
    for (const effect of env.ambientEffects) {
      if (this.random.next() >= effect.chance) continue;
      if (elements.some(e => effect.immuneElements.includes(e))) continue;
      if (bridge.applyStatus(effect.statusEffectId, trigger, targetId)) {
        applied.push({ statusEffectId: effect.statusEffectId, element: trigger, targetId });
      }
    }
    return applied;
  }

  private processPending(): void {
    if (this.pending.length === 0) return;
    // Stable sort keeps FIFO order within a priority
    const queue = [...this.pending].sort((a, b) => b.priority - a.priority);
    const batch = queue.slice(0, this.config.maxResolutionsPerTick);
    this.pending = queue.slice(batch.length);

    for (const job of batch) {
      const combatant = this.combatants.get(job.targetId);
      job.callback(combatant ? this.strike(job.attack, combatant) ?? null : null);
    }
  }

  private resolveTarget(target: TargetRef): ElementalCombatant | undefined {
    return typeof target === 'string' ? this.combatants.get(target) : target;
  }

  private targetsOf(targets: readonly TargetRef[]): ElementalCombatant[] {
    return targets
      .map(t => this.resolveTarget(t))
      .filter((c): c is ElementalCombatant => c !== undefined);
  }
}
