// ─────────────────────────────────────────────
//  Public API
// ─────────────────────────────────────────────

export * from '@/engine/data/types/Element';
export * from '@/engine/data/types/Attack';
export * from '@/engine/data/types/Resistance';
export * from '@/engine/data/types/Modifier';
export * from '@/engine/data/types/Environment';
export * from '@/engine/data/types/DamageResult';
export type * from '@/engine/data/types/Combat';

export { DEFAULT_AFFINITY_PAIRS, SAME_ELEMENT_AFFINITY } from '@/engine/data/defaults/DefaultAffinities';
export type { AffinityPair } from '@/engine/data/defaults/DefaultAffinities';
export { DEFAULT_STATUS_EFFECTS } from '@/engine/data/defaults/DefaultStatusEffects';

export * from '@/engine/systems/element/AffinityTable';
export * from '@/engine/systems/element/AffinityOverrideTable';
export * from '@/engine/systems/element/CompositionResolver';
export * from '@/engine/systems/element/ResistanceAggregator';
export * from '@/engine/systems/element/ElementalConversion';
export * from '@/engine/systems/element/AttackBuilder';
export * from '@/engine/systems/element/ModifierLedger';
export * from '@/engine/systems/element/ElementDatabase';
export * from '@/engine/systems/element/ResolutionPipeline';
export * from '@/engine/systems/element/StatusEffectBridge';
export * from '@/engine/systems/element/ElementalCombatant';
export * from '@/engine/systems/element/ElementSession';

export { DEFAULT_ELEMENT_CONFIG, resolveConfig } from '@/config';
export type { ElementConfig } from '@/config';
export { TypedEventBus } from '@/engine/utils/EventBus';
export { Logger } from '@/engine/utils/Logger';
export type { LogClass } from '@/engine/utils/Logger';
export { MathUtils } from '@/engine/utils/MathUtils';
export { createRng, sequenceRng } from '@/engine/utils/Rng';
