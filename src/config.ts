// ─────────────────────────────────────────────
//  Engine configuration
// ─────────────────────────────────────────────

export interface ElementConfig {
  /** Scales every resolved hit after crit and variance */
  globalDamageMultiplier: number;
  enableComposition: boolean;
  enableEnvironmentalEffects: boolean;
  /** Variance multiplier is rolled in [varianceMin, varianceMax) */
  varianceMin: number;
  varianceMax: number;
  /** Used when an attacker has no critDamage stat */
  defaultCritMultiplier: number;
  /** Queued strikes resolved per session tick */
  maxResolutionsPerTick: number;
  /** Log every resolution step through Logger */
  debug: boolean;
}

export const DEFAULT_ELEMENT_CONFIG: Readonly<ElementConfig> = {
  globalDamageMultiplier: 1,
  enableComposition: true,
  enableEnvironmentalEffects: true,
  varianceMin: 0.95,
  varianceMax: 1.05,
  defaultCritMultiplier: 1,
  maxResolutionsPerTick: 50,
  debug: false,
};

export function resolveConfig(overrides: Partial<ElementConfig> = {}): ElementConfig {
  return { ...DEFAULT_ELEMENT_CONFIG, ...overrides };
}
