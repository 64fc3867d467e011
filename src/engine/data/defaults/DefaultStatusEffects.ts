// ─────────────────────────────────────────────
//  Default Element → Status Effect mapping
//  Status effect ids belong to the host status-effect system.
// ─────────────────────────────────────────────

import type { Element } from '@/engine/data/types/Element';

export const DEFAULT_STATUS_EFFECTS: Partial<Record<Element, readonly string[]>> = {
  Fire:      ['burn', 'ignite'],
  Water:     ['wet', 'drench'],
  Ice:       ['freeze', 'chill'],
  Lightning: ['shock', 'paralyze'],
  Poison:    ['poison', 'toxic'],
  Dark:      ['curse', 'decay'],
  Light:     ['holy_blessing', 'purify'],
};
