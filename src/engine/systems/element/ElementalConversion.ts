import { produce } from 'immer';
import type { Attack } from '@/engine/data/types/Attack';
import type { ConversionRule } from '@/engine/data/types/Modifier';

/**
 * Convert `rule.percentage`% of every `rule.from` part into `rule.to`.
 * Replacing rules rewrite the part in place; additive rules keep it and
 * append the converted share. Composite attacks are left untouched.
 */
export function applyConversion(attack: Attack, rule: ConversionRule): Attack {
  if (attack.composite) return attack;
  if (!attack.parts.some(p => p.element === rule.from)) return attack;

  const share = rule.percentage / 100;
  return produce(attack, draft => {
    const original = draft.parts.length;
    for (let i = 0; i < original; i++) {
      const part = draft.parts[i];
      if (!part || part.element !== rule.from) continue;
      const amount = part.power * share;
      if (rule.additive) {
        draft.parts.push({ element: rule.to, power: amount });
      } else {
        part.element = rule.to;
        part.power = amount;
      }
    }
  });
}

export function applyConversions(attack: Attack, rules: readonly ConversionRule[]): Attack {
  return rules.reduce(applyConversion, attack);
}
