import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ModifierLedger, environmentModifierId, modifierEffectKey } from '@/engine/systems/element/ModifierLedger';
import { AttackBuilder } from '@/engine/systems/element/AttackBuilder';
import { ResistanceAggregator } from '@/engine/systems/element/ResistanceAggregator';
import { AffinityOverrideTable } from '@/engine/systems/element/AffinityOverrideTable';
import {
  affinityOverride,
  attackBonus,
  compositeBonus,
  defenseResistance,
  elementalConversion,
} from '@/engine/data/types/Modifier';
import type { Modifier } from '@/engine/data/types/Modifier';
import { createProfile } from '@/engine/data/types/Resistance';
import type { EnvironmentProfile } from '@/engine/data/types/Environment';
import { Logger } from '@/engine/utils/Logger';
import { makeStats } from './helpers';

describe('ModifierLedger', () => {
  let attacks: AttackBuilder;
  let resistances: ResistanceAggregator;
  let overrides: AffinityOverrideTable;
  let ledger: ModifierLedger;

  beforeEach(() => {
    Logger.setConsoleEnabled(false);
    attacks = new AttackBuilder(makeStats({ hero: { offense: 100, magicPower: 50 } }).stats);
    resistances = new ResistanceAggregator();
    overrides = new AffinityOverrideTable();
    ledger = new ModifierLedger({ attacks, resistances, overrides });
  });

  afterEach(() => {
    Logger.setConsoleEnabled(true);
    vi.restoreAllMocks();
  });

  const snapshot = () => ({
    overrides: overrides.list(),
    temporary: resistances.ids('temporary'),
    total: resistances.total(),
    skills: attacks.skillIds().map(id => [id, attacks.getSkillBonuses(id)]),
    weapons: attacks.weaponIds(),
  });

  describe('dispatch', () => {
    it('AttackBonus registers a skill bonus bucket under the modifier key', () => {
      ledger.apply(attackBonus('flame', [{ element: 'Fire', flat: 10, percentage: 0.1 }]));
      expect(modifierEffectKey('flame')).toBe('modifier:flame');
      expect(attacks.getSkillBonuses('modifier:flame')).toEqual([{
        element: 'Fire', flat: 10, percentage: 0.1, temporary: false, remaining: -1, sourceId: 'modifier:flame',
      }]);
      expect(attacks.getSkillBonuses('flame')).toEqual([]);
      expect(ledger.attackBonusIds()).toEqual(['modifier:flame']);
    });

    it('DefenseResistance registers a temporary resistance source', () => {
      ledger.apply(defenseResistance('ward', [{ element: 'Ice', flat: 0.4, percentage: 0 }]));
      expect(resistances.get('temporary', 'modifier:ward')?.resistances).toEqual({ Ice: 0.4 });
    });

    it('AffinityOverride adds one override per entry', () => {
      ledger.apply(affinityOverride('aff', [
        { attack: 'Fire', defense: 'Water', value: 2 },
        { attack: 'Ice', defense: 'Fire', value: 1.5 },
      ], { sourceId: 'ring' }));
      expect(overrides.resolve('Fire', 'Water', 0.5)).toBe(2);
      expect(overrides.get('modifier:aff_Ice_Fire')).toMatchObject({ value: 1.5, sourceId: 'ring', permanent: true });
    });

    it('ElementalConversion and CompositeBonus are exposed as queries', () => {
      ledger.apply(elementalConversion('conv', { from: 'Fire', to: 'Ice', percentage: 50, additive: true }));
      ledger.apply(compositeBonus('cb1', 1.5));
      ledger.apply(compositeBonus('cb2', 2));
      expect(ledger.conversionRules()).toEqual([{ from: 'Fire', to: 'Ice', percentage: 50, additive: true }]);
      expect(ledger.compositeBonusMultiplier()).toBe(3);
    });
  });

  describe('round trip', () => {
    const kinds: Array<[string, Modifier]> = [
      ['AttackBonus', attackBonus('m', [{ element: 'Fire', flat: 10, percentage: 0 }], { sourceId: 'ring', duration: 5 })],
      ['DefenseResistance', defenseResistance('m', [{ element: 'Ice', flat: 0.5, percentage: 0 }], { sourceId: 'ring' })],
      ['AffinityOverride', affinityOverride('m', [{ attack: 'Fire', defense: 'Water', value: 3 }], { sourceId: 'ring' })],
      ['ElementalConversion', elementalConversion('m', { from: 'Fire', to: 'Ice', percentage: 100, additive: false })],
      ['CompositeBonus', compositeBonus('m', 2, { sourceId: 'ring' })],
    ];

    it.each(kinds)('%s: apply then remove leaves every table as it was', (_kind, mod) => {
      // Pre-existing state, some of it sharing the modifier's source id or its own id
      overrides.add('gear', 'Fire', 'Water', 0.75, -1, 'ring');
      overrides.add('m_Fire_Water', 'Fire', 'Water', 1.25);
      resistances.registerPassive('innate', createProfile({ resistances: { Ice: 0.2 } }));
      resistances.registerTemporary('potion', createProfile({ resistances: { Fire: 0.1 } }), 8);
      resistances.registerTemporary('m', createProfile({ resistances: { Ice: 0.3 } }));
      attacks.registerSkillBonus('bolt', 'Lightning', 5);
      attacks.registerSkillBonus('m', 'Earth', 7);

      const before = snapshot();
      expect(ledger.apply(mod)).toBe(true);
      expect(ledger.remove('m')).toBe(true);
      expect(snapshot()).toEqual(before);
      expect(ledger.has('m')).toBe(false);
    });
  });

  describe('tick', () => {
    it('expires a modifier ticked by its full duration', () => {
      const expired = vi.fn();
      ledger.events.on('modifierExpired', expired);
      ledger.apply(defenseResistance('ward', [{ element: 'Ice', flat: 0.5, percentage: 0 }], { duration: 5 }));

      const result = ledger.tick(5);
      expect(result.map(m => m.id)).toEqual(['ward']);
      expect(ledger.getActiveModifiers()).toEqual([]);
      expect(resistances.ids('temporary')).toEqual([]);
      expect(expired).toHaveBeenCalledTimes(1);
    });

    it('expires a modifier ticked past its duration', () => {
      ledger.apply(compositeBonus('cb', 2, { duration: 1 }));
      expect(ledger.tick(10).map(m => m.id)).toEqual(['cb']);
      expect(ledger.compositeBonusMultiplier()).toBe(1);
    });

    it('counts every duration down from the same snapshot', () => {
      ledger.apply(compositeBonus('short', 2, { duration: 2 }));
      ledger.apply(compositeBonus('long', 2, { duration: 4 }));
      ledger.apply(compositeBonus('forever', 2));

      expect(ledger.tick(2).map(m => m.id)).toEqual(['short']);
      expect(ledger.get('long')?.remainingDuration).toBe(2);
      expect(ledger.get('forever')?.remainingDuration).toBe(0);
      expect(ledger.getActiveModifiers().map(m => m.id)).toEqual(['long', 'forever']);
    });
  });

  describe('validation', () => {
    it('rejects a missing modifier with a warning', () => {
      const warn = vi.spyOn(Logger, 'warn');
      expect(ledger.apply(null)).toBe(false);
      expect(warn).toHaveBeenCalledWith('Rejected elemental modifier: modifier is missing');
    });

    it('rejects a modifier without an id and changes nothing', () => {
      const warn = vi.spyOn(Logger, 'warn');
      const version = ledger.version;
      expect(ledger.apply(attackBonus('  ', [{ element: 'Fire', flat: 5, percentage: 0 }]))).toBe(false);
      expect(warn).toHaveBeenCalledWith('Rejected elemental modifier: modifier has no id');
      expect(ledger.version).toBe(version);
      expect(attacks.skillIds()).toEqual([]);
    });

    it('rejects a timed modifier with a non-finite duration', () => {
      expect(ledger.apply(compositeBonus('cb', 2, { duration: Number.NaN }))).toBe(false);
    });
  });

  describe('id collisions', () => {
    it('replaces a non-stacking modifier with the same id', () => {
      const removed = vi.fn();
      ledger.events.on('modifierRemoved', removed);
      ledger.apply(attackBonus('buff', [{ element: 'Fire', flat: 10, percentage: 0 }]));
      ledger.apply(defenseResistance('buff', [{ element: 'Water', flat: 0.3, percentage: 0 }]));

      expect(ledger.size).toBe(1);
      expect(ledger.get('buff')?.kind).toBe('DefenseResistance');
      expect(attacks.skillIds()).toEqual([]);
      expect(removed).toHaveBeenCalledTimes(1);
    });

    it('adds stacks up to maxStacks and scales the effect', () => {
      const frost = defenseResistance('frost', [{ element: 'Ice', flat: 0.2, percentage: 0 }], {
        allowStacking: true, maxStacks: 3, duration: 10,
      });
      ledger.apply(frost);
      ledger.apply(frost);
      expect(ledger.get('frost')?.currentStacks).toBe(2);
      expect(resistances.get('temporary', 'modifier:frost')?.resistances.Ice).toBeCloseTo(0.4);

      ledger.apply(frost);
      ledger.apply(frost);
      expect(ledger.get('frost')?.currentStacks).toBe(3);
      expect(resistances.get('temporary', 'modifier:frost')?.resistances.Ice).toBeCloseTo(0.6);
    });

    it('refreshes the duration when a stack is added', () => {
      const haste = compositeBonus('haste', 1.5, { allowStacking: true, maxStacks: 2, duration: 10 });
      ledger.apply(haste);
      ledger.tick(4);
      expect(ledger.get('haste')?.remainingDuration).toBe(6);
      ledger.apply(haste);
      expect(ledger.get('haste')?.remainingDuration).toBe(10);
      expect(ledger.compositeBonusMultiplier()).toBeCloseTo(2.25);
    });
  });

  describe('sources', () => {
    it('leaves a skill bonus with the same id as a skill modifier untouched', () => {
      attacks.registerSkillBonus('fireball', 'Fire', 20);
      ledger.registerSkillModifiers('fireball', [
        attackBonus('fireball', [{ element: 'Fire', flat: 5, percentage: 0 }]),
      ]);
      expect(attacks.getSkillBonuses('fireball').map(b => b.flat)).toEqual([20]);

      expect(ledger.remove('fireball')).toBe(true);
      expect(attacks.getSkillBonuses('fireball').map(b => b.flat)).toEqual([20]);
      expect(attacks.skillIds()).toEqual(['fireball']);
    });


    it('equipment modifiers are permanent and removed together', () => {
      ledger.registerEquipmentModifiers('ring', [
        attackBonus('ring_fire', [{ element: 'Fire', flat: 10, percentage: 0 }], { duration: 3 }),
        affinityOverride('ring_aff', [{ attack: 'Fire', defense: 'Water', value: 2 }]),
      ]);
      expect(ledger.getModifiersBySource('ring').map(m => m.id)).toEqual(['ring_fire', 'ring_aff']);
      expect(ledger.get('ring_fire')?.permanent).toBe(true);

      expect(ledger.unregisterEquipmentModifiers('ring')).toBe(2);
      expect(ledger.size).toBe(0);
      expect(overrides.size).toBe(0);
    });

    it('buff modifiers carry the buff duration', () => {
      ledger.registerBuffModifiers('haste', [compositeBonus('haste_cb', 2)], 3);
      expect(ledger.get('haste_cb')).toMatchObject({ permanent: false, remainingDuration: 3, sourceId: 'haste' });
      expect(ledger.tick(3).map(m => m.id)).toEqual(['haste_cb']);
    });

    it('skill modifiers are permanent when no duration is given', () => {
      ledger.registerSkillModifiers('stance', [compositeBonus('stance_cb', 2)]);
      expect(ledger.get('stance_cb')?.permanent).toBe(true);
    });

    it('applies and removes an environment as one defense modifier', () => {
      const volcano: EnvironmentProfile = {
        id: 'volcano', name: 'Volcano',
        resistances: { Fire: 0.3, Ice: -0.2 },
        damageModifiers: {},
        ambientEffects: [],
      };
      ledger.applyEnvironment(volcano);
      const id = environmentModifierId('volcano');
      expect(id).toBe('environment_volcano');
      expect(ledger.get(id)?.sourceId).toBe('volcano');
      expect(resistances.get('temporary', modifierEffectKey(id))?.resistances).toEqual({ Fire: 0.3, Ice: -0.2 });

      expect(ledger.removeEnvironment('volcano')).toBe(1);
      expect(resistances.ids('temporary')).toEqual([]);
    });
  });

  it('advances the version on apply, remove and expiry', () => {
    const start = ledger.version;
    ledger.apply(compositeBonus('a', 2, { duration: 1 }));
    ledger.apply(compositeBonus('b', 2));
    ledger.remove('b');
    ledger.tick(1);
    expect(ledger.version).toBe(start + 4);
  });

  it('clearByKind removes only that kind', () => {
    ledger.apply(compositeBonus('cb', 2));
    ledger.apply(attackBonus('ab', [{ element: 'Fire', flat: 1, percentage: 0 }]));
    expect(ledger.clearByKind('CompositeBonus')).toBe(1);
    expect(ledger.getActiveModifiers().map(m => m.id)).toEqual(['ab']);
  });
});
