import { describe, it, expect } from 'vitest';
import {
  CompositionResolver,
  combinePowers,
  compositeRule,
  evaluateCurve,
  LINEAR_CURVE,
} from '@/engine/systems/element/CompositionResolver';
import type { CombineMethod } from '@/engine/systems/element/CompositionResolver';
import { applyCompositeMultiplier, createAttack, singleElementAttack } from '@/engine/data/types/Attack';

const MUD = compositeRule({
  id: 'mud',
  inputElements: ['Fire', 'Water'],
  resultElement: 'Earth',
  resultName: 'Mud',
  method: 'Average',
  powerMultiplier: 1.2,
});

describe('combinePowers', () => {
  it.each<CombineMethod>(['Average', 'Highest', 'Lowest', 'Weighted', 'CustomCurve'])(
    '%s returns 0 for an empty power list',
    method => {
      expect(combinePowers(method, [], [])).toBe(0);
    },
  );

  it('Highest and Lowest pick the extremes', () => {
    expect(combinePowers('Highest', ['Fire', 'Water'], [10, 40])).toBe(40);
    expect(combinePowers('Lowest', ['Fire', 'Water'], [10, 40])).toBe(10);
  });

  it('Weighted with every weight at 1 equals Average', () => {
    const elements = ['Fire', 'Water', 'Ice'] as const;
    const powers = [10, 20, 45];
    const weighted = combinePowers('Weighted', elements, powers, { Fire: 1, Water: 1, Ice: 1 });
    expect(weighted).toBeCloseTo(combinePowers('Average', elements, powers));
    expect(weighted).toBeCloseTo(25);
  });

  it('Weighted normalises by total weight and defaults missing weights to 1', () => {
    // (10*3 + 30*1) / 4
    expect(combinePowers('Weighted', ['Fire', 'Water'], [10, 30], { Fire: 3 })).toBe(15);
  });

  it('CustomCurve on the identity curve returns p for two equal powers p', () => {
    expect(combinePowers('CustomCurve', ['Fire', 'Water'], [30, 30], {}, LINEAR_CURVE)).toBeCloseTo(30);
  });

  it('CustomCurve clamps the normalised input to [0, 1]', () => {
    expect(combinePowers('CustomCurve', ['Fire', 'Water'], [150, 150], {}, LINEAR_CURVE)).toBeCloseTo(100);
  });
});

describe('compositeRule', () => {
  it('sorts authored curve keys by time', () => {
    const keys = [
      { time: 1, value: 1 },
      { time: 0, value: 0 },
      { time: 0.5, value: 0.25 },
    ];
    const rule = compositeRule({
      inputElements: ['Ice', 'Wind'], resultElement: 'Water', method: 'CustomCurve', curve: keys,
    });
    expect(rule.curve.map(k => k.time)).toEqual([0, 0.5, 1]);
    expect(keys.map(k => k.time)).toEqual([1, 0, 0.5]);

    // mean 40 → t = 0.4 → 0.8 of the way from 0 to 0.25
    const result = new CompositionResolver([rule]).resolve(['Ice', 'Wind'], [40, 40]);
    expect(result.power).toBeCloseTo(20);
  });
});

describe('evaluateCurve', () => {
  const peak = [
    { time: 0, value: 0 },
    { time: 0.5, value: 1 },
    { time: 1, value: 0 },
  ];

  it('interpolates linearly between keys', () => {
    expect(evaluateCurve(peak, 0.25)).toBeCloseTo(0.5);
    expect(evaluateCurve(peak, 0.75)).toBeCloseTo(0.5);
  });

  it('clamps outside the key range', () => {
    expect(evaluateCurve(peak, -1)).toBe(0);
    expect(evaluateCurve(peak, 2)).toBe(0);
  });

  it('returns 0 without keys', () => {
    expect(evaluateCurve([], 0.5)).toBe(0);
  });
});

describe('CompositionResolver.resolve', () => {
  it('Fire 40 + Water 40 with an Average ×1.2 rule forms Earth 48', () => {
    const resolver = new CompositionResolver([MUD]);
    const result = resolver.resolve(['Fire', 'Water'], [40, 40]);
    expect(result.isComposite).toBe(true);
    expect(result.element).toBe('Earth');
    expect(result.power).toBeCloseTo(48);
    expect(result.name).toBe('Mud');
    expect(result.ruleId).toBe('mud');
  });

  it('never composites a single element', () => {
    const solo = compositeRule({ inputElements: ['Fire'], resultElement: 'Void', requiredElementCount: 1 });
    const resolver = new CompositionResolver([solo, MUD]);
    expect(resolver.resolve(['Fire'], [50])).toEqual({
      isComposite: false,
      element: 'Fire',
      power: 50,
      sourceElements: ['Fire'],
    });
    expect(resolver.resolve(['Fire', 'Fire'], [20, 30]).isComposite).toBe(false);
  });

  it('tries rules with more inputs first', () => {
    const storm = compositeRule({ id: 'storm', inputElements: ['Fire', 'Water', 'Wind'], resultElement: 'Void' });
    const resolver = new CompositionResolver();
    resolver.addRule(MUD);
    resolver.addRule(storm);
    expect(resolver.getRules().map(r => r.id)).toEqual(['storm', 'mud']);

    const result = resolver.resolve(['Fire', 'Water', 'Wind'], [30, 30, 30]);
    expect(result.ruleId).toBe('storm');
    expect(result.element).toBe('Void');
    expect(result.power).toBe(30);
  });

  it('keeps insertion order for rules of equal specificity', () => {
    const steam = compositeRule({ id: 'steam', inputElements: ['Fire', 'Water'], resultElement: 'Wind' });
    const resolver = new CompositionResolver([MUD, steam]);
    expect(resolver.resolve(['Fire', 'Water'], [10, 10]).ruleId).toBe('mud');
  });

  it('falls back to the first pair below the power threshold', () => {
    const strict = compositeRule({ ...MUD, minimumPowerThreshold: 100 });
    const result = new CompositionResolver([strict]).resolve(['Fire', 'Water'], [40, 40]);
    expect(result.isComposite).toBe(false);
    expect(result.element).toBe('Fire');
    expect(result.power).toBe(40);
  });

  it('requires every input element', () => {
    const frost = compositeRule({ inputElements: ['Fire', 'Ice'], resultElement: 'Water' });
    expect(new CompositionResolver([frost]).resolve(['Fire', 'Water'], [10, 10]).isComposite).toBe(false);
  });

  it('keeps the first attack element when the rule names None', () => {
    const keep = compositeRule({ inputElements: ['Water', 'Fire'], resultElement: 'None' });
    const result = new CompositionResolver([keep]).resolve(['Fire', 'Water'], [20, 40]);
    expect(result.element).toBe('Fire');
    expect(result.power).toBe(30);
  });

  it('scales by the composite bonus on top of the rule multiplier', () => {
    const result = new CompositionResolver([MUD]).resolve(['Fire', 'Water'], [40, 40], 1.5);
    expect(result.power).toBeCloseTo(72);
  });

  it('removes rules by id', () => {
    const resolver = new CompositionResolver([MUD]);
    expect(resolver.removeRule('mud')).toBe(true);
    expect(resolver.removeRule('mud')).toBe(false);
    expect(resolver.resolve(['Fire', 'Water'], [40, 40]).isComposite).toBe(false);
  });
});

describe('CompositionResolver.resolveAttack', () => {
  it('sums repeated elements and leaves the composite bonus pending', () => {
    const attack = createAttack(
      [{ element: 'Fire', power: 30 }, { element: 'Water', power: 40 }, { element: 'Fire', power: 10 }],
      { compositeBonus: 2 },
    );
    const composed = new CompositionResolver([MUD]).resolveAttack(attack);
    expect(composed.composite?.element).toBe('Earth');
    expect(composed.composite?.power).toBeCloseTo(48);
    expect(composed.composite?.multiplier).toBe(2);
    expect(composed.composite?.sourceElements).toEqual(['Fire', 'Water']);
    expect(applyCompositeMultiplier(composed).composite?.power).toBeCloseTo(96);
    expect(attack.composite).toBeUndefined();
  });

  it('returns a single-element attack unchanged', () => {
    const attack = singleElementAttack('Fire', 50);
    expect(new CompositionResolver([MUD]).resolveAttack(attack)).toBe(attack);
  });
});
