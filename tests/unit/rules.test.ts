import { describe, it, expect } from 'vitest';
import { compilePredicate, compileRules, firstMatchingRule, predicateMatches } from '../../src/engine/rules';
import type { SelectionRule } from '../../src/types';

describe('compilePredicate', () => {
  it('maps aliased scalar conditions to exact matches on the step key', () => {
    expect(compilePredicate('product_type', 'service')).toEqual({
      kind: 'exact',
      answerKey: 'step_1_product_type',
      expected: 'service'
    });
  });

  it('tags special-scenario lists by emptiness', () => {
    expect(compilePredicate('special_scenarios', [])).toEqual({ kind: 'no_scenarios' });
    expect(compilePredicate('special_scenarios', ['b2b'])).toEqual({ kind: 'scenario_overlap', expected: ['b2b'] });
  });

  it('looks up unknown keys verbatim', () => {
    expect(compilePredicate('region', ['by', 'ru'])).toEqual({ kind: 'any_of', answerKey: 'region', expected: ['by', 'ru'] });
  });
});

describe('predicateMatches', () => {
  it('matches no_scenarios only for an empty or absent scenario list', () => {
    const predicate = compilePredicate('special_scenarios', []);
    expect(predicateMatches(predicate, {})).toBe(true);
    expect(predicateMatches(predicate, { step_4_special_scenarios: [] })).toBe(true);
    expect(predicateMatches(predicate, { step_4_special_scenarios: ['seasonal'] })).toBe(false);
  });

  it('matches scenario_overlap when any expected scenario was recorded', () => {
    const predicate = compilePredicate('special_scenarios', ['b2b', 'seasonal']);
    expect(predicateMatches(predicate, { step_4_special_scenarios: ['seasonal'] })).toBe(true);
    expect(predicateMatches(predicate, { step_4_special_scenarios: ['pre_order'] })).toBe(false);
  });

  it('uses plain membership for other list conditions', () => {
    const predicate = compilePredicate('price_range', ['low', 'medium']);
    expect(predicateMatches(predicate, { step_3_price_range: 'medium' })).toBe(true);
    expect(predicateMatches(predicate, { step_3_price_range: 'high' })).toBe(false);
    expect(predicateMatches(predicate, { step_3_price_range: ['low'] })).toBe(false);
    expect(predicateMatches(predicate, {})).toBe(false);
  });

  it('compares scalars strictly', () => {
    expect(predicateMatches(compilePredicate('quantity', 3), { quantity: '3' })).toBe(false);
    expect(predicateMatches(compilePredicate('quantity', 3), { quantity: 3 })).toBe(true);
  });
});

describe('compileRules', () => {
  const rules: SelectionRule[] = [
    { conditions: { product_type: 'physical_product' }, template: 'unprioritised', reason: 'none' },
    { priority: 2, conditions: { product_type: 'physical_product' }, template: 'second', reason: 'B' },
    { priority: 1, conditions: { product_type: 'physical_product' }, template: 'first', reason: 'C' },
    { priority: 1, conditions: { product_type: 'physical_product' }, template: 'first_tie', reason: 'D' }
  ];

  it('orders by priority and keeps configured order among ties', () => {
    expect(compileRules(rules).map(c => c.rule.template)).toEqual(['first', 'first_tie', 'second', 'unprioritised']);
  });

  it('leaves the configured rule list untouched', () => {
    compileRules(rules);
    expect(rules.map(r => r.template)).toEqual(['unprioritised', 'second', 'first', 'first_tie']);
  });

  it('returns the first rule whose conditions all match', () => {
    const compiled = compileRules([
      { priority: 1, conditions: { product_type: 'physical_product', business_model: 'variants' }, template: 'physical_multi', reason: 'variants' },
      { priority: 2, conditions: { product_type: 'physical_product' }, template: 'physical_single', reason: 'single' }
    ]);
    expect(firstMatchingRule(compiled, { step_1_product_type: 'physical_product' })?.template).toBe('physical_single');
    expect(
      firstMatchingRule(compiled, { step_1_product_type: 'physical_product', step_2_business_model: 'variants' })?.template
    ).toBe('physical_multi');
    expect(firstMatchingRule(compiled, { step_1_product_type: 'service' })).toBeUndefined();
  });
});
