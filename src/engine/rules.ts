import type { AnswerSet, AnswerValue, ConditionValue, SelectionRule } from '../types';
import { answerKeyFor, readAnswer, scenariosOf, STEP } from './answers';

/** Rules without a priority sort after every prioritised rule. */
export const UNPRIORITISED = 999;

export type MatchPredicate =
  | { kind: 'exact'; answerKey: string; expected: AnswerValue }
  | { kind: 'any_of'; answerKey: string; expected: AnswerValue[] }
  | { kind: 'no_scenarios' }
  | { kind: 'scenario_overlap'; expected: AnswerValue[] };

export interface CompiledRule {
  rule: SelectionRule;
  predicates: MatchPredicate[];
}

export function compilePredicate(conditionKey: string, expected: ConditionValue): MatchPredicate {
  const answerKey = answerKeyFor(conditionKey);
  if (!Array.isArray(expected)) {
    return { kind: 'exact', answerKey, expected };
  }
  if (answerKey === STEP.SPECIAL_SCENARIOS) {
    return expected.length === 0 ? { kind: 'no_scenarios' } : { kind: 'scenario_overlap', expected };
  }
  return { kind: 'any_of', answerKey, expected };
}

export function predicateMatches(predicate: MatchPredicate, answers: AnswerSet): boolean {
  switch (predicate.kind) {
    case 'exact':
      return readAnswer(answers, predicate.answerKey) === predicate.expected;
    case 'any_of': {
      const value = readAnswer(answers, predicate.answerKey);
      return value !== undefined && !Array.isArray(value) && predicate.expected.includes(value);
    }
    case 'no_scenarios':
      return scenariosOf(answers).length === 0;
    case 'scenario_overlap': {
      const scenarios = scenariosOf(answers);
      return predicate.expected.some(s => scenarios.includes(s));
    }
  }
}

/**
 * Compiles the rule table once, ordered by ascending priority. Array#sort is
 * stable, so rules sharing a priority keep their configured order.
 */
export function compileRules(rules: readonly SelectionRule[]): CompiledRule[] {
  return [...rules]
    .sort((a, b) => (a.priority ?? UNPRIORITISED) - (b.priority ?? UNPRIORITISED))
    .map(rule => ({
      rule,
      predicates: Object.entries(rule.conditions).map(([key, expected]) => compilePredicate(key, expected))
    }));
}

export function ruleMatches(compiled: CompiledRule, answers: AnswerSet): boolean {
  return compiled.predicates.every(p => predicateMatches(p, answers));
}

export function firstMatchingRule(compiled: readonly CompiledRule[], answers: AnswerSet): SelectionRule | undefined {
  return compiled.find(c => ruleMatches(c, answers))?.rule;
}
