import type { AnswerSet } from '../types';
import { readAnswer } from './answers';

/**
 * Branch conditions in the decision tree are single equality tests of the form
 * `step_1_product_type == 'physical_product'` (single or double quotes).
 * There is no other operator and no boolean composition; chaining happens
 * through the tree's own if/elif blocks.
 */

export interface EqualsCondition {
  kind: 'equals';
  key: string;
  literal: string;
}

export interface MalformedCondition {
  kind: 'malformed';
  source: string;
}

export type ParsedCondition = EqualsCondition | MalformedCondition;

const CONDITION_RE = /^\s*(\w+)\s*==\s*(['"])([^'"]+)\2\s*$/;

export function parseCondition(source: string): ParsedCondition {
  const match = CONDITION_RE.exec(source);
  if (!match) return { kind: 'malformed', source };
  return { kind: 'equals', key: match[1], literal: match[3] };
}

/** Malformed expressions evaluate to false. */
export function evaluateCondition(condition: ParsedCondition, answers: AnswerSet): boolean {
  if (condition.kind === 'malformed') return false;
  return readAnswer(answers, condition.key) === condition.literal;
}
