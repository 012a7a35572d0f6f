import type { Answer, AnswerSet, AnswerValue } from '../types';

/** Step identifiers whose answers the engine reads directly. */
export const STEP = {
  PRODUCT_TYPE: 'step_1_product_type',
  BUSINESS_MODEL: 'step_2_business_model',
  PRICE_RANGE: 'step_3_price_range',
  SPECIAL_SCENARIOS: 'step_4_special_scenarios'
} as const;

export const SUGGESTED_TEMPLATE_KEY = 'suggested_template';

/** Rule-table condition keys that stand for the reserved step identifiers. */
export const CONDITION_KEY_ALIASES: Record<string, string> = {
  product_type: STEP.PRODUCT_TYPE,
  business_model: STEP.BUSINESS_MODEL,
  price_range: STEP.PRICE_RANGE,
  special_scenarios: STEP.SPECIAL_SCENARIOS
};

export const SCENARIO = {
  B2B: 'b2b',
  PRE_ORDER: 'pre_order',
  LIMITED_OFFER: 'limited_offer',
  SEASONAL: 'seasonal'
} as const;

export function readAnswer(answers: AnswerSet, key: string): Answer | undefined {
  return Object.hasOwn(answers, key) ? answers[key] : undefined;
}

export function answerKeyFor(conditionKey: string): string {
  return Object.hasOwn(CONDITION_KEY_ALIASES, conditionKey) ? CONDITION_KEY_ALIASES[conditionKey] : conditionKey;
}

/**
 * The special-scenario answer as a list. Absent means none; a lone scalar is
 * read as a one-element list.
 */
export function scenariosOf(answers: AnswerSet): AnswerValue[] {
  const value = readAnswer(answers, STEP.SPECIAL_SCENARIOS);
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}
