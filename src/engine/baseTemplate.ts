import type { AnswerSet } from '../types';
import { readAnswer, STEP } from './answers';

export const TEMPLATE = {
  PHYSICAL_SINGLE: 'physical_single',
  PHYSICAL_MULTI: 'physical_multi',
  PHYSICAL_DROPSHIPPING: 'physical_dropshipping',
  LOW_PRICE_IMPULSE: 'low_price_impulse',
  MEDIUM_PRICE_JUSTIFIED: 'medium_price_justified',
  HIGH_PRICE_DETAILED: 'high_price_detailed',
  SERVICE_CONSULTATION: 'service_consultation',
  DIGITAL_COURSE: 'digital_course',
  B2B: 'b2b',
  PRE_ORDER: 'pre_order',
  LIMITED_OFFER: 'limited_offer'
} as const;

const PRICE_TIER_TEMPLATES: Record<string, string> = {
  low: TEMPLATE.LOW_PRICE_IMPULSE,
  medium: TEMPLATE.MEDIUM_PRICE_JUSTIFIED,
  high: TEMPLATE.HIGH_PRICE_DETAILED
};

/**
 * The template implied by product type, business model and price tier alone,
 * ignoring special scenarios. Every current product type maps somewhere, but
 * callers treat `undefined` as a possible outcome.
 */
export function baseTemplateFor(answers: AnswerSet): string | undefined {
  const productType = readAnswer(answers, STEP.PRODUCT_TYPE);
  const businessModel = readAnswer(answers, STEP.BUSINESS_MODEL);
  const priceRange = readAnswer(answers, STEP.PRICE_RANGE);

  switch (productType) {
    case 'physical_product':
      if (businessModel === 'variants') return TEMPLATE.PHYSICAL_MULTI;
      if (businessModel === 'dropshipping') return TEMPLATE.PHYSICAL_DROPSHIPPING;
      if (typeof priceRange === 'string' && Object.hasOwn(PRICE_TIER_TEMPLATES, priceRange)) {
        return PRICE_TIER_TEMPLATES[priceRange];
      }
      return TEMPLATE.PHYSICAL_SINGLE;
    case 'service':
      return TEMPLATE.SERVICE_CONSULTATION;
    case 'digital_product':
      return TEMPLATE.DIGITAL_COURSE;
    default:
      return TEMPLATE.PHYSICAL_SINGLE;
  }
}
