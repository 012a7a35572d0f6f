import type { Modification, PriorityLabel } from '../types';

export const REASONS = {
  b2b: 'B2B sales require a dedicated template',
  pre_order: 'Pre-orders require a dedicated template',
  limited_offer: 'Limited offer with urgency elements',
  suggestion: 'Template determined by product type',
  default: 'Default base template used',
  keyword: 'Matched by keywords'
} as const;

export const PRIORITY: Record<'b2b' | 'pre_order' | 'limited_offer' | 'suggestion' | 'default', PriorityLabel> = {
  b2b: 'highest',
  pre_order: 'high',
  limited_offer: 'high',
  suggestion: 'medium',
  default: 'low'
};

export const MODIFICATIONS: Record<string, Modification> = {
  seasonal: {
    type: 'design',
    description: 'Use a seasonal color scheme',
    items: ['color_scheme', 'seasonal_imagery', 'lifestyle_photos']
  },
  limited_offer: {
    type: 'urgency',
    description: 'Add urgency elements',
    items: ['countdown_timer', 'stock_counter', 'purchase_counter']
  }
};

export function incompatibilityWarning(template: string, scenario: string): string {
  return `Template ${template} is not compatible with ${scenario}`;
}
