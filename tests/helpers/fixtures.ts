import { join } from 'node:path';
import pino from 'pino';
import type { SelectionLogic, TemplateCatalog } from '../../src/types';

export const TEMPLATES_PATH = join(process.cwd(), 'config', 'landing-templates.json');
export const LOGIC_PATH = join(process.cwd(), 'config', 'template-selection-logic.json');

export const silentLogger = pino({ level: 'silent' });

export const MIN_TEMPLATES: TemplateCatalog = {
  templates: {
    physical_single: { name: 'Single product' },
    b2b: { name: 'B2B offer' },
    service_consultation: { name: 'Service consultation' }
  }
};

export const PRODUCT_OPTIONS = [
  { id: 'physical_product', label: 'Physical product' },
  { id: 'service', label: 'Service' }
];

/** The minimal single-question tree with one default rule. */
export function minLogic(): SelectionLogic {
  return {
    decision_tree: {
      step_1_product_type: {
        question: 'What are you selling?',
        options: PRODUCT_OPTIONS
      },
      template_selection: {
        rules: [
          {
            conditions: { product_type: 'physical_product' },
            template: 'physical_single',
            reason: 'default',
            priority: 1
          }
        ]
      }
    },
    quick_selection: {
      keywords: { physical_single: ['pillow', 'landing'] }
    },
    compatibility_matrix: {
      matrix: { physical_single: { not_compatible_with: [] } }
    }
  };
}

/** A tree that routes on product type and records a suggestion for services. */
export function routedLogic(): SelectionLogic {
  const logic = minLogic();
  logic.decision_tree = {
    step_1_product_type: {
      question: 'What are you selling?',
      options: PRODUCT_OPTIONS,
      next_step: 'route'
    },
    route: {
      condition: {
        if: "step_1_product_type == 'physical_product'",
        then: {
          question: 'How do you sell it?',
          options: [{ id: 'single_item', label: 'One item' }],
          next_step: 'step_2_business_model'
        },
        elif: {
          'step_1_product_type == "service"': {
            question: 'Does any of this apply?',
            options: [{ id: 'b2b', label: 'B2B' }],
            next_step: 'step_4_special_scenarios',
            template_suggestion: 'service_consultation'
          }
        }
      }
    },
    step_2_business_model: {
      question: 'How do you sell it?',
      options: [{ id: 'single_item', label: 'One item' }],
      next_step: 'template_selection'
    },
    step_4_special_scenarios: {
      question: 'Does any of this apply?',
      options: [{ id: 'b2b', label: 'B2B' }],
      next_step: 'template_selection'
    },
    template_selection: logic.decision_tree.template_selection
  };
  return logic;
}

/** Two answered question nodes whose next_step links point at each other. */
export function loopingLogic(): SelectionLogic {
  const logic = minLogic();
  logic.decision_tree.step_1_product_type = {
    question: 'What are you selling?',
    options: PRODUCT_OPTIONS,
    next_step: 'step_x'
  };
  logic.decision_tree.step_x = {
    question: 'Anything else?',
    options: [{ id: 'b', label: 'B' }],
    next_step: 'step_1_product_type'
  };
  return logic;
}
