import 'dotenv/config';

export const CFG = {
  // Configuration payloads (JSON files, relative to the working directory)
  TEMPLATES_PATH: process.env.TEMPLATES_PATH || 'config/landing-templates.json',
  SELECTION_LOGIC_PATH: process.env.SELECTION_LOGIC_PATH || 'config/template-selection-logic.json',

  // First decision-tree node a fresh session evaluates
  INITIAL_STEP: process.env.INITIAL_STEP || 'step_1_product_type',

  LOG_LEVEL: process.env.LOG_LEVEL || 'info',

  // Session registry
  SESSION_MAX_AGE_MS: Number(process.env.SESSION_MAX_AGE_MS || 24 * 60 * 60 * 1000), // 1 day
  MAX_SESSIONS: Number(process.env.MAX_SESSIONS || 10000),

  // Fallback when neither a rule nor the base mapping yields a template
  DEFAULT_TEMPLATE: 'physical_single'
};
