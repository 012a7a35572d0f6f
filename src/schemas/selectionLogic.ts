import { z } from 'zod';
import type { SelectionLogic } from '../types';

/**
 * Structural schemas for the selection-logic payload. They check only what the
 * engine reads; condition strings and cross references are left to the linter.
 */

const AnswerValueSchema = z.union([z.string(), z.number(), z.boolean()]);

// Options reach the caller as configured, extra display fields included
export const AnswerOptionSchema = z
  .object({
    id: z.string(),
    label: z.string()
  })
  .passthrough();

export const ThenBlockSchema = z
  .object({
    question: z.string(),
    options: z.array(AnswerOptionSchema),
    next_step: z.string().optional(),
    template_suggestion: z.string().optional()
  })
  .passthrough();

export const ConditionalStepSchema = z.object({
  condition: z.object({
    if: z.string(),
    then: ThenBlockSchema,
    elif: z.record(z.string(), ThenBlockSchema).optional()
  })
});

export const QuestionStepSchema = z.object({
  question: z.string(),
  options: z.array(AnswerOptionSchema),
  next_step: z.string().optional()
});

// Conditional first: a node carrying both shapes is a conditional node
export const DecisionStepSchema = z.union([ConditionalStepSchema, QuestionStepSchema]);

export const SelectionRuleSchema = z.object({
  priority: z.number().optional(),
  conditions: z.record(z.string(), z.union([AnswerValueSchema, z.array(AnswerValueSchema)])),
  template: z.string(),
  reason: z.string(),
  override: z.boolean().optional()
});

export const DecisionTreeSchema = z
  .object({
    template_selection: z.object({ rules: z.array(SelectionRuleSchema) }).default({ rules: [] })
  })
  .catchall(DecisionStepSchema);

export const SelectionLogicSchema: z.ZodType<SelectionLogic, z.ZodTypeDef, unknown> = z.object({
  decision_tree: DecisionTreeSchema,
  quick_selection: z
    .object({ keywords: z.record(z.string(), z.array(z.string())) })
    .default({ keywords: {} }),
  compatibility_matrix: z
    .object({
      matrix: z.record(
        z.string(),
        z.object({ not_compatible_with: z.array(z.string()).optional() })
      )
    })
    .default({ matrix: {} })
});
