import { z } from 'zod';
import type { TemplateCatalog } from '../types';

export const TemplateInfoSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    use_case: z.string().optional(),
    required_fields: z.record(z.string(), z.string()).optional()
  })
  .passthrough();

export const TemplateCatalogSchema: z.ZodType<TemplateCatalog, z.ZodTypeDef, unknown> = z.object({
  templates: z.record(z.string(), TemplateInfoSchema),
  field_prompts: z.record(z.string(), z.string()).optional()
});
