import type { TemplateCatalog, TemplateInfo } from '../types';

export interface TemplateSummary {
  id: string;
  name: string;
  description: string;
  useCase: string;
}

export function getTemplate(catalog: TemplateCatalog, templateId: string): TemplateInfo | undefined {
  return Object.hasOwn(catalog.templates, templateId) ? catalog.templates[templateId] : undefined;
}

export function listTemplates(catalog: TemplateCatalog): TemplateSummary[] {
  return Object.entries(catalog.templates).map(([id, info]) => ({
    id,
    name: info.name,
    description: info.description ?? '',
    useCase: info.use_case ?? ''
  }));
}
