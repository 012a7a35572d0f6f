import type { FieldCollector } from '../catalog/fieldCollector';
import { scenariosOf } from '../engine/answers';
import type { TemplateSelector } from '../engine/selector';
import type { LintResult } from '../engine/lint';
import type { TemplateResult } from '../types';

/** Human-readable summary of a selection, printed by the CLI. */
export function formatSelectionReport(selector: TemplateSelector, fields: FieldCollector, result: TemplateResult): string {
  const info = selector.getTemplateInfo(result.template);
  const label = result.source === 'keyword' ? `confidence: ${result.confidence}` : `priority: ${result.priority}`;
  const lines = [
    `Template: ${result.template}${info ? ` (${info.name})` : ''}`,
    `Reason: ${result.reason} [${label}]`
  ];

  if (result.source !== 'keyword' && result.baseTemplate !== undefined) {
    lines.push(`Base template: ${result.baseTemplate}`);
  }

  const scenarios = scenariosOf(selector.answerSet);
  const base = result.source !== 'keyword' && result.baseTemplate !== undefined ? result.baseTemplate : result.template;
  const compatibility = selector.checkCompatibility(base, scenarios);
  lines.push(`Compatible: ${compatibility.compatible ? 'yes' : 'no'}`);
  compatibility.warnings.forEach(w => lines.push(`  ! ${w}`));

  for (const mod of selector.recommendedModifications(result.template, scenarios)) {
    lines.push(`Modification (${mod.type}): ${mod.description} -> ${mod.items.join(', ')}`);
  }

  const required = fields.requiredFields(result.template).map(([fieldId]) => fieldId);
  if (required.length > 0) {
    lines.push(`Fields to collect: ${required.join(', ')}`);
  }

  return lines.join('\n');
}

export function formatLintResult(result: LintResult): string {
  const lines = [...result.errors, ...result.warnings].map(
    d => `${d.level.toUpperCase()} ${d.stepId} ${d.path}: ${d.message}`
  );
  lines.push(`${result.errors.length} error(s), ${result.warnings.length} warning(s)`);
  return lines.join('\n');
}
