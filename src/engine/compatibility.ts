import { incompatibilityWarning, MODIFICATIONS } from '../prompts/reasons';
import type { AnswerValue, CompatibilityEntry, CompatibilityReport, Modification } from '../types';

/**
 * Templates missing from the matrix have no known incompatibilities.
 */
export function checkCompatibility(
  matrix: Record<string, CompatibilityEntry>,
  baseTemplate: string,
  scenarios: readonly AnswerValue[]
): CompatibilityReport {
  const entry = Object.hasOwn(matrix, baseTemplate) ? matrix[baseTemplate] : undefined;
  const incompatible = entry?.not_compatible_with ?? [];

  const warnings = scenarios
    .filter((s): s is string => typeof s === 'string' && incompatible.includes(s))
    .map(s => incompatibilityWarning(baseTemplate, s));

  return { compatible: warnings.length === 0, warnings };
}

/**
 * Suggested adjustments per special scenario. The template id does not vary
 * the output yet.
 */
export function recommendedModifications(_templateId: string, scenarios: readonly AnswerValue[]): Modification[] {
  // Output order follows the table, not the scenario list
  return Object.entries(MODIFICATIONS)
    .filter(([scenario]) => scenarios.includes(scenario))
    .map(([, modification]) => ({ ...modification, items: [...modification.items] }));
}
