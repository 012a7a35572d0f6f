/**
 * Selection-logic linter.
 *
 * The engine does not guard against authoring mistakes in its configuration:
 * malformed conditions evaluate to false, an unknown next_step ends the
 * questionnaire early, a conditional node with no matching branch never
 * returns, and answered question nodes may chain back on themselves. This linter finds those mistakes before a payload ships.
 *
 * Exit codes: 0 = clean, 1 = errors, 2 = warnings only.
 */

import type { DecisionStep, SelectionLogic, TemplateCatalog, ThenBlock } from '../types';
import { parseCondition, type EqualsCondition } from './condition';
import { UNPRIORITISED } from './rules';

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export interface LintDiagnostic {
  level: 'error' | 'warning';
  stepId: string;
  path: string;
  message: string;
}

export interface LintResult {
  errors: LintDiagnostic[];
  warnings: LintDiagnostic[];
  exitCode: 0 | 1 | 2;
}

const RULES_KEY = 'template_selection';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function err(diags: LintDiagnostic[], stepId: string, path: string, message: string): void {
  diags.push({ level: 'error', stepId, path, message });
}

function warn(diags: LintDiagnostic[], stepId: string, path: string, message: string): void {
  diags.push({ level: 'warning', stepId, path, message });
}

function stepsOf(logic: SelectionLogic): Map<string, DecisionStep> {
  const steps = new Map<string, DecisionStep>();
  for (const [stepId, node] of Object.entries(logic.decision_tree)) {
    if (stepId === RULES_KEY) continue;
    if ('condition' in node || 'question' in node) steps.set(stepId, node);
  }
  return steps;
}

function checkNextStep(
  diags: LintDiagnostic[],
  steps: Map<string, DecisionStep>,
  stepId: string,
  path: string,
  nextStep: string | undefined
): void {
  // template_selection is the explicit "resolve now" target
  if (nextStep === undefined || nextStep === RULES_KEY || steps.has(nextStep)) return;
  err(diags, stepId, path, `next_step "${nextStep}" does not name a step; the questionnaire would resolve early`);
}

/**
 * A conditional node is provably exhaustive when every branch tests the same
 * key, that key is a question step with options, and each option id has a
 * branch.
 */
function isExhaustive(conditions: EqualsCondition[], steps: Map<string, DecisionStep>): boolean {
  if (conditions.length === 0) return false;
  const key = conditions[0].key;
  if (conditions.some(c => c.key !== key)) return false;

  const tested = steps.get(key);
  if (!tested || !('question' in tested) || tested.options.length === 0) return false;
  const covered = new Set(conditions.map(c => c.literal));
  return tested.options.every(option => covered.has(option.id));
}

// ---------------------------------------------------------------------------
// Checks
// ---------------------------------------------------------------------------

function lintSteps(diags: LintDiagnostic[], steps: Map<string, DecisionStep>, templateIds?: Set<string>): void {
  for (const [stepId, step] of steps) {
    if (!('condition' in step)) {
      checkNextStep(diags, steps, stepId, 'next_step', step.next_step);
      continue;
    }

    const { if: ifCondition, then, elif = {} } = step.condition;
    const branches: Array<[string, string, ThenBlock]> = [
      ['condition.if', ifCondition, then],
      ...Object.entries(elif).map(([source, block]): [string, string, ThenBlock] => [`condition.elif["${source}"]`, source, block])
    ];

    const parsed: EqualsCondition[] = [];
    for (const [path, source, block] of branches) {
      const condition = parseCondition(source);
      if (condition.kind === 'malformed') {
        err(diags, stepId, path, `Condition "${source}" is not of the form key == 'literal'; it always evaluates to false`);
      } else {
        parsed.push(condition);
      }

      checkNextStep(diags, steps, stepId, `${path}.next_step`, block.next_step);
      if (block.next_step === undefined) {
        warn(diags, stepId, `${path}.next_step`, 'Branch has no next_step; answering it re-enters the same node');
      }
      if (block.template_suggestion !== undefined && templateIds && !templateIds.has(block.template_suggestion)) {
        err(diags, stepId, `${path}.template_suggestion`, `Unknown template "${block.template_suggestion}"`);
      }
    }

    if (parsed.length === branches.length && !isExhaustive(parsed, steps)) {
      warn(diags, stepId, 'condition', 'Branches are not provably exhaustive; an unmatched answer never resolves');
    }
  }
}

/**
 * Answered question nodes follow next_step without asking again, so a chain of
 * them leading back to its start would loop. The engine stops such a chain at
 * the first repeated step; the author almost certainly meant something else.
 */
function lintQuestionChains(diags: LintDiagnostic[], steps: Map<string, DecisionStep>): void {
  for (const [start, step] of steps) {
    if ('condition' in step || step.next_step === undefined) continue;

    const visited = new Set<string>([start]);
    const chain = [start];
    let next: string | undefined = step.next_step;
    while (next !== undefined) {
      if (next === start) {
        err(diags, start, 'next_step', `next_step chain ${[...chain, start].join(' -> ')} loops once its questions are answered`);
        break;
      }
      const node = steps.get(next);
      if (!node || 'condition' in node || visited.has(next)) break;
      visited.add(next);
      chain.push(next);
      next = node.next_step;
    }
  }
}

function lintRules(diags: LintDiagnostic[], logic: SelectionLogic, templateIds?: Set<string>): void {
  if (logic.decision_tree.template_selection.rules.length === 0) {
    warn(diags, RULES_KEY, 'rules', 'No selection rules configured; resolution falls back to the base template');
  }

  const seen = new Map<number, number>();
  logic.decision_tree.template_selection.rules.forEach((rule, index) => {
    const path = `rules[${index}]`;
    if (templateIds && !templateIds.has(rule.template)) {
      err(diags, RULES_KEY, `${path}.template`, `Unknown template "${rule.template}"`);
    }
    const priority = rule.priority ?? UNPRIORITISED;
    const first = seen.get(priority);
    if (first !== undefined) {
      warn(diags, RULES_KEY, `${path}.priority`, `Priority ${priority} is shared with rules[${first}]; configured order decides`);
    } else {
      seen.set(priority, index);
    }
  });
}

function lintKeywords(diags: LintDiagnostic[], logic: SelectionLogic, templateIds?: Set<string>): void {
  for (const [template, keywords] of Object.entries(logic.quick_selection.keywords)) {
    const path = `quick_selection.keywords.${template}`;
    if (templateIds && !templateIds.has(template)) {
      err(diags, template, path, `Unknown template "${template}"`);
    }
    if (keywords.some(keyword => keyword.trim() === '')) {
      err(diags, template, path, 'Empty keyword matches every input');
    }
  }
}

function lintMatrix(diags: LintDiagnostic[], logic: SelectionLogic, templateIds?: Set<string>): void {
  if (!templateIds) return;
  for (const template of Object.keys(logic.compatibility_matrix.matrix)) {
    if (!templateIds.has(template)) {
      err(diags, template, `compatibility_matrix.matrix.${template}`, `Unknown template "${template}"`);
    }
  }
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

export function lintSelectionLogic(logic: SelectionLogic, catalog?: TemplateCatalog): LintResult {
  const diags: LintDiagnostic[] = [];
  const steps = stepsOf(logic);
  const templateIds = catalog ? new Set(Object.keys(catalog.templates)) : undefined;

  lintSteps(diags, steps, templateIds);
  lintQuestionChains(diags, steps);
  lintRules(diags, logic, templateIds);
  lintKeywords(diags, logic, templateIds);
  lintMatrix(diags, logic, templateIds);

  const byLocation = (a: LintDiagnostic, b: LintDiagnostic) =>
    a.stepId.localeCompare(b.stepId) || a.path.localeCompare(b.path);
  const errors = diags.filter(d => d.level === 'error').sort(byLocation);
  const warnings = diags.filter(d => d.level === 'warning').sort(byLocation);

  return {
    errors,
    warnings,
    exitCode: errors.length > 0 ? 1 : warnings.length > 0 ? 2 : 0
  };
}
