import { getTemplate } from '../catalog/templateCatalog';
import { CFG } from '../config';
import { PRIORITY, REASONS } from '../prompts/reasons';
import type {
  Answer,
  AnswerSet,
  AnswerValue,
  CompatibilityReport,
  ConditionalStep,
  DecisionStep,
  KeywordMatch,
  Modification,
  QuestionResult,
  ResolvedTemplate,
  SelectionLogic,
  SelectionResult,
  TemplateCatalog,
  TemplateInfo,
  ThenBlock
} from '../types';
import { readAnswer, scenariosOf, SCENARIO, SUGGESTED_TEMPLATE_KEY } from './answers';
import { baseTemplateFor, TEMPLATE } from './baseTemplate';
import { checkCompatibility, recommendedModifications } from './compatibility';
import { evaluateCondition, parseCondition } from './condition';
import { matchKeywords } from './keywords';
import { loadSelectionLogic, loadTemplateCatalog, type ConfigSource } from './loadConfig';
import { compileRules, firstMatchingRule, type CompiledRule } from './rules';

export interface SelectorOptions {
  /** Decision-tree node a fresh or reset session starts from. */
  initialStep?: string;
  /** Used when neither a rule nor the base mapping yields a template. */
  defaultTemplate?: string;
}

const RULES_KEY = 'template_selection';

function isConditional(step: DecisionStep): step is ConditionalStep {
  return 'condition' in step;
}

function copyAnswer(answer: Answer): Answer {
  return Array.isArray(answer) ? [...answer] : answer;
}

/**
 * One questionnaire session. Walks the decision tree a step at a time over
 * the recorded answers and resolves a landing template once the tree is
 * exhausted. Configuration is shared read-only; the answer set and step
 * pointer belong to this instance alone.
 */
export class TemplateSelector {
  private answers: AnswerSet = {};
  private currentStep: string;
  private readonly initialStep: string;
  private readonly defaultTemplate: string;
  private readonly rules: CompiledRule[];

  constructor(
    private readonly catalog: TemplateCatalog,
    private readonly logic: SelectionLogic,
    options: SelectorOptions = {}
  ) {
    this.initialStep = options.initialStep ?? CFG.INITIAL_STEP;
    this.defaultTemplate = options.defaultTemplate ?? CFG.DEFAULT_TEMPLATE;
    this.currentStep = this.initialStep;
    this.rules = compileRules(logic.decision_tree.template_selection.rules);
  }

  /** Builds a selector from payloads given by value or as JSON file paths. */
  static fromSources(templates: ConfigSource, logic: ConfigSource, options: SelectorOptions = {}): TemplateSelector {
    return new TemplateSelector(loadTemplateCatalog(templates), loadSelectionLogic(logic), options);
  }

  get stepId(): string {
    return this.currentStep;
  }

  /** Copy of the recorded answers. */
  get answerSet(): AnswerSet {
    return Object.fromEntries(Object.entries(this.answers).map(([key, value]): [string, Answer] => [key, copyAnswer(value)]));
  }

  recordAnswer(stepId: string, answer: Answer): SelectionResult {
    this.answers[stepId] = copyAnswer(answer);
    return this.advance();
  }

  advance(): SelectionResult {
    return this.advanceFrom(new Set());
  }

  // `followed` holds the question steps whose next_step this call already took
  private advanceFrom(followed: Set<string>): SelectionResult {
    const step = this.stepAt(this.currentStep);
    if (!step) return this.resolve();

    if (isConditional(step)) {
      const { if: ifCondition, then, elif = {} } = step.condition;
      const branches: Array<[string, ThenBlock]> = [[ifCondition, then], ...Object.entries(elif)];
      const winner = branches.find(([source]) => evaluateCondition(parseCondition(source), this.answers));
      if (winner) return this.takeBranch(winner[1]);

      // No branch matched: re-evaluate the unchanged pointer. Terminates only
      // for trees whose branches are exhaustive (see lintSelectionLogic).
      return this.advanceFrom(followed);
    }

    if (
      step.next_step !== undefined &&
      readAnswer(this.answers, this.currentStep) !== undefined &&
      !followed.has(this.currentStep)
    ) {
      followed.add(this.currentStep);
      this.currentStep = step.next_step;
      return this.advanceFrom(followed);
    }

    return this.question(step.question, step);
  }

  resolve(): ResolvedTemplate {
    const scenarios = scenariosOf(this.answers);

    if (scenarios.includes(SCENARIO.B2B)) {
      return this.fixed('b2b', TEMPLATE.B2B);
    }
    if (scenarios.includes(SCENARIO.PRE_ORDER)) {
      return this.fixed('pre_order', TEMPLATE.PRE_ORDER);
    }
    if (scenarios.includes(SCENARIO.LIMITED_OFFER)) {
      const baseTemplate = this.baseTemplate();
      if (baseTemplate !== undefined) {
        return { ...this.fixed('limited_offer', TEMPLATE.LIMITED_OFFER), baseTemplate };
      }
    }

    const suggested = readAnswer(this.answers, SUGGESTED_TEMPLATE_KEY);
    if (typeof suggested === 'string') {
      return this.fixed('suggestion', suggested);
    }

    return this.applyRules();
  }

  applyRules(): ResolvedTemplate {
    const rule = firstMatchingRule(this.rules, this.answers);
    if (rule) {
      return {
        kind: 'template',
        source: 'rule',
        template: rule.template,
        reason: rule.reason,
        priority: rule.priority ?? 'medium',
        override: rule.override ?? false
      };
    }
    return this.fixed('default', this.baseTemplate() ?? this.defaultTemplate);
  }

  baseTemplate(): string | undefined {
    return baseTemplateFor(this.answers);
  }

  /** Keyword shortcut; reads neither the tree nor the answers. */
  quickSelect(text: string): KeywordMatch | undefined {
    const template = matchKeywords(this.logic.quick_selection.keywords, text);
    if (template === undefined) return undefined;
    return { kind: 'template', source: 'keyword', template, reason: REASONS.keyword, confidence: 'medium' };
  }

  checkCompatibility(baseTemplate: string, scenarios: readonly AnswerValue[]): CompatibilityReport {
    return checkCompatibility(this.logic.compatibility_matrix.matrix, baseTemplate, scenarios);
  }

  recommendedModifications(templateId: string, scenarios: readonly AnswerValue[]): Modification[] {
    return recommendedModifications(templateId, scenarios);
  }

  getTemplateInfo(templateId: string): TemplateInfo | undefined {
    return getTemplate(this.catalog, templateId);
  }

  reset(): void {
    this.answers = {};
    this.currentStep = this.initialStep;
  }

  private stepAt(stepId: string): DecisionStep | undefined {
    const tree = this.logic.decision_tree;
    if (stepId === RULES_KEY || !Object.hasOwn(tree, stepId)) return undefined;
    const node = tree[stepId];
    return 'condition' in node || 'question' in node ? node : undefined;
  }

  private takeBranch(branch: ThenBlock): QuestionResult {
    if (branch.next_step !== undefined) {
      this.currentStep = branch.next_step;
    }
    if (branch.template_suggestion !== undefined) {
      this.answers[SUGGESTED_TEMPLATE_KEY] = branch.template_suggestion;
    }
    return this.question(branch.question, branch);
  }

  private question(prompt: string, source: { options: QuestionResult['options'] }): QuestionResult {
    return { kind: 'question', prompt, options: source.options, stepId: this.currentStep };
  }

  private fixed(source: keyof typeof PRIORITY, template: string): ResolvedTemplate {
    return { kind: 'template', source, template, reason: REASONS[source], priority: PRIORITY[source] };
  }
}
