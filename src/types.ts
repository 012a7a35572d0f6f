// Answers

export type AnswerValue = string | number | boolean;
export type Answer = AnswerValue | AnswerValue[];
export type AnswerSet = Record<string, Answer>;

// Decision tree

export interface AnswerOption {
  id: string;
  label: string;
}

export interface ThenBlock {
  question: string;
  options: AnswerOption[];
  next_step?: string;
  template_suggestion?: string;
}

export interface ConditionalBlock {
  if: string;
  then: ThenBlock;
  elif?: Record<string, ThenBlock>; // condition string -> branch, in listed order
}

export interface QuestionStep {
  question: string;
  options: AnswerOption[];
  next_step?: string; // followed once this step has a recorded answer
}

export interface ConditionalStep {
  condition: ConditionalBlock;
}

export type DecisionStep = QuestionStep | ConditionalStep;

export type ConditionValue = AnswerValue | AnswerValue[];

export interface SelectionRule {
  priority?: number; // lower runs first
  conditions: Record<string, ConditionValue>;
  template: string;
  reason: string;
  override?: boolean;
}

export interface TemplateSelection {
  rules: SelectionRule[];
}

export interface DecisionTree {
  template_selection: TemplateSelection;
  [stepId: string]: DecisionStep | TemplateSelection;
}

export interface CompatibilityEntry {
  not_compatible_with?: string[];
}

export interface SelectionLogic {
  decision_tree: DecisionTree;
  quick_selection: { keywords: Record<string, string[]> };
  compatibility_matrix: { matrix: Record<string, CompatibilityEntry> };
}

// Template catalog

export interface TemplateInfo {
  name: string;
  description?: string;
  use_case?: string;
  required_fields?: Record<string, string>; // field id -> field type, in prompt order
  [key: string]: unknown;
}

export interface TemplateCatalog {
  templates: Record<string, TemplateInfo>;
  field_prompts?: Record<string, string>;
}

// Engine results

export type PriorityLabel = 'highest' | 'high' | 'medium' | 'low';

export type ResolutionSource =
  | 'b2b'
  | 'pre_order'
  | 'limited_offer'
  | 'suggestion'
  | 'rule'
  | 'default';

export interface QuestionResult {
  kind: 'question';
  prompt: string;
  options: AnswerOption[];
  stepId: string;
}

export interface ResolvedTemplate {
  kind: 'template';
  source: ResolutionSource;
  template: string;
  reason: string;
  priority: PriorityLabel | number;
  baseTemplate?: string;
  override?: boolean;
}

export interface KeywordMatch {
  kind: 'template';
  source: 'keyword';
  template: string;
  reason: string;
  confidence: 'medium';
}

export type TemplateResult = ResolvedTemplate | KeywordMatch;
export type SelectionResult = QuestionResult | ResolvedTemplate;

export interface CompatibilityReport {
  compatible: boolean;
  warnings: string[];
}

export interface Modification {
  type: 'design' | 'urgency';
  description: string;
  items: string[];
}
