export * from './types';
export { TemplateSelector, type SelectorOptions } from './engine/selector';
export { loadSelectionLogic, loadTemplateCatalog, type ConfigSource } from './engine/loadConfig';
export { lintSelectionLogic, type LintDiagnostic, type LintResult } from './engine/lint';
export { parseCondition, evaluateCondition, type ParsedCondition } from './engine/condition';
export { baseTemplateFor, TEMPLATE } from './engine/baseTemplate';
export { STEP, SCENARIO, SUGGESTED_TEMPLATE_KEY } from './engine/answers';
export { FieldCollector, parseAmount, type CollectedData, type FieldValue } from './catalog/fieldCollector';
export { listTemplates, getTemplate, type TemplateSummary } from './catalog/templateCatalog';
export { SessionManager, type SessionState, type SessionManagerOptions } from './state/sessionManager';
export { runQuestionnaire, parseAnswer } from './cli/questionnaire';
export { ConfigLoadError, SessionNotFoundError } from './util/errors';
