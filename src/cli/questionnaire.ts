import { STEP } from '../engine/answers';
import type { TemplateSelector } from '../engine/selector';
import type { Answer, QuestionResult, ResolvedTemplate } from '../types';

export type AskFn = (question: QuestionResult) => Promise<string>;

/** Steps whose answer is a list of option ids rather than a single one. */
export const MULTI_SELECT_STEPS = new Set<string>([STEP.SPECIAL_SCENARIOS]);

// A well-formed tree never asks more than a handful of questions; stop a
// misconfigured one that keeps re-asking the same node.
const MAX_QUESTIONS = 50;

function resolveToken(token: string, question: QuestionResult): string | undefined {
  const index = Number(token);
  if (Number.isInteger(index) && index >= 1 && index <= question.options.length) {
    return question.options[index - 1].id;
  }
  return question.options.find(o => o.id === token)?.id;
}

/**
 * Reads an answer typed as option numbers (1-based) or option ids. Multi-select
 * steps take a comma separated list, where an empty line means "none".
 * Returns undefined when the input names no option.
 */
export function parseAnswer(input: string, question: QuestionResult): Answer | undefined {
  const trimmed = input.trim();

  if (MULTI_SELECT_STEPS.has(question.stepId)) {
    if (trimmed === '' || trimmed === '0') return [];
    const ids = trimmed.split(',').map(token => resolveToken(token.trim(), question));
    if (ids.some(id => id === undefined)) return undefined;
    return [...new Set(ids.filter((id): id is string => id !== undefined))];
  }

  return resolveToken(trimmed, question);
}

export function formatQuestion(question: QuestionResult): string {
  const lines = [question.prompt, ...question.options.map((o, i) => `  ${i + 1}. ${o.label} (${o.id})`)];
  if (MULTI_SELECT_STEPS.has(question.stepId)) {
    lines.push('  Several answers: comma separated. None: leave empty.');
  }
  return lines.join('\n');
}

/**
 * Drives a selector from its current step to a resolved template, asking each
 * question through `ask` and re-asking when the answer names no option.
 */
export async function runQuestionnaire(selector: TemplateSelector, ask: AskFn): Promise<ResolvedTemplate> {
  let result = selector.advance();
  let asked = 0;

  while (result.kind === 'question') {
    if (asked >= MAX_QUESTIONS) {
      throw new Error(`Questionnaire did not resolve after ${MAX_QUESTIONS} questions; check the decision tree with lint-selection-logic`);
    }
    asked += 1;

    const question = result;
    const answer = parseAnswer(await ask(question), question);
    if (answer === undefined) continue;
    result = selector.recordAnswer(question.stepId, answer);
  }

  return result;
}
