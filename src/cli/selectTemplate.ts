#!/usr/bin/env node
import { createInterface } from 'node:readline/promises';
import { FieldCollector } from '../catalog/fieldCollector';
import { CFG } from '../config';
import { loadSelectionLogic, loadTemplateCatalog } from '../engine/loadConfig';
import { TemplateSelector } from '../engine/selector';
import type { TemplateResult } from '../types';
import { log } from '../util/logger';
import { formatQuestion, runQuestionnaire } from './questionnaire';
import { formatSelectionReport } from './report';

// Usage: select-template [free text describing the product]
async function main() {
  const catalog = loadTemplateCatalog(CFG.TEMPLATES_PATH);
  const selector = new TemplateSelector(catalog, loadSelectionLogic(CFG.SELECTION_LOGIC_PATH));
  const fields = new FieldCollector(catalog);
  const freeText = process.argv.slice(2).join(' ').trim();

  let result: TemplateResult | undefined = freeText ? selector.quickSelect(freeText) : undefined;

  if (!result) {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
      result = await runQuestionnaire(selector, question => rl.question(`\n${formatQuestion(question)}\n> `));
    } finally {
      rl.close();
    }
  }

  console.log(`\n${formatSelectionReport(selector, fields, result)}`);
}

if (require.main === module) {
  main().catch(error => {
    log.error({ err: error }, 'Template selection failed');
    process.exit(1);
  });
}
