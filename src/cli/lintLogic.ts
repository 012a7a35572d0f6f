#!/usr/bin/env node
import { CFG } from '../config';
import { lintSelectionLogic } from '../engine/lint';
import { loadSelectionLogic, loadTemplateCatalog } from '../engine/loadConfig';
import { log } from '../util/logger';
import { formatLintResult } from './report';

// Usage: lint-selection-logic [selection-logic.json] [templates.json]
function main() {
  const [logicPath = CFG.SELECTION_LOGIC_PATH, templatesPath = CFG.TEMPLATES_PATH] = process.argv.slice(2);
  const result = lintSelectionLogic(loadSelectionLogic(logicPath), loadTemplateCatalog(templatesPath));
  console.log(formatLintResult(result));
  process.exitCode = result.exitCode;
}

if (require.main === module) {
  try {
    main();
  } catch (error) {
    log.error({ err: error }, 'Could not lint selection logic');
    process.exit(1);
  }
}
