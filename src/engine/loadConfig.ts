import type { ZodType, ZodTypeDef } from 'zod';
import { SelectionLogicSchema } from '../schemas/selectionLogic';
import { TemplateCatalogSchema } from '../schemas/templateCatalog';
import type { SelectionLogic, TemplateCatalog } from '../types';
import { ConfigLoadError } from '../util/errors';
import { deepFreeze, readJSON } from '../util/jsonFile';
import { log } from '../util/logger';

/** A payload given by value, or a path to the JSON file that holds it. */
export type ConfigSource = string | object;

function loadPayload<T>(source: ConfigSource, schema: ZodType<T, ZodTypeDef, unknown>, label: string): T {
  const path = typeof source === 'string' ? source : undefined;
  const raw = path === undefined ? source : readJSON(path);

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const summary = parsed.error.issues
      .slice(0, 3)
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigLoadError(`Invalid ${label}: ${summary}`, 'CONFIG_SCHEMA', path, parsed.error.issues);
  }

  log.debug({ label, path }, 'Loaded configuration payload');
  return deepFreeze(parsed.data);
}

export function loadTemplateCatalog(source: ConfigSource): TemplateCatalog {
  return loadPayload(source, TemplateCatalogSchema, 'template catalog');
}

export function loadSelectionLogic(source: ConfigSource): SelectionLogic {
  return loadPayload(source, SelectionLogicSchema, 'selection logic');
}
