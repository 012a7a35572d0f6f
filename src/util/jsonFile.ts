import { existsSync, readFileSync } from 'fs';
import { ConfigLoadError } from './errors';

export function readJSON(path: string): unknown {
  if (!existsSync(path)) {
    throw new ConfigLoadError(`Config file ${path} not found`, 'CONFIG_NOT_FOUND', path);
  }
  const raw = readFileSync(path, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigLoadError(`Config file ${path} is not valid JSON: ${detail}`, 'CONFIG_INVALID_JSON', path);
  }
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
