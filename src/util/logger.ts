import pino from 'pino';
import { CFG } from '../config';

/**
 * Paths redacted from every log line. Field collection handles contact data,
 * so anything that looks like it is masked wherever it is nested.
 */
export const REDACT_PATHS = [
  '*.phone',
  '*.email',
  '*.password',
  '*.token'
];

export const log = pino({
  level: CFG.LOG_LEVEL,
  redact: { paths: REDACT_PATHS, censor: '[REDACTED]' }
});

export type Logger = typeof log;
