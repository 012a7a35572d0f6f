import type { ZodIssue } from 'zod';

export type ConfigErrorCode = 'CONFIG_NOT_FOUND' | 'CONFIG_INVALID_JSON' | 'CONFIG_SCHEMA';

/**
 * Raised while loading a configuration payload. The engine itself never
 * throws; only the file and schema boundary does.
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigErrorCode,
    public readonly path?: string,
    public readonly issues: ZodIssue[] = []
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

export class SessionNotFoundError extends Error {
  readonly code = 'SESSION_NOT_FOUND';

  constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} not found`);
    this.name = 'SessionNotFoundError';
  }
}
