import type { ZodError } from 'zod';

/**
 * Base class for errors the engine raises on purpose.
 * Data gaps (unresolved names, missing prices) are never errors; they are
 * returned as data alongside results.
 */
export abstract class EngineError extends Error {
  abstract readonly code: string;

  constructor(
    message: string,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Malformed or empty holdings, weights or configuration.
 * Aborts processing for the entity named by `entityId` only.
 */
export class ConfigurationError extends EngineError {
  readonly code = 'CONFIGURATION_ERROR';

  constructor(
    public readonly entityId: string,
    message: string,
    cause?: Error
  ) {
    super(`[${entityId}] ${message}`, cause);
  }

  static fromZod(entityId: string, context: string, error: ZodError): ConfigurationError {
    const details = error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return new ConfigurationError(entityId, `${context}: ${details}`, error);
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
