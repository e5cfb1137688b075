/**
 * Extract error message from unknown error type
 *
 * Safely handles Error objects, strings, and other types that may be thrown.
 * Always returns a string, never throws.
 *
 * @param error - Error of any type
 * @returns String message describing the error
 * @example
 * try { } catch (err) {
 *   logger.error({ error: getErrorMessage(err) });
 * }
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * A CSV row or channel message that does not match the visit record schema.
 * Recovered by skipping the offending input.
 */
export class RecordValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'RecordValidationError';
  }
}

/**
 * Broker communication failed and the retry budget is spent.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * One or more settings failed validation at startup.
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}
