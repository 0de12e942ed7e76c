/**
 * Error taxonomy shared by tools, providers and the agent loop.
 *
 * Tools never let these escape: they are rendered into `{"error": ...}`
 * payloads. Provider, budget and config errors propagate to the caller.
 */

export type ErrorCode =
  | 'TRANSIENT'
  | 'NOT_FOUND'
  | 'SCHEMA'
  | 'BUDGET_EXCEEDED'
  | 'PROVIDER'
  | 'CONFIG';

export class AlmanacError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AlmanacError';
  }
}

/** Timeout, connection failure or non-2xx response from an upstream service */
export class TransientError extends AlmanacError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, 'TRANSIENT', options);
    this.name = 'TransientError';
    this.status = options?.status;
  }
}

/** Upstream answered but has no matching entity */
export class NotFoundError extends AlmanacError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'NOT_FOUND', options);
    this.name = 'NotFoundError';
  }
}

/** Upstream payload does not have the expected shape */
export class SchemaError extends AlmanacError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'SCHEMA', options);
    this.name = 'SchemaError';
  }
}

export class BudgetExceededError extends AlmanacError {
  constructor(
    public readonly maxRounds: number,
    public readonly pendingTools: string[] = [],
  ) {
    const pending = pendingTools.length > 0 ? ` (model still requesting: ${pendingTools.join(', ')})` : '';
    super(`Agent did not produce an answer within ${maxRounds} rounds${pending}`, 'BUDGET_EXCEEDED');
    this.name = 'BudgetExceededError';
  }
}

export class ProviderError extends AlmanacError {
  constructor(
    message: string,
    public readonly providerId?: string,
    options?: { cause?: unknown },
  ) {
    super(message, 'PROVIDER', options);
    this.name = 'ProviderError';
  }
}

export class ConfigError extends AlmanacError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG', options);
    this.name = 'ConfigError';
  }
}

export function isAlmanacError(err: unknown): err is AlmanacError {
  return err instanceof AlmanacError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
