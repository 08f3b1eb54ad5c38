/**
 * Error taxonomy for the ingestion pipeline.
 * Budget denial during a scheduled tick is a normal outcome, not an error; BudgetDeniedError
 * only exists for ad-hoc queries that must report the denial to an HTTP caller.
 */
export class AuthError extends Error {
  constructor(message: string, readonly retryable: boolean) {
    super(message);
    this.name = 'AuthError';
  }
}

export class UpstreamTransportError extends Error {
  constructor(
    message: string,
    readonly status: number | null = null,
    readonly retryAfterSec: number | null = null,
  ) {
    super(message);
    this.name = 'UpstreamTransportError';
  }
}

export class MalformedRecordError extends Error {
  constructor(message: string, readonly index: number) {
    super(message);
    this.name = 'MalformedRecordError';
  }
}

export class MalformedPayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedPayloadError';
  }
}

export class ConfigurationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

export class BudgetDeniedError extends Error {
  constructor(readonly cost: number, readonly retryAt: number | null) {
    super(`Credit budget exhausted, query costing ${cost} credit(s) denied`);
    this.name = 'BudgetDeniedError';
  }
}

export const errorMessage = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};
