/**
 * Error types surfaced to agents and the CLI.
 * `type` is what appears in the error envelope.
 */

import type { ValidationRule } from './policy/types.js';

export type ViewQueryErrorType = 'QueryValidationError' | 'RemoteExecutionError' | 'ConfigError';

export class ViewQueryError extends Error {
  readonly type: ViewQueryErrorType;
  readonly suggestion?: string;
  readonly details?: unknown;

  constructor(type: ViewQueryErrorType, message: string, suggestion?: string, details?: unknown) {
    super(message);
    this.name = type;
    this.type = type;
    this.suggestion = suggestion;
    this.details = details;
  }
}

export class QueryValidationError extends ViewQueryError {
  readonly rule: ValidationRule;
  readonly offendingKeyword?: string;

  constructor(rule: ValidationRule, message: string, suggestion?: string, offendingKeyword?: string) {
    super('QueryValidationError', message, suggestion, { rule, offendingKeyword });
    this.rule = rule;
    this.offendingKeyword = offendingKeyword;
  }
}

export class RemoteExecutionError extends ViewQueryError {
  constructor(message: string, details?: unknown, suggestion?: string) {
    super('RemoteExecutionError', message, suggestion, details);
  }
}

export class ConfigError extends ViewQueryError {
  constructor(message: string, details?: unknown) {
    super('ConfigError', message, 'Check the environment variables or the .env file.', details);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
