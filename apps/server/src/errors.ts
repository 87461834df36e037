import { ViewQueryError } from '@viewquery/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_POLICY = 3;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'CONFIG_INVALID'
  | 'QUERY_REJECTED'
  | 'REMOTE_QUERY_FAILED'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime' | 'policy';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly suggestion?: string;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, suggestion?: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.suggestion = suggestion;
    this.details = details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, undefined, details);
}

export function runtimeError(message: string, suggestion?: string, details?: unknown): CliError {
  return new CliError('runtime', 'REMOTE_QUERY_FAILED', message, suggestion, details);
}

export function policyError(message: string, suggestion?: string, details?: unknown): CliError {
  return new CliError('policy', 'QUERY_REJECTED', message, suggestion, details);
}

/** Map a core error onto the CLI's kinds. */
export function fromCoreError(error: ViewQueryError): CliError {
  switch (error.type) {
    case 'QueryValidationError':
      return policyError(error.message, error.suggestion, error.details);
    case 'ConfigError':
      return new CliError('usage', 'CONFIG_INVALID', error.message, error.suggestion, error.details);
    case 'RemoteExecutionError':
      return runtimeError(error.message, error.suggestion, error.details);
  }
}

export function toExitCode(error: unknown): number {
  const cliError = error instanceof ViewQueryError ? fromCoreError(error) : error;
  if (cliError instanceof CliError) {
    if (cliError.kind === 'usage') return EXIT_CODE_USAGE;
    if (cliError.kind === 'policy') return EXIT_CODE_POLICY;
    return EXIT_CODE_RUNTIME;
  }
  return EXIT_CODE_RUNTIME;
}
