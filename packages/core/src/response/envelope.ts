/**
 * Uniform JSON envelopes for tool responses, and the size budget that
 * keeps them readable by an agent.
 */

import { SAFE_DEFAULTS } from '../db/defaults.js';
import type { Row } from '../db/types.js';
import { ViewQueryError, errorMessage } from '../errors.js';

export interface TruncationFields {
  _truncated?: true;
  _message?: string;
}

export interface QueryEnvelope extends TruncationFields {
  success: true;
  query: string;
  row_count: number;
  execution_time_ms: number;
  data: Row[];
}

export interface ErrorEnvelope {
  success: false;
  error: {
    type: string;
    message: string;
    suggestion?: string;
  };
}

/** Length of the envelope as sent to the agent */
export function serializedLength(value: unknown): number {
  return JSON.stringify(value, null, 2).length;
}

export function serializeEnvelope(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * Largest number of leading rows for which `build(rows)` fits within the
 * character limit. Returns 0 when not even an empty row list fits.
 */
export function fittingRowCount(
  rows: Row[],
  build: (rows: Row[]) => unknown,
  characterLimit: number,
): number {
  let lo = 0;
  let hi = rows.length;
  let best = 0;

  while (lo <= hi) {
    const mid = Math.floor((lo + hi) / 2);
    if (serializedLength(build(rows.slice(0, mid))) <= characterLimit) {
      best = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }

  return best;
}

export function truncationMessage(characterLimit: number, kept: number, total: number): string {
  return (
    `Response was truncated to fit within ${characterLimit} character limit. ` +
    `Showing ${kept} of ${total} rows.`
  );
}

/**
 * Success envelope for a query. Rows are dropped from the tail of `data`
 * until the serialized envelope fits; `row_count` keeps the number of rows
 * the query actually returned.
 */
export function queryEnvelope(
  query: string,
  rows: Row[],
  executionTimeMs: number,
  characterLimit: number = SAFE_DEFAULTS.characterLimit,
): QueryEnvelope {
  const base = {
    success: true as const,
    query,
    row_count: rows.length,
    execution_time_ms: executionTimeMs,
  };

  const full: QueryEnvelope = { ...base, data: rows };
  if (serializedLength(full) <= characterLimit) return full;

  const build = (kept: Row[]): QueryEnvelope => ({
    ...base,
    data: kept,
    _truncated: true,
    _message: truncationMessage(characterLimit, kept.length, rows.length),
  });

  return build(rows.slice(0, fittingRowCount(rows, build, characterLimit)));
}

export function errorEnvelope(type: string, message: string, suggestion?: string): ErrorEnvelope {
  return {
    success: false,
    error: suggestion ? { type, message, suggestion } : { type, message },
  };
}

export interface ErrorEnvelopeOptions {
  /** Prepended to the error message */
  messagePrefix?: string;
  /** Used when the error carries no suggestion of its own */
  suggestion?: string;
}

/**
 * Error envelope for anything thrown while serving a tool call.
 * Errors that are not ViewQueryErrors are reported as `InternalError`.
 */
export function errorEnvelopeFrom(err: unknown, options: ErrorEnvelopeOptions = {}): ErrorEnvelope {
  const prefix = options.messagePrefix ?? '';
  if (err instanceof ViewQueryError) {
    return errorEnvelope(err.type, `${prefix}${err.message}`, err.suggestion ?? options.suggestion);
  }
  return errorEnvelope('InternalError', `${prefix}${errorMessage(err)}`, options.suggestion);
}
