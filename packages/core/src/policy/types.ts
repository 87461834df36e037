/**
 * Guard types for viewquery.
 *
 * Every query an agent submits is validated and then bounded before it is
 * handed to the execution collaborator.
 */

import { ROW_LIMITS } from '../db/defaults.js';

/** Which rule rejected a query */
export type ValidationRule =
  | 'select_only'
  | 'single_statement'
  | 'blocked_keyword'
  | 'max_length'
  | 'parse';

export interface Rejection {
  ok: false;
  rule: ValidationRule;
  /** Human-readable reason, surfaced to the agent as-is */
  reason: string;
  /** Leftmost blocked keyword in the query text, also set on shape rejections */
  offendingKeyword?: string;
  suggestedFix?: string;
}

export type ValidationOutcome = { ok: true } | Rejection;

/**
 * `raw` scans the whole uppercased text, literals and comments included.
 * `tokens` scans bare words only, so `'deleted'` style literals pass.
 */
export type KeywordScanMode = 'raw' | 'tokens';

/** `ast` adds a node-sql-parser pass on top of the lexical rules */
export type ParserMode = 'lexical' | 'ast';

export interface ValidatorOptions {
  keywordScan: KeywordScanMode;
  parser: ParserMode;
  /** Longest query accepted, in characters */
  maxQueryLength: number;
}

export interface RowLimitConfig {
  /** Limit used when the caller gives none */
  defaultLimit: number;
  /** Hard cap; never above ROW_LIMITS.max */
  maxLimit: number;
}

export type LimitAction = 'appended' | 'kept' | 'clamped' | 'wrapped';

export interface LimitRewrite {
  sql: string;
  effectiveLimit: number;
  action: LimitAction;
  /** Value of the outermost LIMIT before rewriting, when it was a number */
  originalLimit: number | null;
}

export type GuardConfig = ValidatorOptions & RowLimitConfig;

export type PrepareOutcome =
  | {
      ok: true;
      sql: string;
      effectiveLimit: number;
      rewrite: LimitRewrite;
      warnings: string[];
    }
  | { ok: false; rejection: Rejection };

export function defaultValidatorOptions(): ValidatorOptions {
  return {
    keywordScan: 'raw',
    parser: 'lexical',
    maxQueryLength: 5_000,
  };
}

export function defaultGuardConfig(): GuardConfig {
  return {
    ...defaultValidatorOptions(),
    defaultLimit: ROW_LIMITS.default,
    maxLimit: ROW_LIMITS.max,
  };
}
