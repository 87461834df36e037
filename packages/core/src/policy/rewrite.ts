/**
 * Row-limit enforcement.
 *
 * Handles:
 * - Resolving the caller's requested limit into [1, maxLimit]
 * - Appending LIMIT when the outermost query has none
 * - Clamping an outermost LIMIT that is above the effective limit
 * - Wrapping queries whose LIMIT cannot be read as a single number
 *
 * Only the outermost query counts: a LIMIT inside a subquery or CTE does not
 * bound the result, so it is ignored when deciding whether to append.
 */

import { type SqlToken, keywordOf, significantTokens, tokenizeSql } from './lexer.js';
import type { LimitRewrite, RowLimitConfig } from './types.js';
import { ROW_LIMITS } from '../db/defaults.js';

const INTEGER = /^[0-9]+$/;

/**
 * Effective row limit for a request: the default when none is given,
 * otherwise truncated to an integer and clamped to [1, maxLimit].
 */
export function resolveRowLimit(
  requested: number | null | undefined,
  config: Partial<RowLimitConfig> = {},
): number {
  const maxLimit = Math.min(config.maxLimit ?? ROW_LIMITS.max, ROW_LIMITS.max);
  const defaultLimit = config.defaultLimit ?? ROW_LIMITS.default;

  const value =
    requested === null || requested === undefined || !Number.isFinite(requested)
      ? defaultLimit
      : Math.trunc(requested);

  return Math.min(Math.max(value, 1), maxLimit);
}

/**
 * Ensure the query returns at most `effectiveLimit` rows.
 *
 * Applying this to its own output returns the same SQL.
 */
export function enforceRowLimit(sql: string, effectiveLimit: number): LimitRewrite {
  const tokens = tokenizeSql(sql);
  const body = stripTrailing(sql, tokens);
  const bodyTokens = significantTokens(tokens).filter((t) => t.end <= body.length);
  const topLevel = bodyTokens.filter((t) => t.depth === 0);

  const limitIdx = lastIndexOfKeyword(topLevel, 'LIMIT');

  if (limitIdx === -1) {
    if (lastIndexOfKeyword(topLevel, 'FETCH') !== -1) {
      return wrap(body, effectiveLimit);
    }
    return {
      sql: `${body} LIMIT ${effectiveLimit}`,
      effectiveLimit,
      action: 'appended',
      originalLimit: null,
    };
  }

  const value = topLevel[limitIdx + 1];

  // `LIMIT 10, 5000` or `LIMIT 10 + 5000`: the count is more than one token.
  if (!value || !endsClause(bodyTokens, value)) {
    return wrap(body, effectiveLimit);
  }

  if (value.kind === 'number' && INTEGER.test(value.text)) {
    const existing = Number(value.text);
    if (existing <= effectiveLimit) {
      return { sql: body, effectiveLimit, action: 'kept', originalLimit: existing };
    }
    return {
      sql: replaceToken(body, value, String(effectiveLimit)),
      effectiveLimit,
      action: 'clamped',
      originalLimit: existing,
    };
  }

  if (keywordOf(value) === 'ALL') {
    return {
      sql: replaceToken(body, value, String(effectiveLimit)),
      effectiveLimit,
      action: 'clamped',
      originalLimit: null,
    };
  }

  return wrap(body, effectiveLimit);
}

/** SQL with trailing whitespace, comments and semicolons removed. */
function stripTrailing(sql: string, tokens: SqlToken[]): string {
  for (let i = tokens.length - 1; i >= 0; i--) {
    const t = tokens[i];
    if (t.kind === 'whitespace' || t.kind === 'comment') continue;
    if (t.kind === 'punctuation' && t.text === ';') continue;
    return sql.slice(0, t.end);
  }
  return '';
}

function lastIndexOfKeyword(tokens: SqlToken[], keyword: string): number {
  for (let i = tokens.length - 1; i >= 0; i--) {
    if (keywordOf(tokens[i]) === keyword) return i;
  }
  return -1;
}

/** True when `token` is last in the query or followed by a keyword such as OFFSET. */
function endsClause(tokens: SqlToken[], token: SqlToken): boolean {
  const next = tokens[tokens.indexOf(token) + 1];
  return next === undefined || next.kind === 'word';
}

function replaceToken(sql: string, token: SqlToken, text: string): string {
  return sql.slice(0, token.start) + text + sql.slice(token.end);
}

function wrap(body: string, effectiveLimit: number): LimitRewrite {
  return {
    sql: `SELECT * FROM (${body}) AS limited_rows LIMIT ${effectiveLimit}`,
    effectiveLimit,
    action: 'wrapped',
    originalLimit: null,
  };
}
