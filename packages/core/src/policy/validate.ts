/**
 * Query validator: decides whether an untrusted SQL string is a single
 * read-only SELECT.
 *
 * Lexical heuristics only. The execution collaborator trusts whatever it is
 * given, so the guard leans towards rejecting; its own least-privilege
 * credential is the second line of defense.
 */

import { type SqlToken, keywordOf, significantTokens, tokenizeSql } from './lexer.js';
import { parseSql } from './parse.js';
import {
  type Rejection,
  type ValidationOutcome,
  type ValidatorOptions,
  defaultValidatorOptions,
} from './types.js';

export const BLOCKED_KEYWORDS = [
  'INSERT',
  'UPDATE',
  'DELETE',
  'DROP',
  'ALTER',
  'CREATE',
  'TRUNCATE',
  'GRANT',
  'REVOKE',
  'EXEC',
  'EXECUTE',
  'PROCEDURE',
  'FUNCTION',
] as const;

export type BlockedKeyword = (typeof BLOCKED_KEYWORDS)[number];

const BLOCKED_SET: ReadonlySet<string> = new Set(BLOCKED_KEYWORDS);
// Word boundaries follow the lexer's word characters, so letters from any
// script (e.g. Chinese identifiers) extend a word.
const BLOCKED_RE = new RegExp(
  `(?<![\\p{L}\\p{N}_$])(?:${BLOCKED_KEYWORDS.join('|')})(?![\\p{L}\\p{N}_$])`,
  'u',
);

const NOT_SELECT = 'not a SELECT query';
const SELECT_FIX =
  'Rewrite the request as a single SELECT statement, e.g. SELECT "餐厅完整名称", "总体任务完成率" FROM roleplay_daily_reports WHERE "运营日期"::date = CURRENT_DATE - 1';

export function validateQuery(
  query: string,
  options: Partial<ValidatorOptions> = {},
): ValidationOutcome {
  const opts = { ...defaultValidatorOptions(), ...options };
  const trimmed = query.trim();

  if (!trimmed) {
    return reject('select_only', `${NOT_SELECT}: the query is empty`);
  }

  if (trimmed.length > opts.maxQueryLength) {
    return reject(
      'max_length',
      `Query is ${trimmed.length} characters long; the maximum is ${opts.maxQueryLength}.`,
      'Shorten the query, for example by selecting fewer columns.',
    );
  }

  const tokens = significantTokens(tokenizeSql(trimmed));
  const keyword = findBlockedKeyword(trimmed, opts.keywordScan === 'tokens' ? tokens : null);

  // Rule 1: shape. A blocked keyword is still reported alongside.
  if (keywordOf(tokens[0]) !== 'SELECT') {
    return withKeyword(reject('select_only', `${NOT_SELECT}: only SELECT queries are allowed`), keyword);
  }

  const separator = tokens.findIndex((t) => t.kind === 'punctuation' && t.text === ';');
  if (separator !== -1 && tokens.slice(separator + 1).some((t) => t.text !== ';')) {
    return withKeyword(reject('single_statement', `${NOT_SELECT}: multiple statements are not allowed`), keyword);
  }

  // Rule 2: keyword blocklist
  if (keyword) {
    return {
      ...reject('blocked_keyword', `Keyword '${keyword}' is not allowed. Only read-only SELECT queries are permitted.`),
      offendingKeyword: keyword,
    };
  }

  if (opts.parser === 'ast') {
    const parsed = parseSql(trimmed);
    if (!parsed.ok) {
      return reject('parse', parsed.error, 'Check the SQL syntax.');
    }
    if (parsed.statementCount > 1) {
      return reject('single_statement', `${NOT_SELECT}: multiple statements are not allowed`);
    }
    if (parsed.kind !== 'select') {
      return reject('select_only', `${NOT_SELECT}: statement parses as ${parsed.kind.toUpperCase()}`);
    }
  }

  return { ok: true };
}

/**
 * Leftmost blocked keyword in the query, matched as a whole word in any
 * letter case. With tokens, only bare words count.
 */
export function findBlockedKeyword(
  query: string,
  tokens: SqlToken[] | null = null,
): BlockedKeyword | null {
  if (tokens) {
    for (const token of tokens) {
      const word = keywordOf(token);
      if (word !== null && isBlocked(word)) return word;
    }
    return null;
  }

  const match = BLOCKED_RE.exec(query.toUpperCase());
  if (match && isBlocked(match[0])) return match[0];
  return null;
}

function isBlocked(word: string): word is BlockedKeyword {
  return BLOCKED_SET.has(word);
}

/** Names the blocked keyword, if any, in a shape rejection. */
function withKeyword(rejection: Rejection, keyword: BlockedKeyword | null): Rejection {
  if (!keyword) return rejection;
  return { ...rejection, reason: `${rejection.reason} (found '${keyword}')`, offendingKeyword: keyword };
}

function reject(rule: Rejection['rule'], reason: string, suggestedFix = SELECT_FIX): Rejection {
  return { ok: false, rule, reason, suggestedFix };
}
