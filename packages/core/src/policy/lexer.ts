/**
 * Minimal PostgreSQL lexer for the query guard.
 *
 * Not a parser: it only knows enough to tell words apart from literals,
 * quoted identifiers and comments, and to track parenthesis depth so the
 * guard can find statement separators and the outermost LIMIT clause.
 */

export type SqlTokenKind =
  | 'word'
  | 'number'
  | 'string'
  | 'quoted_identifier'
  | 'comment'
  | 'parameter'
  | 'punctuation'
  | 'whitespace';

export interface SqlToken {
  kind: SqlTokenKind;
  text: string;
  /** Offset of the first character */
  start: number;
  /** Offset one past the last character */
  end: number;
  /** Parenthesis depth the token sits at (0 = outermost statement) */
  depth: number;
}

const WORD_START = /[\p{L}_]/u;
const WORD_PART = /[\p{L}\p{N}_$]/u;
const DIGIT = /[0-9]/;
const WHITESPACE = /\s/;
const DOLLAR_TAG = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/;

export function tokenizeSql(sql: string): SqlToken[] {
  const tokens: SqlToken[] = [];
  let depth = 0;
  let i = 0;

  const push = (kind: SqlTokenKind, end: number, tokenDepth = depth): void => {
    tokens.push({ kind, text: sql.slice(i, end), start: i, end, depth: tokenDepth });
    i = end;
  };

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];

    if (WHITESPACE.test(ch)) {
      let end = i + 1;
      while (end < sql.length && WHITESPACE.test(sql[end])) end++;
      push('whitespace', end);
    } else if (ch === '-' && next === '-') {
      const newline = sql.indexOf('\n', i);
      push('comment', newline === -1 ? sql.length : newline);
    } else if (ch === '/' && next === '*') {
      push('comment', scanBlockComment(sql, i));
    } else if (ch === "'") {
      push('string', scanQuoted(sql, i, "'"));
    } else if ((ch === 'E' || ch === 'e') && next === "'") {
      push('string', scanEscapeString(sql, i + 1));
    } else if (ch === '"') {
      push('quoted_identifier', scanQuoted(sql, i, '"'));
    } else if (ch === '$') {
      const tag = DOLLAR_TAG.exec(sql.slice(i));
      if (tag) {
        const close = sql.indexOf(tag[0], i + tag[0].length);
        push('string', close === -1 ? sql.length : close + tag[0].length);
      } else if (next !== undefined && DIGIT.test(next)) {
        let end = i + 1;
        while (end < sql.length && DIGIT.test(sql[end])) end++;
        push('parameter', end);
      } else {
        push('punctuation', i + 1);
      }
    } else if (DIGIT.test(ch) || (ch === '.' && next !== undefined && DIGIT.test(next))) {
      push('number', scanNumber(sql, i));
    } else if (WORD_START.test(ch)) {
      let end = i + 1;
      while (end < sql.length && WORD_PART.test(sql[end])) end++;
      push('word', end);
    } else if (ch === '(') {
      push('punctuation', i + 1);
      depth++;
    } else if (ch === ')') {
      depth = Math.max(0, depth - 1);
      push('punctuation', i + 1);
    } else {
      push('punctuation', i + 1);
    }
  }

  return tokens;
}

/** Tokens that carry meaning: everything except whitespace and comments. */
export function significantTokens(tokens: SqlToken[]): SqlToken[] {
  return tokens.filter((t) => t.kind !== 'whitespace' && t.kind !== 'comment');
}

/** Uppercased text of a bare word token, or null for anything else. */
export function keywordOf(token: SqlToken | undefined): string | null {
  return token?.kind === 'word' ? token.text.toUpperCase() : null;
}

function scanQuoted(sql: string, start: number, quote: string): number {
  let i = start + 1;
  while (i < sql.length) {
    if (sql[i] === quote) {
      if (sql[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return sql.length;
}

function scanEscapeString(sql: string, quoteAt: number): number {
  let i = quoteAt + 1;
  while (i < sql.length) {
    if (sql[i] === '\\') {
      i += 2;
      continue;
    }
    if (sql[i] === "'") {
      if (sql[i + 1] === "'") {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return sql.length;
}

// Postgres block comments nest.
function scanBlockComment(sql: string, start: number): number {
  let level = 0;
  let i = start;
  while (i < sql.length) {
    if (sql[i] === '/' && sql[i + 1] === '*') {
      level++;
      i += 2;
    } else if (sql[i] === '*' && sql[i + 1] === '/') {
      level--;
      i += 2;
      if (level === 0) return i;
    } else {
      i++;
    }
  }
  return sql.length;
}

function scanNumber(sql: string, start: number): number {
  let i = start;
  while (i < sql.length && DIGIT.test(sql[i])) i++;
  if (sql[i] === '.' && sql[i + 1] !== '.') {
    i++;
    while (i < sql.length && DIGIT.test(sql[i])) i++;
  }
  if ((sql[i] === 'e' || sql[i] === 'E') && /[0-9+-]/.test(sql[i + 1] ?? '')) {
    i += 2;
    while (i < sql.length && DIGIT.test(sql[i])) i++;
  }
  return i;
}
