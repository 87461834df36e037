/**
 * AST pass for the guard, using node-sql-parser with the PostgreSQL dialect.
 *
 * Only consulted in `ast` parser mode. The lexical rules still run first,
 * so this is an extra gate, never the sole decision-maker.
 */

import pkg from 'node-sql-parser';
const { Parser } = pkg;

const parser = new Parser();
const PG_OPT = { database: 'PostgresQL' } as const;

export type SqlKind =
  | 'select'
  | 'insert'
  | 'update'
  | 'delete'
  | 'create'
  | 'alter'
  | 'drop'
  | 'truncate'
  | 'unknown';

export interface ParseResult {
  /** Number of statements found */
  statementCount: number;
  /** Statement type of the first statement */
  kind: SqlKind;
}

export type ParseOutcome = ({ ok: true } & ParseResult) | { ok: false; error: string };

const KNOWN_KINDS: readonly SqlKind[] = [
  'select',
  'insert',
  'update',
  'delete',
  'create',
  'alter',
  'drop',
  'truncate',
];

/**
 * Parse a SQL string and report how many statements it holds and what the
 * first one is.
 */
export function parseSql(sql: string): ParseOutcome {
  const normalizedSql = sql.trim().replace(/;+\s*$/, '');

  if (!normalizedSql) {
    return { ok: false, error: 'Empty SQL statement' };
  }

  try {
    const astResult = parser.astify(normalizedSql, PG_OPT);
    const statements: unknown[] = Array.isArray(astResult) ? astResult : [astResult];

    if (statements.length === 0) {
      return { ok: false, error: 'No statements found' };
    }

    const first = statements[0];
    const rawKind =
      typeof first === 'object' && first !== null && 'type' in first && typeof first.type === 'string'
        ? first.type.toLowerCase()
        : '';

    return {
      ok: true,
      statementCount: statements.length,
      kind: KNOWN_KINDS.find((k) => k === rawKind) ?? 'unknown',
    };
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `SQL parse error: ${msg}` };
  }
}
