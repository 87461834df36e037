/**
 * Execution collaborator types.
 *
 * An executor sends one SQL string to the server-side `execute_sql`
 * procedure and returns its rows. It performs no validation of its own;
 * callers run the query guard first.
 */

import { ConfigError, RemoteExecutionError } from '../errors.js';

export type ExecutorKind = 'supabase' | 'postgres';

/** One record as returned by the remote procedure: column name → value */
export type Row = Record<string, unknown>;

export interface RpcTarget {
  /** Remote function name, optionally schema-qualified */
  functionName: string;
  /** Name of the function's SQL text argument */
  argumentName: string;
}

export interface QueryExecutor {
  readonly kind: ExecutorKind;

  /** Execute SQL remotely; rejects with RemoteExecutionError */
  execute(sql: string): Promise<Row[]>;

  /** Release connections held by the executor */
  close(): Promise<void>;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turn whatever the remote procedure returned into rows.
 *
 * `execute_sql` implementations report failures either by raising or by
 * returning `{ "error": "..." }`; the latter becomes a RemoteExecutionError.
 */
export function normalizeRows(payload: unknown): Row[] {
  if (payload === null || payload === undefined) return [];

  if (Array.isArray(payload)) {
    return payload.map((item, idx) => {
      if (!isRow(item)) {
        throw new RemoteExecutionError(
          `Unexpected row ${idx} in remote result: expected an object, got ${describe(item)}.`,
        );
      }
      return item;
    });
  }

  if (isRow(payload)) {
    const keys = Object.keys(payload);
    if (keys.length === 1 && keys[0] === 'error' && typeof payload.error === 'string') {
      throw new RemoteExecutionError(payload.error);
    }
    return [payload];
  }

  throw new RemoteExecutionError(
    `Unexpected remote result: expected an array of records, got ${describe(payload)}.`,
  );
}

/** Validate the function name (optionally schema-qualified) and argument name. */
export function assertRpcTarget(target: RpcTarget): RpcTarget {
  const parts = target.functionName.split('.');
  if (parts.length > 2 || !parts.every((p) => IDENTIFIER.test(p))) {
    throw new ConfigError(`Invalid remote function name: "${target.functionName}".`);
  }
  if (!IDENTIFIER.test(target.argumentName)) {
    throw new ConfigError(`Invalid remote function argument name: "${target.argumentName}".`);
  }
  return target;
}

/** Double-quote an identifier, quoting each part of a dotted name. */
export function quoteIdentifier(name: string): string {
  return name
    .split('.')
    .map((part) => `"${part.replace(/"/g, '""')}"`)
    .join('.');
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
