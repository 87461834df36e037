/**
 * Direct Postgres transport for the remote `execute_sql` procedure.
 * Uses a `pg` pool created once per process.
 */

import pg from 'pg';
import { SAFE_DEFAULTS } from '../defaults.js';
import {
  type QueryExecutor,
  type Row,
  type RpcTarget,
  assertRpcTarget,
  isRow,
  normalizeRows,
  quoteIdentifier,
} from '../types.js';
import { RemoteExecutionError, errorMessage } from '../../errors.js';

const { Pool } = pg;

export interface PgRpcConfig extends RpcTarget {
  connectionString: string;
  ssl: boolean;
  timeoutMs?: number;
}

/** The slice of a pooled `pg` client the executor uses */
export interface PgSession {
  query(text: string, values?: unknown[]): Promise<{ rows: Row[] }>;
  release(err?: Error | boolean): void;
}

/** The slice of `pg.Pool` the executor uses */
export interface PgConnector {
  connect(): Promise<PgSession>;
  end(): Promise<void>;
}

/**
 * Calls `fn(arg => $1)` with the SQL text as its only argument.
 *
 * Safety measures:
 * - Runs inside a BEGIN READ ONLY transaction
 * - Sets a transaction-local statement_timeout
 * - Discards the pooled connection after any failure
 */
export class PgRpcExecutor implements QueryExecutor {
  readonly kind = 'postgres' as const;
  private readonly pool: PgConnector;
  private readonly statement: string;
  private readonly timeoutMs: number;

  constructor(pool: PgConnector, target: RpcTarget, timeoutMs: number = SAFE_DEFAULTS.timeoutMs) {
    const { functionName, argumentName } = assertRpcTarget(target);
    this.pool = pool;
    this.statement = `SELECT ${quoteIdentifier(functionName)}(${quoteIdentifier(argumentName)} => $1::text) AS result`;
    this.timeoutMs = Math.max(1, Math.trunc(timeoutMs));
  }

  async execute(sql: string): Promise<Row[]> {
    let client: PgSession;
    try {
      client = await this.pool.connect();
    } catch (err: unknown) {
      throw new RemoteExecutionError(`Could not connect to Postgres: ${errorMessage(err)}`);
    }

    let rows: Row[];
    try {
      await client.query('BEGIN READ ONLY');
      await client.query(`SET LOCAL statement_timeout = ${this.timeoutMs}`);
      const result = await client.query(this.statement, [sql]);
      await client.query('COMMIT');
      rows = result.rows;
    } catch (err: unknown) {
      client.release(err instanceof Error ? err : true);
      throw toRemoteError(err);
    }

    client.release();
    return collectRows(rows);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

export function createPgExecutor(cfg: PgRpcConfig): PgRpcExecutor {
  const pool = new Pool({
    connectionString: cfg.connectionString,
    ssl: cfg.ssl ? { rejectUnauthorized: false } : undefined,
    max: 4,
    connectionTimeoutMillis: 10_000,
  });
  return new PgRpcExecutor(pool, cfg, cfg.timeoutMs);
}

/**
 * A json-returning function yields one row holding the whole result;
 * a set-returning one yields a row per record.
 */
function collectRows(rows: Row[]): Row[] {
  if (rows.length === 1) return normalizeRows(rows[0].result);
  return normalizeRows(rows.map((r) => r.result));
}

function toRemoteError(err: unknown): RemoteExecutionError {
  if (err instanceof RemoteExecutionError) return err;
  if (!isRow(err)) return new RemoteExecutionError(errorMessage(err));

  const details: Row = {};
  for (const key of ['code', 'detail', 'hint', 'position']) {
    if (err[key] !== undefined) details[key] = err[key];
  }
  return new RemoteExecutionError(errorMessage(err), Object.keys(details).length > 0 ? details : undefined);
}
