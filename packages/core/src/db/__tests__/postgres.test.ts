import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { PgRpcExecutor, type PgConnector, type PgSession } from '../adapters/postgres.js';
import type { Row } from '../types.js';
import { ConfigError, RemoteExecutionError } from '../../errors.js';

const TARGET = { functionName: 'execute_sql', argumentName: 'query' };
const STATEMENT = 'SELECT "execute_sql"("query" => $1::text) AS result';

type Responder = (text: string, values?: unknown[]) => Row[];

class FakeSession implements PgSession {
  readonly queries: Array<{ text: string; values?: unknown[] }> = [];
  readonly released: Array<Error | boolean | undefined> = [];

  constructor(private readonly respond: Responder) {}

  async query(text: string, values?: unknown[]): Promise<{ rows: Row[] }> {
    this.queries.push({ text, values });
    return { rows: this.respond(text, values) };
  }

  release(err?: Error | boolean): void {
    this.released.push(err);
  }
}

class FakePool implements PgConnector {
  ended = false;
  readonly session: FakeSession;

  constructor(respond: Responder) {
    this.session = new FakeSession(respond);
  }

  async connect(): Promise<PgSession> {
    return this.session;
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

function answering(result: Row[]): Responder {
  return (text) => (text === STATEMENT ? result : []);
}

describe('PgRpcExecutor', () => {
  it('calls the procedure inside a read-only transaction', async () => {
    const pool = new FakePool(answering([{ result: [{ a: 1 }, { a: 2 }] }]));
    const executor = new PgRpcExecutor(pool, TARGET);

    const rows = await executor.execute('SELECT a FROM t LIMIT 100');

    assert.deepEqual(rows, [{ a: 1 }, { a: 2 }]);
    assert.deepEqual(
      pool.session.queries.map((q) => q.text),
      ['BEGIN READ ONLY', 'SET LOCAL statement_timeout = 15000', STATEMENT, 'COMMIT'],
    );
    assert.deepEqual(pool.session.queries[2].values, ['SELECT a FROM t LIMIT 100']);
    assert.deepEqual(pool.session.released, [undefined]);
  });

  it('collects one record per row from a set-returning procedure', async () => {
    const pool = new FakePool(answering([{ result: { a: 1 } }, { result: { a: 2 } }]));
    const rows = await new PgRpcExecutor(pool, TARGET).execute('SELECT a FROM t');
    assert.deepEqual(rows, [{ a: 1 }, { a: 2 }]);
  });

  it('uses the configured function, argument and timeout', async () => {
    const pool = new FakePool(() => []);
    const executor = new PgRpcExecutor(pool, { functionName: 'reporting.run_sql', argumentName: 'sql_text' }, 2500);

    await executor.execute('SELECT 1');

    assert.deepEqual(
      pool.session.queries.map((q) => q.text),
      [
        'BEGIN READ ONLY',
        'SET LOCAL statement_timeout = 2500',
        'SELECT "reporting"."run_sql"("sql_text" => $1::text) AS result',
        'COMMIT',
      ],
    );
  });

  it('surfaces an error payload returned by the procedure', async () => {
    const pool = new FakePool(answering([{ result: { error: 'column "x" does not exist' } }]));
    await assert.rejects(
      new PgRpcExecutor(pool, TARGET).execute('SELECT x FROM t'),
      (err: unknown) => err instanceof RemoteExecutionError && err.message === 'column "x" does not exist',
    );
  });

  it('discards the connection and keeps Postgres error fields when the call fails', async () => {
    const failure = Object.assign(new Error('relation "t" does not exist'), { code: '42P01', hint: 'check the name' });
    const pool = new FakePool((text) => {
      if (text === STATEMENT) throw failure;
      return [];
    });

    await assert.rejects(new PgRpcExecutor(pool, TARGET).execute('SELECT 1 FROM t'), (err: unknown) => {
      assert.ok(err instanceof RemoteExecutionError);
      assert.equal(err.message, 'relation "t" does not exist');
      assert.deepEqual(err.details, { code: '42P01', hint: 'check the name' });
      return true;
    });
    assert.deepEqual(pool.session.released, [failure]);
    assert.ok(!pool.session.queries.some((q) => q.text === 'COMMIT'));
  });

  it('reports connection failures', async () => {
    const pool: PgConnector = {
      connect: async () => {
        throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
      },
      end: async () => undefined,
    };
    await assert.rejects(
      new PgRpcExecutor(pool, TARGET).execute('SELECT 1'),
      (err: unknown) =>
        err instanceof RemoteExecutionError &&
        err.message === 'Could not connect to Postgres: connect ECONNREFUSED 127.0.0.1:5432',
    );
  });

  it('ends the pool on close', async () => {
    const pool = new FakePool(() => []);
    await new PgRpcExecutor(pool, TARGET).close();
    assert.equal(pool.ended, true);
  });

  it('rejects an invalid function name up front', () => {
    assert.throws(
      () => new PgRpcExecutor(new FakePool(() => []), { functionName: 'drop table x', argumentName: 'query' }),
      ConfigError,
    );
  });
});
