import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SupabaseRpcExecutor, type RpcCall, type RpcResponse } from '../adapters/supabase.js';
import { RemoteExecutionError } from '../../errors.js';

const TARGET = { functionName: 'execute_sql', argumentName: 'query' };

function recording(response: RpcResponse) {
  const calls: Array<{ functionName: string; args: Record<string, string>; signal: AbortSignal }> = [];
  const call: RpcCall = async (functionName, args, signal) => {
    calls.push({ functionName, args, signal });
    return response;
  };
  return { call, calls };
}

describe('SupabaseRpcExecutor', () => {
  it('sends the SQL as the procedure argument', async () => {
    const { call, calls } = recording({ data: [{ 餐厅ID: 7 }], error: null });
    const rows = await new SupabaseRpcExecutor(call, TARGET).execute('SELECT 1 LIMIT 100');

    assert.deepEqual(rows, [{ 餐厅ID: 7 }]);
    assert.equal(calls.length, 1);
    assert.equal(calls[0].functionName, 'execute_sql');
    assert.deepEqual(calls[0].args, { query: 'SELECT 1 LIMIT 100' });
    assert.ok(calls[0].signal instanceof AbortSignal);
  });

  it('uses a custom argument name', async () => {
    const { call, calls } = recording({ data: [], error: null });
    await new SupabaseRpcExecutor(call, { functionName: 'run_report', argumentName: 'sql_text' }).execute('SELECT 1');
    assert.equal(calls[0].functionName, 'run_report');
    assert.deepEqual(calls[0].args, { sql_text: 'SELECT 1' });
  });

  it('surfaces PostgREST errors with their fields', async () => {
    const { call } = recording({
      data: null,
      error: { message: 'permission denied for view x', code: '42501', details: 'd', hint: 'h' },
    });
    await assert.rejects(new SupabaseRpcExecutor(call, TARGET).execute('SELECT 1'), (err: unknown) => {
      assert.ok(err instanceof RemoteExecutionError);
      assert.equal(err.message, 'permission denied for view x');
      assert.deepEqual(err.details, { code: '42501', details: 'd', hint: 'h' });
      return true;
    });
  });

  it('surfaces an error payload in the data', async () => {
    const { call } = recording({ data: { error: 'syntax error at or near "FORM"' }, error: null });
    await assert.rejects(
      new SupabaseRpcExecutor(call, TARGET).execute('SELECT * FORM t'),
      (err: unknown) => err instanceof RemoteExecutionError && err.message === 'syntax error at or near "FORM"',
    );
  });

  it('reports an aborted request as a timeout', async () => {
    const { call } = recording({ data: null, error: { message: 'AbortError: This operation was aborted' } });
    await assert.rejects(
      new SupabaseRpcExecutor(call, TARGET, 2000).execute('SELECT 1'),
      (err: unknown) => err instanceof RemoteExecutionError && err.message === 'Remote query timed out after 2000 ms.',
    );
  });

  it('reports a thrown timeout as a timeout', async () => {
    const call: RpcCall = async () => {
      const err = new Error('The operation timed out.');
      err.name = 'TimeoutError';
      throw err;
    };
    await assert.rejects(
      new SupabaseRpcExecutor(call, TARGET, 50).execute('SELECT 1'),
      (err: unknown) => err instanceof RemoteExecutionError && err.message === 'Remote query timed out after 50 ms.',
    );
  });

  it('passes other transport failures through', async () => {
    const call: RpcCall = async () => {
      throw new Error('fetch failed');
    };
    await assert.rejects(
      new SupabaseRpcExecutor(call, TARGET).execute('SELECT 1'),
      (err: unknown) => err instanceof RemoteExecutionError && err.message === 'fetch failed',
    );
  });
});
