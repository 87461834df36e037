/**
 * Supabase transport: PostgREST `rpc()` on the `execute_sql` procedure,
 * authenticated with the project's anon key (row-level security applies).
 */

import { createClient } from '@supabase/supabase-js';
import { SAFE_DEFAULTS } from '../defaults.js';
import { type QueryExecutor, type Row, type RpcTarget, assertRpcTarget, normalizeRows } from '../types.js';
import { RemoteExecutionError, errorMessage } from '../../errors.js';

export interface SupabaseRpcConfig extends RpcTarget {
  url: string;
  anonKey: string;
  timeoutMs?: number;
}

export interface RpcError {
  message: string;
  code?: string;
  details?: string;
  hint?: string;
}

export interface RpcResponse {
  data: unknown;
  error: RpcError | null;
}

/** One PostgREST rpc round trip */
export type RpcCall = (
  functionName: string,
  args: Record<string, string>,
  signal: AbortSignal,
) => Promise<RpcResponse>;

export class SupabaseRpcExecutor implements QueryExecutor {
  readonly kind = 'supabase' as const;
  private readonly call: RpcCall;
  private readonly target: RpcTarget;
  private readonly timeoutMs: number;

  constructor(call: RpcCall, target: RpcTarget, timeoutMs: number = SAFE_DEFAULTS.timeoutMs) {
    this.call = call;
    this.target = assertRpcTarget(target);
    this.timeoutMs = Math.max(1, Math.trunc(timeoutMs));
  }

  async execute(sql: string): Promise<Row[]> {
    let response: RpcResponse;
    try {
      response = await this.call(
        this.target.functionName,
        { [this.target.argumentName]: sql },
        AbortSignal.timeout(this.timeoutMs),
      );
    } catch (err: unknown) {
      throw new RemoteExecutionError(
        isAbort(err) ? `Remote query timed out after ${this.timeoutMs} ms.` : errorMessage(err),
      );
    }

    if (response.error) {
      const { message, code, details, hint } = response.error;
      if (/AbortError|TimeoutError/.test(message)) {
        throw new RemoteExecutionError(`Remote query timed out after ${this.timeoutMs} ms.`);
      }
      throw new RemoteExecutionError(message, { code, details, hint });
    }

    return normalizeRows(response.data);
  }

  async close(): Promise<void> {
    // HTTP only; nothing pooled.
  }
}

export function createSupabaseExecutor(cfg: SupabaseRpcConfig): SupabaseRpcExecutor {
  const client = createClient(cfg.url, cfg.anonKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });

  const call: RpcCall = async (functionName, args, signal) => {
    const { data, error } = await client.rpc(functionName, args).abortSignal(signal);
    return { data, error };
  };

  return new SupabaseRpcExecutor(call, cfg, cfg.timeoutMs);
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}
