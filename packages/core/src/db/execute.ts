/**
 * Executor factory.
 * Selects the transport for the remote `execute_sql` procedure.
 */

import { createPgExecutor, type PgRpcConfig } from './adapters/postgres.js';
import { createSupabaseExecutor, type SupabaseRpcConfig } from './adapters/supabase.js';
import type { QueryExecutor } from './types.js';

export type ExecutorConfig =
  | ({ kind: 'supabase' } & SupabaseRpcConfig)
  | ({ kind: 'postgres' } & PgRpcConfig);

export function createExecutor(config: ExecutorConfig): QueryExecutor {
  switch (config.kind) {
    case 'supabase':
      return createSupabaseExecutor(config);
    case 'postgres':
      return createPgExecutor(config);
  }
}
