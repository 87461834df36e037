/**
 * Server configuration, read from the environment and validated with zod.
 */

import { z } from 'zod';
import {
  ConfigError,
  ROW_LIMITS,
  SAFE_DEFAULTS,
  type ExecutorConfig,
  type GuardConfig,
  defaultGuardConfig,
} from '@viewquery/core';
import type { LogLevel } from './log.js';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_ANON_KEY: z.string().optional(),
  DATABASE_URL: z.string().optional(),
  DATABASE_SSL: z.enum(['true', 'false', '1', '0']).default('false'),
  VIEWQUERY_RPC_FUNCTION: z.string().default('execute_sql'),
  VIEWQUERY_RPC_ARGUMENT: z.string().default('query'),
  VIEWQUERY_TIMEOUT_MS: positiveInt(SAFE_DEFAULTS.timeoutMs),
  VIEWQUERY_VIEW: z.string().default('roleplay_daily_reports'),
  VIEWQUERY_DEFAULT_ROW_LIMIT: positiveInt(ROW_LIMITS.default),
  VIEWQUERY_MAX_ROW_LIMIT: z.coerce.number().int().positive().max(ROW_LIMITS.max).default(ROW_LIMITS.max),
  VIEWQUERY_CHARACTER_LIMIT: positiveInt(SAFE_DEFAULTS.characterLimit),
  VIEWQUERY_KEYWORD_SCAN: z.enum(['raw', 'tokens']).default('raw'),
  VIEWQUERY_PARSER: z.enum(['lexical', 'ast']).default('lexical'),
  VIEWQUERY_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export interface ServerConfig {
  /** null when neither transport is configured; see requireExecutor */
  executor: ExecutorConfig | null;
  viewName: string;
  guard: GuardConfig;
  characterLimit: number;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  // Blank variables count as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1].trim() !== ''),
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`, parsed.error.issues);
  }
  const vars = parsed.data;

  if (vars.VIEWQUERY_DEFAULT_ROW_LIMIT > vars.VIEWQUERY_MAX_ROW_LIMIT) {
    throw new ConfigError(
      `VIEWQUERY_DEFAULT_ROW_LIMIT (${vars.VIEWQUERY_DEFAULT_ROW_LIMIT}) exceeds VIEWQUERY_MAX_ROW_LIMIT (${vars.VIEWQUERY_MAX_ROW_LIMIT}).`,
    );
  }

  return {
    executor: resolveExecutor(vars),
    viewName: vars.VIEWQUERY_VIEW,
    guard: {
      ...defaultGuardConfig(),
      keywordScan: vars.VIEWQUERY_KEYWORD_SCAN,
      parser: vars.VIEWQUERY_PARSER,
      defaultLimit: vars.VIEWQUERY_DEFAULT_ROW_LIMIT,
      maxLimit: vars.VIEWQUERY_MAX_ROW_LIMIT,
    },
    characterLimit: vars.VIEWQUERY_CHARACTER_LIMIT,
    logLevel: vars.VIEWQUERY_LOG_LEVEL,
  };
}

export function requireExecutor(config: ServerConfig): ExecutorConfig {
  if (!config.executor) {
    throw new ConfigError(
      'Missing required environment variables: SUPABASE_URL and SUPABASE_ANON_KEY, or DATABASE_URL.',
    );
  }
  return config.executor;
}

function resolveExecutor(vars: z.infer<typeof EnvSchema>): ExecutorConfig | null {
  const target = {
    functionName: vars.VIEWQUERY_RPC_FUNCTION,
    argumentName: vars.VIEWQUERY_RPC_ARGUMENT,
    timeoutMs: vars.VIEWQUERY_TIMEOUT_MS,
  };

  if (vars.SUPABASE_URL || vars.SUPABASE_ANON_KEY) {
    if (!vars.SUPABASE_URL || !vars.SUPABASE_ANON_KEY) {
      throw new ConfigError('Missing required environment variables: SUPABASE_URL or SUPABASE_ANON_KEY');
    }
    return { kind: 'supabase', url: vars.SUPABASE_URL, anonKey: vars.SUPABASE_ANON_KEY, ...target };
  }

  if (vars.DATABASE_URL) {
    const ssl = vars.DATABASE_SSL === 'true' || vars.DATABASE_SSL === '1';
    return { kind: 'postgres', connectionString: vars.DATABASE_URL, ssl, ...target };
  }

  return null;
}

/** Configuration safe to print: secrets replaced by their presence. */
export function describeConfig(config: ServerConfig): Record<string, unknown> {
  const executor = config.executor;
  let transport: Record<string, unknown> | null = null;
  if (executor?.kind === 'supabase') {
    transport = { kind: executor.kind, url: executor.url, anonKey: mask(executor.anonKey) };
  } else if (executor?.kind === 'postgres') {
    transport = { kind: executor.kind, connectionString: maskUrl(executor.connectionString), ssl: executor.ssl };
  }

  return {
    transport,
    rpc: executor ? { functionName: executor.functionName, argumentName: executor.argumentName, timeoutMs: executor.timeoutMs } : null,
    view: config.viewName,
    guard: config.guard,
    characterLimit: config.characterLimit,
    logLevel: config.logLevel,
  };
}

function mask(secret: string): string {
  return secret.length <= 8 ? '****' : `${secret.slice(0, 4)}…${secret.slice(-4)}`;
}

function maskUrl(url: string): string {
  return url.replace(/\/\/([^:/@]+):[^@]*@/, '//$1:****@');
}
