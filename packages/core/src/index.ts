/**
 * @viewquery/core — barrel export
 *
 * Query guard, execution collaborators and tool operations shared by the
 * MCP server and the CLI.
 */

// Limits
export { ROW_LIMITS, SAFE_DEFAULTS } from './db/defaults.js';

// Errors
export {
  ViewQueryError,
  QueryValidationError,
  RemoteExecutionError,
  ConfigError,
  errorMessage,
} from './errors.js';
export type { ViewQueryErrorType } from './errors.js';

// Logging seam
export { silentLogger } from './logging.js';
export type { Logger, LogFields } from './logging.js';

// Guard types
export type {
  ValidationRule,
  Rejection,
  ValidationOutcome,
  KeywordScanMode,
  ParserMode,
  ValidatorOptions,
  RowLimitConfig,
  LimitAction,
  LimitRewrite,
  GuardConfig,
  PrepareOutcome,
} from './policy/types.js';
export { defaultValidatorOptions, defaultGuardConfig } from './policy/types.js';

// Lexer
export { tokenizeSql, significantTokens, keywordOf } from './policy/lexer.js';
export type { SqlToken, SqlTokenKind } from './policy/lexer.js';

// Validator
export { validateQuery, findBlockedKeyword, BLOCKED_KEYWORDS } from './policy/validate.js';
export type { BlockedKeyword } from './policy/validate.js';

// AST pass
export { parseSql } from './policy/parse.js';
export type { ParseResult, ParseOutcome, SqlKind } from './policy/parse.js';

// Limit enforcer
export { resolveRowLimit, enforceRowLimit } from './policy/rewrite.js';

// Guard
export { DefaultQueryGuard } from './policy/engine.js';
export type { QueryGuard } from './policy/engine.js';

// Execution collaborators
export type { ExecutorKind, Row, RpcTarget, QueryExecutor } from './db/types.js';
export { normalizeRows, isRow, assertRpcTarget, quoteIdentifier } from './db/types.js';
export { createExecutor } from './db/execute.js';
export type { ExecutorConfig } from './db/execute.js';
export { PgRpcExecutor, createPgExecutor } from './db/adapters/postgres.js';
export type { PgRpcConfig, PgSession, PgConnector } from './db/adapters/postgres.js';
export { SupabaseRpcExecutor, createSupabaseExecutor } from './db/adapters/supabase.js';
export type { SupabaseRpcConfig, RpcCall, RpcResponse, RpcError } from './db/adapters/supabase.js';

// Response shaping
export {
  queryEnvelope,
  errorEnvelope,
  errorEnvelopeFrom,
  fittingRowCount,
  serializedLength,
  serializeEnvelope,
  truncationMessage,
} from './response/envelope.js';
export type {
  QueryEnvelope,
  ErrorEnvelope,
  ErrorEnvelopeOptions,
  TruncationFields,
} from './response/envelope.js';

// View description
export { describeView, inferColumns, inferType, sampleQuery, metadataQuery, dimensionQuery } from './view/describe.js';
export type { SchemaEnvelope, ColumnInfo, ViewMetadata, InferredType, DescribeOptions } from './view/describe.js';
export { describeColumn, UNKNOWN_COLUMN_DESCRIPTION } from './view/profile.js';
export type { ViewProfile, ColumnNote } from './view/profile.js';
export { ROLEPLAY_DAILY_REPORTS, roleplayProfileFor } from './view/roleplay-daily-reports.js';

// Tool operations
export {
  ViewTools,
  QUERY_FAILURE_SUGGESTION,
  SCHEMA_FAILURE_SUGGESTION,
} from './tools/view-tools.js';
export type { ViewToolsDeps, CustomQueryInput } from './tools/view-tools.js';
