/**
 * The two tool operations, independent of any protocol shell.
 *
 * Every failure comes back as an error envelope; nothing here throws.
 */

import { performance } from 'node:perf_hooks';
import { SAFE_DEFAULTS } from '../db/defaults.js';
import type { QueryExecutor } from '../db/types.js';
import { QueryValidationError, errorMessage } from '../errors.js';
import { type Logger, silentLogger } from '../logging.js';
import type { QueryGuard } from '../policy/engine.js';
import {
  type ErrorEnvelope,
  type QueryEnvelope,
  errorEnvelopeFrom,
  queryEnvelope,
} from '../response/envelope.js';
import { type SchemaEnvelope, describeView } from '../view/describe.js';
import type { ViewProfile } from '../view/profile.js';

export interface ViewToolsDeps {
  executor: QueryExecutor;
  guard: QueryGuard;
  profile: ViewProfile;
  logger?: Logger;
  characterLimit?: number;
  /** Millisecond clock used for execution_time_ms */
  now?: () => number;
}

export interface CustomQueryInput {
  query: string;
  row_limit?: number | null;
}

export const QUERY_FAILURE_SUGGESTION =
  '请检查SQL语法是否正确，特别注意中文列名需要使用双引号。可以先调用 get_view_schema_and_samples 查看可用的列名。';

export const SCHEMA_FAILURE_SUGGESTION =
  'Please check the database connection and ensure the view exists.';

export class ViewTools {
  private readonly executor: QueryExecutor;
  private readonly guard: QueryGuard;
  private readonly profile: ViewProfile;
  private readonly logger: Logger;
  private readonly characterLimit: number;
  private readonly now: () => number;

  constructor(deps: ViewToolsDeps) {
    this.executor = deps.executor;
    this.guard = deps.guard;
    this.profile = deps.profile;
    this.logger = deps.logger ?? silentLogger;
    this.characterLimit = deps.characterLimit ?? SAFE_DEFAULTS.characterLimit;
    this.now = deps.now ?? (() => performance.now());
  }

  get viewName(): string {
    return this.profile.name;
  }

  async getViewSchemaAndSamples(): Promise<SchemaEnvelope | ErrorEnvelope> {
    const started = this.now();
    try {
      const envelope = await describeView(this.executor, this.profile, {
        characterLimit: this.characterLimit,
      });
      this.logger.info('get_view_schema_and_samples ok', {
        view: this.profile.name,
        columns: envelope.columns.length,
        ms: Math.round(this.now() - started),
      });
      return envelope;
    } catch (err: unknown) {
      this.logger.error('get_view_schema_and_samples failed', { error: errorMessage(err) });
      return errorEnvelopeFrom(err, {
        messagePrefix: 'Failed to retrieve schema and samples: ',
        suggestion: SCHEMA_FAILURE_SUGGESTION,
      });
    }
  }

  async executeCustomQuery(input: CustomQueryInput): Promise<QueryEnvelope | ErrorEnvelope> {
    const started = this.now();
    const prepared = this.guard.prepare(input.query, input.row_limit);

    if (!prepared.ok) {
      const { rule, reason, suggestedFix, offendingKeyword } = prepared.rejection;
      this.logger.warn('execute_custom_query rejected', { rule, offendingKeyword });
      return errorEnvelopeFrom(new QueryValidationError(rule, reason, suggestedFix, offendingKeyword));
    }

    for (const warning of prepared.warnings) {
      this.logger.debug(warning);
    }
    this.logger.debug('executing', { sql: prepared.sql });

    try {
      const rows = await this.executor.execute(prepared.sql);
      const executionTimeMs = Math.round(this.now() - started);
      this.logger.info('execute_custom_query ok', {
        limit: prepared.effectiveLimit,
        rows: rows.length,
        ms: executionTimeMs,
      });
      return queryEnvelope(prepared.sql, rows, executionTimeMs, this.characterLimit);
    } catch (err: unknown) {
      this.logger.error('execute_custom_query failed', { error: errorMessage(err) });
      return errorEnvelopeFrom(err, {
        messagePrefix: 'Query execution failed: ',
        suggestion: QUERY_FAILURE_SUGGESTION,
      });
    }
  }
}
