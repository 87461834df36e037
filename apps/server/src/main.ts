#!/usr/bin/env -S npx tsx

/**
 * viewquery entrypoint: the MCP server on stdio plus a few local commands
 * for checking queries and configuration from a shell.
 */

import 'dotenv/config';
import { Command, CommanderError } from 'commander';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { DefaultQueryGuard, QueryValidationError, errorMessage, type ErrorEnvelope } from '@viewquery/core';
import { describeConfig, loadConfig } from './config.js';
import { createLogger } from './log.js';
import { createRuntime } from './runtime.js';
import { createViewQueryServer } from './server.js';
import { VERSION } from './version.js';
import {
  CliError,
  EXIT_CODE_RUNTIME,
  EXIT_CODE_SUCCESS,
  EXIT_CODE_USAGE,
  policyError,
  runtimeError,
  toExitCode,
  usageError,
} from './errors.js';
import {
  type OutputOptions,
  outputOptionsFromCommand,
  printCommandSuccess,
  printError,
  printHuman,
  printHumanTable,
  printWarning,
  withOutputFlags,
} from './output.js';

// ── Helpers ──────────────────────────────────────────────────────────

async function runCommand(command: Command, fn: (output: OutputOptions) => Promise<void> | void): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

function parseRowLimit(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw usageError(`Invalid --row-limit "${raw}". Expected an integer.`);
  }
  return value;
}

function envelopeFailure(envelope: ErrorEnvelope): CliError {
  const { type, message, suggestion } = envelope.error;
  switch (type) {
    case 'QueryValidationError':
      return policyError(message, suggestion);
    case 'ConfigError':
      return new CliError('usage', 'CONFIG_INVALID', message, suggestion);
    default:
      return runtimeError(message, suggestion);
  }
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('viewquery')
  .description('viewquery — read-only SQL access to a reporting view over MCP')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential logs', false)
  .option('--verbose', 'Show additional context', false)
  .option('--debug', 'Show internal error details and stacks', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();

// ── serve ────────────────────────────────────────────────────────────

withExamples(
  program
    .command('serve', { isDefault: true })
    .description('Run the MCP server on stdio')
    .action(async (_opts: unknown, command: Command) => {
      await runCommand(command, async () => {
        const config = loadConfig();
        const logger = createLogger(config.logLevel);
        const { tools, executor } = createRuntime(config, logger);
        const server = createViewQueryServer(tools, {
          version: VERSION,
          defaultRowLimit: config.guard.defaultLimit,
          maxRowLimit: config.guard.maxLimit,
        });

        await server.connect(new StdioServerTransport());
        logger.info('server started', {
          version: VERSION,
          view: config.viewName,
          transport: executor.kind,
          maxRowLimit: config.guard.maxLimit,
        });

        const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
          logger.info('shutting down', { signal });
          await server.close();
          await executor.close();
          process.exit(EXIT_CODE_SUCCESS);
        };
        for (const signal of ['SIGINT', 'SIGTERM'] as const) {
          process.once(signal, () => {
            shutdown(signal).catch((err: unknown) => {
              logger.error('shutdown failed', { error: errorMessage(err) });
              process.exit(EXIT_CODE_RUNTIME);
            });
          });
        }
      });
    }),
  ['viewquery', 'SUPABASE_URL=... SUPABASE_ANON_KEY=... viewquery serve'],
);

// ── check ────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('check')
      .description('Validate a query and show the SQL that would run (no database)')
      .argument('<query>', 'SQL query')
      .option('--row-limit <n>', 'Requested row limit')
      .action(async (query: string, opts: { rowLimit?: string }, command: Command) => {
        await runCommand(command, (output) => {
          const config = loadConfig();
          const guard = new DefaultQueryGuard(config.guard);
          const prepared = guard.prepare(query, parseRowLimit(opts.rowLimit));

          if (!prepared.ok) {
            const { rule, reason, suggestedFix, offendingKeyword } = prepared.rejection;
            throw new QueryValidationError(rule, reason, suggestedFix, offendingKeyword);
          }

          if (output.json) {
            printCommandSuccess(
              {
                sql: prepared.sql,
                effectiveLimit: prepared.effectiveLimit,
                action: prepared.rewrite.action,
                originalLimit: prepared.rewrite.originalLimit,
                warnings: prepared.warnings,
              },
              output,
            );
            return;
          }

          for (const warning of prepared.warnings) {
            printWarning(warning, output);
          }
          printHuman(prepared.sql, output);
          if (output.verbose) {
            printHuman(`(limit ${prepared.effectiveLimit}, ${prepared.rewrite.action})`, output);
          }
        });
      }),
  ),
  [
    'viewquery check "SELECT * FROM roleplay_daily_reports"',
    'viewquery check "select name from t limit 50" --row-limit 10 --json',
  ],
);

// ── query ────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('query')
      .description('Run a query through the guard and print the rows')
      .argument('<query>', 'SQL query')
      .option('--row-limit <n>', 'Requested row limit')
      .action(async (query: string, opts: { rowLimit?: string }, command: Command) => {
        await runCommand(command, async (output) => {
          const config = loadConfig();
          const logger = createLogger(output.debug ? 'debug' : output.verbose ? 'info' : 'warn');
          const { tools, executor } = createRuntime(config, logger);
          try {
            const envelope = await tools.executeCustomQuery({ query, row_limit: parseRowLimit(opts.rowLimit) });
            if (!envelope.success) {
              throw envelopeFailure(envelope);
            }

            if (output.json) {
              printCommandSuccess(envelope, output);
              return;
            }

            const columns = envelope.data.length > 0 ? Object.keys(envelope.data[0]) : [];
            printHumanTable(columns, envelope.data, output);
            printHuman('', output);
            printHuman(`${envelope.row_count} row(s) in ${envelope.execution_time_ms}ms`, output);
            if (envelope._message) {
              printWarning(envelope._message, output);
            }
            if (output.verbose) {
              printHuman(`SQL: ${envelope.query}`, output);
            }
          } finally {
            await executor.close();
          }
        });
      }),
  ),
  [
    'viewquery query "SELECT \\"餐厅完整名称\\", \\"总体任务完成率\\" FROM roleplay_daily_reports" --row-limit 20',
    'viewquery query "SELECT COUNT(*) FROM roleplay_daily_reports" --json',
  ],
);

// ── describe ─────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('describe')
      .description('Show the view columns, metadata and usage hints')
      .action(async (_opts: unknown, command: Command) => {
        await runCommand(command, async (output) => {
          const config = loadConfig();
          const logger = createLogger(output.debug ? 'debug' : 'warn');
          const { tools, executor } = createRuntime(config, logger);
          try {
            const envelope = await tools.getViewSchemaAndSamples();
            if (!envelope.success) {
              throw envelopeFailure(envelope);
            }

            if (output.json) {
              printCommandSuccess(envelope, output);
              return;
            }

            printHuman(`${envelope.view_name}: ${envelope.description}`, output);
            printHuman('', output);
            printHumanTable(
              ['name', 'name_english', 'data_type', 'description'],
              envelope.columns.map((column) => ({ ...column })),
              output,
            );
            printHuman('', output);
            const { total_rows, date_range, restaurant_count } = envelope.metadata;
            printHuman(`Rows: ${total_rows}`, output);
            printHuman(`Dates: ${date_range.earliest} .. ${date_range.latest}`, output);
            printHuman(`Restaurants: ${restaurant_count}`, output);
            if (output.verbose) {
              printHuman('', output);
              printHuman('Usage hints:', output);
              for (const hint of envelope.usage_hints) {
                printHuman(`  ${hint}`, output);
              }
            }
          } finally {
            await executor.close();
          }
        });
      }),
  ),
  ['viewquery describe', 'viewquery describe --json'],
);

// ── doctor ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('doctor')
      .description('Check the runtime and print the resolved configuration')
      .action(async (_opts: unknown, command: Command) => {
        await runCommand(command, (output) => {
          const nodeVersion = process.version;
          const nodeOk = parseInt(nodeVersion.slice(1), 10) >= 20;
          const config = loadConfig();
          const resolved = describeConfig(config);

          if (output.json) {
            printCommandSuccess({ node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 }, config: resolved }, output);
            return;
          }

          printHuman('viewquery doctor', output);
          printHuman('================', output);
          printHuman('', output);
          printHuman(`Node.js:   ${nodeVersion} ${nodeOk ? '✓' : '✗ (requires >=20)'}`, output);
          printHuman(`Transport: ${config.executor ? config.executor.kind : 'not configured'}`, output);
          printHuman(`View:      ${config.viewName}`, output);
          printHuman(`Row limit: default ${config.guard.defaultLimit}, max ${config.guard.maxLimit}`, output);
          printHuman(`Response:  ${config.characterLimit} characters`, output);
          printHuman(`Guard:     keyword scan ${config.guard.keywordScan}, parser ${config.guard.parser}`, output);
          if (output.verbose) {
            printHuman('', output);
            printHuman(JSON.stringify(resolved, null, 2), output);
          }
          if (!config.executor) {
            printWarning('No transport configured: set SUPABASE_URL and SUPABASE_ANON_KEY, or DATABASE_URL.', output);
          }
        });
      }),
  ),
  ['viewquery doctor', 'viewquery doctor --json'],
);

// ── parse ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        process.exitCode = EXIT_CODE_SUCCESS;
        return;
      }
      printError(usageError(error.message), outputOptionsFromCommand(program));
      process.exitCode = EXIT_CODE_USAGE;
      return;
    }
    printError(error, outputOptionsFromCommand(program));
    process.exitCode = toExitCode(error);
  }
}

void main();
