import type { Command } from 'commander';
import { ViewQueryError } from '@viewquery/core';
import { formatTable } from './util/table.js';
import { CliError, fromCoreError } from './errors.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

export function outputOptionsFromCommand(command: Command): OutputOptions {
  const opts = command.optsWithGlobals();
  return {
    json: Boolean(opts.json),
    quiet: Boolean(opts.quiet),
    verbose: Boolean(opts.verbose),
    debug: Boolean(opts.debug),
  };
}

export function printHuman(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.log(message);
  }
}

export function printWarning(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.warn(`Warning: ${message}`);
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function printHumanTable(columns: string[], rows: Record<string, unknown>[], output: OutputOptions): void {
  if (output.quiet) return;
  console.log(formatTable(columns, rows));
}

export function printError(error: unknown, output: OutputOptions): void {
  const normalized = error instanceof ViewQueryError ? fromCoreError(error) : error;
  const isCliError = normalized instanceof CliError;
  const message = normalized instanceof Error ? normalized.message : String(normalized);

  if (output.json) {
    const payload: Record<string, unknown> = {
      ok: false,
      code: isCliError ? normalized.code : 'INTERNAL_ERROR',
      message,
    };
    if (isCliError && normalized.suggestion) {
      payload.suggestion = normalized.suggestion;
    }
    if (output.debug) {
      payload.details = isCliError
        ? normalized.details ?? null
        : normalized instanceof Error
          ? { stack: normalized.stack }
          : { raw: String(normalized) };
    }
    printJson(payload);
    return;
  }

  console.error(`Error: ${message}`);
  if (isCliError && normalized.suggestion) {
    console.error(`Suggestion: ${normalized.suggestion}`);
  }
  if (output.debug) {
    if (isCliError && normalized.details !== undefined) {
      console.error('Details:', JSON.stringify(normalized.details, null, 2));
    } else if (normalized instanceof Error && normalized.stack) {
      console.error(normalized.stack);
    }
  }
}

export function printCommandSuccess(value: unknown, output: OutputOptions, humanMessage?: string): void {
  if (output.json) {
    printJson({ ok: true, data: value });
    return;
  }
  if (humanMessage && !output.quiet) {
    console.log(humanMessage);
  }
}

export function withOutputFlags<T extends Command>(command: T): T {
  command
    .option('--json', 'Machine-readable JSON output', false)
    .option('--quiet', 'Suppress non-essential logs', false)
    .option('--verbose', 'Show additional context', false)
    .option('--debug', 'Show internal error details and stacks', false);
  return command;
}
