import type { Command } from 'commander';
import { errorMessage } from '@sqlgate/core';
import { formatTable } from './util/table.js';
import { CliError } from './errors.js';

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

/** Extra context on stderr, shown only with --verbose */
export function printVerbose(message: string, output: OutputOptions): void {
  if (output.verbose && !output.quiet) {
    console.error(message);
  }
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, jsonReplacer, 2);
}

export function printJson(value: unknown): void {
  console.log(toJson(value));
}

export function printHumanTable(columns: string[], rows: unknown[][], output: OutputOptions): void {
  if (output.quiet) return;
  console.log(formatTable(columns, rows));
}

/**
 * Human rendering of a failure. Refusals and query failures keep the
 * `ERROR: ...` form an agent sees; everything else is a plain `Error:` line.
 */
export function formatError(error: unknown, debug: boolean): string[] {
  const message = errorMessage(error);
  if (error instanceof CliError) {
    if (error.refusal) {
      return [message, `  reason: ${error.refusal.reason}`, `  fix: ${error.refusal.suggestedFix}`];
    }
    if (error.code === 'DB_QUERY_FAILED') {
      const lines = [`ERROR: ${message}`];
      if (debug && error.sql !== undefined) lines.push(`  sql: ${error.sql}`);
      return lines;
    }
    return [`Error: ${message}`];
  }

  const lines = [`Error: ${message}`];
  if (debug && error instanceof Error && error.stack) lines.push(error.stack);
  return lines;
}

export function errorPayload(error: unknown, debug: boolean): Record<string, unknown> {
  const payload: Record<string, unknown> = {
    ok: false,
    code: error instanceof CliError ? error.code : 'INTERNAL_ERROR',
    message: errorMessage(error),
  };
  if (error instanceof CliError) {
    if (error.refusal) {
      payload.reason = error.refusal.reason;
      payload.suggestedFix = error.refusal.suggestedFix;
    }
    if (error.sql !== undefined) payload.sql = error.sql;
  } else if (debug && error instanceof Error) {
    payload.stack = error.stack;
  }
  return payload;
}

export function printError(error: unknown, output: OutputOptions): void {
  if (output.json) {
    printJson(errorPayload(error, output.debug));
    return;
  }
  for (const line of formatError(error, output.debug)) {
    console.error(line);
  }
}

export function printCommandSuccess(value: unknown, output: OutputOptions): void {
  if (output.json) {
    printJson({ ok: true, data: value });
  }
}

/** Per-command output flags; unset ones fall back to the program-level flags */
export function withOutputFlags<T extends Command>(command: T): T {
  return command
    .option('--json', 'Machine-readable JSON output')
    .option('--quiet', 'Suppress non-essential logs')
    .option('--verbose', 'Show additional context')
    .option('--debug', 'Show internal error details and stacks');
}
