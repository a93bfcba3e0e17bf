#!/usr/bin/env node

/**
 * sqlgate CLI entrypoint.
 * Admits, executes and describes read-only queries through the guardrail.
 */

import { Command, CommanderError } from 'commander';
import {
  AdmissionPolicy,
  EXECUTE_SQL_TOOL,
  createEngine,
  describeSchema,
  loadConfig,
  parseTableList,
  runGuardedQuery,
  toObservation,
  type GuardrailConfig,
} from '@sqlgate/core';
import { normalizeArgv } from './argv.js';
import {
  EXIT_CODE_SUCCESS,
  fromCoreError,
  policyError,
  queryError,
  toExitCode,
  usageError,
} from './errors.js';
import {
  outputOptionsFromCommand,
  printCommandSuccess,
  printError,
  printHuman,
  printHumanTable,
  printJson,
  printVerbose,
  withOutputFlags,
} from './output.js';

const VERSION = '0.1.0';

type GlobalOptions = {
  db?: string;
  limit?: string;
};

interface SqlOptions {
  sql?: string;
}

interface RunOptions extends SqlOptions {
  format: string;
}

interface SchemaOptions {
  tables?: string;
}

// ── Helpers ──────────────────────────────────────────────────────────

function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    process.stdin.setEncoding('utf-8');
    process.stdin.on('data', (chunk) => (data += chunk));
    process.stdin.on('end', () => resolve(data.trim()));
    process.stdin.on('error', reject);
  });
}

async function resolveSql(arg: string | undefined, opts: SqlOptions): Promise<string> {
  let sql = arg ?? opts.sql ?? '';
  if (!sql) {
    if (process.stdin.isTTY) {
      throw usageError('Provide SQL as an argument, via --sql, or pipe it via stdin.');
    }
    sql = await readStdin();
  }
  if (!sql.trim()) {
    throw usageError('Empty SQL statement.');
  }
  return sql;
}

function parsePositiveInt(raw: string, flag: string): number {
  const value = Number(raw);
  if (!/^\d+$/.test(raw) || value <= 0) {
    throw usageError(`Invalid ${flag}: expected a positive integer, got "${raw}".`);
  }
  return value;
}

/** Environment config with --db / --limit applied on top */
function resolveConfig(command: Command): GuardrailConfig {
  const opts = command.optsWithGlobals<GlobalOptions>();
  const config = loadConfig();
  return {
    ...config,
    databaseUrl: opts.db ?? config.databaseUrl,
    defaultLimit: opts.limit ? parsePositiveInt(opts.limit, '--limit') : config.defaultLimit,
  };
}

function openEngine(config: GuardrailConfig) {
  return createEngine(config.databaseUrl, {
    statementTimeoutMs: config.statementTimeoutMs,
    poolMax: config.poolMax,
  });
}

async function runCommand(
  command: Command,
  fn: (output: ReturnType<typeof outputOptionsFromCommand>) => Promise<void> | void,
): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    const mapped = fromCoreError(error);
    printError(mapped, output);
    process.exitCode = toExitCode(mapped);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('sqlgate')
  .description('sqlgate: read-only SQL guardrail for agents')
  .option('--db <url>', 'Database URL (default: $SQLGATE_DATABASE_URL or sqlite:///sql_agent_class.db)')
  .option('--limit <n>', 'LIMIT appended to unbounded queries (default: $SQLGATE_DEFAULT_LIMIT or 200)')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential logs', false)
  .option('--verbose', 'Show additional context', false)
  .option('--debug', 'Show internal error details and stacks', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();

// ── check ────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('check')
      .description('Run admission only and print the statement that would execute')
      .argument('[sql]', 'Candidate SQL statement')
      .option('--sql <sql>', 'Candidate SQL statement')
      .action(async function (this: Command, sqlArg: string | undefined, opts: SqlOptions) {
        await runCommand(this, async (output) => {
          const sql = await resolveSql(sqlArg, opts);
          const config = resolveConfig(this);
          const policy = new AdmissionPolicy({ defaultLimit: config.defaultLimit });

          const verdict = policy.admit(sql);
          if (verdict.status === 'rejected') {
            throw policyError(verdict);
          }

          if (output.json) {
            printCommandSuccess(verdict, output);
            return;
          }
          if (verdict.limitApplied) {
            printVerbose(`LIMIT ${config.defaultLimit} appended (no LIMIT or aggregate present).`, output);
          }
          printHuman(verdict.finalText, output);
        });
      }),
  ),
  [
    'sqlgate check "SELECT id FROM customers"',
    'echo "SELECT count(*) FROM orders" | sqlgate check --json',
  ],
);

// ── run ──────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('run')
      .description('Admit and execute a query, printing rows or the refusal')
      .argument('[sql]', 'Candidate SQL statement')
      .option('--sql <sql>', 'Candidate SQL statement')
      .option('--format <format>', 'Output format (table|json)', 'table')
      .action(async function (this: Command, sqlArg: string | undefined, opts: RunOptions) {
        await runCommand(this, async (output) => {
          if (opts.format !== 'table' && opts.format !== 'json') {
            throw usageError(`Invalid --format: ${opts.format}. Expected table or json.`);
          }
          const sql = await resolveSql(sqlArg, opts);
          const config = resolveConfig(this);
          const policy = new AdmissionPolicy({ defaultLimit: config.defaultLimit });
          const engine = openEngine(config);

          try {
            const outcome = await runGuardedQuery(engine, sql, policy.getConfig());

            if (outcome.status === 'rejected') {
              throw policyError(outcome.verdict);
            }
            if (outcome.status === 'error') {
              throw queryError(outcome.result.message, outcome.verdict.finalText);
            }

            if (output.json) {
              printCommandSuccess(
                {
                  sql: outcome.verdict.finalText,
                  limitApplied: outcome.verdict.limitApplied,
                  columns: outcome.result.columns,
                  rows: outcome.result.rows,
                  execMs: outcome.execMs,
                },
                output,
              );
              return;
            }

            printVerbose(`Executed: ${outcome.verdict.finalText}`, output);
            printVerbose(`Took ${outcome.execMs}ms`, output);
            if (opts.format === 'json') {
              printJson(toObservation(outcome));
            } else {
              printHumanTable(outcome.result.columns, outcome.result.rows, output);
            }
          } finally {
            await engine.close();
          }
        });
      }),
  ),
  [
    'sqlgate run "SELECT id, name FROM customers"',
    'sqlgate --db sqlite:///shop.db run --format json "SELECT count(*) FROM orders"',
  ],
);

// ── schema ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('schema')
      .description('Describe the allowlisted tables for agent instructions')
      .option('--tables <list>', 'Comma-separated tables (default: $SQLGATE_TABLES)')
      .action(async function (this: Command, opts: SchemaOptions) {
        await runCommand(this, async (output) => {
          const config = resolveConfig(this);
          const tables = opts.tables ? parseTableList(opts.tables) : config.tables;
          if (tables.length === 0) {
            throw usageError('--tables must name at least one table.');
          }

          const engine = openEngine(config);
          try {
            const snapshot = await engine.introspect(tables);
            if (output.json) {
              printCommandSuccess(snapshot, output);
              return;
            }
            printHuman(describeSchema(snapshot), output);
          } finally {
            await engine.close();
          }
        });
      }),
  ),
  ['sqlgate schema', 'sqlgate --db sqlite:///shop.db schema --tables customers,orders'],
);

// ── tool ─────────────────────────────────────────────────────────────

program
  .command('tool')
  .description('Print the execute_sql tool definition as JSON')
  .action(() => {
    printJson(EXECUTE_SQL_TOOL);
  });

// ── parse ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const normalizedArgv = normalizeArgv(process.argv);
  try {
    await program.parseAsync(normalizedArgv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        process.exitCode = EXIT_CODE_SUCCESS;
        return;
      }
      printError(usageError(error.message), output);
      process.exitCode = toExitCode(usageError(error.message));
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();
