/**
 * End-to-end command tests: spawn the CLI through tsx against a temp SQLite file.
 */

import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { spawnSync } from 'node:child_process';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import Database from 'better-sqlite3';

const MAIN = fileURLToPath(new URL('../main.ts', import.meta.url));
const REPO_ROOT = fileURLToPath(new URL('../../../../', import.meta.url));

interface CliRun {
  status: number | null;
  stdout: string;
  stderr: string;
}

let dir: string;
let databaseUrl: string;

function sqlgate(args: string[], stdin = ''): CliRun {
  const result = spawnSync(process.execPath, ['--import', 'tsx', MAIN, ...args], {
    cwd: REPO_ROOT,
    input: stdin,
    encoding: 'utf8',
    timeout: 60_000,
    env: { ...process.env, SQLGATE_DATABASE_URL: databaseUrl, SQLGATE_DEFAULT_LIMIT: '200' },
  });
  return { status: result.status, stdout: result.stdout, stderr: result.stderr };
}

before(() => {
  dir = mkdtempSync(join(tmpdir(), 'sqlgate-cli-'));
  const path = join(dir, 'shop.sqlite');
  const db = new Database(path);
  db.exec(`
    CREATE TABLE customers (id INTEGER PRIMARY KEY, name TEXT NOT NULL);
    INSERT INTO customers (id, name) VALUES (1, 'Ada Park'), (2, 'Ben Ortiz');
  `);
  db.close();
  // Absolute paths take a fourth slash
  databaseUrl = `sqlite:///${path}`;
});

after(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('sqlgate check', () => {
  it('prints the bounded statement', () => {
    const run = sqlgate(['check', 'SELECT id FROM customers']);
    assert.equal(run.status, 0);
    assert.equal(run.stdout, 'SELECT id FROM customers LIMIT 200\n');
    assert.equal(run.stderr, '');
  });

  it('reports the LIMIT injection with --verbose', () => {
    const run = sqlgate(['check', '--verbose', 'SELECT id FROM customers']);
    assert.equal(run.status, 0);
    assert.equal(run.stderr, 'LIMIT 200 appended (no LIMIT or aggregate present).\n');
  });

  it('honours --limit', () => {
    const run = sqlgate(['--limit', '5', 'check', 'SELECT id FROM customers']);
    assert.equal(run.status, 0);
    assert.equal(run.stdout, 'SELECT id FROM customers LIMIT 5\n');
  });

  it('exits 3 on a refusal', () => {
    const run = sqlgate(['check', 'DELETE FROM customers WHERE id = 1']);
    assert.equal(run.status, 3);
    assert.equal(run.stdout, '');
    assert.equal(
      run.stderr,
      [
        'ERROR: write operations are not allowed.',
        '  reason: write_operation_forbidden',
        '  fix: Rewrite the request as a read-only SELECT.',
        '',
      ].join('\n'),
    );
  });

  it('prints refusals as JSON with --json', () => {
    const run = sqlgate(['check', '--json', 'UPDATE customers SET name = 1']);
    assert.equal(run.status, 3);
    assert.deepEqual(JSON.parse(run.stdout), {
      ok: false,
      code: 'POLICY_BLOCKED',
      message: 'ERROR: write operations are not allowed.',
      reason: 'write_operation_forbidden',
      suggestedFix: 'Rewrite the request as a read-only SELECT.',
    });
  });

  it('rejects a non-integer --limit', () => {
    const run = sqlgate(['--limit', 'abc', 'check', 'SELECT id FROM customers']);
    assert.equal(run.status, 1);
    assert.equal(run.stderr, 'Error: Invalid --limit: expected a positive integer, got "abc".\n');
  });
});

describe('sqlgate run', () => {
  it('prints rows as a table', () => {
    const run = sqlgate(['run', 'SELECT id, name FROM customers ORDER BY id']);
    assert.equal(run.status, 0);
    assert.equal(
      run.stdout,
      ['id | name     ', '---+----------', '1  | Ada Park ', '2  | Ben Ortiz', '(2 rows)', ''].join('\n'),
    );
  });

  it('prints the observation with --format json', () => {
    const run = sqlgate(['run', '--format', 'json', 'SELECT name FROM customers ORDER BY id']);
    assert.equal(run.status, 0);
    assert.deepEqual(JSON.parse(run.stdout), {
      columns: ['name'],
      rows: [['Ada Park'], ['Ben Ortiz']],
    });
  });

  it('reads the statement from stdin', () => {
    const run = sqlgate(['run', '--format', 'json'], 'SELECT count(*) FROM customers\n');
    assert.equal(run.status, 0);
    assert.deepEqual(JSON.parse(run.stdout), { columns: ['count(*)'], rows: [[2]] });
  });

  it('exits 2 on an execution error', () => {
    const run = sqlgate(['run', 'SELECT nickname FROM customers']);
    assert.equal(run.status, 2);
    assert.equal(run.stdout, '');
    assert.equal(run.stderr, 'ERROR: no such column: nickname\n');
  });

  it('exits 3 on a refusal without touching the database', () => {
    const run = sqlgate(['run', 'DROP TABLE customers']);
    assert.equal(run.status, 3);
    const count = sqlgate(['run', '--format', 'json', 'SELECT count(*) FROM customers']);
    assert.deepEqual(JSON.parse(count.stdout), { columns: ['count(*)'], rows: [[2]] });
  });

  it('rejects an unknown --format', () => {
    const run = sqlgate(['run', '--format', 'csv', 'SELECT 1']);
    assert.equal(run.status, 1);
    assert.equal(run.stderr, 'Error: Invalid --format: csv. Expected table or json.\n');
  });
});

describe('sqlgate tool', () => {
  it('prints the tool definition', () => {
    const run = sqlgate(['tool']);
    assert.equal(run.status, 0);
    const definition: unknown = JSON.parse(run.stdout);
    assert.deepEqual(definition, {
      name: 'execute_sql',
      description: 'Execute exactly one SELECT statement; DML/DDL is forbidden.',
      parameters: {
        type: 'object',
        properties: {
          sql: {
            type: 'string',
            minLength: 1,
            description: 'A single read-only SELECT statement, bounded with LIMIT when returning many rows.',
          },
        },
        required: ['sql'],
        additionalProperties: false,
      },
    });
  });
});
