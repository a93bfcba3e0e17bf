import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ConfigError, admit } from '@sqlgate/core';
import {
  CliError,
  EXIT_CODE_POLICY,
  EXIT_CODE_RUNTIME,
  EXIT_CODE_USAGE,
  fromCoreError,
  policyError,
  queryError,
  toExitCode,
  usageError,
} from '../errors.js';
import { normalizeArgv } from '../argv.js';

describe('toExitCode', () => {
  it('maps error kinds to exit codes', () => {
    assert.equal(toExitCode(usageError('bad flag')), EXIT_CODE_USAGE);
    assert.equal(toExitCode(queryError('no such table: x', 'SELECT * FROM x LIMIT 200')), EXIT_CODE_RUNTIME);
    assert.equal(toExitCode(new Error('boom')), EXIT_CODE_RUNTIME);
  });

  it('maps a refusal to the policy exit code', () => {
    const verdict = admit('DROP TABLE orders');
    assert.equal(verdict.status, 'rejected');
    if (verdict.status !== 'rejected') return;
    const error = policyError(verdict);
    assert.equal(toExitCode(error), EXIT_CODE_POLICY);
    assert.equal(error.message, 'ERROR: write operations are not allowed.');
    assert.deepEqual(error.refusal, {
      reason: 'write_operation_forbidden',
      suggestedFix: 'Rewrite the request as a read-only SELECT.',
    });
  });
});

describe('fromCoreError', () => {
  it('turns config faults into usage errors', () => {
    const mapped = fromCoreError(new ConfigError('Database URL is empty.'));
    assert.ok(mapped instanceof CliError);
    assert.equal(mapped.kind, 'usage');
    assert.equal(mapped.code, 'CONFIG_INVALID');
    assert.equal(mapped.message, 'Database URL is empty.');
  });

  it('passes other errors through', () => {
    const err = new Error('boom');
    assert.equal(fromCoreError(err), err);
  });
});

describe('normalizeArgv', () => {
  it('drops a forwarded separator', () => {
    assert.deepEqual(normalizeArgv(['node', 'main.js', '--', 'run', 'SELECT 1']), [
      'node',
      'main.js',
      'run',
      'SELECT 1',
    ]);
  });

  it('leaves ordinary argv alone', () => {
    const argv = ['node', 'main.js', 'tool'];
    assert.deepEqual(normalizeArgv(argv), argv);
  });
});
