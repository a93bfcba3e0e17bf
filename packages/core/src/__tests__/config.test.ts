import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { loadConfig, parseTableList } from '../config.js';
import { ConfigError } from '../errors.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    assert.deepEqual(loadConfig({}), {
      databaseUrl: 'sqlite:///sql_agent_class.db',
      tables: ['customers', 'orders', 'order_items', 'products', 'refunds', 'payments'],
      defaultLimit: 200,
      statementTimeoutMs: 15_000,
      poolMax: 10,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      SQLGATE_DATABASE_URL: ' postgres://app@localhost/shop ',
      SQLGATE_TABLES: 'customers, orders',
      SQLGATE_DEFAULT_LIMIT: '50',
      SQLGATE_STATEMENT_TIMEOUT_MS: '2000',
      SQLGATE_POOL_MAX: '4',
    });
    assert.deepEqual(config, {
      databaseUrl: 'postgres://app@localhost/shop',
      tables: ['customers', 'orders'],
      defaultLimit: 50,
      statementTimeoutMs: 2000,
      poolMax: 4,
    });
  });

  it('rejects non-numeric limits', () => {
    assert.throws(
      () => loadConfig({ SQLGATE_DEFAULT_LIMIT: 'lots' }),
      (err: unknown) =>
        err instanceof ConfigError &&
        err.message === 'SQLGATE_DEFAULT_LIMIT must be a positive integer, got "lots".',
    );
  });

  it('rejects zero', () => {
    assert.throws(() => loadConfig({ SQLGATE_POOL_MAX: '0' }), ConfigError);
  });

  it('rejects an empty table list', () => {
    assert.throws(() => loadConfig({ SQLGATE_TABLES: ' , ' }), /at least one table/);
  });
});

describe('parseTableList', () => {
  it('splits, trims and drops blanks', () => {
    assert.deepEqual(parseTableList(' a ,b,, c'), ['a', 'b', 'c']);
  });
});
