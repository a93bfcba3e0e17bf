import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseDatabaseUrl } from '../url.js';
import { createEngine } from '../engine.js';
import { ConfigError } from '../../errors.js';

describe('parseDatabaseUrl', () => {
  it('reads a relative sqlite path', () => {
    assert.deepEqual(parseDatabaseUrl('sqlite:///sql_agent_class.db'), {
      type: 'sqlite',
      filepath: 'sql_agent_class.db',
    });
  });

  it('reads an absolute sqlite path', () => {
    assert.deepEqual(parseDatabaseUrl('sqlite:////var/data/shop.db'), {
      type: 'sqlite',
      filepath: '/var/data/shop.db',
    });
  });

  it('drops sqlite query options', () => {
    assert.deepEqual(parseDatabaseUrl('sqlite:///shop.db?mode=ro'), {
      type: 'sqlite',
      filepath: 'shop.db',
    });
  });

  it('normalizes postgres schemes and drops driver suffixes', () => {
    for (const url of [
      'postgres://app@db.internal:5432/shop',
      'postgresql://app@db.internal:5432/shop',
      'postgresql+psycopg2://app@db.internal:5432/shop',
    ]) {
      assert.deepEqual(parseDatabaseUrl(url), {
        type: 'postgres',
        connectionString: 'postgresql://app@db.internal:5432/shop',
      });
    }
  });

  it('rejects in-memory sqlite', () => {
    assert.throws(() => parseDatabaseUrl('sqlite://'), ConfigError);
    assert.throws(() => parseDatabaseUrl('sqlite:///:memory:'), ConfigError);
  });

  it('rejects empty and malformed URLs', () => {
    assert.throws(() => parseDatabaseUrl('  '), /Database URL is empty/);
    assert.throws(() => parseDatabaseUrl('shop.db'), /not of the form/);
  });

  it('rejects unsupported schemes', () => {
    assert.throws(
      () => parseDatabaseUrl('mysql://app@localhost/shop'),
      /Unsupported database scheme: mysql/,
    );
  });
});

describe('createEngine', () => {
  it('picks the engine from the URL scheme', async () => {
    const sqlite = createEngine('sqlite:///shop.db');
    assert.equal(sqlite.type, 'sqlite');

    const postgres = createEngine('postgres://app@127.0.0.1:1/shop');
    assert.equal(postgres.type, 'postgres');
    await postgres.close();
  });
});
