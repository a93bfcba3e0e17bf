/**
 * Engine factory.
 * Selects the adapter from the connection URL scheme.
 */

import { PostgresEngine } from './adapters/postgres.js';
import { SqliteEngine } from './adapters/sqlite.js';
import { parseDatabaseUrl } from './url.js';
import type { DbEngine, EngineLimits } from './types.js';

/**
 * Create the process-lifetime engine for a connection URL.
 * Throws ConfigError for URLs that cannot be served.
 */
export function createEngine(url: string, limits: EngineLimits = {}): DbEngine {
  const target = parseDatabaseUrl(url);
  switch (target.type) {
    case 'sqlite':
      return new SqliteEngine({ filepath: target.filepath }, limits);
    case 'postgres':
      return new PostgresEngine({ connectionString: target.connectionString }, limits);
  }
}
