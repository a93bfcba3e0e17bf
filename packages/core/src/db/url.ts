/**
 * Connection URL parsing.
 *
 * Accepts the usual URL forms:
 *   sqlite:///relative/path.db      → relative/path.db
 *   sqlite:////absolute/path.db     → /absolute/path.db
 *   postgres://user@host:5432/db    → passed to pg as-is
 *   postgresql+psycopg2://...       → driver suffix dropped
 */

import { ConfigError } from '../errors.js';

export type DatabaseTarget =
  | { type: 'sqlite'; filepath: string }
  | { type: 'postgres'; connectionString: string };

const URL_RE = /^([a-z][a-z0-9.-]*)(?:\+[a-z0-9_.-]+)?:\/\/(.*)$/i;

export function parseDatabaseUrl(url: string): DatabaseTarget {
  const trimmed = url.trim();
  if (!trimmed) {
    throw new ConfigError('Database URL is empty.');
  }

  const match = URL_RE.exec(trimmed);
  if (!match) {
    throw new ConfigError(`Database URL "${trimmed}" is not of the form <scheme>://<location>.`);
  }

  const scheme = match[1].toLowerCase();
  const rest = match[2];

  switch (scheme) {
    case 'sqlite':
      return { type: 'sqlite', filepath: sqlitePath(rest) };
    case 'postgres':
    case 'postgresql':
      if (!rest) {
        throw new ConfigError('Postgres URL has no host or database.');
      }
      return { type: 'postgres', connectionString: `postgresql://${rest}` };
    default:
      throw new ConfigError(`Unsupported database scheme: ${scheme}. Supported: sqlite, postgres.`);
  }
}

function sqlitePath(rest: string): string {
  // One slash separates the empty host from the path; query options are dropped
  const withoutQuery = rest.split('?')[0];
  const filepath = withoutQuery.startsWith('/') ? withoutQuery.slice(1) : withoutQuery;
  if (!filepath || filepath === ':memory:') {
    throw new ConfigError(
      'In-memory SQLite is not supported: each connection would open its own empty database.',
    );
  }
  return filepath;
}
