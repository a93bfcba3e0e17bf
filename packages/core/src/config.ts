/**
 * Process configuration, read once at start-up from the environment.
 */

import { SAFE_DEFAULTS } from './db/defaults.js';
import { ConfigError } from './errors.js';

export interface GuardrailConfig {
  /** Connection URL, e.g. sqlite:///sql_agent_class.db */
  databaseUrl: string;
  /** Tables described to the agent */
  tables: string[];
  defaultLimit: number;
  statementTimeoutMs: number;
  poolMax: number;
}

export const DEFAULT_DATABASE_URL = 'sqlite:///sql_agent_class.db';

export const DEFAULT_TABLES = [
  'customers',
  'orders',
  'order_items',
  'products',
  'refunds',
  'payments',
] as const;

function readPositiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}".`);
  }
  return Number(raw);
}

export function parseTableList(raw: string): string[] {
  return raw
    .split(',')
    .map((t) => t.trim())
    .filter((t) => t.length > 0);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GuardrailConfig {
  const databaseUrl = env.SQLGATE_DATABASE_URL?.trim() || DEFAULT_DATABASE_URL;

  const tables = env.SQLGATE_TABLES ? parseTableList(env.SQLGATE_TABLES) : [...DEFAULT_TABLES];
  if (tables.length === 0) {
    throw new ConfigError('SQLGATE_TABLES must name at least one table.');
  }

  return {
    databaseUrl,
    tables,
    defaultLimit: readPositiveInt(env, 'SQLGATE_DEFAULT_LIMIT', SAFE_DEFAULTS.defaultLimit),
    statementTimeoutMs: readPositiveInt(
      env,
      'SQLGATE_STATEMENT_TIMEOUT_MS',
      SAFE_DEFAULTS.statementTimeoutMs,
    ),
    poolMax: readPositiveInt(env, 'SQLGATE_POOL_MAX', SAFE_DEFAULTS.poolMax),
  };
}
