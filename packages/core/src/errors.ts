/**
 * Start-up configuration fault: bad URL, bad number, unknown table.
 * The process should stop before serving any query.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
