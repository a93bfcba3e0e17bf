export function normalizeArgv(rawArgv: string[]): string[] {
  // Script runners may forward args as: node main.js -- <args>
  if (rawArgv[2] === '--') {
    return [rawArgv[0], rawArgv[1], ...rawArgv.slice(3)];
  }
  return rawArgv;
}
