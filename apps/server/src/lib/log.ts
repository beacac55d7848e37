type LogLevel = 'info' | 'warn' | 'error'

/**
 * Write one structured JSON line. Errors go to stderr, everything else to
 * stdout, so log aggregators can split them without parsing.
 */
export function log(level: LogLevel, fields: Record<string, unknown>): void {
  const line = JSON.stringify({ ts: new Date().toISOString(), level, ...fields }) + '\n'
  if (level === 'error') process.stderr.write(line)
  else process.stdout.write(line)
}
