/** Log levels in increasing severity; `silent` turns logging off. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(SEVERITY, value);
}

/**
 * Threshold from `PHONEBOOK_LOG_LEVEL`, defaulting to `info`. A set `DEBUG`
 * lowers it to `debug`.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const configured = env.PHONEBOOK_LOG_LEVEL?.toLowerCase();
  if (configured && isLogLevel(configured)) return configured;
  return env.DEBUG ? 'debug' : 'info';
}

function emit(level: Exclude<LogLevel, 'silent'>, args: unknown[]): void {
  if (SEVERITY[level] < SEVERITY[resolveLogLevel()]) return;
  console.error(`phonebook [${level.toUpperCase()}]`, ...args);
}

/** All logging goes to stderr so stdout carries only command output. */
export const logger = {
  debug: (...args: unknown[]) => emit('debug', args),
  info: (...args: unknown[]) => emit('info', args),
  warn: (...args: unknown[]) => emit('warn', args),
  error: (...args: unknown[]) => emit('error', args),
};
