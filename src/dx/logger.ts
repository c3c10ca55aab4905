export type LogLevel = 'debug' | 'info' | 'warn';

let enabled = false;

export function isDebugEnabled(): boolean {
  return enabled || process.env.ABIFORGE_DEBUG === '1';
}

/**
 * Turns generator logging on or off for this process.
 *
 * `ABIFORGE_DEBUG=1` and the `debug` key of `abiforge.config.js` have the
 * same effect.
 */
export function setDebugEnabled(v: boolean) {
  enabled = v;
}

/** Everything the generator prints goes through here, and only in debug mode. */
export function log(level: LogLevel, ...args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  if (level === 'warn') console.warn('[abiforge]', ...args);
  // eslint-disable-next-line no-console
  else console.log('[abiforge]', `${level}:`, ...args);
}

export function logDebug(...args: unknown[]) {
  log('debug', ...args);
}

export function logInfo(...args: unknown[]) {
  log('info', ...args);
}

export function logWarn(...args: unknown[]) {
  log('warn', ...args);
}
