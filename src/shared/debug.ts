import { isDebugEnabled } from './config.js';

/**
 * Log levels. `notice` lines are always written; `debug` lines only when
 * debug mode is on (TAXOGRAPH_DEBUG or `"debug": true` in config.json).
 */
export type LogLevel = 'notice' | 'debug';

let _debugEnabled: boolean | null = null;

function levelEnabled(level: LogLevel): boolean {
  if (level === 'notice') {
    return true;
  }
  if (_debugEnabled === null) {
    _debugEnabled = isDebugEnabled();
  }
  return _debugEnabled;
}

/**
 * Writes one log line to stderr:
 * `[ISO_TIMESTAMP] [TAXOGRAPH:category] LEVEL message {json_data}`
 *
 * Data must stay lightweight and never carry credentials.
 */
export function log(
  level: LogLevel,
  category: string,
  message: string,
  data?: Record<string, unknown>,
): void {
  if (!levelEnabled(level)) {
    return;
  }

  const parts = [
    `[${new Date().toISOString()}]`,
    `[TAXOGRAPH:${category}]`,
    level.toUpperCase(),
    message,
  ];
  if (data !== undefined) {
    parts.push(JSON.stringify(data));
  }
  process.stderr.write(parts.join(' ') + '\n');
}

/**
 * Operator-facing report: failures, and results worth knowing about
 * (an empty extraction). Always on.
 */
export function notice(category: string, message: string, data?: Record<string, unknown>): void {
  log('notice', category, message, data);
}

/** Tracing, off by default. */
export function debug(category: string, message: string, data?: Record<string, unknown>): void {
  log('debug', category, message, data);
}

/**
 * Runs `fn` and traces how long it took. Without debug mode `fn` runs
 * unmeasured.
 */
export function debugTimed<T>(category: string, message: string, fn: () => T): T {
  if (!levelEnabled('debug')) {
    return fn();
  }

  const start = performance.now();
  const result = fn();
  debug(category, message, { ms: Number((performance.now() - start).toFixed(2)) });
  return result;
}
