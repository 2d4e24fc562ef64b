import { isDebugEnabled } from './config.js';

/**
 * Debug mode is process-lifetime: resolved on the first log call, then fixed.
 */
let _enabled: boolean | null = null;

function enabled(): boolean {
  if (_enabled === null) {
    _enabled = isDebugEnabled();
  }
  return _enabled;
}

/**
 * Writes one debug line to stderr when debug mode is on. A no-op otherwise.
 *
 * Format: `[ISO_TIMESTAMP] [HYPERLAYER:category] message {json_data}`
 *
 * stdout is never used: the MCP server speaks its protocol there.
 *
 * @param category - Debug category (e.g., 'db', 'store', 'validate', 'reason')
 * @param data - Optional structured context, kept small
 */
export function debug(
  category: string,
  message: string,
  data?: Record<string, unknown>,
): void {
  if (!enabled()) {
    return;
  }

  let line = `[${new Date().toISOString()}] [HYPERLAYER:${category}] ${message}`;
  if (data !== undefined) {
    line += ` ${JSON.stringify(data)}`;
  }
  process.stderr.write(line + '\n');
}

/**
 * Logs a caught error with its name and message. The error is not consumed:
 * callers still rethrow or report it.
 */
export function debugError(category: string, message: string, err: unknown): void {
  if (!enabled()) {
    return;
  }
  const detail =
    err instanceof Error
      ? { error: err.name, message: err.message }
      : { error: String(err) };
  debug(category, message, detail);
}

/**
 * Runs `fn` and logs how long it took. With debug off, `fn` runs bare.
 */
export function debugTimed<T>(
  category: string,
  message: string,
  fn: () => T,
): T {
  if (!enabled()) {
    return fn();
  }

  const start = performance.now();
  const result = fn();
  const duration = (performance.now() - start).toFixed(2);
  debug(category, `${message} (${duration}ms)`);
  return result;
}
