import { rootLogger } from './logging/pino-setup.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Writes a structured log event through the redacting root logger.
 *
 * Events are namespaced strings such as `identity:token_request_start`;
 * `data` is attached as-is and redacted by path before serialization.
 * @param level - Log severity level
 * @param event - Event identifier for categorization
 * @param data - Optional structured data to include
 * @public
 */
export function logEvent(
  level: LogLevel,
  event: string,
  data?: Record<string, unknown>,
): void {
  rootLogger[level]({ event, ...data });
}

/**
 * Logs an error event with the error's message, code and stack.
 * @param context - Contextual label identifying where the error occurred
 * @param rawError - The error object or value that was thrown
 * @param extra - Additional structured context to aid debugging
 * @public
 */
export function logError(
  context: string,
  rawError: unknown,
  extra?: Record<string, unknown>,
): void {
  const err = rawError instanceof Error ? rawError : undefined;
  const code =
    typeof rawError === 'object' && rawError !== null && 'code' in rawError
      ? rawError.code
      : undefined;
  logEvent('error', `error:${context}`, {
    message: err?.message ?? String(rawError),
    stack: err?.stack,
    code,
    extra,
  });
}
