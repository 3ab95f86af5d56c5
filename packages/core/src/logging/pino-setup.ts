/**
 * Pino logger setup with automatic redaction of sensitive data
 *
 * Uses fast-redact (bundled with pino) for path-based redaction of client
 * credentials, grants and PKCE material that flow through request builders.
 */

import pino from 'pino';

/**
 * Paths censored on every log line.
 *
 * Covers both wire names (`client_secret`) and the camelCase field names
 * used by credential records (`clientSecret`), one level deep.
 * @public
 */
export const REDACTED_PATHS: readonly string[] = [
  // Client authentication
  'client_secret',
  '*.client_secret',
  'clientSecret',
  '*.clientSecret',
  'client_assertion',
  '*.client_assertion',
  'clientAssertion',
  '*.clientAssertion',
  'authorization',
  '*.authorization',
  'Authorization',
  '*.Authorization',
  'password',
  '*.password',

  // Grants and issued tokens
  'code',
  '*.code',
  'authorizationCode',
  '*.authorizationCode',
  'refresh_token',
  '*.refresh_token',
  'refreshToken',
  '*.refreshToken',
  'access_token',
  '*.access_token',
  'id_token',
  '*.id_token',

  // PKCE
  'code_verifier',
  '*.code_verifier',
  'codeVerifier',
  '*.codeVerifier',

  // Key material
  'privateKey',
  '*.privateKey',
];

function levelFromEnv(): pino.LevelWithSilent {
  const env = (process.env.IDFORGE_LOG_LEVEL || '').toLowerCase();
  const levels: pino.LevelWithSilent[] = [
    'fatal',
    'error',
    'warn',
    'info',
    'debug',
    'trace',
    'silent',
  ];
  const match = levels.find((level) => level === env);
  return match ?? 'silent';
}

/**
 * Creates a logger with the shared redaction configuration.
 *
 * Exposed so tests and embedding applications can point the same redaction
 * rules at their own destination stream.
 * @param destination - Optional stream receiving serialized log lines
 * @public
 */
export function createRedactingLogger(
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level: levelFromEnv(),
    base: { service: 'idforge' },
    redact: {
      paths: [...REDACTED_PATHS],
      censor: '[REDACTED]',
      remove: false, // Keep the keys, just redact values
    },
    serializers: {
      ...pino.stdSerializers,
      err: pino.stdSerializers.err,
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

/**
 * Root logger instance with automatic redaction of sensitive data.
 *
 * Silent unless `IDFORGE_LOG_LEVEL` names a pino level. Update the level at
 * runtime when needed for debugging.
 *
 * @example
 * ```typescript
 * import { rootLogger } from '@idforge/core';
 *
 * rootLogger.level = 'debug';
 * rootLogger.info({ client_secret: 'test-secret' }); // { client_secret: '[REDACTED]' }
 * ```
 * @public
 */
export const rootLogger: pino.Logger = createRedactingLogger();
