import { randomBytes } from 'node:crypto';

/**
 * Generates a request id for log correlation: `<epoch millis>_<8 hex chars>`.
 * @public
 */
export function generateRequestId(): string {
  return `${Date.now()}_${randomBytes(4).toString('hex')}`;
}
