/**
 * Interactive redirect capture
 * Awaits an authenticator's final redirect URL with a timeout and cancellation
 */
import { logEvent } from '@idforge/core';
import type { AuthorizationQueryResponse } from '@idforge/models';
import { IdentityError } from '../errors/identity-error.js';
import { parseAuthorizationQueryResponse } from '../authorization/redirect-response.js';
import { unwrap } from '../utils/result.js';

/**
 * Navigates a user agent to an authorization URL and reports where the
 * identity platform finally redirected it.
 *
 * Implementations should stop work when `signal` aborts.
 * @public
 */
export interface InteractiveAuthenticator {
  authenticate(url: URL, redirectUri: URL, signal: AbortSignal): Promise<URL>;
}

/**
 * @public
 */
export interface CaptureOptions {
  /** Milliseconds to wait for the redirect. Defaults to 5 minutes. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export const DEFAULT_CAPTURE_TIMEOUT_MS = 5 * 60 * 1000;

const OPERATION = 'Interactive authentication';

/**
 * Runs `authenticator` and resolves with the redirect payload it captured.
 *
 * Rejects with `Timeout` once `timeoutMs` elapses, with `Cancelled` when
 * `signal` aborts, and with `MissingRedirectPayload` when the redirect URL has
 * neither query nor fragment. In the first two cases the authenticator's own
 * signal is aborted as well.
 * @public
 */
export async function captureRedirect(
  authenticator: InteractiveAuthenticator,
  url: URL,
  redirectUri: URL,
  options: CaptureOptions = {},
): Promise<AuthorizationQueryResponse> {
  const { timeoutMs = DEFAULT_CAPTURE_TIMEOUT_MS, signal } = options;

  const redirect = await new Promise<URL>((resolve, reject) => {
    if (signal?.aborted) {
      reject(IdentityError.cancelled(OPERATION));
      return;
    }

    const controller = new AbortController();
    let settled = false;

    const settle = (complete: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
      complete();
    };

    const onAbort = (): void => {
      controller.abort();
      settle(() => reject(IdentityError.cancelled(OPERATION)));
    };

    const timeout = setTimeout(() => {
      controller.abort();
      logEvent('warn', 'identity:interactive_timeout', { timeoutMs });
      settle(() => reject(IdentityError.timeout(OPERATION, timeoutMs)));
    }, timeoutMs);

    signal?.addEventListener('abort', onAbort, { once: true });

    let captured: Promise<URL>;
    try {
      captured = authenticator.authenticate(url, redirectUri, controller.signal);
    } catch (error) {
      settle(() => reject(error));
      return;
    }
    void captured.then(
      (value) => settle(() => resolve(value)),
      (error: unknown) => settle(() => reject(error)),
    );
  });

  logEvent('debug', 'identity:redirect_captured', { redirectUri: redirectUri.href });
  return unwrap(parseAuthorizationQueryResponse(redirect));
}
