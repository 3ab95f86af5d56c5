import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { IdentityErrorKind } from '../errors/identity-error.js';
import {
  DEFAULT_CAPTURE_TIMEOUT_MS,
  captureRedirect,
  type InteractiveAuthenticator,
} from '../interactive/interactive-authenticator.js';
import { createMockAuthenticator } from './test-utils.js';

const AUTHORIZE_URL = new URL('https://login.microsoftonline.com/common/oauth2/v2.0/authorize?client_id=x');
const REDIRECT_URI = new URL('http://localhost:8000/redirect');

/** Never settles until its signal aborts. */
const waitForAbort: InteractiveAuthenticator['authenticate'] = (_url, _redirectUri, signal) =>
  new Promise<URL>((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });

describe('captureRedirect', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve with the payload of the captured redirect', async () => {
    const { authenticator } = createMockAuthenticator(async () =>
      new URL('http://localhost:8000/redirect#id_token=header.body.sig&state=s-1'),
    );

    const response = await captureRedirect(authenticator, AUTHORIZE_URL, REDIRECT_URI);

    expect(response).toEqual({ id_token: 'header.body.sig', state: 's-1' });
  });

  it('should time out and abort the authenticator', async () => {
    const { authenticator, authenticate } = createMockAuthenticator(waitForAbort);

    const outcome = expect(
      captureRedirect(authenticator, AUTHORIZE_URL, REDIRECT_URI, { timeoutMs: 1000 }),
    ).rejects.toMatchObject({
      kind: IdentityErrorKind.TIMEOUT,
      message: 'Interactive authentication timed out after 1000ms',
    });
    await vi.advanceTimersByTimeAsync(1000);
    await outcome;

    expect(authenticate.mock.calls[0]?.[2].aborted).toBe(true);
  });

  it('should wait five minutes by default', async () => {
    const { authenticator } = createMockAuthenticator(waitForAbort);

    const outcome = expect(
      captureRedirect(authenticator, AUTHORIZE_URL, REDIRECT_URI),
    ).rejects.toMatchObject({ message: 'Interactive authentication timed out after 300000ms' });
    await vi.advanceTimersByTimeAsync(DEFAULT_CAPTURE_TIMEOUT_MS);
    await outcome;
  });

  it('should cancel when the caller aborts', async () => {
    const { authenticator, authenticate } = createMockAuthenticator(waitForAbort);
    const controller = new AbortController();

    const pending = captureRedirect(authenticator, AUTHORIZE_URL, REDIRECT_URI, {
      signal: controller.signal,
    });
    controller.abort();

    await expect(pending).rejects.toMatchObject({
      kind: IdentityErrorKind.CANCELLED,
      message: 'Interactive authentication was cancelled',
    });
    expect(authenticate.mock.calls[0]?.[2].aborted).toBe(true);
  });

  it('should not start the authenticator when already aborted', async () => {
    const { authenticator, authenticate } = createMockAuthenticator(waitForAbort);

    await expect(
      captureRedirect(authenticator, AUTHORIZE_URL, REDIRECT_URI, { signal: AbortSignal.abort() }),
    ).rejects.toMatchObject({ kind: IdentityErrorKind.CANCELLED });
    expect(authenticate).not.toHaveBeenCalled();
  });

  it('should pass through an authenticator failure', async () => {
    const failure = new Error('browser closed');
    const { authenticator } = createMockAuthenticator(async () => {
      throw failure;
    });

    await expect(captureRedirect(authenticator, AUTHORIZE_URL, REDIRECT_URI)).rejects.toBe(failure);
  });

  it('should clear the timeout when the authenticator throws synchronously', async () => {
    const failure = new Error('no browser');
    const { authenticator } = createMockAuthenticator(() => {
      throw failure;
    });
    const controller = new AbortController();
    const removeListener = vi.spyOn(controller.signal, 'removeEventListener');

    await expect(
      captureRedirect(authenticator, AUTHORIZE_URL, REDIRECT_URI, { signal: controller.signal }),
    ).rejects.toBe(failure);

    expect(vi.getTimerCount()).toBe(0);
    expect(removeListener).toHaveBeenCalledWith('abort', expect.any(Function));
  });

  it('should reject a redirect without a payload', async () => {
    const { authenticator } = createMockAuthenticator(async () => new URL(REDIRECT_URI));

    await expect(captureRedirect(authenticator, AUTHORIZE_URL, REDIRECT_URI)).rejects.toMatchObject({
      kind: IdentityErrorKind.MISSING_REDIRECT_PAYLOAD,
      message: 'No query or fragment returned on redirect, url: http://localhost:8000/redirect',
    });
  });
});
