import { describe, it, expect, vi } from 'vitest';
import { IdentityErrorKind } from '../errors/identity-error.js';
import {
  LoopbackRedirectAuthenticator,
  createRedirectCaptureApp,
} from '../interactive/loopback-redirect-authenticator.js';

describe('createRedirectCaptureApp', () => {
  it('should report a redirect that carries a query', async () => {
    const onRedirect = vi.fn<(redirect: URL) => void>();
    const app = createRedirectCaptureApp('/redirect', onRedirect);

    const response = await app.request('/redirect?code=abc&state=xyz');

    expect(response.status).toBe(200);
    expect(await response.text()).toContain('Sign-in complete');
    expect(onRedirect).toHaveBeenCalledTimes(1);
    const [redirect] = onRedirect.mock.calls[0] ?? [];
    expect(redirect?.pathname).toBe('/redirect');
    expect(redirect?.searchParams.get('code')).toBe('abc');
    expect(redirect?.searchParams.get('state')).toBe('xyz');
  });

  it('should serve the fragment relay page when the query is empty', async () => {
    const onRedirect = vi.fn<(redirect: URL) => void>();
    const app = createRedirectCaptureApp('/redirect', onRedirect);

    const response = await app.request('/redirect');

    expect(response.status).toBe(200);
    const html = await response.text();
    expect(html).toContain('window.location.hash');
    expect(html).toContain('window.location.replace');
    expect(onRedirect).not.toHaveBeenCalled();
  });

  it('should fold form_post fields into the query', async () => {
    const onRedirect = vi.fn<(redirect: URL) => void>();
    const app = createRedirectCaptureApp('/redirect', onRedirect);

    const response = await app.request('/redirect', {
      method: 'POST',
      body: new URLSearchParams({ code: 'abc', id_token: 'header.body.sig', state: 'xyz' }),
    });

    expect(response.status).toBe(200);
    const [redirect] = onRedirect.mock.calls[0] ?? [];
    expect(redirect?.search).toBe('?code=abc&id_token=header.body.sig&state=xyz');
  });

  it('should not answer other paths', async () => {
    const onRedirect = vi.fn<(redirect: URL) => void>();
    const app = createRedirectCaptureApp('/redirect', onRedirect);

    const response = await app.request('/favicon.ico');

    expect(response.status).toBe(404);
    expect(onRedirect).not.toHaveBeenCalled();
  });
});

describe('LoopbackRedirectAuthenticator', () => {
  it('should not listen when the signal is already aborted', async () => {
    const output = vi.fn<(message: string) => void>();
    const authenticator = new LoopbackRedirectAuthenticator({ output });

    await expect(
      authenticator.authenticate(
        new URL('https://login.microsoftonline.com/common/oauth2/v2.0/authorize'),
        new URL('http://localhost:8000/redirect'),
        AbortSignal.abort(),
      ),
    ).rejects.toMatchObject({
      kind: IdentityErrorKind.CANCELLED,
      message: 'Loopback redirect capture was cancelled',
    });
    expect(output).not.toHaveBeenCalled();
  });
});
