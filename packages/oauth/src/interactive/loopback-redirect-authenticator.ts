import { Hono } from 'hono';
import { serve, type ServerType } from '@hono/node-server';
import { logError, logEvent } from '@idforge/core';
import { IdentityError } from '../errors/identity-error.js';
import type { InteractiveAuthenticator } from './interactive-authenticator.js';

const COMPLETE_HTML = `<!DOCTYPE html>
<html>
<head><meta charset="utf-8"><title>Sign-in complete</title></head>
<body><p>Sign-in complete. You can close this window.</p></body>
</html>`;

// The fragment never reaches the server; replay it as a query string.
const FRAGMENT_RELAY_HTML = `<!DOCTYPE html>
<html>
<head><meta charset="utf-8"><title>Completing sign-in</title></head>
<body>
<script>
  if (window.location.hash.length > 1) {
    window.location.replace(window.location.pathname + '?' + window.location.hash.slice(1));
  } else {
    document.body.textContent = 'No authorization response received.';
  }
</script>
</body>
</html>`;

/**
 * Hono app that serves the redirect path and reports the first redirect URL
 * carrying a payload.
 *
 * Handles query delivery directly, fragment delivery through a relay page,
 * and `form_post` delivery by folding the form fields into the query.
 * @internal
 */
export function createRedirectCaptureApp(
  redirectPath: string,
  onRedirect: (redirect: URL) => void,
): Hono {
  const app = new Hono();

  app.get(redirectPath, (c) => {
    const url = new URL(c.req.url);
    if (url.search.length <= 1) {
      return c.html(FRAGMENT_RELAY_HTML);
    }
    onRedirect(url);
    return c.html(COMPLETE_HTML);
  });

  app.post(redirectPath, async (c) => {
    const url = new URL(c.req.url);
    const body = await c.req.parseBody();
    const fields = new URLSearchParams();
    for (const [key, value] of Object.entries(body)) {
      if (typeof value === 'string') {
        fields.append(key, value);
      }
    }
    url.search = fields.toString();
    onRedirect(url);
    return c.html(COMPLETE_HTML);
  });

  return app;
}

export interface LoopbackRedirectAuthenticatorOptions {
  /** Interface to bind. Defaults to the redirect URI's host name. */
  hostname?: string;
  /** Receives the message asking the user to open the authorization URL */
  output?: (message: string) => void;
}

/**
 * Captures the redirect with a local HTTP listener on the redirect URI's port.
 *
 * Prints the authorization URL rather than launching a browser; the user opens
 * it and the listener stops after the first redirect.
 * @example
 * ```typescript
 * const response = await AuthCodeAuthorizationUrlParameters.builder(config)
 *   .withScope(['User.Read'])
 *   .interactiveAuthentication(new LoopbackRedirectAuthenticator());
 * ```
 * @public
 */
export class LoopbackRedirectAuthenticator implements InteractiveAuthenticator {
  private readonly hostname?: string;
  private readonly output: (message: string) => void;

  public constructor(options: LoopbackRedirectAuthenticatorOptions = {}) {
    this.hostname = options.hostname;
    this.output = options.output ?? ((message) => console.info(message));
  }

  public authenticate(url: URL, redirectUri: URL, signal: AbortSignal): Promise<URL> {
    const port = redirectUri.port
      ? Number(redirectUri.port)
      : redirectUri.protocol === 'https:'
        ? 443
        : 80;

    return new Promise<URL>((resolve, reject) => {
      let server: ServerType | undefined;

      const close = (): void => {
        signal.removeEventListener('abort', onAbort);
        server?.close();
        server = undefined;
      };

      const onAbort = (): void => {
        close();
        reject(IdentityError.cancelled('Loopback redirect capture'));
      };

      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });

      const app = createRedirectCaptureApp(redirectUri.pathname, (redirect) => {
        close();
        resolve(redirect);
      });

      server = serve(
        { fetch: app.fetch, port, hostname: this.hostname ?? redirectUri.hostname },
        (info) => {
          logEvent('info', 'identity:loopback_listening', { port: info.port });
          this.output(`Open this URL in a browser to sign in:\n${url.href}`);
        },
      );

      server.on('error', (error: Error) => {
        logError('loopback_listener', error, { port });
        close();
        reject(error);
      });
    });
  }
}
