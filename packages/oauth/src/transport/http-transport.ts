/**
 * Token endpoint transport
 * One POST per call; retries are the caller's concern
 */
import { IdentityError } from '../errors/identity-error.js';
import type { BasicAuth } from '../credentials/credential-form.js';

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

/**
 * A fully prepared token request.
 * @public
 */
export interface TokenHttpRequest {
  readonly url: URL;
  readonly method: 'POST';
  readonly headers: Readonly<Record<string, string>>;
  readonly body: URLSearchParams;
}

/**
 * Sends prepared token requests and returns the raw response.
 * @public
 */
export interface HttpTransport {
  post(request: TokenHttpRequest, signal?: AbortSignal): Promise<Response>;
}

/**
 * `Basic base64(client_id:client_secret)` header value.
 * @public
 */
export function basicAuthHeader([clientId, clientSecret]: BasicAuth): string {
  const credentials = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');
  return `Basic ${credentials}`;
}

/**
 * {@link HttpTransport} over the global `fetch`.
 *
 * Network failures reject with `UpstreamHttpError` carrying the original
 * error as `cause`; HTTP error statuses are returned like any other response.
 * @public
 */
export class FetchTransport implements HttpTransport {
  private readonly fetchImpl: typeof fetch;

  public constructor(fetchImpl: typeof fetch = fetch) {
    this.fetchImpl = fetchImpl;
  }

  public async post(request: TokenHttpRequest, signal?: AbortSignal): Promise<Response> {
    try {
      return await this.fetchImpl(request.url, {
        method: request.method,
        headers: { ...request.headers },
        body: request.body.toString(),
        signal,
      });
    } catch (error) {
      throw IdentityError.upstreamHttpError(
        `Token request to ${request.url.origin}${request.url.pathname} failed`,
        { cause: error instanceof Error ? error : undefined },
      );
    }
  }
}
