import type { AuthorizationQueryResponse } from '@idforge/models';
import { IdentityError } from '../errors/identity-error.js';
import { AuthorizationQueryResponseSchema } from '../schemas.js';
import { err, ok, type IdentityResult } from '../utils/result.js';

function toUrl(redirect: URL | string): IdentityResult<URL> {
  if (redirect instanceof URL) {
    return ok(redirect);
  }
  try {
    return ok(new URL(redirect));
  } catch (error) {
    return err(
      IdentityError.malformedUrl('redirect_url', error instanceof Error ? error : undefined),
    );
  }
}

/**
 * Decodes the parameters the authorization endpoint put on the redirect URI.
 *
 * The query component is used when present, otherwise the fragment. A URL
 * with neither fails with `MissingRedirectPayload` naming the full URL.
 * @example
 * ```typescript
 * const result = parseAuthorizationQueryResponse('http://localhost:8000/redirect#code=abc&state=xyz');
 * // result.value.code === 'abc'
 * ```
 * @public
 */
export function parseAuthorizationQueryResponse(
  redirect: URL | string,
): IdentityResult<AuthorizationQueryResponse> {
  const url = toUrl(redirect);
  if (!url.ok) {
    return url;
  }

  const { search, hash, href } = url.value;
  let payload: URLSearchParams;
  if (search.length > 1) {
    payload = url.value.searchParams;
  } else if (hash.length > 1) {
    payload = new URLSearchParams(hash.slice(1));
  } else {
    return err(IdentityError.missingRedirectPayload(href));
  }

  const parsed = AuthorizationQueryResponseSchema.safeParse(Object.fromEntries(payload));
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    return err(
      IdentityError.invalidValue(
        issue ? issue.path.join('.') : 'redirect_response',
        issue ? issue.message : parsed.error.message,
      ),
    );
  }

  return ok(parsed.data);
}
