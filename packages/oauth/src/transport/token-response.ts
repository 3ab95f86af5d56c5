import type { OAuth2TokenResponse } from '@idforge/models';
import { IdentityError } from '../errors/identity-error.js';
import { ErrorResponseSchema, TokenResponseSchema } from '../schemas.js';

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

/**
 * Turns a raw token endpoint response into a validated token payload.
 *
 * Non-2xx responses reject with `UpstreamHttpError` carrying the status and,
 * when the body is an OAuth error response, its `error` code.
 * @throws \{IdentityError\} UpstreamHttpError
 * @public
 */
export async function parseTokenResponse(response: Response): Promise<OAuth2TokenResponse> {
  const body = await readJson(response);

  if (!response.ok) {
    const oauthError = ErrorResponseSchema.safeParse(body);
    if (oauthError.success) {
      const { error, error_description: description } = oauthError.data;
      throw IdentityError.upstreamHttpError(
        `Token endpoint returned ${response.status}: ${error}${description ? ` - ${description}` : ''}`,
        { status: response.status, oauthError: error },
      );
    }
    throw IdentityError.upstreamHttpError(`Token endpoint returned ${response.status}`, {
      status: response.status,
    });
  }

  const parsed = TokenResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw IdentityError.upstreamHttpError('Token endpoint returned an invalid token response', {
      status: response.status,
    });
  }
  return parsed.data;
}
