import { describe, it, expect } from 'vitest';
import { IdentityErrorKind } from '../errors/identity-error.js';
import { parseTokenResponse } from '../transport/token-response.js';
import { jsonResponse } from './test-utils.js';

describe('parseTokenResponse', () => {
  it('should coerce numeric strings and drop unknown fields', async () => {
    const token = await parseTokenResponse(
      jsonResponse({
        access_token: 'at-1',
        token_type: 'Bearer',
        expires_in: '3599',
        ext_expires_in: 3599,
        refresh_token: 'refresh-1',
        foci: '1',
      }),
    );

    expect(token).toEqual({
      access_token: 'at-1',
      token_type: 'Bearer',
      expires_in: 3599,
      ext_expires_in: 3599,
      refresh_token: 'refresh-1',
    });
  });

  it('should reject a success body without an access token', async () => {
    await expect(parseTokenResponse(jsonResponse({ token_type: 'Bearer' }))).rejects.toMatchObject({
      kind: IdentityErrorKind.UPSTREAM_HTTP_ERROR,
      status: 200,
      message: 'Token endpoint returned an invalid token response',
    });
  });

  it('should reject an empty success body', async () => {
    await expect(parseTokenResponse(new Response(''))).rejects.toMatchObject({
      message: 'Token endpoint returned an invalid token response',
    });
  });

  it('should carry the OAuth error code of a failure', async () => {
    await expect(
      parseTokenResponse(jsonResponse({ error: 'invalid_grant' }, 400)),
    ).rejects.toMatchObject({
      status: 400,
      oauthError: 'invalid_grant',
      message: 'Token endpoint returned 400: invalid_grant',
    });
  });

  it('should report the status of a failure without an OAuth body', async () => {
    await expect(
      parseTokenResponse(new Response('<html>Bad Gateway</html>', { status: 502 })),
    ).rejects.toMatchObject({
      kind: IdentityErrorKind.UPSTREAM_HTTP_ERROR,
      status: 502,
      message: 'Token endpoint returned 502',
    });
  });
});
