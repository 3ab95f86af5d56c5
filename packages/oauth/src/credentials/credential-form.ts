/**
 * Dispatch over the closed set of credential variants
 */
import type { CloudInstance } from '@idforge/models';
import { IdentityError } from '../errors/identity-error.js';
import { resolveAuthority } from '../utils/authority.js';
import { err, ok, type IdentityResult } from '../utils/result.js';
import { authorizationCodeCertificateForm } from './authorization-code-certificate-credential.js';
import { authorizationCodeForm } from './authorization-code-credential.js';
import { clientAssertionForm } from './client-assertion-credential.js';
import { clientSecretForm } from './client-secret-credential.js';
import type { Credential, RefreshableCredential } from './credential.js';
import { openIdForm } from './openid-credential.js';

/**
 * Client id and secret for an HTTP Basic `Authorization` header.
 * @public
 */
export type BasicAuth = readonly [clientId: string, clientSecret: string];

/**
 * URL-form-encoded token request body of `credential`.
 * @public
 */
export function credentialFormBody(credential: Credential): IdentityResult<URLSearchParams> {
  switch (credential.kind) {
    case 'authorization_code':
      return authorizationCodeForm(credential);
    case 'authorization_code_certificate':
      return authorizationCodeCertificateForm(credential);
    case 'client_secret':
      return clientSecretForm(credential);
    case 'client_assertion':
    case 'client_certificate':
      return clientAssertionForm(credential);
    case 'openid':
      return openIdForm(credential);
  }
}

/**
 * Token endpoint the request goes to. Refresh token redemptions use the
 * refresh-token URL of the authority, which is the same endpoint.
 * @public
 */
export function credentialTargetUri(
  credential: Credential,
  cloudInstance: CloudInstance = credential.config.cloudInstance,
): IdentityResult<URL> {
  const endpoints = resolveAuthority(cloudInstance, credential.config.authority);
  const refreshing = isRefreshable(credential) && credential.refreshToken !== undefined;
  const target = refreshing ? endpoints.refreshTokenUrl : endpoints.tokenUrl;
  try {
    return ok(new URL(target));
  } catch (error) {
    return err(IdentityError.malformedUrl('token_url', error instanceof Error ? error : undefined));
  }
}

/**
 * Basic auth pair for the variants that authenticate with a client secret;
 * `undefined` for assertion-based variants.
 * @public
 */
export function credentialBasicAuth(credential: Credential): BasicAuth | undefined {
  switch (credential.kind) {
    case 'authorization_code':
    case 'client_secret':
    case 'openid':
      return [credential.config.clientId, credential.clientSecret];
    case 'authorization_code_certificate':
    case 'client_assertion':
    case 'client_certificate':
      return undefined;
  }
}

export function isRefreshable(credential: Credential): credential is RefreshableCredential {
  return (
    credential.kind === 'authorization_code' ||
    credential.kind === 'authorization_code_certificate' ||
    credential.kind === 'openid'
  );
}

/**
 * Copy of `credential` that redeems `refreshToken`, with the authorization
 * code and its verifier cleared.
 * @public
 */
export function withRefreshToken(
  credential: Credential,
  refreshToken: string,
): IdentityResult<RefreshableCredential> {
  if (!isRefreshable(credential)) {
    return err(
      IdentityError.invalidValue('refresh_token', `${credential.kind} credentials cannot redeem a refresh token`),
    );
  }
  return ok({
    ...credential,
    authorizationCode: undefined,
    codeVerifier: undefined,
    refreshToken,
  });
}
