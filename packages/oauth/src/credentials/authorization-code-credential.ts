import { GrantTypes, type IdentityConfig } from '@idforge/models';
import { IdentityError } from '../errors/identity-error.js';
import { OAuthParameter } from '../serializer/oauth-parameter.js';
import { ParameterBag } from '../serializer/parameter-bag.js';
import { err, ok, type IdentityResult } from '../utils/result.js';
import {
  CodeRedemptionCredentialBuilder,
  conflictingRedemption,
  missingIfBlank,
} from './credential-builder.js';
import { CredentialKinds, type AuthorizationCodeCredential } from './credential.js';

const REFRESH_REQUIRED: readonly OAuthParameter[] = [
  OAuthParameter.ClientId,
  OAuthParameter.ClientSecret,
  OAuthParameter.RefreshToken,
  OAuthParameter.GrantType,
];
const REFRESH_OPTIONAL: readonly OAuthParameter[] = [OAuthParameter.Scope];

const CODE_REQUIRED: readonly OAuthParameter[] = [
  OAuthParameter.ClientId,
  OAuthParameter.ClientSecret,
  OAuthParameter.RedirectUri,
  OAuthParameter.AuthorizationCode,
  OAuthParameter.GrantType,
];
const CODE_OPTIONAL: readonly OAuthParameter[] = [OAuthParameter.Scope, OAuthParameter.CodeVerifier];

/**
 * Token request body for redeeming an authorization code, or a refresh token,
 * with a client secret.
 *
 * Checks run in order: code/refresh conflict, client id, client secret, then
 * the branch-specific values. The secret is always sent in the body, even
 * though {@link credentialBasicAuth} also offers it for a Basic header.
 * @public
 */
export function authorizationCodeForm(
  credential: AuthorizationCodeCredential,
): IdentityResult<URLSearchParams> {
  const { config, clientSecret, authorizationCode, refreshToken, codeVerifier } = credential;

  const failure =
    conflictingRedemption(credential) ??
    missingIfBlank(config.clientId, 'client_id') ??
    missingIfBlank(clientSecret, 'client_secret');
  if (failure) {
    return err(failure);
  }

  const bag = new ParameterBag()
    .clientId(config.clientId)
    .clientSecret(clientSecret)
    .extendScopes(credential.scope);

  if (refreshToken !== undefined) {
    const missing = missingIfBlank(refreshToken, 'refresh_token');
    if (missing) {
      return err(missing);
    }
    return bag
      .refreshToken(refreshToken)
      .grantType(GrantTypes.REFRESH_TOKEN)
      .form(REFRESH_REQUIRED, REFRESH_OPTIONAL);
  }

  if (authorizationCode !== undefined) {
    const missing =
      missingIfBlank(authorizationCode, 'authorization_code') ??
      missingIfBlank(config.redirectUri, 'redirect_uri');
    if (missing) {
      return err(missing);
    }
    bag
      .authorizationCode(authorizationCode)
      .redirectUri(config.redirectUri ?? '')
      .grantType(GrantTypes.AUTHORIZATION_CODE);
    if (codeVerifier !== undefined) {
      bag.codeVerifier(codeVerifier);
    }
    return bag.form(CODE_REQUIRED, CODE_OPTIONAL);
  }

  return err(IdentityError.missingRequiredValue('authorization_code or refresh_token'));
}

/**
 * @example
 * ```typescript
 * const credential = AuthorizationCodeCredentialBuilder.create(config)
 *   .withAuthorizationCode(code)
 *   .withClientSecret('test-secret')
 *   .withPkce(pkce)
 *   .withScope(['User.Read'])
 *   .build();
 * ```
 * @public
 */
export class AuthorizationCodeCredentialBuilder extends CodeRedemptionCredentialBuilder<
  AuthorizationCodeCredential,
  AuthorizationCodeCredentialBuilder
> {
  public static create(config: IdentityConfig): AuthorizationCodeCredentialBuilder {
    return new AuthorizationCodeCredentialBuilder({
      kind: CredentialKinds.AUTHORIZATION_CODE,
      config,
      scope: [],
      clientSecret: '',
    });
  }

  protected next(state: AuthorizationCodeCredential): AuthorizationCodeCredentialBuilder {
    return new AuthorizationCodeCredentialBuilder(state);
  }

  public withClientSecret(clientSecret: string): AuthorizationCodeCredentialBuilder {
    return this.next({ ...this.state, clientSecret });
  }

  /** Validates the form the credential will produce and returns the credential. */
  public build(): IdentityResult<AuthorizationCodeCredential> {
    const form = authorizationCodeForm(this.state);
    return form.ok ? ok(this.state) : form;
  }
}
