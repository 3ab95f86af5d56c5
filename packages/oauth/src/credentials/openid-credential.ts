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
import { CredentialKinds, type OpenIdCredential } from './credential.js';

const REFRESH_REQUIRED: readonly OAuthParameter[] = [
  OAuthParameter.ClientId,
  OAuthParameter.ClientSecret,
  OAuthParameter.RefreshToken,
  OAuthParameter.GrantType,
  OAuthParameter.Scope,
];

const CODE_REQUIRED: readonly OAuthParameter[] = [
  OAuthParameter.ClientId,
  OAuthParameter.ClientSecret,
  OAuthParameter.RedirectUri,
  OAuthParameter.AuthorizationCode,
  OAuthParameter.GrantType,
  OAuthParameter.Scope,
];
const CODE_OPTIONAL: readonly OAuthParameter[] = [OAuthParameter.CodeVerifier];

/**
 * OpenID Connect code or refresh token redemption. The `openid` scope is
 * always requested, ahead of any other scope.
 * @public
 */
export function openIdForm(credential: OpenIdCredential): IdentityResult<URLSearchParams> {
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
    .extendScopes(['openid', ...credential.scope]);

  if (refreshToken !== undefined) {
    const missing = missingIfBlank(refreshToken, 'refresh_token');
    if (missing) {
      return err(missing);
    }
    return bag.refreshToken(refreshToken).grantType(GrantTypes.REFRESH_TOKEN).form(REFRESH_REQUIRED);
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
 * @public
 */
export class OpenIdCredentialBuilder extends CodeRedemptionCredentialBuilder<
  OpenIdCredential,
  OpenIdCredentialBuilder
> {
  public static create(config: IdentityConfig): OpenIdCredentialBuilder {
    return new OpenIdCredentialBuilder({
      kind: CredentialKinds.OPENID,
      config,
      scope: [],
      clientSecret: '',
    });
  }

  protected next(state: OpenIdCredential): OpenIdCredentialBuilder {
    return new OpenIdCredentialBuilder(state);
  }

  public withClientSecret(clientSecret: string): OpenIdCredentialBuilder {
    return this.next({ ...this.state, clientSecret });
  }

  public build(): IdentityResult<OpenIdCredential> {
    const form = openIdForm(this.state);
    return form.ok ? ok(this.state) : form;
  }
}
