import {
  CLIENT_ASSERTION_TYPE_JWT_BEARER,
  GrantTypes,
  type IdentityConfig,
} from '@idforge/models';
import { IdentityError } from '../errors/identity-error.js';
import { OAuthParameter } from '../serializer/oauth-parameter.js';
import { ParameterBag } from '../serializer/parameter-bag.js';
import { err, ok, type IdentityResult } from '../utils/result.js';
import {
  CodeRedemptionCredentialBuilder,
  conflictingRedemption,
  missingIfBlank,
} from './credential-builder.js';
import { CredentialKinds, type AuthorizationCodeCertificateCredential } from './credential.js';

const REFRESH_REQUIRED: readonly OAuthParameter[] = [
  OAuthParameter.ClientId,
  OAuthParameter.ClientAssertion,
  OAuthParameter.ClientAssertionType,
  OAuthParameter.RefreshToken,
  OAuthParameter.GrantType,
];
const REFRESH_OPTIONAL: readonly OAuthParameter[] = [OAuthParameter.Scope];

const CODE_REQUIRED: readonly OAuthParameter[] = [
  OAuthParameter.ClientId,
  OAuthParameter.ClientAssertion,
  OAuthParameter.ClientAssertionType,
  OAuthParameter.RedirectUri,
  OAuthParameter.AuthorizationCode,
  OAuthParameter.GrantType,
];
const CODE_OPTIONAL: readonly OAuthParameter[] = [OAuthParameter.Scope, OAuthParameter.CodeVerifier];

/**
 * Authorization code or refresh token redemption where a signed client
 * assertion takes the place of the client secret.
 * @public
 */
export function authorizationCodeCertificateForm(
  credential: AuthorizationCodeCertificateCredential,
): IdentityResult<URLSearchParams> {
  const { config, clientAssertion, clientAssertionType, authorizationCode, refreshToken } =
    credential;

  const failure =
    conflictingRedemption(credential) ??
    missingIfBlank(config.clientId, 'client_id') ??
    missingIfBlank(clientAssertion, 'client_assertion') ??
    missingIfBlank(clientAssertionType, 'client_assertion_type');
  if (failure) {
    return err(failure);
  }

  const bag = new ParameterBag()
    .clientId(config.clientId)
    .clientAssertion(clientAssertion)
    .clientAssertionType(clientAssertionType)
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
    if (credential.codeVerifier !== undefined) {
      bag.codeVerifier(credential.codeVerifier);
    }
    return bag.form(CODE_REQUIRED, CODE_OPTIONAL);
  }

  return err(IdentityError.missingRequiredValue('authorization_code or refresh_token'));
}

/**
 * @public
 */
export class AuthorizationCodeCertificateCredentialBuilder extends CodeRedemptionCredentialBuilder<
  AuthorizationCodeCertificateCredential,
  AuthorizationCodeCertificateCredentialBuilder
> {
  public static create(config: IdentityConfig): AuthorizationCodeCertificateCredentialBuilder {
    return new AuthorizationCodeCertificateCredentialBuilder({
      kind: CredentialKinds.AUTHORIZATION_CODE_CERTIFICATE,
      config,
      scope: [],
      clientAssertion: '',
      clientAssertionType: CLIENT_ASSERTION_TYPE_JWT_BEARER,
    });
  }

  protected next(
    state: AuthorizationCodeCertificateCredential,
  ): AuthorizationCodeCertificateCredentialBuilder {
    return new AuthorizationCodeCertificateCredentialBuilder(state);
  }

  /** Sets a pre-signed assertion, e.g. from {@link createClientAssertion}. */
  public withClientAssertion(clientAssertion: string): AuthorizationCodeCertificateCredentialBuilder {
    return this.next({ ...this.state, clientAssertion });
  }

  public withClientAssertionType(
    clientAssertionType: string,
  ): AuthorizationCodeCertificateCredentialBuilder {
    return this.next({ ...this.state, clientAssertionType });
  }

  public build(): IdentityResult<AuthorizationCodeCertificateCredential> {
    const form = authorizationCodeCertificateForm(this.state);
    return form.ok ? ok(this.state) : form;
  }
}
