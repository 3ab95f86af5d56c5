import type { IdentityConfig } from '@idforge/models';
import { IdentityError } from '../errors/identity-error.js';
import { OAuthParameter } from '../serializer/oauth-parameter.js';
import { err, ok, type IdentityResult } from '../utils/result.js';
import {
  AuthorizationUrlBuilder,
  AuthorizationUrlRequest,
  EMPTY_AUTHORIZATION_URL_OPTIONS,
  normalizeScopes,
  validateClientRegistration,
  type AuthorizationUrlOptions,
} from './authorization-url.js';

const REQUIRED: readonly OAuthParameter[] = [
  OAuthParameter.ClientId,
  OAuthParameter.ResponseType,
  OAuthParameter.RedirectUri,
  OAuthParameter.Scope,
];

const OPTIONAL: readonly OAuthParameter[] = [
  OAuthParameter.ResponseMode,
  OAuthParameter.State,
  OAuthParameter.Prompt,
  OAuthParameter.LoginHint,
  OAuthParameter.DomainHint,
  OAuthParameter.Nonce,
  OAuthParameter.CodeChallenge,
  OAuthParameter.CodeChallengeMethod,
];

/**
 * Authorization request for the authorization code grant.
 *
 * @example
 * ```typescript
 * const pkce = generatePkce();
 * const url = AuthCodeAuthorizationUrlParameters.builder(config)
 *   .withScope(['User.Read'])
 *   .withState(generateState())
 *   .withPkce(pkce)
 *   .url();
 * ```
 * @public
 */
export class AuthCodeAuthorizationUrlParameters extends AuthorizationUrlRequest {
  protected readonly requiredParameters = REQUIRED;
  protected readonly optionalParameters = OPTIONAL;

  private constructor(config: IdentityConfig, options: AuthorizationUrlOptions) {
    super(config, options);
  }

  public static builder(config: IdentityConfig): AuthCodeAuthorizationUrlParameterBuilder {
    return AuthCodeAuthorizationUrlParameterBuilder.create(config);
  }

  /**
   * Validates in order: redirect URI, client id, non-empty scope, and the
   * absence of `openid`, which belongs to the OpenID variant.
   */
  public static create(
    config: IdentityConfig,
    options: AuthorizationUrlOptions,
  ): IdentityResult<AuthCodeAuthorizationUrlParameters> {
    const registration = validateClientRegistration(config);
    if (!registration.ok) {
      return registration;
    }

    const scope = normalizeScopes(options.scope);
    if (scope.length === 0) {
      return err(IdentityError.missingRequiredValue('scope'));
    }
    if (scope.includes('openid')) {
      return err(IdentityError.invalidValue('openid', 'use OpenIdCredential instead'));
    }

    return ok(new AuthCodeAuthorizationUrlParameters(config, { ...options, scope }));
  }
}

/**
 * @public
 */
export class AuthCodeAuthorizationUrlParameterBuilder extends AuthorizationUrlBuilder<
  AuthCodeAuthorizationUrlParameterBuilder,
  AuthCodeAuthorizationUrlParameters
> {
  public static create(config: IdentityConfig): AuthCodeAuthorizationUrlParameterBuilder {
    return new AuthCodeAuthorizationUrlParameterBuilder(config, EMPTY_AUTHORIZATION_URL_OPTIONS);
  }

  protected next(
    config: IdentityConfig,
    options: AuthorizationUrlOptions,
  ): AuthCodeAuthorizationUrlParameterBuilder {
    return new AuthCodeAuthorizationUrlParameterBuilder(config, options);
  }

  public build(): IdentityResult<AuthCodeAuthorizationUrlParameters> {
    return AuthCodeAuthorizationUrlParameters.create(this.config, this.options);
  }
}
