import { ResponseTypes, type IdentityConfig } from '@idforge/models';
import { OAuthParameter } from '../serializer/oauth-parameter.js';
import { secureRandom32 } from '../utils/pkce.js';
import { ok, type IdentityResult } from '../utils/result.js';
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
  OAuthParameter.Nonce,
];

const OPTIONAL: readonly OAuthParameter[] = [
  OAuthParameter.ResponseMode,
  OAuthParameter.State,
  OAuthParameter.Prompt,
  OAuthParameter.LoginHint,
  OAuthParameter.DomainHint,
  OAuthParameter.CodeChallenge,
  OAuthParameter.CodeChallengeMethod,
];

/**
 * OpenID Connect sign-in request.
 *
 * Always asks for the `openid` scope and carries a nonce, generated when the
 * caller sets none. The response type defaults to `id_token`, which is
 * delivered in the fragment unless `form_post` is chosen.
 * @public
 */
export class OpenIdAuthorizationUrlParameters extends AuthorizationUrlRequest {
  protected readonly requiredParameters = REQUIRED;
  protected readonly optionalParameters = OPTIONAL;

  private constructor(config: IdentityConfig, options: AuthorizationUrlOptions) {
    super(config, options);
  }

  public static builder(config: IdentityConfig): OpenIdAuthorizationUrlParameterBuilder {
    return OpenIdAuthorizationUrlParameterBuilder.create(config);
  }

  public static create(
    config: IdentityConfig,
    options: AuthorizationUrlOptions,
  ): IdentityResult<OpenIdAuthorizationUrlParameters> {
    const registration = validateClientRegistration(config);
    if (!registration.ok) {
      return registration;
    }

    return ok(
      new OpenIdAuthorizationUrlParameters(config, {
        ...options,
        scope: normalizeScopes(['openid', ...options.scope]),
        responseTypes:
          options.responseTypes.length > 0 ? options.responseTypes : [ResponseTypes.ID_TOKEN],
        nonce: options.nonce ?? secureRandom32(),
      }),
    );
  }
}

/**
 * @public
 */
export class OpenIdAuthorizationUrlParameterBuilder extends AuthorizationUrlBuilder<
  OpenIdAuthorizationUrlParameterBuilder,
  OpenIdAuthorizationUrlParameters
> {
  public static create(config: IdentityConfig): OpenIdAuthorizationUrlParameterBuilder {
    return new OpenIdAuthorizationUrlParameterBuilder(config, EMPTY_AUTHORIZATION_URL_OPTIONS);
  }

  protected next(
    config: IdentityConfig,
    options: AuthorizationUrlOptions,
  ): OpenIdAuthorizationUrlParameterBuilder {
    return new OpenIdAuthorizationUrlParameterBuilder(config, options);
  }

  public build(): IdentityResult<OpenIdAuthorizationUrlParameters> {
    return OpenIdAuthorizationUrlParameters.create(this.config, this.options);
  }
}
