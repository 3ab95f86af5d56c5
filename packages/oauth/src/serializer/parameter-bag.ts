import type { Authority, CloudInstance } from '@idforge/models';
import { ValidationUtils } from '@idforge/core';
import { IdentityError } from '../errors/identity-error.js';
import { err, ok, type IdentityResult } from '../utils/result.js';
import { resolveAuthority } from '../utils/authority.js';
import { OAuthParameter, parameterAlias } from './oauth-parameter.js';

/**
 * Mapping from canonical parameter to its string value, backing both
 * authorization URLs and token request forms.
 *
 * Setters never fail and simply overwrite. Validation happens once, in
 * {@link ParameterBag.encode}, which emits parameters in exactly the order
 * the caller lists them, independent of the order values were set in.
 * A blank value counts as absent.
 *
 * @example
 * ```typescript
 * const bag = new ParameterBag().clientId(id).grantType('client_credentials');
 * const result = bag.encode([OAuthParameter.Scope], [OAuthParameter.ClientId, OAuthParameter.GrantType], new URLSearchParams());
 * ```
 */
export class ParameterBag {
  private readonly values = new Map<OAuthParameter, string>();
  private readonly scopes: string[] = [];

  public set(parameter: OAuthParameter, value: string): this {
    this.values.set(parameter, value);
    return this;
  }

  public get(parameter: OAuthParameter): string | undefined {
    return this.values.get(parameter);
  }

  public has(parameter: OAuthParameter): boolean {
    return !ValidationUtils.isBlank(this.values.get(parameter));
  }

  public clientId(value: string): this {
    return this.set(OAuthParameter.ClientId, value);
  }

  public clientSecret(value: string): this {
    return this.set(OAuthParameter.ClientSecret, value);
  }

  public redirectUri(value: string): this {
    return this.set(OAuthParameter.RedirectUri, value);
  }

  public responseType(value: string): this {
    return this.set(OAuthParameter.ResponseType, value);
  }

  public responseMode(value: string): this {
    return this.set(OAuthParameter.ResponseMode, value);
  }

  public state(value: string): this {
    return this.set(OAuthParameter.State, value);
  }

  public prompt(value: string): this {
    return this.set(OAuthParameter.Prompt, value);
  }

  public loginHint(value: string): this {
    return this.set(OAuthParameter.LoginHint, value);
  }

  public domainHint(value: string): this {
    return this.set(OAuthParameter.DomainHint, value);
  }

  public nonce(value: string): this {
    return this.set(OAuthParameter.Nonce, value);
  }

  public codeChallenge(value: string): this {
    return this.set(OAuthParameter.CodeChallenge, value);
  }

  public codeChallengeMethod(value: string): this {
    return this.set(OAuthParameter.CodeChallengeMethod, value);
  }

  public codeVerifier(value: string): this {
    return this.set(OAuthParameter.CodeVerifier, value);
  }

  public authorizationCode(value: string): this {
    return this.set(OAuthParameter.AuthorizationCode, value);
  }

  public refreshToken(value: string): this {
    return this.set(OAuthParameter.RefreshToken, value);
  }

  public grantType(value: string): this {
    return this.set(OAuthParameter.GrantType, value);
  }

  public clientAssertion(value: string): this {
    return this.set(OAuthParameter.ClientAssertion, value);
  }

  public clientAssertionType(value: string): this {
    return this.set(OAuthParameter.ClientAssertionType, value);
  }

  /**
   * Adds scopes, trimmed and de-duplicated, keeping first-seen order.
   * The scope parameter holds them joined by single spaces.
   */
  public extendScopes(scopes: Iterable<string>): this {
    for (const raw of scopes) {
      const scope = raw.trim();
      if (scope && !this.scopes.includes(scope)) {
        this.scopes.push(scope);
      }
    }
    if (this.scopes.length > 0) {
      this.values.set(OAuthParameter.Scope, this.scopes.join(' '));
    }
    return this;
  }

  /**
   * Stores the authorization, token and refresh-token URLs of the authority.
   */
  public authority(cloudInstance: CloudInstance, authority: Authority): this {
    const endpoints = resolveAuthority(cloudInstance, authority);
    return this.set(OAuthParameter.AuthorizationUrl, endpoints.authorizationUrl)
      .set(OAuthParameter.TokenUrl, endpoints.tokenUrl)
      .set(OAuthParameter.RefreshTokenUrl, endpoints.refreshTokenUrl);
  }

  /**
   * URL-form-encodes the listed parameters into `sink`.
   *
   * Required parameters are written first, in order; the first one without a
   * value fails the call with `MissingRequiredValue` and nothing further is
   * written. Optional parameters follow in order, skipping absent ones.
   */
  public encode(
    optionalKeys: readonly OAuthParameter[],
    requiredKeys: readonly OAuthParameter[],
    sink: URLSearchParams,
  ): IdentityResult<URLSearchParams> {
    for (const key of requiredKeys) {
      const value = this.values.get(key);
      if (value === undefined || ValidationUtils.isBlank(value)) {
        return err(IdentityError.missingRequiredValue(parameterAlias(key)));
      }
      sink.append(key, value);
    }

    for (const key of optionalKeys) {
      const value = this.values.get(key);
      if (value !== undefined && !ValidationUtils.isBlank(value)) {
        sink.append(key, value);
      }
    }

    return ok(sink);
  }

  /**
   * Encodes a token request form into a fresh `URLSearchParams`.
   */
  public form(
    requiredKeys: readonly OAuthParameter[],
    optionalKeys: readonly OAuthParameter[] = [],
  ): IdentityResult<URLSearchParams> {
    return this.encode(optionalKeys, requiredKeys, new URLSearchParams());
  }
}
