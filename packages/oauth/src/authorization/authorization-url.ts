/**
 * Shared machinery of the authorization URL builders: the immutable builder
 * base, the validated request base, and the response_type/response_mode rule.
 */
import { ValidationUtils, logEvent } from '@idforge/core';
import {
  Authorities,
  ResponseModes,
  ResponseTypes,
  type Authority,
  type AuthorizationQueryResponse,
  type CloudInstance,
  type CodeChallengeMethod,
  type IdentityConfig,
  type Prompt,
  type ResponseMode,
  type ResponseType,
} from '@idforge/models';
import { IdentityError } from '../errors/identity-error.js';
import {
  captureRedirect,
  type CaptureOptions,
  type InteractiveAuthenticator,
} from '../interactive/interactive-authenticator.js';
import { OAuthParameter } from '../serializer/oauth-parameter.js';
import { ParameterBag } from '../serializer/parameter-bag.js';
import { authoritySegment } from '../utils/authority.js';
import type { ProofKeyCodeExchange } from '../utils/pkce.js';
import { secureRandom32 } from '../utils/pkce.js';
import { err, ok, unwrap, type IdentityResult } from '../utils/result.js';

/**
 * Everything an authorization URL carries besides the identity config.
 * @public
 */
export interface AuthorizationUrlOptions {
  readonly responseTypes: readonly ResponseType[];
  readonly responseMode?: ResponseMode;
  readonly scope: readonly string[];
  readonly state?: string;
  readonly nonce?: string;
  readonly prompt?: Prompt;
  readonly loginHint?: string;
  readonly domainHint?: string;
  readonly codeChallenge?: string;
  readonly codeChallengeMethod?: CodeChallengeMethod;
}

export const EMPTY_AUTHORIZATION_URL_OPTIONS: AuthorizationUrlOptions = {
  responseTypes: [],
  scope: [],
};

const CANONICAL_RESPONSE_TYPES: readonly ResponseType[] = [
  ResponseTypes.CODE,
  ResponseTypes.ID_TOKEN,
  ResponseTypes.TOKEN,
];

const CANONICAL_PARAMETERS: ReadonlySet<string> = new Set(Object.values(OAuthParameter));

/**
 * Resolves the wire values of `response_type` and `response_mode`.
 *
 * An empty set yields `code` and leaves the mode as given. Otherwise the set
 * is rendered in `code`, `id_token`, `token` order; when it holds `id_token`
 * an unset or `query` mode becomes `fragment`.
 * @public
 */
export function resolveResponse(
  responseTypes: Iterable<ResponseType>,
  responseMode?: ResponseMode,
): { responseType: string; responseMode?: ResponseMode } {
  const requested = new Set(responseTypes);
  if (requested.size === 0) {
    return { responseType: ResponseTypes.CODE, responseMode };
  }

  const responseType = CANONICAL_RESPONSE_TYPES.filter((type) => requested.has(type)).join(' ');
  if (
    requested.has(ResponseTypes.ID_TOKEN) &&
    (responseMode === undefined || responseMode === ResponseModes.QUERY)
  ) {
    return { responseType, responseMode: ResponseModes.FRAGMENT };
  }
  return { responseType, responseMode };
}

/**
 * Trims scopes and drops blanks and duplicates, keeping first-seen order.
 * @internal
 */
export function normalizeScopes(scopes: Iterable<string>): string[] {
  const result: string[] = [];
  for (const raw of scopes) {
    const scope = raw.trim();
    if (scope && !result.includes(scope)) {
      result.push(scope);
    }
  }
  return result;
}

/**
 * Checks the redirect URI, then the client id, in that order.
 * @internal
 */
export function validateClientRegistration(config: IdentityConfig): IdentityResult<URL> {
  const { redirectUri } = config;
  if (redirectUri === undefined || ValidationUtils.isBlank(redirectUri)) {
    return err(IdentityError.missingRequiredValue('redirect_uri'));
  }

  let redirect: URL;
  try {
    redirect = new URL(redirectUri);
  } catch (error) {
    return err(
      IdentityError.malformedUrl('redirect_uri', error instanceof Error ? error : undefined),
    );
  }

  if (!ValidationUtils.isNonNilUuid(config.clientId)) {
    return err(IdentityError.missingRequiredValue('client_id', 'expected a non-nil UUID'));
  }

  return ok(redirect);
}

/**
 * Appends caller-supplied query parameters, skipping any that would shadow a
 * canonical parameter.
 * @internal
 */
export function appendExtraQueryParameters(
  sink: URLSearchParams,
  extras: Readonly<Record<string, string>>,
): void {
  for (const [key, value] of Object.entries(extras)) {
    if (!CANONICAL_PARAMETERS.has(key) && !sink.has(key)) {
      sink.append(key, value);
    }
  }
}

/**
 * A validated authorization request, ready to render as a URL.
 *
 * Subclasses fix which parameters are required and in which order the
 * optional ones are emitted.
 * @public
 */
export abstract class AuthorizationUrlRequest {
  protected abstract readonly requiredParameters: readonly OAuthParameter[];
  protected abstract readonly optionalParameters: readonly OAuthParameter[];

  protected constructor(
    public readonly config: IdentityConfig,
    public readonly options: AuthorizationUrlOptions,
  ) {}

  /**
   * Renders the authorization URL on `cloudInstance`, by default the config's.
   */
  public url(cloudInstance: CloudInstance = this.config.cloudInstance): IdentityResult<URL> {
    const { responseType, responseMode } = resolveResponse(
      this.options.responseTypes,
      this.options.responseMode,
    );

    const bag = new ParameterBag()
      .authority(cloudInstance, this.config.authority)
      .clientId(this.config.clientId)
      .redirectUri(this.config.redirectUri ?? '')
      .responseType(responseType)
      .extendScopes(this.options.scope);

    if (responseMode !== undefined) bag.responseMode(responseMode);
    if (this.options.state !== undefined) bag.state(this.options.state);
    if (this.options.prompt !== undefined) bag.prompt(this.options.prompt);
    if (this.options.loginHint !== undefined) bag.loginHint(this.options.loginHint);
    if (this.options.domainHint !== undefined) bag.domainHint(this.options.domainHint);
    if (this.options.nonce !== undefined) bag.nonce(this.options.nonce);
    if (this.options.codeChallenge !== undefined) bag.codeChallenge(this.options.codeChallenge);
    if (this.options.codeChallengeMethod !== undefined) {
      bag.codeChallengeMethod(this.options.codeChallengeMethod);
    }

    const query = bag.encode(this.optionalParameters, this.requiredParameters, new URLSearchParams());
    if (!query.ok) {
      return query;
    }
    appendExtraQueryParameters(query.value, this.config.extraQueryParameters);

    const base = bag.get(OAuthParameter.AuthorizationUrl);
    if (base === undefined) {
      return err(IdentityError.missingRequiredValue('authorization_url'));
    }

    logEvent('debug', 'identity:authorization_url_built', {
      authority: authoritySegment(this.config.authority),
      cloudInstance,
      responseType,
      responseMode,
    });

    try {
      return ok(new URL(`${base}?${query.value.toString()}`));
    } catch (error) {
      return err(
        IdentityError.malformedUrl('authorization_url', error instanceof Error ? error : undefined),
      );
    }
  }

  /**
   * Sends the user through `authenticator` and returns the redirect payload.
   *
   * When the request carried a `state`, the returned state must match it.
   * @throws \{IdentityError\} Timeout, Cancelled, MissingRedirectPayload, or InvalidValue("state")
   */
  public async interactiveAuthentication(
    authenticator: InteractiveAuthenticator,
    options?: CaptureOptions,
  ): Promise<AuthorizationQueryResponse> {
    const url = unwrap(this.url());
    const redirectUri = unwrap(validateClientRegistration(this.config));

    const response = await captureRedirect(authenticator, url, redirectUri, options);
    if (this.options.state !== undefined && response.state !== this.options.state) {
      throw IdentityError.invalidValue('state', 'redirect state does not match the request');
    }
    return response;
  }
}

/**
 * Immutable builder base: every `with*` call returns a new builder and all
 * validation is deferred to {@link AuthorizationUrlBuilder.build}.
 * @public
 */
export abstract class AuthorizationUrlBuilder<
  TSelf extends AuthorizationUrlBuilder<TSelf, TRequest>,
  TRequest extends AuthorizationUrlRequest,
> {
  protected constructor(
    protected readonly config: IdentityConfig,
    protected readonly options: AuthorizationUrlOptions,
  ) {}

  protected abstract next(config: IdentityConfig, options: AuthorizationUrlOptions): TSelf;

  public abstract build(): IdentityResult<TRequest>;

  private withOptions(options: Partial<AuthorizationUrlOptions>): TSelf {
    return this.next(this.config, { ...this.options, ...options });
  }

  public withRedirectUri(redirectUri: string | URL): TSelf {
    const value = typeof redirectUri === 'string' ? redirectUri : redirectUri.href;
    return this.next({ ...this.config, redirectUri: value }, this.options);
  }

  public withClientId(clientId: string): TSelf {
    return this.next({ ...this.config, clientId }, this.options);
  }

  public withTenant(tenantId: string): TSelf {
    return this.withAuthority(Authorities.tenant(tenantId));
  }

  public withAuthority(authority: Authority): TSelf {
    return this.next({ ...this.config, authority }, this.options);
  }

  /** Adds to the requested response types. */
  public withResponseType(responseType: ResponseType | Iterable<ResponseType>): TSelf {
    const added = typeof responseType === 'string' ? [responseType] : [...responseType];
    return this.withOptions({ responseTypes: [...this.options.responseTypes, ...added] });
  }

  public withResponseMode(responseMode: ResponseMode): TSelf {
    return this.withOptions({ responseMode });
  }

  public withNonce(nonce: string): TSelf {
    return this.withOptions({ nonce });
  }

  /** Sets a nonce from the secure random source. */
  public withNonceGenerated(): TSelf {
    return this.withOptions({ nonce: secureRandom32() });
  }

  public withState(state: string): TSelf {
    return this.withOptions({ state });
  }

  /** Adds to the requested scopes. */
  public withScope(scope: string | Iterable<string>): TSelf {
    const added = typeof scope === 'string' ? [scope] : [...scope];
    return this.withOptions({ scope: [...this.options.scope, ...added] });
  }

  /** Requests a refresh token through the `offline_access` scope. */
  public withOfflineAccess(): TSelf {
    return this.withScope('offline_access');
  }

  public withPrompt(prompt: Prompt): TSelf {
    return this.withOptions({ prompt });
  }

  public withDomainHint(domainHint: string): TSelf {
    return this.withOptions({ domainHint });
  }

  public withLoginHint(loginHint: string): TSelf {
    return this.withOptions({ loginHint });
  }

  public withCodeChallenge(codeChallenge: string): TSelf {
    return this.withOptions({ codeChallenge });
  }

  public withCodeChallengeMethod(codeChallengeMethod: CodeChallengeMethod): TSelf {
    return this.withOptions({ codeChallengeMethod });
  }

  /** Sets the challenge and its method; the verifier stays with the caller. */
  public withPkce(pkce: ProofKeyCodeExchange): TSelf {
    return this.withOptions({
      codeChallenge: pkce.codeChallenge,
      codeChallengeMethod: pkce.codeChallengeMethod,
    });
  }

  /** Validates, then renders the URL. */
  public url(cloudInstance?: CloudInstance): IdentityResult<URL> {
    const request = this.build();
    if (!request.ok) {
      return request;
    }
    return request.value.url(cloudInstance);
  }

  public async interactiveAuthentication(
    authenticator: InteractiveAuthenticator,
    options?: CaptureOptions,
  ): Promise<AuthorizationQueryResponse> {
    return unwrap(this.build()).interactiveAuthentication(authenticator, options);
  }
}
