import { RequestUtils, logEvent } from '@idforge/core';
import type { OAuth2TokenResponse } from '@idforge/models';
import type { Credential, RefreshableCredential } from '../credentials/credential.js';
import {
  credentialBasicAuth,
  credentialFormBody,
  credentialTargetUri,
  withRefreshToken,
  type BasicAuth,
} from '../credentials/credential-form.js';
import {
  FORM_CONTENT_TYPE,
  FetchTransport,
  basicAuthHeader,
  type HttpTransport,
  type TokenHttpRequest,
} from '../transport/http-transport.js';
import { parseTokenResponse } from '../transport/token-response.js';
import { ok, unwrap, type IdentityResult } from '../utils/result.js';
import type {
  ConfidentialClientOptions,
  ExecutorOptions,
  TokenCredentialExecutor,
} from './token-credential-executor.js';

/**
 * Holds one credential and forwards the executor operations to it.
 *
 * The credential is immutable, so one client may serve concurrent requests.
 * @public
 */
export class ConfidentialClient<C extends Credential = Credential>
  implements TokenCredentialExecutor
{
  private readonly transport: HttpTransport;

  public constructor(
    public readonly credential: C,
    private readonly clientOptions: ConfidentialClientOptions = {},
  ) {
    this.transport = clientOptions.transport ?? new FetchTransport();
  }

  public targetUri(): IdentityResult<URL> {
    return credentialTargetUri(this.credential, this.options().cloudInstance);
  }

  public formBody(): IdentityResult<URLSearchParams> {
    return credentialFormBody(this.credential);
  }

  public basicAuth(): BasicAuth | undefined {
    return credentialBasicAuth(this.credential);
  }

  public options(): ExecutorOptions {
    const { config } = this.credential;
    return {
      cloudInstance: this.clientOptions.cloudInstance ?? config.cloudInstance,
      extraHeaderParameters: config.extraHeaderParameters,
    };
  }

  /**
   * Builds the complete request: form body, target, extra headers, and the
   * Basic header where the variant has one.
   */
  public prepare(): IdentityResult<TokenHttpRequest> {
    const body = this.formBody();
    if (!body.ok) {
      return body;
    }
    const url = this.targetUri();
    if (!url.ok) {
      return url;
    }

    const basicAuth = this.basicAuth();
    const reserved = basicAuth ? ['content-type', 'authorization'] : ['content-type'];
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(this.options().extraHeaderParameters)) {
      // header names are case-insensitive; fetch would join duplicates
      if (!reserved.includes(name.toLowerCase())) {
        headers[name] = value;
      }
    }
    headers['Content-Type'] = FORM_CONTENT_TYPE;
    if (basicAuth) {
      headers.Authorization = basicAuthHeader(basicAuth);
    }

    const request: TokenHttpRequest = { url: url.value, method: 'POST', headers, body: body.value };
    return ok(request);
  }

  public async execute(signal?: AbortSignal): Promise<Response> {
    const request = unwrap(this.prepare());
    const requestId = RequestUtils.generateRequestId();

    logEvent('info', 'identity:token_request_start', {
      requestId,
      kind: this.credential.kind,
      url: `${request.url.origin}${request.url.pathname}`,
      grantType: request.body.get('grant_type'),
    });

    const response = await this.transport.post(request, signal);

    logEvent(response.ok ? 'info' : 'warn', 'identity:token_request_complete', {
      requestId,
      status: response.status,
    });
    return response;
  }

  public async acquireToken(signal?: AbortSignal): Promise<OAuth2TokenResponse> {
    return parseTokenResponse(await this.execute(signal));
  }

  /**
   * Client for the same credential redeeming `refreshToken` instead of its
   * authorization code.
   */
  public withRefreshToken(
    refreshToken: string,
  ): IdentityResult<ConfidentialClient<RefreshableCredential>> {
    const credential = withRefreshToken(this.credential, refreshToken);
    if (!credential.ok) {
      return credential;
    }
    return ok(new ConfidentialClient(credential.value, this.clientOptions));
  }
}
