import type { IdentityConfig, OAuth2TokenResponse } from '@idforge/models';
import { AuthorizationCodeCertificateCredentialBuilder } from '../credentials/authorization-code-certificate-credential.js';
import { AuthorizationCodeCredentialBuilder } from '../credentials/authorization-code-credential.js';
import { ClientAssertionCredentialBuilder } from '../credentials/client-assertion-credential.js';
import {
  ClientCertificateCredentialBuilder,
  type ClientCertificate,
} from '../credentials/client-certificate-credential.js';
import { ClientSecretCredentialBuilder } from '../credentials/client-secret-credential.js';
import type { Credential } from '../credentials/credential.js';
import { withRefreshToken, type BasicAuth } from '../credentials/credential-form.js';
import { OpenIdCredentialBuilder } from '../credentials/openid-credential.js';
import type { TokenHttpRequest } from '../transport/http-transport.js';
import { ok, type IdentityResult } from '../utils/result.js';
import { ConfidentialClient } from './confidential-client.js';
import type {
  ConfidentialClientOptions,
  ExecutorOptions,
  TokenCredentialExecutor,
} from './token-credential-executor.js';

/**
 * Entry point for picking a credential variant for one app registration.
 * Each method returns the variant's builder with the given value set.
 * @public
 */
export class ConfidentialClientApplicationBuilder {
  public constructor(private readonly config: IdentityConfig) {}

  public withAuthorizationCode(authorizationCode: string): AuthorizationCodeCredentialBuilder {
    return AuthorizationCodeCredentialBuilder.create(this.config).withAuthorizationCode(
      authorizationCode,
    );
  }

  public withRefreshToken(refreshToken: string): AuthorizationCodeCredentialBuilder {
    return AuthorizationCodeCredentialBuilder.create(this.config).withRefreshToken(refreshToken);
  }

  public withAuthorizationCodeCertificate(
    authorizationCode: string,
    clientAssertion: string,
  ): AuthorizationCodeCertificateCredentialBuilder {
    return AuthorizationCodeCertificateCredentialBuilder.create(this.config)
      .withAuthorizationCode(authorizationCode)
      .withClientAssertion(clientAssertion);
  }

  public withClientSecret(clientSecret: string): ClientSecretCredentialBuilder {
    return ClientSecretCredentialBuilder.create(this.config).withClientSecret(clientSecret);
  }

  public withClientAssertion(clientAssertion: string): ClientAssertionCredentialBuilder {
    return ClientAssertionCredentialBuilder.create(this.config).withClientAssertion(clientAssertion);
  }

  public withClientCertificate(certificate: ClientCertificate): ClientCertificateCredentialBuilder {
    return ClientCertificateCredentialBuilder.create(this.config).withCertificate(certificate);
  }

  public withOpenIdAuthorizationCode(authorizationCode: string): OpenIdCredentialBuilder {
    return OpenIdCredentialBuilder.create(this.config).withAuthorizationCode(authorizationCode);
  }
}

/**
 * One facade over any credential variant.
 *
 * @example
 * ```typescript
 * const credential = ConfidentialClientApplication.builder(config)
 *   .withAuthorizationCode(code)
 *   .withClientSecret('test-secret')
 *   .withScope(['User.Read', 'offline_access'])
 *   .build();
 * if (!credential.ok) throw credential.error;
 *
 * const app = new ConfidentialClientApplication(credential.value);
 * const token = await app.acquireToken();
 * ```
 * @public
 */
export class ConfidentialClientApplication implements TokenCredentialExecutor {
  private readonly client: ConfidentialClient;

  public constructor(
    credential: Credential,
    private readonly clientOptions: ConfidentialClientOptions = {},
  ) {
    this.client = new ConfidentialClient<Credential>(credential, clientOptions);
  }

  public static builder(config: IdentityConfig): ConfidentialClientApplicationBuilder {
    return new ConfidentialClientApplicationBuilder(config);
  }

  public get credential(): Credential {
    return this.client.credential;
  }

  public targetUri(): IdentityResult<URL> {
    return this.client.targetUri();
  }

  public formBody(): IdentityResult<URLSearchParams> {
    return this.client.formBody();
  }

  public basicAuth(): BasicAuth | undefined {
    return this.client.basicAuth();
  }

  public options(): ExecutorOptions {
    return this.client.options();
  }

  public prepare(): IdentityResult<TokenHttpRequest> {
    return this.client.prepare();
  }

  public execute(signal?: AbortSignal): Promise<Response> {
    return this.client.execute(signal);
  }

  public acquireToken(signal?: AbortSignal): Promise<OAuth2TokenResponse> {
    return this.client.acquireToken(signal);
  }

  /**
   * New application whose credential redeems `refreshToken`, with the
   * authorization code cleared. This application is left unchanged.
   */
  public withRefreshToken(refreshToken: string): IdentityResult<ConfidentialClientApplication> {
    const credential = withRefreshToken(this.client.credential, refreshToken);
    if (!credential.ok) {
      return credential;
    }
    return ok(new ConfidentialClientApplication(credential.value, this.clientOptions));
  }
}
