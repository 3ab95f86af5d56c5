import { GrantTypes, type IdentityConfig } from '@idforge/models';
import { OAuthParameter } from '../serializer/oauth-parameter.js';
import { ParameterBag } from '../serializer/parameter-bag.js';
import { err, ok, type IdentityResult } from '../utils/result.js';
import { CredentialBuilder, missingIfBlank } from './credential-builder.js';
import {
  CredentialKinds,
  DEFAULT_CLIENT_CREDENTIALS_SCOPE,
  type ClientSecretCredential,
} from './credential.js';

const REQUIRED: readonly OAuthParameter[] = [
  OAuthParameter.ClientId,
  OAuthParameter.ClientSecret,
  OAuthParameter.GrantType,
  OAuthParameter.Scope,
];

/**
 * Client credentials grant authenticated with a client secret.
 * Without scopes the request asks for the default Graph scope.
 * @public
 */
export function clientSecretForm(credential: ClientSecretCredential): IdentityResult<URLSearchParams> {
  const { config, clientSecret } = credential;

  const failure =
    missingIfBlank(config.clientId, 'client_id') ?? missingIfBlank(clientSecret, 'client_secret');
  if (failure) {
    return err(failure);
  }

  const scope = credential.scope.length > 0 ? credential.scope : [DEFAULT_CLIENT_CREDENTIALS_SCOPE];
  return new ParameterBag()
    .clientId(config.clientId)
    .clientSecret(clientSecret)
    .grantType(GrantTypes.CLIENT_CREDENTIALS)
    .extendScopes(scope)
    .form(REQUIRED);
}

/**
 * @example
 * ```typescript
 * const credential = ClientSecretCredentialBuilder.create(config)
 *   .withClientSecret(process.env.APP_CLIENT_SECRET ?? '')
 *   .build();
 * ```
 * @public
 */
export class ClientSecretCredentialBuilder extends CredentialBuilder<
  ClientSecretCredential,
  ClientSecretCredentialBuilder
> {
  public static create(config: IdentityConfig): ClientSecretCredentialBuilder {
    return new ClientSecretCredentialBuilder({
      kind: CredentialKinds.CLIENT_SECRET,
      config,
      scope: [],
      clientSecret: '',
    });
  }

  protected next(state: ClientSecretCredential): ClientSecretCredentialBuilder {
    return new ClientSecretCredentialBuilder(state);
  }

  public withClientSecret(clientSecret: string): ClientSecretCredentialBuilder {
    return this.next({ ...this.state, clientSecret });
  }

  public build(): IdentityResult<ClientSecretCredential> {
    const form = clientSecretForm(this.state);
    return form.ok ? ok(this.state) : form;
  }
}
