import {
  CLIENT_ASSERTION_TYPE_JWT_BEARER,
  GrantTypes,
  type IdentityConfig,
} from '@idforge/models';
import { OAuthParameter } from '../serializer/oauth-parameter.js';
import { ParameterBag } from '../serializer/parameter-bag.js';
import { err, ok, type IdentityResult } from '../utils/result.js';
import { CredentialBuilder, missingIfBlank } from './credential-builder.js';
import {
  CredentialKinds,
  DEFAULT_CLIENT_CREDENTIALS_SCOPE,
  type ClientAssertionCredential,
  type ClientCertificateCredential,
} from './credential.js';

const REQUIRED: readonly OAuthParameter[] = [
  OAuthParameter.ClientId,
  OAuthParameter.ClientAssertion,
  OAuthParameter.ClientAssertionType,
  OAuthParameter.GrantType,
  OAuthParameter.Scope,
];

/**
 * Client credentials grant authenticated with a client assertion. Serves both
 * caller-supplied assertions and certificate-signed ones.
 * @public
 */
export function clientAssertionForm(
  credential: ClientAssertionCredential | ClientCertificateCredential,
): IdentityResult<URLSearchParams> {
  const { config, clientAssertion, clientAssertionType } = credential;

  const failure =
    missingIfBlank(config.clientId, 'client_id') ??
    missingIfBlank(clientAssertion, 'client_assertion') ??
    missingIfBlank(clientAssertionType, 'client_assertion_type');
  if (failure) {
    return err(failure);
  }

  const scope = credential.scope.length > 0 ? credential.scope : [DEFAULT_CLIENT_CREDENTIALS_SCOPE];
  return new ParameterBag()
    .clientId(config.clientId)
    .clientAssertion(clientAssertion)
    .clientAssertionType(clientAssertionType)
    .grantType(GrantTypes.CLIENT_CREDENTIALS)
    .extendScopes(scope)
    .form(REQUIRED);
}

/**
 * @public
 */
export class ClientAssertionCredentialBuilder extends CredentialBuilder<
  ClientAssertionCredential,
  ClientAssertionCredentialBuilder
> {
  public static create(config: IdentityConfig): ClientAssertionCredentialBuilder {
    return new ClientAssertionCredentialBuilder({
      kind: CredentialKinds.CLIENT_ASSERTION,
      config,
      scope: [],
      clientAssertion: '',
      clientAssertionType: CLIENT_ASSERTION_TYPE_JWT_BEARER,
    });
  }

  protected next(state: ClientAssertionCredential): ClientAssertionCredentialBuilder {
    return new ClientAssertionCredentialBuilder(state);
  }

  public withClientAssertion(clientAssertion: string): ClientAssertionCredentialBuilder {
    return this.next({ ...this.state, clientAssertion });
  }

  public withClientAssertionType(clientAssertionType: string): ClientAssertionCredentialBuilder {
    return this.next({ ...this.state, clientAssertionType });
  }

  public build(): IdentityResult<ClientAssertionCredential> {
    const form = clientAssertionForm(this.state);
    return form.ok ? ok(this.state) : form;
  }
}
