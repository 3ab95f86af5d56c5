// Errors and results
export { IdentityError, IdentityErrorKind } from './errors/identity-error.js';
export { ok, err, unwrap, type IdentityResult } from './utils/result.js';

// Serializer and authority resolution
export { OAuthParameter, parameterAlias } from './serializer/oauth-parameter.js';
export { ParameterBag } from './serializer/parameter-bag.js';
export {
  AUTHORITY_HOSTS,
  authoritySegment,
  resolveAuthority,
  type AuthorityEndpoints,
} from './utils/authority.js';

// Authorization URLs
export {
  AuthorizationUrlBuilder,
  AuthorizationUrlRequest,
  resolveResponse,
  type AuthorizationUrlOptions,
} from './authorization/authorization-url.js';
export {
  AuthCodeAuthorizationUrlParameters,
  AuthCodeAuthorizationUrlParameterBuilder,
} from './authorization/auth-code-authorization-url.js';
export {
  OpenIdAuthorizationUrlParameters,
  OpenIdAuthorizationUrlParameterBuilder,
} from './authorization/openid-authorization-url.js';
export { parseAuthorizationQueryResponse } from './authorization/redirect-response.js';

// Credentials
export * from './credentials/credential.js';
export {
  AuthorizationCodeCredentialBuilder,
  authorizationCodeForm,
} from './credentials/authorization-code-credential.js';
export {
  AuthorizationCodeCertificateCredentialBuilder,
  authorizationCodeCertificateForm,
} from './credentials/authorization-code-certificate-credential.js';
export {
  ClientSecretCredentialBuilder,
  clientSecretForm,
} from './credentials/client-secret-credential.js';
export {
  ClientAssertionCredentialBuilder,
  clientAssertionForm,
} from './credentials/client-assertion-credential.js';
export {
  ClientCertificateCredentialBuilder,
  createClientAssertion,
  type ClientAssertionOptions,
  type ClientCertificate,
} from './credentials/client-certificate-credential.js';
export { OpenIdCredentialBuilder, openIdForm } from './credentials/openid-credential.js';
export {
  credentialBasicAuth,
  credentialFormBody,
  credentialTargetUri,
  isRefreshable,
  withRefreshToken,
  type BasicAuth,
} from './credentials/credential-form.js';

// Execution
export type {
  ConfidentialClientOptions,
  ExecutorOptions,
  TokenCredentialExecutor,
} from './executor/token-credential-executor.js';
export { ConfidentialClient } from './executor/confidential-client.js';
export {
  ConfidentialClientApplication,
  ConfidentialClientApplicationBuilder,
} from './executor/confidential-client-application.js';
export {
  FetchTransport,
  FORM_CONTENT_TYPE,
  basicAuthHeader,
  type HttpTransport,
  type TokenHttpRequest,
} from './transport/http-transport.js';
export { parseTokenResponse } from './transport/token-response.js';

// Interactive capture
export {
  captureRedirect,
  DEFAULT_CAPTURE_TIMEOUT_MS,
  type CaptureOptions,
  type InteractiveAuthenticator,
} from './interactive/interactive-authenticator.js';
export {
  LoopbackRedirectAuthenticator,
  createRedirectCaptureApp,
  type LoopbackRedirectAuthenticatorOptions,
} from './interactive/loopback-redirect-authenticator.js';

// PKCE, configuration and schemas
export {
  generateCodeChallenge,
  generateCodeVerifier,
  generatePkce,
  generateState,
  secureRandom32,
  type ProofKeyCodeExchange,
} from './utils/pkce.js';
export { loadIdentityConfig } from './utils/config.js';
export {
  IdentityConfigSchema,
  AuthorizationQueryResponseSchema,
  TokenResponseSchema,
  ErrorResponseSchema,
  parseAuthority,
} from './schemas.js';
