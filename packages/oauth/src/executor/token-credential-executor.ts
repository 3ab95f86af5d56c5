import type { CloudInstance, OAuth2TokenResponse } from '@idforge/models';
import type { BasicAuth } from '../credentials/credential-form.js';
import type { HttpTransport, TokenHttpRequest } from '../transport/http-transport.js';
import type { IdentityResult } from '../utils/result.js';

/**
 * Request-level settings of an executor.
 * @public
 */
export interface ExecutorOptions {
  readonly cloudInstance: CloudInstance;
  /** Added to every token request */
  readonly extraHeaderParameters: Readonly<Record<string, string>>;
}

/**
 * Construction options of {@link ConfidentialClient} and the application facade.
 * @public
 */
export interface ConfidentialClientOptions {
  /** Defaults to a {@link FetchTransport} */
  transport?: HttpTransport;
  /** Overrides the cloud instance of the credential's config */
  cloudInstance?: CloudInstance;
}

/**
 * What every credential offers to a transport.
 *
 * `prepare()` is the synchronous mode: it yields the complete request without
 * sending it. `execute()` sends it once through the configured transport.
 * @public
 */
export interface TokenCredentialExecutor {
  targetUri(): IdentityResult<URL>;
  formBody(): IdentityResult<URLSearchParams>;
  basicAuth(): BasicAuth | undefined;
  options(): ExecutorOptions;
  prepare(): IdentityResult<TokenHttpRequest>;
  /** Resolves with the raw response; rejects on validation or network failure */
  execute(signal?: AbortSignal): Promise<Response>;
  /** {@link TokenCredentialExecutor.execute} followed by {@link parseTokenResponse} */
  acquireToken(signal?: AbortSignal): Promise<OAuth2TokenResponse>;
}
