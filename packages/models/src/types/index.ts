export type { Authority } from './authority.js';
export { Authorities } from './authority.js';

export type { CloudInstance } from './cloud-instance.js';
export { CloudInstances } from './cloud-instance.js';

export type { IdentityConfig } from './identity-config.js';
export type { AuthorizationQueryResponse } from './authorization-query-response.js';
export type { OAuth2TokenResponse, OAuth2ErrorResponse } from './token-response.js';
export type { EnvPlaceholderResolverConfig } from './env-placeholder-resolver-config.js';
