/**
 * Zod schemas for identity configuration and the payloads returned by the
 * authorization and token endpoints.
 *
 * The configuration schema normalizes field-name variations transparently:
 * - `client_id` → `clientId`, `redirect_uri` → `redirectUri`
 * - `tenant` / `tenantId` → `authority`
 * - `cloud` → `cloudInstance`, with short aliases (`public`, `china`, ...)
 *
 * @example
 * ```typescript
 * const config = IdentityConfigSchema.parse({
 *   client_id: '6731de76-14a6-49ae-97bc-6eba6914391e',
 *   tenant: 'contoso.onmicrosoft.com',
 *   cloud: 'usgov',
 * });
 * // { clientId, authority: { type: 'tenant', tenantId: 'contoso.onmicrosoft.com' },
 * //   cloudInstance: 'AzureUsGovernment', extraQueryParameters: {}, extraHeaderParameters: {} }
 * ```
 *
 * @public
 */

import { z } from 'zod';
import {
  Authorities,
  CloudInstances,
  type Authority,
  type CloudInstance,
} from '@idforge/models';

const CLOUD_ALIASES: Readonly<Record<string, CloudInstance>> = {
  public: CloudInstances.AZURE_PUBLIC,
  azurepublic: CloudInstances.AZURE_PUBLIC,
  china: CloudInstances.AZURE_CHINA,
  azurechina: CloudInstances.AZURE_CHINA,
  germany: CloudInstances.AZURE_GERMANY,
  azuregermany: CloudInstances.AZURE_GERMANY,
  usgov: CloudInstances.AZURE_US_GOVERNMENT,
  azureusgovernment: CloudInstances.AZURE_US_GOVERNMENT,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Maps an authority string to its realm; anything that is not a shared realm
 * literal is taken as a tenant id or domain.
 * @internal
 */
export function parseAuthority(value: string): Authority {
  switch (value.trim().toLowerCase()) {
    case 'common':
      return Authorities.COMMON;
    case 'organizations':
      return Authorities.ORGANIZATIONS;
    case 'consumers':
      return Authorities.CONSUMERS;
    case 'adfs':
      return Authorities.AZURE_DIRECTORY_FEDERATED_SERVICES;
    default:
      return Authorities.tenant(value.trim());
  }
}

const AuthoritySchema: z.ZodType<Authority> = z.union([
  z.object({ type: z.enum(['common', 'organizations', 'consumers', 'adfs']) }),
  z.object({ type: z.literal('tenant'), tenantId: z.string().min(1) }),
]);

const IdentityConfigBaseSchema = z.object({
  clientId: z.string().min(1),
  authority: AuthoritySchema.default(Authorities.COMMON),
  cloudInstance: z
    .enum([
      CloudInstances.AZURE_PUBLIC,
      CloudInstances.AZURE_CHINA,
      CloudInstances.AZURE_GERMANY,
      CloudInstances.AZURE_US_GOVERNMENT,
    ])
    .default(CloudInstances.AZURE_PUBLIC),
  redirectUri: z.string().url().optional(),
  extraQueryParameters: z.record(z.string()).default({}),
  extraHeaderParameters: z.record(z.string()).default({}),
});

/**
 * Zod schema for {@link IdentityConfig} input with field normalization.
 * @public
 */
export const IdentityConfigSchema = z.preprocess((input: unknown) => {
  if (!isRecord(input)) return input;

  const result: Record<string, unknown> = { ...input };

  if (result.clientId === undefined && result.client_id !== undefined) {
    result.clientId = result.client_id;
  }
  delete result.client_id;

  if (result.redirectUri === undefined && result.redirect_uri !== undefined) {
    result.redirectUri = result.redirect_uri;
  }
  delete result.redirect_uri;

  // tenant wins over a shared-realm authority when both are given
  const tenant = result.tenantId ?? result.tenant;
  if (typeof tenant === 'string' && tenant.trim()) {
    result.authority = Authorities.tenant(tenant.trim());
  } else if (typeof result.authority === 'string') {
    result.authority = parseAuthority(result.authority);
  }
  delete result.tenant;
  delete result.tenantId;

  const cloud = result.cloudInstance ?? result.cloud;
  if (typeof cloud === 'string') {
    result.cloudInstance = CLOUD_ALIASES[cloud.replace(/[\s_-]/g, '').toLowerCase()] ?? cloud;
  }
  delete result.cloud;

  return result;
}, IdentityConfigBaseSchema);

/**
 * Parameters delivered on the redirect URI. Unknown keys are dropped.
 * @public
 */
export const AuthorizationQueryResponseSchema = z.object({
  code: z.string().optional(),
  id_token: z.string().optional(),
  access_token: z.string().optional(),
  token_type: z.string().optional(),
  expires_in: z.coerce.number().int().nonnegative().optional(),
  state: z.string().optional(),
  nonce: z.string().optional(),
  session_state: z.string().optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
  error_uri: z.string().optional(),
});

/**
 * Successful token endpoint response (RFC 6749 section 5.1).
 * @public
 */
export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().min(1),
  expires_in: z.coerce.number().int().nonnegative().optional(),
  ext_expires_in: z.coerce.number().int().nonnegative().optional(),
  scope: z.string().optional(),
  refresh_token: z.string().optional(),
  id_token: z.string().optional(),
});

/**
 * Token endpoint error response (RFC 6749 section 5.2).
 * @public
 */
export const ErrorResponseSchema = z.object({
  error: z.string().min(1),
  error_description: z.string().optional(),
  error_uri: z.string().optional(),
  error_codes: z.array(z.number()).optional(),
  trace_id: z.string().optional(),
  correlation_id: z.string().optional(),
});
