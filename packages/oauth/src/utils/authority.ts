/**
 * Authority resolution
 * Maps a cloud instance and directory realm to concrete endpoint URLs
 */
import {
  CloudInstances,
  type Authority,
  type CloudInstance,
} from '@idforge/models';

/**
 * Sign-in host per cloud instance.
 * @public
 */
export const AUTHORITY_HOSTS: Readonly<Record<CloudInstance, string>> = {
  [CloudInstances.AZURE_PUBLIC]: 'https://login.microsoftonline.com',
  [CloudInstances.AZURE_CHINA]: 'https://login.chinacloudapi.cn',
  [CloudInstances.AZURE_GERMANY]: 'https://login.microsoftonline.de',
  [CloudInstances.AZURE_US_GOVERNMENT]: 'https://login.microsoftonline.us',
};

/**
 * Endpoints of one authority.
 * @public
 */
export interface AuthorityEndpoints {
  readonly authorizationUrl: string;
  readonly tokenUrl: string;
  readonly refreshTokenUrl: string;
}

/**
 * Path segment naming the realm: the tenant itself, or a shared realm literal.
 * @public
 */
export function authoritySegment(authority: Authority): string {
  switch (authority.type) {
    case 'tenant':
      return authority.tenantId;
    case 'common':
    case 'organizations':
    case 'consumers':
    case 'adfs':
      return authority.type;
  }
}

/**
 * Resolves the endpoints for `authority` on `cloudInstance`.
 *
 * Pure and offline. AD FS serves the v1 protocol paths, every other realm the
 * v2.0 paths.
 * @example
 * ```typescript
 * resolveAuthority('AzurePublic', Authorities.tenant('contoso.onmicrosoft.com')).tokenUrl;
 * // 'https://login.microsoftonline.com/contoso.onmicrosoft.com/oauth2/v2.0/token'
 * ```
 * @public
 */
export function resolveAuthority(
  cloudInstance: CloudInstance,
  authority: Authority,
): AuthorityEndpoints {
  const base = `${AUTHORITY_HOSTS[cloudInstance]}/${authoritySegment(authority)}`;
  const oauthPath = authority.type === 'adfs' ? 'oauth2' : 'oauth2/v2.0';

  return {
    authorizationUrl: `${base}/${oauthPath}/authorize`,
    tokenUrl: `${base}/${oauthPath}/token`,
    refreshTokenUrl: `${base}/${oauthPath}/token`,
  };
}
