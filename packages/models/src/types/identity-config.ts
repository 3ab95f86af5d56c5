import type { Authority } from './authority.js';
import type { CloudInstance } from './cloud-instance.js';

/**
 * Application registration and endpoint selection shared by every request
 * built for one client.
 */
export interface IdentityConfig {
  /** Application (client) id; a non-nil UUID */
  readonly clientId: string;
  /** Directory realm used to build endpoint paths */
  readonly authority: Authority;
  /** Cloud whose sign-in host is used */
  readonly cloudInstance: CloudInstance;
  /** Redirect URI registered for the application */
  readonly redirectUri?: string;
  /** Appended to authorization URLs after the canonical parameters */
  readonly extraQueryParameters: Readonly<Record<string, string>>;
  /** Added to token endpoint requests */
  readonly extraHeaderParameters: Readonly<Record<string, string>>;
}
