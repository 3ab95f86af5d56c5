import { vi } from 'vitest';
import {
  Authorities,
  CloudInstances,
  type IdentityConfig,
} from '@idforge/models';
import type { IdentityError } from '../errors/identity-error.js';
import type { InteractiveAuthenticator } from '../interactive/interactive-authenticator.js';
import type { HttpTransport } from '../transport/http-transport.js';
import type { IdentityResult } from '../utils/result.js';

export const TEST_CLIENT_ID = '6731de76-14a6-49ae-97bc-6eba6914391e';
export const TEST_REDIRECT_URI = 'http://localhost:8000/redirect';
export const ENCODED_REDIRECT_URI = 'http%3A%2F%2Flocalhost%3A8000%2Fredirect';
export const TEST_TENANT = 'contoso.onmicrosoft.com';

/**
 * Config for the public cloud, common authority and a loopback redirect URI
 */
export function createTestConfig(overrides: Partial<IdentityConfig> = {}): IdentityConfig {
  return {
    clientId: TEST_CLIENT_ID,
    authority: Authorities.COMMON,
    cloudInstance: CloudInstances.AZURE_PUBLIC,
    redirectUri: TEST_REDIRECT_URI,
    extraQueryParameters: {},
    extraHeaderParameters: {},
    ...overrides,
  };
}

export function expectOk<T>(result: IdentityResult<T>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${result.error.kind}: ${result.error.message}`);
  }
  return result.value;
}

export function expectErr<T>(result: IdentityResult<T>): IdentityError {
  if (result.ok) {
    throw new Error('Expected failure, got success');
  }
  return result.error;
}

export function createMockTransport(response: Response) {
  const post = vi.fn<HttpTransport['post']>().mockResolvedValue(response);
  const transport: HttpTransport = { post };
  return { transport, post };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function createMockAuthenticator(
  implementation: InteractiveAuthenticator['authenticate'],
) {
  const authenticate = vi.fn<InteractiveAuthenticator['authenticate']>(implementation);
  const authenticator: InteractiveAuthenticator = { authenticate };
  return { authenticator, authenticate };
}
