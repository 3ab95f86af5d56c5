import { describe, it, expect, vi } from 'vitest';
import { CloudInstances } from '@idforge/models';
import { AuthorizationCodeCredentialBuilder } from '../credentials/authorization-code-credential.js';
import { ClientAssertionCredentialBuilder } from '../credentials/client-assertion-credential.js';
import { ClientSecretCredentialBuilder } from '../credentials/client-secret-credential.js';
import { CredentialKinds, type ClientSecretCredential } from '../credentials/credential.js';
import { IdentityErrorKind } from '../errors/identity-error.js';
import { ConfidentialClient } from '../executor/confidential-client.js';
import {
  ConfidentialClientApplication,
  ConfidentialClientApplicationBuilder,
} from '../executor/confidential-client-application.js';
import { FetchTransport, FORM_CONTENT_TYPE } from '../transport/http-transport.js';
import {
  TEST_CLIENT_ID,
  createMockTransport,
  createTestConfig,
  expectErr,
  expectOk,
  jsonResponse,
} from './test-utils.js';

const BASIC_TEST_CREDENTIALS =
  'Basic NjczMWRlNzYtMTRhNi00OWFlLTk3YmMtNmViYTY5MTQzOTFlOnRlc3Qtc2VjcmV0';
const COMMON_TOKEN_URL = 'https://login.microsoftonline.com/common/oauth2/v2.0/token';

const secretCredential = expectOk(
  ClientSecretCredentialBuilder.create(
    createTestConfig({ extraHeaderParameters: { 'x-client-SKU': 'test-sku' } }),
  )
    .withClientSecret('test-secret')
    .build(),
);

describe('ConfidentialClient', () => {
  describe('prepare', () => {
    it('should build the request with Basic credentials and extra headers', () => {
      const request = expectOk(new ConfidentialClient(secretCredential).prepare());

      expect(request.url.href).toBe(COMMON_TOKEN_URL);
      expect(request.method).toBe('POST');
      expect(request.headers).toEqual({
        'x-client-SKU': 'test-sku',
        'Content-Type': FORM_CONTENT_TYPE,
        Authorization: BASIC_TEST_CREDENTIALS,
      });
      expect(request.body.get('client_secret')).toBe('test-secret');
    });

    it('should not let extra headers replace the content type', () => {
      const credential = expectOk(
        ClientSecretCredentialBuilder.create(
          createTestConfig({ extraHeaderParameters: { 'Content-Type': 'text/plain' } }),
        )
          .withClientSecret('test-secret')
          .build(),
      );

      const request = expectOk(new ConfidentialClient(credential).prepare());

      expect(request.headers['Content-Type']).toBe(FORM_CONTENT_TYPE);
    });

    it('should drop reserved extra headers regardless of case', () => {
      const credential = expectOk(
        ClientSecretCredentialBuilder.create(
          createTestConfig({
            extraHeaderParameters: {
              'content-type': 'text/plain',
              authorization: 'Bearer other',
              'x-ms-correlation': 'corr-1',
            },
          }),
        )
          .withClientSecret('test-secret')
          .build(),
      );

      const request = expectOk(new ConfidentialClient(credential).prepare());

      expect(request.headers).toEqual({
        'x-ms-correlation': 'corr-1',
        'Content-Type': FORM_CONTENT_TYPE,
        Authorization: BASIC_TEST_CREDENTIALS,
      });
    });

    it('should keep an extra Authorization header when no Basic header is sent', () => {
      const credential = expectOk(
        ClientAssertionCredentialBuilder.create(
          createTestConfig({ extraHeaderParameters: { authorization: 'Bearer other' } }),
        )
          .withClientAssertion('assertion-1')
          .build(),
      );

      const request = expectOk(new ConfidentialClient(credential).prepare());

      expect(request.headers).toEqual({
        authorization: 'Bearer other',
        'Content-Type': FORM_CONTENT_TYPE,
      });
    });

    it('should send no Authorization header for an assertion', () => {
      const credential = expectOk(
        ClientAssertionCredentialBuilder.create(createTestConfig())
          .withClientAssertion('assertion-1')
          .build(),
      );

      const request = expectOk(new ConfidentialClient(credential).prepare());

      expect(request.headers).toEqual({ 'Content-Type': FORM_CONTENT_TYPE });
    });

    it('should target the overridden cloud', () => {
      const client = new ConfidentialClient(secretCredential, {
        cloudInstance: CloudInstances.AZURE_US_GOVERNMENT,
      });

      expect(expectOk(client.prepare()).url.href).toBe(
        'https://login.microsoftonline.us/common/oauth2/v2.0/token',
      );
      expect(client.options().cloudInstance).toBe(CloudInstances.AZURE_US_GOVERNMENT);
    });

    it('should fail on the form body before resolving the target', () => {
      const credential: ClientSecretCredential = {
        kind: CredentialKinds.CLIENT_SECRET,
        config: createTestConfig(),
        scope: [],
        clientSecret: '',
      };

      const error = expectErr(new ConfidentialClient(credential).prepare());

      expect(error.fields).toEqual(['client_secret']);
    });
  });

  describe('execute', () => {
    it('should post the prepared request once with the caller signal', async () => {
      const { transport, post } = createMockTransport(jsonResponse({ access_token: 'at-1', token_type: 'Bearer' }));
      const controller = new AbortController();

      const response = await new ConfidentialClient(secretCredential, { transport }).execute(
        controller.signal,
      );

      expect(response.status).toBe(200);
      expect(post).toHaveBeenCalledTimes(1);
      const [request, signal] = post.mock.calls[0] ?? [];
      expect(request?.body.toString()).toBe(
        `client_id=${TEST_CLIENT_ID}&client_secret=test-secret&grant_type=client_credentials` +
          '&scope=https%3A%2F%2Fgraph.microsoft.com%2F.default',
      );
      expect(signal).toBe(controller.signal);
    });

    it('should reject an invalid credential without calling the transport', async () => {
      const { transport, post } = createMockTransport(jsonResponse({}));
      const credential: ClientSecretCredential = {
        kind: CredentialKinds.CLIENT_SECRET,
        config: createTestConfig({ clientId: '' }),
        scope: [],
        clientSecret: 'test-secret',
      };

      await expect(new ConfidentialClient(credential, { transport }).execute()).rejects.toMatchObject({
        kind: IdentityErrorKind.MISSING_REQUIRED_VALUE,
        fields: ['client_id'],
      });
      expect(post).not.toHaveBeenCalled();
    });
  });

  describe('acquireToken', () => {
    it('should return the validated token payload', async () => {
      const { transport } = createMockTransport(
        jsonResponse({
          access_token: 'at-1',
          token_type: 'Bearer',
          expires_in: 3599,
          scope: 'https://graph.microsoft.com/.default',
        }),
      );

      const token = await new ConfidentialClient(secretCredential, { transport }).acquireToken();

      expect(token).toEqual({
        access_token: 'at-1',
        token_type: 'Bearer',
        expires_in: 3599,
        scope: 'https://graph.microsoft.com/.default',
      });
    });

    it('should surface the OAuth error of a failed request', async () => {
      const { transport } = createMockTransport(
        jsonResponse({ error: 'invalid_client', error_description: 'Bad client secret' }, 401),
      );

      await expect(
        new ConfidentialClient(secretCredential, { transport }).acquireToken(),
      ).rejects.toMatchObject({
        kind: IdentityErrorKind.UPSTREAM_HTTP_ERROR,
        status: 401,
        oauthError: 'invalid_client',
        message: 'Token endpoint returned 401: invalid_client - Bad client secret',
      });
    });
  });

  it('should return a refreshing client and keep the original', () => {
    const redeemed = expectOk(
      AuthorizationCodeCredentialBuilder.create(createTestConfig())
        .withClientSecret('test-secret')
        .withAuthorizationCode('auth-code-1')
        .build(),
    );
    const client = new ConfidentialClient(redeemed);

    const refreshing = expectOk(client.withRefreshToken('refresh-1'));

    expect(expectOk(refreshing.formBody()).get('grant_type')).toBe('refresh_token');
    expect(expectOk(client.formBody()).get('grant_type')).toBe('authorization_code');
  });
});

describe('ConfidentialClientApplication', () => {
  it('should pick the variant through the builder', () => {
    const builder = ConfidentialClientApplication.builder(createTestConfig());

    expect(builder).toBeInstanceOf(ConfidentialClientApplicationBuilder);
    expect(expectOk(builder.withClientSecret('test-secret').build()).kind).toBe('client_secret');
    expect(expectOk(builder.withClientAssertion('assertion-1').build()).kind).toBe('client_assertion');
    expect(
      expectOk(builder.withAuthorizationCode('auth-code-1').withClientSecret('test-secret').build())
        .kind,
    ).toBe('authorization_code');
    expect(
      expectOk(builder.withAuthorizationCodeCertificate('auth-code-1', 'assertion-1').build()).kind,
    ).toBe('authorization_code_certificate');
    expect(
      expectOk(builder.withOpenIdAuthorizationCode('auth-code-1').withClientSecret('test-secret').build())
        .kind,
    ).toBe('openid');
  });

  it('should delegate execution to the credential', async () => {
    const { transport, post } = createMockTransport(jsonResponse({ access_token: 'at-1', token_type: 'Bearer' }));
    const app = new ConfidentialClientApplication(secretCredential, { transport });

    const token = await app.acquireToken();

    expect(token.access_token).toBe('at-1');
    expect(post.mock.calls[0]?.[0].headers.Authorization).toBe(BASIC_TEST_CREDENTIALS);
    expect(app.basicAuth()).toEqual([TEST_CLIENT_ID, 'test-secret']);
  });

  it('should refresh into a new application', () => {
    const credential = expectOk(
      ConfidentialClientApplication.builder(createTestConfig())
        .withAuthorizationCode('auth-code-1')
        .withClientSecret('test-secret')
        .build(),
    );
    const app = new ConfidentialClientApplication(credential);

    const refreshed = expectOk(app.withRefreshToken('refresh-1'));

    expect(refreshed).not.toBe(app);
    expect(expectOk(refreshed.formBody()).get('refresh_token')).toBe('refresh-1');
    expect(expectOk(refreshed.formBody()).has('code')).toBe(false);
    expect(app.credential).toBe(credential);
  });

  it('should refuse to refresh a client credentials application', () => {
    const app = new ConfidentialClientApplication(secretCredential);

    expect(expectErr(app.withRefreshToken('refresh-1')).kind).toBe(IdentityErrorKind.INVALID_VALUE);
  });
});

describe('FetchTransport', () => {
  const request = expectOk(new ConfidentialClient(secretCredential).prepare());

  it('should post the form body as a string', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('{}'));

    await new FetchTransport(fetchImpl).post(request);

    expect(fetchImpl).toHaveBeenCalledWith(request.url, {
      method: 'POST',
      headers: {
        'x-client-SKU': 'test-sku',
        'Content-Type': FORM_CONTENT_TYPE,
        Authorization: BASIC_TEST_CREDENTIALS,
      },
      body: request.body.toString(),
      signal: undefined,
    });
  });

  it('should return error statuses as responses', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('', { status: 503 }));

    const response = await new FetchTransport(fetchImpl).post(request);

    expect(response.status).toBe(503);
  });

  it('should wrap network failures without leaking the body', async () => {
    const cause = new TypeError('fetch failed');
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(cause);

    const error: unknown = await new FetchTransport(fetchImpl).post(request).catch((e: unknown) => e);

    expect(error).toMatchObject({
      kind: IdentityErrorKind.UPSTREAM_HTTP_ERROR,
      message: `Token request to ${COMMON_TOKEN_URL} failed`,
      cause,
    });
  });
});
