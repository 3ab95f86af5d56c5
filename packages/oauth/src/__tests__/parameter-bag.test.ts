import { describe, it, expect } from 'vitest';
import { Authorities, CloudInstances } from '@idforge/models';
import { IdentityErrorKind } from '../errors/identity-error.js';
import { OAuthParameter, parameterAlias } from '../serializer/oauth-parameter.js';
import { ParameterBag } from '../serializer/parameter-bag.js';
import { ENCODED_REDIRECT_URI, TEST_REDIRECT_URI, expectErr, expectOk } from './test-utils.js';

describe('ParameterBag', () => {
  describe('encode', () => {
    it('should emit required then optional keys in list order, not setter order', () => {
      const bag = new ParameterBag()
        .extendScopes(['read', 'write'])
        .grantType('client_credentials')
        .clientId('abc');

      const sink = expectOk(
        bag.encode(
          [OAuthParameter.Scope],
          [OAuthParameter.ClientId, OAuthParameter.GrantType],
          new URLSearchParams(),
        ),
      );

      expect(sink.toString()).toBe('client_id=abc&grant_type=client_credentials&scope=read+write');
    });

    it('should fail on the first missing required key and write nothing after it', () => {
      const bag = new ParameterBag().clientId('abc').extendScopes(['read']);
      const sink = new URLSearchParams();

      const error = expectErr(
        bag.encode(
          [OAuthParameter.State],
          [OAuthParameter.ClientId, OAuthParameter.GrantType, OAuthParameter.Scope],
          sink,
        ),
      );

      expect(error.kind).toBe(IdentityErrorKind.MISSING_REQUIRED_VALUE);
      expect(error.fields).toEqual(['grant_type']);
      expect(sink.toString()).toBe('client_id=abc');
    });

    it('should treat a blank required value as missing', () => {
      const error = expectErr(new ParameterBag().clientId('   ').form([OAuthParameter.ClientId]));

      expect(error.fields).toEqual(['client_id']);
    });

    it('should name the authorization code by its alias', () => {
      const error = expectErr(new ParameterBag().form([OAuthParameter.AuthorizationCode]));

      expect(error.message).toBe('Missing required value: authorization_code');
      expect(error.fields).toEqual(['authorization_code']);
    });

    it('should skip absent and blank optional keys', () => {
      const bag = new ParameterBag().clientId('abc').nonce('n-1').state('');

      const form = expectOk(
        bag.form([OAuthParameter.ClientId], [OAuthParameter.State, OAuthParameter.Nonce]),
      );

      expect(form.toString()).toBe('client_id=abc&nonce=n-1');
    });

    it('should form-encode reserved characters', () => {
      const form = expectOk(
        new ParameterBag().redirectUri(TEST_REDIRECT_URI).form([OAuthParameter.RedirectUri]),
      );

      expect(form.toString()).toBe(`redirect_uri=${ENCODED_REDIRECT_URI}`);
    });
  });

  describe('setters', () => {
    it('should overwrite an earlier value', () => {
      const bag = new ParameterBag().state('first').state('second');

      expect(bag.get(OAuthParameter.State)).toBe('second');
    });

    it('should trim and de-duplicate scopes across calls', () => {
      const bag = new ParameterBag()
        .extendScopes([' read ', 'write', 'read', ''])
        .extendScopes(['write', 'profile']);

      expect(bag.get(OAuthParameter.Scope)).toBe('read write profile');
    });

    it('should leave scope unset when only blanks are given', () => {
      const bag = new ParameterBag().extendScopes([' ', '']);

      expect(bag.has(OAuthParameter.Scope)).toBe(false);
    });

    it('should store the endpoints of an authority', () => {
      const bag = new ParameterBag().authority(
        CloudInstances.AZURE_PUBLIC,
        Authorities.tenant('contoso.onmicrosoft.com'),
      );

      expect(bag.get(OAuthParameter.AuthorizationUrl)).toBe(
        'https://login.microsoftonline.com/contoso.onmicrosoft.com/oauth2/v2.0/authorize',
      );
      expect(bag.get(OAuthParameter.TokenUrl)).toBe(
        'https://login.microsoftonline.com/contoso.onmicrosoft.com/oauth2/v2.0/token',
      );
      expect(bag.get(OAuthParameter.RefreshTokenUrl)).toBe(
        'https://login.microsoftonline.com/contoso.onmicrosoft.com/oauth2/v2.0/token',
      );
    });
  });

  it('should use wire names as aliases for everything but the code', () => {
    expect(parameterAlias(OAuthParameter.ClientId)).toBe('client_id');
    expect(parameterAlias(OAuthParameter.CodeVerifier)).toBe('code_verifier');
    expect(parameterAlias(OAuthParameter.AuthorizationCode)).toBe('authorization_code');
  });
});
