import { describe, it, expect } from 'vitest';
import { parseAuthorizationQueryResponse } from '../authorization/redirect-response.js';
import { IdentityErrorKind } from '../errors/identity-error.js';
import { expectErr, expectOk } from './test-utils.js';

describe('parseAuthorizationQueryResponse', () => {
  it('should read the query component', () => {
    const response = expectOk(
      parseAuthorizationQueryResponse('http://localhost:8000/redirect?code=abc&state=xyz'),
    );

    expect(response).toEqual({ code: 'abc', state: 'xyz' });
  });

  it('should fall back to the fragment', () => {
    const response = expectOk(
      parseAuthorizationQueryResponse(
        new URL('http://localhost:8000/redirect#id_token=header.body.sig&state=xyz&session_state=s-1'),
      ),
    );

    expect(response).toEqual({ id_token: 'header.body.sig', state: 'xyz', session_state: 's-1' });
  });

  it('should prefer the query when both are present', () => {
    const response = expectOk(
      parseAuthorizationQueryResponse('http://localhost:8000/redirect?code=from-query#code=from-fragment'),
    );

    expect(response.code).toBe('from-query');
  });

  it('should coerce expires_in to a number', () => {
    const response = expectOk(
      parseAuthorizationQueryResponse(
        'http://localhost:8000/redirect#access_token=at-1&token_type=Bearer&expires_in=3599',
      ),
    );

    expect(response.expires_in).toBe(3599);
    expect(response.token_type).toBe('Bearer');
  });

  it('should return error fields from the authorization endpoint', () => {
    const response = expectOk(
      parseAuthorizationQueryResponse(
        'http://localhost:8000/redirect?error=access_denied&error_description=User+declined',
      ),
    );

    expect(response.error).toBe('access_denied');
    expect(response.error_description).toBe('User declined');
  });

  it('should fail when neither query nor fragment is present', () => {
    const error = expectErr(parseAuthorizationQueryResponse('http://localhost:8000/redirect'));

    expect(error.kind).toBe(IdentityErrorKind.MISSING_REDIRECT_PAYLOAD);
    expect(error.message).toBe(
      'No query or fragment returned on redirect, url: http://localhost:8000/redirect',
    );
  });

  it('should treat a bare question mark as no payload', () => {
    const error = expectErr(parseAuthorizationQueryResponse('http://localhost:8000/redirect?'));

    expect(error.kind).toBe(IdentityErrorKind.MISSING_REDIRECT_PAYLOAD);
  });

  it('should reject a string that is not a URL', () => {
    const error = expectErr(parseAuthorizationQueryResponse('not a url'));

    expect(error.kind).toBe(IdentityErrorKind.MALFORMED_URL);
    expect(error.fields).toEqual(['redirect_url']);
  });

  it('should reject a non-numeric expires_in', () => {
    const error = expectErr(
      parseAuthorizationQueryResponse('http://localhost:8000/redirect#access_token=at-1&expires_in=soon'),
    );

    expect(error.kind).toBe(IdentityErrorKind.INVALID_VALUE);
    expect(error.fields).toEqual(['expires_in']);
  });
});
