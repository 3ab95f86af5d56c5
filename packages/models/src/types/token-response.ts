/**
 * OAuth2 token response following RFC 6749 section 5.1, with the identity
 * platform's `ext_expires_in` and OpenID `id_token` extensions.
 */
export interface OAuth2TokenResponse {
  /** The access token issued by the authorization server */
  access_token: string;
  /** Type of token issued (typically 'Bearer') */
  token_type: string;
  /** Lifetime in seconds of the access token */
  expires_in?: number;
  /** Extended lifetime in seconds used during service outages */
  ext_expires_in?: number;
  /** Space-delimited list of granted scopes */
  scope?: string;
  /** Refresh token for obtaining new access tokens */
  refresh_token?: string;
  /** OpenID Connect id token */
  id_token?: string;
}

/**
 * OAuth2 error response following RFC 6749 section 5.2.
 */
export interface OAuth2ErrorResponse {
  /** Error code from RFC 6749 (e.g., 'invalid_request', 'invalid_client') */
  error: string;
  /** Human-readable error description */
  error_description?: string;
  /** URI to documentation about the error */
  error_uri?: string;
  /** Platform error codes */
  error_codes?: number[];
  trace_id?: string;
  correlation_id?: string;
}
