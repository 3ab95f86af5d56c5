/**
 * Parameters delivered to the redirect URI after the authorization step,
 * taken from the query or fragment of the callback URL.
 */
export interface AuthorizationQueryResponse {
  code?: string;
  id_token?: string;
  access_token?: string;
  token_type?: string;
  expires_in?: number;
  state?: string;
  nonce?: string;
  session_state?: string;
  error?: string;
  error_description?: string;
  error_uri?: string;
}
