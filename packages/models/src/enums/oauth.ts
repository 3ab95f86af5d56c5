/**
 * Artifacts the authorization endpoint can return.
 *
 * Listed in canonical order; a set of response types is always rendered
 * in this order.
 */
export const ResponseTypes = {
  CODE: 'code',
  ID_TOKEN: 'id_token',
  TOKEN: 'token',
} as const;

export type ResponseType = (typeof ResponseTypes)[keyof typeof ResponseTypes];

/**
 * How the authorization endpoint delivers its response to the redirect URI
 */
export const ResponseModes = {
  QUERY: 'query',
  FRAGMENT: 'fragment',
  FORM_POST: 'form_post',
} as const;

export type ResponseMode = (typeof ResponseModes)[keyof typeof ResponseModes];

/**
 * Type of user interaction required on the sign-in page
 */
export const Prompts = {
  LOGIN: 'login',
  NONE: 'none',
  CONSENT: 'consent',
  SELECT_ACCOUNT: 'select_account',
} as const;

export type Prompt = (typeof Prompts)[keyof typeof Prompts];

/**
 * Standard OAuth 2.0 grant types
 */
export const GrantTypes = {
  AUTHORIZATION_CODE: 'authorization_code',
  REFRESH_TOKEN: 'refresh_token',
  CLIENT_CREDENTIALS: 'client_credentials',
} as const;

export type GrantType = (typeof GrantTypes)[keyof typeof GrantTypes];

/**
 * PKCE code challenge methods
 */
export const CodeChallengeMethods = {
  PLAIN: 'plain',
  S256: 'S256',
} as const;

export type CodeChallengeMethod =
  (typeof CodeChallengeMethods)[keyof typeof CodeChallengeMethods];

/**
 * RFC 7523 client assertion type for JWT bearer client authentication
 */
export const CLIENT_ASSERTION_TYPE_JWT_BEARER =
  'urn:ietf:params:oauth:client-assertion-type:jwt-bearer';
