/**
 * Canonical OAuth parameter identifiers.
 *
 * Values are the wire names. The three endpoint entries never go on the wire;
 * they carry the URLs resolved from the authority.
 */
export enum OAuthParameter {
  ClientId = 'client_id',
  ClientSecret = 'client_secret',
  RedirectUri = 'redirect_uri',
  ResponseType = 'response_type',
  ResponseMode = 'response_mode',
  Scope = 'scope',
  State = 'state',
  Prompt = 'prompt',
  LoginHint = 'login_hint',
  DomainHint = 'domain_hint',
  Nonce = 'nonce',
  CodeChallenge = 'code_challenge',
  CodeChallengeMethod = 'code_challenge_method',
  CodeVerifier = 'code_verifier',
  AuthorizationCode = 'code',
  RefreshToken = 'refresh_token',
  GrantType = 'grant_type',
  ClientAssertion = 'client_assertion',
  ClientAssertionType = 'client_assertion_type',
  AuthorizationUrl = 'authorization_url',
  TokenUrl = 'token_url',
  RefreshTokenUrl = 'refresh_token_url',
}

const ALIASES: Partial<Record<OAuthParameter, string>> = {
  [OAuthParameter.AuthorizationCode]: 'authorization_code',
};

/**
 * Name used in diagnostics; differs from the wire name only where the wire
 * name is ambiguous on its own (`code`).
 */
export function parameterAlias(parameter: OAuthParameter): string {
  return ALIASES[parameter] ?? parameter;
}
