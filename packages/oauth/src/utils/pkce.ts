/**
 * PKCE (Proof Key for Code Exchange) and secure random helpers
 * Pure functions apart from reading the system random source
 */
import { createHash, randomBytes } from 'node:crypto';
import { CodeChallengeMethods, type CodeChallengeMethod } from '@idforge/models';

/**
 * A verifier and the challenge derived from it.
 *
 * The challenge and method go on the authorization URL; keep the verifier
 * and hand it to the credential that redeems the code.
 * @public
 */
export interface ProofKeyCodeExchange {
  readonly codeVerifier: string;
  readonly codeChallenge: string;
  readonly codeChallengeMethod: CodeChallengeMethod;
}

/**
 * Encodes a buffer to URL-safe base64 without padding (RFC 4648 Section 5).
 * @internal
 */
export function base64URLEncode(buffer: Buffer): string {
  return buffer.toString('base64').replace(/\+/g, '-').replace(/\//g, '_').replace(/=/g, '');
}

/**
 * Generates a 43 character code verifier from 32 random bytes (RFC 7636 Section 4.1).
 * @public
 */
export function generateCodeVerifier(): string {
  return base64URLEncode(randomBytes(32));
}

/**
 * Derives the S256 code challenge for a verifier (RFC 7636 Section 4.2).
 * @public
 */
export function generateCodeChallenge(verifier: string): string {
  return base64URLEncode(createHash('sha256').update(verifier).digest());
}

/**
 * Generates a verifier/challenge pair using the S256 method.
 * @example
 * ```typescript
 * const pkce = generatePkce();
 * const url = AuthCodeAuthorizationUrlParameters.builder(config).withPkce(pkce).url();
 * // later: AuthorizationCodeCredentialBuilder.create(config).withPkce(pkce)
 * ```
 * @public
 */
export function generatePkce(): ProofKeyCodeExchange {
  const codeVerifier = generateCodeVerifier();
  return {
    codeVerifier,
    codeChallenge: generateCodeChallenge(codeVerifier),
    codeChallengeMethod: CodeChallengeMethods.S256,
  };
}

/**
 * Generates a 22 character state value from 16 random bytes.
 * @public
 */
export function generateState(): string {
  return base64URLEncode(randomBytes(16));
}

/**
 * Generates a nonce: 32 random bytes, base64url encoded, then hashed with
 * SHA-256 and base64url encoded again, giving a 43 character URL-safe string.
 * @public
 */
export function secureRandom32(): string {
  const seed = base64URLEncode(randomBytes(32));
  return base64URLEncode(createHash('sha256').update(seed).digest());
}
