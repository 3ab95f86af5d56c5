import type { IdentityConfig } from '@idforge/models';

/**
 * Discriminants of the token request variants.
 * @public
 */
export const CredentialKinds = {
  AUTHORIZATION_CODE: 'authorization_code',
  AUTHORIZATION_CODE_CERTIFICATE: 'authorization_code_certificate',
  CLIENT_SECRET: 'client_secret',
  CLIENT_ASSERTION: 'client_assertion',
  CLIENT_CERTIFICATE: 'client_certificate',
  OPENID: 'openid',
} as const;

export type CredentialKind = (typeof CredentialKinds)[keyof typeof CredentialKinds];

/** Scope used by the client credentials variants when none is given. */
export const DEFAULT_CLIENT_CREDENTIALS_SCOPE = 'https://graph.microsoft.com/.default';

export interface CredentialBase {
  readonly config: IdentityConfig;
  readonly scope: readonly string[];
}

/**
 * Payload of the variants that redeem either an authorization code or a
 * refresh token. At most one of the two may be set.
 */
export interface CodeRedemption {
  readonly authorizationCode?: string;
  readonly refreshToken?: string;
  readonly codeVerifier?: string;
}

export interface AuthorizationCodeCredential extends CredentialBase, CodeRedemption {
  readonly kind: typeof CredentialKinds.AUTHORIZATION_CODE;
  readonly clientSecret: string;
}

export interface AuthorizationCodeCertificateCredential extends CredentialBase, CodeRedemption {
  readonly kind: typeof CredentialKinds.AUTHORIZATION_CODE_CERTIFICATE;
  readonly clientAssertion: string;
  readonly clientAssertionType: string;
}

export interface ClientSecretCredential extends CredentialBase {
  readonly kind: typeof CredentialKinds.CLIENT_SECRET;
  readonly clientSecret: string;
}

export interface ClientAssertionCredential extends CredentialBase {
  readonly kind: typeof CredentialKinds.CLIENT_ASSERTION;
  readonly clientAssertion: string;
  readonly clientAssertionType: string;
}

/** A client assertion signed with a certificate's private key. */
export interface ClientCertificateCredential extends CredentialBase {
  readonly kind: typeof CredentialKinds.CLIENT_CERTIFICATE;
  readonly clientAssertion: string;
  readonly clientAssertionType: string;
}

export interface OpenIdCredential extends CredentialBase, CodeRedemption {
  readonly kind: typeof CredentialKinds.OPENID;
  readonly clientSecret: string;
}

/**
 * Every token request variant.
 * @public
 */
export type Credential =
  | AuthorizationCodeCredential
  | AuthorizationCodeCertificateCredential
  | ClientSecretCredential
  | ClientAssertionCredential
  | ClientCertificateCredential
  | OpenIdCredential;

/** Variants that can redeem a refresh token. */
export type RefreshableCredential =
  | AuthorizationCodeCredential
  | AuthorizationCodeCertificateCredential
  | OpenIdCredential;
