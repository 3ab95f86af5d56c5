/**
 * Client credentials authenticated with an X.509 certificate
 * Signs an RS256 client assertion whose audience is the token endpoint
 */
import { X509Certificate } from 'node:crypto';
import * as jose from 'jose';
import { v4 as uuidv4 } from 'uuid';
import { ValidationUtils, logError, logEvent } from '@idforge/core';
import {
  CLIENT_ASSERTION_TYPE_JWT_BEARER,
  type CloudInstance,
  type IdentityConfig,
} from '@idforge/models';
import { IdentityError } from '../errors/identity-error.js';
import { resolveAuthority } from '../utils/authority.js';
import { err, ok, type IdentityResult } from '../utils/result.js';
import { clientAssertionForm } from './client-assertion-credential.js';
import { CredentialBuilder } from './credential-builder.js';
import { CredentialKinds, type ClientCertificateCredential, type CredentialBase } from './credential.js';

/**
 * Key material of a registered certificate.
 *
 * Either the PEM certificate or its SHA-1 thumbprint (hex, as shown in the
 * app registration) identifies it through the `x5t` header.
 * @public
 */
export interface ClientCertificate {
  /** PKCS#8 PEM encoded RSA private key */
  readonly privateKey: string;
  readonly certificate?: string;
  readonly thumbprint?: string;
}

export interface ClientAssertionOptions {
  cloudInstance?: CloudInstance;
  /** Assertion lifetime in seconds, 10 minutes by default */
  lifetimeSeconds?: number;
  /** Issue time in seconds since the epoch; defaults to now */
  issuedAt?: number;
}

const DEFAULT_ASSERTION_LIFETIME_SECONDS = 600;

function x5tHeader(certificate: ClientCertificate): IdentityResult<string> {
  const { certificate: pem, thumbprint } = certificate;

  if (pem !== undefined && !ValidationUtils.isBlank(pem)) {
    try {
      // fingerprint is the colon separated SHA-1 digest of the DER encoding
      const { fingerprint } = new X509Certificate(pem);
      return ok(Buffer.from(fingerprint.replace(/:/g, ''), 'hex').toString('base64url'));
    } catch {
      return err(IdentityError.invalidValue('certificate', 'expected a PEM encoded X.509 certificate'));
    }
  }

  if (thumbprint !== undefined && !ValidationUtils.isBlank(thumbprint)) {
    const hex = thumbprint.replace(/[\s:]/g, '');
    if (!/^[0-9a-fA-F]{40}$/.test(hex)) {
      return err(IdentityError.invalidValue('thumbprint', 'expected a hex SHA-1 thumbprint'));
    }
    return ok(Buffer.from(hex, 'hex').toString('base64url'));
  }

  return err(IdentityError.missingRequiredValue('certificate', 'certificate or thumbprint is required'));
}

/**
 * Signs a JWT bearer client assertion for `config.clientId`.
 *
 * Claims: `aud` the token endpoint, `iss` and `sub` the client id, a random
 * `jti`, and `nbf`/`exp` spanning the lifetime.
 * @public
 */
export async function createClientAssertion(
  config: IdentityConfig,
  certificate: ClientCertificate,
  options: ClientAssertionOptions = {},
): Promise<IdentityResult<string>> {
  if (ValidationUtils.isBlank(config.clientId)) {
    return err(IdentityError.missingRequiredValue('client_id'));
  }
  if (ValidationUtils.isBlank(certificate.privateKey)) {
    return err(IdentityError.missingRequiredValue('private_key'));
  }
  const x5t = x5tHeader(certificate);
  if (!x5t.ok) {
    return x5t;
  }

  let key: jose.KeyLike;
  try {
    key = await jose.importPKCS8(certificate.privateKey, 'RS256');
  } catch {
    return err(IdentityError.invalidValue('private_key', 'expected a PKCS#8 PEM encoded RSA key'));
  }

  const { tokenUrl } = resolveAuthority(options.cloudInstance ?? config.cloudInstance, config.authority);
  const issuedAt = options.issuedAt ?? Math.floor(Date.now() / 1000);
  const lifetime = options.lifetimeSeconds ?? DEFAULT_ASSERTION_LIFETIME_SECONDS;

  let assertion: string;
  try {
    assertion = await new jose.SignJWT({})
      .setProtectedHeader({ alg: 'RS256', typ: 'JWT', x5t: x5t.value })
      .setAudience(tokenUrl)
      .setIssuer(config.clientId)
      .setSubject(config.clientId)
      .setJti(uuidv4())
      .setIssuedAt(issuedAt)
      .setNotBefore(issuedAt)
      .setExpirationTime(issuedAt + lifetime)
      .sign(key);
  } catch (error) {
    // jose refuses RSA moduli under 2048 bits at signing time
    logError('client_assertion_sign', error, { audience: tokenUrl });
    return err(IdentityError.invalidValue('private_key', 'the key cannot sign RS256 assertions'));
  }

  logEvent('debug', 'identity:client_assertion_signed', { audience: tokenUrl, lifetime });
  return ok(assertion);
}

interface ClientCertificateState extends CredentialBase {
  readonly certificate?: ClientCertificate;
}

/**
 * Builder for {@link ClientCertificateCredential}. Building is asynchronous
 * because the assertion is signed at that point, against the token endpoint of
 * the authority configured by then.
 * @example
 * ```typescript
 * const credential = await ClientCertificateCredentialBuilder.create(config)
 *   .withCertificate({ privateKey: pem, thumbprint })
 *   .build();
 * ```
 * @public
 */
export class ClientCertificateCredentialBuilder extends CredentialBuilder<
  ClientCertificateState,
  ClientCertificateCredentialBuilder
> {
  public static create(config: IdentityConfig): ClientCertificateCredentialBuilder {
    return new ClientCertificateCredentialBuilder({ config, scope: [] });
  }

  protected next(state: ClientCertificateState): ClientCertificateCredentialBuilder {
    return new ClientCertificateCredentialBuilder(state);
  }

  public withCertificate(certificate: ClientCertificate): ClientCertificateCredentialBuilder {
    return this.next({ ...this.state, certificate });
  }

  public async build(
    options: Omit<ClientAssertionOptions, 'cloudInstance'> = {},
  ): Promise<IdentityResult<ClientCertificateCredential>> {
    const { config, scope, certificate } = this.state;
    if (certificate === undefined) {
      return err(IdentityError.missingRequiredValue('certificate'));
    }

    const assertion = await createClientAssertion(config, certificate, options);
    if (!assertion.ok) {
      return assertion;
    }

    const credential: ClientCertificateCredential = {
      kind: CredentialKinds.CLIENT_CERTIFICATE,
      config,
      scope,
      clientAssertion: assertion.value,
      clientAssertionType: CLIENT_ASSERTION_TYPE_JWT_BEARER,
    };
    const form = clientAssertionForm(credential);
    return form.ok ? ok(credential) : form;
  }
}
