import { ValidationUtils } from '@idforge/core';
import { Authorities, type Authority, type CloudInstance } from '@idforge/models';
import { IdentityError } from '../errors/identity-error.js';
import type { ProofKeyCodeExchange } from '../utils/pkce.js';
import type { CodeRedemption, CredentialBase } from './credential.js';

/**
 * Immutable builder base shared by the credential variants. Each `with*`
 * call returns a new builder.
 * @internal
 */
export abstract class CredentialBuilder<TState extends CredentialBase, TSelf> {
  protected constructor(protected readonly state: TState) {}

  protected abstract next(state: TState): TSelf;

  public withClientId(clientId: string): TSelf {
    return this.next({ ...this.state, config: { ...this.state.config, clientId } });
  }

  public withTenant(tenantId: string): TSelf {
    return this.withAuthority(Authorities.tenant(tenantId));
  }

  public withAuthority(authority: Authority): TSelf {
    return this.next({ ...this.state, config: { ...this.state.config, authority } });
  }

  public withCloudInstance(cloudInstance: CloudInstance): TSelf {
    return this.next({ ...this.state, config: { ...this.state.config, cloudInstance } });
  }

  /** Adds to the requested scopes. */
  public withScope(scope: string | Iterable<string>): TSelf {
    const added = typeof scope === 'string' ? [scope] : [...scope];
    return this.next({ ...this.state, scope: [...this.state.scope, ...added] });
  }
}

/**
 * Builder base for the variants that redeem an authorization code or a
 * refresh token.
 * @internal
 */
export abstract class CodeRedemptionCredentialBuilder<
  TState extends CredentialBase & CodeRedemption,
  TSelf,
> extends CredentialBuilder<TState, TSelf> {
  public withAuthorizationCode(authorizationCode: string): TSelf {
    return this.next({ ...this.state, authorizationCode });
  }

  public withRefreshToken(refreshToken: string): TSelf {
    return this.next({ ...this.state, refreshToken });
  }

  public withRedirectUri(redirectUri: string | URL): TSelf {
    const value = typeof redirectUri === 'string' ? redirectUri : redirectUri.href;
    return this.next({ ...this.state, config: { ...this.state.config, redirectUri: value } });
  }

  public withCodeVerifier(codeVerifier: string): TSelf {
    return this.next({ ...this.state, codeVerifier });
  }

  /** Takes the verifier of the pair whose challenge went on the authorization URL. */
  public withPkce(pkce: ProofKeyCodeExchange): TSelf {
    return this.withCodeVerifier(pkce.codeVerifier);
  }
}

/**
 * `MissingRequiredValue(field)` when `value` is blank.
 * @internal
 */
export function missingIfBlank(
  value: string | undefined,
  field: string,
): IdentityError | undefined {
  return ValidationUtils.isBlank(value) ? IdentityError.missingRequiredValue(field) : undefined;
}

/**
 * `ConflictingValues` when both an authorization code and a refresh token are set.
 * @internal
 */
export function conflictingRedemption(redemption: CodeRedemption): IdentityError | undefined {
  return redemption.authorizationCode !== undefined && redemption.refreshToken !== undefined
    ? IdentityError.conflictingValues('authorization_code', 'refresh_token')
    : undefined;
}
