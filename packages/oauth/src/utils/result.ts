import { IdentityError } from '../errors/identity-error.js';

/**
 * Discriminated union returned by every synchronous builder.
 * Forces callers to handle validation failures explicitly.
 */
export type IdentityResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: IdentityError };

export function ok<T>(value: T): IdentityResult<T> {
  return { ok: true, value };
}

export function err<T = never>(error: IdentityError): IdentityResult<T> {
  return { ok: false, error };
}

/**
 * Returns the value or throws the carried {@link IdentityError}.
 *
 * Bridges result-returning builders into promise code, where a rejection is
 * the way failures travel.
 */
export function unwrap<T>(result: IdentityResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
