/**
 * Centralized validation utilities shared by request builders and config loading.
 * @public
 */
import { NIL as NIL_UUID, validate as validateUuid } from 'uuid';

/**
 * True for `undefined`, the empty string, and whitespace-only strings.
 * @internal
 */
function isBlank(value: string | undefined | null): boolean {
  return value === undefined || value === null || value.trim().length === 0;
}

/**
 * True when `value` is a well-formed UUID other than the nil UUID.
 * @internal
 */
function isNonNilUuid(value: string): boolean {
  return validateUuid(value) && value.toLowerCase() !== NIL_UUID;
}

/**
 * Collection of validation utility functions.
 * @example
 * ```typescript
 * ValidationUtils.isBlank('  '); // true
 * ValidationUtils.isNonNilUuid('00000000-0000-0000-0000-000000000000'); // false
 * ```
 * @public
 */
export const ValidationUtils = {
  isBlank,
  isNonNilUuid,
};
