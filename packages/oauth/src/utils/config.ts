/**
 * Identity configuration loading
 * Resolves environment placeholders, then normalizes and validates the input
 */
import {
  EnvironmentResolutionError,
  ValidationUtils,
  resolveConfigFields,
} from '@idforge/core';
import type { EnvPlaceholderResolverConfig, IdentityConfig } from '@idforge/models';
import type { ZodIssue } from 'zod';
import { IdentityError } from '../errors/identity-error.js';
import { IdentityConfigSchema } from '../schemas.js';
import { err, ok, type IdentityResult } from './result.js';

const PLACEHOLDER_FIELDS = [
  'clientId',
  'client_id',
  'authority',
  'tenant',
  'tenantId',
  'cloud',
  'cloudInstance',
  'redirectUri',
  'redirect_uri',
] as const;

const FIELD_NAMES: Readonly<Record<string, string>> = {
  clientId: 'client_id',
  redirectUri: 'redirect_uri',
  cloudInstance: 'cloud_instance',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function resolvePlaceholders(
  input: Record<string, unknown>,
  resolverConfig?: EnvPlaceholderResolverConfig,
): Record<string, unknown> {
  const resolved = resolveConfigFields(input, PLACEHOLDER_FIELDS, resolverConfig);

  for (const key of ['extraQueryParameters', 'extraHeaderParameters'] as const) {
    const map = resolved[key];
    if (isRecord(map)) {
      resolved[key] = resolveConfigFields(map, Object.keys(map), resolverConfig);
    }
  }

  return resolved;
}

function issueToError(issue: ZodIssue): IdentityError {
  const path = issue.path.join('.');
  const field = FIELD_NAMES[path] ?? path;
  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return IdentityError.missingRequiredValue(field);
  }
  return IdentityError.invalidValue(field, issue.message);
}

/**
 * Builds an {@link IdentityConfig} from loose input such as a parsed config
 * file section.
 *
 * String fields may hold `${VAR}` or `${VAR:default}` placeholders, resolved
 * from `process.env` unless `resolverConfig.envSource` says otherwise.
 * @example
 * ```typescript
 * const result = loadIdentityConfig({ clientId: '${APP_CLIENT_ID}', tenant: 'contoso.onmicrosoft.com' });
 * if (!result.ok) throw result.error;
 * ```
 * @public
 */
export function loadIdentityConfig(
  input: unknown,
  resolverConfig?: EnvPlaceholderResolverConfig,
): IdentityResult<IdentityConfig> {
  if (!isRecord(input)) {
    return err(IdentityError.invalidValue('config', 'expected an object'));
  }

  let resolved: Record<string, unknown>;
  try {
    resolved = resolvePlaceholders(input, resolverConfig);
  } catch (error) {
    if (error instanceof EnvironmentResolutionError) {
      return err(IdentityError.invalidValue(error.variable ?? 'config', error.message));
    }
    throw error;
  }

  const parsed = IdentityConfigSchema.safeParse(resolved);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    return err(
      issue
        ? issueToError(issue)
        : IdentityError.invalidValue('config', parsed.error.message),
    );
  }

  if (!ValidationUtils.isNonNilUuid(parsed.data.clientId)) {
    return err(IdentityError.missingRequiredValue('client_id', 'expected a non-nil UUID'));
  }

  return ok(parsed.data);
}
