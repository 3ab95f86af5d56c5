import type { EnvPlaceholderResolverConfig } from '@idforge/models';

/**
 * Error thrown when an environment placeholder cannot be resolved.
 * @public
 */
export class EnvironmentResolutionError extends Error {
  public constructor(
    message: string,
    public readonly variable?: string,
  ) {
    super(message);
    this.name = 'EnvironmentResolutionError';
    Object.setPrototypeOf(this, EnvironmentResolutionError.prototype);
  }

  public static missingVariable(variable: string): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Required environment variable '${variable}' is not defined`,
      variable,
    );
  }

  public static circularReference(
    variable: string,
  ): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Circular reference detected in environment variable '${variable}'`,
      variable,
    );
  }

  public static maxDepthExceeded(depth: number): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Maximum resolution depth of ${depth} exceeded`,
    );
  }
}

const PLACEHOLDER = /\$\{([A-Z_][A-Z0-9_]*)(?::([^}]*))?\}/g;

/**
 * Resolves `${VAR}` and `${VAR:default}` placeholders in configuration values.
 *
 * Values taken from the environment may themselves contain placeholders and
 * are resolved recursively, up to `maxDepth`, with cycle detection.
 * @example
 * ```typescript
 * const resolver = new EnvPlaceholderResolver({ envSource: { TENANT: 'contoso' } });
 * resolver.resolve('${TENANT}'); // 'contoso'
 * resolver.resolve('${CLOUD:AzurePublic}'); // 'AzurePublic'
 * ```
 * @public
 */
export class EnvPlaceholderResolver {
  private readonly maxDepth: number;
  private readonly strict: boolean;
  private readonly envSource: Record<string, string | undefined>;

  public constructor(config: EnvPlaceholderResolverConfig = {}) {
    this.maxDepth = config.maxDepth ?? 10;
    this.strict = config.strict ?? true;
    this.envSource = config.envSource ?? process.env;
  }

  /**
   * Resolves every placeholder in `value`.
   * @throws {EnvironmentResolutionError} On a missing variable (strict mode), a cycle, or excessive depth
   */
  public resolve(
    value: string,
    visited: ReadonlySet<string> = new Set(),
    depth = 0,
  ): string {
    if (depth > this.maxDepth) {
      throw EnvironmentResolutionError.maxDepthExceeded(this.maxDepth);
    }

    return value.replace(
      PLACEHOLDER,
      (match, name: string, fallback: string | undefined) => {
        if (visited.has(name)) {
          throw EnvironmentResolutionError.circularReference(name);
        }

        const next = new Set(visited).add(name);
        const envValue = this.envSource[name];

        if (envValue !== undefined) {
          return this.resolve(envValue, next, depth + 1);
        }
        if (fallback !== undefined) {
          return this.resolve(fallback, next, depth + 1);
        }
        if (this.strict) {
          throw EnvironmentResolutionError.missingVariable(name);
        }
        return match;
      },
    );
  }

  public static containsPlaceholder(value: string): boolean {
    return new RegExp(PLACEHOLDER.source).test(value);
  }
}

/**
 * Resolves placeholders in the named string fields of a configuration object.
 *
 * Returns a copy; fields that are absent or not strings are left unchanged.
 * @public
 */
export function resolveConfigFields<T extends object>(
  config: T,
  fields: readonly (keyof T)[],
  resolverConfig?: EnvPlaceholderResolverConfig,
): T {
  const resolver = new EnvPlaceholderResolver(resolverConfig);
  const resolved = { ...config };

  for (const field of fields) {
    const value = config[field];
    if (
      typeof value === 'string' &&
      EnvPlaceholderResolver.containsPlaceholder(value)
    ) {
      Object.assign(resolved, { [field]: resolver.resolve(value) });
    }
  }

  return resolved;
}
