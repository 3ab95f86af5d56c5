/**
 * Configuration for environment placeholder resolution
 */
export interface EnvPlaceholderResolverConfig {
  /** Maximum depth for nested placeholder resolution */
  maxDepth?: number;
  /** Whether to throw on missing variables without defaults */
  strict?: boolean;
  /** Custom environment source (defaults to process.env) */
  envSource?: Record<string, string | undefined>;
}
