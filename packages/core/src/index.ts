export * from './validation-utils.js';

export * as RequestUtils from './utils/request-utils.js';

// Logging with redaction
export * from './logging/index.js';

export {
  EnvPlaceholderResolver,
  EnvironmentResolutionError,
  resolveConfigFields,
} from './env/environment-resolver.js';
