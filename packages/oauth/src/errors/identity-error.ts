/**
 * Failure kinds raised while building or sending identity requests.
 *
 * Every validation kind is detected before any network I/O.
 */
export enum IdentityErrorKind {
  MISSING_REQUIRED_VALUE = 'missing_required_value',
  CONFLICTING_VALUES = 'conflicting_values',
  INVALID_VALUE = 'invalid_value',
  MALFORMED_URL = 'malformed_url',
  MISSING_REDIRECT_PAYLOAD = 'missing_redirect_payload',
  UPSTREAM_HTTP_ERROR = 'upstream_http_error',
  TIMEOUT = 'timeout',
  CANCELLED = 'cancelled',
}

/**
 * Error raised by request builders, the serializer, transports and the
 * interactive capture flow.
 *
 * `fields` names the parameter(s) at fault so callers can present a precise
 * diagnostic. Messages never carry secrets or tokens.
 */
export class IdentityError extends Error {
  public readonly kind: IdentityErrorKind;
  public readonly fields: readonly string[];
  public readonly cause?: Error;
  /** HTTP status of the upstream response, for upstream errors */
  public readonly status?: number;
  /** OAuth error code returned by the token endpoint, for upstream errors */
  public readonly oauthError?: string;

  public constructor(
    message: string,
    kind: IdentityErrorKind,
    options: {
      fields?: readonly string[];
      cause?: Error;
      status?: number;
      oauthError?: string;
    } = {},
  ) {
    super(IdentityError.sanitizeMessage(message));
    this.name = 'IdentityError';
    this.kind = kind;
    this.fields = options.fields ?? [];
    this.cause = options.cause;
    this.status = options.status;
    this.oauthError = options.oauthError;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, IdentityError.prototype);
  }

  /**
   * Removes credential material that may have been interpolated into a message
   */
  private static sanitizeMessage(message: string): string {
    return message
      .replace(/\bBasic\s+[a-zA-Z0-9+/=]+/gi, 'Basic [REDACTED]')
      .replace(/\bBearer\s+[a-zA-Z0-9._-]+/gi, 'Bearer [REDACTED]')
      .replace(/\b(access_token|refresh_token|client_secret|client_assertion|code_verifier|id_token|code)=[^\s&#]+/gi, '$1=[REDACTED]');
  }

  public static missingRequiredValue(field: string, detail?: string): IdentityError {
    return new IdentityError(
      detail
        ? `Missing required value: ${field} - ${detail}`
        : `Missing required value: ${field}`,
      IdentityErrorKind.MISSING_REQUIRED_VALUE,
      { fields: [field] },
    );
  }

  public static conflictingValues(fieldA: string, fieldB: string): IdentityError {
    return new IdentityError(
      `Conflicting values: ${fieldA} and ${fieldB} must not be set at the same time`,
      IdentityErrorKind.CONFLICTING_VALUES,
      { fields: [fieldA, fieldB] },
    );
  }

  public static invalidValue(field: string, reason: string): IdentityError {
    return new IdentityError(
      `Invalid value for ${field}: ${reason}`,
      IdentityErrorKind.INVALID_VALUE,
      { fields: [field] },
    );
  }

  public static malformedUrl(field: string, cause?: Error): IdentityError {
    return new IdentityError(`Malformed URL in ${field}`, IdentityErrorKind.MALFORMED_URL, {
      fields: [field],
      cause,
    });
  }

  public static missingRedirectPayload(url: string): IdentityError {
    return new IdentityError(
      `No query or fragment returned on redirect, url: ${url}`,
      IdentityErrorKind.MISSING_REDIRECT_PAYLOAD,
      { fields: ['query', 'fragment'] },
    );
  }

  public static upstreamHttpError(
    message: string,
    options: { cause?: Error; status?: number; oauthError?: string } = {},
  ): IdentityError {
    return new IdentityError(message, IdentityErrorKind.UPSTREAM_HTTP_ERROR, options);
  }

  public static timeout(operation: string, timeoutMs: number): IdentityError {
    return new IdentityError(
      `${operation} timed out after ${timeoutMs}ms`,
      IdentityErrorKind.TIMEOUT,
    );
  }

  public static cancelled(operation: string): IdentityError {
    return new IdentityError(`${operation} was cancelled`, IdentityErrorKind.CANCELLED);
  }

  /**
   * Convert the error to a JSON representation (useful for logging/debugging)
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      kind: this.kind,
      fields: this.fields,
      status: this.status,
      oauthError: this.oauthError,
      cause: this.cause?.message,
    };
  }
}
