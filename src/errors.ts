import { StatusCodes } from 'http-status-codes';

export type AuthenticationErrorKind =
  | 'configuration'
  | 'state_mismatch'
  | 'invalid_response_format'
  | 'specified_profile'
  | 'unspecified_profile'
  | 'network'
  | 'access_denied'
  | 'provider_callback';

type ErrorDetails = {
  providerId?: string;
  statusCode: number;
  error: string;
  cause?: unknown;
};

/**
 * Base class of every failure surfaced by a provider flow.
 * Messages are prefixed with the provider id when one is known.
 */
export abstract class AuthenticationError extends Error {
  public abstract readonly kind: AuthenticationErrorKind;

  public readonly providerId?: string;

  /** HTTP status a caller would answer with */
  public readonly statusCode: number;

  /** OAuth error code */
  public readonly error: string;

  protected constructor(message: string, details: ErrorDetails) {
    super(
      details.providerId ? `[${details.providerId}] ${message}` : message,
      details.cause === undefined ? undefined : { cause: details.cause }
    );
    this.name = new.target.name;
    this.providerId = details.providerId;
    this.statusCode = details.statusCode;
    this.error = details.error;
  }
}

/**
 * Settings are missing or malformed
 */
export class ConfigurationError extends AuthenticationError {
  public readonly kind = 'configuration' as const;

  /** Setting names that failed validation */
  public readonly fields: string[];

  public constructor(providerId: string, issues: string[], fields: string[]) {
    super(`Invalid settings: ${issues.join('; ')}`, {
      providerId,
      statusCode: StatusCodes.INTERNAL_SERVER_ERROR,
      error: 'server_error',
    });
    this.fields = fields;
  }
}

/**
 * The callback state does not match the cached value (possible CSRF)
 */
export class StateMismatchError extends AuthenticationError {
  public readonly kind = 'state_mismatch' as const;

  public constructor(providerId: string) {
    super("State param doesn't match the cached value", {
      providerId,
      statusCode: StatusCodes.BAD_REQUEST,
      error: 'invalid_state',
    });
  }
}

export class InvalidResponseFormatError extends AuthenticationError {
  public readonly kind = 'invalid_response_format' as const;

  public constructor(providerId: string, cause?: unknown) {
    super('Invalid response format for accessToken', {
      providerId,
      statusCode: StatusCodes.BAD_GATEWAY,
      error: 'invalid_response',
      cause,
    });
  }
}

/**
 * The provider answered the profile request with an explicit error
 */
export class SpecifiedProfileError extends AuthenticationError {
  public readonly kind = 'specified_profile' as const;

  public readonly errorType: string;
  public readonly errorMessage: string;

  public constructor(
    providerId: string,
    errorType: string,
    errorMessage: string
  ) {
    super(
      `Error retrieving profile information. Error type: ${errorType}, message: ${errorMessage}`,
      {
        providerId,
        statusCode: StatusCodes.BAD_GATEWAY,
        error: 'profile_error',
      }
    );
    this.errorType = errorType;
    this.errorMessage = errorMessage;
  }
}

/**
 * The profile could not be fetched or parsed; `cause` holds the reason
 */
export class UnspecifiedProfileError extends AuthenticationError {
  public readonly kind = 'unspecified_profile' as const;

  public constructor(providerId: string, cause: unknown) {
    super('Error retrieving profile information', {
      providerId,
      statusCode: StatusCodes.BAD_GATEWAY,
      error: 'profile_error',
      cause,
    });
  }
}

export type NetworkErrorReason = 'timeout' | 'aborted' | 'transport';

/**
 * Transport-level failure reported by the HTTP layer
 */
export class NetworkError extends AuthenticationError {
  public readonly kind = 'network' as const;

  public readonly reason: NetworkErrorReason;

  /** Request target without its query string */
  public readonly target: string;

  public constructor(
    reason: NetworkErrorReason,
    target: string,
    cause?: unknown
  ) {
    const description = {
      timeout: 'timed out',
      aborted: 'was aborted',
      transport: 'failed',
    }[reason];
    super(`Request to ${target} ${description}`, {
      statusCode:
        reason === 'timeout'
          ? StatusCodes.GATEWAY_TIMEOUT
          : StatusCodes.SERVICE_UNAVAILABLE,
      error: 'temporarily_unavailable',
      cause,
    });
    this.reason = reason;
    this.target = target;
  }
}

/**
 * The user declined the authorization request
 */
export class AccessDeniedError extends AuthenticationError {
  public readonly kind = 'access_denied' as const;

  public constructor(providerId: string) {
    super('User denied access', {
      providerId,
      statusCode: StatusCodes.FORBIDDEN,
      error: 'access_denied',
    });
  }
}

/**
 * The provider redirected back with an error other than access_denied
 */
export class ProviderCallbackError extends AuthenticationError {
  public readonly kind = 'provider_callback' as const;

  public readonly description?: string;

  public constructor(providerId: string, error: string, description?: string) {
    super(
      description
        ? `Got error: ${error}, description: ${description}`
        : `Got error: ${error}`,
      {
        providerId,
        statusCode: StatusCodes.BAD_REQUEST,
        error,
      }
    );
    this.description = description;
  }
}
