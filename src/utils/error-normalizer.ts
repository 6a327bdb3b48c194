import type { OAuthError } from '../types.js';
import { AuthenticationError } from '../errors.js';
import createError from 'http-errors';
import { StatusCodes, ReasonPhrases } from 'http-status-codes';

export type ErrorContext = { endpoint?: string; provider?: string };

/**
 * Error creation using http-errors for standardized error objects
 */
class ErrorBuilder {
  constructor(
    private readonly httpError: createError.HttpError,
    private readonly error: string
  ) {}

  withContext(context: ErrorContext): OAuthError {
    const result: OAuthError = {
      statusCode: this.httpError.statusCode,
      error: this.error,
    };

    if (this.httpError.message && this.httpError.message !== this.error) {
      result.error_description = this.httpError.message;
    }
    if (context.endpoint !== undefined) {
      result.endpoint = context.endpoint;
    }
    if (context.provider !== undefined) {
      result.provider = context.provider;
    }

    return result;
  }
}

function buildError(
  statusCode: number,
  error: string,
  description?: string
): ErrorBuilder {
  // http-errors deprecates non-4xx/5xx status codes; coerce to 500 in those cases
  const status =
    statusCode >= 400 && statusCode < 600
      ? statusCode
      : StatusCodes.INTERNAL_SERVER_ERROR;
  return new ErrorBuilder(createError(status, description ?? error), error);
}

/**
 * Turns anything a provider flow can throw into an {@link OAuthError}, for
 * logging and for callers that answer HTTP requests.
 */
export class ErrorNormalizer {
  static normalizeError(
    e: unknown,
    context: ErrorContext = {},
    defaultProvider?: string
  ): OAuthError {
    const errorContext: ErrorContext = {};
    if (context.endpoint !== undefined) errorContext.endpoint = context.endpoint;
    const provider =
      context.provider ??
      (e instanceof AuthenticationError ? e.providerId : undefined) ??
      defaultProvider;
    if (provider !== undefined) errorContext.provider = provider;

    // Try each error format in order of specificity
    return (
      this.tryAuthenticationError(e) ??
      this.tryOAuthErrorShape(e) ??
      this.tryHTTPResponseShape(e) ??
      this.tryNativeErrorShape(e) ??
      this.tryStringErrorShape(e) ??
      this.createFallbackError()
    ).withContext(errorContext);
  }

  private static tryAuthenticationError(e: unknown): ErrorBuilder | null {
    return e instanceof AuthenticationError
      ? buildError(e.statusCode, e.error, e.message)
      : null;
  }

  /**
   * RFC 6749 error bodies and already normalized errors
   */
  private static tryOAuthErrorShape(e: unknown): ErrorBuilder | null {
    const obj = this.asObject(e);
    if (!obj) return null;

    const error = this.readString(obj, 'error');
    if (!error) return null;

    const statusCode =
      this.readNumber(obj, 'statusCode') ??
      this.readNumber(obj, 'status') ??
      StatusCodes.BAD_REQUEST;
    const description =
      this.readString(obj, 'error_description') ??
      this.readString(obj, 'message');
    return buildError(statusCode, error, description);
  }

  /**
   * Responses from the HTTP layer or fetch
   */
  private static tryHTTPResponseShape(e: unknown): ErrorBuilder | null {
    const obj = this.asObject(e);
    if (!obj) return null;

    const statusCode = this.readNumber(obj, 'status');
    if (statusCode === undefined) return null;

    const description =
      this.readString(obj, 'statusText') || this.getReasonPhrase(statusCode);
    return buildError(
      statusCode,
      this.mapStatusToOAuthError(statusCode),
      description
    );
  }

  private static tryNativeErrorShape(e: unknown): ErrorBuilder | null {
    if (!(e instanceof Error)) return null;

    if (/timeout|timed out/i.test(e.message)) {
      return buildError(
        StatusCodes.GATEWAY_TIMEOUT,
        'temporarily_unavailable',
        e.message
      );
    }
    if (/network|fetch failed|ECONNREFUSED|ENOTFOUND/i.test(e.message)) {
      return buildError(
        StatusCodes.SERVICE_UNAVAILABLE,
        'temporarily_unavailable',
        e.message
      );
    }
    return buildError(
      StatusCodes.INTERNAL_SERVER_ERROR,
      'server_error',
      e.message
    );
  }

  private static tryStringErrorShape(e: unknown): ErrorBuilder | null {
    return typeof e === 'string'
      ? buildError(StatusCodes.INTERNAL_SERVER_ERROR, 'server_error', e)
      : null;
  }

  private static createFallbackError(): ErrorBuilder {
    return buildError(
      StatusCodes.INTERNAL_SERVER_ERROR,
      'server_error',
      ReasonPhrases.INTERNAL_SERVER_ERROR
    );
  }

  private static mapStatusToOAuthError(statusCode: number): string {
    switch (statusCode) {
      case StatusCodes.UNAUTHORIZED:
        return 'unauthorized';
      case StatusCodes.FORBIDDEN:
        return 'access_denied';
      case StatusCodes.TOO_MANY_REQUESTS:
      case StatusCodes.SERVICE_UNAVAILABLE:
      case StatusCodes.GATEWAY_TIMEOUT:
        return 'temporarily_unavailable';
      default:
        return statusCode >= 400 && statusCode < 500
          ? 'invalid_request'
          : 'server_error';
    }
  }

  private static getReasonPhrase(statusCode: number): string {
    const reasonPhrases: Record<number, string> = {
      [StatusCodes.BAD_REQUEST]: ReasonPhrases.BAD_REQUEST,
      [StatusCodes.UNAUTHORIZED]: ReasonPhrases.UNAUTHORIZED,
      [StatusCodes.FORBIDDEN]: ReasonPhrases.FORBIDDEN,
      [StatusCodes.NOT_FOUND]: ReasonPhrases.NOT_FOUND,
      [StatusCodes.TOO_MANY_REQUESTS]: ReasonPhrases.TOO_MANY_REQUESTS,
      [StatusCodes.INTERNAL_SERVER_ERROR]: ReasonPhrases.INTERNAL_SERVER_ERROR,
      [StatusCodes.BAD_GATEWAY]: ReasonPhrases.BAD_GATEWAY,
      [StatusCodes.SERVICE_UNAVAILABLE]: ReasonPhrases.SERVICE_UNAVAILABLE,
      [StatusCodes.GATEWAY_TIMEOUT]: ReasonPhrases.GATEWAY_TIMEOUT,
    };

    return reasonPhrases[statusCode] || `HTTP ${statusCode}`;
  }

  private static asObject(v: unknown): Record<string, unknown> | null {
    if (v === null || typeof v !== 'object') return null;
    return Object.fromEntries(Object.entries(v));
  }

  private static readNumber(
    obj: Record<string, unknown>,
    key: string
  ): number | undefined {
    const value = obj[key];
    return typeof value === 'number' ? value : undefined;
  }

  private static readString(
    obj: Record<string, unknown>,
    key: string
  ): string | undefined {
    const value = obj[key];
    return typeof value === 'string' ? value : undefined;
  }
}
