/**
 * HTTP capability consumed by provider flows
 */

import { NetworkError } from '../errors.js';
import { DEFAULT_TIMEOUT_MS } from '../config.js';

export interface HTTPResponse {
  status: number;
  /** Raw response body */
  body: string;
  /** Response headers with lower-cased names */
  headers: Record<string, string>;
  /**
   * Decode the body as JSON.
   * @throws SyntaxError when the body is not JSON
   */
  json(): unknown;
}

export interface HTTPRequestOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * Implementations must reject with {@link NetworkError} on transport
 * failures, timeouts and cancellation, and resolve for every HTTP status.
 */
export interface HTTPLayer {
  get(url: string, options?: HTTPRequestOptions): Promise<HTTPResponse>;
  post(
    url: string,
    form: Record<string, string>,
    options?: HTTPRequestOptions
  ): Promise<HTTPResponse>;
}

export function createHTTPResponse(
  status: number,
  body: string,
  headers: Record<string, string> = {}
): HTTPResponse {
  return {
    status,
    body,
    headers,
    json: () => JSON.parse(body),
  };
}

// Query strings can carry access tokens
function describeTarget(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.origin}${parsed.pathname}`;
  } catch {
    return '<invalid url>';
  }
}

function errorName(error: unknown): string | undefined {
  return error instanceof Error ||
    (error !== null && typeof error === 'object' && 'name' in error)
    ? String(error.name)
    : undefined;
}

/**
 * HTTPLayer on top of the global fetch
 */
export class FetchHTTPLayer implements HTTPLayer {
  private readonly timeoutMs: number;

  public constructor(options: { timeoutMs?: number } = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  public async get(
    url: string,
    options: HTTPRequestOptions = {}
  ): Promise<HTTPResponse> {
    return this.send(url, { method: 'GET' }, options);
  }

  public async post(
    url: string,
    form: Record<string, string>,
    options: HTTPRequestOptions = {}
  ): Promise<HTTPResponse> {
    return this.send(
      url,
      {
        method: 'POST',
        body: new URLSearchParams(form).toString(),
      },
      {
        ...options,
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          ...options.headers,
        },
      }
    );
  }

  private async send(
    url: string,
    init: { method: string; body?: string },
    options: HTTPRequestOptions
  ): Promise<HTTPResponse> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal
      ? AbortSignal.any([options.signal, timeout])
      : timeout;

    try {
      const response = await fetch(url, {
        ...init,
        headers: options.headers,
        signal,
      });
      const body = await response.text();
      const headers: Record<string, string> = {};
      response.headers.forEach((value, name) => {
        headers[name.toLowerCase()] = value;
      });
      return createHTTPResponse(response.status, body, headers);
    } catch (error) {
      const target = describeTarget(url);
      if (options.signal?.aborted) {
        throw new NetworkError('aborted', target, error);
      }
      if (timeout.aborted || errorName(error) === 'TimeoutError') {
        throw new NetworkError('timeout', target, error);
      }
      throw new NetworkError('transport', target, error);
    }
  }
}
