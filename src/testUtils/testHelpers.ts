/**
 * Common test utilities and helpers
 * Reduces duplication across test files
 */

import { expect } from 'chai';
import sinon from 'sinon';
import type {
  HTTPLayer,
  HTTPRequestOptions,
  HTTPResponse,
} from '../http/http-layer.js';
import type { ProviderBinding } from '../types.js';
import { parseStandardTokenResponse } from '../utils/token-response.js';
import { DefaultLogger } from '../logging/logger.js';
import { LogLevel } from '../logging/types.js';
import { OAUTH2_REDACTION_PATHS } from '../oauth2-provider.js';
import { MockTransport } from './logTransports.js';

/**
 * Await a promise that must reject with an instance of `errorClass`
 * @returns The rejection, narrowed for further assertions
 */
export async function expectRejection<T extends Error>(
  promise: Promise<unknown>,
  errorClass: abstract new (...args: never[]) => T
): Promise<T> {
  try {
    await promise;
  } catch (error) {
    expect(error).to.be.instanceOf(errorClass);
    if (error instanceof errorClass) {
      return error;
    }
  }
  return expect.fail(`Expected rejection with ${errorClass.name}`);
}

export type StubHTTPLayer = {
  get: sinon.SinonStub<[string, HTTPRequestOptions?], Promise<HTTPResponse>>;
  post: sinon.SinonStub<
    [string, Record<string, string>, HTTPRequestOptions?],
    Promise<HTTPResponse>
  >;
};

/**
 * HTTP layer whose methods are sinon stubs; configure them per test
 */
export function createStubHTTPLayer(): StubHTTPLayer & HTTPLayer {
  return {
    get: sinon.stub<[string, HTTPRequestOptions?], Promise<HTTPResponse>>(),
    post: sinon.stub<
      [string, Record<string, string>, HTTPRequestOptions?],
      Promise<HTTPResponse>
    >(),
  };
}

/**
 * Logger writing to a MockTransport, with the provider redaction paths
 */
export function createTestLogger(
  provider: string,
  transport: MockTransport = new MockTransport()
): DefaultLogger {
  return new DefaultLogger(
    { provider },
    { level: LogLevel.Debug, redactPaths: OAUTH2_REDACTION_PATHS },
    transport
  );
}

/**
 * Binding for a fictional RFC 6749 compliant provider
 */
export function createTestBinding(
  overrides: Partial<ProviderBinding> = {}
): ProviderBinding {
  return {
    id: 'example',
    profileRequest: (tokenInfo) => ({
      url: 'https://api.example.com/me',
      headers: { Authorization: `Bearer ${tokenInfo.accessToken}` },
    }),
    parseTokenResponse: (body) => parseStandardTokenResponse('example', body),
    parseProfile: () => ({ providerUserID: 'example-user' }),
    ...overrides,
  };
}
