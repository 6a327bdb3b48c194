/**
 * Error Normalizer unit tests
 * Tests error normalization functionality in isolation
 * Co-located with the utility for better maintainability
 */

import { expect } from 'chai';
import { ErrorNormalizer } from './error-normalizer.js';
import {
  InvalidResponseFormatError,
  NetworkError,
  StateMismatchError,
} from '../errors.js';
import { errorData } from '../fixtures/test-data.js';

describe('ErrorNormalizer', () => {
  const defaultProvider = 'facebook';

  it('uses status and code of authentication errors', () => {
    const normalized = ErrorNormalizer.normalizeError(
      new StateMismatchError('github'),
      { endpoint: 'exchangeCode' },
      defaultProvider
    );

    expect(normalized).to.deep.equal({
      statusCode: 400,
      error: 'invalid_state',
      error_description: "[github] State param doesn't match the cached value",
      endpoint: 'exchangeCode',
      provider: 'github',
    });
  });

  it('normalizes network errors without a provider', () => {
    const normalized = ErrorNormalizer.normalizeError(
      new NetworkError('timeout', 'https://graph.facebook.com/me'),
      {},
      defaultProvider
    );

    expect(normalized).to.deep.equal({
      statusCode: 504,
      error: 'temporarily_unavailable',
      error_description: 'Request to https://graph.facebook.com/me timed out',
      provider: 'facebook',
    });
  });

  it('lets the context provider win', () => {
    const normalized = ErrorNormalizer.normalizeError(
      new InvalidResponseFormatError('facebook'),
      { provider: 'github' }
    );

    expect(normalized.provider).to.equal('github');
    expect(normalized.statusCode).to.equal(502);
  });

  it('passes through OAuth-shaped errors', () => {
    const normalized = ErrorNormalizer.normalizeError(
      errorData.oauthBody,
      { endpoint: 'exchangeCode' },
      defaultProvider
    );

    expect(normalized).to.deep.equal({
      statusCode: 400,
      error: 'invalid_grant',
      error_description: 'Invalid authorization code',
      endpoint: 'exchangeCode',
      provider: 'facebook',
    });
  });

  it('falls back to message when error_description is missing on OAuth-shaped input', () => {
    const normalized = ErrorNormalizer.normalizeError({
      error: 'invalid_request',
      message: 'Bad input',
    });

    expect(normalized.statusCode).to.equal(400);
    expect(normalized.error_description).to.equal('Bad input');
    expect(normalized).to.not.have.property('provider');
  });

  it('normalizes fetch-like response objects', () => {
    const normalized = ErrorNormalizer.normalizeError(
      errorData.http400,
      {},
      defaultProvider
    );

    expect(normalized.statusCode).to.equal(400);
    expect(normalized.error).to.equal('invalid_request');
    expect(normalized.error_description).to.equal('Bad Request');
  });

  it('uses the HTTP reason phrase when statusText is missing', () => {
    expect(
      ErrorNormalizer.normalizeError(errorData.http503).error_description
    ).to.equal('Service Unavailable');
    expect(
      ErrorNormalizer.normalizeError({ status: 418 }).error_description
    ).to.equal('HTTP 418');
  });

  it('maps statuses to OAuth error codes', () => {
    const cases: Array<[number, number, string]> = [
      [400, 400, 'invalid_request'],
      [401, 401, 'unauthorized'],
      [403, 403, 'access_denied'],
      [429, 429, 'temporarily_unavailable'],
      [456, 456, 'invalid_request'],
      [502, 502, 'server_error'],
      [504, 504, 'temporarily_unavailable'],
      [200, 500, 'server_error'],
    ];

    cases.forEach(([status, statusCode, error]) => {
      const normalized = ErrorNormalizer.normalizeError({ status });
      expect(normalized.statusCode).to.equal(statusCode);
      expect(normalized.error).to.equal(error);
    });
  });

  it('maps native timeout errors to temporarily_unavailable (504)', () => {
    const normalized = ErrorNormalizer.normalizeError(errorData.networkTimeout);

    expect(normalized.statusCode).to.equal(504);
    expect(normalized.error).to.equal('temporarily_unavailable');
    expect(normalized.error_description).to.equal('Network timeout');
  });

  it('maps native connection errors to temporarily_unavailable (503)', () => {
    const normalized = ErrorNormalizer.normalizeError(
      new Error('connect ECONNREFUSED 127.0.0.1:443')
    );

    expect(normalized.statusCode).to.equal(503);
    expect(normalized.error).to.equal('temporarily_unavailable');
  });

  it('normalizes string primitives to server_error (500)', () => {
    const normalized = ErrorNormalizer.normalizeError('just failed');

    expect(normalized).to.deep.equal({
      statusCode: 500,
      error: 'server_error',
      error_description: 'just failed',
    });
  });

  it('creates a fallback error for unrecognized shapes', () => {
    const normalized = ErrorNormalizer.normalizeError(
      { someProperty: 'value' },
      { endpoint: 'buildIdentity' }
    );

    expect(normalized).to.deep.equal({
      statusCode: 500,
      error: 'server_error',
      error_description: 'Internal Server Error',
      endpoint: 'buildIdentity',
    });
  });
});
