/**
 * Consolidated test fixtures
 * Simple, focused test data for all test files
 */

import type { OAuth2Settings, TokenInfo } from '../types.js';
import { FACEBOOK_DEFAULTS } from '../providers/facebook/facebook-binding.js';
import { GITHUB_DEFAULTS } from '../providers/github/github-binding.js';

// ============================================================================
// SETTINGS
// ============================================================================

export const testSessionID = 'test-session';

export const createFacebookSettings = (
  overrides: Partial<OAuth2Settings> = {}
): OAuth2Settings => ({
  ...FACEBOOK_DEFAULTS,
  redirectURL: 'https://app.example.com/auth/facebook/callback',
  clientID: 'test-client-id',
  clientSecret: 'test-secret',
  ...overrides,
});

export const createGitHubSettings = (
  overrides: Partial<OAuth2Settings> = {}
): OAuth2Settings => ({
  ...GITHUB_DEFAULTS,
  redirectURL: 'https://app.example.com/auth/github/callback',
  clientID: 'test-client-id',
  clientSecret: 'test-secret',
  ...overrides,
});

// ============================================================================
// TOKEN RESPONSE DATA
// ============================================================================

export const tokenData = {
  facebookBody: 'access_token=test-access-token&expires=3600',
  facebookBodyWithoutExpiry: 'access_token=test-access-token',
  githubBody: JSON.stringify({
    access_token: 'test-access-token',
    token_type: 'bearer',
    scope: 'read:user,user:email',
  }),
  facebook: {
    accessToken: 'test-access-token',
    expiresIn: 3600,
  } satisfies TokenInfo,
};

// ============================================================================
// PROFILE DATA
// ============================================================================

export const profileData = {
  facebook: {
    id: '1000001',
    name: 'Ada Example',
    first_name: 'Ada',
    last_name: 'Example',
    email: 'ada@example.com',
    picture: {
      data: { url: 'https://images.example.com/ada.jpg' },
    },
  },

  facebookMinimal: {
    id: '1000002',
    name: 'Bo Example',
  },

  facebookError: {
    error: {
      type: 'OAuthException',
      message: 'Invalid OAuth access token.',
      code: 190,
    },
  },

  github: {
    id: 4242,
    login: 'ada-example',
    name: 'Ada Example',
    email: null,
    avatar_url: 'https://images.example.com/u/4242',
    html_url: 'https://github.com/ada-example',
  },

  githubError: {
    message: 'Bad credentials',
    documentation_url: 'https://docs.github.com/rest',
  },
};

// ============================================================================
// ERROR TEST DATA
// ============================================================================

export const errorData = {
  http400: {
    status: 400,
    statusText: 'Bad Request',
  },

  http503: {
    status: 503,
  },

  oauthBody: {
    error: 'invalid_grant',
    error_description: 'Invalid authorization code',
    statusCode: 400,
  },

  networkTimeout: new Error('Network timeout'),
};

// ============================================================================
// MODULE EXPORT DATA
// ============================================================================

export const moduleData = {
  expectedVersion: '0.1.0',
  expectedExports: [
    'version',
    'OAuth2Provider',
    'facebookBinding',
    'githubBinding',
    'createFacebookProvider',
    'createGitHubProvider',
    'fromEnvironment',
    'ErrorNormalizer',
    'default',
  ],
};
