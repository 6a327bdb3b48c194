/**
 * GitHub binding
 */

import { z } from 'zod';
import type { ProfileFields, ProviderBinding } from '../../types.js';
import { SpecifiedProfileError } from '../../errors.js';
import { parseStandardTokenResponse } from '../../utils/token-response.js';

export const GITHUB = 'github';

export const GITHUB_API = 'https://api.github.com/user';

export const GITHUB_DEFAULTS = {
  authorizationURL: 'https://github.com/login/oauth/authorize',
  accessTokenURL: 'https://github.com/login/oauth/access_token',
  scope: 'read:user user:email',
} as const;

// GitHub API errors: { message, documentation_url }
const ProfileErrorSchema = z.object({ message: z.string() });

const ProfileSchema = z.object({
  id: z.union([z.number().int(), z.string().min(1)]),
  login: z.string(),
  name: z.string().nullish(),
  email: z.string().nullish(),
  avatar_url: z.string().nullish(),
  html_url: z.string().optional(),
});

/**
 * Extract profile fields from a `GET /user` document. GitHub has no
 * first/last name split; `login` and `html_url` are kept in `extra`.
 * @throws SpecifiedProfileError when the document is an API error
 */
export function parseGitHubProfile(json: unknown): ProfileFields {
  if (json !== null && typeof json === 'object' && !('id' in json)) {
    const error = ProfileErrorSchema.safeParse(json);
    if (error.success) {
      throw new SpecifiedProfileError(GITHUB, 'api_error', error.data.message);
    }
  }

  const profile = ProfileSchema.parse(json);

  return {
    providerUserID: String(profile.id),
    ...(profile.name ? { fullName: profile.name } : {}),
    ...(profile.email ? { email: profile.email } : {}),
    ...(profile.avatar_url ? { avatarURL: profile.avatar_url } : {}),
    extra: {
      login: profile.login,
      ...(profile.html_url ? { htmlURL: profile.html_url } : {}),
    },
  };
}

export const githubBinding: ProviderBinding = {
  id: GITHUB,
  defaults: GITHUB_DEFAULTS,
  // without it the token endpoint answers form-encoded
  accessTokenHeaders: { Accept: 'application/json' },
  profileRequest: (tokenInfo) => ({
    url: GITHUB_API,
    headers: {
      Authorization: `Bearer ${tokenInfo.accessToken}`,
      Accept: 'application/vnd.github+json',
    },
  }),
  parseTokenResponse: (body) => parseStandardTokenResponse(GITHUB, body),
  parseProfile: parseGitHubProfile,
};
