/**
 * Facebook binding
 *
 * Facebook's token endpoint does not follow RFC 6749: it answers with a
 * form-encoded `access_token=...&expires=...` body instead of JSON.
 */

import { z } from 'zod';
import type { ProfileFields, ProviderBinding, TokenInfo } from '../../types.js';
import {
  InvalidResponseFormatError,
  SpecifiedProfileError,
} from '../../errors.js';

export const FACEBOOK = 'facebook';

export const FACEBOOK_API =
  'https://graph.facebook.com/me?fields=name,first_name,last_name,picture,email&return_ssl_resources=1&access_token=';

export const FACEBOOK_DEFAULTS = {
  authorizationURL: 'https://graph.facebook.com/oauth/authorize',
  accessTokenURL: 'https://graph.facebook.com/oauth/access_token',
  scope: 'email',
} as const;

const ProfileErrorSchema = z.object({
  type: z.string(),
  message: z.string(),
});

// Optional fields fall back to absent on null or unexpected types
const optionalString = z
  .string()
  .nullish()
  .catch(undefined)
  .transform((value) => value ?? undefined);

const ProfileSchema = z.object({
  id: z.string().min(1),
  first_name: optionalString,
  last_name: optionalString,
  name: optionalString,
  email: optionalString,
  picture: z
    .object({
      data: z.object({ url: optionalString }).nullish().catch(undefined),
    })
    .nullish()
    .catch(undefined),
});

const DIGITS = /^\d+$/;

/**
 * Parse `access_token=T&expires=S` or `access_token=T`. Any other shape,
 * an empty token or an expiry that is not a safe integer is rejected.
 */
export function parseFacebookTokenResponse(body: string): TokenInfo {
  const parts = body.split(/[&=]/);

  if (parts.length === 4) {
    const [key, token, expiresKey, expires] = parts;
    if (
      key === 'access_token' &&
      token &&
      expiresKey === 'expires' &&
      expires !== undefined &&
      DIGITS.test(expires)
    ) {
      const expiresIn = Number.parseInt(expires, 10);
      if (Number.isSafeInteger(expiresIn)) {
        return { accessToken: token, expiresIn };
      }
    }
  }

  if (parts.length === 2) {
    const [key, token] = parts;
    if (key === 'access_token' && token) {
      return { accessToken: token };
    }
  }

  throw new InvalidResponseFormatError(FACEBOOK);
}

/**
 * Extract profile fields from a Graph API `/me` document. Only `id` is
 * required; other fields are left out when null or mistyped.
 * @throws SpecifiedProfileError when the document has an `error` object
 * @throws ZodError when `id` is missing or not a string
 */
export function parseFacebookProfile(json: unknown): ProfileFields {
  if (
    json !== null &&
    typeof json === 'object' &&
    'error' in json &&
    json.error !== null &&
    typeof json.error === 'object'
  ) {
    const error = ProfileErrorSchema.parse(json.error);
    throw new SpecifiedProfileError(FACEBOOK, error.type, error.message);
  }

  const profile = ProfileSchema.parse(json);
  const avatarURL = profile.picture?.data?.url;

  return {
    providerUserID: profile.id,
    ...(profile.first_name !== undefined ? { firstName: profile.first_name } : {}),
    ...(profile.last_name !== undefined ? { lastName: profile.last_name } : {}),
    ...(profile.name !== undefined ? { fullName: profile.name } : {}),
    ...(avatarURL !== undefined ? { avatarURL } : {}),
    ...(profile.email !== undefined ? { email: profile.email } : {}),
  };
}

export const facebookBinding: ProviderBinding = {
  id: FACEBOOK,
  defaults: FACEBOOK_DEFAULTS,
  profileRequest: (tokenInfo) => ({
    url: FACEBOOK_API + encodeURIComponent(tokenInfo.accessToken),
  }),
  parseTokenResponse: parseFacebookTokenResponse,
  parseProfile: parseFacebookProfile,
};
