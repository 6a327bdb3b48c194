/**
 * Token response parsing shared by bindings of RFC 6749 compliant providers
 */

import { z } from 'zod';
import type { TokenInfo } from '../types.js';
import { InvalidResponseFormatError } from '../errors.js';

/**
 * Standard OAuth fields that are mapped onto TokenInfo
 */
export const STANDARD_TOKEN_FIELDS = new Set([
  'access_token',
  'token_type',
  'refresh_token',
  'expires_in',
]);

/**
 * Sensitive fields that should never be kept in TokenInfo.params
 */
export const SENSITIVE_FIELDS = new Set([
  'client_secret',
  'code_verifier',
  'authorization_code',
  'code',
  'id_token',
]);

const RawTokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    token_type: z.string().optional(),
    refresh_token: z.string().optional(),
    // some providers send the lifetime as a numeric string
    expires_in: z.coerce.number().int().nonnegative().optional(),
    scope: z.string().optional(),
  })
  .passthrough();

/**
 * Normalize a scope string: providers delimit with commas or spaces
 */
export function normalizeScope(scope: string): string {
  return scope
    .split(/[,\s]+/)
    .filter((part) => part.length > 0)
    .join(' ');
}

/**
 * Keep additional non-sensitive fields of the token response
 */
export function extractParams(
  responseData: Record<string, unknown>
): Record<string, unknown> | undefined {
  const params: Record<string, unknown> = {};
  let hasData = false;

  for (const [key, value] of Object.entries(responseData)) {
    if (STANDARD_TOKEN_FIELDS.has(key) || SENSITIVE_FIELDS.has(key)) {
      continue;
    }
    params[key] = key === 'scope' && typeof value === 'string'
      ? normalizeScope(value)
      : value;
    hasData = true;
  }

  return hasData ? params : undefined;
}

/**
 * Parse a JSON token endpoint body.
 * @param providerId - Provider reported in the error
 * @param body - Raw response body
 * @throws InvalidResponseFormatError for non-JSON bodies, provider error
 *   bodies and bodies without an access token
 */
export function parseStandardTokenResponse(
  providerId: string,
  body: string
): TokenInfo {
  let decoded: unknown;
  try {
    decoded = JSON.parse(body);
  } catch (error) {
    throw new InvalidResponseFormatError(providerId, error);
  }

  const result = RawTokenResponseSchema.safeParse(decoded);
  if (!result.success) {
    throw new InvalidResponseFormatError(providerId, result.error);
  }

  const { access_token, token_type, refresh_token, expires_in } = result.data;
  const params = extractParams(result.data);

  return {
    accessToken: access_token,
    ...(token_type ? { tokenType: token_type } : {}),
    ...(expires_in !== undefined ? { expiresIn: expires_in } : {}),
    ...(refresh_token ? { refreshToken: refresh_token } : {}),
    ...(params ? { params } : {}),
  };
}
