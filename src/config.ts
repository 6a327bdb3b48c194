/**
 * OAuth2 settings schema and validation
 * Provides Zod-based validation for provider settings
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { OAuth2Settings } from './types.js';

export const DEFAULT_STATE_TTL_SECONDS = 300;
export const DEFAULT_TIMEOUT_MS = 10_000;

const requiredURL = (name: string) =>
  z
    .string({ required_error: `${name} is required` })
    .trim()
    .min(1, `${name} is required`)
    .url(`Invalid ${name}`);

const requiredString = (name: string) =>
  z
    .string({ required_error: `${name} is required` })
    .trim()
    .min(1, `${name} is required`);

/**
 * OAuth2 settings schema
 */
export const OAuth2SettingsSchema = z.object({
  authorizationURL: requiredURL('authorizationURL'),
  accessTokenURL: requiredURL('accessTokenURL'),
  redirectURL: requiredURL('redirectURL'),
  clientID: requiredString('clientID'),
  clientSecret: requiredString('clientSecret'),
  scope: z.string().trim().optional(),
  authorizationParams: z.record(z.string(), z.string()).optional(),
  accessTokenParams: z.record(z.string(), z.string()).optional(),
  usePKCE: z.boolean().optional(),
  stateTTLSeconds: z
    .number()
    .int()
    .positive('State TTL must be a positive integer')
    .optional(),
  timeoutMs: z
    .number()
    .int()
    .positive('Timeout must be a positive integer')
    .optional(),
});

function toConfigurationError(
  providerId: string,
  error: z.ZodError
): ConfigurationError {
  const issues = [...new Set(error.issues.map((issue) => issue.message))];
  const fields = [
    ...new Set(error.issues.map((issue) => issue.path.join('.'))),
  ];
  return new ConfigurationError(providerId, issues, fields);
}

/**
 * Validate provider settings
 * @param settings - Settings to validate
 * @param providerId - Provider the settings belong to, used in the error message
 * @returns Validated, frozen settings
 * @throws ConfigurationError listing every invalid field
 */
export function validateSettings(
  settings: unknown,
  providerId: string
): Readonly<OAuth2Settings> {
  const result = OAuth2SettingsSchema.safeParse(settings);
  if (!result.success) {
    throw toConfigurationError(providerId, result.error);
  }
  return Object.freeze(result.data);
}

/**
 * Safe validation that returns a result instead of throwing
 */
export function safeValidateSettings(
  settings: unknown,
  providerId: string
):
  | { success: true; data: Readonly<OAuth2Settings> }
  | { success: false; error: ConfigurationError } {
  const result = OAuth2SettingsSchema.safeParse(settings);
  if (result.success) {
    return { success: true, data: Object.freeze(result.data) };
  }
  return { success: false, error: toConfigurationError(providerId, result.error) };
}
