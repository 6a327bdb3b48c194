/**
 * Environment variable helpers
 * Maps <PREFIX>_* environment variables to OAuth2Settings
 */

import type { OAuth2Settings, ProviderBinding } from './types.js';
import { validateSettings } from './config.js';
import {
  OAUTH2_REDACTION_PATHS,
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from './oauth2-provider.js';
import { DefaultLogger, parseLogLevel } from './logging/logger.js';

export type EnvironmentVariables = Record<string, string | undefined>;

export interface FromEnvironmentOptions extends OAuth2ProviderOptions {
  /** Variables to read (default: process.env) */
  env?: EnvironmentVariables;
  /** Variable prefix (default: upper-cased provider id) */
  prefix?: string;
}

function readNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

/**
 * Read provider settings from the environment:
 * - <PREFIX>_CLIENT_ID -> clientID
 * - <PREFIX>_CLIENT_SECRET -> clientSecret
 * - <PREFIX>_REDIRECT_URL -> redirectURL
 * - <PREFIX>_AUTHORIZATION_URL -> authorizationURL (binding default)
 * - <PREFIX>_ACCESS_TOKEN_URL -> accessTokenURL (binding default)
 * - <PREFIX>_SCOPE -> scope (binding default)
 * - <PREFIX>_USE_PKCE -> usePKCE ("true" or "1")
 * - <PREFIX>_TIMEOUT_MS -> timeoutMs
 *
 * @throws ConfigurationError if the resulting settings are invalid
 */
export function settingsFromEnvironment(
  binding: ProviderBinding,
  options: Pick<FromEnvironmentOptions, 'env' | 'prefix'> = {}
): Readonly<OAuth2Settings> {
  const env = options.env ?? process.env;
  const prefix = options.prefix ?? binding.id.toUpperCase();
  const read = (name: string) => env[`${prefix}_${name}`]?.trim() || undefined;

  const usePKCE = read('USE_PKCE');

  return validateSettings(
    {
      authorizationURL:
        read('AUTHORIZATION_URL') ?? binding.defaults?.authorizationURL ?? '',
      accessTokenURL:
        read('ACCESS_TOKEN_URL') ?? binding.defaults?.accessTokenURL ?? '',
      redirectURL: read('REDIRECT_URL') ?? '',
      clientID: read('CLIENT_ID') ?? '',
      clientSecret: read('CLIENT_SECRET') ?? '',
      scope: read('SCOPE') ?? binding.defaults?.scope,
      usePKCE: usePKCE === undefined ? undefined : /^(true|1)$/i.test(usePKCE),
      timeoutMs: readNumber(read('TIMEOUT_MS')),
    },
    binding.id
  );
}

/**
 * Create a provider from environment variables. Settings are validated
 * immediately; LOG_LEVEL sets the level of the default logger.
 *
 * @throws ConfigurationError if required variables are missing
 */
export function fromEnvironment(
  binding: ProviderBinding,
  options: FromEnvironmentOptions = {}
): OAuth2Provider {
  const { env = process.env, prefix, ...providerOptions } = options;
  const settings = settingsFromEnvironment(binding, { env, prefix });

  const logger =
    providerOptions.logger ??
    new DefaultLogger(
      { provider: binding.id },
      {
        level: parseLogLevel(env.LOG_LEVEL),
        redactPaths: OAUTH2_REDACTION_PATHS,
      }
    );

  return new OAuth2Provider(binding, settings, { ...providerOptions, logger });
}
