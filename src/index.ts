/**
 * OAuth2 client provider library
 * Main entry point
 */

export const version = '0.1.0';

// Orchestrator and configuration
export {
  OAuth2Provider,
  OAUTH2_REDACTION_PATHS,
} from './oauth2-provider.js';
export type { OAuth2ProviderOptions, CallbackQuery } from './oauth2-provider.js';
export {
  OAuth2SettingsSchema,
  validateSettings,
  safeValidateSettings,
  DEFAULT_STATE_TTL_SECONDS,
  DEFAULT_TIMEOUT_MS,
} from './config.js';
export { fromEnvironment, settingsFromEnvironment } from './from-environment.js';
export type {
  EnvironmentVariables,
  FromEnvironmentOptions,
} from './from-environment.js';

// Provider bindings
export * from './providers/index.js';

// Model
export { AuthMethod } from './types.js';
export type {
  OAuth2Settings,
  TokenInfo,
  IdentityID,
  Identity,
  ProfileFields,
  ProfileRequest,
  ProviderBinding,
  FlowState,
  AuthenticationResult,
  CallOptions,
  OAuthError,
} from './types.js';

// Errors
export {
  AuthenticationError,
  ConfigurationError,
  StateMismatchError,
  InvalidResponseFormatError,
  SpecifiedProfileError,
  UnspecifiedProfileError,
  NetworkError,
  AccessDeniedError,
  ProviderCallbackError,
} from './errors.js';
export type { AuthenticationErrorKind, NetworkErrorReason } from './errors.js';
export { ErrorNormalizer } from './utils/error-normalizer.js';
export {
  parseStandardTokenResponse,
  normalizeScope,
} from './utils/token-response.js';

// Capabilities
export {
  FetchHTTPLayer,
  createHTTPResponse,
} from './http/http-layer.js';
export type {
  HTTPLayer,
  HTTPResponse,
  HTTPRequestOptions,
} from './http/http-layer.js';
export { MemoryCacheLayer } from './cache/cache-layer.js';
export type { CacheLayer } from './cache/cache-layer.js';

// Logging
export type {
  Logger,
  LogMeta,
  LogRecord,
  LogTransport,
  LoggerOptions,
} from './logging/types.js';
export { LogLevel, LogDestination } from './logging/types.js';
export { DefaultLogger, parseLogLevel } from './logging/logger.js';

export default {
  version,
};
