import * as openidClient from 'openid-client';
import {
  AuthMethod,
  type AuthenticationResult,
  type CallOptions,
  type FlowState,
  type Identity,
  type OAuth2Settings,
  type OAuthError,
  type ProfileFields,
  type ProviderBinding,
  type TokenInfo,
} from './types.js';
import {
  AccessDeniedError,
  InvalidResponseFormatError,
  ProviderCallbackError,
  SpecifiedProfileError,
  StateMismatchError,
  UnspecifiedProfileError,
} from './errors.js';
import { DEFAULT_STATE_TTL_SECONDS, validateSettings } from './config.js';
import { FetchHTTPLayer, type HTTPLayer } from './http/http-layer.js';
import { MemoryCacheLayer, type CacheLayer } from './cache/cache-layer.js';
import { ErrorNormalizer } from './utils/error-normalizer.js';
import type { LogMeta, Logger } from './logging/types.js';
import { DefaultLogger } from './logging/logger.js';

const { randomState, randomPKCECodeVerifier, calculatePKCECodeChallenge } =
  openidClient;

export const OAUTH2_REDACTION_PATHS = [
  // Direct fields
  'clientSecret',
  'accessToken',
  'refreshToken',
  'code',
  'state',
  'codeVerifier',

  // Token and identity records
  'authInfo.accessToken',
  'authInfo.refreshToken',
  'identity.authInfo.accessToken',
  'identity.authInfo.refreshToken',

  // Settings snapshots
  'settings.clientSecret',
];

export interface OAuth2ProviderOptions {
  /** HTTP capability; defaults to {@link FetchHTTPLayer} */
  httpLayer?: HTTPLayer;
  /** Cache capability; required in production */
  cacheLayer?: CacheLayer;
  logger?: Logger;
}

/** Query parameters of the provider callback */
export type CallbackQuery =
  | URLSearchParams
  | Record<string, string | undefined>;

/**
 * Drives the OAuth2 client flow for one provider. Provider-specific wire
 * formats are delegated to the {@link ProviderBinding}; state validation
 * and error classification happen here.
 *
 * Instances hold no per-flow state: flows for different sessions may run
 * concurrently, sharing only the cache layer.
 */
export class OAuth2Provider {
  public readonly binding: ProviderBinding;

  /**
   * Settings as given; validated on first use
   */
  protected readonly rawSettings: OAuth2Settings;

  private validatedSettings?: Readonly<OAuth2Settings>;

  private readonly httpLayer: HTTPLayer;

  private readonly cacheLayer: CacheLayer;

  /**
   * Stores our lazily instantiated implementation of Logger.
   */
  private loggerImpl?: Logger;

  /**
   * @param binding - Provider constants and parsing functions
   * @param settings - Endpoints and client credentials
   * @param options - Capabilities the flow runs against
   */
  public constructor(
    binding: ProviderBinding,
    settings: OAuth2Settings,
    options: OAuth2ProviderOptions = {}
  ) {
    this.binding = binding;
    this.rawSettings = { ...settings };
    if (options.logger) {
      this.loggerImpl = options.logger;
    }
    this.httpLayer =
      options.httpLayer ??
      new FetchHTTPLayer({ timeoutMs: settings.timeoutMs });
    this.cacheLayer = this.enforceProductionStorage(
      options.cacheLayer,
      'cacheLayer',
      () => new MemoryCacheLayer()
    );
  }

  /** Provider identifier */
  public get id(): string {
    return this.binding.id;
  }

  public get logger(): Logger {
    if (this.loggerImpl === undefined) {
      this.loggerImpl = new DefaultLogger(
        { provider: this.id },
        { redactPaths: OAUTH2_REDACTION_PATHS }
      );
    }
    return this.loggerImpl;
  }

  /**
   * Set a custom logger instance for this provider
   */
  public setLogger(logger: Logger): void {
    this.loggerImpl = logger;
  }

  /**
   * Validated settings, memoized after the first successful validation.
   * @throws ConfigurationError if required settings are blank or malformed
   */
  public get settings(): Readonly<OAuth2Settings> {
    if (!this.validatedSettings) {
      this.validatedSettings = validateSettings(this.rawSettings, this.id);
    }
    return this.validatedSettings;
  }

  /**
   * Build the authorization URL and remember a fresh state value for the
   * session.
   *
   * @param sessionID - Key the state (and PKCE verifier) is cached under
   * @returns The URL to redirect the user to
   * @throws ConfigurationError if required settings are blank
   */
  public async buildRedirectURL(sessionID: string): Promise<string> {
    const stage = 'buildRedirectURL';
    try {
      const settings = this.settings;
      const ttl = settings.stateTTLSeconds ?? DEFAULT_STATE_TTL_SECONDS;
      const state = randomState();

      const params: Record<string, string> = {
        client_id: settings.clientID,
        redirect_uri: settings.redirectURL,
        response_type: 'code',
        state,
      };
      if (settings.scope) {
        params.scope = settings.scope;
      }

      await this.cacheLayer.set(this.cacheKey('state', sessionID), state, ttl);

      if (settings.usePKCE) {
        const codeVerifier = randomPKCECodeVerifier();
        params.code_challenge = await calculatePKCECodeChallenge(codeVerifier);
        params.code_challenge_method = 'S256';
        await this.cacheLayer.set(
          this.cacheKey('verifier', sessionID),
          codeVerifier,
          ttl
        );
      }

      // Flow parameters win over configured extras
      const url = this.buildAuthorizeUrl(settings.authorizationURL, {
        ...settings.authorizationParams,
        ...params,
      });

      this.logTransition('Authorization URL generated', 'awaiting_callback', {
        stage,
        endpoint: settings.authorizationURL,
        usePKCE: Boolean(settings.usePKCE),
      });

      return url;
    } catch (error) {
      throw this.logFailure(stage, error);
    }
  }

  /**
   * Validate the callback state and exchange the authorization code for an
   * access token.
   *
   * @param code - Authorization code from the callback
   * @param state - State value from the callback
   * @param sessionID - Session the redirect was built for
   * @throws StateMismatchError if the state is absent or differs; no request is made
   * @throws InvalidResponseFormatError if the token response cannot be parsed
   * @throws NetworkError on transport failure, timeout or cancellation
   */
  public async exchangeCode(
    code: string,
    state: string,
    sessionID: string,
    options: CallOptions = {}
  ): Promise<TokenInfo> {
    const stage = 'exchangeCode';
    try {
      const settings = this.settings;

      const stateKey = this.cacheKey('state', sessionID);
      const cachedState = await this.cacheLayer.get(stateKey);
      if (!cachedState || cachedState !== state) {
        throw new StateMismatchError(this.id);
      }
      // Single use: a replayed callback finds an empty state
      await this.consume(stateKey);

      const form: Record<string, string> = {
        ...settings.accessTokenParams,
        client_id: settings.clientID,
        client_secret: settings.clientSecret,
        code,
        redirect_uri: settings.redirectURL,
        grant_type: 'authorization_code',
      };

      if (settings.usePKCE) {
        const verifierKey = this.cacheKey('verifier', sessionID);
        const codeVerifier = await this.cacheLayer.get(verifierKey);
        if (!codeVerifier) {
          throw new StateMismatchError(this.id);
        }
        await this.consume(verifierKey);
        form.code_verifier = codeVerifier;
      }

      this.logger.info('Exchanging authorization code for access token', {
        stage,
        endpoint: settings.accessTokenURL,
      });

      const response = await this.httpLayer.post(settings.accessTokenURL, form, {
        headers: this.binding.accessTokenHeaders,
        signal: options.signal,
      });
      const tokenInfo = this.parseTokenResponse(response.body);

      this.logTransition('Access token obtained', 'token_exchanged', {
        stage,
        status: response.status,
        hasRefreshToken: Boolean(tokenInfo.refreshToken),
        expiresIn: tokenInfo.expiresIn,
      });

      return tokenInfo;
    } catch (error) {
      throw this.logFailure(stage, error);
    }
  }

  /**
   * Fetch the profile for an access token and normalize it.
   *
   * @throws SpecifiedProfileError if the provider reports an error object
   * @throws UnspecifiedProfileError for any other failure, with `cause` set
   */
  public async buildIdentity(
    tokenInfo: TokenInfo,
    options: CallOptions = {}
  ): Promise<Identity> {
    const stage = 'buildIdentity';
    try {
      let fields: ProfileFields;
      try {
        const request = this.binding.profileRequest(tokenInfo);
        const response = await this.httpLayer.get(request.url, {
          headers: request.headers,
          signal: options.signal,
        });
        fields = this.binding.parseProfile(response.json());
      } catch (error) {
        if (error instanceof SpecifiedProfileError) {
          throw error;
        }
        throw new UnspecifiedProfileError(this.id, error);
      }

      if (!fields.providerUserID) {
        throw new UnspecifiedProfileError(
          this.id,
          new Error('Profile has an empty user id')
        );
      }

      const identity = this.toIdentity(fields, tokenInfo);

      this.logTransition('Profile fetched', 'profile_fetched', {
        stage,
        providerUserID: identity.identityID.providerUserID,
        hasEmail: identity.email !== undefined,
      });

      return identity;
    } catch (error) {
      throw this.logFailure(stage, error);
    }
  }

  /**
   * Handle one request of the flow: redirect when there is no code yet,
   * otherwise complete the exchange and build the identity.
   *
   * @param sessionID - Session the flow belongs to
   * @param query - Query parameters of the current request
   * @throws AccessDeniedError if the user declined
   * @throws ProviderCallbackError if the provider returned another error
   */
  public async authenticate(
    sessionID: string,
    query: CallbackQuery,
    options: CallOptions = {}
  ): Promise<AuthenticationResult> {
    const params = this.toSearchParams(query);

    const error = params.get('error');
    if (error) {
      const failure =
        error === 'access_denied'
          ? new AccessDeniedError(this.id)
          : new ProviderCallbackError(
              this.id,
              error,
              params.get('error_description') ?? undefined
            );
      throw this.logFailure('authenticate', failure);
    }

    const code = params.get('code');
    if (!code) {
      return {
        state: 'awaiting_callback',
        redirectURL: await this.buildRedirectURL(sessionID),
      };
    }

    const tokenInfo = await this.exchangeCode(
      code,
      params.get('state') ?? '',
      sessionID,
      options
    );
    const identity = await this.buildIdentity(tokenInfo, options);
    return { state: 'profile_fetched', identity };
  }

  /**
   * Normalize any failure of this provider into an {@link OAuthError}
   */
  public normalizeError(e: unknown, endpoint?: string): OAuthError {
    return ErrorNormalizer.normalizeError(e, { endpoint }, this.id);
  }

  /**
   * Build a complete authorization URL with query parameters.
   */
  protected buildAuthorizeUrl(
    endpoint: string,
    params: Record<string, string>
  ): string {
    const url = new URL(endpoint);

    Object.entries(params).forEach(([key, value]) => {
      url.searchParams.set(key, value);
    });

    return url.toString();
  }

  /**
   * Refuse the in-memory fallback in production.
   *
   * @param storage - The configured implementation (or undefined)
   * @param name - Name of the option for error/logging messages
   * @param fallback - Creates the development implementation
   * @throws Error if nothing is configured in production
   */
  protected enforceProductionStorage<T>(
    storage: T | undefined,
    name: string,
    fallback: () => T
  ): T {
    if (storage) {
      return storage;
    }
    if (process.env.NODE_ENV === 'production') {
      throw new Error(
        `[${this.id}] Persistent ${name} is required in production; in-memory storage is not allowed`
      );
    }
    this.logger.warn(
      `No ${name} provided; using in-memory storage (not for production)`,
      { stage: 'initialize' }
    );
    return fallback();
  }

  private parseTokenResponse(body: string): TokenInfo {
    let tokenInfo: TokenInfo;
    try {
      tokenInfo = this.binding.parseTokenResponse(body);
    } catch (error) {
      if (error instanceof InvalidResponseFormatError) {
        throw error;
      }
      throw new InvalidResponseFormatError(this.id, error);
    }

    if (!tokenInfo.accessToken) {
      throw new InvalidResponseFormatError(this.id);
    }
    return tokenInfo;
  }

  private toIdentity(fields: ProfileFields, tokenInfo: TokenInfo): Identity {
    const { providerUserID, ...profile } = fields;
    return {
      identityID: { providerUserID, providerName: this.id },
      ...profile,
      authMethod: AuthMethod.OAuth2,
      authInfo: tokenInfo,
    };
  }

  // The cache contract has no delete; an empty value expires quickly
  private async consume(key: string): Promise<void> {
    await this.cacheLayer.set(key, '', 1);
  }

  private cacheKey(kind: 'state' | 'verifier', sessionID: string): string {
    return `oauth2:${this.id}:${kind}:${sessionID}`;
  }

  private toSearchParams(query: CallbackQuery): URLSearchParams {
    if (query instanceof URLSearchParams) {
      return query;
    }
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        params.set(key, value);
      }
    }
    return params;
  }

  private logTransition(
    message: string,
    flowState: Exclude<FlowState, 'failed'>,
    meta: LogMeta
  ): void {
    this.logger.info(message, { ...meta, flowState });
  }

  private logFailure(stage: string, error: unknown): unknown {
    const flowState: FlowState = 'failed';
    this.logger.error(`${stage} failed`, {
      stage,
      flowState,
      error: this.normalizeError(error, stage),
    });
    return error;
  }
}
