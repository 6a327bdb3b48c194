/**
 * Immutable configuration for one OAuth2 provider
 */
export interface OAuth2Settings {
  /** Provider authorization endpoint the user is redirected to */
  authorizationURL: string;
  /** Provider token endpoint the authorization code is exchanged at */
  accessTokenURL: string;
  /** Callback URL registered with the provider */
  redirectURL: string;
  /** OAuth client identifier */
  clientID: string;
  /** OAuth client secret */
  clientSecret: string;
  /** Space or comma separated scopes, passed through as given */
  scope?: string;
  /** Extra query parameters for the authorization URL */
  authorizationParams?: Record<string, string>;
  /** Extra form parameters for the token request */
  accessTokenParams?: Record<string, string>;
  /** Send an S256 PKCE challenge and keep the verifier in the cache */
  usePKCE?: boolean;
  /** Lifetime of the cached state value in seconds (default: 300) */
  stateTTLSeconds?: number;
  /** Timeout for provider requests in milliseconds (default: 10000) */
  timeoutMs?: number;
}

/**
 * Credential obtained by exchanging an authorization code
 */
export type TokenInfo = {
  /** OAuth access token, never empty */
  accessToken: string;
  /** Token type (typically "Bearer") */
  tokenType?: string;
  /** Token lifetime in seconds */
  expiresIn?: number;
  /** OAuth refresh token (if issued) */
  refreshToken?: string;
  /** Additional non-sensitive fields from the token response */
  params?: Record<string, unknown>;
};

/**
 * Identifies a user within a provider's namespace
 */
export type IdentityID = {
  providerUserID: string;
  providerName: string;
};

export const AuthMethod = {
  OAuth2: 'oauth2',
} as const;

export type AuthMethod = (typeof AuthMethod)[keyof typeof AuthMethod];

/**
 * Canonical, provider-agnostic identity produced by a successful flow
 */
export type Identity = {
  identityID: IdentityID;
  firstName?: string;
  lastName?: string;
  fullName?: string;
  email?: string;
  avatarURL?: string;
  authMethod: AuthMethod;
  authInfo: TokenInfo;
  /** Provider-specific profile data with no canonical field */
  extra?: Record<string, unknown>;
};

/**
 * Profile fields a binding extracts from the provider's profile document
 */
export type ProfileFields = Omit<
  Identity,
  'identityID' | 'authMethod' | 'authInfo'
> & {
  providerUserID: string;
};

/**
 * Request a binding needs to fetch the profile for a token
 */
export type ProfileRequest = {
  url: string;
  headers?: Record<string, string>;
};

/**
 * Provider-specific constants and pure translation functions.
 * Implementations must not perform I/O.
 */
export interface ProviderBinding {
  /** Provider identifier, used as the identity namespace and in messages */
  readonly id: string;
  /** Endpoint and scope defaults used when settings leave them out */
  readonly defaults?: Partial<
    Pick<OAuth2Settings, 'authorizationURL' | 'accessTokenURL' | 'scope'>
  >;
  /** Extra headers for the token request */
  readonly accessTokenHeaders?: Record<string, string>;

  /** Build the profile request for an access token */
  profileRequest(tokenInfo: TokenInfo): ProfileRequest;

  /**
   * Parse the raw token endpoint body.
   * @throws InvalidResponseFormatError when the body has no accepted shape
   */
  parseTokenResponse(body: string): TokenInfo;

  /**
   * Extract profile fields from the decoded profile document.
   * @throws SpecifiedProfileError when the document carries a provider error
   */
  parseProfile(json: unknown): ProfileFields;
}

/**
 * Stages of one authentication flow
 */
export type FlowState =
  | 'start'
  | 'awaiting_callback'
  | 'token_exchanged'
  | 'profile_fetched'
  | 'failed';

export type AuthenticationResult =
  | { state: 'awaiting_callback'; redirectURL: string }
  | { state: 'profile_fetched'; identity: Identity };

/**
 * Per-call execution context
 */
export type CallOptions = {
  /** Cancels the outbound provider request */
  signal?: AbortSignal;
};

/**
 * Serializable error shape for logs and HTTP responses
 */
export type OAuthError = {
  /** HTTP status code */
  statusCode: number;
  /** OAuth error code */
  error: string;
  /** Human-readable error description */
  error_description?: string;
  /** Endpoint or stage that generated the error */
  endpoint?: string;
  /** Provider identifier */
  provider?: string;
};
