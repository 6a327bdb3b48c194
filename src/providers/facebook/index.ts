/**
 * Facebook provider exports
 */

import { OAuth2Provider, type OAuth2ProviderOptions } from '../../oauth2-provider.js';
import type { OAuth2Settings } from '../../types.js';
import { facebookBinding } from './facebook-binding.js';

export {
  facebookBinding,
  parseFacebookTokenResponse,
  parseFacebookProfile,
  FACEBOOK,
  FACEBOOK_API,
  FACEBOOK_DEFAULTS,
} from './facebook-binding.js';

/**
 * Create a Facebook provider
 */
export function createFacebookProvider(
  settings: OAuth2Settings,
  options?: OAuth2ProviderOptions
): OAuth2Provider {
  return new OAuth2Provider(facebookBinding, settings, options);
}
