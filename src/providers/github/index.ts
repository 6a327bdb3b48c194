/**
 * GitHub provider exports
 */

import { OAuth2Provider, type OAuth2ProviderOptions } from '../../oauth2-provider.js';
import type { OAuth2Settings } from '../../types.js';
import { githubBinding } from './github-binding.js';

export {
  githubBinding,
  parseGitHubProfile,
  GITHUB,
  GITHUB_API,
  GITHUB_DEFAULTS,
} from './github-binding.js';

/**
 * Create a GitHub provider
 */
export function createGitHubProvider(
  settings: OAuth2Settings,
  options?: OAuth2ProviderOptions
): OAuth2Provider {
  return new OAuth2Provider(githubBinding, settings, options);
}
