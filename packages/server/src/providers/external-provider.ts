import type { ExternalUserInfo } from '@authgate/shared';
import type { Result } from '../result.js';

/**
 * External OAuth2 identity provider
 *
 * `redirectUri` passed to exchangeCode must be byte-identical to the one used
 * to build the authorization URL. Rejections by the provider come back as
 * failed results; outages and timeouts throw ProviderUnavailableError.
 */
export interface IExternalAuthProvider {
  readonly name: string;
  readonly displayName: string;

  buildAuthorizationUrl(state: string, redirectUri: string, nonce?: string): string;

  exchangeCode(code: string, redirectUri: string, signal?: AbortSignal): Promise<Result<ExternalUserInfo>>;
}

/**
 * HTTP settings shared by provider implementations
 */
export interface ProviderHttpOptions {
  fetch?: typeof fetch;
  timeoutMs?: number;
}

export interface ProviderClientCredentials {
  clientId: string;
  clientSecret: string;
}
