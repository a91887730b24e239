import { z } from 'zod';
import type { ExternalUserInfo } from '@authgate/shared';
import { type Result, ok } from '../result.js';
import type {
  IExternalAuthProvider,
  ProviderHttpOptions,
  ProviderClientCredentials,
} from './external-provider.js';
import { requestProvider } from './http.js';

export interface OidcProviderConfig extends ProviderClientCredentials {
  name: string;
  displayName: string;
  authorizationEndpoint: string;
  tokenEndpoint: string;
  userinfoEndpoint: string;
  scopes: string[];
  /**
   * Extra query parameters for the authorization request
   */
  authorizationParams?: Record<string, string>;
}

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
});

const userinfoSchema = z.object({
  sub: z.string().min(1),
  email: z.string().email(),
  // Some providers send "true"/"false" strings
  email_verified: z
    .union([z.boolean(), z.enum(['true', 'false'])])
    .optional()
    .transform((value) => value === true || value === 'true'),
  given_name: z.string().optional(),
  family_name: z.string().optional(),
});

/**
 * OpenID Connect style provider
 *
 * Exchanges the code at the token endpoint, then asks the userinfo endpoint
 * for the provider-verified claims instead of validating the ID token locally.
 */
export class OidcProvider implements IExternalAuthProvider {
  readonly name: string;
  readonly displayName: string;

  constructor(
    private readonly config: OidcProviderConfig,
    private readonly http: ProviderHttpOptions = {}
  ) {
    this.name = config.name;
    this.displayName = config.displayName;
  }

  buildAuthorizationUrl(state: string, redirectUri: string, nonce?: string): string {
    const url = new URL(this.config.authorizationEndpoint);
    url.searchParams.set('client_id', this.config.clientId);
    url.searchParams.set('redirect_uri', redirectUri);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('scope', this.config.scopes.join(' '));
    url.searchParams.set('state', state);
    if (nonce) {
      url.searchParams.set('nonce', nonce);
    }
    for (const [key, value] of Object.entries(this.config.authorizationParams ?? {})) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  async exchangeCode(code: string, redirectUri: string, signal?: AbortSignal): Promise<Result<ExternalUserInfo>> {
    const tokens = await requestProvider(
      {
        provider: this.name,
        endpoint: 'token',
        url: this.config.tokenEndpoint,
        init: {
          method: 'POST',
          headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
            Accept: 'application/json',
          },
          body: new URLSearchParams({
            grant_type: 'authorization_code',
            code,
            redirect_uri: redirectUri,
            client_id: this.config.clientId,
            client_secret: this.config.clientSecret,
          }),
        },
        schema: tokenResponseSchema,
        signal,
      },
      this.http
    );
    if (!tokens.ok) return tokens;

    const userinfo = await requestProvider(
      {
        provider: this.name,
        endpoint: 'userinfo',
        url: this.config.userinfoEndpoint,
        init: {
          headers: {
            Authorization: `Bearer ${tokens.value.access_token}`,
            Accept: 'application/json',
          },
        },
        schema: userinfoSchema,
        signal,
      },
      this.http
    );
    if (!userinfo.ok) return userinfo;

    const claims = userinfo.value;
    return ok({
      providerKey: claims.sub,
      email: claims.email,
      emailVerified: claims.email_verified,
      firstName: claims.given_name,
      lastName: claims.family_name,
    });
  }
}

/**
 * Google sign-in
 */
export function googleProvider(
  credentials: ProviderClientCredentials,
  http?: ProviderHttpOptions
): OidcProvider {
  return new OidcProvider(
    {
      ...credentials,
      name: 'google',
      displayName: 'Google',
      authorizationEndpoint: 'https://accounts.google.com/o/oauth2/v2/auth',
      tokenEndpoint: 'https://oauth2.googleapis.com/token',
      userinfoEndpoint: 'https://www.googleapis.com/oauth2/v3/userinfo',
      scopes: ['openid', 'email', 'profile'],
      authorizationParams: { access_type: 'online' },
    },
    http
  );
}
