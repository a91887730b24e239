import { z } from 'zod';
import type { ExternalUserInfo } from '@authgate/shared';
import { AuthFailure } from '../errors/auth-failure.js';
import { type Result, ok, err } from '../result.js';
import type {
  IExternalAuthProvider,
  ProviderHttpOptions,
  ProviderClientCredentials,
} from './external-provider.js';
import { requestProvider } from './http.js';
import { tokenResponseSchema } from './oidc-provider.js';

export interface OAuth2ProfileProviderConfig extends ProviderClientCredentials {
  name: string;
  displayName: string;
  authorizationEndpoint: string;
  tokenEndpoint: string;
  profileEndpoint: string;
  emailsEndpoint: string;
  scopes: string[];
  /**
   * Some APIs reject requests without a User-Agent
   */
  userAgent?: string;
}

const profileSchema = z.object({
  id: z.union([z.number(), z.string()]).transform(String),
  login: z.string().optional(),
  name: z.string().nullish(),
});

export const emailCandidateSchema = z.object({
  email: z.string(),
  primary: z.boolean(),
  verified: z.boolean(),
});

export type EmailCandidate = z.infer<typeof emailCandidateSchema>;

/**
 * Pick the best email: primary and verified, then primary, then verified
 *
 * Returns null when no address is primary or verified.
 */
export function selectEmail(candidates: EmailCandidate[]): EmailCandidate | null {
  return (
    candidates.find((candidate) => candidate.primary && candidate.verified) ??
    candidates.find((candidate) => candidate.primary) ??
    candidates.find((candidate) => candidate.verified) ??
    null
  );
}

/**
 * Split a display name into first name and the rest
 */
export function splitName(name: string | null | undefined): { firstName?: string; lastName?: string } {
  const trimmed = name?.trim();
  if (!trimmed) {
    return {};
  }
  const space = trimmed.indexOf(' ');
  if (space === -1) {
    return { firstName: trimmed };
  }
  return { firstName: trimmed.slice(0, space), lastName: trimmed.slice(space + 1).trim() };
}

/**
 * OAuth2 provider with a profile endpoint and a separate email list endpoint
 */
export class OAuth2ProfileProvider implements IExternalAuthProvider {
  readonly name: string;
  readonly displayName: string;

  constructor(
    private readonly config: OAuth2ProfileProviderConfig,
    private readonly http: ProviderHttpOptions = {}
  ) {
    this.name = config.name;
    this.displayName = config.displayName;
  }

  buildAuthorizationUrl(state: string, redirectUri: string): string {
    const url = new URL(this.config.authorizationEndpoint);
    url.searchParams.set('client_id', this.config.clientId);
    url.searchParams.set('redirect_uri', redirectUri);
    url.searchParams.set('scope', this.config.scopes.join(' '));
    url.searchParams.set('state', state);
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

    const headers = this.apiHeaders(tokens.value.access_token);

    const profile = await requestProvider(
      {
        provider: this.name,
        endpoint: 'profile',
        url: this.config.profileEndpoint,
        init: { headers },
        schema: profileSchema,
        signal,
      },
      this.http
    );
    if (!profile.ok) return profile;

    const emails = await requestProvider(
      {
        provider: this.name,
        endpoint: 'emails',
        url: this.config.emailsEndpoint,
        init: { headers },
        schema: z.array(emailCandidateSchema),
        signal,
      },
      this.http
    );
    if (!emails.ok) return emails;

    const selected = selectEmail(emails.value);
    if (!selected) {
      return err(AuthFailure.noUsableEmail());
    }

    return ok({
      providerKey: profile.value.id,
      email: selected.email,
      emailVerified: selected.verified,
      ...splitName(profile.value.name),
    });
  }

  private apiHeaders(accessToken: string): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${accessToken}`,
      Accept: 'application/json',
    };
    if (this.config.userAgent) {
      headers['User-Agent'] = this.config.userAgent;
    }
    return headers;
  }
}

/**
 * GitHub sign-in
 */
export function githubProvider(
  credentials: ProviderClientCredentials,
  http?: ProviderHttpOptions
): OAuth2ProfileProvider {
  return new OAuth2ProfileProvider(
    {
      ...credentials,
      name: 'github',
      displayName: 'GitHub',
      authorizationEndpoint: 'https://github.com/login/oauth/authorize',
      tokenEndpoint: 'https://github.com/login/oauth/access_token',
      profileEndpoint: 'https://api.github.com/user',
      emailsEndpoint: 'https://api.github.com/user/emails',
      scopes: ['read:user', 'user:email'],
      userAgent: 'authgate',
    },
    http
  );
}
