import type { Context } from 'hono';
import { getCookie, setCookie, deleteCookie } from 'hono/cookie';
import type {
  TokenPair,
  AuthenticationResponse,
  TwoFactorRequiredResponse,
} from '@authgate/shared';
import {
  ACCESS_TOKEN_COOKIE,
  REFRESH_TOKEN_COOKIE,
  HEADER_AUTHORIZATION,
} from '../config/constants.js';

/**
 * A cookie change to apply to the response
 */
export type CookieInstruction =
  | { action: 'set'; name: string; value: string; expires?: Date }
  | { action: 'delete'; name: string };

/**
 * What to send back: cookie changes plus the JSON body
 *
 * Plain data, so services can build it without touching HTTP.
 */
export interface DeliveryPlan<TBody> {
  cookies: CookieInstruction[];
  body: TBody;
}

export interface SessionTransportOptions {
  /**
   * Mark cookies Secure (on in production)
   */
  secure: boolean;
}

export type AuthenticationExtras = Pick<AuthenticationResponse, 'isNewUser' | 'provider'>;

/**
 * Cookie and bearer delivery of session tokens
 */
export class SessionTransport {
  constructor(private readonly options: SessionTransportOptions) {}

  /**
   * Deliver a pair as cookies (values left out of the body) or in the body
   */
  deliverTokens(
    pair: TokenPair,
    useCookies: boolean,
    extras: AuthenticationExtras = {}
  ): DeliveryPlan<AuthenticationResponse> {
    const body: AuthenticationResponse = {
      requiresTwoFactor: false,
      accessTokenExpiresAt: pair.accessTokenExpiresAt.toISOString(),
      refreshTokenExpiresAt: pair.refreshTokenExpiresAt.toISOString(),
      ...extras,
    };

    if (!useCookies) {
      return {
        cookies: [],
        body: { ...body, accessToken: pair.accessToken, refreshToken: pair.refreshToken },
      };
    }

    return {
      cookies: [
        {
          action: 'set',
          name: ACCESS_TOKEN_COOKIE,
          value: pair.accessToken,
          expires: pair.accessTokenExpiresAt,
        },
        {
          action: 'set',
          name: REFRESH_TOKEN_COOKIE,
          value: pair.refreshToken,
          // Session logins get a browser-session cookie
          expires: pair.isPersistent ? pair.refreshTokenExpiresAt : undefined,
        },
      ],
      body,
    };
  }

  challenge(challengeToken: string): DeliveryPlan<TwoFactorRequiredResponse> {
    return { cookies: [], body: { requiresTwoFactor: true, challengeToken } };
  }

  /**
   * Delete both session cookies
   */
  clear(): DeliveryPlan<null> {
    return {
      cookies: [
        { action: 'delete', name: ACCESS_TOKEN_COOKIE },
        { action: 'delete', name: REFRESH_TOKEN_COOKIE },
      ],
      body: null,
    };
  }

  apply(c: Context, cookies: CookieInstruction[]): void {
    for (const cookie of cookies) {
      if (cookie.action === 'delete') {
        deleteCookie(c, cookie.name, { path: '/', secure: this.options.secure });
        continue;
      }
      setCookie(c, cookie.name, cookie.value, {
        httpOnly: true,
        secure: this.options.secure,
        sameSite: 'Strict',
        path: '/',
        expires: cookie.expires,
      });
    }
  }

  /**
   * Bearer header first, then the access cookie
   */
  readAccessToken(c: Context): string | undefined {
    const header = c.req.header(HEADER_AUTHORIZATION);
    if (header?.startsWith('Bearer ')) {
      const token = header.slice(7).trim();
      if (token) return token;
    }
    return getCookie(c, ACCESS_TOKEN_COOKIE) || undefined;
  }

  /**
   * Body field first, then the refresh cookie
   */
  readRefreshToken(c: Context, fromBody?: string): string | undefined {
    return fromBody || getCookie(c, REFRESH_TOKEN_COOKIE) || undefined;
  }
}

/**
 * `?useCookies=true` selects cookie delivery
 */
export function wantsCookies(c: Context): boolean {
  return c.req.query('useCookies') === 'true';
}
