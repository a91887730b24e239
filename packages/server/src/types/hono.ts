import type { Context } from 'hono';
import type { Principal, AccessTokenClaims } from '@authgate/shared';

/**
 * Hono context variables set by the session middleware
 */
export interface SessionVariables {
  principal?: Principal;
  claims?: AccessTokenClaims;
}

export type AppEnv = { Variables: SessionVariables };

export type AppContext = Context<AppEnv>;
