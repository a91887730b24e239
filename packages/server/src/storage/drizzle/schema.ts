import { pgTable, text, varchar, boolean, integer, timestamp, index } from 'drizzle-orm/pg-core';

const instant = (name: string) => timestamp(name, { withTimezone: true, mode: 'date' });

/**
 * Refresh tokens: append-only, keyed by SHA-256 of the bearer value
 */
export const refreshTokens = pgTable(
  'refresh_tokens',
  {
    id: varchar('id', { length: 64 }).primaryKey(),
    userId: varchar('user_id', { length: 128 }).notNull(),
    tokenHash: varchar('token_hash', { length: 64 }).notNull().unique(),
    familyId: varchar('family_id', { length: 64 }).notNull(),
    parentTokenId: varchar('parent_token_id', { length: 64 }),
    isPersistent: boolean('is_persistent').notNull().default(false),
    isUsed: boolean('is_used').notNull().default(false),
    isInvalidated: boolean('is_invalidated').notNull().default(false),
    createdAt: instant('created_at').notNull(),
    expiresAt: instant('expires_at').notNull(),
  },
  (table) => ({
    userIdx: index('refresh_tokens_user_id_idx').on(table.userId),
    familyIdx: index('refresh_tokens_family_id_idx').on(table.familyId),
    expiresAtIdx: index('refresh_tokens_expires_at_idx').on(table.expiresAt),
  })
);

/**
 * Two-factor challenges: short-lived, single use
 */
export const twoFactorChallenges = pgTable(
  'two_factor_challenges',
  {
    id: varchar('id', { length: 64 }).primaryKey(),
    userId: varchar('user_id', { length: 128 }).notNull(),
    tokenHash: varchar('token_hash', { length: 64 }).notNull().unique(),
    isRememberMe: boolean('is_remember_me').notNull().default(false),
    isUsed: boolean('is_used').notNull().default(false),
    failedAttempts: integer('failed_attempts').notNull().default(0),
    createdAt: instant('created_at').notNull(),
    expiresAt: instant('expires_at').notNull(),
  },
  (table) => ({
    expiresAtIdx: index('two_factor_challenges_expires_at_idx').on(table.expiresAt),
  })
);

/**
 * External sign-in state: one row per authorization redirect
 */
export const externalAuthStates = pgTable(
  'external_auth_states',
  {
    id: varchar('id', { length: 64 }).primaryKey(),
    stateHash: varchar('state_hash', { length: 64 }).notNull().unique(),
    provider: varchar('provider', { length: 64 }).notNull(),
    redirectUri: text('redirect_uri').notNull(),
    userId: varchar('user_id', { length: 64 }),
    isUsed: boolean('is_used').notNull().default(false),
    createdAt: instant('created_at').notNull(),
    expiresAt: instant('expires_at').notNull(),
  },
  (table) => ({
    expiresAtIdx: index('external_auth_states_expires_at_idx').on(table.expiresAt),
  })
);

export type RefreshTokenRow = typeof refreshTokens.$inferSelect;
export type TwoFactorChallengeRow = typeof twoFactorChallenges.$inferSelect;
export type ExternalAuthStateRow = typeof externalAuthStates.$inferSelect;
