import { sql } from 'drizzle-orm';
import {
  check,
  index,
  pgTable,
  serial,
  text,
  timestamp,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

export const IDENTITIES_EMAIL_UNIQUE = 'identities_email_unique';
export const IDENTITIES_PROVIDER_UNIQUE = 'identities_provider_unique';

/**
 * Identity records: local credentials and/or one linked provider identity.
 * Provider tokens are stored encrypted.
 */
export const identities = pgTable(
  'identities',
  {
    id: serial('id').primaryKey(),
    email: text('email').notNull(),
    credentialDigest: text('credential_digest'),
    providerName: text('provider_name'),
    providerSubjectId: text('provider_subject_id'),
    providerAccessToken: text('provider_access_token'),
    providerRefreshToken: text('provider_refresh_token'),
    displayName: text('display_name'),
    pictureUrl: text('picture_url'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex(IDENTITIES_EMAIL_UNIQUE).on(table.email),
    uniqueIndex(IDENTITIES_PROVIDER_UNIQUE).on(table.providerName, table.providerSubjectId),
    check(
      'identities_auth_means',
      sql`${table.credentialDigest} IS NOT NULL OR ${table.providerSubjectId} IS NOT NULL`
    ),
  ]
);

/**
 * Revoked bearer tokens, keyed by SHA-256 of the token string
 */
export const revokedTokens = pgTable(
  'revoked_tokens',
  {
    tokenHash: text('token_hash').primaryKey(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    revokedAt: timestamp('revoked_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('revoked_tokens_expires_at_idx').on(table.expiresAt)]
);

export type IdentityRow = typeof identities.$inferSelect;
export type NewIdentityRow = typeof identities.$inferInsert;
