/**
 * External identity asserted by an OAuth provider
 */
export interface ProviderIdentity {
  provider: string;
  subjectId: string;
}

/**
 * Provider tokens kept for later provider API calls.
 * Opaque to the authentication core.
 */
export interface ProviderTokens {
  accessToken: string;
  refreshToken?: string;
}

/**
 * Durable account entity
 *
 * Every record carries at least one means of authentication:
 * a credential digest, a provider identity, or both.
 */
export interface IdentityRecord {
  id: number;
  email: string;
  credentialDigest?: string;
  providerIdentity?: ProviderIdentity;
  providerTokens?: ProviderTokens;
  displayName?: string;
  pictureUrl?: string;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Input for creating an identity record
 */
export interface CreateIdentityInput {
  email: string;
  credentialDigest?: string;
  providerIdentity?: ProviderIdentity;
  providerTokens?: ProviderTokens;
  displayName?: string;
  pictureUrl?: string;
}

/**
 * Input for updating an identity record.
 * Omitted fields are left unchanged.
 */
export interface UpdateIdentityInput {
  credentialDigest?: string;
  providerIdentity?: ProviderIdentity;
  providerTokens?: ProviderTokens;
  displayName?: string;
  pictureUrl?: string;
}

/**
 * Public view of an identity (no digest, no provider tokens)
 */
export interface IdentityView {
  id: number;
  email: string;
  provider?: string;
  hasPassword: boolean;
  displayName?: string;
  pictureUrl?: string;
  createdAt: string;
}

/**
 * Normalize an email for storage and lookup
 */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function toIdentityView(record: IdentityRecord): IdentityView {
  return {
    id: record.id,
    email: record.email,
    provider: record.providerIdentity?.provider,
    hasPassword: record.credentialDigest !== undefined,
    displayName: record.displayName,
    pictureUrl: record.pictureUrl,
    createdAt: record.createdAt.toISOString(),
  };
}
