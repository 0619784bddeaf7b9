/**
 * Attribute mapping from a provider profile to local fields.
 * Values are dot-notation paths into the raw profile JSON.
 */
export interface AttributeMapping {
  id: string;
  email: string;
  name?: string;
  picture?: string;
}

/**
 * Registry entry for a supported provider: endpoints and fixed scope
 */
export interface ProviderDefinition {
  authorizeUrl: string;
  tokenUrl: string;
  profileUrl: string;
  /**
   * Fallback endpoint listing the user's addresses, read when the
   * profile itself carries no email
   */
  emailsUrl?: string;
  scope: string;
  attributeMapping: AttributeMapping;
}

/**
 * Client credentials registered with a provider
 */
export interface ProviderCredentials {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

/**
 * Everything needed to talk to one provider
 */
export interface ProviderConfig extends ProviderDefinition, ProviderCredentials {
  name: string;
}

/**
 * Tokens returned by a provider's token endpoint
 */
export interface ProviderTokenSet {
  accessToken: string;
  refreshToken?: string;
  tokenType?: string;
  scope?: string;
}

/**
 * Provider profile after attribute mapping
 */
export interface MappedProfile {
  subjectId?: string;
  email?: string;
  name?: string;
  picture?: string;
}

/**
 * Per-attempt CSRF state, kept in the caller's browser session
 */
export interface CsrfFlowState {
  state: string;
  provider: string;
}
