import { describe, it, expect } from 'vitest';
import {
  buildAuthorizationUrl,
  getProviderConfig,
  listProviderNames,
  mapProviderProfile,
  providerDefinitions,
} from '../../federation/providers.js';
import { AuthError } from '../../errors/auth-error.js';

const CREDENTIALS = {
  clientId: 'test-client-id',
  clientSecret: 'test-client-secret',
  redirectUri: 'http://localhost:3000/auth/oauth/github/callback',
};

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof AuthError ? err.code : undefined;
  }
  return undefined;
}

describe('provider registry', () => {
  it('should list the supported providers', () => {
    expect(listProviderNames()).toEqual(['google', 'github']);
  });

  it('should merge definition and credentials', () => {
    const config = getProviderConfig('github', { github: CREDENTIALS });

    expect(config.name).toBe('github');
    expect(config.tokenUrl).toBe('https://github.com/login/oauth/access_token');
    expect(config.emailsUrl).toBe('https://api.github.com/user/emails');
    expect(config.clientId).toBe('test-client-id');
  });

  it('should reject names outside the registry', () => {
    expect(codeOf(() => getProviderConfig('myspace', { github: CREDENTIALS }))).toBe('unknown_provider');
    expect(codeOf(() => getProviderConfig('toString', { github: CREDENTIALS }))).toBe('unknown_provider');
    expect(codeOf(() => getProviderConfig('GitHub', { github: CREDENTIALS }))).toBe('unknown_provider');
  });

  it('should reject providers without credentials', () => {
    expect(codeOf(() => getProviderConfig('google', { github: CREDENTIALS }))).toBe(
      'provider_not_configured'
    );
  });

  it('should accept a custom registry', () => {
    const registry = {
      example: { ...providerDefinitions.google, authorizeUrl: 'https://idp.example.com/authorize' },
    };

    const config = getProviderConfig('example', { example: CREDENTIALS }, registry);
    expect(config.authorizeUrl).toBe('https://idp.example.com/authorize');
    expect(codeOf(() => getProviderConfig('google', { google: CREDENTIALS }, registry))).toBe(
      'unknown_provider'
    );
  });
});

describe('buildAuthorizationUrl', () => {
  it('should carry exactly the authorization request parameters', () => {
    const config = getProviderConfig('github', { github: CREDENTIALS });

    const url = new URL(buildAuthorizationUrl(config, 'test-state'));

    expect(`${url.origin}${url.pathname}`).toBe('https://github.com/login/oauth/authorize');
    expect(Object.fromEntries(url.searchParams)).toEqual({
      client_id: 'test-client-id',
      redirect_uri: 'http://localhost:3000/auth/oauth/github/callback',
      response_type: 'code',
      scope: 'user:email',
      state: 'test-state',
    });
  });
});

describe('mapProviderProfile', () => {
  it('should map a Google profile', () => {
    const profile = mapProviderProfile(providerDefinitions.google.attributeMapping, {
      id: '1001',
      email: 'alice@example.com',
      name: 'Alice',
      picture: 'https://example.com/a.png',
      verified_email: true,
    });

    expect(profile).toEqual({
      subjectId: '1001',
      email: 'alice@example.com',
      name: 'Alice',
      picture: 'https://example.com/a.png',
    });
  });

  it('should stringify numeric GitHub ids and read avatar_url', () => {
    const profile = mapProviderProfile(providerDefinitions.github.attributeMapping, {
      id: 12345,
      login: 'alice',
      email: null,
      avatar_url: 'https://avatars.example.com/u/12345',
    });

    expect(profile).toEqual({
      subjectId: '12345',
      email: undefined,
      name: undefined,
      picture: 'https://avatars.example.com/u/12345',
    });
  });

  it('should follow dotted paths', () => {
    const profile = mapProviderProfile(
      { id: 'user.sub', email: 'user.contact.email' },
      { user: { sub: 'abc', contact: { email: 'alice@example.com' } } }
    );

    expect(profile.subjectId).toBe('abc');
    expect(profile.email).toBe('alice@example.com');
  });

  it('should drop blank and non-scalar values', () => {
    const profile = mapProviderProfile(providerDefinitions.google.attributeMapping, {
      id: '   ',
      email: { value: 'alice@example.com' },
      name: true,
    });

    expect(profile).toEqual({
      subjectId: undefined,
      email: undefined,
      name: undefined,
      picture: undefined,
    });
  });
});
