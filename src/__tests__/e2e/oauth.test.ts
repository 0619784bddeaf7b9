import { describe, it, expect, beforeEach } from 'vitest';
import {
  setupTestContext,
  jsonRequest,
  bearer,
  cookiePair,
  type TestContext,
  type TokenResponse,
  type ErrorResponse,
} from './test-setup.js';
import { AuthError } from '../../errors/auth-error.js';

interface InitiatedFlow {
  state: string;
  cookie: string;
}

async function initiate(ctx: TestContext, provider = 'google'): Promise<InitiatedFlow> {
  const res = await ctx.app.request(`/auth/oauth/${provider}`);
  expect(res.status).toBe(302);

  const location = new URL(res.headers.get('Location') ?? '');
  return {
    state: location.searchParams.get('state') ?? '',
    cookie: cookiePair(res.headers.get('Set-Cookie')),
  };
}

function callbackUrl(params: Record<string, string>, provider = 'google'): string {
  return `/auth/oauth/${provider}/callback?${new URLSearchParams(params).toString()}`;
}

describe('OAuth Login', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = setupTestContext();
  });

  describe('GET /auth/oauth/:provider', () => {
    it('should redirect to the provider with client id, scope and state', async () => {
      const res = await ctx.app.request('/auth/oauth/google');

      expect(res.status).toBe(302);
      const location = new URL(res.headers.get('Location') ?? '');
      expect(`${location.origin}${location.pathname}`).toBe(
        'https://accounts.google.com/o/oauth2/v2/auth'
      );
      expect(location.searchParams.get('client_id')).toBe('test-client-id');
      expect(location.searchParams.get('redirect_uri')).toBe(
        'http://localhost:3000/auth/oauth/google/callback'
      );
      expect(location.searchParams.get('response_type')).toBe('code');
      expect(location.searchParams.get('scope')).toBe('openid email profile');
      expect(location.searchParams.get('state')).toMatch(/^[A-Za-z0-9_-]{43}$/);
    });

    it('should keep the flow state in a signed HttpOnly cookie', async () => {
      const res = await ctx.app.request('/auth/oauth/google');

      const setCookie = res.headers.get('Set-Cookie') ?? '';
      expect(setCookie.startsWith('oauth_flow=')).toBe(true);
      expect(setCookie).toContain('Max-Age=600');
      expect(setCookie).toContain('Path=/auth/oauth');
      expect(setCookie).toContain('HttpOnly');
      expect(setCookie).toContain('SameSite=Lax');
    });

    it('should answer 404 for an unknown provider', async () => {
      const res = await ctx.app.request('/auth/oauth/myspace');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: 'unknown_provider',
        error_description: 'Unsupported OAuth provider: myspace',
      });
    });

    it('should answer 404 for a provider without credentials', async () => {
      const res = await ctx.app.request('/auth/oauth/github');

      expect(res.status).toBe(404);
      const body = (await res.json()) as ErrorResponse;
      expect(body.error).toBe('provider_not_configured');
    });
  });

  describe('GET /auth/oauth/:provider/callback', () => {
    it('should create an identity and return a token', async () => {
      const { state, cookie } = await initiate(ctx);

      const res = await ctx.app.request(callbackUrl({ state, code: 'test-code' }), {
        headers: { Cookie: cookie },
      });

      expect(res.status).toBe(200);
      const body = (await res.json()) as TokenResponse;
      expect(body.token_type).toBe('bearer');
      expect(await ctx.services.tokens.verify(body.access_token)).toBe(1);
      expect(ctx.providerClient.exchangedCodes).toEqual(['test-code']);
      expect(ctx.providerClient.profileTokens).toEqual(['provider-access-token']);

      const me = await ctx.app.request('/auth/me', { headers: bearer(body.access_token) });
      expect(await me.json()).toMatchObject({
        id: 1,
        email: 'alice@example.com',
        provider: 'google',
        hasPassword: false,
        displayName: 'Alice',
        pictureUrl: 'https://example.com/alice.png',
      });
    });

    it('should store the provider tokens', async () => {
      const { state, cookie } = await initiate(ctx);

      await ctx.app.request(callbackUrl({ state, code: 'test-code' }), {
        headers: { Cookie: cookie },
      });

      const identity = await ctx.storage.identities.findById(1);
      expect(identity?.providerTokens).toEqual({
        accessToken: 'provider-access-token',
        refreshToken: 'provider-refresh-token',
      });
    });

    it('should clear the flow cookie', async () => {
      const { state, cookie } = await initiate(ctx);

      const res = await ctx.app.request(callbackUrl({ state, code: 'test-code' }), {
        headers: { Cookie: cookie },
      });

      const setCookie = res.headers.get('Set-Cookie') ?? '';
      expect(setCookie.startsWith('oauth_flow=;')).toBe(true);
      expect(setCookie).toContain('Max-Age=0');
    });

    it('should clear the flow cookie when the state does not match', async () => {
      const { cookie } = await initiate(ctx);

      const res = await ctx.app.request(callbackUrl({ state: 'forged-state', code: 'test-code' }), {
        headers: { Cookie: cookie },
      });

      expect(res.status).toBe(400);
      expect(((await res.json()) as ErrorResponse).error).toBe('csrf_mismatch');
      const setCookie = res.headers.get('Set-Cookie') ?? '';
      expect(setCookie.startsWith('oauth_flow=;')).toBe(true);
      expect(setCookie).toContain('Max-Age=0');
      expect(setCookie).toContain('Path=/auth/oauth');
    });

    it('should clear the flow cookie when the provider reports an error', async () => {
      const { state, cookie } = await initiate(ctx);

      const res = await ctx.app.request(callbackUrl({ state, error: 'access_denied' }), {
        headers: { Cookie: cookie },
      });

      expect(res.status).toBe(502);
      expect(((await res.json()) as ErrorResponse).error).toBe('provider_denied');
      const setCookie = res.headers.get('Set-Cookie') ?? '';
      expect(setCookie.startsWith('oauth_flow=;')).toBe(true);
      expect(setCookie).toContain('Max-Age=0');
      expect(setCookie).toContain('Path=/auth/oauth');
    });

    it('should log in to the same identity on a second flow', async () => {
      const first = await initiate(ctx);
      await ctx.app.request(callbackUrl({ state: first.state, code: 'code-1' }), {
        headers: { Cookie: first.cookie },
      });

      const second = await initiate(ctx);
      const res = await ctx.app.request(callbackUrl({ state: second.state, code: 'code-2' }), {
        headers: { Cookie: second.cookie },
      });

      const body = (await res.json()) as TokenResponse;
      expect(await ctx.services.tokens.verify(body.access_token)).toBe(1);
    });

    it('should link to a local account with the same email', async () => {
      const registered = await ctx.app.request(
        '/auth/register',
        jsonRequest({ email: 'alice@example.com', password: 'test-password' })
      );
      expect(registered.status).toBe(201);

      const { state, cookie } = await initiate(ctx);
      const res = await ctx.app.request(callbackUrl({ state, code: 'test-code' }), {
        headers: { Cookie: cookie },
      });

      const body = (await res.json()) as TokenResponse;
      const me = await ctx.app.request('/auth/me', { headers: bearer(body.access_token) });
      expect(await me.json()).toMatchObject({
        id: 1,
        provider: 'google',
        hasPassword: true,
      });
    });

    it('should reject a state that does not match the cookie', async () => {
      const { cookie } = await initiate(ctx);

      const res = await ctx.app.request(callbackUrl({ state: 'forged-state', code: 'test-code' }), {
        headers: { Cookie: cookie },
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'csrf_mismatch',
        error_description: 'Invalid or missing CSRF state parameter.',
      });
      expect(ctx.providerClient.exchangedCodes).toEqual([]);
    });

    it('should reject a callback without the flow cookie', async () => {
      const { state } = await initiate(ctx);

      const res = await ctx.app.request(callbackUrl({ state, code: 'test-code' }));

      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorResponse;
      expect(body.error).toBe('csrf_mismatch');
    });

    it('should reject a replayed callback once the cookie is cleared', async () => {
      const { state, cookie } = await initiate(ctx);

      const first = await ctx.app.request(callbackUrl({ state, code: 'test-code' }), {
        headers: { Cookie: cookie },
      });
      expect(first.status).toBe(200);

      // The browser now holds the cleared cookie
      const replay = await ctx.app.request(callbackUrl({ state, code: 'test-code' }), {
        headers: { Cookie: cookiePair(first.headers.get('Set-Cookie')) },
      });

      expect(replay.status).toBe(400);
      const body = (await replay.json()) as ErrorResponse;
      expect(body.error).toBe('csrf_mismatch');
    });

    it('should reject a tampered cookie', async () => {
      const { state, cookie } = await initiate(ctx);

      const res = await ctx.app.request(callbackUrl({ state, code: 'test-code' }), {
        headers: { Cookie: `${cookie}x` },
      });

      expect(res.status).toBe(400);
    });

    it('should reject flow state older than its lifetime', async () => {
      const { state, cookie } = await initiate(ctx);
      ctx.clock.advanceSeconds(600);

      const res = await ctx.app.request(callbackUrl({ state, code: 'test-code' }), {
        headers: { Cookie: cookie },
      });

      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorResponse;
      expect(body.error).toBe('csrf_mismatch');
    });

    it('should reject flow state started for another provider', async () => {
      const { state, cookie } = await initiate(ctx);

      const res = await ctx.app.request(callbackUrl({ state, code: 'test-code' }, 'github'), {
        headers: { Cookie: cookie },
      });

      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorResponse;
      expect(body.error).toBe('csrf_mismatch');
    });

    it('should report a provider error as provider_denied', async () => {
      const { state, cookie } = await initiate(ctx);

      const res = await ctx.app.request(
        callbackUrl({ state, error: 'access_denied', error_description: 'User cancelled' }),
        { headers: { Cookie: cookie } }
      );

      expect(res.status).toBe(502);
      expect(await res.json()).toEqual({
        error: 'provider_denied',
        error_description: 'OAuth error: User cancelled',
      });
    });

    it('should reject a callback without a code', async () => {
      const { state, cookie } = await initiate(ctx);

      const res = await ctx.app.request(callbackUrl({ state }), {
        headers: { Cookie: cookie },
      });

      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorResponse;
      expect(body.error).toBe('missing_code');
    });

    it('should report a failed code exchange as 502 and create nothing', async () => {
      ctx.providerClient.exchangeError = AuthError.tokenExchangeFailed();
      const { state, cookie } = await initiate(ctx);

      const res = await ctx.app.request(callbackUrl({ state, code: 'test-code' }), {
        headers: { Cookie: cookie },
      });

      expect(res.status).toBe(502);
      const body = (await res.json()) as ErrorResponse;
      expect(body.error).toBe('token_exchange_failed');
      expect(await ctx.storage.identities.findById(1)).toBeNull();
    });

    it('should refuse to create an identity without an email', async () => {
      ctx.providerClient.profile = { id: 'google-user-2' };
      const { state, cookie } = await initiate(ctx);

      const res = await ctx.app.request(callbackUrl({ state, code: 'test-code' }), {
        headers: { Cookie: cookie },
      });

      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorResponse;
      expect(body.error).toBe('missing_email');
    });

    it('should report a profile without a subject id as 502', async () => {
      ctx.providerClient.profile = { email: 'alice@example.com' };
      const { state, cookie } = await initiate(ctx);

      const res = await ctx.app.request(callbackUrl({ state, code: 'test-code' }), {
        headers: { Cookie: cookie },
      });

      expect(res.status).toBe(502);
      const body = (await res.json()) as ErrorResponse;
      expect(body.error).toBe('missing_subject_id');
    });
  });

  describe('with a success redirect', () => {
    beforeEach(() => {
      ctx = setupTestContext({ successRedirect: 'http://localhost:5173/auth/done' });
    });

    it('should redirect with the token in the URL fragment', async () => {
      const { state, cookie } = await initiate(ctx);

      const res = await ctx.app.request(callbackUrl({ state, code: 'test-code' }), {
        headers: { Cookie: cookie },
      });

      expect(res.status).toBe(302);
      const location = res.headers.get('Location') ?? '';
      const [target, fragment = ''] = location.split('#');
      expect(target).toBe('http://localhost:5173/auth/done');

      const params = new URLSearchParams(fragment);
      expect(params.get('token_type')).toBe('bearer');
      expect(params.get('expires_in')).toBe('3600');
      expect(await ctx.services.tokens.verify(params.get('access_token') ?? '')).toBe(1);
    });
  });

  describe('with linking disabled', () => {
    beforeEach(() => {
      ctx = setupTestContext({ linkPolicy: 'never' });
    });

    it('should report an email collision as a conflict', async () => {
      await ctx.app.request(
        '/auth/register',
        jsonRequest({ email: 'alice@example.com', password: 'test-password' })
      );

      const { state, cookie } = await initiate(ctx);
      const res = await ctx.app.request(callbackUrl({ state, code: 'test-code' }), {
        headers: { Cookie: cookie },
      });

      expect(res.status).toBe(409);
      const body = (await res.json()) as ErrorResponse;
      expect(body.error).toBe('conflict');

      const identity = await ctx.storage.identities.findById(1);
      expect(identity?.providerIdentity).toBeUndefined();
    });
  });
});
