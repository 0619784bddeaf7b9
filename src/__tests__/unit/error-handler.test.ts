import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { z } from 'zod';
import { authErrorHandler, securityHeaders } from '../../middleware/error-handler.js';
import { AuthError } from '../../errors/auth-error.js';

function appThrowing(err: unknown): Hono {
  const app = new Hono();
  app.onError(authErrorHandler({ exposeInternalErrors: false }));
  app.get('/fail', () => {
    throw err;
  });
  return app;
}

describe('authErrorHandler', () => {
  it('should render token errors with an invalid_token challenge', async () => {
    const res = await appThrowing(AuthError.tokenExpired()).request('/fail');

    expect(res.status).toBe(401);
    expect(res.headers.get('WWW-Authenticate')).toBe(
      'Bearer realm="auth", error="invalid_token", error_description="The token has expired."'
    );
    expect(await res.json()).toEqual({
      error: 'token_expired',
      error_description: 'The token has expired.',
    });
  });

  it('should send a plain challenge for other authentication errors', async () => {
    const res = await appThrowing(AuthError.invalidCredentials()).request('/fail');

    expect(res.status).toBe(401);
    expect(res.headers.get('WWW-Authenticate')).toBe('Bearer realm="auth"');
  });

  it('should not challenge non-authentication errors', async () => {
    const res = await appThrowing(AuthError.conflict()).request('/fail');

    expect(res.status).toBe(409);
    expect(res.headers.get('WWW-Authenticate')).toBeNull();
  });

  it('should map upstream failures to 502', async () => {
    const res = await appThrowing(AuthError.tokenExchangeFailed()).request('/fail');

    expect(res.status).toBe(502);
    expect(((await res.json()) as { error: string }).error).toBe('token_exchange_failed');
  });

  it('should forbid caching of error responses', async () => {
    const res = await appThrowing(AuthError.missingCode()).request('/fail');

    expect(res.headers.get('Cache-Control')).toBe('no-store');
    expect(res.headers.get('Pragma')).toBe('no-cache');
  });

  it('should render validation failures as invalid_input', async () => {
    const result = z.object({ email: z.string() }).safeParse({});
    const res = await appThrowing(result.error).request('/fail');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'invalid_input',
      error_description: 'email: Required',
    });
  });

  it('should hide unexpected error messages', async () => {
    const res = await appThrowing(new Error('connection refused')).request('/fail');

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: 'server_error',
      error_description: 'An unexpected error occurred',
    });
  });
});

describe('securityHeaders', () => {
  function appWithHeaders(production: boolean): Hono {
    const app = new Hono();
    app.use('*', securityHeaders({ production }));
    app.get('/ok', (c) => c.text('ok'));
    return app;
  }

  it('should set the baseline security headers', async () => {
    const res = await appWithHeaders(false).request('/ok');

    expect(res.headers.get('X-Frame-Options')).toBe('DENY');
    expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff');
    expect(res.headers.get('Referrer-Policy')).toBe('no-referrer');
    expect(res.headers.get('Strict-Transport-Security')).toBeNull();
  });

  it('should add HSTS in production', async () => {
    const res = await appWithHeaders(true).request('/ok');

    expect(res.headers.get('Strict-Transport-Security')).toBe('max-age=31536000; includeSubDomains');
  });
});
