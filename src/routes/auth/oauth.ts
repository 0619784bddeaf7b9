import { Hono, type Context } from 'hono';
import { setSignedCookie, getSignedCookie, deleteCookie } from 'hono/cookie';
import { z } from 'zod';
import type { AuthVariables } from '../../types/hono.js';
import type { CsrfFlowState } from '../../types/oauth.js';
import type { OAuthFlowService } from '../../services/oauth-flow.js';
import type { TokenService } from '../../services/token-service.js';
import {
  DEFAULT_OAUTH_STATE_TTL,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  OAUTH_STATE_COOKIE,
  OAUTH_STATE_COOKIE_PATH,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
} from '../../config/constants.js';

export interface OAuthRoutesOptions {
  flow: OAuthFlowService;
  tokens: TokenService;
  /**
   * Key for signing the flow-state cookie
   */
  sessionSecret: string;
  /**
   * Frontend URL that receives the token in its fragment; JSON when unset
   */
  successRedirect?: string;
  secureCookies?: boolean;
  stateTtlSeconds?: number;
  now?: () => Date;
}

const flowCookieSchema = z.object({
  state: z.string(),
  provider: z.string(),
  exp: z.number(),
});

/**
 * Read the flow state back from its signed cookie.
 * Tampered, unparsable or stale cookies read as absent.
 */
async function readFlowState(
  c: Context,
  secret: string,
  now: Date
): Promise<CsrfFlowState | undefined> {
  const raw = await getSignedCookie(c, secret, OAUTH_STATE_COOKIE);
  if (!raw) {
    return undefined;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return undefined;
  }

  const parsed = flowCookieSchema.safeParse(json);
  if (!parsed.success || parsed.data.exp * 1000 <= now.getTime()) {
    return undefined;
  }

  return { state: parsed.data.state, provider: parsed.data.provider };
}

/**
 * Create OAuth login routes
 *
 * Routes:
 * - GET /:provider - Redirect to the provider's consent page
 * - GET /:provider/callback - Complete the flow and issue a token
 */
export function createOAuthRoutes(options: OAuthRoutesOptions) {
  const {
    flow,
    tokens,
    sessionSecret,
    successRedirect,
    secureCookies = false,
    stateTtlSeconds = DEFAULT_OAUTH_STATE_TTL,
    now = () => new Date(),
  } = options;

  const router = new Hono<{ Variables: AuthVariables }>();

  router.get('/:provider', async (c) => {
    const { authorizationUrl, flowState } = flow.initiate(c.req.param('provider'));

    const exp = Math.floor(now().getTime() / 1000) + stateTtlSeconds;
    await setSignedCookie(
      c,
      OAUTH_STATE_COOKIE,
      JSON.stringify({ ...flowState, exp }),
      sessionSecret,
      {
        path: OAUTH_STATE_COOKIE_PATH,
        httpOnly: true,
        secure: secureCookies,
        sameSite: 'Lax',
        maxAge: stateTtlSeconds,
      }
    );

    return c.redirect(authorizationUrl, 302);
  });

  router.get('/:provider/callback', async (c) => {
    const expected = await readFlowState(c, sessionSecret, now());

    // Single use: cleared whatever the outcome
    deleteCookie(c, OAUTH_STATE_COOKIE, { path: OAUTH_STATE_COOKIE_PATH });

    const { token } = await flow.callback({
      provider: c.req.param('provider'),
      receivedState: c.req.query('state'),
      expected,
      code: c.req.query('code'),
      error: c.req.query('error'),
      errorDescription: c.req.query('error_description'),
    });

    const body = tokens.toResponse(token);

    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    if (successRedirect) {
      const fragment = new URLSearchParams({
        access_token: body.access_token,
        token_type: body.token_type,
        expires_in: String(body.expires_in),
      });
      return c.redirect(`${successRedirect}#${fragment.toString()}`, 302);
    }

    return c.json(body);
  });

  return router;
}
