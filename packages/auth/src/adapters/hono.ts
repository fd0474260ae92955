/**
 * Hono Framework Adapter
 * Bearer middleware and account/session routes for Hono applications
 */

import { Hono, type Context, type MiddlewareHandler } from 'hono';
import { getStatusForCode, isKeyturnError } from '@keyturn/core';
import {
  editUserInfoRequest,
  formatErrors,
  loginRequest,
  refreshTokenRequest,
  registerRequest,
  type,
  type CookieConfig,
} from '@keyturn/types';
import type { SessionCoordinator } from '../core/session-coordinator.js';
import type { AccountService } from '../core/account-service.js';
import { failure, type Failure } from '../core/results.js';
import type { TokenPair } from '../session/token-codec.js';
import { extractBearerToken, extractCookie, serializeCookie } from './transport.js';
import {
  createClearRefreshCookie,
  createRefreshCookie,
  resolveCookieConfig,
  type AuthContext,
  type ResolvedCookieConfig,
} from './types.js';

/**
 * Hono auth context variables
 */
export interface AuthVariables {
  auth: AuthContext;
}

/**
 * Hono adapter configuration
 */
export interface HonoAdapterConfig {
  sessions: SessionCoordinator;
  accounts: AccountService;
  /** Refresh cookie configuration */
  cookies?: CookieConfig | undefined;
  /** Response for errors thrown inside a route */
  onError?: ((error: Error, c: Context) => Response | Promise<Response>) | undefined;
}

type FailureStatus = 400 | 401 | 404 | 409 | 500 | 503;

/**
 * HTTP status for a result code, from the error-code catalog
 */
function failureStatus(code: string): FailureStatus {
  const status = getStatusForCode(code);
  switch (status) {
    case 400:
    case 401:
    case 404:
    case 409:
    case 503:
      return status;
    default:
      return 500;
  }
}

function sendFailure(c: Context, failed: Failure): Response {
  return c.json(
    { success: false, error: failed.error, errorCode: failed.errorCode },
    failureStatus(failed.errorCode)
  );
}

/**
 * Thrown Keyturn errors below 500 keep their code and message; anything
 * else is reported as INTERNAL_ERROR.
 */
function sendThrown(c: Context, error: Error): Response {
  if (isKeyturnError(error) && error.statusCode < 500) {
    return c.json(
      { success: false, error: error.message, errorCode: error.code },
      failureStatus(error.code)
    );
  }
  return c.json(
    { success: false, error: 'Internal server error', errorCode: 'INTERNAL_ERROR' },
    500
  );
}

function sendValidationFailure(c: Context, errors: type.errors): Response {
  const failed = failure('VALIDATION_FAILED');
  return c.json(
    {
      success: false,
      error: failed.error,
      errorCode: failed.errorCode,
      details: formatErrors(errors),
    },
    400
  );
}

/**
 * Parse a JSON body. Missing or malformed JSON reads as undefined.
 */
async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json<unknown>();
  } catch (error) {
    if (error instanceof SyntaxError) return undefined;
    throw error;
  }
}

function setCookie(c: Context, cookie: Parameters<typeof serializeCookie>[0]): void {
  c.header('Set-Cookie', serializeCookie(cookie), { append: true });
}

/**
 * Refresh token from a JSON body field, else from the cookie
 */
async function readRefreshToken(c: Context, cookies: ResolvedCookieConfig): Promise<string | null> {
  const body = refreshTokenRequest(await readJson(c));
  if (!(body instanceof type.errors)) return body.refreshToken;
  return extractCookie(c.req.header('Cookie'), cookies.name);
}

function sendTokens(
  c: Context,
  identity: string,
  tokens: TokenPair,
  cookies: ResolvedCookieConfig
): Response {
  setCookie(c, createRefreshCookie(tokens.refreshToken, tokens.refreshExpiresAt, cookies));
  return c.json({
    success: true,
    identity,
    accessToken: tokens.accessToken,
    expiresAt: tokens.accessExpiresAt.toISOString(),
  });
}

/**
 * Create Hono auth middleware
 * Validates the bearer access token and attaches the identity
 */
export function createAuthMiddleware(
  config: HonoAdapterConfig
): MiddlewareHandler<{ Variables: AuthVariables }> {
  const { sessions } = config;

  return async (c, next) => {
    const token = extractBearerToken(c.req.header('Authorization'));
    const result = await sessions.authenticate(token);

    if (!result.success) {
      return sendFailure(c, result);
    }

    c.set('auth', { identity: result.identity, expiresAt: result.expiresAt });
    await next();
  };
}

/**
 * Create auth routes
 * POST /register, /login, /refresh, /logout; GET and PATCH /me
 *
 * @example
 * ```ts
 * const app = new Hono();
 * app.route('/auth', createAuthRoutes({ sessions, accounts }));
 * ```
 */
export function createAuthRoutes(config: HonoAdapterConfig): Hono<{ Variables: AuthVariables }> {
  const { sessions, accounts } = config;
  const cookies = resolveCookieConfig(config.cookies);
  const requireAuth = createAuthMiddleware(config);
  const app = new Hono<{ Variables: AuthVariables }>();

  app.onError((error, c) => (config.onError ? config.onError(error, c) : sendThrown(c, error)));

  /**
   * Register
   * POST /register
   */
  app.post('/register', async (c) => {
    const input = registerRequest(await readJson(c));
    if (input instanceof type.errors) return sendValidationFailure(c, input);

    const result = await accounts.register(input);
    if (!result.success) return sendFailure(c, result);

    return c.json({ success: true, user: result.user }, 201);
  });

  /**
   * Login
   * POST /login
   */
  app.post('/login', async (c) => {
    const input = loginRequest(await readJson(c));
    if (input instanceof type.errors) return sendValidationFailure(c, input);

    const result = await sessions.login(input);
    if (!result.success) return sendFailure(c, result);

    return sendTokens(c, result.identity, result.tokens, cookies);
  });

  /**
   * Rotate tokens
   * POST /refresh
   */
  app.post('/refresh', async (c) => {
    const refreshToken = await readRefreshToken(c, cookies);
    const result = await sessions.rotate(refreshToken);

    if (!result.success) {
      // A rejected refresh token is useless to the client
      setCookie(c, createClearRefreshCookie(cookies));
      return sendFailure(c, result);
    }

    return sendTokens(c, result.identity, result.tokens, cookies);
  });

  /**
   * Logout
   * POST /logout
   */
  app.post('/logout', async (c) => {
    const accessToken = extractBearerToken(c.req.header('Authorization'));
    const refreshToken = await readRefreshToken(c, cookies);

    const result = await sessions.logout(accessToken, refreshToken);
    setCookie(c, createClearRefreshCookie(cookies));

    if (!result.success) return sendFailure(c, result);
    return c.json({ success: true });
  });

  /**
   * Get current user
   * GET /me
   */
  app.get('/me', requireAuth, async (c) => {
    const result = await accounts.getUserInfo(c.get('auth').identity);
    if (!result.success) return sendFailure(c, result);

    return c.json({ success: true, user: result.user });
  });

  /**
   * Edit current user
   * PATCH /me
   */
  app.patch('/me', requireAuth, async (c) => {
    const input = editUserInfoRequest(await readJson(c));
    if (input instanceof type.errors) return sendValidationFailure(c, input);

    const result = await accounts.editUserInfo(c.get('auth').identity, input);
    if (!result.success) return sendFailure(c, result);

    return c.json({ success: true, user: result.user });
  });

  return app;
}

/**
 * Create complete Hono auth integration
 */
export function createHonoAuth(config: HonoAdapterConfig) {
  return {
    /** Auth middleware (requires a bearer access token) */
    middleware: createAuthMiddleware(config),
    /** Routes to mount with `app.route()` */
    routes: createAuthRoutes(config),
  };
}
