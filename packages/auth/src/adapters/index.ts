/**
 * Framework Adapters
 * HTTP transport helpers, Hono integration and the Drizzle credential store
 */

// Transport helpers
export {
  extractBearerToken,
  extractCookie,
  serializeCookie,
  type CookieOptions,
} from './transport.js';

// Common types
export {
  createRefreshCookie,
  createClearRefreshCookie,
  resolveCookieConfig,
  REFRESH_COOKIE_NAME,
  type AuthContext,
  type ResolvedCookieConfig,
} from './types.js';

// Hono adapter
export {
  createAuthMiddleware,
  createAuthRoutes,
  createHonoAuth,
  type AuthVariables,
  type HonoAdapterConfig,
} from './hono.js';

// Drizzle user repository
export {
  DrizzleUserRepository,
  createDrizzleUserRepository,
  users,
  type DrizzleDatabase,
  type UserRow,
  type NewUserRow,
} from './drizzle/index.js';
