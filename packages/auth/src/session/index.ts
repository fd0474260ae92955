/**
 * Session Module
 * Token codec, active-token store and revocation list
 */

// Token codec
export {
  TokenCodec,
  createTokenCodec,
  parseDuration,
  DEFAULT_TOKEN_TTL,
  TOKEN_TYPES,
  type TokenCodecConfig,
  type TokenKind,
  type IssuedToken,
  type TokenPair,
  type TokenVerification,
} from './token-codec.js';

// Token store
export { TokenStore, createTokenStore, type TokenStoreConfig } from './token-store.js';

// Revocation list
export {
  RevocationList,
  createRevocationList,
  hashToken,
  type RevocationEntry,
  type RevocationReason,
} from './revocation-list.js';
