/**
 * Password Hashing Utilities
 * PBKDF2-SHA256 through Web Crypto
 */

export const PBKDF2_ITERATIONS = 100000;
const SALT_LENGTH = 16;
const KEY_LENGTH = 32;

/**
 * Hashes and checks passwords for the credential store
 */
export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  matches(plain: string, hash: string): Promise<boolean>;
}

async function deriveKey(
  password: string,
  salt: BufferSource,
  iterations: number
): Promise<Uint8Array> {
  const passwordKey = await crypto.subtle.importKey(
    "raw",
    new TextEncoder().encode(password),
    "PBKDF2",
    false,
    ["deriveBits"]
  );

  const derivedBits = await crypto.subtle.deriveBits(
    {
      name: "PBKDF2",
      salt,
      iterations,
      hash: "SHA-256",
    },
    passwordKey,
    KEY_LENGTH * 8
  );

  return new Uint8Array(derivedBits);
}

function decodeStoredHash(storedHash: string): Uint8Array | null {
  if (!/^[A-Za-z0-9+/]+={0,2}$/.test(storedHash)) return null;
  const combined = Uint8Array.from(atob(storedHash), (c) => c.charCodeAt(0));
  return combined.length === SALT_LENGTH + KEY_LENGTH ? combined : null;
}

/**
 * Hash a password using PBKDF2.
 * Output is base64(salt || key).
 */
export async function hashPassword(
  password: string,
  iterations: number = PBKDF2_ITERATIONS
): Promise<string> {
  const salt = crypto.getRandomValues(new Uint8Array(SALT_LENGTH));
  const hash = await deriveKey(password, salt, iterations);

  const combined = new Uint8Array(salt.length + hash.length);
  combined.set(salt);
  combined.set(hash, salt.length);

  return btoa(String.fromCharCode(...combined));
}

/**
 * Verify a password against a hash made with the same iteration count.
 * Malformed hashes never match.
 */
export async function verifyPassword(
  password: string,
  storedHash: string,
  iterations: number = PBKDF2_ITERATIONS
): Promise<boolean> {
  const combined = decodeStoredHash(storedHash);
  if (!combined) return false;

  const salt = combined.slice(0, SALT_LENGTH);
  const storedKey = combined.slice(SALT_LENGTH);
  const derivedKey = await deriveKey(password, salt, iterations);

  // Constant-time comparison
  let result = 0;
  for (let i = 0; i < derivedKey.length; i++) {
    result |= (derivedKey[i] ?? 0) ^ (storedKey[i] ?? 0);
  }

  return result === 0;
}

/**
 * Default PasswordHasher on PBKDF2
 */
export class Pbkdf2PasswordHasher implements PasswordHasher {
  private readonly iterations: number;

  constructor(options: { iterations?: number } = {}) {
    this.iterations = options.iterations ?? PBKDF2_ITERATIONS;
  }

  hash(plain: string): Promise<string> {
    return hashPassword(plain, this.iterations);
  }

  matches(plain: string, hash: string): Promise<boolean> {
    return verifyPassword(plain, hash, this.iterations);
  }
}
