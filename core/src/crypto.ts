/**
 * Encryption Engine
 *
 * - AES-256-GCM field encryption with a fresh random IV per value
 * - PBKDF2-SHA256 key derivation from the user's password
 * - scrypt password hashes for verification only (never used as a key)
 *
 * Nothing outside this module and key-session.ts touches `crypto` directly.
 */

import * as crypto from "crypto";

import { DecryptionError } from "./errors.js";
import { CONSTANTS } from "./types.js";

const ALGORITHM = "aes-256-gcm";
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

// ============================================================================
// Key Derivation
// ============================================================================

/**
 * Derive a 256-bit encryption key from a password.
 */
export function deriveKey(password: string, salt: Buffer): Buffer {
  return crypto.pbkdf2Sync(
    password,
    salt,
    CONSTANTS.KDF_ITERATIONS,
    CONSTANTS.KEY_LENGTH,
    CONSTANTS.KDF_DIGEST,
  );
}

// ============================================================================
// Encryption / Decryption
// ============================================================================

/**
 * Encrypt with an already-derived key.
 *
 * Output is base64 of `IV ‖ ciphertext ‖ auth tag`.
 */
export function encryptWithKey(plaintext: string, key: Buffer): string {
  const iv = crypto.randomBytes(CONSTANTS.IV_LENGTH);
  const cipher = crypto.createCipheriv(ALGORITHM, key, iv);

  const encrypted = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);

  return Buffer.concat([iv, encrypted, cipher.getAuthTag()]).toString("base64");
}

/**
 * Decrypt a value produced by {@link encryptWithKey}.
 * Throws {@link DecryptionError} on malformed input, a wrong key or tampering.
 */
export function decryptWithKey(ciphertext: string, key: Buffer): string {
  if (ciphertext.length % 4 !== 0 || !BASE64_PATTERN.test(ciphertext)) {
    throw new DecryptionError("Ciphertext is not valid base64");
  }

  const payload = Buffer.from(ciphertext, "base64");
  if (payload.length < CONSTANTS.IV_LENGTH + CONSTANTS.AUTH_TAG_LENGTH) {
    throw new DecryptionError("Ciphertext too short to contain IV and auth tag");
  }

  const iv = payload.subarray(0, CONSTANTS.IV_LENGTH);
  const authTag = payload.subarray(payload.length - CONSTANTS.AUTH_TAG_LENGTH);
  const encrypted = payload.subarray(CONSTANTS.IV_LENGTH, payload.length - CONSTANTS.AUTH_TAG_LENGTH);

  try {
    const decipher = crypto.createDecipheriv(ALGORITHM, key, iv);
    decipher.setAuthTag(authTag);

    return Buffer.concat([decipher.update(encrypted), decipher.final()]).toString("utf8");
  } catch (error) {
    throw new DecryptionError(
      error instanceof Error ? error.message : "Unknown decryption error",
    );
  }
}

/**
 * Encrypt plaintext under a password.
 * Without an explicit salt the password doubles as its own salt.
 */
export function encrypt(plaintext: string, password: string, salt?: Buffer): string {
  return encryptWithKey(plaintext, deriveKey(password, salt ?? Buffer.from(password, "utf8")));
}

/**
 * Decrypt a value produced by {@link encrypt} with the same password and salt.
 */
export function decrypt(ciphertext: string, password: string, salt?: Buffer): string {
  return decryptWithKey(ciphertext, deriveKey(password, salt ?? Buffer.from(password, "utf8")));
}

// ============================================================================
// Password Hashing
// ============================================================================

interface ParsedHash {
  salt: Buffer;
  digest: Buffer;
}

function parseHash(stored: string): ParsedHash | null {
  const parts = stored.split("$");
  if (parts.length !== 3 || parts[0] !== CONSTANTS.HASH_SCHEME) {
    return null;
  }

  const salt = Buffer.from(parts[1], "base64");
  const digest = Buffer.from(parts[2], "base64");
  if (salt.length === 0 || digest.length === 0) {
    return null;
  }

  return { salt, digest };
}

/**
 * Hash a password for storage: `scrypt$<salt>$<digest>`, both base64.
 */
export function hashPassword(password: string): string {
  const salt = crypto.randomBytes(CONSTANTS.HASH_SALT_LENGTH);
  const digest = crypto.scryptSync(password, salt, CONSTANTS.HASH_LENGTH);

  return [CONSTANTS.HASH_SCHEME, salt.toString("base64"), digest.toString("base64")].join("$");
}

/**
 * Check a password against a stored hash. Malformed hashes never verify.
 */
export function verifyPassword(password: string, stored: string): boolean {
  const parsed = parseHash(stored);
  if (!parsed) return false;

  const candidate = crypto.scryptSync(password, parsed.salt, parsed.digest.length);
  return crypto.timingSafeEqual(candidate, parsed.digest);
}

/**
 * The random salt embedded in a stored hash, or null if the hash is malformed.
 * Documents derive their encryption key from it.
 */
export function passwordSalt(stored: string): Buffer | null {
  return parseHash(stored)?.salt ?? null;
}
