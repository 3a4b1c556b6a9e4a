import { decryptWithKey, deriveKey, encryptWithKey, hashPassword, passwordSalt } from "./crypto.js";
import { InvalidStateError, ValidationError } from "./errors.js";

/**
 * In-memory key handle for one unlocked document.
 *
 * The password is only used to derive the key and is not retained.
 * The session lives as long as its owning document and is never persisted.
 */
export class KeySession {
  readonly passwordHash: string;
  private key: Buffer | null;

  constructor(password: string, passwordHash: string) {
    const salt = passwordSalt(passwordHash);
    if (!salt) {
      throw new ValidationError("Stored password hash is malformed");
    }

    this.passwordHash = passwordHash;
    this.key = deriveKey(password, salt);
  }

  /**
   * Start a session for a brand-new password.
   */
  static create(password: string): KeySession {
    return new KeySession(password, hashPassword(password));
  }

  get active(): boolean {
    return this.key !== null;
  }

  encrypt(plaintext: string): string {
    return encryptWithKey(plaintext, this.requireKey());
  }

  decrypt(ciphertext: string): string {
    return decryptWithKey(ciphertext, this.requireKey());
  }

  /**
   * Zero the key. Further use throws.
   */
  dispose(): void {
    this.key?.fill(0);
    this.key = null;
  }

  private requireKey(): Buffer {
    if (!this.key) {
      throw new InvalidStateError("Key session has been disposed");
    }
    return this.key;
  }
}
