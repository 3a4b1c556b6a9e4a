/**
 * Shared type definitions for sealed-settings.
 */

// ============================================================================
// Collaborators
// ============================================================================

/** Result of an interactive read. Cancellation is reported apart from any value. */
export type PromptResult<T> =
  | { readonly canceled: true }
  | { readonly canceled: false; readonly value: T };

/**
 * Interactive prompt service consumed by the password gate.
 * The CLI provides a terminal implementation; tests script the answers.
 */
export interface Prompter {
  /** Read a plain line of input. */
  readLine(message: string): Promise<PromptResult<string>>;

  /** Read a line with the typed characters masked. */
  readSecret(message: string): Promise<PromptResult<string>>;

  /** Show an informational message to the user. */
  notify(message: string): void;
}

/**
 * Plain text-file storage used by settings documents.
 */
export interface TextFileStore {
  exists(filePath: string): Promise<boolean>;
  readAll(filePath: string): Promise<string>;
  writeAll(filePath: string, content: string): Promise<void>;
  ensureDirectory(directoryPath: string): Promise<void>;
}

// ============================================================================
// Formats
// ============================================================================

export type SettingsFormatName = "json" | "yaml";

// ============================================================================
// Constants
// ============================================================================

export const CONSTANTS = {
  /** AES-256-GCM IV length in bytes. */
  IV_LENGTH: 12,
  /** AES-256-GCM auth tag length in bytes. */
  AUTH_TAG_LENGTH: 16,
  /** Derived key length in bytes (256 bits). */
  KEY_LENGTH: 32,
  /** PBKDF2 iteration count for encryption keys. */
  KDF_ITERATIONS: 100000,
  /** PBKDF2 digest. */
  KDF_DIGEST: "sha256",
  /** Random salt length for password hashes. */
  HASH_SALT_LENGTH: 16,
  /** scrypt output length for password hashes. */
  HASH_LENGTH: 32,
  /** Scheme tag written at the front of every password hash. */
  HASH_SCHEME: "scrypt",
  /** Reserved top-level key holding the password hash. */
  PASSWORD_HASH_FIELD: "passwordHash",
} as const;
