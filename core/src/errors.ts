/**
 * Base error class for all sealed-settings errors.
 * Every subclass carries a stable `code`.
 */
export abstract class SettingsError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Thrown for malformed arguments, such as a blank directory or file name.
 */
export class ValidationError extends SettingsError {
  readonly code = "VALIDATION_ERROR";
}

/**
 * Thrown when a supplied password does not match the stored hash,
 * or when password entry is canceled. Never retried automatically.
 */
export class AuthenticationError extends SettingsError {
  readonly code = "AUTHENTICATION_ERROR";

  constructor(message = "Invalid encryption password provided") {
    super(message);
  }
}

/**
 * Thrown when a ciphertext is malformed or was produced under another key.
 */
export class DecryptionError extends SettingsError {
  readonly code = "DECRYPTION_ERROR";

  constructor(message: string) {
    super(`Decryption failed: ${message}`);
  }
}

/**
 * Thrown when a stored value cannot be converted to its declared field type.
 */
export class ConversionError extends SettingsError {
  readonly code = "CONVERSION_ERROR";

  constructor(
    readonly field: string,
    readonly issues: readonly string[],
  ) {
    super(`Cannot convert "${field}": ${issues.join("; ")}`);
  }
}

/**
 * Thrown when a settings file exists but is not readable structured text.
 */
export class StructuralParseError extends SettingsError {
  readonly code = "STRUCTURAL_PARSE_ERROR";

  constructor(
    readonly path: string,
    cause?: unknown,
  ) {
    const detail = cause instanceof Error ? ` - ${cause.message}` : "";
    super(`Invalid settings file: ${path}${detail}`, { cause });
  }
}

/**
 * Thrown when encrypted data is touched without an unlocked key session,
 * or a document is used before it was initialized.
 */
export class InvalidStateError extends SettingsError {
  readonly code = "INVALID_STATE";
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
