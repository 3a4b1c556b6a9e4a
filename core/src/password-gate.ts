/**
 * Password Gate
 *
 * Decides whether a document needs a password at all and, if it does,
 * obtains one programmatically or interactively.
 *
 *   NoEncryptionNeeded  - the settings type has no encrypted field
 *   NeedPassword        - encryption is required, no key yet
 *   Unlocked            - a verified key session is held in memory
 */

import { verifyPassword } from "./crypto.js";
import { AuthenticationError, InvalidStateError } from "./errors.js";
import { KeySession } from "./key-session.js";
import type { Logger } from "./logger.js";
import type { Prompter } from "./types.js";

// ============================================================================
// Types
// ============================================================================

export type PasswordGateState = "NoEncryptionNeeded" | "NeedPassword" | "Unlocked";

export interface PasswordGateOptions {
  requiresEncryption: boolean;
  prompter?: Prompter;
  logger: Logger;
}

export interface UnlockRequest {
  /** Hash found in the settings file, if any. */
  storedHash: string | null;
  /** Password supplied by the caller; prompts when absent. */
  password?: string;
  /**
   * Runs right after a new password is created at the prompt.
   * The owning document saves itself here.
   */
  onPasswordCreated?: () => Promise<void>;
}

// ============================================================================
// Gate
// ============================================================================

export class PasswordGate {
  private currentState: PasswordGateState;
  private activeSession: KeySession | null = null;
  private options: PasswordGateOptions;

  constructor(options: PasswordGateOptions) {
    this.options = options;
    this.currentState = options.requiresEncryption ? "NeedPassword" : "NoEncryptionNeeded";
  }

  get state(): PasswordGateState {
    return this.currentState;
  }

  /** Hash of the password held by the current session. */
  get passwordHash(): string | null {
    return this.activeSession?.passwordHash ?? null;
  }

  /**
   * The unlocked key session. Asking for it in any other state is a
   * programming error.
   */
  get session(): KeySession {
    if (this.currentState !== "Unlocked" || !this.activeSession) {
      throw new InvalidStateError("Cannot use encrypted fields without an unlocked password");
    }
    return this.activeSession;
  }

  async unlock(request: UnlockRequest): Promise<PasswordGateState> {
    if (!this.options.requiresEncryption) {
      this.currentState = "NoEncryptionNeeded";
      return this.currentState;
    }

    if (request.password !== undefined) {
      this.unlockWith(request.password, request.storedHash);
    } else if (request.storedHash) {
      await this.promptForExisting(request.storedHash);
    } else {
      await this.promptForNew(request.onPasswordCreated);
    }

    return this.currentState;
  }

  /** End the session and zero its key. */
  dispose(): void {
    this.activeSession?.dispose();
    this.activeSession = null;
    if (this.currentState === "Unlocked") {
      this.currentState = "NeedPassword";
    }
  }

  private unlockWith(password: string, storedHash: string | null): void {
    if (storedHash) {
      if (!verifyPassword(password, storedHash)) {
        throw new AuthenticationError();
      }
      this.open(new KeySession(password, storedHash));
      return;
    }

    // First use: accepted as-is, the hash is written on the next save.
    this.options.logger.debug("No stored password hash; accepting the supplied password");
    this.open(KeySession.create(password));
  }

  private async promptForExisting(storedHash: string): Promise<void> {
    const prompter = this.requirePrompter();
    prompter.notify("Encryption is enabled for these settings.");
    prompter.notify("Please enter the encryption password:");

    while (true) {
      const input = await this.readSecret(prompter, "Encryption password");

      if (input.trim() === "") {
        prompter.notify("Password cannot be empty.");
        continue;
      }

      if (verifyPassword(input, storedHash)) {
        this.open(new KeySession(input, storedHash));
        prompter.notify("Password accepted.");
        return;
      }

      prompter.notify("Incorrect password. Try again.");
    }
  }

  private async promptForNew(onPasswordCreated?: () => Promise<void>): Promise<void> {
    const prompter = this.requirePrompter();
    prompter.notify("Encryption is enabled for these settings.");
    prompter.notify("Please create a new encryption password:");

    while (true) {
      const first = await this.readSecret(prompter, "New password");

      if (first.trim() === "") {
        prompter.notify("Password cannot be empty.");
        continue;
      }

      const confirmation = await this.readSecret(prompter, "Re-enter password to confirm");
      if (first !== confirmation) {
        prompter.notify("Passwords do not match. Please try again.");
        continue;
      }

      this.open(KeySession.create(first));
      if (onPasswordCreated) {
        await onPasswordCreated();
      }
      prompter.notify("Encryption password set successfully.");
      return;
    }
  }

  private async readSecret(prompter: Prompter, message: string): Promise<string> {
    const result = await prompter.readSecret(message);
    if (result.canceled) {
      throw new AuthenticationError("Password entry was canceled");
    }
    return result.value;
  }

  private requirePrompter(): Prompter {
    if (!this.options.prompter) {
      throw new AuthenticationError("A password is required but no prompter is available");
    }
    return this.options.prompter;
  }

  private open(session: KeySession): void {
    this.activeSession?.dispose();
    this.activeSession = session;
    this.currentState = "Unlocked";
  }
}
