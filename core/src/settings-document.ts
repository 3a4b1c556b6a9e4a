/**
 * Settings Document
 *
 * Base class for application settings persisted to one file. Subclasses
 * declare their fields with a descriptor table:
 *
 * ```ts
 * const API_SHAPE = defineShape<ApiSettings>("ApiSettings", {
 *   apiKey: field.secret(),
 *   retries: field.number(),
 * });
 *
 * class ApiSettings extends SettingsDocument {
 *   apiKey: string | null = null;
 *   retries = 3;
 *   protected describe() { return API_SHAPE; }
 * }
 *
 * const settings = await SettingsDocument.open(ApiSettings, dir, "api");
 * ```
 *
 * A document instance has a single owner: do not run load() and save()
 * on the same instance concurrently.
 */

import * as path from "path";

import { convertValue, isRecord } from "./conversion.js";
import type { ObjectShape } from "./descriptor.js";
import { hasAnyEncryptedField, holdsDocuments } from "./descriptor.js";
import { ConversionError, InvalidStateError, StructuralParseError, ValidationError, errorMessage } from "./errors.js";
import { NodeFileStore } from "./file-store.js";
import type { SettingsFormat } from "./formats.js";
import { getFormat, normalizeFileName } from "./formats.js";
import type { CascadingDocument, EncryptContext, WalkContext } from "./graph-walker.js";
import {
  CASCADE_SAVE,
  decryptGraph,
  encryptGraph,
  saveNestedDocuments,
  shapeToPlain,
  sharedLedger,
} from "./graph-walker.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import type { PasswordGateState } from "./password-gate.js";
import { PasswordGate } from "./password-gate.js";
import type { Prompter, SettingsFormatName, TextFileStore } from "./types.js";
import { CONSTANTS } from "./types.js";
import { VisitedSet } from "./visited-set.js";

// ============================================================================
// Options
// ============================================================================

export interface DocumentOptions {
  /** Encryption password. When omitted and one is needed, the prompter asks. */
  password?: string;
  prompter?: Prompter;
  fileStore?: TextFileStore;
  format?: SettingsFormatName;
  logger?: Logger;
}

interface ResolvedOptions {
  password?: string;
  prompter?: Prompter;
  fileStore: TextFileStore;
  format: SettingsFormatName;
  logger: Logger;
}

export const DEFAULT_DOCUMENT_OPTIONS: { readonly format: SettingsFormatName } = {
  format: "json",
};

export type DocumentConstructor<T extends SettingsDocument> = new (
  directory: string,
  fileName: string,
  options?: DocumentOptions,
) => T;

// ============================================================================
// Document
// ============================================================================

export abstract class SettingsDocument implements CascadingDocument {
  private readonly settingsDirectory: string;
  private readonly settingsFileName: string;
  private readonly format: SettingsFormat;
  private readonly options: ResolvedOptions;
  private gate: PasswordGate | null = null;
  private storedHash: string | null = null;

  constructor(directory: string, fileName: string, options: DocumentOptions = {}) {
    if (!directory?.trim() || !fileName?.trim()) {
      throw new ValidationError("Both directory path and file name must be provided.");
    }

    this.options = {
      password: options.password,
      prompter: options.prompter,
      format: options.format ?? DEFAULT_DOCUMENT_OPTIONS.format,
      fileStore: options.fileStore ?? new NodeFileStore(),
      logger: options.logger ?? createConsoleLogger("SettingsDocument"),
    };
    this.format = getFormat(this.options.format);
    this.settingsDirectory = directory;
    this.settingsFileName = normalizeFileName(fileName.trim(), this.format);
  }

  /**
   * The field table of the concrete settings type. Return a shared constant:
   * analysis results are cached per table.
   */
  protected abstract describe(): ObjectShape;

  /**
   * Construct and initialize a document.
   */
  static async open<T extends SettingsDocument>(
    ctor: DocumentConstructor<T>,
    directory: string,
    fileName: string,
    options?: DocumentOptions,
  ): Promise<T> {
    const document = new ctor(directory, fileName, options);
    await document.initialize();
    return document;
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  get directory(): string {
    return this.settingsDirectory;
  }

  get fileName(): string {
    return this.settingsFileName;
  }

  get filePath(): string {
    return path.join(this.settingsDirectory, this.settingsFileName);
  }

  /** Hash persisted under the reserved `passwordHash` key. */
  get passwordHash(): string | null {
    return this.gate?.passwordHash ?? this.storedHash;
  }

  get state(): PasswordGateState {
    return this.gate?.state ?? "NeedPassword";
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Unlock (prompting if needed) and load the file if it exists.
   *
   * When no password exists yet and one is created at the prompt, the
   * document is saved immediately, before the caller sets any field.
   */
  async initialize(): Promise<void> {
    const shape = this.describe();
    if (shape.fields.some((descriptor) => descriptor.name.toLowerCase() === CONSTANTS.PASSWORD_HASH_FIELD.toLowerCase())) {
      throw new ValidationError(`"${CONSTANTS.PASSWORD_HASH_FIELD}" is reserved and cannot be declared by ${shape.name}`);
    }

    const gate = new PasswordGate({
      requiresEncryption: hasAnyEncryptedField(shape),
      prompter: this.options.prompter,
      logger: this.options.logger,
    });
    this.gate = gate;

    const data = await this.readData();
    this.storedHash = readPasswordHash(data);

    let applied = false;
    await gate.unlock({
      storedHash: this.storedHash,
      password: this.options.password,
      onPasswordCreated: async () => {
        if (data) {
          this.apply(data, shape);
          applied = true;
        }
        await this.save();
      },
    });

    if (data && !applied) {
      this.apply(data, shape);
    }
  }

  /**
   * Re-read the file. A supplied password is verified against the stored
   * hash before anything is decrypted.
   */
  async load(password?: string): Promise<void> {
    const gate = this.requireGate();
    const shape = this.describe();

    const data = await this.readData();
    this.storedHash = readPasswordHash(data);

    if (password !== undefined && gate.state !== "NoEncryptionNeeded") {
      await gate.unlock({ storedHash: this.storedHash, password });
    }

    if (data) {
      this.apply(data, shape);
    }
  }

  /**
   * Encrypt, write, then save every nested document.
   * Failures are logged and reported as `false`.
   */
  async save(): Promise<boolean> {
    return this[CASCADE_SAVE](new VisitedSet());
  }

  async [CASCADE_SAVE](visited: VisitedSet): Promise<boolean> {
    if (!visited.claim(this)) return true;

    const shape = this.describe();

    try {
      const gate = this.requireGate();
      await this.options.fileStore.ensureDirectory(this.settingsDirectory);

      if (gate.state !== "NoEncryptionNeeded") {
        const encrypted = encryptGraph(this, shape, this.encryptContext());
        this.options.logger.debug(`Encrypted ${encrypted} field(s) in ${this.filePath}`);
      }

      await this.options.fileStore.writeAll(this.filePath, this.format.stringify(this.serialize(shape)));
    } catch (error) {
      this.options.logger.error(`Failed to save settings to ${this.filePath}: ${errorMessage(error)}`);
      return false;
    }

    return saveNestedDocuments(this, shape, visited);
  }

  /** End the key session. */
  dispose(): void {
    this.gate?.dispose();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private requireGate(): PasswordGate {
    if (!this.gate) {
      throw new InvalidStateError("Document is not initialized; call initialize() or SettingsDocument.open()");
    }
    return this.gate;
  }

  private walkContext(visited: VisitedSet): WalkContext {
    const gate = this.requireGate();
    return {
      visited,
      logger: this.options.logger,
      session: () => gate.session,
    };
  }

  private encryptContext(): EncryptContext {
    return { ...this.walkContext(new VisitedSet()), ledger: sharedLedger };
  }

  private async readData(): Promise<Record<string, unknown> | null> {
    const store = this.options.fileStore;
    if (!(await store.exists(this.filePath))) return null;

    const text = await store.readAll(this.filePath);
    if (text.trim() === "") {
      this.options.logger.warn(`Settings file is empty, keeping defaults: ${this.filePath}`);
      return null;
    }

    let parsed: unknown;
    try {
      parsed = this.format.parse(text);
    } catch (error) {
      throw new StructuralParseError(this.filePath, error);
    }

    if (!isRecord(parsed)) {
      throw new StructuralParseError(this.filePath, new Error("top-level value is not an object"));
    }
    return parsed;
  }

  private apply(data: Record<string, unknown>, shape: ObjectShape): void {
    const values = new Map<string, unknown>();
    for (const [key, value] of Object.entries(data)) {
      values.set(key.toLowerCase(), value);
    }

    const context = this.walkContext(new VisitedSet());

    for (const descriptor of shape.fields) {
      const key = descriptor.name.toLowerCase();
      if (holdsDocuments(descriptor.type) || !values.has(key)) continue;

      let converted: unknown;
      try {
        converted = convertValue(values.get(key), descriptor.type, descriptor.name, descriptor.nullable);
      } catch (error) {
        if (!(error instanceof ConversionError)) throw error;
        this.options.logger.warn(`Skipping "${descriptor.name}" in ${this.filePath}: ${error.message}`);
        continue;
      }

      descriptor.set(this, decryptGraph(converted, descriptor.type, context, { owner: this, field: descriptor }));
    }
  }

  private serialize(shape: ObjectShape): Record<string, unknown> {
    const payload: Record<string, unknown> = {};
    const hash = this.passwordHash;
    if (hash !== null) {
      payload[CONSTANTS.PASSWORD_HASH_FIELD] = hash;
    }
    return Object.assign(payload, shapeToPlain(this, shape));
  }
}

function readPasswordHash(data: Record<string, unknown> | null): string | null {
  if (!data) return null;

  const wanted = CONSTANTS.PASSWORD_HASH_FIELD.toLowerCase();
  for (const [key, value] of Object.entries(data)) {
    if (key.toLowerCase() === wanted && typeof value === "string" && value.trim() !== "") {
      return value;
    }
  }
  return null;
}
