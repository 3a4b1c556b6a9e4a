/**
 * Graph Walker
 *
 * Typed visitor over a settings object graph, driven by the descriptor
 * tables. Handles:
 * - decryption of loaded values (decryptGraph)
 * - in-place encryption before a save (encryptGraph)
 * - the save cascade into nested documents (saveNestedDocuments)
 * - serialization to plain data (toPlain)
 *
 * Each pass owns a VisitedSet, so shared references are processed once
 * and back-references terminate.
 */

import type { FieldDescriptor, ObjectShape, TypeNode } from "./descriptor.js";
import { hasAnyEncryptedField, holdsDocuments, reachesEncryptedField } from "./descriptor.js";
import { DecryptionError, ValidationError } from "./errors.js";
import type { KeySession } from "./key-session.js";
import type { Logger } from "./logger.js";
import type { VisitedSet } from "./visited-set.js";

// ============================================================================
// Types
// ============================================================================

/** Capability key for documents that take part in a save cascade. */
export const CASCADE_SAVE = Symbol("sealed-settings.cascadeSave");

/**
 * Implemented by every settings document. The walker calls it for each
 * document reachable from the one being saved.
 */
export interface CascadingDocument {
  [CASCADE_SAVE](visited: VisitedSet): Promise<boolean>;
}

export function isCascadingDocument(value: unknown): value is CascadingDocument {
  return typeof value === "object" && value !== null && CASCADE_SAVE in value;
}

/** The field a value was read from. */
export interface Slot {
  readonly owner: object;
  readonly field: FieldDescriptor;
}

export interface WalkContext {
  readonly visited: VisitedSet;
  readonly logger: Logger;
  /** Returns the unlocked session; throws InvalidStateError otherwise. */
  session(): KeySession;
}

export interface EncryptContext extends WalkContext {
  readonly ledger: CiphertextLedger;
}

interface IssuedCiphertext {
  readonly ciphertext: string;
  readonly issuer: KeySession;
}

/**
 * Remembers which session wrote the ciphertext held by each slot.
 *
 * A slot that still holds its issuer's ciphertext is not encrypted again by
 * that session. Another document reaching the same object through its own
 * graph re-keys the slot instead, so each file holds ciphertext under its
 * own document's key.
 */
export class CiphertextLedger {
  private readonly issued = new WeakMap<object, Map<string, IssuedCiphertext>>();

  record(owner: object, fieldName: string, ciphertext: string, issuer: KeySession): void {
    let fields = this.issued.get(owner);
    if (!fields) {
      fields = new Map();
      this.issued.set(owner, fields);
    }
    fields.set(fieldName, { ciphertext, issuer });
  }

  /** The session that produced `value` for this slot, if any. */
  issuerOf(owner: object, fieldName: string, value: string): KeySession | undefined {
    const entry = this.issued.get(owner)?.get(fieldName);
    return entry?.ciphertext === value ? entry.issuer : undefined;
  }
}

/** Shared by every document, since objects can be reachable from several. */
export const sharedLedger = new CiphertextLedger();

function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null;
}

// ============================================================================
// Decryption
// ============================================================================

/**
 * Decrypt a loaded value according to its declared type.
 *
 * Encrypted slots that fail to decrypt keep their stored value and log a
 * warning. Empty ciphertext becomes null.
 */
export function decryptGraph(raw: unknown, type: TypeNode, ctx: WalkContext, slot?: Slot): unknown {
  if (raw === null || raw === undefined) return raw;

  if (slot?.field.encrypted && typeof raw === "string") {
    return decryptSlot(raw, slot, ctx);
  }

  switch (type.kind) {
    case "array": {
      if (!Array.isArray(raw) || !reachesEncryptedField(type.element)) return raw;
      const items: readonly unknown[] = raw;
      const element = type.element;
      return items.map((item) => decryptGraph(item, element, ctx));
    }
    case "object": {
      const shape = type.shape();
      if (!isObject(raw) || !hasAnyEncryptedField(shape)) return raw;
      decryptObject(raw, shape, ctx);
      return raw;
    }
    default:
      return raw;
  }
}

function decryptObject(target: object, shape: ObjectShape, ctx: WalkContext): void {
  if (!ctx.visited.claim(target)) return;

  for (const descriptor of shape.fields) {
    if (!descriptor.encrypted && !reachesEncryptedField(descriptor.type)) continue;

    const current = descriptor.get(target);
    descriptor.set(target, decryptGraph(current, descriptor.type, ctx, { owner: target, field: descriptor }));
  }
}

function decryptSlot(ciphertext: string, slot: Slot, ctx: WalkContext): string | null {
  if (!ctx.visited.claimSlot(slot.owner, slot.field.name)) {
    return ciphertext;
  }

  const session = ctx.session();

  if (ciphertext.trim() === "") {
    return null;
  }

  try {
    return session.decrypt(ciphertext);
  } catch (error) {
    if (!(error instanceof DecryptionError)) throw error;

    ctx.logger.warn(`Could not decrypt "${slot.field.name}", keeping the stored value. ${error.message}`);
    return ciphertext;
  }
}

// ============================================================================
// Encryption
// ============================================================================

/**
 * Replace every encrypted slot holding text with its ciphertext, in place.
 * Returns the number of slots encrypted.
 *
 * The object stays encrypted after the save; reload to read plaintext again.
 */
export function encryptGraph(root: object, shape: ObjectShape, ctx: EncryptContext): number {
  return encryptObject(root, shape, ctx);
}

function encryptObject(target: object, shape: ObjectShape, ctx: EncryptContext): number {
  if (!ctx.visited.claim(target)) return 0;

  let count = 0;
  for (const descriptor of shape.fields) {
    const value = descriptor.get(target);

    if (descriptor.encrypted) {
      if (typeof value === "string" && encryptSlot(target, descriptor, value, ctx)) {
        count += 1;
      }
      continue;
    }

    if (reachesEncryptedField(descriptor.type)) {
      count += encryptValue(value, descriptor.type, ctx);
    }
  }

  return count;
}

function encryptSlot(target: object, descriptor: FieldDescriptor, value: string, ctx: EncryptContext): boolean {
  const session = ctx.session();
  const issuer = ctx.ledger.issuerOf(target, descriptor.name, value);
  if (issuer === session) return false;

  const plaintext = issuer ? issuer.decrypt(value) : value;
  const ciphertext = session.encrypt(plaintext);
  descriptor.set(target, ciphertext);
  ctx.ledger.record(target, descriptor.name, ciphertext, session);
  return true;
}

function encryptValue(value: unknown, type: TypeNode, ctx: EncryptContext): number {
  if (!isObject(value)) return 0;

  if (type.kind === "array" && Array.isArray(value)) {
    const items: readonly unknown[] = value;
    const element = type.element;
    return items.reduce<number>((sum, item) => sum + encryptValue(item, element, ctx), 0);
  }

  if (type.kind === "object") {
    return encryptObject(value, type.shape(), ctx);
  }

  return 0;
}

// ============================================================================
// Save Cascade
// ============================================================================

/**
 * Save every document reachable from `root` through fields, collection
 * elements and nested objects. Returns false if any nested save failed.
 */
export async function saveNestedDocuments(
  root: object,
  shape: ObjectShape,
  visited: VisitedSet,
): Promise<boolean> {
  let ok = true;

  for (const descriptor of shape.fields) {
    const value = descriptor.get(root);
    if (!(await saveReachable(value, descriptor.type, visited))) {
      ok = false;
    }
  }

  return ok;
}

async function saveReachable(value: unknown, type: TypeNode, visited: VisitedSet): Promise<boolean> {
  if (!isObject(value)) return true;

  switch (type.kind) {
    case "document":
      return isCascadingDocument(value) ? value[CASCADE_SAVE](visited) : true;
    case "array": {
      if (!Array.isArray(value)) return true;
      const items: readonly unknown[] = value;
      let ok = true;
      for (const item of items) {
        if (!(await saveReachable(item, type.element, visited))) ok = false;
      }
      return ok;
    }
    case "object":
      if (!visited.claim(value)) return true;
      return saveNestedDocuments(value, type.shape(), visited);
    default:
      return true;
  }
}

// ============================================================================
// Serialization
// ============================================================================

/**
 * Plain data for one value, following its declared type.
 * Document slots, collections of documents and undeclared properties are
 * left out.
 */
export function toPlain(value: unknown, type: TypeNode, path: readonly object[] = []): unknown {
  if (value === null || value === undefined) return null;

  switch (type.kind) {
    case "array": {
      if (!Array.isArray(value)) return null;
      const items: readonly unknown[] = value;
      const element = type.element;
      return items.map((item) => toPlain(item, element, path));
    }
    case "object":
      return isObject(value) ? shapeToPlain(value, type.shape(), path) : null;
    case "document":
      return undefined;
    default:
      return value;
  }
}

/**
 * Plain record of an object's declared fields.
 * Throws ValidationError on a reference cycle between plain objects.
 */
export function shapeToPlain(
  target: object,
  shape: ObjectShape,
  path: readonly object[] = [],
): Record<string, unknown> {
  if (path.includes(target)) {
    throw new ValidationError(`Circular reference in ${shape.name} cannot be serialized`);
  }

  const ancestors = [...path, target];
  const plain: Record<string, unknown> = {};

  for (const descriptor of shape.fields) {
    if (holdsDocuments(descriptor.type)) continue;
    plain[descriptor.name] = toPlain(descriptor.get(target), descriptor.type, ancestors);
  }

  return plain;
}
