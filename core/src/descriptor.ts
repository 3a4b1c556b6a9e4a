/**
 * Settings Descriptor
 *
 * Every settings type declares a static table of its fields: name, declared
 * type, encryption marker, accessors. The table is built once with
 * {@link defineShape} and reused for conversion, encryption, decryption,
 * serialization and the save cascade.
 */

// ============================================================================
// Types
// ============================================================================

export type TypeNode =
  | { readonly kind: "string" }
  | { readonly kind: "number" }
  | { readonly kind: "boolean" }
  | { readonly kind: "array"; readonly element: TypeNode }
  | { readonly kind: "object"; readonly shape: () => ObjectShape }
  | { readonly kind: "document" };

export type TypeKind = TypeNode["kind"];

/** Display metadata for a field. */
export interface FieldInfo {
  readonly label: string;
  readonly description?: string;
}

/** Display metadata plus whether a stored null is accepted. */
export interface FieldOptions extends Partial<FieldInfo> {
  readonly nullable?: boolean;
}

export interface FieldSpec {
  readonly type: TypeNode;
  readonly encrypted: boolean;
  readonly nullable: boolean;
  readonly info?: Partial<FieldInfo>;
}

export interface FieldDescriptor {
  readonly name: string;
  readonly type: TypeNode;
  /** Only string fields can carry the marker. */
  readonly encrypted: boolean;
  /** Whether a null read from disk is assigned or rejected. */
  readonly nullable: boolean;
  readonly info: FieldInfo;
  get(target: object): unknown;
  set(target: object, value: unknown): void;
}

export interface ObjectShape<T extends object = object> {
  readonly name: string;
  readonly fields: readonly FieldDescriptor[];
  /** Builds a default instance when a composite value is read from disk. */
  create?(): T;
}

export type ShapeFields<T> = { readonly [K in keyof T & string]?: FieldSpec };

export interface EncryptedField {
  readonly owner: ObjectShape;
  readonly field: FieldDescriptor;
}

// ============================================================================
// Builders
// ============================================================================

const STRING_TYPE: TypeNode = { kind: "string" };
const NUMBER_TYPE: TypeNode = { kind: "number" };
const BOOLEAN_TYPE: TypeNode = { kind: "boolean" };
const DOCUMENT_TYPE: TypeNode = { kind: "document" };

/** Type nodes, for collection elements. */
export const t = {
  string: (): TypeNode => STRING_TYPE,
  number: (): TypeNode => NUMBER_TYPE,
  boolean: (): TypeNode => BOOLEAN_TYPE,
  array: (element: TypeNode): TypeNode => ({ kind: "array", element }),
  /** Pass a thunk when the shape refers to itself or is declared later. */
  object: (shape: ObjectShape | (() => ObjectShape)): TypeNode => ({
    kind: "object",
    shape: typeof shape === "function" ? shape : () => shape,
  }),
  document: (): TypeNode => DOCUMENT_TYPE,
};

function slot(type: TypeNode, encrypted: boolean, nullByDefault: boolean, options?: FieldOptions): FieldSpec {
  const nullable = options?.nullable ?? nullByDefault;
  if (!options) return { type, encrypted, nullable };
  return { type, encrypted, nullable, info: { label: options.label, description: options.description } };
}

/**
 * Field slots. Strings, objects and documents accept null unless
 * `nullable: false` is passed; numbers, booleans and collections do not
 * unless `nullable: true` is passed.
 */
export const field = {
  string: (options?: FieldOptions): FieldSpec => slot(STRING_TYPE, false, true, options),
  /** A string stored as ciphertext. */
  secret: (options?: FieldOptions): FieldSpec => slot(STRING_TYPE, true, true, options),
  number: (options?: FieldOptions): FieldSpec => slot(NUMBER_TYPE, false, false, options),
  boolean: (options?: FieldOptions): FieldSpec => slot(BOOLEAN_TYPE, false, false, options),
  array: (element: TypeNode, options?: FieldOptions): FieldSpec => slot(t.array(element), false, false, options),
  object: (shape: ObjectShape | (() => ObjectShape), options?: FieldOptions): FieldSpec =>
    slot(t.object(shape), false, true, options),
  /**
   * A nested settings document. Never written into the owner's file;
   * saved through the owner's save cascade instead.
   */
  document: (options?: FieldOptions): FieldSpec => slot(DOCUMENT_TYPE, false, true, options),
};

/**
 * Build the field table for a settings type.
 */
export function defineShape<T extends object>(
  name: string,
  fields: ShapeFields<T>,
  create?: () => T,
): ObjectShape<T> {
  const entries: Array<[string, FieldSpec | undefined]> = Object.entries(fields);
  const descriptors: FieldDescriptor[] = [];

  for (const [fieldName, spec] of entries) {
    if (!spec) continue;

    descriptors.push({
      name: fieldName,
      type: spec.type,
      encrypted: spec.encrypted,
      nullable: spec.nullable,
      info: {
        label: spec.info?.label ?? fieldName,
        description: spec.info?.description,
      },
      get: (target) => Reflect.get(target, fieldName),
      set: (target, value) => {
        Reflect.set(target, fieldName, value);
      },
    });
  }

  return { name, fields: descriptors, create };
}

/**
 * Look up a field by name (case-insensitive).
 */
export function findField(shape: ObjectShape, name: string): FieldDescriptor | undefined {
  const wanted = name.toLowerCase();
  return shape.fields.find((descriptor) => descriptor.name.toLowerCase() === wanted);
}

/**
 * Display name and description of a field, defaulting to its name.
 */
export function getFieldInfo(shape: ObjectShape, name: string): FieldInfo {
  return findField(shape, name)?.info ?? { label: name };
}

// ============================================================================
// Encrypted Field Analysis
// ============================================================================

const encryptedFieldCache = new WeakMap<ObjectShape, readonly EncryptedField[]>();
const hasEncryptedCache = new WeakMap<ObjectShape, boolean>();

/**
 * Every encrypted field reachable from a shape, at any depth, paired with the
 * shape that declares it. Nested documents are not entered.
 */
export function getEncryptedFields(shape: ObjectShape): readonly EncryptedField[] {
  const cached = encryptedFieldCache.get(shape);
  if (cached) return cached;

  const found: EncryptedField[] = [];
  collectEncrypted(shape, found, new Set());
  encryptedFieldCache.set(shape, found);
  return found;
}

function collectEncrypted(shape: ObjectShape, found: EncryptedField[], seen: Set<ObjectShape>): void {
  if (seen.has(shape)) return;
  seen.add(shape);

  for (const descriptor of shape.fields) {
    if (descriptor.encrypted) {
      found.push({ owner: shape, field: descriptor });
    }
    collectFromType(descriptor.type, found, seen);
  }
}

function collectFromType(type: TypeNode, found: EncryptedField[], seen: Set<ObjectShape>): void {
  if (type.kind === "array") {
    collectFromType(type.element, found, seen);
  } else if (type.kind === "object") {
    collectEncrypted(type.shape(), found, seen);
  }
}

/**
 * Whether any encrypted field is reachable from a shape. Short-circuits.
 */
export function hasAnyEncryptedField(shape: ObjectShape): boolean {
  const cached = hasEncryptedCache.get(shape);
  if (cached !== undefined) return cached;

  const result = searchShape(shape, new Set());
  hasEncryptedCache.set(shape, result);
  return result;
}

/**
 * Whether a value of this type is, or is a collection of, nested documents.
 * Such values live in their own files and are never read from or written
 * to the owner's.
 */
export function holdsDocuments(type: TypeNode): boolean {
  if (type.kind === "document") return true;
  return type.kind === "array" && holdsDocuments(type.element);
}

/**
 * Whether a value of this type can hold an encrypted slot.
 */
export function reachesEncryptedField(type: TypeNode): boolean {
  switch (type.kind) {
    case "array":
      return reachesEncryptedField(type.element);
    case "object":
      return hasAnyEncryptedField(type.shape());
    default:
      return false;
  }
}

function searchShape(shape: ObjectShape, seen: Set<ObjectShape>): boolean {
  if (seen.has(shape)) return false;
  seen.add(shape);

  return shape.fields.some((descriptor) => descriptor.encrypted || searchType(descriptor.type, seen));
}

function searchType(type: TypeNode, seen: Set<ObjectShape>): boolean {
  if (type.kind === "array") return searchType(type.element, seen);
  if (type.kind === "object") return searchShape(type.shape(), seen);
  return false;
}
