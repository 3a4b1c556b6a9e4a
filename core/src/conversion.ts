/**
 * Converts raw parsed values into the declared field types.
 *
 * zod schemas are generated from the descriptor tables and cached per shape.
 * Values that fail validation raise a ConversionError listing the issues.
 */

import { z } from "zod";

import type { ObjectShape, TypeNode } from "./descriptor.js";
import { holdsDocuments } from "./descriptor.js";
import { ConversionError } from "./errors.js";

const objectSchemaCache = new WeakMap<ObjectShape, z.ZodTypeAny>();

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Schema accepting the stored form of a type. Collection elements never
 * accept null; the slot itself does when `nullable` is set.
 */
export function schemaFor(type: TypeNode, nullable = true): z.ZodTypeAny {
  const schema = baseSchema(type);
  return nullable ? schema.nullable() : schema;
}

function baseSchema(type: TypeNode): z.ZodTypeAny {
  switch (type.kind) {
    case "string":
      return z.string();
    case "number":
      return z.number();
    case "boolean":
      return z.boolean();
    case "array":
      return z.array(schemaFor(type.element, false));
    case "object": {
      const shape = type.shape;
      return z.lazy(() => objectSchema(shape()));
    }
    case "document":
      return z.unknown();
  }
}

function objectSchema(shape: ObjectShape): z.ZodTypeAny {
  const cached = objectSchemaCache.get(shape);
  if (cached) return cached;

  const members: Record<string, z.ZodTypeAny> = {};
  for (const descriptor of shape.fields) {
    if (holdsDocuments(descriptor.type)) continue;
    members[descriptor.name] = schemaFor(descriptor.type, descriptor.nullable).optional();
  }

  // Unknown keys are stripped.
  const schema = z.object(members);
  objectSchemaCache.set(shape, schema);
  return schema;
}

/**
 * Validate a raw value against its declared type and build typed instances
 * for composite values.
 */
export function convertValue(raw: unknown, type: TypeNode, fieldName: string, nullable = true): unknown {
  const parsed = schemaFor(type, nullable).safeParse(raw);
  if (!parsed.success) {
    throw new ConversionError(
      fieldName,
      parsed.error.issues.map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join(".") : fieldName;
        return `${where}: ${issue.message}`;
      }),
    );
  }

  const data: unknown = parsed.data;
  return materialize(data, type);
}

function materialize(value: unknown, type: TypeNode): unknown {
  if (value === null || value === undefined) return null;

  switch (type.kind) {
    case "array": {
      if (!Array.isArray(value)) return value;
      const items: readonly unknown[] = value;
      const element = type.element;
      return items.map((item) => materialize(item, element));
    }
    case "object":
      return isRecord(value) ? build(type.shape(), value) : value;
    default:
      return value;
  }
}

function build(shape: ObjectShape, data: Record<string, unknown>): object {
  const target: object = shape.create ? shape.create() : {};

  for (const descriptor of shape.fields) {
    if (holdsDocuments(descriptor.type)) continue;

    const value = data[descriptor.name];
    if (value === undefined) continue;

    descriptor.set(target, materialize(value, descriptor.type));
  }

  return target;
}
