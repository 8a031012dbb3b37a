import type { Schema, SchemaType } from "@tooldeck/core";

export interface ValidationError {
  path: string;
  expected: string;
  actual: string;
  message: string;
}

/** JSON type name of a value; "unsupported" for things JSON cannot hold. */
export function jsonTypeOf(value: unknown): SchemaType | "unsupported" {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  switch (typeof value) {
    case "string":
      return "string";
    case "number":
      return Number.isFinite(value) ? "number" : "unsupported";
    case "boolean":
      return "boolean";
    case "object":
      return "object";
    default:
      return "unsupported";
  }
}

function matchesType(value: unknown, type: SchemaType): boolean {
  const actual = jsonTypeOf(value);
  if (type === "integer") return actual === "number" && Number.isInteger(value);
  return actual === type;
}

/**
 * Validate a value against the supported schema subset (type, properties,
 * required, items). Returns the first violation found, or undefined.
 * `description` and unknown keywords are not enforced. No schema means no constraint.
 */
export function validate(value: unknown, schema: Schema | undefined, root = "$"): ValidationError | undefined {
  if (!schema) return undefined;
  return validateAt(value, schema, root);
}

function validateAt(value: unknown, schema: Schema, path: string): ValidationError | undefined {
  if (schema.type && !matchesType(value, schema.type)) {
    const actual = jsonTypeOf(value);
    return {
      path,
      expected: schema.type,
      actual,
      message: `${path}: expected ${schema.type}, got ${actual}`,
    };
  }

  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    for (const field of schema.required ?? []) {
      if (!Object.hasOwn(value, field) || Reflect.get(value, field) === undefined) {
        const fieldPath = `${path}.${field}`;
        return {
          path: fieldPath,
          expected: "present",
          actual: "missing",
          message: `${fieldPath}: required field is missing`,
        };
      }
    }
    for (const [field, fieldSchema] of Object.entries(schema.properties ?? {})) {
      if (!Object.hasOwn(value, field)) continue;
      const error = validateAt(Reflect.get(value, field), fieldSchema, `${path}.${field}`);
      if (error) return error;
    }
  }

  if (Array.isArray(value) && schema.items) {
    for (let i = 0; i < value.length; i++) {
      const error = validateAt(value[i], schema.items, `${path}[${i}]`);
      if (error) return error;
    }
  }

  return undefined;
}
