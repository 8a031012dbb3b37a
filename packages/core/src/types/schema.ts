export type SchemaType = "object" | "string" | "number" | "integer" | "boolean" | "array" | "null";

export const SCHEMA_TYPES: readonly SchemaType[] = ["object", "string", "number", "integer", "boolean", "array", "null"];

/**
 * The JSON-Schema subset enforced on tool input and output.
 * Other keywords (title, enum, default, ...) are carried through to tool listings untouched.
 */
export interface Schema {
  type?: SchemaType;
  description?: string;
  properties?: Record<string, Schema>;
  required?: string[];
  items?: Schema;
  [keyword: string]: unknown;
}
