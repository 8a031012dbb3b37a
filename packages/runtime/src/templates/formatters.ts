/** Turns a resolved template value into the text that replaces the expression. */
export type Formatter = (value: unknown) => string;

/** Strings as-is, numbers and booleans stringified, everything else compact JSON. */
export const formatValue: Formatter = (value) => {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value) ?? "";
};

/**
 * Percent-encodes everything except unreserved characters (A-Z a-z 0-9 - _ . ~).
 * Not idempotent: "%20" encodes to "%2520".
 */
export const urlEncode: Formatter = (value) =>
  encodeURIComponent(formatValue(value)).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );

/** Compact JSON, so strings come out quoted and escaped (for JSON bodies). */
export const jsonFormat: Formatter = (value) => JSON.stringify(value) ?? "null";

export class FormatterRegistry {
  private formatters = new Map<string, Formatter>();

  register(name: string, formatter: Formatter): this {
    this.formatters.set(name, formatter);
    return this;
  }

  get(name: string): Formatter | undefined {
    return this.formatters.get(name);
  }

  has(name: string): boolean {
    return this.formatters.has(name);
  }

  names(): string[] {
    return Array.from(this.formatters.keys());
  }
}

export function createDefaultFormatters(): FormatterRegistry {
  return new FormatterRegistry().register("url_encode", urlEncode).register("json", jsonFormat);
}
