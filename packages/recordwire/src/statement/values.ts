/**
 * Literal formatting for values embedded in statement text.
 */

/**
 * A fragment inserted into statement text as-is, such as a record ID,
 * a parameter reference or a function call.
 */
export class RawValue {
  readonly text: string;

  constructor(text: string) {
    this.text = text;
  }
}

/**
 * Marks `text` to be written verbatim.
 *
 * @example
 * ```typescript
 * update("user:alice").set("friend", raw("user:bob")).render();
 * // UPDATE user:alice SET friend = user:bob
 * ```
 */
export function raw(text: string): RawValue {
  return new RawValue(text);
}

/**
 * Formats a value as a statement literal. `undefined` is `NONE`, `null`
 * is `NULL`, raw values pass through and the rest is JSON.
 */
export function formatValue(value: unknown): string {
  if (value === undefined) return "NONE";
  if (value === null) return "NULL";
  if (value instanceof RawValue) return value.text;
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "number" && !Number.isFinite(value)) return "NONE";
  return JSON.stringify(value);
}

/**
 * Formats a data object as a `CONTENT`/`MERGE` body.
 */
export function formatObject(data: Readonly<Record<string, unknown>>): string {
  return JSON.stringify(data, (_key, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value,
  );
}
