/**
 * Shared statement types.
 */

/**
 * Anything that renders to statement text, with optional bound variables
 * sent alongside the text.
 */
export type Statement = Readonly<{
  render(): string;
  readonly bindings: Readonly<Record<string, unknown>>;
}>;

/**
 * What a write statement returns. A single tagged value so the modes
 * cannot be combined.
 */
export type ReturnMode = "none" | "before" | "after" | "diff";

/**
 * Where a statement reads from or writes to.
 */
export type StatementTarget =
  | Readonly<{ kind: "table"; table: string }>
  | Readonly<{ kind: "record"; id: string }>
  | Readonly<{ kind: "edge"; from: string; edge: string; to: string }>;

/**
 * A record given either by its ID or as an entity carrying one.
 */
export type RecordRef = string | Readonly<{ id: string }>;
