/**
 * Statement clauses.
 *
 * Each clause renders to a standalone fragment of statement text, or to
 * `""` when nothing was added. The statement builders join non-empty
 * fragments in a fixed order, so no clause needs to know its neighbours.
 */
import { ConfigurationError } from "../errors";

// ============================================================
// Types
// ============================================================

export type Clause = Readonly<{
  isEmpty(): boolean;
  render(): string;
}>;

export type SortDirection = "asc" | "desc";

export type OrderEntry = Readonly<{
  field: string;
  direction: SortDirection;
}>;

// ============================================================
// Filter
// ============================================================

const LEADING_OPERATOR = /^(and|or)\s/i;

/**
 * `WHERE` clause.
 *
 * Conditions are joined with `AND` unless a condition already starts with
 * `AND ` or `OR `. The first condition never carries a leading operator.
 */
export class FilterClause implements Clause {
  readonly #conditions: string[] = [];

  add(condition: string): this {
    const trimmed = condition.trim();
    if (trimmed.length > 0) {
      this.#conditions.push(trimmed);
    }
    return this;
  }

  and(condition: string): this {
    return this.add(`AND ${stripOperator(condition)}`);
  }

  or(condition: string): this {
    return this.add(`OR ${stripOperator(condition)}`);
  }

  isEmpty(): boolean {
    return this.#conditions.length === 0;
  }

  render(): string {
    if (this.isEmpty()) return "";

    const parts = this.#conditions.map((condition, index) => {
      if (index === 0) return stripOperator(condition);
      return LEADING_OPERATOR.test(condition) ? condition : `AND ${condition}`;
    });

    return `WHERE ${parts.join(" ")}`;
  }
}

function stripOperator(condition: string): string {
  return condition.trim().replace(LEADING_OPERATOR, "").trim();
}

// ============================================================
// Field Lists
// ============================================================

/**
 * A keyword followed by a comma-joined field list. Adding a field that is
 * already present is a no-op.
 */
abstract class FieldListClause implements Clause {
  readonly #fields: string[] = [];

  protected abstract readonly keyword: string;

  add(...fields: readonly string[]): this {
    for (const field of fields) {
      const trimmed = field.trim();
      if (trimmed.length > 0 && !this.#fields.includes(trimmed)) {
        this.#fields.push(trimmed);
      }
    }
    return this;
  }

  get fields(): readonly string[] {
    return this.#fields;
  }

  isEmpty(): boolean {
    return this.#fields.length === 0;
  }

  render(): string {
    if (this.isEmpty()) return "";
    return `${this.keyword} ${this.#fields.join(", ")}`;
  }
}

/**
 * `GROUP BY a, b`, or `GROUP ALL` once {@link GroupByClause.all} is called.
 */
export class GroupByClause extends FieldListClause {
  protected readonly keyword = "GROUP BY";
  #all = false;

  all(): this {
    this.#all = true;
    return this;
  }

  override isEmpty(): boolean {
    return !this.#all && super.isEmpty();
  }

  override render(): string {
    return this.#all ? "GROUP ALL" : super.render();
  }
}

export class FetchClause extends FieldListClause {
  protected readonly keyword = "FETCH";
}

export class OmitClause extends FieldListClause {
  protected readonly keyword = "OMIT";
}

export class SplitClause extends FieldListClause {
  protected readonly keyword = "SPLIT";
}

// ============================================================
// Ordering
// ============================================================

export class OrderByClause implements Clause {
  readonly #entries: OrderEntry[] = [];

  add(field: string, direction: SortDirection = "asc"): this {
    const trimmed = field.trim();
    if (
      trimmed.length > 0 &&
      !this.#entries.some((entry) => entry.field === trimmed)
    ) {
      this.#entries.push({ field: trimmed, direction });
    }
    return this;
  }

  /**
   * Changes the direction of the most recently added field.
   */
  setDirection(direction: SortDirection): this {
    const last = this.#entries.at(-1);
    if (last !== undefined) {
      this.#entries[this.#entries.length - 1] = { ...last, direction };
    }
    return this;
  }

  get entries(): readonly OrderEntry[] {
    return this.#entries;
  }

  isEmpty(): boolean {
    return this.#entries.length === 0;
  }

  render(): string {
    if (this.isEmpty()) return "";
    const parts = this.#entries.map(
      (entry) => `${entry.field} ${entry.direction.toUpperCase()}`,
    );
    return `ORDER BY ${parts.join(", ")}`;
  }
}

// ============================================================
// Pagination
// ============================================================

/**
 * `LIMIT n`, followed by `START m` when an offset is set. An offset
 * without a limit renders `START m` alone.
 */
export class LimitOffsetClause implements Clause {
  #limit: number | undefined;
  #offset: number | undefined;

  limit(count: number): this {
    this.#limit = requireCount(count, "limit");
    return this;
  }

  offset(count: number): this {
    this.#offset = requireCount(count, "offset");
    return this;
  }

  isEmpty(): boolean {
    return this.#limit === undefined && this.#offset === undefined;
  }

  render(): string {
    const parts: string[] = [];
    if (this.#limit !== undefined) parts.push(`LIMIT ${this.#limit}`);
    if (this.#offset !== undefined) parts.push(`START ${this.#offset}`);
    return parts.join(" ");
  }
}

/**
 * Returns `count` if it is a non-negative integer, else throws.
 */
export function requireCount(count: number, name: string): number {
  if (!Number.isSafeInteger(count) || count < 0) {
    throw new ConfigurationError(
      `${name} must be a non-negative integer, got ${count}`,
      { [name]: count },
    );
  }
  return count;
}

// ============================================================
// Timeout
// ============================================================

/**
 * Renders milliseconds as `Ns` or `NsMms`.
 *
 * @example
 * ```typescript
 * formatDuration(5000); // "5s"
 * formatDuration(1500); // "1s500ms"
 * ```
 */
export function formatDuration(milliseconds: number): string {
  if (!Number.isFinite(milliseconds) || milliseconds < 0) {
    throw new ConfigurationError(
      `Timeout must be a non-negative finite number of milliseconds, got ${milliseconds}`,
      { milliseconds },
    );
  }
  const total = Math.floor(milliseconds);
  const seconds = Math.floor(total / 1000);
  const remainder = total % 1000;
  return remainder === 0 ? `${seconds}s` : `${seconds}s${remainder}ms`;
}

export class TimeoutClause implements Clause {
  #milliseconds: number | undefined;

  set(milliseconds: number): this {
    formatDuration(milliseconds);
    this.#milliseconds = milliseconds;
    return this;
  }

  isEmpty(): boolean {
    return this.#milliseconds === undefined;
  }

  render(): string {
    if (this.#milliseconds === undefined) return "";
    return `TIMEOUT ${formatDuration(this.#milliseconds)}`;
  }
}

// ============================================================
// Flags
// ============================================================

export class ParallelClause implements Clause {
  #enabled = false;

  enable(): this {
    this.#enabled = true;
    return this;
  }

  isEmpty(): boolean {
    return !this.#enabled;
  }

  render(): string {
    return this.#enabled ? "PARALLEL" : "";
  }
}

export type ExplainMode = "plain" | "full";

export class ExplainClause implements Clause {
  #mode: ExplainMode | undefined;

  set(mode: ExplainMode = "plain"): this {
    this.#mode = mode;
    return this;
  }

  isEmpty(): boolean {
    return this.#mode === undefined;
  }

  render(): string {
    if (this.#mode === undefined) return "";
    return this.#mode === "full" ? "EXPLAIN FULL" : "EXPLAIN";
  }
}

// ============================================================
// Composition
// ============================================================

/**
 * Joins the non-empty fragments of `clauses` with single spaces.
 */
export function joinFragments(
  ...parts: readonly (Clause | string)[]
): string {
  return parts
    .map((part) => (typeof part === "string" ? part : part.render()))
    .filter((fragment) => fragment.length > 0)
    .join(" ");
}
