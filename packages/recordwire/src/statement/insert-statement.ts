/**
 * Immutable builder for `INSERT`.
 */
import { ConfigurationError } from "../errors";
import { joinFragments } from "./clauses";
import { parseTarget, renderReturn } from "./target";
import { type ReturnMode, type Statement } from "./types";
import { formatObject, formatValue } from "./values";

type InsertBody =
  | Readonly<{
      kind: "records";
      records: readonly Readonly<Record<string, unknown>>[];
    }>
  | Readonly<{
      kind: "rows";
      columns: readonly string[];
      rows: readonly (readonly unknown[])[];
    }>;

type InsertState = Readonly<{
  table: string;
  relation: boolean;
  ignore: boolean;
  body: InsertBody | undefined;
  onDuplicate: readonly (readonly [string, unknown])[];
  returnMode: ReturnMode | undefined;
  bindings: Readonly<Record<string, unknown>>;
}>;

/**
 * Bulk write builder. Records go in either as objects (`values`) or as
 * rows under a column list (`columns` then `row`); switching form
 * discards what the other form collected.
 *
 * @example
 * ```typescript
 * insert("product")
 *   .values({ id: "laptop", stock: 3 }, { id: "phone", stock: 9 })
 *   .onDuplicateKeyUpdate("stock", raw("stock + $input.stock"))
 *   .render();
 * // INSERT INTO product [{"id":"laptop","stock":3}, {"id":"phone","stock":9}]
 * //   ON DUPLICATE KEY UPDATE stock = stock + $input.stock
 * ```
 */
export class InsertStatement implements Statement {
  readonly #state: InsertState;

  constructor(state: InsertState) {
    this.#state = state;
  }

  get bindings(): Readonly<Record<string, unknown>> {
    return this.#state.bindings;
  }

  /** Inserts edges: each record needs `in` and `out`. */
  relation(): InsertStatement {
    return this.#with({ relation: true });
  }

  /** Skips records whose ID already exists instead of failing. */
  ignore(): InsertStatement {
    return this.#with({ ignore: true });
  }

  values(
    ...records: readonly Readonly<Record<string, unknown>>[]
  ): InsertStatement {
    const body = this.#state.body;
    const previous = body?.kind === "records" ? body.records : [];
    return this.#with({
      body: {
        kind: "records",
        records: [...previous, ...records.map((record) => ({ ...record }))],
      },
    });
  }

  columns(...names: readonly string[]): InsertStatement {
    if (names.length === 0) {
      throw new ConfigurationError("INSERT columns must not be empty");
    }
    return this.#with({
      body: { kind: "rows", columns: [...names], rows: [] },
    });
  }

  /**
   * Adds one row of values, in column order.
   *
   * @throws ConfigurationError when no columns are set or the row length
   * differs from the column count
   */
  row(...values: readonly unknown[]): InsertStatement {
    const body = this.#state.body;
    if (body?.kind !== "rows") {
      throw new ConfigurationError("Call columns() before row()");
    }
    if (values.length !== body.columns.length) {
      throw new ConfigurationError(
        `INSERT row has ${values.length} values for ${body.columns.length} columns`,
        { columns: body.columns, values: values.length },
      );
    }
    return this.#with({
      body: { ...body, rows: [...body.rows, [...values]] },
    });
  }

  /**
   * Adds a `field = value` assignment applied when a record with the same
   * ID exists. Wrap expressions such as `$input.stock` in `raw`.
   */
  onDuplicateKeyUpdate(field: string, value: unknown): InsertStatement {
    return this.#with({
      onDuplicate: [...this.#state.onDuplicate, [field, value]],
    });
  }

  returnNone(): InsertStatement {
    return this.#with({ returnMode: "none" });
  }

  returnAfter(): InsertStatement {
    return this.#with({ returnMode: "after" });
  }

  returnDiff(): InsertStatement {
    return this.#with({ returnMode: "diff" });
  }

  bind(name: string, value: unknown): InsertStatement {
    return this.#with({ bindings: { ...this.#state.bindings, [name]: value } });
  }

  /**
   * @throws ConfigurationError when there is nothing to insert
   */
  render(): string {
    const state = this.#state;
    const assignments = state.onDuplicate.map(
      ([field, value]) => `${field} = ${formatValue(value)}`,
    );

    return joinFragments(
      "INSERT",
      state.relation ? "RELATION" : "",
      state.ignore ? "IGNORE" : "",
      "INTO",
      state.table,
      renderBody(state.body, state.table),
      assignments.length === 0 ?
        ""
      : `ON DUPLICATE KEY UPDATE ${assignments.join(", ")}`,
      state.returnMode === undefined ? "" : renderReturn(state.returnMode),
    );
  }

  toString(): string {
    return this.render();
  }

  #with(patch: Partial<InsertState>): InsertStatement {
    return new InsertStatement({ ...this.#state, ...patch });
  }
}

function renderBody(body: InsertBody | undefined, table: string): string {
  if (body === undefined || countOf(body) === 0) {
    throw new ConfigurationError(`INSERT INTO ${table} has nothing to insert`, {
      table,
    });
  }

  switch (body.kind) {
    case "records": {
      return `[${body.records.map((record) => formatObject(record)).join(", ")}]`;
    }
    case "rows": {
      const rows = body.rows.map(
        (row) => `(${row.map((value) => formatValue(value)).join(", ")})`,
      );
      return `(${body.columns.join(", ")}) VALUES ${rows.join(", ")}`;
    }
  }
}

function countOf(body: InsertBody): number {
  return body.kind === "records" ? body.records.length : body.rows.length;
}

/**
 * Starts an `INSERT` into `table`.
 *
 * @throws ConfigurationError when `table` names a record or an edge
 */
export function insert(table: string): InsertStatement {
  const target = parseTarget(table);
  if (target.kind !== "table") {
    throw new ConfigurationError(`INSERT needs a table name, got "${table}"`, {
      table,
    });
  }
  return new InsertStatement({
    table: target.table,
    relation: false,
    ignore: false,
    body: undefined,
    onDuplicate: [],
    returnMode: undefined,
    bindings: {},
  });
}
