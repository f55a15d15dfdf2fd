import { FetchClause, FilterClause, joinFragments } from "./clauses";
import { type Statement } from "./types";

type LiveState = Readonly<{
  table: string;
  diff: boolean;
  projection: readonly string[];
  conditions: readonly string[];
  fetch: readonly string[];
  bindings: Readonly<Record<string, unknown>>;
}>;

/**
 * `LIVE SELECT` builder, for subscriptions that need a filter. Plain
 * table subscriptions go through the `live` RPC method instead.
 *
 * @example
 * ```typescript
 * liveSelect("orders").where("status = 'open'").render();
 * // LIVE SELECT * FROM orders WHERE status = 'open'
 * ```
 */
export class LiveSelectStatement implements Statement {
  readonly #state: LiveState;

  constructor(state: LiveState) {
    this.#state = state;
  }

  get bindings(): Readonly<Record<string, unknown>> {
    return this.#state.bindings;
  }

  get table(): string {
    return this.#state.table;
  }

  /**
   * Emits JSON Patch diffs instead of whole records.
   */
  diff(): LiveSelectStatement {
    return new LiveSelectStatement({ ...this.#state, diff: true });
  }

  fields(...fields: readonly string[]): LiveSelectStatement {
    return new LiveSelectStatement({ ...this.#state, projection: fields });
  }

  where(condition: string): LiveSelectStatement {
    return new LiveSelectStatement({
      ...this.#state,
      conditions: [...this.#state.conditions, condition],
    });
  }

  fetch(...fields: readonly string[]): LiveSelectStatement {
    return new LiveSelectStatement({
      ...this.#state,
      fetch: [...this.#state.fetch, ...fields],
    });
  }

  bind(name: string, value: unknown): LiveSelectStatement {
    return new LiveSelectStatement({
      ...this.#state,
      bindings: { ...this.#state.bindings, [name]: value },
    });
  }

  render(): string {
    const { table, diff, projection, conditions, fetch } = this.#state;
    const head =
      diff ? "LIVE SELECT DIFF"
      : projection.length > 0 ? `LIVE SELECT ${projection.join(", ")}`
      : "LIVE SELECT *";

    const filter = new FilterClause();
    for (const condition of conditions) filter.add(condition);

    return joinFragments(
      `${head} FROM ${table}`,
      filter,
      new FetchClause().add(...fetch),
    );
  }

  toString(): string {
    return this.render();
  }
}

export function liveSelect(table: string): LiveSelectStatement {
  return new LiveSelectStatement({
    table,
    diff: false,
    projection: [],
    conditions: [],
    fetch: [],
    bindings: {},
  });
}
