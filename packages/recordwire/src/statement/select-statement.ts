/**
 * SelectStatement - immutable builder for `SELECT` statements.
 */
import {
  ExplainClause,
  type ExplainMode,
  FetchClause,
  FilterClause,
  formatDuration,
  GroupByClause,
  joinFragments,
  LimitOffsetClause,
  OmitClause,
  type OrderEntry,
  OrderByClause,
  ParallelClause,
  requireCount,
  type SortDirection,
  SplitClause,
  TimeoutClause,
} from "./clauses";
import { parseTarget, renderTarget } from "./target";
import { type Statement, type StatementTarget } from "./types";

type SelectState = Readonly<{
  target: StatementTarget;
  projection: readonly string[];
  valueOnly: boolean;
  only: boolean;
  conditions: readonly string[];
  groupBy: readonly string[];
  groupAll: boolean;
  orderBy: readonly OrderEntry[];
  limit: number | undefined;
  offset: number | undefined;
  fetch: readonly string[];
  omit: readonly string[];
  split: readonly string[];
  timeoutMs: number | undefined;
  parallel: boolean;
  explain: ExplainMode | undefined;
  bindings: Readonly<Record<string, unknown>>;
}>;

/**
 * Fluent `SELECT` builder. Every call returns a new builder; clause
 * order in the output is fixed no matter the call order.
 *
 * @example
 * ```typescript
 * select("user")
 *   .fields("name", "email")
 *   .where("age > 18")
 *   .orderBy("name")
 *   .limit(10)
 *   .render();
 * // SELECT name, email FROM user WHERE age > 18 ORDER BY name ASC LIMIT 10
 * ```
 */
export class SelectStatement implements Statement {
  readonly #state: SelectState;

  constructor(state: SelectState) {
    this.#state = state;
  }

  get bindings(): Readonly<Record<string, unknown>> {
    return this.#state.bindings;
  }

  get target(): StatementTarget {
    return this.#state.target;
  }

  /**
   * Sets the projection. Defaults to `*`.
   */
  fields(...fields: readonly string[]): SelectStatement {
    return this.#with({ projection: fields, valueOnly: false });
  }

  /**
   * `SELECT VALUE field`: returns bare values instead of objects.
   */
  value(field: string): SelectStatement {
    return this.#with({ projection: [field], valueOnly: true });
  }

  /**
   * `FROM ONLY target`: returns a single record instead of an array.
   */
  only(): SelectStatement {
    return this.#with({ only: true });
  }

  /**
   * Adds a condition. Joined with `AND` unless it starts with `AND`/`OR`.
   */
  where(condition: string): SelectStatement {
    return this.#with({ conditions: [...this.#state.conditions, condition] });
  }

  orWhere(condition: string): SelectStatement {
    return this.where(`OR ${condition}`);
  }

  groupBy(...fields: readonly string[]): SelectStatement {
    return this.#with({ groupBy: [...this.#state.groupBy, ...fields] });
  }

  groupAll(): SelectStatement {
    return this.#with({ groupAll: true });
  }

  orderBy(field: string, direction: SortDirection = "asc"): SelectStatement {
    return this.#with({
      orderBy: [...this.#state.orderBy, { field, direction }],
    });
  }

  /**
   * Flips the most recent `orderBy` to descending.
   */
  desc(): SelectStatement {
    return this.#withDirection("desc");
  }

  asc(): SelectStatement {
    return this.#withDirection("asc");
  }

  limit(count: number): SelectStatement {
    return this.#with({ limit: requireCount(count, "limit") });
  }

  /**
   * Skips `count` records (`START count`).
   */
  start(count: number): SelectStatement {
    return this.#with({ offset: requireCount(count, "start") });
  }

  fetch(...fields: readonly string[]): SelectStatement {
    return this.#with({ fetch: [...this.#state.fetch, ...fields] });
  }

  omit(...fields: readonly string[]): SelectStatement {
    return this.#with({ omit: [...this.#state.omit, ...fields] });
  }

  split(...fields: readonly string[]): SelectStatement {
    return this.#with({ split: [...this.#state.split, ...fields] });
  }

  timeout(milliseconds: number): SelectStatement {
    formatDuration(milliseconds);
    return this.#with({ timeoutMs: milliseconds });
  }

  parallel(): SelectStatement {
    return this.#with({ parallel: true });
  }

  explain(mode: ExplainMode = "plain"): SelectStatement {
    return this.#with({ explain: mode });
  }

  /**
   * Binds a variable sent with the statement, referenced as `$name`.
   */
  bind(name: string, value: unknown): SelectStatement {
    return this.#with({ bindings: { ...this.#state.bindings, [name]: value } });
  }

  render(): string {
    const state = this.#state;

    const filter = new FilterClause();
    for (const condition of state.conditions) filter.add(condition);

    const groupBy = new GroupByClause().add(...state.groupBy);
    if (state.groupAll) groupBy.all();

    const orderBy = new OrderByClause();
    for (const entry of state.orderBy) orderBy.add(entry.field, entry.direction);

    const page = new LimitOffsetClause();
    if (state.limit !== undefined) page.limit(state.limit);
    if (state.offset !== undefined) page.offset(state.offset);

    const timeout = new TimeoutClause();
    if (state.timeoutMs !== undefined) timeout.set(state.timeoutMs);

    const parallel = new ParallelClause();
    if (state.parallel) parallel.enable();

    const explain = new ExplainClause();
    if (state.explain !== undefined) explain.set(state.explain);

    return joinFragments(
      this.#head(),
      filter,
      groupBy,
      orderBy,
      page,
      new FetchClause().add(...state.fetch),
      new OmitClause().add(...state.omit),
      new SplitClause().add(...state.split),
      timeout,
      parallel,
      explain,
    );
  }

  toString(): string {
    return this.render();
  }

  #head(): string {
    const { projection, valueOnly, only, target } = this.#state;
    const fields = projection.length > 0 ? projection.join(", ") : "*";
    const select = valueOnly ? `SELECT VALUE ${fields}` : `SELECT ${fields}`;
    const from = only ? "FROM ONLY" : "FROM";
    return `${select} ${from} ${renderTarget(target)}`;
  }

  #withDirection(direction: SortDirection): SelectStatement {
    const entries = this.#state.orderBy;
    const last = entries.at(-1);
    if (last === undefined) return this;
    return this.#with({
      orderBy: [...entries.slice(0, -1), { ...last, direction }],
    });
  }

  #with(patch: Partial<SelectState>): SelectStatement {
    return new SelectStatement({ ...this.#state, ...patch });
  }
}

/**
 * Starts a `SELECT` over a table, a record or an edge triple.
 */
export function select(target: string | StatementTarget): SelectStatement {
  return new SelectStatement({
    target: parseTarget(target),
    projection: [],
    valueOnly: false,
    only: false,
    conditions: [],
    groupBy: [],
    groupAll: false,
    orderBy: [],
    limit: undefined,
    offset: undefined,
    fetch: [],
    omit: [],
    split: [],
    timeoutMs: undefined,
    parallel: false,
    explain: undefined,
    bindings: {},
  });
}
