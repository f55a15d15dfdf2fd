/**
 * Immutable builders for `CREATE`, `UPDATE`, `UPSERT` and `DELETE`.
 */
import {
  FilterClause,
  formatDuration,
  joinFragments,
  ParallelClause,
  TimeoutClause,
} from "./clauses";
import { parseTarget, renderReturn, renderTarget } from "./target";
import {
  type ReturnMode,
  type Statement,
  type StatementTarget,
} from "./types";
import { formatObject, formatValue } from "./values";

export type MutationVerb = "CREATE" | "UPDATE" | "UPSERT" | "DELETE";

/**
 * Verbs that carry a data body.
 */
export type DataVerb = Exclude<MutationVerb, "DELETE">;

/**
 * Verbs that take a `WHERE` clause.
 */
export type FilteredVerb = Exclude<MutationVerb, "CREATE">;

type DataBody =
  | Readonly<{ kind: "content"; data: Readonly<Record<string, unknown>> }>
  | Readonly<{ kind: "merge"; data: Readonly<Record<string, unknown>> }>
  | Readonly<{
      kind: "set";
      assignments: readonly (readonly [string, unknown])[];
    }>;

type MutationState = Readonly<{
  target: StatementTarget;
  only: boolean;
  body: DataBody | undefined;
  conditions: readonly string[];
  returnMode: ReturnMode | undefined;
  timeoutMs: number | undefined;
  parallel: boolean;
  bindings: Readonly<Record<string, unknown>>;
}>;

/**
 * Write statement builder. Data methods exist only on verbs that accept a
 * body, and `where` only on verbs that accept a filter.
 *
 * @example
 * ```typescript
 * update("user")
 *   .set("active", false)
 *   .where("last_login < time::now() - 1y")
 *   .returnNone()
 *   .render();
 * // UPDATE user SET active = false WHERE last_login < time::now() - 1y RETURN NONE
 * ```
 */
export class MutationStatement<V extends MutationVerb = MutationVerb>
  implements Statement
{
  readonly #verb: V;
  readonly #state: MutationState;

  constructor(verb: V, state: MutationState) {
    this.#verb = verb;
    this.#state = state;
  }

  get verb(): V {
    return this.#verb;
  }

  get bindings(): Readonly<Record<string, unknown>> {
    return this.#state.bindings;
  }

  only(): MutationStatement<V> {
    return this.#with({ only: true });
  }

  /**
   * Replaces the record body (`CONTENT {...}`).
   */
  content<T extends DataVerb>(
    this: MutationStatement<T>,
    data: Readonly<Record<string, unknown>>,
  ): MutationStatement<T> {
    return this.#with({ body: { kind: "content", data: { ...data } } });
  }

  /**
   * Merges into the existing record (`MERGE {...}`).
   */
  merge<T extends DataVerb>(
    this: MutationStatement<T>,
    data: Readonly<Record<string, unknown>>,
  ): MutationStatement<T> {
    return this.#with({ body: { kind: "merge", data: { ...data } } });
  }

  /**
   * Adds a `field = value` assignment. Replaces a `CONTENT` or `MERGE`
   * body set earlier.
   */
  set<T extends DataVerb>(
    this: MutationStatement<T>,
    field: string,
    value: unknown,
  ): MutationStatement<T> {
    const body = this.#state.body;
    const previous = body?.kind === "set" ? body.assignments : [];
    return this.#with({
      body: { kind: "set", assignments: [...previous, [field, value]] },
    });
  }

  where<T extends FilteredVerb>(
    this: MutationStatement<T>,
    condition: string,
  ): MutationStatement<T> {
    return this.#with({ conditions: [...this.#state.conditions, condition] });
  }

  returnNone(): MutationStatement<V> {
    return this.#with({ returnMode: "none" });
  }

  returnBefore(): MutationStatement<V> {
    return this.#with({ returnMode: "before" });
  }

  returnAfter(): MutationStatement<V> {
    return this.#with({ returnMode: "after" });
  }

  returnDiff(): MutationStatement<V> {
    return this.#with({ returnMode: "diff" });
  }

  timeout(milliseconds: number): MutationStatement<V> {
    formatDuration(milliseconds);
    return this.#with({ timeoutMs: milliseconds });
  }

  parallel(): MutationStatement<V> {
    return this.#with({ parallel: true });
  }

  bind(name: string, value: unknown): MutationStatement<V> {
    return this.#with({ bindings: { ...this.#state.bindings, [name]: value } });
  }

  render(): string {
    const state = this.#state;

    const filter = new FilterClause();
    for (const condition of state.conditions) filter.add(condition);

    const timeout = new TimeoutClause();
    if (state.timeoutMs !== undefined) timeout.set(state.timeoutMs);

    const parallel = new ParallelClause();
    if (state.parallel) parallel.enable();

    return joinFragments(
      state.only ? `${this.#verb} ONLY` : this.#verb,
      renderTarget(state.target),
      renderBody(state.body),
      filter,
      state.returnMode === undefined ? "" : renderReturn(state.returnMode),
      timeout,
      parallel,
    );
  }

  toString(): string {
    return this.render();
  }

  #with(patch: Partial<MutationState>): MutationStatement<V> {
    return new MutationStatement(this.#verb, { ...this.#state, ...patch });
  }
}

function renderBody(body: DataBody | undefined): string {
  if (body === undefined) return "";
  switch (body.kind) {
    case "content": {
      return `CONTENT ${formatObject(body.data)}`;
    }
    case "merge": {
      return `MERGE ${formatObject(body.data)}`;
    }
    case "set": {
      if (body.assignments.length === 0) return "";
      const parts = body.assignments.map(
        ([field, value]) => `${field} = ${formatValue(value)}`,
      );
      return `SET ${parts.join(", ")}`;
    }
  }
}

function start<V extends MutationVerb>(
  verb: V,
  target: string | StatementTarget,
): MutationStatement<V> {
  return new MutationStatement(verb, {
    target: parseTarget(target),
    only: false,
    body: undefined,
    conditions: [],
    returnMode: undefined,
    timeoutMs: undefined,
    parallel: false,
    bindings: {},
  });
}

export function create(
  target: string | StatementTarget,
): MutationStatement<"CREATE"> {
  return start("CREATE", target);
}

export function update(
  target: string | StatementTarget,
): MutationStatement<"UPDATE"> {
  return start("UPDATE", target);
}

export function upsert(
  target: string | StatementTarget,
): MutationStatement<"UPSERT"> {
  return start("UPSERT", target);
}

/**
 * Starts a `DELETE`. Named `remove` because `delete` is reserved.
 */
export function remove(
  target: string | StatementTarget,
): MutationStatement<"DELETE"> {
  return start("DELETE", target);
}
