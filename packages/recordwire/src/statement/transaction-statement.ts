/**
 * Multi-statement blocks: `BEGIN TRANSACTION ... COMMIT TRANSACTION`, and
 * the `LET` and `RETURN` statements used inside them.
 */
import { ConfigurationError } from "../errors";
import { type Statement } from "./types";
import { formatValue } from "./values";

// ============================================================
// Shared
// ============================================================

type Bindings = Readonly<Record<string, unknown>>;

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

function isStatement(value: unknown): value is Statement {
  return (
    typeof value === "object" &&
    value !== null &&
    "render" in value &&
    typeof value.render === "function" &&
    "bindings" in value
  );
}

/**
 * Adds `next` to `current`. A name may be bound twice only to the same
 * value.
 */
function mergeBindings(current: Bindings, next: Bindings): Bindings {
  for (const [name, value] of Object.entries(next)) {
    if (name in current && !Object.is(current[name], value)) {
      throw new ConfigurationError(
        `Variable $${name} is bound to different values in one block`,
        { name },
      );
    }
  }
  return { ...current, ...next };
}

/**
 * A nested statement becomes a parenthesized subquery; anything else is
 * a literal.
 */
function renderOperand(value: unknown): string {
  return isStatement(value) ? `(${value.render()})` : formatValue(value);
}

function bindingsOf(value: unknown): Bindings {
  return isStatement(value) ? value.bindings : {};
}

// ============================================================
// LET / RETURN
// ============================================================

/**
 * `LET $name = value`.
 *
 * @example
 * ```typescript
 * letVariable("adults", select("user").where("age >= 18")).render();
 * // LET $adults = (SELECT * FROM user WHERE age >= 18)
 * ```
 */
export class LetStatement implements Statement {
  readonly name: string;
  readonly #value: unknown;

  constructor(name: string, value: unknown) {
    this.name = name;
    this.#value = value;
  }

  get bindings(): Bindings {
    return bindingsOf(this.#value);
  }

  render(): string {
    return `LET $${this.name} = ${renderOperand(this.#value)}`;
  }

  toString(): string {
    return this.render();
  }
}

/**
 * @throws ConfigurationError when `name` is not a valid variable name
 */
export function letVariable(name: string, value: unknown): LetStatement {
  const bare = name.startsWith("$") ? name.slice(1) : name;
  if (!VARIABLE_NAME.test(bare)) {
    throw new ConfigurationError(`Invalid variable name "${name}"`, { name });
  }
  return new LetStatement(bare, value);
}

export class ReturnStatement implements Statement {
  readonly #value: unknown;

  constructor(value: unknown) {
    this.#value = value;
  }

  get bindings(): Bindings {
    return bindingsOf(this.#value);
  }

  render(): string {
    return `RETURN ${renderOperand(this.#value)}`;
  }

  toString(): string {
    return this.render();
  }
}

/**
 * `RETURN value`. Pass `raw("$name")` to return a variable.
 */
export function returnValue(value: unknown): ReturnStatement {
  return new ReturnStatement(value);
}

// ============================================================
// Transaction
// ============================================================

export type TransactionOutcome = "commit" | "cancel";

type TransactionState = Readonly<{
  statements: readonly (Statement | string)[];
  outcome: TransactionOutcome;
  bindings: Bindings;
}>;

/**
 * Wraps statements in one transaction, sent as a single query with the
 * bindings of every statement merged.
 *
 * @example
 * ```typescript
 * transaction(
 *   update("account:a").set("balance", raw("balance - 10")),
 *   update("account:b").set("balance", raw("balance + 10")),
 * ).render();
 * // BEGIN TRANSACTION; UPDATE account:a SET balance = balance - 10;
 * //   UPDATE account:b SET balance = balance + 10; COMMIT TRANSACTION;
 * ```
 */
export class TransactionStatement implements Statement {
  readonly #state: TransactionState;

  constructor(state: TransactionState) {
    this.#state = state;
  }

  get bindings(): Bindings {
    return this.#state.bindings;
  }

  get outcome(): TransactionOutcome {
    return this.#state.outcome;
  }

  /**
   * Appends statements. Strings are taken as statement text.
   *
   * @throws ConfigurationError when two statements bind one variable to
   * different values
   */
  add(...statements: readonly (Statement | string)[]): TransactionStatement {
    let bindings = this.#state.bindings;
    for (const statement of statements) {
      if (typeof statement !== "string") {
        bindings = mergeBindings(bindings, statement.bindings);
      }
    }
    return this.#with({
      statements: [...this.#state.statements, ...statements],
      bindings,
    });
  }

  commit(): TransactionStatement {
    return this.#with({ outcome: "commit" });
  }

  /** Ends with `CANCEL TRANSACTION`, so nothing is applied. */
  cancel(): TransactionStatement {
    return this.#with({ outcome: "cancel" });
  }

  render(): string {
    const body = this.#state.statements
      .map((statement) =>
        typeof statement === "string" ? statement : statement.render(),
      )
      .map((text) => text.trim().replace(/;+$/, "").trimEnd())
      .filter((text) => text.length > 0);
    const end =
      this.#state.outcome === "commit" ?
        "COMMIT TRANSACTION"
      : "CANCEL TRANSACTION";

    return ["BEGIN TRANSACTION", ...body, end]
      .map((text) => `${text};`)
      .join(" ");
  }

  toString(): string {
    return this.render();
  }

  #with(patch: Partial<TransactionState>): TransactionStatement {
    return new TransactionStatement({ ...this.#state, ...patch });
  }
}

export function transaction(
  ...statements: readonly (Statement | string)[]
): TransactionStatement {
  return new TransactionStatement({
    statements: [],
    outcome: "commit",
    bindings: {},
  }).add(...statements);
}
