/**
 * RelationBuilder - fluent builder for `RELATE` statements.
 */
import { ConfigurationError, MissingTargetError } from "../errors";
import { type FieldDescriptor } from "../security/field-descriptor";
import { EncryptionPipeline, type FieldBag } from "../security/pipeline";
import { formatDuration, joinFragments } from "./clauses";
import { recordIdOf, renderReturn } from "./target";
import { type RecordRef, type ReturnMode } from "./types";
import { formatObject } from "./values";

// ============================================================
// Types
// ============================================================

/**
 * Runs rendered statement text. Supplied by the client.
 */
export type StatementRunner = (text: string) => Promise<unknown>;

export type RelationBuilderConfig = Readonly<{
  pipeline: EncryptionPipeline;
  run?: StatementRunner;
}>;

type EntitySource = Readonly<{
  entity: object;
  fields: readonly FieldDescriptor[];
  encrypt: boolean;
}>;

type RelationState = Readonly<{
  from: string | undefined;
  to: string | undefined;
  via: string | undefined;
  data: Readonly<Record<string, unknown>>;
  entity: EntitySource | undefined;
  encrypt: boolean;
  returnMode: ReturnMode;
  timeoutMs: number | undefined;
  only: boolean;
}>;

export type WithEntityOptions = Readonly<{
  /** Fields to encrypt or hash before the entity is written. */
  fields?: readonly FieldDescriptor[];
  /** Defaults to true. */
  encrypt?: boolean;
}>;

// ============================================================
// Builder
// ============================================================

/**
 * Builds `RELATE from->edge->to` statements.
 *
 * `build()` checks the endpoints synchronously, before any encryption or
 * network work, and throws {@link MissingTargetError} when one is missing.
 * The return mode defaults to `AFTER` and is always rendered.
 *
 * When the edge data comes from an entity with encryption on, the entity
 * is copied, the copy is encrypted and written, and the caller's object
 * keeps its plaintext. Fields with a one-way hash are the exception: the
 * hash is written back onto the caller's object, for fields it held as
 * strings.
 *
 * @example
 * ```typescript
 * await relate()
 *   .from("user:alice")
 *   .to("product:laptop")
 *   .via("purchased")
 *   .withData({ price: 999.99 })
 *   .build();
 * // RELATE user:alice->purchased->product:laptop CONTENT {"price":999.99} RETURN AFTER
 * ```
 */
export class RelationBuilder {
  readonly #config: RelationBuilderConfig;
  readonly #state: RelationState;

  constructor(config: RelationBuilderConfig, state: RelationState) {
    this.#config = config;
    this.#state = state;
  }

  from(record: RecordRef): RelationBuilder {
    return this.#with({ from: recordIdOf(record) });
  }

  to(record: RecordRef): RelationBuilder {
    return this.#with({ to: recordIdOf(record) });
  }

  /**
   * Sets the edge table.
   */
  via(edgeTable: string): RelationBuilder {
    return this.#with({ via: edgeTable });
  }

  withData(data: Readonly<Record<string, unknown>>): RelationBuilder {
    return this.#with({ data: { ...this.#state.data, ...data } });
  }

  with(key: string, value: unknown): RelationBuilder {
    return this.#with({ data: { ...this.#state.data, [key]: value } });
  }

  /**
   * Uses the fields of `entity` as edge data. Values set with
   * `withData`/`with` take precedence over the entity's.
   */
  withEntity(entity: object, options: WithEntityOptions = {}): RelationBuilder {
    return this.#with({
      entity: {
        entity,
        fields: options.fields ?? [],
        encrypt: options.encrypt ?? true,
      },
    });
  }

  withoutEncryption(): RelationBuilder {
    return this.#with({ encrypt: false });
  }

  returnBefore(): RelationBuilder {
    return this.#with({ returnMode: "before" });
  }

  returnAfter(): RelationBuilder {
    return this.#with({ returnMode: "after" });
  }

  returnDiff(): RelationBuilder {
    return this.#with({ returnMode: "diff" });
  }

  returnNone(): RelationBuilder {
    return this.#with({ returnMode: "none" });
  }

  timeout(milliseconds: number): RelationBuilder {
    formatDuration(milliseconds);
    return this.#with({ timeoutMs: milliseconds });
  }

  /**
   * `RELATE ONLY`: returns a single edge instead of an array.
   */
  only(): RelationBuilder {
    return this.#with({ only: true });
  }

  /**
   * Renders the statement.
   *
   * @throws MissingTargetError synchronously when from, to or via is unset
   */
  build(): Promise<string> {
    const endpoints = this.#requireEndpoints();
    return this.#collectData().then((data) =>
      this.#render(endpoints, data),
    );
  }

  /**
   * Builds and runs the statement.
   *
   * @throws MissingTargetError synchronously when from, to or via is unset
   */
  execute(): Promise<unknown> {
    const { run } = this.#config;
    if (run === undefined) {
      throw new ConfigurationError(
        "This relation builder is not bound to a client",
        {},
        { suggestion: "Create it with client.relation(), or call build()." },
      );
    }
    return this.build().then((text) => run(text));
  }

  #requireEndpoints(): Readonly<{ from: string; to: string; via: string }> {
    const { from, to, via } = this.#state;
    if (from === undefined) throw new MissingTargetError("from");
    if (to === undefined) throw new MissingTargetError("to");
    if (via === undefined) throw new MissingTargetError("via");
    return { from, to, via };
  }

  async #collectData(): Promise<FieldBag> {
    const { entity, data, encrypt } = this.#state;
    if (entity === undefined) return { ...data };

    const bag: FieldBag = Object.fromEntries(Object.entries(entity.entity));
    if (encrypt && entity.encrypt && entity.fields.length > 0) {
      await this.#config.pipeline.encryptFields(bag, entity.fields);
      for (const descriptor of entity.fields) {
        const { fieldName } = descriptor;
        if (
          descriptor.algorithm.kind === "hash" &&
          typeof Reflect.get(entity.entity, fieldName) === "string"
        ) {
          Reflect.set(entity.entity, fieldName, bag[fieldName]);
        }
      }
    }

    return { ...bag, ...data };
  }

  #render(
    endpoints: Readonly<{ from: string; to: string; via: string }>,
    data: FieldBag,
  ): string {
    const { only, returnMode, timeoutMs } = this.#state;
    return joinFragments(
      only ? "RELATE ONLY" : "RELATE",
      `${endpoints.from}->${endpoints.via}->${endpoints.to}`,
      Object.keys(data).length > 0 ? `CONTENT ${formatObject(data)}` : "",
      renderReturn(returnMode),
      timeoutMs === undefined ? "" : `TIMEOUT ${formatDuration(timeoutMs)}`,
    );
  }

  #with(patch: Partial<RelationState>): RelationBuilder {
    return new RelationBuilder(this.#config, { ...this.#state, ...patch });
  }
}

/**
 * Starts a relation. Without a config the builder renders text only and
 * performs no encryption.
 */
export function relate(
  config: RelationBuilderConfig = { pipeline: EncryptionPipeline.disabled() },
): RelationBuilder {
  return new RelationBuilder(config, {
    from: undefined,
    to: undefined,
    via: undefined,
    data: {},
    entity: undefined,
    encrypt: true,
    returnMode: "after",
    timeoutMs: undefined,
    only: false,
  });
}
