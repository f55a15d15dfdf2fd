/**
 * Field descriptors.
 *
 * A descriptor names one field of a record and how it crosses the wire:
 * encrypted, hashed, or as-is. Descriptors are built once per record
 * shape with {@link defineFields}; strength defaults are resolved there
 * and never looked up again.
 *
 * @example
 * ```typescript
 * const userFields = defineFields([
 *   reversible("email"),
 *   hashed("password", "argon2"),
 *   hashed("pin", "bcrypt", { strength: 12 }),
 * ]);
 * ```
 */
import { z } from "zod";

import { ConfigurationError } from "../errors";
import { zodIssuesToValidationIssues } from "../errors/validation";

// ============================================================
// Types
// ============================================================

export type HashAlgorithm = "argon2" | "bcrypt" | "scrypt" | "sha256" | "sha512";

export type FieldAlgorithm =
  | Readonly<{ kind: "reversible" }>
  | Readonly<{ kind: "hash"; hash: HashAlgorithm }>
  | Readonly<{ kind: "plain" }>;

export type FieldDescriptor = Readonly<{
  fieldName: string;
  algorithm: FieldAlgorithm;
  /**
   * Resolved cost parameter: bcrypt cost, argon2 memory in KiB or scrypt N.
   * Undefined for algorithms without one.
   */
  strength: number | undefined;
  /** Whether `verify` may be called against this field. */
  verifiable: boolean;
}>;

/**
 * Strength value meaning "use the algorithm's default".
 */
export const UNSET_STRENGTH = -1;

export type FieldSpec = Readonly<{
  fieldName: string;
  /** Defaults to {@link FieldDefaults.algorithm}. */
  algorithm?: FieldAlgorithm;
  strength?: number;
  verifiable?: boolean;
}>;

/**
 * Project-wide fallbacks applied by {@link defineFields}.
 */
export type FieldDefaults = Readonly<{
  algorithm?: FieldAlgorithm;
  verifiable?: boolean;
  bcryptCost?: number;
  argon2MemoryKiB?: number;
  scryptCost?: number;
}>;

type StrengthRange = Readonly<{
  min: number;
  max: number;
  fallback: number;
  powerOfTwo: boolean;
}>;

/**
 * Accepted strength per tunable algorithm.
 */
export const STRENGTH_RANGES = {
  bcrypt: { min: 4, max: 31, fallback: 10, powerOfTwo: false },
  argon2: { min: 1024, max: 4_194_304, fallback: 65_536, powerOfTwo: false },
  scrypt: { min: 2, max: 1_048_576, fallback: 16_384, powerOfTwo: true },
} as const satisfies Record<string, StrengthRange>;

type TunableHash = keyof typeof STRENGTH_RANGES;

// ============================================================
// Spec Helpers
// ============================================================

export function reversible(fieldName: string): FieldSpec {
  return { fieldName, algorithm: { kind: "reversible" } };
}

export function plain(fieldName: string): FieldSpec {
  return { fieldName, algorithm: { kind: "plain" } };
}

export function hashed(
  fieldName: string,
  hash: HashAlgorithm,
  options: Readonly<{ strength?: number; verifiable?: boolean }> = {},
): FieldSpec {
  return { fieldName, algorithm: { kind: "hash", hash }, ...options };
}

// ============================================================
// Construction
// ============================================================

const algorithmSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("reversible") }),
  z.object({ kind: z.literal("plain") }),
  z.object({
    kind: z.literal("hash"),
    hash: z.enum(["argon2", "bcrypt", "scrypt", "sha256", "sha512"]),
  }),
]);

const fieldSpecSchema = z.object({
  fieldName: z.string().min(1),
  algorithm: algorithmSchema.optional(),
  strength: z.number().int().optional(),
  verifiable: z.boolean().optional(),
});

const fieldDefaultsSchema = z.object({
  algorithm: algorithmSchema.optional(),
  verifiable: z.boolean().optional(),
  bcryptCost: z.number().int().optional(),
  argon2MemoryKiB: z.number().int().optional(),
  scryptCost: z.number().int().optional(),
});

/**
 * Builds descriptors from specs, resolving every default up front.
 *
 * A spec may be a bare field name, which takes the default algorithm
 * (reversible unless `defaults.algorithm` says otherwise).
 *
 * @throws ConfigurationError on a malformed spec, a duplicate field name
 *   or a strength outside the algorithm's range
 */
export function defineFields(
  specs: readonly (FieldSpec | string)[],
  defaults: FieldDefaults = {},
): readonly FieldDescriptor[] {
  const parsedDefaults = parseOrThrow(fieldDefaultsSchema, defaults, "defaults");
  const fallbackStrength: Record<TunableHash, number> = {
    bcrypt: resolveStrength(
      "bcrypt",
      parsedDefaults.bcryptCost ?? UNSET_STRENGTH,
      "defaults",
    ),
    argon2: resolveStrength(
      "argon2",
      parsedDefaults.argon2MemoryKiB ?? UNSET_STRENGTH,
      "defaults",
    ),
    scrypt: resolveStrength(
      "scrypt",
      parsedDefaults.scryptCost ?? UNSET_STRENGTH,
      "defaults",
    ),
  };

  const seen = new Set<string>();
  const descriptors = specs.map((input): FieldDescriptor => {
    const spec = parseOrThrow(
      fieldSpecSchema,
      typeof input === "string" ? { fieldName: input } : input,
      typeof input === "string" ? input : "field spec",
    );

    if (seen.has(spec.fieldName)) {
      throw new ConfigurationError(
        `Field "${spec.fieldName}" is described more than once`,
        { fieldName: spec.fieldName },
      );
    }
    seen.add(spec.fieldName);

    const algorithm: FieldAlgorithm =
      spec.algorithm ?? parsedDefaults.algorithm ?? { kind: "reversible" };
    const requested = spec.strength ?? UNSET_STRENGTH;

    let strength: number | undefined;
    if (algorithm.kind === "hash" && isTunable(algorithm.hash)) {
      strength =
        requested === UNSET_STRENGTH ?
          fallbackStrength[algorithm.hash]
        : resolveStrength(algorithm.hash, requested, spec.fieldName);
    } else if (requested !== UNSET_STRENGTH) {
      throw new ConfigurationError(
        `Field "${spec.fieldName}" sets a strength, but its algorithm takes none`,
        { fieldName: spec.fieldName, algorithm, strength: requested },
      );
    }

    return Object.freeze({
      fieldName: spec.fieldName,
      algorithm: Object.freeze({ ...algorithm }),
      strength,
      verifiable:
        algorithm.kind === "hash" ?
          (spec.verifiable ?? parsedDefaults.verifiable ?? true)
        : false,
    });
  });

  return Object.freeze(descriptors);
}

/**
 * Resolves {@link UNSET_STRENGTH} to the algorithm default and checks the
 * range of anything else.
 */
export function resolveStrength(
  hash: TunableHash,
  requested: number,
  fieldName: string,
): number {
  const range: StrengthRange = STRENGTH_RANGES[hash];
  if (requested === UNSET_STRENGTH) return range.fallback;

  const inRange =
    Number.isInteger(requested) &&
    requested >= range.min &&
    requested <= range.max;
  const shapeOk = !range.powerOfTwo || isPowerOfTwo(requested);

  if (!inRange || !shapeOk) {
    throw new ConfigurationError(
      `${hash} strength ${requested} for "${fieldName}" is out of range ` +
        `[${range.min}, ${range.max}]${range.powerOfTwo ? " (power of two)" : ""}`,
      { fieldName, hash, strength: requested, min: range.min, max: range.max },
      {
        suggestion: `Use a ${hash} strength between ${range.min} and ${range.max}, or ${UNSET_STRENGTH} for the default of ${range.fallback}.`,
      },
    );
  }
  return requested;
}

export function isTunable(hash: HashAlgorithm): hash is TunableHash {
  return hash === "bcrypt" || hash === "argon2" || hash === "scrypt";
}

/**
 * Descriptors whose values can be decrypted on the way in.
 */
export function reversibleFields(
  descriptors: readonly FieldDescriptor[],
): readonly FieldDescriptor[] {
  return descriptors.filter(
    (descriptor) => descriptor.algorithm.kind === "reversible",
  );
}

function isPowerOfTwo(value: number): boolean {
  return value > 1 && (value & (value - 1)) === 0;
}

function parseOrThrow<T>(
  schema: z.ZodType<T>,
  value: unknown,
  subject: string,
): T {
  const result = schema.safeParse(value);
  if (result.success) return result.data;

  const issues = zodIssuesToValidationIssues(result.error);
  throw new ConfigurationError(
    `Invalid field configuration for ${subject}: ${issues
      .map((issue) => `${issue.path || "(root)"} ${issue.message}`)
      .join("; ")}`,
    { subject, issues },
    { cause: result.error },
  );
}
