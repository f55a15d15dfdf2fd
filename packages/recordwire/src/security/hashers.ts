/**
 * One-way hashers for password-like fields.
 *
 * Salted hashers (argon2, bcrypt, scrypt) produce self-describing strings
 * that carry their salt and cost, so `verify` needs nothing but the stored
 * value. `verify` resolves to `false` for a malformed stored value rather
 * than rejecting.
 */
import {
  createHash,
  randomBytes,
  scrypt,
  type ScryptOptions,
  timingSafeEqual,
} from "node:crypto";

import * as argon2 from "argon2";
import bcrypt from "bcryptjs";

import { type HashAlgorithm, STRENGTH_RANGES } from "./field-descriptor";

// ============================================================
// Types
// ============================================================

export type PasswordHasher = Readonly<{
  /** @param strength - resolved cost, or undefined for the default */
  hash(value: string, strength: number | undefined): Promise<string>;
  verify(candidate: string, stored: string): Promise<boolean>;
}>;

export type HasherRegistry = Readonly<Record<HashAlgorithm, PasswordHasher>>;

// ============================================================
// Argon2id
// ============================================================

const ARGON2_TIME_COST = 3;
const ARGON2_PARALLELISM = 1;
const ARGON2_HASH_LENGTH = 32;

export const argon2Hasher: PasswordHasher = {
  async hash(value, strength) {
    return argon2.hash(value, {
      type: argon2.argon2id,
      memoryCost: strength ?? STRENGTH_RANGES.argon2.fallback,
      timeCost: ARGON2_TIME_COST,
      parallelism: ARGON2_PARALLELISM,
      hashLength: ARGON2_HASH_LENGTH,
    });
  },

  async verify(candidate, stored) {
    if (!stored.startsWith("$argon2")) return false;
    try {
      return await argon2.verify(stored, candidate);
    } catch {
      return false;
    }
  },
};

// ============================================================
// bcrypt
// ============================================================

export const bcryptHasher: PasswordHasher = {
  async hash(value, strength) {
    return bcrypt.hash(value, strength ?? STRENGTH_RANGES.bcrypt.fallback);
  },

  async verify(candidate, stored) {
    if (!stored.startsWith("$2")) return false;
    try {
      return await bcrypt.compare(candidate, stored);
    } catch {
      return false;
    }
  },
};

// ============================================================
// scrypt
// ============================================================

const SCRYPT_BLOCK_SIZE = 8;
const SCRYPT_PARALLELIZATION = 1;
const SCRYPT_KEY_LENGTH = 32;
const SCRYPT_SALT_LENGTH = 16;

/** `$scrypt$ln=<log2 N>,r=<r>,p=<p>$<salt>$<key>`, both base64. */
const SCRYPT_FORMAT = /^\$scrypt\$ln=(\d+),r=(\d+),p=(\d+)\$([^$]+)\$([^$]+)$/;

function deriveScrypt(
  value: string,
  salt: Buffer,
  keyLength: number,
  options: ScryptOptions,
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(value, salt, keyLength, options, (error, key) => {
      if (error) {
        reject(error);
      } else {
        resolve(key);
      }
    });
  });
}

function scryptOptions(cost: number, blockSize: number, parallelization: number) {
  return {
    N: cost,
    r: blockSize,
    p: parallelization,
    maxmem: 256 * cost * blockSize,
  } satisfies ScryptOptions;
}

export const scryptHasher: PasswordHasher = {
  async hash(value, strength) {
    const cost = strength ?? STRENGTH_RANGES.scrypt.fallback;
    const salt = randomBytes(SCRYPT_SALT_LENGTH);
    const key = await deriveScrypt(
      value,
      salt,
      SCRYPT_KEY_LENGTH,
      scryptOptions(cost, SCRYPT_BLOCK_SIZE, SCRYPT_PARALLELIZATION),
    );
    return [
      "",
      "scrypt",
      `ln=${Math.log2(cost)},r=${SCRYPT_BLOCK_SIZE},p=${SCRYPT_PARALLELIZATION}`,
      salt.toString("base64"),
      key.toString("base64"),
    ].join("$");
  },

  async verify(candidate, stored) {
    const match = SCRYPT_FORMAT.exec(stored);
    if (match === null) return false;

    const [, logCost, blockSize, parallelization, salt, key] = match;
    const expected = Buffer.from(key ?? "", "base64");
    const exponent = Number(logCost);
    if (expected.length === 0 || exponent < 1 || exponent > 20) return false;

    try {
      const actual = await deriveScrypt(
        candidate,
        Buffer.from(salt ?? "", "base64"),
        expected.length,
        scryptOptions(
          2 ** exponent,
          Number(blockSize),
          Number(parallelization),
        ),
      );
      return timingSafeEqual(actual, expected);
    } catch {
      return false;
    }
  },
};

// ============================================================
// Unsalted digests
// ============================================================

function digestHasher(algorithm: "sha256" | "sha512"): PasswordHasher {
  const digest = (value: string) =>
    createHash(algorithm).update(value, "utf8").digest();

  return {
    hash(value) {
      return Promise.resolve(digest(value).toString("base64"));
    },

    verify(candidate, stored) {
      const expected = Buffer.from(stored, "base64");
      const actual = digest(candidate);
      return Promise.resolve(
        expected.length === actual.length && timingSafeEqual(actual, expected),
      );
    },
  };
}

export const sha256Hasher = digestHasher("sha256");
export const sha512Hasher = digestHasher("sha512");

/**
 * The built-in hasher for every algorithm.
 */
export function createDefaultHashers(): HasherRegistry {
  return {
    argon2: argon2Hasher,
    bcrypt: bcryptHasher,
    scrypt: scryptHasher,
    sha256: sha256Hasher,
    sha512: sha512Hasher,
  };
}
