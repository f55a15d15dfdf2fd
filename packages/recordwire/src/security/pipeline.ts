/**
 * EncryptionPipeline - transforms described fields on their way to and
 * from the wire.
 *
 * Outbound, reversible fields are encrypted and hashed fields are hashed.
 * Inbound, only reversible fields are decrypted; a stored hash is never
 * touched on the way back.
 */
import { ConfigurationError, DecryptionError } from "../errors";
import { err, isOk, ok, type Result } from "../utils/result";
import { AesGcmCipher, type FieldCipher } from "./cipher";
import { type FieldDescriptor } from "./field-descriptor";
import { createDefaultHashers, type HasherRegistry } from "./hashers";

// ============================================================
// Types
// ============================================================

/**
 * A mutable bag of record fields.
 */
export type FieldBag = Record<string, unknown>;

export type FieldFailure = Readonly<{
  fieldName: string;
  error: DecryptionError;
}>;

/**
 * Outcome of {@link EncryptionPipeline.decryptFields}. Fields listed in
 * `failures` keep their encrypted value.
 */
export type DecryptionReport = Readonly<{
  decrypted: readonly string[];
  failures: readonly FieldFailure[];
}>;

export type EncryptionPipelineOptions = Readonly<{
  cipher: FieldCipher;
  /** Defaults to {@link createDefaultHashers}. */
  hashers?: HasherRegistry;
}>;

// ============================================================
// Pipeline
// ============================================================

export class EncryptionPipeline {
  readonly #cipher: FieldCipher | undefined;
  readonly #hashers: HasherRegistry;

  constructor(options: EncryptionPipelineOptions | undefined) {
    this.#cipher = options?.cipher;
    this.#hashers = options?.hashers ?? createDefaultHashers();
  }

  /**
   * Pipeline keyed by a secret string.
   */
  static fromKey(
    keyMaterial: string,
    hashers?: HasherRegistry,
  ): EncryptionPipeline {
    return new EncryptionPipeline({
      cipher: new AesGcmCipher(keyMaterial),
      ...(hashers !== undefined && { hashers }),
    });
  }

  /**
   * A pipeline that passes every value through unchanged.
   */
  static disabled(): EncryptionPipeline {
    return new EncryptionPipeline(undefined);
  }

  get enabled(): boolean {
    return this.#cipher !== undefined;
  }

  /**
   * Encrypts or hashes every described string field of `bag`, in place.
   * Missing and non-string fields are left alone.
   */
  async encryptFields<T extends FieldBag>(
    bag: T,
    descriptors: readonly FieldDescriptor[],
  ): Promise<T> {
    if (!this.enabled) return bag;

    for (const descriptor of descriptors) {
      const value = bag[descriptor.fieldName];
      if (typeof value !== "string") continue;
      Object.assign(bag, {
        [descriptor.fieldName]: await this.encryptValue(value, descriptor),
      });
    }
    return bag;
  }

  /**
   * Decrypts every reversible string field of `bag`, in place. A field
   * that fails keeps its stored value and is listed in the report.
   */
  decryptFields(
    bag: FieldBag,
    descriptors: readonly FieldDescriptor[],
  ): DecryptionReport {
    const decrypted: string[] = [];
    const failures: FieldFailure[] = [];
    if (!this.enabled) return { decrypted, failures };

    for (const descriptor of descriptors) {
      if (descriptor.algorithm.kind !== "reversible") continue;

      const value = bag[descriptor.fieldName];
      if (typeof value !== "string") continue;

      const result = this.tryDecrypt(value);
      if (isOk(result)) {
        bag[descriptor.fieldName] = result.data;
        decrypted.push(descriptor.fieldName);
      } else {
        failures.push({ fieldName: descriptor.fieldName, error: result.error });
      }
    }

    return { decrypted, failures };
  }

  /**
   * Transforms a single value according to its descriptor.
   */
  async encryptValue(
    value: string,
    descriptor: FieldDescriptor,
  ): Promise<string> {
    const { algorithm } = descriptor;
    switch (algorithm.kind) {
      case "plain": {
        return value;
      }
      case "reversible": {
        return this.#requireCipher().encrypt(value);
      }
      case "hash": {
        return this.#hashers[algorithm.hash].hash(value, descriptor.strength);
      }
    }
  }

  /**
   * @throws DecryptionError when the value was tampered with or the key is wrong
   */
  decryptValue(value: string): string {
    return this.#requireCipher().decrypt(value);
  }

  tryDecrypt(value: string): Result<string, DecryptionError> {
    try {
      return ok(this.decryptValue(value));
    } catch (error) {
      if (error instanceof DecryptionError) return err(error);
      throw error;
    }
  }

  /**
   * Checks `candidate` against a stored value of the described field.
   *
   * Resolves to `false` on any mismatch, including a malformed stored
   * value. Rejects only when the descriptor does not allow verification.
   */
  async verify(
    candidate: string,
    stored: string,
    descriptor: FieldDescriptor,
  ): Promise<boolean> {
    const { algorithm } = descriptor;
    if (algorithm.kind !== "hash" || !descriptor.verifiable) {
      throw new ConfigurationError(
        `Field "${descriptor.fieldName}" is not a verifiable hash`,
        { fieldName: descriptor.fieldName, algorithm },
      );
    }

    return this.#hashers[algorithm.hash].verify(candidate, stored);
  }

  #requireCipher(): FieldCipher {
    if (this.#cipher === undefined) {
      throw new ConfigurationError(
        "Encryption is disabled for this client",
        {},
        { suggestion: "Pass an encryption key in the client configuration." },
      );
    }
    return this.#cipher;
  }
}
