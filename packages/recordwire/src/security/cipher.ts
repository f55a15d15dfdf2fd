/**
 * Reversible field encryption: AES-256-GCM.
 *
 * Output is `base64(iv ‖ ciphertext ‖ authTag)` with a random 96-bit IV,
 * so the same plaintext encrypts differently every time while any client
 * holding the same key material can decrypt it.
 */
import {
  createCipheriv,
  createDecipheriv,
  createHash,
  randomBytes,
} from "node:crypto";

import { ConfigurationError, DecryptionError } from "../errors";

// ============================================================
// Types
// ============================================================

/**
 * A ready-to-use symmetric cipher for string fields.
 */
export type FieldCipher = Readonly<{
  encrypt(plaintext: string): string;
  /** @throws DecryptionError when the value was tampered with or the key is wrong */
  decrypt(ciphertext: string): string;
}>;

// ============================================================
// AES-GCM
// ============================================================

const ALGORITHM = "aes-256-gcm";
const IV_LENGTH = 12;
const TAG_LENGTH = 16;

/** Shortest key material accepted. */
export const MIN_KEY_LENGTH = 8;

export class AesGcmCipher implements FieldCipher {
  readonly #key: Buffer;

  /**
   * @param keyMaterial - Secret of at least 8 characters; hashed with
   *   SHA-256 into the 256-bit key.
   */
  constructor(keyMaterial: string) {
    if (keyMaterial.length < MIN_KEY_LENGTH) {
      throw new ConfigurationError(
        `Encryption key must be at least ${MIN_KEY_LENGTH} characters`,
        { keyLength: keyMaterial.length },
        { suggestion: "Provide a longer encryption key." },
      );
    }
    this.#key = createHash("sha256").update(keyMaterial, "utf8").digest();
  }

  encrypt(plaintext: string): string {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.#key, iv);
    const ciphertext = Buffer.concat([
      cipher.update(plaintext, "utf8"),
      cipher.final(),
    ]);
    return Buffer.concat([iv, ciphertext, cipher.getAuthTag()]).toString(
      "base64",
    );
  }

  decrypt(encoded: string): string {
    const payload = Buffer.from(encoded, "base64");
    if (
      payload.length < IV_LENGTH + TAG_LENGTH ||
      payload.toString("base64") !== encoded
    ) {
      throw new DecryptionError("Value is not an encrypted payload", {
        length: encoded.length,
      });
    }

    const iv = payload.subarray(0, IV_LENGTH);
    const tag = payload.subarray(payload.length - TAG_LENGTH);
    const ciphertext = payload.subarray(IV_LENGTH, payload.length - TAG_LENGTH);

    try {
      const decipher = createDecipheriv(ALGORITHM, this.#key, iv);
      decipher.setAuthTag(tag);
      return Buffer.concat([
        decipher.update(ciphertext),
        decipher.final(),
      ]).toString("utf8");
    } catch (error) {
      throw new DecryptionError(
        "Authentication failed: wrong key or tampered value",
        {},
        { cause: error },
      );
    }
  }
}
