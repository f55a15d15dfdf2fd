/**
 * Example 02: Field Encryption
 *
 * Runs without a database. Shows how described fields are transformed on
 * their way out and back:
 * - Reversible fields are encrypted with AES-256-GCM
 * - Hashed fields are one-way and can only be verified
 * - RELATE edge data taken from an entity is protected the same way
 */
import {
  defineFields,
  EncryptionPipeline,
  hashed,
  relate,
  reversible,
} from "../src";

export async function main(): Promise<void> {
  const pipeline = EncryptionPipeline.fromKey("example-secret-key");

  const fields = defineFields([
    reversible("ssn"),
    hashed("password", "scrypt"),
    hashed("apiKey", "sha256"),
  ]);

  // ============================================================
  // Outbound
  // ============================================================

  const record = {
    name: "Alice",
    ssn: "123-45-6789",
    password: "correct horse battery staple",
    apiKey: "example-api-key",
  };
  const stored = await pipeline.encryptFields({ ...record }, fields);
  console.log("Stored form:", stored);

  // ============================================================
  // Verification
  // ============================================================

  const passwordField = fields.find((field) => field.fieldName === "password");
  if (passwordField !== undefined) {
    const matches = await pipeline.verify(
      "correct horse battery staple",
      stored.password,
      passwordField,
    );
    console.log("Password matches:", matches);
  }

  // ============================================================
  // Inbound
  // ============================================================

  const restored = { ...stored };
  const report = pipeline.decryptFields(restored, fields);
  console.log("Decrypted fields:", report.decrypted);
  console.log("Read back:", restored);

  // ============================================================
  // Edge data
  // ============================================================

  const ownership = { since: "2024-01-01", serial: "SN-0042" };
  const statement = await relate({ pipeline })
    .from("user:alice")
    .to("device:phone")
    .via("owns")
    .withEntity(ownership, { fields: defineFields([reversible("serial")]) })
    .returnNone()
    .build();
  console.log("Statement:", statement);
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
