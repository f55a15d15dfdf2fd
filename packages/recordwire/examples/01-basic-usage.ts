/**
 * Example 01: Basic Usage
 *
 * This example walks through a client session:
 * - Connecting, signing in and selecting namespace and database
 * - Writing records with an encrypted and a hashed field
 * - Relating records with the RELATE builder
 * - Running a built SELECT with bound variables
 * - Following a table with a live query
 *
 * Point RECORDWIRE_URL at a running database to try it.
 */
import {
  createClient,
  type CreateClientOptions,
  defineFields,
  hashed,
  reversible,
  select,
} from "../src";

// ============================================================
// Step 1: Describe protected fields
// ============================================================

// Email is stored encrypted and read back in clear; the password is
// stored as a one-way hash
const userFields = defineFields([
  reversible("email"),
  hashed("password", "scrypt"),
]);

export async function main(options: CreateClientOptions = {}): Promise<void> {
  // ============================================================
  // Step 2: Connect
  // ============================================================

  const client = createClient(
    {
      url: process.env.RECORDWIRE_URL ?? "ws://localhost:8000/rpc",
      namespace: "shop",
      database: "main",
      auth: {
        username: process.env.RECORDWIRE_USERNAME ?? "root",
        password: process.env.RECORDWIRE_PASSWORD ?? "root",
      },
      encryptionKey: "example-secret-key",
    },
    options,
  );
  await client.connect();
  console.log("Connected:", client.state);

  // ============================================================
  // Step 3: Write records
  // ============================================================

  const alice = await client.create(
    "user:alice",
    {
      name: "Alice",
      age: 34,
      email: "alice@example.com",
      password: "correct horse battery staple",
    },
    { fields: userFields },
  );
  console.log("Created:", alice);

  await client.create("product:laptop", { name: "Laptop", price: 999.99 });

  // ============================================================
  // Step 4: Relate records
  // ============================================================

  const purchase = await client
    .relation()
    .from("user:alice")
    .to("product:laptop")
    .via("purchased")
    .withData({ price: 999.99, quantity: 1 })
    .execute();
  console.log("Purchase edge:", purchase);

  // ============================================================
  // Step 5: Query
  // ============================================================

  const [adults] = await client.execute(
    select("user")
      .fields("name", "age")
      .where("age >= $min")
      .bind("min", 18)
      .orderBy("name")
      .limit(10),
  );
  console.log("Adults:", adults);

  // ============================================================
  // Step 6: Live query
  // ============================================================

  const { id, stream } = await client.live("order");
  await client.create("order", { item: "product:laptop", total: 999.99 });

  const next = await stream.next();
  if (!next.done) {
    console.log(`Live ${next.value.action}:`, next.value.result);
  }
  await client.unsubscribe(id);

  // Clean up
  await client.disconnect();
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
