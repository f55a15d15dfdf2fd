import { nanoid } from "nanoid";

/**
 * Request ID generation.
 *
 * Default implementation uses nanoid: URL-safe, 21 characters, secure random.
 */

/**
 * ID generator function type.
 */
export type IdGenerator = () => string;

/**
 * Generates a new request ID.
 */
export function generateId(): string {
  return nanoid();
}

/**
 * Draws from `generator` until the ID is not in `taken`.
 * Gives up after `maxAttempts` so a broken generator cannot spin forever.
 */
export function generateUniqueId(
  taken: Readonly<{ has(id: string): boolean }>,
  generator: IdGenerator = generateId,
  maxAttempts = 8,
): string {
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const id = generator();
    if (!taken.has(id)) return id;
  }
  throw new Error(
    `Could not generate a unique request ID after ${maxAttempts} attempts`,
  );
}
