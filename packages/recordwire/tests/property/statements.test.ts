/**
 * Property-based tests for statement rendering.
 */
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { relate, select, type SelectStatement } from "../../src/statement";
import {
  fieldValueArb,
  identifierArb,
  recordIdArb,
  sortDirectionArb,
} from "./arbitraries";

type Modifier = (statement: SelectStatement) => SelectStatement;

const modifierArb: fc.Arbitrary<readonly Modifier[]> = fc
  .record({
    condition: identifierArb.map((field) => `${field} = true`),
    order: fc.tuple(identifierArb, sortDirectionArb),
    limit: fc.integer({ min: 0, max: 500 }),
    start: fc.integer({ min: 0, max: 500 }),
    fetch: identifierArb,
    timeoutMs: fc.integer({ min: 1, max: 59_000 }),
  })
  .map(({ condition, order, limit, start, fetch, timeoutMs }) => [
    (statement) => statement.where(condition),
    (statement) => statement.orderBy(order[0], order[1]),
    (statement) => statement.limit(limit),
    (statement) => statement.start(start),
    (statement) => statement.fetch(fetch),
    (statement) => statement.timeout(timeoutMs),
    (statement) => statement.parallel(),
  ]);

const CLAUSE_KEYWORDS = [
  " WHERE ",
  " ORDER BY ",
  " LIMIT ",
  " START ",
  " FETCH ",
  " TIMEOUT ",
  " PARALLEL",
];

describe("Statement Properties", () => {
  it("renders the same text whatever order clauses are added in", () => {
    fc.assert(
      fc.property(
        identifierArb,
        modifierArb.chain((modifiers) =>
          fc.tuple(
            fc.constant(modifiers),
            fc.shuffledSubarray([...modifiers], {
              minLength: modifiers.length,
            }),
          ),
        ),
        (table, [modifiers, shuffled]) => {
          const inOrder = modifiers.reduce(
            (statement, modify) => modify(statement),
            select(table),
          );
          const reordered = shuffled.reduce(
            (statement, modify) => modify(statement),
            select(table),
          );
          expect(reordered.render()).toBe(inOrder.render());
        },
      ),
    );
  });

  it("places clause keywords in canonical order", () => {
    fc.assert(
      fc.property(identifierArb, modifierArb, (table, modifiers) => {
        const text = [...modifiers]
          .reverse()
          .reduce((statement, modify) => modify(statement), select(table))
          .render();
        const positions = CLAUSE_KEYWORDS.map((keyword) =>
          text.indexOf(keyword),
        );
        expect(positions.every((position) => position > 0)).toBe(true);
        expect([...positions].sort((a, b) => a - b)).toEqual(positions);
      }),
    );
  });

  it("never renders a doubled operator", () => {
    fc.assert(
      fc.property(
        fc.array(
          fc.tuple(fc.constantFrom("", "AND ", "OR "), identifierArb),
          { minLength: 1, maxLength: 6 },
        ),
        (conditions) => {
          const text = conditions
            .reduce(
              (statement, [prefix, field]) =>
                statement.where(`${prefix}${field} > 1`),
              select("t"),
            )
            .render();
          expect(text).not.toMatch(/\b(AND|OR)\s+(AND|OR)\b/);
          expect(text).not.toMatch(/WHERE\s+(AND|OR)\b/);
        },
      ),
    );
  });

  it("carries relation data values through CONTENT unchanged", async () => {
    await fc.assert(
      fc.asyncProperty(
        recordIdArb,
        recordIdArb,
        identifierArb,
        fc.dictionary(identifierArb, fieldValueArb),
        async (from, to, edge, data) => {
          const text = await relate()
            .from(from)
            .to(to)
            .via(edge)
            .withData(data)
            .build();

          const prefix = `RELATE ${from}->${edge}->${to} `;
          expect(text.startsWith(prefix)).toBe(true);
          expect(text.endsWith(" RETURN AFTER")).toBe(true);

          const body = text.slice(prefix.length, -" RETURN AFTER".length);
          if (Object.keys(data).length === 0) {
            expect(body).toBe("");
            return;
          }
          expect(body.startsWith("CONTENT ")).toBe(true);
          const parsed: unknown = JSON.parse(body.slice("CONTENT ".length));
          expect(parsed).toEqual(data);
        },
      ),
    );
  });
});
