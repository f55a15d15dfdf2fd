import { ConfigurationError } from "../errors";
import {
  type RecordRef,
  type ReturnMode,
  type StatementTarget,
} from "./types";

/**
 * Reads a target from its textual form: `a->e->b` is an edge triple,
 * `table:id` a record, anything else a table.
 */
export function parseTarget(value: string | StatementTarget): StatementTarget {
  if (typeof value !== "string") return value;

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ConfigurationError("Statement target must not be empty");
  }

  const segments = trimmed.split("->");
  if (segments.length === 3) {
    const [from = "", edge = "", to = ""] = segments.map((part) =>
      part.trim(),
    );
    return edgeTarget(from, edge, to);
  }
  if (segments.length !== 1) {
    throw new ConfigurationError(
      `Edge target must have the form from->edge->to, got "${trimmed}"`,
      { target: trimmed },
    );
  }

  return trimmed.includes(":") ?
      { kind: "record", id: trimmed }
    : { kind: "table", table: trimmed };
}

export function edgeTarget(
  from: string,
  edge: string,
  to: string,
): StatementTarget {
  if (from === "" || edge === "" || to === "") {
    throw new ConfigurationError(
      "Edge target needs a source, an edge table and a destination",
      { from, edge, to },
    );
  }
  return { kind: "edge", from, edge, to };
}

export function renderTarget(target: StatementTarget): string {
  switch (target.kind) {
    case "table": {
      return target.table;
    }
    case "record": {
      return target.id;
    }
    case "edge": {
      return `${target.from}->${target.edge}->${target.to}`;
    }
  }
}

export function recordIdOf(ref: RecordRef): string {
  return typeof ref === "string" ? ref : ref.id;
}

export function renderReturn(mode: ReturnMode): string {
  return `RETURN ${mode.toUpperCase()}`;
}
