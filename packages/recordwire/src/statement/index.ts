export {
  type Clause,
  ExplainClause,
  type ExplainMode,
  FetchClause,
  FilterClause,
  formatDuration,
  GroupByClause,
  joinFragments,
  LimitOffsetClause,
  OmitClause,
  OrderByClause,
  type OrderEntry,
  ParallelClause,
  type SortDirection,
  SplitClause,
  TimeoutClause,
} from "./clauses";
export { insert, InsertStatement } from "./insert-statement";
export { liveSelect, LiveSelectStatement } from "./live-statement";
export {
  create,
  type DataVerb,
  type FilteredVerb,
  MutationStatement,
  type MutationVerb,
  remove,
  update,
  upsert,
} from "./mutation-statement";
export {
  relate,
  RelationBuilder,
  type RelationBuilderConfig,
  type StatementRunner,
  type WithEntityOptions,
} from "./relate-builder";
export { select, SelectStatement } from "./select-statement";
export { edgeTarget, parseTarget, renderTarget } from "./target";
export {
  LetStatement,
  letVariable,
  ReturnStatement,
  returnValue,
  transaction,
  type TransactionOutcome,
  TransactionStatement,
} from "./transaction-statement";
export {
  type RecordRef,
  type ReturnMode,
  type Statement,
  type StatementTarget,
} from "./types";
export { formatValue, raw, RawValue } from "./values";
