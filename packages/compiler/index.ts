/**
 * compiler package
 *
 * pipeline: request -> normalized filters -> grain -> partitions -> Plan -> (SQL | execute)
 */

// aggregation compiler
export { compileRequest, qualify, totalColumn, TOTAL_PREFIX } from './aggregation-compiler.js';
export type { AggregationRequest, OrderByItem, MutateInput, WindowInput } from './aggregation-compiler.js';

// value index
export { compileIndex, dimensionType, INDEX_COLUMNS } from './value-index.js';
export type { IndexRequest, IndexFieldType } from './value-index.js';

// plan
export {
  Plan,
  scan,
  filter,
  unnest,
  extend,
  joinNodes,
  aggregate,
  project,
  orderBy,
  limit,
  window,
  union,
  WINDOW_FUNCTIONS,
  printPlan,
  formatCondition,
} from './plan.js';
export type {
  PlanNode,
  ScanNode,
  FilterNode,
  UnnestNode,
  ExtendNode,
  JoinPlanNode,
  AggregateNode,
  ProjectNode,
  WindowNode,
  UnionNode,
  WindowDefinition,
  WindowFunction,
  SortKey,
  OrderByNode,
  LimitNode,
  NamedExpr,
  JoinPair,
  JoinKind,
  SortDirection,
  Condition,
  CompareCondition,
  LogicalCondition,
  ExecutionBackend,
} from './plan.js';

// SQL
export { generateSQL, sqlExpr, sqlCondition, sqlLiteral, quoteIdentifier } from './sql-generator.js';

// calculated measures
export {
  analyzeFormula,
  analyzeCalculated,
  neededBaseMeasures,
  collectGrandTotalRefs,
  evaluateFormula,
} from './measure-algebra.js';
export type { FormulaAnalysis, FormulaColumns } from './measure-algebra.js';

// filters
export {
  normalizeFilter,
  normalizeFilters,
  normalizeOperator,
  coerceLiteral,
  bindFilter,
  PredicateBuilder,
  FieldPredicates,
} from './predicate.js';
export type {
  FilterInput,
  FilterRecord,
  ComparisonJson,
  CompoundJson,
  LiteralKind,
  BoundFilter,
  BindContext,
} from './predicate.js';

// dependency graph
export { DependencyGraph, buildDependencyGraph, columnId } from './dependency-graph.js';
export type { GraphData, GraphEntry, GraphJSON, NodeType, DependencyType } from './dependency-graph.js';

// projection
export { expressionColumns, requiredColumns, requiredColumnsByTable } from './projection.js';
export type { Unanalyzable, TableUsage, ProjectionRequest } from './projection.js';

// time grains
export { TIME_GRAINS, parseTimeGrain, applyGrain, isFinerThan, truncateDate } from './time-grain.js';
export type { TimeGrain } from './time-grain.js';
