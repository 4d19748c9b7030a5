/**
 * chasmless - a semantic query compiler that cannot double count
 *
 * Define dimensions and measures on source tables, join the tables with
 * declared cardinalities, and ask for grouped aggregates. Every request
 * compiles to a relational plan that is safe against fan-out and chasm
 * traps; the plan renders to SQL or runs on an execution backend.
 *
 * @example
 * ```typescript
 * import { table, joinMany, createSemanticLayer, MemoryBackend } from 'chasmless';
 *
 * const orders = table('orders', { id: 'integer', region: 'string', amount: 'number' })
 *   .defineDimension('region', 'region')
 *   .defineMeasure('revenue', 'sum(amount)');
 * const items = table('line_items', { order_id: 'integer', sku: 'string' })
 *   .defineMeasure('item_count', 'count()');
 *
 * const layer = createSemanticLayer(joinMany(orders, items, 'orders.id = line_items.order_id'), {
 *   backend: new MemoryBackend({ orders: orderRows, line_items: itemRows }),
 * });
 *
 * // SQL only
 * const sql = layer.compile({ groupKeys: ['region'], measures: ['revenue'] }).toQueryText();
 *
 * // full pipeline: compile -> execute
 * const rows = await layer.query({ groupKeys: ['region'], measures: ['revenue', 'item_count'] });
 * ```
 */

// parser
export {
  parseExpression,
  parseFormula,
  parsePredicate,
  parseExpressionWithErrors,
  formatExpr,
  formatFormula,
  formatPredicate,
  formatScalar,
  col,
  lit,
  agg,
  measureRef,
  grandTotal,
  opaque,
  TIME_GRAINS,
  COMPARISON_OPERATORS,
} from './parser/index.js';
export type {
  ParseResult,
  ParseErrorDetail,
  Expr,
  MeasureExpr,
  Predicate,
  Comparison,
  Compound,
  ComparisonOperator,
  Scalar,
  Value,
  Row,
  TimeGrain,
  AggregateFunction,
} from './parser/index.js';

// model
export * from './model/index.js';

// compiler
export * from './compiler/index.js';

// executor
export { MemoryBackend, SqlBackend, createSqlBackend } from './executor/index.js';
export type { SqlConnection, SqlBackendOptions } from './executor/index.js';

// config and errors
export { resolveOptions } from './config.js';
export type { CompilerOptions, ResolvedOptions, Logger } from './config.js';
export * from './errors.js';

// --- internal imports ---

import type { Row } from './parser/ast.js';
import { SourceTable } from './model/source-table.js';
import { SemanticModel, type ModelDescription } from './model/semantic-model.js';
import type { JoinTree } from './model/join-tree.js';
import type { CalculatedMeasureInput } from './model/source-table.js';
import { compileRequest, type AggregationRequest } from './compiler/aggregation-compiler.js';
import type { ExecutionBackend, Plan } from './compiler/plan.js';
import { compileIndex, type IndexRequest } from './compiler/value-index.js';
import type { DependencyGraph } from './compiler/dependency-graph.js';
import { requiredColumnsByTable, type ProjectionRequest } from './compiler/projection.js';
import type { CompilerOptions } from './config.js';

/**
 * High-level API: a model plus the options every request compiles with.
 */
export class SemanticLayer {
  readonly model: SemanticModel;
  private readonly options: CompilerOptions;

  constructor(model: SemanticModel, options: CompilerOptions = {}) {
    this.model = model;
    this.options = options;
  }

  /** compile a request to a plan (no execution) */
  compile(request: AggregationRequest): Plan {
    return compileRequest(this.model, request, this.options);
  }

  /** SQL text of a request */
  toSQL(request: AggregationRequest): string {
    return this.compile(request).toQueryText();
  }

  /** compile and execute, on `backend` or the configured one */
  async query(request: AggregationRequest, backend?: ExecutionBackend): Promise<Row[]> {
    return this.compile(request).execute(backend);
  }

  /** plan of a value index over the model's dimensions */
  compileIndex(request: IndexRequest = {}): Plan {
    return compileIndex(this.model, request, this.options);
  }

  /** rows of fieldName, fieldPath, fieldType, fieldValue and weight */
  async index(request: IndexRequest = {}, backend?: ExecutionBackend): Promise<Row[]> {
    return this.compileIndex(request).execute(backend);
  }

  /** a layer whose model gains a namespace-level calculated measure */
  withCalculatedMeasure(name: string, input: CalculatedMeasureInput): SemanticLayer {
    return new SemanticLayer(this.model.defineCalculatedMeasure(name, input), this.options);
  }

  describe(): ModelDescription {
    return this.model.describe();
  }

  dependencyGraph(): DependencyGraph {
    return this.model.dependencyGraph();
  }

  requiredColumns(request: ProjectionRequest): Map<string, Set<string>> {
    return requiredColumnsByTable(this.model, request);
  }
}

/**
 * Create a semantic layer over a table, a join tree or a ready model.
 */
export function createSemanticLayer(
  source: SemanticModel | JoinTree | SourceTable,
  options: CompilerOptions = {}
): SemanticLayer {
  const model = source instanceof SemanticModel ? source : new SemanticModel(source);
  return new SemanticLayer(model, options);
}
