/**
 * Dimensional value index
 *
 * Lists the values each dimension takes, weighted by a row count or a
 * measure, as one relation a search box or a filter picker can read.
 * Text-like dimensions contribute one row per distinct value; numeric ones
 * a single `<min> to <max>` row. Fragments are stacked with UNION ALL.
 */

import { agg, col, lit, type Expr } from '../parser/ast.js';
import type { Dimension, ScalarType, SourceTable } from '../model/source-table.js';
import type { DimensionRef, SemanticModel } from '../model/semantic-model.js';
import {
  Plan,
  aggregate,
  extend,
  filter,
  joinNodes,
  limit,
  orderBy,
  printPlan,
  project,
  scan,
  union,
  type Condition,
  type NamedExpr,
  type PlanNode,
} from './plan.js';
import { compileResolved, qualify, type AggregationRequest } from './aggregation-compiler.js';
import { requiredColumns } from './projection.js';
import { resolveOptions, type CompilerOptions, type ResolvedOptions } from '../config.js';
import { InvalidRequestError } from '../errors.js';

export interface IndexRequest {
  /** dimensions to index; every dimension of the model when omitted */
  fields?: readonly string[];
  /** measure weighting each value; rows of the dimension's table when omitted */
  by?: string;
}

export const INDEX_COLUMNS = ['fieldName', 'fieldPath', 'fieldType', 'fieldValue', 'weight'] as const;

export type IndexFieldType = ScalarType | 'unknown';

const VALUE = '__value__';
const MIN = '__min__';
const MAX = '__max__';
const COUNT = '__count__';
const WEIGHT = 'weight';

/** best-effort scalar type of a dimension's values */
export function dimensionType(table: SourceTable, dimension: Dimension): IndexFieldType {
  const expr = dimension.resolved;
  switch (expr.kind) {
    case 'column':
      return table.scalarType(expr.name) ?? 'unknown';
    case 'truncate':
      return 'timestamp';
    case 'binary':
    case 'negate':
      return 'number';
    case 'cast':
      return expr.to === 'string' ? 'string' : 'number';
    case 'call':
      switch (expr.fn) {
        case 'lower':
        case 'upper':
        case 'concat':
          return 'string';
        case 'length':
          return 'integer';
        case 'abs':
        case 'round':
          return 'number';
        default:
          return 'unknown';
      }
    case 'literal':
      if (typeof expr.value === 'string') return 'string';
      if (typeof expr.value === 'number') return 'number';
      if (typeof expr.value === 'boolean') return 'boolean';
      return 'unknown';
    default:
      return 'unknown';
  }
}

function notNull(operand: Expr): Condition {
  return { kind: 'compare', operator: 'is not null', operand };
}

class IndexCompiler {
  /** fragments never cap or log on their own */
  private readonly inner: ResolvedOptions;
  private readonly weightColumn: string | undefined;

  constructor(
    private readonly model: SemanticModel,
    private readonly request: IndexRequest,
    private readonly options: ResolvedOptions
  ) {
    this.inner = { ...options, debug: false, maxLimit: undefined };
    this.weightColumn = request.by === undefined ? undefined : this.resolveWeight(request.by);
  }

  private resolveWeight(by: string): string {
    const ref = this.model.resolve(by);
    if (ref.kind === 'dimension') {
      throw new InvalidRequestError(`Index weight '${by}' is a dimension; weight by a measure`);
    }
    return ref.name;
  }

  private dimensions(): DimensionRef[] {
    if (this.request.fields === undefined) {
      return this.model.fieldRefs().filter((ref): ref is DimensionRef => ref.kind === 'dimension');
    }
    if (this.request.fields.length === 0) {
      throw new InvalidRequestError('An index request needs at least one field');
    }
    const seen = new Set<string>();
    return this.request.fields.flatMap((name): DimensionRef[] => {
      const ref = this.model.resolve(name);
      if (ref.kind !== 'dimension') {
        throw new InvalidRequestError(`Cannot index '${name}'; only dimensions take values`);
      }
      if (seen.has(ref.name)) return [];
      seen.add(ref.name);
      return [ref];
    });
  }

  /** the dimension's table, narrowed to the columns its expression reads */
  private scanFor(ref: DimensionRef): PlanNode {
    const table = this.model.table(ref.table);
    if (!this.options.projectionPushdown) return scan(table.name, table.columnNames);
    const columns = requiredColumns(table, { dimensions: [ref.field.resolved] })
      .map((needed) => table.columnNames.filter((c) => needed.has(c)))
      .unwrapOr(table.columnNames);
    return scan(table.name, columns.length > 0 ? columns : table.columnNames.slice(0, 1));
  }

  /** group key and weight measure through the aggregation compiler */
  private weighted(weight: string, request: Omit<AggregationRequest, 'measures'>): PlanNode {
    return compileResolved(this.model, { ...request, measures: [weight] }, this.inner).root;
  }

  private labelled(input: PlanNode, ref: DimensionRef, type: IndexFieldType, value: Expr, weight: string): PlanNode {
    const definitions: NamedExpr[] = [
      { name: 'fieldName', expr: lit(ref.field.name) },
      { name: 'fieldPath', expr: lit(ref.name) },
      { name: 'fieldType', expr: lit(type) },
      { name: 'fieldValue', expr: value },
      ...(weight === WEIGHT ? [] : [{ name: WEIGHT, expr: col(weight) }]),
    ];
    return project(extend(input, definitions), INDEX_COLUMNS);
  }

  private values(ref: DimensionRef, type: IndexFieldType): PlanNode {
    const castValue: Expr = { kind: 'cast', to: 'string', operand: col(VALUE) };

    if (this.weightColumn === undefined) {
      const key = { name: VALUE, expr: qualify(ref.field.resolved, ref.table) };
      const counted = aggregate(this.scanFor(ref), [key], [{ name: COUNT, expr: agg('count') }]);
      return this.labelled(counted, ref, type, castValue, COUNT);
    }
    const grouped = extend(this.weighted(this.weightColumn, { groupKeys: [ref.name] }), [
      { name: VALUE, expr: col(ref.name) },
    ]);
    return this.labelled(project(grouped, [VALUE, this.weightColumn]), ref, type, castValue, this.weightColumn);
  }

  private range(ref: DimensionRef, type: IndexFieldType): PlanNode {
    const dimensionExpr = qualify(ref.field.resolved, ref.table);
    const bounds = [
      { name: MIN, expr: agg('min', dimensionExpr) },
      { name: MAX, expr: agg('max', dimensionExpr) },
    ];
    const present = filter(this.scanFor(ref), [notNull(dimensionExpr)]);
    const text: Expr = {
      kind: 'call',
      fn: 'concat',
      args: [
        { kind: 'cast', to: 'string', operand: col(MIN) },
        lit(' to '),
        { kind: 'cast', to: 'string', operand: col(MAX) },
      ],
    };

    if (this.weightColumn === undefined) {
      const summary = aggregate(present, [], [...bounds, { name: COUNT, expr: agg('count') }]);
      // a dimension with no values yields no row
      return this.labelled(filter(summary, [notNull(col(MIN))]), ref, type, text, COUNT);
    }
    const summary = filter(aggregate(present, [], bounds), [notNull(col(MIN))]);
    const weight = this.weighted(this.weightColumn, { filters: [{ field: ref.name, operator: 'is not null' }] });
    return this.labelled(joinNodes('cross', summary, weight), ref, type, text, this.weightColumn);
  }

  compile(): Plan {
    const fragments = this.dimensions().map((ref) => {
      const type = dimensionType(this.model.table(ref.table), ref.field);
      return type === 'number' || type === 'integer' ? this.range(ref, type) : this.values(ref, type);
    });
    if (fragments.length === 0) {
      throw new InvalidRequestError('The model has no dimensions to index');
    }

    let result = union(fragments);
    result = orderBy(result, [
      { column: 'fieldPath', direction: 'asc' },
      { column: WEIGHT, direction: 'desc' },
      { column: 'fieldValue', direction: 'asc' },
    ]);
    result = limit(result, this.options.maxLimit);

    if (this.options.debug) {
      this.options.logger.debug(`Compiled index plan:\n${printPlan(result)}`);
    }
    return new Plan(result, this.options.backend);
  }
}

/**
 * Compile a value index over the model's dimensions.
 */
export function compileIndex(model: SemanticModel, request: IndexRequest = {}, options: CompilerOptions = {}): Plan {
  return new IndexCompiler(model, request, resolveOptions(options)).compile();
}
