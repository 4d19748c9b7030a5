/**
 * Expression AST
 *
 * The owned expression language used by dimension bodies, measure bodies,
 * calculated-measure formulas and filter predicates. Everything here is plain
 * data so the dependency graph and projection extractor can walk it without
 * running anything. The one exception is `opaque`, the explicit escape hatch
 * for logic the language cannot express.
 */

// ---
// VALUES
// ---

export type Scalar = string | number | boolean | Date | null;

export type Value = Scalar | readonly Value[] | { readonly [field: string]: Value };

export type Row = Record<string, Value>;

// ---
// TIME GRAINS
// ---

/** finest to coarsest */
export const TIME_GRAINS = ['second', 'minute', 'hour', 'day', 'week', 'month', 'quarter', 'year'] as const;

export type TimeGrain = (typeof TIME_GRAINS)[number];

// ---
// SCALAR AND AGGREGATE EXPRESSIONS
// ---

export type AggregateFunction = 'sum' | 'count' | 'count_distinct' | 'min' | 'max' | 'mean';

export type ScalarFunction = 'lower' | 'upper' | 'abs' | 'round' | 'coalesce' | 'length' | 'concat';

export type ArithmeticOp = 'add' | 'sub' | 'mul' | 'div';

export interface ColumnExpr {
  kind: 'column';
  name: string;
}

export interface LiteralExpr {
  kind: 'literal';
  value: Scalar;
}

export interface BinaryExpr {
  kind: 'binary';
  op: ArithmeticOp;
  left: Expr;
  right: Expr;
}

export interface NegateExpr {
  kind: 'negate';
  operand: Expr;
}

export interface CallExpr {
  kind: 'call';
  fn: ScalarFunction;
  args: Expr[];
}

/** `arg` is null for count(*) */
export interface AggregateExpr {
  kind: 'aggregate';
  fn: AggregateFunction;
  arg: Expr | null;
}

export interface CastExpr {
  kind: 'cast';
  to: 'double' | 'string';
  operand: Expr;
}

export interface TruncateExpr {
  kind: 'truncate';
  grain: TimeGrain;
  operand: Expr;
}

/**
 * Logic the expression language cannot express.
 *
 * `sql` may contain `{column}` placeholders that the SQL generator replaces
 * with the qualified column. `evaluate` receives the owning table's row with
 * bare column names. Projection pushdown treats any opaque expression as
 * needing every column of its table.
 */
export interface OpaqueExpr {
  kind: 'opaque';
  sql: string;
  evaluate: (row: Row) => Value;
  /** set once the expression is bound to a table */
  table?: string;
}

export type Expr =
  | ColumnExpr
  | LiteralExpr
  | BinaryExpr
  | NegateExpr
  | CallExpr
  | AggregateExpr
  | CastExpr
  | TruncateExpr
  | OpaqueExpr;

// ---
// CALCULATED-MEASURE FORMULAS
// ---

export interface FormulaLiteral {
  kind: 'literal';
  value: number;
}

export interface MeasureRef {
  kind: 'measureRef';
  name: string;
}

export interface GrandTotalOf {
  kind: 'grandTotal';
  of: MeasureRef;
}

export interface FormulaBinary {
  kind: 'binary';
  op: ArithmeticOp;
  left: MeasureExpr;
  right: MeasureExpr;
}

export type MeasureExpr = FormulaLiteral | MeasureRef | GrandTotalOf | FormulaBinary;

// ---
// PREDICATES
// ---

export const COMPARISON_OPERATORS = [
  '=',
  '!=',
  '>',
  '>=',
  '<',
  '<=',
  'in',
  'not in',
  'like',
  'not like',
  'ilike',
  'not ilike',
  'is null',
  'is not null',
] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export type CompoundOperator = 'AND' | 'OR';

export interface Comparison {
  type: 'comparison';
  field: string;
  operator: ComparisonOperator;
  value?: Scalar;
  values?: Scalar[];
}

export interface Compound {
  type: 'compound';
  operator: CompoundOperator;
  children: Predicate[];
}

export type Predicate = Comparison | Compound;

// ---
// HELPERS
// ---

export function col(name: string): ColumnExpr {
  return { kind: 'column', name };
}

export function lit(value: Scalar): LiteralExpr {
  return { kind: 'literal', value };
}

export function agg(fn: AggregateFunction, arg: Expr | null = null): AggregateExpr {
  return { kind: 'aggregate', fn, arg };
}

export function measureRef(name: string): MeasureRef {
  return { kind: 'measureRef', name };
}

export function grandTotal(name: string): GrandTotalOf {
  return { kind: 'grandTotal', of: measureRef(name) };
}

export function opaque(sql: string, evaluate: (row: Row) => Value): OpaqueExpr {
  return { kind: 'opaque', sql, evaluate };
}

export function isList(value: Value): value is readonly Value[] {
  return Array.isArray(value);
}

export function isStruct(value: Value): value is { readonly [field: string]: Value } {
  return typeof value === 'object' && value !== null && !(value instanceof Date) && !Array.isArray(value);
}

/** Visit every sub-expression, parents first. */
export function walkExpr(expr: Expr, visit: (node: Expr) => void): void {
  visit(expr);
  switch (expr.kind) {
    case 'binary':
      walkExpr(expr.left, visit);
      walkExpr(expr.right, visit);
      break;
    case 'negate':
    case 'cast':
    case 'truncate':
      walkExpr(expr.operand, visit);
      break;
    case 'call':
      for (const arg of expr.args) walkExpr(arg, visit);
      break;
    case 'aggregate':
      if (expr.arg) walkExpr(expr.arg, visit);
      break;
    default:
      break;
  }
}

/** Rebuild an expression bottom-up, replacing column references. */
export function mapColumns(expr: Expr, replace: (column: ColumnExpr) => Expr): Expr {
  switch (expr.kind) {
    case 'column':
      return replace(expr);
    case 'binary':
      return { ...expr, left: mapColumns(expr.left, replace), right: mapColumns(expr.right, replace) };
    case 'negate':
    case 'cast':
    case 'truncate':
      return { ...expr, operand: mapColumns(expr.operand, replace) };
    case 'call':
      return { ...expr, args: expr.args.map((arg) => mapColumns(arg, replace)) };
    case 'aggregate':
      return { ...expr, arg: expr.arg ? mapColumns(expr.arg, replace) : null };
    default:
      return expr;
  }
}
