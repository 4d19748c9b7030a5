/**
 * Predicate normalizer
 *
 * Filters arrive as predicate trees, JSON objects, key-value records,
 * strings or builder callbacks. They are all normalized to one Predicate
 * tree here, then bound to model fields (with literal coercion) and
 * classified by the tables they touch so the compiler can push them down.
 */

import { z } from 'zod';
import {
  COMPARISON_OPERATORS,
  type Comparison,
  type ComparisonOperator,
  type Compound,
  type CompoundOperator,
  type Expr,
  type Predicate,
  type Scalar,
} from '../parser/ast.js';
import { parsePredicate } from '../parser/chevrotain-parser.js';
import type { SemanticModel, DimensionRef, FieldRef, MeasureLikeRef } from '../model/semantic-model.js';
import type { Condition } from './plan.js';
import {
  EmptyCompoundFilterError,
  MalformedFilterSpecError,
  UnknownFieldError,
  UnsupportedFilterOperatorError,
} from '../errors.js';

// ---
// INPUT FORMS
// ---

export interface ComparisonJson {
  field: string;
  operator: string;
  value?: Scalar;
  values?: Scalar[];
}

export interface CompoundJson {
  operator: string;
  conditions: unknown[];
}

export type FilterRecord = Record<string, Scalar | Scalar[]>;

export type FilterInput =
  | Predicate
  | ComparisonJson
  | CompoundJson
  | FilterRecord
  | string
  | ((t: PredicateBuilder) => Predicate);

const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null(), z.date()]);

const ComparisonJsonSchema = z
  .object({
    field: z.string().min(1),
    operator: z.string().min(1),
    value: ScalarSchema.optional(),
    values: z.array(ScalarSchema).optional(),
  })
  .strict();

const CompoundJsonSchema = z
  .object({
    operator: z.string().min(1),
    conditions: z.array(z.unknown()),
  })
  .strict();

const TreeComparisonSchema = ComparisonJsonSchema.extend({ type: z.literal('comparison') });

const TreeCompoundSchema = z
  .object({
    type: z.literal('compound'),
    operator: z.string().min(1),
    children: z.array(z.unknown()),
  })
  .strict();

const FilterRecordSchema = z.record(z.union([ScalarSchema, z.array(ScalarSchema)]));

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function parseWith<T>(schema: z.ZodType<T>, input: unknown, what: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new MalformedFilterSpecError(`Invalid ${what}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

// ---
// OPERATORS
// ---

const OPERATOR_ALIASES: Record<string, ComparisonOperator> = {
  '==': '=',
  eq: '=',
  equals: '=',
  '<>': '!=',
  ne: '!=',
};

function isComparisonOperator(value: string): value is ComparisonOperator {
  return COMPARISON_OPERATORS.some((op) => op === value);
}

export function normalizeOperator(operator: string): ComparisonOperator {
  const key = operator.trim().toLowerCase().replace(/\s+/g, ' ');
  const resolved = OPERATOR_ALIASES[key] ?? key;
  if (!isComparisonOperator(resolved)) {
    throw new UnsupportedFilterOperatorError(operator);
  }
  return resolved;
}

function normalizeCompoundOperator(operator: string): CompoundOperator {
  const upper = operator.trim().toUpperCase();
  if (upper === 'AND') return 'AND';
  if (upper === 'OR') return 'OR';
  throw new UnsupportedFilterOperatorError(operator);
}

function comparison(field: string, operatorInput: string, value: Scalar | undefined, values: Scalar[] | undefined): Comparison {
  const operator = normalizeOperator(operatorInput);
  const label = `Filter on '${field}' with operator '${operator}'`;

  switch (operator) {
    case 'in':
    case 'not in':
      if (values === undefined) {
        throw new MalformedFilterSpecError(`${label} requires 'values', a list`);
      }
      if (value !== undefined) {
        throw new MalformedFilterSpecError(`${label} takes 'values', not 'value'`);
      }
      if (values.length === 0) {
        throw new MalformedFilterSpecError(`${label} requires at least one value`);
      }
      return { type: 'comparison', field, operator, values: [...values] };
    case 'is null':
    case 'is not null':
      if (value !== undefined || values !== undefined) {
        throw new MalformedFilterSpecError(`${label} should not have 'value' or 'values'`);
      }
      return { type: 'comparison', field, operator };
    default:
      if (values !== undefined) {
        throw new MalformedFilterSpecError(`${label} takes a single 'value', not 'values'`);
      }
      if (value === undefined) {
        throw new MalformedFilterSpecError(`${label} requires 'value'`);
      }
      return { type: 'comparison', field, operator, value };
  }
}

function compound(operatorInput: string, children: Predicate[]): Predicate {
  const operator = normalizeCompoundOperator(operatorInput);
  if (children.length === 0) {
    throw new EmptyCompoundFilterError(operator);
  }
  return { type: 'compound', operator, children };
}

// ---
// BUILDER (callable form)
// ---

export class FieldPredicates {
  constructor(private readonly field: string) {}

  private cmp(operator: ComparisonOperator, value?: Scalar, values?: Scalar[]): Comparison {
    return comparison(this.field, operator, value, values);
  }

  eq(value: Scalar): Comparison {
    return this.cmp('=', value);
  }
  ne(value: Scalar): Comparison {
    return this.cmp('!=', value);
  }
  gt(value: Scalar): Comparison {
    return this.cmp('>', value);
  }
  gte(value: Scalar): Comparison {
    return this.cmp('>=', value);
  }
  lt(value: Scalar): Comparison {
    return this.cmp('<', value);
  }
  lte(value: Scalar): Comparison {
    return this.cmp('<=', value);
  }
  in(values: Scalar[]): Comparison {
    return this.cmp('in', undefined, values);
  }
  notIn(values: Scalar[]): Comparison {
    return this.cmp('not in', undefined, values);
  }
  like(pattern: string): Comparison {
    return this.cmp('like', pattern);
  }
  notLike(pattern: string): Comparison {
    return this.cmp('not like', pattern);
  }
  ilike(pattern: string): Comparison {
    return this.cmp('ilike', pattern);
  }
  notIlike(pattern: string): Comparison {
    return this.cmp('not ilike', pattern);
  }
  isNull(): Comparison {
    return this.cmp('is null');
  }
  isNotNull(): Comparison {
    return this.cmp('is not null');
  }
}

/**
 * Passed to callable filters: `(t) => t.and(t.field('amount').gt(100), ...)`.
 */
export class PredicateBuilder {
  field(name: string): FieldPredicates {
    return new FieldPredicates(name);
  }

  and(...children: Predicate[]): Predicate {
    return compound('AND', children);
  }

  or(...children: Predicate[]): Predicate {
    return compound('OR', children);
  }
}

// ---
// NORMALIZATION
// ---

function isBuilderCallback(input: unknown): input is (t: PredicateBuilder) => unknown {
  return typeof input === 'function';
}

function isObject(input: unknown): input is Record<string, unknown> {
  return typeof input === 'object' && input !== null && !Array.isArray(input);
}

function normalizeObject(input: Record<string, unknown>): Predicate {
  if (input.type === 'comparison') {
    const tree = parseWith(TreeComparisonSchema, input, 'comparison');
    return comparison(tree.field, tree.operator, tree.value, tree.values);
  }
  if (input.type === 'compound') {
    const tree = parseWith(TreeCompoundSchema, input, 'compound filter');
    // operator first, so a bad operator is reported before bad children
    const operator = normalizeCompoundOperator(tree.operator);
    return compound(operator, tree.children.map(normalizeFilter));
  }
  if ('conditions' in input) {
    const json = parseWith(CompoundJsonSchema, input, 'compound filter');
    const operator = normalizeCompoundOperator(json.operator);
    return compound(operator, json.conditions.map(normalizeFilter));
  }
  if ('field' in input && 'operator' in input) {
    const json = parseWith(ComparisonJsonSchema, input, 'filter');
    return comparison(json.field, json.operator, json.value, json.values);
  }

  // key-value shorthand: { region: 'West', status: ['open', 'new'] }
  const record = parseWith(FilterRecordSchema, input, 'filter record');
  const children = Object.entries(record).map(([field, value]) =>
    Array.isArray(value) ? comparison(field, 'in', undefined, value) : comparison(field, '=', value, undefined)
  );
  if (children.length === 0) {
    throw new MalformedFilterSpecError('Filter record must name at least one field');
  }
  return children.length === 1 ? children[0] : compound('AND', children);
}

/**
 * Normalize any accepted filter form into a Predicate tree.
 */
export function normalizeFilter(input: unknown): Predicate {
  if (typeof input === 'string') {
    return normalizeFilter(parsePredicate(input));
  }
  if (isBuilderCallback(input)) {
    return normalizeFilter(input(new PredicateBuilder()));
  }
  if (!isObject(input)) {
    throw new MalformedFilterSpecError(`Unsupported filter form: ${JSON.stringify(input)}`);
  }
  return normalizeObject(input);
}

export function normalizeFilters(input: FilterInput | FilterInput[] | undefined): Predicate[] {
  if (input === undefined) return [];
  return (Array.isArray(input) ? input : [input]).map(normalizeFilter);
}

// ---
// LITERAL COERCION
// ---

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}:\d{2}/;
const ZONE_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;

export type LiteralKind = 'date' | 'timestamp' | 'other' | 'unknown';

function parseDateString(text: string, field: string): Date {
  let iso = text;
  if (DATE_PATTERN.test(text)) {
    iso = `${text}T00:00:00Z`;
  } else if (TIMESTAMP_PATTERN.test(text)) {
    iso = text.replace(' ', 'T');
    if (!ZONE_SUFFIX.test(iso)) iso = `${iso}Z`;
  }
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    throw new MalformedFilterSpecError(`'${text}' is not a valid date for '${field}'`);
  }
  return date;
}

/**
 * String literals compared with date/timestamp fields become Dates. When the
 * field type is unknown, strings shaped like a date or timestamp are coerced.
 */
export function coerceLiteral(value: Scalar, kind: LiteralKind, field: string): Scalar {
  if (typeof value !== 'string') return value;
  if (kind === 'date' || kind === 'timestamp') return parseDateString(value, field);
  if (kind === 'unknown' && (DATE_PATTERN.test(value) || TIMESTAMP_PATTERN.test(value))) {
    return parseDateString(value, field);
  }
  return value;
}

// ---
// BINDING AND CLASSIFICATION
// ---

export interface BoundFilter {
  condition: Condition;
  /** tables whose dimensions the filter reads */
  tables: Set<string>;
  /** measures read; a filter with measures runs after aggregation */
  measures: MeasureLikeRef[];
}

export interface BindContext {
  model: SemanticModel;
  /** qualified row-level expression of a dimension (grain applied) */
  dimensionExpr(ref: DimensionRef): Expr;
  /** literal kind for coercion */
  dimensionKind(ref: DimensionRef): LiteralKind;
  /** a raw column named by a filter that matches no field */
  rawColumn(name: string): { table: string; operand: Expr; kind: LiteralKind };
}

function resolveOrUndefined(model: SemanticModel, name: string): FieldRef | undefined {
  try {
    return model.resolve(name);
  } catch (error) {
    if (error instanceof UnknownFieldError) return undefined;
    throw error;
  }
}

function bind(predicate: Predicate, context: BindContext, out: BoundFilter): Condition {
  if (predicate.type === 'compound') {
    return {
      kind: predicate.operator === 'AND' ? 'and' : 'or',
      children: predicate.children.map((child) => bind(child, context, out)),
    };
  }

  const ref = resolveOrUndefined(context.model, predicate.field);
  let operand: Expr;
  let kind: LiteralKind;
  if (ref === undefined) {
    const raw = context.rawColumn(predicate.field);
    out.tables.add(raw.table);
    operand = raw.operand;
    kind = raw.kind;
  } else if (ref.kind === 'dimension') {
    out.tables.add(ref.table);
    operand = context.dimensionExpr(ref);
    kind = context.dimensionKind(ref);
  } else {
    if (!out.measures.some((m) => m.name === ref.name)) out.measures.push(ref);
    operand = { kind: 'column', name: ref.name };
    kind = 'other';
  }

  const label = ref?.name ?? predicate.field;
  const coerce = (value: Scalar) => coerceLiteral(value, kind, label);
  return {
    kind: 'compare',
    operator: predicate.operator,
    operand,
    value: predicate.value === undefined ? undefined : coerce(predicate.value),
    values: predicate.values?.map(coerce),
  };
}

/**
 * Resolve a predicate's fields against the model and record which tables
 * and measures it touches. Mixing measures and dimensions is rejected.
 */
export function bindFilter(predicate: Predicate, context: BindContext): BoundFilter {
  const out: BoundFilter = {
    condition: { kind: 'and', children: [] },
    tables: new Set(),
    measures: [],
  };
  out.condition = bind(predicate, context, out);
  if (out.measures.length > 0 && out.tables.size > 0) {
    throw new MalformedFilterSpecError('A filter cannot mix measures and dimensions');
  }
  return out;
}

export type { Predicate, Comparison, Compound };
