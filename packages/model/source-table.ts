/**
 * Source tables and their semantic fields
 *
 * A SourceTable is a named relation with a known column set plus ordered
 * dimension, measure and calculated-measure definitions. Tables are
 * immutable: every define* call returns a new table.
 */

import {
  mapColumns,
  walkExpr,
  type ColumnExpr,
  type Expr,
  type MeasureExpr,
  type TimeGrain,
} from '../parser/ast.js';
import { parseExpression, parseFormula } from '../parser/chevrotain-parser.js';
import { parseTimeGrain } from '../compiler/time-grain.js';
import { DuplicateFieldError, InvalidDefinitionError, UnknownFieldError } from '../errors.js';

// ---
// COLUMN TYPES
// ---

export type ScalarType = 'string' | 'number' | 'integer' | 'boolean' | 'date' | 'timestamp';

export interface StructType {
  [field: string]: ScalarType;
}

export interface ArrayType {
  array: ScalarType | StructType;
}

export type ColumnType = ScalarType | ArrayType;

// ---
// FIELD DEFINITIONS
// ---

export interface Dimension {
  readonly name: string;
  readonly table: string;
  /** as written, may reference earlier dimensions */
  readonly expr: Expr;
  /** earlier dimensions inlined, raw columns only */
  readonly resolved: Expr;
  readonly isTimeDimension: boolean;
  readonly smallestTimeGrain?: TimeGrain;
  readonly description?: string;
}

export interface Measure {
  readonly name: string;
  readonly table: string;
  readonly expr: Expr;
  /** array columns to flatten, outermost first */
  readonly unnest: readonly string[];
  readonly description?: string;
}

export interface CalculatedMeasure {
  readonly name: string;
  /** null for namespace-level measures defined on a joined model */
  readonly table: string | null;
  readonly formula: MeasureExpr;
  readonly description?: string;
}

export interface DimensionOptions {
  expr: string | Expr;
  /** defaults to true for a bare date or timestamp column */
  isTimeDimension?: boolean;
  smallestTimeGrain?: TimeGrain | string;
  description?: string;
}

export interface MeasureOptions {
  expr: string | Expr;
  unnest?: string[];
  description?: string;
}

export type DimensionInput = string | Expr | DimensionOptions;

export type MeasureInput = string | Expr | MeasureOptions;

export type CalculatedMeasureInput = string | MeasureExpr | { formula: string | MeasureExpr; description?: string };

const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function assertValidName(name: string, what: string): void {
  if (!NAME_PATTERN.test(name)) {
    throw new InvalidDefinitionError(`Invalid ${what} name '${name}'`);
  }
}

function toExpr(input: string | Expr): Expr {
  return typeof input === 'string' ? parseExpression(input) : input;
}

export function toFormula(input: CalculatedMeasureInput): { formula: MeasureExpr; description?: string } {
  if (typeof input === 'string') return { formula: parseFormula(input) };
  if ('kind' in input) return { formula: input };
  const formula = typeof input.formula === 'string' ? parseFormula(input.formula) : input.formula;
  return { formula, description: input.description };
}

function countAggregates(expr: Expr): number {
  let count = 0;
  walkExpr(expr, (node) => {
    if (node.kind === 'aggregate') count += 1;
  });
  return count;
}

function hasOpaque(expr: Expr): boolean {
  let found = false;
  walkExpr(expr, (node) => {
    if (node.kind === 'opaque') found = true;
  });
  return found;
}

function columnRefs(expr: Expr): ColumnExpr[] {
  const refs: ColumnExpr[] = [];
  walkExpr(expr, (node) => {
    if (node.kind === 'column') refs.push(node);
  });
  return refs;
}

/** columns read outside any aggregate */
function freeColumns(expr: Expr): string[] {
  switch (expr.kind) {
    case 'aggregate':
      return [];
    case 'column':
      return [expr.name];
    case 'binary':
      return [...freeColumns(expr.left), ...freeColumns(expr.right)];
    case 'negate':
    case 'cast':
    case 'truncate':
      return freeColumns(expr.operand);
    case 'call':
      return expr.args.flatMap(freeColumns);
    default:
      return [];
  }
}

// ---
// SOURCE TABLE
// ---

export class SourceTable {
  readonly name: string;
  readonly columns: Readonly<Record<string, ColumnType>>;
  readonly dimensions: ReadonlyMap<string, Dimension>;
  readonly measures: ReadonlyMap<string, Measure>;
  readonly calculatedMeasures: ReadonlyMap<string, CalculatedMeasure>;

  constructor(
    name: string,
    columns: Record<string, ColumnType>,
    fields: {
      dimensions?: ReadonlyMap<string, Dimension>;
      measures?: ReadonlyMap<string, Measure>;
      calculatedMeasures?: ReadonlyMap<string, CalculatedMeasure>;
    } = {}
  ) {
    assertValidName(name, 'table');
    for (const column of Object.keys(columns)) assertValidName(column, 'column');
    this.name = name;
    this.columns = Object.freeze({ ...columns });
    this.dimensions = fields.dimensions ?? new Map();
    this.measures = fields.measures ?? new Map();
    this.calculatedMeasures = fields.calculatedMeasures ?? new Map();
    Object.freeze(this);
  }

  get columnNames(): string[] {
    return Object.keys(this.columns);
  }

  hasField(name: string): boolean {
    return this.dimensions.has(name) || this.measures.has(name) || this.calculatedMeasures.has(name);
  }

  fieldNames(): string[] {
    return [...this.dimensions.keys(), ...this.measures.keys(), ...this.calculatedMeasures.keys()];
  }

  /** scalar type of a raw column, undefined for unknown or nested columns */
  scalarType(column: string): ScalarType | undefined {
    const type = this.columns[column];
    return typeof type === 'string' ? type : undefined;
  }

  defineDimension(name: string, input: DimensionInput): SourceTable {
    this.assertNewField(name);
    const options: DimensionOptions = typeof input === 'string' || 'kind' in input ? { expr: input } : input;
    const expr = toExpr(options.expr);

    if (countAggregates(expr) > 0) {
      throw new InvalidDefinitionError(`Dimension '${this.name}.${name}' must not aggregate`);
    }

    // resolve against raw columns overlaid with earlier dimensions
    const resolved = mapColumns(expr, (column) => {
      const earlier = this.dimensions.get(column.name);
      if (earlier) return earlier.resolved;
      if (column.name in this.columns) return column;
      throw new UnknownFieldError(column.name, `in dimension '${this.name}.${name}'`);
    });

    const columnType = expr.kind === 'column' ? this.scalarType(expr.name) : undefined;
    const inferredTime = columnType === 'date' || columnType === 'timestamp';
    const dimension: Dimension = {
      name,
      table: this.name,
      expr,
      resolved,
      isTimeDimension: options.isTimeDimension ?? inferredTime,
      smallestTimeGrain:
        options.smallestTimeGrain === undefined ? undefined : parseTimeGrain(options.smallestTimeGrain),
      description: options.description,
    };

    const dimensions = new Map(this.dimensions);
    dimensions.set(name, dimension);
    return this.with({ dimensions });
  }

  defineMeasure(name: string, input: MeasureInput): SourceTable {
    this.assertNewField(name);
    const options: MeasureOptions = typeof input === 'string' || 'kind' in input ? { expr: input } : input;
    const expr = toExpr(options.expr);
    const unnest = options.unnest ?? [];
    const label = `${this.name}.${name}`;

    if (countAggregates(expr) !== 1) {
      // also rejects nested aggregates
      throw new InvalidDefinitionError(`Measure '${label}' must contain exactly one aggregate`);
    }
    if (hasOpaque(expr)) {
      throw new InvalidDefinitionError(`Measure '${label}' cannot use an opaque expression`);
    }
    const [free] = freeColumns(expr);
    if (free !== undefined) {
      throw new InvalidDefinitionError(`Measure '${label}' reads column '${free}' outside its aggregate`);
    }

    const available = this.unnestedColumns(unnest, label);
    for (const ref of columnRefs(expr)) {
      if (available.has(ref.name)) continue;
      if (this.dimensions.has(ref.name)) {
        throw new InvalidDefinitionError(`Measure '${label}' references dimension '${ref.name}'; use raw columns`);
      }
      if (this.measures.has(ref.name) || this.calculatedMeasures.has(ref.name)) {
        throw new InvalidDefinitionError(
          `Measure '${label}' references measure '${ref.name}'; compose measures with a calculated measure`
        );
      }
      throw new InvalidDefinitionError(`Measure '${label}' references '${ref.name}', which is not a column of '${this.name}'`);
    }

    const measure: Measure = { name, table: this.name, expr, unnest: [...unnest], description: options.description };
    const measures = new Map(this.measures);
    measures.set(name, measure);
    return this.with({ measures });
  }

  defineCalculatedMeasure(name: string, input: CalculatedMeasureInput): SourceTable {
    this.assertNewField(name);
    const { formula, description } = toFormula(input);
    // references are checked when a request uses the measure
    const calculated: CalculatedMeasure = { name, table: this.name, formula, description };
    const calculatedMeasures = new Map(this.calculatedMeasures);
    calculatedMeasures.set(name, calculated);
    return this.with({ calculatedMeasures });
  }

  /**
   * Columns visible after flattening `path`: the raw columns, then for every
   * step the element fields of the array column it names.
   */
  unnestedColumns(path: readonly string[], label = this.name): Set<string> {
    const available = new Map<string, ColumnType>(Object.entries(this.columns));
    for (const step of path) {
      const type = available.get(step);
      if (type === undefined || typeof type === 'string') {
        throw new InvalidDefinitionError(`Unnest step '${step}' of '${label}' is not an array column`);
      }
      available.delete(step);
      const element = type.array;
      if (typeof element === 'string') {
        available.set(step, element);
        continue;
      }
      for (const [field, fieldType] of Object.entries(element)) {
        if (available.has(field)) {
          throw new InvalidDefinitionError(`Struct field '${field}' of '${step}' shadows a column of '${this.name}'`);
        }
        available.set(field, fieldType);
      }
    }
    return new Set(available.keys());
  }

  /** element fields exposed by unnesting `column` after `before`, null for scalar arrays */
  structFields(column: string, before: readonly string[]): string[] | null {
    let current: Record<string, ColumnType> = { ...this.columns };
    for (const step of [...before, column]) {
      const type = current[step];
      if (type === undefined || typeof type === 'string') {
        throw new InvalidDefinitionError(`Unnest step '${step}' of '${this.name}' is not an array column`);
      }
      if (step === column) {
        return typeof type.array === 'string' ? null : Object.keys(type.array);
      }
      const next: Record<string, ColumnType> = { ...current };
      delete next[step];
      if (typeof type.array === 'string') {
        next[step] = type.array;
      } else {
        Object.assign(next, type.array);
      }
      current = next;
    }
    return null;
  }

  private assertNewField(name: string): void {
    assertValidName(name, 'field');
    if (this.hasField(name)) {
      throw new DuplicateFieldError(name, this.name);
    }
  }

  private with(fields: {
    dimensions?: ReadonlyMap<string, Dimension>;
    measures?: ReadonlyMap<string, Measure>;
    calculatedMeasures?: ReadonlyMap<string, CalculatedMeasure>;
  }): SourceTable {
    return new SourceTable(this.name, { ...this.columns }, {
      dimensions: fields.dimensions ?? this.dimensions,
      measures: fields.measures ?? this.measures,
      calculatedMeasures: fields.calculatedMeasures ?? this.calculatedMeasures,
    });
  }
}

/**
 * Create a source table from its column types.
 */
export function table(name: string, columns: Record<string, ColumnType>): SourceTable {
  return new SourceTable(name, columns);
}
