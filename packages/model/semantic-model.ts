/**
 * Semantic model - the merged field namespace of a join tree
 *
 * With a single table, fields keep their bare names. With two or more
 * tables every field is exposed as `<table>.<field>`, whether or not its
 * name collides. Lookups try the exact name first, then a unique
 * `.<name>` suffix; more than one suffix match is an error.
 */

import { formatExpr, formatFormula } from '../parser/prettifier.js';
import {
  SourceTable,
  assertValidName,
  toFormula,
  type CalculatedMeasure,
  type CalculatedMeasureInput,
  type ColumnType,
  type Dimension,
  type Measure,
} from './source-table.js';
import { TableGraph, leaf, leaves, type Cardinality, type JoinTree } from './join-tree.js';
import { buildDependencyGraph, type DependencyGraph } from '../compiler/dependency-graph.js';
import {
  AmbiguousFieldError,
  DuplicateFieldError,
  InvalidDefinitionError,
  UnknownFieldError,
} from '../errors.js';

// ---
// FIELD REFERENCES
// ---

export interface DimensionRef {
  kind: 'dimension';
  /** canonical name in the namespace */
  name: string;
  table: string;
  field: Dimension;
}

export interface MeasureFieldRef {
  kind: 'measure';
  name: string;
  table: string;
  field: Measure;
}

export interface CalculatedRef {
  kind: 'calculated';
  name: string;
  table: string | null;
  field: CalculatedMeasure;
}

export type FieldRef = DimensionRef | MeasureFieldRef | CalculatedRef;

export type MeasureLikeRef = MeasureFieldRef | CalculatedRef;

// ---
// DESCRIPTION
// ---

export interface FieldDescription {
  name: string;
  table: string | null;
  expression: string;
  description?: string;
}

export interface DimensionDescription extends FieldDescription {
  isTimeDimension: boolean;
  smallestTimeGrain?: string;
}

export interface MeasureDescription extends FieldDescription {
  unnest?: string[];
}

export interface ModelDescription {
  tables: { name: string; columns: Record<string, ColumnType> }[];
  dimensions: DimensionDescription[];
  measures: MeasureDescription[];
  calculatedMeasures: FieldDescription[];
  timeDimensions: string[];
  joins: { left: string; right: string; cardinality: Cardinality; on: string[] }[];
}

function collectJoins(tree: JoinTree): ModelDescription['joins'] {
  if (tree.kind === 'leaf') return [];
  const here = {
    left: tree.on.length > 0 ? tree.on[0].left.table : leaves(tree.left)[0].name,
    right: tree.on.length > 0 ? tree.on[0].right.table : leaves(tree.right)[0].name,
    cardinality: tree.cardinality,
    on: tree.on.map((k) => `${k.left.table}.${k.left.column} = ${k.right.table}.${k.right.column}`),
  };
  return [...collectJoins(tree.left), ...collectJoins(tree.right), here];
}

// ---
// MODEL
// ---

export class SemanticModel {
  readonly tree: JoinTree;
  readonly tables: ReadonlyMap<string, SourceTable>;
  /** true when fields are exposed as `<table>.<field>` */
  readonly prefixed: boolean;
  readonly calculatedMeasures: ReadonlyMap<string, CalculatedMeasure>;
  readonly graph: TableGraph;
  private readonly fields = new Map<string, FieldRef>();

  constructor(tree: JoinTree | SourceTable, calculatedMeasures: ReadonlyMap<string, CalculatedMeasure> = new Map()) {
    this.tree = tree instanceof SourceTable ? leaf(tree) : tree;
    const tables = leaves(this.tree);
    this.tables = new Map(tables.map((t) => [t.name, t]));
    this.prefixed = tables.length > 1;
    this.calculatedMeasures = calculatedMeasures;
    this.graph = new TableGraph(this.tree);

    for (const t of tables) {
      for (const field of t.dimensions.values()) {
        this.register({ kind: 'dimension', name: this.canonicalName(t.name, field.name), table: t.name, field });
      }
      for (const field of t.measures.values()) {
        this.register({ kind: 'measure', name: this.canonicalName(t.name, field.name), table: t.name, field });
      }
      for (const field of t.calculatedMeasures.values()) {
        this.register({ kind: 'calculated', name: this.canonicalName(t.name, field.name), table: t.name, field });
      }
    }
    for (const field of calculatedMeasures.values()) {
      this.register({ kind: 'calculated', name: field.name, table: null, field });
    }
  }

  private register(ref: FieldRef): void {
    if (this.fields.has(ref.name)) {
      throw new DuplicateFieldError(ref.name, 'the model');
    }
    this.fields.set(ref.name, ref);
  }

  canonicalName(table: string, field: string): string {
    return this.prefixed ? `${table}.${field}` : field;
  }

  table(name: string): SourceTable {
    const found = this.tables.get(name);
    if (!found) throw new UnknownFieldError(name, '(no such table)');
    return found;
  }

  /** canonical names in definition order */
  fieldNames(): string[] {
    return [...this.fields.keys()];
  }

  fieldRefs(): FieldRef[] {
    return [...this.fields.values()];
  }

  /**
   * Define a calculated measure over the whole namespace, e.g. a ratio of
   * measures owned by different tables. Returns a new model.
   */
  defineCalculatedMeasure(name: string, input: CalculatedMeasureInput): SemanticModel {
    assertValidName(name, 'field');
    if (this.fields.has(name)) throw new DuplicateFieldError(name, 'the model');
    const { formula, description } = toFormula(input);
    const calculated = new Map(this.calculatedMeasures);
    calculated.set(name, { name, table: null, formula, description });
    return new SemanticModel(this.tree, calculated);
  }

  resolve(name: string): FieldRef {
    const exact = this.fields.get(name);
    if (exact) return exact;

    // single-table models also accept `<table>.<field>`
    if (!this.prefixed) {
      const [only] = this.tables.keys();
      if (name.startsWith(`${only}.`)) {
        const bare = this.fields.get(name.slice(only.length + 1));
        if (bare) return bare;
      }
    }

    const matches = [...this.fields.values()].filter((ref) => ref.name.endsWith(`.${name}`));
    if (matches.length === 1) return matches[0];
    if (matches.length > 1) {
      throw new AmbiguousFieldError(
        name,
        matches.map((m) => m.name)
      );
    }
    throw new UnknownFieldError(name);
  }

  /**
   * Resolve a formula reference: the owning table's own fields win, then the
   * namespace. The target must be a measure or calculated measure.
   */
  resolveMeasure(name: string, fromTable: string | null): MeasureLikeRef {
    let ref: FieldRef | undefined;
    if (fromTable !== null && !name.includes('.')) {
      const owner = this.table(fromTable);
      if (owner.hasField(name)) ref = this.fields.get(this.canonicalName(fromTable, name));
    }
    ref ??= this.resolve(name);
    if (ref.kind === 'dimension') {
      throw new InvalidDefinitionError(`'${name}' is a dimension and cannot be used in a formula`);
    }
    return ref;
  }

  dependencyGraph(): DependencyGraph {
    return buildDependencyGraph(this);
  }

  describe(): ModelDescription {
    const dimensions: DimensionDescription[] = [];
    const measures: MeasureDescription[] = [];
    const calculatedMeasures: FieldDescription[] = [];

    for (const ref of this.fields.values()) {
      const base = { name: ref.name, table: ref.table, description: ref.field.description };
      switch (ref.kind) {
        case 'dimension':
          dimensions.push({
            ...base,
            expression: formatExpr(ref.field.expr),
            isTimeDimension: ref.field.isTimeDimension,
            smallestTimeGrain: ref.field.smallestTimeGrain,
          });
          break;
        case 'measure':
          measures.push({
            ...base,
            expression: formatExpr(ref.field.expr),
            unnest: ref.field.unnest.length > 0 ? [...ref.field.unnest] : undefined,
          });
          break;
        case 'calculated':
          calculatedMeasures.push({ ...base, expression: formatFormula(ref.field.formula) });
          break;
      }
    }

    return {
      tables: [...this.tables.values()].map((t) => ({ name: t.name, columns: { ...t.columns } })),
      dimensions,
      measures,
      calculatedMeasures,
      timeDimensions: dimensions.filter((d) => d.isTimeDimension).map((d) => d.name),
      joins: collectJoins(this.tree),
    };
  }
}

/**
 * Build the merged namespace of a join tree (or a single table).
 */
export function createModel(tree: JoinTree | SourceTable): SemanticModel {
  return new SemanticModel(tree);
}
