/**
 * Projection requirement extractor
 *
 * Works out which raw columns each table must supply so scans can read only
 * those. Anything the extractor cannot see through (an opaque expression, a
 * bare column name several tables own) widens the table to all of its
 * columns.
 */

import { err, ok, type Result } from 'neverthrow';
import { walkExpr, type Expr, type Predicate } from '../parser/ast.js';
import type { SourceTable } from '../model/source-table.js';
import type { SemanticModel } from '../model/semantic-model.js';
import { analyzeCalculated } from './measure-algebra.js';
import { normalizeFilters, type FilterInput } from './predicate.js';
import { UnknownFieldError } from '../errors.js';

export interface Unanalyzable {
  reason: 'opaque' | 'ambiguous';
  table: string;
  detail: string;
}

export interface TableUsage {
  /** resolved dimension expressions */
  dimensions?: readonly Expr[];
  measures?: readonly { expr: Expr; unnest: readonly string[] }[];
  /** row-level filter operands */
  filters?: readonly Expr[];
  joinKeys?: readonly string[];
}

/** Column names an expression reads, or err when it contains opaque logic. */
export function expressionColumns(expr: Expr, table: string): Result<Set<string>, Unanalyzable> {
  const columns = new Set<string>();
  let opaqueSql: string | undefined;
  walkExpr(expr, (node) => {
    if (node.kind === 'column') columns.add(node.name);
    if (node.kind === 'opaque') opaqueSql ??= node.sql;
  });
  if (opaqueSql !== undefined) {
    return err({ reason: 'opaque', table, detail: `opaque expression '${opaqueSql}'` });
  }
  return ok(columns);
}

/**
 * Raw columns of `table` needed to evaluate the given usage. Struct fields
 * exposed by an unnest path are not raw columns; the path's first array
 * column is.
 */
export function requiredColumns(table: SourceTable, usage: TableUsage): Result<Set<string>, Unanalyzable> {
  const needed = new Set<string>(usage.joinKeys ?? []);
  const exprs = [...(usage.dimensions ?? []), ...(usage.filters ?? [])];

  for (const measure of usage.measures ?? []) {
    if (measure.unnest.length > 0) needed.add(measure.unnest[0]);
    exprs.push(measure.expr);
  }

  for (const expr of exprs) {
    const columns = expressionColumns(expr, table.name);
    if (columns.isErr()) return err(columns.error);
    for (const column of columns.value) {
      if (column in table.columns) needed.add(column);
    }
  }
  return ok(needed);
}

interface CollectedUsage {
  dimensions: Expr[];
  measures: { expr: Expr; unnest: readonly string[] }[];
  filters: Expr[];
  joinKeys: string[];
}

export interface ProjectionRequest {
  groupKeys?: readonly string[];
  measures?: readonly string[];
  filters?: FilterInput | FilterInput[];
}

function predicateFields(predicate: Predicate, out: string[]): string[] {
  if (predicate.type === 'comparison') {
    out.push(predicate.field);
  } else {
    for (const child of predicate.children) predicateFields(child, out);
  }
  return out;
}

/**
 * Columns every leaf of the model must supply for a request. Every table
 * keeps the keys of the joins it takes part in.
 */
export function requiredColumnsByTable(model: SemanticModel, request: ProjectionRequest): Map<string, Set<string>> {
  const usage = new Map<string, CollectedUsage>();
  for (const name of model.tables.keys()) {
    const joinKeys = model.graph.hops(name).flatMap((hop) =>
      hop.edge.keys.map((k) => (hop.from === hop.edge.a ? k.a : k.b))
    );
    usage.set(name, { dimensions: [], measures: [], filters: [], joinKeys });
  }
  const widened = new Set<string>();
  const usageOf = (table: string): CollectedUsage => {
    const found = usage.get(table);
    if (!found) throw new UnknownFieldError(table, '(no such table)');
    return found;
  };

  const addField = (name: string, asFilter: boolean): void => {
    const ref = model.resolve(name);
    if (ref.kind === 'dimension') {
      const target = usageOf(ref.table);
      (asFilter ? target.filters : target.dimensions).push(ref.field.resolved);
      return;
    }
    for (const measure of analyzeCalculated(model, ref).baseMeasures.values()) {
      usageOf(measure.table).measures.push(measure.field);
    }
  };

  // filters may also name raw columns, bare or as `<table>.<column>`
  const addFilterField = (name: string): void => {
    if (tryResolve(model, name)) {
      addField(name, true);
      return;
    }
    const dot = name.indexOf('.');
    const qualified = dot >= 0 ? model.tables.get(name.slice(0, dot)) : undefined;
    if (qualified && name.slice(dot + 1) in qualified.columns) {
      usageOf(qualified.name).filters.push({ kind: 'column', name: name.slice(dot + 1) });
      return;
    }
    const owners = [...model.tables.values()].filter((t) => name in t.columns);
    if (owners.length === 0) throw new UnknownFieldError(name, 'in filter');
    if (owners.length === 1) {
      usageOf(owners[0].name).filters.push({ kind: 'column', name });
      return;
    }
    for (const owner of owners) widened.add(owner.name);
  };

  for (const key of request.groupKeys ?? []) addField(key, false);
  for (const measure of request.measures ?? []) addField(measure, false);
  for (const predicate of normalizeFilters(request.filters)) {
    for (const field of predicateFields(predicate, [])) addFilterField(field);
  }

  const result = new Map<string, Set<string>>();
  for (const [name, tableUsage] of usage) {
    const table = model.table(name);
    const columns: Result<Set<string>, Unanalyzable> = widened.has(name)
      ? err({ reason: 'ambiguous', table: name, detail: 'a filter names a column several tables own' })
      : requiredColumns(table, tableUsage);
    result.set(name, columns.unwrapOr(new Set(table.columnNames)));
  }
  return result;
}

function tryResolve(model: SemanticModel, name: string): boolean {
  try {
    model.resolve(name);
    return true;
  } catch (error) {
    if (error instanceof UnknownFieldError) return false;
    throw error;
  }
}
