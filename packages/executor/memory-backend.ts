/**
 * In-memory execution backend
 *
 * Evaluates a plan over arrays of plain row objects with SQL null
 * semantics: NULL join keys never match (unless the join is null-safe),
 * aggregates skip NULLs, comparisons against NULL are false and division
 * by zero yields NULL.
 */

import { isList, isStruct, type Expr, type Row, type Scalar, type Value } from '../parser/ast.js';
import type {
  AggregateNode,
  CompareCondition,
  Condition,
  ExecutionBackend,
  JoinPlanNode,
  PlanNode,
  SortKey,
  UnnestNode,
  WindowDefinition,
  WindowNode,
} from '../compiler/plan.js';
import { truncateDate } from '../compiler/time-grain.js';

// ---
// VALUES
// ---

function asScalar(value: Value | undefined): Scalar {
  if (value === undefined || isList(value) || isStruct(value)) return null;
  return value;
}

function toDate(value: Scalar): Date | null {
  if (value instanceof Date) return value;
  if (typeof value === 'string' || typeof value === 'number') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  return null;
}

function toNumber(value: Scalar): number | null {
  if (value === null) return null;
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) return value.getTime();
  const parsed = Number(value);
  return Number.isNaN(parsed) ? null : parsed;
}

/** dates at midnight print as days, other instants as timestamps */
function toText(value: Scalar): string | null {
  if (value === null) return null;
  if (value instanceof Date) {
    const iso = value.toISOString();
    return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso.slice(0, 19).replace('T', ' ');
  }
  return String(value);
}

/** negative, zero or positive; dates compare with date-shaped strings */
function compareScalars(a: Scalar, b: Scalar): number {
  if (a === null || b === null) return 0;
  if (a instanceof Date || b instanceof Date) {
    const left = toDate(a);
    const right = toDate(b);
    if (left && right) return left.getTime() - right.getTime();
  }
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

/** grouping and join identity */
function keyOf(values: readonly Scalar[]): string {
  return JSON.stringify(values.map((v) => (v instanceof Date ? { date: v.toISOString() } : v)));
}

function likePattern(pattern: string, caseInsensitive: boolean): RegExp {
  const source = pattern
    .split('')
    .map((ch) => (ch === '%' ? '.*' : ch === '_' ? '.' : ch.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')))
    .join('');
  return new RegExp(`^${source}$`, caseInsensitive ? 'is' : 's');
}

// ---
// EXPRESSIONS
// ---

function arithmetic(op: 'add' | 'sub' | 'mul' | 'div', a: Scalar, b: Scalar): Scalar {
  const left = toNumber(a);
  const right = toNumber(b);
  if (left === null || right === null) return null;
  switch (op) {
    case 'add':
      return left + right;
    case 'sub':
      return left - right;
    case 'mul':
      return left * right;
    case 'div':
      return right === 0 ? null : left / right;
  }
}

function callFunction(fn: string, args: Scalar[]): Scalar {
  const [first] = args;
  switch (fn) {
    case 'coalesce':
      return args.find((arg) => arg !== null) ?? null;
    case 'concat':
      return args.map((arg) => toText(arg) ?? '').join('');
    case 'lower':
      return first === null ? null : String(first).toLowerCase();
    case 'upper':
      return first === null ? null : String(first).toUpperCase();
    case 'length':
      return first === null ? null : String(first).length;
    case 'abs': {
      const n = toNumber(first);
      return n === null ? null : Math.abs(n);
    }
    case 'round': {
      const n = toNumber(first);
      if (n === null) return null;
      const digits = toNumber(args[1] ?? 0) ?? 0;
      const factor = 10 ** digits;
      return Math.round(n * factor) / factor;
    }
    default:
      throw new Error(`Unsupported function '${fn}'`);
  }
}

/** row values of an opaque expression's table, under bare column names */
function bareView(row: Row, table: string | undefined): Row {
  if (!table) return row;
  const prefix = `${table}.`;
  const view: Row = {};
  for (const [column, value] of Object.entries(row)) {
    if (column.startsWith(prefix)) view[column.slice(prefix.length)] = value;
  }
  return view;
}

export function evaluate(expr: Expr, row: Row): Scalar {
  switch (expr.kind) {
    case 'column':
      return asScalar(row[expr.name]);
    case 'literal':
      return expr.value;
    case 'binary':
      return arithmetic(expr.op, evaluate(expr.left, row), evaluate(expr.right, row));
    case 'negate': {
      const n = toNumber(evaluate(expr.operand, row));
      return n === null ? null : -n;
    }
    case 'call':
      return callFunction(expr.fn, expr.args.map((arg) => evaluate(arg, row)));
    case 'cast': {
      const value = evaluate(expr.operand, row);
      return expr.to === 'string' ? toText(value) : toNumber(value);
    }
    case 'truncate': {
      const date = toDate(evaluate(expr.operand, row));
      return date ? truncateDate(date, expr.grain) : null;
    }
    case 'opaque':
      return asScalar(expr.evaluate(bareView(row, expr.table)));
    case 'aggregate':
      throw new Error('Aggregate expressions are evaluated per group');
  }
}

/** evaluate an expression whose aggregates range over `rows` */
function evaluateAggregate(expr: Expr, rows: readonly Row[]): Scalar {
  switch (expr.kind) {
    case 'aggregate': {
      if (expr.arg === null) return rows.length;
      const arg = expr.arg;
      const values = rows.map((row) => evaluate(arg, row)).filter((v): v is Exclude<Scalar, null> => v !== null);
      switch (expr.fn) {
        case 'count':
          return values.length;
        case 'count_distinct':
          return new Set(values.map((v) => keyOf([v]))).size;
        case 'sum': {
          if (values.length === 0) return null;
          return values.reduce<number>((total, v) => total + (toNumber(v) ?? 0), 0);
        }
        case 'mean': {
          if (values.length === 0) return null;
          return values.reduce<number>((total, v) => total + (toNumber(v) ?? 0), 0) / values.length;
        }
        case 'min':
        case 'max': {
          if (values.length === 0) return null;
          const sign = expr.fn === 'min' ? -1 : 1;
          return values.reduce((best, v) => (sign * compareScalars(v, best) > 0 ? v : best));
        }
      }
      break;
    }
    case 'literal':
      return expr.value;
    case 'binary':
      return arithmetic(expr.op, evaluateAggregate(expr.left, rows), evaluateAggregate(expr.right, rows));
    case 'negate': {
      const n = toNumber(evaluateAggregate(expr.operand, rows));
      return n === null ? null : -n;
    }
    case 'cast': {
      const value = evaluateAggregate(expr.operand, rows);
      return expr.to === 'string' ? toText(value) : toNumber(value);
    }
    case 'call':
      return callFunction(expr.fn, expr.args.map((arg) => evaluateAggregate(arg, rows)));
    default:
      // bare column or truncation outside an aggregate: take the group's first row
      return rows.length > 0 ? evaluate(expr, rows[0]) : null;
  }
  return null;
}

// ---
// CONDITIONS
// ---

function compare(condition: CompareCondition, row: Row): boolean {
  const operand = evaluate(condition.operand, row);
  const value = condition.value ?? null;
  switch (condition.operator) {
    case 'is null':
      return operand === null;
    case 'is not null':
      return operand !== null;
  }
  if (operand === null) return false;

  switch (condition.operator) {
    case 'in':
    case 'not in': {
      const found = (condition.values ?? []).some((v) => v !== null && compareScalars(operand, v) === 0);
      return condition.operator === 'in' ? found : !found;
    }
    case 'like':
    case 'not like':
    case 'ilike':
    case 'not ilike': {
      if (value === null) return false;
      const matched = likePattern(String(value), condition.operator.endsWith('ilike')).test(String(operand));
      return condition.operator.startsWith('not') ? !matched : matched;
    }
  }

  if (value === null) return false;
  const order = compareScalars(operand, value);
  switch (condition.operator) {
    case '=':
      return order === 0;
    case '!=':
      return order !== 0;
    case '>':
      return order > 0;
    case '>=':
      return order >= 0;
    case '<':
      return order < 0;
    default:
      // '<='
      return order <= 0;
  }
}

export function matches(condition: Condition, row: Row): boolean {
  switch (condition.kind) {
    case 'compare':
      return compare(condition, row);
    case 'and':
      return condition.children.every((child) => matches(child, row));
    case 'or':
      return condition.children.some((child) => matches(child, row));
  }
}

// ---
// OPERATORS
// ---

function nullRow(columns: readonly string[]): Row {
  return Object.fromEntries(columns.map((c) => [c, null]));
}

function runJoin(node: JoinPlanNode, left: Row[], right: Row[]): Row[] {
  const extra = node.right.columns.filter((c) => !node.left.columns.includes(c));
  const pick = (row: Row): Row => Object.fromEntries(extra.map((c) => [c, row[c] ?? null]));

  if (node.how === 'cross') {
    return left.flatMap((l) => right.map((r) => ({ ...l, ...pick(r) })));
  }

  const index = new Map<string, Row[]>();
  for (const row of right) {
    const values = node.on.map((pair) => asScalar(row[pair.right]));
    if (!node.nullSafe && values.some((v) => v === null)) continue;
    const key = keyOf(values);
    const bucket = index.get(key);
    if (bucket) bucket.push(row);
    else index.set(key, [row]);
  }

  const output: Row[] = [];
  for (const row of left) {
    const values = node.on.map((pair) => asScalar(row[pair.left]));
    const found = !node.nullSafe && values.some((v) => v === null) ? [] : index.get(keyOf(values)) ?? [];
    if (node.how === 'semi') {
      if (found.length > 0) output.push(row);
    } else if (found.length > 0) {
      for (const match of found) output.push({ ...row, ...pick(match) });
    } else if (node.how === 'left') {
      output.push({ ...row, ...nullRow(extra) });
    }
  }
  return output;
}

function runAggregate(node: AggregateNode, rows: Row[]): Row[] {
  const groups = new Map<string, { keys: Scalar[]; rows: Row[] }>();
  for (const row of rows) {
    const keys = node.keys.map((k) => evaluate(k.expr, row));
    const id = keyOf(keys);
    const group = groups.get(id);
    if (group) group.rows.push(row);
    else groups.set(id, { keys, rows: [row] });
  }
  // a grand aggregate yields one row even over no input
  if (node.keys.length === 0 && groups.size === 0) groups.set('[]', { keys: [], rows: [] });

  return [...groups.values()].map((group) => {
    const output: Row = {};
    node.keys.forEach((k, i) => {
      output[k.name] = group.keys[i];
    });
    for (const m of node.measures) output[m.name] = evaluateAggregate(m.expr, group.rows);
    return output;
  });
}

function runUnnest(node: UnnestNode, rows: Row[]): Row[] {
  return rows.flatMap((row) => {
    const array = row[node.column];
    if (array === undefined || array === null || !isList(array)) return [];
    const rest: Row = { ...row };
    delete rest[node.column];
    return array.map((element): Row => {
      if (!node.fields) return { ...rest, [node.column]: element };
      const unpacked: Row = {};
      for (const field of node.fields) {
        unpacked[`${node.prefix}.${field}`] = isStruct(element) ? element[field] ?? null : null;
      }
      return { ...rest, ...unpacked };
    });
  });
}

function sortRows(rows: Row[], keys: readonly SortKey[]): Row[] {
  // Array.prototype.sort is stable; NULLs sort last ascending and first descending
  return [...rows].sort((a, b) => {
    for (const { column, direction } of keys) {
      const left = asScalar(a[column]);
      const right = asScalar(b[column]);
      if (left === null && right === null) continue;
      if (left === null) return direction === 'asc' ? 1 : -1;
      if (right === null) return direction === 'asc' ? -1 : 1;
      const order = compareScalars(left, right);
      if (order !== 0) return direction === 'asc' ? order : -order;
    }
    return 0;
  });
}

function sameOrder(a: Row, b: Row, keys: readonly SortKey[]): boolean {
  return keys.every(({ column }) => keyOf([asScalar(a[column])]) === keyOf([asScalar(b[column])]));
}

/** values of one window column for a partition already in window order */
function windowValues(definition: WindowDefinition, rows: readonly Row[]): Scalar[] {
  const read = (row: Row): Scalar => asScalar(definition.column === undefined ? null : row[definition.column]);
  switch (definition.fn) {
    case 'row_number':
      return rows.map((_row, i) => i + 1);
    case 'rank':
    case 'dense_rank': {
      const values: number[] = [];
      rows.forEach((row, i) => {
        if (i === 0) values.push(1);
        else if (sameOrder(row, rows[i - 1], definition.orderBy)) values.push(values[i - 1]);
        else values.push(definition.fn === 'rank' ? i + 1 : values[i - 1] + 1);
      });
      return values;
    }
    case 'running_sum': {
      let total: number | null = null;
      return rows.map((row) => {
        const n = toNumber(read(row));
        if (n !== null) total = (total ?? 0) + n;
        return total;
      });
    }
    case 'lag':
    case 'lead': {
      const step = (definition.offset ?? 1) * (definition.fn === 'lag' ? -1 : 1);
      return rows.map((_row, i) => {
        const other = rows[i + step];
        return other === undefined ? null : read(other);
      });
    }
  }
}

function runWindow(node: WindowNode, rows: Row[]): Row[] {
  const output = rows.map((row): Row => ({ ...row }));
  for (const definition of node.definitions) {
    const partitions = new Map<string, Row[]>();
    for (const row of output) {
      const id = keyOf(definition.partitionBy.map((c) => asScalar(row[c])));
      const bucket = partitions.get(id);
      if (bucket) bucket.push(row);
      else partitions.set(id, [row]);
    }
    for (const partition of partitions.values()) {
      // sortRows keeps the row objects, so values land on the output rows
      const ordered = sortRows(partition, definition.orderBy);
      const values = windowValues(definition, ordered);
      ordered.forEach((row, i) => {
        row[definition.name] = values[i];
      });
    }
  }
  return output;
}

// ---
// BACKEND
// ---

export class MemoryBackend implements ExecutionBackend {
  private readonly tables: ReadonlyMap<string, readonly Row[]>;

  constructor(tables: Record<string, readonly Row[]>) {
    this.tables = new Map(Object.entries(tables));
  }

  async execute(root: PlanNode): Promise<Row[]> {
    return this.run(root);
  }

  run(node: PlanNode): Row[] {
    switch (node.kind) {
      case 'scan': {
        const rows = this.tables.get(node.table);
        if (!rows) throw new Error(`No rows registered for table '${node.table}'`);
        return rows.map((row) => Object.fromEntries(node.source.map((c) => [`${node.table}.${c}`, row[c] ?? null])));
      }
      case 'filter':
        return this.run(node.input).filter((row) => matches(node.condition, row));
      case 'unnest':
        return runUnnest(node, this.run(node.input));
      case 'extend':
        return this.run(node.input).map((row) => {
          const output: Row = { ...row };
          for (const d of node.definitions) output[d.name] = evaluate(d.expr, output);
          return output;
        });
      case 'join':
        return runJoin(node, this.run(node.left), this.run(node.right));
      case 'aggregate':
        return runAggregate(node, this.run(node.input));
      case 'project':
        return this.run(node.input).map((row) => Object.fromEntries(node.columns.map((c) => [c, row[c] ?? null])));
      case 'window':
        return runWindow(node, this.run(node.input));
      case 'union':
        return node.inputs.flatMap((input) =>
          this.run(input).map((row) => Object.fromEntries(node.columns.map((c) => [c, row[c] ?? null])))
        );
      case 'orderBy':
        return sortRows(this.run(node.input), node.keys);
      case 'limit':
        return this.run(node.input).slice(0, node.count);
    }
  }
}
