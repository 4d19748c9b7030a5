/**
 * Relational plan
 *
 * The compiler's output: a tree of relational operators over qualified
 * column names (`<table>.<column>` for raw columns, canonical field names
 * for computed ones). Every node carries its output column list so the SQL
 * generator and the backends never have to infer it.
 */

import type { ComparisonOperator, Expr, Row, Scalar } from '../parser/ast.js';
import { formatExpr, formatScalar } from '../parser/prettifier.js';
import { generateSQL } from './sql-generator.js';

// ---
// CONDITIONS
// ---

export interface CompareCondition {
  kind: 'compare';
  operator: ComparisonOperator;
  operand: Expr;
  value?: Scalar;
  values?: readonly Scalar[];
}

export interface LogicalCondition {
  kind: 'and' | 'or';
  children: readonly Condition[];
}

export type Condition = CompareCondition | LogicalCondition;

// ---
// NODES
// ---

export interface NamedExpr {
  name: string;
  expr: Expr;
}

export interface JoinPair {
  left: string;
  right: string;
}

export type JoinKind = 'inner' | 'left' | 'cross' | 'semi';

export type SortDirection = 'asc' | 'desc';

export interface SortKey {
  column: string;
  direction: SortDirection;
}

export const WINDOW_FUNCTIONS = ['row_number', 'rank', 'dense_rank', 'running_sum', 'lag', 'lead'] as const;

export type WindowFunction = (typeof WINDOW_FUNCTIONS)[number];

/** one column computed over an ordered partition of the input rows */
export interface WindowDefinition {
  name: string;
  fn: WindowFunction;
  /** the column read by running_sum, lag and lead */
  column?: string;
  /** rows back (lag) or ahead (lead); defaults to 1 */
  offset?: number;
  partitionBy: readonly string[];
  orderBy: readonly SortKey[];
}

interface NodeBase {
  readonly columns: readonly string[];
}

export interface ScanNode extends NodeBase {
  kind: 'scan';
  table: string;
  /** raw column names read from the table */
  source: readonly string[];
}

export interface FilterNode extends NodeBase {
  kind: 'filter';
  input: PlanNode;
  condition: Condition;
}

/** one output row per array element; struct elements are unpacked into `<prefix>.<field>` */
export interface UnnestNode extends NodeBase {
  kind: 'unnest';
  input: PlanNode;
  column: string;
  fields: readonly string[] | null;
  prefix: string;
}

export interface ExtendNode extends NodeBase {
  kind: 'extend';
  input: PlanNode;
  definitions: readonly NamedExpr[];
}

/** right-side columns already present on the left are dropped */
export interface JoinPlanNode extends NodeBase {
  kind: 'join';
  how: JoinKind;
  left: PlanNode;
  right: PlanNode;
  on: readonly JoinPair[];
  /** match NULL keys to each other */
  nullSafe: boolean;
}

export interface AggregateNode extends NodeBase {
  kind: 'aggregate';
  input: PlanNode;
  keys: readonly NamedExpr[];
  measures: readonly NamedExpr[];
}

export interface ProjectNode extends NodeBase {
  kind: 'project';
  input: PlanNode;
}

export interface WindowNode extends NodeBase {
  kind: 'window';
  input: PlanNode;
  definitions: readonly WindowDefinition[];
}

/** inputs share one column list; rows are concatenated in input order */
export interface UnionNode extends NodeBase {
  kind: 'union';
  inputs: readonly PlanNode[];
}

export interface OrderByNode extends NodeBase {
  kind: 'orderBy';
  input: PlanNode;
  keys: readonly SortKey[];
}

export interface LimitNode extends NodeBase {
  kind: 'limit';
  input: PlanNode;
  count: number;
}

export type PlanNode =
  | ScanNode
  | FilterNode
  | UnnestNode
  | ExtendNode
  | JoinPlanNode
  | AggregateNode
  | ProjectNode
  | WindowNode
  | UnionNode
  | OrderByNode
  | LimitNode;

// ---
// BUILDERS
// ---

export function scan(table: string, source: readonly string[]): ScanNode {
  return { kind: 'scan', table, source, columns: source.map((c) => `${table}.${c}`) };
}

export function filter(input: PlanNode, conditions: readonly Condition[]): PlanNode {
  if (conditions.length === 0) return input;
  const condition: Condition = conditions.length === 1 ? conditions[0] : { kind: 'and', children: conditions };
  return { kind: 'filter', input, condition, columns: input.columns };
}

export function unnest(input: PlanNode, column: string, fields: readonly string[] | null, prefix: string): UnnestNode {
  const exposed = fields ? fields.map((f) => `${prefix}.${f}`) : [column];
  return {
    kind: 'unnest',
    input,
    column,
    fields,
    prefix,
    columns: [...input.columns.filter((c) => c !== column), ...exposed],
  };
}

export function extend(input: PlanNode, definitions: readonly NamedExpr[]): PlanNode {
  if (definitions.length === 0) return input;
  return { kind: 'extend', input, definitions, columns: [...input.columns, ...definitions.map((d) => d.name)] };
}

export function joinNodes(
  how: JoinKind,
  left: PlanNode,
  right: PlanNode,
  on: readonly JoinPair[] = [],
  nullSafe = false
): JoinPlanNode {
  const columns = how === 'semi' ? left.columns : [...left.columns, ...right.columns.filter((c) => !left.columns.includes(c))];
  return { kind: 'join', how, left, right, on, nullSafe, columns };
}

export function aggregate(input: PlanNode, keys: readonly NamedExpr[], measures: readonly NamedExpr[]): AggregateNode {
  return {
    kind: 'aggregate',
    input,
    keys,
    measures,
    columns: [...keys.map((k) => k.name), ...measures.map((m) => m.name)],
  };
}

export function project(input: PlanNode, columns: readonly string[]): PlanNode {
  const same = columns.length === input.columns.length && columns.every((c, i) => input.columns[i] === c);
  return same ? input : { kind: 'project', input, columns };
}

export function window(input: PlanNode, definitions: readonly WindowDefinition[]): PlanNode {
  if (definitions.length === 0) return input;
  return { kind: 'window', input, definitions, columns: [...input.columns, ...definitions.map((d) => d.name)] };
}

export function union(inputs: readonly PlanNode[]): PlanNode {
  const [first, ...rest] = inputs;
  if (!first) throw new Error('A union needs at least one input');
  for (const input of rest) {
    if (input.columns.length !== first.columns.length || input.columns.some((c, i) => first.columns[i] !== c)) {
      throw new Error(`Union inputs disagree on columns: [${first.columns.join(', ')}] vs [${input.columns.join(', ')}]`);
    }
  }
  return rest.length === 0 ? first : { kind: 'union', inputs, columns: first.columns };
}

export function orderBy(input: PlanNode, keys: readonly SortKey[]): PlanNode {
  if (keys.length === 0) return input;
  return { kind: 'orderBy', input, keys, columns: input.columns };
}

export function limit(input: PlanNode, count: number | undefined): PlanNode {
  if (count === undefined) return input;
  return { kind: 'limit', input, count, columns: input.columns };
}

// ---
// PRINTING
// ---

export function formatCondition(condition: Condition): string {
  if (condition.kind !== 'compare') {
    const joiner = condition.kind === 'and' ? ' AND ' : ' OR ';
    return `(${condition.children.map(formatCondition).join(joiner)})`;
  }
  const operand = formatExpr(condition.operand);
  switch (condition.operator) {
    case 'is null':
    case 'is not null':
      return `${operand} ${condition.operator}`;
    case 'in':
    case 'not in':
      return `${operand} ${condition.operator} (${(condition.values ?? []).map(formatScalar).join(', ')})`;
    default:
      return `${operand} ${condition.operator} ${formatScalar(condition.value ?? null)}`;
  }
}

function formatSortKeys(keys: readonly SortKey[]): string {
  return keys.map((k) => `${k.column} ${k.direction}`).join(', ');
}

function formatWindow(definition: WindowDefinition): string {
  const args = [definition.column, definition.offset === undefined ? undefined : String(definition.offset)];
  const over = [
    definition.partitionBy.length > 0 ? `partition by ${definition.partitionBy.join(', ')}` : '',
    `order by ${formatSortKeys(definition.orderBy)}`,
  ].filter((part) => part !== '');
  const call = `${definition.fn}(${args.filter((a) => a !== undefined).join(', ')})`;
  return `${definition.name}=${call} over (${over.join(' ')})`;
}

function describeNode(node: PlanNode): string {
  const named = (items: readonly NamedExpr[]) => items.map((i) => `${i.name}=${formatExpr(i.expr)}`).join(', ');
  switch (node.kind) {
    case 'scan':
      return `scan ${node.table} [${node.source.join(', ')}]`;
    case 'filter':
      return `filter ${formatCondition(node.condition)}`;
    case 'unnest':
      return `unnest ${node.column}${node.fields ? ` -> [${node.fields.join(', ')}]` : ''}`;
    case 'extend':
      return `extend ${named(node.definitions)}`;
    case 'join': {
      const on = node.on.map((p) => `${p.left} ${node.nullSafe ? '<=>' : '='} ${p.right}`).join(' AND ');
      return `join ${node.how}${on ? ` on ${on}` : ''}`;
    }
    case 'aggregate':
      return `aggregate keys=[${named(node.keys)}] measures=[${named(node.measures)}]`;
    case 'project':
      return `project [${node.columns.join(', ')}]`;
    case 'window':
      return `window ${node.definitions.map(formatWindow).join(', ')}`;
    case 'union':
      return `union all (${node.inputs.length} inputs)`;
    case 'orderBy':
      return `orderBy ${formatSortKeys(node.keys)}`;
    case 'limit':
      return `limit ${node.count}`;
  }
}

function children(node: PlanNode): PlanNode[] {
  switch (node.kind) {
    case 'scan':
      return [];
    case 'join':
      return [node.left, node.right];
    case 'union':
      return [...node.inputs];
    default:
      return [node.input];
  }
}

/**
 * Indented, one operator per line.
 */
export function printPlan(node: PlanNode, depth = 0): string {
  const line = `${'  '.repeat(depth)}${describeNode(node)}`;
  return [line, ...children(node).map((child) => printPlan(child, depth + 1))].join('\n');
}

// ---
// PLAN
// ---

export interface ExecutionBackend {
  execute(root: PlanNode): Promise<Row[]>;
}

export class Plan {
  readonly root: PlanNode;
  /** output columns, in request order */
  readonly columns: readonly string[];
  private readonly backend: ExecutionBackend | undefined;

  constructor(root: PlanNode, backend?: ExecutionBackend) {
    this.root = root;
    this.columns = root.columns;
    this.backend = backend;
  }

  toQueryText(): string {
    return generateSQL(this.root);
  }

  explain(): string {
    return printPlan(this.root);
  }

  /**
   * Run the plan on `backend`, or on the backend configured at compile time.
   */
  async execute(backend?: ExecutionBackend): Promise<Row[]> {
    const target = backend ?? this.backend;
    if (!target) {
      throw new Error('No execution backend configured; pass one to execute() or to the compiler options');
    }
    return target.execute(this.root);
  }
}
