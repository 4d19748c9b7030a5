/**
 * Join trees
 *
 * A join tree composes source tables through joins of declared cardinality.
 * Trees are immutable values; join() always returns a new node. Besides the
 * tree itself this module derives the table graph the compiler walks: one
 * edge per join, oriented so that to-one hops can be recognised.
 */

import { SourceTable } from './source-table.js';
import { DuplicateTableError, InvalidDefinitionError } from '../errors.js';

/**
 * `one-to-one`: each left row matches at most one right row (many-to-one included).
 * `one-to-many`: each right row matches at most one left row.
 */
export type Cardinality = 'one-to-one' | 'one-to-many' | 'cross';

export interface ColumnRef {
  table: string;
  column: string;
}

export interface JoinKey {
  left: ColumnRef;
  right: ColumnRef;
}

export interface LeafNode {
  readonly kind: 'leaf';
  readonly table: SourceTable;
}

export interface JoinNode {
  readonly kind: 'join';
  readonly left: JoinTree;
  readonly right: JoinTree;
  readonly cardinality: Cardinality;
  readonly on: readonly JoinKey[];
}

export type JoinTree = LeafNode | JoinNode;

/** `orders.customer_id` or a column found in exactly one table of that side */
export interface JoinKeyInput {
  left: string;
  right: string;
}

export function leaf(table: SourceTable): LeafNode {
  const node: LeafNode = { kind: 'leaf', table };
  return Object.freeze(node);
}

function asTree(input: JoinTree | SourceTable): JoinTree {
  return input instanceof SourceTable ? leaf(input) : input;
}

export function leaves(tree: JoinTree): SourceTable[] {
  return tree.kind === 'leaf' ? [tree.table] : [...leaves(tree.left), ...leaves(tree.right)];
}

function resolveKeyColumn(reference: string, side: SourceTable[]): ColumnRef {
  const dot = reference.indexOf('.');
  if (dot >= 0) {
    const tableName = reference.slice(0, dot);
    const column = reference.slice(dot + 1);
    const owner = side.find((t) => t.name === tableName);
    if (!owner || !(column in owner.columns)) {
      throw new InvalidDefinitionError(`Join key '${reference}' does not name a column on its side of the join`);
    }
    return { table: tableName, column };
  }

  const owners = side.filter((t) => reference in t.columns);
  if (owners.length !== 1) {
    throw new InvalidDefinitionError(
      owners.length === 0
        ? `Join key '${reference}' does not name a column on its side of the join`
        : `Join key '${reference}' is ambiguous; qualify it with a table name`
    );
  }
  return { table: owners[0].name, column: reference };
}

function parseJoinCondition(on: string): JoinKeyInput[] {
  return on.split(/\s+and\s+/i).map((part) => {
    const match = /^\s*([A-Za-z_][\w.]*)\s*={1,2}\s*([A-Za-z_][\w.]*)\s*$/.exec(part);
    if (!match) {
      throw new InvalidDefinitionError(`Cannot parse join condition '${part.trim()}'; expected 'a.x = b.y'`);
    }
    return { left: match[1], right: match[2] };
  });
}

/**
 * Join two trees. Key pairs (or a condition string such as
 * `"customers.id = orders.customer_id"`) name a left-side column first.
 */
export function join(
  left: JoinTree | SourceTable,
  right: JoinTree | SourceTable,
  cardinality: Cardinality,
  on: readonly JoinKeyInput[] | string = []
): JoinNode {
  const leftTree = asTree(left);
  const rightTree = asTree(right);
  const leftTables = leaves(leftTree);
  const rightTables = leaves(rightTree);

  for (const t of rightTables) {
    if (leftTables.some((l) => l.name === t.name)) throw new DuplicateTableError(t.name);
  }

  const pairs = typeof on === 'string' ? parseJoinCondition(on) : on;
  const keys = pairs.map((pair) => ({
    left: resolveKeyColumn(pair.left, leftTables),
    right: resolveKeyColumn(pair.right, rightTables),
  }));

  if (cardinality === 'cross' && keys.length > 0) {
    throw new InvalidDefinitionError('A cross join takes no join keys');
  }
  if (cardinality !== 'cross') {
    if (keys.length === 0) {
      throw new InvalidDefinitionError(`A ${cardinality} join needs at least one key pair`);
    }
    // one edge per join: every pair must connect the same two tables
    const sameTables = keys.every(
      (k) => k.left.table === keys[0].left.table && k.right.table === keys[0].right.table
    );
    if (!sameTables) {
      throw new InvalidDefinitionError('All key pairs of a join must connect the same two tables');
    }
  }

  const node: JoinNode = { kind: 'join', left: leftTree, right: rightTree, cardinality, on: Object.freeze(keys) };
  return Object.freeze(node);
}

/** each left row has at most one right match */
export function joinOne(left: JoinTree | SourceTable, right: JoinTree | SourceTable, on: readonly JoinKeyInput[] | string): JoinNode {
  return join(left, right, 'one-to-one', on);
}

/** each left row may have many right matches */
export function joinMany(left: JoinTree | SourceTable, right: JoinTree | SourceTable, on: readonly JoinKeyInput[] | string): JoinNode {
  return join(left, right, 'one-to-many', on);
}

export function joinCross(left: JoinTree | SourceTable, right: JoinTree | SourceTable): JoinNode {
  return join(left, right, 'cross');
}

// ---
// TABLE GRAPH
// ---

export interface TableEdge {
  /** left-side table of the join */
  a: string;
  /** right-side table of the join */
  b: string;
  cardinality: Cardinality;
  keys: { a: string; b: string }[];
}

/** An edge walked in a given direction. */
export interface Hop {
  edge: TableEdge;
  from: string;
  to: string;
}

export function hopKeys(hop: Hop): { from: string; to: string }[] {
  return hop.edge.keys.map((k) => (hop.from === hop.edge.a ? { from: k.a, to: k.b } : { from: k.b, to: k.a }));
}

/** true when every `from` row meets at most one `to` row */
export function isToOne(hop: Hop): boolean {
  const { edge } = hop;
  if (edge.cardinality === 'one-to-one') return hop.from === edge.a;
  if (edge.cardinality === 'one-to-many') return hop.from === edge.b;
  return false;
}

export class TableGraph {
  private readonly adjacency = new Map<string, Hop[]>();

  constructor(tree: JoinTree) {
    for (const t of leaves(tree)) this.adjacency.set(t.name, []);
    this.collect(tree);
  }

  private collect(tree: JoinTree): void {
    if (tree.kind === 'leaf') return;
    this.collect(tree.left);
    this.collect(tree.right);

    // cross joins connect the first table of each side
    const a = tree.on.length > 0 ? tree.on[0].left.table : leaves(tree.left)[0].name;
    const b = tree.on.length > 0 ? tree.on[0].right.table : leaves(tree.right)[0].name;
    const edge: TableEdge = {
      a,
      b,
      cardinality: tree.cardinality,
      keys: tree.on.map((k) => ({ a: k.left.column, b: k.right.column })),
    };
    this.adjacency.get(a)?.push({ edge, from: a, to: b });
    this.adjacency.get(b)?.push({ edge, from: b, to: a });
  }

  hops(table: string): readonly Hop[] {
    return this.adjacency.get(table) ?? [];
  }

  /** the unique tree path between two tables */
  path(from: string, to: string): Hop[] {
    const previous = new Map<string, Hop | null>([[from, null]]);
    const queue = [from];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || current === to) break;
      for (const hop of this.hops(current)) {
        if (previous.has(hop.to)) continue;
        previous.set(hop.to, hop);
        queue.push(hop.to);
      }
    }

    const path: Hop[] = [];
    let cursor = previous.get(to);
    if (cursor === undefined) {
      throw new InvalidDefinitionError(`No join path between '${from}' and '${to}'`);
    }
    while (cursor) {
      path.unshift(cursor);
      cursor = previous.get(cursor.from);
    }
    return path;
  }

  /**
   * Tables reachable from `origin` through to-one hops only, each with the
   * path that reaches it. The origin maps to an empty path.
   */
  toOneReachable(origin: string): Map<string, Hop[]> {
    const reached = new Map<string, Hop[]>([[origin, []]]);
    const queue = [origin];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      const base = reached.get(current) ?? [];
      for (const hop of this.hops(current)) {
        if (reached.has(hop.to) || !isToOne(hop)) continue;
        reached.set(hop.to, [...base, hop]);
        queue.push(hop.to);
      }
    }
    return reached;
  }
}
