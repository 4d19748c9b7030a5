/**
 * Dependency graph
 *
 * Maps every field of a model to the fields and raw columns it reads.
 * Column nodes live in their own id space, `column:<name>`, where the name is
 * bare on a single-table model and `<table>.<column>` once tables are joined,
 * so a dimension named after its column never shares a node with it.
 */

import { walkExpr, type Expr, type MeasureExpr } from '../parser/ast.js';
import type { SemanticModel } from '../model/semantic-model.js';

export type NodeType = 'column' | 'dimension' | 'measure' | 'calc_measure';

export type DependencyType = NodeType;

export interface GraphEntry {
  type: NodeType;
  deps: Record<string, DependencyType>;
}

export type GraphData = Record<string, GraphEntry>;

export interface GraphJSON {
  nodes: { id: string; type: NodeType }[];
  edges: { source: string; target: string; type: DependencyType }[];
}

const COLUMN_PREFIX = 'column:';

/** node id of a raw column, given its canonical name */
export function columnId(name: string): string {
  return `${COLUMN_PREFIX}${name}`;
}

export class DependencyGraph {
  readonly entries: Readonly<GraphData>;

  constructor(entries: GraphData) {
    this.entries = entries;
  }

  has(name: string): boolean {
    return name in this.entries;
  }

  get(name: string): GraphEntry | undefined {
    return this.entries[name];
  }

  /** direct dependencies of a node */
  deps(name: string): string[] {
    return Object.keys(this.entries[name]?.deps ?? {});
  }

  /**
   * Breadth-first walk along dependency edges. Start nodes come first, even
   * when the graph does not contain them; every node is visited once.
   */
  bfs(start: string | readonly string[], maxDepth = Infinity): string[] {
    const starts = typeof start === 'string' ? [start] : [...start];
    const seen = new Set<string>(starts);
    const order = [...seen];
    let frontier = [...seen];
    for (let depth = 0; depth < maxDepth && frontier.length > 0; depth++) {
      const next: string[] = [];
      for (const node of frontier) {
        for (const dep of this.deps(node)) {
          if (seen.has(dep)) continue;
          seen.add(dep);
          order.push(dep);
          next.push(dep);
        }
      }
      frontier = next;
    }
    return order;
  }

  /** everything `name` depends on, transitively */
  predecessors(name: string, maxDepth = Infinity): Set<string> {
    return new Set(this.bfs(name, maxDepth).filter((node) => node !== name));
  }

  /** everything that depends on `name`, transitively */
  successors(name: string, maxDepth = Infinity): Set<string> {
    return this.invert().predecessors(name, maxDepth);
  }

  /**
   * The dependents graph: every edge reversed, column nodes included. Edge
   * types become the type of the new dependency.
   */
  invert(): DependencyGraph {
    const inverted: GraphData = {};
    const ensure = (name: string, type: NodeType): GraphEntry => {
      inverted[name] ??= { type, deps: {} };
      return inverted[name];
    };
    for (const [name, entry] of Object.entries(this.entries)) {
      ensure(name, entry.type);
      for (const [dep, type] of Object.entries(entry.deps)) {
        ensure(dep, this.entries[dep]?.type ?? type).deps[name] = entry.type;
      }
    }
    return new DependencyGraph(inverted);
  }

  toJSON(): GraphJSON {
    const nodes = new Map<string, NodeType>();
    const edges: GraphJSON['edges'] = [];
    for (const [name, entry] of Object.entries(this.entries)) {
      nodes.set(name, entry.type);
      for (const [dep, type] of Object.entries(entry.deps)) {
        if (!nodes.has(dep)) nodes.set(dep, this.entries[dep]?.type ?? type);
        edges.push({ source: dep, target: name, type });
      }
    }
    return { nodes: [...nodes].map(([id, type]) => ({ id, type })), edges };
  }
}

function formulaRefs(model: SemanticModel, formula: MeasureExpr, owner: string | null, deps: Record<string, DependencyType>): void {
  switch (formula.kind) {
    case 'literal':
      return;
    case 'binary':
      formulaRefs(model, formula.left, owner, deps);
      formulaRefs(model, formula.right, owner, deps);
      return;
    case 'grandTotal':
      formulaRefs(model, formula.of, owner, deps);
      return;
    case 'measureRef': {
      const ref = model.resolveMeasure(formula.name, owner);
      deps[ref.name] = ref.kind === 'measure' ? 'measure' : 'calc_measure';
      return;
    }
  }
}

/**
 * Build the dependency graph of a model. Dimension expressions are read as
 * written, so a reference to an earlier dimension is a dimension edge.
 */
export function buildDependencyGraph(model: SemanticModel): DependencyGraph {
  const graph: GraphData = {};

  const columnDeps = (table: string, expr: Expr, dimensions: ReadonlySet<string>): Record<string, DependencyType> => {
    const deps: Record<string, DependencyType> = {};
    walkExpr(expr, (node) => {
      if (node.kind !== 'column') return;
      const name = model.canonicalName(table, node.name);
      if (dimensions.has(node.name)) deps[name] = 'dimension';
      else deps[columnId(name)] = 'column';
    });
    return deps;
  };

  for (const table of model.tables.values()) {
    const earlier = new Set<string>();
    for (const dimension of table.dimensions.values()) {
      graph[model.canonicalName(table.name, dimension.name)] = {
        type: 'dimension',
        deps: columnDeps(table.name, dimension.expr, earlier),
      };
      earlier.add(dimension.name);
    }
    for (const measure of table.measures.values()) {
      graph[model.canonicalName(table.name, measure.name)] = {
        type: 'measure',
        deps: columnDeps(table.name, measure.expr, new Set()),
      };
    }
  }

  for (const ref of model.fieldRefs()) {
    if (ref.kind !== 'calculated') continue;
    const deps: Record<string, DependencyType> = {};
    formulaRefs(model, ref.field.formula, ref.table, deps);
    graph[ref.name] = { type: 'calc_measure', deps };
  }

  return new DependencyGraph(graph);
}
