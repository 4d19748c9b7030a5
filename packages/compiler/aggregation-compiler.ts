/**
 * Aggregation compiler
 *
 * Turns a grouped aggregation request into a relational plan that cannot
 * double count. Base measures are grouped into partitions by owning table
 * and unnest path; each partition aggregates its owner's rows, joining only
 * tables it reaches through to-one hops, so no join can fan its rows out.
 * Partitions are then combined on a key spine built from the filtered join
 * tree, which keeps group keys that have no facts. Mutations run last,
 * over the aggregated rows, one step at a time.
 */

import { walkExpr, type Expr, type Predicate, type TimeGrain } from '../parser/ast.js';
import { parseExpression } from '../parser/chevrotain-parser.js';
import type { Dimension } from '../model/source-table.js';
import type { DimensionRef, MeasureFieldRef, MeasureLikeRef, SemanticModel } from '../model/semantic-model.js';
import { hopKeys, type Hop, type JoinTree } from '../model/join-tree.js';
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
  unnest,
  window,
  WINDOW_FUNCTIONS,
  type Condition,
  type JoinPair,
  type NamedExpr,
  type PlanNode,
  type SortDirection,
  type SortKey,
  type WindowDefinition,
  type WindowFunction,
} from './plan.js';
import { analyzeCalculated, evaluateFormula } from './measure-algebra.js';
import { bindFilter, normalizeFilters, type BindContext, type FilterInput, type LiteralKind } from './predicate.js';
import { requiredColumnsByTable } from './projection.js';
import { applyGrain, parseTimeGrain } from './time-grain.js';
import { resolveOptions, type CompilerOptions, type ResolvedOptions } from '../config.js';
import {
  AmbiguousFieldError,
  InvalidRequestError,
  MalformedFilterSpecError,
  UnknownFieldError,
} from '../errors.js';

// ---
// REQUEST
// ---

export type OrderByItem = string | readonly [string, SortDirection];

/** a window column over the aggregated rows */
export interface WindowInput {
  window: WindowFunction;
  /** read by running_sum, lag and lead */
  column?: string;
  /** lag and lead only; defaults to 1 */
  offset?: number;
  partitionBy?: readonly string[];
  orderBy: readonly OrderByItem[];
}

/** a scalar expression over output columns, or a window */
export type MutateInput = string | Expr | WindowInput;

export interface AggregationRequest {
  groupKeys?: readonly string[];
  measures?: readonly string[];
  filters?: FilterInput | FilterInput[];
  /** fields must be among the group keys and measures */
  orderBy?: readonly OrderByItem[];
  limit?: number;
  /** applied to every time dimension among the group keys */
  timeGrain?: TimeGrain | string;
  /** inclusive bounds on the first time dimension among the group keys */
  timeRange?: { start: string | Date; end: string | Date };
  /**
   * Columns computed after aggregation, in insertion order. Each may read
   * the group keys, the measures and the mutations before it.
   */
  mutate?: Readonly<Record<string, MutateInput>>;
}

/** prefix of the broadcast grand-total columns */
export const TOTAL_PREFIX = '__total__';

export function totalColumn(measure: string): string {
  return `${TOTAL_PREFIX}.${measure}`;
}

// ---
// INTERNAL STATE
// ---

interface GroupKey {
  /** canonical name, also the output column */
  name: string;
  table: string;
  /** grain applied */
  dimension: Dimension;
}

interface CrossFilter {
  condition: Condition;
  tables: ReadonlySet<string>;
}

interface Partition {
  owner: string;
  unnest: readonly string[];
  measures: MeasureFieldRef[];
}

interface BuiltPartition {
  partition: Partition;
  /** keys this partition groups by */
  keys: GroupKey[];
  /** filtered, joined rows before aggregation */
  source: PlanNode;
  aggregated: PlanNode;
}

/** Qualify raw column references with their table and bind opaque logic to it. */
export function qualify(expr: Expr, table: string): Expr {
  switch (expr.kind) {
    case 'column':
      return { kind: 'column', name: `${table}.${expr.name}` };
    case 'opaque':
      return { ...expr, table };
    case 'literal':
      return expr;
    case 'binary':
      return { ...expr, left: qualify(expr.left, table), right: qualify(expr.right, table) };
    case 'negate':
    case 'cast':
    case 'truncate':
      return { ...expr, operand: qualify(expr.operand, table) };
    case 'call':
      return { ...expr, args: expr.args.map((arg) => qualify(arg, table)) };
    case 'aggregate':
      return { ...expr, arg: expr.arg ? qualify(expr.arg, table) : null };
  }
}

function uniqueBy<T>(items: readonly T[], key: (item: T) => string): T[] {
  const seen = new Set<string>();
  return items.filter((item) => {
    const k = key(item);
    if (seen.has(k)) return false;
    seen.add(k);
    return true;
  });
}

function mapColumns(expr: Expr, rename: (name: string) => string): Expr {
  switch (expr.kind) {
    case 'column':
      return { kind: 'column', name: rename(expr.name) };
    case 'opaque':
    case 'literal':
      return expr;
    case 'binary':
      return { ...expr, left: mapColumns(expr.left, rename), right: mapColumns(expr.right, rename) };
    case 'negate':
    case 'cast':
    case 'truncate':
      return { ...expr, operand: mapColumns(expr.operand, rename) };
    case 'call':
      return { ...expr, args: expr.args.map((arg) => mapColumns(arg, rename)) };
    case 'aggregate':
      return { ...expr, arg: expr.arg ? mapColumns(expr.arg, rename) : null };
  }
}

function isWindowInput(input: MutateInput): input is WindowInput {
  return typeof input === 'object' && 'window' in input;
}

function qualifiedPairs(hop: Hop): JoinPair[] {
  return hopKeys(hop).map((k) => ({ left: `${hop.from}.${k.from}`, right: `${hop.to}.${k.to}` }));
}

// ---
// COMPILER
// ---

class RequestCompiler {
  private readonly keys: GroupKey[];
  private readonly measures: MeasureLikeRef[];
  private readonly tableFilters = new Map<string, Condition[]>();
  private readonly crossFilters: CrossFilter[] = [];
  private readonly postFilters: Condition[] = [];
  /** measures computed only to evaluate post-aggregation filters */
  private readonly helperMeasures: MeasureLikeRef[] = [];
  private readonly predicates: Predicate[];
  private readonly projection: Map<string, Set<string>> | undefined;

  constructor(
    private readonly model: SemanticModel,
    private readonly request: AggregationRequest,
    private readonly options: ResolvedOptions
  ) {
    const groupKeys = request.groupKeys ?? [];
    const measureNames = request.measures ?? [];
    if (groupKeys.length === 0 && measureNames.length === 0) {
      throw new InvalidRequestError('A request needs at least one group key or measure');
    }

    this.keys = this.resolveKeys(groupKeys);
    this.measures = uniqueBy(measureNames.map((name) => this.resolveMeasureName(name)), (m) => m.name);
    this.predicates = [...normalizeFilters(request.filters), ...this.timeRangePredicates()];
    for (const predicate of this.predicates) this.classify(predicate);

    this.projection = options.projectionPushdown
      ? requiredColumnsByTable(model, {
          groupKeys: this.keys.map((k) => k.name),
          measures: [...this.measures, ...this.helperMeasures].map((m) => m.name),
          filters: this.predicates,
        })
      : undefined;
  }

  // --- resolution ---

  private resolveKeys(names: readonly string[]): GroupKey[] {
    const grain = this.request.timeGrain === undefined ? undefined : parseTimeGrain(this.request.timeGrain);
    const keys = names.map((name): GroupKey => {
      const ref = this.model.resolve(name);
      if (ref.kind !== 'dimension') {
        throw new InvalidRequestError(`Group key '${name}' is a measure, not a dimension`);
      }
      const dimension = grain && ref.field.isTimeDimension ? applyGrain(ref.field, grain) : ref.field;
      return { name: ref.name, table: ref.table, dimension };
    });
    return uniqueBy(keys, (k) => k.name);
  }

  private resolveMeasureName(name: string): MeasureLikeRef {
    const ref = this.model.resolve(name);
    if (ref.kind === 'dimension') {
      throw new InvalidRequestError(`'${name}' is a dimension; request it as a group key`);
    }
    return ref;
  }

  private timeRangePredicates(): Predicate[] {
    const range = this.request.timeRange;
    if (!range) return [];
    const timeKey = this.keys.find((k) => k.dimension.isTimeDimension);
    if (!timeKey) {
      throw new MalformedFilterSpecError('timeRange requires a time dimension among the group keys');
    }
    return [
      {
        type: 'compound',
        operator: 'AND',
        children: [
          { type: 'comparison', field: timeKey.name, operator: '>=', value: range.start },
          { type: 'comparison', field: timeKey.name, operator: '<=', value: range.end },
        ],
      },
    ];
  }

  // --- filters ---

  private dimensionOf(ref: DimensionRef): Dimension {
    return this.keys.find((k) => k.name === ref.name)?.dimension ?? ref.field;
  }

  private literalKind(table: string, expr: Expr): LiteralKind {
    if (expr.kind === 'truncate') return 'timestamp';
    if (expr.kind !== 'column') return 'unknown';
    const type = this.model.table(table).scalarType(expr.name);
    if (type === 'date' || type === 'timestamp') return type;
    return type === undefined ? 'unknown' : 'other';
  }

  private rawColumn(name: string): { table: string; operand: Expr; kind: LiteralKind } {
    const dot = name.indexOf('.');
    const qualified = dot >= 0 ? this.model.tables.get(name.slice(0, dot)) : undefined;
    const column = qualified ? name.slice(dot + 1) : name;
    const owners = qualified
      ? column in qualified.columns
        ? [qualified]
        : []
      : [...this.model.tables.values()].filter((t) => column in t.columns);

    if (owners.length === 0) throw new UnknownFieldError(name, 'in filter');
    if (owners.length > 1) {
      throw new AmbiguousFieldError(name, owners.map((t) => `${t.name}.${column}`));
    }
    const [owner] = owners;
    const operand: Expr = { kind: 'column', name: column };
    return { table: owner.name, operand: qualify(operand, owner.name), kind: this.literalKind(owner.name, operand) };
  }

  private classify(predicate: Predicate): void {
    const context: BindContext = {
      model: this.model,
      dimensionExpr: (ref) => qualify(this.dimensionOf(ref).resolved, ref.table),
      dimensionKind: (ref) => this.literalKind(ref.table, this.dimensionOf(ref).resolved),
      rawColumn: (name) => this.rawColumn(name),
    };
    const bound = bindFilter(predicate, context);

    if (bound.measures.length > 0) {
      this.postFilters.push(bound.condition);
      for (const measure of bound.measures) {
        if (!this.measures.some((m) => m.name === measure.name) && !this.helperMeasures.some((m) => m.name === measure.name)) {
          this.helperMeasures.push(measure);
        }
      }
      return;
    }
    if (bound.tables.size === 1) {
      const [table] = bound.tables;
      const list = this.tableFilters.get(table) ?? [];
      list.push(bound.condition);
      this.tableFilters.set(table, list);
      return;
    }
    this.crossFilters.push({ condition: bound.condition, tables: bound.tables });
  }

  private filtersOf(table: string): Condition[] {
    return this.tableFilters.get(table) ?? [];
  }

  private allDimensionFilters(): Condition[] {
    return [...[...this.tableFilters.values()].flat(), ...this.crossFilters.map((f) => f.condition)];
  }

  // --- relations ---

  /** `whole` reads every column, ignoring the projection */
  private scanTable(name: string, whole = false): PlanNode {
    const table = this.model.table(name);
    const needed = whole ? undefined : this.projection?.get(name);
    if (!needed) return scan(name, table.columnNames);
    const columns = table.columnNames.filter((c) => needed.has(c));
    // a relation needs at least one column to carry its rows
    return scan(name, columns.length > 0 ? columns : table.columnNames.slice(0, 1));
  }

  private filteredScan(name: string): PlanNode {
    return filter(this.scanTable(name), this.filtersOf(name));
  }

  /** every table joined along the tree; to-many joins keep unmatched left rows */
  private rawTree(tree: JoinTree = this.model.tree, whole?: string): PlanNode {
    if (tree.kind === 'leaf') return this.scanTable(tree.table.name, tree.table.name === whole);
    const on = tree.on.map((k) => ({
      left: `${k.left.table}.${k.left.column}`,
      right: `${k.right.table}.${k.right.column}`,
    }));
    return joinNodes(
      tree.cardinality === 'cross' ? 'cross' : 'left',
      this.rawTree(tree.left, whole),
      this.rawTree(tree.right, whole),
      on
    );
  }

  private filteredRawTree(whole?: string): PlanNode {
    return filter(this.rawTree(this.model.tree, whole), this.allDimensionFilters());
  }

  /**
   * Rows of `owner` that appear in the filtered join tree, each kept once.
   * Rows are matched null-safely on every scalar column of the owner.
   */
  private qualifyingRows(owner: string): PlanNode {
    const table = this.model.table(owner);
    const identity = table.columnNames
      .filter((c) => table.scalarType(c) !== undefined)
      .map((c) => ({ left: `${owner}.${c}`, right: `${owner}.${c}` }));
    return joinNodes('semi', this.scanTable(owner, true), this.filteredRawTree(owner), identity, true);
  }

  // --- partitions ---

  private baseMeasures(): { base: Map<string, MeasureFieldRef>; totals: Map<string, MeasureFieldRef> } {
    const base = new Map<string, MeasureFieldRef>();
    const totals = new Map<string, MeasureFieldRef>();
    for (const ref of [...this.measures, ...this.helperMeasures]) {
      const analysis = analyzeCalculated(this.model, ref);
      for (const [name, measure] of analysis.baseMeasures) base.set(name, measure);
      for (const [name, measure] of analysis.grandTotals) totals.set(name, measure);
    }
    return { base, totals };
  }

  private partition(base: Map<string, MeasureFieldRef>): Partition[] {
    const partitions = new Map<string, Partition>();
    for (const measure of base.values()) {
      const { unnest: path } = measure.field;
      const id = `${measure.table}|${path.join('.')}`;
      const existing = partitions.get(id);
      if (existing) {
        existing.measures.push(measure);
      } else {
        partitions.set(id, { owner: measure.table, unnest: path, measures: [measure] });
      }
    }
    return [...partitions.values()];
  }

  /** true when every multi-table filter lies within the to-one reach of the owner */
  private canPreAggregate(owner: string): boolean {
    const reach = this.model.graph.toOneReachable(owner);
    return this.crossFilters.every((f) => [...f.tables].every((t) => reach.has(t)));
  }

  /**
   * With `restricted`, the owner's rows come from `qualifyingRows`, which
   * already applies every filter; joins then only fetch group keys.
   */
  private buildPartition(partition: Partition, restricted = false): BuiltPartition {
    const { owner } = partition;
    const ownerTable = this.model.table(owner);
    const graph = this.model.graph;
    const crossFilters = restricted ? [] : this.crossFilters;
    const side = (table: string): PlanNode => (restricted ? this.scanTable(table) : this.filteredScan(table));

    let relation = restricted ? this.qualifyingRows(owner) : this.filteredScan(owner);
    partition.unnest.forEach((step, index) => {
      const fields = ownerTable.structFields(step, partition.unnest.slice(0, index));
      relation = unnest(relation, `${owner}.${step}`, fields, owner);
    });

    const reach = graph.toOneReachable(owner);
    const keyTables = this.keys.filter((k) => reach.has(k.table)).map((k) => k.table);
    const filteredTables = restricted ? [] : [...this.tableFilters.keys()].filter((t) => t !== owner);
    const innerTables = new Set([
      ...filteredTables.filter((t) => reach.has(t)),
      ...crossFilters.flatMap((f) => [...f.tables]),
    ]);

    // filtered tables past a to-many hop restrict the owner through a semi-join
    const branches = new Map<string, { exit: Hop; tables: string[] }>();
    for (const table of filteredTables.filter((t) => !reach.has(t))) {
      const exit = graph.path(owner, table).find((hop) => !reach.has(hop.to));
      if (!exit) continue;
      const id = `${exit.from}->${exit.to}`;
      const branch = branches.get(id) ?? { exit, tables: [] };
      branch.tables.push(table);
      branches.set(id, branch);
    }

    const needed = new Set([...keyTables, ...innerTables, ...[...branches.values()].map((b) => b.exit.from)]);
    needed.delete(owner);
    const joined = new Set([owner]);
    for (const table of this.model.tables.keys()) {
      if (!needed.has(table)) continue;
      for (const hop of reach.get(table) ?? []) {
        if (joined.has(hop.to)) continue;
        const inner = [...innerTables].some((t) => (reach.get(t) ?? []).some((h) => h.to === hop.to));
        relation = joinNodes(inner ? 'inner' : 'left', relation, side(hop.to), qualifiedPairs(hop));
        joined.add(hop.to);
      }
    }

    relation = filter(relation, crossFilters.map((f) => f.condition));

    for (const { exit, tables } of branches.values()) {
      let branch = this.filteredScan(exit.to);
      const inBranch = new Set([exit.to]);
      for (const table of tables) {
        for (const hop of graph.path(exit.to, table)) {
          if (inBranch.has(hop.to)) continue;
          branch = joinNodes('inner', branch, this.filteredScan(hop.to), qualifiedPairs(hop));
          inBranch.add(hop.to);
        }
      }
      relation = joinNodes('semi', relation, branch, qualifiedPairs(exit));
    }

    const keys = this.keys.filter((k) => reach.has(k.table));
    const aggregated = aggregate(
      relation,
      keys.map((k) => this.keyExpr(k)),
      partition.measures.map((m) => ({ name: m.name, expr: qualify(m.field.expr, owner) }))
    );
    return { partition, keys, source: relation, aggregated };
  }

  private keyExpr(key: GroupKey): NamedExpr {
    return { name: key.name, expr: qualify(key.dimension.resolved, key.table) };
  }

  // --- assembly ---

  compile(): Plan {
    const { base, totals } = this.baseMeasures();
    const partitions = this.partition(base);

    let result: PlanNode;
    const totalSources = new Map<string, PlanNode>();

    if (partitions.length === 0) {
      // dimensions only: the distinct key combinations
      result = aggregate(this.filteredRawTree(), this.keys.map((k) => this.keyExpr(k)), []);
    } else {
      const built = partitions.map((p) => this.buildPartition(p, this.needsRestriction(p)));
      for (const b of built) {
        for (const measure of b.partition.measures) totalSources.set(measure.name, b.source);
      }
      result = this.combine(built);
    }

    for (const [name, measure] of totals) {
      const source = totalSources.get(name);
      if (!source) continue;
      const total = aggregate(source, [], [{ name: totalColumn(name), expr: qualify(measure.field.expr, measure.table) }]);
      result = joinNodes('cross', result, total);
    }

    const formulaColumns = {
      measure: (name: string) => name,
      total: (name: string) => (totals.has(name) ? totalColumn(name) : undefined),
    };
    const calculated = uniqueBy([...this.measures, ...this.helperMeasures], (m) => m.name).flatMap((ref): NamedExpr[] =>
      ref.kind === 'calculated'
        ? [{ name: ref.name, expr: evaluateFormula(this.model, ref.field.formula, ref.table, formulaColumns) }]
        : []
    );
    result = extend(result, calculated);
    result = filter(result, this.postFilters);

    const outputs = uniqueBy([...this.keys.map((k) => k.name), ...this.measures.map((m) => m.name)], (n) => n);
    result = this.mutations(result, outputs);
    result = project(result, outputs);
    result = orderBy(result, this.orderKeys(outputs));
    result = limit(result, this.limit());

    if (this.options.debug) {
      this.options.logger.debug(`Compiled plan:\n${printPlan(result)}`);
    }
    return new Plan(result, this.options.backend);
  }

  /**
   * A filter spanning tables outside the owner's to-one reach cannot be
   * pushed into the partition; its rows are restricted through the whole
   * filtered join tree instead.
   */
  private needsRestriction(partition: Partition): boolean {
    if (this.canPreAggregate(partition.owner)) return false;
    this.options.logger.warn(
      `A filter spans tables that measures of '${partition.owner}' cannot reach through to-one joins; ` +
        'restricting its rows through the filtered join tree'
    );
    return true;
  }

  private combine(built: BuiltPartition[]): PlanNode {
    if (this.keys.length === 0) {
      return built.map((b) => b.aggregated).reduce((left, right) => joinNodes('cross', left, right));
    }
    if (built.length === 1 && this.model.tables.size === 1) {
      return built[0].aggregated;
    }

    let result: PlanNode = aggregate(this.filteredRawTree(), this.keys.map((k) => this.keyExpr(k)), []);
    for (const b of built) {
      result =
        b.keys.length === 0
          ? joinNodes('cross', result, b.aggregated)
          : joinNodes(
              'left',
              result,
              b.aggregated,
              b.keys.map((k) => ({ left: k.name, right: k.name })),
              true
            );
    }
    return result;
  }

  // --- mutations ---

  /** output column named by `field`, as given or through the namespace */
  private outputColumn(field: string, outputs: readonly string[]): string | undefined {
    if (outputs.includes(field)) return field;
    try {
      const column = this.model.resolve(field).name;
      return outputs.includes(column) ? column : undefined;
    } catch (error) {
      if (error instanceof UnknownFieldError) return undefined;
      throw error;
    }
  }

  private readColumn(mutation: string, field: string, outputs: readonly string[]): string {
    const column = this.outputColumn(field, outputs);
    if (column === undefined) {
      throw new InvalidRequestError(
        `Mutation '${mutation}' reads '${field}', which is not a group key, measure or earlier mutation of the request`
      );
    }
    return column;
  }

  /** appends each mutated name to `outputs` */
  private mutations(input: PlanNode, outputs: string[]): PlanNode {
    let result = input;
    for (const [name, entry] of Object.entries(this.request.mutate ?? {})) {
      if (name.trim() === '') throw new InvalidRequestError('Mutation names must not be empty');
      if (outputs.includes(name) || result.columns.includes(name)) {
        throw new InvalidRequestError(`Mutation '${name}' collides with a column of the request`);
      }
      result = isWindowInput(entry)
        ? window(result, [this.windowDefinition(name, entry, outputs)])
        : extend(result, [{ name, expr: this.mutationExpr(name, entry, outputs) }]);
      outputs.push(name);
    }
    return result;
  }

  private mutationExpr(name: string, input: string | Expr, outputs: readonly string[]): Expr {
    const expr = typeof input === 'string' ? parseExpression(input) : input;
    let aggregates = false;
    walkExpr(expr, (node) => {
      if (node.kind === 'aggregate') aggregates = true;
    });
    if (aggregates) {
      throw new InvalidRequestError(`Mutation '${name}' must not aggregate; define a measure for it instead`);
    }
    return mapColumns(expr, (field) => this.readColumn(name, field, outputs));
  }

  private windowDefinition(name: string, input: WindowInput, outputs: readonly string[]): WindowDefinition {
    const fn = input.window;
    if (!WINDOW_FUNCTIONS.includes(fn)) {
      throw new InvalidRequestError(`Unsupported window function '${fn}'; expected one of: ${WINDOW_FUNCTIONS.join(', ')}`);
    }
    const reads = fn === 'running_sum' || fn === 'lag' || fn === 'lead';
    if (reads && input.column === undefined) {
      throw new InvalidRequestError(`Window '${name}' uses ${fn}, which needs a column`);
    }
    if (input.offset !== undefined) {
      if (fn !== 'lag' && fn !== 'lead') {
        throw new InvalidRequestError(`Window '${name}' takes an offset only with lag or lead`);
      }
      if (!Number.isInteger(input.offset) || input.offset < 1) {
        throw new InvalidRequestError(`Window '${name}' offset must be a positive integer, got ${input.offset}`);
      }
    }
    if (input.orderBy.length === 0) {
      throw new InvalidRequestError(`Window '${name}' needs at least one orderBy item`);
    }
    return {
      name,
      fn,
      column: reads && input.column !== undefined ? this.readColumn(name, input.column, outputs) : undefined,
      offset: input.offset,
      partitionBy: (input.partitionBy ?? []).map((field) => this.readColumn(name, field, outputs)),
      orderBy: this.sortKeys(input.orderBy, outputs, (field) =>
        `Window '${name}' orders by '${field}', which is not a group key, measure or earlier mutation of the request`
      ),
    };
  }

  // --- ordering ---

  private sortKeys(items: readonly OrderByItem[], outputs: readonly string[], missing: (field: string) => string): SortKey[] {
    return items.map((item) => {
      const [field, direction]: readonly [string, SortDirection] = typeof item === 'string' ? [item, 'asc'] : item;
      if (direction !== 'asc' && direction !== 'desc') {
        throw new InvalidRequestError(`Sort direction for '${field}' must be 'asc' or 'desc'`);
      }
      const column = this.outputColumn(field, outputs);
      if (column === undefined) throw new InvalidRequestError(missing(field));
      return { column, direction };
    });
  }

  private orderKeys(outputs: readonly string[]): SortKey[] {
    return this.sortKeys(
      this.request.orderBy ?? [],
      outputs,
      (field) => `Cannot order by '${field}'; it is not a group key or measure of the request`
    );
  }

  private limit(): number | undefined {
    const requested = this.request.limit;
    if (requested !== undefined && (!Number.isInteger(requested) || requested < 0)) {
      throw new InvalidRequestError(`limit must be a non-negative integer, got ${requested}`);
    }
    const { maxLimit } = this.options;
    if (maxLimit === undefined) return requested;
    return requested === undefined ? maxLimit : Math.min(requested, maxLimit);
  }
}

/**
 * Compile an aggregation request against a model.
 */
export function compileRequest(model: SemanticModel, request: AggregationRequest, options: CompilerOptions = {}): Plan {
  return compileResolved(model, request, resolveOptions(options));
}

/** compile with options already merged with the environment */
export function compileResolved(model: SemanticModel, request: AggregationRequest, options: ResolvedOptions): Plan {
  return new RequestCompiler(model, request, options).compile();
}

