/**
 * SQL Generator
 *
 * Renders a plan as one SQL statement of nested subqueries. Identifiers are
 * always double-quoted because plan columns carry dots. The dialect is
 * ANSI with the DuckDB/Postgres spellings of UNNEST, ILIKE and DATE_TRUNC.
 */

import type { Expr, Scalar } from '../parser/ast.js';
import type { Condition, JoinPlanNode, PlanNode, SortKey, WindowDefinition } from './plan.js';

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

const q = quoteIdentifier;

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `  ${line}`)
    .join('\n');
}

function subquery(node: PlanNode): string {
  return `(\n${indent(generateSQL(node))}\n)`;
}

export function sqlLiteral(value: Scalar): string {
  if (value === null) return 'NULL';
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (typeof value === 'number') return String(value);
  if (value instanceof Date) {
    const iso = value.toISOString();
    if (iso.endsWith('T00:00:00.000Z')) return `DATE '${iso.slice(0, 10)}'`;
    const millis = value.getUTCMilliseconds() > 0 ? iso.slice(19, 23) : '';
    return `TIMESTAMP '${iso.slice(0, 19).replace('T', ' ')}${millis}'`;
  }
  return `'${value.replace(/'/g, "''")}'`;
}

const BINARY_SYMBOLS = { add: '+', sub: '-', mul: '*' } as const;

/**
 * Render a scalar or aggregate expression. `alias` qualifies column
 * references (`t."orders.amount"`).
 */
export function sqlExpr(expr: Expr, alias?: string): string {
  const column = (name: string) => (alias ? `${alias}.${q(name)}` : q(name));
  const recurse = (inner: Expr) => sqlExpr(inner, alias);

  switch (expr.kind) {
    case 'column':
      return column(expr.name);
    case 'literal':
      return sqlLiteral(expr.value);
    case 'binary':
      if (expr.op === 'div') {
        // NULL instead of a division-by-zero error
        return `(${recurse(expr.left)} / NULLIF(${recurse(expr.right)}, 0))`;
      }
      return `(${recurse(expr.left)} ${BINARY_SYMBOLS[expr.op]} ${recurse(expr.right)})`;
    case 'negate':
      return `(-${recurse(expr.operand)})`;
    case 'call':
      return `${expr.fn.toUpperCase()}(${expr.args.map(recurse).join(', ')})`;
    case 'aggregate': {
      if (expr.arg === null) return 'COUNT(*)';
      const arg = recurse(expr.arg);
      switch (expr.fn) {
        case 'count_distinct':
          return `COUNT(DISTINCT ${arg})`;
        case 'mean':
          return `AVG(${arg})`;
        default:
          return `${expr.fn.toUpperCase()}(${arg})`;
      }
    }
    case 'cast':
      return `CAST(${recurse(expr.operand)} AS ${expr.to === 'string' ? 'VARCHAR' : 'DOUBLE'})`;
    case 'truncate':
      return `DATE_TRUNC('${expr.grain}', ${recurse(expr.operand)})`;
    case 'opaque': {
      const { table } = expr;
      return expr.sql.replace(/\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) =>
        column(table ? `${table}.${name}` : name)
      );
    }
  }
}

export function sqlCondition(condition: Condition): string {
  if (condition.kind !== 'compare') {
    const joiner = condition.kind === 'and' ? ' AND ' : ' OR ';
    return `(${condition.children.map(sqlCondition).join(joiner)})`;
  }
  const operand = sqlExpr(condition.operand);
  switch (condition.operator) {
    case 'is null':
    case 'is not null':
      return `${operand} ${condition.operator.toUpperCase()}`;
    case 'in':
    case 'not in':
      return `${operand} ${condition.operator.toUpperCase()} (${(condition.values ?? []).map(sqlLiteral).join(', ')})`;
    default:
      return `${operand} ${condition.operator.toUpperCase()} ${sqlLiteral(condition.value ?? null)}`;
  }
}

function joinCondition(node: JoinPlanNode): string {
  if (node.on.length === 0) return 'TRUE';
  const equals = node.nullSafe ? 'IS NOT DISTINCT FROM' : '=';
  return node.on.map((pair) => `l.${q(pair.left)} ${equals} r.${q(pair.right)}`).join(' AND ');
}

function renderJoin(node: JoinPlanNode): string {
  if (node.how === 'semi') {
    return [
      'SELECT l.*',
      `FROM ${subquery(node.left)} AS l`,
      `WHERE EXISTS (SELECT 1 FROM ${subquery(node.right)} AS r WHERE ${joinCondition(node)})`,
    ].join('\n');
  }

  const extra = node.right.columns.filter((c) => !node.left.columns.includes(c));
  const select = ['l.*', ...extra.map((c) => `r.${q(c)}`)].join(', ');
  const keyword = node.how === 'cross' ? 'CROSS JOIN' : node.how === 'left' ? 'LEFT JOIN' : 'INNER JOIN';
  const on = node.how === 'cross' ? '' : ` ON ${joinCondition(node)}`;
  return [`SELECT ${select}`, `FROM ${subquery(node.left)} AS l`, `${keyword} ${subquery(node.right)} AS r${on}`].join('\n');
}

function sortList(keys: readonly SortKey[]): string {
  return keys.map((k) => `${q(k.column)} ${k.direction.toUpperCase()}`).join(', ');
}

function orderClause(keys: readonly SortKey[]): string {
  return `ORDER BY ${sortList(keys)}`;
}

function windowCall(definition: WindowDefinition): string {
  const column = definition.column === undefined ? 'NULL' : q(definition.column);
  switch (definition.fn) {
    case 'row_number':
    case 'rank':
    case 'dense_rank':
      return `${definition.fn.toUpperCase()}()`;
    case 'running_sum':
      return `SUM(${column})`;
    case 'lag':
    case 'lead':
      return `${definition.fn.toUpperCase()}(${column}, ${definition.offset ?? 1})`;
  }
}

function windowExpr(definition: WindowDefinition): string {
  const over = [
    ...(definition.partitionBy.length > 0 ? [`PARTITION BY ${definition.partitionBy.map(q).join(', ')}`] : []),
    `ORDER BY ${sortList(definition.orderBy)}`,
    // SUM's default frame would treat peers as one step
    ...(definition.fn === 'running_sum' ? ['ROWS BETWEEN UNBOUNDED PRECEDING AND CURRENT ROW'] : []),
  ];
  return `${windowCall(definition)} OVER (${over.join(' ')})`;
}

/**
 * Render a plan node (and everything below it) as a SELECT statement.
 */
export function generateSQL(node: PlanNode): string {
  switch (node.kind) {
    case 'scan':
      return `SELECT ${node.source.map((c) => `${q(c)} AS ${q(`${node.table}.${c}`)}`).join(', ')} FROM ${q(node.table)}`;

    case 'filter':
      return ['SELECT *', `FROM ${subquery(node.input)} AS t`, `WHERE ${sqlCondition(node.condition)}`].join('\n');

    case 'unnest': {
      const kept = node.input.columns.filter((c) => c !== node.column).map((c) => `t.${q(c)}`);
      const element = `u.${q('value')}`;
      const exposed = node.fields
        ? node.fields.map((f) => `${element}.${q(f)} AS ${q(`${node.prefix}.${f}`)}`)
        : [`${element} AS ${q(node.column)}`];
      return [
        `SELECT ${[...kept, ...exposed].join(', ')}`,
        `FROM ${subquery(node.input)} AS t`,
        `CROSS JOIN UNNEST(t.${q(node.column)}) AS u(${q('value')})`,
      ].join('\n');
    }

    case 'extend': {
      const definitions = node.definitions.map((d) => `${sqlExpr(d.expr)} AS ${q(d.name)}`);
      return [`SELECT *, ${definitions.join(', ')}`, `FROM ${subquery(node.input)} AS t`].join('\n');
    }

    case 'join':
      return renderJoin(node);

    case 'aggregate': {
      const select = [...node.keys, ...node.measures].map((n) => `${sqlExpr(n.expr)} AS ${q(n.name)}`);
      const lines = [`SELECT ${select.join(', ')}`, `FROM ${subquery(node.input)} AS t`];
      if (node.keys.length > 0) {
        lines.push(`GROUP BY ${node.keys.map((k) => sqlExpr(k.expr)).join(', ')}`);
      }
      return lines.join('\n');
    }

    case 'project':
      return [`SELECT ${node.columns.map(q).join(', ')}`, `FROM ${subquery(node.input)} AS t`].join('\n');

    case 'window': {
      const definitions = node.definitions.map((d) => `${windowExpr(d)} AS ${q(d.name)}`);
      return [`SELECT *, ${definitions.join(', ')}`, `FROM ${subquery(node.input)} AS t`].join('\n');
    }

    case 'union':
      return node.inputs
        .map((input) => [`SELECT ${node.columns.map(q).join(', ')}`, `FROM ${subquery(input)} AS t`].join('\n'))
        .join('\nUNION ALL\n');

    case 'orderBy':
      return ['SELECT *', `FROM ${subquery(node.input)} AS t`, orderClause(node.keys)].join('\n');

    case 'limit': {
      // ORDER BY and LIMIT share one SELECT so the order survives
      const ordered = node.input.kind === 'orderBy' ? node.input : null;
      const lines = ['SELECT *', `FROM ${subquery(ordered ? ordered.input : node.input)} AS t`];
      if (ordered) lines.push(orderClause(ordered.keys));
      lines.push(`LIMIT ${node.count}`);
      return lines.join('\n');
    }
  }
}
