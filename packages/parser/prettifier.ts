/**
 * Prettifier - formats expression, formula and predicate ASTs back to text
 *
 * Text produced for parser-built ASTs parses back to an equal AST.
 * Parentheses are only emitted where precedence requires them.
 */

import type { Expr, MeasureExpr, Predicate, Scalar, ArithmeticOp } from './ast.js';

const SYMBOLS: Record<ArithmeticOp, string> = { add: '+', sub: '-', mul: '*', div: '/' };

function precedence(op: ArithmeticOp): number {
  return op === 'add' || op === 'sub' ? 1 : 2;
}

/** left operands need parens when looser; right ones also when equal and non-commutative */
function wrap(text: string, child: ArithmeticOp | null, parent: ArithmeticOp, side: 'left' | 'right'): string {
  if (child === null) return text;
  const needs =
    precedence(child) < precedence(parent) ||
    (side === 'right' && precedence(child) === precedence(parent) && (parent === 'sub' || parent === 'div'));
  return needs ? `(${text})` : text;
}

export function formatScalar(value: Scalar): string {
  if (value === null) return 'null';
  if (value instanceof Date) return `'${value.toISOString()}'`;
  if (typeof value === 'string') return `'${value.replace(/'/g, "''")}'`;
  return String(value);
}

/**
 * Format an expression AST into source text
 */
export function formatExpr(expr: Expr): string {
  switch (expr.kind) {
    case 'column':
      return expr.name;
    case 'literal':
      return formatScalar(expr.value);
    case 'binary':
      return [
        wrap(formatExpr(expr.left), expr.left.kind === 'binary' ? expr.left.op : null, expr.op, 'left'),
        SYMBOLS[expr.op],
        wrap(formatExpr(expr.right), expr.right.kind === 'binary' ? expr.right.op : null, expr.op, 'right'),
      ].join(' ');
    case 'negate':
      return expr.operand.kind === 'binary' ? `-(${formatExpr(expr.operand)})` : `-${formatExpr(expr.operand)}`;
    case 'call':
      return `${expr.fn}(${expr.args.map(formatExpr).join(', ')})`;
    case 'aggregate':
      if (expr.arg === null) return `${expr.fn}(*)`;
      if (expr.fn === 'count_distinct') return `count(distinct ${formatExpr(expr.arg)})`;
      return `${expr.fn}(${formatExpr(expr.arg)})`;
    case 'cast':
      return formatExpr(expr.operand);
    case 'truncate':
      return `${expr.grain}(${formatExpr(expr.operand)})`;
    case 'opaque':
      return `<opaque: ${expr.sql}>`;
  }
}

/**
 * Format a calculated-measure formula into source text
 */
export function formatFormula(formula: MeasureExpr): string {
  switch (formula.kind) {
    case 'literal':
      return String(formula.value);
    case 'measureRef':
      return formula.name;
    case 'grandTotal':
      return `all(${formula.of.name})`;
    case 'binary':
      return [
        wrap(formatFormula(formula.left), formula.left.kind === 'binary' ? formula.left.op : null, formula.op, 'left'),
        SYMBOLS[formula.op],
        wrap(formatFormula(formula.right), formula.right.kind === 'binary' ? formula.right.op : null, formula.op, 'right'),
      ].join(' ');
  }
}

/**
 * Format a predicate tree into source text
 */
export function formatPredicate(predicate: Predicate): string {
  if (predicate.type === 'compound') {
    const parts = predicate.children.map((child) =>
      child.type === 'compound' && child.operator !== predicate.operator
        ? `(${formatPredicate(child)})`
        : formatPredicate(child)
    );
    return parts.join(` ${predicate.operator} `);
  }

  const { field, operator } = predicate;
  switch (operator) {
    case 'is null':
    case 'is not null':
      return `${field} ${operator}`;
    case 'in':
    case 'not in':
      return `${field} ${operator} (${(predicate.values ?? []).map(formatScalar).join(', ')})`;
    default:
      return `${field} ${operator} ${formatScalar(predicate.value ?? null)}`;
  }
}
