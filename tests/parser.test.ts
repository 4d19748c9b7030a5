/**
 * Expression Parser Test Suite
 *
 * Covers the three textual forms: expressions, formulas and predicates,
 * plus the prettifier that prints them back.
 */

import { describe, it, expect } from 'vitest';
import {
  parseExpression,
  parseFormula,
  parsePredicate,
  parseExpressionWithErrors,
  formatExpr,
  formatFormula,
  formatPredicate,
  ExpressionSyntaxError,
} from '../packages/index.js';

describe('Expressions', () => {
  it('respects arithmetic precedence', () => {
    expect(parseExpression('a + b * 2')).toEqual({
      kind: 'binary',
      op: 'add',
      left: { kind: 'column', name: 'a' },
      right: { kind: 'binary', op: 'mul', left: { kind: 'column', name: 'b' }, right: { kind: 'literal', value: 2 } },
    });
  });

  it('parses aggregates', () => {
    expect(parseExpression('count(*)')).toEqual({ kind: 'aggregate', fn: 'count', arg: null });
    expect(parseExpression('count()')).toEqual({ kind: 'aggregate', fn: 'count', arg: null });
    expect(parseExpression('count(distinct customer_id)')).toEqual({
      kind: 'aggregate',
      fn: 'count_distinct',
      arg: { kind: 'column', name: 'customer_id' },
    });
    expect(parseExpression('AVG(amount)')).toEqual({ kind: 'aggregate', fn: 'mean', arg: { kind: 'column', name: 'amount' } });
  });

  it('parses scalar functions and qualified columns', () => {
    expect(parseExpression("coalesce(orders.status, 'none')")).toEqual({
      kind: 'call',
      fn: 'coalesce',
      args: [{ kind: 'column', name: 'orders.status' }, { kind: 'literal', value: 'none' }],
    });
  });

  it('folds negative numbers into literals', () => {
    expect(parseExpression('-3')).toEqual({ kind: 'literal', value: -3 });
    expect(parseExpression('-a')).toEqual({ kind: 'negate', operand: { kind: 'column', name: 'a' } });
  });

  it('rejects unknown functions', () => {
    expect(() => parseExpression('median(a)')).toThrow("Unknown function 'median'");
  });

  it('rejects DISTINCT outside count', () => {
    expect(() => parseExpression('sum(distinct a)')).toThrow(ExpressionSyntaxError);
  });

  it('reports syntax errors without throwing through the editor entry point', () => {
    const result = parseExpressionWithErrors('a +');
    expect(result.ast).toBeNull();
    expect(result.parseErrors.length).toBeGreaterThan(0);
  });
});

describe('Formulas', () => {
  it('reads names as measure references and all() as a grand total', () => {
    expect(parseFormula('revenue / all(revenue)')).toEqual({
      kind: 'binary',
      op: 'div',
      left: { kind: 'measureRef', name: 'revenue' },
      right: { kind: 'grandTotal', of: { kind: 'measureRef', name: 'revenue' } },
    });
  });

  it('rejects other functions', () => {
    expect(() => parseFormula('sum(revenue)')).toThrow("Function 'sum' is not allowed in a formula");
  });

  it('rejects string literals', () => {
    expect(() => parseFormula("revenue * 'x'")).toThrow('Formulas only accept numeric literals');
  });
});

describe('Predicates', () => {
  it('binds AND tighter than OR', () => {
    expect(parsePredicate("a = 1 OR b = 2 AND c != 'x'")).toEqual({
      type: 'compound',
      operator: 'OR',
      children: [
        { type: 'comparison', field: 'a', operator: '=', value: 1 },
        {
          type: 'compound',
          operator: 'AND',
          children: [
            { type: 'comparison', field: 'b', operator: '=', value: 2 },
            { type: 'comparison', field: 'c', operator: '!=', value: 'x' },
          ],
        },
      ],
    });
  });

  it('parses membership, patterns and null checks', () => {
    expect(parsePredicate("region NOT IN ('West', 'East')")).toEqual({
      type: 'comparison',
      field: 'region',
      operator: 'not in',
      values: ['West', 'East'],
    });
    expect(parsePredicate("name ilike 'a%'")).toEqual({ type: 'comparison', field: 'name', operator: 'ilike', value: 'a%' });
    expect(parsePredicate('shipped_at is not null')).toEqual({ type: 'comparison', field: 'shipped_at', operator: 'is not null' });
  });

  it('accepts negative numbers and the <> spelling', () => {
    expect(parsePredicate('delta <> -5')).toEqual({ type: 'comparison', field: 'delta', operator: '!=', value: -5 });
  });
});

describe('Prettifier', () => {
  it('prints only the parentheses precedence needs', () => {
    expect(formatExpr(parseExpression('(a + b) * c - (d - e)'))).toBe('(a + b) * c - (d - e)');
    expect(formatExpr(parseExpression('(a * b) + c'))).toBe('a * b + c');
  });

  it('prints formulas and predicates back to parseable text', () => {
    const formula = 'revenue / all(revenue) * 100';
    expect(parseFormula(formatFormula(parseFormula(formula)))).toEqual(parseFormula(formula));

    const predicate = "(a = 1 OR b = 2) AND name like 'it''s%'";
    expect(formatPredicate(parsePredicate(predicate))).toBe(predicate);
  });
});
