/**
 * Calculated-measure analysis and evaluation
 */

import { describe, it, expect } from 'vitest';
import {
  table,
  joinMany,
  SemanticModel,
  parseFormula,
  neededBaseMeasures,
  collectGrandTotalRefs,
  evaluateFormula,
  CalculatedMeasureCycleError,
  InvalidDefinitionError,
} from '../packages/index.js';

const sales = table('sales', { id: 'integer', amount: 'number', cost: 'number' })
  .defineMeasure('revenue', 'sum(amount)')
  .defineMeasure('spend', 'sum(cost)')
  .defineCalculatedMeasure('profit', 'revenue - spend')
  .defineCalculatedMeasure('margin', 'profit / revenue')
  .defineCalculatedMeasure('revenue_share', 'revenue / all(revenue)');

const model = new SemanticModel(sales);

describe('neededBaseMeasures', () => {
  it('follows calculated measures down to base measures', () => {
    expect(neededBaseMeasures(model, parseFormula('margin * 100'))).toEqual(new Set(['revenue', 'spend']));
  });

  it('includes measures read through all()', () => {
    expect(neededBaseMeasures(model, parseFormula('revenue_share'))).toEqual(new Set(['revenue']));
  });

  it('resolves references against the owning table first', () => {
    const refunds = table('refunds', { sale_id: 'integer', amount: 'number' })
      .defineMeasure('revenue', 'sum(amount)')
      .defineCalculatedMeasure('net', 'revenue * -1');
    const joined = new SemanticModel(joinMany(sales, refunds, 'sales.id = refunds.sale_id'));
    expect(neededBaseMeasures(joined, parseFormula('net'))).toEqual(new Set(['refunds.revenue']));
  });
});

describe('collectGrandTotalRefs', () => {
  it('finds grand totals through nested calculated measures', () => {
    const withNested = model.defineCalculatedMeasure('share_pct', 'revenue_share * 100');
    expect(collectGrandTotalRefs(withNested, parseFormula('share_pct'))).toEqual(new Set(['revenue']));
    expect(collectGrandTotalRefs(model, parseFormula('margin'))).toEqual(new Set());
  });

  it('rejects all() around a calculated measure', () => {
    expect(() => collectGrandTotalRefs(model, parseFormula('all(profit)'))).toThrow(
      'all(profit) must wrap a base measure, not a calculated measure'
    );
  });
});

describe('cycles', () => {
  it('reports the cycle path', () => {
    const looped = new SemanticModel(
      table('t', { a: 'integer' })
        .defineMeasure('base', 'sum(a)')
        .defineCalculatedMeasure('x', 'y + base')
        .defineCalculatedMeasure('y', 'x * 2')
    );
    expect(() => neededBaseMeasures(looped, parseFormula('x'))).toThrow(CalculatedMeasureCycleError);
    expect(() => neededBaseMeasures(looped, parseFormula('x'))).toThrow(
      'Calculated measures reference each other in a cycle: x -> y -> x'
    );
  });
});

describe('evaluateFormula', () => {
  const columns = {
    measure: (name: string) => name,
    total: (name: string) => `__total__.${name}`,
  };

  it('inlines calculated measures and casts both sides of a division', () => {
    expect(evaluateFormula(model, parseFormula('margin'), 'sales', columns)).toEqual({
      kind: 'binary',
      op: 'div',
      left: {
        kind: 'cast',
        to: 'double',
        operand: { kind: 'binary', op: 'sub', left: { kind: 'column', name: 'revenue' }, right: { kind: 'column', name: 'spend' } },
      },
      right: { kind: 'cast', to: 'double', operand: { kind: 'column', name: 'revenue' } },
    });
  });

  it('reads grand totals from their broadcast column', () => {
    expect(evaluateFormula(model, parseFormula('all(revenue)'), null, columns)).toEqual({
      kind: 'column',
      name: '__total__.revenue',
    });
  });

  it('fails when a grand total was not computed', () => {
    expect(() =>
      evaluateFormula(model, parseFormula('all(revenue)'), null, { measure: (name) => name, total: () => undefined })
    ).toThrow(InvalidDefinitionError);
  });
});
