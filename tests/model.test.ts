/**
 * Model tests - source tables, join trees and the merged namespace
 */

import { describe, it, expect } from 'vitest';
import {
  table,
  joinMany,
  joinOne,
  joinCross,
  SemanticModel,
  TableGraph,
  isToOne,
  DuplicateFieldError,
  DuplicateTableError,
  InvalidDefinitionError,
  UnknownFieldError,
  AmbiguousFieldError,
} from '../packages/index.js';
import { orders, lineItems, customers, orderItemsTree, chasmTree } from './fixtures/commerce.js';

describe('SourceTable', () => {
  it('returns a new table from every definition', () => {
    const base = table('t', { a: 'integer' });
    const withDimension = base.defineDimension('a_dim', 'a');
    expect(base.fieldNames()).toEqual([]);
    expect(withDimension.fieldNames()).toEqual(['a_dim']);
  });

  it('inlines earlier dimensions into later ones', () => {
    const t = table('t', { price: 'number', qty: 'integer' })
      .defineDimension('gross', 'price * qty')
      .defineDimension('net', 'gross - 1');
    const net = t.dimensions.get('net');
    expect(net?.expr).toEqual({ kind: 'binary', op: 'sub', left: { kind: 'column', name: 'gross' }, right: { kind: 'literal', value: 1 } });
    expect(net?.resolved).toEqual({
      kind: 'binary',
      op: 'sub',
      left: { kind: 'binary', op: 'mul', left: { kind: 'column', name: 'price' }, right: { kind: 'column', name: 'qty' } },
      right: { kind: 'literal', value: 1 },
    });
  });

  it('infers time dimensions from date columns', () => {
    expect(orders.dimensions.get('created_at')?.isTimeDimension).toBe(true);
    expect(orders.dimensions.get('status')?.isTimeDimension).toBe(false);
  });

  it('rejects duplicate field names', () => {
    expect(() => orders.defineMeasure('status', 'count()')).toThrow(DuplicateFieldError);
  });

  it('rejects a dimension that aggregates', () => {
    expect(() => table('t', { a: 'integer' }).defineDimension('bad', 'sum(a)')).toThrow(
      "Dimension 't.bad' must not aggregate"
    );
  });

  it('rejects a measure without exactly one aggregate', () => {
    const t = table('t', { a: 'integer' });
    expect(() => t.defineMeasure('plain', 'a')).toThrow("Measure 't.plain' must contain exactly one aggregate");
    expect(() => t.defineMeasure('twice', 'sum(a) + max(a)')).toThrow(InvalidDefinitionError);
  });

  it('rejects a column read outside the aggregate', () => {
    const t = table('t', { a: 'integer', b: 'integer' });
    expect(() => t.defineMeasure('m', 'sum(a) + a')).toThrow("Measure 't.m' reads column 'a' outside its aggregate");
    expect(() => t.defineMeasure('n', 'b * count()')).toThrow(InvalidDefinitionError);
    expect(t.defineMeasure('scaled', 'sum(a) * 2 + 1').measures.has('scaled')).toBe(true);
  });

  it('rejects a measure that reads a dimension', () => {
    const t = table('t', { a: 'integer' }).defineDimension('d', 'a');
    expect(() => t.defineMeasure('m', 'sum(d)')).toThrow("Measure 't.m' references dimension 'd'; use raw columns");
  });

  it('rejects unnesting a scalar column', () => {
    expect(() => table('t', { a: 'integer' }).defineMeasure('m', { expr: 'count()', unnest: ['a'] })).toThrow(
      "Unnest step 'a' of 't.m' is not an array column"
    );
  });

  it('rejects invalid names', () => {
    expect(() => table('bad-name', { a: 'integer' })).toThrow("Invalid table name 'bad-name'");
  });
});

describe('join trees', () => {
  it('rejects a table joined twice', () => {
    expect(() => joinMany(orders, orders, 'orders.id = orders.id')).toThrow(DuplicateTableError);
  });

  it('rejects keys that are not columns of their side', () => {
    expect(() => joinMany(orders, lineItems, 'orders.nope = line_items.order_id')).toThrow(
      "Join key 'orders.nope' does not name a column on its side of the join"
    );
  });

  it('requires key pairs on a keyed join', () => {
    expect(() => joinMany(orders, lineItems, [])).toThrow('A one-to-many join needs at least one key pair');
  });

  it('orients hops so to-one directions are recognised', () => {
    const graph = new TableGraph(orderItemsTree);
    const [fromOrders] = graph.hops('orders');
    const [fromItems] = graph.hops('line_items');
    expect(isToOne(fromOrders)).toBe(false);
    expect(isToOne(fromItems)).toBe(true);
    expect([...graph.toOneReachable('line_items').keys()]).toEqual(['line_items', 'orders']);
  });

  it('treats one-to-one joins as to-one from the left only', () => {
    const profiles = table('profiles', { customer_id: 'integer', tier: 'string' });
    const graph = new TableGraph(joinOne(customers, profiles, 'id = customer_id'));
    expect([...graph.toOneReachable('customers').keys()]).toEqual(['customers', 'profiles']);
    expect([...graph.toOneReachable('profiles').keys()]).toEqual(['profiles']);
  });

  it('never treats a cross join as to-one', () => {
    const graph = new TableGraph(joinCross(customers, table('calendar', { day: 'date' })));
    expect([...graph.toOneReachable('customers').keys()]).toEqual(['customers']);
  });
});

describe('SemanticModel namespace', () => {
  it('keeps bare names on a single table', () => {
    const model = new SemanticModel(orders);
    expect(model.fieldNames()).toEqual(['status', 'created_at', 'total_amount', 'order_count', 'avg_amount']);
    expect(model.resolve('orders.status').name).toBe('status');
  });

  it('prefixes every field once tables are joined', () => {
    const model = new SemanticModel(orderItemsTree);
    expect(model.describe().dimensions.map((d) => d.name)).toEqual(['orders.status', 'orders.created_at', 'line_items.sku']);
    expect(model.resolve('sku').name).toBe('line_items.sku');
    expect(model.resolve('orders.status').name).toBe('orders.status');
  });

  it('reports ambiguous suffixes with their candidates', () => {
    const a = table('a', { id: 'integer', label: 'string' }).defineDimension('label', 'label');
    const b = table('b', { a_id: 'integer', label: 'string' }).defineDimension('label', 'label');
    const model = new SemanticModel(joinMany(a, b, 'a.id = b.a_id'));
    expect(() => model.resolve('label')).toThrow(AmbiguousFieldError);
    expect(() => model.resolve('label')).toThrow("Field 'label' is ambiguous; qualify it as one of: a.label, b.label");
    expect(model.resolve('b.label').table).toBe('b');
  });

  it('rejects unknown fields', () => {
    expect(() => new SemanticModel(chasmTree).resolve('revenue')).toThrow(UnknownFieldError);
  });

  it('adds namespace-level calculated measures and leaves the source model unchanged', () => {
    const model = new SemanticModel(orderItemsTree);
    const extended = model.defineCalculatedMeasure('per_item', 'total_amount / item_count');
    expect(model.fieldNames()).not.toContain('per_item');
    expect(extended.resolve('per_item')).toMatchObject({ kind: 'calculated', table: null, name: 'per_item' });
  });

  it('describes tables, fields and joins', () => {
    const description = new SemanticModel(chasmTree).describe();
    expect(description.tables.map((t) => t.name)).toEqual(['customers', 'orders', 'tickets']);
    expect(description.timeDimensions).toEqual(['orders.created_at']);
    expect(description.measures.find((m) => m.name === 'orders.avg_amount')?.expression).toBe('mean(amount)');
    expect(description.joins).toEqual([
      { left: 'customers', right: 'orders', cardinality: 'one-to-many', on: ['customers.id = orders.customer_id'] },
      { left: 'customers', right: 'tickets', cardinality: 'one-to-many', on: ['customers.id = tickets.customer_id'] },
    ]);
  });
});
