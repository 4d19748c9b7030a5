/**
 * Projection pushdown tests
 */

import { describe, it, expect } from 'vitest';
import {
  table,
  opaque,
  col,
  SemanticModel,
  createSemanticLayer,
  expressionColumns,
  requiredColumns,
  requiredColumnsByTable,
} from '../packages/index.js';
import { orderItemsTree, chasmTree } from './fixtures/commerce.js';

describe('expressionColumns', () => {
  it('lists the columns an expression reads', () => {
    const result = expressionColumns({ kind: 'binary', op: 'mul', left: col('price'), right: col('qty') }, 't');
    expect(result.isOk() && [...result.value]).toEqual(['price', 'qty']);
  });

  it('fails on opaque logic', () => {
    const result = expressionColumns(opaque('md5({id})', (row) => String(row.id)), 't');
    expect(result.isErr() && result.error).toEqual({ reason: 'opaque', table: 't', detail: "opaque expression 'md5({id})'" });
  });
});

describe('requiredColumns', () => {
  const events = table('events', {
    id: 'integer',
    kind: 'string',
    payload: { array: { value: 'number' } },
    note: 'string',
  });

  it('keeps join keys, expression columns and the first unnest column', () => {
    const result = requiredColumns(events, {
      joinKeys: ['id'],
      dimensions: [col('kind')],
      measures: [{ expr: { kind: 'aggregate', fn: 'sum', arg: col('value') }, unnest: ['payload'] }],
    });
    expect(result.isOk() && [...result.value].sort()).toEqual(['id', 'kind', 'payload']);
  });

  it('fails when an expression is opaque', () => {
    const result = requiredColumns(events, { dimensions: [opaque('upper({note})', (row) => row.note ?? null)] });
    expect(result.isErr()).toBe(true);
  });
});

describe('requiredColumnsByTable', () => {
  it('reads only what a request touches, plus join keys', () => {
    const columns = requiredColumnsByTable(new SemanticModel(orderItemsTree), {
      groupKeys: ['sku'],
      measures: ['total_amount'],
      filters: { status: 'shipped' },
    });
    expect(columns.get('orders')).toEqual(new Set(['id', 'amount', 'status']));
    expect(columns.get('line_items')).toEqual(new Set(['order_id', 'sku']));
  });

  it('widens a table with an opaque dimension to all its columns', () => {
    const accounts = table('accounts', { id: 'integer', email: 'string', plan: 'string' })
      .defineDimension('domain', { expr: opaque("split_part({email}, '@', 2)", (row) => String(row.email).split('@')[1] ?? null) })
      .defineMeasure('account_count', 'count()');
    const columns = requiredColumnsByTable(new SemanticModel(accounts), { groupKeys: ['domain'], measures: ['account_count'] });
    expect(columns.get('accounts')).toEqual(new Set(['id', 'email', 'plan']));
  });

  it('widens every owner of an ambiguous raw filter column', () => {
    const columns = requiredColumnsByTable(new SemanticModel(chasmTree), { measures: ['ticket_count'], filters: 'id > 1' });
    expect(columns.get('customers')).toEqual(new Set(['id', 'name', 'region']));
    expect(columns.get('orders')).toEqual(new Set(['id', 'customer_id', 'amount', 'status', 'created_at']));
    expect(columns.get('tickets')).toEqual(new Set(['id', 'customer_id', 'priority']));
  });

  it('narrows the scans of a compiled plan', () => {
    const sql = createSemanticLayer(orderItemsTree).toSQL({ measures: ['total_amount'] });
    expect(sql).toContain('SELECT "id" AS "orders.id", "amount" AS "orders.amount" FROM "orders"');
  });

  it('reads every column when pushdown is off', () => {
    const sql = createSemanticLayer(orderItemsTree, { projectionPushdown: false }).toSQL({ measures: ['total_amount'] });
    expect(sql).toContain(
      'SELECT "id" AS "orders.id", "customer_id" AS "orders.customer_id", "amount" AS "orders.amount", "status" AS "orders.status", "created_at" AS "orders.created_at" FROM "orders"'
    );
  });
});
