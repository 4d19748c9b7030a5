/**
 * Aggregation compiler tests
 *
 * Runs compiled plans on the in-memory backend and checks the numbers
 * against hand-computed totals. The shop fixture has three orders
 * (100, 120, 80) with six line items, and two customers with tickets.
 */

import { describe, it, expect } from 'vitest';
import {
  createSemanticLayer,
  compileRequest,
  table,
  joinMany,
  MemoryBackend,
  SemanticModel,
  InvalidRequestError,
  InvalidTimeGrainError,
  UnknownFieldError,
} from '../packages/index.js';
import { orders, orderItemsTree, chasmTree, backend, recordingLogger } from './fixtures/commerce.js';

describe('fan-out', () => {
  it('sums order amounts once even when line items are requested alongside', async () => {
    const layer = createSemanticLayer(orderItemsTree, { backend: backend() });
    const rows = await layer.query({ measures: ['total_amount', 'item_count'] });
    expect(rows).toEqual([{ 'orders.total_amount': 300, 'line_items.item_count': 6 }]);
  });

  it('keeps per-group totals exact when grouping by the one side', async () => {
    const layer = createSemanticLayer(orderItemsTree, { backend: backend() });
    const rows = await layer.query({
      groupKeys: ['status'],
      measures: ['total_amount', 'total_quantity'],
      orderBy: ['status'],
    });
    expect(rows).toEqual([
      { 'orders.status': 'open', 'orders.total_amount': 120, 'line_items.total_quantity': 2 },
      { 'orders.status': 'shipped', 'orders.total_amount': 180, 'line_items.total_quantity': 11 },
    ]);
  });
});

describe('chasm', () => {
  it('counts orders and tickets independently under a shared customer', async () => {
    const layer = createSemanticLayer(chasmTree, { backend: backend() });
    const rows = await layer.query({ measures: ['order_count', 'ticket_count'] });
    expect(rows).toEqual([{ 'orders.order_count': 3, 'tickets.ticket_count': 3 }]);
  });

  it('keeps a group key with no facts exactly once, with null measures', async () => {
    const layer = createSemanticLayer(chasmTree, { backend: backend() });
    const rows = await layer.query({
      groupKeys: ['region'],
      measures: ['order_count', 'ticket_count'],
      orderBy: ['region'],
    });
    expect(rows).toEqual([
      { 'customers.region': 'East', 'orders.order_count': 1, 'tickets.ticket_count': 1 },
      { 'customers.region': 'North', 'orders.order_count': null, 'tickets.ticket_count': null },
      { 'customers.region': 'West', 'orders.order_count': 2, 'tickets.ticket_count': 2 },
    ]);
    expect(rows.filter((row) => row['customers.region'] === 'North')).toHaveLength(1);
  });
});

describe('calculated measures', () => {
  it('computes a share of the grand total that sums to one', async () => {
    const model = new SemanticModel(orders.defineCalculatedMeasure('share', 'total_amount / all(total_amount)'));
    const rows = await compileRequest(model, { groupKeys: ['status'], measures: ['share'], orderBy: ['status'] }).execute(
      backend()
    );

    expect(rows.map((row) => row.status)).toEqual(['open', 'shipped']);
    const shares = rows.map((row) => Number(row.share));
    expect(shares[0]).toBeCloseTo(0.4, 12);
    expect(shares[1]).toBeCloseTo(0.6, 12);
    expect(shares[0] + shares[1]).toBeCloseTo(1, 12);
  });

  it('divides integer sums as doubles', async () => {
    const pairs = table('pairs', { a: 'integer', b: 'integer' })
      .defineMeasure('sa', 'sum(a)')
      .defineMeasure('sb', 'sum(b)')
      .defineCalculatedMeasure('ratio', 'sa / sb');
    const layer = createSemanticLayer(pairs, { backend: new MemoryBackend({ pairs: [{ a: 7, b: 2 }] }) });

    expect(await layer.query({ measures: ['ratio'] })).toEqual([{ ratio: 3.5 }]);
    expect(layer.toSQL({ measures: ['ratio'] })).toContain('CAST("sa" AS DOUBLE)');
  });

  it('combines measures of different tables through a namespace-level formula', async () => {
    const layer = createSemanticLayer(orderItemsTree, { backend: backend() }).withCalculatedMeasure(
      'amount_per_item',
      'total_amount / item_count'
    );
    const rows = await layer.query({ measures: ['amount_per_item'] });
    expect(rows).toEqual([{ amount_per_item: 50 }]);
  });
});

describe('averages across a join', () => {
  const customers = table('customers', { id: 'integer', region: 'string' }).defineDimension('region', 'region');
  const sales = table('orders', { id: 'integer', customer_id: 'integer', amount: 'number' }).defineMeasure(
    'avg_amount',
    'avg(amount)'
  );
  // West customers place one and three orders: the mean of their means would be 200
  const data = new MemoryBackend({
    customers: [
      { id: 1, region: 'West' },
      { id: 2, region: 'West' },
      { id: 3, region: 'East' },
    ],
    orders: [
      { id: 1, customer_id: 1, amount: 100 },
      { id: 2, customer_id: 2, amount: 200 },
      { id: 3, customer_id: 2, amount: 300 },
      { id: 4, customer_id: 2, amount: 400 },
      { id: 5, customer_id: 3, amount: 500 },
      { id: 6, customer_id: 3, amount: 600 },
    ],
  });

  it('averages order rows per region, not per-customer averages', async () => {
    const layer = createSemanticLayer(joinMany(customers, sales, 'customers.id = orders.customer_id'), { backend: data });
    const rows = await layer.query({ groupKeys: ['region'], measures: ['avg_amount'], orderBy: ['region'] });
    expect(rows).toEqual([
      { 'customers.region': 'East', 'orders.avg_amount': 550 },
      { 'customers.region': 'West', 'orders.avg_amount': 250 },
    ]);
  });
});

describe('time grains', () => {
  it('truncates a time dimension to the requested grain', async () => {
    const layer = createSemanticLayer(orders, { backend: backend() });
    const rows = await layer.query({
      groupKeys: ['created_at'],
      measures: ['total_amount'],
      timeGrain: 'month',
      orderBy: ['created_at'],
    });
    expect(rows).toEqual([
      { created_at: new Date('2024-03-01T00:00:00Z'), total_amount: 220 },
      { created_at: new Date('2024-04-01T00:00:00Z'), total_amount: 80 },
    ]);
  });

  it('rejects a grain finer than the dimension allows', () => {
    const layer = createSemanticLayer(orders);
    expect(() => layer.compile({ groupKeys: ['created_at'], timeGrain: 'TIME_GRAIN_SECOND' })).toThrow(
      InvalidTimeGrainError
    );
  });

  it('restricts rows with an inclusive time range', async () => {
    const layer = createSemanticLayer(orders, { backend: backend() });
    const rows = await layer.query({
      groupKeys: ['created_at'],
      measures: ['total_amount'],
      timeRange: { start: '2024-03-01', end: '2024-03-31' },
      orderBy: ['created_at'],
    });
    expect(rows).toEqual([
      { created_at: new Date('2024-03-02T00:00:00Z'), total_amount: 120 },
      { created_at: new Date('2024-03-17T00:00:00Z'), total_amount: 100 },
    ]);
  });
});

describe('nested data', () => {
  const baskets = table('baskets', {
    id: 'integer',
    items: { array: { sku: 'string', qty: 'integer' } },
    tags: { array: 'string' },
  })
    .defineMeasure('basket_count', 'count()')
    .defineMeasure('total_qty', { expr: 'sum(qty)', unnest: ['items'] })
    .defineMeasure('tag_count', { expr: 'count(tags)', unnest: ['tags'] });

  const data = new MemoryBackend({
    baskets: [
      { id: 1, items: [{ sku: 'pen', qty: 2 }, { sku: 'ink', qty: 3 }], tags: ['gift'] },
      { id: 2, items: [], tags: ['bulk', 'gift'] },
      { id: 3, items: [{ sku: 'pad', qty: 4 }], tags: null },
    ],
  });

  it('aggregates each unnest path in its own partition', async () => {
    const layer = createSemanticLayer(baskets, { backend: data });
    const rows = await layer.query({ measures: ['basket_count', 'total_qty', 'tag_count'] });
    expect(rows).toEqual([{ basket_count: 3, total_qty: 9, tag_count: 3 }]);
  });
});

describe('ordering and limits', () => {
  it('orders by a measure and limits the result', async () => {
    const layer = createSemanticLayer(orders, { backend: backend() });
    const rows = await layer.query({
      groupKeys: ['status'],
      measures: ['total_amount'],
      orderBy: [['total_amount', 'desc']],
      limit: 1,
    });
    expect(rows).toEqual([{ status: 'shipped', total_amount: 180 }]);
  });

  it('caps results with maxLimit when no limit is given', async () => {
    const layer = createSemanticLayer(orders, { backend: backend(), maxLimit: 1 });
    const rows = await layer.query({ groupKeys: ['status'], measures: ['total_amount'] });
    expect(rows).toHaveLength(1);
  });

  it('rejects ordering by a field that is not an output', () => {
    const layer = createSemanticLayer(orders);
    expect(() => layer.compile({ groupKeys: ['status'], orderBy: ['total_amount'] })).toThrow(
      "Cannot order by 'total_amount'; it is not a group key or measure of the request"
    );
  });

  it('rejects a negative limit', () => {
    const layer = createSemanticLayer(orders);
    expect(() => layer.compile({ measures: ['total_amount'], limit: -1 })).toThrow(InvalidRequestError);
  });
});

describe('request validation', () => {
  const layer = createSemanticLayer(orderItemsTree);

  it('rejects an empty request', () => {
    expect(() => layer.compile({})).toThrow('A request needs at least one group key or measure');
  });

  it('rejects a measure used as a group key', () => {
    expect(() => layer.compile({ groupKeys: ['total_amount'] })).toThrow(
      "Group key 'total_amount' is a measure, not a dimension"
    );
  });

  it('rejects a dimension requested as a measure', () => {
    expect(() => layer.compile({ measures: ['sku'] })).toThrow("'sku' is a dimension; request it as a group key");
  });

  it('rejects unknown fields', () => {
    expect(() => layer.compile({ measures: ['revenue'] })).toThrow(UnknownFieldError);
  });
});

describe('dimensions only', () => {
  it('returns the distinct key combinations', async () => {
    const layer = createSemanticLayer(orderItemsTree, { backend: backend() });
    const rows = await layer.query({ groupKeys: ['status'], orderBy: ['status'] });
    expect(rows).toEqual([{ 'orders.status': 'open' }, { 'orders.status': 'shipped' }]);
  });
});

describe('debug logging', () => {
  it('logs the compiled plan when debug is on', () => {
    const logger = recordingLogger();
    createSemanticLayer(orders, { debug: true, logger }).compile({ measures: ['order_count'] });
    expect(logger.messages).toEqual([
      { level: 'debug', text: 'Compiled plan:\naggregate keys=[] measures=[order_count=count(*)]\n  scan orders [id]' },
    ]);
  });

  it('explains and renders the same plan', () => {
    const plan = createSemanticLayer(orders).compile({ measures: ['order_count'] });
    expect(plan.explain()).toBe('aggregate keys=[] measures=[order_count=count(*)]\n  scan orders [id]');
    expect(plan.toQueryText()).toBe(
      ['SELECT COUNT(*) AS "order_count"', 'FROM (', '  SELECT "id" AS "orders.id" FROM "orders"', ') AS t'].join('\n')
    );
    expect(plan.columns).toEqual(['order_count']);
  });
});
